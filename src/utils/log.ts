import log from 'electron-log/node';

export type LogLevelSetting = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly' | false;

export interface LoggingOptions {
  level?: LogLevelSetting;
  /** Absolute path of a log file; file logging stays off without one */
  file?: string;
}

export const parseLogLevel = (value: string | undefined): LogLevelSetting | undefined => {
  if (value === undefined) return undefined;
  const normalised = value.trim().toLowerCase();
  if (['off', 'none', 'false', 'silent'].includes(normalised)) return false;
  switch (normalised) {
    case 'error':
    case 'warn':
    case 'info':
    case 'verbose':
    case 'debug':
    case 'silly':
      return normalised;
    default:
      return undefined;
  }
};

const defaultConsoleLevel = (): LogLevelSetting => {
  const fromEnv = parseLogLevel(process.env.TAGFOLD_LOG_LEVEL);
  if (fromEnv !== undefined) return fromEnv;
  return process.env.NODE_ENV === 'test' ? false : 'info';
};

log.transports.console.level = defaultConsoleLevel();
log.transports.file.level = false;

export const configureLogging = (options: LoggingOptions) => {
  if (options.level !== undefined) {
    log.transports.console.level = options.level;
  }
  if (options.file) {
    const filePath = options.file;
    log.transports.file.resolvePathFn = () => filePath;
    log.transports.file.level = options.level === false ? 'info' : options.level ?? 'info';
  }
};

export const createLogger = (scope: string) => log.scope(scope);

export type ScopedLogger = ReturnType<typeof createLogger>;
