import type { ScanIssue, ScanIssueStage } from './fileTypes';

export type TagfoldErrorCode =
  | 'scan_failed'
  | 'root_unreadable'
  | 'provider_unavailable'
  | 'provider_timeout'
  | 'index_connection'
  | 'rejected_document'
  | 'move_failed'
  | 'invalid_config';

export class TagfoldError extends Error {
  readonly code: TagfoldErrorCode;

  constructor(code: TagfoldErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A single entry could not be read during a scan; the scan carries on without it. */
export class ScanError extends TagfoldError {
  readonly path: string;
  readonly stage: ScanIssueStage;

  constructor(filePath: string, stage: ScanIssueStage, message: string, options?: { cause?: unknown }) {
    super('scan_failed', message, options);
    this.path = filePath;
    this.stage = stage;
  }

  toIssue(): ScanIssue {
    return { path: this.path, stage: this.stage, message: this.message, code: errorCodeOf(this.cause) };
  }
}

export class RootUnreadableError extends TagfoldError {
  readonly rootPath: string;

  constructor(rootPath: string, message: string, options?: { cause?: unknown }) {
    super('root_unreadable', message, options);
    this.rootPath = rootPath;
  }
}

export class ProviderUnavailableError extends TagfoldError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super('provider_unavailable', message, options);
    this.provider = provider;
  }
}

export class ProviderTimeoutError extends TagfoldError {
  readonly provider: string;
  readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super('provider_timeout', `${provider} did not answer within ${timeoutMs} ms`);
    this.provider = provider;
    this.timeoutMs = timeoutMs;
  }
}

export class IndexConnectionError extends TagfoldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('index_connection', message, options);
  }
}

export class RejectedDocumentError extends TagfoldError {
  readonly paths: string[];

  constructor(paths: string[], message: string, options?: { cause?: unknown }) {
    super('rejected_document', message, options);
    this.paths = paths;
  }
}

export class MoveFailedError extends TagfoldError {
  readonly sourcePath: string;
  readonly destinationPath: string;

  constructor(sourcePath: string, destinationPath: string, message: string, options?: { cause?: unknown }) {
    super('move_failed', message, options);
    this.sourcePath = sourcePath;
    this.destinationPath = destinationPath;
  }
}

export class ConfigError extends TagfoldError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('invalid_config', issues.length ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.issues = issues;
  }
}

export const isProviderFailure = (
  error: unknown,
): error is ProviderUnavailableError | ProviderTimeoutError =>
  error instanceof ProviderUnavailableError || error instanceof ProviderTimeoutError;

export const errorCodeOf = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
};
