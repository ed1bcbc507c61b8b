import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError, describeError, errorCodeOf } from '../common/errors';
import { DEFAULT_PROTECTION_MARKERS } from '../common/protectedZones';
import { createLogger, parseLogLevel } from '../utils/log';

export const CONFIG_FILE_NAME = 'tagfold.config.json';

const DEFAULT_OLLAMA_URL = 'http://127.0.0.1:11434';
const DEFAULT_MEILI_URL = 'http://127.0.0.1:7700';

const logger = createLogger('config');

const positiveInt = z.number().int().positive();
const markerList = (defaults: readonly string[]) => z.array(z.string().min(1)).default([...defaults]);

const configSchema = z.object({
  protection: z
    .object({
      vcsMarkers: markerList(DEFAULT_PROTECTION_MARKERS.vcsMarkers),
      dependencyMarkers: markerList(DEFAULT_PROTECTION_MARKERS.dependencyMarkers),
      bundleSuffixes: markerList(DEFAULT_PROTECTION_MARKERS.bundleSuffixes),
      projectConfigFiles: markerList(DEFAULT_PROTECTION_MARKERS.projectConfigFiles),
    })
    .default({}),
  scan: z
    .object({
      concurrency: positiveInt.default(8),
      chunkSize: positiveInt.default(64 * 1024),
      followSymlinks: z.boolean().default(false),
      ignoreJunk: z.boolean().default(true),
    })
    .default({}),
  providers: z
    .object({
      concurrency: positiveInt.default(4),
      timeoutMs: positiveInt.default(30_000),
      maxContentBytes: positiveInt.default(16 * 1024),
      useLlm: z.boolean().default(false),
      useEmbeddings: z.boolean().default(false),
    })
    .default({}),
  ollama: z
    .object({
      url: z.string().url().default(DEFAULT_OLLAMA_URL),
      tagModel: z.string().min(1).default('llama3.1:8b'),
      embeddingModel: z.string().min(1).default('nomic-embed-text'),
      dimension: positiveInt.default(768),
      timeoutMs: positiveInt.default(20_000),
      maxPromptChars: positiveInt.default(6_000),
    })
    .default({}),
  organiser: z
    .object({
      minClusterSize: positiveInt.default(2),
      fallbackFolder: z.string().min(1).default('misc'),
      maxFolderNameLength: positiveInt.min(8).default(40),
      separator: z.enum(['-', '_', '.']).default('-'),
      similarityThreshold: z.number().min(-1).max(1).default(0.7),
      moveConcurrency: positiveInt.default(4),
      skipConfirmation: z.boolean().default(false),
      dryRunDefault: z.boolean().default(false),
    })
    .default({}),
  index: z
    .object({
      backend: z.enum(['file', 'meilisearch']).default('file'),
      filePath: z.string().min(1).default(path.join(os.homedir(), '.tagfold', 'index.json')),
      batchSize: positiveInt.default(100),
    })
    .default({}),
  meilisearch: z
    .object({
      url: z.string().url().default(DEFAULT_MEILI_URL),
      apiKey: z.string().min(1).optional(),
      indexName: z
        .string()
        .regex(/^[A-Za-z0-9_-]+$/, 'may only contain letters, digits, "-" and "_"')
        .default('tagfold'),
      requestTimeoutMs: positiveInt.default(10_000),
      taskPollIntervalMs: positiveInt.default(100),
      taskTimeoutMs: positiveInt.default(30_000),
    })
    .default({}),
  logging: z
    .object({
      level: z.union([z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']), z.literal(false)]).optional(),
      file: z.string().min(1).optional(),
    })
    .default({}),
});

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type AppConfig = DeepReadonly<z.output<typeof configSchema>>;
export type ConfigInput = z.input<typeof configSchema>;

type RawConfig = Record<string, unknown>;

const isRecord = (value: unknown): value is RawConfig =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const mergeDeep = (base: RawConfig, overlay: RawConfig): RawConfig => {
  const merged: RawConfig = { ...base };
  Object.entries(overlay).forEach(([key, value]) => {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? mergeDeep(existing, value) : value;
  });
  return merged;
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object') {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

const ENV_OVERRIDES: Array<{ variable: string; section: string; key: string; parse?: (raw: string) => unknown }> = [
  { variable: 'OLLAMA_BASE_URL', section: 'ollama', key: 'url' },
  { variable: 'OLLAMA_TAG_MODEL', section: 'ollama', key: 'tagModel' },
  { variable: 'OLLAMA_EMBED_MODEL', section: 'ollama', key: 'embeddingModel' },
  { variable: 'MEILI_URL', section: 'meilisearch', key: 'url' },
  { variable: 'MEILI_MASTER_KEY', section: 'meilisearch', key: 'apiKey' },
  { variable: 'MEILI_INDEX', section: 'meilisearch', key: 'indexName' },
  { variable: 'TAGFOLD_INDEX_BACKEND', section: 'index', key: 'backend' },
  { variable: 'TAGFOLD_INDEX_FILE', section: 'index', key: 'filePath' },
  {
    variable: 'TAGFOLD_LOG_LEVEL',
    section: 'logging',
    key: 'level',
    parse: (raw) => {
      const level = parseLogLevel(raw);
      return level === undefined ? raw : level;
    },
  },
];

const overridesFromEnv = (env: NodeJS.ProcessEnv): RawConfig => {
  let overlay: RawConfig = {};
  ENV_OVERRIDES.forEach(({ variable, section, key, parse }) => {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') {
      return;
    }
    overlay = mergeDeep(overlay, { [section]: { [key]: parse ? parse(raw.trim()) : raw.trim() } });
  });
  return overlay;
};

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Applied last, after the file and the environment */
  overrides?: RawConfig;
}

/** Validates a raw configuration object, layering environment overrides on top. */
export const resolveConfig = (raw: unknown = {}, options: ResolveConfigOptions = {}): AppConfig => {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }
  const layered = mergeDeep(mergeDeep(raw, overridesFromEnv(options.env ?? process.env)), options.overrides ?? {});
  const parsed = configSchema.safeParse(layered);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }
  return deepFreeze(parsed.data);
};

export interface LoadConfigOptions extends ResolveConfigOptions {
  /** Explicit file; it must exist */
  configPath?: string;
  /** Directory searched for `tagfold.config.json` when no explicit file is given */
  cwd?: string;
}

const readConfigFile = async (filePath: string, required: boolean): Promise<unknown> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (!required && errorCodeOf(error) === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read configuration file ${filePath}: ${describeError(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration file ${filePath} is not valid JSON: ${describeError(error)}`);
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<AppConfig> => {
  const filePath = options.configPath
    ? path.resolve(options.configPath)
    : path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
  const raw = await readConfigFile(filePath, Boolean(options.configPath));
  const config = resolveConfig(raw, options);
  logger.debug(`Configuration resolved (index backend: ${config.index.backend}, llm: ${config.providers.useLlm})`);
  return config;
};
