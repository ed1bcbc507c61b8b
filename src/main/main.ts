#!/usr/bin/env node
import 'dotenv/config';
import readline from 'readline/promises';
import { Command, InvalidArgumentError } from 'commander';
import { describeError } from '../common/errors';
import { compareStrings } from '../common/paths';
import type { MovePlan, PlanEntry } from '../types/plan';
import { configureLogging, createLogger } from '../utils/log';
import { logReorganiseSummary, logRunError, logSyncSummary } from '../utils/runLogger';
import { loadConfig, type AppConfig } from './config';
import { renderExecutionReport, renderPlanTree, renderSyncReport } from './organiser/planPreview';
import { runReorganisation } from './organiser/reorganise';
import { annotateFiles } from './providers/annotator';
import { createProviders } from './providers/createProviders';
import { describeFile } from './scanner';
import { createIndexClient } from './searchIndex/createIndexClient';
import { toIndexedDocument } from './searchIndex/documents';
import { runSync } from './syncEngine';
import { SyncWatcher } from './watcher';

const VERSION = '0.1.0';

const logger = createLogger('cli');

export interface CliIo {
  stdout?: { write: (chunk: string) => unknown };
  /** Asks a yes/no question; defaults to reading stdin */
  prompt?: (question: string) => Promise<string>;
  fetchImpl?: typeof fetch;
  env?: NodeJS.ProcessEnv;
  setExitCode?: (code: number) => void;
}

interface GlobalOptions {
  config?: string;
}

interface OrganiseFlags {
  dryRun?: boolean;
  apply?: boolean;
  yes?: boolean;
  minClusterSize?: number;
  useLlm?: boolean;
  useEmbeddings?: boolean;
  index: boolean;
}

const parsePositiveInt = (value: string) => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const promptOnStdin = async (question: string) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

const isYes = (answer: string) => ['y', 'yes'].includes(answer.trim().toLowerCase());

/** Aborts the returned signal on Ctrl+C for as long as `task` runs. */
const withInterrupt = async <T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> => {
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted; finishing the current step.');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
};

export const createProgram = (io: CliIo = {}): Command => {
  const stdout = io.stdout ?? process.stdout;
  const print = (text: string) => {
    stdout.write(`${text}\n`);
  };
  const prompt = io.prompt ?? promptOnStdin;
  const setExitCode =
    io.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();
  program
    .name('tagfold')
    .description('Keep a search index in sync with a folder and reorganise files by their tags')
    .version(VERSION)
    .option('-c, --config <file>', 'configuration file (defaults to ./tagfold.config.json)');

  const setup = async (overrides: Record<string, unknown> = {}): Promise<AppConfig> => {
    const { config: configPath } = program.opts<GlobalOptions>();
    const config = await loadConfig({ configPath, env: io.env, overrides });
    configureLogging({ level: config.logging.level, file: config.logging.file });
    return config;
  };

  const guard = (command: string, action: () => Promise<void>) => async () => {
    try {
      await action();
    } catch (error) {
      logRunError(error, command);
      setExitCode(1);
    }
  };

  program
    .command('sync')
    .description('Bring the search index in line with the files under <dir>')
    .argument('<dir>', 'directory to index')
    .action((dir: string) =>
      guard('sync', async () => {
        const config = await setup();
        const report = await withInterrupt((signal) =>
          runSync({
            rootPath: dir,
            config,
            providers: createProviders(config, io.fetchImpl),
            indexClient: createIndexClient(config, io.fetchImpl),
            signal,
          }),
        );
        print(renderSyncReport(report));
        logSyncSummary(report);
        if (report.rejected.length) {
          setExitCode(1);
        }
      })(),
    );

  program
    .command('organise')
    .alias('organize')
    .description('Move the files under <dir> into folders named after their dominant tag')
    .argument('<dir>', 'directory to reorganise')
    .option('--dry-run', 'only show what would move')
    .option('--apply', 'move files even when dry runs are the configured default')
    .option('-y, --yes', 'skip the confirmation prompt')
    .option('--min-cluster-size <n>', 'smallest group that gets its own folder', parsePositiveInt)
    .option('--use-llm', 'tag files with the configured Ollama model')
    .option('--use-embeddings', 'place leftover files by embedding similarity')
    .option('--no-index', 'neither read cached tags from nor update the index')
    .action((dir: string, flags: OrganiseFlags) =>
      guard('organise', async () => {
        const startedAt = Date.now();
        const providerOverrides: Record<string, unknown> = {};
        if (flags.useLlm) providerOverrides.useLlm = true;
        if (flags.useEmbeddings) providerOverrides.useEmbeddings = true;
        const config = await setup({
          providers: providerOverrides,
          organiser: flags.minClusterSize === undefined ? {} : { minClusterSize: flags.minClusterSize },
        });

        const preview = flags.dryRun || (config.organiser.dryRunDefault && !flags.apply);
        const confirmApply = async (entries: PlanEntry[], plan: MovePlan) => {
          print(renderPlanTree(plan, entries));
          const moves = entries.filter((entry) => entry.status.kind === 'confirmed').length;
          const answer = await prompt(`Create ${plan.folders.length} directories, move ${moves} files? [y/N]: `);
          return isYes(answer);
        };

        const report = await withInterrupt((signal) =>
          runReorganisation({
            rootPath: dir,
            config,
            providers: createProviders(config, io.fetchImpl),
            indexClient: flags.index ? createIndexClient(config, io.fetchImpl) : undefined,
            mode: preview ? 'preview' : 'apply',
            confirmed: Boolean(flags.yes),
            confirmApply,
            signal,
          }),
        );

        if (report.execution.mode === 'preview') {
          print(renderPlanTree(report.plan, report.execution.entries));
        }
        print(renderExecutionReport(report.execution, report.rootPath));
        logReorganiseSummary(report, Date.now() - startedAt);
        if (report.execution.failures.length || report.reindex?.error) {
          setExitCode(1);
        }
      })(),
    );

  program
    .command('search')
    .description('Look up indexed files by tag or path')
    .argument('<query...>', 'words to search for')
    .option('-l, --limit <n>', 'maximum number of results', parsePositiveInt, 20)
    .action((query: string[], flags: { limit: number }) =>
      guard('search', async () => {
        const config = await setup();
        const hits = await createIndexClient(config, io.fetchImpl).search(query.join(' '), flags.limit);
        if (hits.length === 0) {
          print('No matching files.');
          return;
        }
        hits.forEach(({ document }) => {
          print(document.tags.length ? `${document.path}  [${document.tags.join(', ')}]` : document.path);
        });
      })(),
    );

  program
    .command('tag')
    .description('Show the weighted tags of a single file')
    .argument('<file>', 'file to tag')
    .option('--save', 'store the tags in the search index')
    .action((file: string, flags: { save?: boolean }) =>
      guard('tag', async () => {
        const config = await setup();
        const record = await describeFile(file, config.scan.chunkSize);
        const providers = createProviders(config, io.fetchImpl);
        const { annotations, degraded } = await withInterrupt((signal) =>
          annotateFiles([record], {
            tagger: providers.tagger,
            embedder: providers.embedder,
            readContent: providers.readContent,
            concurrency: 1,
            timeoutMs: config.providers.timeoutMs,
            signal,
          }),
        );
        const annotation = annotations.get(record.path);
        const tags = [...(annotation?.tags ?? [])].sort((a, b) => b.weight - a.weight || compareStrings(a.tag, b.tag));
        const lines = tags.map(({ tag, weight }) => `  ${tag} ${Number(weight.toFixed(2))}`);

        print(lines.length ? [`Tags for ${record.path}:`, ...lines].join('\n') : `No tags for ${record.path}.`);
        degraded.forEach((entry) => print(`Degraded (${entry.stage}): ${entry.reason}`));

        if (flags.save) {
          const indexClient = createIndexClient(config, io.fetchImpl);
          await indexClient.upsert([toIndexedDocument(record, annotation)]);
          print(`Saved to the ${indexClient.name} index.`);
        }
      })(),
    );

  program
    .command('watch')
    .description('Sync <dir> now and again whenever something under it changes')
    .argument('<dir>', 'directory to watch')
    .action((dir: string) =>
      guard('watch', async () => {
        const config = await setup();
        const providers = createProviders(config, io.fetchImpl);
        const indexClient = createIndexClient(config, io.fetchImpl);

        await withInterrupt(async (signal) => {
          const syncOnce = async () => {
            const report = await runSync({ rootPath: dir, config, providers, indexClient, signal });
            logSyncSummary(report);
          };
          await syncOnce();

          const watcher = new SyncWatcher(dir, syncOnce, { ignoreJunk: config.scan.ignoreJunk });
          watcher.start();
          await new Promise<void>((resolve) => {
            signal.addEventListener('abort', () => resolve(), { once: true });
          });
          watcher.stop();
          await watcher.whenIdle();
        });
      })(),
    );

  return program;
};

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
