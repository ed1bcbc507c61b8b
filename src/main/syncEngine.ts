import path from 'path';
import type { ScanIssue } from '../common/fileTypes';
import { RejectedDocumentError } from '../common/errors';
import { isWithin } from '../common/paths';
import type { SyncDiff, SyncDiffCounts } from '../types/diff';
import type { DegradedAnnotation, IndexClient } from '../types/providers';
import type { AppConfig } from './config';
import { annotateFiles } from './providers/annotator';
import type { ProviderSet } from './providers/createProviders';
import { scanDirectory } from './scanner';
import { toIndexedDocument } from './searchIndex/documents';
import { diffSnapshots, summariseDiff } from './syncDiff';
import { createLogger } from '../utils/log';

const logger = createLogger('sync');

export interface SyncOptions {
  rootPath: string;
  config: AppConfig;
  providers: ProviderSet;
  indexClient: IndexClient;
  signal?: AbortSignal;
}

export interface RejectedBatch {
  paths: string[];
  reason: string;
}

export interface SyncReport {
  rootPath: string;
  diff: SyncDiff;
  counts: SyncDiffCounts;
  issues: ScanIssue[];
  degraded: DegradedAnnotation[];
  rejected: RejectedBatch[];
  durationMs: number;
}

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
};

/**
 * Brings the index in line with the tree under `rootPath`. Scan and index
 * connection failures propagate; a rejected batch is reported and the rest
 * carry on. Nothing is cached between runs: the next run diffs from scratch.
 */
export const runSync = async ({ rootPath, config, providers, indexClient, signal }: SyncOptions): Promise<SyncReport> => {
  const startedAt = Date.now();
  const absoluteRoot = path.resolve(rootPath);

  const scan = await scanDirectory(absoluteRoot, {
    followSymlinks: config.scan.followSymlinks,
    concurrency: config.scan.concurrency,
    chunkSize: config.scan.chunkSize,
    ignoreJunk: config.scan.ignoreJunk,
    signal,
  });

  const snapshot = (await indexClient.snapshot()).filter((document) => isWithin(absoluteRoot, document.path));
  const diff = diffSnapshots(scan.records, snapshot);
  logger.info(
    `${indexClient.name}: ${diff.toAdd.length} new, ${diff.toUpdate.length} changed, ${diff.toRemove.length} gone under ${absoluteRoot}`,
  );

  const changed = new Set([...diff.toAdd, ...diff.toUpdate]);
  const records = scan.records.filter((record) => changed.has(record.path));
  const { annotations, degraded } = await annotateFiles(records, {
    tagger: providers.tagger,
    embedder: providers.embedder,
    readContent: providers.readContent,
    concurrency: config.providers.concurrency,
    timeoutMs: config.providers.timeoutMs,
    signal,
  });

  const documents = records.map((record) => toIndexedDocument(record, annotations.get(record.path)));
  const rejected: RejectedBatch[] = [];
  for (const batch of chunk(documents, config.index.batchSize)) {
    signal?.throwIfAborted();
    try {
      await indexClient.upsert(batch);
    } catch (error) {
      if (!(error instanceof RejectedDocumentError)) {
        throw error;
      }
      logger.warn(`Index rejected ${error.paths.length} documents: ${error.message}`);
      rejected.push({ paths: error.paths, reason: error.message });
    }
  }

  if (diff.toRemove.length > 0) {
    signal?.throwIfAborted();
    await indexClient.delete(diff.toRemove);
  }

  return {
    rootPath: absoluteRoot,
    diff,
    counts: summariseDiff(diff),
    issues: scan.issues,
    degraded,
    rejected,
    durationMs: Date.now() - startedAt,
  };
};
