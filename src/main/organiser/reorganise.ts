import path from 'path';
import type { ProtectedZone, ScanIssue } from '../../common/fileTypes';
import { describeError } from '../../common/errors';
import { createProtectionIndex, detectProtectedZones } from '../../common/protectedZones';
import type { ExecutionMode, ExecutionReport, MovePlan, PlanEntry } from '../../types/plan';
import type { DegradedAnnotation, IndexClient } from '../../types/providers';
import type { IndexedDocument } from '../../types/snapshot';
import { createLogger } from '../../utils/log';
import type { AppConfig } from '../config';
import { annotateFiles } from '../providers/annotator';
import type { ProviderSet } from '../providers/createProviders';
import { scanDirectory } from '../scanner';
import { toIndexedDocument } from '../searchIndex/documents';
import { FolderNameGenerator } from './folderNames';
import { buildMovePlan, nameClusters, type NamedCluster } from './planner';
import { executePlan, type MoveFile } from './safeMover';
import { clusterByTags } from './tagClusterer';

const logger = createLogger('organiser');

export interface ReorganiseOptions {
  rootPath: string;
  config: AppConfig;
  providers: ProviderSet;
  /** Cached annotations are read from it, and it is updated after an apply */
  indexClient?: IndexClient;
  mode: ExecutionMode;
  confirmed?: boolean;
  confirmApply?: (preview: PlanEntry[], plan: MovePlan) => Promise<boolean>;
  signal?: AbortSignal;
  moveFile?: MoveFile;
}

export interface ReindexOutcome {
  removed: number;
  upserted: number;
  error?: string;
}

export interface ReorganiseReport {
  rootPath: string;
  scanIssues: ScanIssue[];
  zones: ProtectedZone[];
  degraded: DegradedAnnotation[];
  clusters: NamedCluster[];
  plan: MovePlan;
  execution: ExecutionReport;
  reindex?: ReindexOutcome;
}

const loadCache = async (indexClient: IndexClient | undefined) => {
  const cache = new Map<string, IndexedDocument>();
  if (!indexClient) return cache;
  try {
    (await indexClient.snapshot()).forEach((document) => cache.set(document.path, document));
  } catch (error) {
    // Annotations are recomputed without the cache; the moves do not depend on it.
    logger.warn(`Cannot read cached annotations from ${indexClient.name}: ${describeError(error)}`);
  }
  return cache;
};

export const runReorganisation = async (options: ReorganiseOptions): Promise<ReorganiseReport> => {
  const { config, providers, indexClient, signal } = options;
  const rootPath = path.resolve(options.rootPath);

  const scan = await scanDirectory(rootPath, {
    followSymlinks: config.scan.followSymlinks,
    concurrency: config.scan.concurrency,
    chunkSize: config.scan.chunkSize,
    ignoreJunk: config.scan.ignoreJunk,
    signal,
  });

  const zones = detectProtectedZones({
    rootPath,
    filePaths: scan.records.map((record) => record.path),
    directoryPaths: scan.directories,
    markers: config.protection,
  });
  const protection = createProtectionIndex(rootPath, zones);
  const movable = scan.records.filter((record) => !protection.isProtected(record.path));

  const { annotations, degraded } = await annotateFiles(movable, {
    tagger: providers.tagger,
    embedder: providers.embedder,
    readContent: providers.readContent,
    concurrency: config.providers.concurrency,
    timeoutMs: config.providers.timeoutMs,
    cache: await loadCache(indexClient),
    signal,
  });

  const clusters = clusterByTags(
    movable.map((record) => {
      const annotation = annotations.get(record.path);
      return { path: record.path, tags: annotation?.tags ?? [], embedding: annotation?.embedding };
    }),
    {
      minClusterSize: config.organiser.minClusterSize,
      fallbackKey: config.organiser.fallbackFolder,
      useEmbeddings: Boolean(providers.embedder),
      similarityThreshold: config.organiser.similarityThreshold,
    },
  );

  const generator = new FolderNameGenerator({
    maxLength: config.organiser.maxFolderNameLength,
    separator: config.organiser.separator,
    fallbackName: config.organiser.fallbackFolder,
    reservedNames: [
      ...config.protection.vcsMarkers,
      ...config.protection.dependencyMarkers,
      ...zones.filter((zone) => path.dirname(zone.path) === rootPath).map((zone) => path.basename(zone.path)),
    ],
    reservedSuffixes: config.protection.bundleSuffixes,
  });
  const named = nameClusters(clusters, generator);

  const plan = buildMovePlan({
    rootPath,
    records: scan.records,
    clusters: named,
    protection,
    existingDirectories: scan.directories,
  });

  const { confirmApply } = options;
  const execution = await executePlan(plan, {
    mode: options.mode,
    confirmed: options.confirmed,
    nonInteractive: config.organiser.skipConfirmation,
    confirmApply: confirmApply ? (preview) => confirmApply(preview, plan) : undefined,
    concurrency: config.organiser.moveConcurrency,
    signal,
    moveFile: options.moveFile,
  });

  const report: ReorganiseReport = {
    rootPath,
    scanIssues: scan.issues,
    zones,
    degraded,
    clusters: named,
    plan,
    execution,
  };

  const moved = execution.entries.filter((entry) => entry.status.kind === 'moved');
  if (indexClient && moved.length > 0) {
    const recordByPath = new Map(scan.records.map((record) => [record.path, record]));
    const documents: IndexedDocument[] = [];
    moved.forEach((entry) => {
      const record = recordByPath.get(entry.sourcePath);
      if (record) {
        documents.push(toIndexedDocument(record, annotations.get(record.path), entry.destinationPath));
      }
    });
    try {
      await indexClient.delete(moved.map((entry) => entry.sourcePath));
      await indexClient.upsert(documents);
      report.reindex = { removed: moved.length, upserted: documents.length };
    } catch (error) {
      logger.error(`Files were moved but ${indexClient.name} could not be updated: ${describeError(error)}`);
      report.reindex = { removed: 0, upserted: 0, error: describeError(error) };
    }
  }

  return report;
};
