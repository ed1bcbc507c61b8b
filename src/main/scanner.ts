import fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import path from 'path';
import mime from 'mime-types';
import type { FileRecord, ScanIssue, ScanIssueStage, ScanResult } from '../common/fileTypes';
import { RootUnreadableError, ScanError, describeError } from '../common/errors';
import { compareStrings } from '../common/paths';
import { WorkerPool, mapWithPool } from '../utils/workerPool';
import { createLogger } from '../utils/log';
import { computeContentHash, DEFAULT_HASH_CHUNK_SIZE } from './fingerprint';
import { normaliseRelativePath, shouldIgnorePath } from './ignoreRules';

export const DEFAULT_SCAN_CONCURRENCY = 8;

export interface ScanOptions {
  /** Follow symlinked files and directories; cycles back into an ancestor are skipped */
  followSymlinks?: boolean;
  /** Files hashed in parallel */
  concurrency?: number;
  chunkSize?: number;
  /** Skip OS metadata, swap files and partial downloads */
  ignoreJunk?: boolean;
  onIssue?: (issue: ScanIssue) => void;
  onDirectory?: (directoryPath: string) => void;
  signal?: AbortSignal;
}

interface WalkFrame {
  directoryPath: string;
  /** Real paths from the root down to this directory */
  ancestry: string[];
}

const logger = createLogger('scanner');

const toIsoString = (date: Date) => date.toISOString();

const extensionOf = (filePath: string) => path.extname(filePath).slice(1).toLowerCase();

const buildFileRecord = (
  filePath: string,
  rootPath: string,
  stats: Stats,
  contentHash: string,
): FileRecord => ({
  path: filePath,
  relativePath: normaliseRelativePath(rootPath, filePath),
  name: path.basename(filePath),
  size: stats.size,
  extension: extensionOf(filePath),
  mimeType: mime.lookup(filePath) || null,
  // Some filesystems report no birth time; fall back to the inode change time.
  createdAt: toIsoString(stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime),
  modifiedAt: toIsoString(stats.mtime),
  contentHash,
});

const buildIssue = (filePath: string, stage: ScanIssueStage, error: unknown): ScanIssue =>
  new ScanError(filePath, stage, describeError(error), { cause: error }).toIssue();

/**
 * Builds the record of a single file, relative to its own directory. Unlike a
 * scan, a file that cannot be read is an error rather than an issue.
 */
export const describeFile = async (filePath: string, chunkSize = DEFAULT_HASH_CHUNK_SIZE): Promise<FileRecord> => {
  const absolutePath = path.resolve(filePath);
  let stats: Stats;
  try {
    stats = await fs.stat(absolutePath);
  } catch (error) {
    throw new ScanError(absolutePath, 'stat', describeError(error), { cause: error });
  }
  if (!stats.isFile()) {
    throw new ScanError(absolutePath, 'stat', `${absolutePath} is not a regular file`);
  }
  try {
    const contentHash = await computeContentHash(absolutePath, chunkSize);
    return buildFileRecord(absolutePath, path.dirname(absolutePath), stats, contentHash);
  } catch (error) {
    throw new ScanError(absolutePath, 'hash', describeError(error), { cause: error });
  }
};

async function* walkFileTree(rootPath: string, options: ScanOptions): AsyncGenerator<FileRecord> {
  const absoluteRoot = path.resolve(rootPath);
  const report = (issue: ScanIssue) => {
    logger.warn(`Skipping ${issue.path} (${issue.stage}): ${issue.message}`);
    options.onIssue?.(issue);
  };

  let rootStats: Stats;
  try {
    rootStats = await fs.stat(absoluteRoot);
  } catch (error) {
    throw new RootUnreadableError(absoluteRoot, `Cannot read scan root ${absoluteRoot}: ${describeError(error)}`, {
      cause: error,
    });
  }
  if (!rootStats.isDirectory()) {
    throw new RootUnreadableError(absoluteRoot, `Scan root ${absoluteRoot} is not a directory`);
  }

  const pool = new WorkerPool(options.concurrency ?? DEFAULT_SCAN_CONCURRENCY);
  const chunkSize = options.chunkSize ?? DEFAULT_HASH_CHUNK_SIZE;
  const ignoreJunk = options.ignoreJunk ?? true;
  const visitedLinkTargets = new Set<string>();
  const stack: WalkFrame[] = [{ directoryPath: absoluteRoot, ancestry: [await fs.realpath(absoluteRoot)] }];

  const readRecord = async (filePath: string): Promise<FileRecord | null> => {
    let stats: Stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      report(buildIssue(filePath, 'stat', error));
      return null;
    }
    if (!stats.isFile()) {
      return null;
    }
    try {
      const contentHash = await computeContentHash(filePath, chunkSize);
      return buildFileRecord(filePath, absoluteRoot, stats, contentHash);
    } catch (error) {
      report(buildIssue(filePath, 'hash', error));
      return null;
    }
  };

  while (stack.length > 0) {
    options.signal?.throwIfAborted();
    const frame = stack.pop();
    if (!frame) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(frame.directoryPath, { withFileTypes: true });
    } catch (error) {
      if (frame.directoryPath === absoluteRoot) {
        throw new RootUnreadableError(absoluteRoot, `Cannot list scan root ${absoluteRoot}: ${describeError(error)}`, {
          cause: error,
        });
      }
      report(buildIssue(frame.directoryPath, 'readdir', error));
      continue;
    }
    options.onDirectory?.(frame.directoryPath);

    const files: string[] = [];
    const subdirectories: WalkFrame[] = [];
    const parentReal = frame.ancestry[frame.ancestry.length - 1];

    for (const entry of [...entries].sort((a, b) => compareStrings(a.name, b.name))) {
      const entryPath = path.join(frame.directoryPath, entry.name);

      if (entry.isSymbolicLink()) {
        if (!options.followSymlinks) {
          continue;
        }
        let targetStats: Stats;
        let targetReal: string;
        try {
          targetStats = await fs.stat(entryPath);
          targetReal = await fs.realpath(entryPath);
        } catch (error) {
          report(buildIssue(entryPath, 'symlink', error));
          continue;
        }
        if (targetStats.isDirectory()) {
          if (frame.ancestry.includes(targetReal) || visitedLinkTargets.has(targetReal)) {
            logger.debug(`Not following ${entryPath}: it points back to ${targetReal}`);
            continue;
          }
          visitedLinkTargets.add(targetReal);
          subdirectories.push({ directoryPath: entryPath, ancestry: [...frame.ancestry, targetReal] });
        } else if (targetStats.isFile() && !(ignoreJunk && shouldIgnorePath(normaliseRelativePath(absoluteRoot, entryPath), false))) {
          files.push(entryPath);
        }
        continue;
      }

      const relativePath = normaliseRelativePath(absoluteRoot, entryPath);
      if (entry.isDirectory()) {
        if (ignoreJunk && shouldIgnorePath(relativePath, true)) {
          continue;
        }
        subdirectories.push({
          directoryPath: entryPath,
          ancestry: [...frame.ancestry, path.join(parentReal, entry.name)],
        });
        continue;
      }

      if (entry.isFile() && !(ignoreJunk && shouldIgnorePath(relativePath, false))) {
        files.push(entryPath);
      }
    }

    const records = await mapWithPool(files, readRecord, pool);
    for (const record of records) {
      if (record) {
        yield record;
      }
    }

    // Reverse so the next pop visits subdirectories in name order.
    for (let index = subdirectories.length - 1; index >= 0; index -= 1) {
      stack.push(subdirectories[index]);
    }
  }
}

/**
 * Lazy sequence of every regular file under `rootPath`. Each iteration starts a
 * fresh walk, so the same value can be consumed more than once.
 */
export const streamFileRecords = (rootPath: string, options: ScanOptions = {}): AsyncIterable<FileRecord> => ({
  [Symbol.asyncIterator]: () => walkFileTree(rootPath, options),
});

export const scanDirectory = async (rootPath: string, options: ScanOptions = {}): Promise<ScanResult> => {
  const absoluteRoot = path.resolve(rootPath);
  const records: FileRecord[] = [];
  const directories: string[] = [];
  const issues: ScanIssue[] = [];

  const stream = streamFileRecords(absoluteRoot, {
    ...options,
    onIssue: (issue) => {
      issues.push(issue);
      options.onIssue?.(issue);
    },
    onDirectory: (directoryPath) => {
      directories.push(directoryPath);
      options.onDirectory?.(directoryPath);
    },
  });

  for await (const record of stream) {
    records.push(record);
  }

  records.sort((a, b) => compareStrings(a.path, b.path));
  directories.sort(compareStrings);
  logger.debug(`Scanned ${records.length} files in ${directories.length} directories under ${absoluteRoot}`);

  return {
    rootPath: absoluteRoot,
    records,
    directories,
    issues,
  };
};

export type { FileRecord, ScanIssue, ScanResult } from '../common/fileTypes';
