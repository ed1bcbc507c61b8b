import { constants as fsConstants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { MoveFailedError, describeError, errorCodeOf } from '../../common/errors';
import type {
  ExecutionMode,
  ExecutionReport,
  MovePlan,
  PlanEntry,
  PlanEntryStatus,
  StatusCounts,
} from '../../types/plan';
import { createLogger } from '../../utils/log';
import { WorkerPool } from '../../utils/workerPool';

const logger = createLogger('mover');

export type MoveFile = (sourcePath: string, destinationPath: string) => Promise<void>;

export interface ExecutePlanOptions {
  mode: ExecutionMode;
  /** The caller already has the user's consent */
  confirmed?: boolean;
  /** Skip the confirmation gate entirely, for scripted runs */
  nonInteractive?: boolean;
  /** Shown the annotated preview; resolving `false` leaves the tree untouched */
  confirmApply?: (preview: PlanEntry[]) => Promise<boolean>;
  /** Destination folders moved into in parallel; moves into one folder stay sequential */
  concurrency?: number;
  signal?: AbortSignal;
  moveFile?: MoveFile;
}

const pathExists = async (targetPath: string) => {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch (error) {
    if (errorCodeOf(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

const failureReason = (error: unknown) => {
  switch (errorCodeOf(error)) {
    case 'ENOENT':
      return 'source vanished';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EEXIST':
    case 'ENOTEMPTY':
      return 'destination exists';
    case 'EBUSY':
      return 'file is locked';
    default:
      return describeError(error);
  }
};

/** `rename`, or copy-then-unlink when source and destination sit on different devices. */
export const defaultMoveFile: MoveFile = async (sourcePath, destinationPath) => {
  try {
    await fs.rename(sourcePath, destinationPath);
  } catch (error) {
    if (errorCodeOf(error) !== 'EXDEV') {
      throw error;
    }
    await fs.copyFile(sourcePath, destinationPath, fsConstants.COPYFILE_EXCL);
    await fs.unlink(sourcePath);
  }
};

const withStatus = (entry: PlanEntry, status: PlanEntryStatus): PlanEntry => ({ ...entry, status });

/** Checks a single planned move against the tree as it is now. */
export const checkPlanEntry = async (entry: PlanEntry): Promise<PlanEntry> => {
  if (entry.status.kind !== 'planned') {
    return withStatus(entry, entry.status);
  }
  if (!(await pathExists(entry.sourcePath))) {
    return withStatus(entry, { kind: 'failed', reason: 'source vanished' });
  }
  if (await pathExists(entry.destinationPath)) {
    return withStatus(entry, { kind: 'failed', reason: 'destination exists' });
  }
  return withStatus(entry, { kind: 'confirmed' });
};

export const previewPlan = async (plan: MovePlan): Promise<PlanEntry[]> => {
  const checked: PlanEntry[] = [];
  for (const entry of plan.entries) {
    checked.push(await checkPlanEntry(entry));
  }
  return checked;
};

const countStatuses = (entries: readonly PlanEntry[]): StatusCounts => {
  const counts: StatusCounts = { planned: 0, skipped: 0, confirmed: 0, moved: 0, failed: 0 };
  entries.forEach((entry) => {
    counts[entry.status.kind] += 1;
  });
  return counts;
};

const buildReport = (
  mode: ExecutionMode,
  entries: PlanEntry[],
  flags: { aborted: boolean; cancelled: boolean },
): ExecutionReport => {
  const failures: ExecutionReport['failures'] = [];
  const skipped: ExecutionReport['skipped'] = [];
  entries.forEach((entry) => {
    if (entry.status.kind === 'failed') {
      failures.push({ sourcePath: entry.sourcePath, destinationPath: entry.destinationPath, reason: entry.status.reason });
    } else if (entry.status.kind === 'skipped') {
      skipped.push({ sourcePath: entry.sourcePath, reason: entry.status.reason });
    }
  });
  return { mode, ...flags, entries, counts: countStatuses(entries), failures, skipped };
};

const moveEntry = async (entry: PlanEntry, moveFile: MoveFile): Promise<PlanEntryStatus> => {
  try {
    await fs.mkdir(path.dirname(entry.destinationPath), { recursive: true });
    // Something may have appeared since the preview ran.
    if (await pathExists(entry.destinationPath)) {
      return { kind: 'failed', reason: 'destination exists' };
    }
    await moveFile(entry.sourcePath, entry.destinationPath);
    return { kind: 'moved' };
  } catch (error) {
    const failure = new MoveFailedError(entry.sourcePath, entry.destinationPath, failureReason(error), { cause: error });
    logger.warn(`Cannot move ${failure.sourcePath} to ${failure.destinationPath}: ${describeError(error)}`);
    return { kind: 'failed', reason: failure.message };
  }
};

/**
 * Runs a plan. Preview only looks at the disk; apply first passes the
 * confirmation gate, then moves every confirmed entry. A failed move never
 * stops the others. The input plan is left as it was.
 */
export const executePlan = async (plan: MovePlan, options: ExecutePlanOptions): Promise<ExecutionReport> => {
  const preview = await previewPlan(plan);
  if (options.mode === 'preview') {
    return buildReport('preview', preview, { aborted: false, cancelled: false });
  }

  const gateOpen =
    Boolean(options.confirmed) ||
    Boolean(options.nonInteractive) ||
    (options.confirmApply ? await options.confirmApply(preview) : false);
  if (!gateOpen) {
    logger.info('Apply was not confirmed; no file was moved.');
    return buildReport('apply', plan.entries.map((entry) => withStatus(entry, entry.status)), {
      aborted: true,
      cancelled: false,
    });
  }

  const results = [...preview];
  const groups = new Map<string, number[]>();
  results.forEach((entry, index) => {
    if (entry.status.kind !== 'confirmed') return;
    const folder = path.dirname(entry.destinationPath);
    const group = groups.get(folder) ?? [];
    group.push(index);
    groups.set(folder, group);
  });

  const moveFile = options.moveFile ?? defaultMoveFile;
  const pool = new WorkerPool(options.concurrency ?? 4);
  let cancelled = false;

  await Promise.all(
    [...groups.values()].map((indexes) =>
      pool.run(async () => {
        for (const index of indexes) {
          const entry = results[index];
          if (options.signal?.aborted) {
            cancelled = true;
            results[index] = withStatus(entry, { kind: 'skipped', reason: 'cancelled' });
            continue;
          }
          results[index] = withStatus(entry, await moveEntry(entry, moveFile));
        }
      }),
    ),
  );

  const report = buildReport('apply', results, { aborted: false, cancelled });
  logger.info(
    `Moved ${report.counts.moved} files; ${report.counts.failed} failed, ${report.counts.skipped} skipped.`,
  );
  return report;
};
