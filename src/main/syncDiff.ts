import { compareStrings } from '../common/paths';
import type { DiffableEntry, SyncDiff, SyncDiffCounts } from '../types/diff';

const hasChanged = (current: DiffableEntry, previous: DiffableEntry) => {
  // The hash is authoritative whenever both sides have one.
  if (current.contentHash && previous.contentHash) {
    return current.contentHash !== previous.contentHash;
  }
  return current.modifiedAt !== previous.modifiedAt || current.size !== previous.size;
};

const indexByPath = <T extends DiffableEntry>(entries: Iterable<T>) => {
  const byPath = new Map<string, T>();
  for (const entry of entries) {
    byPath.set(entry.path, entry);
  }
  return byPath;
};

/**
 * Partitions every path known to either side into exactly one bucket. Neither
 * input is modified; buckets are sorted so equal inputs give equal output.
 */
export const diffSnapshots = (
  current: Iterable<DiffableEntry>,
  previous: Iterable<DiffableEntry>,
): SyncDiff => {
  const currentByPath = indexByPath(current);
  const previousByPath = indexByPath(previous);

  const diff: SyncDiff = { toAdd: [], toUpdate: [], toRemove: [], unchanged: [] };

  currentByPath.forEach((entry, entryPath) => {
    const known = previousByPath.get(entryPath);
    if (!known) {
      diff.toAdd.push(entryPath);
    } else if (hasChanged(entry, known)) {
      diff.toUpdate.push(entryPath);
    } else {
      diff.unchanged.push(entryPath);
    }
  });

  previousByPath.forEach((_entry, entryPath) => {
    if (!currentByPath.has(entryPath)) {
      diff.toRemove.push(entryPath);
    }
  });

  diff.toAdd.sort(compareStrings);
  diff.toUpdate.sort(compareStrings);
  diff.toRemove.sort(compareStrings);
  diff.unchanged.sort(compareStrings);
  return diff;
};

export const summariseDiff = (diff: SyncDiff): SyncDiffCounts => ({
  added: diff.toAdd.length,
  updated: diff.toUpdate.length,
  removed: diff.toRemove.length,
  unchanged: diff.unchanged.length,
});
