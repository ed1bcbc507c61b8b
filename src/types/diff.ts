export interface SyncDiff {
  toAdd: string[];
  toUpdate: string[];
  toRemove: string[];
  unchanged: string[];
}

export interface SyncDiffCounts {
  added: number;
  updated: number;
  removed: number;
  unchanged: number;
}

/** Minimal shape both sides of a diff must expose. */
export interface DiffableEntry {
  path: string;
  size: number;
  modifiedAt: string;
  contentHash: string;
}
