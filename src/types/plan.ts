export type SkipReason = 'protected' | 'no-op' | 'unclustered' | 'cancelled';

export type PlanEntryStatus =
  | { kind: 'planned' }
  | { kind: 'skipped'; reason: SkipReason }
  | { kind: 'confirmed' }
  | { kind: 'moved' }
  | { kind: 'failed'; reason: string };

export type PlanEntryStatusKind = PlanEntryStatus['kind'];

export interface PlanEntry {
  readonly sourcePath: string;
  readonly destinationPath: string;
  /** Folder name of the cluster the file was assigned to */
  readonly cluster?: string;
  status: PlanEntryStatus;
}

export interface MovePlan {
  rootPath: string;
  createdAtIso: string;
  /** One entry per scanned file, sorted by source path */
  entries: readonly PlanEntry[];
  /** Destination folders that do not exist under the root yet */
  folders: string[];
}

export type ExecutionMode = 'preview' | 'apply';

export type StatusCounts = Record<PlanEntryStatusKind, number>;

export interface ExecutionReport {
  mode: ExecutionMode;
  /** Confirmation gate refused; nothing was touched */
  aborted: boolean;
  /** A cancellation signal fired before every entry ran */
  cancelled: boolean;
  entries: PlanEntry[];
  counts: StatusCounts;
  failures: { sourcePath: string; destinationPath: string; reason: string }[];
  skipped: { sourcePath: string; reason: SkipReason }[];
}
