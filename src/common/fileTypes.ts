export interface FileRecord {
  /** Absolute, normalised path on disk */
  path: string;
  /** Path relative to the scanned root, always with `/` separators */
  relativePath: string;
  /** File name including extension */
  name: string;
  /** File size in bytes */
  size: number;
  /** Lowercased extension without the leading dot; empty when there is none */
  extension: string;
  /** MIME type inferred from the file extension */
  mimeType: string | null;
  /** ISO timestamp of creation (birth time where the platform reports one) */
  createdAt: string;
  /** ISO timestamp of the last modification */
  modifiedAt: string;
  /** SHA-256 of the file contents, hex encoded */
  contentHash: string;
}

export type ScanIssueStage = 'readdir' | 'stat' | 'hash' | 'symlink';

export interface ScanIssue {
  path: string;
  stage: ScanIssueStage;
  message: string;
  code?: string;
}

export interface ScanResult {
  /** Root directory that was scanned */
  rootPath: string;
  /** Every readable regular file, sorted by path */
  records: FileRecord[];
  /** Every directory the walk entered, root included */
  directories: string[];
  issues: ScanIssue[];
}

export type ProtectionReason = 'vcs' | 'dependency' | 'bundle' | 'project-config';

export interface ProtectedZone {
  /** Directory that roots the zone; every descendant is protected too */
  path: string;
  reason: ProtectionReason;
  /** Entry name that triggered the rule, e.g. `.git` or `package.json` */
  marker: string;
}
