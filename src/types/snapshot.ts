/**
 * Document as stored by an index backend. It carries the scan fields of a
 * file plus whatever the providers derived from it.
 */
export interface IndexedDocument {
  path: string;
  size: number;
  extension: string;
  createdAt: string;
  modifiedAt: string;
  contentHash: string;
  /** Order is irrelevant; treated as a set */
  tags: string[];
  /** Weight per tag, kept so a cached annotation clusters the same way again */
  tagWeights?: Record<string, number>;
  embedding?: number[];
}

export interface SearchHit {
  document: IndexedDocument;
  score?: number;
}
