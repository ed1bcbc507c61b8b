import type { IndexedDocument, SearchHit } from './snapshot';

export interface WeightedTag {
  tag: string;
  weight: number;
}

export interface TagProvider {
  readonly name: string;
  tag(filePath: string, content: string, signal?: AbortSignal): Promise<WeightedTag[]>;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface IndexClient {
  readonly name: string;
  upsert(documents: IndexedDocument[]): Promise<void>;
  delete(paths: string[]): Promise<void>;
  snapshot(): Promise<IndexedDocument[]>;
  search(query: string, limit?: number): Promise<SearchHit[]>;
}

export type AnnotationSource = 'provider' | 'cache' | 'degraded';

export interface FileAnnotation {
  path: string;
  tags: WeightedTag[];
  embedding?: number[];
  source: AnnotationSource;
}

export interface DegradedAnnotation {
  path: string;
  stage: 'tag' | 'embed' | 'content';
  reason: string;
}
