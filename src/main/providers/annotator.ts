import type { FileRecord } from '../../common/fileTypes';
import { describeError, isProviderFailure } from '../../common/errors';
import { compareStrings } from '../../common/paths';
import type { IndexedDocument } from '../../types/snapshot';
import type {
  DegradedAnnotation,
  EmbeddingProvider,
  FileAnnotation,
  TagProvider,
  WeightedTag,
} from '../../types/providers';
import { WorkerPool, mapWithPool } from '../../utils/workerPool';
import { createLogger } from '../../utils/log';
import type { ContentReader } from './contentReader';
import { categoryForExtension } from './tagDictionary';
import { withTimeout } from './timeouts';

export interface AnnotateOptions {
  tagger: TagProvider;
  embedder?: EmbeddingProvider;
  readContent: ContentReader;
  /** Provider calls in flight at once */
  concurrency: number;
  /** Deadline for each provider call */
  timeoutMs: number;
  /** Documents from a previous run, keyed by path; reused when the hash still matches */
  cache?: ReadonlyMap<string, IndexedDocument>;
  signal?: AbortSignal;
}

export interface AnnotationResult {
  annotations: Map<string, FileAnnotation>;
  degraded: DegradedAnnotation[];
}

const logger = createLogger('annotator');

/** Tags used when every provider failed for a file: just its format category. */
export const degradedTagsFor = (record: Pick<FileRecord, 'extension'>): WeightedTag[] => {
  const category = categoryForExtension(record.extension);
  return category ? [{ tag: category, weight: 1 }] : [];
};

const fromCache = (
  record: FileRecord,
  cached: IndexedDocument | undefined,
  needsEmbedding: boolean,
): FileAnnotation | null => {
  if (!cached || !cached.tagWeights || cached.contentHash !== record.contentHash) {
    return null;
  }
  if (needsEmbedding && !cached.embedding) {
    return null;
  }
  return {
    path: record.path,
    tags: Object.entries(cached.tagWeights).map(([tag, weight]) => ({ tag, weight })),
    embedding: cached.embedding,
    source: 'cache',
  };
};

const logFailure = (record: FileRecord, stage: DegradedAnnotation['stage'], error: unknown) => {
  const message = `${stage} failed for ${record.relativePath}: ${describeError(error)}`;
  if (isProviderFailure(error)) {
    logger.warn(message);
  } else {
    logger.error(message);
  }
};

/**
 * Derives tags (and embeddings when an embedder is given) for each record.
 * A provider failure degrades that one file; a cancelled signal aborts the run.
 */
export const annotateFiles = async (
  records: readonly FileRecord[],
  options: AnnotateOptions,
): Promise<AnnotationResult> => {
  const pool = new WorkerPool(options.concurrency);
  const degraded: DegradedAnnotation[] = [];
  const { tagger, embedder, signal } = options;

  const annotateOne = async (record: FileRecord): Promise<FileAnnotation> => {
    const cached = fromCache(record, options.cache?.get(record.path), Boolean(embedder));
    if (cached) {
      return cached;
    }

    let content = '';
    try {
      content = await options.readContent(record);
    } catch (error) {
      logFailure(record, 'content', error);
      degraded.push({ path: record.path, stage: 'content', reason: describeError(error) });
    }

    let tags: WeightedTag[];
    let source: FileAnnotation['source'] = 'provider';
    try {
      tags = await withTimeout(
        tagger.name,
        options.timeoutMs,
        (callSignal) => tagger.tag(record.relativePath, content, callSignal),
        signal,
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logFailure(record, 'tag', error);
      degraded.push({ path: record.path, stage: 'tag', reason: describeError(error) });
      tags = degradedTagsFor(record);
      source = 'degraded';
    }

    let embedding: number[] | undefined;
    if (embedder && content.trim()) {
      try {
        embedding = await withTimeout(
          embedder.name,
          options.timeoutMs,
          (callSignal) => embedder.embed(content, callSignal),
          signal,
        );
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        logFailure(record, 'embed', error);
        degraded.push({ path: record.path, stage: 'embed', reason: describeError(error) });
      }
    }

    return { path: record.path, tags, embedding, source };
  };

  const annotated = await mapWithPool(records, annotateOne, pool);
  degraded.sort((a, b) => compareStrings(a.path, b.path) || compareStrings(a.stage, b.stage));

  return {
    annotations: new Map(annotated.map((annotation) => [annotation.path, annotation])),
    degraded,
  };
};
