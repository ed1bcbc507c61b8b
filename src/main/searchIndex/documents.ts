import { z } from 'zod';
import type { FileRecord } from '../../common/fileTypes';
import { compareStrings } from '../../common/paths';
import type { FileAnnotation } from '../../types/providers';
import type { IndexedDocument } from '../../types/snapshot';

export const indexedDocumentSchema = z.object({
  path: z.string().min(1),
  size: z.number().nonnegative(),
  extension: z.string(),
  createdAt: z.string(),
  modifiedAt: z.string(),
  contentHash: z.string(),
  tags: z.array(z.string()),
  tagWeights: z.record(z.number()).optional(),
  embedding: z.array(z.number()).optional(),
});

/**
 * Builds the stored form of a file. `pathOverride` is used after a move, when
 * the record still carries the old location.
 */
export const toIndexedDocument = (
  record: FileRecord,
  annotation?: FileAnnotation,
  pathOverride?: string,
): IndexedDocument => {
  // A Map, so tags such as `constructor` never read an inherited member.
  const weights = new Map<string, number>();
  annotation?.tags.forEach(({ tag, weight }) => {
    weights.set(tag, Math.max(weights.get(tag) ?? 0, weight));
  });
  const tags = [...weights.keys()].sort(compareStrings);
  const tagWeights = Object.fromEntries(tags.map((tag) => [tag, weights.get(tag) ?? 0]));
  const document: IndexedDocument = {
    path: pathOverride ?? record.path,
    size: record.size,
    extension: record.extension,
    createdAt: record.createdAt,
    modifiedAt: record.modifiedAt,
    contentHash: record.contentHash,
    tags,
    tagWeights,
  };
  if (annotation?.embedding) {
    document.embedding = annotation.embedding;
  }
  return document;
};
