import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { IndexConnectionError, describeError, errorCodeOf } from '../../common/errors';
import { compareStrings } from '../../common/paths';
import type { IndexClient } from '../../types/providers';
import type { IndexedDocument, SearchHit } from '../../types/snapshot';
import { indexedDocumentSchema } from './documents';
import { tokenizeContent } from '../providers/tagDictionary';

const STORE_VERSION = 1;

const storeSchema = z.object({
  version: z.literal(STORE_VERSION),
  savedAtIso: z.string(),
  documents: z.array(indexedDocumentSchema),
});

/**
 * Index persisted as one JSON file. Writes go to a temporary file that is
 * renamed over the store, and operations on one client run one at a time.
 */
export class FileIndexClient implements IndexClient {
  readonly name = 'file';
  readonly filePath: string;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  upsert(documents: IndexedDocument[]): Promise<void> {
    return this.exclusive(async () => {
      if (documents.length === 0) return;
      const store = await this.load();
      documents.forEach((document) => store.set(document.path, document));
      await this.save(store);
    });
  }

  delete(paths: string[]): Promise<void> {
    return this.exclusive(async () => {
      if (paths.length === 0) return;
      const store = await this.load();
      paths.forEach((documentPath) => store.delete(documentPath));
      await this.save(store);
    });
  }

  snapshot(): Promise<IndexedDocument[]> {
    return this.exclusive(async () => {
      const store = await this.load();
      return [...store.values()].sort((a, b) => compareStrings(a.path, b.path));
    });
  }

  /** Two points per query word that is one of the tags, one per word found in the path. */
  search(query: string, limit = 20): Promise<SearchHit[]> {
    return this.exclusive(async () => {
      const words = [...new Set(tokenizeContent(query))];
      if (words.length === 0) return [];
      const store = await this.load();
      const hits: SearchHit[] = [];
      store.forEach((document) => {
        const tags = new Set(document.tags.map((tag) => tag.toLowerCase()));
        const lowerPath = document.path.toLowerCase();
        const score = words.reduce(
          (total, word) => total + (tags.has(word) ? 2 : 0) + (lowerPath.includes(word) ? 1 : 0),
          0,
        );
        if (score > 0) {
          hits.push({ document, score });
        }
      });
      return hits
        .sort((a, b) => (b.score ?? 0) - (a.score ?? 0) || compareStrings(a.document.path, b.document.path))
        .slice(0, limit);
    });
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.pending.then(operation, operation);
    this.pending = result.catch(() => undefined);
    return result;
  }

  private async load(): Promise<Map<string, IndexedDocument>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        return new Map();
      }
      throw new IndexConnectionError(`Cannot read index file ${this.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new IndexConnectionError(`Index file ${this.filePath} is not valid JSON`, { cause: error });
    }
    const parsed = storeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IndexConnectionError(`Index file ${this.filePath} has an unexpected layout`);
    }
    return new Map(parsed.data.documents.map((document) => [document.path, document]));
  }

  private async save(store: Map<string, IndexedDocument>): Promise<void> {
    const payload = {
      version: STORE_VERSION,
      savedAtIso: new Date().toISOString(),
      documents: [...store.values()].sort((a, b) => compareStrings(a.path, b.path)),
    };
    const temporaryPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(temporaryPath, JSON.stringify(payload, null, 2), 'utf8');
      await fs.rename(temporaryPath, this.filePath);
    } catch (error) {
      throw new IndexConnectionError(`Cannot write index file ${this.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
