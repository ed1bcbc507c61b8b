import crypto from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import { IndexConnectionError, RejectedDocumentError, describeError } from '../../common/errors';
import type { IndexClient } from '../../types/providers';
import type { IndexedDocument, SearchHit } from '../../types/snapshot';
import { indexedDocumentSchema } from './documents';

export interface MeilisearchIndexClientOptions {
  url: string;
  apiKey?: string;
  indexName: string;
  requestTimeoutMs: number;
  taskPollIntervalMs: number;
  taskTimeoutMs: number;
  /** Documents fetched per page while taking a snapshot */
  pageSize?: number;
  fetchImpl?: typeof fetch;
}

interface MeiliResponse {
  status: number;
  ok: boolean;
  payload: unknown;
}

const DEFAULT_PAGE_SIZE = 1000;

const enqueuedTaskSchema = z.object({ taskUid: z.number() });
const taskSchema = z.object({
  status: z.enum(['enqueued', 'processing', 'succeeded', 'failed', 'canceled']),
  error: z.object({ message: z.string(), code: z.string().optional() }).nullish(),
});
const documentsPageSchema = z.object({
  results: z.array(z.unknown()),
  total: z.number(),
});
const searchResponseSchema = z.object({ hits: z.array(z.unknown()) });
const storedIdSchema = z.object({ id: z.string() });
const errorBodySchema = z.object({ message: z.string(), code: z.string().optional() });

/** Meilisearch ids only allow `[A-Za-z0-9_-]`, so paths are hashed. */
export const documentIdFor = (documentPath: string) =>
  `doc-${crypto.createHash('sha1').update(documentPath).digest('hex')}`;

const describeBody = (payload: unknown, status: number) => {
  const parsed = errorBodySchema.safeParse(payload);
  return parsed.success ? `${parsed.data.message}${parsed.data.code ? ` (${parsed.data.code})` : ''}` : `status ${status}`;
};

// Malformed documents are a client-side fault; auth and server faults are systemic.
const isDocumentRejection = (status: number) => status >= 400 && status < 500 && status !== 401 && status !== 403 && status !== 404;

export class MeilisearchIndexClient implements IndexClient {
  readonly name = 'meilisearch';
  private readonly options: MeilisearchIndexClientOptions;

  constructor(options: MeilisearchIndexClientOptions) {
    this.options = { ...options, url: options.url.replace(/\/+$/, '') };
  }

  async upsert(documents: IndexedDocument[]): Promise<void> {
    if (documents.length === 0) return;
    const paths = documents.map((document) => document.path);
    const response = await this.request(
      'POST',
      `/indexes/${this.options.indexName}/documents?primaryKey=id`,
      documents.map((document) => ({ id: documentIdFor(document.path), ...document })),
    );
    if (!response.ok) {
      const message = `Meilisearch refused ${documents.length} documents: ${describeBody(response.payload, response.status)}`;
      if (isDocumentRejection(response.status)) {
        throw new RejectedDocumentError(paths, message);
      }
      throw new IndexConnectionError(message);
    }
    await this.waitForTask(response.payload, paths);
  }

  async delete(paths: string[]): Promise<void> {
    if (paths.length === 0) return;
    const response = await this.request(
      'POST',
      `/indexes/${this.options.indexName}/documents/delete-batch`,
      paths.map(documentIdFor),
    );
    if (response.status === 404) return;
    if (!response.ok) {
      throw new IndexConnectionError(`Meilisearch refused a delete: ${describeBody(response.payload, response.status)}`);
    }
    await this.waitForTask(response.payload, paths);
  }

  async snapshot(): Promise<IndexedDocument[]> {
    const pageSize = this.options.pageSize ?? DEFAULT_PAGE_SIZE;
    const documents: IndexedDocument[] = [];
    let offset = 0;
    let total = Number.POSITIVE_INFINITY;

    while (offset < total) {
      const response = await this.request(
        'GET',
        `/indexes/${this.options.indexName}/documents?limit=${pageSize}&offset=${offset}`,
      );
      // A missing index is simply an empty one.
      if (response.status === 404) return [];
      if (!response.ok) {
        throw new IndexConnectionError(`Cannot list documents: ${describeBody(response.payload, response.status)}`);
      }
      const page = documentsPageSchema.safeParse(response.payload);
      if (!page.success) {
        throw new IndexConnectionError('Meilisearch returned an unexpected documents page');
      }
      documents.push(...this.parseDocuments(page.data.results));
      total = page.data.total;
      if (page.data.results.length === 0) break;
      offset += page.data.results.length;
    }

    return documents;
  }

  async search(query: string, limit = 20): Promise<SearchHit[]> {
    const response = await this.request('POST', `/indexes/${this.options.indexName}/search`, { q: query, limit });
    if (response.status === 404) return [];
    if (!response.ok) {
      throw new IndexConnectionError(`Search failed: ${describeBody(response.payload, response.status)}`);
    }
    const parsed = searchResponseSchema.safeParse(response.payload);
    if (!parsed.success) {
      throw new IndexConnectionError('Meilisearch returned an unexpected search response');
    }
    return this.parseDocuments(parsed.data.hits).map((document) => ({ document }));
  }

  private parseDocuments(values: unknown[]): IndexedDocument[] {
    return values.map((value, position) => {
      const parsed = indexedDocumentSchema.safeParse(value);
      if (!parsed.success) {
        const identified = storedIdSchema.safeParse(value);
        const label = identified.success ? identified.data.id : `#${position}`;
        throw new IndexConnectionError(
          `Meilisearch holds document ${label} with an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        );
      }
      return parsed.data;
    });
  }

  private async waitForTask(payload: unknown, paths: string[]): Promise<void> {
    const enqueued = enqueuedTaskSchema.safeParse(payload);
    if (!enqueued.success) {
      throw new IndexConnectionError('Meilisearch did not return a task id');
    }
    const deadline = Date.now() + this.options.taskTimeoutMs;

    while (Date.now() <= deadline) {
      const response = await this.request('GET', `/tasks/${enqueued.data.taskUid}`);
      if (!response.ok) {
        throw new IndexConnectionError(`Cannot read task ${enqueued.data.taskUid}: ${describeBody(response.payload, response.status)}`);
      }
      const task = taskSchema.safeParse(response.payload);
      if (!task.success) {
        throw new IndexConnectionError(`Task ${enqueued.data.taskUid} has an unexpected shape`);
      }
      switch (task.data.status) {
        case 'succeeded':
          return;
        case 'failed':
          throw new RejectedDocumentError(paths, task.data.error?.message ?? `Task ${enqueued.data.taskUid} failed`);
        case 'canceled':
          throw new IndexConnectionError(`Task ${enqueued.data.taskUid} was cancelled`);
        case 'enqueued':
        case 'processing':
          await delay(this.options.taskPollIntervalMs);
          break;
        default: {
          const exhaustive: never = task.data.status;
          throw new IndexConnectionError(`Unknown task status ${String(exhaustive)}`);
        }
      }
    }

    throw new IndexConnectionError(
      `Task ${enqueued.data.taskUid} did not finish within ${this.options.taskTimeoutMs} ms`,
    );
  }

  private async request(method: 'GET' | 'POST', route: string, body?: unknown): Promise<MeiliResponse> {
    const fetchImpl = this.options.fetchImpl ?? fetch;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    let status: number;
    let ok: boolean;
    let rawText: string;
    try {
      const response = await fetchImpl(`${this.options.url}${route}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
      status = response.status;
      ok = response.ok;
      rawText = await response.text();
    } catch (error) {
      throw new IndexConnectionError(`Cannot reach Meilisearch at ${this.options.url}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!rawText) {
      return { status, ok, payload: null };
    }
    try {
      return { status, ok, payload: JSON.parse(rawText) };
    } catch (error) {
      throw new IndexConnectionError(`Meilisearch answered ${status} with a body that is not JSON`, { cause: error });
    }
  }
}
