import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { IndexConnectionError, RejectedDocumentError } from '../common/errors';
import { resolveConfig } from '../main/config';
import { createIndexClient } from '../main/searchIndex/createIndexClient';
import { FileIndexClient } from '../main/searchIndex/fileIndexClient';
import { toIndexedDocument } from '../main/searchIndex/documents';
import { MeilisearchIndexClient, documentIdFor } from '../main/searchIndex/meiliIndexClient';
import type { FileRecord } from '../common/fileTypes';
import type { IndexedDocument } from '../types/snapshot';

const indexedDocument = (documentPath: string, tags: string[] = []): IndexedDocument => ({
  path: documentPath,
  size: 1,
  extension: path.extname(documentPath).slice(1),
  createdAt: '2024-01-01T00:00:00.000Z',
  modifiedAt: '2024-01-01T00:00:00.000Z',
  contentHash: `hash:${documentPath}`,
  tags,
});

describe('toIndexedDocument', () => {
  const record: FileRecord = {
    path: '/r/trip/beach.jpg',
    relativePath: 'trip/beach.jpg',
    name: 'beach.jpg',
    size: 2048,
    extension: 'jpg',
    mimeType: 'image/jpeg',
    createdAt: '2024-06-01T10:00:00.000Z',
    modifiedAt: '2024-06-02T10:00:00.000Z',
    contentHash: 'abc123',
  };

  it('keeps the heaviest weight of each tag and sorts the tag list', () => {
    const document = toIndexedDocument(record, {
      path: record.path,
      tags: [
        { tag: 'trip', weight: 0.5 },
        { tag: 'beach', weight: 1 },
        { tag: 'trip', weight: 2 },
      ],
      embedding: [0.1, 0.2],
      source: 'provider',
    });

    expect(document).toEqual({
      path: '/r/trip/beach.jpg',
      size: 2048,
      extension: 'jpg',
      createdAt: '2024-06-01T10:00:00.000Z',
      modifiedAt: '2024-06-02T10:00:00.000Z',
      contentHash: 'abc123',
      tags: ['beach', 'trip'],
      tagWeights: { beach: 1, trip: 2 },
      embedding: [0.1, 0.2],
    });
  });

  it('keeps tags that share a name with object members', () => {
    const document = toIndexedDocument(record, {
      path: record.path,
      tags: [
        { tag: 'constructor', weight: 1 },
        { tag: 'toString', weight: 2 },
        { tag: 'constructor', weight: 0.5 },
      ],
      source: 'provider',
    });

    expect(document.tags).toEqual(['constructor', 'toString']);
    expect(document.tagWeights).toEqual({ constructor: 1, toString: 2 });
  });

  it('stores a moved file under its new path', () => {
    const document = toIndexedDocument(record, undefined, '/r/image/beach.jpg');

    expect(document.path).toBe('/r/image/beach.jpg');
    expect(document.tags).toEqual([]);
    expect(document).not.toHaveProperty('embedding');
  });
});

describe('FileIndexClient', () => {
  let tempDir: string;
  let indexFile: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-index-'));
    indexFile = path.join(tempDir, 'nested', 'index.json');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist yet', async () => {
    await expect(new FileIndexClient(indexFile).snapshot()).resolves.toEqual([]);
  });

  it('persists upserts and deletes across instances', async () => {
    const client = new FileIndexClient(indexFile);
    await client.upsert([indexedDocument('/r/b.txt'), indexedDocument('/r/a.txt')]);
    await client.upsert([indexedDocument('/r/a.txt', ['updated'])]);
    await client.delete(['/r/b.txt', '/r/never-indexed.txt']);

    const reopened = new FileIndexClient(indexFile);
    await expect(reopened.snapshot()).resolves.toEqual([indexedDocument('/r/a.txt', ['updated'])]);
    expect(await fs.readdir(path.dirname(indexFile))).toEqual(['index.json']);
  });

  it('does not lose writes issued at the same time', async () => {
    const client = new FileIndexClient(indexFile);

    await Promise.all([
      client.upsert([indexedDocument('/r/one.txt')]),
      client.upsert([indexedDocument('/r/two.txt')]),
      client.upsert([indexedDocument('/r/three.txt')]),
    ]);

    expect((await client.snapshot()).map((document) => document.path)).toEqual(['/r/one.txt', '/r/three.txt', '/r/two.txt']);
  });

  it('reports a corrupt store as a connection failure', async () => {
    await fs.mkdir(path.dirname(indexFile), { recursive: true });
    await fs.writeFile(indexFile, '{ not json');

    await expect(new FileIndexClient(indexFile).snapshot()).rejects.toBeInstanceOf(IndexConnectionError);
  });

  it('ranks tag matches above path matches', async () => {
    const client = new FileIndexClient(indexFile);
    await client.upsert([
      indexedDocument('/r/finance/bill.pdf', ['financial']),
      indexedDocument('/r/photos/trip.jpg', ['travel', 'image']),
      indexedDocument('/r/notes/travel-plan.txt', ['task']),
    ]);

    expect((await client.search('Travel')).map((hit) => [hit.document.path, hit.score])).toEqual([
      ['/r/photos/trip.jpg', 2],
      ['/r/notes/travel-plan.txt', 1],
    ]);
    expect((await client.search('financial bill')).map((hit) => [hit.document.path, hit.score])).toEqual([
      ['/r/finance/bill.pdf', 3],
    ]);
    expect((await client.search('r', 2)).map((hit) => hit.document.path)).toEqual([
      '/r/finance/bill.pdf',
      '/r/notes/travel-plan.txt',
    ]);
    await expect(client.search('  ')).resolves.toEqual([]);
  });
});

interface FakeRequest {
  method: string;
  url: string;
  authorization: string | null;
  body: unknown;
}

const fakeMeilisearch = (handle: (request: FakeRequest) => Response) => {
  const requests: FakeRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const request: FakeRequest = {
      method: init?.method ?? 'GET',
      url: String(input),
      authorization: new Headers(init?.headers).get('Authorization'),
      body: init?.body === undefined ? undefined : JSON.parse(String(init.body)),
    };
    requests.push(request);
    return handle(request);
  };
  return { requests, fetchImpl };
};

const json = (payload: unknown, status = 200) => new Response(JSON.stringify(payload), { status });

const meiliClient = (fetchImpl: typeof fetch, apiKey: string | undefined = 'test-secret') =>
  new MeilisearchIndexClient({
    url: 'http://meili.test/',
    apiKey,
    indexName: 'files',
    requestTimeoutMs: 1000,
    taskPollIntervalMs: 1,
    taskTimeoutMs: 1000,
    pageSize: 2,
    fetchImpl,
  });

describe('MeilisearchIndexClient', () => {
  it('keys documents by a hash of their path and waits for the task', async () => {
    let polls = 0;
    const { requests, fetchImpl } = fakeMeilisearch((request) => {
      if (request.method === 'POST') return json({ taskUid: 7 }, 202);
      polls += 1;
      return json({ status: polls === 1 ? 'processing' : 'succeeded' });
    });

    await meiliClient(fetchImpl).upsert([indexedDocument('/r/a.txt', ['notes'])]);

    expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
      'POST http://meili.test/indexes/files/documents?primaryKey=id',
      'GET http://meili.test/tasks/7',
      'GET http://meili.test/tasks/7',
    ]);
    expect(requests[0].authorization).toBe('Bearer test-secret');
    expect(requests[0].body).toEqual([{ id: documentIdFor('/r/a.txt'), ...indexedDocument('/r/a.txt', ['notes']) }]);
    expect(documentIdFor('/r/a.txt')).toMatch(/^doc-[0-9a-f]{40}$/);
  });

  it('sends no credentials when no key is configured', async () => {
    const { requests, fetchImpl } = fakeMeilisearch(() => json({ hits: [] }));

    await meiliClient(fetchImpl, undefined).search('anything');

    expect(requests[0].authorization).toBeNull();
  });

  it('reports a failed task as rejected documents', async () => {
    const { fetchImpl } = fakeMeilisearch((request) =>
      request.method === 'POST' ? json({ taskUid: 3 }, 202) : json({ status: 'failed', error: { message: 'bad field' } }),
    );

    const failure = meiliClient(fetchImpl).upsert([indexedDocument('/r/a.txt')]);

    await expect(failure).rejects.toBeInstanceOf(RejectedDocumentError);
    await expect(failure).rejects.toMatchObject({ paths: ['/r/a.txt'], message: 'bad field' });
  });

  it('tells client errors apart from server and auth errors', async () => {
    const answering = (status: number) =>
      fakeMeilisearch(() => json({ message: 'nope', code: 'some_code' }, status)).fetchImpl;

    await expect(meiliClient(answering(400)).upsert([indexedDocument('/r/a.txt')])).rejects.toBeInstanceOf(
      RejectedDocumentError,
    );
    await expect(meiliClient(answering(401)).upsert([indexedDocument('/r/a.txt')])).rejects.toBeInstanceOf(
      IndexConnectionError,
    );
    await expect(meiliClient(answering(503)).upsert([indexedDocument('/r/a.txt')])).rejects.toThrow(
      'Meilisearch refused 1 documents: nope (some_code)',
    );
  });

  it('pages through every stored document', async () => {
    const stored = [indexedDocument('/r/a.txt'), indexedDocument('/r/b.txt'), indexedDocument('/r/c.txt')];
    const { requests, fetchImpl } = fakeMeilisearch((request) => {
      if (request.url.endsWith('offset=0')) {
        return json({ results: stored.slice(0, 2).map((document) => ({ id: 'x', ...document })), total: 3 });
      }
      return json({ results: [{ id: 'y', ...stored[2] }], total: 3 });
    });

    await expect(meiliClient(fetchImpl).snapshot()).resolves.toEqual(stored);
    expect(requests.map((request) => request.url)).toEqual([
      'http://meili.test/indexes/files/documents?limit=2&offset=0',
      'http://meili.test/indexes/files/documents?limit=2&offset=2',
    ]);
  });

  it('fails the snapshot on a malformed stored document instead of dropping it', async () => {
    const { fetchImpl } = fakeMeilisearch(() =>
      json({ results: [{ id: 'y', ...indexedDocument('/r/a.txt') }, { id: 'z', unexpected: true }], total: 2 }),
    );

    const snapshot = meiliClient(fetchImpl).snapshot();

    await expect(snapshot).rejects.toBeInstanceOf(IndexConnectionError);
    await expect(snapshot).rejects.toThrow('Meilisearch holds document z with an unexpected shape');
  });

  it('fails a search that returns a malformed hit', async () => {
    const { fetchImpl } = fakeMeilisearch(() => json({ hits: [{ unexpected: true }] }));

    await expect(meiliClient(fetchImpl).search('beach')).rejects.toThrow(
      'Meilisearch holds document #0 with an unexpected shape',
    );
  });

  it('treats a missing index as empty', async () => {
    const { fetchImpl } = fakeMeilisearch(() => json({ message: 'Index `files` not found.' }, 404));

    await expect(meiliClient(fetchImpl).snapshot()).resolves.toEqual([]);
    await expect(meiliClient(fetchImpl).delete(['/r/a.txt'])).resolves.toBeUndefined();
  });

  it('turns search hits into documents', async () => {
    const { requests, fetchImpl } = fakeMeilisearch(() => json({ hits: [{ id: 'x', ...indexedDocument('/r/a.txt', ['travel']) }] }));

    const hits = await meiliClient(fetchImpl).search('travel', 5);

    expect(hits).toEqual([{ document: indexedDocument('/r/a.txt', ['travel']) }]);
    expect(requests[0].body).toEqual({ q: 'travel', limit: 5 });
  });

  it('reports an unreachable server', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };

    await expect(meiliClient(fetchImpl).snapshot()).rejects.toThrow(
      'Cannot reach Meilisearch at http://meili.test: fetch failed',
    );
  });
});

describe('createIndexClient', () => {
  it('builds the configured backend', () => {
    expect(createIndexClient(resolveConfig({ index: { filePath: '/tmp/index.json' } }, { env: {} }))).toBeInstanceOf(
      FileIndexClient,
    );
    expect(createIndexClient(resolveConfig({ index: { backend: 'meilisearch' } }, { env: {} }))).toBeInstanceOf(
      MeilisearchIndexClient,
    );
  });
});
