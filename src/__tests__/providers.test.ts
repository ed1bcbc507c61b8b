import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ProviderTimeoutError, ProviderUnavailableError } from '../common/errors';
import type { FileRecord } from '../common/fileTypes';
import { createContentReader, isTextLike } from '../main/providers/contentReader';
import { DictionaryTagProvider } from '../main/providers/dictionaryTagger';
import { FallbackTagProvider } from '../main/providers/fallbackTagger';
import { OllamaEmbeddingProvider } from '../main/providers/ollamaEmbedder';
import { OllamaTagProvider, truncateForPrompt } from '../main/providers/ollamaTagger';
import { tokenizeName } from '../main/providers/tagDictionary';
import { withTimeout } from '../main/providers/timeouts';
import type { TagProvider } from '../types/providers';

interface RecordedCall {
  url: string;
  body: unknown;
}

const fakeFetch = (respond: () => Response) => {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), body: JSON.parse(String(init?.body)) });
    return respond();
  };
  return { calls, fetchImpl };
};

const jsonResponse = (payload: unknown, status = 200) =>
  new Response(JSON.stringify(payload), { status, headers: { 'Content-Type': 'application/json' } });

const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

describe('tokenizeName', () => {
  it('splits delimiters and camelCase and drops noise', () => {
    expect(tokenizeName('myHolidayPhotos')).toEqual(['my', 'holiday', 'photos']);
    expect(tokenizeName('IMG_0042 copy')).toEqual([]);
    expect(tokenizeName('HTMLParser-notes.v2')).toEqual(['html', 'parser', 'notes', 'v2']);
  });
});

describe('DictionaryTagProvider', () => {
  const tagger = new DictionaryTagProvider();

  it('weighs file name, folders, category and content keywords', async () => {
    const tags = await tagger.tag('invoices/2024/ACME_Invoice-March.pdf', 'Invoice total due. invoice invoice invoice');

    expect(tags).toEqual([
      { tag: 'financial', weight: 4 },
      { tag: 'acme', weight: 1 },
      { tag: 'invoice', weight: 1 },
      { tag: 'march', weight: 1 },
      { tag: 'document', weight: 0.5 },
      { tag: 'invoices', weight: 0.5 },
    ]);
  });

  it('falls back to folder tokens when the file name says nothing', async () => {
    const tags = await tagger.tag('myHolidayPhotos/IMG_0042.JPG', '');

    expect(tags).toEqual([
      { tag: 'holiday', weight: 0.5 },
      { tag: 'image', weight: 0.5 },
      { tag: 'my', weight: 0.5 },
      { tag: 'photos', weight: 0.5 },
    ]);
  });

  it('ignores generic folder names', async () => {
    const tags = await tagger.tag('Downloads/misc/recipe.txt', '');

    expect(tags).toEqual([
      { tag: 'recipe', weight: 2 },
      { tag: 'text', weight: 0.5 },
    ]);
  });
});

describe('OllamaTagProvider', () => {
  it('posts a JSON-mode prompt and reads weighted tags back', async () => {
    const { calls, fetchImpl } = fakeFetch(() =>
      jsonResponse({ response: JSON.stringify({ tags: [{ tag: ' Invoice ', confidence: 0.9 }, 'travel'] }) }),
    );
    const provider = new OllamaTagProvider({ baseUrl: 'http://ollama.test/', model: 'test-model', maxPromptChars: 100, fetchImpl });

    const tags = await provider.tag('docs/bill.txt', 'Amount due');

    expect(tags).toEqual([
      { tag: 'invoice', weight: 0.9 },
      { tag: 'travel', weight: 1 },
    ]);
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://ollama.test/api/generate');
    expect(calls[0].body).toMatchObject({ model: 'test-model', stream: false, format: 'json' });
    expect(provider.name).toBe('ollama:test-model');
  });

  it('reports non-2xx answers as an unavailable provider', async () => {
    const { fetchImpl } = fakeFetch(() => new Response('model not found', { status: 404 }));
    const provider = new OllamaTagProvider({ baseUrl: 'http://ollama.test', model: 'm', maxPromptChars: 100, fetchImpl });

    await expect(provider.tag('a.txt', '')).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it('reports model output that is not JSON', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse({ response: 'here are some tags: invoice' }));
    const provider = new OllamaTagProvider({ baseUrl: 'http://ollama.test', model: 'm', maxPromptChars: 100, fetchImpl });

    await expect(provider.tag('a.txt', '')).rejects.toThrow('Model output is not JSON');
  });

  it('reports a refused connection', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const provider = new OllamaTagProvider({ baseUrl: 'http://ollama.test', model: 'm', maxPromptChars: 100, fetchImpl });

    await expect(provider.tag('a.txt', '')).rejects.toThrow('Cannot reach Ollama at http://ollama.test/api/generate: fetch failed');
  });

  it('cuts long content before prompting', () => {
    expect(truncateForPrompt('abcdef', 4)).toBe('abcd\n[… truncated 2 characters]');
    expect(truncateForPrompt('abc', 4)).toBe('abc');
  });
});

describe('OllamaEmbeddingProvider', () => {
  it('returns the embedding when it has the configured dimension', async () => {
    const { calls, fetchImpl } = fakeFetch(() => jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
    const provider = new OllamaEmbeddingProvider({ baseUrl: 'http://ollama.test', model: 'embed', dimension: 3, fetchImpl });

    await expect(provider.embed('hello')).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(calls[0]).toEqual({ url: 'http://ollama.test/api/embeddings', body: { model: 'embed', prompt: 'hello' } });
  });

  it('rejects an embedding of the wrong size', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse({ embedding: [0.1, 0.2] }));
    const provider = new OllamaEmbeddingProvider({ baseUrl: 'http://ollama.test', model: 'embed', dimension: 3, fetchImpl });

    await expect(provider.embed('hello')).rejects.toThrow('Expected an embedding of 3 dimensions, got 2');
  });
});

describe('withTimeout', () => {
  it('rejects with a timeout error and aborts the task signal', async () => {
    let taskSignal: AbortSignal | undefined;

    await expect(
      withTimeout('slow', 20, (signal) => {
        taskSignal = signal;
        return new Promise<never>(() => undefined);
      }),
    ).rejects.toBeInstanceOf(ProviderTimeoutError);
    expect(taskSignal?.aborted).toBe(true);
  });

  it('keeps the timeout error when the transport sees the abort first', async () => {
    const provider = new OllamaTagProvider({ baseUrl: 'http://ollama.test', model: 'm', maxPromptChars: 100, fetchImpl: hangingFetch });

    await expect(withTimeout(provider.name, 20, (signal) => provider.tag('a.txt', '', signal))).rejects.toThrow(
      'ollama:m did not answer within 20 ms',
    );
  });

  it('resolves with the task value when it is fast enough', async () => {
    await expect(withTimeout('fast', 1000, async () => 42)).resolves.toBe(42);
  });
});

describe('FallbackTagProvider', () => {
  const fallback: TagProvider = { name: 'backup', tag: async () => [{ tag: 'from-backup', weight: 1 }] };

  it('uses the primary when it answers', async () => {
    const primary: TagProvider = { name: 'main', tag: async () => [{ tag: 'from-main', weight: 1 }] };

    await expect(new FallbackTagProvider(primary, fallback, 1000).tag('a.txt', '')).resolves.toEqual([
      { tag: 'from-main', weight: 1 },
    ]);
  });

  it('answers from the fallback when the primary is unavailable', async () => {
    const primary: TagProvider = {
      name: 'main',
      tag: async () => {
        throw new ProviderUnavailableError('main', 'down');
      },
    };
    const provider = new FallbackTagProvider(primary, fallback, 1000);

    expect(provider.name).toBe('main|backup');
    await expect(provider.tag('a.txt', '')).resolves.toEqual([{ tag: 'from-backup', weight: 1 }]);
  });

  it('answers from the fallback when the primary is too slow', async () => {
    const primary: TagProvider = { name: 'main', tag: () => new Promise(() => undefined) };

    await expect(new FallbackTagProvider(primary, fallback, 20).tag('a.txt', '')).resolves.toEqual([
      { tag: 'from-backup', weight: 1 },
    ]);
  });

  it('lets other errors through', async () => {
    const primary: TagProvider = {
      name: 'main',
      tag: async () => {
        throw new Error('bug');
      },
    };

    await expect(new FallbackTagProvider(primary, fallback, 1000).tag('a.txt', '')).rejects.toThrow('bug');
  });
});

describe('createContentReader', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'content-reader-'));
    await fs.writeFile(path.join(tempDir, 'notes.txt'), 'meeting agenda for monday');
    await fs.writeFile(path.join(tempDir, 'photo.png'), 'binary-ish');
    await fs.writeFile(path.join(tempDir, 'cafe.txt'), 'café au lait');
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const recordFor = (name: string, mimeType: string | null, size: number): FileRecord => ({
    path: path.join(tempDir, name),
    relativePath: name,
    name,
    size,
    extension: path.extname(name).slice(1),
    mimeType,
    createdAt: '2024-01-01T00:00:00.000Z',
    modifiedAt: '2024-01-01T00:00:00.000Z',
    contentHash: 'h',
  });

  it('reads at most the configured number of bytes from text files', async () => {
    await expect(createContentReader(7)(recordFor('notes.txt', 'text/plain', 25))).resolves.toBe('meeting');
  });

  it('drops a character cut in half by the byte limit', async () => {
    const record = recordFor('cafe.txt', 'text/plain', Buffer.byteLength('café au lait'));

    await expect(createContentReader(4)(record)).resolves.toBe('caf');
    await expect(createContentReader(5)(record)).resolves.toBe('café');
  });

  it('returns nothing for binary files', async () => {
    await expect(createContentReader(100)(recordFor('photo.png', 'image/png', 10))).resolves.toBe('');
  });

  it('knows which types are text', () => {
    expect(isTextLike('application/json')).toBe(true);
    expect(isTextLike('text/markdown')).toBe(true);
    expect(isTextLike('application/pdf')).toBe(false);
    expect(isTextLike(null)).toBe(false);
  });
});
