import { z } from 'zod';
import { ProviderTimeoutError, ProviderUnavailableError, describeError } from '../../common/errors';
import type { WeightedTag } from '../../types/providers';
import { createLogger } from '../../utils/log';

export interface OllamaConnection {
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

const logger = createLogger('ollama');

const MAX_ERROR_SNIPPET = 200;

export const normaliseBaseUrl = (url: string) => url.replace(/\/+$/, '');

const snippet = (text: string) =>
  text.length <= MAX_ERROR_SNIPPET ? text : `${text.slice(0, MAX_ERROR_SNIPPET - 1)}…`;

const TAGGING_PROMPT = `You label files for a personal file organiser.
You receive the path of a file relative to the folder being organised and,
when available, the beginning of its text content.

Return a JSON object that matches this TypeScript type:
{
  "tags": { "tag": string; "confidence": number }[];
}

Give at most five tags. Each tag is one or two lowercase words describing the
topic or purpose of the file (for example "invoice", "travel", "tax return"),
never its format. Confidence is between 0 and 1.`;

/**
 * Posts JSON to an Ollama route and returns the decoded body. Transport
 * problems, non-2xx answers and undecodable bodies all surface as
 * `ProviderUnavailableError`; an aborted deadline keeps its timeout error.
 */
export const postOllamaJson = async (
  connection: OllamaConnection,
  route: string,
  body: unknown,
  provider: string,
  signal?: AbortSignal,
): Promise<unknown> => {
  const fetchImpl = connection.fetchImpl ?? fetch;
  const endpoint = `${normaliseBaseUrl(connection.baseUrl)}${route}`;
  let rawText: string;
  let status: number;
  let ok: boolean;
  try {
    const response = await fetchImpl(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
    status = response.status;
    ok = response.ok;
    rawText = await response.text();
  } catch (error) {
    if (signal?.reason instanceof ProviderTimeoutError) {
      throw signal.reason;
    }
    throw new ProviderUnavailableError(provider, `Cannot reach Ollama at ${endpoint}: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!ok) {
    throw new ProviderUnavailableError(provider, `Ollama answered ${status} for ${route}: ${snippet(rawText)}`);
  }

  try {
    return JSON.parse(rawText);
  } catch (error) {
    throw new ProviderUnavailableError(provider, `Ollama returned a body that is not JSON: ${snippet(rawText)}`, {
      cause: error,
    });
  }
};

export const adaptOllamaTagRequest = (model: string, filePath: string, content: string) => ({
  model,
  prompt: `${TAGGING_PROMPT}\n\n<file path="${filePath}">\n${content}\n</file>`,
  stream: false,
  format: 'json',
  options: {
    temperature: 0,
  },
});

const generateResponseSchema = z.object({ response: z.string() });

const tagPayloadSchema = z.object({
  tags: z.array(
    z.union([
      z.string(),
      z.object({
        tag: z.string(),
        confidence: z.number().min(0).max(1).optional(),
      }),
    ]),
  ),
});

/** Unwraps `/api/generate` output and turns the model's JSON into weighted tags. */
export const adaptOllamaTagResponse = (payload: unknown, provider: string): WeightedTag[] => {
  const envelope = generateResponseSchema.safeParse(payload);
  if (!envelope.success) {
    throw new ProviderUnavailableError(provider, 'Ollama response has no "response" text');
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(envelope.data.response);
  } catch (error) {
    logger.warn('Failed to parse the model output as JSON.', snippet(envelope.data.response));
    throw new ProviderUnavailableError(provider, 'Model output is not JSON', { cause: error });
  }

  const tagged = tagPayloadSchema.safeParse(decoded);
  if (!tagged.success) {
    throw new ProviderUnavailableError(provider, `Model output does not list tags: ${tagged.error.issues[0]?.message}`);
  }

  const weights = new Map<string, number>();
  tagged.data.tags.forEach((entry) => {
    const tag = (typeof entry === 'string' ? entry : entry.tag).trim().toLowerCase();
    const weight = typeof entry === 'string' ? 1 : entry.confidence ?? 1;
    if (tag) {
      weights.set(tag, Math.max(weights.get(tag) ?? 0, weight));
    }
  });
  return [...weights.entries()].map(([tag, weight]) => ({ tag, weight }));
};

export const adaptOllamaEmbeddingRequest = (model: string, text: string) => ({
  model,
  prompt: text,
});

const embeddingResponseSchema = z.object({ embedding: z.array(z.number()) });

export const adaptOllamaEmbeddingResponse = (payload: unknown, provider: string, dimension: number): number[] => {
  const parsed = embeddingResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ProviderUnavailableError(provider, 'Ollama response has no numeric "embedding"');
  }
  if (parsed.data.embedding.length !== dimension) {
    throw new ProviderUnavailableError(
      provider,
      `Expected an embedding of ${dimension} dimensions, got ${parsed.data.embedding.length}`,
    );
  }
  return parsed.data.embedding;
};
