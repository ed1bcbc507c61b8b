import type { EmbeddingProvider } from '../../types/providers';
import {
  adaptOllamaEmbeddingRequest,
  adaptOllamaEmbeddingResponse,
  postOllamaJson,
  type OllamaConnection,
} from './ollama';

export interface OllamaEmbeddingProviderOptions extends OllamaConnection {
  model: string;
  dimension: number;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  private readonly options: OllamaEmbeddingProviderOptions;

  constructor(options: OllamaEmbeddingProviderOptions) {
    this.options = options;
    this.name = `ollama-embed:${options.model}`;
    this.dimension = options.dimension;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const payload = await postOllamaJson(
      this.options,
      '/api/embeddings',
      adaptOllamaEmbeddingRequest(this.options.model, text),
      this.name,
      signal,
    );
    return adaptOllamaEmbeddingResponse(payload, this.name, this.dimension);
  }
}
