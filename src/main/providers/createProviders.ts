import type { AppConfig } from '../config';
import type { EmbeddingProvider, TagProvider } from '../../types/providers';
import { createContentReader, type ContentReader } from './contentReader';
import { DictionaryTagProvider } from './dictionaryTagger';
import { FallbackTagProvider } from './fallbackTagger';
import { OllamaEmbeddingProvider } from './ollamaEmbedder';
import { OllamaTagProvider } from './ollamaTagger';

export interface ProviderSet {
  tagger: TagProvider;
  embedder?: EmbeddingProvider;
  readContent: ContentReader;
}

export const createProviders = (config: AppConfig, fetchImpl?: typeof fetch): ProviderSet => {
  const dictionary = new DictionaryTagProvider();
  const tagger = config.providers.useLlm
    ? new FallbackTagProvider(
        new OllamaTagProvider({
          baseUrl: config.ollama.url,
          model: config.ollama.tagModel,
          maxPromptChars: config.ollama.maxPromptChars,
          fetchImpl,
        }),
        dictionary,
        config.ollama.timeoutMs,
      )
    : dictionary;

  const embedder = config.providers.useEmbeddings
    ? new OllamaEmbeddingProvider({
        baseUrl: config.ollama.url,
        model: config.ollama.embeddingModel,
        dimension: config.ollama.dimension,
        fetchImpl,
      })
    : undefined;

  return {
    tagger,
    embedder,
    readContent: createContentReader(config.providers.maxContentBytes),
  };
};
