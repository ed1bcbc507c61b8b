import type { AppConfig } from '../config';
import type { IndexClient } from '../../types/providers';
import { FileIndexClient } from './fileIndexClient';
import { MeilisearchIndexClient } from './meiliIndexClient';

export const createIndexClient = (config: AppConfig, fetchImpl?: typeof fetch): IndexClient => {
  switch (config.index.backend) {
    case 'file':
      return new FileIndexClient(config.index.filePath);
    case 'meilisearch':
      return new MeilisearchIndexClient({
        url: config.meilisearch.url,
        apiKey: config.meilisearch.apiKey,
        indexName: config.meilisearch.indexName,
        requestTimeoutMs: config.meilisearch.requestTimeoutMs,
        taskPollIntervalMs: config.meilisearch.taskPollIntervalMs,
        taskTimeoutMs: config.meilisearch.taskTimeoutMs,
        fetchImpl,
      });
    default: {
      const exhaustive: never = config.index.backend;
      throw new Error(`Unsupported index backend ${String(exhaustive)}`);
    }
  }
};
