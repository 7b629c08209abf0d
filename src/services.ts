/**
 * Builds the external collaborators and the dispatcher from resolved config.
 */

import { validateExternalConfig, type ResolvedConfig } from './config/loader.js';
import { HttpEmbeddingService, type EmbeddingService } from './models/embedding-service.js';
import { DEFAULT_RETRIEVAL_SETTINGS, SearchDispatcher } from './retrieval/dispatcher.js';
import type { IndexService } from './storage/index-service.js';
import { QdrantIndexService } from './storage/qdrant-index.js';
import { ConfigError } from './utils/errors.js';

export interface Services {
  index: IndexService;
  embedder: EmbeddingService;
  dispatcher: SearchDispatcher;
}

/**
 * Throw a ConfigError listing every invalid value.
 */
export function assertValidConfig(config: ResolvedConfig): void {
  const errors = validateExternalConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration:\n  - ${errors.join('\n  - ')}`, 'CONFIG_INVALID');
  }
}

export function createServices(config: ResolvedConfig): Services {
  assertValidConfig(config);

  const { url, apiKey, collection, timeoutMs, denseVector, sparseVector } = config.index;
  if (!url || !collection || !config.embedding.url) {
    throw new ConfigError(
      'index.url, index.collection and embedding.url are required',
      'CONFIG_INVALID',
    );
  }

  const index = new QdrantIndexService({
    url,
    apiKey,
    collection,
    timeoutMs: timeoutMs ?? 30_000,
    denseVector,
    sparseVector,
  });
  const embedder = new HttpEmbeddingService({
    url: config.embedding.url,
    model: config.embedding.model,
    timeoutMs: config.embedding.timeoutMs ?? 60_000,
  });
  const dispatcher = new SearchDispatcher({
    index,
    embedder,
    settings: {
      defaultLimit: config.retrieval.defaultLimit ?? DEFAULT_RETRIEVAL_SETTINGS.defaultLimit,
      mmrLambda: config.retrieval.mmrLambda ?? DEFAULT_RETRIEVAL_SETTINGS.mmrLambda,
      defaultGroupSize:
        config.retrieval.defaultGroupSize ?? DEFAULT_RETRIEVAL_SETTINGS.defaultGroupSize,
    },
  });

  return { index, embedder, dispatcher };
}
