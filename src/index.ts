/**
 * chatstrata
 *
 * Normalizes AI chat exports into one chunk schema and searches them under
 * several ranking strategies.
 *
 * @packageDocumentation
 */

// Configuration
export { loadConfig, validateExternalConfig, resolvePath, EXTERNAL_DEFAULTS } from './config/loader.js';
export type { ExternalConfig, LoadConfigOptions, ResolvedConfig } from './config/loader.js';

// Normalization
export * from './parser/index.js';

// Index Service
export * from './storage/index.js';

// Embedding Service
export { HttpEmbeddingService, toSparseVector } from './models/embedding-service.js';
export type {
  EmbeddingService,
  Encoding,
  HttpEmbeddingConfig,
  SparseWeights,
} from './models/embedding-service.js';

// Ingestion
export * from './ingest/index.js';

// Retrieval
export * from './retrieval/index.js';

// Services and HTTP API
export { createServices, assertValidConfig } from './services.js';
export type { Services } from './services.js';
export { createApp, startServer } from './server/server.js';

// Errors and logging
export * from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel, setJsonMode } from './utils/logger.js';
export type { LogFields, Logger, LogLevel } from './utils/logger.js';
