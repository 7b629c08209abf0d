/**
 * Normalization layer exports.
 */

// Canonical record
export type {
  Chunk,
  DateRange,
  ExportSummary,
  Interpretations,
  NormalizeOptions,
  Platform,
  SystemContext,
  ToolUsageRecord,
} from './types.js';
export { PLATFORMS, isPlatform } from './types.js';
export { createChunk, isValidChunk, hasInterpretations, platformLabel, TurnCounter } from './chunk.js';
export type { ChunkInit } from './chunk.js';

// Collection
export { ChunkCollection } from './collection.js';
export type {
  CollectionMetadata,
  PersistedChunk,
  PersistedCollection,
  PlatformStats,
  SaveOptions,
  SerializeOptions,
} from './collection.js';

// Normalizers
export type { ExportNormalizer } from './normalizer.js';
export { TreeExportNormalizer } from './tree-export.js';
export { PairedTurnExportNormalizer } from './paired-turn-export.js';
export { ProjectExportNormalizer } from './project-export.js';

// Registry and input
export { FormatRegistry, defaultRegistry } from './registry.js';
export type { ParseFileOptions, ParsedExport } from './registry.js';
export { loadJsonFile, parseJsonText, DEFAULT_MAX_FILE_SIZE_MB } from './input-loader.js';
export type { LoadInputOptions, LoadedInput } from './input-loader.js';

// Embedding text
export { toEmbeddingText, isEmbeddingTextMode, EMBEDDING_TEXT_MODES } from './embedding-text.js';
export type { EmbeddingTextMode, EmbeddingTextOptions } from './embedding-text.js';
