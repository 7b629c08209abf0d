/**
 * Ingest pipeline exports.
 */

export { ingestCollection } from './ingest-collection.js';
export type { IngestDeps, IngestOptions, IngestProgress, IngestResult } from './ingest-collection.js';
