/**
 * Uploads a chunk collection into the index.
 *
 * Each chunk becomes one point: its embedding text is encoded into dense and
 * sparse vectors, and its display fields become the payload. The point id is
 * the chunk id, so re-ingesting a collection overwrites instead of duplicating.
 */

import type { ChunkCollection } from '../parser/collection.js';
import { toEmbeddingText, type EmbeddingTextMode } from '../parser/embedding-text.js';
import type { Chunk } from '../parser/types.js';
import { toSparseVector, type EmbeddingService } from '../models/embedding-service.js';
import { withConnection, type IndexPoint, type IndexService } from '../storage/index-service.js';
import { chunkToPayload } from '../storage/payload.js';
import { ExternalServiceError, StrataError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ingest');

/**
 * Progress information passed to callback.
 */
export interface IngestProgress {
  /** Chunks processed so far, including skipped ones */
  done: number;
  total: number;
  /** Points written so far */
  uploaded: number;
}

export interface IngestOptions {
  /** Embedding text mode. Default: 'balanced' */
  mode?: EmbeddingTextMode;
  /** Chunks per encode + upsert round. Default: 32 */
  batchSize?: number;
  /** Called after each batch. */
  progressCallback?: (progress: IngestProgress) => void;
}

export interface IngestResult {
  uploaded: number;
  /** Chunks with no embedding text */
  skipped: number;
  batches: number;
  durationMs: number;
}

export interface IngestDeps {
  index: IndexService;
  embedder: EmbeddingService;
}

export async function ingestCollection(
  collection: ChunkCollection,
  deps: IngestDeps,
  options: IngestOptions = {},
): Promise<IngestResult> {
  const start = performance.now();
  const mode = options.mode ?? 'balanced';
  const batchSize = Math.max(1, options.batchSize ?? 32);
  const chunks = collection.chunks;

  let uploaded = 0;
  let skipped = 0;
  let batches = 0;
  let collectionReady = false;

  await withConnection(deps.index, async (connection) => {
    for (let i = 0; i < chunks.length; i += batchSize) {
      const batch: Array<{ chunk: Chunk; text: string }> = [];
      for (const chunk of chunks.slice(i, i + batchSize)) {
        const text = toEmbeddingText(chunk, { mode });
        if (text.trim() === '') {
          skipped++;
        } else {
          batch.push({ chunk, text });
        }
      }

      if (batch.length > 0) {
        const encodings = await deps.embedder.encodeBatch(batch.map((b) => b.text));

        if (!collectionReady) {
          await connection.ensureCollection(encodings[0].dense.length);
          collectionReady = true;
        }

        const points: IndexPoint[] = batch.map(({ chunk }, j) => ({
          id: chunk.chunkId,
          dense: encodings[j].dense,
          sparse: toSparseVector(encodings[j].sparse),
          payload: chunkToPayload(chunk),
        }));

        try {
          await connection.upsert(points);
        } catch (error) {
          if (error instanceof StrataError) throw error;
          throw new ExternalServiceError(
            `Upsert failed: ${errorMessage(error)}`,
            'INDEX_REQUEST_FAILED',
            'index',
            error,
          );
        }
        uploaded += points.length;
        batches++;
      }

      const done = Math.min(i + batchSize, chunks.length);
      log.debug('Ingest batch complete', { done, total: chunks.length });
      options.progressCallback?.({ done, total: chunks.length, uploaded });
    }
  });

  const durationMs = performance.now() - start;
  log.info('Ingest complete', { uploaded, skipped, batches, durationMs: Math.round(durationMs) });

  return { uploaded, skipped, batches, durationMs };
}
