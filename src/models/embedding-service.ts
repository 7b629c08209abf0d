/**
 * Embedding Service: turns text into a dense vector and a sparse lexical weight map.
 *
 * The service is constructed once, loaded once with `load()`, and passed to
 * whatever needs it. The HTTP client talks to a BGE-M3 style inference server:
 *
 * - `GET  {url}/health` answers when the model is ready
 * - `POST {url}/encode` takes `{ texts, return_dense, return_sparse }` and answers
 *   `{ dense_vecs: number[][], lexical_weights: Record<tokenId, weight>[] }`
 */

import type { SparseVector } from '../storage/index-service.js';
import { ExternalServiceError } from '../utils/errors.js';
import { asArray, asRecord, isNumberArray, isRecord } from '../utils/guards.js';
import { requestJson } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedding-service');

/** Token id (as a string) to weight. */
export type SparseWeights = Record<string, number>;

export interface Encoding {
  dense: number[];
  sparse: SparseWeights;
}

export interface EmbeddingService {
  readonly loaded: boolean;
  /** Prepare the model. Safe to call more than once. */
  load(): Promise<void>;
  encode(text: string): Promise<Encoding>;
  encodeBatch(texts: string[]): Promise<Encoding[]>;
}

/**
 * Convert a weight map into parallel index/value arrays, sorted by token id.
 * Entries whose key is not an integer are dropped.
 */
export function toSparseVector(weights: SparseWeights): SparseVector {
  const entries = Object.entries(weights)
    .map(([token, weight]) => [Number(token), weight] as const)
    .filter(([token]) => Number.isInteger(token) && token >= 0)
    .sort((a, b) => a[0] - b[0]);

  return {
    indices: entries.map(([token]) => token),
    values: entries.map(([, weight]) => weight),
  };
}

export interface HttpEmbeddingConfig {
  url: string;
  /** Model name sent with each request; servers may ignore it */
  model?: string;
  timeoutMs: number;
  /** Texts per encode request. Default: 16 */
  batchSize?: number;
}

function parseWeights(raw: unknown): SparseWeights {
  const weights: SparseWeights = {};
  for (const [token, weight] of Object.entries(asRecord(raw))) {
    if (typeof weight === 'number' && Number.isFinite(weight)) {
      weights[token] = weight;
    }
  }
  return weights;
}

export class HttpEmbeddingService implements EmbeddingService {
  private ready = false;
  private loading: Promise<void> | null = null;

  constructor(private readonly config: HttpEmbeddingConfig) {}

  get loaded(): boolean {
    return this.ready;
  }

  private endpoint(path: string): string {
    return `${this.config.url.replace(/\/+$/, '')}${path}`;
  }

  async load(): Promise<void> {
    if (this.ready) return;
    this.loading ??= this.checkHealth();
    try {
      await this.loading;
    } finally {
      this.loading = null;
    }
  }

  private async checkHealth(): Promise<void> {
    const start = performance.now();
    await requestJson(this.endpoint('/health'), 'embedding', { timeoutMs: this.config.timeoutMs });
    this.ready = true;
    log.info(`Embedding service ready in ${(performance.now() - start).toFixed(0)}ms`, {
      url: this.config.url,
    });
  }

  async encode(text: string): Promise<Encoding> {
    const [encoding] = await this.encodeBatch([text]);
    return encoding;
  }

  async encodeBatch(texts: string[]): Promise<Encoding[]> {
    if (!this.ready) {
      await this.load();
    }

    const batchSize = this.config.batchSize ?? 16;
    const encodings: Encoding[] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      encodings.push(...(await this.encodeRequest(texts.slice(i, i + batchSize))));
    }
    return encodings;
  }

  private async encodeRequest(texts: string[]): Promise<Encoding[]> {
    const response = await requestJson(this.endpoint('/encode'), 'embedding', {
      method: 'POST',
      body: {
        texts,
        return_dense: true,
        return_sparse: true,
        ...(this.config.model ? { model: this.config.model } : {}),
      },
      timeoutMs: this.config.timeoutMs,
    });

    const body = isRecord(response) ? response : {};
    const dense = asArray(body.dense_vecs);
    const sparse = asArray(body.lexical_weights);

    if (dense.length !== texts.length || !dense.every(isNumberArray)) {
      throw new ExternalServiceError(
        `Embedding service returned ${dense.length} dense vectors for ${texts.length} texts`,
        'EMBEDDING_REQUEST_FAILED',
        'embedding',
      );
    }

    return dense.map((vector, i) => ({ dense: vector, sparse: parseWeights(sparse[i]) }));
  }
}
