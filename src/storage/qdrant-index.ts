/**
 * Index Service backed by Qdrant's REST API.
 *
 * Points carry two named vectors: a dense one and a sparse lexical one.
 * Each connection owns an AbortController; closing it cancels any request
 * still in flight.
 */

import type {
  GroupOptions,
  IndexConnection,
  IndexFilter,
  IndexGroup,
  IndexHit,
  IndexPoint,
  IndexService,
  PointId,
  QueryOptions,
  RecommendOptions,
  SparseVector,
} from './index-service.js';
import { ExternalServiceError, errorMessage } from '../utils/errors.js';
import { asArray, asNumber, asRecord, isNumberArray, isRecord } from '../utils/guards.js';
import { requestJson } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('qdrant-index');

export interface QdrantIndexConfig {
  url: string;
  apiKey?: string;
  collection: string;
  timeoutMs: number;
  /** Name of the dense vector. Default: 'dense' */
  denseVector?: string;
  /** Name of the sparse vector. Default: 'sparse' */
  sparseVector?: string;
}

/** Payload fields indexed for filtering and grouping. */
export const PAYLOAD_INDEXES: ReadonlyArray<{ field: string; schema: string }> = [
  { field: 'platform', schema: 'keyword' },
  { field: 'conversation_id', schema: 'keyword' },
  { field: 'has_interpretations', schema: 'bool' },
  { field: 'timestamp', schema: 'float' },
  { field: 'turn_number', schema: 'integer' },
];

function isPointId(value: unknown): value is PointId {
  return typeof value === 'string' || typeof value === 'number';
}

/**
 * Read a scored point from a response.
 */
export function parseScoredPoint(raw: unknown, denseVector: string): IndexHit | null {
  if (!isRecord(raw) || !isPointId(raw.id)) return null;

  const hit: IndexHit = {
    id: raw.id,
    score: asNumber(raw.score) ?? 0,
    payload: asRecord(raw.payload),
  };

  const vector = raw.vector;
  const named = isRecord(vector) ? vector[denseVector] : undefined;
  if (isNumberArray(vector)) {
    hit.vector = vector;
  } else if (isNumberArray(named)) {
    hit.vector = named;
  }

  return hit;
}

class QdrantConnection implements IndexConnection {
  private readonly controller = new AbortController();
  private closed = false;
  private readonly dense: string;
  private readonly sparse: string;

  constructor(private readonly config: QdrantIndexConfig) {
    this.dense = config.denseVector ?? 'dense';
    this.sparse = config.sparseVector ?? 'sparse';
  }

  private collectionPath(suffix = ''): string {
    return `/collections/${encodeURIComponent(this.config.collection)}${suffix}`;
  }

  private async request(
    method: 'GET' | 'POST' | 'PUT',
    path: string,
    body?: unknown,
  ): Promise<unknown> {
    if (this.closed) {
      throw new ExternalServiceError('Index connection is closed', 'INDEX_REQUEST_FAILED', 'index');
    }
    const response = await requestJson(`${this.config.url.replace(/\/+$/, '')}${path}`, 'index', {
      method,
      body,
      headers: this.config.apiKey ? { 'api-key': this.config.apiKey } : {},
      timeoutMs: this.config.timeoutMs,
      signal: this.controller.signal,
    });
    return asRecord(response).result;
  }

  private async queryPoints(body: Record<string, unknown>): Promise<IndexHit[]> {
    const result = await this.request('POST', this.collectionPath('/points/query'), body);
    return this.parsePoints(asRecord(result).points);
  }

  private parsePoints(raw: unknown): IndexHit[] {
    const hits: IndexHit[] = [];
    for (const point of asArray(raw)) {
      const hit = parseScoredPoint(point, this.dense);
      if (hit) hits.push(hit);
    }
    return hits;
  }

  private filterBody(filter?: IndexFilter): Record<string, unknown> {
    return filter ? { filter } : {};
  }

  async queryDense(vector: number[], options: QueryOptions): Promise<IndexHit[]> {
    return this.queryPoints({
      query: vector,
      using: this.dense,
      limit: options.limit,
      with_payload: true,
      with_vector: options.withVectors ? [this.dense] : false,
      ...this.filterBody(options.filter),
    });
  }

  async querySparse(vector: SparseVector, options: QueryOptions): Promise<IndexHit[]> {
    return this.queryPoints({
      query: { indices: vector.indices, values: vector.values },
      using: this.sparse,
      limit: options.limit,
      with_payload: true,
      with_vector: false,
      ...this.filterBody(options.filter),
    });
  }

  async recommend(options: RecommendOptions): Promise<IndexHit[]> {
    return this.queryPoints({
      query: { recommend: { positive: options.positive, negative: options.negative } },
      using: this.dense,
      limit: options.limit,
      with_payload: true,
      ...this.filterBody(options.filter),
    });
  }

  async groupDense(vector: number[], options: GroupOptions): Promise<IndexGroup[]> {
    const result = await this.request('POST', this.collectionPath('/points/query/groups'), {
      query: vector,
      using: this.dense,
      group_by: options.groupBy,
      group_size: options.groupSize,
      limit: options.limit,
      with_payload: true,
      ...this.filterBody(options.filter),
    });

    const groups: IndexGroup[] = [];
    for (const raw of asArray(asRecord(result).groups)) {
      if (!isRecord(raw) || !isPointId(raw.id)) continue;
      groups.push({ id: raw.id, hits: this.parsePoints(raw.hits) });
    }
    return groups;
  }

  async ensureCollection(dimension: number): Promise<void> {
    const existing = await this.request('GET', this.collectionPath('/exists'));
    if (asRecord(existing).exists === true) return;

    log.info('Creating collection', { collection: this.config.collection, dimension });
    await this.request('PUT', this.collectionPath(), {
      vectors: { [this.dense]: { size: dimension, distance: 'Cosine' } },
      sparse_vectors: { [this.sparse]: {} },
    });
    for (const { field, schema } of PAYLOAD_INDEXES) {
      await this.request('PUT', this.collectionPath('/index?wait=true'), {
        field_name: field,
        field_schema: schema,
      });
    }
  }

  async upsert(points: IndexPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.request('PUT', this.collectionPath('/points?wait=true'), {
      points: points.map((p) => ({
        id: p.id,
        vector: { [this.dense]: p.dense, [this.sparse]: p.sparse },
        payload: p.payload,
      })),
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.request('GET', this.collectionPath());
      return true;
    } catch (error) {
      log.debug('Index ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.controller.abort();
  }
}

export class QdrantIndexService implements IndexService {
  constructor(private readonly config: QdrantIndexConfig) {}

  async connect(): Promise<IndexConnection> {
    return new QdrantConnection(this.config);
  }
}
