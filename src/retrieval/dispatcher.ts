/**
 * Retrieval dispatcher: routes a query to one ranking strategy.
 *
 * Pipeline per request:
 * 1. Validate filters (before any external call)
 * 2. Encode the query, unless the strategy works from example points
 * 3. Open an index connection, run the strategy, close the connection
 * 4. Assemble display results
 */

import { buildFilter } from './filter-builder.js';
import { mergeHybrid } from './hybrid-merge.js';
import { selectWithMMR } from './mmr.js';
import { orderResults } from './order-by.js';
import { toGroupedResults, toSearchResults } from './result-assembler.js';
import type { HealthReport, SearchFilters, SearchMode, SearchOutcome } from './types.js';
import type { EmbeddingService, Encoding } from '../models/embedding-service.js';
import { toSparseVector } from '../models/embedding-service.js';
import {
  withConnection,
  type IndexConnection,
  type IndexFilter,
  type IndexHit,
  type IndexService,
} from '../storage/index-service.js';
import {
  ExternalServiceError,
  InvalidFilterError,
  MissingRequiredFilterError,
  StrataError,
  errorMessage,
  type ExternalServiceName,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('dispatcher');

export interface RetrievalSettings {
  /** Default: 10 */
  defaultLimit: number;
  /** Default: 100 */
  maxLimit: number;
  /** MMR lambda when a request gives none. Default: 0.5 */
  mmrLambda: number;
  /** Default: 3 */
  defaultGroupSize: number;
  /** Default: 10 */
  maxGroupSize: number;
  /** Queries per batch request. Default: 10 */
  maxBatchSize: number;
}

export const DEFAULT_RETRIEVAL_SETTINGS: RetrievalSettings = {
  defaultLimit: 10,
  maxLimit: 100,
  mmrLambda: 0.5,
  defaultGroupSize: 3,
  maxGroupSize: 10,
  maxBatchSize: 10,
};

export interface DispatcherDeps {
  index: IndexService;
  embedder: EmbeddingService;
  settings?: Partial<RetrievalSettings>;
}

export interface BatchSearchItem {
  query: string;
  outcome: SearchOutcome;
}

/** A validated request with defaults applied. */
interface ResolvedRequest {
  mode: SearchMode;
  limit: number;
  filter: IndexFilter | undefined;
}

function serviceError(error: unknown, service: ExternalServiceName): StrataError {
  if (error instanceof StrataError) return error;
  return new ExternalServiceError(
    `${service} service failed: ${errorMessage(error)}`,
    service === 'index' ? 'INDEX_REQUEST_FAILED' : 'EMBEDDING_REQUEST_FAILED',
    service,
    error,
  );
}

function checkRange(value: number, min: number, max: number, field: string): number {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new InvalidFilterError(`${field} must be between ${min} and ${max}, got ${value}`, field);
  }
  return value;
}

function checkInteger(value: number, min: number, max: number, field: string): number {
  if (!Number.isInteger(value)) {
    throw new InvalidFilterError(`${field} must be an integer, got ${value}`, field);
  }
  return checkRange(value, min, max, field);
}

export class SearchDispatcher {
  private readonly index: IndexService;
  private readonly embedder: EmbeddingService;
  readonly settings: RetrievalSettings;

  constructor(deps: DispatcherDeps) {
    this.index = deps.index;
    this.embedder = deps.embedder;
    this.settings = { ...DEFAULT_RETRIEVAL_SETTINGS, ...deps.settings };
  }

  /**
   * Load the embedding model. Called once at startup.
   */
  async init(): Promise<void> {
    try {
      await this.embedder.load();
    } catch (error) {
      throw serviceError(error, 'embedding');
    }
  }

  async search(query: string, filters: SearchFilters = {}): Promise<SearchOutcome> {
    const start = performance.now();
    const request = this.resolve(query, filters);
    const executionTime = (): number => Math.round((performance.now() - start) * 100) / 100;

    const searchLog = log.child({ mode: request.mode });
    searchLog.debug('Search', { limit: request.limit, filtered: !!request.filter });

    switch (request.mode) {
      case 'recommend': {
        const hits = await this.withIndex((c) =>
          c.recommend({
            positive: filters.positiveIds ?? [],
            negative: filters.negativeIds ?? [],
            filter: request.filter,
            limit: request.limit,
          }),
        );
        return {
          kind: 'results',
          mode: 'recommend',
          results: toSearchResults(hits),
          executionTimeMs: executionTime(),
        };
      }

      case 'groups': {
        const encoding = await this.encode(query);
        const groupBy = filters.groupBy ?? '';
        const groupSize = filters.groupSize ?? this.settings.defaultGroupSize;
        const groups = await this.withIndex((c) =>
          c.groupDense(encoding.dense, {
            groupBy,
            groupSize,
            limit: request.limit,
            filter: request.filter,
          }),
        );
        return {
          kind: 'groups',
          mode: 'groups',
          groups: toGroupedResults(groups),
          executionTimeMs: executionTime(),
        };
      }

      case 'mmr': {
        const encoding = await this.encode(query);
        const lambda = filters.mmrDiversity ?? this.settings.mmrLambda;
        const candidates = await this.withIndex((c) =>
          c.queryDense(encoding.dense, {
            filter: request.filter,
            limit: request.limit * 2,
            withVectors: true,
          }),
        );
        const selected = selectWithMMR(
          candidates,
          { lambda, limit: request.limit },
          { score: (hit) => hit.score, vector: (hit) => hit.vector },
        );
        return {
          kind: 'results',
          mode: 'mmr',
          results: toSearchResults(selected),
          executionTimeMs: executionTime(),
        };
      }

      case 'order_by': {
        const encoding = await this.encode(query);
        const hits = await this.withIndex((c) => this.hybrid(c, encoding, request));
        const results = toSearchResults(hits);
        const ordered = filters.orderByField
          ? orderResults(results, filters.orderByField, filters.orderDirection ?? 'desc')
          : results;
        return {
          kind: 'results',
          mode: 'order_by',
          results: ordered,
          executionTimeMs: executionTime(),
        };
      }

      case 'hybrid': {
        const encoding = await this.encode(query);
        const hits = await this.withIndex((c) => this.hybrid(c, encoding, request));
        return {
          kind: 'results',
          mode: 'hybrid',
          results: toSearchResults(hits),
          executionTimeMs: executionTime(),
        };
      }
    }
  }

  /**
   * Run several queries with the same filters, one after another.
   */
  async searchBatch(queries: string[], filters: SearchFilters = {}): Promise<BatchSearchItem[]> {
    checkInteger(queries.length, 1, this.settings.maxBatchSize, 'queries');
    const items: BatchSearchItem[] = [];
    for (const query of queries) {
      items.push({ query, outcome: await this.search(query, filters) });
    }
    return items;
  }

  async health(): Promise<HealthReport> {
    let indexConnected = false;
    try {
      indexConnected = await withConnection(this.index, (c) => c.ping());
    } catch (error) {
      log.warn('Index health check failed', { error: errorMessage(error) });
    }
    const modelLoaded = this.embedder.loaded;
    return {
      status: modelLoaded && indexConnected ? 'healthy' : 'degraded',
      modelLoaded,
      indexConnected,
    };
  }

  private resolve(query: string, filters: SearchFilters): ResolvedRequest {
    const mode = filters.mode ?? 'hybrid';
    const limit = checkInteger(
      filters.limit ?? this.settings.defaultLimit,
      1,
      this.settings.maxLimit,
      'limit',
    );

    if (mode !== 'recommend' && query.trim() === '') {
      throw new InvalidFilterError('Query must not be empty', 'query');
    }
    if (mode === 'recommend' && (filters.positiveIds ?? []).length === 0) {
      throw new MissingRequiredFilterError(
        'Recommend search requires at least one positive example id',
        'MISSING_POSITIVE_EXAMPLE',
        'positiveIds',
      );
    }
    if (mode === 'groups' && !filters.groupBy) {
      throw new MissingRequiredFilterError(
        'Group search requires a group-by field',
        'MISSING_GROUP_BY',
        'groupBy',
      );
    }
    if (filters.groupSize !== undefined) {
      checkInteger(filters.groupSize, 1, this.settings.maxGroupSize, 'groupSize');
    }
    if (filters.mmrDiversity !== undefined) {
      checkRange(filters.mmrDiversity, 0, 1, 'mmrDiversity');
    }

    return { mode, limit, filter: buildFilter(filters) };
  }

  private async encode(query: string): Promise<Encoding> {
    try {
      return await this.embedder.encode(query);
    } catch (error) {
      throw serviceError(error, 'embedding');
    }
  }

  private async withIndex<T>(fn: (connection: IndexConnection) => Promise<T>): Promise<T> {
    try {
      return await withConnection(this.index, fn);
    } catch (error) {
      throw serviceError(error, 'index');
    }
  }

  /**
   * Dense and sparse top-k under the same filter, merged by id.
   */
  private async hybrid(
    connection: IndexConnection,
    encoding: Encoding,
    request: ResolvedRequest,
  ): Promise<IndexHit[]> {
    const options = { filter: request.filter, limit: request.limit };
    const dense = await connection.queryDense(encoding.dense, options);
    const sparse = await connection.querySparse(toSparseVector(encoding.sparse), options);
    return mergeHybrid(dense, sparse, request.limit);
  }
}
