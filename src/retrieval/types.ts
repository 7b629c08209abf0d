/**
 * Request and response shapes of the retrieval dispatcher.
 */

import type { PointId } from '../storage/index-service.js';

/**
 * Ranking strategy.
 *
 * - `hybrid`: dense and sparse top-k merged by id
 * - `recommend`: nearest to positive example points, away from negative ones
 * - `order_by`: hybrid, then re-sorted by a result field
 * - `mmr`: dense over-fetch re-ranked for diversity
 * - `groups`: best hits per value of a payload field
 */
export type SearchMode = 'hybrid' | 'recommend' | 'order_by' | 'mmr' | 'groups';

export const SEARCH_MODES: readonly SearchMode[] = ['hybrid', 'recommend', 'order_by', 'mmr', 'groups'];

export function isSearchMode(value: unknown): value is SearchMode {
  return typeof value === 'string' && SEARCH_MODES.some((m) => m === value);
}

export type SortDirection = 'asc' | 'desc';

export interface SearchFilters {
  /** Default: 'hybrid' */
  mode?: SearchMode;
  platform?: string;
  /** 1-100. Default: 10 */
  limit?: number;
  /** Only chunks that carry interpretation data */
  withInterpretations?: boolean;
  /** Epoch seconds or ISO-8601 */
  dateFrom?: string | number;
  dateTo?: string | number;
  /** `key:value` match on the payload metadata object */
  metadataFilter?: string;
  positiveIds?: PointId[];
  negativeIds?: PointId[];
  orderByField?: string;
  /** Default: 'desc' */
  orderDirection?: SortDirection;
  /** MMR lambda, 0-1 */
  mmrDiversity?: number;
  groupBy?: string;
  /** 1-10. Default: 3 */
  groupSize?: number;
}

export interface SearchResult {
  /** Position in this response; not stable across requests */
  id: number;
  /** Index point id, usable as a recommend example */
  pointId: PointId;
  /** Strategy-specific, rounded to 4 decimals; not comparable across modes */
  score: number;
  platform: string;
  conversationTitle: string;
  timestamp: string | null;
  turnNumber: number;
  userMessage: string;
  assistantMessage: string;
  hasInterpretations: boolean;
  chunkId?: string;
  conversationId?: string;
  aboutUser?: string;
  aboutModel?: string;
  userMessageType?: string;
  assistantMessageType?: string;
  assistantModel?: string;
}

export interface GroupedResult {
  groupKey: string;
  hits: SearchResult[];
}

export type SearchOutcome =
  | { kind: 'results'; mode: SearchMode; results: SearchResult[]; executionTimeMs: number }
  | { kind: 'groups'; mode: 'groups'; groups: GroupedResult[]; executionTimeMs: number };

export interface HealthReport {
  status: 'healthy' | 'degraded';
  modelLoaded: boolean;
  indexConnected: boolean;
}
