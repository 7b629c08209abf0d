/**
 * Request parsing for the search API.
 *
 * Query-string parameters use snake_case (`date_from`, `search_mode`, ...);
 * batch request bodies carry filters in the dispatcher's own camelCase shape.
 */

import { isPlatform, PLATFORMS } from '../parser/types.js';
import { isSearchMode, type SearchFilters, type SearchMode } from '../retrieval/types.js';
import type { PointId } from '../storage/index-service.js';
import { InvalidFilterError } from '../utils/errors.js';
import { asArray, isRecord, type JsonRecord } from '../utils/guards.js';

export interface SearchRequest {
  query: string;
  filters: SearchFilters;
}

export interface BatchSearchRequest {
  queries: string[];
  filters: SearchFilters;
}

/** First value of a query-string parameter; empty strings count as absent. */
function param(query: JsonRecord, name: string): string | undefined {
  const raw = query[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseInteger(value: string | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidFilterError(`${field} must be an integer, got "${value}"`, field);
  }
  return parseInt(value, 10);
}

function parseFloatParam(value: string | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidFilterError(`${field} must be a number, got "${value}"`, field);
  }
  return parsed;
}

function parseBoolean(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/**
 * Accepts the strategy names plus `vector`, the older name of `hybrid`.
 */
export function parseSearchMode(value: unknown): SearchMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'vector') return 'hybrid';
  if (!isSearchMode(value)) {
    throw new InvalidFilterError(`Unknown search mode: ${String(value)}`, 'mode');
  }
  return value;
}

function parsePlatform(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (!isPlatform(value)) {
    throw new InvalidFilterError(
      `platform must be one of ${PLATFORMS.join(', ')}, got ${String(value)}`,
      'platform',
    );
  }
  return value;
}

function parseDirection(value: unknown): 'asc' | 'desc' | undefined {
  if (value === undefined) return undefined;
  if (value !== 'asc' && value !== 'desc') {
    throw new InvalidFilterError(
      `orderDirection must be asc or desc, got ${String(value)}`,
      'orderDirection',
    );
  }
  return value;
}

/** Numeric ids stay numbers so they match integer point ids. */
function toPointId(value: string): PointId {
  return /^\d+$/.test(value) ? Number(value) : value;
}

/**
 * Split a comma-separated id list.
 */
export function parseIdList(value: string | undefined): PointId[] | undefined {
  if (value === undefined) return undefined;
  const ids = value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id !== '')
    .map(toPointId);
  return ids.length > 0 ? ids : undefined;
}

/**
 * Parse `GET /api/search` query parameters.
 */
export function parseSearchQuery(query: JsonRecord): SearchRequest {
  return {
    query: param(query, 'q') ?? '',
    filters: {
      mode: parseSearchMode(param(query, 'search_mode')),
      platform: parsePlatform(param(query, 'platform')),
      limit: parseInteger(param(query, 'limit'), 'limit'),
      withInterpretations: parseBoolean(param(query, 'interpretations')),
      dateFrom: param(query, 'date_from'),
      dateTo: param(query, 'date_to'),
      metadataFilter: param(query, 'metadata_filter'),
      positiveIds: parseIdList(param(query, 'positive_ids')),
      negativeIds: parseIdList(param(query, 'negative_ids')),
      orderByField: param(query, 'order_by_field'),
      orderDirection: parseDirection(param(query, 'order_direction')),
      mmrDiversity: parseFloatParam(param(query, 'mmr_diversity'), 'mmrDiversity'),
      groupBy: param(query, 'group_by'),
      groupSize: parseInteger(param(query, 'group_size'), 'groupSize'),
    },
  };
}

function optional<T>(
  body: JsonRecord,
  field: string,
  check: (value: unknown) => value is T,
  expected: string,
): T | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (!check(value)) {
    throw new InvalidFilterError(`${field} must be ${expected}`, field);
  }
  return value;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isDate = (v: unknown): v is string | number => isString(v) || isNumber(v);
const isIdList = (v: unknown): v is PointId[] =>
  Array.isArray(v) && v.every((id) => isString(id) || isNumber(id));

/**
 * Parse the `filters` object of a batch request body.
 */
export function parseFilterBody(raw: unknown): SearchFilters {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new InvalidFilterError('filters must be an object', 'filters');
  }

  return {
    mode: parseSearchMode(optional(raw, 'mode', isString, 'a string')),
    platform: parsePlatform(optional(raw, 'platform', isString, 'a string')),
    limit: optional(raw, 'limit', isNumber, 'a number'),
    withInterpretations: optional(raw, 'withInterpretations', isBoolean, 'a boolean'),
    dateFrom: optional(raw, 'dateFrom', isDate, 'a string or number'),
    dateTo: optional(raw, 'dateTo', isDate, 'a string or number'),
    metadataFilter: optional(raw, 'metadataFilter', isString, 'a string'),
    positiveIds: optional(raw, 'positiveIds', isIdList, 'a list of ids'),
    negativeIds: optional(raw, 'negativeIds', isIdList, 'a list of ids'),
    orderByField: optional(raw, 'orderByField', isString, 'a string'),
    orderDirection: parseDirection(optional(raw, 'orderDirection', isString, 'a string')),
    mmrDiversity: optional(raw, 'mmrDiversity', isNumber, 'a number'),
    groupBy: optional(raw, 'groupBy', isString, 'a string'),
    groupSize: optional(raw, 'groupSize', isNumber, 'a number'),
  };
}

/**
 * Parse a `POST /api/search/batch` body: `{ queries: string[], filters?: {...} }`.
 */
export function parseBatchBody(body: unknown): BatchSearchRequest {
  if (!isRecord(body)) {
    throw new InvalidFilterError('Request body must be a JSON object', 'body');
  }
  const queries = asArray(body.queries);
  if (!Array.isArray(body.queries) || !queries.every(isString)) {
    throw new InvalidFilterError('queries must be a list of strings', 'queries');
  }
  return { queries: queries.filter(isString), filters: parseFilterBody(body.filters) };
}
