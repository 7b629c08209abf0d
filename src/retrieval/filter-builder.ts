/**
 * Builds the index predicate for a search.
 *
 * All clauses are ANDed:
 * - `platform` exact match
 * - `has_interpretations = true` when interpretations are required
 * - `timestamp` range, `gte` from dateFrom and `lte` from dateTo (epoch seconds)
 * - one `metadata.<key> = value` match from a `key:value` metadata filter
 */

import type { FieldCondition, IndexFilter } from '../storage/index-service.js';
import { METADATA_FIELD } from '../storage/payload.js';
import { DateParseError, InvalidFilterError } from '../utils/errors.js';
import { toEpochSeconds } from '../utils/time.js';
import type { SearchFilters } from './types.js';

/**
 * Parse a date filter value into epoch seconds.
 */
export function parseDate(value: string | number): number {
  const seconds = toEpochSeconds(value);
  if (seconds === null) {
    throw new DateParseError(value);
  }
  return seconds;
}

/**
 * Split `key:value` at the first colon.
 */
export function parseMetadataFilter(filter: string): { key: string; value: string } {
  const colon = filter.indexOf(':');
  if (colon <= 0) {
    throw new InvalidFilterError(
      `Metadata filter must look like key:value, got "${filter}"`,
      'metadataFilter',
    );
  }
  return { key: filter.slice(0, colon), value: filter.slice(colon + 1) };
}

/**
 * Predicate for the given filters, or undefined when nothing restricts the search.
 */
export function buildFilter(filters: SearchFilters): IndexFilter | undefined {
  const must: FieldCondition[] = [];

  if (filters.platform) {
    must.push({ key: 'platform', match: { value: filters.platform } });
  }

  if (filters.withInterpretations) {
    must.push({ key: 'has_interpretations', match: { value: true } });
  }

  const range: { gte?: number; lte?: number } = {};
  if (filters.dateFrom !== undefined && filters.dateFrom !== '') {
    range.gte = parseDate(filters.dateFrom);
  }
  if (filters.dateTo !== undefined && filters.dateTo !== '') {
    range.lte = parseDate(filters.dateTo);
  }
  if (range.gte !== undefined || range.lte !== undefined) {
    must.push({ key: 'timestamp', range });
  }

  if (filters.metadataFilter) {
    const { key, value } = parseMetadataFilter(filters.metadataFilter);
    must.push({ key: `${METADATA_FIELD}.${key}`, match: { value } });
  }

  return must.length > 0 ? { must } : undefined;
}
