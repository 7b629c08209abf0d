/**
 * Re-sorting of assembled results by one of their fields.
 *
 * Fields may be named as on the result (`turnNumber`) or as in the index
 * payload and HTTP parameters (`turn_number`).
 */

import type { SearchResult, SortDirection } from './types.js';

type Sortable = string | number;

function camelCase(field: string): string {
  return field.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function sortValue(result: SearchResult, field: string): Sortable {
  const fields: Record<string, unknown> = { ...result };
  const value = field in fields ? fields[field] : fields[camelCase(field)];
  if (typeof value === 'number') return value;
  if (value === undefined || value === null) return '';
  return String(value);
}

function compare(a: Sortable, b: Sortable): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Stable sort by `field`; results missing the field compare as ''.
 */
export function orderResults(
  results: SearchResult[],
  field: string,
  direction: SortDirection = 'desc',
): SearchResult[] {
  const sign = direction === 'asc' ? 1 : -1;
  return [...results].sort((a, b) => sign * compare(sortValue(a, field), sortValue(b, field)));
}
