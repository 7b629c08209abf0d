/**
 * Retrieval system exports.
 */

// Dispatcher
export { SearchDispatcher, DEFAULT_RETRIEVAL_SETTINGS } from './dispatcher.js';
export type { BatchSearchItem, DispatcherDeps, RetrievalSettings } from './dispatcher.js';

// Request and response shapes
export { SEARCH_MODES, isSearchMode } from './types.js';
export type {
  GroupedResult,
  HealthReport,
  SearchFilters,
  SearchMode,
  SearchOutcome,
  SearchResult,
  SortDirection,
} from './types.js';

// Filters
export { buildFilter, parseDate, parseMetadataFilter } from './filter-builder.js';

// Fusion and re-ranking
export { mergeHybrid } from './hybrid-merge.js';
export { selectWithMMR } from './mmr.js';
export { orderResults } from './order-by.js';
export { toSearchResult, toSearchResults, toGroupedResults, flattenGroups } from './result-assembler.js';
