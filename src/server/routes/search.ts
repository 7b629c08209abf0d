import express, { Router } from 'express';
import type { BatchSearchItem, SearchDispatcher } from '../../retrieval/dispatcher.js';
import type { GroupedResult, SearchFilters, SearchMode, SearchResult } from '../../retrieval/types.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { parseBatchBody, parseSearchQuery } from '../params.js';

export type SearchResponse =
  | {
      query: string;
      mode: SearchMode;
      totalResults: number;
      executionTimeMs: number;
      results: SearchResult[];
      filters: SearchFilters;
    }
  | {
      query: string;
      mode: 'groups';
      totalGroups: number;
      executionTimeMs: number;
      groups: GroupedResult[];
      filters: SearchFilters;
    };

export interface BatchSearchResponse {
  results: SearchResponse[];
  totalExecutionTimeMs: number;
}

function toResponse(item: BatchSearchItem, filters: SearchFilters): SearchResponse {
  const { query, outcome } = item;
  if (outcome.kind === 'groups') {
    return {
      query,
      mode: outcome.mode,
      totalGroups: outcome.groups.length,
      executionTimeMs: outcome.executionTimeMs,
      groups: outcome.groups,
      filters,
    };
  }
  return {
    query,
    mode: outcome.mode,
    totalResults: outcome.results.length,
    executionTimeMs: outcome.executionTimeMs,
    results: outcome.results,
    filters,
  };
}

export function createSearchRouter(dispatcher: SearchDispatcher): Router {
  const router = Router();

  /**
   * GET /api/search — One query under any ranking strategy.
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { query, filters } = parseSearchQuery(req.query);
      const outcome = await dispatcher.search(query, filters);
      res.json(toResponse({ query, outcome }, filters));
    }),
  );

  /**
   * POST /api/search/batch — Up to ten queries sharing one set of filters.
   */
  router.post(
    '/batch',
    express.json(),
    asyncHandler(async (req, res) => {
      const start = performance.now();
      const { queries, filters } = parseBatchBody(req.body);
      const items = await dispatcher.searchBatch(queries, filters);
      const body: BatchSearchResponse = {
        results: items.map((item) => toResponse(item, filters)),
        totalExecutionTimeMs: Math.round((performance.now() - start) * 100) / 100,
      };
      res.json(body);
    }),
  );

  return router;
}
