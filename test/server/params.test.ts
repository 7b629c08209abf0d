import { describe, it, expect } from 'vitest';
import {
  parseBatchBody,
  parseFilterBody,
  parseIdList,
  parseSearchMode,
  parseSearchQuery,
} from '../../src/server/params.js';
import { InvalidFilterError } from '../../src/utils/errors.js';

describe('params', () => {
  describe('parseSearchMode', () => {
    it('accepts strategy names and the vector alias', () => {
      expect(parseSearchMode('mmr')).toBe('mmr');
      expect(parseSearchMode('vector')).toBe('hybrid');
      expect(parseSearchMode(undefined)).toBeUndefined();
    });

    it('rejects unknown modes', () => {
      expect(() => parseSearchMode('semantic')).toThrow(
        new InvalidFilterError('Unknown search mode: semantic', 'mode'),
      );
    });
  });

  describe('parseIdList', () => {
    it('splits, trims and converts numeric ids', () => {
      expect(parseIdList(' 12, abc-1 ,,7')).toEqual([12, 'abc-1', 7]);
    });

    it('returns undefined for nothing', () => {
      expect(parseIdList(undefined)).toBeUndefined();
      expect(parseIdList(' , ')).toBeUndefined();
    });
  });

  describe('parseSearchQuery', () => {
    it('maps snake_case parameters to filters', () => {
      expect(
        parseSearchQuery({
          q: 'sorting',
          search_mode: 'order_by',
          platform: 'claude',
          limit: '5',
          interpretations: 'true',
          date_from: '2024-01-01',
          date_to: '1706745600',
          metadata_filter: 'filename:a.sql',
          positive_ids: '1,2',
          negative_ids: 'x',
          order_by_field: 'timestamp',
          order_direction: 'asc',
          mmr_diversity: '0.3',
          group_by: 'conversation_id',
          group_size: '2',
        }),
      ).toEqual({
        query: 'sorting',
        filters: {
          mode: 'order_by',
          platform: 'claude',
          limit: 5,
          withInterpretations: true,
          dateFrom: '2024-01-01',
          dateTo: '1706745600',
          metadataFilter: 'filename:a.sql',
          positiveIds: [1, 2],
          negativeIds: ['x'],
          orderByField: 'timestamp',
          orderDirection: 'asc',
          mmrDiversity: 0.3,
          groupBy: 'conversation_id',
          groupSize: 2,
        },
      });
    });

    it('treats empty and missing parameters as absent', () => {
      const { query, filters } = parseSearchQuery({ q: '', platform: '' });

      expect(query).toBe('');
      expect(filters.platform).toBeUndefined();
      expect(filters.withInterpretations).toBe(false);
    });

    it('takes the first of repeated parameters', () => {
      expect(parseSearchQuery({ q: ['first', 'second'] }).query).toBe('first');
    });

    it('accepts 1 as true', () => {
      expect(parseSearchQuery({ interpretations: '1' }).filters.withInterpretations).toBe(true);
    });

    it('rejects malformed values', () => {
      expect(() => parseSearchQuery({ limit: 'ten' })).toThrow('limit must be an integer, got "ten"');
      expect(() => parseSearchQuery({ group_size: '1.5' })).toThrow(
        'groupSize must be an integer, got "1.5"',
      );
      expect(() => parseSearchQuery({ mmr_diversity: 'high' })).toThrow(
        'mmrDiversity must be a number, got "high"',
      );
      expect(() => parseSearchQuery({ platform: 'gemini' })).toThrow(
        'platform must be one of chatgpt, claude, claude-projects, got gemini',
      );
      expect(() => parseSearchQuery({ order_direction: 'up' })).toThrow(
        'orderDirection must be asc or desc, got up',
      );
    });
  });

  describe('parseFilterBody', () => {
    it('reads camelCase fields', () => {
      expect(
        parseFilterBody({ mode: 'vector', limit: 3, withInterpretations: true, positiveIds: [1, 'a'] }),
      ).toMatchObject({ mode: 'hybrid', limit: 3, withInterpretations: true, positiveIds: [1, 'a'] });
    });

    it('accepts a missing filters object', () => {
      expect(parseFilterBody(undefined)).toEqual({});
      expect(parseFilterBody(null)).toEqual({});
    });

    it('checks field types', () => {
      expect(() => parseFilterBody('all')).toThrow('filters must be an object');
      expect(() => parseFilterBody({ limit: '3' })).toThrow('limit must be a number');
      expect(() => parseFilterBody({ withInterpretations: 'yes' })).toThrow(
        'withInterpretations must be a boolean',
      );
      expect(() => parseFilterBody({ dateFrom: true })).toThrow('dateFrom must be a string or number');
      expect(() => parseFilterBody({ negativeIds: [{}] })).toThrow('negativeIds must be a list of ids');
    });
  });

  describe('parseBatchBody', () => {
    it('reads queries and filters', () => {
      expect(parseBatchBody({ queries: ['a', 'b'], filters: { limit: 1 } })).toMatchObject({
        queries: ['a', 'b'],
        filters: { limit: 1 },
      });
    });

    it('rejects bad bodies', () => {
      expect(() => parseBatchBody([])).toThrow('Request body must be a JSON object');
      expect(() => parseBatchBody({ queries: 'a' })).toThrow('queries must be a list of strings');
      expect(() => parseBatchBody({ queries: ['a', 2] })).toThrow('queries must be a list of strings');
    });
  });
});
