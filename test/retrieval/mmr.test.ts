import { describe, it, expect } from 'vitest';
import { selectWithMMR } from '../../src/retrieval/mmr.js';

interface Candidate {
  id: string;
  score: number;
  vector?: number[];
}

const accessors = {
  score: (c: Candidate) => c.score,
  vector: (c: Candidate) => c.vector,
};

const A: Candidate = { id: 'A', score: 0.9, vector: [1, 0] };
const B: Candidate = { id: 'B', score: 0.85, vector: [1, 0] };
const C: Candidate = { id: 'C', score: 0.5, vector: [0, 1] };

function ids(selected: Candidate[]): string[] {
  return selected.map((c) => c.id);
}

describe('selectWithMMR', () => {
  it('returns nothing for no candidates or a zero limit', () => {
    expect(selectWithMMR([], { lambda: 0.5, limit: 3 }, accessors)).toEqual([]);
    expect(selectWithMMR([A, B], { lambda: 0.5, limit: 0 }, accessors)).toEqual([]);
  });

  it('ranks by relevance alone at lambda 1', () => {
    expect(ids(selectWithMMR([C, B, A], { lambda: 1, limit: 2 }, accessors))).toEqual(['A', 'B']);
  });

  it('prefers a novel candidate over a near-duplicate at lambda 0.5', () => {
    // B: 0.5 * 0.85 - 0.5 * 1 = -0.075; C: 0.5 * 0.5 - 0 = 0.25
    expect(ids(selectWithMMR([A, B, C], { lambda: 0.5, limit: 2 }, accessors))).toEqual(['A', 'C']);
  });

  it('ranks by novelty alone at lambda 0', () => {
    expect(ids(selectWithMMR([A, B, C], { lambda: 0, limit: 3 }, accessors))).toEqual(['A', 'C', 'B']);
  });

  it('treats candidates without a vector as novel', () => {
    const D: Candidate = { id: 'D', score: 0.1 };

    // B: -0.075; D: 0.5 * 0.1 - 0 = 0.05
    expect(ids(selectWithMMR([A, B, D], { lambda: 0.5, limit: 2 }, accessors))).toEqual(['A', 'D']);
  });

  it('seeds with the first of equally relevant candidates', () => {
    const first: Candidate = { id: 'first', score: 0.7, vector: [1, 0] };
    const second: Candidate = { id: 'second', score: 0.7, vector: [0, 1] };

    expect(ids(selectWithMMR([first, second], { lambda: 0.5, limit: 1 }, accessors))).toEqual(['first']);
  });

  it('stops when candidates run out', () => {
    expect(selectWithMMR([A, C], { lambda: 0.5, limit: 10 }, accessors)).toHaveLength(2);
  });
});
