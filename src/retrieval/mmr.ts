/**
 * Maximal Marginal Relevance (MMR) selection for diversity-aware search results.
 *
 * Picks candidates greedily using:
 *   MMR(c) = lambda * relevance(c) - (1 - lambda) * max_similarity(c, Selected)
 *
 * lambda = 1 ranks by relevance alone; lambda = 0 ranks by novelty alone.
 * Relevance is the index score as returned, without normalization.
 */

import { cosineSimilarity } from '../utils/similarity.js';

export interface MMRConfig {
  /** 0 = pure diversity, 1 = pure relevance */
  lambda: number;
  /** Number of items to select */
  limit: number;
}

export interface MMRAccessors<T> {
  score: (item: T) => number;
  /** Items without a vector count as novel (similarity 0) */
  vector: (item: T) => number[] | undefined;
}

/**
 * Select up to `limit` items by MMR.
 *
 * The first pick is the highest-relevance candidate. Ties go to the
 * candidate that appears first in the input.
 */
export function selectWithMMR<T>(candidates: T[], config: MMRConfig, accessors: MMRAccessors<T>): T[] {
  const { lambda, limit } = config;
  if (candidates.length === 0 || limit <= 0) return [];

  const selected: T[] = [];
  const selectedVectors: number[][] = [];
  const remaining = candidates.map((_, i) => i);

  const take = (position: number): void => {
    const [idx] = remaining.splice(position, 1);
    const picked = candidates[idx];
    selected.push(picked);
    const vector = accessors.vector(picked);
    if (vector) selectedVectors.push(vector);
  };

  // Seed with the most relevant candidate
  let seed = 0;
  for (let p = 1; p < remaining.length; p++) {
    if (accessors.score(candidates[remaining[p]]) > accessors.score(candidates[remaining[seed]])) {
      seed = p;
    }
  }
  take(seed);

  while (selected.length < limit && remaining.length > 0) {
    let bestPosition = 0;
    let bestMMR = -Infinity;

    for (let p = 0; p < remaining.length; p++) {
      const candidate = candidates[remaining[p]];
      const vector = accessors.vector(candidate);

      let maxSim = 0;
      if (vector && selectedVectors.length > 0) {
        maxSim = -Infinity;
        for (const other of selectedVectors) {
          const sim = cosineSimilarity(vector, other);
          if (sim > maxSim) maxSim = sim;
        }
      }

      const mmr = lambda * accessors.score(candidate) - (1 - lambda) * maxSim;
      if (mmr > bestMMR) {
        bestMMR = mmr;
        bestPosition = p;
      }
    }

    take(bestPosition);
  }

  return selected;
}
