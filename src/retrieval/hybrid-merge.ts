/**
 * Merges dense and sparse hit lists for hybrid search.
 *
 * Hits are keyed by point id; when both lists contain a point, the dense hit
 * and its score win. The union is sorted by score descending and truncated.
 *
 * Dense and sparse scores live on different scales, so the merged order is
 * only as meaningful as their overlap.
 */

import type { IndexHit, PointId } from '../storage/index-service.js';

export function mergeHybrid(dense: IndexHit[], sparse: IndexHit[], limit: number): IndexHit[] {
  const byId = new Map<PointId, IndexHit>();

  for (const hit of dense) {
    if (!byId.has(hit.id)) byId.set(hit.id, hit);
  }
  for (const hit of sparse) {
    if (!byId.has(hit.id)) byId.set(hit.id, hit);
  }

  return [...byId.values()].sort((a, b) => b.score - a.score).slice(0, Math.max(0, limit));
}
