/**
 * Index Service exports.
 */

export { withConnection } from './index-service.js';
export type {
  FieldCondition,
  GroupOptions,
  IndexConnection,
  IndexFilter,
  IndexGroup,
  IndexHit,
  IndexPoint,
  IndexService,
  MatchCondition,
  PointId,
  QueryOptions,
  RangeCondition,
  RecommendOptions,
  SparseVector,
} from './index-service.js';

export { QdrantIndexService, PAYLOAD_INDEXES } from './qdrant-index.js';
export type { QdrantIndexConfig } from './qdrant-index.js';

export { chunkToPayload, METADATA_FIELD } from './payload.js';
export type { IndexPayload } from './payload.js';
