/**
 * Contract for the external semantic index.
 *
 * Filters use the index's JSON condition shape directly: a conjunction of
 * exact matches and numeric ranges over payload fields.
 */

export type PointId = string | number;

export type MatchValue = string | number | boolean;

export interface MatchCondition {
  key: string;
  match: { value: MatchValue };
}

export interface RangeCondition {
  key: string;
  range: { gte?: number; lte?: number };
}

export type FieldCondition = MatchCondition | RangeCondition;

/** Every condition must hold. */
export interface IndexFilter {
  must: FieldCondition[];
}

/** Sparse lexical vector as parallel arrays. */
export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface IndexHit {
  id: PointId;
  score: number;
  payload: Record<string, unknown>;
  /** Dense vector, present when requested */
  vector?: number[];
}

export interface IndexGroup {
  /** Value of the group-by field shared by the hits */
  id: PointId;
  hits: IndexHit[];
}

export interface IndexPoint {
  id: PointId;
  dense: number[];
  sparse: SparseVector;
  payload: Record<string, unknown>;
}

export interface QueryOptions {
  filter?: IndexFilter;
  limit: number;
  withVectors?: boolean;
}

export interface RecommendOptions {
  positive: PointId[];
  negative: PointId[];
  filter?: IndexFilter;
  limit: number;
}

export interface GroupOptions {
  groupBy: string;
  groupSize: number;
  /** Number of groups */
  limit: number;
  filter?: IndexFilter;
}

/**
 * One session with the index. Closed by the caller on every exit path.
 */
export interface IndexConnection {
  queryDense(vector: number[], options: QueryOptions): Promise<IndexHit[]>;
  querySparse(vector: SparseVector, options: QueryOptions): Promise<IndexHit[]>;
  recommend(options: RecommendOptions): Promise<IndexHit[]>;
  groupDense(vector: number[], options: GroupOptions): Promise<IndexGroup[]>;
  /** Create the collection and its payload indexes when missing. */
  ensureCollection(dimension: number): Promise<void>;
  upsert(points: IndexPoint[]): Promise<void>;
  /** Whether the index answers. Never throws. */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export interface IndexService {
  connect(): Promise<IndexConnection>;
}

/**
 * Run `fn` with a fresh connection, closing it afterwards whatever happens.
 */
export async function withConnection<T>(
  index: IndexService,
  fn: (connection: IndexConnection) => Promise<T>,
): Promise<T> {
  const connection = await index.connect();
  try {
    return await fn(connection);
  } finally {
    await connection.close();
  }
}
