import type { DistanceMetric } from './config';
import type { Metadata, MetadataValue } from './chunk';
import type { EmbeddingVector } from './embedding';

export type { DistanceMetric } from './config';

/**
 * Entry written to a collection
 */
export interface VectorRecord {
  id: string;
  values: EmbeddingVector;
  metadata: Metadata;
}

/**
 * Raw match returned by a backend query
 */
export interface ScoredRecord {
  id: string;
  /** Similarity, higher is more relevant */
  score: number;
  metadata: Metadata;
}

/**
 * Chunk as reconstructed from stored metadata
 */
export interface RetrievedChunk {
  content: string;
  index: number;
  total: number;
  documentPath: string;
  metadata: Metadata;
}

export interface SearchResult {
  id: string;
  score: number;
  chunk: RetrievedChunk;
}

export interface RangePredicate {
  gt?: number;
  gte?: number;
  lt?: number;
  lte?: number;
}

export type FilterCondition = MetadataValue | RangePredicate;

/**
 * Conjunction of exact-match and numeric range predicates on metadata keys
 */
export type MetadataFilter = Record<string, FilterCondition>;

export interface CollectionSpec {
  name: string;
  dimension: number;
  metric: DistanceMetric;
}

export type BackendStatus = 'ready' | 'indexing' | 'initializing' | 'degraded';

/**
 * Collection statistics as reported by the backend
 */
export interface CollectionStats extends CollectionSpec {
  vectorCount: number;
  status: BackendStatus;
}

export type RebuildMode = 'incremental' | 'full';

export function isRangePredicate(condition: FilterCondition): condition is RangePredicate {
  return typeof condition === 'object' && condition !== null;
}
