/**
 * Translation between pipeline types and Qdrant's payloads, filters and
 * collection configuration
 */

import { Metadata } from '../../types/chunk';
import { BackendStatus, DistanceMetric, isRangePredicate, MetadataFilter } from '../../types/vector';

export type QdrantDistance = 'Cosine' | 'Euclid' | 'Dot';

export interface QdrantCondition {
  key: string;
  match?: { value: string | number | boolean };
  range?: { gt?: number; gte?: number; lt?: number; lte?: number };
}

export interface QdrantFilter {
  must: QdrantCondition[];
}

export function toQdrantDistance(metric: DistanceMetric): QdrantDistance {
  switch (metric) {
    case 'cosine':
      return 'Cosine';
    case 'euclidean':
      return 'Euclid';
    case 'dotproduct':
      return 'Dot';
  }
}

export function fromQdrantDistance(distance: string): DistanceMetric | undefined {
  switch (distance) {
    case 'Cosine':
      return 'cosine';
    case 'Euclid':
      return 'euclidean';
    case 'Dot':
      return 'dotproduct';
    default:
      return undefined;
  }
}

/**
 * green: ready, yellow: optimizing, grey: optimizations pending, red: failed
 */
export function fromQdrantStatus(status: string): BackendStatus {
  switch (status) {
    case 'green':
      return 'ready';
    case 'yellow':
      return 'indexing';
    case 'grey':
      return 'initializing';
    default:
      return 'degraded';
  }
}

/**
 * Conjunction of match and range conditions
 */
export function toQdrantFilter(filter: MetadataFilter | undefined): QdrantFilter | undefined {
  if (!filter || Object.keys(filter).length === 0) {
    return undefined;
  }

  const must = Object.entries(filter).map(([key, condition]): QdrantCondition => {
    if (isRangePredicate(condition)) {
      return { key, range: { ...condition } };
    }
    return { key, match: { value: condition } };
  });

  return { must };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps the scalar entries of a point payload
 */
export function fromPayload(payload: unknown): Metadata {
  const metadata: Metadata = {};
  if (!isRecord(payload)) {
    return metadata;
  }

  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      metadata[key] = value;
    }
  }
  return metadata;
}

/**
 * Reads the single unnamed vector configuration of a collection
 */
export function parseVectorParams(
  vectors: unknown
): { dimension: number; metric: DistanceMetric } | undefined {
  if (!isRecord(vectors)) {
    return undefined;
  }

  const size = vectors.size;
  const distance = vectors.distance;
  if (typeof size !== 'number' || typeof distance !== 'string') {
    return undefined;
  }

  const metric = fromQdrantDistance(distance);
  return metric ? { dimension: size, metric } : undefined;
}

/**
 * Dense vector of a scrolled point, if it carries one
 */
export function toDenseVector(vector: unknown): number[] | undefined {
  if (!Array.isArray(vector)) {
    return undefined;
  }
  const values: number[] = [];
  for (const value of vector) {
    if (typeof value !== 'number') {
      return undefined;
    }
    values.push(value);
  }
  return values;
}
