/**
 * Deterministic result ordering, score conversion and metadata filtering
 */

import { Metadata } from '../../types/chunk';
import {
  DistanceMetric,
  isRangePredicate,
  MetadataFilter,
  RangePredicate,
  RetrievedChunk,
  SearchResult,
} from '../../types/vector';

/**
 * Converts a backend score to a similarity where higher is more relevant.
 * Euclidean distances map to 1 / (1 + distance).
 */
export function toSimilarity(metric: DistanceMetric, raw: number): number {
  if (metric === 'euclidean') {
    return 1 / (1 + Math.max(0, raw));
  }
  return raw;
}

/**
 * Rebuilds chunk fields from stored metadata
 */
export function toRetrievedChunk(metadata: Metadata): RetrievedChunk {
  const content = metadata.text;
  const index = metadata.chunk_index;
  const total = metadata.total_chunks;
  const documentPath = metadata.document_path;

  return {
    content: typeof content === 'string' ? content : '',
    index: typeof index === 'number' ? index : 0,
    total: typeof total === 'number' ? total : 1,
    documentPath: typeof documentPath === 'string' ? documentPath : '',
    metadata,
  };
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Score descending, then chunk index, document path and id ascending
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
  return (
    b.score - a.score ||
    a.chunk.index - b.chunk.index ||
    compareStrings(a.chunk.documentPath, b.chunk.documentPath) ||
    compareStrings(a.id, b.id)
  );
}

export function rankResults(results: SearchResult[]): SearchResult[] {
  return [...results].sort(compareResults);
}

function matchesRange(value: unknown, range: RangePredicate): boolean {
  if (typeof value !== 'number') {
    return false;
  }
  return (
    (range.gt === undefined || value > range.gt) &&
    (range.gte === undefined || value >= range.gte) &&
    (range.lt === undefined || value < range.lt) &&
    (range.lte === undefined || value <= range.lte)
  );
}

/**
 * Whether metadata satisfies every predicate of the filter
 */
export function matchesFilter(metadata: Metadata, filter?: MetadataFilter): boolean {
  if (!filter) {
    return true;
  }

  return Object.entries(filter).every(([key, condition]) => {
    const value = metadata[key];
    if (isRangePredicate(condition)) {
      return matchesRange(value, condition);
    }
    return value === condition;
  });
}
