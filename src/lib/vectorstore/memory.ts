/**
 * In-process vector store backend
 *
 * Used for local development (VECTOR_STORE=memory) and as the backend of
 * the test suite. Queries are exact brute-force scans.
 */

import { Metadata } from '../../types/chunk';
import { EmbeddingVector } from '../../types/embedding';
import {
  CollectionSpec,
  CollectionStats,
  DistanceMetric,
  MetadataFilter,
  ScoredRecord,
  VectorRecord,
} from '../../types/vector';
import { CollectionAlreadyExistsError, CollectionNotFoundError } from '../utils/errors';
import { matchesFilter } from './ranking';
import { VectorStoreBackend } from './types';

interface StoredCollection {
  spec: CollectionSpec;
  records: Map<string, VectorRecord>;
}

function dot(a: EmbeddingVector, b: EmbeddingVector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Native score: similarity for cosine and dotproduct, distance for euclidean
 */
export function rawScore(metric: DistanceMetric, a: EmbeddingVector, b: EmbeddingVector): number {
  switch (metric) {
    case 'cosine': {
      const norms = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
      return norms === 0 ? 0 : dot(a, b) / norms;
    }
    case 'dotproduct':
      return dot(a, b);
    case 'euclidean': {
      let sum = 0;
      for (let i = 0; i < a.length; i++) {
        const diff = a[i] - b[i];
        sum += diff * diff;
      }
      return Math.sqrt(sum);
    }
  }
}

export class InMemoryVectorStore implements VectorStoreBackend {
  readonly kind = 'memory';
  private readonly collections = new Map<string, StoredCollection>();

  async createCollection(spec: CollectionSpec): Promise<void> {
    if (this.collections.has(spec.name)) {
      throw new CollectionAlreadyExistsError(spec.name, `Collection already exists: ${spec.name}`);
    }
    this.collections.set(spec.name, { spec: { ...spec }, records: new Map() });
  }

  async getCollection(name: string): Promise<CollectionStats | undefined> {
    const stored = this.collections.get(name);
    if (!stored) {
      return undefined;
    }
    return { ...stored.spec, vectorCount: stored.records.size, status: 'ready' };
  }

  async listCollectionNames(): Promise<string[]> {
    return [...this.collections.keys()];
  }

  async upsert(collection: string, records: VectorRecord[]): Promise<void> {
    const stored = this.require(collection);
    for (const record of records) {
      stored.records.set(record.id, {
        id: record.id,
        values: Object.freeze([...record.values]),
        metadata: { ...record.metadata },
      });
    }
  }

  async query(
    collection: string,
    vector: EmbeddingVector,
    topK: number,
    filter?: MetadataFilter
  ): Promise<ScoredRecord[]> {
    const stored = this.require(collection);
    const metric = stored.spec.metric;
    const ascending = metric === 'euclidean';

    const scored: ScoredRecord[] = [];
    for (const record of stored.records.values()) {
      if (!matchesFilter(record.metadata, filter)) {
        continue;
      }
      const metadata: Metadata = { ...record.metadata };
      scored.push({ id: record.id, score: rawScore(metric, vector, record.values), metadata });
    }

    scored.sort(
      (a, b) => (ascending ? a.score - b.score : b.score - a.score) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
    );
    return scored.slice(0, topK);
  }

  async optimize(collection: string): Promise<void> {
    this.require(collection);
  }

  async exportRecords(collection: string): Promise<VectorRecord[]> {
    return [...this.require(collection).records.values()];
  }

  async clear(spec: CollectionSpec): Promise<void> {
    this.require(spec.name).records.clear();
  }

  private require(name: string): StoredCollection {
    const stored = this.collections.get(name);
    if (!stored) {
      throw new CollectionNotFoundError(name);
    }
    return stored;
  }
}
