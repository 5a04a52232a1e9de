/**
 * Capability set every vector store backend implements
 */

import {
  CollectionSpec,
  CollectionStats,
  MetadataFilter,
  ScoredRecord,
  VectorRecord,
} from '../../types/vector';
import { EmbeddingVector } from '../../types/embedding';

export interface BackendCallOptions {
  signal?: AbortSignal;
}

/**
 * Raw backend protocol. The adapter adds validation, retries, batching,
 * ranking and write serialization on top.
 *
 * `query` returns the backend's native score: a similarity for cosine and
 * dotproduct, a (non-squared) distance for euclidean.
 */
export interface VectorStoreBackend {
  readonly kind: string;

  createCollection(spec: CollectionSpec, options?: BackendCallOptions): Promise<void>;

  /** Authoritative statistics, or undefined when the collection does not exist */
  getCollection(name: string, options?: BackendCallOptions): Promise<CollectionStats | undefined>;

  listCollectionNames(options?: BackendCallOptions): Promise<string[]>;

  upsert(collection: string, records: VectorRecord[], options?: BackendCallOptions): Promise<void>;

  query(
    collection: string,
    vector: EmbeddingVector,
    topK: number,
    filter?: MetadataFilter,
    options?: BackendCallOptions
  ): Promise<ScoredRecord[]>;

  /** Starts the backend's background index optimization and returns */
  optimize(collection: string, options?: BackendCallOptions): Promise<void>;

  /** Every stored record with its vector and metadata */
  exportRecords(collection: string, options?: BackendCallOptions): Promise<VectorRecord[]>;

  /** Removes every record; the collection keeps its name, dimension and metric */
  clear(spec: CollectionSpec, options?: BackendCallOptions): Promise<void>;
}
