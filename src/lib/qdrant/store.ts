/**
 * Qdrant vector store backend
 *
 * Each collection is a Qdrant collection with one unnamed dense vector.
 * Chunk metadata is stored as the point payload.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { getQdrantClient } from './client';
import {
  fromPayload,
  fromQdrantStatus,
  parseVectorParams,
  toDenseVector,
  toQdrantDistance,
  toQdrantFilter,
} from './filters';
import { EmbeddingVector } from '../../types/embedding';
import {
  CollectionSpec,
  CollectionStats,
  MetadataFilter,
  ScoredRecord,
  VectorRecord,
} from '../../types/vector';
import { VectorDatabaseError } from '../utils/errors';
import { VectorStoreBackend } from '../vectorstore/types';
import * as logger from '../utils/logger';

const SCROLL_PAGE_SIZE = 256;

export class QdrantStore implements VectorStoreBackend {
  readonly kind = 'qdrant';
  private readonly client: QdrantClient;

  constructor(client?: QdrantClient) {
    this.client = client ?? getQdrantClient();
  }

  async createCollection(spec: CollectionSpec): Promise<void> {
    logger.info('Creating Qdrant collection', { ...spec });

    await this.client.createCollection(spec.name, {
      vectors: { size: spec.dimension, distance: toQdrantDistance(spec.metric) },
    });
  }

  async getCollection(name: string): Promise<CollectionStats | undefined> {
    const { exists } = await this.client.collectionExists(name);
    if (!exists) {
      return undefined;
    }

    const info = await this.client.getCollection(name);
    const params = parseVectorParams(info.config.params.vectors);
    if (!params) {
      throw new VectorDatabaseError(
        `Collection "${name}" does not use a single unnamed dense vector`
      );
    }

    return {
      name,
      dimension: params.dimension,
      metric: params.metric,
      vectorCount: info.points_count ?? 0,
      status: fromQdrantStatus(info.status),
    };
  }

  async listCollectionNames(): Promise<string[]> {
    const response = await this.client.getCollections();
    return response.collections.map((collection) => collection.name);
  }

  async upsert(collection: string, records: VectorRecord[]): Promise<void> {
    await this.client.upsert(collection, {
      wait: true,
      points: records.map((record) => ({
        id: record.id,
        vector: [...record.values],
        payload: { ...record.metadata },
      })),
    });
  }

  async query(
    collection: string,
    vector: EmbeddingVector,
    topK: number,
    filter?: MetadataFilter
  ): Promise<ScoredRecord[]> {
    const qdrantFilter = toQdrantFilter(filter);

    const points = await this.client.search(collection, {
      vector: [...vector],
      limit: topK,
      with_payload: true,
      ...(qdrantFilter && { filter: qdrantFilter }),
    });

    logger.debug('Qdrant search completed', { collection, resultsCount: points.length });

    return points.map((point) => ({
      id: String(point.id),
      score: point.score,
      metadata: fromPayload(point.payload),
    }));
  }

  /**
   * Asks Qdrant to re-run its optimizers with the current configuration
   */
  async optimize(collection: string): Promise<void> {
    await this.client.updateCollection(collection, { optimizers_config: {} });
  }

  async exportRecords(collection: string): Promise<VectorRecord[]> {
    const records: VectorRecord[] = [];
    let offset: string | number | undefined;

    for (;;) {
      const page = await this.client.scroll(collection, {
        limit: SCROLL_PAGE_SIZE,
        with_payload: true,
        with_vector: true,
        ...(offset !== undefined && { offset }),
      });

      for (const point of page.points) {
        const values = toDenseVector(point.vector);
        if (!values) {
          throw new VectorDatabaseError(`Point ${String(point.id)} has no dense vector`);
        }
        records.push({ id: String(point.id), values, metadata: fromPayload(point.payload) });
      }

      const next = page.next_page_offset;
      if (typeof next !== 'string' && typeof next !== 'number') {
        break;
      }
      offset = next;
    }

    logger.debug('Exported Qdrant points', { collection, count: records.length });
    return records;
  }

  /**
   * Drops and recreates the collection with the same configuration
   */
  async clear(spec: CollectionSpec): Promise<void> {
    await this.client.deleteCollection(spec.name);
    await this.createCollection(spec);
  }
}
