/**
 * Pinecone vector store backend
 *
 * Each collection is a serverless Pinecone index. Pinecone reports squared
 * distances for the euclidean metric; they are converted to plain distances
 * here.
 */

import { IndexModel, Pinecone, PineconeRecord } from '@pinecone-database/pinecone';
import { getPineconeClient } from './client';
import { fromPineconeMetadata, toPineconeFilter, toPineconeMetadata, validateMetadata } from './metadata';
import { getConfig } from '../../types/config';
import { EmbeddingVector } from '../../types/embedding';
import {
  BackendStatus,
  CollectionSpec,
  CollectionStats,
  DistanceMetric,
  MetadataFilter,
  ScoredRecord,
  VectorRecord,
} from '../../types/vector';
import { CollectionNotFoundError, ConfigurationError, VectorDatabaseError } from '../utils/errors';
import { VectorStoreBackend } from '../vectorstore/types';
import * as logger from '../utils/logger';

type ServerlessCloud = 'aws' | 'gcp' | 'azure';

const FETCH_BATCH_SIZE = 100;
const INDEX_NAME_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,43}[a-z0-9])?$/;

export interface PineconeStoreOptions {
  client?: Pinecone;
  cloud?: string;
  region?: string;
}

function parseCloud(value: string): ServerlessCloud {
  switch (value.toLowerCase()) {
    case 'aws':
      return 'aws';
    case 'gcp':
      return 'gcp';
    case 'azure':
      return 'azure';
    default:
      throw new ConfigurationError(`Unsupported PINECONE_CLOUD "${value}" (expected aws, gcp or azure)`);
  }
}

function toMetric(value: string): DistanceMetric {
  switch (value) {
    case 'euclidean':
      return 'euclidean';
    case 'dotproduct':
      return 'dotproduct';
    default:
      return 'cosine';
  }
}

function toStatus(model: IndexModel): BackendStatus {
  if (model.status.ready) {
    return 'ready';
  }
  return model.status.state === 'InitializationFailed' ? 'degraded' : 'initializing';
}

export class PineconeStore implements VectorStoreBackend {
  readonly kind = 'pinecone';
  private readonly client: Pinecone;
  private readonly cloud: ServerlessCloud;
  private readonly region: string;

  constructor(options: PineconeStoreOptions = {}) {
    this.client = options.client ?? getPineconeClient();
    this.cloud = parseCloud(options.cloud ?? getConfig('PINECONE_CLOUD', 'aws'));
    this.region = options.region ?? getConfig('PINECONE_REGION', 'us-east-1');
  }

  async createCollection(spec: CollectionSpec): Promise<void> {
    if (!INDEX_NAME_PATTERN.test(spec.name)) {
      throw new ConfigurationError(
        `Invalid Pinecone index name "${spec.name}": use lowercase letters, digits and hyphens`
      );
    }

    logger.info('Creating Pinecone index', { ...spec, cloud: this.cloud, region: this.region });

    await this.client.createIndex({
      name: spec.name,
      dimension: spec.dimension,
      metric: spec.metric,
      spec: { serverless: { cloud: this.cloud, region: this.region } },
      waitUntilReady: true,
    });
  }

  async getCollection(name: string): Promise<CollectionStats | undefined> {
    const model = await this.findIndex(name);
    if (!model) {
      return undefined;
    }

    const stats = await this.client.index(name).describeIndexStats();

    return {
      name,
      dimension: model.dimension ?? stats.dimension ?? 0,
      metric: toMetric(model.metric),
      vectorCount: stats.totalRecordCount ?? 0,
      status: toStatus(model),
    };
  }

  async listCollectionNames(): Promise<string[]> {
    const list = await this.client.listIndexes();
    return (list.indexes ?? []).map((model) => model.name);
  }

  async upsert(collection: string, records: VectorRecord[]): Promise<void> {
    const pineconeRecords: PineconeRecord[] = records.map((record) => {
      const metadata = toPineconeMetadata(record.metadata);
      if (!validateMetadata(metadata)) {
        throw new VectorDatabaseError(`Metadata of record ${record.id} exceeds the Pinecone size limit`);
      }
      return { id: record.id, values: [...record.values], metadata };
    });

    await this.client.index(collection).upsert(pineconeRecords);
  }

  async query(
    collection: string,
    vector: EmbeddingVector,
    topK: number,
    filter?: MetadataFilter
  ): Promise<ScoredRecord[]> {
    const model = await this.requireIndex(collection);
    const squaredDistances = model.metric === 'euclidean';
    const pineconeFilter = toPineconeFilter(filter);

    const response = await this.client.index(collection).query({
      vector: [...vector],
      topK,
      includeMetadata: true,
      ...(pineconeFilter && { filter: pineconeFilter }),
    });

    logger.debug('Pinecone query completed', {
      collection,
      resultsCount: response.matches.length,
    });

    return response.matches.map((match) => {
      const score = match.score ?? 0;
      return {
        id: match.id,
        score: squaredDistances ? Math.sqrt(Math.max(0, score)) : score,
        metadata: fromPineconeMetadata(match.metadata),
      };
    });
  }

  /**
   * Serverless indexes optimize continuously; there is nothing to trigger
   */
  async optimize(collection: string): Promise<void> {
    await this.requireIndex(collection);
    logger.info('Pinecone serverless indexes optimize continuously, nothing to trigger', {
      collection,
    });
  }

  async exportRecords(collection: string): Promise<VectorRecord[]> {
    const index = this.client.index(collection);
    const ids: string[] = [];
    let paginationToken: string | undefined;

    do {
      const page = await index.listPaginated({ paginationToken });
      for (const item of page.vectors ?? []) {
        if (item.id) {
          ids.push(item.id);
        }
      }
      paginationToken = page.pagination?.next;
    } while (paginationToken);

    const records: VectorRecord[] = [];
    for (let i = 0; i < ids.length; i += FETCH_BATCH_SIZE) {
      const response = await index.fetch(ids.slice(i, i + FETCH_BATCH_SIZE));
      for (const record of Object.values(response.records)) {
        records.push({
          id: record.id,
          values: record.values,
          metadata: fromPineconeMetadata(record.metadata),
        });
      }
    }

    logger.debug('Exported Pinecone records', { collection, count: records.length });
    return records;
  }

  async clear(spec: CollectionSpec): Promise<void> {
    await this.requireIndex(spec.name);
    await this.client.index(spec.name).deleteAll();
  }

  private async findIndex(name: string): Promise<IndexModel | undefined> {
    const list = await this.client.listIndexes();
    return (list.indexes ?? []).find((model) => model.name === name);
  }

  private async requireIndex(name: string): Promise<IndexModel> {
    const model = await this.findIndex(name);
    if (!model) {
      throw new CollectionNotFoundError(name);
    }
    return model;
  }
}
