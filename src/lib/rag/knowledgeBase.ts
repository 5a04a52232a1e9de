/**
 * Knowledge base: the operations exposed to the transport layer
 *
 * ingest → chunk, embed, upsert, record the collection state
 * search / queryWithContext → retrieve, assemble context
 * rebuildIndex / listCollections / describeCollection → lifecycle and stats
 */

import { chunkDocument } from '../chunking/chunker';
import { EmbeddingClient } from '../embeddings/client';
import { CacheStats } from '../embeddings/cache';
import { VectorStoreAdapter } from '../vectorstore/adapter';
import { Document } from '../../types/chunk';
import { EmbeddingOutcome, EmbeddingVector } from '../../types/embedding';
import { DistanceMetric, RebuildMode, SearchResult, VectorRecord } from '../../types/vector';
import { EmbeddingProviderUnavailableError, toError } from '../utils/errors';
import { trackEvent, trackMetric, trackOperation } from '../utils/telemetry';
import { addBreadcrumb, withSpan } from '../utils/sentry';
import * as logger from '../utils/logger';
import { CollectionDescription, IndexManager, IngestionOutcome } from './indexManager';
import { assembleContext, buildPrompt } from './prompts';
import { Retriever, RetrieveOptions } from './retrieval';

export const DEFAULT_SEARCH_K = 5;
export const DEFAULT_CONTEXT_K = 3;

export interface KnowledgeBaseOptions {
  embeddings: EmbeddingClient;
  store: VectorStoreAdapter;
  defaultCollection: string;
  /** Dimension and metric of collections created on first ingestion */
  dimension: number;
  metric: DistanceMetric;
  chunkSize?: number;
  chunkOverlap?: number;
  relevanceFloor?: number;
  /** Default deadline for each network-bound step */
  timeoutMs?: number;
  clock?: () => Date;
}

export interface IngestOptions {
  chunkSize?: number;
  overlap?: number;
  timeoutMs?: number;
}

export interface FailedChunk {
  id: string;
  index: number;
  reason: string;
}

export interface IngestReport {
  status: IngestionOutcome;
  collection: string;
  documentPath: string;
  totalChunks: number;
  chunksAdded: number;
  chunkIds: string[];
  failedChunks: FailedChunk[];
  collectionState: CollectionDescription['state'];
}

export type SearchOptions = RetrieveOptions;

type ChunkEmbedding =
  | { status: 'embedded'; vector: EmbeddingVector }
  | { status: 'failed'; reason: string };

export interface ContextResult {
  query: string;
  collection: string;
  context: string;
  prompt: string;
  contextDocuments: number;
  results: SearchResult[];
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  vectorStore: { kind: string; status: 'up' | 'down'; collections?: number; error?: string };
  embeddings: { model: string; cache: CacheStats };
}

export class KnowledgeBase {
  readonly embeddings: EmbeddingClient;
  readonly store: VectorStoreAdapter;
  readonly indexManager: IndexManager;
  readonly retriever: Retriever;
  readonly defaultCollection: string;
  private readonly dimension: number;
  private readonly metric: DistanceMetric;
  private readonly chunkSize?: number;
  private readonly chunkOverlap?: number;
  private readonly timeoutMs?: number;
  private readonly clock: () => Date;

  constructor(options: KnowledgeBaseOptions) {
    this.embeddings = options.embeddings;
    this.store = options.store;
    this.defaultCollection = options.defaultCollection;
    this.dimension = options.dimension;
    this.metric = options.metric;
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? (() => new Date());
    this.indexManager = new IndexManager(this.store, this.clock);
    this.retriever = new Retriever(this.embeddings, this.store, options.relevanceFloor);
  }

  /**
   * Chunks, embeds and stores a document.
   *
   * Rejected chunks and failed writes are listed in the report; the status is
   * `partial` when some chunks were stored and `failed` when none were.
   *
   * @throws EmptyDocumentError / ConfigurationError before any network call
   * @throws EmbeddingProviderUnavailableError when no chunk could be embedded
   */
  async ingest(
    document: Document,
    collection: string = this.defaultCollection,
    options: IngestOptions = {}
  ): Promise<IngestReport> {
    const chunks = chunkDocument(
      document,
      {
        chunkSize: options.chunkSize ?? this.chunkSize,
        overlap: options.overlap ?? this.chunkOverlap,
      },
      this.clock()
    );
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    addBreadcrumb('Document chunked', 'ingest', 'info', {
      documentPath: document.path,
      collection,
      chunks: chunks.length,
    });

    return withSpan('ingest', 'rag.ingest', async () => {
      const startTime = Date.now();
      await this.indexManager.ensureCollection(collection, this.dimension, this.metric, { timeoutMs });

      const outcomes = await this.embedChunks(chunks.map((chunk) => chunk.content), timeoutMs);

      const records: VectorRecord[] = [];
      const failedChunks: FailedChunk[] = [];
      chunks.forEach((chunk, i) => {
        const outcome = outcomes[i];
        if (outcome.status === 'embedded') {
          records.push({ id: chunk.id, values: outcome.vector, metadata: chunk.metadata });
        } else {
          failedChunks.push({ id: chunk.id, index: chunk.index, reason: outcome.reason });
        }
      });

      let chunkIds: string[] = [];
      if (records.length > 0) {
        const result = await this.store.upsert(collection, records, { timeoutMs });
        chunkIds = result.succeededIds;

        const indexById = new Map(chunks.map((chunk) => [chunk.id, chunk.index]));
        for (const failure of result.failed) {
          failedChunks.push({
            id: failure.id,
            index: indexById.get(failure.id) ?? -1,
            reason: failure.reason,
          });
        }
      }

      failedChunks.sort((a, b) => a.index - b.index);

      const status: IngestionOutcome =
        failedChunks.length === 0 ? 'complete' : chunkIds.length > 0 ? 'partial' : 'failed';
      const collectionState = this.indexManager.recordIngestion(collection, document.path, status);

      const report: IngestReport = {
        status,
        collection,
        documentPath: document.path,
        totalChunks: chunks.length,
        chunksAdded: chunkIds.length,
        chunkIds,
        failedChunks,
        collectionState,
      };

      trackEvent(
        'DocumentIngested',
        { collection, documentPath: document.path, status },
        { totalChunks: chunks.length, chunksAdded: chunkIds.length, failedChunks: failedChunks.length }
      );
      trackMetric('IngestionLatency', Date.now() - startTime, { collection });

      if (status === 'complete') {
        logger.info('Document ingested', { collection, documentPath: document.path, chunks: chunkIds.length });
      } else {
        logger.warn('Document ingestion incomplete', {
          collection,
          documentPath: document.path,
          status,
          succeeded: chunkIds.length,
          failed: failedChunks.length,
        });
      }

      return report;
    });
  }

  async search(
    query: string,
    collection: string = this.defaultCollection,
    k: number = DEFAULT_SEARCH_K,
    options: SearchOptions = {}
  ): Promise<SearchResult[]> {
    return withSpan('search', 'rag.search', () =>
      this.retriever.retrieve(query, k, collection, {
        ...options,
        timeoutMs: options.timeoutMs ?? this.timeoutMs,
      })
    );
  }

  /**
   * Retrieves the top results and assembles them into a context block and
   * an answer prompt for a generation step
   */
  async queryWithContext(
    query: string,
    collection: string = this.defaultCollection,
    k: number = DEFAULT_CONTEXT_K,
    options: SearchOptions = {}
  ): Promise<ContextResult> {
    const results = await this.search(query, collection, k, options);
    const context = assembleContext(results);

    return {
      query,
      collection,
      context,
      prompt: buildPrompt(query, context),
      contextDocuments: results.length,
      results,
    };
  }

  async rebuildIndex(
    collection: string = this.defaultCollection,
    mode: RebuildMode = 'incremental'
  ): Promise<CollectionDescription> {
    return withSpan('rebuildIndex', 'rag.rebuild', () =>
      trackOperation(
        'IndexRebuild',
        () => this.indexManager.rebuild(collection, mode, { timeoutMs: this.timeoutMs }),
        { collection, mode }
      )
    );
  }

  async listCollections(): Promise<CollectionDescription[]> {
    return this.indexManager.list({ timeoutMs: this.timeoutMs });
  }

  async describeCollection(collection: string = this.defaultCollection): Promise<CollectionDescription> {
    return this.indexManager.describe(collection, { timeoutMs: this.timeoutMs });
  }

  async health(): Promise<HealthReport> {
    const embeddings = { model: this.embeddings.model, cache: this.embeddings.cacheStats() };
    const timestamp = this.clock().toISOString();

    try {
      const collections = await this.store.listCollections({ timeoutMs: this.timeoutMs });
      return {
        status: 'healthy',
        timestamp,
        vectorStore: { kind: this.store.backend.kind, status: 'up', collections: collections.length },
        embeddings,
      };
    } catch (err) {
      const error = toError(err);
      logger.logError('Vector store health check failed', error);
      return {
        status: 'unhealthy',
        timestamp,
        vectorStore: { kind: this.store.backend.kind, status: 'down', error: error.message },
        embeddings,
      };
    }
  }

  /**
   * Embeds chunk texts. When the provider fails after some vectors were
   * obtained, those are kept and the rest are reported as failed.
   */
  private async embedChunks(
    texts: string[],
    timeoutMs: number | undefined
  ): Promise<ChunkEmbedding[]> {
    let outcomes: EmbeddingOutcome[];
    try {
      outcomes = await this.embeddings.embed(texts, { timeoutMs });
    } catch (err) {
      if (!(err instanceof EmbeddingProviderUnavailableError) || err.partial.size === 0) {
        throw err;
      }

      logger.warn('Embedding provider failed mid-ingestion, keeping partial results', {
        succeeded: err.partial.size,
        total: texts.length,
      });

      const partial = err.partial;
      const reason = err.message;
      return texts.map((text): ChunkEmbedding => {
        const vector = partial.get(this.embeddings.fingerprint(text));
        return vector
          ? { status: 'embedded', vector }
          : { status: 'failed', reason };
      });
    }

    return outcomes.map((outcome): ChunkEmbedding =>
      outcome.status === 'embedded'
        ? { status: 'embedded', vector: outcome.vector }
        : { status: 'failed', reason: outcome.error.message }
    );
  }
}
