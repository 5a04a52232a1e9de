/**
 * RAG retrieval logic for semantic search
 *
 * Embeds the query, searches the collection, applies the relevance floor and
 * re-ranks by caller preferences.
 */

import { EmbeddingClient } from '../embeddings/client';
import { VectorStoreAdapter } from '../vectorstore/adapter';
import { MetadataFilter, SearchResult } from '../../types/vector';
import { ConfigurationError, EmptyQueryError } from '../utils/errors';
import { trackMetric } from '../utils/telemetry';
import * as logger from '../utils/logger';
import { PreferenceHints, rerankByPreferences } from './reranker';

export interface RetrieveOptions {
  filter?: MetadataFilter;
  preferences?: PreferenceHints;
  /** Results scoring below this are dropped */
  minScore?: number;
  timeoutMs?: number;
}

export class Retriever {
  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly store: VectorStoreAdapter,
    private readonly defaultMinScore: number = Number.NEGATIVE_INFINITY
  ) {}

  /**
   * Retrieves the k most relevant chunks for a query
   *
   * @throws EmptyQueryError for blank queries, before any embedding call
   * @throws ConfigurationError when k is not a positive integer
   * @throws CollectionNotFoundError
   */
  async retrieve(
    query: string,
    k: number,
    collection: string,
    options: RetrieveOptions = {}
  ): Promise<SearchResult[]> {
    if (query.trim().length === 0) {
      throw new EmptyQueryError();
    }
    if (!Number.isInteger(k) || k <= 0) {
      throw new ConfigurationError(`k must be a positive integer, got ${k}`);
    }

    const startTime = Date.now();
    const { timeoutMs } = options;

    const stats = await this.store.describeCollection(collection, { timeoutMs });
    if (stats.vectorCount === 0) {
      logger.info('Collection is empty, skipping retrieval', { collection });
      return [];
    }

    const limit = Math.min(k, stats.vectorCount);

    logger.info('Starting RAG retrieval', {
      collection,
      queryLength: query.length,
      k,
      limit,
      hasFilter: !!options.filter,
    });

    const vector = await this.embeddings.embedQuery(query, { timeoutMs });
    const results = await this.store.search(collection, vector, limit, options.filter, { timeoutMs });

    const minScore = options.minScore ?? this.defaultMinScore;
    const relevant = results.filter((result) => result.score >= minScore);
    const ranked = rerankByPreferences(relevant, options.preferences);

    const latency = Date.now() - startTime;
    trackMetric('RetrievalLatency', latency, { collection });
    trackMetric('RetrievalResultCount', ranked.length, { collection });

    logger.info('RAG retrieval completed', {
      collection,
      retrieved: results.length,
      aboveFloor: ranked.length,
      latencyMs: latency,
    });

    return ranked;
  }
}
