/**
 * Wires the knowledge base from environment configuration
 */

import { EmbeddingClient } from '../embeddings/client';
import { OpenAIEmbeddingProvider } from '../openai/embeddings';
import { countTokens } from '../openai/tokenizer';
import { PineconeStore } from '../pinecone/store';
import { QdrantStore } from '../qdrant/store';
import { InMemoryVectorStore } from '../vectorstore/memory';
import { VectorStoreAdapter } from '../vectorstore/adapter';
import { VectorStoreBackend } from '../vectorstore/types';
import { RetryPolicy } from '../utils/retry';
import * as logger from '../utils/logger';
import { loadPipelineConfig, PipelineConfig, VectorStoreKind } from '../../types/config';
import { KnowledgeBase } from './knowledgeBase';

let knowledgeBase: KnowledgeBase | null = null;

export function createBackend(kind: VectorStoreKind): VectorStoreBackend {
  switch (kind) {
    case 'pinecone':
      return new PineconeStore();
    case 'qdrant':
      return new QdrantStore();
    case 'memory':
      return new InMemoryVectorStore();
  }
}

export function createKnowledgeBase(
  config: PipelineConfig = loadPipelineConfig(),
  backend: VectorStoreBackend = createBackend(config.vectorStore)
): KnowledgeBase {
  const retryPolicy = new RetryPolicy(config.retry);

  const embeddings = new EmbeddingClient({
    provider: new OpenAIEmbeddingProvider({
      model: config.embeddingModel,
      dimensions: config.embeddingDimensions,
    }),
    cacheSize: config.embeddingCacheSize,
    retryPolicy,
    maxBatchSize: config.embeddingBatchSize,
    maxBatchTokens: config.embeddingBatchTokens,
    maxInputTokens: config.embeddingMaxInputTokens,
    timeoutMs: config.requestTimeoutMs,
    tokenCounter: (text) => countTokens(text, config.embeddingModel),
  });

  const store = new VectorStoreAdapter({
    backend,
    retryPolicy,
    upsertBatchSize: config.upsertBatchSize,
    timeoutMs: config.requestTimeoutMs,
    rebuildTimeoutMs: config.rebuildTimeoutMs,
    rebuildPollIntervalMs: config.rebuildPollIntervalMs,
  });

  logger.info('Knowledge base configured', {
    vectorStore: backend.kind,
    embeddingModel: config.embeddingModel,
    dimension: config.embeddingDimensions,
    metric: config.distanceMetric,
    defaultCollection: config.defaultCollection,
  });

  return new KnowledgeBase({
    embeddings,
    store,
    defaultCollection: config.defaultCollection,
    dimension: config.embeddingDimensions,
    metric: config.distanceMetric,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    relevanceFloor: config.relevanceFloor,
    timeoutMs: config.requestTimeoutMs,
  });
}

/**
 * Process-wide knowledge base built on first use
 */
export function getKnowledgeBase(): KnowledgeBase {
  if (!knowledgeBase) {
    knowledgeBase = createKnowledgeBase();
  }
  return knowledgeBase;
}
