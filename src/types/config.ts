/**
 * Environment variable configuration
 */

import { ConfigurationError } from '../lib/utils/errors';

export interface EnvironmentConfig {
  // Azure Functions
  AzureWebJobsStorage: string;
  FUNCTIONS_WORKER_RUNTIME: string;
  APPLICATIONINSIGHTS_CONNECTION_STRING?: string;

  // Logging
  LOG_LEVEL?: string;

  // Sentry
  SENTRY_DSN?: string;
  SENTRY_ENVIRONMENT?: string;
  SENTRY_RELEASE?: string;

  // OpenAI
  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  OPENAI_BASE_URL?: string;

  // Embeddings
  EMBEDDING_DIMENSIONS?: string;
  EMBEDDING_BATCH_SIZE?: string;
  EMBEDDING_BATCH_TOKENS?: string;
  EMBEDDING_MAX_INPUT_TOKENS?: string;
  EMBEDDING_CACHE_SIZE?: string;

  // Vector store
  VECTOR_STORE?: string;
  PINECONE_API_KEY?: string;
  PINECONE_CLOUD?: string;
  PINECONE_REGION?: string;
  QDRANT_URL?: string;
  QDRANT_API_KEY?: string;
  DEFAULT_COLLECTION?: string;
  DISTANCE_METRIC?: string;
  UPSERT_BATCH_SIZE?: string;

  // Chunking
  CHUNK_SIZE?: string;
  CHUNK_OVERLAP?: string;

  // Retry and timeouts
  RETRY_MAX_ATTEMPTS?: string;
  RETRY_BASE_DELAY_MS?: string;
  RETRY_MAX_DELAY_MS?: string;
  RETRY_JITTER?: string;
  REQUEST_TIMEOUT_MS?: string;
  REBUILD_TIMEOUT_MS?: string;
  REBUILD_POLL_INTERVAL_MS?: string;

  // Retrieval
  RELEVANCE_FLOOR?: string;
}

export type VectorStoreKind = 'pinecone' | 'qdrant' | 'memory';

export type DistanceMetric = 'cosine' | 'euclidean' | 'dotproduct';

/**
 * Fully resolved pipeline settings
 */
export interface PipelineConfig {
  embeddingModel: string;
  embeddingDimensions: number;
  embeddingBatchSize: number;
  embeddingBatchTokens: number;
  embeddingMaxInputTokens: number;
  embeddingCacheSize: number;
  vectorStore: VectorStoreKind;
  defaultCollection: string;
  distanceMetric: DistanceMetric;
  upsertBatchSize: number;
  chunkSize: number;
  chunkOverlap: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitter: number;
  };
  requestTimeoutMs: number;
  rebuildTimeoutMs: number;
  rebuildPollIntervalMs: number;
  relevanceFloor: number;
}

/**
 * Validates that required environment variables are set
 * @throws ConfigurationError if any required variable is missing
 */
export function validateConfig(): void {
  const required: (keyof EnvironmentConfig)[] = [
    'AzureWebJobsStorage',
    'FUNCTIONS_WORKER_RUNTIME',
    'OPENAI_API_KEY',
  ];

  const vectorStore = parseVectorStore(getConfig('VECTOR_STORE', 'pinecone'));
  if (vectorStore === 'pinecone') {
    required.push('PINECONE_API_KEY');
  }

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`
    );
  }
}

/**
 * Gets configuration value from environment with default fallback
 */
export function getConfig<K extends keyof EnvironmentConfig>(
  key: K,
  defaultValue?: string
): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Environment variable ${key} is not set`);
  }
  return value;
}

/**
 * Gets a numeric configuration value, rejecting values that do not parse
 */
export function getNumberConfig<K extends keyof EnvironmentConfig>(
  key: K,
  defaultValue: number
): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

export function parseVectorStore(value: string): VectorStoreKind {
  switch (value.toLowerCase()) {
    case 'pinecone':
      return 'pinecone';
    case 'qdrant':
      return 'qdrant';
    case 'memory':
      return 'memory';
    default:
      throw new ConfigurationError(
        `Unsupported VECTOR_STORE "${value}" (expected pinecone, qdrant or memory)`
      );
  }
}

export function parseDistanceMetric(value: string): DistanceMetric {
  switch (value.toLowerCase()) {
    case 'cosine':
      return 'cosine';
    case 'euclidean':
    case 'euclid':
      return 'euclidean';
    case 'dotproduct':
    case 'dot':
      return 'dotproduct';
    default:
      throw new ConfigurationError(
        `Unsupported distance metric "${value}" (expected cosine, euclidean or dotproduct)`
      );
  }
}

/**
 * Resolves the pipeline settings from the environment
 */
export function loadPipelineConfig(): PipelineConfig {
  return {
    embeddingModel: getConfig('OPENAI_MODEL', 'text-embedding-3-small'),
    embeddingDimensions: getNumberConfig('EMBEDDING_DIMENSIONS', 1536),
    embeddingBatchSize: getNumberConfig('EMBEDDING_BATCH_SIZE', 2048),
    embeddingBatchTokens: getNumberConfig('EMBEDDING_BATCH_TOKENS', 300_000),
    embeddingMaxInputTokens: getNumberConfig('EMBEDDING_MAX_INPUT_TOKENS', 8191),
    embeddingCacheSize: getNumberConfig('EMBEDDING_CACHE_SIZE', 10_000),
    vectorStore: parseVectorStore(getConfig('VECTOR_STORE', 'pinecone')),
    defaultCollection: getConfig('DEFAULT_COLLECTION', 'knowledge-base'),
    distanceMetric: parseDistanceMetric(getConfig('DISTANCE_METRIC', 'cosine')),
    upsertBatchSize: getNumberConfig('UPSERT_BATCH_SIZE', 100),
    chunkSize: getNumberConfig('CHUNK_SIZE', 1000),
    chunkOverlap: getNumberConfig('CHUNK_OVERLAP', 200),
    retry: {
      maxAttempts: getNumberConfig('RETRY_MAX_ATTEMPTS', 4),
      baseDelayMs: getNumberConfig('RETRY_BASE_DELAY_MS', 500),
      maxDelayMs: getNumberConfig('RETRY_MAX_DELAY_MS', 8000),
      jitter: getNumberConfig('RETRY_JITTER', 0.25),
    },
    requestTimeoutMs: getNumberConfig('REQUEST_TIMEOUT_MS', 30_000),
    rebuildTimeoutMs: getNumberConfig('REBUILD_TIMEOUT_MS', 300_000),
    rebuildPollIntervalMs: getNumberConfig('REBUILD_POLL_INTERVAL_MS', 2000),
    relevanceFloor: getNumberConfig('RELEVANCE_FLOOR', 0),
  };
}
