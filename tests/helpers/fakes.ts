/**
 * In-process stand-ins for the embedding provider and the vector store
 */

import { EmbeddingProvider } from '../../src/types/embedding';
import { Metadata } from '../../src/types/chunk';
import { CollectionSpec, CollectionStats, VectorRecord } from '../../src/types/vector';
import { EmbeddingRejectedError } from '../../src/lib/utils/errors';
import { RetryPolicy } from '../../src/lib/utils/retry';
import { InMemoryVectorStore } from '../../src/lib/vectorstore/memory';

/**
 * Deterministic bag-of-trigrams vector: texts sharing many character
 * trigrams get similar vectors.
 */
export function textVector(text: string, dimension = 64): number[] {
  const vector = new Array<number>(dimension).fill(0);
  const lower = text.toLowerCase();
  const grams = lower.length < 3 ? [lower] : [];
  for (let i = 0; i + 3 <= lower.length; i++) {
    grams.push(lower.slice(i, i + 3));
  }

  for (const gram of grams) {
    let hash = 2166136261;
    for (let i = 0; i < gram.length; i++) {
      hash ^= gram.charCodeAt(i);
      hash = Math.imul(hash, 16777619) >>> 0;
    }
    vector[hash % dimension] += 1;
  }
  return vector;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'test-embedding-model';
  readonly calls: string[][] = [];

  /** Outcome of upcoming calls in order: an Error is thrown, undefined succeeds */
  failures: (Error | undefined)[] = [];

  /** Every call whose batch contains one of these texts is rejected */
  readonly rejectTexts = new Set<string>();

  constructor(readonly dimension = 64) {}

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);

    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    if (texts.some((text) => this.rejectTexts.has(text))) {
      throw new EmbeddingRejectedError('invalid input');
    }
    return texts.map((text) => textVector(text, this.dimension));
  }
}

/**
 * Provider that never answers until its signal aborts
 */
export class HangingEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'test-embedding-model';
  calls = 0;

  embedBatch(_texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    this.calls++;
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }
}

/**
 * Retry policy without delays
 */
export function fastRetryPolicy(maxAttempts = 3): RetryPolicy {
  return new RetryPolicy({ maxAttempts, baseDelayMs: 0, maxDelayMs: 0, jitter: 0 });
}

export const characterCount = (text: string): number => text.length;

/**
 * In-memory backend with scripted failures and convergence delays
 */
export class ScriptedVectorStore extends InMemoryVectorStore {
  readonly upsertCalls: string[][] = [];
  clearCalls = 0;
  optimizeCalls = 0;

  /** Outcome of upcoming upsert calls in order: an Error is thrown, undefined succeeds */
  upsertFailures: (Error | undefined)[] = [];

  /** Number of upcoming getCollection calls that report the collection as still indexing */
  pendingReadyPolls = 0;

  /** Set after every clear() */
  pollsAfterClear = 0;

  /** When set, every backend call fails with it */
  outage?: Error;

  async getCollection(name: string): Promise<CollectionStats | undefined> {
    this.checkOutage();
    const stats = await super.getCollection(name);
    if (stats && this.pendingReadyPolls > 0) {
      this.pendingReadyPolls--;
      return { ...stats, status: 'indexing' };
    }
    return stats;
  }

  async listCollectionNames(): Promise<string[]> {
    this.checkOutage();
    return super.listCollectionNames();
  }

  async upsert(collection: string, records: VectorRecord[]): Promise<void> {
    this.upsertCalls.push(records.map((record) => record.id));
    const failure = this.upsertFailures.shift();
    if (failure) {
      throw failure;
    }
    return super.upsert(collection, records);
  }

  async optimize(collection: string): Promise<void> {
    this.optimizeCalls++;
    return super.optimize(collection);
  }

  async clear(spec: CollectionSpec): Promise<void> {
    this.clearCalls++;
    await super.clear(spec);
    this.pendingReadyPolls = this.pollsAfterClear;
  }

  private checkOutage(): void {
    if (this.outage) {
      throw this.outage;
    }
  }
}

/**
 * Record with the metadata fields search results are rebuilt from
 */
export function vectorRecord(
  id: string,
  values: number[],
  documentPath = 'docs/a.md',
  chunkIndex = 0,
  extra: Metadata = {}
): VectorRecord {
  return {
    id,
    values,
    metadata: {
      document_path: documentPath,
      chunk_index: chunkIndex,
      total_chunks: 1,
      text: `${documentPath}#${chunkIndex}`,
      ...extra,
    },
  };
}
