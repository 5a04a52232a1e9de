/**
 * Embedding client: cache, single-flight coalescing, batching and retry
 * in front of an EmbeddingProvider
 *
 * Every input is keyed by its fingerprint. Cache hits are served directly,
 * fingerprints already being embedded by another call are awaited, and the
 * remaining misses are validated, batched and sent to the provider. Results
 * are merged back in input order.
 */

import { EmbeddingOutcome, EmbeddingProvider, EmbeddingVector, EmbedOptions } from '../../types/embedding';
import {
  EmbeddingError,
  EmbeddingProviderUnavailableError,
  EmbeddingRejectedError,
  EmptyQueryError,
  TimeoutError,
  toError,
} from '../utils/errors';
import { RetryPolicy } from '../utils/retry';
import { withDeadline } from '../utils/timeout';
import { countTokens } from '../openai/tokenizer';
import { trackDependency, trackMetric } from '../utils/telemetry';
import * as logger from '../utils/logger';
import { CacheStats, fingerprint, LruCache } from './cache';

export const DEFAULT_MAX_BATCH_SIZE = 2048;
export const DEFAULT_MAX_BATCH_TOKENS = 300_000;
export const DEFAULT_MAX_INPUT_TOKENS = 8191;
export const DEFAULT_CACHE_SIZE = 10_000;

export interface EmbeddingClientOptions {
  provider: EmbeddingProvider;
  /** Injected cache; a fresh one of `cacheSize` entries is created otherwise */
  cache?: LruCache<EmbeddingVector>;
  cacheSize?: number;
  retryPolicy?: RetryPolicy;
  maxBatchSize?: number;
  maxBatchTokens?: number;
  maxInputTokens?: number;
  /** Default deadline for each call */
  timeoutMs?: number;
  tokenCounter?: (text: string) => number;
}

/**
 * Outcome of one fingerprint. Never rejects, so a promise shared by
 * several callers cannot surface as an unhandled rejection.
 */
type Settlement =
  | { status: 'embedded'; vector: EmbeddingVector }
  | { status: 'rejected'; error: EmbeddingRejectedError }
  | { status: 'failed'; error: Error };

interface PendingItem {
  fingerprint: string;
  text: string;
  tokens: number;
}

/**
 * Scales a vector to unit length and freezes it
 */
export function normalizeVector(values: readonly number[]): EmbeddingVector {
  let sumOfSquares = 0;
  for (const value of values) {
    sumOfSquares += value * value;
  }
  const norm = Math.sqrt(sumOfSquares);
  const normalized = norm === 0 ? [...values] : values.map((value) => value / norm);
  return Object.freeze(normalized);
}

export class EmbeddingClient {
  readonly provider: EmbeddingProvider;
  readonly cache: LruCache<EmbeddingVector>;
  private readonly retryPolicy: RetryPolicy;
  private readonly maxBatchSize: number;
  private readonly maxBatchTokens: number;
  private readonly maxInputTokens: number;
  private readonly timeoutMs?: number;
  private readonly tokenCounter: (text: string) => number;
  private readonly inFlight = new Map<string, Promise<Settlement>>();

  constructor(options: EmbeddingClientOptions) {
    this.provider = options.provider;
    this.cache = options.cache ?? new LruCache<EmbeddingVector>(options.cacheSize ?? DEFAULT_CACHE_SIZE);
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.maxBatchTokens = options.maxBatchTokens ?? DEFAULT_MAX_BATCH_TOKENS;
    this.maxInputTokens = options.maxInputTokens ?? DEFAULT_MAX_INPUT_TOKENS;
    this.timeoutMs = options.timeoutMs;
    this.tokenCounter =
      options.tokenCounter ?? ((text: string) => countTokens(text, this.provider.model));
  }

  get model(): string {
    return this.provider.model;
  }

  fingerprint(text: string): string {
    return fingerprint(this.provider.model, text);
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /**
   * Embeds `texts`, returning one outcome per input in input order.
   *
   * @throws EmbeddingProviderUnavailableError when the provider stays
   *   unavailable; `partial` holds the vectors obtained for this call
   * @throws TimeoutError when the deadline passes
   */
  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingOutcome[]> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const startedAt = Date.now();
    const fingerprints = texts.map((text) => this.fingerprint(text));
    const settlements = new Map<string, Promise<Settlement>>();
    const shared = new Set<string>();
    const queued = new Set<string>();
    const misses: { fingerprint: string; text: string }[] = [];

    texts.forEach((text, i) => {
      const fp = fingerprints[i];
      if (settlements.has(fp) || queued.has(fp)) {
        return;
      }

      const hit = this.cache.get(fp);
      if (hit) {
        settlements.set(fp, Promise.resolve({ status: 'embedded', vector: hit }));
        shared.add(fp);
        return;
      }

      const pending = this.inFlight.get(fp);
      if (pending) {
        settlements.set(fp, pending);
        shared.add(fp);
        return;
      }

      queued.add(fp);
      misses.push({ fingerprint: fp, text });
    });

    logger.debug('Embedding request partitioned', {
      inputs: texts.length,
      unique: settlements.size + misses.length,
      cacheOrInFlight: shared.size,
      misses: misses.length,
    });

    let ownFailure: Error | undefined;
    if (misses.length > 0) {
      const resolvers = new Map<string, (settlement: Settlement) => void>();
      for (const miss of misses) {
        const promise = new Promise<Settlement>((resolve) => {
          resolvers.set(miss.fingerprint, resolve);
        });
        this.inFlight.set(miss.fingerprint, promise);
        settlements.set(miss.fingerprint, promise);
      }

      const settle = (fp: string, settlement: Settlement): void => {
        const resolve = resolvers.get(fp);
        if (!resolve) {
          return;
        }
        resolvers.delete(fp);
        if (settlement.status === 'embedded') {
          this.cache.set(fp, settlement.vector);
        }
        this.inFlight.delete(fp);
        resolve(settlement);
      };

      try {
        await withDeadline('embed', timeoutMs, (signal) => this.embedMisses(misses, settle, signal));
      } catch (err) {
        ownFailure = toError(err);
      } finally {
        const failure = ownFailure ?? new EmbeddingError('Embedding did not complete');
        for (const fp of [...resolvers.keys()]) {
          settle(fp, { status: 'failed', error: failure });
        }
      }
    }

    const resolved = await this.awaitSettlements(settlements, timeoutMs, startedAt);

    // Another caller's deadline does not bound this call: embed those inputs again
    const foreignTimeouts = [...resolved].filter(
      ([fp, settlement]) =>
        shared.has(fp) && settlement.status === 'failed' && settlement.error instanceof TimeoutError
    );
    if (foreignTimeouts.length > 0) {
      const retryTexts = foreignTimeouts.map(([fp]) => texts[fingerprints.indexOf(fp)]);
      const remaining = timeoutMs === undefined ? undefined : timeoutMs - (Date.now() - startedAt);
      if (timeoutMs !== undefined && remaining !== undefined && remaining <= 0) {
        throw new TimeoutError(`embed timed out after ${timeoutMs}ms`, 'embed', timeoutMs);
      }
      const retried = await this.embed(retryTexts, { timeoutMs: remaining }).catch((err: unknown) => {
        if (err instanceof TimeoutError && timeoutMs !== undefined) {
          throw new TimeoutError(`embed timed out after ${timeoutMs}ms`, 'embed', timeoutMs);
        }
        throw err;
      });
      for (const outcome of retried) {
        shared.delete(outcome.fingerprint);
        resolved.set(
          outcome.fingerprint,
          outcome.status === 'embedded'
            ? { status: 'embedded', vector: outcome.vector }
            : { status: 'rejected', error: outcome.error }
        );
      }
    }

    this.reportCacheStats();

    const failedFingerprint = fingerprints.find((fp) => resolved.get(fp)?.status === 'failed');
    if (failedFingerprint !== undefined) {
      const failure = resolved.get(failedFingerprint);
      const cause = failure?.status === 'failed' ? failure.error : ownFailure;

      if (cause instanceof TimeoutError && ownFailure === cause) {
        throw cause;
      }

      const partial = new Map<string, EmbeddingVector>();
      for (const [fp, settlement] of resolved) {
        if (settlement.status === 'embedded') {
          partial.set(fp, settlement.vector);
        }
      }

      const unavailable = new EmbeddingProviderUnavailableError(
        `Embedding provider unavailable: ${cause?.message ?? 'unknown error'}`,
        partial,
        cause
      );
      logger.logError('Embedding request failed', unavailable, {
        inputs: texts.length,
        succeeded: partial.size,
      });
      throw unavailable;
    }

    return texts.map((_, i): EmbeddingOutcome => {
      const fp = fingerprints[i];
      const settlement = resolved.get(fp);
      if (settlement?.status === 'embedded') {
        return { status: 'embedded', fingerprint: fp, vector: settlement.vector, cached: shared.has(fp) };
      }
      if (settlement?.status === 'rejected') {
        return { status: 'rejected', fingerprint: fp, error: settlement.error };
      }
      throw new EmbeddingError(`No embedding outcome for input ${i}`);
    });
  }

  /**
   * Embeds a single query text
   *
   * @throws EmptyQueryError for blank queries
   * @throws EmbeddingRejectedError when the provider refuses the query
   */
  async embedQuery(text: string, options: EmbedOptions = {}): Promise<EmbeddingVector> {
    if (text.trim().length === 0) {
      throw new EmptyQueryError();
    }

    const [outcome] = await this.embed([text], options);
    if (outcome.status === 'rejected') {
      throw outcome.error;
    }
    return outcome.vector;
  }

  /**
   * Waits for every settlement, bounded by what is left of this call's deadline
   */
  private async awaitSettlements(
    settlements: Map<string, Promise<Settlement>>,
    timeoutMs: number | undefined,
    startedAt: number
  ): Promise<Map<string, Settlement>> {
    const all = Promise.all(
      [...settlements].map(async ([fp, promise]) => [fp, await promise] as const)
    );
    if (timeoutMs === undefined) {
      return new Map(await all);
    }

    const remaining = Math.max(0, timeoutMs - (Date.now() - startedAt));
    try {
      return new Map(await withDeadline('embed', remaining, () => all));
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new TimeoutError(`embed timed out after ${timeoutMs}ms`, 'embed', timeoutMs);
      }
      throw err;
    }
  }

  private async embedMisses(
    misses: { fingerprint: string; text: string }[],
    settle: (fp: string, settlement: Settlement) => void,
    signal: AbortSignal
  ): Promise<void> {
    const valid: PendingItem[] = [];

    for (const miss of misses) {
      const tokens = this.validate(miss.text, miss.fingerprint);
      if (tokens instanceof EmbeddingRejectedError) {
        settle(miss.fingerprint, { status: 'rejected', error: tokens });
      } else {
        valid.push({ ...miss, tokens });
      }
    }

    for (const batch of this.toBatches(valid)) {
      await this.embedBatch(batch, settle, signal);
    }
  }

  /**
   * Token count of a valid input, or the reason it cannot be embedded
   */
  private validate(text: string, fp: string): number | EmbeddingRejectedError {
    if (text.trim().length === 0) {
      return new EmbeddingRejectedError('Input text is empty', { fingerprint: fp });
    }

    const tokens = this.tokenCounter(text);
    if (tokens > this.maxInputTokens) {
      return new EmbeddingRejectedError(
        `Input has ${tokens} tokens, exceeding the limit of ${this.maxInputTokens}`,
        { fingerprint: fp }
      );
    }
    return tokens;
  }

  /**
   * Groups items into batches bounded by item count and total tokens
   */
  private toBatches(items: PendingItem[]): PendingItem[][] {
    const batches: PendingItem[][] = [];
    let current: PendingItem[] = [];
    let tokens = 0;

    for (const item of items) {
      if (
        current.length > 0 &&
        (current.length >= this.maxBatchSize || tokens + item.tokens > this.maxBatchTokens)
      ) {
        batches.push(current);
        current = [];
        tokens = 0;
      }
      current.push(item);
      tokens += item.tokens;
    }

    if (current.length > 0) {
      batches.push(current);
    }
    return batches;
  }

  private async embedBatch(
    batch: PendingItem[],
    settle: (fp: string, settlement: Settlement) => void,
    signal: AbortSignal
  ): Promise<void> {
    let vectors: EmbeddingVector[];
    try {
      vectors = await this.callProvider(batch, signal);
    } catch (err) {
      if (!(err instanceof EmbeddingRejectedError)) {
        throw err;
      }

      if (batch.length === 1) {
        settle(batch[0].fingerprint, {
          status: 'rejected',
          error: new EmbeddingRejectedError(err.message, {
            fingerprint: batch[0].fingerprint,
            originalError: err,
          }),
        });
        return;
      }

      logger.warn('Embedding batch rejected, isolating inputs', { batchSize: batch.length });
      for (const item of batch) {
        await this.embedBatch([item], settle, signal);
      }
      return;
    }

    batch.forEach((item, i) => {
      settle(item.fingerprint, { status: 'embedded', vector: vectors[i] });
    });
  }

  private async callProvider(batch: PendingItem[], signal: AbortSignal): Promise<EmbeddingVector[]> {
    const texts = batch.map((item) => item.text);
    const startTime = Date.now();

    try {
      const raw = await this.retryPolicy.execute(
        (_attempt, attemptSignal) => this.provider.embedBatch(texts, { signal: attemptSignal }),
        { operation: 'embeddings.create', signal }
      );

      if (raw.length !== texts.length) {
        throw new EmbeddingError(
          `Provider returned ${raw.length} embeddings for ${texts.length} inputs`
        );
      }
      if (raw.some((vector) => vector.some((value) => !Number.isFinite(value)))) {
        throw new EmbeddingError('Provider returned non-finite embedding values');
      }

      trackDependency('OpenAI Embeddings', 'HTTP', this.provider.model, Date.now() - startTime, true);
      return raw.map((vector) => normalizeVector(vector));
    } catch (err) {
      trackDependency('OpenAI Embeddings', 'HTTP', this.provider.model, Date.now() - startTime, false);
      throw err;
    }
  }

  private reportCacheStats(): void {
    const stats = this.cache.stats();
    trackMetric('EmbeddingCacheHits', stats.hits);
    trackMetric('EmbeddingCacheMisses', stats.misses);
    trackMetric('EmbeddingCacheSize', stats.size);
  }
}
