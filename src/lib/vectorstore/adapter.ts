/**
 * Vector store adapter
 *
 * Wraps a VectorStoreBackend with validation (dimension, k), retries for
 * transient failures, batched writes that report partial success, ranked
 * search results and per-collection write serialization.
 */

import { EmbeddingVector } from '../../types/embedding';
import {
  CollectionSpec,
  CollectionStats,
  DistanceMetric,
  MetadataFilter,
  RebuildMode,
  SearchResult,
  VectorRecord,
} from '../../types/vector';
import {
  CollectionAlreadyExistsError,
  CollectionNotFoundError,
  ConfigurationError,
  DimensionMismatchError,
  RebuildIncompleteError,
  RebuildTimeoutError,
  TimeoutError,
  VectorDatabaseError,
  toError,
} from '../utils/errors';
import { RetryPolicy } from '../utils/retry';
import { KeyedMutex } from '../utils/mutex';
import { sleep, withDeadline } from '../utils/timeout';
import { trackDependency } from '../utils/telemetry';
import * as logger from '../utils/logger';
import { rankResults, toRetrievedChunk, toSimilarity } from './ranking';
import { BackendCallOptions, VectorStoreBackend } from './types';

export const DEFAULT_UPSERT_BATCH_SIZE = 100;
export const DEFAULT_REBUILD_TIMEOUT_MS = 300_000;
export const DEFAULT_REBUILD_POLL_INTERVAL_MS = 2000;
const RESTORE_PASSES = 2;
const MAX_SEARCH_CANDIDATES = 10_000;

export interface VectorStoreAdapterOptions {
  backend: VectorStoreBackend;
  retryPolicy?: RetryPolicy;
  upsertBatchSize?: number;
  /** Default deadline for each operation */
  timeoutMs?: number;
  /** Wall-clock budget of a full rebuild */
  rebuildTimeoutMs?: number;
  rebuildPollIntervalMs?: number;
}

export interface OperationOptions {
  timeoutMs?: number;
}

export interface FailedWrite {
  id: string;
  reason: string;
}

export interface UpsertResult {
  succeededIds: string[];
  failed: FailedWrite[];
}

function isDomainError(error: unknown): boolean {
  return (
    error instanceof CollectionNotFoundError ||
    error instanceof CollectionAlreadyExistsError ||
    error instanceof DimensionMismatchError ||
    error instanceof TimeoutError ||
    error instanceof VectorDatabaseError
  );
}

export class VectorStoreAdapter {
  readonly backend: VectorStoreBackend;
  private readonly retryPolicy: RetryPolicy;
  private readonly upsertBatchSize: number;
  private readonly timeoutMs?: number;
  private readonly rebuildTimeoutMs: number;
  private readonly rebuildPollIntervalMs: number;
  private readonly writeLocks = new KeyedMutex();
  /** Dimension and metric are fixed for a collection's lifetime */
  private readonly specs = new Map<string, CollectionSpec>();

  constructor(options: VectorStoreAdapterOptions) {
    this.backend = options.backend;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.upsertBatchSize = options.upsertBatchSize ?? DEFAULT_UPSERT_BATCH_SIZE;
    this.timeoutMs = options.timeoutMs;
    this.rebuildTimeoutMs = options.rebuildTimeoutMs ?? DEFAULT_REBUILD_TIMEOUT_MS;
    this.rebuildPollIntervalMs = options.rebuildPollIntervalMs ?? DEFAULT_REBUILD_POLL_INTERVAL_MS;

    if (!Number.isInteger(this.upsertBatchSize) || this.upsertBatchSize <= 0) {
      throw new ConfigurationError(
        `upsertBatchSize must be a positive integer, got ${this.upsertBatchSize}`
      );
    }
  }

  /**
   * Creates a collection. Returns false when an identical collection
   * already exists.
   *
   * @throws CollectionAlreadyExistsError when the name is taken with a
   *   different dimension or metric
   */
  async createCollection(
    name: string,
    dimension: number,
    metric: DistanceMetric,
    options: OperationOptions = {}
  ): Promise<boolean> {
    if (name.trim().length === 0) {
      throw new ConfigurationError('Collection name must not be empty');
    }
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ConfigurationError(`dimension must be a positive integer, got ${dimension}`);
    }

    return this.withTimeout('createCollection', options, async (signal) => {
      const existing = await this.call('getCollection', signal, (o) => this.backend.getCollection(name, o));

      if (existing) {
        if (existing.dimension !== dimension || existing.metric !== metric) {
          throw new CollectionAlreadyExistsError(
            name,
            `Collection "${name}" already exists with dimension ${existing.dimension} and metric ` +
              `${existing.metric} (requested ${dimension}/${metric})`
          );
        }
        this.remember(existing);
        logger.debug('Collection already exists with matching configuration', { collection: name });
        return false;
      }

      const spec: CollectionSpec = { name, dimension, metric };
      await this.call('createCollection', signal, (o) => this.backend.createCollection(spec, o));
      this.remember(spec);

      logger.info('Collection created', { collection: name, dimension, metric });
      return true;
    });
  }

  /**
   * Backend-authoritative statistics
   *
   * @throws CollectionNotFoundError
   */
  async describeCollection(name: string, options: OperationOptions = {}): Promise<CollectionStats> {
    return this.withTimeout('describeCollection', options, (signal) => this.describe(name, signal));
  }

  async listCollections(options: OperationOptions = {}): Promise<CollectionStats[]> {
    return this.withTimeout('listCollections', options, async (signal) => {
      const names = await this.call('listCollections', signal, (o) => this.backend.listCollectionNames(o));
      const collections: CollectionStats[] = [];

      for (const name of [...names].sort()) {
        const stats = await this.call('getCollection', signal, (o) => this.backend.getCollection(name, o));
        if (stats) {
          this.remember(stats);
          collections.push(stats);
        }
      }
      return collections;
    });
  }

  /**
   * Writes records in batches. Duplicate ids overwrite.
   *
   * A batch that still fails after retries is reported in `failed` and the
   * remaining batches are still written. When the deadline passes, the
   * unwritten records are reported as failed, unless nothing was written
   * at all, in which case TimeoutError is thrown.
   *
   * @throws DimensionMismatchError before anything is written
   */
  async upsert(
    collection: string,
    records: VectorRecord[],
    options: OperationOptions = {}
  ): Promise<UpsertResult> {
    const known = this.specs.get(collection);
    if (known) {
      this.checkDimensions(known, records);
    }

    return this.writeLocks.runExclusive(collection, async () => {
      const result: UpsertResult = { succeededIds: [], failed: [] };
      if (records.length === 0) {
        return result;
      }

      const timeoutMs = options.timeoutMs ?? this.timeoutMs;
      try {
        await withDeadline('upsert', timeoutMs, async (signal) => {
          const spec = known ?? (await this.describe(collection, signal));
          this.checkDimensions(spec, records);

          for (let i = 0; i < records.length; i += this.upsertBatchSize) {
            const batch = records.slice(i, i + this.upsertBatchSize);
            const ids = batch.map((record) => record.id);

            try {
              await this.call('upsert', signal, (o) => this.backend.upsert(collection, batch, o));
              result.succeededIds.push(...ids);
            } catch (err) {
              if (signal.aborted) {
                throw err;
              }
              const reason = toError(err).message;
              logger.warn('Upsert batch failed', { collection, batchSize: batch.length, error: reason });
              result.failed.push(...ids.map((id) => ({ id, reason })));
            }
          }
        });
      } catch (err) {
        if (!(err instanceof TimeoutError) || result.succeededIds.length === 0) {
          throw err;
        }
        const written = new Set([...result.succeededIds, ...result.failed.map((f) => f.id)]);
        for (const record of records) {
          if (!written.has(record.id)) {
            result.failed.push({ id: record.id, reason: err.message });
          }
        }
      }

      logger.info('Upsert completed', {
        collection,
        succeeded: result.succeededIds.length,
        failed: result.failed.length,
      });
      return result;
    });
  }

  /**
   * Nearest neighbours ordered by score descending, then chunk index,
   * document path and id ascending
   *
   * @throws ConfigurationError when k is not a positive integer
   */
  async search(
    collection: string,
    vector: EmbeddingVector,
    k: number,
    filter?: MetadataFilter,
    options: OperationOptions = {}
  ): Promise<SearchResult[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ConfigurationError(`k must be a positive integer, got ${k}`);
    }

    return this.withTimeout('search', options, async (signal) => {
      const spec = this.specs.get(collection) ?? (await this.describe(collection, signal));
      if (vector.length !== spec.dimension) {
        throw new DimensionMismatchError(collection, spec.dimension, vector.length);
      }

      // Widen the candidate set until the k-th score is no longer tied past its end
      for (let limit = k + 1; ; limit = Math.min(limit * 2, MAX_SEARCH_CANDIDATES)) {
        const matches = await this.call('query', signal, (o) =>
          this.backend.query(collection, vector, limit, filter, o)
        );

        const ranked = rankResults(
          matches.map(
            (match): SearchResult => ({
              id: match.id,
              score: toSimilarity(spec.metric, match.score),
              chunk: toRetrievedChunk(match.metadata),
            })
          )
        );

        const exhausted = matches.length < limit || limit >= MAX_SEARCH_CANDIDATES;
        if (exhausted || ranked.length <= k || ranked[ranked.length - 1].score < ranked[k - 1].score) {
          return ranked.slice(0, k);
        }
        logger.debug('Score tie at the result cut-off, widening search', { collection, k, limit });
      }
    });
  }

  /**
   * Incremental: starts the backend's optimization and returns.
   * Full: exports every stored record, clears the collection, writes the
   * records back and waits until the backend reports the expected count.
   *
   * The rebuild budget bounds the export and the convergence wait. Once the
   * collection is cleared, the exported records are written back without a
   * deadline, batches that fail being written again on a second pass.
   *
   * @throws RebuildTimeoutError when a full rebuild exceeds its budget
   * @throws RebuildIncompleteError when records were lost after clearing
   */
  async rebuild(
    name: string,
    mode: RebuildMode,
    options: OperationOptions = {}
  ): Promise<CollectionStats> {
    return this.writeLocks.runExclusive(name, async () => {
      if (mode === 'incremental') {
        return this.withTimeout('rebuild', options, async (signal) => {
          await this.describe(name, signal);
          await this.call('optimize', signal, (o) => this.backend.optimize(name, o));
          logger.info('Incremental index optimization started', { collection: name });
          return this.describe(name, signal);
        });
      }

      const startTime = Date.now();
      const deadline = startTime + this.rebuildTimeoutMs;

      const { spec, records } = await this.withinRebuildBudget(name, deadline, (signal) =>
        this.exportCollection(name, signal)
      );
      logger.info('Full rebuild started', { collection: name, records: records.length });

      await this.restore(spec, records);

      const stats = await this.withinRebuildBudget(name, deadline, (signal) =>
        this.awaitConvergence(name, records.length, signal)
      );
      logger.info('Full rebuild completed', {
        collection: name,
        vectorCount: stats.vectorCount,
        durationMs: Date.now() - startTime,
      });
      return stats;
    });
  }

  private async withinRebuildBudget<T>(
    name: string,
    deadline: number,
    work: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    try {
      return await withDeadline('rebuild', Math.max(0, deadline - Date.now()), work);
    } catch (err) {
      if (err instanceof TimeoutError) {
        const timeout = new RebuildTimeoutError(name, this.rebuildTimeoutMs);
        logger.logError('Full rebuild timed out', timeout, { collection: name });
        throw timeout;
      }
      throw err;
    }
  }

  private async exportCollection(
    name: string,
    signal: AbortSignal
  ): Promise<{ spec: CollectionSpec; records: VectorRecord[] }> {
    const stats = await this.describe(name, signal);
    const exported = await this.call('exportRecords', signal, (o) => this.backend.exportRecords(name, o));

    const unique = new Map<string, VectorRecord>();
    for (const record of exported) {
      unique.set(record.id, record);
    }
    return {
      spec: { name, dimension: stats.dimension, metric: stats.metric },
      records: [...unique.values()],
    };
  }

  /**
   * Clears the collection and writes the exported records back
   */
  private async restore(spec: CollectionSpec, records: VectorRecord[]): Promise<void> {
    const signal = new AbortController().signal;

    let clearFailure: Error | undefined;
    try {
      await this.call('clear', signal, (o) => this.backend.clear(spec, o));
    } catch (err) {
      clearFailure = toError(err);
      logger.warn('Clearing the collection failed, writing the exported records back', {
        collection: spec.name,
        error: clearFailure.message,
      });
    }

    let pending: VectorRecord[][] = [];
    for (let i = 0; i < records.length; i += this.upsertBatchSize) {
      pending.push(records.slice(i, i + this.upsertBatchSize));
    }

    let lastFailure: Error | undefined;
    for (let pass = 1; pass <= RESTORE_PASSES && pending.length > 0; pass++) {
      const failed: VectorRecord[][] = [];
      for (const batch of pending) {
        try {
          await this.call('upsert', signal, (o) => this.backend.upsert(spec.name, batch, o));
        } catch (err) {
          lastFailure = toError(err);
          logger.warn('Rebuild batch failed', {
            collection: spec.name,
            pass,
            batchSize: batch.length,
            error: lastFailure.message,
          });
          failed.push(batch);
        }
      }
      pending = failed;
    }

    const missing = pending.flat();
    if (missing.length > 0) {
      const documents = new Set<string>();
      for (const record of missing) {
        const path = record.metadata.document_path;
        if (typeof path === 'string') {
          documents.add(path);
        }
      }
      const error = new RebuildIncompleteError(
        spec.name,
        records.length - missing.length,
        records.length,
        [...documents].sort(),
        lastFailure
      );
      logger.logError('Full rebuild lost records', error, { collection: spec.name, missing: missing.length });
      throw error;
    }

    if (clearFailure) {
      throw clearFailure;
    }
  }

  private async awaitConvergence(
    name: string,
    expected: number,
    signal: AbortSignal
  ): Promise<CollectionStats> {
    for (;;) {
      const stats = await this.describe(name, signal);
      if (stats.vectorCount === expected && stats.status === 'ready') {
        return stats;
      }
      logger.debug('Waiting for rebuild to converge', {
        collection: name,
        expected,
        actual: stats.vectorCount,
        status: stats.status,
      });
      await sleep(this.rebuildPollIntervalMs, signal);
    }
  }

  private async describe(name: string, signal: AbortSignal): Promise<CollectionStats> {
    const stats = await this.call('getCollection', signal, (o) => this.backend.getCollection(name, o));
    if (!stats) {
      this.specs.delete(name);
      throw new CollectionNotFoundError(name);
    }
    this.remember(stats);
    return stats;
  }

  private remember(spec: CollectionSpec): void {
    this.specs.set(spec.name, { name: spec.name, dimension: spec.dimension, metric: spec.metric });
  }

  private checkDimensions(spec: CollectionSpec, records: VectorRecord[]): void {
    for (const record of records) {
      if (record.values.length !== spec.dimension) {
        throw new DimensionMismatchError(spec.name, spec.dimension, record.values.length);
      }
    }
  }

  private withTimeout<T>(
    operation: string,
    options: OperationOptions,
    work: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    return withDeadline(operation, options.timeoutMs ?? this.timeoutMs, work);
  }

  /**
   * One backend call under the retry policy. Failures that are not domain
   * errors surface as VectorDatabaseError.
   */
  private async call<T>(
    operation: string,
    signal: AbortSignal,
    fn: (options: BackendCallOptions) => Promise<T>
  ): Promise<T> {
    const startTime = Date.now();
    try {
      const value = await this.retryPolicy.execute(
        (_attempt, attemptSignal) => fn({ signal: attemptSignal }),
        { operation: `${this.backend.kind}.${operation}`, signal }
      );
      trackDependency(this.backend.kind, 'VectorStore', operation, Date.now() - startTime, true);
      return value;
    } catch (err) {
      trackDependency(this.backend.kind, 'VectorStore', operation, Date.now() - startTime, false);
      if (isDomainError(err)) {
        throw err;
      }
      const error = toError(err);
      throw new VectorDatabaseError(`${this.backend.kind} ${operation} failed: ${error.message}`, error);
    }
  }
}
