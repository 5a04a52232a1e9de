/**
 * Collection lifecycle state machine
 *
 *   absent → created → indexed → optimizing → indexed
 *   created | indexed → degraded   (partial ingestion)
 *   degraded → indexed             (full rebuild, or every incomplete
 *                                   document re-ingested successfully)
 *
 * Statistics always come from the backend; the manager only overlays the
 * lifecycle state, the incompletely indexed documents and the last
 * indexing time.
 */

import { CollectionStats, DistanceMetric, RebuildMode } from '../../types/vector';
import { VectorStoreAdapter, OperationOptions } from '../vectorstore/adapter';
import { CollectionNotFoundError, RebuildIncompleteError, RebuildTimeoutError } from '../utils/errors';
import { KeyedMutex } from '../utils/mutex';
import * as logger from '../utils/logger';

export type CollectionState = 'absent' | 'created' | 'indexed' | 'optimizing' | 'degraded';

export type IngestionOutcome = 'complete' | 'partial' | 'failed';

export interface CollectionDescription extends CollectionStats {
  state: CollectionState;
  /** Documents with chunks missing from the index */
  incompleteDocuments: string[];
  indexedAt?: string;
}

interface TrackedCollection {
  state: Exclude<CollectionState, 'absent'>;
  incompleteDocuments: Set<string>;
  indexedAt?: string;
}

export class IndexManager {
  private readonly tracked = new Map<string, TrackedCollection>();
  private readonly rebuildLocks = new KeyedMutex();

  constructor(
    private readonly store: VectorStoreAdapter,
    private readonly clock: () => Date = () => new Date()
  ) {}

  state(name: string): CollectionState {
    return this.tracked.get(name)?.state ?? 'absent';
  }

  /**
   * Creates the collection if needed (absent → created). An existing
   * collection with the same configuration is adopted.
   */
  async ensureCollection(
    name: string,
    dimension: number,
    metric: DistanceMetric,
    options: OperationOptions = {}
  ): Promise<CollectionDescription> {
    const created = await this.store.createCollection(name, dimension, metric, options);

    if (created) {
      this.tracked.set(name, { state: 'created', incompleteDocuments: new Set() });
      logger.info('Collection state changed', { collection: name, from: 'absent', to: 'created' });
    }

    return this.describe(name, options);
  }

  /**
   * Applies the outcome of one document's ingestion
   */
  recordIngestion(name: string, documentPath: string, outcome: IngestionOutcome): CollectionState {
    const entry = this.tracked.get(name);
    if (!entry) {
      return 'absent';
    }

    const from = entry.state;

    if (outcome === 'complete') {
      entry.incompleteDocuments.delete(documentPath);
      entry.indexedAt = this.clock().toISOString();
      if (entry.state === 'created' || (entry.state === 'degraded' && entry.incompleteDocuments.size === 0)) {
        entry.state = 'indexed';
      }
    } else if (outcome === 'partial') {
      entry.incompleteDocuments.add(documentPath);
      entry.indexedAt = this.clock().toISOString();
      entry.state = 'degraded';
    }

    if (entry.state !== from) {
      logger.info('Collection state changed', {
        collection: name,
        from,
        to: entry.state,
        documentPath,
      });
    }
    if (outcome === 'partial') {
      logger.warn('Document incompletely indexed', {
        collection: name,
        documentPath,
        incompleteDocuments: entry.incompleteDocuments.size,
      });
    }

    return entry.state;
  }

  /**
   * Rebuilds the index (→ optimizing → indexed).
   *
   * A RebuildTimeoutError leaves the collection optimizing. A
   * RebuildIncompleteError degrades it, the documents whose records were
   * lost becoming incomplete. Any other failure restores the previous state.
   */
  async rebuild(
    name: string,
    mode: RebuildMode,
    options: OperationOptions = {}
  ): Promise<CollectionDescription> {
    return this.rebuildLocks.runExclusive(name, async () => {
      await this.describe(name, options);
      const entry = this.require(name);
      const previous = entry.state;

      entry.state = 'optimizing';
      logger.info('Collection state changed', { collection: name, from: previous, to: 'optimizing', mode });

      let stats: CollectionStats;
      try {
        stats = await this.store.rebuild(name, mode, options);
      } catch (err) {
        if (err instanceof RebuildIncompleteError) {
          for (const documentPath of err.missingDocuments) {
            entry.incompleteDocuments.add(documentPath);
          }
          entry.state = 'degraded';
          logger.warn('Collection state changed', { collection: name, from: 'optimizing', to: 'degraded' });
        } else if (!(err instanceof RebuildTimeoutError)) {
          entry.state = previous;
          logger.warn('Rebuild failed, state restored', { collection: name, state: previous });
        }
        throw err;
      }

      if (mode === 'full') {
        if (entry.incompleteDocuments.size > 0) {
          logger.warn('Full rebuild cleared incomplete documents', {
            collection: name,
            documents: [...entry.incompleteDocuments],
          });
        }
        entry.incompleteDocuments.clear();
        entry.state = stats.vectorCount > 0 ? 'indexed' : 'created';
      } else if (previous === 'degraded') {
        entry.state = 'degraded';
      } else {
        entry.state = stats.vectorCount > 0 ? 'indexed' : 'created';
      }
      entry.indexedAt = this.clock().toISOString();

      logger.info('Collection state changed', { collection: name, from: 'optimizing', to: entry.state });
      return this.overlay(stats);
    });
  }

  /**
   * @throws CollectionNotFoundError (the collection becomes absent)
   */
  async describe(name: string, options: OperationOptions = {}): Promise<CollectionDescription> {
    try {
      const stats = await this.store.describeCollection(name, options);
      return this.overlay(stats);
    } catch (err) {
      if (err instanceof CollectionNotFoundError) {
        this.tracked.delete(name);
      }
      throw err;
    }
  }

  async list(options: OperationOptions = {}): Promise<CollectionDescription[]> {
    const collections = await this.store.listCollections(options);
    return collections.map((stats) => this.overlay(stats));
  }

  /**
   * Collections first seen through the backend are adopted as indexed
   * when they hold vectors, created otherwise
   */
  private overlay(stats: CollectionStats): CollectionDescription {
    let entry = this.tracked.get(stats.name);
    if (!entry) {
      entry = {
        state: stats.vectorCount > 0 ? 'indexed' : 'created',
        incompleteDocuments: new Set(),
      };
      this.tracked.set(stats.name, entry);
    }

    return {
      ...stats,
      state: entry.state,
      incompleteDocuments: [...entry.incompleteDocuments].sort(),
      ...(entry.indexedAt !== undefined && { indexedAt: entry.indexedAt }),
    };
  }

  private require(name: string): TrackedCollection {
    const entry = this.tracked.get(name);
    if (!entry) {
      throw new CollectionNotFoundError(name);
    }
    return entry;
  }
}
