import type { EmbeddingRejectedError } from '../lib/utils/errors';

/**
 * Fixed-length, L2-normalized embedding. Never mutated once produced.
 */
export type EmbeddingVector = readonly number[];

/**
 * Remote service mapping a batch of strings to vectors
 */
export interface EmbeddingProvider {
  /** Model identifier; part of every cache fingerprint */
  readonly model: string;

  /**
   * Embeds `texts`, returning one vector per input in input order.
   *
   * Implementations signal rate limits with RateLimitError, transient
   * failures with ServiceUnavailableError and invalid input with
   * EmbeddingRejectedError.
   */
  embedBatch(texts: string[], options?: { signal?: AbortSignal }): Promise<number[][]>;
}

export type EmbeddingOutcome =
  | {
      status: 'embedded';
      fingerprint: string;
      vector: EmbeddingVector;
      /** True when the vector came from the cache or another in-flight call */
      cached: boolean;
    }
  | {
      status: 'rejected';
      fingerprint: string;
      error: EmbeddingRejectedError;
    };

export interface EmbedOptions {
  /** Deadline for the whole call, across batches and retries */
  timeoutMs?: number;
}
