/**
 * Retry policy with exponential backoff and jitter
 *
 * One policy object is shared by the embedding client and the vector store
 * adapter so that every upstream call backs off the same way.
 */

import {
  RateLimitError,
  ServiceUnavailableError,
  TimeoutError,
  ConfigurationError,
} from './errors';
import { sleep, withDeadline } from './timeout';
import * as logger from './logger';

const RETRYABLE_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

const RETRYABLE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export interface RetryPolicyOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction (0-1) of each delay that is randomized away */
  jitter: number;
  isRetryable: (error: unknown) => boolean;
  random: () => number;
}

export interface ExecuteOptions {
  /** Operation name used in logs and timeout errors */
  operation: string;
  /** Deadline covering every attempt and every backoff sleep */
  timeoutMs?: number;
  /** Enclosing operation's signal; aborting it stops further attempts */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryPolicyOptions = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitter: 0.25,
  isRetryable: isTransientError,
  random: Math.random,
};

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Determines if an error is transient: rate limits, 5xx responses,
 * network resets and upstream request timeouts.
 *
 * A TimeoutError raised by our own deadline is never transient.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return false;
  }
  if (error instanceof RateLimitError || error instanceof ServiceUnavailableError) {
    return true;
  }

  const status = readProperty(error, 'status');
  if (typeof status === 'number') {
    return RETRYABLE_STATUSES.has(status);
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && RETRYABLE_CODES.has(code)) {
    return true;
  }

  const cause = readProperty(error, 'cause');
  if (cause !== undefined && cause !== error) {
    return isTransientError(cause);
  }

  return false;
}

export class RetryPolicy {
  readonly options: RetryPolicyOptions;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };

    const { maxAttempts, baseDelayMs, maxDelayMs, jitter } = this.options;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    if (baseDelayMs < 0 || maxDelayMs < 0) {
      throw new ConfigurationError('Retry delays must not be negative');
    }
    if (jitter < 0 || jitter > 1) {
      throw new ConfigurationError(`jitter must be between 0 and 1, got ${jitter}`);
    }
  }

  /**
   * Backoff before the next attempt: base * 2^(attempt - 1), capped,
   * minus up to `jitter` of itself.
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitter, random } = this.options;
    const exponential = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
    return Math.round(exponential * (1 - jitter * random()));
  }

  /**
   * Runs `operation` until it succeeds, fails permanently, runs out of
   * attempts, or the deadline passes. The last error is rethrown unchanged.
   */
  async execute<T>(
    operation: (attempt: number, signal: AbortSignal) => Promise<T>,
    options: ExecuteOptions
  ): Promise<T> {
    return withDeadline(options.operation, options.timeoutMs, async (signal) => {
      const { maxAttempts, isRetryable } = this.options;

      for (let attempt = 1; ; attempt++) {
        try {
          return await operation(attempt, signal);
        } catch (err) {
          if (signal.aborted || attempt >= maxAttempts || !isRetryable(err)) {
            throw err;
          }

          const delay =
            err instanceof RateLimitError && err.retryAfter !== undefined
              ? Math.min(err.retryAfter, this.options.maxDelayMs)
              : this.delayFor(attempt);

          logger.warn(`${options.operation} failed, retrying in ${delay}ms`, {
            attempt,
            maxAttempts,
            error: err instanceof Error ? err.message : String(err),
          });

          await sleep(delay, signal);
        }
      }
    }, options.signal);
  }
}
