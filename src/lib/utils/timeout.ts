/**
 * Deadline and sleep helpers shared by every network-bound operation
 */

import { TimeoutError } from './errors';

/**
 * Sleeps for a specified number of milliseconds.
 * Rejects with the signal's reason as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

/**
 * Runs `work` under a deadline.
 *
 * The signal handed to `work` aborts when the deadline passes or when
 * `parentSignal` aborts, and the returned promise rejects at that moment even
 * if `work` ignores the signal. Without either the work runs unbounded.
 */
export function withDeadline<T>(
  operation: string,
  timeoutMs: number | undefined,
  work: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    return Promise.reject(abortReason(parentSignal));
  }

  const controller = new AbortController();
  const bounded = timeoutMs !== undefined && Number.isFinite(timeoutMs);

  if (!bounded && !parentSignal) {
    return work(controller.signal);
  }

  return new Promise<T>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const cleanup = (): void => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      parentSignal?.removeEventListener('abort', onParentAbort);
    };

    const fail = (err: Error): void => {
      cleanup();
      controller.abort(err);
      reject(err);
    };

    const onParentAbort = (): void => fail(abortReason(parentSignal));

    if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
      timer = setTimeout(() => {
        fail(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, operation, timeoutMs));
      }, timeoutMs);
    }
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });

    work(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}
