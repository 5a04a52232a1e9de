/**
 * Unit tests for the shared retry policy
 */

import { isTransientError, RetryPolicy } from '../../src/lib/utils/retry';
import {
  ConfigurationError,
  RateLimitError,
  ServiceUnavailableError,
  TimeoutError,
} from '../../src/lib/utils/errors';

describe('isTransientError', () => {
  it('should treat rate limits and unavailable services as transient', () => {
    expect(isTransientError(new RateLimitError('slow down'))).toBe(true);
    expect(isTransientError(new ServiceUnavailableError('down'))).toBe(true);
  });

  it('should never retry our own deadline', () => {
    expect(isTransientError(new TimeoutError('late', 'op', 10))).toBe(false);
  });

  it('should classify HTTP statuses', () => {
    expect(isTransientError({ status: 503 })).toBe(true);
    expect(isTransientError({ status: 429 })).toBe(true);
    expect(isTransientError({ status: 400 })).toBe(false);
    expect(isTransientError({ status: 404 })).toBe(false);
  });

  it('should classify network error codes and causes', () => {
    expect(isTransientError({ code: 'ECONNRESET' })).toBe(true);
    expect(isTransientError(new Error('fetch failed', { cause: { status: 502 } }))).toBe(true);
    expect(isTransientError(new Error('plain failure'))).toBe(false);
    expect(isTransientError('string failure')).toBe(false);
  });
});

describe('RetryPolicy', () => {
  const fast = (): RetryPolicy =>
    new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitter: 0 });

  it('should return once a transient failure clears', async () => {
    let attempts = 0;
    const result = await fast().execute(async () => {
      attempts++;
      if (attempts < 3) {
        throw new ServiceUnavailableError('down', 503);
      }
      return 'ok';
    }, { operation: 'test-op' });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('should rethrow permanent failures without retrying', async () => {
    const permanent = new ConfigurationError('bad setting');
    let attempts = 0;

    await expect(
      fast().execute(async () => {
        attempts++;
        throw permanent;
      }, { operation: 'test-op' })
    ).rejects.toBe(permanent);
    expect(attempts).toBe(1);
  });

  it('should rethrow the last error once attempts run out', async () => {
    let attempts = 0;
    const errors = [new ServiceUnavailableError('first'), new ServiceUnavailableError('second'), new ServiceUnavailableError('third')];

    await expect(
      fast().execute(async () => {
        throw errors[attempts++];
      }, { operation: 'test-op' })
    ).rejects.toBe(errors[2]);
    expect(attempts).toBe(3);
  });

  it('should compute capped exponential delays', () => {
    const policy = new RetryPolicy({ baseDelayMs: 100, maxDelayMs: 1000, jitter: 0 });

    expect(policy.delayFor(1)).toBe(100);
    expect(policy.delayFor(2)).toBe(200);
    expect(policy.delayFor(3)).toBe(400);
    expect(policy.delayFor(5)).toBe(1000);
  });

  it('should subtract jitter from the delay', () => {
    const policy = new RetryPolicy({ baseDelayMs: 100, maxDelayMs: 1000, jitter: 0.5, random: () => 1 });
    expect(policy.delayFor(1)).toBe(50);
  });

  it('should fail with TimeoutError when the deadline passes', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(
      fast().execute(() => never, { operation: 'slow-op', timeoutMs: 20 })
    ).rejects.toMatchObject({ name: 'TimeoutError', operation: 'slow-op', timeoutMs: 20 });
  });

  it('should stop retrying when the deadline passes during backoff', async () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 1000, jitter: 0 });
    let attempts = 0;

    await expect(
      policy.execute(async () => {
        attempts++;
        throw new ServiceUnavailableError('down');
      }, { operation: 'flaky-op', timeoutMs: 30 })
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(attempts).toBe(1);
  });

  it('should reject invalid options', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(ConfigurationError);
    expect(() => new RetryPolicy({ baseDelayMs: -1 })).toThrow(ConfigurationError);
    expect(() => new RetryPolicy({ jitter: 2 })).toThrow(ConfigurationError);
  });
});
