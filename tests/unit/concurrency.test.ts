/**
 * Unit tests for deadlines, abortable sleeps and the keyed mutex
 */

import { KeyedMutex } from '../../src/lib/utils/mutex';
import { sleep, withDeadline } from '../../src/lib/utils/timeout';
import { TimeoutError } from '../../src/lib/utils/errors';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it('should reject with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    const reason = new Error('stopped');

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it('should reject immediately on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already stopped'));

    await expect(sleep(10, controller.signal)).rejects.toThrow('already stopped');
  });
});

describe('withDeadline', () => {
  it('should resolve with the work result', async () => {
    await expect(withDeadline('fast-op', 1000, async () => 42)).resolves.toBe(42);
  });

  it('should reject with TimeoutError and abort the work signal', async () => {
    let workSignal: AbortSignal | undefined;
    const result = withDeadline('slow-op', 10, (signal) => {
      workSignal = signal;
      return new Promise<never>(() => undefined);
    });

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    expect(workSignal?.aborted).toBe(true);
  });

  it('should follow the parent signal', async () => {
    const parent = new AbortController();
    const result = withDeadline('child-op', undefined, () => new Promise<never>(() => undefined), parent.signal);
    const reason = new Error('parent stopped');

    parent.abort(reason);

    await expect(result).rejects.toBe(reason);
  });

  it('should run unbounded without a deadline', async () => {
    await expect(withDeadline('op', undefined, async (signal) => signal.aborted)).resolves.toBe(false);
  });
});

describe('KeyedMutex', () => {
  it('should run tasks for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = mutex.runExclusive('collection', async () => {
      events.push('first:start');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      events.push('first:end');
    });
    const second = mutex.runExclusive('collection', async () => {
      events.push('second');
    });

    await flush();
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should run tasks for different keys in parallel', async () => {
    const mutex = new KeyedMutex();
    let releaseA: () => void = () => undefined;

    const a = mutex.runExclusive('a', () => new Promise<string>((resolve) => {
      releaseA = () => resolve('a');
    }));
    const b = await mutex.runExclusive('b', async () => 'b');

    expect(b).toBe('b');
    await flush();
    releaseA();
    await expect(a).resolves.toBe('a');
  });

  it('should release the key when a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('key', async () => {
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');
    await expect(mutex.runExclusive('key', async () => 'next')).resolves.toBe('next');
  });
});
