/**
 * Unit tests for the embedding client
 */

import { EmbeddingClient } from '../../src/lib/embeddings/client';
import { fingerprint, LruCache } from '../../src/lib/embeddings/cache';
import {
  EmbeddingProviderUnavailableError,
  EmbeddingRejectedError,
  EmptyQueryError,
  ServiceUnavailableError,
  TimeoutError,
} from '../../src/lib/utils/errors';
import { EmbeddingOutcome, EmbeddingVector } from '../../src/types/embedding';
import {
  characterCount,
  fastRetryPolicy,
  FakeEmbeddingProvider,
  HangingEmbeddingProvider,
} from '../helpers/fakes';

function vectorOf(outcome: EmbeddingOutcome): EmbeddingVector {
  if (outcome.status !== 'embedded') {
    throw new Error(`expected an embedding, got ${outcome.status}`);
  }
  return outcome.vector;
}

describe('EmbeddingClient', () => {
  let provider: FakeEmbeddingProvider;
  let client: EmbeddingClient;

  beforeEach(() => {
    provider = new FakeEmbeddingProvider();
    client = new EmbeddingClient({
      provider,
      retryPolicy: fastRetryPolicy(3),
      tokenCounter: characterCount,
    });
  });

  describe('embed', () => {
    it('should return outcomes in input order with fingerprints', async () => {
      const outcomes = await client.embed(['alpha', 'beta']);

      expect(outcomes.map((o) => o.fingerprint)).toEqual([
        fingerprint('test-embedding-model', 'alpha'),
        fingerprint('test-embedding-model', 'beta'),
      ]);
      expect(outcomes.every((o) => o.status === 'embedded')).toBe(true);
    });

    it('should serve cache hits and only send misses to the provider', async () => {
      await client.embed(['alpha', 'beta']);
      const outcomes = await client.embed(['beta', 'gamma', 'alpha']);

      expect(provider.calls).toEqual([['alpha', 'beta'], ['gamma']]);
      expect(outcomes.map((o) => o.status === 'embedded' && o.cached)).toEqual([true, false, true]);
    });

    it('should embed duplicate texts within one call once', async () => {
      const [first, second] = await client.embed(['same text', 'same text']);

      expect(provider.calls).toEqual([['same text']]);
      expect(vectorOf(first)).toEqual(vectorOf(second));
      expect(client.cacheStats().misses).toBe(1);
    });

    it('should coalesce concurrent calls for the same text', async () => {
      const [a, b] = await Promise.all([client.embed(['shared']), client.embed(['shared'])]);

      expect(provider.calls).toEqual([['shared']]);
      expect(vectorOf(a[0])).toEqual(vectorOf(b[0]));
    });

    it('should return frozen unit-length vectors', async () => {
      const [outcome] = await client.embed(['normalize me']);
      const vector = vectorOf(outcome);
      const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));

      expect(norm).toBeCloseTo(1, 10);
      expect(Object.isFrozen(vector)).toBe(true);
    });

    it('should use an injected cache', async () => {
      const cache = new LruCache<EmbeddingVector>(5);
      const cached = new EmbeddingClient({ provider, cache, tokenCounter: characterCount });

      await cached.embed(['alpha']);

      expect(cache.size).toBe(1);
      expect(cache.get(fingerprint('test-embedding-model', 'alpha'))).toHaveLength(64);
    });

    it('should reject blank inputs per item without calling the provider for them', async () => {
      const outcomes = await client.embed(['fine', '   ']);

      expect(provider.calls).toEqual([['fine']]);
      expect(outcomes[0].status).toBe('embedded');
      expect(outcomes[1].status).toBe('rejected');
    });

    it('should reject inputs over the token limit', async () => {
      const limited = new EmbeddingClient({
        provider,
        maxInputTokens: 5,
        tokenCounter: characterCount,
      });

      const outcomes = await limited.embed(['short', 'much too long']);

      expect(provider.calls).toEqual([['short']]);
      expect(outcomes[1]).toMatchObject({ status: 'rejected' });
      if (outcomes[1].status === 'rejected') {
        expect(outcomes[1].error).toBeInstanceOf(EmbeddingRejectedError);
        expect(outcomes[1].error.message).toBe('Input has 13 tokens, exceeding the limit of 5');
      }
    });

    it('should split batches by item count', async () => {
      const batched = new EmbeddingClient({ provider, maxBatchSize: 2, tokenCounter: characterCount });

      await batched.embed(['a1', 'b2', 'c3']);

      expect(provider.calls).toEqual([['a1', 'b2'], ['c3']]);
    });

    it('should split batches by token budget', async () => {
      const batched = new EmbeddingClient({ provider, maxBatchTokens: 5, tokenCounter: characterCount });

      await batched.embed(['aaa', 'bb', 'cc']);

      expect(provider.calls).toEqual([['aaa', 'bb'], ['cc']]);
    });

    it('should isolate a rejected input and embed the rest of the batch', async () => {
      provider.rejectTexts.add('bad input');

      const outcomes = await client.embed(['good input', 'bad input', 'fine input']);

      expect(provider.calls).toEqual([
        ['good input', 'bad input', 'fine input'],
        ['good input'],
        ['bad input'],
        ['fine input'],
      ]);
      expect(outcomes.map((o) => o.status)).toEqual(['embedded', 'rejected', 'embedded']);
    });

    it('should retry transient failures', async () => {
      provider.failures = [new ServiceUnavailableError('down', 503)];

      const outcomes = await client.embed(['retry me']);

      expect(provider.calls).toHaveLength(2);
      expect(outcomes[0].status).toBe('embedded');
    });

    it('should fail with EmbeddingProviderUnavailable and no succeeded fingerprints after exhausting retries', async () => {
      const outage = new ServiceUnavailableError('down', 503);
      provider.failures = [outage, outage, outage];

      const result = client.embed(['one', 'two', 'three']);

      await expect(result).rejects.toBeInstanceOf(EmbeddingProviderUnavailableError);
      await result.catch((err: unknown) => {
        expect(err).toBeInstanceOf(EmbeddingProviderUnavailableError);
        if (err instanceof EmbeddingProviderUnavailableError) {
          expect(err.succeededFingerprints).toEqual([]);
          expect(err.originalError).toBe(outage);
        }
      });
      expect(provider.calls).toHaveLength(3);
    });

    it('should report vectors obtained before the provider failed', async () => {
      const single = new EmbeddingClient({
        provider,
        maxBatchSize: 1,
        retryPolicy: fastRetryPolicy(2),
        tokenCounter: characterCount,
      });
      const outage = new ServiceUnavailableError('down', 503);
      provider.failures = [undefined, outage, outage];

      const error = await single.embed(['first', 'second']).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EmbeddingProviderUnavailableError);
      if (error instanceof EmbeddingProviderUnavailableError) {
        expect(error.succeededFingerprints).toEqual([fingerprint('test-embedding-model', 'first')]);
      }

      // The failed text is not cached or left in flight
      await single.embed(['second']);
      expect(provider.calls).toEqual([['first'], ['second'], ['second'], ['second']]);
    });

    it('should fail with TimeoutError and stop retrying when the deadline passes', async () => {
      const hanging = new HangingEmbeddingProvider();
      const slow = new EmbeddingClient({
        provider: hanging,
        retryPolicy: fastRetryPolicy(5),
        tokenCounter: characterCount,
      });

      await expect(slow.embed(['never'], { timeoutMs: 20 })).rejects.toBeInstanceOf(TimeoutError);
      expect(hanging.calls).toBe(1);
    });

    it('should hold a caller waiting on a shared embedding to its own deadline', async () => {
      const hanging = new HangingEmbeddingProvider();
      const slow = new EmbeddingClient({
        provider: hanging,
        retryPolicy: fastRetryPolicy(1),
        tokenCounter: characterCount,
      });

      const owner = slow.embed(['shared slow text'], { timeoutMs: 200 }).catch((err: unknown) => err);
      const waiter = await slow.embed(['shared slow text'], { timeoutMs: 20 }).catch((err: unknown) => err);

      expect(waiter).toBeInstanceOf(TimeoutError);
      if (waiter instanceof TimeoutError) {
        expect(waiter.timeoutMs).toBe(20);
      }
      expect(hanging.calls).toBe(1);
      expect(await owner).toBeInstanceOf(TimeoutError);
    });

    it('should embed again when the call it was waiting on times out first', async () => {
      const hanging = new HangingEmbeddingProvider();
      const slow = new EmbeddingClient({
        provider: hanging,
        retryPolicy: fastRetryPolicy(1),
        tokenCounter: characterCount,
      });

      const owner = slow.embed(['retried text'], { timeoutMs: 20 }).catch((err: unknown) => err);
      const waiter = await slow.embed(['retried text'], { timeoutMs: 150 }).catch((err: unknown) => err);

      expect(await owner).toBeInstanceOf(TimeoutError);
      expect(waiter).toBeInstanceOf(TimeoutError);
      if (waiter instanceof TimeoutError) {
        expect(waiter.timeoutMs).toBe(150);
      }
      expect(hanging.calls).toBe(2);
    });
  });

  describe('embedQuery', () => {
    it('should return the same vector as embedding the text as a chunk', async () => {
      const [chunk] = await client.embed(['shared fingerprint domain']);
      const query = await client.embedQuery('shared fingerprint domain');

      expect(query).toBe(vectorOf(chunk));
      expect(provider.calls).toHaveLength(1);
    });

    it('should reject blank queries before calling the provider', async () => {
      await expect(client.embedQuery('  ')).rejects.toBeInstanceOf(EmptyQueryError);
      expect(provider.calls).toHaveLength(0);
    });

    it('should surface a rejected query', async () => {
      provider.rejectTexts.add('refused');
      await expect(client.embedQuery('refused')).rejects.toBeInstanceOf(EmbeddingRejectedError);
    });
  });
});
