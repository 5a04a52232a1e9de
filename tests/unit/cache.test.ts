/**
 * Unit tests for the embedding LRU cache
 */

import { fingerprint, LruCache } from '../../src/lib/embeddings/cache';
import { ConfigurationError } from '../../src/lib/utils/errors';

describe('fingerprint', () => {
  it('should be stable for the same model and text', () => {
    expect(fingerprint('model-a', 'hello')).toBe(fingerprint('model-a', 'hello'));
    expect(fingerprint('model-a', 'hello')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should depend on the model', () => {
    expect(fingerprint('model-a', 'hello')).not.toBe(fingerprint('model-b', 'hello'));
  });

  it('should not collide when model and text boundaries shift', () => {
    expect(fingerprint('ab', 'c')).not.toBe(fingerprint('a', 'bc'));
  });
});

describe('LruCache', () => {
  it('should evict the least recently used entry', () => {
    const cache = new LruCache<number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.stats().evictions).toBe(1);
    expect(cache.get('a')).toBe(1);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('c')).toBe(3);
  });

  it('should track hits and misses', () => {
    const cache = new LruCache<number>(10);
    cache.set('a', 1);
    cache.get('a');
    cache.get('missing');

    expect(cache.stats()).toEqual({ hits: 1, misses: 1, evictions: 0, size: 1, capacity: 10 });
  });

  it('should overwrite an existing key without growing', () => {
    const cache = new LruCache<number>(2);
    cache.set('a', 1);
    cache.set('a', 2);

    expect(cache.size).toBe(1);
    expect(cache.get('a')).toBe(2);
  });

  it('should store nothing with zero capacity', () => {
    const cache = new LruCache<number>(0);
    cache.set('a', 1);
    expect(cache.size).toBe(0);
  });

  it('should reject invalid capacities', () => {
    expect(() => new LruCache<number>(-1)).toThrow(ConfigurationError);
    expect(() => new LruCache<number>(1.5)).toThrow(ConfigurationError);
  });
});
