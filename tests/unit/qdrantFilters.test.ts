/**
 * Unit tests for Qdrant translation helpers
 */

import {
  fromPayload,
  fromQdrantDistance,
  fromQdrantStatus,
  parseVectorParams,
  toDenseVector,
  toQdrantDistance,
  toQdrantFilter,
} from '../../src/lib/qdrant/filters';

describe('Qdrant translation', () => {
  it('should map distance metrics both ways', () => {
    expect(toQdrantDistance('cosine')).toBe('Cosine');
    expect(toQdrantDistance('euclidean')).toBe('Euclid');
    expect(toQdrantDistance('dotproduct')).toBe('Dot');
    expect(fromQdrantDistance('Euclid')).toBe('euclidean');
    expect(fromQdrantDistance('Manhattan')).toBeUndefined();
  });

  it('should map collection status colours', () => {
    expect(fromQdrantStatus('green')).toBe('ready');
    expect(fromQdrantStatus('yellow')).toBe('indexing');
    expect(fromQdrantStatus('grey')).toBe('initializing');
    expect(fromQdrantStatus('red')).toBe('degraded');
  });

  describe('toQdrantFilter', () => {
    it('should return undefined for missing or empty filters', () => {
      expect(toQdrantFilter(undefined)).toBeUndefined();
      expect(toQdrantFilter({})).toBeUndefined();
    });

    it('should build match and range conditions', () => {
      expect(toQdrantFilter({ category: 'guide', chunk_index: { gte: 2 } })).toEqual({
        must: [
          { key: 'category', match: { value: 'guide' } },
          { key: 'chunk_index', range: { gte: 2 } },
        ],
      });
    });
  });

  describe('fromPayload', () => {
    it('should keep scalar entries only', () => {
      expect(fromPayload({ text: 'a', chunk_index: 0, draft: true, nested: { x: 1 }, list: [1] })).toEqual({
        text: 'a',
        chunk_index: 0,
        draft: true,
      });
    });

    it('should return an empty object for missing payloads', () => {
      expect(fromPayload(null)).toEqual({});
      expect(fromPayload(undefined)).toEqual({});
    });
  });

  describe('parseVectorParams', () => {
    it('should read a single unnamed vector configuration', () => {
      expect(parseVectorParams({ size: 1536, distance: 'Cosine' })).toEqual({
        dimension: 1536,
        metric: 'cosine',
      });
    });

    it('should reject named vectors and unknown distances', () => {
      expect(parseVectorParams({ text: { size: 4, distance: 'Cosine' } })).toBeUndefined();
      expect(parseVectorParams({ size: 4, distance: 'Manhattan' })).toBeUndefined();
      expect(parseVectorParams(undefined)).toBeUndefined();
    });
  });

  describe('toDenseVector', () => {
    it('should accept arrays of numbers only', () => {
      expect(toDenseVector([0.5, 1])).toEqual([0.5, 1]);
      expect(toDenseVector([[0.5], [1]])).toBeUndefined();
      expect(toDenseVector({ indices: [1], values: [0.5] })).toBeUndefined();
    });
  });
});
