/**
 * Unit tests for Pinecone metadata and filter translation
 */

import {
  fromPineconeMetadata,
  MAX_METADATA_BYTES,
  toPineconeFilter,
  toPineconeMetadata,
  validateMetadata,
} from '../../src/lib/pinecone/metadata';

describe('Pinecone metadata', () => {
  describe('toPineconeMetadata', () => {
    it('should copy scalar metadata', () => {
      const metadata = { document_path: 'docs/a.md', chunk_index: 2, draft: false };
      const converted = toPineconeMetadata(metadata);

      expect(converted).toEqual(metadata);
      expect(converted).not.toBe(metadata);
    });
  });

  describe('fromPineconeMetadata', () => {
    it('should return an empty object without metadata', () => {
      expect(fromPineconeMetadata(undefined)).toEqual({});
    });

    it('should join list values', () => {
      expect(fromPineconeMetadata({ tags: ['setup', 'install'], chunk_index: 1 })).toEqual({
        tags: 'setup, install',
        chunk_index: 1,
      });
    });
  });

  describe('toPineconeFilter', () => {
    it('should return undefined for missing or empty filters', () => {
      expect(toPineconeFilter(undefined)).toBeUndefined();
      expect(toPineconeFilter({})).toBeUndefined();
    });

    it('should translate exact values and ranges', () => {
      expect(
        toPineconeFilter({ category: 'guide', chunk_index: { gte: 1, lt: 5 }, score: { gt: 0.5, lte: 2 } })
      ).toEqual({
        category: { $eq: 'guide' },
        chunk_index: { $gte: 1, $lt: 5 },
        score: { $gt: 0.5, $lte: 2 },
      });
    });
  });

  describe('validateMetadata', () => {
    it('should accept metadata within the size limit', () => {
      expect(validateMetadata({ text: 'short' })).toBe(true);
    });

    it('should reject metadata over the size limit', () => {
      expect(validateMetadata({ text: 'x'.repeat(MAX_METADATA_BYTES) })).toBe(false);
    });
  });
});
