/**
 * Translation between pipeline metadata/filters and Pinecone's formats
 */

import { RecordMetadata } from '@pinecone-database/pinecone';
import { Metadata } from '../../types/chunk';
import { isRangePredicate, MetadataFilter } from '../../types/vector';
import * as logger from '../utils/logger';

/**
 * Maximum metadata size per vector in Pinecone (40KB)
 */
export const MAX_METADATA_BYTES = 40 * 1024;

/**
 * Converts chunk metadata to Pinecone metadata format
 */
export function toPineconeMetadata(metadata: Metadata): RecordMetadata {
  return { ...metadata };
}

/**
 * Keeps the scalar values of Pinecone metadata. List values are joined
 * with ", " so they stay readable in context blocks.
 */
export function fromPineconeMetadata(metadata: RecordMetadata | undefined): Metadata {
  const result: Metadata = {};
  if (!metadata) {
    return result;
  }

  for (const [key, value] of Object.entries(metadata)) {
    if (Array.isArray(value)) {
      result[key] = value.join(', ');
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Translates a metadata filter into Pinecone filter syntax:
 * exact values become `$eq`, ranges use `$gt`/`$gte`/`$lt`/`$lte`.
 */
export function toPineconeFilter(filter: MetadataFilter | undefined): Record<string, unknown> | undefined {
  if (!filter || Object.keys(filter).length === 0) {
    return undefined;
  }

  const result: Record<string, unknown> = {};
  for (const [key, condition] of Object.entries(filter)) {
    if (isRangePredicate(condition)) {
      const range: Record<string, number> = {};
      if (condition.gt !== undefined) range.$gt = condition.gt;
      if (condition.gte !== undefined) range.$gte = condition.gte;
      if (condition.lt !== undefined) range.$lt = condition.lt;
      if (condition.lte !== undefined) range.$lte = condition.lte;
      result[key] = range;
    } else {
      result[key] = { $eq: condition };
    }
  }
  return result;
}

/**
 * Validates that metadata fits within Pinecone's size limit
 *
 * @returns true if valid, false if too large
 */
export function validateMetadata(metadata: RecordMetadata): boolean {
  const size = Buffer.byteLength(JSON.stringify(metadata), 'utf8');

  if (size > MAX_METADATA_BYTES) {
    logger.error('Metadata exceeds Pinecone size limit', {
      size,
      limit: MAX_METADATA_BYTES,
    });
    return false;
  }

  return true;
}
