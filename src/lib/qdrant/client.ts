/**
 * Qdrant client initialization
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { getConfig } from '../../types/config';
import * as logger from '../utils/logger';

let qdrantClient: QdrantClient | null = null;

/**
 * Gets or creates a singleton Qdrant REST client instance
 */
export function getQdrantClient(): QdrantClient {
  if (!qdrantClient) {
    const url = getConfig('QDRANT_URL', 'http://localhost:6333');
    const apiKey = getConfig('QDRANT_API_KEY', '');

    logger.info('Initializing Qdrant client', { url });

    qdrantClient = new QdrantClient({
      url,
      ...(apiKey ? { apiKey } : {}),
    });
  }

  return qdrantClient;
}
