/**
 * Pinecone client initialization
 */

import { Pinecone } from '@pinecone-database/pinecone';
import { getConfig } from '../../types/config';
import * as logger from '../utils/logger';

let pineconeClient: Pinecone | null = null;

/**
 * Gets or creates a singleton Pinecone client instance
 */
export function getPineconeClient(): Pinecone {
  if (!pineconeClient) {
    const apiKey = getConfig('PINECONE_API_KEY');

    logger.info('Initializing Pinecone client');

    pineconeClient = new Pinecone({
      apiKey,
    });
  }

  return pineconeClient;
}
