/**
 * OpenAI client initialization
 */

import OpenAI from 'openai';
import { getConfig, getNumberConfig } from '../../types/config';
import * as logger from '../utils/logger';

let openaiClient: OpenAI | null = null;

/**
 * Gets or creates the shared OpenAI client
 *
 * OPENAI_BASE_URL points the client at an OpenAI-compatible embeddings
 * endpoint (a proxy or a self-hosted gateway). The SDK's own retries are
 * disabled; RetryPolicy owns them.
 */
export function getOpenAIClient(): OpenAI {
  if (!openaiClient) {
    const baseURL = getConfig('OPENAI_BASE_URL', '') || undefined;

    logger.info('Initializing OpenAI client', { baseURL: baseURL ?? 'default' });

    openaiClient = new OpenAI({
      apiKey: getConfig('OPENAI_API_KEY'),
      baseURL,
      timeout: getNumberConfig('REQUEST_TIMEOUT_MS', 30000),
      maxRetries: 0,
    });
  }

  return openaiClient;
}

export function getEmbeddingModel(): string {
  return getConfig('OPENAI_MODEL', 'text-embedding-3-small');
}
