/**
 * OpenAI embeddings provider
 *
 * Maps one batch of texts to vectors and translates API failures into the
 * pipeline's error taxonomy. Retries are handled by the embedding client.
 */

import OpenAI from 'openai';
import { getOpenAIClient, getEmbeddingModel } from './client';
import { EmbeddingProvider } from '../../types/embedding';
import {
  EmbeddingError,
  EmbeddingRejectedError,
  RateLimitError,
  ServiceUnavailableError,
} from '../utils/errors';
import * as logger from '../utils/logger';

/**
 * The part of the OpenAI client this provider calls
 */
export interface EmbeddingsApi {
  embeddings: {
    create(
      body: OpenAI.EmbeddingCreateParams,
      options?: { signal?: AbortSignal }
    ): PromiseLike<OpenAI.CreateEmbeddingResponse>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  client?: EmbeddingsApi;
  model?: string;
  /** Output dimensions for models that support shortening */
  dimensions?: number;
}

const REJECTED_STATUSES = new Set([400, 413, 422]);

function parseRetryAfter(headers: Record<string, string | null | undefined> | undefined): number | undefined {
  const raw = headers?.['retry-after'];
  if (!raw) {
    return undefined;
  }
  const seconds = parseInt(raw, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * Translates an OpenAI SDK error into the pipeline's error classes
 *
 * - 429 → RateLimitError (honours retry-after)
 * - 408, 409, 5xx and connection failures → ServiceUnavailableError
 * - 400, 413, 422 → EmbeddingRejectedError
 * - anything else → EmbeddingError
 */
export function classifyOpenAIError(err: unknown): Error {
  if (err instanceof OpenAI.APIUserAbortError) {
    return err;
  }

  if (err instanceof OpenAI.APIConnectionError) {
    return new ServiceUnavailableError(`OpenAI connection failed: ${err.message}`, undefined, err);
  }

  if (err instanceof OpenAI.APIError) {
    const status = err.status;

    if (status === 429) {
      return new RateLimitError('OpenAI rate limit exceeded', parseRetryAfter(err.headers));
    }
    if (status !== undefined && (status === 408 || status === 409 || status >= 500)) {
      return new ServiceUnavailableError(`OpenAI service error (${status})`, status, err);
    }
    if (status !== undefined && REJECTED_STATUSES.has(status)) {
      return new EmbeddingRejectedError(`OpenAI rejected the input: ${err.message}`, {
        originalError: err,
      });
    }
    return new EmbeddingError('Failed to generate embeddings', err, status);
  }

  return new EmbeddingError(
    'Failed to generate embeddings',
    err instanceof Error ? err : new Error(String(err))
  );
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly client: EmbeddingsApi;
  private readonly dimensions?: number;

  constructor(options: OpenAIEmbeddingProviderOptions = {}) {
    this.client = options.client ?? getOpenAIClient();
    this.model = options.model ?? getEmbeddingModel();
    this.dimensions = options.dimensions;
  }

  async embedBatch(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    logger.debug('Generating embeddings', { model: this.model, batchSize: texts.length });

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts,
          encoding_format: 'float',
          ...(this.dimensions !== undefined ? { dimensions: this.dimensions } : {}),
        },
        { signal: options.signal }
      );
    } catch (err) {
      const classified = classifyOpenAIError(err);
      logger.warn('OpenAI embeddings request failed', {
        model: this.model,
        batchSize: texts.length,
        errorName: classified.name,
        error: classified.message,
      });
      throw classified;
    }

    const ordered = [...response.data].sort((a, b) => a.index - b.index);

    logger.debug('Embeddings generated successfully', {
      model: this.model,
      count: ordered.length,
      dimensions: ordered[0]?.embedding.length,
      totalTokens: response.usage?.total_tokens,
    });

    return ordered.map((item) => item.embedding);
  }
}
