/**
 * Unit tests for the OpenAI embeddings provider
 */

import OpenAI from 'openai';
import { classifyOpenAIError, OpenAIEmbeddingProvider } from '../../src/lib/openai/embeddings';
import {
  EmbeddingError,
  EmbeddingRejectedError,
  RateLimitError,
  ServiceUnavailableError,
} from '../../src/lib/utils/errors';

function embeddingResponse(vectors: number[][], order: number[]): OpenAI.CreateEmbeddingResponse {
  return {
    object: 'list',
    model: 'text-embedding-3-small',
    usage: { prompt_tokens: 4, total_tokens: 4 },
    data: order.map((index) => ({ object: 'embedding' as const, index, embedding: vectors[index] })),
  };
}

describe('OpenAIEmbeddingProvider', () => {
  it('should request float embeddings and return them in input order', async () => {
    const create = jest.fn().mockResolvedValue(embeddingResponse([[1, 0], [0, 1]], [1, 0]));
    const provider = new OpenAIEmbeddingProvider({
      client: { embeddings: { create } },
      model: 'text-embedding-3-small',
    });

    const vectors = await provider.embedBatch(['first', 'second']);

    expect(vectors).toEqual([[1, 0], [0, 1]]);
    expect(create).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: ['first', 'second'], encoding_format: 'float' },
      { signal: undefined }
    );
  });

  it('should pass configured dimensions and the abort signal', async () => {
    const create = jest.fn().mockResolvedValue(embeddingResponse([[1, 0]], [0]));
    const provider = new OpenAIEmbeddingProvider({
      client: { embeddings: { create } },
      model: 'text-embedding-3-large',
      dimensions: 2,
    });
    const controller = new AbortController();

    await provider.embedBatch(['text'], { signal: controller.signal });

    expect(create).toHaveBeenCalledWith(
      { model: 'text-embedding-3-large', input: ['text'], encoding_format: 'float', dimensions: 2 },
      { signal: controller.signal }
    );
  });

  it('should translate API failures', async () => {
    const create = jest
      .fn()
      .mockRejectedValue(new OpenAI.APIError(503, undefined, 'Service Unavailable', {}));
    const provider = new OpenAIEmbeddingProvider({
      client: { embeddings: { create } },
      model: 'text-embedding-3-small',
    });

    await expect(provider.embedBatch(['text'])).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});

describe('classifyOpenAIError', () => {
  it('should map 429 to RateLimitError with retry-after in milliseconds', () => {
    const error = classifyOpenAIError(
      new OpenAI.APIError(429, undefined, 'Too Many Requests', { 'retry-after': '2' })
    );

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: 2000 });
  });

  it('should leave retryAfter unset without the header', () => {
    const error = classifyOpenAIError(new OpenAI.APIError(429, undefined, 'Too Many Requests', {}));
    expect(error).toMatchObject({ retryAfter: undefined });
  });

  it.each([408, 409, 500, 502, 503])('should map %i to ServiceUnavailableError', (status) => {
    const error = classifyOpenAIError(new OpenAI.APIError(status, undefined, 'failure', {}));
    expect(error).toBeInstanceOf(ServiceUnavailableError);
    expect(error).toMatchObject({ status });
  });

  it('should map connection failures to ServiceUnavailableError', () => {
    const error = classifyOpenAIError(new OpenAI.APIConnectionError({ message: 'socket hang up' }));
    expect(error).toBeInstanceOf(ServiceUnavailableError);
  });

  it.each([400, 413, 422])('should map %i to EmbeddingRejectedError', (status) => {
    const error = classifyOpenAIError(new OpenAI.APIError(status, undefined, 'bad input', {}));
    expect(error).toBeInstanceOf(EmbeddingRejectedError);
  });

  it('should map other API errors to EmbeddingError', () => {
    const error = classifyOpenAIError(new OpenAI.APIError(401, undefined, 'Unauthorized', {}));
    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({ status: 401 });
  });

  it('should pass user aborts through unchanged', () => {
    const abort = new OpenAI.APIUserAbortError();
    expect(classifyOpenAIError(abort)).toBe(abort);
  });

  it('should wrap unknown values', () => {
    const error = classifyOpenAIError('boom');
    expect(error).toBeInstanceOf(EmbeddingError);
    if (error instanceof EmbeddingError) {
      expect(error.originalError?.message).toBe('boom');
    }
  });
});
