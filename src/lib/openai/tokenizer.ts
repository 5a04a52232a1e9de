/**
 * Token counting with tiktoken (same tokenizer as the OpenAI embedding models)
 */

import { encoding_for_model, get_encoding, Tiktoken, TiktokenModel } from 'tiktoken';
import * as logger from '../utils/logger';

// Encoders are expensive to initialize, keep one per model
const encoders = new Map<string, Tiktoken>();

const KNOWN_EMBEDDING_MODELS: ReadonlySet<string> = new Set<TiktokenModel>([
  'text-embedding-ada-002',
  'text-embedding-3-small',
  'text-embedding-3-large',
]);

function isKnownModel(model: string): model is TiktokenModel {
  return KNOWN_EMBEDDING_MODELS.has(model);
}

/**
 * Gets or initializes the encoder for a model.
 * Unknown models fall back to cl100k_base.
 */
function getEncoder(model: string): Tiktoken {
  let encoder = encoders.get(model);
  if (!encoder) {
    encoder = isKnownModel(model) ? encoding_for_model(model) : get_encoding('cl100k_base');
    encoders.set(model, encoder);
    logger.debug('Tiktoken encoder initialized', { model });
  }
  return encoder;
}

/**
 * Counts tokens in text
 *
 * @param text - Text to count tokens for
 * @param model - Embedding model whose tokenizer is used
 */
export function countTokens(text: string, model = 'text-embedding-3-small'): number {
  return getEncoder(model).encode(text).length;
}
