/**
 * Recursive character chunking with exact source-offset overlap
 *
 * Text is cut along the coarsest separator available (paragraph, line, word,
 * then anywhere) and pieces are merged into chunks of at most `chunkSize`
 * characters. Every chunk after the first starts exactly `overlap` characters
 * before the end of its predecessor, so chunks are verbatim slices of the
 * source and the document can be rebuilt from them.
 */

import { createHash } from 'node:crypto';
import {
  Chunk,
  ChunkingConfig,
  ChunkMetadata,
  Document,
  TextSpan,
} from '../../types/chunk';
import { ConfigurationError, EmptyDocumentError } from '../utils/errors';
import * as logger from '../utils/logger';

// Default configuration
export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_OVERLAP = 200;

/** Separators in priority order; '' means "cut anywhere" */
const SEPARATORS = ['\n\n', '\n', ' ', ''];

interface Piece {
  start: number;
  end: number;
  /** Piece produced by the '' separator: any offset inside is a valid cut */
  free: boolean;
}

/**
 * Throws ConfigurationError unless chunkSize > overlap >= 0 (both integers)
 */
export function validateChunkingConfig(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(
      `overlap (${overlap}) must be strictly less than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Cuts [start, end) after every occurrence of `separator`.
 * The separator stays attached to the piece before it.
 */
function cutAtSeparator(text: string, start: number, end: number, separator: string): Piece[] {
  const pieces: Piece[] = [];
  let position = start;

  while (position < end) {
    const found = text.indexOf(separator, position);
    if (found === -1 || found + separator.length > end) {
      break;
    }
    const pieceEnd = found + separator.length;
    pieces.push({ start: position, end: pieceEnd, free: false });
    position = pieceEnd;
  }

  if (position < end) {
    pieces.push({ start: position, end, free: false });
  }

  return pieces;
}

/**
 * Splits [start, end) into pieces no longer than chunkSize, trying the
 * separators from `separatorIndex` onwards.
 */
function splitRecursive(
  text: string,
  start: number,
  end: number,
  chunkSize: number,
  separatorIndex: number
): Piece[] {
  if (end - start <= chunkSize) {
    return [{ start, end, free: false }];
  }

  for (let i = separatorIndex; i < SEPARATORS.length; i++) {
    const separator = SEPARATORS[i];

    if (separator === '') {
      return [{ start, end, free: true }];
    }

    const pieces = cutAtSeparator(text, start, end, separator);
    if (pieces.length <= 1) {
      continue;
    }

    const result: Piece[] = [];
    for (const piece of pieces) {
      if (piece.end - piece.start <= chunkSize) {
        result.push(piece);
      } else {
        result.push(...splitRecursive(text, piece.start, piece.end, chunkSize, i + 1));
      }
    }
    return result;
  }

  return [{ start, end, free: true }];
}

/**
 * Farthest valid cut in (start, limit]: the limit itself when it falls inside
 * a free piece, otherwise the last piece boundary before it.
 */
function findCut(pieces: Piece[], start: number, limit: number): number | undefined {
  let best: number | undefined;

  for (const piece of pieces) {
    if (piece.start >= limit) {
      break;
    }
    if (piece.free && piece.start < limit && limit < piece.end) {
      return limit;
    }
    if (piece.end <= limit && piece.end > start) {
      best = piece.end;
    }
  }

  return best;
}

/**
 * Splits text into spans of at most `chunkSize` characters sharing exactly
 * `overlap` characters with their predecessor.
 *
 * @throws ConfigurationError for invalid sizes (before any splitting)
 * @throws EmptyDocumentError when the text is empty or whitespace only
 */
export function splitText(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_OVERLAP
): TextSpan[] {
  validateChunkingConfig(chunkSize, overlap);

  if (text.trim().length === 0) {
    throw new EmptyDocumentError('Cannot chunk an empty document');
  }

  const length = text.length;
  if (length <= chunkSize) {
    return [{ content: text, start: 0, end: length }];
  }

  const pieces = splitRecursive(text, 0, length, chunkSize, 0);
  const spans: TextSpan[] = [];
  let start = 0;

  for (;;) {
    const limit = Math.min(start + chunkSize, length);
    let end = limit === length ? length : findCut(pieces, start, limit) ?? limit;

    // A chunk must reach past the shared overlap, otherwise the next one would not advance
    if (end <= start + overlap) {
      end = limit;
    }

    spans.push({ content: text.slice(start, end), start, end });

    if (end >= length) {
      break;
    }
    start = end - overlap;
  }

  return spans;
}

/**
 * Splits text into chunk content strings
 */
export function split(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_OVERLAP
): string[] {
  return splitText(text, chunkSize, overlap).map((span) => span.content);
}

/**
 * Deterministic UUID-shaped id for a document's n-th chunk
 */
export function chunkId(documentPath: string, index: number): string {
  const hex = createHash('sha256').update(`${documentPath}#${index}`).digest('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}

/**
 * Chunks a document, attaching merged metadata to every chunk
 *
 * @param document - Loaded document text and metadata
 * @param config - Chunking configuration
 * @param now - Ingestion timestamp stamped on every chunk
 */
export function chunkDocument(
  document: Document,
  config: ChunkingConfig = {},
  now: Date = new Date()
): Chunk[] {
  const chunkSize = config.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = config.overlap ?? DEFAULT_OVERLAP;

  logger.debug('Starting document chunking', {
    documentPath: document.path,
    contentLength: document.text.length,
    chunkSize,
    overlap,
  });

  let spans: TextSpan[];
  try {
    spans = splitText(document.text, chunkSize, overlap);
  } catch (err) {
    if (err instanceof EmptyDocumentError) {
      throw new EmptyDocumentError(`Document "${document.path}" is empty`, document.path);
    }
    throw err;
  }

  const ingestedAt = now.toISOString();
  const total = spans.length;

  const chunks = spans.map((span, index): Chunk => {
    const metadata: ChunkMetadata = {
      ...document.metadata,
      document_path: document.path,
      chunk_index: index,
      total_chunks: total,
      start_offset: span.start,
      end_offset: span.end,
      ingested_at: ingestedAt,
      text: span.content,
    };

    return {
      id: chunkId(document.path, index),
      documentPath: document.path,
      content: span.content,
      index,
      total,
      startOffset: span.start,
      endOffset: span.end,
      metadata,
    };
  });

  logger.info('Document chunking completed', {
    documentPath: document.path,
    originalLength: document.text.length,
    chunksCreated: total,
  });

  return chunks;
}
