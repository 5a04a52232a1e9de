/**
 * Documents and the chunks derived from them
 */

/** Scalar metadata value accepted by every vector store backend */
export type MetadataValue = string | number | boolean;

export type Metadata = Record<string, MetadataValue>;

/**
 * A unit of already-loaded source text
 */
export interface Document {
  /** Identifying path or name (e.g. "docs/setup.md") */
  path: string;

  /** Full source text */
  text: string;

  /** Free-form metadata such as source, filename or type */
  metadata?: Metadata;
}

/**
 * Metadata stored with every chunk vector
 */
export interface ChunkMetadata extends Metadata {
  document_path: string;
  chunk_index: number;
  total_chunks: number;
  start_offset: number;
  end_offset: number;
  ingested_at: string;
  text: string;
}

/**
 * Contiguous slice of a document's text
 */
export interface Chunk {
  /** Deterministic id derived from the document path and chunk index */
  id: string;

  documentPath: string;

  /** The text content of this chunk */
  content: string;

  /** Chunk sequence number (0-indexed) */
  index: number;

  /** Total number of chunks from the same document */
  total: number;

  /** Starting character position in the original text */
  startOffset: number;

  /** Ending character position (exclusive) in the original text */
  endOffset: number;

  metadata: ChunkMetadata;
}

/**
 * Configuration for text chunking
 */
export interface ChunkingConfig {
  /** Maximum characters per chunk (default: 1000) */
  chunkSize?: number;

  /** Characters shared by consecutive chunks (default: 200) */
  overlap?: number;
}

/**
 * A span of the source text produced by the splitter
 */
export interface TextSpan {
  content: string;
  start: number;
  end: number;
}
