/**
 * Search Module Types
 *
 * Type definitions for the in-memory vector index.
 */

import type { Chunk } from '../indexer/chunker/types.js';

export interface VectorIndexOptions {
  /** Embedding size every entry must have */
  dimensions: number;
}

export interface IndexQueryOptions {
  /**
   * Return chunks whose embedding is a degraded zero vector.
   * @default false
   */
  includeDegraded?: boolean;
}

/**
 * A retrieved chunk with its similarity to the query.
 */
export interface ScoredChunk {
  chunk: Chunk;
  /** Cosine similarity in [-1, 1], higher = more similar */
  score: number;
  /** The chunk's embedding is a degraded zero vector */
  degraded: boolean;
}
