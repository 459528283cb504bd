/**
 * Chunker Configuration
 */

import { ConfigurationError } from '../../errors/index.js';

/**
 * Window size and overlap, both in characters.
 */
export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 512,
  chunkOverlap: 20,
};

/**
 * Reject option combinations that cannot produce a forward-moving window.
 *
 * @throws ConfigurationError
 */
export function validateChunkOptions(options: ChunkOptions): void {
  const { chunkSize, chunkOverlap } = options;
  const issues: string[] = [];

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    issues.push(`chunk_size must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    issues.push(`chunk_overlap must be a non-negative integer (got ${chunkOverlap})`);
  }
  if (issues.length === 0 && chunkSize <= chunkOverlap) {
    issues.push(
      `chunk_size (${chunkSize}) must be larger than chunk_overlap (${chunkOverlap})`
    );
  }

  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid chunking settings: ${issues.join('; ')}`,
      'Run: docqa config set chunking.chunk_size <n>  with a value above chunk_overlap'
    );
  }
}
