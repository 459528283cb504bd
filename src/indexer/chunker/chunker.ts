/**
 * Chunker
 *
 * Splits documents into overlapping fixed-size character windows.
 *
 * Window k starts at k * (chunkSize - chunkOverlap) and spans
 * min(chunkSize, remaining) characters. The last window always ends at the
 * end of the text, so dropping the first chunkOverlap characters of every
 * chunk after the first and concatenating reconstructs the document.
 *
 * Windows holding only whitespace (a long run of blank lines, say) have
 * nothing to embed and are skipped. Chunk indexes stay window positions, so
 * a skipped window leaves a gap in the index sequence.
 */

import { ConfigurationError } from '../../errors/index.js';
import type { Document } from '../types.js';
import type { Chunk } from './types.js';
import { validateChunkOptions, type ChunkOptions } from './config.js';

/**
 * Chunk a single document.
 *
 * @throws ConfigurationError for an empty document or invalid options
 *
 * @example
 * ```typescript
 * const chunks = chunkDocument(doc, { chunkSize: 512, chunkOverlap: 20 });
 * // chunks[1].startOffset === 492
 * ```
 */
export function chunkDocument(document: Document, options: ChunkOptions): Chunk[] {
  validateChunkOptions(options);

  const text = document.rawText;
  if (text.length === 0) {
    throw new ConfigurationError(
      `Document ${document.id} is empty and cannot be chunked`,
      'Remove the empty file or add content to it'
    );
  }

  const { chunkSize, chunkOverlap } = options;
  const step = chunkSize - chunkOverlap;
  const chunks: Chunk[] = [];

  for (let start = 0, index = 0; ; start += step, index++) {
    const end = Math.min(start + chunkSize, text.length);
    const window = text.slice(start, end);

    if (!isBlank(window)) {
      chunks.push({
        id: `${document.id}#${index}`,
        documentId: document.id,
        index,
        text: window,
        startOffset: start,
        endOffset: end,
      });
    }

    if (end === text.length) {
      break;
    }
  }

  return chunks;
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

/**
 * Chunk many documents, preserving document order.
 *
 * @param onProgress - Called after each document with (done, total)
 */
export function chunkDocuments(
  documents: readonly Document[],
  options: ChunkOptions,
  onProgress?: (processed: number, total: number, documentId: string) => void
): Chunk[] {
  validateChunkOptions(options);

  const chunks: Chunk[] = [];
  documents.forEach((document, i) => {
    chunks.push(...chunkDocument(document, options));
    onProgress?.(i + 1, documents.length, document.id);
  });

  return chunks;
}
