/**
 * Chunker Types
 */

/**
 * A contiguous span of one document.
 *
 * Invariants:
 * - text.length <= chunkSize
 * - rawText.slice(startOffset, endOffset) === text
 * - chunks of one document with consecutive indexes share exactly
 *   chunkOverlap characters
 * - text is never whitespace only
 */
export interface Chunk {
  /** `${documentId}#${index}`, unique within a session */
  readonly id: string;

  /** Document this chunk was cut from */
  readonly documentId: string;

  /** Window position within its document (0-based; blank windows are skipped) */
  readonly index: number;

  readonly text: string;

  /** Start offset in the document text (UTF-16 code units, inclusive) */
  readonly startOffset: number;

  /** End offset in the document text (exclusive) */
  readonly endOffset: number;
}
