/**
 * Vector Index
 *
 * Immutable in-memory index from chunk id to (chunk, embedding). Built once
 * from embedded chunks, then queried concurrently without mutation; a new
 * document set means building a new index.
 *
 * Ranking is exact cosine similarity over every entry, with ties broken by
 * ingestion order.
 */

import {
  DimensionMismatchError,
  NoDataError,
  ValidationError,
} from '../errors/index.js';
import type { EmbeddedChunk } from '../indexer/embedder/types.js';
import { dotProduct, vectorNorm } from './similarity.js';
import type { IndexQueryOptions, ScoredChunk, VectorIndexOptions } from './types.js';

interface IndexedEntry extends EmbeddedChunk {
  /** Ingestion position, used to break ties */
  position: number;
  norm: number;
}

/**
 * @example
 * ```typescript
 * const index = VectorIndex.build(embeddedChunks, { dimensions: 1536 });
 * const top = index.query(queryVector, 3);
 * console.log(top[0]?.chunk.id, top[0]?.score);
 * ```
 */
export class VectorIndex {
  readonly dimensions: number;
  private readonly entries: readonly IndexedEntry[];
  private readonly byId: ReadonlyMap<string, IndexedEntry>;

  private constructor(dimensions: number, entries: IndexedEntry[]) {
    this.dimensions = dimensions;
    this.entries = entries;
    this.byId = new Map(entries.map((entry) => [entry.chunk.id, entry]));
  }

  /**
   * Build an index from embedded chunks.
   *
   * @throws NoDataError when there are no entries
   * @throws DimensionMismatchError when an embedding has the wrong size
   * @throws ValidationError for duplicate chunk ids or invalid dimensions
   */
  static build(entries: readonly EmbeddedChunk[], options: VectorIndexOptions): VectorIndex {
    const { dimensions } = options;

    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new ValidationError(`Invalid index dimensions: ${dimensions}`);
    }

    if (entries.length === 0) {
      throw new NoDataError(
        'No chunks to index',
        'Add .txt or .md files to the documents directory'
      );
    }

    const seen = new Set<string>();
    const indexed = entries.map((entry, position): IndexedEntry => {
      const { chunk, embedding } = entry;

      if (seen.has(chunk.id)) {
        throw new ValidationError(`Duplicate chunk id in index: ${chunk.id}`);
      }
      seen.add(chunk.id);

      if (embedding.vector.length !== dimensions) {
        throw new DimensionMismatchError(dimensions, embedding.vector.length, `chunk ${chunk.id}`);
      }

      return { chunk, embedding, position, norm: vectorNorm(embedding.vector) };
    });

    return new VectorIndex(dimensions, indexed);
  }

  /** Number of indexed chunks */
  get size(): number {
    return this.entries.length;
  }

  /** Number of chunks with degraded embeddings */
  get degradedCount(): number {
    return this.entries.filter((entry) => entry.embedding.kind === 'degraded').length;
  }

  has(chunkId: string): boolean {
    return this.byId.has(chunkId);
  }

  get(chunkId: string): EmbeddedChunk | undefined {
    const entry = this.byId.get(chunkId);
    return entry ? { chunk: entry.chunk, embedding: entry.embedding } : undefined;
  }

  /**
   * Rank chunks by cosine similarity to a query vector.
   *
   * Returns at most topK results; fewer when there are fewer candidates.
   *
   * @throws ValidationError when topK is not a positive integer
   * @throws DimensionMismatchError when the query vector has the wrong size
   */
  query(vector: readonly number[], topK: number, options: IndexQueryOptions = {}): ScoredChunk[] {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`Invalid topK: ${topK}`, ['topK must be an integer of at least 1']);
    }

    if (vector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, vector.length, 'query vector');
    }

    const includeDegraded = options.includeDegraded ?? false;
    const queryNorm = vectorNorm(vector);

    return this.entries
      .filter((entry) => includeDegraded || entry.embedding.kind === 'real')
      .map((entry) => {
        const denominator = queryNorm * entry.norm;
        return {
          entry,
          score: denominator === 0 ? 0 : dotProduct(vector, entry.embedding.vector) / denominator,
        };
      })
      .sort((a, b) => b.score - a.score || a.entry.position - b.entry.position)
      .slice(0, topK)
      .map(({ entry, score }) => ({
        chunk: entry.chunk,
        score,
        degraded: entry.embedding.kind === 'degraded',
      }));
  }
}
