/**
 * Search Module
 *
 * In-memory vector index with exact cosine ranking.
 *
 * @example
 * ```typescript
 * import { VectorIndex } from './search/index.js';
 *
 * const index = VectorIndex.build(embeddedChunks, { dimensions: provider.dimensions });
 * const results = index.query(queryEmbedding.vector, 3);
 * ```
 *
 * @packageDocumentation
 */

export { VectorIndex } from './vector-index.js';
export { cosineSimilarity, dotProduct, vectorNorm } from './similarity.js';
export type { IndexQueryOptions, ScoredChunk, VectorIndexOptions } from './types.js';
