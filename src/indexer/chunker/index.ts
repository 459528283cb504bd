/**
 * Chunker Module
 *
 * Usage:
 * ```typescript
 * import { chunkDocuments } from './chunker/index.js';
 *
 * const documents = await source.load();
 * const chunks = chunkDocuments(documents, { chunkSize: 512, chunkOverlap: 20 });
 * ```
 */

export { chunkDocument, chunkDocuments } from './chunker.js';
export { validateChunkOptions, DEFAULT_CHUNK_OPTIONS, type ChunkOptions } from './config.js';
export type { Chunk } from './types.js';
