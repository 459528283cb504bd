/**
 * Embedder Module
 *
 * Titan embeddings on Bedrock with retry, degraded fallback, caching and a
 * secondary backend.
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, embedChunks } from './embedder/index.js';
 *
 * const { provider } = await createEmbeddingProvider(config.embedding, { region: config.aws.region });
 * const { chunks: embedded } = await embedChunks(chunks, provider, { concurrency: 8 });
 * ```
 */

// Provider factory
export { createEmbeddingProvider } from './provider.js';

// Providers
export { TitanEmbeddingProvider, degradedEmbedding, PROBE_TEXT } from './titan.js';
export { CachedEmbeddingProvider, DEFAULT_CACHE_SIZE } from './cached.js';

// Model variants
export {
  resolveEmbeddingModel,
  buildEmbeddingRequest,
  getModelDimensions,
  isTitanV1,
  TITAN_V1_MODEL,
  TITAN_V2_MODEL,
  TITAN_V1_DIMENSIONS,
  TITAN_V2_DIMENSIONS,
  type EmbeddingModelSpec,
} from './models.js';

// Embedder orchestration
export { embedChunks } from './embedder.js';

// Types
export type {
  Embedding,
  EmbeddedChunk,
  EmbedChunksResult,
  EmbedderOptions,
  EmbedManyOptions,
  EmbeddingProvider,
  EmbeddingProviderResult,
  DegradationEvent,
  ProviderOptions,
} from './types.js';
