/**
 * Embedder Types
 *
 * Type definitions for the embedding generation pipeline.
 */

import type { AwsCredentials } from '../../config/env.js';
import type { BedrockInvokerOptions, ModelInvoker } from '../../providers/bedrock.js';
import type { Logger } from '../../utils/index.js';
import type { Chunk } from '../chunker/types.js';

/**
 * A computed embedding.
 *
 * A degraded embedding is a zero vector of the model's dimension, returned
 * when the backend could not be reached. It is kept distinct so retrieval
 * can exclude it and attributions can flag it.
 */
export type Embedding =
  | { kind: 'real'; vector: number[] }
  | { kind: 'degraded'; vector: number[]; reason: string };

/**
 * Emitted each time an embedding falls back to a zero vector.
 */
export interface DegradationEvent {
  model: string;
  reason: string;
  /** Start of the text that could not be embedded */
  textPreview: string;
}

export interface EmbedManyOptions {
  /**
   * Requests in flight at once.
   * @default 1
   */
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Computes embeddings one text at a time (embed) or as a bounded-concurrency
 * batch whose results keep input order (embedMany).
 */
export interface EmbeddingProvider {
  /** Backend description for logs */
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  /**
   * @throws ValidationError for empty text
   * @throws ConfigurationError or MalformedResponseError; connectivity
   *   failures come back as degraded embeddings instead
   */
  embed(text: string): Promise<Embedding>;

  embedMany(texts: readonly string[], options?: EmbedManyOptions): Promise<Embedding[]>;
}

/**
 * A chunk paired with its embedding, ready for the vector index.
 */
export interface EmbeddedChunk {
  chunk: Chunk;
  embedding: Embedding;
}

/**
 * Options for the embedChunks orchestration function.
 */
export interface EmbedderOptions extends EmbedManyOptions {
  /** Called for every chunk whose embedding came back degraded */
  onDegraded?: (chunkId: string, reason: string) => void;
}

export interface EmbedChunksResult {
  chunks: EmbeddedChunk[];
  degradedCount: number;
}

/**
 * Options for creating an embedding provider.
 */
export interface ProviderOptions {
  /** Region of the primary backend (normally config.aws.region) */
  region: string;

  /**
   * Static credentials for the primary backend.
   * Defaults to the environment (AWS_ACCESS_KEY_ID, ...).
   */
  credentials?: AwsCredentials | null;

  /** Builds the model invoker; tests pass a fake */
  createInvoker?: (options: BedrockInvokerOptions) => ModelInvoker;

  /** Status messages while choosing a backend */
  onProgress?: (status: string) => void;

  /** Called for every degraded embedding the provider returns */
  onDegraded?: (event: DegradationEvent) => void;

  /**
   * Logger for degradation and fallback warnings.
   * Defaults to console logger if not provided.
   */
  logger?: Logger;
}

/**
 * Result from createEmbeddingProvider including metadata about the backend.
 */
export interface EmbeddingProviderResult {
  /** The provider (wrapped with caching when enabled) */
  provider: EmbeddingProvider;
  /** The model actually used (the fallback model when the primary failed) */
  model: string;
  dimensions: number;
  backend: 'primary' | 'fallback';
  /** Why the primary backend was skipped, when the fallback is in use */
  primaryFailure?: string;
}
