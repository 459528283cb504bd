/**
 * Pipeline Factory
 *
 * Wires a RAGPipeline from configuration: a directory document source,
 * the Bedrock generation client, and an embedding provider that is chosen
 * (primary or fallback) the first time the index is built.
 */

import type { AwsCredentials } from '../config/env.js';
import { getAwsCredentials } from '../config/env.js';
import type { Config } from '../config/schema.js';
import { createEmbeddingProvider } from '../indexer/embedder/provider.js';
import type { DegradationEvent, EmbeddingProvider } from '../indexer/embedder/types.js';
import { DirectoryDocumentSource } from '../indexer/loader.js';
import type { Tracer } from '../observability/index.js';
import {
  BedrockModelInvoker,
  type BedrockInvokerOptions,
  type ModelInvoker,
} from '../providers/bedrock.js';
import { BedrockGenerationClient } from '../providers/generation.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import { RAGPipeline } from './pipeline.js';

export interface PipelineFactoryOptions {
  /** Documents directory (defaults to documents.directory) */
  directory?: string;
  /** Chunks per question (defaults to search.top_k) */
  topK?: number;
  /**
   * Static AWS credentials. undefined reads the environment; null uses the
   * SDK's default credential chain.
   */
  credentials?: AwsCredentials | null;
  /** Builds model invokers; tests pass a fake */
  createInvoker?: (options: BedrockInvokerOptions) => ModelInvoker;
  tracer?: Tracer;
  logger?: Logger;
  /** Backend selection messages (fallback in use, ...) */
  onStatus?: (message: string) => void;
  onEmbeddingDegraded?: (event: DegradationEvent) => void;
}

/**
 * Build a pipeline from configuration.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const pipeline = createPipeline(config, { directory: './docs', tracer });
 * const report = await pipeline.initialize();
 * ```
 */
export function createPipeline(config: Config, options: PipelineFactoryOptions = {}): RAGPipeline {
  const logger = options.logger ?? consoleLogger;
  const createInvoker =
    options.createInvoker ?? ((invokerOptions) => new BedrockModelInvoker(invokerOptions));
  const credentials =
    options.credentials === undefined ? getAwsCredentials() : options.credentials;

  const generator = new BedrockGenerationClient(
    createInvoker({
      region: config.aws.region,
      credentials,
      maxAttempts: config.generation.max_retries,
      requestTimeoutMs: config.generation.timeout_ms,
    }),
    config.generation
  );

  const source = new DirectoryDocumentSource(options.directory ?? config.documents.directory, {
    extensions: config.documents.extensions,
    recursive: config.documents.recursive,
    ignorePatterns: config.documents.ignore_patterns,
  });

  const embeddingProvider = async (): Promise<EmbeddingProvider> => {
    const result = await createEmbeddingProvider(config.embedding, {
      region: config.aws.region,
      credentials,
      createInvoker,
      logger,
      ...(options.onStatus && { onProgress: options.onStatus }),
      ...(options.onEmbeddingDegraded && { onDegraded: options.onEmbeddingDegraded }),
    });
    logger.debug?.(
      `Embedding backend: ${result.model} (${result.dimensions} dimensions, ${result.backend})`
    );
    return result.provider;
  };

  return new RAGPipeline({
    source,
    chunking: {
      chunkSize: config.chunking.chunk_size,
      chunkOverlap: config.chunking.chunk_overlap,
    },
    embeddingProvider,
    generator,
    topK: options.topK ?? config.search.top_k,
    embeddingConcurrency: config.embedding.concurrency,
    includeDegraded: config.search.include_degraded,
    logger,
    ...(options.tracer && { tracer: options.tracer }),
  });
}
