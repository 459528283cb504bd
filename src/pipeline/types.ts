/**
 * Pipeline Types
 */

import type { QueryMode } from '../agent/types.js';
import type { Failure } from '../errors/index.js';
import type { ChunkOptions } from '../indexer/chunker/config.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import type { DocumentSource } from '../indexer/types.js';
import type { Tracer } from '../observability/index.js';
import type { TextGenerator } from '../providers/generation.js';
import type { Logger } from '../utils/index.js';

/**
 * Lifecycle of a pipeline. Moves strictly forward; any failing step moves
 * to 'failed', and only reset() leaves it.
 */
export type PipelineState =
  | 'uninitialized'
  | 'documents_loaded'
  | 'indexed'
  | 'ready'
  | 'failed';

/** Units of work reported through stage events */
export type PipelineStage = 'loading' | 'chunking' | 'embedding' | 'indexing';

/** The public steps initialize() runs, in order */
export type PipelineStep = 'loadDocuments' | 'buildIndex' | 'createQueryEngine';

export interface StageStats {
  stage: PipelineStage;
  /** Items the stage produced (documents, chunks, embeddings, index entries) */
  count: number;
  durationMs: number;
}

/**
 * Type-safe event map for RAGPipeline.
 */
export interface PipelineEvents {
  state: [state: PipelineState, previous: PipelineState];
  'stage:start': [stage: PipelineStage, total: number];
  progress: [stage: PipelineStage, processed: number, total: number];
  'stage:complete': [stage: PipelineStage, stats: StageStats];
  degraded: [chunkId: string, reason: string];
  warning: [message: string, context?: string];
}

/**
 * Outcome of initialize().
 */
export interface InitializeReport {
  state: PipelineState;
  documents: number;
  chunks: number;
  /** Chunks whose embedding is a zero vector */
  degradedChunks: number;
  durationMs: number;
  /** The step that stopped the sequence, if any */
  error: Failure<PipelineStep> | null;
}

export interface RAGPipelineOptions {
  source: DocumentSource;
  chunking: ChunkOptions;

  /**
   * The embedding provider, or a factory called on the first buildIndex().
   * A factory keeps backend selection (and its probe) off the bypass path.
   */
  embeddingProvider: EmbeddingProvider | (() => Promise<EmbeddingProvider>);

  generator: TextGenerator;

  /** Default number of chunks retrieved per question */
  topK: number;

  /**
   * Embedding requests in flight during buildIndex().
   * @default 1
   */
  embeddingConcurrency?: number;

  /** Retrieve chunks with degraded embeddings */
  includeDegraded?: boolean;

  tracer?: Tracer;
  logger?: Logger;
}

export interface AskOptions {
  /** @default 'grounded' */
  mode?: QueryMode;
  topK?: number;
  temperature?: number;
  sessionId?: string;
}
