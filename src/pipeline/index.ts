/**
 * Pipeline Module
 *
 * The orchestrator tying loading, chunking, embedding, indexing and
 * answering together.
 */

export { RAGPipeline } from './pipeline.js';
export { createPipeline, type PipelineFactoryOptions } from './factory.js';
export type {
  AskOptions,
  InitializeReport,
  PipelineEvents,
  PipelineStage,
  PipelineState,
  PipelineStep,
  RAGPipelineOptions,
  StageStats,
} from './types.js';
