/**
 * Pipeline Setup for Commands
 *
 * Shared by `ask` and `chat`: load config, build the tracer and pipeline,
 * and run ingestion with progress output and Ctrl+C cancellation.
 */

import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { ValidationError } from '../../errors/index.js';
import { createTracer, type Tracer } from '../../observability/index.js';
import { createPipeline } from '../../pipeline/factory.js';
import type { RAGPipeline } from '../../pipeline/pipeline.js';
import type { InitializeReport } from '../../pipeline/types.js';
import type { CommandContext } from '../types.js';
import {
  attachProgressReporter,
  createProgressReporter,
  type ProgressReporter,
} from './progress.js';

/** Largest --top-k accepted on the command line */
export const MAX_TOP_K = 100;

export interface CommandPipeline {
  config: Config;
  pipeline: RAGPipeline;
  tracer: Tracer;
  /** null in --json mode */
  reporter: ProgressReporter | null;
}

export interface CommandPipelineOptions {
  directory?: string;
  topK?: number;
}

/**
 * Parse and validate a --top-k value.
 */
export function parseTopK(value: string): number {
  const topK = Number(value);
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    throw new ValidationError(`Invalid --top-k value: ${value}`, [
      `Use a whole number between 1 and ${MAX_TOP_K}`,
    ]);
  }
  return topK;
}

export function setupCommandPipeline(
  ctx: CommandContext,
  options: CommandPipelineOptions = {}
): CommandPipeline {
  const config = loadConfig();
  const tracer = createTracer(config.observability, ctx);
  const reporter = ctx.options.json ? null : createProgressReporter({ verbose: ctx.options.verbose });

  const pipeline = createPipeline(config, {
    ...(options.directory !== undefined && { directory: options.directory }),
    ...(options.topK !== undefined && { topK: options.topK }),
    tracer,
    logger: ctx,
    onStatus: (message) => (reporter ? reporter.status(message) : ctx.debug(message)),
  });

  ctx.debug(`Documents: ${options.directory ?? config.documents.directory}`);
  ctx.debug(`Generation model: ${config.generation.model}`);

  return { config, pipeline, tracer, reporter };
}

/**
 * Run `fn` with an AbortSignal that fires on Ctrl+C.
 */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    return await fn(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

/**
 * Load, chunk, embed and index, one step at a time.
 *
 * @throws The failing step's RAGError
 */
export async function ingestDocuments(
  pipeline: RAGPipeline,
  reporter: ProgressReporter | null
): Promise<void> {
  const detach = reporter ? attachProgressReporter(pipeline, reporter) : null;

  try {
    await withInterrupt(async (signal) => {
      const loaded = await pipeline.loadDocuments();
      if (!loaded.ok) throw loaded.error;

      const built = await pipeline.buildIndex(signal);
      if (!built.ok) throw built.error;

      const engine = pipeline.createQueryEngine();
      if (!engine.ok) throw engine.error;
    });
  } catch (error) {
    reporter?.fail('Could not build the document index');
    throw error;
  } finally {
    detach?.();
  }
}

/**
 * Run the whole initialization and report it; never throws.
 */
export async function initializeWithProgress(
  pipeline: RAGPipeline,
  reporter: ProgressReporter | null
): Promise<InitializeReport> {
  const detach = reporter ? attachProgressReporter(pipeline, reporter) : null;

  try {
    const report = await withInterrupt((signal) => pipeline.initialize(signal));
    reporter?.showSummary(report);
    return report;
  } finally {
    detach?.();
  }
}
