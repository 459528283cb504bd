/**
 * RAG Pipeline
 *
 * Owns one document collection from loading to answering:
 *
 * ```
 * uninitialized ──loadDocuments──▶ documents_loaded ──buildIndex──▶ indexed
 *                                                                     │
 *                       ready ◀────────────createQueryEngine──────────┘
 *
 * any failing step ──▶ failed          reset() ──▶ uninitialized
 * ```
 *
 * Steps return Result values and never throw. Calling a step from the wrong
 * state, or while another step is running, returns an error without changing
 * state. reset() abandons a running step: its result is discarded when it
 * settles. Progress is published as
 * events so the CLI (or any other caller) decides how to display it.
 */

import { EventEmitter } from 'node:events';

import { askDirect } from '../agent/direct.js';
import { QueryEngine, failedResult } from '../agent/query-engine.js';
import type { QueryResult } from '../agent/types.js';
import {
  NoDataError,
  OperationCancelledError,
  ValidationError,
  toFailure,
  toRAGError,
  type RAGError,
} from '../errors/index.js';
import { chunkDocuments } from '../indexer/chunker/index.js';
import { embedChunks } from '../indexer/embedder/embedder.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import type { Document } from '../indexer/types.js';
import { VectorIndex } from '../search/vector-index.js';
import {
  checkCancelled,
  consoleLogger,
  err,
  ok,
  yieldToEventLoop,
  type Logger,
  type Result,
} from '../utils/index.js';
import type {
  AskOptions,
  InitializeReport,
  PipelineEvents,
  PipelineStage,
  PipelineState,
  PipelineStep,
  RAGPipelineOptions,
} from './types.js';

/**
 * @example
 * ```typescript
 * const pipeline = new RAGPipeline({
 *   source: new DirectoryDocumentSource('./docs'),
 *   chunking: { chunkSize: 512, chunkOverlap: 20 },
 *   embeddingProvider: provider,
 *   generator,
 *   topK: 3,
 * });
 *
 * pipeline.on('progress', (stage, done, total) => console.log(`${stage} ${done}/${total}`));
 *
 * const report = await pipeline.initialize();
 * const answer = await pipeline.ask('What is AWS Bedrock?');
 * ```
 */
export class RAGPipeline extends EventEmitter<PipelineEvents> {
  private readonly options: RAGPipelineOptions;
  private readonly logger: Logger;

  private currentState: PipelineState = 'uninitialized';
  private loadedDocuments: Document[] = [];
  private vectorIndex: VectorIndex | null = null;
  private engine: QueryEngine | null = null;
  private provider: EmbeddingProvider | null = null;
  /** Step currently awaiting work, if any */
  private runningStep: PipelineStep | null = null;
  /** Bumped by reset(); a step started under an older value is stale */
  private generation = 0;

  constructor(options: RAGPipelineOptions) {
    super();
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get documents(): readonly Document[] {
    return this.loadedDocuments;
  }

  get index(): VectorIndex | null {
    return this.vectorIndex;
  }

  get isReady(): boolean {
    return this.currentState === 'ready' && this.engine !== null;
  }

  // ==========================================================================
  // STEPS
  // ==========================================================================

  /**
   * Load documents from the source.
   *
   * Finding no documents is recoverable: the state stays 'uninitialized'.
   */
  async loadDocuments(): Promise<Result<Document[]>> {
    const guard = this.requireState('uninitialized', 'loadDocuments');
    if (guard) return err(guard);

    const token = this.beginStep('loadDocuments');
    const { source } = this.options;
    const startTime = performance.now();
    this.emit('stage:start', 'loading', 0);

    let documents: Document[];
    try {
      documents = await source.load((message, context) => this.warn(message, context));
    } catch (error) {
      if (this.isStale(token)) return err(new OperationCancelledError('Loading'));
      return err(this.fail(error));
    } finally {
      this.endStep(token);
    }

    if (this.isStale(token)) {
      return err(new OperationCancelledError('Loading'));
    }

    this.emit('stage:complete', 'loading', {
      stage: 'loading',
      count: documents.length,
      durationMs: performance.now() - startTime,
    });

    if (documents.length === 0) {
      return err(new NoDataError(`No documents found in ${source.description}`));
    }

    this.loadedDocuments = documents;
    this.setState('documents_loaded');
    return ok(documents);
  }

  /**
   * Chunk, embed and index the loaded documents.
   *
   * A cancelled build commits nothing and leaves the pipeline 'failed'. A
   * build abandoned by reset() commits nothing and leaves the state alone.
   */
  async buildIndex(signal?: AbortSignal): Promise<Result<VectorIndex>> {
    const guard = this.requireState('documents_loaded', 'buildIndex');
    if (guard) return err(guard);

    const token = this.beginStep('buildIndex');
    try {
      checkCancelled(signal, 'Indexing');
      const chunks = this.runStage('chunking', this.loadedDocuments.length, (report) =>
        chunkDocuments(this.loadedDocuments, this.options.chunking, (done, total) =>
          report(done, total)
        )
      );
      if (chunks.length === 0) {
        throw new NoDataError('Chunking produced no chunks');
      }

      await yieldToEventLoop();
      checkCancelled(signal, 'Indexing');
      const provider = await this.resolveProvider();

      const embeddingStart = performance.now();
      this.emit('stage:start', 'embedding', chunks.length);
      const embedded = await embedChunks(chunks, provider, {
        concurrency: this.options.embeddingConcurrency ?? 1,
        signal,
        onProgress: (done, total) => this.emit('progress', 'embedding', done, total),
        onDegraded: (chunkId, reason) => this.emit('degraded', chunkId, reason),
      });
      this.emit('stage:complete', 'embedding', {
        stage: 'embedding',
        count: embedded.chunks.length,
        durationMs: performance.now() - embeddingStart,
      });

      if (embedded.degradedCount > 0) {
        this.warn(
          `${embedded.degradedCount} of ${chunks.length} chunks have degraded embeddings and are excluded from retrieval`,
          provider.model
        );
      }

      checkCancelled(signal, 'Indexing');
      if (this.isStale(token)) {
        return err(new OperationCancelledError('Indexing'));
      }
      const index = this.runStage('indexing', embedded.chunks.length, () =>
        VectorIndex.build(embedded.chunks, { dimensions: provider.dimensions })
      );

      this.vectorIndex = index;
      this.setState('indexed');
      return ok(index);
    } catch (error) {
      if (this.isStale(token)) return err(new OperationCancelledError('Indexing'));
      return err(this.fail(error));
    } finally {
      this.endStep(token);
    }
  }

  /**
   * Create the query engine over the built index.
   *
   * @param topK - Chunks per question (defaults to the pipeline's topK)
   */
  createQueryEngine(topK: number = this.options.topK): Result<QueryEngine> {
    const guard = this.requireState('indexed', 'createQueryEngine');
    if (guard) return err(guard);

    try {
      const engine = new QueryEngine({
        embeddingProvider: this.requireProvider(),
        index: this.vectorIndex,
        generator: this.options.generator,
        topK,
        includeDegraded: this.options.includeDegraded ?? false,
        ...(this.options.tracer && { tracer: this.options.tracer }),
      });
      this.engine = engine;
      this.setState('ready');
      return ok(engine);
    } catch (error) {
      return err(this.fail(error));
    }
  }

  /**
   * Run loadDocuments, buildIndex and createQueryEngine, stopping at the
   * first failure.
   */
  async initialize(signal?: AbortSignal): Promise<InitializeReport> {
    const startTime = performance.now();

    const report = (step: PipelineStep | null, error: RAGError | null): InitializeReport => ({
      state: this.currentState,
      documents: this.loadedDocuments.length,
      chunks: this.vectorIndex?.size ?? 0,
      degradedChunks: this.vectorIndex?.degradedCount ?? 0,
      durationMs: Math.round(performance.now() - startTime),
      error: step && error ? toFailure(error, step) : null,
    });

    const loaded = await this.loadDocuments();
    if (!loaded.ok) return report('loadDocuments', loaded.error);

    const built = await this.buildIndex(signal);
    if (!built.ok) return report('buildIndex', built.error);

    const engine = this.createQueryEngine();
    if (!engine.ok) return report('createQueryEngine', engine.error);

    return report(null, null);
  }

  /**
   * Discard documents, index and engine, and return to 'uninitialized'.
   * The embedding provider is kept.
   */
  reset(): void {
    this.generation++;
    this.runningStep = null;
    this.loadedDocuments = [];
    this.vectorIndex = null;
    this.engine = null;
    this.setState('uninitialized');
  }

  // ==========================================================================
  // QUESTIONS
  // ==========================================================================

  /**
   * Answer a question. Grounded questions need a 'ready' pipeline; bypass
   * questions go straight to the model in any state. Never throws.
   */
  async ask(query: string, options: AskOptions = {}): Promise<QueryResult> {
    const mode = options.mode ?? 'grounded';

    if (mode === 'bypass') {
      return askDirect(this.options.generator, query, {
        ...(options.temperature !== undefined && { temperature: options.temperature }),
        ...(options.sessionId !== undefined && { sessionId: options.sessionId }),
        ...(this.options.tracer && { tracer: this.options.tracer }),
      });
    }

    if (this.currentState !== 'ready' || this.engine === null) {
      return failedResult(
        query,
        'grounded',
        new NoDataError(
          `The document index is not ready (state: ${this.currentState})`,
          'Load documents and build the index first, or ask in bypass mode'
        ),
        'retrieval'
      );
    }

    return this.engine.query(query, {
      ...(options.topK !== undefined && { topK: options.topK }),
      ...(options.temperature !== undefined && { temperature: options.temperature }),
      ...(options.sessionId !== undefined && { sessionId: options.sessionId }),
    });
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private requireState(expected: PipelineState, step: PipelineStep): ValidationError | null {
    if (this.runningStep !== null) {
      return new ValidationError(
        `Cannot run ${step} while ${this.runningStep} is in progress`,
        ['Wait for the running step to finish, or call reset()']
      );
    }
    if (this.currentState === expected) {
      return null;
    }
    return new ValidationError(
      `Cannot run ${step} in state '${this.currentState}' (expected '${expected}')`,
      this.currentState === 'failed' ? ['Call reset() to start over'] : []
    );
  }

  private beginStep(step: PipelineStep): number {
    this.runningStep = step;
    return this.generation;
  }

  private endStep(token: number): void {
    if (!this.isStale(token)) {
      this.runningStep = null;
    }
  }

  private isStale(token: number): boolean {
    return token !== this.generation;
  }

  private setState(next: PipelineState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    this.emit('state', next, previous);
  }

  private fail(error: unknown): RAGError {
    const normalized = toRAGError(error);
    this.logger.debug?.(`Pipeline step failed: ${normalized.message}`);
    this.vectorIndex = null;
    this.engine = null;
    this.setState('failed');
    return normalized;
  }

  private warn(message: string, context?: string): void {
    this.logger.warn(context ? `${message} (${context})` : message);
    this.emit('warning', message, context);
  }

  private runStage<T>(
    stage: PipelineStage,
    total: number,
    work: (report: (processed: number, total: number) => void) => T
  ): T {
    const startTime = performance.now();
    this.emit('stage:start', stage, total);
    const result = work((processed, count) => this.emit('progress', stage, processed, count));
    this.emit('stage:complete', stage, {
      stage,
      count: countOf(result, total),
      durationMs: performance.now() - startTime,
    });
    return result;
  }

  private async resolveProvider(): Promise<EmbeddingProvider> {
    if (this.provider) {
      return this.provider;
    }
    const { embeddingProvider } = this.options;
    this.provider =
      typeof embeddingProvider === 'function' ? await embeddingProvider() : embeddingProvider;
    return this.provider;
  }

  private requireProvider(): EmbeddingProvider {
    if (!this.provider) {
      throw new ValidationError('No embedding provider: build the index first');
    }
    return this.provider;
  }
}

function countOf(value: unknown, fallback: number): number {
  if (Array.isArray(value)) {
    return value.length;
  }
  if (value instanceof VectorIndex) {
    return value.size;
  }
  return fallback;
}
