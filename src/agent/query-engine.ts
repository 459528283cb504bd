/**
 * Query Engine
 *
 * Answers one question from the vector index:
 *
 * ```
 * question
 *   │
 *   ├── embed (EmbeddingProvider)        stage: embedding
 *   ├── rank top-k (VectorIndex)         stage: retrieval
 *   ├── buildGroundedPrompt
 *   └── generate (TextGenerator)         stage: generation
 *   ▼
 * QueryResult (answer + source attributions + token usage)
 * ```
 *
 * query() never throws. Every failure is returned as a QueryResult whose
 * error names the stage, and a failed query leaves nothing behind for the
 * next one.
 */

import {
  ConnectivityError,
  NoDataError,
  ValidationError,
  toFailure,
} from '../errors/index.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import { createNoopTracer, type TraceHandle, type Tracer } from '../observability/index.js';
import type { TextGenerator } from '../providers/generation.js';
import type { ScoredChunk } from '../search/types.js';
import type { VectorIndex } from '../search/vector-index.js';
import { truncateText } from '../utils/index.js';
import { buildGroundedPrompt, GROUNDED_ROLE_INSTRUCTION } from './prompt.js';
import type {
  QueryMode,
  QueryResult,
  QueryStage,
  SourceAttribution,
} from './types.js';

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * A QueryResult describing a failure at the given stage.
 */
export function failedResult(
  query: string,
  mode: QueryMode,
  error: unknown,
  stage: QueryStage
): QueryResult {
  return {
    query,
    mode,
    responseText: null,
    sources: [],
    numSources: 0,
    usage: null,
    error: toFailure(error, stage),
  };
}

/**
 * Clamp to [0, 1] and round to 4 decimal places.
 */
export function normalizeScore(score: number): number {
  const clamped = Math.min(1, Math.max(0, score));
  return Math.round(clamped * 10000) / 10000;
}

export function toSourceAttribution(hit: ScoredChunk): SourceAttribution {
  return {
    chunkId: hit.chunk.id,
    documentId: hit.chunk.documentId,
    score: normalizeScore(hit.score),
    textPreview: truncateText(hit.chunk.text),
    fullText: hit.chunk.text,
    degraded: hit.degraded,
  };
}

// ============================================================================
// QUERY ENGINE
// ============================================================================

export interface QueryEngineOptions {
  embeddingProvider: EmbeddingProvider;
  /** null until an index has been built; queries then fail at retrieval */
  index: VectorIndex | null;
  generator: TextGenerator;
  /** Chunks retrieved per question */
  topK: number;
  /** Rank chunks whose embedding is a zero vector (default: false) */
  includeDegraded?: boolean;
  tracer?: Tracer;
}

export interface QueryOptions {
  /** Overrides the engine's topK for this question */
  topK?: number;
  /** Overrides the configured sampling temperature */
  temperature?: number;
  /** Groups traces of one chat session */
  sessionId?: string;
}

export class QueryEngine {
  private readonly options: QueryEngineOptions;
  private readonly tracer: Tracer;

  /**
   * @throws ValidationError when topK is not a positive integer
   */
  constructor(options: QueryEngineOptions) {
    if (!Number.isInteger(options.topK) || options.topK < 1) {
      throw new ValidationError(`Invalid topK: ${options.topK}`, [
        'topK must be an integer of at least 1',
      ]);
    }
    this.options = options;
    this.tracer = options.tracer ?? createNoopTracer();
  }

  get topK(): number {
    return this.options.topK;
  }

  get hasIndex(): boolean {
    return this.options.index !== null;
  }

  /**
   * Answer a question from the indexed documents.
   *
   * @example
   * ```typescript
   * const result = await engine.query('What is AWS Bedrock?');
   * if (result.error) {
   *   console.error(`${result.error.stage}: ${result.error.message}`);
   * } else {
   *   console.log(result.responseText, result.sources);
   * }
   * ```
   */
  async query(queryText: string, options: QueryOptions = {}): Promise<QueryResult> {
    const topK = options.topK ?? this.options.topK;
    const trace = this.tracer.trace({
      name: 'docqa-query',
      input: queryText,
      metadata: { topK, mode: 'grounded' },
      ...(options.sessionId !== undefined && { sessionId: options.sessionId }),
    });

    const fail = (error: unknown, stage: QueryStage): QueryResult => {
      const result = failedResult(queryText, 'grounded', error, stage);
      trace.update({ error: `${stage}: ${result.error?.message ?? 'failed'}` }).end();
      return result;
    };

    const { index } = this.options;
    if (index === null) {
      return fail(
        new NoDataError('The vector index has not been built', 'Load documents and build the index first'),
        'retrieval'
      );
    }

    // Retrieval: embed the question, then rank
    const retrieval = trace.span({ name: 'retrieval', input: queryText, metadata: { topK } });
    let hits: ScoredChunk[];

    try {
      const embedding = await this.options.embeddingProvider.embed(queryText);
      if (embedding.kind === 'degraded') {
        throw new ConnectivityError(
          `Could not embed the question (${embedding.reason})`,
          embedding.reason
        );
      }

      try {
        hits = index.query(embedding.vector, topK, {
          includeDegraded: this.options.includeDegraded ?? false,
        });
      } catch (error) {
        retrieval.update({ error: String(error) }).end();
        return fail(error, 'retrieval');
      }
    } catch (error) {
      retrieval.update({ error: String(error) }).end();
      return fail(error, 'embedding');
    }

    if (hits.length === 0) {
      retrieval.update({ output: [] }).end();
      return fail(
        new NoDataError(
          'No retrievable chunks: every indexed chunk has a degraded embedding',
          'Rebuild the index once Bedrock is reachable, or set search.include_degraded = true'
        ),
        'retrieval'
      );
    }

    retrieval
      .update({ output: hits.map((hit) => ({ chunkId: hit.chunk.id, score: hit.score })) })
      .end();

    return this.generate(queryText, hits, options, trace, fail);
  }

  private async generate(
    queryText: string,
    hits: ScoredChunk[],
    options: QueryOptions,
    trace: TraceHandle,
    fail: (error: unknown, stage: QueryStage) => QueryResult
  ): Promise<QueryResult> {
    const { generator } = this.options;
    const prompt = buildGroundedPrompt(queryText, hits);

    const generation = trace.generation({
      name: 'answer-generation',
      model: generator.model,
      input: prompt,
      ...(options.temperature !== undefined && {
        modelParameters: { temperature: options.temperature },
      }),
    });

    try {
      const answer = await generator.generate(prompt, {
        roleInstruction: GROUNDED_ROLE_INSTRUCTION,
        ...(options.temperature !== undefined && { temperature: options.temperature }),
      });

      generation
        .update({
          output: answer.text,
          usage: {
            input: answer.promptTokens,
            output: answer.responseTokens,
            total: answer.totalTokens,
          },
        })
        .end();

      const sources = hits.map(toSourceAttribution);
      trace.update({ output: answer.text, metadata: { numSources: sources.length } }).end();

      return {
        query: queryText,
        mode: 'grounded',
        responseText: answer.text,
        sources,
        numSources: sources.length,
        usage: {
          promptTokens: answer.promptTokens,
          responseTokens: answer.responseTokens,
          totalTokens: answer.totalTokens,
        },
        error: null,
      };
    } catch (error) {
      generation.update({ error: String(error) }).end();
      return fail(error, 'generation');
    }
  }
}
