/**
 * Agent Types
 *
 * Result shapes returned by the query engine and the pipeline's ask().
 * Every field is plain data so results serialize straight to JSON.
 */

import type { Failure } from '../errors/index.js';

/**
 * grounded: answer from retrieved sources; bypass: ask the model directly.
 */
export type QueryMode = 'grounded' | 'bypass';

/** Where a query failed */
export type QueryStage = 'embedding' | 'retrieval' | 'generation';

export type QueryFailure = Failure<QueryStage>;

export interface TokenUsage {
  promptTokens: number;
  responseTokens: number;
  totalTokens: number;
}

/**
 * A retrieved chunk as shown to the user.
 */
export interface SourceAttribution {
  chunkId: string;
  documentId: string;
  /** Similarity clamped to [0, 1] and rounded to 4 decimal places */
  score: number;
  /** First 150 characters, with "..." when cut */
  textPreview: string;
  fullText: string;
  /** The chunk's embedding was a zero vector */
  degraded: boolean;
}

/**
 * Outcome of one question. Exactly one of responseText and error is non-null.
 */
export interface QueryResult {
  query: string;
  mode: QueryMode;
  responseText: string | null;
  sources: SourceAttribution[];
  /** Always sources.length */
  numSources: number;
  usage: TokenUsage | null;
  error: QueryFailure | null;
}
