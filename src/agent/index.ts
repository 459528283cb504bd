/**
 * Agent Module
 *
 * Turns questions into answers: grounded answers through the query engine,
 * direct answers through askDirect.
 *
 * @example
 * ```typescript
 * import { QueryEngine } from './agent/index.js';
 *
 * const engine = new QueryEngine({ embeddingProvider, index, generator, topK: 3 });
 * const result = await engine.query('What is AWS Bedrock?');
 * ```
 */

export {
  QueryEngine,
  failedResult,
  normalizeScore,
  toSourceAttribution,
  type QueryEngineOptions,
  type QueryOptions,
} from './query-engine.js';

export { askDirect, type DirectQueryOptions } from './direct.js';

export { buildGroundedPrompt, escapeXml, GROUNDED_ROLE_INSTRUCTION } from './prompt.js';

export type {
  QueryMode,
  QueryStage,
  QueryFailure,
  QueryResult,
  SourceAttribution,
  TokenUsage,
} from './types.js';
