/**
 * Direct (bypass) questions
 *
 * Sends the question to the generation model without retrieval. Works
 * whether or not any documents were indexed.
 */

import { createNoopTracer, type Tracer } from '../observability/index.js';
import type { TextGenerator } from '../providers/generation.js';
import { failedResult } from './query-engine.js';
import type { QueryResult } from './types.js';

export interface DirectQueryOptions {
  temperature?: number;
  /** Defaults to the generator's configured system prompt */
  roleInstruction?: string;
  tracer?: Tracer;
  sessionId?: string;
}

/**
 * Ask the model directly. Never throws; failures are reported at the
 * generation stage.
 */
export async function askDirect(
  generator: TextGenerator,
  queryText: string,
  options: DirectQueryOptions = {}
): Promise<QueryResult> {
  const tracer = options.tracer ?? createNoopTracer();
  const trace = tracer.trace({
    name: 'docqa-query',
    input: queryText,
    metadata: { mode: 'bypass' },
    ...(options.sessionId !== undefined && { sessionId: options.sessionId }),
  });
  const generation = trace.generation({
    name: 'answer-generation',
    model: generator.model,
    input: queryText,
  });

  try {
    const answer = await generator.generate(queryText, {
      ...(options.roleInstruction !== undefined && { roleInstruction: options.roleInstruction }),
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
    trace.update({ output: answer.text }).end();

    return {
      query: queryText,
      mode: 'bypass',
      responseText: answer.text,
      sources: [],
      numSources: 0,
      usage: {
        promptTokens: answer.promptTokens,
        responseTokens: answer.responseTokens,
        totalTokens: answer.totalTokens,
      },
      error: null,
    };
  } catch (error) {
    const result = failedResult(queryText, 'bypass', error, 'generation');
    generation.update({ error: String(error) }).end();
    trace.update({ error: `generation: ${result.error?.message ?? 'failed'}` }).end();
    return result;
  }
}
