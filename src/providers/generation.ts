/**
 * Generation Client
 *
 * Sends a prompt plus a role instruction to Claude on Bedrock through the
 * Anthropic messages protocol and returns the answer with token usage.
 *
 * The client does not know whether a prompt is grounded or a direct
 * question; callers build the prompt and choose the role instruction.
 */

import { z } from 'zod';

import type { GenerationConfig } from '../config/schema.js';
import { MalformedResponseError, ValidationError } from '../errors/index.js';
import type { ModelInvoker, ModelRequestBody } from './bedrock.js';

// ============================================================================
// TYPES
// ============================================================================

export interface GenerateOptions {
  /** System role text; defaults to the configured system prompt */
  roleInstruction?: string;
  /** Sampling temperature (0-1); defaults to the configured temperature */
  temperature?: number;
}

export interface GenerationResult {
  text: string;
  promptTokens: number;
  responseTokens: number;
  totalTokens: number;
}

/**
 * Anything that can answer a prompt. The query engine and the pipeline
 * depend on this, not on Bedrock.
 */
export interface TextGenerator {
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<GenerationResult>;
}

/**
 * Request body of the Anthropic messages protocol on Bedrock
 */
export interface MessagesRequestBody extends ModelRequestBody {
  anthropic_version: string;
  system: string;
  messages: Array<{
    role: 'user';
    content: Array<{ type: 'text'; text: string }>;
  }>;
  max_tokens: number;
  temperature: number;
  top_p: number;
}

/**
 * Fields of the response that are required. Anything else is ignored.
 */
export const MessagesResponseSchema = z.object({
  content: z
    .array(z.object({ type: z.string().optional(), text: z.string() }))
    .nonempty('content must contain at least one text block'),
  usage: z.object({
    input_tokens: z.number().int().nonnegative(),
    output_tokens: z.number().int().nonnegative(),
  }),
});

// ============================================================================
// CLIENT
// ============================================================================

export class BedrockGenerationClient implements TextGenerator {
  private readonly invoker: ModelInvoker;
  private readonly settings: GenerationConfig;

  constructor(invoker: ModelInvoker, settings: GenerationConfig) {
    this.invoker = invoker;
    this.settings = settings;
  }

  get model(): string {
    return this.settings.model;
  }

  /**
   * Build the request body for a prompt.
   *
   * @throws ValidationError for an empty prompt or a temperature outside [0, 1]
   */
  buildRequest(prompt: string, options: GenerateOptions = {}): MessagesRequestBody {
    if (prompt.trim() === '') {
      throw new ValidationError('Prompt must not be empty');
    }

    const temperature = options.temperature ?? this.settings.temperature;
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
      throw new ValidationError(`Invalid temperature: ${temperature}`, [
        'temperature must be between 0 and 1',
      ]);
    }

    return {
      anthropic_version: this.settings.anthropic_version,
      system: options.roleInstruction ?? this.settings.system_prompt,
      messages: [
        {
          role: 'user',
          content: [{ type: 'text', text: prompt }],
        },
      ],
      max_tokens: this.settings.max_tokens,
      temperature,
      top_p: this.settings.top_p,
    };
  }

  /**
   * Generate an answer.
   *
   * @throws ValidationError for invalid input
   * @throws ConnectivityError once the SDK's retries or the deadline run out
   * @throws ConfigurationError for credential or model-access problems
   * @throws MalformedResponseError when text or usage is missing
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const body = this.buildRequest(prompt, options);
    const raw = await this.invoker.invoke(this.settings.model, body, {
      timeoutMs: this.settings.timeout_ms,
    });

    return parseGenerationResponse(raw, this.settings.model);
  }
}

/**
 * Validate a messages-protocol response and extract text and token counts.
 *
 * @throws MalformedResponseError listing every missing or mistyped field
 */
export function parseGenerationResponse(raw: unknown, model: string): GenerationResult {
  const result = MessagesResponseSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new MalformedResponseError(`Unexpected response from ${model}`, issues);
  }

  const { content, usage } = result.data;

  return {
    text: content[0].text,
    promptTokens: usage.input_tokens,
    responseTokens: usage.output_tokens,
    totalTokens: usage.input_tokens + usage.output_tokens,
  };
}
