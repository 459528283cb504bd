/**
 * In-process stand-ins for Bedrock.
 *
 * FakeInvoker replaces the ModelInvoker seam; HashingEmbeddingProvider and
 * StubGenerator replace whole components when a test only cares about the
 * layers above them.
 */

import type { Embedding, EmbedManyOptions, EmbeddingProvider } from '../indexer/embedder/types.js';
import type { Document, DocumentSource } from '../indexer/types.js';
import type { InvokeOptions, ModelInvoker, ModelRequestBody } from '../providers/bedrock.js';
import type {
  GenerateOptions,
  GenerationResult,
  TextGenerator,
} from '../providers/generation.js';
import { mapWithConcurrency } from '../utils/index.js';

// ============================================================================
// DETERMINISTIC EMBEDDINGS
// ============================================================================

/** FNV-1a, 32 bit */
function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words vector: each lower-cased word adds 1 to the slot its hash
 * picks. Texts sharing words have positive cosine similarity.
 */
export function hashEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    const slot = hashToken(token) % dimensions;
    vector[slot] = (vector[slot] ?? 0) + 1;
  }
  return vector;
}

// ============================================================================
// MODEL INVOKER
// ============================================================================

export interface RecordedInvocation {
  modelId: string;
  body: ModelRequestBody;
  options: InvokeOptions;
}

export type InvokeHandler = (modelId: string, body: ModelRequestBody) => unknown;

/**
 * ModelInvoker that records calls and answers through a handler. A handler
 * that throws makes invoke() reject with the same error.
 */
export class FakeInvoker implements ModelInvoker {
  readonly description: string;
  readonly calls: RecordedInvocation[] = [];
  private readonly handler: InvokeHandler;

  constructor(handler: InvokeHandler, description = 'fake') {
    this.handler = handler;
    this.description = description;
  }

  async invoke(modelId: string, body: ModelRequestBody, options: InvokeOptions): Promise<unknown> {
    this.calls.push({ modelId, body, options });
    return this.handler(modelId, body);
  }
}

/**
 * Handler answering Titan requests with hashEmbedding(inputText).
 */
export function titanResponder(dimensions: number): InvokeHandler {
  return (_modelId, body) => {
    const input = body['inputText'];
    return { embedding: hashEmbedding(typeof input === 'string' ? input : '', dimensions) };
  };
}

/**
 * A messages-protocol response body.
 */
export function claudeResponse(text: string, inputTokens = 10, outputTokens = 5): unknown {
  return {
    id: 'msg_test',
    type: 'message',
    role: 'assistant',
    content: [{ type: 'text', text }],
    stop_reason: 'end_turn',
    usage: { input_tokens: inputTokens, output_tokens: outputTokens },
  };
}

// ============================================================================
// EMBEDDING PROVIDER
// ============================================================================

export interface HashingProviderOptions {
  dimensions?: number;
  /** Texts for which a degraded zero vector is returned */
  degradeWhen?: (text: string) => boolean;
  /** Error thrown for texts matching this predicate */
  failWhen?: (text: string) => boolean;
}

/**
 * EmbeddingProvider computing hashEmbedding locally.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly model = 'hashing-test';
  readonly dimensions: number;
  readonly embedded: string[] = [];
  private readonly options: HashingProviderOptions;

  constructor(options: HashingProviderOptions = {}) {
    this.options = options;
    this.dimensions = options.dimensions ?? 64;
  }

  async embed(text: string): Promise<Embedding> {
    this.embedded.push(text);

    if (this.options.failWhen?.(text)) {
      throw new Error(`embedding failed for: ${text}`);
    }
    if (this.options.degradeWhen?.(text)) {
      return {
        kind: 'degraded',
        vector: new Array<number>(this.dimensions).fill(0),
        reason: 'ThrottlingException',
      };
    }
    return { kind: 'real', vector: hashEmbedding(text, this.dimensions) };
  }

  embedMany(texts: readonly string[], options: EmbedManyOptions = {}): Promise<Embedding[]> {
    return mapWithConcurrency(texts, options.concurrency ?? 1, (text) => this.embed(text), {
      signal: options.signal,
      onProgress: options.onProgress,
    });
  }
}

// ============================================================================
// GENERATOR
// ============================================================================

export interface RecordedPrompt {
  prompt: string;
  options: GenerateOptions;
}

/**
 * TextGenerator returning a fixed answer, or rejecting with a fixed error.
 */
export class StubGenerator implements TextGenerator {
  readonly model = 'stub-model';
  readonly prompts: RecordedPrompt[] = [];
  private readonly outcome: GenerationResult | Error;

  constructor(outcome: string | GenerationResult | Error = 'stub answer') {
    this.outcome =
      typeof outcome === 'string'
        ? { text: outcome, promptTokens: 12, responseTokens: 3, totalTokens: 15 }
        : outcome;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    this.prompts.push({ prompt, options });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

// ============================================================================
// DOCUMENTS
// ============================================================================

export function makeDocument(id: string, rawText: string): Document {
  return { id, sourcePath: `/docs/${id}`, extension: 'txt', rawText };
}

/**
 * DocumentSource over documents held in memory.
 */
export class MemorySource implements DocumentSource {
  readonly description = 'memory';
  documents: Document[];
  /** Thrown from load() when set */
  failure: Error | null = null;
  /** [message, context] pairs reported through onWarning */
  warnings: Array<[string, string]> = [];

  constructor(documents: Document[] = []) {
    this.documents = documents;
  }

  async load(onWarning?: (message: string, context?: string) => void): Promise<Document[]> {
    if (this.failure) {
      throw this.failure;
    }
    for (const [message, context] of this.warnings) {
      onWarning?.(message, context);
    }
    return this.documents;
  }
}
