/**
 * Titan Embedding Provider
 *
 * Embeds text through a ModelInvoker using one of the Titan request shapes.
 * Transient failures have already been retried by the SDK by the time they
 * reach this class; whatever still fails with a ConnectivityError becomes a
 * degraded zero vector.
 */

import { z } from 'zod';

import {
  ConnectivityError,
  MalformedResponseError,
  ValidationError,
} from '../../errors/index.js';
import type { ModelInvoker } from '../../providers/bedrock.js';
import { consoleLogger, mapWithConcurrency, truncateText, type Logger } from '../../utils/index.js';
import { buildEmbeddingRequest, type EmbeddingModelSpec } from './models.js';
import type {
  DegradationEvent,
  EmbedManyOptions,
  Embedding,
  EmbeddingProvider,
} from './types.js';

const TitanResponseSchema = z.object({
  embedding: z.array(z.number()),
});

/** Text sent when verifying that a backend works */
export const PROBE_TEXT = 'This is a test sentence.';

export interface TitanProviderOptions {
  /** Deadline per embedding call, retries included */
  timeoutMs: number;
  logger?: Logger;
  onDegraded?: (event: DegradationEvent) => void;
}

/**
 * Zero vector of the given size, tagged with why it was produced.
 */
export function degradedEmbedding(dimensions: number, reason: string): Embedding {
  return { kind: 'degraded', vector: new Array<number>(dimensions).fill(0), reason };
}

export class TitanEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  private readonly invoker: ModelInvoker;
  private readonly spec: EmbeddingModelSpec;
  private readonly options: TitanProviderOptions;
  private readonly logger: Logger;

  constructor(invoker: ModelInvoker, spec: EmbeddingModelSpec, options: TitanProviderOptions) {
    this.invoker = invoker;
    this.spec = spec;
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
    this.name = `${spec.modelId} via ${invoker.description}`;
  }

  get model(): string {
    return this.spec.modelId;
  }

  get dimensions(): number {
    return this.spec.dimensions;
  }

  /**
   * Embed without the degraded fallback: every failure propagates.
   * Used to probe a backend before committing to it.
   *
   * @throws ValidationError | ConnectivityError | ConfigurationError | MalformedResponseError
   */
  async embedStrict(text: string): Promise<number[]> {
    if (text.trim() === '') {
      throw new ValidationError('Cannot embed empty text');
    }

    const raw = await this.invoker.invoke(
      this.spec.modelId,
      buildEmbeddingRequest(this.spec, text),
      { timeoutMs: this.options.timeoutMs }
    );

    const parsed = TitanResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Unexpected embedding response from ${this.spec.modelId}`,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }

    const vector = parsed.data.embedding;
    if (vector.length !== this.spec.dimensions) {
      throw new MalformedResponseError(
        `Embedding from ${this.spec.modelId} has ${vector.length} dimensions`,
        [`embedding: expected ${this.spec.dimensions} values`]
      );
    }

    return vector;
  }

  /**
   * Verify the backend answers with a well-formed vector.
   */
  async probe(): Promise<void> {
    await this.embedStrict(PROBE_TEXT);
  }

  async embed(text: string): Promise<Embedding> {
    try {
      return { kind: 'real', vector: await this.embedStrict(text) };
    } catch (error) {
      if (!(error instanceof ConnectivityError)) {
        throw error;
      }

      const reason = error.reason ?? error.message;
      this.logger.warn(
        `Embedding degraded to a zero vector (${this.spec.modelId}): ${error.message}`
      );
      this.options.onDegraded?.({
        model: this.spec.modelId,
        reason,
        textPreview: truncateText(text, 60),
      });

      return degradedEmbedding(this.spec.dimensions, reason);
    }
  }

  embedMany(texts: readonly string[], options: EmbedManyOptions = {}): Promise<Embedding[]> {
    return mapWithConcurrency(texts, options.concurrency ?? 1, (text) => this.embed(text), {
      signal: options.signal,
      onProgress: options.onProgress,
    });
  }
}
