/**
 * Caching Embedding Provider
 *
 * Wraps a provider so identical text embeds to the identical vector within a
 * session without a second backend call. Only real embeddings are cached; a
 * degraded result is returned but the next call tries the backend again.
 *
 * Every caller gets its own copy of the vector, so mutating a result leaves
 * the cache (and any index built from earlier results) untouched.
 */

import { mapWithConcurrency } from '../../utils/index.js';
import type { EmbedManyOptions, Embedding, EmbeddingProvider } from './types.js';

export const DEFAULT_CACHE_SIZE = 10_000;

export class CachedEmbeddingProvider implements EmbeddingProvider {
  private readonly provider: EmbeddingProvider;
  private readonly maxSize: number;
  private readonly cache = new Map<string, number[]>();
  private readonly pending = new Map<string, Promise<Embedding>>();

  constructor(provider: EmbeddingProvider, maxSize: number = DEFAULT_CACHE_SIZE) {
    this.provider = provider;
    this.maxSize = maxSize;
  }

  get name(): string {
    return this.provider.name;
  }

  get model(): string {
    return this.provider.model;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  /** Number of cached vectors */
  get size(): number {
    return this.cache.size;
  }

  async embed(text: string): Promise<Embedding> {
    const cached = this.cache.get(text);
    if (cached) {
      // Refresh recency
      this.cache.delete(text);
      this.cache.set(text, cached);
      return { kind: 'real', vector: [...cached] };
    }

    // Concurrent requests for the same text share one backend call
    const inFlight = this.pending.get(text);
    if (inFlight) {
      return copyEmbedding(await inFlight);
    }

    const request = this.provider.embed(text);
    this.pending.set(text, request);

    try {
      const embedding = await request;
      if (embedding.kind === 'real') {
        this.store(text, [...embedding.vector]);
      }
      return copyEmbedding(embedding);
    } finally {
      this.pending.delete(text);
    }
  }

  embedMany(texts: readonly string[], options: EmbedManyOptions = {}): Promise<Embedding[]> {
    return mapWithConcurrency(texts, options.concurrency ?? 1, (text) => this.embed(text), {
      signal: options.signal,
      onProgress: options.onProgress,
    });
  }

  clear(): void {
    this.cache.clear();
  }

  private store(text: string, vector: number[]): void {
    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(text, vector);
  }
}

function copyEmbedding(embedding: Embedding): Embedding {
  return { ...embedding, vector: [...embedding.vector] };
}
