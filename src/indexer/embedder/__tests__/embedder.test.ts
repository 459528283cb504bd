/**
 * Embedder Tests
 *
 * embedChunks orchestration and the caching wrapper, using in-process
 * providers.
 */

import { describe, it, expect, vi } from 'vitest';

import { OperationCancelledError } from '../../../errors/index.js';
import { HashingEmbeddingProvider, hashEmbedding } from '../../../test-utils/index.js';
import type { Chunk } from '../../chunker/types.js';
import { CachedEmbeddingProvider } from '../cached.js';
import { embedChunks } from '../embedder.js';

function makeChunk(index: number, text: string): Chunk {
  return {
    id: `doc.txt#${index}`,
    documentId: 'doc.txt',
    index,
    text,
    startOffset: index * 10,
    endOffset: index * 10 + text.length,
  };
}

describe('embedChunks', () => {
  it('pairs every chunk with its embedding in chunk order', async () => {
    const provider = new HashingEmbeddingProvider({ dimensions: 16 });
    const chunks = [makeChunk(0, 'alpha beta'), makeChunk(1, 'gamma'), makeChunk(2, 'delta')];

    const result = await embedChunks(chunks, provider, { concurrency: 3 });

    expect(result.degradedCount).toBe(0);
    expect(result.chunks.map((e) => e.chunk.id)).toEqual(['doc.txt#0', 'doc.txt#1', 'doc.txt#2']);
    expect(result.chunks[1]?.embedding).toEqual({
      kind: 'real',
      vector: hashEmbedding('gamma', 16),
    });
  });

  it('counts and reports degraded chunks', async () => {
    const provider = new HashingEmbeddingProvider({
      dimensions: 8,
      degradeWhen: (text) => text.includes('throttled'),
    });
    const onDegraded = vi.fn();

    const result = await embedChunks(
      [makeChunk(0, 'fine'), makeChunk(1, 'throttled text')],
      provider,
      { onDegraded }
    );

    expect(result.degradedCount).toBe(1);
    expect(result.chunks[1]?.embedding.kind).toBe('degraded');
    expect(onDegraded).toHaveBeenCalledOnce();
    expect(onDegraded).toHaveBeenCalledWith('doc.txt#1', 'ThrottlingException');
  });

  it('reports progress for each chunk', async () => {
    const provider = new HashingEmbeddingProvider();
    const onProgress = vi.fn();

    await embedChunks([makeChunk(0, 'a'), makeChunk(1, 'b')], provider, { onProgress });

    expect(onProgress).toHaveBeenLastCalledWith(2, 2);
    expect(onProgress).toHaveBeenCalledTimes(2);
  });

  it('returns nothing for no chunks without calling the provider', async () => {
    const provider = new HashingEmbeddingProvider();

    await expect(embedChunks([], provider)).resolves.toEqual({ chunks: [], degradedCount: 0 });
    expect(provider.embedded).toEqual([]);
  });

  it('throws when cancelled before starting', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      embedChunks([makeChunk(0, 'a')], new HashingEmbeddingProvider(), {
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('propagates provider failures', async () => {
    const provider = new HashingEmbeddingProvider({ failWhen: () => true });

    await expect(embedChunks([makeChunk(0, 'a')], provider)).rejects.toThrow(
      'embedding failed for: a'
    );
  });
});

describe('CachedEmbeddingProvider', () => {
  it('returns the identical vector for repeated text with one backend call', async () => {
    const inner = new HashingEmbeddingProvider({ dimensions: 8 });
    const cached = new CachedEmbeddingProvider(inner);

    const first = await cached.embed('same text');
    const second = await cached.embed('same text');

    expect(second).toEqual(first);
    expect(inner.embedded).toEqual(['same text']);
    expect(cached.size).toBe(1);
  });

  it('shares one call between concurrent requests for the same text', async () => {
    const inner = new HashingEmbeddingProvider({ dimensions: 8 });
    const cached = new CachedEmbeddingProvider(inner);

    const results = await cached.embedMany(['x', 'x', 'x'], { concurrency: 3 });

    expect(results).toHaveLength(3);
    expect(inner.embedded).toEqual(['x']);
  });

  it('hands out copies so callers cannot change cached vectors', async () => {
    const inner = new HashingEmbeddingProvider({ dimensions: 8 });
    const cached = new CachedEmbeddingProvider(inner);
    const expected = (await inner.embed('stable text')).vector;

    const first = await cached.embed('stable text');
    first.vector.fill(42);
    const [second, third] = await Promise.all([
      cached.embed('stable text'),
      cached.embed('stable text'),
    ]);
    second.vector.fill(7);

    expect(third.vector).toEqual(expected);
    expect((await cached.embed('stable text')).vector).toEqual(expected);
  });

  it('never caches degraded embeddings', async () => {
    const inner = new HashingEmbeddingProvider({ degradeWhen: () => true });
    const cached = new CachedEmbeddingProvider(inner);

    await cached.embed('flaky');
    await cached.embed('flaky');

    expect(inner.embedded).toEqual(['flaky', 'flaky']);
    expect(cached.size).toBe(0);
  });

  it('evicts the least recently used entry when full', async () => {
    const inner = new HashingEmbeddingProvider();
    const cached = new CachedEmbeddingProvider(inner, 2);

    await cached.embed('a');
    await cached.embed('b');
    await cached.embed('a'); // hit, refreshes 'a'
    await cached.embed('c'); // evicts 'b'
    await cached.embed('a'); // still cached
    await cached.embed('b'); // recomputed

    expect(inner.embedded).toEqual(['a', 'b', 'c', 'b']);
  });

  it('exposes the wrapped provider metadata', () => {
    const cached = new CachedEmbeddingProvider(new HashingEmbeddingProvider({ dimensions: 32 }));

    expect(cached.model).toBe('hashing-test');
    expect(cached.dimensions).toBe(32);
    expect(cached.name).toBe('hashing');
  });
});
