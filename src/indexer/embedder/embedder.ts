/**
 * Embedder Orchestration
 *
 * Turns Chunk[] into EmbeddedChunk[] for the vector index. Embeddings run
 * through the provider's bounded worker pool; results keep chunk order, so
 * the output matches what sequential embedding would produce.
 */

import { checkCancelled } from '../../utils/index.js';
import type { Chunk } from '../chunker/types.js';
import type { EmbedChunksResult, EmbedderOptions, EmbeddingProvider } from './types.js';

/**
 * Compute an embedding for every chunk.
 *
 * @example
 * ```typescript
 * const chunks = chunkDocuments(documents, { chunkSize: 512, chunkOverlap: 20 });
 * const { chunks: embedded, degradedCount } = await embedChunks(chunks, provider, {
 *   concurrency: 8,
 *   onProgress: (done, total) => console.log(`${done}/${total} chunks embedded`),
 * });
 * ```
 *
 * @throws OperationCancelledError if the signal aborts
 * @throws ConfigurationError | MalformedResponseError from the provider
 */
export async function embedChunks(
  chunks: readonly Chunk[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<EmbedChunksResult> {
  const { concurrency = 1, signal, onProgress, onDegraded } = options;

  checkCancelled(signal, 'Embedding');

  if (chunks.length === 0) {
    return { chunks: [], degradedCount: 0 };
  }

  const embeddings = await provider.embedMany(
    chunks.map((chunk) => chunk.text),
    { concurrency, signal, onProgress }
  );

  let degradedCount = 0;
  const embedded = chunks.map((chunk, i) => {
    const embedding = embeddings[i];
    if (embedding === undefined) {
      throw new Error(`Missing embedding for chunk ${chunk.id}`);
    }

    if (embedding.kind === 'degraded') {
      degradedCount++;
      onDegraded?.(chunk.id, embedding.reason);
    }

    return { chunk, embedding };
  });

  return { chunks: embedded, degradedCount };
}
