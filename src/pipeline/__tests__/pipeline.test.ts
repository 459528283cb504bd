import { describe, it, expect, vi } from 'vitest';
import { OperationCancelledError, ValidationError } from '../../errors/index.js';
import type { EmbeddingProvider } from '../../indexer/embedder/types.js';
import {
  HashingEmbeddingProvider,
  MemorySource,
  StubGenerator,
  makeDocument as doc,
} from '../../test-utils/index.js';
import { silentLogger } from '../../utils/index.js';
import { RAGPipeline } from '../pipeline.js';
import type { PipelineStage, PipelineState, RAGPipelineOptions } from '../types.js';

function createTestPipeline(overrides: Partial<RAGPipelineOptions> = {}) {
  const source = new MemorySource([doc('bedrock.txt', 'AWS Bedrock provides foundation models.')]);
  const generator = new StubGenerator('Bedrock hosts foundation models.');
  const provider = new HashingEmbeddingProvider({ dimensions: 64 });
  const pipeline = new RAGPipeline({
    source,
    chunking: { chunkSize: 50, chunkOverlap: 10 },
    embeddingProvider: provider,
    generator,
    topK: 3,
    logger: silentLogger,
    ...overrides,
  });
  return { pipeline, source, generator, provider };
}

/** A promise the test resolves by hand */
function createGate() {
  let release: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { opened, open: () => release() };
}

function gatedProvider(provider: EmbeddingProvider, gate: { opened: Promise<void> }) {
  return async () => {
    await gate.opened;
    return provider;
  };
}

describe('RAGPipeline', () => {
  describe('initialize', () => {
    it('indexes a single short document as one chunk and answers from it', async () => {
      const { pipeline, generator } = createTestPipeline();

      const report = await pipeline.initialize();

      expect(report).toMatchObject({
        state: 'ready',
        documents: 1,
        chunks: 1,
        degradedChunks: 0,
        error: null,
      });
      expect(report.durationMs).toBeGreaterThanOrEqual(0);

      const result = await pipeline.ask('What is AWS Bedrock?');

      expect(result.error).toBeNull();
      expect(result.responseText).toBe('Bedrock hosts foundation models.');
      expect(result.sources).toHaveLength(1);
      expect(result.sources[0]?.score).toBeGreaterThan(0);
      expect(generator.prompts[0]?.prompt).toContain('AWS Bedrock provides foundation models.');
    });

    it('moves forward through every state', async () => {
      const { pipeline } = createTestPipeline();
      const states: Array<[PipelineState, PipelineState]> = [];
      pipeline.on('state', (state, previous) => states.push([state, previous]));

      await pipeline.initialize();

      expect(states).toEqual([
        ['documents_loaded', 'uninitialized'],
        ['indexed', 'documents_loaded'],
        ['ready', 'indexed'],
      ]);
    });

    it('reports each stage', async () => {
      const { pipeline } = createTestPipeline();
      const started: PipelineStage[] = [];
      const completed: Array<[PipelineStage, number]> = [];
      pipeline.on('stage:start', (stage) => started.push(stage));
      pipeline.on('stage:complete', (stage, stats) => completed.push([stage, stats.count]));

      await pipeline.initialize();

      expect(started).toEqual(['loading', 'chunking', 'embedding', 'indexing']);
      expect(completed).toEqual([
        ['loading', 1],
        ['chunking', 1],
        ['embedding', 1],
        ['indexing', 1],
      ]);
    });

    it('never reaches ready without documents, but still answers in bypass mode', async () => {
      const { pipeline, source } = createTestPipeline();
      source.documents = [];

      const report = await pipeline.initialize();

      expect(report.state).toBe('uninitialized');
      expect(report.documents).toBe(0);
      expect(report.error).toMatchObject({ stage: 'loadDocuments', kind: 'no_data' });
      expect(report.error?.message).toBe('No documents found in memory');

      const grounded = await pipeline.ask('What is AWS Bedrock?');
      expect(grounded.error?.stage).toBe('retrieval');
      expect(grounded.error?.kind).toBe('no_data');
      expect(grounded.responseText).toBeNull();

      const bypass = await pipeline.ask('What is AWS Bedrock?', { mode: 'bypass' });
      expect(bypass.error).toBeNull();
      expect(bypass.mode).toBe('bypass');
      expect(bypass.responseText).toBe('Bedrock hosts foundation models.');
    });

    it('stops at a failing embedding step', async () => {
      const { pipeline } = createTestPipeline({
        embeddingProvider: new HashingEmbeddingProvider({ failWhen: () => true }),
      });

      const report = await pipeline.initialize();

      expect(report.state).toBe('failed');
      expect(report.documents).toBe(1);
      expect(report.chunks).toBe(0);
      expect(report.error?.stage).toBe('buildIndex');
      expect(report.error?.message).toBe(
        'embedding failed for: AWS Bedrock provides foundation models.'
      );
      expect(pipeline.index).toBeNull();
    });

    it('keeps chunks with degraded embeddings out of answers', async () => {
      const { pipeline, source, generator } = createTestPipeline({
        embeddingProvider: new HashingEmbeddingProvider({
          degradeWhen: (text) => text.includes('offline'),
        }),
      });
      source.documents.push(doc('offline.txt', 'This chunk was embedded offline.'));
      const degraded: Array<[string, string]> = [];
      const warnings: string[] = [];
      pipeline.on('degraded', (chunkId, reason) => degraded.push([chunkId, reason]));
      pipeline.on('warning', (message) => warnings.push(message));

      const report = await pipeline.initialize();

      expect(report.state).toBe('ready');
      expect(report.chunks).toBe(2);
      expect(report.degradedChunks).toBe(1);
      expect(degraded).toEqual([['offline.txt#0', 'ThrottlingException']]);
      expect(warnings).toEqual([
        '1 of 2 chunks have degraded embeddings and are excluded from retrieval',
      ]);

      const result = await pipeline.ask('Which chunk was embedded?');
      expect(result.sources.map((source) => source.chunkId)).toEqual(['bedrock.txt#0']);
      expect(generator.prompts[0]?.prompt).not.toContain('This chunk was embedded offline.');
    });

    it('indexes a document with a blank run longer than a chunk', async () => {
      const provider = new HashingEmbeddingProvider({
        failWhen: (text) => text.trim().length === 0,
      });
      const { pipeline, source } = createTestPipeline({
        chunking: { chunkSize: 512, chunkOverlap: 20 },
        embeddingProvider: provider,
      });
      source.documents = [
        doc('gap.txt', 'Intro paragraph.' + '\n'.repeat(1200) + 'Closing paragraph.'),
      ];

      const report = await pipeline.initialize();

      expect(report).toMatchObject({ state: 'ready', chunks: 2, error: null });
      expect(pipeline.index?.get('gap.txt#2')?.chunk.startOffset).toBe(984);
    });

    it('commits nothing when cancelled', async () => {
      const { pipeline } = createTestPipeline();
      const controller = new AbortController();
      controller.abort();

      const report = await pipeline.initialize(controller.signal);

      expect(report.state).toBe('failed');
      expect(report.chunks).toBe(0);
      expect(report.error).toMatchObject({
        stage: 'buildIndex',
        kind: 'cancelled',
        message: 'Indexing cancelled',
      });
    });
  });

  describe('steps', () => {
    it('refuses a step from the wrong state without changing state', async () => {
      const { pipeline } = createTestPipeline();

      const result = await pipeline.buildIndex();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.message).toBe(
          "Cannot run buildIndex in state 'uninitialized' (expected 'documents_loaded')"
        );
      }
      expect(pipeline.state).toBe('uninitialized');
    });

    it('moves to failed when the source fails, and recovers after reset', async () => {
      const { pipeline, source } = createTestPipeline();
      source.failure = new Error('disk unavailable');

      const failed = await pipeline.loadDocuments();
      expect(failed.ok).toBe(false);
      expect(pipeline.state).toBe('failed');

      source.failure = null;
      const refused = await pipeline.loadDocuments();
      expect(refused.ok).toBe(false);
      if (!refused.ok) {
        expect(refused.error.hint).toBe('Issues:\n  Call reset() to start over');
      }

      pipeline.reset();
      expect(pipeline.state).toBe('uninitialized');

      const loaded = await pipeline.loadDocuments();
      expect(loaded.ok).toBe(true);
      expect(pipeline.state).toBe('documents_loaded');
    });

    it('fails createQueryEngine for an invalid topK', async () => {
      const { pipeline } = createTestPipeline();
      await pipeline.loadDocuments();
      await pipeline.buildIndex();

      const result = pipeline.createQueryEngine(0);

      expect(result.ok).toBe(false);
      expect(pipeline.state).toBe('failed');
    });

    it('forwards warnings from the document source', async () => {
      const { pipeline, source } = createTestPipeline();
      source.warnings.push(['Skipping empty document', 'empty.txt']);
      const listener = vi.fn();
      pipeline.on('warning', listener);

      await pipeline.loadDocuments();

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith('Skipping empty document', 'empty.txt');
    });

    it('refuses a second build while one is running', async () => {
      const gate = createGate();
      const provider = new HashingEmbeddingProvider();
      const { pipeline } = createTestPipeline({
        embeddingProvider: gatedProvider(provider, gate),
      });
      await pipeline.loadDocuments();

      const first = pipeline.buildIndex();
      const second = await pipeline.buildIndex();

      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error.message).toBe(
          'Cannot run buildIndex while buildIndex is in progress'
        );
      }

      gate.open();
      expect((await first).ok).toBe(true);
      expect(provider.embedded).toEqual(['AWS Bedrock provides foundation models.']);
      expect(pipeline.state).toBe('indexed');
    });

    it('discards a build that was running when reset was called', async () => {
      const gate = createGate();
      const { pipeline } = createTestPipeline({
        embeddingProvider: gatedProvider(new HashingEmbeddingProvider(), gate),
      });
      await pipeline.loadDocuments();
      const states: PipelineState[] = [];
      pipeline.on('state', (state) => states.push(state));

      const build = pipeline.buildIndex();
      pipeline.reset();
      gate.open();
      const result = await build;

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(OperationCancelledError);
      }
      expect(pipeline.state).toBe('uninitialized');
      expect(pipeline.index).toBeNull();
      expect(pipeline.documents).toEqual([]);
      expect(states).toEqual(['uninitialized']);

      expect((await pipeline.loadDocuments()).ok).toBe(true);
    });

    it('discards documents that finish loading after reset', async () => {
      const gate = createGate();
      const { pipeline, source } = createTestPipeline();
      const load = source.load.bind(source);
      source.load = async (onWarning) => {
        await gate.opened;
        return load(onWarning);
      };

      const loading = pipeline.loadDocuments();
      pipeline.reset();
      gate.open();

      expect((await loading).ok).toBe(false);
      expect(pipeline.state).toBe('uninitialized');
      expect(pipeline.documents).toEqual([]);
    });

    it('discards documents and index on reset', async () => {
      const { pipeline } = createTestPipeline();
      await pipeline.initialize();

      pipeline.reset();

      expect(pipeline.state).toBe('uninitialized');
      expect(pipeline.documents).toEqual([]);
      expect(pipeline.index).toBeNull();
      expect(pipeline.isReady).toBe(false);
      expect((await pipeline.ask('What is AWS Bedrock?')).error?.kind).toBe('no_data');
    });
  });

  describe('embedding provider factory', () => {
    it('is called once, on the first index build', async () => {
      const provider = new HashingEmbeddingProvider();
      const factory = vi.fn(async () => provider);
      const { pipeline } = createTestPipeline({ embeddingProvider: factory });

      await pipeline.ask('hello', { mode: 'bypass' });
      expect(factory).not.toHaveBeenCalled();

      await pipeline.initialize();
      pipeline.reset();
      await pipeline.initialize();

      expect(factory).toHaveBeenCalledOnce();
      expect(pipeline.state).toBe('ready');
    });

    it('fails the build when no backend can be created', async () => {
      const { pipeline } = createTestPipeline({
        embeddingProvider: async () => {
          throw new OperationCancelledError('Backend selection');
        },
      });

      const report = await pipeline.initialize();

      expect(report.state).toBe('failed');
      expect(report.error?.message).toBe('Backend selection cancelled');
    });
  });

  describe('ask', () => {
    it('passes topK and temperature to the query engine', async () => {
      const { pipeline, source, generator } = createTestPipeline();
      source.documents.push(doc('other.txt', 'Models are billed per token.'));
      await pipeline.initialize();

      const result = await pipeline.ask('AWS Bedrock models', { topK: 1, temperature: 0.5 });

      expect(result.numSources).toBe(1);
      expect(generator.prompts[0]?.options.temperature).toBe(0.5);
    });
  });
});
