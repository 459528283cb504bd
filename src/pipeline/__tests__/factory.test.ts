/**
 * Pipeline Factory Tests
 *
 * Runs a configured pipeline end to end against in-process model invokers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { GROUNDED_ROLE_INSTRUCTION } from '../../agent/prompt.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { ConfigurationError } from '../../errors/index.js';
import type { BedrockInvokerOptions } from '../../providers/bedrock.js';
import {
  FakeInvoker,
  claudeResponse,
  titanResponder,
  type InvokeHandler,
} from '../../test-utils/index.js';
import { silentLogger } from '../../utils/index.js';
import { createPipeline } from '../factory.js';

const CREDENTIALS = { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' };

const isTitan = (modelId: string): boolean => modelId.startsWith('amazon.titan');

const healthy: InvokeHandler = (modelId, body) =>
  isTitan(modelId) ? titanResponder(1536)(modelId, body) : claudeResponse('Bedrock answer', 20, 7);

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'docqa-factory-'));
  writeFileSync(join(dir, 'bedrock.txt'), 'AWS Bedrock provides foundation models.');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function recordInvokers(handlers: { primary: InvokeHandler; fallback: InvokeHandler }) {
  const created: BedrockInvokerOptions[] = [];
  const invokers: FakeInvoker[] = [];
  const createInvoker = (options: BedrockInvokerOptions): FakeInvoker => {
    created.push(options);
    const invoker = new FakeInvoker(options.credentials ? handlers.primary : handlers.fallback);
    invokers.push(invoker);
    return invoker;
  };
  return { created, invokers, createInvoker };
}

describe('createPipeline', () => {
  it('answers a grounded question from the documents directory', async () => {
    const { created, invokers, createInvoker } = recordInvokers({
      primary: healthy,
      fallback: healthy,
    });
    const pipeline = createPipeline(DEFAULT_CONFIG, {
      directory: dir,
      credentials: CREDENTIALS,
      createInvoker,
      logger: silentLogger,
    });

    const report = await pipeline.initialize();
    const result = await pipeline.ask('What is AWS Bedrock?');

    expect(report.state).toBe('ready');
    expect(report.chunks).toBe(1);
    expect(result.responseText).toBe('Bedrock answer');
    expect(result.usage).toEqual({ promptTokens: 20, responseTokens: 7, totalTokens: 27 });
    expect(result.sources[0]?.documentId).toBe('bedrock.txt');

    expect(created[0]).toEqual({
      region: 'eu-central-1',
      credentials: CREDENTIALS,
      maxAttempts: 3,
      requestTimeoutMs: 60000,
    });
    const generationCall = invokers[0]?.calls.at(-1);
    expect(generationCall?.modelId).toBe(DEFAULT_CONFIG.generation.model);
    expect(generationCall?.body['system']).toBe(GROUNDED_ROLE_INSTRUCTION);
  });

  it('uses the configured system prompt for bypass questions', async () => {
    const { invokers, createInvoker } = recordInvokers({ primary: healthy, fallback: healthy });
    const pipeline = createPipeline(DEFAULT_CONFIG, {
      directory: dir,
      credentials: CREDENTIALS,
      createInvoker,
      logger: silentLogger,
    });

    const result = await pipeline.ask('Hello?', { mode: 'bypass' });

    expect(result.responseText).toBe('Bedrock answer');
    expect(invokers).toHaveLength(1);
    expect(invokers[0]?.calls[0]?.body['system']).toBe('You are a helpful assistant.');
  });

  it('switches to the fallback embedding backend when the primary is refused', async () => {
    const { createInvoker } = recordInvokers({
      primary: (modelId, body) => {
        if (isTitan(modelId)) {
          throw new ConfigurationError('Access denied to amazon.titan-embed-text-v1');
        }
        return healthy(modelId, body);
      },
      fallback: healthy,
    });
    const onStatus = vi.fn();
    const pipeline = createPipeline(DEFAULT_CONFIG, {
      directory: dir,
      credentials: CREDENTIALS,
      createInvoker,
      logger: silentLogger,
      onStatus,
    });

    const report = await pipeline.initialize();

    expect(report.state).toBe('ready');
    expect(onStatus).toHaveBeenLastCalledWith(
      'Using fallback embedding backend: amazon.titan-embed-text-v1 in eu-central-1'
    );
  });

  it('uses the overridden topK', async () => {
    writeFileSync(join(dir, 'pricing.txt'), 'Bedrock models are billed per token.');
    const { createInvoker } = recordInvokers({ primary: healthy, fallback: healthy });
    const pipeline = createPipeline(DEFAULT_CONFIG, {
      directory: dir,
      topK: 1,
      credentials: CREDENTIALS,
      createInvoker,
      logger: silentLogger,
    });

    await pipeline.initialize();
    const result = await pipeline.ask('What is AWS Bedrock?');

    expect(result.numSources).toBe(1);
  });
});
