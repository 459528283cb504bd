import { describe, it, expect } from 'vitest';
import { createNoopTracer } from '../noop-tracer.js';

describe('NoopTracer', () => {
  it('is local and shared', () => {
    const tracer = createNoopTracer();

    expect(tracer.isRemote).toBe(false);
    expect(createNoopTracer()).toBe(tracer);
  });

  it('hands out the same handles for every trace', () => {
    const tracer = createNoopTracer();
    const first = tracer.trace({ name: 'docqa-query' });
    const second = tracer.trace({ name: 'docqa-ingest', input: 'x', sessionId: 's' });

    expect(second).toBe(first);
    expect(first.traceId).toBeUndefined();
    expect(first.span({ name: 'retrieval' })).toBe(first.generation({ name: 'answer-generation' }));
  });

  it('accepts a full trace lifecycle', async () => {
    const tracer = createNoopTracer();
    const trace = tracer.trace({ name: 'docqa-query' });

    const span = trace.span({ name: 'retrieval' });
    expect(span.update({ output: [] })).toBe(span);
    span.end();

    const generation = trace.generation({ name: 'answer-generation', model: 'm' });
    generation.update({ usage: { input: 1, output: 2, total: 3 }, error: 'failed' });
    generation.end();

    expect(trace.update({ output: 'done' })).toBe(trace);
    trace.end();

    await expect(tracer.flush()).resolves.toBeUndefined();
    await expect(tracer.shutdown()).resolves.toBeUndefined();
  });
});
