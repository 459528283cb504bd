import { describe, it, expect } from 'vitest';
import { StubGenerator } from '../../test-utils/index.js';
import { askDirect } from '../direct.js';

describe('askDirect', () => {
  it('sends the question as-is', async () => {
    const generator = new StubGenerator('Paris.');

    const result = await askDirect(generator, 'Capital of France?', { temperature: 0.2 });

    expect(result).toEqual({
      query: 'Capital of France?',
      mode: 'bypass',
      responseText: 'Paris.',
      sources: [],
      numSources: 0,
      usage: { promptTokens: 12, responseTokens: 3, totalTokens: 15 },
      error: null,
    });
    expect(generator.prompts).toEqual([
      { prompt: 'Capital of France?', options: { temperature: 0.2 } },
    ]);
  });

  it('reports generation failures', async () => {
    const result = await askDirect(new StubGenerator(new Error('denied')), 'hello');

    expect(result.responseText).toBeNull();
    expect(result.error?.stage).toBe('generation');
    expect(result.error?.message).toBe('denied');
  });
});
