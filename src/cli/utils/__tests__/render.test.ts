import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';

import type { QueryResult, SourceAttribution } from '../../../agent/types.js';
import { formatQueryResult, formatSource, formatSources, formatUsage } from '../render.js';

const guide: SourceAttribution = {
  chunkId: 'guide.md#0',
  documentId: 'guide.md',
  score: 0.8123,
  textPreview: 'Bedrock  offers\nfoundation models',
  fullText: 'Bedrock  offers\nfoundation models through one API.',
  degraded: false,
};

const faq: SourceAttribution = {
  chunkId: 'faq.md#4',
  documentId: 'faq.md',
  score: 0.441,
  textPreview: 'Pricing is per request.',
  fullText: 'Pricing is per request.',
  degraded: true,
};

function groundedResult(overrides: Partial<QueryResult> = {}): QueryResult {
  return {
    query: 'What does Bedrock offer?',
    mode: 'grounded',
    responseText: 'Bedrock offers foundation models.',
    sources: [guide],
    numSources: 1,
    usage: { promptTokens: 812, responseTokens: 41, totalTokens: 853 },
    error: null,
    ...overrides,
  };
}

describe('render', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe('formatSource', () => {
    it('prints position, chunk id and score on one line', () => {
      expect(formatSource(guide, 1)).toBe('[1] guide.md#0 (0.8123)');
    });

    it('flags degraded sources', () => {
      expect(formatSource(faq, 2)).toBe('[2] faq.md#4 (0.4410) [degraded]');
    });

    it('adds a whitespace-collapsed preview in detailed style', () => {
      expect(formatSource(guide, 1, 'detailed')).toBe(
        '[1] guide.md#0 (0.8123)\n    Bedrock offers foundation models'
      );
    });
  });

  describe('formatSources', () => {
    it('numbers sources from 1', () => {
      expect(formatSources([guide, faq])).toBe(
        '  [1] guide.md#0 (0.8123)\n  [2] faq.md#4 (0.4410) [degraded]'
      );
    });

    it('says so when there are none', () => {
      expect(formatSources([])).toBe('No sources');
    });
  });

  it('formatUsage totals the token counts', () => {
    expect(formatUsage({ promptTokens: 10, responseTokens: 5, totalTokens: 15 })).toBe(
      'Tokens: 10 prompt + 5 response = 15'
    );
  });

  describe('formatQueryResult', () => {
    it('renders answer, sources and usage for a grounded result', () => {
      expect(formatQueryResult(groundedResult())).toBe(
        [
          'Bedrock offers foundation models.',
          '',
          'Sources:',
          '  [1] guide.md#0 (0.8123)',
          '',
          'Tokens: 812 prompt + 41 response = 853',
        ].join('\n')
      );
    });

    it('omits the sources section in bypass mode', () => {
      const result = groundedResult({ mode: 'bypass', sources: [], numSources: 0 });

      expect(formatQueryResult(result, { showUsage: false })).toBe(
        'Bedrock offers foundation models.'
      );
    });

    it('renders the failing stage and hint for an error', () => {
      const result = groundedResult({
        responseText: null,
        sources: [],
        numSources: 0,
        usage: null,
        error: {
          stage: 'generation',
          kind: 'connectivity',
          message: 'Bedrock unavailable',
          hint: 'Check your network',
        },
      });

      expect(formatQueryResult(result)).toBe(
        'Error (generation): Bedrock unavailable\nHint: Check your network'
      );
    });
  });
});
