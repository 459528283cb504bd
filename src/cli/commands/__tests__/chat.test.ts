/**
 * Tests for chat command
 *
 * Covers REPL command parsing, the command handlers and question handling.
 * The readline loop itself is not driven here.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import chalk from 'chalk';

import { createChatCommand, handleQuestion, parseREPLCommand, type ChatState } from '../chat.js';
import type { CommandContext } from '../../types.js';
import { ChatSession } from '../../utils/chat-session.js';
import { RAGPipeline } from '../../../pipeline/pipeline.js';
import {
  HashingEmbeddingProvider,
  MemorySource,
  StubGenerator,
  makeDocument,
} from '../../../test-utils/index.js';
import { silentLogger } from '../../../utils/index.js';

describe('chat command', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let generator: StubGenerator;

  function createState(): ChatState {
    generator = new StubGenerator('Bedrock hosts foundation models.');
    const pipeline = new RAGPipeline({
      source: new MemorySource([
        makeDocument('bedrock.txt', 'AWS Bedrock provides foundation models.'),
      ]),
      chunking: { chunkSize: 50, chunkOverlap: 10 },
      embeddingProvider: new HashingEmbeddingProvider({ dimensions: 32 }),
      generator,
      topK: 3,
      logger: silentLogger,
    });
    return { pipeline, session: new ChatSession('grounded', 'session-1') };
  }

  async function runCommand(input: string, state: ChatState): Promise<boolean> {
    const parsed = parseREPLCommand(input);
    if (!parsed) {
      throw new Error(`not a REPL command: ${input}`);
    }
    return parsed.command.handler(parsed.args, state, mockContext);
  }

  beforeEach(() => {
    chalk.level = 0;
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  describe('createChatCommand', () => {
    it('declares its options', () => {
      const cmd = createChatCommand(() => mockContext);

      expect(cmd.name()).toBe('chat');
      expect(cmd.options.map((option) => option.long)).toEqual(['--dir', '--top-k', '--bypass']);
    });
  });

  describe('parseREPLCommand', () => {
    it.each([
      ['exit', 'exit'],
      ['QUIT', 'exit'],
      ['/q', 'exit'],
      ['/help', 'help'],
      ['/?', 'help'],
      ['/m', 'mode'],
      ['/sources', 'sources'],
      ['/history', 'history'],
      ['/clear', 'clear'],
    ])('maps %j to /%s', (input, name) => {
      expect(parseREPLCommand(input)?.command.name).toBe(name);
    });

    it('splits arguments', () => {
      const parsed = parseREPLCommand('  /mode   bypass ');

      expect(parsed?.command.name).toBe('mode');
      expect(parsed?.args).toEqual(['bypass']);
    });

    it('treats other input as a question', () => {
      expect(parseREPLCommand('What is Bedrock?')).toBeNull();
      expect(parseREPLCommand('/unknown')).toBeNull();
      expect(parseREPLCommand('exit now')).toBeNull();
    });
  });

  describe('/mode', () => {
    it('shows the current mode without arguments', async () => {
      const state = createState();

      await runCommand('/mode', state);

      expect(logOutput).toEqual(['Mode: grounded']);
    });

    it('switches to bypass', async () => {
      const state = createState();

      const shouldContinue = await runCommand('/mode bypass', state);

      expect(shouldContinue).toBe(true);
      expect(state.session.mode).toBe('bypass');
      expect(logOutput).toEqual(['✓ Mode: bypass']);
    });

    it('refuses grounded mode until the index is ready', async () => {
      const state = createState();
      state.session.setMode('bypass');

      await runCommand('/mode grounded', state);

      expect(state.session.mode).toBe('bypass');
      expect(logOutput).toEqual([
        'Grounded mode is unavailable: the document index is not ready (state: uninitialized)',
      ]);
    });

    it('rejects unknown modes', async () => {
      const state = createState();

      await runCommand('/mode creative', state);

      expect(state.session.mode).toBe('grounded');
      expect(logOutput).toEqual(['Usage: /mode [grounded|bypass]']);
    });
  });

  describe('handleQuestion', () => {
    it('answers in grounded mode and records the turn', async () => {
      const state = createState();
      await state.pipeline.initialize();

      const result = await handleQuestion('Which service provides foundation models?', state, mockContext);

      expect(result.mode).toBe('grounded');
      expect(result.error).toBeNull();
      expect(state.session.history).toHaveLength(1);
      expect(logOutput.join('\n')).toContain('Bedrock hosts foundation models.');
    });

    it('records failed turns too', async () => {
      const state = createState();

      const result = await handleQuestion('What is Bedrock?', state, mockContext);

      expect(result.error?.message).toBe('The document index is not ready (state: uninitialized)');
      expect(state.session.lastTurn?.result).toBe(result);
      expect(logOutput.join('\n')).toContain('Error (retrieval):');
    });

    it('sends the question straight to the model in bypass mode', async () => {
      const state = createState();
      state.session.setMode('bypass');

      const result = await handleQuestion('Tell me a joke', state, mockContext);

      expect(result.mode).toBe('bypass');
      expect(generator.prompts[0]?.prompt).toBe('Tell me a joke');
    });
  });

  describe('session commands', () => {
    it('/sources shows the last grounded answer in detail', async () => {
      const state = createState();
      await state.pipeline.initialize();
      await handleQuestion('Which service provides foundation models?', state, mockContext);
      logOutput = [];

      await runCommand('/sources', state);

      expect(logOutput[1]).toBe('Sources for: Which service provides foundation models?');
      expect(logOutput[2]).toMatch(/^ {2}\[1\] bedrock\.txt#0 \(\d\.\d{4}\)\n {4}AWS Bedrock provides foundation models\.$/);
    });

    it('/sources says when there is nothing to show', async () => {
      await runCommand('/sources', createState());

      expect(logOutput).toEqual(['No grounded answers yet.']);
    });

    it('/history lists each turn with its mode', async () => {
      const state = createState();
      state.session.setMode('bypass');
      await handleQuestion('First question', state, mockContext);
      logOutput = [];

      await runCommand('/history', state);

      expect(logOutput).toEqual(['', '  ✓ 1. [bypass] First question', '']);
    });

    it('/clear empties the history', async () => {
      const state = createState();
      state.session.setMode('bypass');
      await handleQuestion('First question', state, mockContext);

      await runCommand('/clear', state);

      expect(state.session.history).toEqual([]);
    });

    it('exit stops the REPL', async () => {
      expect(await runCommand('exit', createState())).toBe(false);
    });
  });
});
