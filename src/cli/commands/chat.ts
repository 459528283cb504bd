/**
 * Chat Command
 *
 * Interactive REPL over one documents directory. The directory is indexed
 * once at startup; each line is then answered in the session's mode.
 *
 *   docqa chat                  # grounded answers from ./data
 *   docqa chat --dir ./notes    # another directory
 *   docqa chat --bypass         # start in bypass mode, skip indexing
 *
 * REPL Commands:
 *   /help      - Show available commands
 *   /mode X    - Switch between grounded and bypass answers
 *   /sources   - Show the sources of the last grounded answer in full
 *   /history   - List the questions asked so far
 *   /clear     - Clear the session history
 *   exit       - Exit the chat
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { QueryMode, QueryResult } from '../../agent/types.js';
import type { RAGPipeline } from '../../pipeline/pipeline.js';
import type { CommandContext } from '../types.js';
import { ChatSession } from '../utils/chat-session.js';
import { formatQueryResult, formatSources } from '../utils/render.js';
import {
  initializeWithProgress,
  parseTopK,
  setupCommandPipeline,
} from '../utils/pipeline-setup.js';

interface ChatCommandOptions {
  dir?: string;
  topK?: string;
  bypass?: boolean;
}

/**
 * State shared by the REPL loop and command handlers.
 */
export interface ChatState {
  pipeline: RAGPipeline;
  session: ChatSession;
  /** Readline interface for prompt updates (set after REPL starts) */
  rl?: readline.Interface;
}

/**
 * REPL command definition.
 * Handler returns true to continue REPL, false to exit.
 */
interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  usage?: string;
  handler: (args: string[], state: ChatState, ctx: CommandContext) => Promise<boolean>;
}

const MODES: readonly QueryMode[] = ['grounded', 'bypass'];

function isQueryMode(value: string): value is QueryMode {
  return MODES.some((mode) => mode === value);
}

function getPrompt(state: ChatState): string {
  const label = state.session.mode === 'grounded' ? chalk.green('grounded') : chalk.yellow('bypass');
  return `${chalk.dim('[')}${label}${chalk.dim(']')} ${chalk.cyan('>')} `;
}

function updatePrompt(state: ChatState): void {
  if (state.rl) {
    state.rl.setPrompt(getPrompt(state));
  }
}

// ============================================================================
// REPL Commands
// ============================================================================

/**
 * Commands start with "/" except for exit/quit.
 */
export const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: async (_args, _state, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Available Commands:'));
      ctx.log('');
      for (const cmd of REPL_COMMANDS) {
        const aliasStr =
          cmd.aliases.length > 0
            ? chalk.dim(` (${cmd.aliases.map((a) => '/' + a).join(', ')})`)
            : '';
        const usageStr = cmd.usage ? ` ${chalk.cyan(cmd.usage)}` : '';
        ctx.log(`  ${chalk.green('/' + cmd.name)}${usageStr}${aliasStr}`);
        ctx.log(`    ${chalk.dim(cmd.description)}`);
      }
      ctx.log('');
      ctx.log(chalk.dim('Type any other text to ask a question.'));
      ctx.log('');
      return true;
    },
  },
  {
    name: 'mode',
    aliases: ['m'],
    description: 'Show or switch the answer mode',
    usage: '[grounded|bypass]',
    handler: async (args, state, ctx) => {
      const requested = args[0]?.toLowerCase();

      if (requested === undefined) {
        ctx.log(`Mode: ${chalk.cyan(state.session.mode)}`);
        return true;
      }

      if (!isQueryMode(requested)) {
        ctx.log(chalk.yellow('Usage: /mode [grounded|bypass]'));
        return true;
      }

      if (requested === 'grounded' && !state.pipeline.isReady) {
        ctx.log(
          chalk.yellow(
            `Grounded mode is unavailable: the document index is not ready (state: ${state.pipeline.state})`
          )
        );
        return true;
      }

      state.session.setMode(requested);
      updatePrompt(state);
      ctx.log(chalk.green(`✓ Mode: ${requested}`));
      return true;
    },
  },
  {
    name: 'sources',
    aliases: ['s'],
    description: 'Show the sources of the last grounded answer',
    handler: async (_args, state, ctx) => {
      const turn = state.session.lastGroundedTurn;
      if (!turn) {
        ctx.log(chalk.dim('No grounded answers yet.'));
        return true;
      }

      ctx.log('');
      ctx.log(chalk.bold(`Sources for: ${turn.query}`));
      ctx.log(formatSources(turn.result.sources, 'detailed'));
      ctx.log('');
      return true;
    },
  },
  {
    name: 'history',
    aliases: [],
    description: 'List the questions asked in this session',
    handler: async (_args, state, ctx) => {
      const turns = state.session.history;
      if (turns.length === 0) {
        ctx.log(chalk.dim('No questions yet.'));
        return true;
      }

      ctx.log('');
      turns.forEach((turn, i) => {
        const status = turn.result.error ? chalk.red('✗') : chalk.green('✓');
        ctx.log(`  ${status} ${chalk.dim(`${i + 1}. [${turn.mode}]`)} ${turn.query}`);
      });
      ctx.log('');
      return true;
    },
  },
  {
    name: 'clear',
    aliases: ['c'],
    description: 'Clear the session history',
    handler: async (_args, state, ctx) => {
      state.session.clear();
      ctx.log(chalk.green('✓ History cleared'));
      return true;
    },
  },
  {
    name: 'exit',
    aliases: ['quit', 'q'],
    description: 'Exit the chat',
    handler: async (_args, _state, ctx) => {
      ctx.log(chalk.dim('Goodbye!'));
      return false;
    },
  },
];

/**
 * Parse user input to detect REPL commands.
 * Returns null if it's a regular question.
 *
 * @internal Exported for testing purposes
 */
export function parseREPLCommand(
  input: string
): { command: REPLCommand; args: string[] } | null {
  const trimmed = input.trim();

  // "exit" and "quit" work without the slash
  const bare = /^(exit|quit)$/i.test(trimmed) ? 'exit' : null;
  if (!bare && !trimmed.startsWith('/')) {
    return null;
  }

  const parts = bare ? [bare] : trimmed.slice(1).split(/\s+/);
  const cmdName = parts[0]?.toLowerCase() ?? '';
  const args = parts.slice(1);

  const command = REPL_COMMANDS.find(
    (c) => c.name === cmdName || c.aliases.includes(cmdName)
  );

  if (!command) {
    return null; // Unknown command, treat as question
  }

  return { command, args };
}

// ============================================================================
// Questions
// ============================================================================

/**
 * Answer one question in the session's mode and record the turn.
 */
export async function handleQuestion(
  question: string,
  state: ChatState,
  ctx: CommandContext
): Promise<QueryResult> {
  const spinner =
    !ctx.options.json && process.stdout.isTTY ? ora({ text: 'Thinking...', color: 'cyan' }).start() : null;

  let result: QueryResult;
  try {
    result = await state.pipeline.ask(question, {
      mode: state.session.mode,
      sessionId: state.session.id,
    });
  } finally {
    spinner?.stop();
  }

  state.session.record(result);

  if (ctx.options.json) {
    console.log(JSON.stringify(result));
  } else {
    ctx.log('');
    ctx.log(formatQueryResult(result));
    ctx.log('');
  }

  return result;
}

function displayWelcome(state: ChatState, ctx: CommandContext): void {
  ctx.log('');
  ctx.log(chalk.bold('docqa chat'));
  if (state.pipeline.isReady) {
    ctx.log(chalk.dim(`${state.pipeline.documents.length} document(s) indexed`));
  }
  ctx.log(chalk.dim('Type /help for commands, exit to quit.'));
  ctx.log('');
}

// ============================================================================
// REPL Loop
// ============================================================================

/**
 * Main REPL loop using readline.
 *
 * Uses the event-based pattern (rl.on('line', ...)) instead of the async
 * iterator; the iterator can end early around awaited model calls.
 */
async function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: getPrompt(state),
    });

    state.rl = rl;

    const handleLine = async (line: string): Promise<void> => {
      const input = line.trim();

      if (!input) {
        rl.prompt();
        return;
      }

      const replCmd = parseREPLCommand(input);
      if (replCmd) {
        try {
          const shouldContinue = await replCmd.command.handler(replCmd.args, state, ctx);
          if (!shouldContinue) {
            rl.close();
            return;
          }
        } catch (error) {
          ctx.error(`Command failed: ${error instanceof Error ? error.message : String(error)}`);
        }
        rl.prompt();
        return;
      }

      try {
        await handleQuestion(input, state, ctx);
      } catch (error) {
        ctx.error(`Failed to process question: ${error instanceof Error ? error.message : String(error)}`);
      }

      rl.prompt();
    };

    // Register all event handlers BEFORE calling prompt()
    rl.on('line', (line) => {
      void handleLine(line);
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    // EOF, pipe closed, or an exit command
    rl.on('close', () => {
      resolve();
    });

    displayWelcome(state, ctx);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive chat about your documents')
    .option('-d, --dir <path>', 'Documents directory (overrides documents.directory)')
    .option('-k, --top-k <number>', 'Number of sources to retrieve')
    .option('--bypass', 'Start in bypass mode without indexing')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();

      const topK = cmdOptions.topK !== undefined ? parseTopK(cmdOptions.topK) : undefined;
      const { pipeline, tracer, reporter } = setupCommandPipeline(ctx, {
        ...(cmdOptions.dir !== undefined && { directory: cmdOptions.dir }),
        ...(topK !== undefined && { topK }),
      });

      const session = new ChatSession(cmdOptions.bypass ? 'bypass' : 'grounded');
      const state: ChatState = { pipeline, session };

      try {
        if (!cmdOptions.bypass) {
          const report = await initializeWithProgress(pipeline, reporter);
          if (report.state !== 'ready') {
            ctx.warn(
              `Grounded mode unavailable: ${report.error?.message ?? `pipeline state is ${report.state}`}`
            );
            if (report.error?.hint) {
              ctx.log(chalk.dim(report.error.hint));
            }
            ctx.log(chalk.dim('Continuing in bypass mode.'));
            session.setMode('bypass');
          }
        }

        await runChatREPL(state, ctx);
      } finally {
        await tracer.shutdown();
      }
    });
}
