#!/usr/bin/env node
/**
 * docqa CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createCheckCommand } from './commands/check.js';
import { createConfigCommand } from './commands/config.js';
import { createDocsCommand } from './commands/docs.js';
import { createInitCommand } from './commands/init.js';
import { handleError, createGlobalErrorHandler, ValidationError } from '../errors/index.js';

const VERSION = process.env['DOCQA_VERSION'] ?? '0.1.0';

const program = new Command();

program
  .name('docqa')
  .description('Ask questions about your documents, answered by AWS Bedrock')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('docqa init')}                          Write the config and a sample document
  ${chalk.cyan('docqa ask "What is AWS Bedrock?"')}    Answer from ./data
  ${chalk.cyan('docqa ask "Hello" --bypass')}          Ask the model without retrieval
  ${chalk.cyan('docqa chat --dir ./notes')}            Interactive chat over ./notes
  ${chalk.cyan('docqa check --probe')}                 Verify credentials and Bedrock access
  ${chalk.cyan('docqa config set search.top_k 5')}     Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

// ============================================================================
// COMMANDS
// ============================================================================

program.addCommand(createInitCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createDocsCommand(getContext));
program.addCommand(createCheckCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new ValidationError(`Unknown command: ${operands[0] ?? ''}`, [
    'Run: docqa --help  to see available commands',
  ]);
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
