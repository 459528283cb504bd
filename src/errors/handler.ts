/**
 * Error handler for CLI error formatting and display
 *
 * This module provides:
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode for debugging with stack traces
 * - Conversion of thrown values into structured failure records
 */

import chalk from 'chalk';
import { QueryError, RAGError, type ErrorKind } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  kind?: ErrorKind;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Structured description of a failed step, carried by results instead of
 * being thrown across the public API.
 */
export interface Failure<TStage extends string = string> {
  /** Where the failure happened (e.g. 'embedding', 'generation') */
  stage: TStage;
  kind: ErrorKind;
  message: string;
  hint?: string;
}

/**
 * Normalize any thrown value into a RAGError.
 *
 * Unknown throwables become QueryError so a caller always has a kind.
 */
export function toRAGError(error: unknown): RAGError {
  if (error instanceof RAGError) {
    return error;
  }
  if (error instanceof Error) {
    return new QueryError(error.message, error);
  }
  return new QueryError(String(error));
}

/**
 * Build a failure record for a stage from any thrown value.
 */
export function toFailure<TStage extends string>(
  error: unknown,
  stage: TStage
): Failure<TStage> {
  const normalized = toRAGError(error);
  return {
    stage,
    kind: normalized.kind,
    message: normalized.message,
    ...(normalized.hint !== undefined && { hint: normalized.hint }),
  };
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof RAGError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        kind: error.kind,
        code: error.code,
        hint: error.hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    } else {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    return lines.join('\n');
  }

  // Strings, numbers and other throwables
  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error.
 *
 * RAGError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof RAGError) {
    return error.code;
  }
  return 1;
}

/** Exit code per failure kind, matching the error classes' codes */
const FAILURE_EXIT_CODES: Record<ErrorKind, number> = {
  configuration: 2,
  no_data: 4,
  connectivity: 5,
  malformed_response: 6,
  query: 7,
  validation: 1,
  cancelled: 130,
};

/**
 * Exit code for a failure carried in a result.
 */
export function getFailureExitCode(failure: Pick<Failure, 'kind'>): number {
  return FAILURE_EXIT_CODES[failure.kind];
}

/**
 * Format an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a handler suitable for process 'uncaughtException' and
 * 'unhandledRejection' events.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
