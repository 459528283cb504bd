/**
 * Answer Rendering
 *
 * Terminal formatting for query results:
 *
 * ```
 * Bedrock offers foundation models through one API.
 *
 * Sources:
 *   [1] guide.md#0 (0.8123)
 *   [2] faq.md#4 (0.4410) [degraded]
 *
 * Tokens: 812 prompt + 41 response = 853
 * ```
 */

import chalk from 'chalk';

import type { QueryResult, SourceAttribution, TokenUsage } from '../../agent/types.js';
import { formatScore } from '../../utils/index.js';

/**
 * - 'compact': one line per source
 * - 'detailed': adds the text preview under each source
 */
export type SourceStyle = 'compact' | 'detailed';

export interface RenderOptions {
  style?: SourceStyle;
  /** Print token usage (default: true) */
  showUsage?: boolean;
}

/**
 * Format a single source; `position` is 1-based.
 */
export function formatSource(
  source: SourceAttribution,
  position: number,
  style: SourceStyle = 'compact'
): string {
  const flag = source.degraded ? chalk.yellow(' [degraded]') : '';
  const line = `[${position}] ${chalk.cyan(source.chunkId)} ${chalk.dim(`(${formatScore(source.score)})`)}${flag}`;

  if (style === 'compact') {
    return line;
  }

  const preview = source.textPreview.replace(/\s+/g, ' ').trim();
  return `${line}\n    ${chalk.dim(preview)}`;
}

export function formatSources(
  sources: readonly SourceAttribution[],
  style: SourceStyle = 'compact'
): string {
  if (sources.length === 0) {
    return chalk.dim('No sources');
  }
  return sources.map((source, i) => `  ${formatSource(source, i + 1, style)}`).join('\n');
}

export function formatUsage(usage: TokenUsage): string {
  return `Tokens: ${usage.promptTokens} prompt + ${usage.responseTokens} response = ${usage.totalTokens}`;
}

/**
 * Render a successful result, or its error with stage and hint.
 */
export function formatQueryResult(result: QueryResult, options: RenderOptions = {}): string {
  const { style = 'compact', showUsage = true } = options;

  if (result.error) {
    const lines = [chalk.red(`Error (${result.error.stage}): `) + result.error.message];
    if (result.error.hint) {
      lines.push(chalk.dim('Hint: ') + result.error.hint);
    }
    return lines.join('\n');
  }

  const lines: string[] = [result.responseText ?? ''];

  if (result.mode === 'grounded') {
    lines.push('', chalk.bold('Sources:'), formatSources(result.sources, style));
  }

  if (showUsage && result.usage) {
    lines.push('', chalk.dim(formatUsage(result.usage)));
  }

  return lines.join('\n');
}
