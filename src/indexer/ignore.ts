/**
 * Gitignore Pattern Handling
 *
 * Decides which files in a documents directory are skipped. Uses the
 * 'ignore' package, which implements the full gitignore spec.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import ignore from 'ignore';

import { DEFAULT_IGNORE_PATTERNS } from './types.js';

export interface IgnoreFilterOptions {
  /** Directory containing the optional .gitignore */
  rootPath: string;

  /** Patterns added after .gitignore (highest priority) */
  additionalPatterns?: string[];
}

/**
 * Returns true when a path (absolute, or relative to the root) is ignored.
 */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Split gitignore content into patterns, dropping blank lines and comments.
 * Negation patterns (leading "!") are kept.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Build an ignore filter from defaults, the root .gitignore and extra patterns.
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({ rootPath: './data', additionalPatterns: ['drafts/'] });
 * shouldIgnore('drafts/notes.md'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [] } = options;
  const ig = ignore().add(DEFAULT_IGNORE_PATTERNS);

  const gitignorePath = join(rootPath, '.gitignore');
  if (existsSync(gitignorePath)) {
    ig.add(parseGitignoreContent(readFileSync(gitignorePath, 'utf-8')));
  }

  if (additionalPatterns.length > 0) {
    ig.add(additionalPatterns);
  }

  return (filePath: string): boolean => {
    let relativePath = filePath.startsWith(rootPath) ? relative(rootPath, filePath) : filePath;

    // 'ignore' expects forward slashes
    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    if (relativePath === '') {
      return false;
    }

    return ig.ignores(relativePath);
  };
}
