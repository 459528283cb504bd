/**
 * Docs Command
 *
 * Summarizes a documents directory without touching Bedrock:
 *   docqa docs           - The configured documents.directory
 *   docqa docs ./notes   - Another directory
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from '../../config/loader.js';
import { getDirectoryStats } from '../../indexer/loader.js';
import { formatFileSize } from '../../utils/index.js';
import type { CommandContext } from '../types.js';

export function createDocsCommand(getContext: () => CommandContext): Command {
  return new Command('docs')
    .description('Show what a documents directory contains')
    .argument('[dir]', 'Documents directory (defaults to documents.directory)')
    .action(async (dir: string | undefined) => {
      const ctx = getContext();
      const config = loadConfig();
      const directory = dir ?? config.documents.directory;

      ctx.debug(`Scanning ${directory}`);
      const stats = await getDirectoryStats(directory, {
        extensions: config.documents.extensions,
        recursive: config.documents.recursive,
        ignorePatterns: config.documents.ignore_patterns,
      });

      if (ctx.options.json) {
        console.log(JSON.stringify({ directory, ...stats }, null, 2));
        return;
      }

      ctx.log(chalk.bold(directory));
      ctx.log(`  ${chalk.dim('Files:')}       ${stats.fileCount.toLocaleString()}`);
      ctx.log(`  ${chalk.dim('Total size:')}  ${formatFileSize(stats.totalSize)}`);
      ctx.log(`  ${chalk.dim('Documents:')}   ${stats.documentCount.toLocaleString()}`);

      const types = Object.entries(stats.fileTypes).sort(([, a], [, b]) => b - a);
      if (types.length > 0) {
        ctx.log('');
        ctx.log(chalk.dim('  By extension:'));
        for (const [ext, count] of types) {
          ctx.log(`    ${ext.padEnd(10)} ${count}`);
        }
      }

      if (stats.documentCount === 0) {
        ctx.log('');
        ctx.log(
          chalk.yellow(`No ${config.documents.extensions.join('/')} files to index. Run: docqa init`)
        );
      }
    });
}
