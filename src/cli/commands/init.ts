/**
 * Init Command
 *
 * First-run setup: writes ~/.docqa/config.toml (if missing) and a sample
 * document so `docqa ask` has something to answer from.
 *
 *   docqa init           - Use documents.directory
 *   docqa init ./notes   - Use ./notes and save it as documents.directory
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig, setConfigValue } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { createSampleDocument } from '../../indexer/loader.js';
import type { CommandContext } from '../types.js';

export interface InitResult {
  configPath: string;
  configCreated: boolean;
  directory: string;
  /** null when sample.txt already existed */
  samplePath: string | null;
}

/**
 * Create the config file and the sample document.
 */
export function initWorkspace(dir?: string): InitResult {
  const configPath = getConfigPath();
  const configCreated = !existsSync(configPath);
  const config = loadConfig(true);

  const directory = dir !== undefined ? resolve(dir) : config.documents.directory;
  if (dir !== undefined) {
    setConfigValue('documents.directory', directory);
  }

  const samplePath = createSampleDocument(directory);

  return { configPath, configCreated, directory, samplePath };
}

export function createInitCommand(getContext: () => CommandContext): Command {
  return new Command('init')
    .description('Create the config file and a sample document')
    .argument('[dir]', 'Documents directory to set up')
    .action((dir: string | undefined) => {
      const ctx = getContext();
      const result = initWorkspace(dir);

      if (ctx.options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      ctx.log(
        result.configCreated
          ? `${chalk.green('✓')} Created ${chalk.cyan(result.configPath)}`
          : `${chalk.dim('•')} Using ${chalk.cyan(result.configPath)}`
      );
      ctx.log(
        result.samplePath
          ? `${chalk.green('✓')} Wrote ${chalk.cyan(result.samplePath)}`
          : `${chalk.dim('•')} Sample document already present in ${chalk.cyan(result.directory)}`
      );
      ctx.log('');
      ctx.log(`Try: ${chalk.cyan('docqa ask "What is AWS Bedrock?"')}`);
    });
}
