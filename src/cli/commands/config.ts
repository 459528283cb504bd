/**
 * Config Command
 *
 * Manages ~/.docqa/config.toml via CLI:
 *   docqa config get <key>          - Get a specific value
 *   docqa config set <key> <value>  - Set a value (lists as "txt,md")
 *   docqa config list               - Show all configuration
 *   docqa config path               - Show config file location
 *   docqa config reset --force      - Restore the template
 *
 * Secret values (the Langfuse secret key) are masked in output.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  getConfigValue,
  isOptionalKey,
  listConfig,
  resetConfig,
  setConfigValue,
} from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { ConfigurationError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

const SECRET_KEYS = new Set(['observability.langfuse_secret_key']);

/**
 * Format a value for display
 */
export function formatConfigValue(key: string, value: unknown): string {
  if (value === undefined) return '(not set)';
  if (SECRET_KEYS.has(key)) return '********';
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(String).join(', ');
  return String(value);
}

function displayValue(key: string, value: unknown): unknown {
  return SECRET_KEYS.has(key) && value !== undefined ? '********' : (value ?? null);
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., docqa config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);

      if (value === undefined && !isOptionalKey(key)) {
        throw new ConfigurationError(
          `Unknown config key: ${key}`,
          'Run: docqa config list  to see available keys'
        );
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value: displayValue(key, value) }));
      } else {
        ctx.log(formatConfigValue(key, value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., docqa config set search.top_k 5)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      setConfigValue(key, value);
      const stored = getConfigValue(key);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: displayValue(key, stored) }));
      } else {
        ctx.log(
          `${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(formatConfigValue(key, stored))}`
        );
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        const obj = Object.fromEntries(entries.map(([key, value]) => [key, displayValue(key, value)]));
        console.log(JSON.stringify(obj, null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));

      // Blank line between sections
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatConfigValue(key, value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      resetConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: getConfigPath() }));
      } else {
        ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
      }
    });

  return configCmd;
}
