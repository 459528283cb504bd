/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.docqa/            (or $DOCQA_HOME)
 * └── config.toml      (User configuration)
 *
 * Paths are resolved on every call so DOCQA_HOME can change between calls
 * (tests point it at a temp directory).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the docqa directory path (~/.docqa unless DOCQA_HOME is set)
 */
export function getDocqaDir(): string {
  const override = process.env['DOCQA_HOME'];
  return override && override.trim() !== '' ? override : join(homedir(), '.docqa');
}

/**
 * Get the config file path (~/.docqa/config.toml)
 */
export function getConfigPath(): string {
  return join(getDocqaDir(), 'config.toml');
}
