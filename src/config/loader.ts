/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.docqa)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import {
  ConfigSchema,
  PartialConfigSchema,
  type Config,
  type PartialConfig,
} from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getDocqaDir, getConfigPath } from './paths.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Ensure the ~/.docqa directory exists
 */
function ensureDocqaDir(): void {
  const dir = getDocqaDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Merge sparse user settings over the defaults, section by section.
 */
export function mergeConfig(base: Config, override: PartialConfig): Config {
  return {
    aws: { ...base.aws, ...override.aws },
    generation: { ...base.generation, ...override.generation },
    embedding: { ...base.embedding, ...override.embedding },
    chunking: { ...base.chunking, ...override.chunking },
    search: { ...base.search, ...override.search },
    documents: {
      ...base.documents,
      ...override.documents,
      extensions: override.documents?.extensions ?? base.documents.extensions,
      ignore_patterns: override.documents?.ignore_patterns ?? base.documents.ignore_patterns,
    },
    observability: { ...base.observability, ...override.observability },
  };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Parse and validate TOML text into a full Config.
 *
 * @param content - Raw TOML
 * @param source - Where the text came from, used in error messages
 * @throws ConfigurationError on bad syntax or invalid values
 */
export function parseConfig(content: string, source: string = 'config.toml'): Config {
  let parsed: TOML.JsonMap;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigurationError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${source} or run: docqa config reset --force`
    );
  }

  // Validate against the partial schema (allows missing fields)
  const partial = PartialConfigSchema.safeParse(parsed);

  if (!partial.success) {
    throw new ConfigurationError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      'Run: docqa config reset --force  to restore defaults'
    );
  }

  // Cross-field rules only make sense on the merged result
  const merged = ConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial.data));

  if (!merged.success) {
    throw new ConfigurationError(
      `Invalid configuration:\n${formatIssues(merged.error.issues)}`,
      `Fix the values in ${source}`
    );
  }

  return merged.data;
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the template on first run
 * @throws ConfigurationError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureDocqaDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  return parseConfig(fs.readFileSync(configPath, 'utf-8'), configPath);
}

/**
 * Walk a dot-notation path through nested objects.
 */
function lookup(source: unknown, key: string): unknown {
  let current: unknown = source;

  for (const part of key.split('.')) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    current = Object.entries(current).find(([name]) => name === part)?.[1];
  }

  return current;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('embedding.model') => 'amazon.titan-embed-text-v1'
 */
export function getConfigValue(key: string): unknown {
  return lookup(loadConfig(), key);
}

function isTable(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file after validating the result
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part !== '');
  const leaf = parts.pop();

  if (leaf === undefined) {
    throw new ConfigurationError(
      'Invalid config key: empty key',
      'Run: docqa config list  to see available keys'
    );
  }

  if (lookup(DEFAULT_CONFIG, key) === undefined && !isOptionalKey(key)) {
    throw new ConfigurationError(
      `Unknown config key: ${key}`,
      'Run: docqa config list  to see available keys'
    );
  }

  const configPath = getConfigPath();
  ensureDocqaDir();

  let config: TOML.JsonMap = {};
  if (fs.existsSync(configPath)) {
    config = TOML.parse(fs.readFileSync(configPath, 'utf-8'));
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isTable(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }

  current[leaf] = Array.isArray(lookup(DEFAULT_CONFIG, key))
    ? parseListValue(value)
    : parseValue(value);

  const tomlContent = TOML.stringify(config);

  try {
    parseConfig(tomlContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Invalid value for '${key}': ${message}`,
      'Run: docqa config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, tomlContent, 'utf-8');
}

/** Keys that have no default but may be set */
const OPTIONAL_KEYS = new Set([
  'embedding.dimensions',
  'embedding.fallback_model',
  'embedding.fallback_region',
  'observability.langfuse_public_key',
  'observability.langfuse_secret_key',
]);

export function isOptionalKey(key: string): boolean {
  return OPTIONAL_KEYS.has(key);
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Parse a comma-separated list ("txt, md") into strings
 */
function parseListValue(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * List all config values in a flat format
 * Returns entries like ['search.top_k', 3]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: object, prefix = ''): void {
    const fields: Array<[string, unknown]> = Object.entries(obj);
    for (const [key, value] of fields) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        flatten(value, fullKey);
      } else if (value !== undefined) {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}

/**
 * Delete the config file and write a fresh template.
 */
export function resetConfig(): void {
  const configPath = getConfigPath();
  if (fs.existsSync(configPath)) {
    fs.unlinkSync(configPath);
  }
  loadConfig(true);
}
