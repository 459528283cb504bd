/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `docqa config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  ConfigObjectSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  GenerationConfigSchema,
  SUPPORTED_REGIONS,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  AwsConfig,
  GenerationConfig,
  EmbeddingConfig,
  ChunkingConfig,
  SearchConfig,
  DocumentsConfig,
  ObservabilityConfig,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  parseConfig,
  mergeConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
  isOptionalKey,
} from './loader.js';

// Paths
export { getDocqaDir, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  getAwsCredentials,
  hasAwsCredentials,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, AwsCredentials } from './env.js';
