/**
 * Configuration Schema
 *
 * Defines the shape of ~/.docqa/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Regions known to host both the Titan embedding and Claude models.
 * Other regions are accepted but reported by `docqa check`.
 */
export const SUPPORTED_REGIONS = [
  'us-east-1',
  'us-west-2',
  'eu-west-1',
  'eu-central-1',
  'ap-southeast-1',
  'ap-northeast-1',
] as const;

/**
 * AWS connection settings
 */
export const AwsConfigSchema = z.object({
  region: z.string().min(1).describe('AWS region for Bedrock calls'),
});

/**
 * Answer generation (Claude on Bedrock)
 */
export const GenerationConfigSchema = z.object({
  model: z.string().min(1).describe('Bedrock model id of the generation model'),
  max_tokens: z
    .number()
    .int()
    .min(1)
    .max(100000)
    .describe('Maximum tokens in a generated answer'),
  temperature: z
    .number()
    .min(0)
    .max(1)
    .describe('Default sampling temperature (0-1)'),
  top_p: z.number().min(0).max(1).describe('Nucleus sampling cutoff (0-1)'),
  anthropic_version: z.string().min(1).describe('Messages protocol version sent to Bedrock'),
  system_prompt: z.string().min(1).describe('Role instruction used for bypass questions'),
  max_retries: z
    .number()
    .int()
    .min(1)
    .max(20)
    .describe('Total attempts per generation request (SDK standard retry mode)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Deadline for one generation call in milliseconds'),
});

/**
 * Titan v2 output sizes
 */
export const TitanV2DimensionsSchema = z.union([
  z.literal(256),
  z.literal(512),
  z.literal(1024),
]);

/**
 * Embedding settings (Titan on Bedrock)
 */
export const EmbeddingConfigSchema = z.object({
  model: z.string().min(1).describe('Bedrock model id of the embedding model'),
  dimensions: TitanV2DimensionsSchema.optional().describe(
    'Vector size for Titan v2 (256, 512 or 1024)'
  ),
  normalize: z.boolean().describe('Ask Titan v2 for unit-length vectors'),
  fallback_model: z
    .string()
    .optional()
    .describe('Model used with the default AWS credential chain if the primary fails'),
  fallback_region: z.string().optional().describe('Region for the fallback backend'),
  max_retries: z
    .number()
    .int()
    .min(1)
    .max(20)
    .describe('Total attempts per embedding request (SDK standard retry mode)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Deadline for one embedding call in milliseconds'),
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(64)
    .describe('Embedding requests in flight during ingestion'),
  cache: z.boolean().describe('Reuse embeddings of identical text within a session'),
  verify_on_startup: z
    .boolean()
    .describe('Probe the primary backend before use and fall back if it fails'),
});

/**
 * Document chunking
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(1).describe('Characters per chunk'),
  chunk_overlap: z.number().int().min(0).describe('Characters shared by consecutive chunks'),
});

/**
 * Retrieval
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of chunks retrieved per question'),
  include_degraded: z
    .boolean()
    .describe('Retrieve chunks whose embedding fell back to a zero vector'),
});

/**
 * Document discovery
 */
export const DocumentsConfigSchema = z.object({
  directory: z.string().min(1).describe('Directory holding the documents'),
  extensions: z
    .array(z.string().min(1))
    .min(1)
    .describe('File extensions to load, without the dot'),
  recursive: z.boolean().describe('Descend into subdirectories'),
  ignore_patterns: z
    .array(z.string())
    .describe('Additional gitignore-style patterns to skip'),
});

/**
 * Langfuse tracing
 */
export const ObservabilityConfigSchema = z.object({
  enabled: z.boolean().describe('Send traces to Langfuse when keys are present'),
  langfuse_host: z.string().url().describe('Langfuse base URL'),
  langfuse_public_key: z.string().optional(),
  langfuse_secret_key: z.string().optional(),
});

/**
 * Object shape of config.toml (before cross-field checks)
 */
export const ConfigObjectSchema = z.object({
  aws: AwsConfigSchema,
  generation: GenerationConfigSchema,
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  search: SearchConfigSchema,
  documents: DocumentsConfigSchema,
  observability: ObservabilityConfigSchema,
});

/**
 * Root configuration schema, including rules that span fields
 */
export const ConfigSchema = ConfigObjectSchema.superRefine((config, ctx) => {
  if (config.chunking.chunk_overlap >= config.chunking.chunk_size) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'chunk_overlap'],
      message: `chunk_overlap (${config.chunking.chunk_overlap}) must be smaller than chunk_size (${config.chunking.chunk_size})`,
    });
  }
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigObjectSchema>;

export type AwsConfig = Config['aws'];
export type GenerationConfig = Config['generation'];
export type EmbeddingConfig = Config['embedding'];
export type ChunkingConfig = Config['chunking'];
export type SearchConfig = Config['search'];
export type DocumentsConfig = Config['documents'];
export type ObservabilityConfig = Config['observability'];

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigObjectSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
