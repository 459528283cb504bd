/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  aws: {
    region: 'eu-central-1',
  },

  // Claude 3.5 Sonnet through the Bedrock messages protocol
  generation: {
    model: 'anthropic.claude-3-5-sonnet-20240620-v1:0',
    max_tokens: 5000,
    temperature: 0.1,
    top_p: 0.9,
    anthropic_version: 'bedrock-2023-05-31',
    system_prompt: 'You are a helpful assistant.',
    max_retries: 3,
    timeout_ms: 60000,
  },

  // Titan v1 (1536 dimensions). The fallback uses the same model through the
  // default AWS credential chain, so dimensions always match.
  embedding: {
    model: 'amazon.titan-embed-text-v1',
    normalize: true,
    fallback_model: 'amazon.titan-embed-text-v1',
    max_retries: 10,
    timeout_ms: 60000,
    concurrency: 8,
    cache: true,
    verify_on_startup: true,
  },

  chunking: {
    chunk_size: 512,
    chunk_overlap: 20,
  },

  search: {
    top_k: 3,
    include_degraded: false,
  },

  documents: {
    directory: './data',
    extensions: ['txt', 'md'],
    recursive: false,
    ignore_patterns: [],
  },

  // Langfuse is opt-in: without keys the tracer is a no-op
  observability: {
    enabled: true,
    langfuse_host: 'https://cloud.langfuse.com',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.docqa/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# docqa configuration
# Location: ~/.docqa/config.toml (override the directory with DOCQA_HOME)
#
# AWS credentials are read from the environment or a .env file:
#   AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_SESSION_TOKEN (optional)

[aws]
region = "${DEFAULT_CONFIG.aws.region}"

[generation]
model = "${DEFAULT_CONFIG.generation.model}"
max_tokens = ${DEFAULT_CONFIG.generation.max_tokens}
temperature = ${DEFAULT_CONFIG.generation.temperature}
top_p = ${DEFAULT_CONFIG.generation.top_p}
anthropic_version = "${DEFAULT_CONFIG.generation.anthropic_version}"
system_prompt = "${DEFAULT_CONFIG.generation.system_prompt}"
max_retries = ${DEFAULT_CONFIG.generation.max_retries}
timeout_ms = ${DEFAULT_CONFIG.generation.timeout_ms}

[embedding]
# amazon.titan-embed-text-v1 (1536 dims) or amazon.titan-embed-text-v2:0
model = "${DEFAULT_CONFIG.embedding.model}"
# dimensions = 1024   # Titan v2 only: 256, 512 or 1024
normalize = ${DEFAULT_CONFIG.embedding.normalize}
fallback_model = "${DEFAULT_CONFIG.embedding.fallback_model ?? ''}"
max_retries = ${DEFAULT_CONFIG.embedding.max_retries}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
concurrency = ${DEFAULT_CONFIG.embedding.concurrency}
cache = ${DEFAULT_CONFIG.embedding.cache}
verify_on_startup = ${DEFAULT_CONFIG.embedding.verify_on_startup}

[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[search]
top_k = ${DEFAULT_CONFIG.search.top_k}
include_degraded = ${DEFAULT_CONFIG.search.include_degraded}

[documents]
directory = "${DEFAULT_CONFIG.documents.directory}"
extensions = [${DEFAULT_CONFIG.documents.extensions.map((ext) => `"${ext}"`).join(', ')}]
recursive = ${DEFAULT_CONFIG.documents.recursive}
ignore_patterns = []

[observability]
enabled = ${DEFAULT_CONFIG.observability.enabled}
langfuse_host = "${DEFAULT_CONFIG.observability.langfuse_host}"
# Keys may also come from LANGFUSE_PUBLIC_KEY / LANGFUSE_SECRET_KEY
`;
