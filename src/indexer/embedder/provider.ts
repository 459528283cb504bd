/**
 * Embedding Provider Factory
 *
 * Creates the embedding provider from configuration:
 * 1. Primary backend: static credentials from the environment, the
 *    configured model and region, verified with one probe request
 * 2. Fallback backend: the AWS default credential chain with
 *    embedding.fallback_model in embedding.fallback_region
 * 3. Caching wrapper for duplicate text
 *
 * If neither backend works the factory fails; there is no no-op embedder.
 */

import { getAwsCredentials } from '../../config/env.js';
import type { EmbeddingConfig } from '../../config/schema.js';
import { ConfigurationError, DimensionMismatchError } from '../../errors/index.js';
import {
  BedrockModelInvoker,
  type BedrockInvokerOptions,
  type ModelInvoker,
} from '../../providers/bedrock.js';
import { consoleLogger } from '../../utils/index.js';
import { CachedEmbeddingProvider } from './cached.js';
import { isTitanV1, resolveEmbeddingModel, type EmbeddingModelSpec } from './models.js';
import { TitanEmbeddingProvider } from './titan.js';
import type { EmbeddingProvider, EmbeddingProviderResult, ProviderOptions } from './types.js';

function defaultCreateInvoker(options: BedrockInvokerOptions): ModelInvoker {
  return new BedrockModelInvoker(options);
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build one backend and, when configured, probe it.
 */
async function buildBackend(
  spec: EmbeddingModelSpec,
  invokerOptions: BedrockInvokerOptions,
  config: EmbeddingConfig,
  options: ProviderOptions
): Promise<TitanEmbeddingProvider> {
  const createInvoker = options.createInvoker ?? defaultCreateInvoker;
  const provider = new TitanEmbeddingProvider(createInvoker(invokerOptions), spec, {
    timeoutMs: config.timeout_ms,
    logger: options.logger,
    onDegraded: options.onDegraded,
  });

  if (config.verify_on_startup) {
    await provider.probe();
  }

  return provider;
}

function finish(
  provider: EmbeddingProvider,
  config: EmbeddingConfig,
  backend: EmbeddingProviderResult['backend'],
  primaryFailure?: string
): EmbeddingProviderResult {
  return {
    provider: config.cache ? new CachedEmbeddingProvider(provider) : provider,
    model: provider.model,
    dimensions: provider.dimensions,
    backend,
    ...(primaryFailure !== undefined && { primaryFailure }),
  };
}

/**
 * Create an embedding provider from configuration.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const { provider, model, dimensions } = await createEmbeddingProvider(config.embedding, {
 *   region: config.aws.region,
 * });
 *
 * const embedding = await provider.embed('Hello, world!');
 * console.log(embedding.vector.length); // 1536 for Titan v1
 * ```
 *
 * @throws ConfigurationError for unknown models, a fallback whose dimension
 *   differs from the primary, or when both backends fail
 */
export async function createEmbeddingProvider(
  config: EmbeddingConfig,
  options: ProviderOptions
): Promise<EmbeddingProviderResult> {
  const logger = options.logger ?? consoleLogger;
  const settings = { dimensions: config.dimensions, normalize: config.normalize };

  const primarySpec = resolveEmbeddingModel(config.model, settings);
  // A v1 fallback has a fixed size; the mismatch check below reports it
  const fallbackSpec =
    config.fallback_model !== undefined
      ? resolveEmbeddingModel(config.fallback_model, {
          ...settings,
          dimensions: isTitanV1(config.fallback_model) ? undefined : config.dimensions,
        })
      : undefined;

  // Validate dimension consistency upfront if fallback is configured
  if (fallbackSpec && fallbackSpec.dimensions !== primarySpec.dimensions) {
    const mismatch = new DimensionMismatchError(
      primarySpec.dimensions,
      fallbackSpec.dimensions,
      `fallback model ${fallbackSpec.modelId}`
    );
    throw new ConfigurationError(
      mismatch.message,
      'Primary and fallback embedding models must produce vectors of the same size',
      mismatch
    );
  }

  const primaryLabel = `${primarySpec.modelId} in ${options.region}`;
  let primaryFailure: string;

  // Try primary backend
  try {
    const credentials =
      options.credentials === undefined ? getAwsCredentials() : options.credentials;
    if (credentials === null) {
      throw new ConfigurationError('No AWS credentials found in the environment');
    }

    const provider = await buildBackend(
      primarySpec,
      {
        region: options.region,
        credentials,
        maxAttempts: config.max_retries,
        requestTimeoutMs: config.timeout_ms,
      },
      config,
      options
    );
    return finish(provider, config, 'primary');
  } catch (error) {
    primaryFailure = describeFailure(error);
  }

  if (!fallbackSpec) {
    throw new ConfigurationError(
      `Embedding backend unavailable (${primaryLabel}): ${primaryFailure}`,
      'Set AWS credentials or configure embedding.fallback_model'
    );
  }

  const fallbackRegion = config.fallback_region ?? options.region;
  const fallbackLabel = `${fallbackSpec.modelId} in ${fallbackRegion}`;

  options.onProgress?.(`Primary embedding backend unavailable: ${primaryFailure}. Trying fallback...`);
  logger.warn(`Primary embedding backend (${primaryLabel}) failed: ${primaryFailure}`);

  try {
    const provider = await buildBackend(
      fallbackSpec,
      {
        region: fallbackRegion,
        credentials: null,
        maxAttempts: config.max_retries,
        requestTimeoutMs: config.timeout_ms,
      },
      config,
      options
    );
    options.onProgress?.(`Using fallback embedding backend: ${fallbackLabel}`);
    return finish(provider, config, 'fallback', primaryFailure);
  } catch (error) {
    throw new ConfigurationError(
      `Both embedding backends failed.\n` +
        `  primary (${primaryLabel}): ${primaryFailure}\n` +
        `  fallback (${fallbackLabel}): ${describeFailure(error)}`,
      'Check AWS credentials, the region, and model access in the Bedrock console',
      error
    );
  }
}
