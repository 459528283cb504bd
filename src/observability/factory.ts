/**
 * Tracer Factory
 *
 * Chooses the Tracer for a run:
 *   1. observability.enabled = false      → NoopTracer
 *   2. No Langfuse keys (env or config)    → NoopTracer (local-only)
 *   3. Both keys present                   → LangfuseTracer
 *
 * LANGFUSE_PUBLIC_KEY, LANGFUSE_SECRET_KEY and LANGFUSE_BASE_URL take
 * precedence over config.toml, like the AWS credentials.
 */

import { getEnv } from '../config/env.js';
import type { ObservabilityConfig } from '../config/schema.js';
import type { Logger } from '../utils/index.js';
import { createLangfuseTracer, type LangfuseTracerConfig } from './langfuse-tracer.js';
import { createNoopTracer } from './noop-tracer.js';
import type { Tracer } from './types.js';

/**
 * Resolve Langfuse connection settings, or null when tracing stays local.
 */
export function resolveLangfuseConfig(config: ObservabilityConfig): LangfuseTracerConfig | null {
  if (!config.enabled) {
    return null;
  }

  const publicKey = getEnv('LANGFUSE_PUBLIC_KEY') ?? config.langfuse_public_key;
  const secretKey = getEnv('LANGFUSE_SECRET_KEY') ?? config.langfuse_secret_key;

  if (!publicKey || !secretKey) {
    return null;
  }

  return {
    publicKey,
    secretKey,
    baseUrl: getEnv('LANGFUSE_BASE_URL') ?? config.langfuse_host,
  };
}

/**
 * Create a tracer from the [observability] section.
 *
 * @param logger - Told when only one of the two keys is set
 */
export function createTracer(config: ObservabilityConfig, logger?: Logger): Tracer {
  const langfuse = resolveLangfuseConfig(config);

  if (!langfuse) {
    const hasPublic = Boolean(getEnv('LANGFUSE_PUBLIC_KEY') ?? config.langfuse_public_key);
    const hasSecret = Boolean(getEnv('LANGFUSE_SECRET_KEY') ?? config.langfuse_secret_key);
    if (config.enabled && hasPublic !== hasSecret) {
      logger?.debug?.('Langfuse tracing off: set both LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY');
    }
    return createNoopTracer();
  }

  return createLangfuseTracer(langfuse);
}
