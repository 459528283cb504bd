/**
 * Check Command
 *
 * Pre-flight check of the local setup before asking questions:
 *   docqa check            - Config, credentials, documents and tracing
 *   docqa check --probe    - Also embed a probe text against Bedrock
 *   docqa check --json     - Output as JSON (for scripts)
 *
 * Checks performed:
 * 1. Config file parses and validates
 * 2. AWS region is one Bedrock serves
 * 3. AWS credentials are present (warning when a fallback model can run without them)
 * 4. Documents directory exists and holds documents
 * 5. Langfuse tracing is configured (informational)
 * 6. (--probe) The embedding backend answers
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from '../../config/loader.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { hasAwsCredentials, SETUP_INSTRUCTIONS } from '../../config/env.js';
import { SUPPORTED_REGIONS, type Config } from '../../config/schema.js';
import { toRAGError } from '../../errors/index.js';
import { createEmbeddingProvider } from '../../indexer/embedder/provider.js';
import { PROBE_TEXT } from '../../indexer/embedder/titan.js';
import { getDirectoryStats } from '../../indexer/loader.js';
import { resolveLangfuseConfig } from '../../observability/index.js';
import type { BedrockInvokerOptions, ModelInvoker } from '../../providers/bedrock.js';
import type { CommandContext } from '../types.js';

// ============================================================================
// Types
// ============================================================================

export type CheckStatus = 'ok' | 'info' | 'warning' | 'error';

export interface CheckItem {
  name: string;
  status: CheckStatus;
  message: string;
  hint?: string;
}

export interface CheckReport {
  /** No error-level items */
  ready: boolean;
  checks: CheckItem[];
}

export interface CheckOptions {
  probe?: boolean;
  /** Builds model invokers for the probe; tests pass a fake */
  createInvoker?: (options: BedrockInvokerOptions) => ModelInvoker;
  onProgress?: (status: string) => void;
}

// ============================================================================
// Checks
// ============================================================================

function checkRegion(config: Config): CheckItem {
  const region = config.aws.region;
  if (SUPPORTED_REGIONS.some((supported) => supported === region)) {
    return { name: 'region', status: 'ok', message: region };
  }
  return {
    name: 'region',
    status: 'warning',
    message: `${region} is not a known Bedrock region`,
    hint: `Known regions: ${SUPPORTED_REGIONS.join(', ')}`,
  };
}

function checkCredentials(config: Config): CheckItem {
  if (hasAwsCredentials()) {
    return { name: 'credentials', status: 'ok', message: 'Static AWS credentials found' };
  }

  if (config.embedding.fallback_model !== undefined) {
    return {
      name: 'credentials',
      status: 'warning',
      message: 'No static AWS credentials; embeddings will use the fallback model',
      hint: SETUP_INSTRUCTIONS.trim(),
    };
  }

  return {
    name: 'credentials',
    status: 'error',
    message: 'No AWS credentials found in the environment',
    hint: SETUP_INSTRUCTIONS.trim(),
  };
}

async function checkDocuments(config: Config): Promise<CheckItem> {
  const { directory, extensions, recursive, ignore_patterns } = config.documents;

  try {
    const stats = await getDirectoryStats(directory, {
      extensions,
      recursive,
      ignorePatterns: ignore_patterns,
    });

    if (stats.documentCount === 0) {
      return {
        name: 'documents',
        status: 'error',
        message: `No documents in ${directory} (extensions: ${extensions.join(', ')})`,
        hint: 'Add .txt or .md files, or run: docqa init',
      };
    }

    return {
      name: 'documents',
      status: 'ok',
      message: `${stats.documentCount} document(s) in ${directory}`,
    };
  } catch (error) {
    const failure = toRAGError(error);
    return {
      name: 'documents',
      status: 'error',
      message: failure.message,
      hint: failure.hint ?? 'Run: docqa init',
    };
  }
}

function checkTracing(config: Config): CheckItem {
  if (!config.observability.enabled) {
    return { name: 'tracing', status: 'info', message: 'Disabled in config' };
  }

  const langfuse = resolveLangfuseConfig(config.observability);
  if (!langfuse) {
    return {
      name: 'tracing',
      status: 'info',
      message: 'Langfuse keys not set; traces stay local',
      hint: 'Set LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY to send traces',
    };
  }

  return { name: 'tracing', status: 'ok', message: `Langfuse at ${langfuse.baseUrl}` };
}

async function probeEmbedding(config: Config, options: CheckOptions): Promise<CheckItem> {
  try {
    const result = await createEmbeddingProvider(
      { ...config.embedding, verify_on_startup: true },
      {
        region: config.aws.region,
        ...(options.createInvoker && { createInvoker: options.createInvoker }),
        ...(options.onProgress && { onProgress: options.onProgress }),
      }
    );

    const embedding = await result.provider.embed(PROBE_TEXT);
    if (embedding.kind === 'degraded') {
      return {
        name: 'embedding',
        status: 'error',
        message: `${result.model} returned a degraded embedding (${embedding.reason})`,
        hint: 'Check network access to Bedrock and your AWS permissions',
      };
    }

    return {
      name: 'embedding',
      status: result.backend === 'primary' ? 'ok' : 'warning',
      message: `${result.model} (${result.dimensions} dimensions, ${result.backend})`,
      ...(result.primaryFailure !== undefined && { hint: `Primary failed: ${result.primaryFailure}` }),
    };
  } catch (error) {
    const failure = toRAGError(error);
    return {
      name: 'embedding',
      status: 'error',
      message: failure.message,
      ...(failure.hint !== undefined && { hint: failure.hint }),
    };
  }
}

/**
 * Run every check against the current config file.
 */
export async function runChecks(options: CheckOptions = {}): Promise<CheckReport> {
  const checks: CheckItem[] = [];

  let config: Config;
  try {
    config = loadConfig(false);
    checks.push({ name: 'config', status: 'ok', message: 'Configuration is valid' });
  } catch (error) {
    const failure = toRAGError(error);
    checks.push({
      name: 'config',
      status: 'error',
      message: failure.message,
      ...(failure.hint !== undefined && { hint: failure.hint }),
    });
    // Keep checking the rest against defaults
    config = DEFAULT_CONFIG;
  }

  checks.push(checkRegion(config));
  checks.push(checkCredentials(config));
  checks.push(await checkDocuments(config));
  checks.push(checkTracing(config));

  if (options.probe) {
    checks.push(await probeEmbedding(config, options));
  }

  return {
    ready: !checks.some((check) => check.status === 'error'),
    checks,
  };
}

// ============================================================================
// Command Factory
// ============================================================================

const STATUS_ICONS: Record<CheckStatus, string> = {
  ok: chalk.green('✓'),
  info: chalk.blue('ℹ'),
  warning: chalk.yellow('⚠'),
  error: chalk.red('✗'),
};

export function createCheckCommand(getContext: () => CommandContext): Command {
  return new Command('check')
    .description('Check configuration, credentials and documents')
    .option('--probe', 'Also embed a probe text to test Bedrock access')
    .action(async (cmdOptions: { probe?: boolean }) => {
      const ctx = getContext();

      const report = await runChecks({
        probe: cmdOptions.probe ?? false,
        onProgress: (status) => ctx.debug(status),
      });

      if (!report.ready) {
        process.exitCode = 1;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      const lines: string[] = [];
      lines.push(
        chalk.bold('docqa check') + (report.ready ? chalk.green(' (ready)') : chalk.red(' (not ready)'))
      );
      lines.push(chalk.dim('─'.repeat(40)));

      for (const check of report.checks) {
        lines.push(`${STATUS_ICONS[check.status]} ${chalk.cyan(check.name.padEnd(12))} ${check.message}`);
        if (check.hint && check.status !== 'ok') {
          for (const hintLine of check.hint.split('\n')) {
            lines.push(chalk.dim(`    ${hintLine}`));
          }
        }
      }

      ctx.log(lines.join('\n'));
    });
}
