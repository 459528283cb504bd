/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to AWS credentials and Langfuse keys.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Secrets are NEVER logged, even in verbose mode
 * - Secrets are NEVER included in error messages
 * - Only presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env file (for local development)
// No-op if .env doesn't exist - production uses real env vars
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema. Nothing is required at load time; credentials
 * are checked when a Bedrock client is built.
 */
export const EnvSchema = z.object({
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_SESSION_TOKEN: z.string().optional(),
  AWS_REGION: z.string().optional(),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_BASE_URL: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Static AWS credentials taken from the environment.
 */
export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * _clearEnvCache() resets it for tests.
 */
let _envCache: EnvVars | null = null;

/**
 * Read a variable by its upper-case name, falling back to the lower-case
 * spelling that older .env files use (aws_access_key_id, ...).
 */
function readVar(name: string): string | undefined {
  for (const candidate of [name, name.toLowerCase()]) {
    const value = process.env[candidate];
    if (value !== undefined && value.trim() !== '') {
      return value;
    }
  }
  return undefined;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    AWS_ACCESS_KEY_ID: readVar('AWS_ACCESS_KEY_ID'),
    AWS_SECRET_ACCESS_KEY: readVar('AWS_SECRET_ACCESS_KEY'),
    AWS_SESSION_TOKEN: readVar('AWS_SESSION_TOKEN'),
    AWS_REGION: readVar('AWS_REGION'),
    LANGFUSE_PUBLIC_KEY: readVar('LANGFUSE_PUBLIC_KEY'),
    LANGFUSE_SECRET_KEY: readVar('LANGFUSE_SECRET_KEY'),
    LANGFUSE_BASE_URL: readVar('LANGFUSE_BASE_URL'),
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Static credentials from the environment, or null when the key id or
 * secret is missing. A session token alone is never enough.
 */
export function getAwsCredentials(): AwsCredentials | null {
  const env = loadEnv();

  if (!env.AWS_ACCESS_KEY_ID || !env.AWS_SECRET_ACCESS_KEY) {
    return null;
  }

  return {
    accessKeyId: env.AWS_ACCESS_KEY_ID,
    secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    ...(env.AWS_SESSION_TOKEN && { sessionToken: env.AWS_SESSION_TOKEN }),
  };
}

/**
 * Check if static AWS credentials are configured, without exposing them.
 */
export function hasAwsCredentials(): boolean {
  return getAwsCredentials() !== null;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when credentials are missing.
 */
export const SETUP_INSTRUCTIONS = `
To use AWS Bedrock:

1. Create an IAM user or role with bedrock:InvokeModel permission and enable
   model access for the Titan embedding and Claude models in the Bedrock console.

2. Set the credentials (or put them in a .env file in the working directory):

   # macOS/Linux
   export AWS_ACCESS_KEY_ID="..."
   export AWS_SECRET_ACCESS_KEY="..."
   export AWS_SESSION_TOKEN="..."      # only for temporary credentials

3. Choose a region that hosts both models:

   docqa config set aws.region us-east-1

Without static credentials docqa falls back to the default AWS credential
chain (shared config profiles, SSO, instance roles).
`.trim();
