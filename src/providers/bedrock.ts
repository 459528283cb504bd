/**
 * Bedrock Model Invoker
 *
 * The one place that talks to AWS Bedrock. Embedding and generation code
 * depend on the ModelInvoker interface, so tests can substitute an
 * in-process fake.
 *
 * Responsibilities:
 * - Build a BedrockRuntimeClient with region, credentials, standard retry
 *   mode and a per-attempt request timeout
 * - Enforce a deadline on each logical call (all retries included)
 * - Parse the JSON response body
 * - Map SDK and transport failures onto the error taxonomy
 *
 * SECURITY: credentials are passed to the SDK and never logged.
 */

import {
  BedrockRuntimeClient,
  InvokeModelCommand,
} from '@aws-sdk/client-bedrock-runtime';

import type { AwsCredentials } from '../config/env.js';
import {
  ConfigurationError,
  ConnectivityError,
  MalformedResponseError,
  QueryError,
  type RAGError,
} from '../errors/index.js';
import { withTimeout } from '../utils/async.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * JSON request body sent to a model
 */
export type ModelRequestBody = Record<string, unknown>;

export interface InvokeOptions {
  /** Deadline for the whole call, retries included */
  timeoutMs: number;
}

/**
 * Invokes a model with a JSON body and returns the parsed JSON response.
 *
 * Implementations throw ConnectivityError, ConfigurationError or
 * MalformedResponseError.
 */
export interface ModelInvoker {
  /** Human-readable backend description for logs (never contains secrets) */
  readonly description: string;
  invoke(modelId: string, body: ModelRequestBody, options: InvokeOptions): Promise<unknown>;
}

export interface BedrockInvokerOptions {
  region: string;
  /** Static credentials; null uses the SDK's default credential chain */
  credentials: AwsCredentials | null;
  /** Total attempts per request, first try included */
  maxAttempts: number;
  /** Socket/request timeout per attempt in milliseconds */
  requestTimeoutMs: number;
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

/** Transient service conditions, retried by the SDK before they reach us */
const CONNECTIVITY_ERROR_NAMES = new Set([
  'ThrottlingException',
  'TooManyRequestsException',
  'ServiceUnavailableException',
  'InternalServerException',
  'ModelNotReadyException',
  'ModelTimeoutException',
  'TimeoutError',
  'RequestTimeout',
  'RequestTimeoutException',
  'AbortError',
]);

/** Node socket error codes */
const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
]);

/** Problems that retrying cannot fix */
const CONFIGURATION_ERROR_NAMES = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'ExpiredTokenException',
  'InvalidSignatureException',
  'CredentialsProviderError',
  'ResourceNotFoundException',
  'ValidationException',
  'ServiceQuotaExceededException',
]);

function readStringField(error: object, field: string): string | undefined {
  const value: unknown = Object.entries(error).find(([key]) => key === field)?.[1];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map a failure from the Bedrock SDK onto the error taxonomy.
 *
 * @param error - Whatever client.send() rejected with
 * @param context - What was being attempted (e.g. "invoke amazon.titan-embed-text-v1")
 */
export function classifyBedrockError(error: unknown, context: string): RAGError {
  if (!(error instanceof Error)) {
    return new QueryError(`${context} failed: ${String(error)}`);
  }

  const name = error.name;
  const code = readStringField(error, 'code');
  const fault = readStringField(error, '$fault');

  if (CONFIGURATION_ERROR_NAMES.has(name)) {
    return new ConfigurationError(
      `${context} was rejected (${name}): ${error.message}`,
      'Check AWS credentials, the region, and that model access is enabled in the Bedrock console',
      error
    );
  }

  if (
    CONNECTIVITY_ERROR_NAMES.has(name) ||
    (code !== undefined && NETWORK_ERROR_CODES.has(code)) ||
    fault === 'server'
  ) {
    return new ConnectivityError(`${context} failed (${name}): ${error.message}`, name, error);
  }

  if (fault === 'client') {
    return new ConfigurationError(`${context} was rejected (${name}): ${error.message}`, undefined, error);
  }

  return new QueryError(`${context} failed: ${error.message}`, error);
}

// ============================================================================
// BEDROCK IMPLEMENTATION
// ============================================================================

/**
 * ModelInvoker backed by the AWS SDK v3 Bedrock runtime client.
 *
 * @example
 * ```typescript
 * const invoker = new BedrockModelInvoker({
 *   region: 'eu-central-1',
 *   credentials: getAwsCredentials(),
 *   maxAttempts: 10,
 *   requestTimeoutMs: 60000,
 * });
 * const json = await invoker.invoke('amazon.titan-embed-text-v1', { inputText: 'hi' }, { timeoutMs: 60000 });
 * ```
 */
export class BedrockModelInvoker implements ModelInvoker {
  readonly description: string;
  private readonly client: BedrockRuntimeClient;

  constructor(options: BedrockInvokerOptions) {
    this.description = `bedrock(${options.region}, ${
      options.credentials ? 'static credentials' : 'default credential chain'
    })`;

    this.client = new BedrockRuntimeClient({
      region: options.region,
      ...(options.credentials && { credentials: options.credentials }),
      maxAttempts: options.maxAttempts,
      retryMode: 'standard',
      requestHandler: {
        requestTimeout: options.requestTimeoutMs,
        connectionTimeout: options.requestTimeoutMs,
      },
    });
  }

  async invoke(modelId: string, body: ModelRequestBody, options: InvokeOptions): Promise<unknown> {
    const context = `Bedrock call to ${modelId}`;
    const controller = new AbortController();

    const command = new InvokeModelCommand({
      modelId,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify(body),
    });

    let text: string;
    try {
      const response = await withTimeout(
        this.client.send(command, { abortSignal: controller.signal }),
        options.timeoutMs,
        () => {
          controller.abort();
          return new ConnectivityError(
            `${context} exceeded its ${options.timeoutMs}ms deadline`,
            'DeadlineExceeded'
          );
        }
      );
      text = response.body.transformToString();
    } catch (error) {
      if (error instanceof ConnectivityError) {
        throw error;
      }
      throw classifyBedrockError(error, context);
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new MalformedResponseError(`${context} returned a body that is not JSON`, [], error);
    }
  }

  /**
   * Release sockets held by the client.
   */
  destroy(): void {
    this.client.destroy();
  }
}
