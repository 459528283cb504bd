/**
 * Providers Module
 *
 * Model access on AWS Bedrock: the invoker seam and the generation client.
 * Embedding models live in indexer/embedder and share the invoker.
 *
 * ```typescript
 * import { BedrockModelInvoker, BedrockGenerationClient } from './providers/index.js';
 *
 * const invoker = new BedrockModelInvoker({ region, credentials, maxAttempts: 3, requestTimeoutMs: 60000 });
 * const generator = new BedrockGenerationClient(invoker, config.generation);
 * ```
 */

export {
  BedrockModelInvoker,
  classifyBedrockError,
  type BedrockInvokerOptions,
  type InvokeOptions,
  type ModelInvoker,
  type ModelRequestBody,
} from './bedrock.js';

export {
  BedrockGenerationClient,
  MessagesResponseSchema,
  parseGenerationResponse,
  type GenerateOptions,
  type GenerationResult,
  type MessagesRequestBody,
  type TextGenerator,
} from './generation.js';
