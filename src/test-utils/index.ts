/**
 * Test Utilities Module
 *
 * Shared fakes for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { FakeInvoker, titanResponder } from '../../test-utils/index.js';
 *
 * const invoker = new FakeInvoker(titanResponder(1536));
 * ```
 */

export {
  FakeInvoker,
  HashingEmbeddingProvider,
  MemorySource,
  StubGenerator,
  claudeResponse,
  hashEmbedding,
  makeDocument,
  titanResponder,
  type HashingProviderOptions,
  type InvokeHandler,
  type RecordedInvocation,
  type RecordedPrompt,
} from './fakes.js';
