/**
 * docqa - Library Entry Point
 *
 * Question answering over a directory of text documents with
 * retrieval-augmented generation on AWS Bedrock. The CLI (`docqa`) wraps
 * the same pipeline:
 *
 * ```bash
 * docqa ask "What is AWS Bedrock?"
 * docqa chat --dir ./notes
 * ```
 *
 * @example Programmatic use
 * ```typescript
 * import { createPipeline, createTracer, loadConfig } from 'docqa';
 *
 * const config = loadConfig();
 * const tracer = createTracer(config.observability);
 * const pipeline = createPipeline(config, { directory: './notes', tracer });
 *
 * const report = await pipeline.initialize();
 * if (report.state === 'ready') {
 *   const result = await pipeline.ask('What is AWS Bedrock?');
 *   console.log(result.responseText ?? result.error?.message);
 * }
 * await tracer.shutdown();
 * ```
 *
 * @packageDocumentation
 */

// Pipeline
export * from './pipeline/index.js';

// Answering
export * from './agent/index.js';

// Loading and chunking
export * from './indexer/index.js';
export * from './indexer/embedder/index.js';

// Retrieval
export * from './search/index.js';

// Bedrock access
export * from './providers/index.js';

// Configuration
export * from './config/index.js';

// Tracing
export * from './observability/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/index.js';
