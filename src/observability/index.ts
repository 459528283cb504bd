/**
 * Observability Module
 *
 * @example
 * ```typescript
 * import { createTracer } from '../observability/index.js';
 *
 * const tracer = createTracer(config.observability);
 * const trace = tracer.trace({ name: 'docqa-query', input: question });
 * // ... do work ...
 * trace.end();
 * await tracer.shutdown();
 * ```
 */

export type {
  Tracer,
  TraceHandle,
  ObservationHandle,
  SpanHandle,
  GenerationHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
} from './types.js';

export { createTracer, resolveLangfuseConfig } from './factory.js';
export { createNoopTracer } from './noop-tracer.js';
export { createLangfuseTracer, type LangfuseTracerConfig } from './langfuse-tracer.js';
