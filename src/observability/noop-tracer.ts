/**
 * NoopTracer
 *
 * Used when observability is disabled or Langfuse keys are missing. Every
 * call returns the same frozen handles, so tracing costs nothing.
 */

import type { ObservationHandle, TraceHandle, Tracer } from './types.js';

const NOOP_OBSERVATION: ObservationHandle = Object.freeze({
  update: (): ObservationHandle => NOOP_OBSERVATION,
  end: (): void => undefined,
});

const NOOP_TRACE: TraceHandle = Object.freeze({
  span: (): ObservationHandle => NOOP_OBSERVATION,
  generation: (): ObservationHandle => NOOP_OBSERVATION,
  update: (): TraceHandle => NOOP_TRACE,
  end: (): void => undefined,
});

const NOOP_TRACER: Tracer = Object.freeze({
  trace: (): TraceHandle => NOOP_TRACE,
  flush: async (): Promise<void> => undefined,
  shutdown: async (): Promise<void> => undefined,
  isRemote: false,
});

/**
 * The shared no-operation tracer.
 */
export function createNoopTracer(): Tracer {
  return NOOP_TRACER;
}
