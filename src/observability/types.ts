/**
 * Observability Types
 *
 * Tracer abstraction over Langfuse v4 (OpenTelemetry-based). The query
 * engine and CLI commands trace through these interfaces and never learn
 * whether anything leaves the process: a NoopTracer stands in when tracing
 * is off or unconfigured.
 *
 * Langfuse v4 mapping:
 *   tracer.trace()           → startObservation(name, attrs)
 *   traceHandle.span()       → parent.startObservation(name, attrs)
 *   traceHandle.generation() → parent.startObservation(name, attrs, { asType: 'generation' })
 *   handle.update()          → obs.update({ output, level, statusMessage, usageDetails })
 *   tracer.flush()           → processor.forceFlush()
 */

// ============================================================================
// Input Options
// ============================================================================

/** Options for creating a new trace (root observation). */
export interface TraceOptions {
  /** Trace name (e.g. 'docqa-query', 'docqa-ingest') */
  name: string;
  /** The question or command input */
  input?: unknown;
  metadata?: Record<string, unknown>;
  /** Groups the turns of one chat session */
  sessionId?: string;
}

/** Options for creating a span within a trace. */
export interface SpanOptions {
  /** Span name (e.g. 'retrieval') */
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

/** Options for creating a generation (model call) within a trace. */
export interface GenerationOptions {
  /** Generation name (e.g. 'answer-generation') */
  name: string;
  /** Bedrock model id */
  model?: string;
  /** Prompt sent to the model */
  input?: unknown;
  metadata?: Record<string, unknown>;
  /** Sampling settings (temperature, max_tokens, ...) */
  modelParameters?: Record<string, string | number>;
}

/** Data to update a handle with before ending. */
export interface UpdateData {
  output?: unknown;
  metadata?: Record<string, unknown>;
  /** Marks the observation as failed, with a short reason */
  error?: string;
  /** Token usage for generations */
  usage?: {
    input?: number;
    output?: number;
    total?: number;
  };
}

// ============================================================================
// Handles
// ============================================================================

/**
 * A span or generation. Call end() exactly once when the work finishes.
 */
export interface ObservationHandle {
  update(data: UpdateData): ObservationHandle;
  end(): void;
}

export type SpanHandle = ObservationHandle;
export type GenerationHandle = ObservationHandle;

/**
 * Root observation of one operation.
 */
export interface TraceHandle {
  /** Langfuse trace id; undefined when not tracing remotely */
  readonly traceId?: string;
  span(options: SpanOptions): SpanHandle;
  generation(options: GenerationOptions): GenerationHandle;
  update(data: UpdateData): TraceHandle;
  end(): void;
}

// ============================================================================
// Tracer
// ============================================================================

export interface Tracer {
  trace(options: TraceOptions): TraceHandle;
  /** Send pending observations */
  flush(): Promise<void>;
  /** Flush and stop; later traces are dropped */
  shutdown(): Promise<void>;
  /** Whether observations leave the process */
  readonly isRemote: boolean;
}
