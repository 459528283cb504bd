/**
 * LangfuseTracer
 *
 * Implements Tracer on the Langfuse v4 SDK. An OpenTelemetry NodeSDK is
 * started with a LangfuseSpanProcessor that exports every observation to
 * the configured Langfuse host.
 *
 * Lifecycle:
 *   createLangfuseTracer(config) → starts the NodeSDK
 *     tracer.trace()      → root observation
 *       .span()           → child span
 *       .generation()     → child generation
 *     tracer.shutdown()   → sdk.shutdown() (flushes, then stops)
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';
import { startObservation } from '@langfuse/tracing';

import type {
  GenerationOptions,
  ObservationHandle,
  SpanOptions,
  TraceHandle,
  TraceOptions,
  Tracer,
  UpdateData,
} from './types.js';

export interface LangfuseTracerConfig {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
}

type Observation = ReturnType<typeof startObservation>;

/**
 * Attributes shared by every observation type.
 */
function toAttributes(data: UpdateData) {
  return {
    output: data.output,
    metadata: data.metadata,
    ...(data.error !== undefined && { level: 'ERROR' as const, statusMessage: data.error }),
  };
}

function wrapObservation(obs: Observation, withUsage: boolean): ObservationHandle {
  const handle: ObservationHandle = {
    update(data: UpdateData): ObservationHandle {
      obs.update({
        ...toAttributes(data),
        ...(withUsage &&
          data.usage && {
            usageDetails: {
              input: data.usage.input,
              output: data.usage.output,
              total: data.usage.total,
            },
          }),
      });
      return handle;
    },
    end(): void {
      obs.end();
    },
  };
  return handle;
}

function wrapTrace(obs: Observation): TraceHandle {
  const handle: TraceHandle = {
    traceId: obs.traceId,
    span(options: SpanOptions): ObservationHandle {
      const child = obs.startObservation(options.name, {
        input: options.input,
        metadata: options.metadata,
      });
      return wrapObservation(child, false);
    },
    generation(options: GenerationOptions): ObservationHandle {
      const child = obs.startObservation(
        options.name,
        {
          model: options.model,
          input: options.input,
          metadata: options.metadata,
          modelParameters: options.modelParameters,
        },
        { asType: 'generation' }
      );
      return wrapObservation(child, true);
    },
    update(data: UpdateData): TraceHandle {
      obs.update(toAttributes(data));
      return handle;
    },
    end(): void {
      obs.end();
    },
  };
  return handle;
}

/**
 * Create a Langfuse-backed tracer.
 *
 * Call shutdown() before the process exits or buffered observations are lost.
 */
export function createLangfuseTracer(config: LangfuseTracerConfig): Tracer {
  const processor = new LangfuseSpanProcessor({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });

  const sdk = new NodeSDK({ spanProcessors: [processor] });
  sdk.start();

  let shutdownPromise: Promise<void> | null = null;

  return {
    trace(options: TraceOptions): TraceHandle {
      const obs = startObservation(options.name, {
        input: options.input,
        metadata: options.metadata,
      });

      // Session grouping is a trace-level attribute in Langfuse v4
      if (options.sessionId) {
        obs.updateTrace({ sessionId: options.sessionId });
      }

      return wrapTrace(obs);
    },

    async flush(): Promise<void> {
      await processor.forceFlush();
    },

    shutdown(): Promise<void> {
      shutdownPromise ??= sdk.shutdown();
      return shutdownPromise;
    },

    isRemote: true,
  };
}
