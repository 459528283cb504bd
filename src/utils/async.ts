/**
 * Async helpers: deadlines, cancellation checks and a bounded worker pool.
 */

import { OperationCancelledError, ValidationError } from '../errors/index.js';

/**
 * Race a promise against a deadline.
 *
 * The timer is cleared once the promise settles, so nothing is left
 * scheduled after the call returns. The underlying operation is not
 * aborted; its eventual result is ignored.
 *
 * @param promise - Work to wait for
 * @param timeoutMs - Deadline in milliseconds
 * @param onTimeout - Builds the error to reject with when the deadline passes
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Throw OperationCancelledError if the signal has been aborted.
 */
export function checkCancelled(signal: AbortSignal | undefined, operation?: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}

/**
 * Yield to the event loop so spinners and the REPL stay responsive during
 * long batches.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface MapWithConcurrencyOptions {
  /** Stop picking up new items once aborted */
  signal?: AbortSignal;
  /** Called after each item completes */
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Map items through an async function with at most `concurrency` calls in
 * flight. Results are returned in input order regardless of completion order.
 *
 * The first rejection stops the pool from starting new items and is
 * rethrown once the in-flight calls have settled.
 *
 * @example
 * ```typescript
 * const vectors = await mapWithConcurrency(texts, 4, (text) => embed(text));
 * ```
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
  options: MapWithConcurrencyOptions = {}
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError(`Invalid concurrency: ${concurrency}`, [
      'concurrency must be an integer of at least 1',
    ]);
  }

  const jobs = items.map((item, index) => ({ item, index }));
  const results = new Array<R>(items.length);
  let cursor = 0;
  let completed = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed) {
      checkCancelled(options.signal);

      const job = jobs[cursor++];
      if (!job) {
        return;
      }

      try {
        results[job.index] = await fn(job.item, job.index);
      } catch (error) {
        failed = true;
        throw error;
      }

      completed++;
      options.onProgress?.(completed, items.length);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  const settled = await Promise.allSettled(
    Array.from({ length: workerCount }, () => worker())
  );

  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }

  return results;
}
