/**
 * Result type for operations that report failure as a value.
 *
 * Pipeline steps return Result instead of throwing so that callers can branch
 * on `ok` and read a typed error.
 */

import type { RAGError } from '../errors/index.js';

export type Result<T, E = RAGError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
