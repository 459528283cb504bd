/**
 * Vector similarity helpers.
 */

import { DimensionMismatchError } from '../errors/index.js';

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/** Euclidean length */
export function vectorNorm(vector: readonly number[]): number {
  return Math.sqrt(dotProduct(vector, vector));
}

/**
 * Cosine similarity in [-1, 1]. A zero vector scores 0 against everything.
 *
 * @throws DimensionMismatchError when the lengths differ
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length, 'cosine similarity');
  }

  const denominator = vectorNorm(a) * vectorNorm(b);
  return denominator === 0 ? 0 : dotProduct(a, b) / denominator;
}
