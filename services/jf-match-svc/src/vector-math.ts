import type { EmbeddingVector } from './types';

export function zeroVector(dimensions: number): EmbeddingVector {
  return new Array<number>(dimensions).fill(0);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(vector: readonly number[]): number {
  return Math.sqrt(dot(vector, vector));
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

/**
 * Cosine similarity clamped into [0, 1].
 *
 * An empty vector or a vector with zero norm carries no signal and scores 0.
 * Negative similarity is treated as no match. Callers are expected to have
 * checked that non-empty inputs share a dimension.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  if (a.length !== b.length) {
    throw new RangeError(`Cannot compare vectors of length ${a.length} and ${b.length}.`);
  }

  const normProduct = norm(a) * norm(b);
  if (normProduct === 0) {
    return 0;
  }

  return clampUnit(dot(a, b) / normProduct);
}
