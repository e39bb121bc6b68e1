/**
 * Shared utility functions for Corpus Gate.
 */

/**
 * Generate a unique request ID for tracing.
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Check if a latency exceeds its budget.
 */
export function checkLatencyBudget(
  actual: number,
  budget: number,
  stage: string
): { exceeded: boolean; violation?: string } {
  if (actual > budget) {
    return {
      exceeded: true,
      violation: `${stage}: ${actual}ms exceeded budget of ${budget}ms`,
    };
  }
  return { exceeded: false };
}

/**
 * Scale a vector to unit length so that inner product equals cosine
 * similarity. The zero vector is returned unchanged.
 */
export function normalizeL2(vector: readonly number[]): number[] {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }

  const norm = Math.sqrt(sumSquares);
  if (norm === 0) {
    return [...vector];
  }

  return vector.map((value) => value / norm);
}

/**
 * Inner product of two vectors of equal dimension.
 */
export function dotProduct(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same dimensions');
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}
