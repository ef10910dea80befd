/**
 * Vector helpers for the knowledge index.
 */

/**
 * Cosine similarity between two equal-length vectors.
 * A zero-norm vector has no direction, so its similarity to anything is 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

/**
 * Scale a vector to unit length. Zero vectors are returned unchanged.
 */
export function l2Normalize(vector: readonly number[]): number[] {
  let norm = 0;
  for (const value of vector) {
    norm += value * value;
  }

  if (norm === 0) {
    return [...vector];
  }

  const scale = 1 / Math.sqrt(norm);
  return vector.map((value) => value * scale);
}

export function isFiniteVector(vector: readonly number[]): boolean {
  return vector.length > 0 && vector.every((value) => Number.isFinite(value));
}
