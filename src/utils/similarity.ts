/**
 * Vector similarity for the brute-force vector index.
 *
 * Scores follow the "higher is better" convention used everywhere in the
 * retrieval pipeline: cosine similarity in [-1, 1].
 */

/**
 * Compute the dot product of two vectors.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Compute the L2 norm of a vector.
 */
export function norm(a: readonly number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity between two vectors. Returns [-1, 1], or 0 when either
 * vector has zero length.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const d = dot(a, b);
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to handle floating point errors
  return Math.max(-1, Math.min(1, d / (na * nb)));
}
