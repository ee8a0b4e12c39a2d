/**
 * Vector similarity helpers for semantic chunking
 *
 * @module services/chunking/similarity
 */

/**
 * Cosine similarity; 0 when either vector has zero magnitude
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Element-wise mean of equal-length vectors
 */
export function centroid(vectors: ArrayLike<number>[]): Float64Array {
  if (vectors.length === 0) {
    throw new Error('Cannot compute the centroid of zero vectors');
  }
  const dim = vectors[0].length;
  const sum = new Float64Array(dim);
  for (const vector of vectors) {
    for (let i = 0; i < dim; i++) {
      sum[i] += vector[i];
    }
  }
  for (let i = 0; i < dim; i++) {
    sum[i] /= vectors.length;
  }
  return sum;
}
