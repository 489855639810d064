import type { Chunk, SearchResult } from './types';

/**
 * Cosine similarity of two vectors. A dimension mismatch scores -1 and a
 * zero vector scores 0.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    return -1;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  const score = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.max(-1, Math.min(1, score));
}

/**
 * Exact top-k over every stored vector. Array.prototype.sort is stable, so
 * equal scores keep insertion order.
 */
export function linearSearch(
  query: ArrayLike<number>,
  chunks: readonly Chunk[],
  vectors: readonly ArrayLike<number>[],
  topK: number,
): SearchResult[] {
  if (topK <= 0) {
    return [];
  }

  const scored = chunks.map((chunk, i) => {
    const vector = vectors[i];
    return {
      ...chunk,
      similarity: vector ? cosineSimilarity(query, vector) : -1,
    };
  });

  scored.sort((a, b) => b.similarity - a.similarity);
  return scored.slice(0, topK);
}
