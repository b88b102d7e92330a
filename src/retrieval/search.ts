/**
 * Similarity Search
 *
 * Full linear scan over the cached passages ranked by cosine similarity.
 */

import { EmbeddingProviderError } from "../errors.js";
import type { EmbeddingCache, ScoredPassage } from "../types.js";
import { cosineSimilarity } from "../vector.js";

/**
 * Top `k` passages by descending cosine similarity to the query. Passages
 * with equal scores keep document order. Returns every passage when `k`
 * exceeds the cache size, whatever their scores.
 */
export function searchPassages(queryVector: number[], cache: EmbeddingCache, k: number): ScoredPassage[] {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }
  if (queryVector.length !== cache.dimension) {
    throw new EmbeddingProviderError(
      `Query embedding has ${queryVector.length} dimensions, cached passages have ${cache.dimension}`
    );
  }

  return cache.entries
    .map((entry) => ({ passage: entry.passage, score: cosineSimilarity(queryVector, entry.vector) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, k);
}
