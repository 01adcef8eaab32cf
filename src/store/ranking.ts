import type { SimilarityMatch } from "./types.js";

export const SNIPPET_LENGTH = 300;

/**
 * Cosine distance (pgvector `<=>`) to a similarity score in [0, 1]
 */
export function distanceToScore(distance: number): number {
  const similarity = 1 - distance;
  // rounding keeps an exact match at 1.0 despite float noise
  const rounded = Math.round(similarity * 1e6) / 1e6;
  return Math.min(1, Math.max(0, rounded));
}

export function makeSnippet(text: string): string {
  return text.length > SNIPPET_LENGTH ? text.slice(0, SNIPPET_LENGTH) : text;
}

/**
 * Keeps the best chunk of each page and orders pages by score, then url
 */
export function rankMatches(candidates: readonly SimilarityMatch[], topK: number): SimilarityMatch[] {
  const best = new Map<string, SimilarityMatch>();
  for (const candidate of candidates) {
    const current = best.get(candidate.url);
    if (
      !current ||
      candidate.score > current.score ||
      (candidate.score === current.score && candidate.chunkIndex < current.chunkIndex)
    ) {
      best.set(candidate.url, candidate);
    }
  }

  return [...best.values()]
    .sort((a, b) => b.score - a.score || (a.url < b.url ? -1 : a.url > b.url ? 1 : 0))
    .slice(0, Math.max(0, topK));
}
