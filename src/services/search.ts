import { SiteIndexError } from "../errors.js";
import type { PageStore } from "../store/types.js";
import type { Embedder } from "./embeddings.js";

export interface SearchHit {
  // 1-based
  rank: number;
  url: string;
  score: number;
  snippet: string;
}

export interface SearchOptions {
  store: PageStore;
  embedder: Embedder;
  topK: number;
}

/**
 * Embeds the query and returns the best-matching pages
 */
export async function searchIndex(query: string, options: SearchOptions): Promise<SearchHit[]> {
  const text = query.trim();
  if (!text) {
    throw new SiteIndexError("Query must not be empty", "INVALID_QUERY");
  }
  if (!Number.isInteger(options.topK) || options.topK < 1) {
    throw new SiteIndexError(`topK must be a positive integer, got ${options.topK}`, "INVALID_QUERY");
  }

  const vector = await options.embedder.embed(text);
  const matches = await options.store.similarityQuery(vector, options.topK);

  return matches.map((match, i) => ({
    rank: i + 1,
    url: match.url,
    score: match.score,
    snippet: match.snippet,
  }));
}

export function formatResults(hits: readonly SearchHit[]): string {
  if (hits.length === 0) {
    return "No results.";
  }
  return hits
    .map((hit) => {
      const snippet = hit.snippet.replace(/\s+/g, " ").trim();
      return `#${hit.rank}  score=${hit.score.toFixed(3)}  ${hit.url}\n    ${snippet}`;
    })
    .join("\n\n");
}
