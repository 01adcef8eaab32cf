import type { PageAssets, PageCategory, PageMetadata } from "../crawler/types.js";

export type UpsertOutcome = "created" | "updated" | "unchanged";

export interface PageRecord {
  url: string;
  title: string | null;
  cleanText: string | null;
  rawMarkup: string | null;
  contentFingerprint: string | null;
  fingerprintChangedAt: Date | null;
  metadata: PageMetadata | null;
  lastSeen: Date | null;
  summaryVector: number[] | null;
  embeddedAt: Date | null;
  category: PageCategory | null;
  categoryConfidence: number | null;
}

/** A page whose text has not been embedded since it last changed */
export interface EmbeddingTarget {
  url: string;
  title: string | null;
  cleanText: string;
  fingerprintChangedAt: Date | null;
  embeddedAt: Date | null;
}

export interface ChunkInput {
  chunkIndex: number;
  text: string;
  vector: number[];
}

export interface SimilarityMatch {
  url: string;
  chunkIndex: number;
  // Cosine similarity clamped to [0, 1]
  score: number;
  snippet: string;
}

/**
 * Storage capability used by the crawl, embed and search phases
 */
export interface PageStore {
  /** Insert or overwrite by url; never touches summary vector or embedded_at. */
  upsertPage(assets: PageAssets): Promise<UpsertOutcome>;
  /** Pages with text where embedded_at is null or older than the last content change. */
  targetsForEmbedding(): Promise<EmbeddingTarget[]>;
  /** Replaces a page's chunks and sets its summary vector and embedded_at together. */
  replaceChunks(url: string, summaryVector: number[], chunks: ChunkInput[]): Promise<void>;
  /** Best chunk per page, by score desc then url asc. */
  similarityQuery(vector: number[], topK: number): Promise<SimilarityMatch[]>;
  close(): Promise<void>;
}
