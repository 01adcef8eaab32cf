import type { PageAssets } from "../crawler/types.js";
import { hasChanged } from "../crawler/fingerprint.js";
import { distanceToScore, makeSnippet, rankMatches } from "./ranking.js";
import type {
  ChunkInput,
  EmbeddingTarget,
  PageRecord,
  PageStore,
  SimilarityMatch,
  UpsertOutcome,
} from "./types.js";

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
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
 * In-process PageStore used by `--no-store` runs and tests.
 * `now` is injectable so tests get strictly ordered timestamps.
 */
export class MemoryPageStore implements PageStore {
  private readonly pages = new Map<string, PageRecord>();
  private readonly chunks = new Map<string, ChunkInput[]>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async upsertPage(assets: PageAssets): Promise<UpsertOutcome> {
    const existing = this.pages.get(assets.url);
    const seenAt = this.now();
    const changed = !existing || hasChanged(existing.contentFingerprint, assets.fingerprint);

    this.pages.set(assets.url, {
      url: assets.url,
      title: assets.title,
      cleanText: assets.cleanText,
      rawMarkup: assets.rawMarkup,
      contentFingerprint: assets.fingerprint,
      fingerprintChangedAt: changed ? seenAt : (existing?.fingerprintChangedAt ?? seenAt),
      metadata: assets.metadata,
      lastSeen: seenAt,
      summaryVector: existing?.summaryVector ?? null,
      embeddedAt: existing?.embeddedAt ?? null,
      category: assets.category,
      categoryConfidence: assets.categoryConfidence,
    });

    if (!existing) return "created";
    return changed ? "updated" : "unchanged";
  }

  async targetsForEmbedding(): Promise<EmbeddingTarget[]> {
    const targets: EmbeddingTarget[] = [];
    for (const page of this.pages.values()) {
      if (!page.cleanText) continue;
      const stale =
        page.embeddedAt === null ||
        (page.fingerprintChangedAt !== null &&
          page.fingerprintChangedAt.getTime() > page.embeddedAt.getTime());
      if (stale) {
        targets.push({
          url: page.url,
          title: page.title,
          cleanText: page.cleanText,
          fingerprintChangedAt: page.fingerprintChangedAt,
          embeddedAt: page.embeddedAt,
        });
      }
    }
    return targets.sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
  }

  async replaceChunks(url: string, summaryVector: number[], chunks: ChunkInput[]): Promise<void> {
    const page = this.pages.get(url);
    if (!page) {
      throw new Error(`Unknown page: ${url}`);
    }
    this.chunks.set(
      url,
      chunks.map((chunk) => ({ ...chunk, vector: [...chunk.vector] }))
    );
    this.pages.set(url, { ...page, summaryVector: [...summaryVector], embeddedAt: this.now() });
  }

  async similarityQuery(vector: number[], topK: number): Promise<SimilarityMatch[]> {
    const candidates: SimilarityMatch[] = [];
    for (const [url, pageChunks] of this.chunks) {
      for (const chunk of pageChunks) {
        candidates.push({
          url,
          chunkIndex: chunk.chunkIndex,
          score: distanceToScore(1 - cosineSimilarity(vector, chunk.vector)),
          snippet: makeSnippet(chunk.text),
        });
      }
    }
    return rankMatches(candidates, topK);
  }

  getPage(url: string): PageRecord | undefined {
    return this.pages.get(url);
  }

  getChunks(url: string): ChunkInput[] {
    return this.chunks.get(url) ?? [];
  }

  get pageCount(): number {
    return this.pages.size;
  }

  async close(): Promise<void> {}
}
