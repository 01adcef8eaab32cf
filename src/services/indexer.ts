/**
 * Embed phase - chunks and embeds every page whose text changed since it was
 * last embedded, then stores chunk vectors and a page vector together.
 */

import { describeError, EmbeddingError } from "../errors.js";
import type { PageStore } from "../store/types.js";
import { chunkDocument, type ChunkOptions } from "./chunker.js";
import { meanVector, normalizeVector, type Embedder } from "./embeddings.js";

export interface EmbedPassOptions {
  store: PageStore;
  embedder: Embedder;
  chunking?: Partial<ChunkOptions>;
  verbose?: boolean;
  onProgress?: (done: number, total: number, url: string) => void;
}

export interface EmbedFailure {
  url: string;
  message: string;
}

export interface EmbedPassResult {
  targets: number;
  processed: number;
  failed: number;
  chunks: number;
  errors: EmbedFailure[];
  durationMs: number;
}

/**
 * Runs one embed pass. A page-level embedding failure is recorded and the
 * pass continues; an unreachable embedding service or a storage failure
 * ends it by throwing.
 */
export async function runEmbedPass(options: EmbedPassOptions): Promise<EmbedPassResult> {
  const { store, embedder, chunking, verbose = true, onProgress } = options;
  const log = verbose ? console.log : () => {};
  const startTime = Date.now();

  const targets = await store.targetsForEmbedding();
  const result: EmbedPassResult = {
    targets: targets.length,
    processed: 0,
    failed: 0,
    chunks: 0,
    errors: [],
    durationMs: 0,
  };

  log(`\n🧮 ${targets.length} page(s) need embedding`);

  for (const [i, target] of targets.entries()) {
    const pieces = chunkDocument(target.cleanText, chunking);
    if (pieces.length === 0) {
      result.failed++;
      result.errors.push({ url: target.url, message: "No text to embed" });
      continue;
    }

    let vectors: number[][];
    try {
      vectors = await embedder.embedBatch(pieces.map((piece) => piece.content));
    } catch (error) {
      if (error instanceof EmbeddingError && !error.unreachable) {
        result.failed++;
        result.errors.push({ url: target.url, message: describeError(error) });
        console.error(`   ❌ ${target.url}: ${describeError(error)}`);
        continue;
      }
      throw error;
    }

    // Page vector is the normalized mean of its chunk vectors
    const pageVector = normalizeVector(meanVector(vectors));
    await store.replaceChunks(
      target.url,
      pageVector,
      pieces.map((piece, j) => ({
        chunkIndex: piece.chunkIndex,
        text: piece.content,
        vector: vectors[j],
      }))
    );

    result.processed++;
    result.chunks += pieces.length;
    log(`   ✓ [${i + 1}/${targets.length}] ${target.url} (${pieces.length} chunks)`);
    onProgress?.(i + 1, targets.length, target.url);
  }

  result.durationMs = Date.now() - startTime;
  log(`\n✅ Embedded ${result.processed} page(s), ${result.chunks} chunk(s), ${result.failed} failed`);
  return result;
}
