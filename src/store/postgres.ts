/**
 * Postgres + pgvector PageStore. Row writes go through drizzle; the vector
 * search uses a raw query so `hnsw.ef_search` can be set for the transaction.
 */

import { and, asc, eq, gt, isNull, or, sql } from "drizzle-orm";
import { z } from "zod";
import type { PageAssets } from "../crawler/types.js";
import { hasChanged } from "../crawler/fingerprint.js";
import type { Database } from "../db/index.js";
import { chunks, pages } from "../db/schema.js";
import { PersistenceError } from "../errors.js";
import { distanceToScore, makeSnippet, rankMatches } from "./ranking.js";
import type {
  ChunkInput,
  EmbeddingTarget,
  PageStore,
  SimilarityMatch,
  UpsertOutcome,
} from "./types.js";

// Initial chunks fetched per requested page; the window doubles while one page crowds out others
const OVERFETCH_FACTOR = 4;

const chunkDistanceRow = z.object({
  url: z.string(),
  chunk_index: z.coerce.number().int(),
  text: z.string(),
  distance: z.coerce.number(),
});

/** The part of a pg Pool the vector search needs */
export interface VectorQueryPool {
  connect(): Promise<{
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
    release(): void;
  }>;
  end(): Promise<void>;
}

export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(",")}]`;
}

export class PostgresPageStore implements PageStore {
  constructor(
    private readonly db: Database,
    private readonly pool: VectorQueryPool,
    private readonly efSearch = 200
  ) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(`${operation} failed: ${message}`, error);
    }
  }

  upsertPage(assets: PageAssets): Promise<UpsertOutcome> {
    return this.run(`upsert ${assets.url}`, () =>
      this.db.transaction(async (tx): Promise<UpsertOutcome> => {
        const [existing] = await tx
          .select({ fingerprint: pages.contentFingerprint })
          .from(pages)
          .where(eq(pages.url, assets.url))
          .for("update");

        const fields = {
          title: assets.title,
          cleanText: assets.cleanText,
          rawMarkup: assets.rawMarkup,
          contentFingerprint: assets.fingerprint,
          metadata: assets.metadata,
          lastSeen: sql`now()`,
          category: assets.category,
          categoryConfidence: assets.categoryConfidence,
        };

        if (!existing) {
          await tx
            .insert(pages)
            .values({ url: assets.url, ...fields, fingerprintChangedAt: sql`now()` });
          return "created";
        }

        if (hasChanged(existing.fingerprint, assets.fingerprint)) {
          await tx
            .update(pages)
            .set({ ...fields, fingerprintChangedAt: sql`now()` })
            .where(eq(pages.url, assets.url));
          return "updated";
        }

        await tx.update(pages).set(fields).where(eq(pages.url, assets.url));
        return "unchanged";
      })
    );
  }

  targetsForEmbedding(): Promise<EmbeddingTarget[]> {
    return this.run("select embedding targets", async () => {
      const rows = await this.db
        .select({
          url: pages.url,
          title: pages.title,
          cleanText: pages.cleanText,
          fingerprintChangedAt: pages.fingerprintChangedAt,
          embeddedAt: pages.embeddedAt,
        })
        .from(pages)
        .where(
          and(
            sql`length(coalesce(${pages.cleanText}, '')) > 0`,
            or(isNull(pages.embeddedAt), gt(pages.fingerprintChangedAt, pages.embeddedAt))
          )
        )
        .orderBy(asc(pages.url));

      return rows.map((row) => ({ ...row, cleanText: row.cleanText ?? "" }));
    });
  }

  replaceChunks(url: string, summaryVector: number[], chunkInputs: ChunkInput[]): Promise<void> {
    return this.run(`store chunks for ${url}`, () =>
      this.db.transaction(async (tx) => {
        await tx.delete(chunks).where(eq(chunks.pageUrl, url));
        if (chunkInputs.length > 0) {
          await tx.insert(chunks).values(
            chunkInputs.map((chunk) => ({
              pageUrl: url,
              chunkIndex: chunk.chunkIndex,
              text: chunk.text,
              vector: chunk.vector,
            }))
          );
        }
        const updated = await tx
          .update(pages)
          .set({ summaryVector, embeddedAt: sql`now()` })
          .where(eq(pages.url, url))
          .returning({ url: pages.url });
        if (updated.length === 0) {
          throw new PersistenceError(`Unknown page: ${url}`);
        }
      })
    );
  }

  similarityQuery(vector: number[], topK: number): Promise<SimilarityMatch[]> {
    return this.run("similarity query", async () => {
      const client = await this.pool.connect();
      try {
        await client.query("BEGIN");
        // SET takes no bind parameters
        await client.query(`SET LOCAL hnsw.ef_search = ${Math.max(1, Math.floor(this.efSearch))}`);
        const literal = toVectorLiteral(vector);
        let limit = Math.max(1, topK) * OVERFETCH_FACTOR;
        let ranked: SimilarityMatch[] = [];
        for (;;) {
          const result = await client.query(
            `SELECT page_url AS url, chunk_index, text, vector <=> $1::vector AS distance
             FROM chunks
             ORDER BY vector <=> $1::vector, page_url, chunk_index
             LIMIT $2`,
            [literal, limit]
          );
          const rows = z.array(chunkDistanceRow).parse(result.rows);
          ranked = rankMatches(
            rows.map((row) => ({
              url: row.url,
              chunkIndex: row.chunk_index,
              score: distanceToScore(row.distance),
              snippet: makeSnippet(row.text),
            })),
            topK
          );
          // fewer rows than asked for means every chunk has been seen
          if (ranked.length >= topK || rows.length < limit) break;
          limit *= 2;
        }
        await client.query("COMMIT");

        return ranked;
      } catch (error) {
        await client.query("ROLLBACK").catch((rollbackError: unknown) => {
          console.error("Rollback failed:", rollbackError);
        });
        throw error;
      } finally {
        client.release();
      }
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
