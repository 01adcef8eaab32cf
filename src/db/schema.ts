import {
  pgTable,
  text,
  timestamp,
  integer,
  real,
  jsonb,
  varchar,
  index,
  check,
  primaryKey,
  vector,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { PageCategory, PageMetadata } from "../crawler/types.js";

// Width of every stored vector; EMBEDDING_DIMENSIONS must match
export const VECTOR_DIMENSIONS = 1024;

// Crawled pages, keyed by canonical URL
export const pages = pgTable(
  "pages",
  {
    url: text("url").primaryKey(),
    title: text("title"),
    cleanText: text("clean_text"),
    rawMarkup: text("raw_markup"),
    contentFingerprint: text("content_fingerprint"),
    fingerprintChangedAt: timestamp("fingerprint_changed_at", { withTimezone: true }),
    metadata: jsonb("metadata").$type<PageMetadata>(),
    lastSeen: timestamp("last_seen", { withTimezone: true }),
    // Written only by the embed phase
    summaryVector: vector("summary_vector", { dimensions: VECTOR_DIMENSIONS }),
    embeddedAt: timestamp("embedded_at", { withTimezone: true }),
    category: varchar("category", { length: 20 }).$type<PageCategory>(),
    categoryConfidence: real("category_confidence"),
  },
  (table) => [
    index("idx_pages_content_fingerprint").on(table.contentFingerprint),
    index("idx_pages_category").on(table.category),
    check(
      "chk_category",
      sql`${table.category} IN ('content', 'hubs', 'recruitment', 'interactable')`
    ),
    check(
      "chk_category_confidence",
      sql`${table.categoryConfidence} >= 0 AND ${table.categoryConfidence} <= 1`
    ),
  ]
);

// Chunked page text for vector search
export const chunks = pgTable(
  "chunks",
  {
    pageUrl: text("page_url")
      .references(() => pages.url, { onDelete: "cascade" })
      .notNull(),
    chunkIndex: integer("chunk_index").notNull(),
    text: text("text").notNull(),
    vector: vector("vector", { dimensions: VECTOR_DIMENSIONS }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.pageUrl, table.chunkIndex] }),
    // HNSW needs no training phase and works well regardless of data size
    index("idx_chunks_vector").using("hnsw", table.vector.op("vector_cosine_ops")),
  ]
);

export type Page = typeof pages.$inferSelect;
export type NewPage = typeof pages.$inferInsert;

export type Chunk = typeof chunks.$inferSelect;
export type NewChunk = typeof chunks.$inferInsert;
