import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { ChunkOptions } from "../services/chunker.js";
import type { Embedder } from "../services/embeddings.js";
import type { PageStore } from "../store/types.js";
import { createCrawlRouter, type CrawlJobOptions } from "./routes/crawl.js";
import { createEmbedRouter } from "./routes/embed.js";
import { createSearchRouter } from "./routes/search.js";

export interface AppDeps {
  store: PageStore;
  embedder: Embedder;
  crawl: Omit<CrawlJobOptions, "store">;
  chunking?: Partial<ChunkOptions>;
  topK: number;
  // Request logging and job progress output
  verbose?: boolean;
}

export function createApp(deps: AppDeps) {
  const { store, embedder, verbose = true } = deps;
  const app = new Hono();

  // Middleware
  if (verbose) {
    app.use("*", logger());
  }
  app.use("*", cors());

  // API Routes
  app.route("/api/crawl", createCrawlRouter({ ...deps.crawl, store, verbose }));
  app.route("/api/embed", createEmbedRouter({ store, embedder, chunking: deps.chunking, verbose }));
  app.route("/api/search", createSearchRouter({ store, embedder, topK: deps.topK }));

  // Health check
  app.get("/api/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return app;
}
