import { serve } from "@hono/node-server";
import { loadConfig } from "../config.js";
import { createEmbedder } from "../services/embeddings.js";
import { openPostgresStore } from "../store/index.js";
import { createApp } from "./app.js";

const config = loadConfig();
const store = openPostgresStore(config);

const app = createApp({
  store,
  embedder: createEmbedder(config),
  crawl: { settings: config.crawler, firecrawl: config.firecrawl },
  chunking: config.chunking,
  topK: config.search.topK,
});

const port = config.port;

console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   🔎  Site Index API                                      ║
║                                                           ║
║   Server running at http://localhost:${String(port).padEnd(5)}                ║
║                                                           ║
║   Endpoints:                                              ║
║   • GET  /api/health       - Health check                 ║
║   • POST /api/crawl        - Start a crawl job            ║
║   • GET  /api/crawl/:id    - Crawl job status             ║
║   • POST /api/embed        - Start an embed job           ║
║   • GET  /api/embed/:id    - Embed job status             ║
║   • POST /api/search       - Semantic search              ║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
`);

const server = serve({
  fetch: app.fetch,
  port,
});

process.on("SIGTERM", () => {
  server.close();
  store.close().catch((error: unknown) => {
    console.error("Failed to close store:", error);
  });
});
