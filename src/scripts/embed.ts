#!/usr/bin/env node
/**
 * Embed CLI - chunks and embeds every page changed since its last embedding
 *
 * Usage:
 *   npm run embed [--quiet]
 */

import { loadConfig } from "../config.js";
import { describeError } from "../errors.js";
import { createEmbedder } from "../services/embeddings.js";
import { runEmbedPass } from "../services/indexer.js";
import { openPostgresStore } from "../store/index.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes("--help") || args.includes("-h")) {
    console.log("Usage: npm run embed [--quiet]");
    return;
  }
  const verbose = !(args.includes("--quiet") || args.includes("-q"));

  const config = loadConfig();
  const store = openPostgresStore(config);

  try {
    const embedder = createEmbedder(config);
    const result = await runEmbedPass({
      store,
      embedder,
      chunking: config.chunking,
      verbose,
    });

    console.log("\n" + "═".repeat(60));
    console.log("📊 EMBED SUMMARY");
    console.log("═".repeat(60));
    console.log(`   • Pages needing embedding: ${result.targets}`);
    console.log(`   • Embedded: ${result.processed}`);
    console.log(`   • Chunks written: ${result.chunks}`);
    console.log(`   • Failed: ${result.failed}`);
    for (const failure of result.errors) {
      console.log(`     - ${failure.url}: ${failure.message}`);
    }
    console.log(`   • Duration: ${(result.durationMs / 1000).toFixed(1)}s`);
  } catch (error) {
    console.error("\n❌ Embed pass failed:", describeError(error));
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
