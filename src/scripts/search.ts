#!/usr/bin/env node
/**
 * Search CLI
 *
 * Usage:
 *   npm run search "<query>" [--top-k n]
 */

import { loadConfig } from "../config.js";
import { describeError } from "../errors.js";
import { createEmbedder } from "../services/embeddings.js";
import { formatResults, searchIndex } from "../services/search.js";
import { openPostgresStore } from "../store/index.js";

function parseArgs(defaultTopK: number): { query: string; topK: number } {
  const args = process.argv.slice(2);
  const words: string[] = [];
  let topK = defaultTopK;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--top-k" || arg === "-k") {
      const value = Number(args[++i]);
      if (!Number.isInteger(value) || value < 1) {
        console.error("❌ --top-k needs a positive integer");
        process.exit(1);
      }
      topK = value;
    } else if (arg === "--help" || arg === "-h") {
      console.log('Usage: npm run search "<query>" [--top-k n]');
      process.exit(0);
    } else {
      words.push(arg);
    }
  }

  const query = words.join(" ").trim();
  if (!query) {
    console.error("❌ A query is required");
    process.exit(1);
  }
  return { query, topK };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const { query, topK } = parseArgs(config.search.topK);
  const store = openPostgresStore(config);

  try {
    const hits = await searchIndex(query, {
      store,
      embedder: createEmbedder(config),
      topK,
    });
    console.log(`\n🔍 ${query}\n`);
    console.log(formatResults(hits));
  } catch (error) {
    console.error("\n❌ Search failed:", describeError(error));
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
