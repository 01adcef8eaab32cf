#!/usr/bin/env node
/**
 * Crawl CLI - crawls a site breadth-first and stores every page
 *
 * Usage:
 *   npm run crawl <url> [options]
 *
 * Examples:
 *   npm run crawl https://docs.example.com
 *   npm run crawl https://example.com --depth 2 --max-pages 50
 */

import { loadConfig, type AppConfig } from "../config.js";
import { runCrawl, type CrawlSettings } from "../crawler/index.js";
import { validateUrl } from "../crawler/url.js";
import { describeError } from "../errors.js";
import { MemoryPageStore, openPostgresStore } from "../store/index.js";
import type { PageStore } from "../store/types.js";

interface CrawlArgs {
  url: string;
  overrides: Partial<CrawlSettings>;
  store: boolean;
  verbose: boolean;
}

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed) || parsed < 0) {
    console.error(`❌ ${flag} needs a non-negative number`);
    process.exit(1);
  }
  return parsed;
}

// Parse command line arguments
function parseArgs(): CrawlArgs {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    printHelp();
    process.exit(0);
  }

  const check = validateUrl(args[0]);
  if (!check.ok) {
    console.error(`❌ Invalid URL: ${args[0]} (${check.reason})`);
    process.exit(1);
  }

  const parsed: CrawlArgs = { url: check.url, overrides: {}, store: true, verbose: true };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--depth":
      case "-d":
        parsed.overrides.maxDepth = Math.floor(parseNumber(arg, args[++i]));
        break;

      case "--max-pages":
      case "-m":
        parsed.overrides.maxPages = Math.max(1, Math.floor(parseNumber(arg, args[++i])));
        break;

      case "--concurrency":
      case "-c":
        parsed.overrides.concurrency = Math.max(1, Math.floor(parseNumber(arg, args[++i])));
        break;

      case "--delay":
        parsed.overrides.requestSpacingMs = parseNumber(arg, args[++i]);
        break;

      case "--no-robots":
        parsed.overrides.respectRobots = false;
        break;

      case "--no-store":
        parsed.store = false;
        break;

      case "--quiet":
      case "-q":
        parsed.verbose = false;
        break;

      default:
        console.error(`❌ Unknown option: ${arg}`);
        printHelp();
        process.exit(1);
    }
  }

  return parsed;
}

function printHelp(): void {
  console.log(`
🕷️  SITE CRAWLER
================

Usage:
  npm run crawl <url> [options]

Arguments:
  url                      The start URL; only its domain is crawled

Options:
  -d, --depth <n>          Maximum crawl depth (default: CRAWL_MAX_DEPTH or 3)
  -m, --max-pages <n>      Maximum pages to fetch (default: CRAWL_MAX_PAGES or 1000)
  -c, --concurrency <n>    Concurrent fetches (default: CRAWL_CONCURRENCY or 8)
  --delay <ms>             Minimum spacing between requests (default: 200)
  --no-robots              Ignore robots.txt
  --no-store               Keep pages in memory instead of Postgres
  -q, --quiet              Less verbose output
  -h, --help               Show this help message
`);
}

function openStore(config: AppConfig, persistent: boolean): PageStore {
  return persistent ? openPostgresStore(config) : new MemoryPageStore();
}

async function main(): Promise<void> {
  const { url, overrides, store: persistent, verbose } = parseArgs();
  const config = loadConfig();

  console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   🕷️  SITE CRAWLER                                         ║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
`);

  const store = openStore(config, persistent);
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\n🛑 Stopping after the current level...");
    controller.abort();
  });

  try {
    const result = await runCrawl(url, {
      settings: { ...config.crawler, ...overrides },
      firecrawl: config.firecrawl,
      store,
      verbose,
      signal: controller.signal,
    });

    if (!verbose) {
      const { stats } = result;
      console.log(
        `${result.state}: ${stats.processed} processed, ${stats.skippedError} failed, ${stats.skippedUnchanged} unchanged`
      );
    }

    if (result.state === "aborted") {
      process.exitCode = 1;
      return;
    }
    console.log("\n✅ Crawl completed successfully!");
  } catch (error) {
    console.error("\n❌ Crawl failed:", describeError(error));
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

// Run
main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
