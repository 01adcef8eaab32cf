/**
 * Crawl Orchestrator - wires robots.txt, the fetch gateway, the parser and a
 * page store into one crawl run
 */

import type { AppConfig } from "../config.js";
import type { PageStore } from "../store/types.js";
import { PageCategorizer } from "./categorizer.js";
import { Crawler, type CrawlProgress, type CrawlResult } from "./crawler.js";
import { FirecrawlFetcher } from "./firecrawl.js";
import { FetchGateway } from "./gateway.js";
import { ScrapeResultParser } from "./parser.js";
import { getRobotsInfo, isUrlAllowed } from "./robots.js";
import type { Fetcher } from "./types.js";
import { canonicalizeUrl } from "./url.js";

export type CrawlSettings = AppConfig["crawler"];

export interface CrawlRunOptions {
  settings: CrawlSettings;
  store: PageStore;
  // Defaults to a FirecrawlFetcher built from `firecrawl`
  fetcher?: Fetcher;
  firecrawl?: AppConfig["firecrawl"];
  // Used for robots.txt only
  fetchImpl?: typeof fetch;
  verbose?: boolean;
  signal?: AbortSignal;
  onProgress?: (progress: CrawlProgress) => void;
}

function buildFetcher(options: CrawlRunOptions): Fetcher {
  if (options.fetcher) return options.fetcher;
  if (!options.firecrawl) {
    throw new Error("Either a fetcher or Firecrawl settings are required");
  }
  return new FirecrawlFetcher({
    baseUrl: options.firecrawl.baseUrl,
    apiKey: options.firecrawl.apiKey,
    timeoutMs: options.settings.fetchTimeoutMs,
  });
}

/**
 * Crawls a site from `seedUrl` and persists every page through `store`
 */
export async function runCrawl(seedUrl: string, options: CrawlRunOptions): Promise<CrawlResult> {
  const { settings, verbose = true } = options;
  const start = canonicalizeUrl(seedUrl);
  const log = verbose ? console.log : () => {};

  let requestSpacingMs = settings.requestSpacingMs;
  let isAllowed: ((url: string) => boolean) | undefined;

  if (settings.respectRobots) {
    log("\n🤖 Checking robots.txt...");
    const robots = await getRobotsInfo(start, options.fetchImpl);
    if (robots.crawlDelayMs !== undefined && robots.crawlDelayMs > requestSpacingMs) {
      log(`   Found crawl-delay: ${robots.crawlDelayMs}ms`);
      requestSpacingMs = robots.crawlDelayMs;
    }
    if (robots.disallowed.length > 0) {
      log(`   Disallowed paths: ${robots.disallowed.length}`);
      isAllowed = (url) => isUrlAllowed(url, robots.disallowed);
    }
  }

  const gateway = new FetchGateway(buildFetcher(options), {
    concurrency: settings.concurrency,
    requestSpacingMs,
    maxAttempts: settings.maxAttempts,
    retryBaseDelayMs: settings.retryBaseDelayMs,
    verbose,
  });

  const crawler = new Crawler(
    {
      gateway,
      parser: new ScrapeResultParser(await PageCategorizer.load()),
      store: options.store,
    },
    {
      maxDepth: settings.maxDepth,
      maxPages: settings.maxPages,
      levelDelayMs: settings.levelDelayMs,
      failureThreshold: settings.failureThreshold,
      isAllowed,
      onProgress: options.onProgress,
      verbose,
    }
  );

  const result = await crawler.crawl(start, options.signal);
  if (verbose) {
    printSummary(result);
  }
  return result;
}

export function printSummary(result: CrawlResult): void {
  const { stats } = result;
  console.log("\n" + "═".repeat(60));
  console.log("📊 CRAWL SUMMARY");
  console.log("═".repeat(60));
  console.log(`\n🕷️  ${result.startUrl} (${result.state})`);
  console.log(`   • Pages processed: ${stats.processed}`);
  console.log(`   • New: ${stats.created}, changed: ${stats.updated}`);
  console.log(`   • Skipped (unchanged): ${stats.skippedUnchanged}`);
  console.log(`   • Skipped (error): ${stats.skippedError}`);
  console.log(`   • Links discovered: ${stats.discovered}`);
  console.log(`   • Left in frontier: ${stats.pending}`);
  console.log(`   • Duration: ${(stats.durationMs / 1000).toFixed(1)}s`);
  if (result.abortReason) {
    console.log(`\n❌ Aborted: ${result.abortReason}`);
  }

  if (result.errors.length > 0) {
    console.log(`\n⚠️  Errors (${result.errors.length}):`);
    for (const failure of result.errors.slice(0, 10)) {
      console.log(`   • [${failure.kind}] ${failure.url}`);
    }
    if (result.errors.length > 10) {
      console.log(`   ... and ${result.errors.length - 10} more`);
    }
  }
  console.log("═".repeat(60));
}
