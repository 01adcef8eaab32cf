/**
 * Breadth-first crawler - dispatches one whole depth level at a time through
 * the fetch gateway, then persists results and enqueues new links in
 * dispatch order once the level has joined.
 *
 * Only the coordinating loop touches the frontier, so dedup needs no locks.
 */

import {
  CrawlAbortedError,
  describeError,
  PersistenceError,
  type FetchErrorKind,
} from "../errors.js";
import type { PageStore } from "../store/types.js";
import { Frontier, type FrontierEntry } from "./frontier.js";
import type { FetchGateway, FetchOutcome } from "./gateway.js";
import type { PageAssets, Parser } from "./types.js";
import { canonicalizeUrl, filterLinks, hostOf, siteKey } from "./url.js";

export type CrawlState = "idle" | "running" | "completed" | "aborted";

export interface CrawlerConfig {
  // Maximum crawl depth (0 = only the start URL)
  maxDepth: number;
  // Maximum pages dispatched over the whole crawl
  maxPages: number;
  // Pause between levels in ms (politeness)
  levelDelayMs: number;
  // Abort once failed / dispatched exceeds this ratio...
  failureThreshold: number;
  // ...but only after this many pages have been dispatched
  minPagesBeforeAbort: number;
  // Extra link filter (robots.txt rules)
  isAllowed?: (url: string) => boolean;
  onProgress?: (progress: CrawlProgress) => void;
  verbose: boolean;
}

export interface CrawlProgress {
  depth: number;
  levelSize: number;
  processed: number;
  frontierSize: number;
  visited: number;
}

export interface CrawlStats {
  processed: number;
  created: number;
  updated: number;
  skippedUnchanged: number;
  skippedError: number;
  discovered: number;
  levels: number;
  // Entries left undispatched when the crawl ended
  pending: number;
  durationMs: number;
  cancelled: boolean;
}

export interface CrawlFailure {
  url: string;
  depth: number;
  kind: FetchErrorKind | "parse-error";
  message: string;
  attempts: number;
}

export interface CrawlResult {
  startUrl: string;
  state: "completed" | "aborted";
  stats: CrawlStats;
  errors: CrawlFailure[];
  // Set when state is "aborted"
  abortReason?: string;
}

export interface CrawlerDeps {
  gateway: FetchGateway;
  parser: Parser;
  store: PageStore;
}

const DEFAULT_CONFIG: CrawlerConfig = {
  maxDepth: 3,
  maxPages: 1000,
  levelDelayMs: 200,
  failureThreshold: 0.5,
  minPagesBeforeAbort: 10,
  verbose: true,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class Crawler {
  private readonly cfg: CrawlerConfig;
  private frontier = new Frontier();
  private status: CrawlState = "idle";

  constructor(
    private readonly deps: CrawlerDeps,
    config: Partial<CrawlerConfig> = {}
  ) {
    this.cfg = { ...DEFAULT_CONFIG, ...config };
  }

  get state(): CrawlState {
    return this.status;
  }

  /**
   * Crawls from `startUrl`. Cancellation through `signal` takes effect
   * between levels; a level that has been dispatched always finishes.
   */
  async crawl(startUrl: string, signal?: AbortSignal): Promise<CrawlResult> {
    if (this.status !== "idle") {
      throw new Error(`Crawler already ${this.status}; create a new instance per crawl`);
    }

    const cfg = this.cfg;
    const log = cfg.verbose ? console.log : () => {};
    const startTime = Date.now();
    const start = canonicalizeUrl(startUrl);
    const referenceHost = hostOf(start);

    const stats: CrawlStats = {
      processed: 0,
      created: 0,
      updated: 0,
      skippedUnchanged: 0,
      skippedError: 0,
      discovered: 0,
      levels: 0,
      pending: 0,
      durationMs: 0,
      cancelled: false,
    };
    const errors: CrawlFailure[] = [];

    this.frontier = new Frontier((url) => siteKey(url, referenceHost));
    this.frontier.seed(start);
    this.status = "running";

    log(`\n🕷️  Starting crawl from: ${start}`);
    log(`   Max depth: ${cfg.maxDepth}, Max pages: ${cfg.maxPages}`);

    const finish = (state: "completed" | "aborted", abortReason?: string): CrawlResult => {
      this.status = state;
      stats.pending += this.frontier.size;
      stats.durationMs = Date.now() - startTime;
      return { startUrl: start, state, stats, errors, abortReason };
    };

    try {
      while (!this.frontier.isEmpty) {
        if (signal?.aborted) {
          stats.cancelled = true;
          log(`\n🛑 Crawl cancelled after ${stats.levels} level(s)`);
          break;
        }

        const remaining = cfg.maxPages - stats.processed;
        if (remaining <= 0) {
          log(`\n📦 Page budget of ${cfg.maxPages} reached`);
          break;
        }

        const depth = this.frontier.currentDepth;
        if (depth === null || depth > cfg.maxDepth) {
          break;
        }

        const level = this.frontier.takeLevel();
        const batch = level.slice(0, remaining);
        stats.pending += level.length - batch.length;
        stats.levels++;

        log(
          `\n📄 Depth ${depth}: dispatching ${batch.length} page(s) (${stats.processed}/${cfg.maxPages} done, ${this.frontier.size} queued)`
        );

        const outcomes = await this.deps.gateway.fetchAll(batch.map((entry) => entry.url));

        // Join point: results are handled in dispatch order
        for (let i = 0; i < batch.length; i++) {
          await this.handleOutcome(batch[i], outcomes[i], referenceHost, stats, errors, log);
        }

        if (
          stats.processed >= cfg.minPagesBeforeAbort &&
          stats.skippedError / stats.processed > cfg.failureThreshold
        ) {
          throw new CrawlAbortedError(
            `${stats.skippedError} of ${stats.processed} fetches failed (threshold ${cfg.failureThreshold})`
          );
        }

        cfg.onProgress?.({
          depth,
          levelSize: batch.length,
          processed: stats.processed,
          frontierSize: this.frontier.size,
          visited: this.frontier.visitedCount,
        });

        if (!this.frontier.isEmpty && cfg.levelDelayMs > 0 && stats.processed < cfg.maxPages) {
          await sleep(cfg.levelDelayMs);
        }
      }
    } catch (error) {
      if (error instanceof CrawlAbortedError || error instanceof PersistenceError) {
        console.error(`\n❌ Crawl aborted: ${describeError(error)}`);
        return finish("aborted", describeError(error));
      }
      this.status = "aborted";
      throw error;
    }

    const result = finish("completed");
    log(`\n✅ Crawl complete!`);
    log(`   Pages processed: ${stats.processed}`);
    log(`   Stored: ${stats.created} new, ${stats.updated} changed, ${stats.skippedUnchanged} unchanged`);
    log(`   Errors: ${stats.skippedError}`);
    log(`   Duration: ${(stats.durationMs / 1000).toFixed(1)}s`);
    return result;
  }

  private async handleOutcome(
    entry: FrontierEntry,
    outcome: FetchOutcome,
    referenceHost: string,
    stats: CrawlStats,
    errors: CrawlFailure[],
    log: (...args: unknown[]) => void
  ): Promise<void> {
    stats.processed++;

    if (!outcome.ok) {
      stats.skippedError++;
      errors.push({
        url: entry.url,
        depth: entry.depth,
        kind: outcome.error.kind,
        message: outcome.error.message,
        attempts: outcome.attempts,
      });
      log(`   ⚠️  ${outcome.error.kind}: ${entry.url}`);
      return;
    }

    let assets: PageAssets;
    try {
      // the frontier's canonical URL is the storage key
      assets = this.deps.parser.parse({ ...outcome.result, url: entry.url });
    } catch (error) {
      stats.skippedError++;
      errors.push({
        url: entry.url,
        depth: entry.depth,
        kind: "parse-error",
        message: describeError(error),
        attempts: outcome.attempts,
      });
      log(`   ⚠️  parse-error: ${entry.url}`);
      return;
    }

    const upsert = await this.deps.store.upsertPage(assets);
    if (upsert === "created") stats.created++;
    else if (upsert === "updated") stats.updated++;
    else stats.skippedUnchanged++;

    log(`   ${upsert === "unchanged" ? "----" : "EMBD"}  ${entry.url}`);

    if (entry.depth + 1 > this.cfg.maxDepth) {
      return;
    }

    const links = filterLinks(assets.links, entry.url, referenceHost, this.cfg.isAllowed);
    let added = 0;
    for (const link of links) {
      if (this.frontier.enqueue(link, entry.depth + 1)) {
        added++;
      }
    }
    stats.discovered += added;
    if (added > 0) {
      log(`         +${added} new link(s) at depth ${entry.depth + 1}`);
    }
  }
}
