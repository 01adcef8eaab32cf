/**
 * Fetch Gateway - bounded-concurrency, paced access to the scrape oracle.
 *
 * All fetches share one p-queue: `concurrency` caps in-flight requests and
 * `interval` + `intervalCap: 1` enforces a minimum spacing between request
 * starts. Retries go back through the queue, so they are paced as well.
 */

import PQueue from "p-queue";
import { FetchError } from "../errors.js";
import type { Fetcher, ScrapeResult } from "./types.js";

export interface GatewayConfig {
  // Maximum in-flight fetches
  concurrency: number;
  // Minimum delay between the start of two fetches, in ms
  requestSpacingMs: number;
  // Total attempts per URL, first try included
  maxAttempts: number;
  // Backoff before retry n is retryBaseDelayMs * 2^(n-1)
  retryBaseDelayMs: number;
  verbose?: boolean;
}

export type FetchOutcome =
  | { ok: true; url: string; result: ScrapeResult; attempts: number }
  | { ok: false; url: string; error: FetchError; attempts: number };

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  concurrency: 8,
  requestSpacingMs: 200,
  maxAttempts: 3,
  retryBaseDelayMs: 1000,
  verbose: true,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toFetchError(error: unknown, url: string): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError("transient-network", `Fetch failed for ${url}: ${message}`, {
    cause: error,
  });
}

export class FetchGateway {
  private readonly queue: PQueue;
  private readonly cfg: GatewayConfig;

  constructor(
    private readonly fetcher: Fetcher,
    config: Partial<GatewayConfig> = {},
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {
    this.cfg = { ...DEFAULT_GATEWAY_CONFIG, ...config };
    this.queue = new PQueue({
      concurrency: this.cfg.concurrency,
      interval: this.cfg.requestSpacingMs,
      intervalCap: 1,
    });
  }

  /**
   * Fetches one URL. Per-URL failures come back as `{ ok: false }`.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.queue.add(() => this.fetcher.scrape(url, signal), {
          throwOnTimeout: true,
        });
        return { ok: true, url, result, attempts: attempt };
      } catch (error) {
        const fetchError = toFetchError(error, url);

        if (!fetchError.retryable || attempt >= this.cfg.maxAttempts) {
          return { ok: false, url, error: fetchError, attempts: attempt };
        }

        const delayMs = this.cfg.retryBaseDelayMs * Math.pow(2, attempt - 1);
        if (this.cfg.verbose) {
          console.log(
            `   ⏳ ${fetchError.kind} on ${url}, retrying in ${(delayMs / 1000).toFixed(1)}s (attempt ${attempt + 1}/${this.cfg.maxAttempts})`
          );
        }
        await this.wait(delayMs);
      }
    }
  }

  /**
   * Fetches a batch concurrently; outcomes keep the order of `urls`.
   */
  fetchAll(urls: readonly string[], signal?: AbortSignal): Promise<FetchOutcome[]> {
    return Promise.all(urls.map((url) => this.fetch(url, signal)));
  }

  /** Requests running or waiting for a slot */
  get load(): number {
    return this.queue.size + this.queue.pending;
  }
}
