/**
 * Firecrawl-backed Fetcher - posts URLs to the /scrape endpoint and returns
 * markdown, html, outbound links and page metadata in one response.
 */

import { z } from "zod";
import { FetchError, type FetchErrorKind } from "../errors.js";
import type { Fetcher, ScrapeResult } from "./types.js";

export interface FirecrawlConfig {
  baseUrl: string;
  apiKey?: string;
  // Per-request timeout in ms
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

const scrapeResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  data: z
    .object({
      markdown: z.string().nullish(),
      html: z.string().nullish(),
      links: z.array(z.string()).nullish(),
      metadata: z.record(z.unknown()).nullish(),
    })
    .nullish(),
});

/**
 * Maps an HTTP status from the scrape service to a fetch failure kind
 */
export function classifyStatus(status: number): FetchErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "transient-network";
  if (status >= 400 && status < 500) return "upstream-rejected-input";
  return "upstream-server-error";
}

export class FirecrawlFetcher implements Fetcher {
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: FirecrawlConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/scrape`;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async scrape(url: string, signal?: AbortSignal): Promise<ScrapeResult> {
    const body = {
      url,
      formats: ["markdown", "html", "links"],
      onlyMainContent: false,
      excludeTags: ["img", "video"],
      removeBase64Images: true,
      blockAds: true,
      parsePDF: true,
      maxAge: 0,
      timeout: Math.min(this.timeoutMs, 30000),
    };

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.endpoint, {
          method: "POST",
          headers,
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        if (timedOut || signal?.aborted) {
          throw new FetchError("timeout", `Request timed out for ${url}`, { cause: error });
        }
        throw new FetchError(
          "transient-network",
          `Scrape service unreachable for ${url}: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        );
      }

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw new FetchError(
          classifyStatus(response.status),
          `Scrape service returned ${response.status} for ${url}${text ? `: ${text.slice(0, 200)}` : ""}`,
          { status: response.status }
        );
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        if (timedOut) {
          throw new FetchError("timeout", `Request timed out for ${url}`, { cause: error });
        }
        throw new FetchError("upstream-server-error", `Malformed scrape response for ${url}`, {
          status: response.status,
          cause: error,
        });
      }

      const parsed = scrapeResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new FetchError("upstream-server-error", `Unexpected scrape response shape for ${url}`, {
          status: response.status,
          cause: parsed.error,
        });
      }
      if (!parsed.data.success || !parsed.data.data) {
        throw new FetchError(
          "upstream-server-error",
          `Scrape failed for ${url}: ${parsed.data.error ?? "unknown error"}`,
          { status: response.status }
        );
      }

      const data = parsed.data.data;
      return {
        url,
        markdown: data.markdown ?? "",
        html: data.html ?? "",
        links: data.links ?? [],
        metadata: data.metadata ?? {},
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
