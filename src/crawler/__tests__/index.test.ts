import { describe, expect, it, vi } from "vitest";
import { FakeFetcher } from "../../__tests__/fakes.js";
import { loadConfig } from "../../config.js";
import { MemoryPageStore } from "../../store/memory.js";
import { runCrawl, type CrawlSettings } from "../index.js";

const settings: CrawlSettings = {
  ...loadConfig({}).crawler,
  maxDepth: 1,
  requestSpacingMs: 0,
  levelDelayMs: 0,
};

const SITE = {
  "https://a.example/": { links: ["/private/report", "/public"] },
  "https://a.example/public": {},
  "https://a.example/private/report": {},
};

describe("runCrawl", () => {
  it("follows robots.txt disallow rules", async () => {
    const fetcher = new FakeFetcher(SITE);
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("User-agent: *\nDisallow: /private\n", { status: 200 }));

    const result = await runCrawl("https://a.example/", {
      settings,
      store: new MemoryPageStore(),
      fetcher,
      fetchImpl,
      verbose: false,
    });

    expect(fetchImpl).toHaveBeenCalledOnce();
    expect(fetcher.calls).toEqual(["https://a.example/", "https://a.example/public"]);
    expect(result.stats.processed).toBe(2);
  });

  it("skips robots.txt when told to", async () => {
    const fetcher = new FakeFetcher(SITE);
    const fetchImpl = vi.fn<typeof fetch>();

    await runCrawl("https://a.example/", {
      settings: { ...settings, respectRobots: false },
      store: new MemoryPageStore(),
      fetcher,
      fetchImpl,
      verbose: false,
    });

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(fetcher.calls).toHaveLength(3);
  });

  it("needs either a fetcher or scrape service settings", async () => {
    await expect(
      runCrawl("https://a.example/", {
        settings: { ...settings, respectRobots: false },
        store: new MemoryPageStore(),
        verbose: false,
      })
    ).rejects.toThrow("Either a fetcher or Firecrawl settings are required");
  });

  it("rejects a start URL that cannot be fetched", async () => {
    await expect(
      runCrawl("mailto:someone@a.example", { settings, store: new MemoryPageStore(), verbose: false })
    ).rejects.toThrow(TypeError);
  });
});
