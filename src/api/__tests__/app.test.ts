import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { FakeEmbedder, FakeFetcher } from "../../__tests__/fakes.js";
import { loadConfig } from "../../config.js";
import { MemoryPageStore } from "../../store/memory.js";
import { createApp } from "../app.js";

const jobResponse = z.object({ jobId: z.string(), status: z.string() });
const jobStatus = z.object({ status: z.string(), result: z.unknown().optional() });

function testApp() {
  const store = new MemoryPageStore();
  const fetcher = new FakeFetcher({
    "https://a.example/": {
      markdown: "# Home\n\nThe example company builds garden tools.",
      links: ["/about"],
    },
    "https://a.example/about": { markdown: "# About\n\nFounded by two gardeners." },
  });
  const settings = {
    ...loadConfig({}).crawler,
    requestSpacingMs: 0,
    levelDelayMs: 0,
    respectRobots: false,
  };
  const app = createApp({
    store,
    embedder: new FakeEmbedder(),
    crawl: { settings, fetcher },
    topK: 5,
    verbose: false,
  });
  return { app, store, fetcher };
}

function postJson(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

async function waitForJob(
  app: ReturnType<typeof testApp>["app"],
  path: string
): Promise<z.infer<typeof jobStatus>> {
  return vi.waitFor(async () => {
    const res = await app.request(path);
    const job = jobStatus.parse(await res.json());
    expect(job.status).not.toBe("running");
    return job;
  });
}

describe("API", () => {
  it("reports health", async () => {
    const { app } = testApp();
    const res = await app.request("/api/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });

  it("runs a crawl job, an embed job and a search", async () => {
    const { app, store, fetcher } = testApp();

    const crawlRes = await app.request("/api/crawl", postJson({ url: "https://a.example", maxDepth: 1 }));
    expect(crawlRes.status).toBe(202);
    const crawl = jobResponse.parse(await crawlRes.json());

    const crawlJob = await waitForJob(app, `/api/crawl/${crawl.jobId}`);
    expect(crawlJob).toMatchObject({
      status: "completed",
      result: { state: "completed", stats: { processed: 2, created: 2 } },
    });
    expect(fetcher.calls).toEqual(["https://a.example/", "https://a.example/about"]);
    expect(store.pageCount).toBe(2);

    const embedRes = await app.request("/api/embed", { method: "POST" });
    expect(embedRes.status).toBe(202);
    const embed = jobResponse.parse(await embedRes.json());
    const embedJob = await waitForJob(app, `/api/embed/${embed.jobId}`);
    expect(embedJob).toMatchObject({ status: "completed", result: { processed: 2, failed: 0 } });

    const searchRes = await app.request(
      "/api/search",
      postJson({ query: "# About\n\nFounded by two gardeners.", topK: 1 })
    );
    expect(searchRes.status).toBe(200);
    expect(await searchRes.json()).toEqual({
      query: "# About\n\nFounded by two gardeners.",
      results: [
        {
          rank: 1,
          url: "https://a.example/about",
          score: 1,
          snippet: "# About\n\nFounded by two gardeners.",
        },
      ],
    });
  });

  it("rejects a crawl of a URL that cannot be fetched", async () => {
    const { app } = testApp();
    const res = await app.request("/api/crawl", postJson({ url: "ftp://a.example/" }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid URL (unsupported-scheme)" });
  });

  it("validates request bodies", async () => {
    const { app } = testApp();
    expect((await app.request("/api/crawl", postJson({ maxDepth: 1 }))).status).toBe(400);
    expect((await app.request("/api/search", postJson({ query: "   " }))).status).toBe(400);
    expect((await app.request("/api/search", postJson({ query: "x", topK: 0 }))).status).toBe(400);
  });

  it("answers 404 for unknown jobs", async () => {
    const { app } = testApp();
    expect((await app.request("/api/crawl/nope")).status).toBe(404);
    expect((await app.request("/api/embed/nope")).status).toBe(404);
  });
});
