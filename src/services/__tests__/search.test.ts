import { describe, expect, it } from "vitest";
import { FakeEmbedder } from "../../__tests__/fakes.js";
import { ScrapeResultParser } from "../../crawler/parser.js";
import { MemoryPageStore } from "../../store/memory.js";
import { runEmbedPass } from "../indexer.js";
import { formatResults, searchIndex } from "../search.js";

async function indexedStore() {
  const store = new MemoryPageStore();
  const parser = new ScrapeResultParser();
  const pages = {
    "https://a.example/pricing": "Plans start at ten dollars a month.",
    "https://a.example/team": "Our team works from three offices.",
    "https://a.example/blog": "Release notes for the spring update.",
  };
  for (const [url, markdown] of Object.entries(pages)) {
    await store.upsertPage(parser.parse({ url, markdown, html: "", links: [], metadata: {} }));
  }
  const embedder = new FakeEmbedder();
  await runEmbedPass({ store, embedder, verbose: false });
  return { store, embedder };
}

describe("searchIndex", () => {
  it("ranks the page whose text matches the query exactly first", async () => {
    const { store, embedder } = await indexedStore();

    const hits = await searchIndex("Our team works from three offices.", { store, embedder, topK: 2 });

    expect(hits).toHaveLength(2);
    expect(hits[0]).toEqual({
      rank: 1,
      url: "https://a.example/team",
      score: 1,
      snippet: "Our team works from three offices.",
    });
    expect(hits[1].rank).toBe(2);
    expect(hits[1].score).toBeLessThanOrEqual(1);
  });

  it("rejects an empty query", async () => {
    const { store, embedder } = await indexedStore();
    await expect(searchIndex("   ", { store, embedder, topK: 3 })).rejects.toMatchObject({
      code: "INVALID_QUERY",
    });
  });

  it("rejects a non-positive topK", async () => {
    const { store, embedder } = await indexedStore();
    await expect(searchIndex("team", { store, embedder, topK: 0 })).rejects.toThrow(
      "topK must be a positive integer, got 0"
    );
  });

  it("returns nothing from an empty index", async () => {
    const hits = await searchIndex("anything", {
      store: new MemoryPageStore(),
      embedder: new FakeEmbedder(),
      topK: 5,
    });
    expect(hits).toEqual([]);
  });
});

describe("formatResults", () => {
  it("prints one block per hit", () => {
    const text = formatResults([
      { rank: 1, url: "https://a.example/x", score: 0.87349, snippet: "First\nline  here" },
      { rank: 2, url: "https://a.example/y", score: 0.5, snippet: "Second" },
    ]);
    expect(text).toBe(
      "#1  score=0.873  https://a.example/x\n    First line here\n\n#2  score=0.500  https://a.example/y\n    Second"
    );
  });

  it("says so when nothing matched", () => {
    expect(formatResults([])).toBe("No results.");
  });
});
