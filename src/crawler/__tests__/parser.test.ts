import { describe, expect, it } from "vitest";
import { PageCategorizer } from "../categorizer.js";
import { computeFingerprint } from "../fingerprint.js";
import { extractTitle, ScrapeResultParser } from "../parser.js";
import type { ScrapeResult } from "../types.js";

function result(overrides: Partial<ScrapeResult> = {}): ScrapeResult {
  return {
    url: "https://a.example/blog/post",
    markdown: "\n# First post\n\nHello there.\n",
    html: "<h1>First post</h1>",
    links: ["/about"],
    metadata: {},
    ...overrides,
  };
}

describe("extractTitle", () => {
  it("prefers the metadata title", () => {
    expect(extractTitle(result({ metadata: { title: "  Meta title " } }))).toBe("Meta title");
    expect(extractTitle(result({ metadata: { ogTitle: "OG title" } }))).toBe("OG title");
  });

  it("falls back to the first top-level heading", () => {
    expect(extractTitle(result())).toBe("First post");
    expect(extractTitle(result({ markdown: "## Sub only" }))).toBe("");
  });
});

describe("ScrapeResultParser", () => {
  it("builds the page assets", async () => {
    const assets = new ScrapeResultParser(await PageCategorizer.load()).parse(result());

    expect(assets).toMatchObject({
      url: "https://a.example/blog/post",
      title: "First post",
      cleanText: "# First post\n\nHello there.",
      rawMarkup: "<h1>First post</h1>",
      links: ["/about"],
      fingerprint: computeFingerprint("# First post\n\nHello there."),
      category: "content",
    });
  });

  it("leaves the category empty without a categorizer", () => {
    const assets = new ScrapeResultParser(null).parse(result());
    expect(assets.category).toBeNull();
    expect(assets.categoryConfidence).toBeNull();
  });
});
