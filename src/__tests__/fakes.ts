import { FetchError } from "../errors.js";
import type { Fetcher, ScrapeResult } from "../crawler/types.js";
import { normalizeVector, type Embedder } from "../services/embeddings.js";

export interface FakePage {
  markdown?: string;
  links?: string[];
  title?: string;
  fail?: FetchError;
}

/**
 * Serves scripted pages; unknown URLs answer like a 404
 */
export class FakeFetcher implements Fetcher {
  readonly calls: string[] = [];

  constructor(private readonly pages: Record<string, FakePage>) {}

  async scrape(url: string): Promise<ScrapeResult> {
    this.calls.push(url);
    const page: FakePage | undefined = this.pages[url];
    if (!page) {
      throw new FetchError("upstream-rejected-input", `No page at ${url}`, { status: 404 });
    }
    if (page.fail) {
      throw page.fail;
    }
    return {
      url,
      markdown: page.markdown ?? `# Page ${url}\n\nSome text about ${url}.`,
      html: "<html></html>",
      links: page.links ?? [],
      metadata: page.title ? { title: page.title } : {},
    };
  }
}

/**
 * Same text, same vector: character codes folded into a fixed width
 */
export class FakeEmbedder implements Embedder {
  readonly dimensions = 16;
  batches = 0;

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (let i = 0; i < text.length; i++) {
      vector[i % this.dimensions] += text.charCodeAt(i);
    }
    return normalizeVector(vector);
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorFor(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batches++;
    return texts.map((text) => this.vectorFor(text));
  }
}

/** A clock that moves one second per call */
export function steppingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let tick = 0;
  return () => new Date(start + tick++ * 1000);
}
