/**
 * Turns a scrape result into the page record the store persists.
 * The markdown reported by the scrape service is the page's clean text.
 */

import type { PageCategorizer } from "./categorizer.js";
import { computeFingerprint } from "./fingerprint.js";
import type { PageAssets, Parser, ScrapeResult } from "./types.js";

export class ScrapeResultParser implements Parser {
  constructor(private readonly categorizer: PageCategorizer | null = null) {}

  parse(result: ScrapeResult): PageAssets {
    const cleanText = result.markdown.trim();
    const title = extractTitle(result);
    const match = this.categorizer?.categorize(result.url, title, cleanText) ?? null;

    return {
      url: result.url,
      title,
      cleanText,
      rawMarkup: result.html,
      metadata: result.metadata,
      links: result.links,
      fingerprint: computeFingerprint(cleanText),
      category: match?.category ?? null,
      categoryConfidence: match?.confidence ?? null,
    };
  }
}

export function extractTitle(result: ScrapeResult): string {
  const fromMetadata = result.metadata.title ?? result.metadata.ogTitle;
  if (typeof fromMetadata === "string" && fromMetadata.trim()) {
    return fromMetadata.trim();
  }

  const heading = /^#\s+(.+)$/m.exec(result.markdown);
  return heading ? heading[1].trim() : "";
}
