/**
 * Capability interfaces for the crawl phase. Anything with these methods can
 * stand in for the real scrape service, parser or store.
 */

export type PageMetadata = Record<string, unknown>;

/**
 * What the scrape oracle reports for one URL
 */
export interface ScrapeResult {
  url: string;
  markdown: string;
  html: string;
  links: string[];
  metadata: PageMetadata;
}

export interface Fetcher {
  /** Throws `FetchError` on failure. */
  scrape(url: string, signal?: AbortSignal): Promise<ScrapeResult>;
}

export const PAGE_CATEGORIES = [
  "content",
  "hubs",
  "recruitment",
  "interactable",
] as const;

export type PageCategory = (typeof PAGE_CATEGORIES)[number];

/**
 * A parsed page, ready to persist
 */
export interface PageAssets {
  url: string;
  title: string;
  cleanText: string;
  rawMarkup: string;
  metadata: PageMetadata;
  links: string[];
  fingerprint: string;
  category: PageCategory | null;
  categoryConfidence: number | null;
}

export interface Parser {
  parse(result: ScrapeResult): PageAssets;
}
