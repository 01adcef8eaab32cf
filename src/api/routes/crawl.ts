import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import { runCrawl, type CrawlRunOptions } from "../../crawler/index.js";
import type { CrawlProgress, CrawlResult } from "../../crawler/crawler.js";
import { validateUrl } from "../../crawler/url.js";
import { JobRegistry } from "../jobs.js";

export type CrawlJobOptions = Omit<CrawlRunOptions, "signal" | "onProgress">;

const crawlRequestSchema = z.object({
  url: z.string().min(1),
  maxDepth: z.number().int().nonnegative().optional(),
  maxPages: z.number().int().positive().optional(),
});

export function createCrawlRouter(
  options: CrawlJobOptions,
  jobs = new JobRegistry<CrawlResult, CrawlProgress>()
) {
  const crawlRouter = new Hono();

  /**
   * POST /api/crawl
   * Start a background crawl
   */
  crawlRouter.post("/", zValidator("json", crawlRequestSchema), (c) => {
    const { url, maxDepth, maxPages } = c.req.valid("json");

    const check = validateUrl(url);
    if (!check.ok) {
      return c.json({ error: `Invalid URL (${check.reason})` }, 400);
    }
    if (jobs.running) {
      return c.json({ error: "A crawl is already running" }, 409);
    }

    const settings = {
      ...options.settings,
      maxDepth: maxDepth ?? options.settings.maxDepth,
      maxPages: maxPages ?? options.settings.maxPages,
    };
    const job = jobs.start((report) =>
      runCrawl(check.url, { ...options, settings, onProgress: report })
    );

    return c.json({ jobId: job.id, status: job.status, url: check.url }, 202);
  });

  /**
   * GET /api/crawl/:id
   * Crawl job status
   */
  crawlRouter.get("/:id", (c) => {
    const job = jobs.get(c.req.param("id"));
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }
    return c.json(job);
  });

  return crawlRouter;
}
