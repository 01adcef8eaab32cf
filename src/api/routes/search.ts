import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import { describeError, SiteIndexError } from "../../errors.js";
import { searchIndex, type SearchOptions } from "../../services/search.js";

const searchRequestSchema = z.object({
  query: z.string().trim().min(1),
  topK: z.number().int().min(1).max(100).optional(),
});

export function createSearchRouter(options: SearchOptions) {
  const searchRouter = new Hono();

  /**
   * POST /api/search
   * Semantic search over embedded pages
   */
  searchRouter.post("/", zValidator("json", searchRequestSchema), async (c) => {
    const { query, topK } = c.req.valid("json");

    try {
      const results = await searchIndex(query, { ...options, topK: topK ?? options.topK });
      return c.json({ query, results });
    } catch (error) {
      if (error instanceof SiteIndexError && error.code === "INVALID_QUERY") {
        return c.json({ error: error.message }, 400);
      }
      console.error("Search error:", describeError(error));
      return c.json({ error: "Search failed" }, 500);
    }
  });

  return searchRouter;
}
