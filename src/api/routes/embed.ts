import { Hono } from "hono";
import { runEmbedPass, type EmbedPassOptions, type EmbedPassResult } from "../../services/indexer.js";
import { JobRegistry } from "../jobs.js";

interface EmbedProgress {
  done: number;
  total: number;
}

export function createEmbedRouter(
  options: Omit<EmbedPassOptions, "onProgress">,
  jobs = new JobRegistry<EmbedPassResult, EmbedProgress>()
) {
  const embedRouter = new Hono();

  /**
   * POST /api/embed
   * Embed every page changed since its last embedding
   */
  embedRouter.post("/", (c) => {
    if (jobs.running) {
      return c.json({ error: "An embed pass is already running" }, 409);
    }
    const job = jobs.start((report) =>
      runEmbedPass({ ...options, onProgress: (done, total) => report({ done, total }) })
    );
    return c.json({ jobId: job.id, status: job.status }, 202);
  });

  embedRouter.get("/:id", (c) => {
    const job = jobs.get(c.req.param("id"));
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }
    return c.json(job);
  });

  return embedRouter;
}
