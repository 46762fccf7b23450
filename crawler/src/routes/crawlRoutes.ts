import { Router } from "express";
import { z } from "zod";
import { EstateCrawler } from "../crawlers/estateCrawler";
import { Logger } from "../lib/logger";
import { errorMessage, StorageUnavailableError } from "../lib/persistence";
import { RunRegistry } from "../lib/status";

const crawlBodySchema = z.object({
  categories: z.array(z.string().min(1)).optional()
});

export function createCrawlRouter(crawler: EstateCrawler, runs: RunRegistry, logger: Logger): Router {
  const router = Router();

  router.get("/health", (_request, response) => {
    const status = runs.current();
    logger.debug("health_requested", { state: status.state });
    response.json({ ok: true, state: status.state, timestamp: new Date().toISOString() });
  });

  router.post("/crawl", (request, response) => {
    const parsed = crawlBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      logger.warn("crawl_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    if (runs.isRunning()) {
      const status = runs.current();
      logger.warn("crawl_rejected_active", { run_id: status.run_id });
      response.status(409).json({ error: `crawl run ${status.run_id} already in progress`, status });
      return;
    }

    const categories = crawler.resolveCategories(parsed.data.categories);
    if (categories.length === 0) {
      response.status(400).json({ error: "no known categories selected" });
      return;
    }

    const status = runs.markRunning(categories.map((category) => category.name));
    logger.info("crawl_queued", { run_id: status.run_id, categories: status.categories });

    void crawler
      .run(categories)
      .then((report) => {
        runs.markCompleted(report);
        logger.info("crawl_finished", { run_id: status.run_id, verdict: report.verdict });
      })
      .catch((error: unknown) => {
        runs.markFailed(errorMessage(error));
        logger.error("crawl_failed", {
          run_id: status.run_id,
          fatal: error instanceof StorageUnavailableError,
          error
        });
      });

    response.status(202).json(status);
  });

  router.get("/status", (_request, response) => {
    response.json(runs.current());
  });

  router.get("/report", (_request, response) => {
    const report = runs.lastReport();
    if (!report) {
      response.status(404).json({ error: "no completed run yet" });
      return;
    }
    response.json(report);
  });

  return router;
}
