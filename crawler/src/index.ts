import express, { NextFunction, Request, Response } from "express";
import { config } from "./config";
import { createCrawler } from "./crawlers/estateCrawler";
import { Logger } from "./lib/logger";
import { RunRegistry } from "./lib/status";
import { createCrawlRouter } from "./routes/crawlRoutes";

const app = express();
app.use(express.json({ limit: "100kb" }));
const logger = new Logger("crawler", config.LOG_LEVEL);
const serverLogger = logger.child("server");

const crawler = createCrawler(config, logger);
const runs = new RunRegistry();

app.use((request: Request, response: Response, next: NextFunction) => {
  const started = Date.now();
  response.on("finish", () => {
    serverLogger.info("http_request", {
      method: request.method,
      path: request.path,
      status_code: response.statusCode,
      duration_ms: Date.now() - started
    });
  });
  next();
});

app.use("/", createCrawlRouter(crawler, runs, logger.child("routes")));

app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
  const message = error instanceof Error ? error.message : "internal server error";
  serverLogger.error("unhandled_error", { error });
  response.status(500).json({ error: message });
});

const server = app.listen(config.PORT, () => {
  serverLogger.info("server_started", {
    port: config.PORT,
    log_level: config.LOG_LEVEL,
    storage_backend: config.STORAGE_BACKEND,
    api_base_url: config.API_BASE_URL,
    locality_region_id: config.LOCALITY_REGION_ID,
    page_size: config.PAGE_SIZE,
    crawl_concurrency: config.CRAWL_CONCURRENCY,
    concurrent_requests: config.CONCURRENT_REQUESTS,
    autothrottle: config.AUTOTHROTTLE_ENABLED ? "enabled" : "disabled",
    retry_times: config.RETRY_TIMES
  });
});

const shutdown = (): void => {
  serverLogger.info("shutdown_started", { running: runs.isRunning() });
  server.close(() => {
    serverLogger.info("shutdown_completed");
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
