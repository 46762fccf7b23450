import { AppConfig } from "../config";
import { DEFAULT_CATEGORIES, selectCategories } from "../lib/categories";
import { mapLimit } from "../lib/concurrency";
import { PageFetcher } from "../lib/fetcher";
import { FetchClient, HttpFetchClient } from "../lib/http";
import { Logger } from "../lib/logger";
import { errorMessage, PersistenceAdapter } from "../lib/persistence";
import { RecordPipeline } from "../lib/pipeline";
import { CategoryPlanner } from "../lib/planner";
import { buildRunReport, logRunReport, RunReport } from "../lib/reporter";
import { RequestScheduler } from "../lib/scheduler";
import { RunStats } from "../lib/stats";
import { createPersistenceAdapter } from "../lib/storage";
import { AutoThrottle } from "../lib/throttle";
import { CategoryDefinition } from "../types";

export interface CrawlerDependencies {
  client: FetchClient;
  /** Called once per run; every run gets a fresh sink. */
  createAdapter: () => PersistenceAdapter;
  logger: Logger;
  now?: () => Date;
}

export function defaultRequestHeaders(config: Pick<AppConfig, "USER_AGENT">): Record<string, string> {
  return {
    accept: "application/json, text/plain, */*",
    "accept-language": "en,cs;q=0.9",
    "user-agent": config.USER_AGENT
  };
}

export function createFetchClient(config: AppConfig, logger: Logger): HttpFetchClient {
  const throttle = new AutoThrottle({
    enabled: config.AUTOTHROTTLE_ENABLED,
    minDelayMs: config.DOWNLOAD_DELAY_MS,
    startDelayMs: config.AUTOTHROTTLE_START_DELAY_MS,
    maxDelayMs: config.AUTOTHROTTLE_MAX_DELAY_MS,
    targetConcurrency: config.AUTOTHROTTLE_TARGET_CONCURRENCY
  });
  return new HttpFetchClient(
    { timeoutMs: config.REQUEST_TIMEOUT_MS, userAgent: config.USER_AGENT },
    {
      retryTimes: config.RETRY_TIMES,
      retryHttpCodes: config.RETRY_HTTP_CODES,
      backoffMs: config.RETRY_BACKOFF_MS,
      maxBackoffMs: config.RETRY_MAX_BACKOFF_MS
    },
    new RequestScheduler(config.CONCURRENT_REQUESTS, throttle),
    logger.child("http")
  );
}

export class EstateCrawler {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly config: AppConfig,
    private readonly deps: CrawlerDependencies
  ) {
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  resolveCategories(names: readonly string[] = this.config.CATEGORIES): CategoryDefinition[] {
    const { selected, unknown } = selectCategories(names, DEFAULT_CATEGORIES);
    if (unknown.length > 0) {
      this.logger.warn("unknown_categories_ignored", { unknown, available: DEFAULT_CATEGORIES.map((category) => category.name) });
    }
    return selected;
  }

  /**
   * One full crawl: open the sink, plan, fetch every page through the pipeline, close the sink and
   * report. Only an unreachable sink rejects; every other failure ends up in the report.
   */
  async run(categories: readonly CategoryDefinition[] = this.resolveCategories()): Promise<RunReport> {
    const stats = new RunStats(this.now());
    const adapter = this.deps.createAdapter();
    await adapter.open();

    const headers = defaultRequestHeaders(this.config);
    this.logger.info("run_started", {
      backend: adapter.backend,
      categories: categories.map((category) => category.name),
      page_size: this.config.PAGE_SIZE,
      concurrency: this.config.CRAWL_CONCURRENCY,
      required_fields: this.config.REQUIRED_FIELDS
    });

    try {
      const planner = new CategoryPlanner(
        this.deps.client,
        {
          apiBaseUrl: this.config.API_BASE_URL,
          pageSize: this.config.PAGE_SIZE,
          maxPages: this.config.API_MAX_PAGES,
          regionId: this.config.LOCALITY_REGION_ID,
          concurrency: this.config.CRAWL_CONCURRENCY,
          headers
        },
        stats,
        this.logger.child("planner")
      );
      const tasks = await planner.plan(categories);

      const pipeline = new RecordPipeline({
        requiredFields: this.config.REQUIRED_FIELDS,
        adapter,
        stats,
        logger: this.logger.child("pipeline")
      });
      const fetcher = new PageFetcher(this.deps.client, pipeline, stats, this.logger.child("fetcher"), {
        headers,
        now: this.now
      });

      await mapLimit(tasks, this.config.CRAWL_CONCURRENCY, async (task) => {
        try {
          await fetcher.run(task);
        } catch (error) {
          stats.recordTaskFailure({ category: task.category.name, page: task.page, url: task.url, reason: errorMessage(error) });
          this.logger.error("page_task_crashed", { category: task.category.name, page: task.page, error });
        }
      });
    } finally {
      try {
        await adapter.close();
      } catch (error) {
        this.logger.error("storage_close_failed", { backend: adapter.backend, error });
      }
    }

    const report = buildRunReport(stats.snapshot(this.now()));
    logRunReport(report, this.logger.child("report"));
    return report;
  }
}

export function createCrawler(config: AppConfig, logger: Logger): EstateCrawler {
  return new EstateCrawler(config, {
    client: createFetchClient(config, logger),
    createAdapter: () => createPersistenceAdapter(config, logger),
    logger
  });
}
