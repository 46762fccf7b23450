import { CategoryDefinition, PageTask, ResultSizeSchema } from "../types";
import { mapLimit } from "./concurrency";
import { FetchClient } from "./http";
import { Logger } from "./logger";
import { RunStats } from "./stats";
import { buildEstatesUrl } from "./url";

export interface PlannerOptions {
  apiBaseUrl: string;
  pageSize: number;
  maxPages: number;
  regionId?: number;
  concurrency: number;
  headers: Record<string, string>;
}

export function computePageCount(expected: number, pageSize: number): number {
  if (expected <= 0) {
    return 0;
  }
  return Math.ceil(expected / Math.max(1, pageSize));
}

/** Reads `result_size` out of a probe body. Returns an error string for unparseable payloads. */
export function parseResultSize(body: string): { ok: true; resultSize: number } | { ok: false; error: string } {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    return { ok: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
  const parsed = ResultSizeSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, error: "missing result_size" };
  }
  return { ok: true, resultSize: parsed.data.result_size };
}

export class CategoryPlanner {
  constructor(
    private readonly client: FetchClient,
    private readonly options: PlannerOptions,
    private readonly stats: RunStats,
    private readonly logger: Logger
  ) {}

  private url(category: CategoryDefinition, perPage: number, page: number): string {
    return buildEstatesUrl(this.options.apiBaseUrl, {
      mainCb: category.mainCb,
      typeCb: category.typeCb,
      regionId: this.options.regionId,
      perPage,
      page
    });
  }

  /**
   * Probes every partition and returns its page tasks, ordered by partition then page.
   * Probe failures are recorded against the partition and never reject.
   */
  async plan(categories: readonly CategoryDefinition[]): Promise<PageTask[]> {
    const perCategory = await mapLimit(categories, this.options.concurrency, (category) => this.planCategory(category));
    const tasks = perCategory.flat();
    this.logger.info("plan_completed", {
      categories: categories.length,
      page_tasks: tasks.length,
      page_size: this.options.pageSize
    });
    return tasks;
  }

  private async planCategory(category: CategoryDefinition): Promise<PageTask[]> {
    const probeUrl = this.url(category, 1, 1);
    const outcome = await this.client.fetch(probeUrl, { headers: this.options.headers });
    if (outcome.kind !== "ok") {
      this.stats.failCategory(category, { category: category.name, page: null, url: probeUrl, reason: outcome.error });
      this.logger.error("category_probe_failed", {
        category: category.name,
        url: probeUrl,
        failure: outcome.kind,
        status: outcome.status,
        error: outcome.error,
        attempts: outcome.attempts
      });
      return [];
    }

    const parsed = parseResultSize(outcome.body);
    if (!parsed.ok) {
      this.stats.failCategory(category, { category: category.name, page: null, url: probeUrl, reason: parsed.error });
      this.logger.error("category_probe_invalid", { category: category.name, url: probeUrl, error: parsed.error });
      return [];
    }

    const expected = parsed.resultSize;
    if (expected === 0) {
      this.stats.skipCategory(category);
      this.logger.info("category_empty_skipped", { category: category.name });
      return [];
    }

    const pages = computePageCount(expected, this.options.pageSize);
    const scheduledPages = Math.min(pages, this.options.maxPages);
    this.stats.registerCategory(category, expected, pages, scheduledPages);
    if (scheduledPages < pages) {
      // Not subdivided: pages past the ceiling stay unfetched and the category reports INCOMPLETE.
      this.logger.warn("category_exceeds_page_ceiling", {
        category: category.name,
        expected,
        pages,
        max_pages: this.options.maxPages,
        unreachable_records: expected - scheduledPages * this.options.pageSize
      });
    }
    this.logger.info("category_planned", { category: category.name, expected, pages: scheduledPages });

    return Array.from({ length: scheduledPages }, (_, index) => ({
      category,
      page: index + 1,
      url: this.url(category, this.options.pageSize, index + 1)
    }));
  }
}
