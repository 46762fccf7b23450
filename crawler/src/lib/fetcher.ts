import { EstatesPage, EstatesPageSchema, PageTask } from "../types";
import { FetchClient } from "./http";
import { Logger } from "./logger";
import { toEstateItem } from "./normalize";
import { RecordPipeline } from "./pipeline";
import { RunStats } from "./stats";

export type PageParseResult = { ok: true; page: EstatesPage } | { ok: false; error: string };

export function parseEstatesPage(body: string): PageParseResult {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    return { ok: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const parsed = EstatesPageSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: `unexpected envelope at ${issue ? issue.path.join(".") || "<root>" : "<root>"}` };
  }
  return { ok: true, page: parsed.data };
}

export interface PageFetcherOptions {
  headers: Record<string, string>;
  now?: () => Date;
}

export class PageFetcher {
  private readonly now: () => Date;

  constructor(
    private readonly client: FetchClient,
    private readonly pipeline: RecordPipeline,
    private readonly stats: RunStats,
    private readonly logger: Logger,
    private readonly options: PageFetcherOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetches one (category, page) and feeds its records through the pipeline in page order.
   * Fetch and parse failures land in the failure set; nothing here rejects for a bad page.
   */
  async run(task: PageTask): Promise<void> {
    const { category, page, url } = task;
    const outcome = await this.client.fetch(url, { headers: this.options.headers });
    if (outcome.kind !== "ok") {
      this.stats.recordTaskFailure({ category: category.name, page, url, reason: outcome.error });
      this.logger.error("page_fetch_failed", {
        category: category.name,
        page,
        url,
        failure: outcome.kind,
        status: outcome.status,
        error: outcome.error,
        attempts: outcome.attempts
      });
      return;
    }

    const parsed = parseEstatesPage(outcome.body);
    if (!parsed.ok) {
      this.stats.recordTaskFailure({ category: category.name, page, url, reason: parsed.error });
      this.logger.error("page_parse_failed", { category: category.name, page, url, error: parsed.error });
      return;
    }

    const estates = parsed.page._embedded.estates;
    this.stats.recordPage(category, estates.length);
    if (estates.length === 0) {
      this.logger.warn("page_empty", { category: category.name, page, url, result_size: parsed.page.result_size });
      return;
    }

    const metadata = { scraped_at: this.now().toISOString(), source_page: page, source_category: category.name };
    let passed = 0;
    for (const raw of estates) {
      const result = await this.pipeline.process(toEstateItem(raw, metadata));
      if (result.action === "pass") {
        passed += 1;
      }
    }
    this.logger.debug("page_processed", { category: category.name, page, records: estates.length, persisted: passed });
  }
}
