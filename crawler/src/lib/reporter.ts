import { Logger } from "./logger";
import { CategoryTally, PersistTotals, RunStatsSnapshot, TaskFailure } from "./stats";

export type CategoryVerdict = "OK" | "INCOMPLETE" | "SKIPPED" | "FAILED";

export interface CategoryReport {
  name: string;
  expected: number;
  fetched: number;
  pages: number;
  pagesFetched: number;
  verdict: CategoryVerdict;
  exceedsPageCeiling: boolean;
  error?: string;
}

export interface RunTotals {
  expected: number;
  fetched: number;
  valid: number;
  invalid: number;
  duplicates: number;
  counted: number;
  persisted: number;
  persistedBreakdown: PersistTotals;
  persistErrors: number;
  failedTasks: number;
  planningFailures: number;
  missingFields: Record<string, number>;
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  categories: CategoryReport[];
  totals: RunTotals;
  missing: number;
  /** `SUCCESS` or `MISSING-<n>-RECORDS`. */
  verdict: string;
  success: boolean;
  failures: TaskFailure[];
}

export function categoryVerdict(tally: CategoryTally): CategoryVerdict {
  if (tally.status === "failed") {
    return "FAILED";
  }
  if (tally.status === "skipped") {
    return "SKIPPED";
  }
  return tally.fetched >= tally.expected ? "OK" : "INCOMPLETE";
}

export function runVerdict(expected: number, fetched: number): { verdict: string; missing: number; success: boolean } {
  const missing = Math.max(0, expected - fetched);
  return missing === 0
    ? { verdict: "SUCCESS", missing, success: true }
    : { verdict: `MISSING-${missing}-RECORDS`, missing, success: false };
}

export function buildRunReport(snapshot: RunStatsSnapshot): RunReport {
  const categories = snapshot.categories.map((tally) => ({
    name: tally.name,
    expected: tally.expected,
    fetched: tally.fetched,
    pages: tally.scheduledPages,
    pagesFetched: tally.pagesFetched,
    verdict: categoryVerdict(tally),
    exceedsPageCeiling: tally.exceedsPageCeiling,
    ...(tally.error ? { error: tally.error } : {})
  }));

  const expected = categories.reduce((sum, category) => sum + category.expected, 0);
  const persisted = snapshot.persisted.inserted + snapshot.persisted.updated;
  const { verdict, missing, success } = runVerdict(expected, snapshot.itemsEmitted);

  return {
    startedAt: snapshot.startedAt,
    finishedAt: snapshot.finishedAt,
    durationMs: snapshot.durationMs,
    categories,
    totals: {
      expected,
      fetched: snapshot.itemsEmitted,
      valid: snapshot.valid,
      invalid: snapshot.invalid,
      duplicates: snapshot.duplicates,
      counted: snapshot.counted,
      persisted,
      persistedBreakdown: { ...snapshot.persisted },
      persistErrors: snapshot.persistErrors,
      failedTasks: snapshot.taskFailures.length,
      planningFailures: snapshot.planningFailures.length,
      missingFields: { ...snapshot.missingFields }
    },
    missing,
    verdict,
    success,
    failures: [...snapshot.planningFailures, ...snapshot.taskFailures]
  };
}

/** Writes the reconciliation report. Reporting problems are logged, never thrown. */
export function logRunReport(report: RunReport, logger: Logger): void {
  try {
    for (const category of report.categories) {
      const metadata = {
        category: category.name,
        expected: category.expected,
        fetched: category.fetched,
        pages: category.pages,
        pages_fetched: category.pagesFetched,
        verdict: category.verdict,
        ...(category.exceedsPageCeiling ? { exceeds_page_ceiling: true } : {}),
        ...(category.error ? { error: category.error } : {})
      };
      if (category.verdict === "OK" || category.verdict === "SKIPPED") {
        logger.info("category_report", metadata);
      } else {
        logger.warn("category_report", metadata);
      }
    }

    for (const failure of report.failures) {
      logger.warn("failed_task", { category: failure.category, page: failure.page, url: failure.url, reason: failure.reason });
    }

    logger.info("run_totals", {
      expected: report.totals.expected,
      fetched: report.totals.fetched,
      valid: report.totals.valid,
      invalid: report.totals.invalid,
      duplicates: report.totals.duplicates,
      counted: report.totals.counted,
      persisted: report.totals.persisted,
      inserted: report.totals.persistedBreakdown.inserted,
      updated: report.totals.persistedBreakdown.updated,
      skipped_duplicate: report.totals.persistedBreakdown.skipped_duplicate,
      persist_errors: report.totals.persistErrors,
      failed_tasks: report.totals.failedTasks,
      planning_failures: report.totals.planningFailures,
      missing_fields: report.totals.missingFields,
      duration_ms: report.durationMs
    });

    if (report.success) {
      logger.info("run_verdict", { verdict: report.verdict, expected: report.totals.expected, fetched: report.totals.fetched });
    } else {
      logger.error("run_verdict", {
        verdict: report.verdict,
        missing: report.missing,
        expected: report.totals.expected,
        fetched: report.totals.fetched
      });
    }
  } catch (error) {
    logger.error("run_report_failed", { error });
  }
}
