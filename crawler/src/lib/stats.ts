import { CategoryDefinition } from "../types";

export type UpsertResult = "inserted" | "updated" | "skipped-duplicate";

export type CategoryStatus = "planned" | "skipped" | "failed";

export interface CategoryTally {
  name: string;
  mainCb: number;
  typeCb: number;
  status: CategoryStatus;
  expected: number;
  pages: number;
  scheduledPages: number;
  pagesFetched: number;
  fetched: number;
  exceedsPageCeiling: boolean;
  error?: string;
}

export interface TaskFailure {
  category: string;
  /** `null` for the count probe. */
  page: number | null;
  url: string;
  reason: string;
}

export interface PersistTotals {
  inserted: number;
  updated: number;
  skipped_duplicate: number;
}

export interface RunStatsSnapshot {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  categories: CategoryTally[];
  pagesFetched: number;
  itemsEmitted: number;
  valid: number;
  invalid: number;
  missingFields: Record<string, number>;
  duplicates: number;
  counted: number;
  persisted: PersistTotals;
  persistErrors: number;
  taskFailures: TaskFailure[];
  planningFailures: TaskFailure[];
}

/**
 * Counters for one crawl run, handed by reference to every component that reports into it.
 *
 * Every mutator is synchronous, so each update runs to completion on the event loop before any
 * other task resumes. Callers must not split a read-modify-write across an `await`.
 */
export class RunStats {
  private readonly startedAt: Date;
  private readonly categories = new Map<string, CategoryTally>();
  private readonly missingFields = new Map<string, number>();
  private readonly taskFailures: TaskFailure[] = [];
  private readonly planningFailures: TaskFailure[] = [];
  private readonly persisted: PersistTotals = { inserted: 0, updated: 0, skipped_duplicate: 0 };
  private pagesFetched = 0;
  private itemsEmitted = 0;
  private valid = 0;
  private invalid = 0;
  private duplicates = 0;
  private counted = 0;
  private persistErrors = 0;

  constructor(now: Date = new Date()) {
    this.startedAt = now;
  }

  private tally(category: CategoryDefinition): CategoryTally {
    const existing = this.categories.get(category.name);
    if (existing) {
      return existing;
    }
    const created: CategoryTally = {
      name: category.name,
      mainCb: category.mainCb,
      typeCb: category.typeCb,
      status: "planned",
      expected: 0,
      pages: 0,
      scheduledPages: 0,
      pagesFetched: 0,
      fetched: 0,
      exceedsPageCeiling: false
    };
    this.categories.set(category.name, created);
    return created;
  }

  registerCategory(category: CategoryDefinition, expected: number, pages: number, scheduledPages: number): void {
    const tally = this.tally(category);
    tally.status = "planned";
    tally.expected = expected;
    tally.pages = pages;
    tally.scheduledPages = scheduledPages;
    tally.exceedsPageCeiling = scheduledPages < pages;
  }

  skipCategory(category: CategoryDefinition): void {
    const tally = this.tally(category);
    tally.status = "skipped";
    tally.expected = 0;
  }

  failCategory(category: CategoryDefinition, failure: TaskFailure): void {
    const tally = this.tally(category);
    tally.status = "failed";
    tally.error = failure.reason;
    this.planningFailures.push(failure);
  }

  recordPage(category: CategoryDefinition, itemCount: number): void {
    const tally = this.tally(category);
    tally.pagesFetched += 1;
    tally.fetched += itemCount;
    this.pagesFetched += 1;
    this.itemsEmitted += itemCount;
  }

  recordTaskFailure(failure: TaskFailure): void {
    this.taskFailures.push(failure);
  }

  recordValid(): void {
    this.valid += 1;
  }

  recordInvalid(missing: readonly string[]): void {
    this.invalid += 1;
    for (const field of missing) {
      this.missingFields.set(field, (this.missingFields.get(field) ?? 0) + 1);
    }
  }

  recordDuplicate(): void {
    this.duplicates += 1;
  }

  recordCounted(): void {
    this.counted += 1;
  }

  recordPersisted(result: UpsertResult): void {
    if (result === "inserted") {
      this.persisted.inserted += 1;
    } else if (result === "updated") {
      this.persisted.updated += 1;
    } else {
      this.persisted.skipped_duplicate += 1;
    }
  }

  recordPersistError(): void {
    this.persistErrors += 1;
  }

  snapshot(now: Date = new Date()): RunStatsSnapshot {
    return {
      startedAt: this.startedAt.toISOString(),
      finishedAt: now.toISOString(),
      durationMs: Math.max(0, now.getTime() - this.startedAt.getTime()),
      categories: [...this.categories.values()].map((tally) => ({ ...tally })),
      pagesFetched: this.pagesFetched,
      itemsEmitted: this.itemsEmitted,
      valid: this.valid,
      invalid: this.invalid,
      missingFields: Object.fromEntries(this.missingFields),
      duplicates: this.duplicates,
      counted: this.counted,
      persisted: { ...this.persisted },
      persistErrors: this.persistErrors,
      taskFailures: [...this.taskFailures],
      planningFailures: [...this.planningFailures]
    };
  }
}
