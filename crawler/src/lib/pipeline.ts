import { EstateItem, FieldValue, ItemRecord } from "../types";
import { Logger } from "./logger";
import { errorMessage, PersistenceAdapter } from "./persistence";
import { RunStats } from "./stats";

export type DropReason = "missing-required-field" | "duplicate-id" | "persist-failed";

export type StageOutcome = { action: "pass"; item: EstateItem } | { action: "drop"; reason: DropReason };

export interface PipelineStage {
  readonly name: string;
  process(item: EstateItem): StageOutcome | Promise<StageOutcome>;
}

export type PipelineResult = StageOutcome & { stage: string };

const pass = (item: EstateItem): StageOutcome => ({ action: "pass", item });
const drop = (reason: DropReason): StageOutcome => ({ action: "drop", reason });

export function isEmptyValue(value: FieldValue): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === "string") {
    return value.trim().length === 0;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return false;
}

export class ValidateStage implements PipelineStage {
  readonly name = "validate";

  constructor(
    private readonly requiredFields: readonly string[],
    private readonly stats: RunStats,
    private readonly logger: Logger
  ) {}

  process(item: EstateItem): StageOutcome {
    const fields: ItemRecord = item;
    const missing = this.requiredFields.filter((field) => isEmptyValue(fields[field]));
    if (missing.length > 0) {
      this.stats.recordInvalid(missing);
      this.logger.warn("item_invalid", {
        missing_fields: missing,
        hash_id: item.hash_id,
        source_category: item.source_category,
        source_page: item.source_page
      });
      return drop("missing-required-field");
    }
    this.stats.recordValid();
    return pass(item);
  }
}

/** Items without a `hash_id` pass through: there is nothing to deduplicate them on. */
export class DeduplicateStage implements PipelineStage {
  readonly name = "deduplicate";
  private readonly seen = new Set<string>();

  constructor(
    private readonly stats: RunStats,
    private readonly logger: Logger
  ) {}

  get seenCount(): number {
    return this.seen.size;
  }

  process(item: EstateItem): StageOutcome {
    const id = item.hash_id;
    if (id === undefined || isEmptyValue(id)) {
      return pass(item);
    }
    // Check and insert stay in one synchronous block.
    if (this.seen.has(id)) {
      this.stats.recordDuplicate();
      this.logger.debug("item_duplicate", { hash_id: id, source_category: item.source_category, source_page: item.source_page });
      return drop("duplicate-id");
    }
    this.seen.add(id);
    return pass(item);
  }
}

export class CountTrackStage implements PipelineStage {
  readonly name = "count";

  constructor(private readonly stats: RunStats) {}

  process(item: EstateItem): StageOutcome {
    this.stats.recordCounted();
    return pass(item);
  }
}

export class PersistStage implements PipelineStage {
  readonly name = "persist";

  constructor(
    private readonly adapter: PersistenceAdapter,
    private readonly stats: RunStats,
    private readonly logger: Logger
  ) {}

  async process(item: EstateItem): Promise<StageOutcome> {
    try {
      const result = await this.adapter.upsert(item);
      this.stats.recordPersisted(result);
      return pass(item);
    } catch (error) {
      this.stats.recordPersistError();
      this.logger.error("item_persist_failed", {
        backend: this.adapter.backend,
        hash_id: item.hash_id,
        error: errorMessage(error)
      });
      return drop("persist-failed");
    }
  }
}

export interface RecordPipelineOptions {
  requiredFields: readonly string[];
  adapter: PersistenceAdapter;
  stats: RunStats;
  logger: Logger;
}

/**
 * Validate → Deduplicate → CountTrack → Persist. The order is fixed: invalid items never enter the
 * seen-set and duplicates never reach the adapter.
 */
export class RecordPipeline {
  readonly stages: readonly PipelineStage[];

  constructor(options: RecordPipelineOptions) {
    this.stages = [
      new ValidateStage(options.requiredFields, options.stats, options.logger),
      new DeduplicateStage(options.stats, options.logger),
      new CountTrackStage(options.stats),
      new PersistStage(options.adapter, options.stats, options.logger)
    ];
  }

  async process(item: EstateItem): Promise<PipelineResult> {
    let current = item;
    let last = "none";
    for (const stage of this.stages) {
      last = stage.name;
      const outcome = await stage.process(current);
      if (outcome.action === "drop") {
        return { ...outcome, stage: stage.name };
      }
      current = outcome.item;
    }
    return { action: "pass", item: current, stage: last };
  }
}
