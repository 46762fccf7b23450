import { appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { EstateItem, FieldValue, ItemRecord } from "../types";
import { Logger } from "./logger";
import { errorMessage, PersistenceAdapter, StorageUnavailableError, UpsertResult } from "./persistence";

function isFieldList(value: FieldValue): value is readonly FieldValue[] {
  return Array.isArray(value);
}

function scalarText(value: FieldValue): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Flattens nested objects into `parent_child` keys and joins lists with `listDelimiter`.
 * Undefined and null leaves are dropped so they do not widen the header.
 */
export function flattenRecord(record: ItemRecord, listDelimiter: string, prefix = ""): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined || value === null) {
      continue;
    }
    const column = prefix ? `${prefix}_${key}` : key;
    if (isFieldList(value)) {
      flat[column] = value.map((entry) => scalarText(entry)).join(listDelimiter);
    } else if (typeof value === "object") {
      Object.assign(flat, flattenRecord(value, listDelimiter, column));
    } else {
      flat[column] = scalarText(value);
    }
  }
  return flat;
}

export function defaultCsvFilename(now: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `estates_${date}_${time}.csv`;
}

const CsvRowsSchema = z.array(z.array(z.string()));

export interface CsvSettings {
  outputDir: string;
  filename: string;
  listDelimiter: string;
}

export interface SchemaDrift {
  driftedRecords: number;
  extraFields: string[];
  missingFields: string[];
}

/**
 * Append-only sink. The first item fixes the header; later items are written under it with extra
 * fields dropped and missing ones left blank, and the mismatch is reported at close. Every write
 * goes through one promise chain so rows never interleave. Opening a file that already has rows
 * resumes it: its header and stored ids carry over.
 */
export class CsvAdapter implements PersistenceAdapter {
  readonly backend = "csv" as const;
  readonly filePath: string;
  private header: string[] | null = null;
  private headerWritten = false;
  private rowsWritten = 0;
  private writes: Promise<void> = Promise.resolve();
  private readonly written = new Set<string>();
  private readonly extraFields = new Set<string>();
  private readonly missingFields = new Set<string>();
  private driftedRecords = 0;

  constructor(
    private readonly settings: CsvSettings,
    private readonly logger: Logger
  ) {
    this.filePath = path.resolve(settings.outputDir, settings.filename);
  }

  async open(): Promise<void> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, "", { flag: "a" });
      this.resume(await readFile(this.filePath, "utf8"));
    } catch (error) {
      throw new StorageUnavailableError("csv", errorMessage(error), { cause: error });
    }
    this.logger.info("storage_opened", { backend: this.backend, file: this.filePath, existing_ids: this.written.size });
  }

  async upsert(item: EstateItem): Promise<UpsertResult> {
    const hashId = item.hash_id;
    if (hashId !== undefined && this.written.has(hashId)) {
      return "skipped-duplicate";
    }
    if (hashId !== undefined) {
      this.written.add(hashId);
    }

    const flat = flattenRecord(item, this.settings.listDelimiter);
    if (!this.header) {
      this.header = Object.keys(flat);
    } else {
      this.trackDrift(this.header, flat);
    }
    const header = this.header;
    const row = stringify([header.map((column) => flat[column] ?? "")]);

    // The header goes out with the first row that is actually written.
    const write = this.writes.then(async () => {
      await appendFile(this.filePath, this.headerWritten ? row : stringify([header]) + row, "utf8");
      this.headerWritten = true;
      this.rowsWritten += 1;
    });
    this.writes = write.catch(() => undefined);
    try {
      await write;
    } catch (error) {
      if (hashId !== undefined) {
        this.written.delete(hashId);
      }
      throw error;
    }
    return "inserted";
  }

  drift(): SchemaDrift {
    return {
      driftedRecords: this.driftedRecords,
      extraFields: [...this.extraFields].sort(),
      missingFields: [...this.missingFields].sort()
    };
  }

  async close(): Promise<void> {
    await this.writes;
    const drift = this.drift();
    if (drift.driftedRecords > 0) {
      this.logger.warn("schema_drift_detected", {
        file: this.filePath,
        drifted_records: drift.driftedRecords,
        extra_fields: drift.extraFields,
        missing_fields: drift.missingFields
      });
    }
    this.logger.info("storage_closed", { backend: this.backend, file: this.filePath, rows: this.rowsWritten });
  }

  private resume(content: string): void {
    if (content.trim().length === 0) {
      return;
    }
    const [header, ...rows] = CsvRowsSchema.parse(parse(content, { relax_column_count: true, skip_empty_lines: true }));
    if (!header) {
      return;
    }
    this.header = header;
    this.headerWritten = true;
    const idColumn = header.indexOf("hash_id");
    if (idColumn < 0) {
      return;
    }
    for (const row of rows) {
      const id = row[idColumn];
      if (id) {
        this.written.add(id);
      }
    }
  }

  private trackDrift(header: readonly string[], flat: Record<string, string>): void {
    const known = new Set(header);
    const extra = Object.keys(flat).filter((column) => !known.has(column));
    const missing = header.filter((column) => !(column in flat));
    if (extra.length === 0 && missing.length === 0) {
      return;
    }
    this.driftedRecords += 1;
    extra.forEach((column) => this.extraFields.add(column));
    missing.forEach((column) => this.missingFields.add(column));
  }
}
