import { Pool, PoolConfig, QueryResultRow } from "pg";
import { EstateField, EstateItem } from "../types";
import { Logger } from "./logger";
import { errorCode, errorMessage, PersistenceAdapter, StorageUnavailableError, UpsertResult } from "./persistence";

export interface SqlResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

/** The slice of `pg.Pool` the adapter uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  end(): Promise<void>;
}

interface ColumnSpec {
  name: EstateField;
  type: string;
}

const UNIQUE_VIOLATION = "23505";

export const ESTATE_COLUMNS: readonly ColumnSpec[] = [
  { name: "hash_id", type: "text not null" },
  { name: "id", type: "bigint" },
  { name: "name", type: "text" },
  { name: "labels_all", type: "text[]" },
  { name: "exclusively_at_rk", type: "boolean" },
  { name: "category", type: "integer" },
  { name: "has_floor_plan", type: "boolean" },
  { name: "locality", type: "text" },
  { name: "new", type: "boolean" },
  { name: "type", type: "integer" },
  { name: "price", type: "bigint" },
  { name: "seo_category_main_cb", type: "integer" },
  { name: "seo_category_sub_cb", type: "integer" },
  { name: "seo_category_type_cb", type: "integer" },
  { name: "seo_locality", type: "text" },
  { name: "price_czk_value_raw", type: "bigint" },
  { name: "price_czk_unit", type: "text" },
  { name: "price_czk_alt_value_raw", type: "bigint" },
  { name: "price_czk_alt_unit", type: "text" },
  { name: "links_self_href", type: "text" },
  { name: "links_iterator_href", type: "text" },
  { name: "links_images", type: "text[]" },
  { name: "links_image_middle2", type: "text[]" },
  { name: "gps_lat", type: "double precision" },
  { name: "gps_lon", type: "double precision" },
  { name: "embedded_company_url", type: "text" },
  { name: "embedded_company_id", type: "text" },
  { name: "embedded_company_name", type: "text" },
  { name: "embedded_company_logo_small", type: "text" },
  { name: "scraped_at", type: "timestamptz" },
  { name: "source_page", type: "integer" },
  { name: "source_category", type: "text" }
];

// "new" and "type" are reserved words in some positions; quote every column.
const quote = (identifier: string): string => `"${identifier.replace(/"/g, '""')}"`;

export function buildCreateTableSql(table: string): string[] {
  const columns = ESTATE_COLUMNS.map((column) => `${quote(column.name)} ${column.type}`);
  return [
    `create table if not exists ${quote(table)} (\n  ${[...columns, `"ingested_at" timestamptz not null default now()`].join(",\n  ")}\n)`,
    `create unique index if not exists ${quote(`${table}_hash_id_key`)} on ${quote(table)} ("hash_id")`,
    `create index if not exists ${quote(`${table}_id_idx`)} on ${quote(table)} ("id")`
  ];
}

export function buildInsertSql(table: string): string {
  const names = ESTATE_COLUMNS.map((column) => quote(column.name)).join(", ");
  const placeholders = ESTATE_COLUMNS.map((_, index) => `$${index + 1}`).join(", ");
  return `insert into ${quote(table)} (${names}) values (${placeholders})`;
}

export function toRowValues(item: EstateItem): unknown[] {
  return ESTATE_COLUMNS.map((column) => item[column.name] ?? null);
}

export function createPgClient(poolConfig: PoolConfig): SqlClient {
  const pool = new Pool(poolConfig);
  return {
    async query(text: string, values: unknown[] = []): Promise<SqlResult> {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    end: () => pool.end()
  };
}

/**
 * Relational sink. Existence is pre-checked by `hash_id` (or the legacy numeric `id`) before the
 * insert; the unique index catches the window between check and write.
 */
export class PostgresAdapter implements PersistenceAdapter {
  readonly backend = "postgres" as const;
  private readonly insertSql: string;
  private readonly existsSql: string;

  constructor(
    private readonly client: SqlClient,
    private readonly table: string,
    private readonly logger: Logger
  ) {
    this.insertSql = buildInsertSql(table);
    this.existsSql = `select 1 as found from ${quote(table)} where "hash_id" = $1 or ("id" is not null and "id" = $2) limit 1`;
  }

  /** On failure the pool is ended here; callers only close an adapter that opened. */
  async open(): Promise<void> {
    try {
      await this.client.query("select 1");
      for (const statement of buildCreateTableSql(this.table)) {
        await this.client.query(statement);
      }
    } catch (error) {
      await this.endAfterFailedOpen();
      throw new StorageUnavailableError("postgres", errorMessage(error), { cause: error });
    }
    this.logger.info("storage_opened", { backend: this.backend, table: this.table });
  }

  async upsert(item: EstateItem): Promise<UpsertResult> {
    const hashId = item.hash_id ?? null;
    const legacyId = item.id ?? null;

    const existing = await this.client.query(this.existsSql, [hashId, legacyId]);
    if (existing.rows.length > 0) {
      this.logger.debug("item_already_stored", { hash_id: hashId });
      return "skipped-duplicate";
    }

    try {
      await this.client.query(this.insertSql, toRowValues(item));
      return "inserted";
    } catch (error) {
      if (errorCode(error) === UNIQUE_VIOLATION) {
        this.logger.error("item_insert_conflict", { hash_id: hashId, error: errorMessage(error) });
        return "skipped-duplicate";
      }
      throw error;
    }
  }

  private async endAfterFailedOpen(): Promise<void> {
    try {
      await this.client.end();
    } catch (error) {
      this.logger.warn("storage_close_failed", { backend: this.backend, error: errorMessage(error) });
    }
  }

  async close(): Promise<void> {
    await this.client.end();
    this.logger.info("storage_closed", { backend: this.backend, table: this.table });
  }
}
