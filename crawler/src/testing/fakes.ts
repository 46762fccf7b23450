import { FetchClient, FetchOutcome, FetchRequest } from "../lib/http";
import { Logger, LogLevel } from "../lib/logger";
import { PersistenceAdapter, StorageUnavailableError, UpsertResult } from "../lib/persistence";
import { EstateItem } from "../types";

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  metadata?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Logger at debug level whose lines are parsed back into `entries`. */
export function captureLogger(scope = "test"): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger(scope, "debug", (level, line) => {
    const parsed: unknown = JSON.parse(line);
    if (!isRecord(parsed)) {
      return;
    }
    entries.push({
      level,
      scope: String(parsed.scope),
      message: String(parsed.message),
      ...(isRecord(parsed.metadata) ? { metadata: parsed.metadata } : {})
    });
  });
  return { logger, entries };
}

export function silentLogger(): Logger {
  return new Logger("test", "error", () => undefined);
}

type Route = FetchOutcome | ((url: string, call: number) => FetchOutcome);

/** Serves canned outcomes by exact URL; anything unrouted is a fatal 404. */
export class FakeFetchClient implements FetchClient {
  readonly calls: Array<{ url: string; request?: FetchRequest }> = [];
  private readonly routes = new Map<string, Route>();
  private readonly hits = new Map<string, number>();

  route(url: string, outcome: Route): this {
    this.routes.set(url, outcome);
    return this;
  }

  json(url: string, payload: unknown): this {
    return this.route(url, { kind: "ok", url, status: 200, body: JSON.stringify(payload), attempts: 1 });
  }

  async fetch(url: string, request?: FetchRequest): Promise<FetchOutcome> {
    this.calls.push({ url, request });
    const call = (this.hits.get(url) ?? 0) + 1;
    this.hits.set(url, call);
    const route = this.routes.get(url);
    if (!route) {
      return { kind: "fatal", url, status: 404, error: "HTTP 404", attempts: 1 };
    }
    return typeof route === "function" ? route(url, call) : route;
  }
}

/** Keyed by `hash_id`; a second write of the same id is `updated` when any field changed. */
export class MemoryAdapter implements PersistenceAdapter {
  readonly backend = "csv" as const;
  readonly items = new Map<string, EstateItem>();
  opened = false;
  closed = false;
  failOpen = false;
  failOn = new Set<string>();

  async open(): Promise<void> {
    if (this.failOpen) {
      throw new StorageUnavailableError(this.backend, "disk is read-only");
    }
    this.opened = true;
  }

  async upsert(item: EstateItem): Promise<UpsertResult> {
    const id = item.hash_id ?? `anonymous-${this.items.size}`;
    if (this.failOn.has(id)) {
      throw new Error(`write rejected for ${id}`);
    }
    const existing = this.items.get(id);
    this.items.set(id, item);
    if (!existing) {
      return "inserted";
    }
    return JSON.stringify(existing) === JSON.stringify(item) ? "skipped-duplicate" : "updated";
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function estate(hashId: number, name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { hash_id: hashId, name, locality: "Praha 5", price: 5_000_000, ...extra };
}

export function estatesPage(estates: unknown[], resultSize?: number): Record<string, unknown> {
  return { ...(resultSize === undefined ? {} : { result_size: resultSize }), _embedded: { estates } };
}
