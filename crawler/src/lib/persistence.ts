import { EstateItem } from "../types";
import { UpsertResult } from "./stats";

export type { UpsertResult };

export type StorageBackend = "csv" | "postgres" | "mongodb";

/**
 * Sink for validated, deduplicated items.
 *
 * `upsert` must be idempotent per `hash_id`: a second delivery reports `updated` or
 * `skipped-duplicate`, never a second stored copy. Unique-key conflicts resolve to
 * `skipped-duplicate`. Any other rejection is a write error for the caller to absorb.
 */
export interface PersistenceAdapter {
  readonly backend: StorageBackend;
  /** Rejects with {@link StorageUnavailableError} when the store cannot be reached. */
  open(): Promise<void>;
  upsert(item: EstateItem): Promise<UpsertResult>;
  close(): Promise<void>;
}

export class StorageUnavailableError extends Error {
  constructor(
    readonly backend: StorageBackend,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${backend} storage unavailable: ${message}`, options);
    this.name = "StorageUnavailableError";
  }
}

export function errorCode(error: unknown): string | number | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" || typeof code === "number" ? code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
