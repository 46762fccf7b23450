import assert from "node:assert/strict";
import test from "node:test";
import { captureLogger } from "../testing/fakes";
import { EstateItem } from "../types";
import { EstateCollection, MongoAdapter, UpsertWriteResult } from "./mongo";
import { StorageUnavailableError } from "./persistence";

class FakeCollection implements EstateCollection {
  readonly documents = new Map<string, EstateItem & { ingested_at: Date }>();
  connected = false;
  connectError: Error | null = null;
  writeError: Error | null = null;

  async connect(): Promise<void> {
    if (this.connectError) {
      throw this.connectError;
    }
    this.connected = true;
  }

  async upsertByHashId(hashId: string, item: EstateItem, insertedAt: Date): Promise<UpsertWriteResult> {
    if (this.writeError) {
      throw this.writeError;
    }
    const existing = this.documents.get(hashId);
    if (!existing) {
      this.documents.set(hashId, { ...item, ingested_at: insertedAt });
      return { upserted: true, modified: false };
    }
    const { ingested_at: ingestedAt, ...stored } = existing;
    const modified = JSON.stringify(stored) !== JSON.stringify(item);
    this.documents.set(hashId, { ...item, ingested_at: ingestedAt });
    return { upserted: false, modified };
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }
}

const firstSeen = new Date("2024-05-01T09:00:00.000Z");
const item: EstateItem = { hash_id: "123", name: "Rodinný dům", price: 9_900_000 };

test("the first delivery inserts, a changed one updates, an identical one is skipped", async () => {
  const collection = new FakeCollection();
  const adapter = new MongoAdapter(collection, captureLogger().logger, () => firstSeen);
  await adapter.open();

  assert.equal(await adapter.upsert(item), "inserted");
  assert.equal(await adapter.upsert({ ...item, price: 9_500_000 }), "updated");
  assert.equal(await adapter.upsert({ ...item, price: 9_500_000 }), "skipped-duplicate");
  assert.equal(collection.documents.size, 1);
  assert.equal(collection.documents.get("123")?.ingested_at, firstSeen);
});

test("open wraps connection errors in StorageUnavailableError", async () => {
  const collection = new FakeCollection();
  collection.connectError = new Error("Server selection timed out after 30000 ms");
  const adapter = new MongoAdapter(collection, captureLogger().logger);
  await assert.rejects(adapter.open(), StorageUnavailableError);
});

test("a duplicate key error resolves to skipped-duplicate", async () => {
  const collection = new FakeCollection();
  collection.writeError = Object.assign(new Error("E11000 duplicate key error"), { code: 11000 });
  const { logger, entries } = captureLogger();
  const adapter = new MongoAdapter(collection, logger);

  assert.equal(await adapter.upsert(item), "skipped-duplicate");
  assert.equal(entries.find((entry) => entry.message === "item_upsert_conflict")?.metadata?.hash_id, "123");
});

test("other write errors and items without hash_id reject", async () => {
  const collection = new FakeCollection();
  const adapter = new MongoAdapter(collection, captureLogger().logger);
  await assert.rejects(adapter.upsert({ name: "Bez id" }), /without hash_id/);

  collection.writeError = new Error("not primary");
  await assert.rejects(adapter.upsert(item), /not primary/);
});

test("close disconnects", async () => {
  const collection = new FakeCollection();
  const adapter = new MongoAdapter(collection, captureLogger().logger);
  await adapter.open();
  await adapter.close();
  assert.equal(collection.connected, false);
});
