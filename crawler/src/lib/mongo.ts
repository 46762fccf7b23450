import mongoose, { Connection } from "mongoose";
import { EstateItem } from "../types";
import { Logger } from "./logger";
import { errorCode, errorMessage, PersistenceAdapter, StorageUnavailableError, UpsertResult } from "./persistence";

const DUPLICATE_KEY = 11000;

export interface UpsertWriteResult {
  upserted: boolean;
  modified: boolean;
}

/** Storage primitive the adapter needs: one atomic upsert keyed by `hash_id`. */
export interface EstateCollection {
  connect(): Promise<void>;
  upsertByHashId(hashId: string, item: EstateItem, insertedAt: Date): Promise<UpsertWriteResult>;
  disconnect(): Promise<void>;
}

export interface MongoSettings {
  uri: string;
  database: string;
  collection: string;
  serverSelectionTimeoutMs?: number;
}

const estateSchema = new mongoose.Schema(
  {
    hash_id: { type: String, required: true },
    ingested_at: { type: Date }
  },
  { strict: false, versionKey: false }
);
estateSchema.index({ hash_id: 1 }, { unique: true });

function estateModel(connection: Connection, collection: string) {
  return connection.model("Estate", estateSchema, collection);
}

type EstateModel = ReturnType<typeof estateModel>;

export class MongooseEstateCollection implements EstateCollection {
  private connection: Connection | null = null;
  private model: EstateModel | null = null;

  constructor(private readonly settings: MongoSettings) {}

  async connect(): Promise<void> {
    const connection = await mongoose
      .createConnection(this.settings.uri, {
        dbName: this.settings.database,
        serverSelectionTimeoutMS: this.settings.serverSelectionTimeoutMs ?? 10000
      })
      .asPromise();
    this.connection = connection;
    this.model = estateModel(connection, this.settings.collection);
    await this.model.syncIndexes();
  }

  async upsertByHashId(hashId: string, item: EstateItem, insertedAt: Date): Promise<UpsertWriteResult> {
    if (!this.model) {
      throw new Error("mongo collection used before connect()");
    }
    const result = await this.model
      .updateOne({ hash_id: hashId }, { $set: item, $setOnInsert: { ingested_at: insertedAt } }, { upsert: true })
      .exec();
    return { upserted: result.upsertedCount > 0, modified: result.modifiedCount > 0 };
  }

  async disconnect(): Promise<void> {
    await this.connection?.close();
    this.connection = null;
    this.model = null;
  }
}

/** Document sink: the store's upsert is atomic, so no separate existence check is made. */
export class MongoAdapter implements PersistenceAdapter {
  readonly backend = "mongodb" as const;

  constructor(
    private readonly collection: EstateCollection,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async open(): Promise<void> {
    try {
      await this.collection.connect();
    } catch (error) {
      throw new StorageUnavailableError("mongodb", errorMessage(error), { cause: error });
    }
    this.logger.info("storage_opened", { backend: this.backend });
  }

  async upsert(item: EstateItem): Promise<UpsertResult> {
    if (item.hash_id === undefined) {
      throw new Error("cannot upsert a document without hash_id");
    }
    try {
      const result = await this.collection.upsertByHashId(item.hash_id, item, this.now());
      if (result.upserted) {
        return "inserted";
      }
      return result.modified ? "updated" : "skipped-duplicate";
    } catch (error) {
      if (errorCode(error) === DUPLICATE_KEY) {
        this.logger.error("item_upsert_conflict", { hash_id: item.hash_id, error: errorMessage(error) });
        return "skipped-duplicate";
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.collection.disconnect();
    this.logger.info("storage_closed", { backend: this.backend });
  }
}
