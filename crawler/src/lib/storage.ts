import { PoolConfig } from "pg";
import { AppConfig } from "../config";
import { CsvAdapter, defaultCsvFilename } from "./csv";
import { createPgClient, PostgresAdapter } from "./db";
import { Logger } from "./logger";
import { MongoAdapter, MongooseEstateCollection } from "./mongo";
import { PersistenceAdapter, StorageUnavailableError } from "./persistence";

type StorageConfig = Pick<
  AppConfig,
  | "STORAGE_BACKEND"
  | "DATABASE_URL"
  | "POSTGRES_HOST"
  | "POSTGRES_PORT"
  | "POSTGRES_USER"
  | "POSTGRES_PASSWORD"
  | "POSTGRES_DB"
  | "POSTGRES_TABLE"
  | "MONGO_URI"
  | "MONGO_DATABASE"
  | "MONGO_COLLECTION"
  | "OUTPUT_DIR"
  | "OUTPUT_FILENAME"
  | "CSV_LIST_DELIMITER"
  | "REQUEST_TIMEOUT_MS"
>;

export function postgresPoolConfig(config: StorageConfig): PoolConfig {
  if (config.DATABASE_URL) {
    return { connectionString: config.DATABASE_URL };
  }
  if (!config.POSTGRES_USER || !config.POSTGRES_DB) {
    throw new StorageUnavailableError("postgres", "set DATABASE_URL or POSTGRES_USER and POSTGRES_DB");
  }
  return {
    host: config.POSTGRES_HOST,
    port: config.POSTGRES_PORT,
    user: config.POSTGRES_USER,
    password: config.POSTGRES_PASSWORD,
    database: config.POSTGRES_DB
  };
}

/** Picks the sink named by `STORAGE_BACKEND`. Missing credentials fail here, before any request is made. */
export function createPersistenceAdapter(config: StorageConfig, logger: Logger, now: Date = new Date()): PersistenceAdapter {
  const storageLogger = logger.child(`storage.${config.STORAGE_BACKEND}`);
  switch (config.STORAGE_BACKEND) {
    case "postgres":
      return new PostgresAdapter(createPgClient(postgresPoolConfig(config)), config.POSTGRES_TABLE, storageLogger);
    case "mongodb":
      if (!config.MONGO_URI) {
        throw new StorageUnavailableError("mongodb", "set MONGO_URI");
      }
      return new MongoAdapter(
        new MongooseEstateCollection({
          uri: config.MONGO_URI,
          database: config.MONGO_DATABASE,
          collection: config.MONGO_COLLECTION,
          serverSelectionTimeoutMs: config.REQUEST_TIMEOUT_MS
        }),
        storageLogger
      );
    case "csv":
      return new CsvAdapter(
        {
          outputDir: config.OUTPUT_DIR,
          filename: config.OUTPUT_FILENAME ?? defaultCsvFilename(now),
          listDelimiter: config.CSV_LIST_DELIMITER
        },
        storageLogger
      );
  }
}
