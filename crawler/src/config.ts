import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().min(1).optional()
);

const optionalPositiveInt = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.coerce.number().int().positive().optional()
);

// "true"/"false" strings; z.coerce.boolean() would read "false" as true.
const envBoolean = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    );

const statusCodeList = (fallback: string) =>
  commaList(fallback).pipe(z.array(z.coerce.number().int().min(100).max(599)));

const sqlIdentifier = z.string().regex(/^[a-z_][a-z0-9_]*$/i, "must be a plain SQL identifier");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.string().min(1).default("info"),

  STORAGE_BACKEND: z.enum(["csv", "postgres", "mongodb"]).default("csv"),
  DATABASE_URL: optionalNonEmptyString,
  POSTGRES_HOST: z.string().min(1).default("localhost"),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: optionalNonEmptyString,
  POSTGRES_PASSWORD: optionalNonEmptyString,
  POSTGRES_DB: optionalNonEmptyString,
  POSTGRES_TABLE: sqlIdentifier.default("estates"),
  MONGO_URI: optionalNonEmptyString,
  MONGO_DATABASE: z.string().min(1).default("sreality"),
  MONGO_COLLECTION: z.string().min(1).default("estates"),
  OUTPUT_DIR: z.string().min(1).default("data"),
  OUTPUT_FILENAME: optionalNonEmptyString,
  CSV_LIST_DELIMITER: z.string().min(1).default("|"),

  REQUIRED_FIELDS: commaList("hash_id,name").pipe(z.array(z.string().min(1)).min(1)),

  API_BASE_URL: z.string().url().default("https://www.sreality.cz/api/cs/v2"),
  LOCALITY_REGION_ID: optionalPositiveInt,
  CATEGORIES: commaList(""),
  PAGE_SIZE: z.coerce.number().int().positive().default(999),
  API_MAX_PAGES: z.coerce.number().int().positive().default(100),

  CRAWL_CONCURRENCY: z.coerce.number().int().positive().default(8),
  CONCURRENT_REQUESTS: z.coerce.number().int().positive().default(8),
  DOWNLOAD_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
  AUTOTHROTTLE_ENABLED: envBoolean(true),
  AUTOTHROTTLE_START_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  AUTOTHROTTLE_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  AUTOTHROTTLE_TARGET_CONCURRENCY: z.coerce.number().positive().default(4),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RETRY_TIMES: z.coerce.number().int().nonnegative().default(5),
  RETRY_HTTP_CODES: statusCodeList("500,502,503,504,408,429,520,521,522,523,524"),
  RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().default(500),
  RETRY_MAX_BACKOFF_MS: z.coerce.number().int().nonnegative().default(8000),
  USER_AGENT: z
    .string()
    .min(1)
    .default(
      "Mozilla/5.0 (Linux; Android 6.0; Nexus 5 Build/MRA58N) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Mobile Safari/537.36"
    )
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  return EnvSchema.parse(env);
}

export const config: AppConfig = loadConfig(process.env);
