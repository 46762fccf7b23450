import assert from "node:assert/strict";
import test from "node:test";
import { Logger, LogLevel, parseLogLevel } from "./logger";

function collect(level: string) {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const logger = new Logger("crawler", level, (sinkLevel, line) => lines.push({ level: sinkLevel, line }));
  return { logger, lines };
}

test("parseLogLevel falls back to info", () => {
  assert.equal(parseLogLevel(" WARN "), "warn");
  assert.equal(parseLogLevel("verbose"), "info");
  assert.equal(parseLogLevel(undefined), "info");
});

test("messages below the configured level are dropped", () => {
  const { logger, lines } = collect("warn");
  logger.info("ignored");
  logger.warn("kept");
  logger.error("kept too");
  assert.deepEqual(lines.map((entry) => entry.level), ["warn", "error"]);
});

test("lines are JSON with scope and sanitized metadata", () => {
  const { logger, lines } = collect("debug");
  logger.child("planner").error("category_probe_failed", {
    error: new TypeError("fetch failed"),
    categories: ["byty-prodej"],
    attempts: 6
  });

  const parsed: unknown = JSON.parse(lines[0]?.line ?? "null");
  assert.ok(typeof parsed === "object" && parsed !== null);
  assert.ok("scope" in parsed && "message" in parsed && "metadata" in parsed);
  assert.equal(parsed.scope, "crawler.planner");
  assert.equal(parsed.message, "category_probe_failed");
  const metadata = parsed.metadata;
  assert.ok(typeof metadata === "object" && metadata !== null);
  assert.ok("error" in metadata && "categories" in metadata && "attempts" in metadata);
  assert.deepEqual(metadata.categories, ["byty-prodej"]);
  assert.equal(metadata.attempts, 6);
  const error = metadata.error;
  assert.ok(typeof error === "object" && error !== null && "name" in error && "message" in error);
  assert.equal(error.name, "TypeError");
  assert.equal(error.message, "fetch failed");
});

test("child loggers keep the parent level", () => {
  const { logger, lines } = collect("error");
  logger.child("http").warn("fetch_retries_exhausted");
  assert.equal(lines.length, 0);
});
