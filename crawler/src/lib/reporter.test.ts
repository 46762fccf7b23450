import assert from "node:assert/strict";
import test from "node:test";
import { captureLogger } from "../testing/fakes";
import { buildRunReport, categoryVerdict, logRunReport, runVerdict } from "./reporter";
import { RunStats } from "./stats";

const flats = { name: "byty-prodej", mainCb: 1, typeCb: 1 };
const houses = { name: "domy-prodej", mainCb: 2, typeCb: 1 };
const land = { name: "pozemky-prodej", mainCb: 3, typeCb: 1 };

test("runVerdict names the missing record count", () => {
  assert.deepEqual(runVerdict(1000, 1000), { verdict: "SUCCESS", missing: 0, success: true });
  assert.deepEqual(runVerdict(1000, 950), { verdict: "MISSING-50-RECORDS", missing: 50, success: false });
  assert.deepEqual(runVerdict(10, 12), { verdict: "SUCCESS", missing: 0, success: true });
});

test("categoryVerdict compares fetched with expected", () => {
  const base = { name: "x", mainCb: 1, typeCb: 1, pages: 1, scheduledPages: 1, pagesFetched: 1, exceedsPageCeiling: false };
  assert.equal(categoryVerdict({ ...base, status: "planned", expected: 10, fetched: 10 }), "OK");
  assert.equal(categoryVerdict({ ...base, status: "planned", expected: 10, fetched: 9 }), "INCOMPLETE");
  assert.equal(categoryVerdict({ ...base, status: "skipped", expected: 0, fetched: 0 }), "SKIPPED");
  assert.equal(categoryVerdict({ ...base, status: "failed", expected: 0, fetched: 0 }), "FAILED");
});

test("a complete run reports SUCCESS at info level", () => {
  const stats = new RunStats(new Date("2024-05-01T10:00:00.000Z"));
  stats.registerCategory(flats, 1000, 2, 2);
  stats.recordPage(flats, 999);
  stats.recordPage(flats, 1);
  stats.skipCategory(land);
  const report = buildRunReport(stats.snapshot(new Date("2024-05-01T10:00:05.000Z")));

  assert.equal(report.verdict, "SUCCESS");
  assert.equal(report.success, true);
  assert.equal(report.durationMs, 5000);
  assert.deepEqual(
    report.categories.map((category) => [category.name, category.verdict]),
    [
      ["byty-prodej", "OK"],
      ["pozemky-prodej", "SKIPPED"]
    ]
  );

  const { logger, entries } = captureLogger();
  logRunReport(report, logger);
  const verdict = entries.find((entry) => entry.message === "run_verdict");
  assert.equal(verdict?.level, "info");
  assert.equal(verdict?.metadata?.verdict, "SUCCESS");
});

test("a short run reports every gap and the missing total at error level", () => {
  const stats = new RunStats();
  stats.registerCategory(flats, 600, 1, 1);
  stats.recordPage(flats, 600);
  stats.registerCategory(houses, 400, 1, 1);
  stats.recordPage(houses, 350);
  stats.recordTaskFailure({ category: "domy-prodej", page: 2, url: "https://api.test/p2", reason: "HTTP 503" });
  stats.recordPersisted("inserted");
  stats.recordPersisted("updated");
  stats.recordPersisted("skipped-duplicate");

  const report = buildRunReport(stats.snapshot());
  assert.equal(report.verdict, "MISSING-50-RECORDS");
  assert.equal(report.totals.expected, 1000);
  assert.equal(report.totals.fetched, 950);
  assert.equal(report.totals.persisted, 2);
  assert.equal(report.totals.failedTasks, 1);

  const { logger, entries } = captureLogger();
  logRunReport(report, logger);
  assert.deepEqual(
    entries.filter((entry) => entry.message === "category_report").map((entry) => [entry.level, entry.metadata?.verdict]),
    [
      ["info", "OK"],
      ["warn", "INCOMPLETE"]
    ]
  );
  assert.equal(entries.find((entry) => entry.message === "failed_task")?.metadata?.reason, "HTTP 503");
  const verdict = entries.find((entry) => entry.message === "run_verdict");
  assert.equal(verdict?.level, "error");
  assert.equal(verdict?.metadata?.missing, 50);
});

test("planning failures are listed with the page failures", () => {
  const stats = new RunStats();
  stats.failCategory(flats, { category: "byty-prodej", page: null, url: "https://api.test/probe", reason: "HTTP 500" });
  const report = buildRunReport(stats.snapshot());
  assert.equal(report.categories[0]?.verdict, "FAILED");
  assert.equal(report.categories[0]?.error, "HTTP 500");
  assert.equal(report.totals.planningFailures, 1);
  assert.deepEqual(report.failures.map((failure) => failure.page), [null]);
});
