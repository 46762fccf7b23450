import assert from "node:assert/strict";
import test from "node:test";
import { buildRunReport } from "./reporter";
import { RunStats } from "./stats";
import { RunRegistry } from "./status";

test("RunRegistry starts idle with no report", () => {
  const runs = new RunRegistry();
  assert.deepEqual(runs.current(), { run_id: 0, state: "idle", categories: [] });
  assert.equal(runs.lastReport(), undefined);
});

test("only one run can be active at a time", () => {
  const runs = new RunRegistry();
  const status = runs.markRunning(["byty-prodej"]);
  assert.equal(status.run_id, 1);
  assert.equal(status.state, "running");
  assert.throws(() => runs.markRunning(["domy-prodej"]), /crawl run 1 already in progress/);
});

test("completion stores the report and a failure clears the verdict", () => {
  const runs = new RunRegistry();
  runs.markRunning(["byty-prodej"]);
  const report = buildRunReport(new RunStats().snapshot());
  runs.markCompleted(report);
  assert.equal(runs.current().state, "completed");
  assert.equal(runs.current().verdict, "SUCCESS");
  assert.equal(runs.lastReport(), report);

  const second = runs.markRunning(["byty-prodej"]);
  assert.equal(second.run_id, 2);
  assert.equal(second.verdict, undefined);
  runs.markFailed("postgres storage unavailable: timeout");
  assert.equal(runs.current().state, "failed");
  assert.equal(runs.current().error, "postgres storage unavailable: timeout");
  assert.equal(runs.lastReport(), report);
});

test("current returns a copy", () => {
  const runs = new RunRegistry();
  runs.markRunning(["byty-prodej"]);
  runs.current().categories.push("mutated");
  assert.deepEqual(runs.current().categories, ["byty-prodej"]);
});
