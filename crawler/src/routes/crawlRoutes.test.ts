import assert from "node:assert/strict";
import { AddressInfo } from "node:net";
import test from "node:test";
import express from "express";
import { loadConfig } from "../config";
import { EstateCrawler } from "../crawlers/estateCrawler";
import { RunRegistry } from "../lib/status";
import { estate, estatesPage, FakeFetchClient, MemoryAdapter, silentLogger } from "../testing/fakes";
import { createCrawlRouter } from "./crawlRoutes";

const BASE = "https://api.test/v2";
const config = loadConfig({ API_BASE_URL: BASE, PAGE_SIZE: "5" });

async function withServer(runs: RunRegistry, run: (baseUrl: string) => Promise<void>): Promise<void> {
  const client = new FakeFetchClient()
    .json(`${BASE}/estates?category_main_cb=1&category_type_cb=1&per_page=1&page=1`, estatesPage([], 2))
    .json(`${BASE}/estates?category_main_cb=1&category_type_cb=1&per_page=5&page=1`, estatesPage([estate(1, "A"), estate(2, "B")], 2));
  const crawler = new EstateCrawler(config, { client, createAdapter: () => new MemoryAdapter(), logger: silentLogger() });
  const app = express();
  app.use(express.json());
  app.use("/", createCrawlRouter(crawler, runs, silentLogger()));

  const server = app.listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address: AddressInfo | string | null = server.address();
  try {
    assert.ok(address !== null && typeof address === "object");
    await run(`http://127.0.0.1:${address.port}`);
  } finally {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }
}

async function waitForIdle(runs: RunRegistry): Promise<void> {
  while (runs.isRunning()) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

test("POST /crawl starts a run and GET /report returns its verdict", async () => {
  const runs = new RunRegistry();
  await withServer(runs, async (baseUrl) => {
    const before = await fetch(`${baseUrl}/report`);
    assert.equal(before.status, 404);

    const started = await fetch(`${baseUrl}/crawl`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ categories: ["byty-prodej"] })
    });
    assert.equal(started.status, 202);
    const accepted: unknown = await started.json();
    assert.ok(typeof accepted === "object" && accepted !== null && "run_id" in accepted && "state" in accepted);
    assert.equal(accepted.run_id, 1);
    assert.equal(accepted.state, "running");

    await waitForIdle(runs);
    const report = await fetch(`${baseUrl}/report`);
    assert.equal(report.status, 200);
    const body: unknown = await report.json();
    assert.ok(typeof body === "object" && body !== null && "verdict" in body);
    assert.equal(body.verdict, "SUCCESS");

    const status = await fetch(`${baseUrl}/status`);
    const statusBody: unknown = await status.json();
    assert.ok(typeof statusBody === "object" && statusBody !== null && "state" in statusBody);
    assert.equal(statusBody.state, "completed");
  });
});

test("POST /crawl is rejected while a run is active", async () => {
  const runs = new RunRegistry();
  runs.markRunning(["byty-prodej"]);
  await withServer(runs, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/crawl`, { method: "POST" });
    assert.equal(response.status, 409);
  });
});

test("POST /crawl validates its body and category names", async () => {
  const runs = new RunRegistry();
  await withServer(runs, async (baseUrl) => {
    const invalid = await fetch(`${baseUrl}/crawl`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ categories: "byty-prodej" })
    });
    assert.equal(invalid.status, 400);

    const unknown = await fetch(`${baseUrl}/crawl`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ categories: ["chaty"] })
    });
    assert.equal(unknown.status, 400);
    assert.equal(runs.current().state, "idle");
  });
});

test("GET /health reports the run state", async () => {
  await withServer(new RunRegistry(), async (baseUrl) => {
    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();
    assert.ok(typeof body === "object" && body !== null && "ok" in body && "state" in body);
    assert.equal(body.ok, true);
    assert.equal(body.state, "idle");
  });
});
