import test from "node:test";
import assert from "node:assert/strict";
import { createRunId, Logger, MetricsRegistry, summarizeSamples } from "../src/observability";
import { captureLines } from "./fakes";

test("logger writes one JSON line per event with its context", () => {
  const { lines, writer } = captureLines();
  const logger = new Logger({ component: "cli", runId: "run_test", writer });

  logger.child("download").warn("download_item_failed", { identifier: "https://archive.test/v/1" });

  assert.equal(lines.length, 1);
  assert.equal(lines[0].level, "warn");
  assert.equal(lines[0].fields.component, "download");
  assert.equal(lines[0].fields.runId, "run_test");
  assert.equal(lines[0].fields.identifier, "https://archive.test/v/1");
});

test("logger drops lines below its minimum level", () => {
  const { lines, writer } = captureLines();
  const logger = new Logger({ component: "cli", runId: "run_test", minLevel: "warn", writer });

  logger.debug("noise");
  logger.info("progress");
  logger.error("fatal");

  assert.deepEqual(
    lines.map((line) => line.msg),
    ["fatal"],
  );
});

test("metrics accumulate counters and time with the injected clock", () => {
  const clock = { now: 1_000 };
  const metrics = new MetricsRegistry(() => clock.now);
  metrics.incrementCounter("downloads_ok");
  metrics.incrementCounter("bytes_downloaded", 2048);
  metrics.incrementCounter("bytes_downloaded", 1024);

  const stop = metrics.startTimer("download_ms");
  clock.now += 250;
  assert.equal(stop(), 250);
  clock.now += 100;
  assert.equal(stop(), 250);

  assert.equal(metrics.getCounter("downloads_ok"), 1);
  assert.equal(metrics.getCounters().bytes_downloaded, 3072);
  assert.equal(metrics.getCounters().scrolls, 0);
  assert.deepEqual(metrics.getTimerSummaries().download_ms, { count: 1, totalMs: 250, min: 250, max: 250, avg: 250, p95: 250 });
  assert.equal(metrics.getTimerSummaries().scroll_ms.count, 0);
});

test("summarizeSamples reports the spread of durations", () => {
  const values = Array.from({ length: 20 }, (_, index) => (index + 1) * 10);
  assert.deepEqual(summarizeSamples(values), { count: 20, totalMs: 2100, min: 10, max: 200, avg: 105, p95: 190 });
  assert.deepEqual(summarizeSamples([]), { count: 0, totalMs: 0, min: 0, max: 0, avg: 0, p95: 0 });
});

test("printSummary logs the snapshot through the given logger", () => {
  const { lines, writer } = captureLines();
  const metrics = new MetricsRegistry();
  metrics.incrementCounter("scrolls", 3);

  metrics.printSummary(new Logger({ component: "cli", runId: "run_test", writer }));

  assert.equal(lines.length, 1);
  assert.equal(lines[0].msg, "metrics_summary");
  assert.deepEqual(lines[0].fields.counters, { ...metrics.getCounters() });
});

test("run ids carry the profile and the start time", () => {
  const runId = createRunId("alice/bob", new Date("2024-03-04T05:06:07.089Z"));
  assert.match(runId, /^run_alice_bob_2024-03-04T05-06-07-089Z_[a-z0-9]{0,6}$/);
});
