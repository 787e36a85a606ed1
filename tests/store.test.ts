import test from "node:test";
import assert from "node:assert/strict";
import { InMemoryRunStore, RunStore, SqliteRunStore } from "../src/store";
import { StatsSnapshot } from "../src/types";

const FINAL_STATS: StatsSnapshot = {
  total: 3,
  found: 3,
  completed: 1,
  skipped: 1,
  failed: 1,
  remaining: 0,
  recent: [],
};

const implementations: Array<[string, () => RunStore]> = [
  ["InMemoryRunStore", () => new InMemoryRunStore()],
  ["SqliteRunStore", () => new SqliteRunStore(":memory:")],
];

for (const [name, createStore] of implementations) {
  test(`${name} records a run and its final counters`, async () => {
    const store = createStore();
    try {
      await store.startRun("run_old", "alice", "2024-01-01T00:00:00.000Z");
      await store.startRun("run_new", "alice", "2024-01-02T00:00:00.000Z");
      await store.finishRun("run_new", "completed", FINAL_STATS, "2024-01-02T00:10:00.000Z");

      const runs = await store.listRuns(10);
      assert.deepEqual(
        runs.map((run) => [run.runId, run.status]),
        [
          ["run_new", "completed"],
          ["run_old", "running"],
        ],
      );
      assert.equal(runs[0].finishedAt, "2024-01-02T00:10:00.000Z");
      assert.equal(runs[0].failed, 1);
      assert.equal(runs[1].finishedAt, undefined);
      assert.equal((await store.listRuns(1)).length, 1);
    } finally {
      await store.close();
    }
  });

  test(`${name} keeps the latest outcome per item`, async () => {
    const store = createStore();
    try {
      await store.startRun("run_items", "bob", "2024-01-01T00:00:00.000Z");
      await store.recordItem({
        runId: "run_items",
        identifier: "https://archive.test/v/1",
        status: "failed",
        error: "HTTP 503 while fetching https://archive.test/v/1",
        finishedAt: "2024-01-01T00:01:00.000Z",
      });
      await store.recordItem({
        runId: "run_items",
        identifier: "https://archive.test/v/2",
        status: "failed",
        error: "HTTP 404 while fetching https://archive.test/v/2",
        finishedAt: "2024-01-01T00:02:00.000Z",
      });
      await store.recordItem({
        runId: "run_items",
        identifier: "https://archive.test/v/1",
        status: "completed",
        path: "/videos/clip_1.mp4",
        bytes: 42,
        finishedAt: "2024-01-01T00:03:00.000Z",
      });

      const failed = await store.listFailedItems("run_items");
      assert.deepEqual(
        failed.map((item) => [item.identifier, item.status, item.error, item.finishedAt]),
        [
          [
            "https://archive.test/v/2",
            "failed",
            "HTTP 404 while fetching https://archive.test/v/2",
            "2024-01-01T00:02:00.000Z",
          ],
        ],
      );
      assert.equal(failed[0].path, undefined);
    } finally {
      await store.close();
    }
  });
}
