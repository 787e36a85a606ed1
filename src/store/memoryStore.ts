import { ItemResult, StatsSnapshot } from "../types";
import { RunRecord, RunStatus, RunStore } from "./types";

export class InMemoryRunStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();
  private readonly items = new Map<string, ItemResult[]>();

  async startRun(runId: string, profile: string, startedAt: string): Promise<void> {
    this.runs.set(runId, {
      runId,
      profile,
      startedAt,
      status: "running",
      total: 0,
      found: 0,
      completed: 0,
      skipped: 0,
      failed: 0,
    });
  }

  async recordItem(result: ItemResult): Promise<void> {
    const existing = (this.items.get(result.runId) ?? []).filter((item) => item.identifier !== result.identifier);
    this.items.set(result.runId, [...existing, { ...result }]);
  }

  async finishRun(
    runId: string,
    status: Exclude<RunStatus, "running">,
    stats: StatsSnapshot,
    finishedAt: string,
  ): Promise<void> {
    const run = this.runs.get(runId);
    if (!run) {
      return;
    }
    this.runs.set(runId, {
      ...run,
      status,
      finishedAt,
      total: stats.total,
      found: stats.found,
      completed: stats.completed,
      skipped: stats.skipped,
      failed: stats.failed,
    });
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    return [...this.runs.values()]
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .slice(0, limit)
      .map((run) => ({ ...run }));
  }

  async listFailedItems(runId: string): Promise<ItemResult[]> {
    return (this.items.get(runId) ?? []).filter((item) => item.status === "failed").map((item) => ({ ...item }));
  }

  async close(): Promise<void> {
    return;
  }
}
