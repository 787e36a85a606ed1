import { ItemResult, StatsSnapshot } from "../types";

export type RunStatus = "running" | "completed" | "failed";

export interface RunRecord {
  runId: string;
  profile: string;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus;
  total: number;
  found: number;
  completed: number;
  skipped: number;
  failed: number;
}

/**
 * History of runs and their per-item outcomes. Informational only: whether an
 * item needs downloading is decided by the dedup cache, never by this store.
 */
export interface RunStore {
  startRun(runId: string, profile: string, startedAt: string): Promise<void>;
  recordItem(result: ItemResult): Promise<void>;
  finishRun(runId: string, status: Exclude<RunStatus, "running">, stats: StatsSnapshot, finishedAt: string): Promise<void>;
  listRuns(limit: number): Promise<RunRecord[]>;
  listFailedItems(runId: string): Promise<ItemResult[]>;
  close(): Promise<void>;
}
