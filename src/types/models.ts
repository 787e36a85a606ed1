export type DiscoveryEvent =
  | { type: "total_count"; total: number }
  | { type: "item_found"; identifier: string };

export type ItemOutcome = "completed" | "skipped" | "failed";

export interface ItemResult {
  runId: string;
  identifier: string;
  status: ItemOutcome;
  path?: string;
  bytes?: number;
  error?: string;
  finishedAt: string;
}

export interface RecentActivity {
  label: string;
  status: ItemOutcome;
  at: string;
}

export interface StatsSnapshot {
  /** Advertised video count; 0 when the profile did not expose one. */
  total: number;
  found: number;
  completed: number;
  skipped: number;
  failed: number;
  remaining: number;
  /** Newest first. */
  recent: readonly RecentActivity[];
}

export interface RunOutcome {
  underDiscovered: boolean;
  missing: number;
  hasFailures: boolean;
  allAccountedFor: boolean;
  successRate: number;
}

export interface RunSummary {
  runId: string;
  profile: string;
  stats: StatsSnapshot;
  outcome: RunOutcome;
}
