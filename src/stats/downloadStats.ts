import { Mutex } from "../core/concurrency";
import { errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { ItemOutcome, RecentActivity, StatsSnapshot } from "../types";

export type StatsListener = (snapshot: StatsSnapshot) => void;

export interface DownloadStatsOptions {
  recentActivityLimit?: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Single owner of the run counters. Every mutation goes through the mutex and
 * is followed by one notification with a frozen snapshot; the listener is
 * called after the lock is released.
 */
export class DownloadStats {
  private readonly lock = new Mutex();
  private readonly recentLimit: number;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private listener?: StatsListener;

  private total = 0;
  private found = 0;
  private completed = 0;
  private skipped = 0;
  private failed = 0;
  private recent: RecentActivity[] = [];

  constructor(options: DownloadStatsOptions = {}) {
    this.recentLimit = Math.max(0, options.recentActivityLimit ?? 5);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  onUpdate(listener: StatsListener | undefined): void {
    this.listener = listener;
  }

  get remaining(): number {
    return Math.max(this.found - this.completed - this.skipped - this.failed, 0);
  }

  async setTotal(total: number): Promise<void> {
    await this.mutate(() => {
      this.total = Math.max(0, total);
    });
  }

  async incrementFound(): Promise<void> {
    await this.mutate(() => {
      this.found += 1;
    });
  }

  async incrementCompleted(label: string): Promise<void> {
    await this.mutate(() => {
      this.completed += 1;
    }, { label, status: "completed" });
  }

  async incrementSkipped(label?: string): Promise<void> {
    await this.mutate(() => {
      this.skipped += 1;
    }, label === undefined ? undefined : { label, status: "skipped" });
  }

  async incrementFailed(label?: string): Promise<void> {
    await this.mutate(() => {
      this.failed += 1;
    }, label === undefined ? undefined : { label, status: "failed" });
  }

  snapshot(): StatsSnapshot {
    return Object.freeze({
      total: this.total,
      found: this.found,
      completed: this.completed,
      skipped: this.skipped,
      failed: this.failed,
      remaining: this.remaining,
      recent: Object.freeze(this.recent.map((entry) => Object.freeze({ ...entry }))),
    });
  }

  private async mutate(apply: () => void, activity?: { label: string; status: ItemOutcome }): Promise<void> {
    const snapshot = await this.lock.runExclusive(() => {
      apply();
      if (activity && this.recentLimit > 0) {
        this.recent = [{ ...activity, at: this.now().toISOString() }, ...this.recent].slice(0, this.recentLimit);
      }
      return this.snapshot();
    });
    this.notify(snapshot);
  }

  private notify(snapshot: StatsSnapshot): void {
    if (!this.listener) {
      return;
    }
    try {
      this.listener(snapshot);
    } catch (error) {
      this.logger?.warn("stats_listener_failed", { error: errorMessage(error) });
    }
  }
}
