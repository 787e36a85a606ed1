import { Logger } from "../observability";
import { StatsSnapshot } from "../types";
import { DownloadStats } from "./downloadStats";
import { formatReport, summarizeRun } from "./report";

export interface ProgressReporterOptions {
  logger: Logger;
  intervalMs: number;
  now?: () => number;
}

/**
 * Live view of a run for the terminal. Hooked onto the stats notification; it
 * only logs, so it never blocks the worker that triggered the update.
 */
export class ProgressReporter {
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private lastEmittedAt = Number.NEGATIVE_INFINITY;
  private lastSnapshot?: StatsSnapshot;

  constructor(options: ProgressReporterOptions) {
    this.logger = options.logger;
    this.intervalMs = Math.max(0, options.intervalMs);
    this.now = options.now ?? Date.now;
  }

  attach(stats: DownloadStats): void {
    stats.onUpdate((snapshot) => this.update(snapshot));
  }

  detach(stats: DownloadStats): void {
    stats.onUpdate(undefined);
  }

  update(snapshot: StatsSnapshot): void {
    this.lastSnapshot = snapshot;
    const current = this.now();
    if (current - this.lastEmittedAt < this.intervalMs) {
      return;
    }
    this.lastEmittedAt = current;
    this.emit(snapshot);
  }

  /** Logs the final counters plus a verdict that separates discovery gaps from download failures. */
  finish(snapshot: StatsSnapshot): void {
    const outcome = summarizeRun(snapshot);
    this.emit(snapshot);
    this.logger.info("run_report", {
      total: snapshot.total,
      found: snapshot.found,
      completed: snapshot.completed,
      skipped: snapshot.skipped,
      failed: snapshot.failed,
      ...outcome,
      report: formatReport(snapshot, outcome),
    });

    if (outcome.underDiscovered) {
      this.logger.warn("run_under_discovered", { total: snapshot.total, found: snapshot.found, missing: outcome.missing });
    }
    if (outcome.hasFailures) {
      this.logger.warn("run_had_failures", { failed: snapshot.failed, successRate: outcome.successRate });
    }
  }

  getLastSnapshot(): StatsSnapshot | undefined {
    return this.lastSnapshot;
  }

  private emit(snapshot: StatsSnapshot): void {
    this.logger.info("progress", {
      total: snapshot.total,
      found: snapshot.found,
      completed: snapshot.completed,
      skipped: snapshot.skipped,
      failed: snapshot.failed,
      remaining: snapshot.remaining,
      latest: snapshot.recent[0]?.label,
    });
  }
}
