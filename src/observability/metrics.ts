import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  totalMs: number;
  min: number;
  max: number;
  avg: number;
  p95: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

/**
 * In-process counters and duration samples for one command. Nothing is
 * exported anywhere; the totals are logged once when the command ends.
 */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly samples = new Map<MetricTimerName, number[]>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.getCounter(name) + value);
  }

  /** Starts a stopwatch; calling the returned function records and returns the elapsed ms. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    let recorded: number | undefined;
    return () => {
      if (recorded === undefined) {
        recorded = this.now() - startedAt;
        this.samples.set(name, [...(this.samples.get(name) ?? []), recorded]);
      }
      return recorded;
    };
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      scrolls: this.getCounter("scrolls"),
      items_discovered: this.getCounter("items_discovered"),
      items_enqueued: this.getCounter("items_enqueued"),
      downloads_ok: this.getCounter("downloads_ok"),
      downloads_skipped: this.getCounter("downloads_skipped"),
      downloads_failed: this.getCounter("downloads_failed"),
      bytes_downloaded: this.getCounter("bytes_downloaded"),
      rate_limit_waits: this.getCounter("rate_limit_waits"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      scroll_ms: summarizeSamples(this.samples.get("scroll_ms") ?? []),
      page_fetch_ms: summarizeSamples(this.samples.get("page_fetch_ms") ?? []),
      download_ms: summarizeSamples(this.samples.get("download_ms") ?? []),
    };
  }

  snapshot(): MetricsSnapshot {
    return { counters: this.getCounters(), timers: this.getTimerSummaries() };
  }

  printSummary(logger?: Logger): void {
    if (logger) {
      logger.info("metrics_summary", { ...this.snapshot() });
      return;
    }
    console.log(JSON.stringify({ ts: new Date().toISOString(), level: "info", msg: "metrics_summary", ...this.snapshot() }, null, 2));
  }
}

export function summarizeSamples(values: readonly number[]): TimerSummary {
  if (values.length === 0) {
    return { count: 0, totalMs: 0, min: 0, max: 0, avg: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const totalMs = sorted.reduce((sum, value) => sum + value, 0);
  const rank = Math.min(sorted.length - 1, Math.ceil(sorted.length * 0.95) - 1);

  return {
    count: sorted.length,
    totalMs,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: Number((totalMs / sorted.length).toFixed(2)),
    p95: sorted[rank],
  };
}
