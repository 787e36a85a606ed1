export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  profile?: string;
  identifier?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "scrolls"
  | "items_discovered"
  | "items_enqueued"
  | "downloads_ok"
  | "downloads_skipped"
  | "downloads_failed"
  | "bytes_downloaded"
  | "rate_limit_waits";

export type MetricTimerName = "scroll_ms" | "page_fetch_ms" | "download_ms";
