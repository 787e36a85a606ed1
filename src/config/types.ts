import { LogLevel } from "../observability/types";

export interface SelectorConfig {
  /** Element whose text is the profile's advertised video count. */
  count: string;
  /** Anchors linking to individual video pages in the listing. */
  item: string;
}

export interface AppConfig {
  archiveBaseUrl: string;
  profileBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  headless: boolean;
  selectors: SelectorConfig;
  scrollSettleMs: number;
  maxScrollAttempts: number;
  maxFailAttempts: number;
  videoResolution: string;
  numWorkers: number;
  queueCapacity: number;
  maxConcurrentRequests: number;
  rateLimitMaxRequests: number;
  rateLimitPeriodMs: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  requestTimeoutMs: number;
  chunkSizeBytes: number;
  recentActivityLimit: number;
  progressIntervalMs: number;
  outputDir: string;
  cachePath: string;
  storePath: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "selectors">> & {
  selectors?: Partial<SelectorConfig>;
};
