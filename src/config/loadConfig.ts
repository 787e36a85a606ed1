import fs from "node:fs";
import path from "node:path";
import { isLogLevel } from "../observability/logger";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  archiveBaseUrl: "https://web.archive.org/web/",
  profileBaseUrl: "https://web.archive.org/web/20191210043532/https://plays.tv/u/",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  ignoreHttpsErrors: false,
  headless: true,
  selectors: {
    count: ".nav-tab-label span",
    item: ".bd .video-list-container a.title",
  },
  scrollSettleMs: 4_000,
  maxScrollAttempts: 50,
  maxFailAttempts: 10,
  videoResolution: "720",
  numWorkers: 20,
  queueCapacity: 100,
  maxConcurrentRequests: 10,
  // the archive starts refusing clients at roughly 15 requests per minute
  rateLimitMaxRequests: 14,
  rateLimitPeriodMs: 60_000,
  connectTimeoutMs: 30_000,
  readTimeoutMs: 60_000,
  requestTimeoutMs: 300_000,
  chunkSizeBytes: 8_192,
  recentActivityLimit: 5,
  progressIntervalMs: 1_000,
  outputDir: "recovered-videos",
  cachePath: "recovered-videos/cache",
  storePath: "data/runs.sqlite",
  logLevel: "info",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: ConfigOverrides | null = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    selectors: {
      ...DEFAULT_CONFIG.selectors,
      ...(fileConfig.selectors ?? {}),
    },
  };

  return {
    ...merged,
    archiveBaseUrl: env.ARCHIVE_BASE_URL ?? merged.archiveBaseUrl,
    profileBaseUrl: env.PROFILE_BASE_URL ?? merged.profileBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    headless: toBool(env.HEADLESS, merged.headless),
    scrollSettleMs: toInt(env.SCROLL_SETTLE_MS, merged.scrollSettleMs),
    maxScrollAttempts: toInt(env.MAX_SCROLL_ATTEMPTS, merged.maxScrollAttempts),
    maxFailAttempts: toInt(env.MAX_FAIL_ATTEMPTS, merged.maxFailAttempts),
    videoResolution: env.VIDEO_RESOLUTION ?? merged.videoResolution,
    numWorkers: toInt(env.NUM_WORKERS, merged.numWorkers),
    queueCapacity: toInt(env.QUEUE_CAPACITY, merged.queueCapacity),
    maxConcurrentRequests: toInt(env.MAX_CONCURRENT_REQUESTS, merged.maxConcurrentRequests),
    rateLimitMaxRequests: toInt(env.RATE_LIMIT_MAX_REQUESTS, merged.rateLimitMaxRequests),
    rateLimitPeriodMs: toInt(env.RATE_LIMIT_PERIOD_MS, merged.rateLimitPeriodMs),
    connectTimeoutMs: toInt(env.CONNECT_TIMEOUT_MS, merged.connectTimeoutMs),
    readTimeoutMs: toInt(env.READ_TIMEOUT_MS, merged.readTimeoutMs),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    chunkSizeBytes: toInt(env.CHUNK_SIZE_BYTES, merged.chunkSizeBytes),
    recentActivityLimit: toInt(env.RECENT_ACTIVITY_LIMIT, merged.recentActivityLimit),
    progressIntervalMs: toInt(env.PROGRESS_INTERVAL_MS, merged.progressIntervalMs),
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    cachePath: env.CACHE_PATH ?? merged.cachePath,
    storePath: env.STORE_PATH ?? merged.storePath,
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : merged.logLevel,
  };
}

export { DEFAULT_CONFIG };
