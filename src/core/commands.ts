import { DedupCache } from "../cache";
import { AppConfig } from "../config";
import { discoverProfile, PlaywrightBrowsingSession } from "../crawl";
import { DownloadClient, profileOutputDir } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { runRecoveryPipeline } from "../pipeline";
import { DownloadStats, ProgressReporter } from "../stats";
import { RunStore } from "../store";
import { RunSummary } from "../types";
import { Semaphore } from "./concurrency";
import { errorMessage } from "./errors";
import { closeFetchDispatchers } from "./fetch";
import { TokenBucketRateLimiter } from "./rateLimiter";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: RunStore;
  logger: Logger;
  metrics: MetricsRegistry;
}

export async function runRecover(ctx: CommandContext, profile: string): Promise<RunSummary> {
  const { config, logger, metrics, store } = ctx;
  const destinationDir = profileOutputDir(config.outputDir, profile);
  await store.startRun(ctx.runId, profile, new Date().toISOString());
  logger.info("recover_start", { profile, destinationDir, cachePath: config.cachePath, headless: config.headless });

  const stats = new DownloadStats({ recentActivityLimit: config.recentActivityLimit, logger: logger.child("stats") });
  const reporter = new ProgressReporter({ logger: logger.child("progress"), intervalMs: config.progressIntervalMs });
  reporter.attach(stats);

  try {
    const cache = await DedupCache.open(config.cachePath);
    logger.info("cache_loaded", { path: cache.filePath, entries: cache.size });

    const rateLimiter = new TokenBucketRateLimiter({
      maxRequests: config.rateLimitMaxRequests,
      periodMs: config.rateLimitPeriodMs,
      onWait: (waitMs) => {
        metrics.incrementCounter("rate_limit_waits", 1);
        logger.debug("rate_limit_wait", { waitMs });
      },
    });
    const downloader = new DownloadClient({
      config,
      destinationDir,
      rateLimiter,
      gate: new Semaphore(config.maxConcurrentRequests),
      logger: logger.child("download"),
      metrics,
    });

    const session = await PlaywrightBrowsingSession.launch({
      headless: config.headless,
      userAgent: config.userAgent,
      ignoreHttpsErrors: config.ignoreHttpsErrors,
      timeoutMs: config.readTimeoutMs,
    });
    const events = discoverProfile({ config, session, logger: logger.child("discovery"), metrics }, profile);

    const summary = await runRecoveryPipeline({
      runId: ctx.runId,
      profile,
      config,
      events,
      cache,
      downloader,
      stats,
      store,
      logger: logger.child("pipeline"),
      metrics,
    });

    reporter.finish(summary.stats);
    await store.finishRun(ctx.runId, "completed", summary.stats, new Date().toISOString());
    return summary;
  } catch (error) {
    logger.error("recover_failed", { profile, error: errorMessage(error) });
    await store.finishRun(ctx.runId, "failed", stats.snapshot(), new Date().toISOString());
    throw error;
  } finally {
    reporter.detach(stats);
    await closeFetchDispatchers();
  }
}

export async function runStatus(ctx: CommandContext, limit: number): Promise<void> {
  ctx.logger.info("status_start", { limit });
  const runs = await ctx.store.listRuns(Math.max(1, limit));
  for (const run of runs) {
    ctx.logger.info("status_run", { ...run });
  }

  const latest = runs[0];
  if (latest) {
    const failedItems = await ctx.store.listFailedItems(latest.runId);
    for (const item of failedItems) {
      ctx.logger.info("status_failed_item", { runId: item.runId, identifier: item.identifier, error: item.error });
    }
  }
  ctx.logger.info("status_complete", { runs: runs.length });
}
