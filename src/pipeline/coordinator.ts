import { AppConfig } from "../config";
import { errorMessage, isItemError } from "../core/errors";
import { identifierToFilename } from "../download/naming";
import { DownloadedVideo } from "../download/downloader";
import { Logger, MetricsRegistry } from "../observability";
import { summarizeRun } from "../stats/report";
import { DownloadStats } from "../stats/downloadStats";
import { RunStore } from "../store";
import { DiscoveryEvent, ItemResult, RunSummary } from "../types";
import { END_OF_INPUT, WorkQueue } from "./workQueue";

export interface ItemCache {
  has(identifier: string): boolean;
  add(identifier: string): Promise<boolean>;
}

export interface VideoDownloader {
  download(identifier: string): Promise<DownloadedVideo>;
}

export interface PipelineDeps {
  runId: string;
  profile: string;
  config: Pick<AppConfig, "numWorkers" | "queueCapacity">;
  events: AsyncIterable<DiscoveryEvent>;
  cache: ItemCache;
  downloader: VideoDownloader;
  stats: DownloadStats;
  store: RunStore;
  logger: Logger;
  metrics: MetricsRegistry;
}

/**
 * Fans discovered items out to a fixed pool of workers.
 *
 * Discovery runs as its own task and hands every item over through the work
 * queue, followed by a single end-of-input marker. Each worker that takes the
 * marker puts it back before exiting, so every worker sees it exactly once.
 * Per-item failures are counted and the run carries on. A discovery failure
 * still lets the workers finish what was queued; a cache failure stops intake
 * and drains the rest unprocessed. Either is rethrown once the workers exit.
 */
export async function runRecoveryPipeline(deps: PipelineDeps): Promise<RunSummary> {
  const { runId, profile, config, cache, downloader, stats, store, logger, metrics } = deps;
  const queue = new WorkQueue<string>(Math.max(0, config.queueCapacity));
  const workerCount = Math.max(1, config.numWorkers);
  let abortError: unknown;
  let discoveryError: unknown;

  const recordItem = async (result: Omit<ItemResult, "runId" | "finishedAt">): Promise<void> => {
    try {
      await store.recordItem({ ...result, runId, finishedAt: new Date().toISOString() });
    } catch (error) {
      logger.warn("run_store_record_failed", { identifier: result.identifier, error: errorMessage(error) });
    }
  };

  const processItem = async (identifier: string): Promise<void> => {
    const label = identifierToFilename(identifier);
    if (cache.has(identifier)) {
      await stats.incrementSkipped(label);
      metrics.incrementCounter("downloads_skipped", 1);
      logger.debug("download_item_skipped", { identifier });
      await recordItem({ identifier, status: "skipped" });
      return;
    }

    try {
      const video = await downloader.download(identifier);
      await cache.add(identifier);
      await stats.incrementCompleted(video.filename);
      metrics.incrementCounter("downloads_ok", 1);
      logger.info("download_item_ok", { identifier, path: video.path, bytes: video.bytes });
      await recordItem({ identifier, status: "completed", path: video.path, bytes: video.bytes });
    } catch (error) {
      if (!isItemError(error)) {
        throw error;
      }
      await stats.incrementFailed(label);
      metrics.incrementCounter("downloads_failed", 1);
      logger.warn("download_item_failed", {
        identifier,
        error: errorMessage(error),
        errorName: error instanceof Error ? error.name : undefined,
      });
      await recordItem({ identifier, status: "failed", error: errorMessage(error) });
    }
  };

  const produce = async (): Promise<void> => {
    try {
      for await (const event of deps.events) {
        if (abortError !== undefined) {
          break;
        }
        if (event.type === "total_count") {
          await stats.setTotal(event.total);
          logger.info("discovery_total", { profile, total: event.total });
          continue;
        }
        await stats.incrementFound();
        metrics.incrementCounter("items_enqueued", 1);
        await queue.put(event.identifier);
      }
    } catch (error) {
      discoveryError = error;
      logger.error("discovery_failed", { profile, error: errorMessage(error) });
    } finally {
      await queue.put(END_OF_INPUT);
    }
  };

  const work = async (workerId: number): Promise<void> => {
    for (;;) {
      const entry = await queue.get();
      if (entry === END_OF_INPUT) {
        await queue.put(END_OF_INPUT);
        logger.debug("worker_exit", { workerId });
        return;
      }

      try {
        // once the run is doomed, drain without touching the network
        if (abortError === undefined) {
          await processItem(entry);
        }
      } catch (error) {
        abortError ??= error;
        logger.error("pipeline_fatal", { identifier: entry, workerId, error: errorMessage(error) });
      } finally {
        queue.taskDone();
      }
    }
  };

  logger.info("pipeline_start", { profile, workers: workerCount, queueCapacity: config.queueCapacity });
  const workers = Array.from({ length: workerCount }, (_, index) => work(index + 1));
  await produce();
  await queue.join();
  await Promise.all(workers);

  if (abortError !== undefined) {
    throw abortError;
  }
  if (discoveryError !== undefined) {
    throw discoveryError;
  }

  const snapshot = stats.snapshot();
  logger.info("pipeline_complete", { profile, ...snapshot, recent: undefined });
  return { runId, profile, stats: snapshot, outcome: summarizeRun(snapshot) };
}
