import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Response } from "undici";
import { AppConfig } from "../config";
import { Semaphore } from "../core/concurrency";
import { ExtractionError, RequestError, errorMessage } from "../core/errors";
import { defaultFetch, FetchFn, getFetchDispatcher } from "../core/fetch";
import { extractVideoSource } from "../crawl/htmlParser";
import { Logger, MetricsRegistry } from "../observability";
import { identifierToFilename } from "./naming";

export type DownloadConfig = Pick<
  AppConfig,
  | "userAgent"
  | "ignoreHttpsErrors"
  | "videoResolution"
  | "connectTimeoutMs"
  | "readTimeoutMs"
  | "requestTimeoutMs"
  | "chunkSizeBytes"
>;

export interface RequestThrottle {
  acquire(): Promise<void>;
}

export interface DownloadClientDeps {
  config: DownloadConfig;
  destinationDir: string;
  rateLimiter: RequestThrottle;
  gate: Semaphore;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

export interface DownloadedVideo {
  identifier: string;
  mediaUrl: string;
  filename: string;
  path: string;
  bytes: number;
}

/**
 * Resolves a video page to its media file and streams it to disk.
 *
 * Each of the two requests (page, media) takes its own concurrency permit and
 * rate-limit token, and is bounded by `requestTimeoutMs` end to end, body included.
 */
export class DownloadClient {
  private readonly config: DownloadConfig;
  private readonly destinationDir: string;
  private readonly rateLimiter: RequestThrottle;
  private readonly gate: Semaphore;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchFn;

  constructor(deps: DownloadClientDeps) {
    this.config = deps.config;
    this.destinationDir = deps.destinationDir;
    this.rateLimiter = deps.rateLimiter;
    this.gate = deps.gate;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
  }

  targetPath(identifier: string): string {
    return path.join(this.destinationDir, identifierToFilename(identifier));
  }

  async download(identifier: string): Promise<DownloadedVideo> {
    const finalPath = this.targetPath(identifier);
    const html = await this.fetchPage(identifier);
    const mediaUrl = extractVideoSource(html, identifier, this.config.videoResolution);
    if (!mediaUrl) {
      throw new ExtractionError(
        identifier,
        `No ${this.config.videoResolution}p video source found on ${identifier}`,
      );
    }

    const bytes = await this.streamToFile(identifier, mediaUrl, finalPath);
    return {
      identifier,
      mediaUrl,
      filename: path.basename(finalPath),
      path: finalPath,
      bytes,
    };
  }

  private async fetchPage(identifier: string): Promise<string> {
    return this.guarded(async (signal) => {
      const stopTimer = this.metrics.startTimer("page_fetch_ms");
      try {
        const response = await this.request(identifier, identifier, "text/html,application/xhtml+xml", signal);
        try {
          return await response.text();
        } catch (error) {
          throw new RequestError(identifier, identifier, { cause: error });
        }
      } finally {
        const durationMs = stopTimer();
        this.logger.debug("download_page_fetched", { identifier, durationMs });
      }
    });
  }

  private async streamToFile(identifier: string, mediaUrl: string, outputPath: string): Promise<number> {
    return this.guarded(async (signal) => {
      const stopTimer = this.metrics.startTimer("download_ms");
      const response = await this.request(identifier, mediaUrl, "video/mp4,*/*", signal);
      if (!response.body) {
        stopTimer();
        throw new RequestError(identifier, mediaUrl, { cause: "response had no body" });
      }

      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      const tempPath = `${outputPath}.part`;
      let bytes = 0;

      const writable = fs.createWriteStream(tempPath, { flags: "w", highWaterMark: this.config.chunkSizeBytes });
      const readable = Readable.fromWeb(response.body, { highWaterMark: this.config.chunkSizeBytes });
      readable.on("data", (chunk: Uint8Array) => {
        bytes += chunk.byteLength;
      });

      try {
        await pipeline(readable, writable, { signal });
        fs.renameSync(tempPath, outputPath);
      } catch (error) {
        if (fs.existsSync(tempPath)) {
          fs.unlinkSync(tempPath);
        }
        throw new RequestError(identifier, mediaUrl, { cause: error });
      } finally {
        const durationMs = stopTimer();
        this.logger.debug("download_media_streamed", { identifier, url: mediaUrl, bytes, durationMs });
      }

      this.metrics.incrementCounter("bytes_downloaded", bytes);
      return bytes;
    });
  }

  private async request(identifier: string, url: string, accept: string, signal: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.config.userAgent,
          accept,
        },
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors, {
          connectTimeoutMs: this.config.connectTimeoutMs,
          readTimeoutMs: this.config.readTimeoutMs,
        }),
        signal,
        redirect: "follow",
      });
    } catch (error) {
      throw new RequestError(identifier, url, { cause: error });
    }

    if (!response.ok) {
      await this.discardBody(identifier, response);
      throw new RequestError(identifier, url, { status: response.status });
    }
    return response;
  }

  private async discardBody(identifier: string, response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug("download_body_discard_failed", { identifier, error: errorMessage(error) });
    }
  }

  /** Permit first, then token; the permit is held until the operation settles. */
  private async guarded<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    await this.gate.acquire();
    try {
      await this.rateLimiter.acquire();
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
      try {
        return await operation(controller.signal);
      } finally {
        clearTimeout(timeout);
      }
    } finally {
      this.gate.release();
    }
  }
}
