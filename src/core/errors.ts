function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** The browsing session could not load the profile or read the listing. Aborts the run. */
export class DiscoveryFatalError extends Error {
  readonly profile: string;

  constructor(profile: string, message: string, options?: { cause?: unknown }) {
    super(options?.cause === undefined ? message : `${message}: ${describeCause(options.cause)}`, options);
    this.name = "DiscoveryFatalError";
    this.profile = profile;
  }
}

/** A video page was fetched but carried no usable source element. */
export class ExtractionError extends Error {
  readonly identifier: string;

  constructor(identifier: string, message: string) {
    super(message);
    this.name = "ExtractionError";
    this.identifier = identifier;
  }
}

export class RequestError extends Error {
  readonly identifier: string;
  readonly url: string;
  readonly status?: number;

  constructor(identifier: string, url: string, detail: { status?: number; cause?: unknown }) {
    const reason =
      detail.status !== undefined ? `HTTP ${detail.status}` : describeCause(detail.cause ?? "request failed");
    super(`${reason} while fetching ${url}`, detail.cause === undefined ? undefined : { cause: detail.cause });
    this.name = "RequestError";
    this.identifier = identifier;
    this.url = url;
    this.status = detail.status;
  }
}

/** The dedup cache file could not be read or appended to. */
export class CacheIOError extends Error {
  readonly path: string;

  constructor(path: string, operation: "open" | "append", cause: unknown) {
    super(`Cache ${operation} failed for ${path}: ${describeCause(cause)}`, { cause });
    this.name = "CacheIOError";
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Per-item failures are recorded and the pipeline moves on; everything else aborts the run. */
export function isItemError(error: unknown): boolean {
  return !(error instanceof DiscoveryFatalError) && !(error instanceof CacheIOError);
}
