import fs from "node:fs";
import path from "node:path";
import { Mutex } from "../core/concurrency";
import { CacheIOError } from "../core/errors";

export const CACHE_HEADER =
  "# Download cache for clip-recovery. Video URLs listed here will not be downloaded again.\n" +
  "# Delete this file or remove entries to download those videos again.\n";

export function parseCacheContent(content: string): Set<string> {
  const identifiers = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    identifiers.add(trimmed);
  }
  return identifiers;
}

/**
 * Append-only record of identifiers that finished downloading. Reads are a
 * plain set lookup; writes are serialized and hit the file before the set, so
 * an identifier is never reported as cached unless it is on disk.
 */
export class DedupCache {
  private readonly writeLock = new Mutex();

  private constructor(
    readonly filePath: string,
    private readonly identifiers: Set<string>,
  ) {}

  static async open(cachePath: string): Promise<DedupCache> {
    const absolutePath = path.resolve(cachePath);
    try {
      await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
      if (!fs.existsSync(absolutePath)) {
        await fs.promises.writeFile(absolutePath, CACHE_HEADER, "utf-8");
        return new DedupCache(absolutePath, new Set());
      }
      const content = await fs.promises.readFile(absolutePath, "utf-8");
      // a hand-edited file may lack the final newline; appends must start on a fresh line
      if (content.length > 0 && !content.endsWith("\n")) {
        await fs.promises.appendFile(absolutePath, "\n", "utf-8");
      }
      return new DedupCache(absolutePath, parseCacheContent(content));
    } catch (error) {
      throw new CacheIOError(absolutePath, "open", error);
    }
  }

  get size(): number {
    return this.identifiers.size;
  }

  has(identifier: string): boolean {
    return this.identifiers.has(identifier);
  }

  /** Returns false when the identifier was already recorded. */
  async add(identifier: string): Promise<boolean> {
    return this.writeLock.runExclusive(async () => {
      if (this.identifiers.has(identifier)) {
        return false;
      }

      try {
        await fs.promises.appendFile(this.filePath, `${identifier}\n`, "utf-8");
      } catch (error) {
        throw new CacheIOError(this.filePath, "append", error);
      }

      this.identifiers.add(identifier);
      return true;
    });
  }
}
