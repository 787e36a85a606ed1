import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CACHE_HEADER, DedupCache, parseCacheContent } from "../src/cache";
import { CacheIOError } from "../src/core/errors";

test("parseCacheContent skips comments, blank lines and repeats", () => {
  const ids = parseCacheContent("# header\r\nhttps://a.test/v/1\n\n  https://a.test/v/2  \nhttps://a.test/v/1\n# trailing\n");
  assert.deepEqual([...ids], ["https://a.test/v/1", "https://a.test/v/2"]);
});

test("open creates the cache file with its header", async () => {
  const dir = mkdtempSync(join(tmpdir(), "clip-cache-"));
  const cachePath = join(dir, "nested", "cache");

  const cache = await DedupCache.open(cachePath);

  assert.equal(cache.size, 0);
  assert.equal(await fs.readFile(cachePath, "utf-8"), CACHE_HEADER);
});

test("add is idempotent and writes each identifier once", async () => {
  const dir = mkdtempSync(join(tmpdir(), "clip-cache-"));
  const cachePath = join(dir, "cache");
  const cache = await DedupCache.open(cachePath);

  assert.equal(await cache.add("https://a.test/v/1"), true);
  assert.equal(await cache.add("https://a.test/v/1"), false);
  assert.equal(cache.has("https://a.test/v/1"), true);
  assert.equal(cache.size, 1);
  assert.equal(await fs.readFile(cachePath, "utf-8"), `${CACHE_HEADER}https://a.test/v/1\n`);
});

test("concurrent adds of the same identifier append a single line", async () => {
  const dir = mkdtempSync(join(tmpdir(), "clip-cache-"));
  const cachePath = join(dir, "cache");
  const cache = await DedupCache.open(cachePath);

  const results = await Promise.all([cache.add("x"), cache.add("x"), cache.add("x")]);

  assert.deepEqual(results, [true, false, false]);
  assert.equal(await fs.readFile(cachePath, "utf-8"), `${CACHE_HEADER}x\n`);
});

test("a reopened cache remembers earlier entries", async () => {
  const dir = mkdtempSync(join(tmpdir(), "clip-cache-"));
  const cachePath = join(dir, "cache");
  const first = await DedupCache.open(cachePath);
  await first.add("https://a.test/v/1");
  await first.add("https://a.test/v/2");

  const second = await DedupCache.open(cachePath);

  assert.equal(second.size, 2);
  assert.equal(second.has("https://a.test/v/2"), true);
  assert.equal(second.has("https://a.test/v/3"), false);
});

test("an entry appended to a file without a final newline survives a reopen", async () => {
  const dir = mkdtempSync(join(tmpdir(), "clip-cache-"));
  const cachePath = join(dir, "cache");
  await fs.writeFile(cachePath, "# header\nhttps://a.test/v/1", "utf-8");

  const cache = await DedupCache.open(cachePath);
  assert.equal(await cache.add("https://a.test/v/2"), true);

  assert.equal(await fs.readFile(cachePath, "utf-8"), "# header\nhttps://a.test/v/1\nhttps://a.test/v/2\n");
  const reopened = await DedupCache.open(cachePath);
  assert.equal(reopened.has("https://a.test/v/1"), true);
  assert.equal(reopened.has("https://a.test/v/2"), true);
  assert.equal(reopened.size, 2);
});

test("an unreadable cache path is reported as CacheIOError", async () => {
  const dir = mkdtempSync(join(tmpdir(), "clip-cache-"));

  await assert.rejects(DedupCache.open(dir), (error: unknown) => {
    assert.ok(error instanceof CacheIOError);
    assert.equal(error.path, dir);
    return true;
  });
});
