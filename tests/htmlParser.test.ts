import test from "node:test";
import assert from "node:assert/strict";
import { join } from "node:path";
import { extractVideoSource, toItemIdentifier } from "../src/crawl/htmlParser";
import { identifierToFilename, profileOutputDir } from "../src/download/naming";

const ARCHIVE = "https://web.archive.org/web/";

test("toItemIdentifier drops query and fragment", () => {
  assert.equal(
    toItemIdentifier("https://web.archive.org/web/2019/https://plays.tv/video/abc/clip?from=feed#top", ARCHIVE),
    "https://web.archive.org/web/2019/https://plays.tv/video/abc/clip",
  );
});

test("toItemIdentifier routes live links through the archive", () => {
  assert.equal(
    toItemIdentifier("https://plays.tv/video/abc/clip", ARCHIVE),
    "https://web.archive.org/web/https://plays.tv/video/abc/clip",
  );
});

test("toItemIdentifier rejects hrefs that are not absolute URLs", () => {
  assert.equal(toItemIdentifier("/video/abc/clip", ARCHIVE), undefined);
  assert.equal(toItemIdentifier("", ARCHIVE), undefined);
});

test("extractVideoSource takes the first source of the wanted resolution", () => {
  const html = `
    <video>
      <source res="480" src="https://cdn.test/low.mp4">
      <source res="720" src="/media/hd.mp4">
      <source res="720" src="https://cdn.test/other.mp4">
    </video>`;
  assert.equal(extractVideoSource(html, "https://archive.test/video/1", "720"), "https://archive.test/media/hd.mp4");
  assert.equal(extractVideoSource(html, "https://archive.test/video/1", "480"), "https://cdn.test/low.mp4");
  assert.equal(extractVideoSource(html, "https://archive.test/video/1", "1080"), undefined);
});

test("extractVideoSource gives up when the first matching source has no src", () => {
  const empty = `<video><source res="720" src=""><source res="720" src="/media/hd.mp4"></video>`;
  const missing = `<video><source res="720"><source res="720" src="/media/hd.mp4"></video>`;
  assert.equal(extractVideoSource(empty, "https://archive.test/video/1", "720"), undefined);
  assert.equal(extractVideoSource(missing, "https://archive.test/video/1", "720"), undefined);
});

test("extractVideoSource resolves protocol-relative sources to https", () => {
  const html = `<video><source res="720" src="//cdn.test/x.mp4"></video>`;
  assert.equal(extractVideoSource(html, "https://archive.test/video/1", "720"), "https://cdn.test/x.mp4");
});

test("extractVideoSource ignores source elements without res", () => {
  const html = `<video><source src="https://cdn.test/any.mp4"></video>`;
  assert.equal(extractVideoSource(html, "https://archive.test/video/1", "720"), undefined);
});

test("identifierToFilename joins the last two path segments", () => {
  assert.equal(
    identifierToFilename("https://web.archive.org/web/2019/https://plays.tv/video/5a1b2c3d/my_clip"),
    "my_clip_5a1b2c3d.mp4",
  );
  assert.equal(identifierToFilename("https://archive.test/video/id9/Best%20Play!/"), "Best_Play__id9.mp4");
});

test("profileOutputDir keeps the profile name filesystem safe", () => {
  assert.equal(profileOutputDir("/data/out", "alice"), join("/data/out", "alice"));
  assert.equal(profileOutputDir("/data/out", "../etc"), join("/data/out", ".._etc"));
});
