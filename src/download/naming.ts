import path from "node:path";

function sanitizeSegment(segment: string): string {
  return segment.replace(/[^A-Za-z0-9._-]/g, "_");
}

/**
 * `<last>_<second-to-last>.mp4` from the identifier's path, e.g.
 * `.../video/5a1b2c3d/my_clip` becomes `my_clip_5a1b2c3d.mp4`. The same
 * identifier always maps to the same name.
 */
export function identifierToFilename(identifier: string): string {
  const segments = identifier
    .split(/[?#]/)[0]
    .split("/")
    .filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1] ?? "video";
  const secondLast = segments[segments.length - 2] ?? "unknown";
  return `${sanitizeSegment(decodeSafely(last))}_${sanitizeSegment(decodeSafely(secondLast))}.mp4`;
}

function decodeSafely(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function profileOutputDir(outputDir: string, profile: string): string {
  return path.resolve(outputDir, sanitizeSegment(profile));
}
