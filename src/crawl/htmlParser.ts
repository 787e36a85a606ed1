import { load } from "cheerio";

function normalizeUrl(baseUrl: string, href: string): string {
  return new URL(href, baseUrl).toString();
}

/**
 * Canonical identifier for a listing link: query and fragment dropped, and
 * routed through the archive unless the link already points into it.
 */
export function toItemIdentifier(href: string, archiveBaseUrl: string): string | undefined {
  let url: URL;
  try {
    url = new URL(href.trim());
  } catch {
    return undefined;
  }

  url.search = "";
  url.hash = "";
  const cleaned = url.toString();
  return cleaned.startsWith(archiveBaseUrl) ? cleaned : `${archiveBaseUrl}${cleaned}`;
}

/**
 * Absolute URL of the first `<source res="...">` element for the wanted
 * resolution. Undefined when there is none, or when that first element has no
 * usable `src`; later elements of the same resolution are not consulted.
 */
export function extractVideoSource(html: string, pageUrl: string, resolution: string): string | undefined {
  const $ = load(html);
  const match = $("source[res]")
    .filter((_, element) => $(element).attr("res") === resolution)
    .first();
  const src = match.attr("src")?.trim();
  return src ? normalizeUrl(pageUrl, src) : undefined;
}
