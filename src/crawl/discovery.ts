import { AppConfig } from "../config";
import { sleep as defaultSleep } from "../core/concurrency";
import { DiscoveryFatalError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { DiscoveryEvent } from "../types";
import { BrowsingSession, SCROLL_TO_BOTTOM_SCRIPT } from "./browser";
import { toItemIdentifier } from "./htmlParser";

export type DiscoveryConfig = Pick<
  AppConfig,
  "archiveBaseUrl" | "profileBaseUrl" | "selectors" | "scrollSettleMs" | "maxScrollAttempts" | "maxFailAttempts"
>;

export interface DiscoveryDeps {
  config: DiscoveryConfig;
  session: BrowsingSession;
  logger: Logger;
  metrics: MetricsRegistry;
  sleep?: (ms: number) => Promise<void>;
}

export function buildProfileUrl(profileBaseUrl: string, profile: string): string {
  return `${profileBaseUrl}${encodeURIComponent(profile)}`;
}

/** Advertised count as rendered on the profile tab ("1,204" style included); 0 when unreadable. */
export function parseAdvisoryTotal(text: string): number {
  const normalized = text.replace(/[\s,]/g, "");
  if (!/^\d+$/.test(normalized)) {
    return 0;
  }
  return Number.parseInt(normalized, 10);
}

function collectNewIdentifiers(hrefs: string[], seen: Set<string>, archiveBaseUrl: string): string[] {
  const fresh: string[] = [];
  const batch = new Set<string>();
  for (const href of hrefs) {
    const identifier = toItemIdentifier(href, archiveBaseUrl);
    if (!identifier || seen.has(identifier) || batch.has(identifier)) {
      continue;
    }
    batch.add(identifier);
    fresh.push(identifier);
  }
  return fresh;
}

/**
 * Walks an infinite-scroll profile listing and yields what it finds as it goes.
 *
 * The advertised total is emitted first. Scrolling stops once that many
 * distinct items have been seen, or after `maxFailAttempts` scrolls in a row
 * turn up nothing new, whichever comes first; `maxScrollAttempts` caps the
 * whole walk. A total of 0 means "unknown", leaving only the stagnation rule.
 *
 * Every browser failure is fatal. The session is closed when the sequence ends.
 */
export async function* discoverProfile(deps: DiscoveryDeps, profile: string): AsyncGenerator<DiscoveryEvent, void, undefined> {
  const { config, session, logger, metrics } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const profileUrl = buildProfileUrl(config.profileBaseUrl, profile);

  const guard = async <T>(step: string, operation: () => Promise<T>): Promise<T> => {
    try {
      return await operation();
    } catch (error) {
      throw new DiscoveryFatalError(profile, `Discovery failed to ${step} for ${profileUrl}`, { cause: error });
    }
  };

  try {
    logger.info("discovery_start", { profile, url: profileUrl });
    await guard("open profile", () => session.open(profileUrl));
    const countText = await guard("read video count", () => session.readText(config.selectors.count));
    const total = parseAdvisoryTotal(countText);
    if (total === 0) {
      logger.warn("discovery_total_unknown", { profile, countText });
    }
    yield { type: "total_count", total };

    const seen = new Set<string>();
    let consecutiveFails = 0;

    for (let attempt = 1; attempt <= config.maxScrollAttempts; attempt += 1) {
      const stopTimer = metrics.startTimer("scroll_ms");
      await guard("scroll listing", () => session.executeScript(SCROLL_TO_BOTTOM_SCRIPT));
      // the first pass reads what the initial page load already rendered
      if (attempt !== 1) {
        await sleep(config.scrollSettleMs);
      }
      const hrefs = await guard("read listing", () => session.findElements(config.selectors.item));
      const fresh = collectNewIdentifiers(hrefs, seen, config.archiveBaseUrl);
      const durationMs = stopTimer();
      metrics.incrementCounter("scrolls", 1);
      metrics.incrementCounter("items_discovered", fresh.length);
      logger.debug("discovery_scroll", { profile, attempt, newItems: fresh.length, seen: seen.size + fresh.length, durationMs });

      for (const identifier of fresh) {
        seen.add(identifier);
        yield { type: "item_found", identifier };
      }

      if (total > 0 && seen.size >= total) {
        logger.info("discovery_target_reached", { profile, attempt, found: seen.size, total });
        return;
      }

      if (fresh.length > 0) {
        consecutiveFails = 0;
        continue;
      }

      consecutiveFails += 1;
      if (consecutiveFails >= config.maxFailAttempts) {
        logger.info("discovery_stagnated", { profile, attempt, found: seen.size, total, consecutiveFails });
        return;
      }
    }

    logger.warn("discovery_max_scrolls_reached", { profile, maxScrollAttempts: config.maxScrollAttempts, found: seen.size, total });
  } finally {
    try {
      await session.close();
    } catch (error) {
      logger.warn("discovery_session_close_failed", { profile, error: error instanceof Error ? error.message : String(error) });
    }
  }
}
