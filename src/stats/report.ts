import { RunOutcome, StatsSnapshot } from "../types";

export function summarizeRun(stats: StatsSnapshot): RunOutcome {
  const processed = stats.completed + stats.skipped + stats.failed;
  const successRate = stats.found > 0 ? Number(((stats.completed / stats.found) * 100).toFixed(1)) : 0;

  return {
    underDiscovered: stats.found < stats.total,
    missing: Math.max(stats.total - stats.found, 0),
    hasFailures: stats.failed > 0,
    allAccountedFor: stats.failed === 0 && processed === stats.found,
    successRate,
  };
}

/**
 * Human-readable verdict lines. Under-discovery comes first: it means the
 * listing itself needs a second look, whereas failed downloads only need a re-run.
 */
export function formatReport(stats: StatsSnapshot, outcome: RunOutcome = summarizeRun(stats)): string[] {
  const lines = [
    `Total videos listed: ${stats.total > 0 ? stats.total : "~"}`,
    `Videos found: ${stats.found}`,
    `Successfully downloaded: ${stats.completed}`,
    `Skipped (already downloaded): ${stats.skipped}`,
    `Failed: ${stats.failed}`,
  ];

  if (outcome.underDiscovered) {
    lines.push(
      `Warning: only found ${stats.found}/${stats.total} videos (${outcome.missing} missing). ` +
        "Some videos may not have been discovered.",
    );
  }

  if (outcome.allAccountedFor) {
    if (stats.completed === stats.found) {
      lines.push(`Complete: all ${stats.found} videos downloaded successfully.`);
    } else {
      lines.push(
        `Complete: all ${stats.found} videos processed (${stats.completed} downloaded, ${stats.skipped} already downloaded).`,
      );
    }
  } else if (outcome.hasFailures) {
    lines.push(
      `Incomplete: ${stats.failed} download(s) failed. Success rate: ${outcome.successRate.toFixed(1)}%. ` +
        "Run again to retry them.",
    );
  }

  return lines;
}
