import { AppConfig, loadConfig } from "../config";
import { runRecover, runStatus } from "../core/commands";
import { errorMessage } from "../core/errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createRunStore } from "../store";

export type CommandName = "recover" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  profile?: string;
  showBrowser: boolean;
  limit: number;
  configPath?: string;
}

const DEFAULT_STATUS_LIMIT = 10;

const HELP_TEXT = `
Usage:
  clip-recovery <command> [options]
  clip-recovery <profile> [options]   Same as \`recover <profile>\`

Commands:
  recover <profile>   Discover and download every archived video of a profile
  status              List recent runs and the failed items of the latest one

Options:
  --config <path>  Optional path to JSON config file
  --show-browser   Run the discovery browser with a visible window (recover)
  --limit <n>      Number of runs to list (status, default ${DEFAULT_STATUS_LIMIT})
  -h, --help       Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "recover" || raw === "status") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("-") ? value : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const first = argv[0];
  if (!first || first.startsWith("-")) {
    return "help";
  }

  // a bare profile name is shorthand for `recover <profile>`
  const named = parseCommand(first);
  const command = named ?? "recover";
  const profileRaw = named ? argv[1] : first;
  const profile = profileRaw && !profileRaw.startsWith("-") ? profileRaw.trim() : undefined;
  if (command === "recover" && !profile) {
    return "help";
  }

  const limitParsed = Number.parseInt(readOption(argv, "--limit") ?? "", 10);
  return {
    command,
    profile: command === "recover" ? profile : undefined,
    showBrowser: argv.includes("--show-browser"),
    limit: Number.isFinite(limitParsed) && limitParsed > 0 ? limitParsed : DEFAULT_STATUS_LIMIT,
    configPath: readOption(argv, "--config"),
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config: AppConfig = loadConfig(parsed.configPath);
  if (parsed.showBrowser) {
    config = {
      ...config,
      headless: false,
    };
  }

  const runId = createRunId(parsed.profile);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const store = createRunStore(config);
  const context = { runId, config, store, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    profile: parsed.profile,
    headless: config.headless,
    workers: config.numWorkers,
  });

  try {
    switch (parsed.command) {
      case "recover": {
        if (!parsed.profile) {
          console.error(getHelpText());
          return 1;
        }
        const summary = await runRecover({ ...context, logger: logger.child("recover") }, parsed.profile);
        logger.info("command_complete", {
          command: parsed.command,
          profile: summary.profile,
          allAccountedFor: summary.outcome.allAccountedFor,
        });
        break;
      }
      case "status":
        await runStatus({ ...context, logger: logger.child("status") }, parsed.limit);
        logger.info("command_complete", { command: parsed.command });
        break;
      default:
        console.error(`Unsupported command: ${parsed.command}`);
        return 1;
    }
    return 0;
  } catch (error) {
    logger.error("fatal", {
      command: parsed.command,
      error: errorMessage(error),
      errorName: error instanceof Error ? error.name : undefined,
    });
    return 1;
  } finally {
    await store.close();
    if (parsed.command === "recover") {
      metrics.printSummary(logger);
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
