import { LogFields, LogLevel } from "./types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
  writer?: LogWriter;
}

function consoleWriter(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.context.minLevel ?? "debug"]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    (this.context.writer ?? consoleWriter)(level, JSON.stringify(payload));
  }
}

/** Logger that drops every line; handy for tests and library callers. */
export function createSilentLogger(component = "silent"): Logger {
  return new Logger({ component, runId: "silent", writer: () => undefined });
}
