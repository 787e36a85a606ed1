import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { ItemOutcome, ItemResult, StatsSnapshot } from "../types";
import { RunRecord, RunStatus, RunStore } from "./types";

type RunRow = {
  runId: string;
  profile: string;
  startedAt: string;
  finishedAt: string | null;
  status: string;
  total: number;
  found: number;
  completed: number;
  skipped: number;
  failed: number;
};

type ItemRow = {
  runId: string;
  identifier: string;
  status: string;
  path: string | null;
  bytes: number | null;
  error: string | null;
  finishedAt: string;
};

function toRunStatus(value: string): RunStatus {
  return value === "completed" || value === "failed" ? value : "running";
}

function toItemOutcome(value: string): ItemOutcome {
  return value === "completed" || value === "skipped" ? value : "failed";
}

export class SqliteRunStore implements RunStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, profile: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, profile, startedAt, finishedAt, status, total, found, completed, skipped, failed)
        VALUES (@runId, @profile, @startedAt, NULL, 'running', 0, 0, 0, 0, 0)
        ON CONFLICT(runId) DO UPDATE SET
          profile = excluded.profile,
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, profile, startedAt });
  }

  async recordItem(result: ItemResult): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO run_items (runId, identifier, status, path, bytes, error, finishedAt)
        VALUES (@runId, @identifier, @status, @path, @bytes, @error, @finishedAt)
        ON CONFLICT(runId, identifier) DO UPDATE SET
          status = excluded.status,
          path = excluded.path,
          bytes = excluded.bytes,
          error = excluded.error,
          finishedAt = excluded.finishedAt
      `,
      )
      .run({
        runId: result.runId,
        identifier: result.identifier,
        status: result.status,
        path: result.path ?? null,
        bytes: result.bytes ?? null,
        error: result.error ?? null,
        finishedAt: result.finishedAt,
      });
  }

  async finishRun(
    runId: string,
    status: Exclude<RunStatus, "running">,
    stats: StatsSnapshot,
    finishedAt: string,
  ): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt,
          total = @total,
          found = @found,
          completed = @completed,
          skipped = @skipped,
          failed = @failed
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
        total: stats.total,
        found: stats.found,
        completed: stats.completed,
        skipped: stats.skipped,
        failed: stats.failed,
      });
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    const rows = this.db
      .prepare(
        `
        SELECT runId, profile, startedAt, finishedAt, status, total, found, completed, skipped, failed
        FROM runs
        ORDER BY startedAt DESC
        LIMIT ?
      `,
      )
      .all(limit) as RunRow[];

    return rows.map((row) => ({
      runId: row.runId,
      profile: row.profile,
      startedAt: row.startedAt,
      finishedAt: row.finishedAt ?? undefined,
      status: toRunStatus(row.status),
      total: row.total,
      found: row.found,
      completed: row.completed,
      skipped: row.skipped,
      failed: row.failed,
    }));
  }

  async listFailedItems(runId: string): Promise<ItemResult[]> {
    const rows = this.db
      .prepare(
        `
        SELECT runId, identifier, status, path, bytes, error, finishedAt
        FROM run_items
        WHERE runId = ? AND status = 'failed'
        ORDER BY finishedAt ASC
      `,
      )
      .all(runId) as ItemRow[];

    return rows.map((row) => ({
      runId: row.runId,
      identifier: row.identifier,
      status: toItemOutcome(row.status),
      path: row.path ?? undefined,
      bytes: row.bytes ?? undefined,
      error: row.error ?? undefined,
      finishedAt: row.finishedAt,
    }));
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        profile TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL,
        total INTEGER NOT NULL DEFAULT 0,
        found INTEGER NOT NULL DEFAULT 0,
        completed INTEGER NOT NULL DEFAULT 0,
        skipped INTEGER NOT NULL DEFAULT 0,
        failed INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS run_items (
        runId TEXT NOT NULL,
        identifier TEXT NOT NULL,
        status TEXT NOT NULL,
        path TEXT NULL,
        bytes INTEGER NULL,
        error TEXT NULL,
        finishedAt TEXT NOT NULL,
        PRIMARY KEY (runId, identifier)
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(startedAt);
      CREATE INDEX IF NOT EXISTS idx_run_items_status ON run_items(runId, status);
    `);
  }
}
