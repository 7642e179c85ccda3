import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { DatasetCount, DatasetName, RunRecord, RunStatus, RunStore, StoreStats } from "./types";

type RunRow = {
  runId: string;
  command: string;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus;
};

type DatasetRow = {
  dataset: DatasetName;
  season: number;
  count: number;
  runId: string;
  updatedAt: string;
};

function toRunRecord(row: RunRow): RunRecord {
  return {
    runId: row.runId,
    command: row.command,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt ?? undefined,
    status: row.status,
  };
}

export class SqliteStore implements RunStore {
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

  async startRun(runId: string, command: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, command, startedAt, finishedAt, status)
        VALUES (@runId, @command, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          command = excluded.command,
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({
        runId,
        command,
        startedAt,
      });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
      });
  }

  async recordDatasetCount(count: DatasetCount): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO dataset_counts (dataset, season, count, runId, updatedAt)
        VALUES (@dataset, @season, @count, @runId, @updatedAt)
        ON CONFLICT(dataset, season) DO UPDATE SET
          count = excluded.count,
          runId = excluded.runId,
          updatedAt = excluded.updatedAt
      `,
      )
      .run({
        dataset: count.dataset,
        season: count.season,
        count: count.count,
        runId: count.runId,
        updatedAt: count.updatedAt,
      });
  }

  async getStats(): Promise<StoreStats> {
    const lastRunRow = this.db
      .prepare(
        `
        SELECT runId, command, startedAt, finishedAt, status
        FROM runs
        ORDER BY startedAt DESC
        LIMIT 1
      `,
      )
      .get() as RunRow | undefined;

    const datasetRows = this.db
      .prepare(
        `
        SELECT dataset, season, count, runId, updatedAt
        FROM dataset_counts
        ORDER BY dataset ASC, season ASC
      `,
      )
      .all() as DatasetRow[];

    return {
      totalRuns: this.countWhere("1 = 1"),
      completedRuns: this.countWhere("status = 'completed'"),
      failedRuns: this.countWhere("status = 'failed'"),
      lastRun: lastRunRow ? toRunRecord(lastRunRow) : undefined,
      datasets: datasetRows.map((row) => ({ ...row })),
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private countWhere(whereClause: string): number {
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM runs WHERE ${whereClause}`).get() as { count: number };
    return row.count;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        command TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS dataset_counts (
        dataset TEXT NOT NULL,
        season INTEGER NOT NULL,
        count INTEGER NOT NULL,
        runId TEXT NOT NULL,
        updatedAt TEXT NOT NULL,
        PRIMARY KEY (dataset, season)
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(startedAt);
    `);
  }
}
