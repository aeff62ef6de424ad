import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { Report, VerdictOutcome } from "./types.js";

export interface RunStoreOptions {
  dbPath: string;
}

export interface RunRow {
  id: number;
  username: string;
  startedAt: number;
  finishedAt: number;
  cancelled: boolean;
  sitesTotal: number;
  foundCount: number;
  notFoundCount: number;
  failedCount: number;
}

export interface StoredVerdictRow {
  siteName: string;
  categories: string[];
  url: string;
  outcome: VerdictOutcome;
  statusCode: number;
  confidence: number;
  detail: string | null;
  elapsedMs: number;
}

const schemaSql = fs.readFileSync(path.join(__dirname, "..", "schema.sql"), "utf8");

interface RunDbRow {
  id: number;
  username: string;
  started_at: number;
  finished_at: number;
  cancelled: number;
  sites_total: number;
  found_count: number;
  not_found_count: number;
  failed_count: number;
}

interface VerdictDbRow {
  site_name: string;
  categories: string;
  url: string;
  outcome: VerdictOutcome;
  status_code: number;
  confidence: number;
  detail: string | null;
  elapsed_ms: number;
}

function getColumns(db: Database.Database, table: string): string[] {
  return db
    .prepare(`PRAGMA table_info(${table})`)
    .all()
    .map((row) => (row as { name: string }).name);
}

function applySchema(db: Database.Database) {
  db.exec(schemaSql);
  // Stores written before confidence was recorded.
  if (!getColumns(db, "verdicts").includes("confidence")) {
    db.exec("ALTER TABLE verdicts ADD COLUMN confidence INTEGER NOT NULL DEFAULT 0");
  }
}

/**
 * Keeps finished reports so earlier runs can be listed and compared.
 */
export class RunStore {
  private db: Database.Database;

  constructor(options: RunStoreOptions) {
    if (options.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(options.dbPath), { recursive: true });
    }
    this.db = new Database(options.dbPath);
    if (options.dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
    applySchema(this.db);
  }

  close() {
    this.db.close();
  }

  saveReport(report: Report): number {
    const insertRun = this.db.prepare(
      `INSERT INTO runs (username, started_at, finished_at, cancelled, sites_total, found_count, not_found_count, failed_count)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertVerdict = this.db.prepare(
      `INSERT INTO verdicts (run_id, position, site_name, categories, url, outcome, status_code, confidence, detail, elapsed_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const transaction = this.db.transaction((value: Report) => {
      const result = insertRun.run(
        value.username,
        value.startedAt,
        value.finishedAt,
        value.cancelled ? 1 : 0,
        value.verdicts.length,
        value.counts["found"],
        value.counts["not-found"],
        value.counts["failed"]
      );
      const runId = Number(result.lastInsertRowid);
      value.verdicts.forEach((verdict, position) => {
        insertVerdict.run(
          runId,
          position,
          verdict.site.name,
          JSON.stringify(verdict.site.categories),
          verdict.url,
          verdict.outcome,
          verdict.status,
          verdict.confidence,
          verdict.detail,
          Math.round(verdict.elapsedMs)
        );
      });
      return runId;
    });

    return transaction(report);
  }

  listRuns(limit: number, username?: string): RunRow[] {
    const rows = (
      username
        ? this.db
            .prepare("SELECT * FROM runs WHERE username = ? ORDER BY id DESC LIMIT ?")
            .all(username, limit)
        : this.db.prepare("SELECT * FROM runs ORDER BY id DESC LIMIT ?").all(limit)
    ) as RunDbRow[];
    return rows.map((row) => ({
      id: row.id,
      username: row.username,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      cancelled: row.cancelled === 1,
      sitesTotal: row.sites_total,
      foundCount: row.found_count,
      notFoundCount: row.not_found_count,
      failedCount: row.failed_count
    }));
  }

  getRunVerdicts(runId: number, outcome?: VerdictOutcome): StoredVerdictRow[] {
    const rows = (
      outcome
        ? this.db
            .prepare("SELECT * FROM verdicts WHERE run_id = ? AND outcome = ? ORDER BY position ASC")
            .all(runId, outcome)
        : this.db.prepare("SELECT * FROM verdicts WHERE run_id = ? ORDER BY position ASC").all(runId)
    ) as VerdictDbRow[];
    return rows.map((row) => ({
      siteName: row.site_name,
      categories: parseCategories(row.categories),
      url: row.url,
      outcome: row.outcome,
      statusCode: row.status_code,
      confidence: row.confidence,
      detail: row.detail,
      elapsedMs: row.elapsed_ms
    }));
  }
}

function parseCategories(value: string): string[] {
  const parsed: unknown = JSON.parse(value);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}
