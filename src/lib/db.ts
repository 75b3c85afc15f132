import { createClient, type Client, type Value } from "@libsql/client";
import { buildCaseKey } from "./listing";
import type { RunResult } from "./types";

export interface RunSummary {
  id: number;
  task_run_at: string;
  case_key: string | null;
  cnr: string | null;
  listed_today: boolean | null;
  listed_tomorrow: boolean | null;
  serial: string | null;
  court: string | null;
  entries_count: number;
}

function flag(value: boolean | null): number | null {
  return value === null ? null : value ? 1 : 0;
}

function text(value: Value | undefined): string | null {
  return value === null || value === undefined ? null : String(value);
}

function bool(value: Value | undefined): boolean | null {
  return value === null || value === undefined ? null : Number(value) === 1;
}

export function openHistoryDb(database: { url: string; authToken: string | null }): Client {
  return createClient({ url: database.url, authToken: database.authToken ?? undefined });
}

/** Creates the run history tables of a libsql (SQLite) database when missing. */
export async function initRunHistory(db: Client) {
  await db.executeMultiple(`
    CREATE TABLE IF NOT EXISTS runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_run_at TEXT NOT NULL,
      case_key TEXT,
      cnr TEXT,
      listed_today INTEGER,
      listed_tomorrow INTEGER,
      serial TEXT,
      court TEXT,
      result_json TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS cause_list_entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER REFERENCES runs(id) ON DELETE CASCADE,
      serial TEXT NOT NULL,
      case_text TEXT,
      purpose TEXT,
      court_info TEXT,
      raw_cells TEXT NOT NULL
    );
  `);
}

export async function recordRun(db: Client, result: RunResult): Promise<number> {
  await initRunHistory(db);
  const { inputs } = result;
  const inserted = await db.execute({
    sql: `INSERT INTO runs (task_run_at, case_key, cnr, listed_today, listed_tomorrow, serial, court, result_json)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    args: [
      result.task_run_at,
      buildCaseKey(inputs.case_type, inputs.case_number, inputs.year, result.case_overview),
      inputs.cnr ?? result.case_overview?.cnr ?? null,
      flag(result.is_listed_today),
      flag(result.is_listed_tomorrow),
      result.listing_details?.serial ?? null,
      result.listing_details?.court ?? null,
      JSON.stringify(result),
    ],
  });
  const runId = Number(inserted.lastInsertRowid);

  for (const entry of result.cause_list?.entries ?? []) {
    await db.execute({
      sql: `INSERT INTO cause_list_entries (run_id, serial, case_text, purpose, court_info, raw_cells)
            VALUES (?, ?, ?, ?, ?, ?)`,
      args: [runId, entry.serial, entry.case_text, entry.purpose, entry.court_info, JSON.stringify(entry.raw_cells)],
    });
  }
  return runId;
}

export async function getRecentRuns(db: Client, limit = 20): Promise<RunSummary[]> {
  await initRunHistory(db);
  const result = await db.execute({
    sql: `SELECT r.*, (SELECT COUNT(*) FROM cause_list_entries e WHERE e.run_id = r.id) AS entries_count
          FROM runs r
          ORDER BY r.task_run_at DESC, r.id DESC LIMIT ?`,
    args: [limit],
  });
  return result.rows.map((row) => ({
    id: Number(row.id),
    task_run_at: String(row.task_run_at),
    case_key: text(row.case_key),
    cnr: text(row.cnr),
    listed_today: bool(row.listed_today),
    listed_tomorrow: bool(row.listed_tomorrow),
    serial: text(row.serial),
    court: text(row.court),
    entries_count: Number(row.entries_count),
  }));
}
