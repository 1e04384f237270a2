import Database from 'better-sqlite3';
import type { DataIssue, PageFailure } from '../types/DataQuality';

export interface RunSummary {
  startDate: string;
  endDate: string;
  targetTimezone: string;
  sourceTimezone: string;
  outputPath: string;
  events: number;
  pagesPlanned: number;
  pagesVisited: number;
  interrupted: boolean;
  issues: DataIssue[];
  failures: PageFailure[];
}

export interface RunRow {
  id: number;
  start_date: string;
  end_date: string;
  target_timezone: string;
  source_timezone: string;
  output_path: string;
  events: number;
  pages_planned: number;
  pages_visited: number;
  failed_pages: number;
  interrupted: number;
  created_at: number;
}

export interface DataIssueRow {
  id: number;
  run_id: number;
  url: string | null;
  type: string;
  message: string;
  details: string | null;
  created_at: number;
}

export interface PageFailureRow {
  id: number;
  run_id: number;
  url: string;
  dates: string;
  message: string;
  created_at: number;
}

/**
 * SQLite log of scrape runs: one row per run plus its issues and failed pages.
 * Pass ':memory:' for a throwaway store.
 */
export function openRunLog(dbPath: string) {
  const db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS scrape_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      start_date TEXT NOT NULL,
      end_date TEXT NOT NULL,
      target_timezone TEXT NOT NULL,
      source_timezone TEXT NOT NULL,
      output_path TEXT NOT NULL,
      events INTEGER NOT NULL,
      pages_planned INTEGER NOT NULL,
      pages_visited INTEGER NOT NULL,
      failed_pages INTEGER NOT NULL,
      interrupted INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS data_issues (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL,
      url TEXT,
      type TEXT NOT NULL,
      message TEXT NOT NULL,
      details TEXT,
      created_at INTEGER NOT NULL,
      FOREIGN KEY (run_id) REFERENCES scrape_runs(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS page_failures (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL,
      url TEXT NOT NULL,
      dates TEXT NOT NULL,
      message TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      FOREIGN KEY (run_id) REFERENCES scrape_runs(id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_data_issues_run ON data_issues(run_id);
  `);

  const insertRun = db.prepare(`
    INSERT INTO scrape_runs (
      start_date, end_date, target_timezone, source_timezone, output_path,
      events, pages_planned, pages_visited, failed_pages, interrupted, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertIssue = db.prepare(`
    INSERT INTO data_issues (run_id, url, type, message, details, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  const insertFailure = db.prepare(`
    INSERT INTO page_failures (run_id, url, dates, message, created_at)
    VALUES (?, ?, ?, ?, ?)
  `);

  const recordRunTx = db.transaction((summary: RunSummary): number => {
    const now = Date.now();
    const info = insertRun.run(
      summary.startDate,
      summary.endDate,
      summary.targetTimezone,
      summary.sourceTimezone,
      summary.outputPath,
      summary.events,
      summary.pagesPlanned,
      summary.pagesVisited,
      summary.failures.length,
      summary.interrupted ? 1 : 0,
      now
    );
    const runId = Number(info.lastInsertRowid);

    for (const issue of summary.issues) {
      insertIssue.run(
        runId,
        issue.url || null,
        issue.type,
        issue.message,
        issue.details ? JSON.stringify(issue.details) : null,
        now
      );
    }
    for (const failure of summary.failures) {
      insertFailure.run(runId, failure.url, failure.dates.join(','), failure.message, now);
    }
    return runId;
  });

  return {
    getDbPath: (): string => dbPath,

    /** Store a run with its issues and failure manifest; returns the run id. */
    recordRun: (summary: RunSummary): number => recordRunTx(summary),

    getRecentRuns: (limit: number = 10): RunRow[] => {
      return db.prepare('SELECT * FROM scrape_runs ORDER BY id DESC LIMIT ?').all(limit) as RunRow[];
    },

    getRecentDataIssues: (limit: number = 100): DataIssueRow[] => {
      return db.prepare('SELECT * FROM data_issues ORDER BY id DESC LIMIT ?').all(limit) as DataIssueRow[];
    },

    getPageFailures: (runId: number): PageFailureRow[] => {
      return db.prepare('SELECT * FROM page_failures WHERE run_id = ? ORDER BY id').all(runId) as PageFailureRow[];
    },

    close: (): void => {
      db.close();
    },
  };
}

export type RunLog = ReturnType<typeof openRunLog>;
