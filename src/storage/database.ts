import Database from 'better-sqlite3';
import type { AggregationResult, ReportDateRow, ReportSink, RunRecord } from '../types/index.js';
import { parseCutoffDate } from '../citations/dates.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per completed fetch + merge
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  publications INTEGER NOT NULL,
  citations INTEGER NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Report dates: one row per cutoff date, values filled once aggregated
CREATE TABLE IF NOT EXISTS report_dates (
  report_date TEXT PRIMARY KEY,
  num_original_pubs INTEGER,
  num_citing_pubs INTEGER,
  run_id INTEGER REFERENCES runs(run_id),
  updated_at TEXT
);
`;

export interface DatabaseStats {
    runs: number;
    reportDates: number;
    recorded: number;
}

/**
 * Report ledger around better-sqlite3: registered report dates, their
 * recorded counts, and run metadata. Implements the reporting sink.
 */
export class ImpactDatabase implements ReportSink {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        logger.debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.info('Database migrated to v1');
        }
    }

    // ─── Report dates ─────────────────────────────────────────

    /**
     * Register report dates. Existing dates keep their values.
     * Returns the number of newly added dates.
     * @throws InvalidDateError for a malformed date
     */
    addReportDates(dates: readonly string[]): number {
        const valid = dates.map(parseCutoffDate);
        const stmt = this.db.prepare<[string]>('INSERT OR IGNORE INTO report_dates (report_date) VALUES (?)');

        let added = 0;
        const insertAll = this.db.transaction((items: string[]) => {
            for (const date of items) {
                added += stmt.run(date).changes;
            }
        });

        insertAll(valid);
        return added;
    }

    pendingDates(today: string): string[] {
        return this.db
            .prepare<[string], { report_date: string }>(
                `SELECT report_date FROM report_dates
                 WHERE report_date <= ? AND (num_original_pubs IS NULL OR num_citing_pubs IS NULL)
                 ORDER BY report_date`
            )
            .all(today)
            .map((row) => row.report_date);
    }

    record(date: string, result: AggregationResult, runId: number | null): void {
        this.db
            .prepare<[string, number, number, number | null]>(
                `INSERT INTO report_dates (report_date, num_original_pubs, num_citing_pubs, run_id, updated_at)
                 VALUES (?, ?, ?, ?, datetime('now'))
                 ON CONFLICT(report_date) DO UPDATE SET
                   num_original_pubs = excluded.num_original_pubs,
                   num_citing_pubs = excluded.num_citing_pubs,
                   run_id = excluded.run_id,
                   updated_at = excluded.updated_at`
            )
            .run(parseCutoffDate(date), result.num_original_pubs, result.num_citing_pubs, runId);
    }

    getReportRow(date: string): ReportDateRow | undefined {
        return this.db
            .prepare<[string], ReportDateRow>('SELECT * FROM report_dates WHERE report_date = ?')
            .get(date);
    }

    getReportRows(): ReportDateRow[] {
        return this.db
            .prepare<[], ReportDateRow>('SELECT * FROM report_dates ORDER BY report_date')
            .all();
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const result = this.db
            .prepare<Omit<RunRecord, 'run_id'>>(
                `INSERT INTO runs (created_at, version, config_json, publications, citations, stats_json)
                 VALUES (@created_at, @version, @config_json, @publications, @citations, @stats_json)`
            )
            .run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const count = (sql: string): number =>
            this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

        return {
            runs: count('SELECT COUNT(*) as count FROM runs'),
            reportDates: count('SELECT COUNT(*) as count FROM report_dates'),
            recorded: count('SELECT COUNT(*) as count FROM report_dates WHERE num_original_pubs IS NOT NULL'),
        };
    }

    /**
     * Raw better-sqlite3 handle, for tests.
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    close(): void {
        this.db.close();
    }
}
