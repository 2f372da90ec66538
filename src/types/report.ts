import type { AggregationResult } from './citation.js';

/**
 * Destination for per-date aggregation results.
 * The sink decides where a date's values live; callers only hand over the two counts.
 */
export interface ReportSink {
    /** Report dates on or before `today` that have no recorded values yet. */
    pendingDates(today: string): string[];

    record(date: string, result: AggregationResult, runId: number | null): void;
}

/**
 * Row of the `report_dates` table.
 */
export interface ReportDateRow {
    report_date: string;
    num_original_pubs: number | null;
    num_citing_pubs: number | null;
    run_id: number | null;
    updated_at: string | null;
}

/**
 * Run metadata stored in the `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    version: string;
    config_json: string;
    publications: number;
    citations: number;
    stats_json: string;
}
