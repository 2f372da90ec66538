import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ImpactDatabase } from '../storage/database.js';
import { InvalidDateError } from '../utils/errors.js';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';

describe('ImpactDatabase', () => {
    let db: ImpactDatabase;
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'impact-db-test-'));
        db = new ImpactDatabase(path.join(tmpDir, 'test.db'));
    });

    afterEach(() => {
        db.close();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('initialization', () => {
        it('should create the runs and report_dates tables', () => {
            const tables = db.getRawDb()
                .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
                .all()
                .map((t) => t.name);

            expect(tables).toEqual(['report_dates', 'runs']);
        });

        it('should set PRAGMA user_version = 1', () => {
            expect(db.getRawDb().pragma('user_version', { simple: true })).toBe(1);
        });
    });

    describe('report dates', () => {
        it('should add dates once', () => {
            expect(db.addReportDates(['2024-01-01', '2024-02-01', '2024-01-01'])).toBe(2);
            expect(db.addReportDates(['2024-02-01'])).toBe(0);
            expect(db.getReportRows().map((r) => r.report_date)).toEqual(['2024-01-01', '2024-02-01']);
        });

        it('should reject malformed dates', () => {
            expect(() => db.addReportDates(['2024-1-1'])).toThrow(InvalidDateError);
            expect(db.getReportRows()).toEqual([]);
        });

        it('should list only past dates without values as pending', () => {
            db.addReportDates(['2024-01-01', '2024-02-01', '2024-03-01']);
            expect(db.pendingDates('2024-02-01')).toEqual(['2024-01-01', '2024-02-01']);

            db.record('2024-01-01', { num_original_pubs: 3, num_citing_pubs: 5 }, null);
            expect(db.pendingDates('2024-02-01')).toEqual(['2024-02-01']);
        });

        it('should store recorded values', () => {
            db.addReportDates(['2024-01-01']);
            db.record('2024-01-01', { num_original_pubs: 3, num_citing_pubs: 5 }, null);

            expect(db.getReportRow('2024-01-01')).toMatchObject({
                report_date: '2024-01-01',
                num_original_pubs: 3,
                num_citing_pubs: 5,
                run_id: null,
            });
        });

        it('should insert a row when recording an unregistered date', () => {
            db.record('2025-06-30', { num_original_pubs: 1, num_citing_pubs: 2 }, null);
            expect(db.getReportRow('2025-06-30')?.num_citing_pubs).toBe(2);
        });
    });

    describe('runs', () => {
        it('should insert runs and link report rows to them', () => {
            const runId = db.insertRun({
                created_at: '2024-01-02T00:00:00.000Z',
                version: '1.0.0',
                config_json: '{}',
                publications: 4,
                citations: 12,
                stats_json: '{}',
            });

            expect(runId).toBe(1);
            db.record('2024-01-01', { num_original_pubs: 2, num_citing_pubs: 7 }, runId);

            expect(db.getReportRow('2024-01-01')?.run_id).toBe(1);
            expect(db.getRuns()).toHaveLength(1);
            expect(db.getStats()).toEqual({ runs: 1, reportDates: 1, recorded: 1 });
        });
    });
});
