import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createProgram } from '../cli/program.js';
import { ImpactDatabase } from '../storage/database.js';
import { writeSnapshot } from '../storage/snapshot-store.js';

describe('impact CLI', () => {
    let tmpDir: string;
    let log: MockInstance<typeof console.log>;

    const run = async (...args: string[]): Promise<void> => {
        await createProgram().parseAsync(args, { from: 'user' });
    };

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'impact-cli-test-'));
        log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should accept --db on dates subcommands', async () => {
        const dbPath = path.join(tmpDir, 'ledger.db');

        await run('dates', 'add', '--db', dbPath, '2024-01-01', '2024-02-01');
        expect(log).toHaveBeenLastCalledWith('Added 2 report date(s).');

        await run('dates', 'list', '--db', dbPath);
        expect(log).toHaveBeenNthCalledWith(2, '2024-01-01  pending');
        expect(log).toHaveBeenNthCalledWith(3, '2024-02-01  pending');

        await run('dates', 'pending', '--db', dbPath);
        expect(log).toHaveBeenLastCalledWith('2024-01-01\n2024-02-01');
    });

    it('should fall back to the configured reportDb', async () => {
        const dbPath = path.join(tmpDir, 'configured.db');
        fs.writeFileSync(path.join(tmpDir, 'impact.config.json'), JSON.stringify({ reportDb: dbPath }));
        vi.spyOn(process, 'cwd').mockReturnValue(tmpDir);

        await run('dates', 'add', '2024-03-01');

        const db = new ImpactDatabase(dbPath);
        expect(db.getReportRows().map((row) => row.report_date)).toEqual(['2024-03-01']);
        db.close();
    });

    it('should record re-aggregated counts in the ledger given by --db', async () => {
        const dbPath = path.join(tmpDir, 'ledger.db');
        const snapshotPath = path.join(tmpDir, 'snapshot.json');
        writeSnapshot(snapshotPath, new Map([
            ['10.1/A', [{ title: 'X', doi: '10.1/X', publication_date: '2022-01-01', source: 'openalex' as const }]],
        ]));

        await run('aggregate', '-i', snapshotPath, '--date', '2023-01-01', '--db', dbPath, '--record');

        expect(log).toHaveBeenLastCalledWith('2023-01-01  publications cited: 1  citing works: 1');
        const db = new ImpactDatabase(dbPath);
        expect(db.getReportRow('2023-01-01')).toMatchObject({ num_original_pubs: 1, num_citing_pubs: 1 });
        db.close();
    });
});
