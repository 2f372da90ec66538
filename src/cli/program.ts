import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { ConfigurationError, InvalidDateError, RunAbortedError, SnapshotError } from '../utils/errors.js';
import { runImpactPipeline, resolveReportDates, VERSION } from '../pipeline/impact-run.js';
import { aggregateForDates, type DatedAggregation } from '../citations/aggregator.js';
import { todayIso } from '../citations/dates.js';
import { readSnapshot, summarizeSnapshot } from '../storage/snapshot-store.js';
import { ImpactDatabase } from '../storage/database.js';
import type { ImpactConfig } from '../types/index.js';

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new ConfigurationError(`Expected an integer, got "${value}"`);
    }
    return parsed;
}

function printAggregations(aggregations: DatedAggregation[]): void {
    if (aggregations.length === 0) {
        console.log('No pending dates - all report dates are filled.');
        return;
    }
    for (const { date, result } of aggregations) {
        console.log(`${date}  publications cited: ${result.num_original_pubs}  citing works: ${result.num_citing_pubs}`);
    }
}

/**
 * Open the report ledger at `--db`, or at the configured `reportDb`.
 */
async function openLedger(dbPath: string | undefined): Promise<ImpactDatabase> {
    const config = await resolveConfig({ reportDb: dbPath });
    return new ImpactDatabase(config.reportDb);
}

/**
 * Expected failures print one line; anything else is logged with its stack.
 */
export function fail(error: unknown, context: string): never {
    if (
        error instanceof ConfigurationError ||
        error instanceof SnapshotError ||
        error instanceof InvalidDateError ||
        error instanceof RunAbortedError
    ) {
        console.error(`${context}: ${error.message}`);
    } else {
        getLogger().error({ error }, context);
    }
    process.exit(1);
}

/**
 * Build the `impact` command tree.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('impact')
        .description('Track citation impact of publications across OpenAlex and Semantic Scholar.')
        .version(VERSION);

    // ─── RUN command ──────────────────────────────────────────

    program
        .command('run')
        .description('Fetch citations, write the snapshot, and record counts per report date')
        .option('--date <dates...>', 'Report dates (YYYY-MM-DD); defaults to pending ledger dates')
        .option('-p, --publications <path>', 'Tracked publications JSON file')
        .option('-s, --snapshot <path>', 'Snapshot output path')
        .option('--db <path>', 'Report ledger database path')
        .option('--delay <ms>', 'Pause after each publication')
        .option('-c, --concurrency <n>', 'Publications fetched concurrently')
        .option('--limit <n>', 'Citing works per publication and source')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs')
        .action(async (opts) => {
            let db: ImpactDatabase | undefined;
            try {
                const cliConfig: Partial<ImpactConfig> = {
                    dates: opts.date,
                    publicationsFile: opts.publications,
                    snapshotFile: opts.snapshot,
                    reportDb: opts.db,
                    requestDelayMs: opts.delay !== undefined ? parseInteger(opts.delay) : undefined,
                    concurrency: opts.concurrency !== undefined ? parseInteger(opts.concurrency) : undefined,
                    citationsPerPublication: opts.limit !== undefined ? parseInteger(opts.limit) : undefined,
                    logLevel: opts.logLevel,
                    jsonLogs: opts.jsonLogs,
                };

                const config = await resolveConfig(cliConfig);
                initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
                getHttpClient({
                    timeout: config.httpTimeoutMs,
                    maxRetries: config.maxRetries,
                    version: VERSION,
                    email: config.openalexEmail,
                });

                const ledger = new ImpactDatabase(config.reportDb);
                db = ledger;
                const controller = new AbortController();
                process.once('SIGINT', () => {
                    getLogger().warn('Interrupted, stopping after in-flight lookups');
                    controller.abort();
                });

                const result = await runImpactPipeline(config, {
                    sink: ledger,
                    signal: controller.signal,
                    recordRun: (snapshot) => {
                        let citations = 0;
                        for (const list of snapshot.values()) citations += list.length;
                        return ledger.insertRun({
                            created_at: new Date().toISOString(),
                            version: VERSION,
                            config_json: JSON.stringify(config),
                            publications: snapshot.size,
                            citations,
                            stats_json: JSON.stringify(getHttpClient().getAllRequestCounts()),
                        });
                    },
                });

                printAggregations(result.aggregations);
                ledger.close();
            } catch (error) {
                db?.close();
                fail(error, 'Run failed');
            }
        });

    // ─── AGGREGATE command ────────────────────────────────────

    program
        .command('aggregate')
        .description('Recompute counts from an existing snapshot without re-fetching')
        .requiredOption('-i, --input <path>', 'Snapshot JSON file')
        .option('--date <dates...>', 'Report dates (YYYY-MM-DD); defaults to pending ledger dates')
        .option('--db <path>', 'Report ledger database path (default: config reportDb)')
        .option('--record', 'Store the counts in the ledger', false)
        .action(async (opts) => {
            let db: ImpactDatabase | undefined;
            try {
                const snapshot = readSnapshot(opts.input);
                const needsLedger = opts.record || !opts.date;
                db = needsLedger ? await openLedger(opts.db) : undefined;

                const dates = resolveReportDates(opts.date, db, todayIso());
                const aggregations = aggregateForDates(snapshot, dates);

                if (opts.record && db) {
                    for (const { date, result } of aggregations) {
                        db.record(date, result, null);
                    }
                }

                printAggregations(aggregations);
                db?.close();
            } catch (error) {
                db?.close();
                fail(error, 'Aggregate failed');
            }
        });

    // ─── DATES command ────────────────────────────────────────

    const datesCommand = program
        .command('dates')
        .description('Manage report dates in the ledger');

    datesCommand
        .command('add')
        .description('Register report dates (YYYY-MM-DD)')
        .argument('<dates...>', 'Dates to add')
        .option('--db <path>', 'Report ledger database path (default: config reportDb)')
        .action(async (values: string[], opts: { db?: string }) => {
            let db: ImpactDatabase | undefined;
            try {
                db = await openLedger(opts.db);
                const added = db.addReportDates(values);
                console.log(`Added ${added} report date(s).`);
                db.close();
            } catch (error) {
                db?.close();
                fail(error, 'Adding dates failed');
            }
        });

    datesCommand
        .command('pending')
        .description('List report dates on or before today without values')
        .option('--db <path>', 'Report ledger database path (default: config reportDb)')
        .action(async (opts: { db?: string }) => {
            const db = await openLedger(opts.db);
            const pending = db.pendingDates(todayIso());
            db.close();
            console.log(pending.length > 0 ? pending.join('\n') : 'No pending dates.');
        });

    datesCommand
        .command('list')
        .description('Show all report dates and their recorded counts')
        .option('--db <path>', 'Report ledger database path (default: config reportDb)')
        .action(async (opts: { db?: string }) => {
            const db = await openLedger(opts.db);
            const rows = db.getReportRows();
            db.close();

            for (const row of rows) {
                const values = row.num_original_pubs === null
                    ? 'pending'
                    : `publications cited: ${row.num_original_pubs}  citing works: ${row.num_citing_pubs}`;
                console.log(`${row.report_date}  ${values}`);
            }
        });

    // ─── INSPECT command ──────────────────────────────────────

    program
        .command('inspect')
        .description('Show snapshot statistics')
        .requiredOption('-i, --input <path>', 'Snapshot JSON file')
        .action((opts) => {
            try {
                const stats = summarizeSnapshot(readSnapshot(opts.input));

                console.log('\nCitation Snapshot Statistics\n');
                console.log(`  Publications:       ${stats.publications}`);
                console.log(`  With citations:     ${stats.publicationsWithCitations}`);
                console.log(`  Citations:          ${stats.citations}`);
                console.log(`    openalex:         ${stats.bySource.openalex}`);
                console.log(`    s2:               ${stats.bySource.s2}`);
                console.log(`  Without DOI:        ${stats.withoutDoi}`);
                console.log(`  Unparseable dates:  ${stats.unparseableDates}`);
                console.log('');
            } catch (error) {
                fail(error, 'Inspect failed');
            }
        });

    return program;
}
