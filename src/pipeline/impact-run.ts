import type {
    CitationRecord,
    CitationSnapshot,
    CitationSourceAdapter,
    ImpactConfig,
    ReportSink,
    TrackedPublication,
} from '../types/index.js';
import { OpenAlexAdapter } from '../sources/openalex.js';
import { SemanticScholarAdapter } from '../sources/semantic-scholar.js';
import { mergeCitationsWithStats } from '../citations/merger.js';
import { aggregateForDates, type DatedAggregation } from '../citations/aggregator.js';
import { parseCutoffDate, todayIso } from '../citations/dates.js';
import { loadTrackedPublications } from '../publications/loader.js';
import { writeSnapshot } from '../storage/snapshot-store.js';
import { RunAbortedError } from '../utils/errors.js';
import { getApiKey } from '../utils/config.js';
import { sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export const VERSION = '1.0.0';

export interface FetchOptions {
    /** Fixed pause after each publication, in ms */
    delayMs: number;
    /** Publications fetched at the same time */
    concurrency: number;
    signal?: AbortSignal;
}

export interface PipelineDeps {
    /** Providers in priority order; defaults to OpenAlex then Semantic Scholar */
    adapters?: readonly CitationSourceAdapter[];
    /** Destination for per-date counts; nothing is recorded without one */
    sink?: ReportSink;
    /** Records the completed run and returns its ID */
    recordRun?: (snapshot: CitationSnapshot) => number | null;
    signal?: AbortSignal;
    now?: Date;
}

export interface PipelineResult {
    snapshot: CitationSnapshot;
    aggregations: DatedAggregation[];
    runId: number | null;
}

/**
 * Default providers, in priority order.
 */
export function createDefaultAdapters(config: ImpactConfig): CitationSourceAdapter[] {
    return [
        new OpenAlexAdapter({
            apiKey: getApiKey('OPENALEX_API_KEY'),
            email: config.openalexEmail,
            citationLimit: config.citationsPerPublication,
        }),
        new SemanticScholarAdapter({
            apiKey: getApiKey('S2_API_KEY'),
            citationLimit: config.citationsPerPublication,
        }),
    ];
}

/**
 * Collect every adapter's citations for one publication, DOI first, title only
 * when there is no DOI. Not-found and failed lookups contribute nothing.
 */
export async function fetchPublicationCitations(
    publication: TrackedPublication,
    adapters: readonly CitationSourceAdapter[]
): Promise<CitationRecord[]> {
    const collected: CitationRecord[] = [];

    for (const adapter of adapters) {
        const bundle = publication.doi
            ? await adapter.fetchByDoi(publication.doi)
            : await adapter.fetchByTitle(publication.title);

        switch (bundle.status) {
            case 'found':
                logger.debug(
                    { publication: publication.identifier, source: adapter.sourceId, citations: bundle.citations.length },
                    'Citations fetched'
                );
                collected.push(...bundle.citations);
                break;
            case 'not_found':
                logger.info({ publication: publication.identifier, source: adapter.sourceId }, 'Publication not found');
                break;
            case 'error':
                logger.warn(
                    { publication: publication.identifier, source: adapter.sourceId, reason: bundle.reason },
                    'Source lookup failed, continuing without it'
                );
                break;
        }
    }

    return collected;
}

/**
 * Fetch and merge citations for every tracked publication.
 *
 * Workers take publications in list order and pause `delayMs` after each one.
 * The snapshot keeps the list order whatever the completion order.
 *
 * @throws RunAbortedError when `signal` fires before every publication is done
 */
export async function collectCitations(
    publications: readonly TrackedPublication[],
    adapters: readonly CitationSourceAdapter[],
    options: FetchOptions
): Promise<CitationSnapshot> {
    const { delayMs, signal } = options;
    const results = new Array<CitationRecord[] | undefined>(publications.length);
    let next = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
        while (next < publications.length && !signal?.aborted) {
            const index = next++;
            const publication = publications[index];
            if (!publication) break;

            logger.info({ publication: publication.identifier, index: index + 1, total: publications.length }, 'Processing publication');

            const raw = await fetchPublicationCitations(publication, adapters);
            const { citations, stats } = mergeCitationsWithStats(raw);
            results[index] = citations;
            completed++;

            logger.info(
                { publication: publication.identifier, raw: raw.length, unique: citations.length, ...stats },
                'Citations merged'
            );

            if (delayMs > 0 && next < publications.length && !signal?.aborted) {
                await sleep(delayMs);
            }
        }
    };

    const workerCount = Math.max(1, Math.min(options.concurrency, publications.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (signal?.aborted || completed < publications.length) {
        throw new RunAbortedError(completed, publications.length);
    }

    const snapshot = new Map<string, readonly CitationRecord[]>();
    publications.forEach((publication, index) => {
        snapshot.set(publication.identifier, results[index] ?? []);
    });
    return snapshot;
}

/**
 * Dates to aggregate: explicit dates when given, otherwise the sink's pending dates.
 */
export function resolveReportDates(
    explicit: readonly string[] | undefined,
    sink: ReportSink | undefined,
    today: string
): string[] {
    if (explicit && explicit.length > 0) {
        return explicit.map(parseCutoffDate);
    }
    return sink ? sink.pendingDates(today) : [];
}

/**
 * Full run:
 *
 * 1. Load tracked publications (configuration failures abort here)
 * 2. Fetch + merge citations per publication
 * 3. Write the snapshot once
 * 4. Aggregate for each report date and hand the counts to the sink
 */
export async function runImpactPipeline(
    config: ImpactConfig,
    deps: PipelineDeps = {}
): Promise<PipelineResult> {
    const publications = loadTrackedPublications(config.publicationsFile);
    const today = todayIso(deps.now);
    // Validate explicit dates before any network call
    const dates = resolveReportDates(config.dates, deps.sink, today);
    const adapters = deps.adapters ?? createDefaultAdapters(config);

    logger.info(
        { publications: publications.length, sources: adapters.map((a) => a.sourceId), dates },
        'Starting citation run'
    );

    const startTime = Date.now();
    const snapshot = await collectCitations(publications, adapters, {
        delayMs: config.requestDelayMs,
        concurrency: config.concurrency,
        signal: deps.signal,
    });

    writeSnapshot(config.snapshotFile, snapshot);
    const runId = deps.recordRun?.(snapshot) ?? null;

    const aggregations = aggregateForDates(snapshot, dates);
    for (const { date, result } of aggregations) {
        deps.sink?.record(date, result, runId);
        logger.info({ date, ...result }, 'Aggregated citations');
    }

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info({ publications: snapshot.size, dates: aggregations.length, elapsed: `${elapsed}s` }, 'Citation run complete');

    return { snapshot, aggregations, runId };
}
