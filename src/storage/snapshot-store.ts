import { readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import type { CitationRecord, CitationSnapshot, CitationSource } from '../types/index.js';
import { normalizeCitationDate } from '../citations/dates.js';
import { SnapshotError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const recordSchema = z.object({
    title: z.string(),
    doi: z.string().nullable(),
    publication_date: z.string().nullable(),
    source: z.enum(['openalex', 's2']),
});

const snapshotSchema = z.record(z.string(), z.array(recordSchema));

export interface SnapshotSummary {
    publications: number;
    publicationsWithCitations: number;
    citations: number;
    bySource: Record<CitationSource, number>;
    withoutDoi: number;
    unparseableDates: number;
}

/**
 * Plain-object form written to disk: identifier → citations.
 */
export function snapshotToJson(snapshot: CitationSnapshot): Record<string, CitationRecord[]> {
    const output: Record<string, CitationRecord[]> = {};
    for (const [identifier, citations] of snapshot) {
        output[identifier] = [...citations];
    }
    return output;
}

/**
 * Write the whole snapshot. The content goes to a temporary sibling first and is
 * renamed over `filePath`, so readers see either the old file or the complete new one.
 */
export function writeSnapshot(filePath: string, snapshot: CitationSnapshot): void {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    const content = JSON.stringify(snapshotToJson(snapshot), null, 2);

    try {
        writeFileSync(tmpPath, content, 'utf-8');
        renameSync(tmpPath, filePath);
    } catch (error) {
        rmSync(tmpPath, { force: true });
        throw new SnapshotError(`Failed to write snapshot ${filePath}`, error);
    }

    logger.info({ filePath, publications: snapshot.size }, 'Snapshot written');
}

/**
 * Load a previously written snapshot for re-aggregation.
 * @throws SnapshotError when the file is missing or malformed
 */
export function readSnapshot(filePath: string): CitationSnapshot {
    let content: unknown;
    try {
        content = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new SnapshotError(`Failed to read snapshot ${filePath}`, error);
    }

    const parsed = snapshotSchema.safeParse(content);
    if (!parsed.success) {
        throw new SnapshotError(`Malformed snapshot ${filePath}`, parsed.error.issues);
    }

    return new Map(Object.entries(parsed.data));
}

/**
 * Counts for `impact inspect`.
 */
export function summarizeSnapshot(snapshot: CitationSnapshot): SnapshotSummary {
    const summary: SnapshotSummary = {
        publications: snapshot.size,
        publicationsWithCitations: 0,
        citations: 0,
        bySource: { openalex: 0, s2: 0 },
        withoutDoi: 0,
        unparseableDates: 0,
    };

    for (const citations of snapshot.values()) {
        if (citations.length > 0) summary.publicationsWithCitations++;
        for (const citation of citations) {
            summary.citations++;
            summary.bySource[citation.source]++;
            if (!citation.doi) summary.withoutDoi++;
            if (normalizeCitationDate(citation.publication_date) === null) summary.unparseableDates++;
        }
    }

    return summary;
}
