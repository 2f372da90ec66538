import type { CitationRecord, CitationSource } from '../types/index.js';
import { stripDoiPrefix } from '../sources/utils.js';
import { normalizeCitationDate } from './dates.js';

/** Number of leading title characters that identify a DOI-less citing work. */
export const TITLE_KEY_LENGTH = 50;

/** Provider whose record wins when both report the same DOI. */
export const PRIORITY_SOURCE: CitationSource = 'openalex';

export interface MergeOptions {
    prioritySource?: CitationSource;
}

/**
 * Counters describing what a merge discarded.
 */
export interface MergeStats {
    /** Records with neither a DOI nor a usable title */
    dropped: number;
    /** Title-keyed records already present under a DOI key */
    folded: number;
    /** Records that lost to another record with the same key */
    duplicates: number;
}

export interface MergeResult {
    citations: CitationRecord[];
    stats: MergeStats;
}

/**
 * Dedup key for a DOI: trimmed, lower-cased, without a doi.org prefix.
 * Returns null for an absent or blank DOI.
 */
export function doiKey(doi: string | null | undefined): string | null {
    const stripped = stripDoiPrefix(doi);
    return stripped ? stripped.toLowerCase() : null;
}

/**
 * Dedup key for a DOI-less record: the first TITLE_KEY_LENGTH characters, trimmed.
 * Returns null when nothing is left.
 */
export function titleKey(title: string | null | undefined): string | null {
    if (!title) return null;
    const prefix = Array.from(title).slice(0, TITLE_KEY_LENGTH).join('').trim();
    return prefix || null;
}

/**
 * True when `candidate` has a parseable date strictly earlier than `holder`'s.
 * A dated candidate beats an undated holder.
 */
function isEarlier(candidate: CitationRecord, holder: CitationRecord): boolean {
    const candidateDate = normalizeCitationDate(candidate.publication_date);
    if (candidateDate === null) return false;
    const holderDate = normalizeCitationDate(holder.publication_date);
    return holderDate === null || candidateDate < holderDate;
}

/**
 * Merge the citation records every provider returned for one tracked
 * publication into one record per distinct citing work.
 *
 * Records with a DOI are keyed by `doiKey`; the priority source wins, otherwise
 * the first seen. Records without a DOI are keyed by `titleKey`; the earliest
 * date wins, ties keep the first seen. A title-keyed record whose key matches
 * the title key of a DOI-keyed winner is folded into it.
 */
export function mergeCitationsWithStats(
    records: readonly CitationRecord[],
    options: MergeOptions = {}
): MergeResult {
    const prioritySource = options.prioritySource ?? PRIORITY_SOURCE;
    const byDoi = new Map<string, CitationRecord>();
    const byTitle = new Map<string, CitationRecord>();
    const stats: MergeStats = { dropped: 0, folded: 0, duplicates: 0 };

    for (const record of records) {
        const doi = doiKey(record.doi);

        if (doi !== null) {
            const holder = byDoi.get(doi);
            if (!holder) {
                byDoi.set(doi, record);
            } else {
                stats.duplicates++;
                if (holder.source !== prioritySource && record.source === prioritySource) {
                    byDoi.set(doi, record);
                }
            }
            continue;
        }

        const title = titleKey(record.title);
        if (title === null) {
            stats.dropped++;
            continue;
        }

        const holder = byTitle.get(title);
        if (!holder) {
            byTitle.set(title, record);
        } else {
            stats.duplicates++;
            if (isEarlier(record, holder)) {
                byTitle.set(title, record);
            }
        }
    }

    const doiTitles = new Set<string>();
    for (const record of byDoi.values()) {
        const key = titleKey(record.title);
        if (key !== null) doiTitles.add(key);
    }

    const citations: CitationRecord[] = [...byDoi.values()].map(copyRecord);
    for (const [key, record] of byTitle) {
        if (doiTitles.has(key)) {
            stats.folded++;
            continue;
        }
        citations.push(copyRecord(record));
    }

    return { citations, stats };
}

/**
 * `mergeCitationsWithStats` without the counters.
 */
export function mergeCitations(
    records: readonly CitationRecord[],
    options: MergeOptions = {}
): CitationRecord[] {
    return mergeCitationsWithStats(records, options).citations;
}

function copyRecord(record: CitationRecord): CitationRecord {
    return {
        title: record.title,
        doi: record.doi,
        publication_date: record.publication_date,
        source: record.source,
    };
}
