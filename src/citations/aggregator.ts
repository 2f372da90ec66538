import type { AggregationResult, CitationSnapshot } from '../types/index.js';
import { normalizeCitationDate, parseCutoffDate } from './dates.js';
import { doiKey } from './merger.js';

export interface DatedAggregation {
    date: string;
    result: AggregationResult;
}

/**
 * Point-in-time citation counts for one cutoff date.
 *
 * A tracked publication qualifies when any of its citations has a normalized
 * date on or before the cutoff. Citing works are counted once per distinct
 * DOI across all publications; DOI-less and undated citations are not counted.
 *
 * @param cutoff - `YYYY-MM-DD`
 * @throws InvalidDateError when the cutoff is malformed
 */
export function aggregateCitations(snapshot: CitationSnapshot, cutoff: string): AggregationResult {
    const cutoffDate = parseCutoffDate(cutoff);
    let qualifying = 0;
    const citingDois = new Set<string>();

    for (const citations of snapshot.values()) {
        let qualifies = false;

        for (const citation of citations) {
            const date = normalizeCitationDate(citation.publication_date);
            if (date === null || date > cutoffDate) continue;

            qualifies = true;
            const key = doiKey(citation.doi);
            if (key !== null) citingDois.add(key);
        }

        if (qualifies) qualifying++;
    }

    return {
        num_original_pubs: qualifying,
        num_citing_pubs: citingDois.size,
    };
}

/**
 * Aggregate the same snapshot for several cutoff dates, in the order given.
 */
export function aggregateForDates(
    snapshot: CitationSnapshot,
    cutoffs: readonly string[]
): DatedAggregation[] {
    return cutoffs.map((date) => ({ date, result: aggregateCitations(snapshot, date) }));
}
