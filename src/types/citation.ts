/**
 * Citation data model shared by the source adapters, the merger and the aggregator.
 */

/** Provider that reported a citation. `openalex` is the priority source. */
export type CitationSource = 'openalex' | 's2';

/**
 * One citing work as reported by one provider.
 * Records are never mutated after creation; merging produces new records.
 */
export interface CitationRecord {
    /** Title of the citing work (may be empty) */
    title: string;

    /** DOI without the https://doi.org/ prefix */
    doi: string | null;

    /** Raw date string: YYYY, YYYY-MM or YYYY-MM-DD. Validated only when aggregated. */
    publication_date: string | null;

    source: CitationSource;
}

/**
 * A publication the system monitors.
 * `identifier` is the DOI when present, otherwise the title.
 */
export interface TrackedPublication {
    readonly identifier: string;
    readonly title: string;
    readonly doi: string;
}

/**
 * Merged citations per tracked publication, keyed by publication identifier.
 */
export type CitationSnapshot = ReadonlyMap<string, readonly CitationRecord[]>;

/**
 * Counts computed for one cutoff date.
 */
export interface AggregationResult {
    num_original_pubs: number;
    num_citing_pubs: number;
}
