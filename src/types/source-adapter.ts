import type { CitationRecord, CitationSource } from './citation.js';

/**
 * The looked-up publication as the provider knows it.
 */
export interface PublicationInfo {
    /** Provider-specific work ID (OpenAlex short ID, S2 paperId) */
    source_id: string;
    title: string;
    doi: string | null;
    publication_date: string | null;
}

/**
 * Result of a single adapter lookup. Adapters never reject; every failure
 * is folded into `error`.
 */
export type CitationBundle =
    | { status: 'not_found' }
    | { status: 'error'; reason: string }
    | { status: 'found'; publication: PublicationInfo; citations: CitationRecord[] };

/**
 * Interface for citation providers (OpenAlex, Semantic Scholar).
 * Each adapter normalizes its payload into `CitationRecord` on receipt.
 */
export interface CitationSourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /** Source tag written on every record */
    readonly sourceId: CitationSource;

    /**
     * Look up a publication by DOI and return its first page of citing works.
     */
    fetchByDoi(doi: string): Promise<CitationBundle>;

    /**
     * Look up a publication by title (best match) and return its citing works.
     */
    fetchByTitle(title: string): Promise<CitationBundle>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for polite pool (OpenAlex) */
    email?: string;

    /** Maximum citing works per publication (one page) */
    citationLimit?: number;
}
