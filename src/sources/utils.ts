/**
 * Shared utilities for source adapters.
 */

const DOI_PREFIXES = [
    'https://doi.org/',
    'http://doi.org/',
    'https://dx.doi.org/',
    'http://dx.doi.org/',
    'doi:',
];

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    let value = doi.trim();
    const lower = value.toLowerCase();
    for (const prefix of DOI_PREFIXES) {
        if (lower.startsWith(prefix)) {
            value = value.slice(prefix.length);
            break;
        }
    }
    return value.trim() || null;
}

/**
 * Trim a provider title; missing titles become the empty string.
 */
export function cleanTitle(title: string | null | undefined): string {
    return (title ?? '').trim();
}

/**
 * Shorten an OpenAlex entity URL to its ID.
 * "https://openalex.org/W2741809807" → "W2741809807"
 */
export function shortOpenAlexId(id: string): string {
    return id.replace('https://openalex.org/', '');
}

/**
 * Describe any thrown value for logs and `error` bundles.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
