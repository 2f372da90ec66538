import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { TrackedPublication } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { stripDoiPrefix } from '../sources/utils.js';

const logger = getLogger();

const entrySchema = z.object({
    doi: z.string().nullish(),
    title: z.string().nullish(),
});

const listFileSchema = z.object({
    publications: z.array(entrySchema),
});

const parallelFileSchema = z.object({
    dois: z.array(z.string()),
    titles: z.array(z.string()),
});

const publicationsFileSchema = z.union([listFileSchema, parallelFileSchema]);

type PublicationEntry = z.infer<typeof entrySchema>;

/**
 * Build the immutable tracked-publication list from parsed file content.
 *
 * Accepts `{ publications: [{ doi?, title? }] }` or parallel `{ dois, titles }`
 * lists. Parallel lists of different lengths, or no entry with an identifier,
 * are configuration failures.
 */
export function buildTrackedPublications(content: unknown): readonly TrackedPublication[] {
    const parsed = publicationsFileSchema.safeParse(content);
    if (!parsed.success) {
        throw new ConfigurationError(
            'Publications file must contain a "publications" array or "dois" and "titles" arrays',
            parsed.error.issues
        );
    }

    let entries: PublicationEntry[];
    if ('publications' in parsed.data) {
        entries = parsed.data.publications;
    } else {
        const { dois, titles } = parsed.data;
        if (dois.length !== titles.length) {
            throw new ConfigurationError(
                `Publication list length mismatch: ${dois.length} DOIs but ${titles.length} titles`
            );
        }
        entries = dois.map((doi, i) => ({ doi, title: titles[i] }));
    }

    const publications: TrackedPublication[] = [];
    const seen = new Set<string>();

    entries.forEach((entry, index) => {
        const doi = stripDoiPrefix(entry.doi) ?? '';
        const title = (entry.title ?? '').trim();
        const identifier = doi || title;

        if (!identifier) {
            logger.warn({ index }, 'Skipping publication without DOI or title');
            return;
        }
        if (seen.has(identifier)) {
            logger.warn({ identifier }, 'Skipping duplicate publication');
            return;
        }

        seen.add(identifier);
        publications.push(Object.freeze({ identifier, title, doi }));
    });

    if (publications.length === 0) {
        throw new ConfigurationError('No publication has a DOI or a title');
    }

    return Object.freeze(publications);
}

/**
 * Read and validate the tracked-publication file.
 * @throws ConfigurationError on a missing file, invalid JSON, or invalid content
 */
export function loadTrackedPublications(filePath: string): readonly TrackedPublication[] {
    let raw: string;
    try {
        raw = readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Publications file not found: ${filePath}`, error);
    }

    let content: unknown;
    try {
        content = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`Invalid JSON in ${filePath}`, error);
    }

    const publications = buildTrackedPublications(content);
    logger.info({ filePath, count: publications.length }, 'Loaded publications');
    return publications;
}
