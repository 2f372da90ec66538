import { z } from 'zod';
import type {
    CitationBundle,
    CitationRecord,
    CitationSourceAdapter,
    PublicationInfo,
    SourceAdapterOptions,
} from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { cleanTitle, describeError, stripDoiPrefix } from './utils.js';

const logger = getLogger();

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** Fields to request from S2 API */
const PAPER_FIELDS = ['paperId', 'externalIds', 'title', 'year'].join(',');

/**
 * Semantic Scholar paper (subset of relevant fields).
 */
const paperSchema = z.object({
    paperId: z.string().min(1),
    externalIds: z.object({ DOI: z.string().nullish() }).passthrough().nullish(),
    title: z.string().nullish(),
    year: z.number().int().nullish(),
});

type S2Paper = z.infer<typeof paperSchema>;

/**
 * Citing papers may come without a paperId; only their metadata is kept.
 */
const citingPaperSchema = paperSchema.extend({
    paperId: z.string().nullish(),
});

type S2CitingPaper = z.infer<typeof citingPaperSchema>;

const searchSchema = z.object({
    data: z.array(z.unknown()).nullish(),
});

const citationsSchema = z.object({
    data: z.array(z.object({ citingPaper: z.unknown() })).nullish(),
});

/**
 * Semantic Scholar source adapter.
 * Secondary source; dates are publication years only.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements CitationSourceAdapter {
    readonly name = 'Semantic Scholar';
    readonly sourceId = 's2' as const;
    private httpClient: HttpClient;
    private apiKey?: string;
    private citationLimit: number;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['S2_API_KEY'];
        this.citationLimit = options?.citationLimit ?? 10;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async fetchByDoi(doi: string): Promise<CitationBundle> {
        const url = `${S2_BASE}/paper/DOI:${encodeURI(doi)}?fields=${PAPER_FIELDS}`;
        logger.debug({ url }, 'S2 DOI lookup');

        try {
            const response = await this.httpClient.get(url, {
                source: 's2',
                headers: this.buildHeaders(),
            });
            const paper = paperSchema.parse(response.data);
            return await this.withCitations(paper);
        } catch (error) {
            if (error instanceof HttpError && error.status === 404) {
                return { status: 'not_found' };
            }
            logger.warn({ doi, error: describeError(error) }, 'S2 DOI lookup failed');
            return { status: 'error', reason: describeError(error) };
        }
    }

    async fetchByTitle(title: string): Promise<CitationBundle> {
        const params = new URLSearchParams({
            query: this.cleanSearchQuery(title),
            limit: '1',
            fields: PAPER_FIELDS,
        });

        const url = `${S2_BASE}/paper/search?${params.toString()}`;
        logger.debug({ url }, 'S2 title search');

        try {
            const response = await this.httpClient.get(url, {
                source: 's2',
                headers: this.buildHeaders(),
            });
            const [first] = searchSchema.parse(response.data).data ?? [];
            if (first === undefined) return { status: 'not_found' };
            return await this.withCitations(paperSchema.parse(first));
        } catch (error) {
            if (error instanceof HttpError && error.status === 404) {
                return { status: 'not_found' };
            }
            logger.warn({ title, error: describeError(error) }, 'S2 title lookup failed');
            return { status: 'error', reason: describeError(error) };
        }
    }

    // ─── Private helpers ──────────────────────────────────────

    private async withCitations(paper: S2Paper): Promise<CitationBundle> {
        const citations = await this.fetchCitingPapers(paper.paperId);
        return { status: 'found', publication: this.toPublicationInfo(paper), citations };
    }

    private async fetchCitingPapers(paperId: string): Promise<CitationRecord[]> {
        const params = new URLSearchParams({
            fields: PAPER_FIELDS,
            limit: String(Math.min(this.citationLimit, 1000)),
        });

        const url = `${S2_BASE}/paper/${encodeURIComponent(paperId)}/citations?${params.toString()}`;
        logger.debug({ url }, 'S2 fetch citations');

        const response = await this.httpClient.get(url, {
            source: 's2',
            headers: this.buildHeaders(),
        });

        const citations: CitationRecord[] = [];
        for (const entry of (citationsSchema.parse(response.data).data ?? []).slice(0, this.citationLimit)) {
            const parsed = citingPaperSchema.safeParse(entry.citingPaper);
            if (!parsed.success) {
                logger.debug({ paperId }, 'Dropping malformed S2 citing paper');
                continue;
            }
            citations.push(this.normalizeCitingPaper(parsed.data));
        }
        return citations;
    }

    private normalizeCitingPaper(paper: S2CitingPaper): CitationRecord {
        return {
            title: cleanTitle(paper.title),
            doi: stripDoiPrefix(paper.externalIds?.DOI),
            publication_date: paper.year != null ? String(paper.year) : null,
            source: 's2',
        };
    }

    private toPublicationInfo(paper: S2Paper): PublicationInfo {
        return {
            source_id: paper.paperId,
            title: cleanTitle(paper.title),
            doi: stripDoiPrefix(paper.externalIds?.DOI),
            publication_date: paper.year != null ? String(paper.year) : null,
        };
    }

    /**
     * Clean search query: S2 treats hyphens and plus signs as operators.
     */
    private cleanSearchQuery(query: string): string {
        return query
            .replace(/[-+]/g, ' ')
            .replace(/\s+/g, ' ')
            .trim();
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}
