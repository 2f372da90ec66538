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
import { cleanTitle, describeError, shortOpenAlexId, stripDoiPrefix } from './utils.js';

const logger = getLogger();

const OPENALEX_BASE = 'https://api.openalex.org';

/**
 * OpenAlex work (subset of relevant fields).
 */
const workSchema = z.object({
    id: z.string().min(1),
    doi: z.string().nullish(),
    title: z.string().nullish(),
    display_name: z.string().nullish(),
    publication_date: z.string().nullish(),
    publication_year: z.number().int().nullish(),
});

type OpenAlexWork = z.infer<typeof workSchema>;

/**
 * List envelope. Works are validated one by one so that a single malformed
 * entry does not discard the page.
 */
const listSchema = z.object({
    results: z.array(z.unknown()),
});

/**
 * OpenAlex source adapter. Priority source for citation dates.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter implements CitationSourceAdapter {
    readonly name = 'OpenAlex';
    readonly sourceId = 'openalex' as const;
    private httpClient: HttpClient;
    private apiKey?: string;
    private email?: string;
    private citationLimit: number;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options?.email;
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
        try {
            const work = await this.lookupByDoi(doi);
            if (!work) return { status: 'not_found' };
            return await this.withCitations(work);
        } catch (error) {
            logger.warn({ doi, error: describeError(error) }, 'OpenAlex DOI lookup failed');
            return { status: 'error', reason: describeError(error) };
        }
    }

    async fetchByTitle(title: string): Promise<CitationBundle> {
        try {
            // Commas separate filters in OpenAlex syntax
            const params = new URLSearchParams({
                filter: `title.search:${title.replace(/,/g, ' ')}`,
                per_page: '1',
            });
            this.addAuthParams(params);

            const url = `${OPENALEX_BASE}/works?${params.toString()}`;
            logger.debug({ url }, 'OpenAlex title search');

            const work = await this.firstWork(url);
            if (!work) return { status: 'not_found' };
            return await this.withCitations(work);
        } catch (error) {
            logger.warn({ title, error: describeError(error) }, 'OpenAlex title lookup failed');
            return { status: 'error', reason: describeError(error) };
        }
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Direct DOI lookup, falling back to a DOI filter search when the direct route 404s.
     */
    private async lookupByDoi(doi: string): Promise<OpenAlexWork | null> {
        const params = new URLSearchParams();
        this.addAuthParams(params);
        const query = params.toString();

        const url = `${OPENALEX_BASE}/works/doi:${encodeURI(doi)}${query ? `?${query}` : ''}`;
        logger.debug({ url }, 'OpenAlex DOI lookup');

        try {
            const response = await this.httpClient.get(url, { source: 'openalex' });
            return this.parseWork(response.data);
        } catch (error) {
            if (!(error instanceof HttpError) || error.status !== 404) throw error;
        }

        const searchParams = new URLSearchParams({
            filter: `doi:${doi}`,
            per_page: '1',
        });
        this.addAuthParams(searchParams);

        const searchUrl = `${OPENALEX_BASE}/works?${searchParams.toString()}`;
        logger.debug({ url: searchUrl }, 'Direct DOI not found, trying search');
        return this.firstWork(searchUrl);
    }

    private async firstWork(url: string): Promise<OpenAlexWork | null> {
        const response = await this.httpClient.get(url, { source: 'openalex' });
        const list = listSchema.parse(response.data);
        const [first] = list.results;
        return first === undefined ? null : this.parseWork(first);
    }

    private parseWork(data: unknown): OpenAlexWork {
        return workSchema.parse(data);
    }

    private async withCitations(work: OpenAlexWork): Promise<CitationBundle> {
        const citations = await this.fetchCitingWorks(work.id);
        return { status: 'found', publication: this.toPublicationInfo(work), citations };
    }

    private async fetchCitingWorks(workId: string): Promise<CitationRecord[]> {
        const params = new URLSearchParams({
            filter: `cites:${shortOpenAlexId(workId)}`,
            per_page: String(Math.min(this.citationLimit, 200)),
        });
        this.addAuthParams(params);

        const url = `${OPENALEX_BASE}/works?${params.toString()}`;
        logger.debug({ url }, 'OpenAlex fetch citations');

        const response = await this.httpClient.get(url, { source: 'openalex' });
        const list = listSchema.parse(response.data);

        const citations: CitationRecord[] = [];
        for (const raw of list.results.slice(0, this.citationLimit)) {
            const parsed = workSchema.safeParse(raw);
            if (!parsed.success) {
                logger.debug({ workId, issues: parsed.error.issues.length }, 'Dropping malformed OpenAlex citing work');
                continue;
            }
            citations.push(this.normalizeCitingWork(parsed.data));
        }
        return citations;
    }

    private normalizeCitingWork(work: OpenAlexWork): CitationRecord {
        return {
            title: cleanTitle(work.display_name ?? work.title),
            doi: stripDoiPrefix(work.doi),
            publication_date: workDate(work),
            source: 'openalex',
        };
    }

    private toPublicationInfo(work: OpenAlexWork): PublicationInfo {
        return {
            source_id: shortOpenAlexId(work.id),
            title: cleanTitle(work.display_name ?? work.title),
            doi: stripDoiPrefix(work.doi),
            publication_date: workDate(work),
        };
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}

function workDate(work: OpenAlexWork): string | null {
    if (work.publication_date) return work.publication_date;
    return work.publication_year != null ? String(work.publication_year) : null;
}
