import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError } from '../utils/http-client.js';

function jsonResponse(
    body: unknown,
    init: { status?: number; statusText?: string; headers?: Record<string, string> } = {}
): Response {
    return new Response(JSON.stringify(body), {
        status: init.status ?? 200,
        statusText: init.statusText ?? 'OK',
        headers: { 'content-type': 'application/json', ...init.headers },
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000 });
        vi.restoreAllMocks();
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('openalex')).toBe(0);
            expect(client.getRequestCount('s2')).toBe(0);
        });

        it('should reset counts', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ ok: true })));

            await client.get('https://api.example.com/1', { source: 'openalex' });
            expect(client.getAllRequestCounts()).toEqual({ openalex: 1 });

            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });

    describe('responses', () => {
        it('should parse JSON bodies', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ results: [1, 2] })));

            const response = await client.get('https://api.example.com/works');

            expect(response.status).toBe(200);
            expect(response.data).toEqual({ results: [1, 2] });
        });

        it('should throw a non-retryable HttpError for 404', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () =>
                jsonResponse({ error: 'missing' }, { status: 404, statusText: 'Not Found' })
            ));

            const error = await client.get('https://api.example.com/missing').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 404, retryable: false, response: { error: 'missing' } });
        });

        it('should retry a 503 honouring Retry-After', async () => {
            const mockFetch = vi.fn()
                .mockImplementationOnce(async () =>
                    jsonResponse({}, { status: 503, statusText: 'Service Unavailable', headers: { 'retry-after': '0' } })
                )
                .mockImplementationOnce(async () => jsonResponse({ recovered: true }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/flaky', { source: 'openalex' });

            expect(response.data).toEqual({ recovered: true });
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(client.getRequestCount('openalex')).toBe(2);
        });

        it('should give up after maxRetries', async () => {
            const noRetry = new HttpClient({ maxRetries: 0 });
            const mockFetch = vi.fn().mockImplementation(async () =>
                jsonResponse({}, { status: 503, statusText: 'Service Unavailable' })
            );
            vi.stubGlobal('fetch', mockFetch);

            await expect(noRetry.get('https://api.example.com/down')).rejects.toThrow('HTTP 503: Service Unavailable');
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ data: 'ok' })));

            const start = Date.now();

            // Make 3 requests with S2 source (1/sec rate limit)
            await Promise.all([
                client.request('https://api.example.com/1', { source: 's2' }),
                client.request('https://api.example.com/2', { source: 's2' }),
                client.request('https://api.example.com/3', { source: 's2' }),
            ]);

            const elapsed = Date.now() - start;

            // The first token is immediately available, so 3 requests need ~2 seconds
            expect(elapsed).toBeGreaterThanOrEqual(1000);
            expect(client.getRequestCount('s2')).toBe(3);
        });
    });
});
