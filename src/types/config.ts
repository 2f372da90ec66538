/**
 * Log level options. `silent` disables output entirely.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ImpactConfig {
    // Input
    publicationsFile: string;

    // Output
    snapshotFile: string;
    reportDb: string;

    // Report dates given on the command line; pending ledger dates otherwise
    dates?: string[];

    // Fetching
    citationsPerPublication: number;
    requestDelayMs: number;
    concurrency: number;
    httpTimeoutMs: number;
    maxRetries: number;
    openalexEmail?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ImpactConfig = {
    publicationsFile: './publications.json',
    snapshotFile: './citing_papers_by_publication.json',
    reportDb: './impact.db',
    citationsPerPublication: 10,
    requestDelayMs: 2000,
    concurrency: 1,
    httpTimeoutMs: 10000,
    maxRetries: 3,
    logLevel: 'info',
    jsonLogs: false,
};
