/**
 * Barrel export for all shared types.
 */
export type {
    CitationRecord,
    CitationSource,
    CitationSnapshot,
    TrackedPublication,
    AggregationResult,
} from './citation.js';
export { DEFAULT_CONFIG } from './config.js';
export type { ImpactConfig, LogLevel } from './config.js';
export type {
    CitationSourceAdapter,
    CitationBundle,
    PublicationInfo,
    SourceAdapterOptions,
} from './source-adapter.js';
export type { ReportSink, ReportDateRow, RunRecord } from './report.js';
