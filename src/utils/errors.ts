/**
 * Corrupt or missing input: aborts the run before any network call.
 */
export class ConfigurationError extends Error {
    readonly code = 'CONFIGURATION_ERROR';
    constructor(message: string, public readonly details?: unknown) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class SnapshotError extends Error {
    readonly code = 'SNAPSHOT_ERROR';
    constructor(message: string, public readonly details?: unknown) {
        super(message);
        this.name = 'SnapshotError';
    }
}

export class InvalidDateError extends Error {
    readonly code = 'INVALID_DATE';
    constructor(public readonly value: string) {
        super(`Invalid date "${value}", expected YYYY-MM-DD`);
        this.name = 'InvalidDateError';
    }
}

/**
 * Raised when a run is cancelled mid-fetch. No snapshot is written.
 */
export class RunAbortedError extends Error {
    readonly code = 'RUN_ABORTED';
    constructor(public readonly completed: number, public readonly total: number) {
        super(`Run aborted after ${completed}/${total} publications`);
        this.name = 'RunAbortedError';
    }
}
