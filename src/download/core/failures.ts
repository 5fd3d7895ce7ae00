import { FailureReason, FailureRecord } from './types';

// Engine messages that mean the video cannot be reached with the current session
const INACCESSIBLE_MARKERS = [
    'private video',
    'video unavailable',
    'sign in to confirm',
    'members-only',
];

/**
 * Raised when a batch cannot start at all (nothing to do, missing mux tool,
 * unusable destination). Never used for a single item.
 */
export class BatchPreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BatchPreconditionError';
    }
}

/**
 * Raised for input that is not an absolute URL. Retrying cannot fix it.
 */
export class InvalidUrlError extends Error {
    constructor(readonly url: string) {
        super(`Invalid URL: ${url}`);
        this.name = 'InvalidUrlError';
    }
}

export function createFailure(url: string, reason: FailureReason, detail?: string): FailureRecord {
    const record: FailureRecord = detail ? { url, reason, detail } : { url, reason };
    return Object.freeze(record);
}

/**
 * Map an engine error message onto a failure record
 */
export function classifyEngineError(url: string, message: string): FailureRecord {
    if (isInaccessibleMessage(message)) {
        return createFailure(url, FailureReason.PRIVATE_OR_INACCESSIBLE, message);
    }
    return createFailure(url, FailureReason.DOWNLOAD_ERROR, message);
}

/**
 * Same as classifyEngineError, for metadata lookups that produced nothing usable
 */
export function classifyExtractionError(url: string, message: string): FailureRecord {
    const record = classifyEngineError(url, message);
    return record.reason === FailureReason.DOWNLOAD_ERROR
        ? createFailure(url, FailureReason.NO_METADATA, message)
        : record;
}

export function isInaccessibleMessage(message: string): boolean {
    const lower = message.toLowerCase();
    return INACCESSIBLE_MARKERS.some((marker) => lower.includes(marker));
}

export function describeFailure(record: FailureRecord): string {
    return record.detail ? `${record.reason}: ${record.detail}` : record.reason;
}
