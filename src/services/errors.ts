/**
 * Harvest error taxonomy
 * Every failure a fetch stream can end with is one of these
 */

export type HarvestErrorKind =
    | 'RateLimited'
    | 'RemoteRejected'
    | 'MalformedResponse'
    | 'RetryBudgetExhausted'
    | 'TransportFailed'
    | 'Cancelled'
    | 'NotFound'
    | 'InvalidInput';

export class HarvestError extends Error {
    readonly kind: HarvestErrorKind;

    constructor(kind: HarvestErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'HarvestError';
        this.kind = kind;
    }
}

/**
 * 403/429 from the remote. Retried by the retry policy, never surfaced
 * unless a caller bypasses the policy.
 */
export class RateLimitedError extends HarvestError {
    readonly status: number;
    readonly retryAfterMs: number | null;

    constructor(status: number, retryAfterMs: number | null) {
        super('RateLimited', `Rate limited (HTTP ${status})`);
        this.name = 'RateLimitedError';
        this.status = status;
        this.retryAfterMs = retryAfterMs;
    }
}

export class RemoteRejectedError extends HarvestError {
    readonly status: number;

    constructor(status: number, detail?: string) {
        super('RemoteRejected', detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`);
        this.name = 'RemoteRejectedError';
        this.status = status;
    }
}

export class MalformedResponseError extends HarvestError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('MalformedResponse', message, options);
        this.name = 'MalformedResponseError';
    }
}

export class RetryBudgetExhaustedError extends HarvestError {
    readonly retries: number;

    constructor(stream: string, retries: number, options?: { cause?: unknown }) {
        super('RetryBudgetExhausted', `Still rate limited after ${retries} retries (${stream})`, options);
        this.name = 'RetryBudgetExhaustedError';
        this.retries = retries;
    }
}

export class TransportError extends HarvestError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('TransportFailed', message, options);
        this.name = 'TransportError';
    }
}

export class CancelledError extends HarvestError {
    constructor(message = 'Harvest cancelled') {
        super('Cancelled', message);
        this.name = 'CancelledError';
    }
}

export class NotFoundError extends HarvestError {
    constructor(message: string) {
        super('NotFound', message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad entity or container IDs. Raised before any fetching starts.
 */
export class InvalidInputError extends HarvestError {
    constructor(message: string) {
        super('InvalidInput', message);
        this.name = 'InvalidInputError';
    }
}

function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

/**
 * Normalize anything thrown inside a fetch stream
 */
export function toHarvestError(error: unknown): HarvestError {
    if (error instanceof HarvestError) {
        return error;
    }
    if (isAbortError(error)) {
        return new CancelledError();
    }
    if (error instanceof Error && error.name === 'TimeoutError') {
        return new TransportError(`Request timed out: ${error.message}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(message, { cause: error });
}
