/**
 * Rate limit retry policy
 * Wraps one HTTP exchange; 403/429 responses are retried after the
 * Retry-After delay (60s when absent) until the stream's budget runs out
 */
import { setTimeout as delay } from 'node:timers/promises';
import { config } from '../config/index.js';
import { createLogger } from '../observability/logger.js';
import { httpRequestsTotal, rateLimitHits, retryCount } from '../observability/metrics.js';
import {
    CancelledError,
    MalformedResponseError,
    RateLimitedError,
    RemoteRejectedError,
    RetryBudgetExhaustedError,
    TransportError,
    toHarvestError,
} from './errors.js';

const log = createLogger({ component: 'retry' });

const ERROR_BODY_LIMIT = 500;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
    maxRetries: number;
    defaultRetryAfterMs: number;
    requestTimeoutMs: number;
    sleep: Sleep;
    now: () => number;
}

export interface HttpRequest {
    api: 'youtube' | 'github';
    url: string;
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string;
    /** A 2xx payload that still reports a rate limit (GraphQL errors) */
    isRateLimitedPayload?: (payload: unknown) => boolean;
    /** A 403 whose body shows it is not a rate limit */
    isPermanentForbidden?: (bodyText: string) => boolean;
}

/**
 * Retry counter for one logical paginated stream.
 * Shared by every page of that stream and by nothing else.
 */
export class RetryBudget {
    private retries = 0;

    constructor(
        readonly stream: string,
        readonly maxRetries: number
    ) { }

    get used(): number {
        return this.retries;
    }

    get remaining(): number {
        return this.maxRetries - this.retries;
    }

    tryConsume(): boolean {
        if (this.retries >= this.maxRetries) {
            return false;
        }
        this.retries++;
        return true;
    }
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
    if (header === null) return null;

    const value = header.trim();
    if (value === '') return null;

    if (/^\d+(\.\d+)?$/.test(value)) {
        return Math.round(parseFloat(value) * 1000);
    }

    const date = Date.parse(value);
    if (Number.isNaN(date)) return null;

    return Math.max(0, date - now);
}

export function isRateLimitStatus(status: number): boolean {
    return status === 403 || status === 429;
}

const abortableSleep: Sleep = async (ms, signal) => {
    await delay(ms, undefined, { signal });
};

async function readBodyExcerpt(response: Response): Promise<string> {
    try {
        const text = await response.text();
        return text.length > ERROR_BODY_LIMIT ? `${text.substring(0, ERROR_BODY_LIMIT)}...` : text;
    } catch (error) {
        log.debug('Could not read error response body', { status: response.status, error: String(error) });
        return '';
    }
}

function isInterruptedRead(error: unknown): boolean {
    return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Release the connection of a response that will not be read
 */
async function discardBody(response: Response): Promise<void> {
    if (response.bodyUsed || !response.body) return;
    try {
        await response.body.cancel();
    } catch (error) {
        log.debug('Could not discard response body', { status: response.status, error: String(error) });
    }
}

function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export class RateLimitRetryPolicy {
    private readonly options: RetryPolicyOptions;

    constructor(options: Partial<RetryPolicyOptions> = {}) {
        this.options = {
            maxRetries: options.maxRetries ?? config.maxRetries,
            defaultRetryAfterMs: options.defaultRetryAfterMs ?? config.defaultRetryAfterSeconds * 1000,
            requestTimeoutMs: options.requestTimeoutMs ?? config.requestTimeoutMs,
            sleep: options.sleep ?? abortableSleep,
            now: options.now ?? Date.now,
        };
    }

    get maxRetries(): number {
        return this.options.maxRetries;
    }

    get defaultRetryAfterMs(): number {
        return this.options.defaultRetryAfterMs;
    }

    createBudget(stream: string): RetryBudget {
        return new RetryBudget(stream, this.options.maxRetries);
    }

    /**
     * Perform the exchange and return the parsed JSON body
     */
    async execute(request: HttpRequest, budget: RetryBudget, signal?: AbortSignal): Promise<unknown> {
        for (; ;) {
            if (signal?.aborted) {
                throw new CancelledError();
            }

            const response = await this.send(request, budget, signal);
            httpRequestsTotal.inc({ api: request.api, status_code: String(response.status) });

            let limited: RateLimitedError;

            if (response.ok) {
                const payload = await this.parseJson(response, request, signal);
                if (!request.isRateLimitedPayload?.(payload)) {
                    return payload;
                }
                limited = new RateLimitedError(response.status, parseRetryAfter(response.headers.get('retry-after'), this.options.now()));
            } else if (isRateLimitStatus(response.status)) {
                const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), this.options.now());
                if (response.status === 403 && request.isPermanentForbidden) {
                    const detail = await readBodyExcerpt(response);
                    if (request.isPermanentForbidden(detail)) {
                        throw new RemoteRejectedError(response.status, detail);
                    }
                }
                limited = new RateLimitedError(response.status, retryAfterMs);
            } else {
                throw new RemoteRejectedError(response.status, await readBodyExcerpt(response));
            }

            await discardBody(response);
            rateLimitHits.inc({ api: request.api });

            if (!budget.tryConsume()) {
                log.warn('Retry budget exhausted', {
                    api: request.api,
                    stream: budget.stream,
                    retries: budget.used,
                });
                throw new RetryBudgetExhaustedError(budget.stream, budget.used, { cause: limited });
            }

            const waitMs = limited.retryAfterMs ?? this.options.defaultRetryAfterMs;
            retryCount.inc({ api: request.api, attempt: String(budget.used) });
            log.warn(`Rate limited. Retrying in ${waitMs / 1000} seconds...`, {
                api: request.api,
                stream: budget.stream,
                status: limited.status,
                attempt: budget.used,
                maxRetries: budget.maxRetries,
            });

            try {
                await this.options.sleep(waitMs, signal);
            } catch (error) {
                throw toHarvestError(error);
            }
        }
    }

    private async send(request: HttpRequest, budget: RetryBudget, signal?: AbortSignal): Promise<Response> {
        try {
            return await fetch(request.url, {
                method: request.method ?? 'GET',
                headers: request.headers,
                body: request.body,
                signal: requestSignal(this.options.requestTimeoutMs, signal),
            });
        } catch (error) {
            if (signal?.aborted) {
                throw new CancelledError();
            }
            const failure = toHarvestError(error);
            log.error('Request failed', error, { api: request.api, stream: budget.stream });
            throw failure instanceof CancelledError
                ? new TransportError('Request aborted', { cause: error })
                : failure;
        }
    }

    private async parseJson(response: Response, request: HttpRequest, signal?: AbortSignal): Promise<unknown> {
        try {
            return await response.json();
        } catch (error) {
            if (signal?.aborted) {
                throw new CancelledError();
            }
            if (isInterruptedRead(error)) {
                const failure = toHarvestError(error);
                throw failure instanceof CancelledError
                    ? new TransportError('Response body aborted', { cause: error })
                    : failure;
            }
            throw new MalformedResponseError(`Response from ${request.api} is not valid JSON`, { cause: error });
        }
    }
}
