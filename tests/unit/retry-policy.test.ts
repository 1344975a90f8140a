/**
 * Rate limit retry policy tests
 * fetch is stubbed; sleeping is replaced by a recorder
 */
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
    RateLimitRetryPolicy,
    RetryBudget,
    isRateLimitStatus,
    parseRetryAfter,
    type Sleep,
} from '../../src/services/retry-policy.js';
import { RetryBudgetExhaustedError } from '../../src/services/errors.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

const request = { api: 'youtube' as const, url: 'https://api.test/items' };

describe('parseRetryAfter', () => {
    it('reads delta-seconds', () => {
        expect(parseRetryAfter('2')).toBe(2000);
        expect(parseRetryAfter(' 0.5 ')).toBe(500);
    });

    it('reads an HTTP-date relative to now', () => {
        const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
        expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:30 GMT', now)).toBe(30000);
    });

    it('clamps dates in the past to zero', () => {
        const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
        expect(parseRetryAfter('Wed, 21 Oct 2026 07:00:00 GMT', now)).toBe(0);
    });

    it('returns null when absent or unreadable', () => {
        expect(parseRetryAfter(null)).toBeNull();
        expect(parseRetryAfter('')).toBeNull();
        expect(parseRetryAfter('soon')).toBeNull();
    });
});

describe('isRateLimitStatus', () => {
    it('matches 403 and 429 only', () => {
        expect(isRateLimitStatus(403)).toBe(true);
        expect(isRateLimitStatus(429)).toBe(true);
        expect(isRateLimitStatus(500)).toBe(false);
        expect(isRateLimitStatus(404)).toBe(false);
    });
});

describe('RetryBudget', () => {
    it('allows exactly maxRetries retries', () => {
        const budget = new RetryBudget('stream', 2);
        expect(budget.tryConsume()).toBe(true);
        expect(budget.tryConsume()).toBe(true);
        expect(budget.tryConsume()).toBe(false);
        expect(budget.used).toBe(2);
        expect(budget.remaining).toBe(0);
    });
});

describe('RateLimitRetryPolicy', () => {
    let sleep: Mock<Sleep>;
    let policy: RateLimitRetryPolicy;

    beforeEach(() => {
        mockFetch.mockReset();
        sleep = vi.fn<Sleep>(async () => undefined);
        policy = new RateLimitRetryPolicy({ maxRetries: 5, defaultRetryAfterMs: 60000, sleep });
    });

    afterEach(() => {
        vi.clearAllMocks();
    });

    it('returns the parsed body of a successful response', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse({ items: [1] }));

        const payload = await policy.execute(request, policy.createBudget('s'));

        expect(payload).toEqual({ items: [1] });
        expect(sleep).not.toHaveBeenCalled();
    });

    it('retries a 429 after the Retry-After delay', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '3' }))
            .mockResolvedValueOnce(jsonResponse({ ok: true }));

        const payload = await policy.execute(request, policy.createBudget('s'));

        expect(payload).toEqual({ ok: true });
        expect(mockFetch).toHaveBeenCalledTimes(2);
        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep.mock.calls[0]?.[0]).toBe(3000);
    });

    it('waits 60 seconds when Retry-After is absent', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse({}, 403))
            .mockResolvedValueOnce(jsonResponse({ ok: true }));

        await policy.execute(request, policy.createBudget('s'));

        expect(sleep.mock.calls[0]?.[0]).toBe(60000);
    });

    it('gives up after five retries when always rate limited', async () => {
        mockFetch.mockImplementation(async () => jsonResponse({}, 429));
        const budget = policy.createBudget('playlistItems:PL1');

        const failure = await policy.execute(request, budget).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(RetryBudgetExhaustedError);
        expect(failure).toMatchObject({
            kind: 'RetryBudgetExhausted',
            message: 'Still rate limited after 5 retries (playlistItems:PL1)',
        });
        expect(mockFetch).toHaveBeenCalledTimes(6);
        expect(sleep).toHaveBeenCalledTimes(5);
    });

    it('keeps budgets of sibling streams independent', async () => {
        mockFetch.mockImplementation(async () => jsonResponse({}, 429));
        const exhausted = policy.createBudget('a');
        await expect(policy.execute(request, exhausted)).rejects.toBeInstanceOf(RetryBudgetExhaustedError);

        mockFetch.mockReset();
        mockFetch
            .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '1' }))
            .mockResolvedValueOnce(jsonResponse({ sibling: true }));
        const sibling = policy.createBudget('b');

        await expect(policy.execute(request, sibling)).resolves.toEqual({ sibling: true });
        expect(sibling.used).toBe(1);
        expect(exhausted.used).toBe(5);
    });

    it('shares one budget across pages of the same stream', async () => {
        const budget = policy.createBudget('s');
        mockFetch
            .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '1' }))
            .mockResolvedValueOnce(jsonResponse({ page: 1 }))
            .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '1' }))
            .mockResolvedValueOnce(jsonResponse({ page: 2 }));

        await policy.execute(request, budget);
        await policy.execute(request, budget);

        expect(budget.used).toBe(2);
    });

    it('counts retries per stream, not per run of consecutive limits', async () => {
        const strict = new RateLimitRetryPolicy({ maxRetries: 2, sleep });
        const budget = strict.createBudget('s');
        mockFetch
            .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '1' }))
            .mockResolvedValueOnce(jsonResponse({ page: 1 }))
            .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '1' }))
            .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '1' }));

        await strict.execute(request, budget);
        await expect(strict.execute(request, budget)).rejects.toBeInstanceOf(RetryBudgetExhaustedError);

        expect(mockFetch).toHaveBeenCalledTimes(4);
        expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('discards the body of a rate-limited response before waiting', async () => {
        const limited = jsonResponse({ error: 'slow down' }, 429, { 'retry-after': '1' });
        const body = limited.body;
        if (!body) throw new Error('expected a response body');
        const cancel = vi.spyOn(body, 'cancel');
        mockFetch
            .mockResolvedValueOnce(limited)
            .mockResolvedValueOnce(jsonResponse({ ok: true }));

        await policy.execute(request, policy.createBudget('s'));

        expect(cancel).toHaveBeenCalledTimes(1);
        expect(cancel.mock.invocationCallOrder[0]).toBeLessThan(sleep.mock.invocationCallOrder[0] ?? 0);
    });

    it('does not retry other error statuses', async () => {
        mockFetch.mockResolvedValueOnce(new Response('boom', { status: 500 }));

        await expect(policy.execute(request, policy.createBudget('s'))).rejects.toMatchObject({
            kind: 'RemoteRejected',
            message: 'HTTP 500: boom',
        });
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('does not retry a 403 recognised as permanent', async () => {
        mockFetch.mockResolvedValueOnce(new Response('{"reason":"commentsDisabled"}', { status: 403 }));

        await expect(policy.execute(
            { ...request, isPermanentForbidden: body => body.includes('commentsDisabled') },
            policy.createBudget('s')
        )).rejects.toMatchObject({ kind: 'RemoteRejected' });
        expect(sleep).not.toHaveBeenCalled();
    });

    it('retries a 200 whose payload reports a rate limit', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse({ errors: [{ type: 'RATE_LIMITED' }] }))
            .mockResolvedValueOnce(jsonResponse({ data: {} }));

        const payload = await policy.execute({
            ...request,
            isRateLimitedPayload: (body) => typeof body === 'object' && body !== null && 'errors' in body,
        }, policy.createBudget('s'));

        expect(payload).toEqual({ data: {} });
        expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('reports a body that is not JSON as malformed', async () => {
        mockFetch.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

        await expect(policy.execute(request, policy.createBudget('s'))).rejects.toMatchObject({
            kind: 'MalformedResponse',
        });
    });

    it('reports a body read that times out as a transport failure', async () => {
        const response = jsonResponse({ items: [] });
        vi.spyOn(response, 'json').mockRejectedValue(
            Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
        );
        mockFetch.mockResolvedValueOnce(response);

        await expect(policy.execute(request, policy.createBudget('s'))).rejects.toMatchObject({
            kind: 'TransportFailed',
            message: 'Request timed out: The operation was aborted due to timeout',
        });
    });

    it('maps network errors to transport failures', async () => {
        mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

        await expect(policy.execute(request, policy.createBudget('s'))).rejects.toMatchObject({
            kind: 'TransportFailed',
            message: 'fetch failed',
        });
    });

    it('refuses to start once cancelled', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(policy.execute(request, policy.createBudget('s'), controller.signal)).rejects.toMatchObject({
            kind: 'Cancelled',
        });
        expect(mockFetch).not.toHaveBeenCalled();
    });
});
