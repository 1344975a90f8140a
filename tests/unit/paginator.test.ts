/**
 * Cursor paginator tests
 */
import { describe, it, expect, vi } from 'vitest';
import { CursorPaginator, normalizePage, paginate } from '../../src/services/paginator.js';
import { RemoteRejectedError } from '../../src/services/errors.js';
import type { Page } from '../../src/fetchers/types.js';

function pagesFrom(pages: Page<number>[]) {
    return vi.fn(async (cursor: string | null): Promise<Page<number>> => {
        const index = cursor === null ? 0 : Number(cursor);
        const page = pages[index];
        if (!page) throw new Error(`no page for cursor ${cursor}`);
        return page;
    });
}

describe('normalizePage', () => {
    it('treats an empty cursor as the last page', () => {
        expect(normalizePage({ items: [1], cursor: '', hasMore: true })).toEqual({ items: [1], cursor: null, hasMore: false });
    });

    it('keeps a page with a cursor as is', () => {
        expect(normalizePage({ items: [], cursor: 'abc', hasMore: true })).toEqual({ items: [], cursor: 'abc', hasMore: true });
    });
});

describe('CursorPaginator', () => {
    it('yields pages in order and stops when no cursor is returned', async () => {
        const fetchPage = pagesFrom([
            { items: [1, 2], cursor: '1', hasMore: true },
            { items: [3], cursor: '2', hasMore: true },
            { items: [4, 5], cursor: null, hasMore: false },
        ]);

        const result = await paginate(fetchPage, { stream: 'test', resource: 'test' }).collect();

        expect(result.items).toEqual([1, 2, 3, 4, 5]);
        expect(result.pages).toBe(3);
        expect(result.complete).toBe(true);
        expect(result.failure).toBeUndefined();
        expect(fetchPage.mock.calls.map(call => call[0])).toEqual([null, '1', '2']);
    });

    it('continues past empty intermediate pages', async () => {
        const fetchPage = pagesFrom([
            { items: [1], cursor: '1', hasMore: true },
            { items: [], cursor: '2', hasMore: true },
            { items: [2], cursor: null, hasMore: false },
        ]);

        const result = await paginate(fetchPage, { stream: 'test', resource: 'test' }).collect();

        expect(result.items).toEqual([1, 2]);
        expect(result.pages).toBe(3);
    });

    it('keeps earlier pages when a later page fails', async () => {
        const fetchPage = vi.fn(async (cursor: string | null): Promise<Page<number>> => {
            if (cursor === null) return { items: [1, 2], cursor: 'next', hasMore: true };
            throw new RemoteRejectedError(500);
        });

        const paginator = new CursorPaginator(fetchPage, { stream: 'test', resource: 'test' });
        const result = await paginator.collect();

        expect(result.items).toEqual([1, 2]);
        expect(result.complete).toBe(false);
        expect(result.failure?.kind).toBe('RemoteRejected');
        expect(result.failure?.message).toBe('HTTP 500');
        expect(paginator.failure).toBe(result.failure);
    });

    it('maps plain errors to transport failures', async () => {
        const fetchPage = vi.fn(async (): Promise<Page<number>> => {
            throw new Error('socket hang up');
        });

        const result = await paginate(fetchPage, { stream: 'test', resource: 'test' }).collect();

        expect(result.items).toEqual([]);
        expect(result.pages).toBe(0);
        expect(result.failure?.kind).toBe('TransportFailed');
        expect(result.failure?.message).toBe('socket hang up');
    });

    it('stops with a cancellation and keeps partial items once aborted', async () => {
        const controller = new AbortController();
        const fetchPage = vi.fn(async (cursor: string | null): Promise<Page<number>> => {
            if (cursor === null) {
                controller.abort();
                return { items: [7], cursor: 'next', hasMore: true };
            }
            return { items: [8], cursor: null, hasMore: false };
        });

        const result = await paginate(fetchPage, { stream: 'test', resource: 'test', signal: controller.signal }).collect();

        expect(result.items).toEqual([7]);
        expect(result.complete).toBe(false);
        expect(result.failure?.kind).toBe('Cancelled');
        expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it('starts from the initial cursor', async () => {
        const fetchPage = pagesFrom([
            { items: [1], cursor: '1', hasMore: true },
            { items: [2], cursor: null, hasMore: false },
        ]);

        const result = await paginate(fetchPage, { stream: 'test', resource: 'test', initialCursor: '1' }).collect();

        expect(result.items).toEqual([2]);
        expect(fetchPage).toHaveBeenCalledWith('1');
    });

    it('stops early at maxPages without a failure', async () => {
        const fetchPage = pagesFrom([
            { items: [1], cursor: '1', hasMore: true },
            { items: [2], cursor: '2', hasMore: true },
            { items: [3], cursor: null, hasMore: false },
        ]);

        const result = await paginate(fetchPage, { stream: 'test', resource: 'test', maxPages: 2 }).collect();

        expect(result.items).toEqual([1, 2]);
        expect(result.complete).toBe(false);
        expect(result.failure).toBeUndefined();
    });

    it('cannot be iterated twice', async () => {
        const paginator = paginate(pagesFrom([{ items: [1], cursor: null, hasMore: false }]), { stream: 'once', resource: 'test' });
        await paginator.collect();

        await expect(paginator.collect()).rejects.toThrow('Paginator for once has already been consumed');
    });
});
