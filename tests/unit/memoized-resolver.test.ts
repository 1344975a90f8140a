/**
 * Memoized resolver tests
 */
import { describe, it, expect, vi } from 'vitest';
import pLimit from 'p-limit';
import { MemoizedResolver } from '../../src/services/memoized-resolver.js';
import { NotFoundError } from '../../src/services/errors.js';

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((res) => {
        resolve = res;
    });
    return { promise, resolve };
}

describe('MemoizedResolver', () => {
    it('fetches once for ten concurrent callers and hands all of them the same result', async () => {
        const gate = deferred<{ title: string }>();
        const loader = vi.fn(() => gate.promise);
        const resolver = new MemoizedResolver(loader, { name: 'test' });

        const callers = Array.from({ length: 10 }, () => resolver.resolve('X'));
        expect(resolver.state('X')).toBe('InFlight');

        gate.resolve({ title: 'video X' });
        const outcomes = await Promise.all(callers);

        expect(loader).toHaveBeenCalledTimes(1);
        expect(resolver.fetchCount).toBe(1);
        for (const outcome of outcomes) {
            expect(outcome).toBe(outcomes[0]);
        }
        expect(outcomes[0]).toEqual({ ok: true, value: { title: 'video X' }, warnings: [] });
        expect(resolver.state('X')).toBe('Succeeded');
    });

    it('returns the stored outcome to later callers without fetching again', async () => {
        const loader = vi.fn(async (id: string) => id.toUpperCase());
        const resolver = new MemoizedResolver(loader, { name: 'test' });

        const first = await resolver.resolve('a');
        const second = await resolver.resolve('a');

        expect(second).toBe(first);
        expect(loader).toHaveBeenCalledTimes(1);
        expect(resolver.size).toBe(1);
    });

    it('stores failures as outcomes and never retries them', async () => {
        const loader = vi.fn(async (id: string): Promise<string> => {
            throw new NotFoundError(`Video ${id} not found`);
        });
        const resolver = new MemoizedResolver(loader, { name: 'test' });

        const outcome = await resolver.resolve('gone');
        await resolver.resolve('gone');

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe('NotFound');
            expect(outcome.error.message).toBe('Video gone not found');
        }
        expect(loader).toHaveBeenCalledTimes(1);
        expect(resolver.state('gone')).toBe('Failed');
    });

    it('collects warnings raised by the loader', async () => {
        const resolver = new MemoizedResolver(async (id, context) => {
            context.warn('comments incomplete');
            return id;
        }, { name: 'test' });

        await expect(resolver.resolve('w')).resolves.toEqual({ ok: true, value: 'w', warnings: ['comments incomplete'] });
    });

    it('reports unknown IDs as not started', () => {
        const resolver = new MemoizedResolver(async (id: string) => id, { name: 'test' });
        expect(resolver.state('nope')).toBe('NotStarted');
    });

    it('keeps no more loads running than the shared limit', async () => {
        let running = 0;
        let peak = 0;
        const resolver = new MemoizedResolver(async (id: string) => {
            running++;
            peak = Math.max(peak, running);
            await new Promise(resolve => setTimeout(resolve, 5));
            running--;
            return id;
        }, { name: 'test', limit: pLimit(2) });

        await Promise.all(['a', 'b', 'c', 'd', 'e'].map(id => resolver.resolve(id)));

        expect(peak).toBe(2);
        expect(resolver.fetchCount).toBe(5);
    });
});
