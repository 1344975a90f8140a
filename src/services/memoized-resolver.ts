/**
 * Memoized resolver
 * Each entity ID is fetched at most once per run; every caller asking for
 * the same ID shares the same task and sees the same outcome.
 */
import type pLimit from 'p-limit';
import { createLogger, type Logger } from '../observability/logger.js';
import { entityOutcomes, memoHits } from '../observability/metrics.js';
import type { EntityId, FetchOutcome } from '../fetchers/types.js';
import { toHarvestError } from './errors.js';

export type FetchState = 'NotStarted' | 'InFlight' | 'Succeeded' | 'Failed';

type Limit = ReturnType<typeof pLimit>;

export interface ResolveContext {
    readonly id: EntityId;
    /** Record a non-fatal problem (e.g. partial comment list) */
    warn(reason: string): void;
}

export type EntityLoader<T> = (id: EntityId, context: ResolveContext) => Promise<T>;

export interface MemoizedResolverOptions {
    /** Resolver name for logs and metrics */
    name: string;
    /** Shared concurrency cap for underlying fetches */
    limit?: Limit;
    logger?: Logger;
}

export class MemoizedResolver<T> {
    private readonly tasks = new Map<EntityId, Promise<FetchOutcome<T>>>();
    private readonly states = new Map<EntityId, FetchState>();
    private readonly log: Logger;
    private fetches = 0;

    constructor(
        private readonly loader: EntityLoader<T>,
        private readonly options: MemoizedResolverOptions
    ) {
        this.log = options.logger ?? createLogger({ component: 'resolver' });
    }

    /**
     * Return the task for `id`, starting it if this is the first request.
     * Lookup and insert happen in one synchronous step; the loader only
     * runs after the task is registered.
     */
    resolve(id: EntityId): Promise<FetchOutcome<T>> {
        const existing = this.tasks.get(id);
        if (existing) {
            memoHits.inc({ resolver: this.options.name });
            return existing;
        }

        this.states.set(id, 'InFlight');
        const task = Promise.resolve(id).then((key) => this.run(key));
        this.tasks.set(id, task);
        return task;
    }

    state(id: EntityId): FetchState {
        return this.states.get(id) ?? 'NotStarted';
    }

    /** Number of distinct IDs requested so far */
    get size(): number {
        return this.tasks.size;
    }

    /** Number of underlying loader invocations */
    get fetchCount(): number {
        return this.fetches;
    }

    private async run(id: EntityId): Promise<FetchOutcome<T>> {
        const warnings: string[] = [];
        const context: ResolveContext = {
            id,
            warn: (reason) => {
                warnings.push(reason);
            },
        };

        let outcome: FetchOutcome<T>;
        try {
            const value = await (this.options.limit
                ? this.options.limit(() => this.invoke(id, context))
                : this.invoke(id, context));
            outcome = { ok: true, value, warnings };
        } catch (error) {
            const failure = toHarvestError(error);
            this.log.warn('Entity fetch failed', {
                resolver: this.options.name,
                entityId: id,
                kind: failure.kind,
                reason: failure.message,
            });
            outcome = { ok: false, error: failure };
        }

        this.states.set(id, outcome.ok ? 'Succeeded' : 'Failed');
        entityOutcomes.inc({ resolver: this.options.name, status: outcome.ok ? 'success' : 'failed' });
        return outcome;
    }

    private invoke(id: EntityId, context: ResolveContext): Promise<T> {
        this.fetches++;
        return this.loader(id, context);
    }
}
