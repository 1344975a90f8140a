/**
 * Cursor paginator
 * Drives one paginated query to exhaustion, one page per round-trip.
 * A failing page ends the stream but keeps everything collected before it.
 */
import { createLogger, type Logger } from '../observability/logger.js';
import { incompleteStreams, pagesFetched } from '../observability/metrics.js';
import type { Page, PageFetcher } from '../fetchers/types.js';
import { CancelledError, type HarvestError, toHarvestError } from './errors.js';

export interface PaginatorOptions {
    /** Stream name used in logs, e.g. `playlistItems:PL123` */
    stream: string;
    /** Resource label for metrics, e.g. `playlistItems` */
    resource: string;
    signal?: AbortSignal;
    /** Start from this cursor instead of the first page */
    initialCursor?: string | null;
    /** Stop (incomplete) after this many pages */
    maxPages?: number;
    logger?: Logger;
}

export interface PaginationResult<T> {
    items: T[];
    pages: number;
    complete: boolean;
    failure?: HarvestError;
}

/**
 * Enforce the page invariant: no cursor, no more pages
 */
export function normalizePage<T>(page: Page<T>): Page<T> {
    const cursor = page.cursor === '' ? null : page.cursor;
    return {
        items: page.items,
        cursor,
        hasMore: page.hasMore && cursor !== null,
    };
}

export class CursorPaginator<T> implements AsyncIterable<Page<T>> {
    private readonly log: Logger;
    private started = false;
    private exhausted = false;
    private pageCount = 0;
    private stoppedBy: HarvestError | undefined;

    constructor(
        private readonly fetchPage: PageFetcher<T>,
        private readonly options: PaginatorOptions
    ) {
        this.log = (options.logger ?? createLogger({ component: 'paginator' })).child({ stream: options.stream });
    }

    get pages(): number {
        return this.pageCount;
    }

    /** True once the last page was reached without a failure */
    get complete(): boolean {
        return this.exhausted;
    }

    get failure(): HarvestError | undefined {
        return this.stoppedBy;
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<Page<T>, void, undefined> {
        if (this.started) {
            throw new Error(`Paginator for ${this.options.stream} has already been consumed`);
        }
        this.started = true;

        const { signal, maxPages } = this.options;
        let cursor: string | null = this.options.initialCursor ?? null;

        for (; ;) {
            if (signal?.aborted) {
                this.stop(new CancelledError(`Pagination of ${this.options.stream} cancelled`));
                return;
            }

            if (maxPages !== undefined && this.pageCount >= maxPages) {
                this.log.warn('Page limit reached, stopping early', { maxPages });
                incompleteStreams.inc({ resource: this.options.resource, reason: 'MaxPages' });
                return;
            }

            let page: Page<T>;
            try {
                page = normalizePage(await this.fetchPage(cursor));
            } catch (error) {
                this.stop(toHarvestError(error));
                return;
            }

            this.pageCount++;
            pagesFetched.inc({ resource: this.options.resource });
            this.log.debug('Page fetched', { page: this.pageCount, items: page.items.length, hasMore: page.hasMore });

            yield page;

            if (!page.hasMore) {
                this.exhausted = true;
                return;
            }
            cursor = page.cursor;
        }
    }

    /**
     * Consume the remaining pages and concatenate their items
     */
    async collect(): Promise<PaginationResult<T>> {
        const items: T[] = [];
        for await (const page of this) {
            items.push(...page.items);
        }
        return {
            items,
            pages: this.pageCount,
            complete: this.exhausted,
            failure: this.stoppedBy,
        };
    }

    private stop(failure: HarvestError): void {
        this.stoppedBy = failure;
        incompleteStreams.inc({ resource: this.options.resource, reason: failure.kind });
        this.log.warn('Pagination stopped, keeping partial results', {
            pages: this.pageCount,
            kind: failure.kind,
            reason: failure.message,
        });
    }
}

export function paginate<T>(fetchPage: PageFetcher<T>, options: PaginatorOptions): CursorPaginator<T> {
    return new CursorPaginator(fetchPage, options);
}
