/**
 * Aggregator
 * Merges direct and container-discovered result streams into the final
 * collection: failures dropped, first-seen wins, ordered by where each
 * stream was declared rather than when its fetches finished.
 */
import { createLogger, type Logger } from '../observability/logger.js';
import type { EntityId, EntityOutcome, FetchOutcome } from '../fetchers/types.js';

export interface SourcedOutcome<T> {
    id: EntityId;
    outcome: FetchOutcome<T>;
}

export interface SourceStream<T> {
    /** e.g. `videos` or `playlist:PL123` */
    source: string;
    kind: 'direct' | 'container';
    results: readonly SourcedOutcome<T>[];
}

export interface AggregateResult<T> {
    entities: T[];
    outcomes: EntityOutcome[];
}

/**
 * Direct streams first, then containers; each group keeps submission order
 */
function orderStreams<T>(streams: readonly SourceStream<T>[]): SourceStream<T>[] {
    return [
        ...streams.filter(stream => stream.kind === 'direct'),
        ...streams.filter(stream => stream.kind === 'container'),
    ];
}

export function aggregate<T>(
    streams: readonly SourceStream<T>[],
    logger: Logger = createLogger({ component: 'aggregator' })
): AggregateResult<T> {
    const entities: T[] = [];
    const accepted = new Set<EntityId>();
    const order: EntityId[] = [];
    const failures = new Map<EntityId, string>();
    const warnings = new Map<EntityId, string>();

    for (const stream of orderStreams(streams)) {
        for (const { id, outcome } of stream.results) {
            if (!accepted.has(id) && !failures.has(id)) {
                order.push(id);
            }

            if (!outcome.ok) {
                if (!failures.has(id)) {
                    failures.set(id, outcome.error.message);
                    logger.warn('Dropping failed entity', {
                        entityId: id,
                        source: stream.source,
                        kind: outcome.error.kind,
                        reason: outcome.error.message,
                    });
                }
                continue;
            }

            if (accepted.has(id)) {
                continue;
            }

            accepted.add(id);
            if (outcome.warnings.length > 0) {
                warnings.set(id, outcome.warnings.join('; '));
            }
            Object.freeze(outcome.value);
            entities.push(outcome.value);
        }
    }

    const outcomes = order.map((id): EntityOutcome => {
        if (accepted.has(id)) {
            const warning = warnings.get(id);
            return warning ? { id, ok: true, reason: warning } : { id, ok: true };
        }
        return { id, ok: false, reason: failures.get(id) };
    });

    logger.debug('Aggregated streams', {
        streams: streams.length,
        entities: entities.length,
        failed: outcomes.length - entities.length,
    });

    return { entities, outcomes };
}
