/**
 * Prometheus metrics for harvest runs
 * Collected in-process; the CLI can dump them to METRICS_FILE after a run
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// ============================================================================
// HTTP METRICS
// ============================================================================

/**
 * Counter: Remote API requests by api and status code
 */
export const httpRequestsTotal = new client.Counter({
    name: 'harvest_http_requests_total',
    help: 'Total remote API requests',
    labelNames: ['api', 'status_code'] as const,
    registers: [registry],
});

/**
 * Counter: Rate limit responses received
 */
export const rateLimitHits = new client.Counter({
    name: 'harvest_rate_limit_hits_total',
    help: 'Number of rate limited responses',
    labelNames: ['api'] as const,
    registers: [registry],
});

/**
 * Counter: Retry attempts after a rate limit
 */
export const retryCount = new client.Counter({
    name: 'harvest_retry_count',
    help: 'Number of retry attempts',
    labelNames: ['api', 'attempt'] as const,
    registers: [registry],
});

// ============================================================================
// PAGINATION METRICS
// ============================================================================

/**
 * Counter: Pages consumed by resource
 */
export const pagesFetched = new client.Counter({
    name: 'harvest_pages_fetched_total',
    help: 'Total pages fetched',
    labelNames: ['resource'] as const,
    registers: [registry],
});

/**
 * Counter: Paginated streams that stopped before the last page
 */
export const incompleteStreams = new client.Counter({
    name: 'harvest_incomplete_streams_total',
    help: 'Paginated streams that stopped early',
    labelNames: ['resource', 'reason'] as const,
    registers: [registry],
});

// ============================================================================
// ENTITY METRICS
// ============================================================================

/**
 * Counter: Entity fetch outcomes by resolver
 */
export const entityOutcomes = new client.Counter({
    name: 'harvest_entity_outcomes_total',
    help: 'Entity fetches by resolver and outcome',
    labelNames: ['resolver', 'status'] as const,
    registers: [registry],
});

/**
 * Counter: Resolve calls served by an existing task
 */
export const memoHits = new client.Counter({
    name: 'harvest_memo_hits_total',
    help: 'Resolve calls that joined an existing fetch',
    labelNames: ['resolver'] as const,
    registers: [registry],
});

/**
 * Histogram: Harvest run duration in seconds
 */
export const runDuration = new client.Histogram({
    name: 'harvest_run_duration_seconds',
    help: 'Harvest run duration in seconds',
    labelNames: ['api'] as const,
    buckets: [1, 5, 10, 30, 60, 120, 300, 600, 1800],
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}
