/**
 * Run summaries and exit codes shared by the CLI commands
 */
import { writeFile } from 'fs/promises';
import { config } from '../config/index.js';
import type { Logger } from '../observability/logger.js';
import { getMetrics } from '../observability/metrics.js';
import type { HarvestReport } from '../fetchers/types.js';

export const EXIT_OK = 0;
export const EXIT_ALL_FAILED = 1;
export const EXIT_INVALID_INPUT = 2;

export interface ReportCounts {
    succeeded: number;
    failed: number;
    containersFailed: number;
}

export function countReport(report: HarvestReport<unknown>): ReportCounts {
    return {
        succeeded: report.entities.length,
        failed: report.outcomes.filter(outcome => !outcome.ok).length,
        containersFailed: report.containers.filter(container => !container.ok).length,
    };
}

/**
 * 1 when something was attempted and nothing came back, else 0
 */
export function exitCodeFor(reports: readonly HarvestReport<unknown>[]): number {
    const totals = reports.map(countReport).reduce(
        (sum, counts) => ({
            succeeded: sum.succeeded + counts.succeeded,
            failed: sum.failed + counts.failed,
            containersFailed: sum.containersFailed + counts.containersFailed,
        }),
        { succeeded: 0, failed: 0, containersFailed: 0 }
    );

    if (totals.succeeded === 0 && (totals.failed > 0 || totals.containersFailed > 0)) {
        return EXIT_ALL_FAILED;
    }
    return EXIT_OK;
}

export function logReport(log: Logger, label: string, report: HarvestReport<unknown>): void {
    const counts = countReport(report);

    for (const outcome of report.outcomes) {
        if (!outcome.ok) {
            log.warn(`Failed to fetch ${outcome.id}`, { reason: outcome.reason });
        } else if (outcome.reason) {
            log.warn(`Partial data for ${outcome.id}`, { reason: outcome.reason });
        }
    }
    for (const container of report.containers) {
        if (!container.complete) {
            log.warn(`Container ${container.id} was not read to the end`, {
                discovered: container.discovered,
                reason: container.reason,
            });
        }
    }

    log.info(`Processed ${counts.succeeded} ${label} in ${(report.durationMs / 1000).toFixed(1)}s`, { ...counts });
}

/**
 * Dump the metrics registry when METRICS_FILE is configured
 */
export async function dumpMetrics(log: Logger): Promise<void> {
    if (!config.metricsFile) return;

    await writeFile(config.metricsFile, await getMetrics(), 'utf8');
    log.info(`Metrics written to ${config.metricsFile}`);
}
