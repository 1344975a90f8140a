/**
 * `github` command: dump open issues and discussions of a repository to JSON
 */
import { config } from '../config/index.js';
import { createLogger } from '../observability/logger.js';
import { discussionsOutputPath, issuesOutputPath, writeJson } from '../output/json-writer.js';
import { InvalidInputError } from '../services/errors.js';
import { discussionsIncluded, harvestGitHub, type GitHubHarvestDeps } from '../services/github-harvest.service.js';
import { parseRepository } from '../services/input.js';
import type { HarvestReport } from '../fetchers/types.js';
import { EXIT_INVALID_INPUT, dumpMetrics, exitCodeFor, logReport } from './summary.js';

const log = createLogger({ api: 'github', component: 'cli' });

export interface GitHubCommandOptions {
    token?: string;
    repository: string;
    labels?: string[];
    includeDiscussions?: boolean;
    issue?: string[];
    discussion?: string[];
    outputDir?: string;
}

export async function runGitHubCommand(
    options: GitHubCommandOptions,
    signal?: AbortSignal,
    deps: GitHubHarvestDeps = {}
): Promise<number> {
    const token = options.token ?? config.githubToken;
    if (!token) {
        log.error('A GitHub access token is required. Pass -t/--token or set GITHUB_TOKEN');
        return EXIT_INVALID_INPUT;
    }

    try {
        const target = parseRepository(options.repository);
        const requestedLabels = options.labels ?? [];
        log.info(`Repository: ${target.owner}/${target.name}`);
        log.info(requestedLabels.length > 0 ? `Labels: ${requestedLabels.join(', ')}` : 'No Labels specified.');
        log.info(`Including discussions: ${
            discussionsIncluded(options.includeDiscussions, requestedLabels, options.discussion ?? []) ? 'yes' : 'no'
        }`);

        const result = await harvestGitHub({
            token,
            repository: options.repository,
            labels: options.labels,
            includeDiscussions: options.includeDiscussions,
            issueIds: options.issue,
            discussionIds: options.discussion,
            signal,
        }, deps);

        const { repository, labels } = result;

        const reports: HarvestReport<unknown>[] = [result.issues];

        logReport(log, 'issues', result.issues);
        const issuesPath = issuesOutputPath(repository, labels, options.outputDir);
        await writeJson(issuesPath, result.issues.entities);
        log.info(`Issues and comments have been written to ${issuesPath}`);

        if (result.discussions) {
            reports.push(result.discussions);
            logReport(log, 'discussions', result.discussions);
            const discussionsPath = discussionsOutputPath(repository, options.outputDir);
            await writeJson(discussionsPath, result.discussions.entities);
            log.info(`Discussions have been written to ${discussionsPath}`);
        }

        await dumpMetrics(log);
        return exitCodeFor(reports);
    } catch (error) {
        if (error instanceof InvalidInputError) {
            log.error(error.message);
            return EXIT_INVALID_INPUT;
        }
        throw error;
    }
}
