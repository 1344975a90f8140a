/**
 * GitHub harvest
 * Issues and (optionally) discussions of one repository, fetched as two
 * independent streams. Directly requested node IDs come first.
 */
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/index.js';
import { createLogger, type Logger } from '../observability/logger.js';
import { runDuration } from '../observability/metrics.js';
import { createGitHubFetcher, type GitHubFetcher } from '../fetchers/github.fetcher.js';
import type {
    ContainerOutcome,
    DiscussionRecord,
    EntityId,
    HarvestReport,
    IssueRecord,
    Page,
} from '../fetchers/types.js';
import { aggregate, type SourcedOutcome } from './aggregator.js';
import { InvalidInputError } from './errors.js';
import { assertEntityIds, parseRepository, type RepositoryRef } from './input.js';
import { MemoizedResolver, type ResolveContext } from './memoized-resolver.js';
import type { CursorPaginator } from './paginator.js';
import { RateLimitRetryPolicy } from './retry-policy.js';

export interface GitHubHarvestInput {
    token: string;
    /** `owner/repo` */
    repository: string;
    labels?: readonly string[];
    /** Defaults to true when no labels are given */
    includeDiscussions?: boolean;
    issueIds?: readonly string[];
    discussionIds?: readonly string[];
    signal?: AbortSignal;
}

export interface GitHubHarvestDeps {
    policy?: RateLimitRetryPolicy;
    fetcher?: GitHubFetcher;
    concurrency?: number;
}

export interface GitHubHarvestResult {
    repository: RepositoryRef;
    labels: string[];
    includeDiscussions: boolean;
    issues: HarvestReport<IssueRecord>;
    discussions: HarvestReport<DiscussionRecord> | null;
}

interface StreamPlan<N extends { id: EntityId }, R> {
    kind: 'issues' | 'discussions';
    directIds: string[];
    pages: () => CursorPaginator<N>;
    load: (id: EntityId, seed: N | undefined, context: ResolveContext) => Promise<R>;
}

/**
 * Run one repository-scoped stream: direct IDs plus every node the
 * listing discovers, resolved through one memoized resolver
 */
async function harvestStream<N extends { id: EntityId }, R>(
    plan: StreamPlan<N, R>,
    repository: RepositoryRef,
    limit: ReturnType<typeof pLimit>,
    log: Logger
): Promise<HarvestReport<R>> {
    const startedAt = Date.now();
    const containerId = `${repository.owner}/${repository.name}`;
    const seeds = new Map<EntityId, N>();

    const resolver = new MemoizedResolver<R>(
        (id, context) => {
            const seed = seeds.get(id);
            seeds.delete(id);
            return plan.load(id, seed, context);
        },
        { name: `github-${plan.kind}`, limit, logger: log.child({ component: 'resolver' }) }
    );

    const resolveTagged = async (id: EntityId): Promise<SourcedOutcome<R>> => ({
        id,
        outcome: await resolver.resolve(id),
    });

    const directTask = Promise.all(plan.directIds.map(resolveTagged));

    const listingTask = (async () => {
        const paginator = plan.pages();
        const pending: Promise<SourcedOutcome<R>>[] = [];
        const discover = (page: Page<N>) => {
            for (const node of page.items) {
                if (resolver.state(node.id) === 'NotStarted') {
                    seeds.set(node.id, node);
                }
                pending.push(resolveTagged(node.id));
            }
        };
        for await (const page of paginator) {
            discover(page);
        }
        const results = await Promise.all(pending);

        const container: ContainerOutcome = {
            id: containerId,
            ok: paginator.failure === undefined,
            discovered: results.length,
            complete: paginator.complete,
        };
        if (paginator.failure) container.reason = paginator.failure.message;

        return { results, container };
    })();

    const [direct, listing] = await Promise.all([directTask, listingTask]);

    const { entities, outcomes } = aggregate<R>([
        { source: `${plan.kind}:direct`, kind: 'direct', results: direct },
        { source: `${plan.kind}:${containerId}`, kind: 'container', results: listing.results },
    ], log.child({ component: 'aggregator' }));

    const durationMs = Date.now() - startedAt;
    log.info(`Processed ${entities.length} ${plan.kind}`, {
        durationMs,
        failed: outcomes.filter(outcome => !outcome.ok).length,
        fetches: resolver.fetchCount,
    });

    return { entities, outcomes, containers: [listing.container], durationMs };
}

/**
 * Discussions are on unless labels narrow the run, or discussion IDs ask for them
 */
export function discussionsIncluded(
    flag: boolean | undefined,
    labels: readonly string[],
    discussionIds: readonly string[]
): boolean {
    return flag ?? (labels.length === 0 || discussionIds.length > 0);
}

export async function harvestGitHub(
    input: GitHubHarvestInput,
    deps: GitHubHarvestDeps = {}
): Promise<GitHubHarvestResult> {
    if (!input.token) {
        throw new InvalidInputError('A GitHub access token is required');
    }
    const repository = parseRepository(input.repository);
    const labels = [...(input.labels ?? [])];
    const issueIds = assertEntityIds(input.issueIds ?? [], 'issue');
    const discussionIds = assertEntityIds(input.discussionIds ?? [], 'discussion');
    const includeDiscussions = discussionsIncluded(input.includeDiscussions, labels, discussionIds);

    const { signal } = input;
    const runId = uuidv4();
    const log = createLogger({ runId, api: 'github', containerId: `${repository.owner}/${repository.name}` });
    const startedAt = Date.now();

    if (!includeDiscussions && discussionIds.length > 0) {
        log.warn('Discussions excluded, ignoring discussion IDs', { discussionIds });
    }

    const fetcher = deps.fetcher ?? createGitHubFetcher({
        token: input.token,
        policy: deps.policy ?? new RateLimitRetryPolicy(),
    });
    const limit = pLimit(deps.concurrency ?? config.concurrency);

    log.info('Starting GitHub harvest', {
        labels: labels.length > 0 ? labels : 'none',
        includeDiscussions,
    });

    const issuesTask = harvestStream({
        kind: 'issues',
        directIds: issueIds,
        pages: () => fetcher.issuePages(repository, labels, signal),
        load: (id, seed, context) => fetcher.loadIssue(id, seed, context, signal),
    }, repository, limit, log.child({ stream: 'issues' }));

    const discussionsTask = includeDiscussions
        ? harvestStream({
            kind: 'discussions',
            directIds: discussionIds,
            pages: () => fetcher.discussionPages(repository, signal),
            load: (id, seed, context) => fetcher.loadDiscussion(id, seed, context, signal),
        }, repository, limit, log.child({ stream: 'discussions' }))
        : Promise.resolve(null);

    const [issues, discussions] = await Promise.all([issuesTask, discussionsTask]);
    runDuration.observe({ api: 'github' }, (Date.now() - startedAt) / 1000);

    return { repository, labels, includeDiscussions, issues, discussions };
}
