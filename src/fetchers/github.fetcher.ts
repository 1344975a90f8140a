/**
 * GitHub GraphQL Fetcher
 * Pages through repository issues and discussions and completes comment
 * connections that overflow the first page
 */
import type { z } from 'zod';
import { config } from '../config/index.js';
import { createLogger } from '../observability/logger.js';
import { MalformedResponseError, NotFoundError } from '../services/errors.js';
import type { RepositoryRef } from '../services/input.js';
import type { ResolveContext } from '../services/memoized-resolver.js';
import { paginate, type CursorPaginator } from '../services/paginator.js';
import type { RateLimitRetryPolicy, RetryBudget } from '../services/retry-policy.js';
import { flattenThreads } from '../services/tree-flattener.js';
import { GITHUB_QUERIES, type GithubQueryName } from './github.queries.js';
import {
    discussionCommentsPageSchema,
    discussionNodeSchema,
    discussionsPageSchema,
    graphqlEnvelopeSchema,
    issueCommentsPageSchema,
    issueNodeSchema,
    issuesPageSchema,
    parseResponse,
    repliesPageSchema,
    typedNodeSchema,
    type DiscussionComment,
    type DiscussionNode,
    type GithubComment,
    type IssueNode,
    type PageInfo,
} from './schemas.js';
import type {
    CommentData,
    CommentNode,
    DiscussionRecord,
    EntityId,
    GithubCommentRecord,
    IssueRecord,
    Page,
    PageFetcher,
} from './types.js';

const log = createLogger({ api: 'github' });

// Placeholder author for deleted accounts
export const UNKNOWN_AUTHOR = '??';

export interface GitHubFetcherOptions {
    token: string;
    policy: RateLimitRetryPolicy;
    endpoint?: string;
    userAgent?: string;
}

export interface GitHubFetcher {
    issuePages(repository: RepositoryRef, labels: readonly string[], signal?: AbortSignal): CursorPaginator<IssueNode>;
    discussionPages(repository: RepositoryRef, signal?: AbortSignal): CursorPaginator<DiscussionNode>;
    /** Build the record from `seed` when the listing already returned it, else fetch the node */
    loadIssue(id: EntityId, seed: IssueNode | undefined, context: ResolveContext, signal?: AbortSignal): Promise<IssueRecord>;
    loadDiscussion(id: EntityId, seed: DiscussionNode | undefined, context: ResolveContext, signal?: AbortSignal): Promise<DiscussionRecord>;
}

interface Connection<T> {
    nodes: T[];
    pageInfo: PageInfo;
}

function toUtc(timestamp: string): string {
    return new Date(timestamp).toISOString();
}

export function toCommentData(comment: GithubComment): CommentData {
    return {
        id: comment.id,
        author: comment.author?.login ?? UNKNOWN_AUTHOR,
        text: comment.body,
        publishedAt: toUtc(comment.createdAt),
        url: comment.url,
    };
}

/**
 * Flat comment node -> on-disk GitHub comment (`content`, `createdAt`)
 */
export function toGithubCommentRecord(node: CommentNode): GithubCommentRecord {
    return Object.freeze({
        id: node.id,
        ...(node.parentId !== undefined ? { parentId: node.parentId } : {}),
        author: node.author,
        content: node.text,
        createdAt: node.publishedAt,
        url: node.url ?? '',
    });
}

function connectionPage<T>(connection: Connection<T>): Page<T> {
    return {
        items: connection.nodes,
        cursor: connection.pageInfo.endCursor,
        hasMore: connection.pageInfo.hasNextPage,
    };
}

/**
 * Secondary rate limits arrive as HTTP 200 with a RATE_LIMITED error
 */
export function isGraphqlRateLimited(payload: unknown): boolean {
    const result = graphqlEnvelopeSchema.safeParse(payload);
    return result.success && (result.data.errors ?? []).some(error => error.type === 'RATE_LIMITED');
}

export function createGitHubFetcher(options: GitHubFetcherOptions): GitHubFetcher {
    const endpoint = options.endpoint ?? config.githubGraphqlUrl;
    const userAgent = options.userAgent ?? config.userAgent;
    const { policy } = options;

    async function graphql<S extends z.ZodTypeAny>(
        name: GithubQueryName,
        variables: Record<string, unknown>,
        schema: S,
        budget: RetryBudget,
        signal?: AbortSignal
    ): Promise<z.output<S>> {
        const payload = await policy.execute({
            api: 'github',
            url: endpoint,
            method: 'POST',
            headers: {
                'Authorization': `Bearer ${options.token}`,
                'Content-Type': 'application/json',
                'Accept': 'application/json',
                'User-Agent': userAgent,
            },
            body: JSON.stringify({ query: GITHUB_QUERIES[name], variables }),
            isRateLimitedPayload: isGraphqlRateLimited,
        }, budget, signal);

        const envelope = parseResponse(graphqlEnvelopeSchema, payload, `GraphQL ${name}`);
        const errors = envelope.errors ?? [];
        if (errors.length > 0) {
            const notFound = errors.find(error => error.type === 'NOT_FOUND');
            if (notFound) {
                throw new NotFoundError(notFound.message);
            }
            const messages = errors.map(error => error.message).join('; ');
            if (envelope.data === undefined || envelope.data === null) {
                throw new MalformedResponseError(`GraphQL ${name} failed: ${messages}`);
            }
            log.warn('GraphQL response carried errors', { query: name, stream: budget.stream, errors: messages });
        }

        return parseResponse(schema, envelope.data, `GraphQL ${name}`);
    }

    async function fetchNode<S extends z.ZodTypeAny>(
        query: 'issue' | 'discussion',
        typename: 'Issue' | 'Discussion',
        schema: S,
        id: EntityId,
        signal?: AbortSignal
    ): Promise<z.output<S>> {
        const budget = policy.createBudget(`${query}:${id}`);
        const data = await graphql(query, { id }, typedNodeSchema, budget, signal);

        if (!data.node) {
            throw new NotFoundError(`${typename} ${id} not found`);
        }
        if (data.node.__typename !== typename) {
            throw new NotFoundError(`${id} is a ${data.node.__typename}, not a ${typename}`);
        }
        return parseResponse(schema, data.node, typename);
    }

    /**
     * Walk the rest of a connection whose first page came inline
     */
    async function remaining<T>(
        resource: string,
        ownerId: EntityId,
        inline: Connection<T>,
        fetchPage: (budget: RetryBudget) => PageFetcher<T>,
        context: ResolveContext,
        signal?: AbortSignal
    ): Promise<T[]> {
        const { hasNextPage, endCursor } = inline.pageInfo;
        if (!hasNextPage || !endCursor) {
            return inline.nodes;
        }

        const stream = `${resource}:${ownerId}`;
        const result = await paginate(fetchPage(policy.createBudget(stream)), {
            stream,
            resource,
            signal,
            initialCursor: endCursor,
            logger: log.child({ entityId: ownerId }),
        }).collect();

        if (result.failure) {
            context.warn(`${resource} of ${ownerId} incomplete: ${result.failure.message}`);
        }
        return [...inline.nodes, ...result.items];
    }

    async function discussionThread(comment: DiscussionComment, context: ResolveContext, signal?: AbortSignal) {
        const replies = await remaining<GithubComment>('commentReplies', comment.id, comment.replies, (budget) => async (cursor) => {
            const data = await graphql('commentReplies', { id: comment.id, after: cursor }, repliesPageSchema, budget, signal);
            if (!data.node) throw new NotFoundError(`Discussion comment ${comment.id} not found`);
            return connectionPage(data.node.replies);
        }, context, signal);

        return {
            comment: toCommentData(comment),
            replies: replies.map(reply => ({ comment: toCommentData(reply) })),
        };
    }

    return {
        issuePages(repository, labels, signal) {
            const { owner, name } = repository;
            const stream = `issues:${owner}/${name}`;
            const budget = policy.createBudget(stream);

            return paginate<IssueNode>(async (cursor) => {
                const data = await graphql('issues', {
                    owner,
                    name,
                    after: cursor,
                    labels: labels.length > 0 ? labels : null,
                }, issuesPageSchema, budget, signal);

                if (!data.repository) {
                    throw new NotFoundError(`Repository ${owner}/${name} not found`);
                }
                return connectionPage(data.repository.issues);
            }, {
                stream,
                resource: 'issues',
                signal,
                logger: log.child({ containerId: `${owner}/${name}` }),
            });
        },

        discussionPages(repository, signal) {
            const { owner, name } = repository;
            const stream = `discussions:${owner}/${name}`;
            const budget = policy.createBudget(stream);

            return paginate<DiscussionNode>(async (cursor) => {
                const data = await graphql('discussions', { owner, name, after: cursor }, discussionsPageSchema, budget, signal);

                if (!data.repository) {
                    throw new NotFoundError(`Repository ${owner}/${name} not found`);
                }
                return connectionPage(data.repository.discussions);
            }, {
                stream,
                resource: 'discussions',
                signal,
                logger: log.child({ containerId: `${owner}/${name}` }),
            });
        },

        async loadIssue(id, seed, context, signal) {
            const issue: IssueNode = seed ?? await fetchNode('issue', 'Issue', issueNodeSchema, id, signal);
            log.info(`Processing issue ${issue.title} (${issue.url})`, { entityId: id });

            const comments = await remaining<GithubComment>('issueComments', id, issue.comments, (budget) => async (cursor) => {
                const data = await graphql('issueComments', { id, after: cursor }, issueCommentsPageSchema, budget, signal);
                if (!data.node) throw new NotFoundError(`Issue ${id} not found`);
                return connectionPage(data.node.comments);
            }, context, signal);

            return {
                id: issue.id,
                title: issue.title,
                url: issue.url,
                body: issue.body,
                createdAt: toUtc(issue.createdAt),
                lastUpdated: toUtc(issue.updatedAt),
                upvotes: issue.reactions?.totalCount ?? 0,
                labels: Object.freeze(issue.labels?.nodes.map(label => label.name) ?? []),
                comments: Object.freeze(
                    flattenThreads(comments.map(comment => ({ comment: toCommentData(comment) }))).map(toGithubCommentRecord)
                ),
            };
        },

        async loadDiscussion(id, seed, context, signal) {
            const discussion: DiscussionNode = seed ?? await fetchNode('discussion', 'Discussion', discussionNodeSchema, id, signal);
            log.info(`Processing discussion ${discussion.title} (${discussion.url})`, { entityId: id });

            const comments = await remaining<DiscussionComment>('discussionComments', id, discussion.comments, (budget) => async (cursor) => {
                const data = await graphql('discussionComments', { id, after: cursor }, discussionCommentsPageSchema, budget, signal);
                if (!data.node) throw new NotFoundError(`Discussion ${id} not found`);
                return connectionPage(data.node.comments);
            }, context, signal);

            const threads = await Promise.all(comments.map(comment => discussionThread(comment, context, signal)));

            return {
                id: discussion.id,
                title: discussion.title,
                url: discussion.url,
                answerId: discussion.answer?.id ?? null,
                comments: Object.freeze(flattenThreads(threads).map(toGithubCommentRecord)),
            };
        },
    };
}
