/**
 * feedback-harvester
 *
 * Library entry point. The CLI lives in ./cli/index.ts.
 */
export * from './fetchers/index.js';
export * from './services/errors.js';
export { aggregate } from './services/aggregator.js';
export type { AggregateResult, SourceStream, SourcedOutcome } from './services/aggregator.js';
export { CursorPaginator, normalizePage, paginate } from './services/paginator.js';
export type { PaginationResult, PaginatorOptions } from './services/paginator.js';
export { MemoizedResolver } from './services/memoized-resolver.js';
export type { EntityLoader, FetchState, MemoizedResolverOptions, ResolveContext } from './services/memoized-resolver.js';
export { RateLimitRetryPolicy, RetryBudget, isRateLimitStatus, parseRetryAfter } from './services/retry-policy.js';
export type { HttpRequest, RetryPolicyOptions, Sleep } from './services/retry-policy.js';
export { flattenThreads } from './services/tree-flattener.js';
export { assertEntityIds, parseRepository } from './services/input.js';
export type { RepositoryRef } from './services/input.js';
export { harvestYouTube } from './services/youtube-harvest.service.js';
export type { YouTubeHarvestDeps, YouTubeHarvestInput } from './services/youtube-harvest.service.js';
export { harvestGitHub } from './services/github-harvest.service.js';
export type { GitHubHarvestDeps, GitHubHarvestInput, GitHubHarvestResult } from './services/github-harvest.service.js';
export { discussionsOutputPath, issuesOutputPath, writeJson, youtubeOutputPath } from './output/json-writer.js';
