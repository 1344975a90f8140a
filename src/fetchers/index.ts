/**
 * Source fetchers
 */
export { createYouTubeFetcher, toCommentThread, videoUrl } from './youtube.fetcher.js';
export type { YouTubeFetcher, YouTubeFetcherOptions } from './youtube.fetcher.js';
export { createGitHubFetcher, isGraphqlRateLimited, toCommentData, toGithubCommentRecord, UNKNOWN_AUTHOR } from './github.fetcher.js';
export type { GitHubFetcher, GitHubFetcherOptions } from './github.fetcher.js';
export type * from './types.js';
