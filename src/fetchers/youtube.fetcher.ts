/**
 * YouTube Data API v3 Fetcher
 * Enumerates playlists and fetches videos with their full comment threads
 */
import { config } from '../config/index.js';
import { createLogger } from '../observability/logger.js';
import { NotFoundError } from '../services/errors.js';
import type { ResolveContext } from '../services/memoized-resolver.js';
import { paginate, type CursorPaginator } from '../services/paginator.js';
import type { HttpRequest, RateLimitRetryPolicy, RetryBudget } from '../services/retry-policy.js';
import { flattenThreads } from '../services/tree-flattener.js';
import {
    commentThreadListSchema,
    parseResponse,
    playlistItemListSchema,
    videoListSchema,
    type CommentThreadList,
    type YouTubeComment,
} from './schemas.js';
import type { CommentData, CommentThread, EntityId, VideoRecord } from './types.js';

const log = createLogger({ api: 'youtube' });

const PLAYLIST_PAGE_SIZE = 50;
const COMMENT_PAGE_SIZE = 100;

// 403 reasons that will not go away by waiting
const PERMANENT_FORBIDDEN_REASONS = /"reason"\s*:\s*"(commentsDisabled|forbidden|playlistItemsNotAccessible|channelClosed|channelSuspended)"/;

export interface YouTubeFetcherOptions {
    apiKey: string;
    policy: RateLimitRetryPolicy;
    baseUrl?: string;
    userAgent?: string;
}

export interface YouTubeFetcher {
    playlistVideoIds(playlistId: string, signal?: AbortSignal): CursorPaginator<EntityId>;
    fetchVideo(videoId: EntityId, context: ResolveContext, signal?: AbortSignal): Promise<VideoRecord>;
}

export function videoUrl(videoId: EntityId): string {
    return `https://www.youtube.com/watch?v=${videoId}`;
}

function toCommentData(comment: YouTubeComment): CommentData {
    return {
        id: comment.id,
        author: comment.snippet.authorDisplayName,
        text: comment.snippet.textDisplay,
        publishedAt: comment.snippet.publishedAt,
    };
}

/**
 * Comment thread → top-level comment plus its replies.
 * Replies hang off the top-level comment, whose ID equals the thread ID.
 */
export function toCommentThread(item: CommentThreadList['items'][number]): CommentThread {
    return {
        comment: toCommentData(item.snippet.topLevelComment),
        replies: (item.replies?.comments ?? []).map(reply => ({ comment: toCommentData(reply) })),
    };
}

export function createYouTubeFetcher(options: YouTubeFetcherOptions): YouTubeFetcher {
    const baseUrl = options.baseUrl ?? config.youtubeApiBase;
    const userAgent = options.userAgent ?? config.userAgent;
    const { policy } = options;

    function buildRequest(resource: string, params: Record<string, string | undefined>): HttpRequest {
        const url = new URL(`${baseUrl}/${resource}`);
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) url.searchParams.set(key, value);
        }
        url.searchParams.set('key', options.apiKey);

        return {
            api: 'youtube',
            url: url.toString(),
            headers: {
                'Accept': 'application/json',
                'User-Agent': userAgent,
            },
            isPermanentForbidden: (body) => PERMANENT_FORBIDDEN_REASONS.test(body),
        };
    }

    async function get(
        resource: string,
        params: Record<string, string | undefined>,
        budget: RetryBudget,
        signal?: AbortSignal
    ): Promise<unknown> {
        return policy.execute(buildRequest(resource, params), budget, signal);
    }

    async function fetchVideoInfo(videoId: EntityId, signal?: AbortSignal): Promise<{ title: string; uploadDate: string }> {
        const budget = policy.createBudget(`videos:${videoId}`);
        const payload = await get('videos', { part: 'snippet', id: videoId }, budget, signal);
        const data = parseResponse(videoListSchema, payload, 'videos');

        const video = data.items[0];
        if (!video) {
            throw new NotFoundError(`Video ${videoId} not found`);
        }

        return { title: video.snippet.title, uploadDate: video.snippet.publishedAt };
    }

    return {
        playlistVideoIds(playlistId, signal) {
            const budget = policy.createBudget(`playlistItems:${playlistId}`);

            return paginate<EntityId>(async (cursor) => {
                const payload = await get('playlistItems', {
                    part: 'snippet',
                    maxResults: String(PLAYLIST_PAGE_SIZE),
                    playlistId,
                    pageToken: cursor ?? undefined,
                }, budget, signal);
                const data = parseResponse(playlistItemListSchema, payload, 'playlistItems');

                const ids: EntityId[] = [];
                for (const item of data.items) {
                    const videoId = item.snippet?.resourceId?.videoId;
                    if (videoId) ids.push(videoId);
                }

                const next = data.nextPageToken ?? null;
                return { items: ids, cursor: next, hasMore: next !== null };
            }, {
                stream: `playlistItems:${playlistId}`,
                resource: 'playlistItems',
                signal,
                logger: log.child({ containerId: playlistId }),
            });
        },

        async fetchVideo(videoId, context, signal) {
            const videoLog = log.child({ entityId: videoId });
            videoLog.info(`Processing video ${videoId}`);

            const info = await fetchVideoInfo(videoId, signal);
            videoLog.info(`Video title: ${info.title}`);

            const budget = policy.createBudget(`commentThreads:${videoId}`);
            const threads = await paginate<CommentThread>(async (cursor) => {
                const payload = await get('commentThreads', {
                    part: 'snippet,replies',
                    videoId,
                    maxResults: String(COMMENT_PAGE_SIZE),
                    pageToken: cursor ?? undefined,
                }, budget, signal);
                const data = parseResponse(commentThreadListSchema, payload, 'commentThreads');

                const next = data.nextPageToken ?? null;
                return { items: data.items.map(toCommentThread), cursor: next, hasMore: next !== null };
            }, {
                stream: `commentThreads:${videoId}`,
                resource: 'commentThreads',
                signal,
                logger: videoLog,
            }).collect();

            if (threads.failure) {
                context.warn(`Comments incomplete after ${threads.pages} page(s): ${threads.failure.message}`);
            }

            return {
                id: videoId,
                title: info.title,
                url: videoUrl(videoId),
                uploadDate: info.uploadDate,
                comments: Object.freeze(flattenThreads(threads.items)),
            };
        },
    };
}
