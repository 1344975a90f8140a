/**
 * YouTube harvest
 * Direct videos and playlist members are fetched concurrently, each video
 * at most once, then merged: direct list first, playlists in the order
 * they were given
 */
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/index.js';
import { createLogger } from '../observability/logger.js';
import { runDuration } from '../observability/metrics.js';
import { createYouTubeFetcher, type YouTubeFetcher } from '../fetchers/youtube.fetcher.js';
import type { ContainerOutcome, EntityId, HarvestReport, VideoRecord } from '../fetchers/types.js';
import { aggregate, type SourceStream, type SourcedOutcome } from './aggregator.js';
import { InvalidInputError } from './errors.js';
import { assertEntityIds } from './input.js';
import { MemoizedResolver } from './memoized-resolver.js';
import { RateLimitRetryPolicy } from './retry-policy.js';

export interface YouTubeHarvestInput {
    apiKey: string;
    videoIds: readonly string[];
    playlistIds: readonly string[];
    signal?: AbortSignal;
}

export interface YouTubeHarvestDeps {
    policy?: RateLimitRetryPolicy;
    fetcher?: YouTubeFetcher;
    concurrency?: number;
}

export async function harvestYouTube(
    input: YouTubeHarvestInput,
    deps: YouTubeHarvestDeps = {}
): Promise<HarvestReport<VideoRecord>> {
    if (!input.apiKey) {
        throw new InvalidInputError('A YouTube API key is required');
    }
    const videoIds = assertEntityIds(input.videoIds, 'video');
    const playlistIds = assertEntityIds(input.playlistIds, 'playlist');

    const { signal } = input;
    const runId = uuidv4();
    const log = createLogger({ runId, api: 'youtube' });
    const startedAt = Date.now();

    const fetcher = deps.fetcher ?? createYouTubeFetcher({
        apiKey: input.apiKey,
        policy: deps.policy ?? new RateLimitRetryPolicy(),
    });

    const resolver = new MemoizedResolver<VideoRecord>(
        (id, context) => fetcher.fetchVideo(id, context, signal),
        {
            name: 'youtube-video',
            limit: pLimit(deps.concurrency ?? config.concurrency),
            logger: log.child({ component: 'resolver' }),
        }
    );

    const resolveTagged = async (id: EntityId): Promise<SourcedOutcome<VideoRecord>> => ({
        id,
        outcome: await resolver.resolve(id),
    });

    log.info('Starting YouTube harvest', { videos: videoIds.length, playlists: playlistIds.length });

    const directTask = Promise.all(videoIds.map(resolveTagged));

    const playlistTasks = playlistIds.map(async (playlistId) => {
        log.info(`Fetching videos from playlist ${playlistId}`, { containerId: playlistId });

        const paginator = fetcher.playlistVideoIds(playlistId, signal);
        const pending: Promise<SourcedOutcome<VideoRecord>>[] = [];
        for await (const page of paginator) {
            pending.push(...page.items.map(resolveTagged));
        }
        const results = await Promise.all(pending);

        log.info(`Found ${results.length} videos in playlist ${playlistId}`, { containerId: playlistId });

        const container: ContainerOutcome = {
            id: playlistId,
            ok: paginator.failure === undefined,
            discovered: results.length,
            complete: paginator.complete,
        };
        if (paginator.failure) container.reason = paginator.failure.message;

        return { playlistId, results, container };
    });

    const [direct, playlists] = await Promise.all([directTask, Promise.all(playlistTasks)]);

    const streams: SourceStream<VideoRecord>[] = [
        { source: 'videos', kind: 'direct', results: direct },
        ...playlists.map((playlist): SourceStream<VideoRecord> => ({
            source: `playlist:${playlist.playlistId}`,
            kind: 'container',
            results: playlist.results,
        })),
    ];

    const { entities, outcomes } = aggregate(streams, log.child({ component: 'aggregator' }));
    const durationMs = Date.now() - startedAt;
    runDuration.observe({ api: 'youtube' }, durationMs / 1000);

    log.info(`Processed ${entities.length} videos`, {
        durationMs,
        failed: outcomes.filter(outcome => !outcome.ok).length,
        fetches: resolver.fetchCount,
    });

    return {
        entities,
        outcomes,
        containers: playlists.map(playlist => playlist.container),
        durationMs,
    };
}
