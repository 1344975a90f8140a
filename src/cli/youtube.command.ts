/**
 * `youtube` command: dump comments of videos and playlists to JSON
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { config } from '../config/index.js';
import { createLogger } from '../observability/logger.js';
import { writeJson, youtubeOutputPath } from '../output/json-writer.js';
import { InvalidInputError } from '../services/errors.js';
import { harvestYouTube, type YouTubeHarvestDeps } from '../services/youtube-harvest.service.js';
import { EXIT_INVALID_INPUT, dumpMetrics, exitCodeFor, logReport } from './summary.js';

const log = createLogger({ api: 'youtube', component: 'cli' });

export interface YouTubeCommandOptions {
    key?: string;
    video?: string[];
    playlist?: string[];
    output?: string;
    file?: string;
}

export const youtubeInputFileSchema = z.object({
    videos: z.array(z.string()).default([]),
    playlists: z.array(z.string()).default([]),
});

export type YouTubeInputFile = z.infer<typeof youtubeInputFileSchema>;

/**
 * Read the `--file` JSON describing videos and playlists
 */
export async function readInputFile(filePath: string): Promise<YouTubeInputFile> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(filePath, 'utf8'));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new InvalidInputError(`Could not read input file ${filePath}: ${message}`);
    }

    const result = youtubeInputFileSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new InvalidInputError(`Invalid input file ${filePath}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
    }
    return result.data;
}

export async function runYouTubeCommand(
    options: YouTubeCommandOptions,
    signal?: AbortSignal,
    deps: YouTubeHarvestDeps = {}
): Promise<number> {
    const apiKey = options.key ?? config.youtubeApiKey;
    if (!apiKey) {
        log.error('A YouTube API key is required. Pass -k/--key or set YT_APIKEY');
        return EXIT_INVALID_INPUT;
    }

    let videoIds = options.video ?? [];
    let playlistIds = options.playlist ?? [];

    try {
        if (options.file) {
            log.info(`Config: ${options.file}`);
            const inputFile = await readInputFile(options.file);
            videoIds = inputFile.videos;
            playlistIds = inputFile.playlists;
        } else {
            log.info(playlistIds.length > 0 ? `Playlists: ${playlistIds.join(', ')}` : 'No playlists specified');
            log.info(videoIds.length > 0 ? `Videos: ${videoIds.join(', ')}` : 'No videos specified');
        }

        if (videoIds.length === 0 && playlistIds.length === 0) {
            throw new InvalidInputError('No videos, playlists or input file specified');
        }

        const report = await harvestYouTube({ apiKey, videoIds, playlistIds, signal }, deps);
        logReport(log, 'videos', report);

        if (report.entities.length > 0) {
            const outputPath = youtubeOutputPath(options.output);
            await writeJson(outputPath, report.entities);
            log.info(`Wrote output to ${outputPath}`);
        } else {
            log.info('No videos processed.');
        }

        await dumpMetrics(log);
        return exitCodeFor([report]);
    } catch (error) {
        if (error instanceof InvalidInputError) {
            log.error(error.message);
            return EXIT_INVALID_INPUT;
        }
        throw error;
    }
}
