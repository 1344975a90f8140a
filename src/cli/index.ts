#!/usr/bin/env node
/**
 * feedback-harvester CLI
 *
 * youtube: comments of videos and playlist members -> comments.json
 * github:  open issues and discussions of a repository -> issues_*.json, discussions_*.json
 */
import { Command } from 'commander';
import { config, getRedactedConfig } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { runGitHubCommand, type GitHubCommandOptions } from './github.command.js';
import { runYouTubeCommand, type YouTubeCommandOptions } from './youtube.command.js';
import { EXIT_ALL_FAILED } from './summary.js';

const controller = new AbortController();

process.on('SIGINT', () => {
    if (controller.signal.aborted) {
        process.exit(130);
    }
    logger.warn('Received SIGINT, cancelling harvest (press again to force quit)');
    controller.abort();
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(EXIT_ALL_FAILED);
});

function buildProgram(): Command {
    const program = new Command();

    program
        .name('feedback-harvester')
        .description('Harvest user feedback from YouTube comments and GitHub issues/discussions')
        .version('0.1.0');

    program
        .command('youtube')
        .description('Fetch comment threads of videos and playlists')
        .option('-k, --key <key>', 'YouTube Data API key (defaults to YT_APIKEY)')
        .option('-v, --video <ids...>', 'video IDs')
        .option('-p, --playlist <ids...>', 'playlist IDs')
        .option('-o, --output <file>', 'output file (defaults to comments.json)')
        .option('-f, --file <file>', 'JSON file with { "videos": [], "playlists": [] }; replaces -v and -p')
        .action(async (options: YouTubeCommandOptions) => {
            process.exitCode = await runYouTubeCommand(options, controller.signal);
        });

    program
        .command('github')
        .description('Fetch open issues and discussions of a repository')
        .requiredOption('-r, --repository <owner/repo>', 'repository to read')
        .option('-t, --token <token>', 'GitHub access token (defaults to GITHUB_TOKEN)')
        .option('-l, --labels <labels...>', 'only issues carrying any of these labels')
        .option('-d, --include-discussions', 'also fetch discussions (default when no labels are given)')
        .option('--no-include-discussions', 'skip discussions')
        .option('--issue <ids...>', 'issue node IDs to fetch directly')
        .option('--discussion <ids...>', 'discussion node IDs to fetch directly')
        .option('-o, --output-dir <dir>', 'directory for the output files (defaults to cwd)')
        .action(async (options: GitHubCommandOptions) => {
            process.exitCode = await runGitHubCommand(options, controller.signal);
        });

    return program;
}

async function main(): Promise<void> {
    logger.debug('Configuration loaded', getRedactedConfig(config));

    try {
        await buildProgram().parseAsync(process.argv);
    } catch (error) {
        logger.error('Harvest failed', error);
        process.exitCode = EXIT_ALL_FAILED;
    }
}

void main();
