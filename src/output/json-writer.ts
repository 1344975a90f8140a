/**
 * JSON output for harvest results
 */
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { RepositoryRef } from '../services/input.js';

export const DEFAULT_YOUTUBE_OUTPUT = 'comments.json';

/**
 * `--output` resolved against cwd, or comments.json in cwd
 */
export function youtubeOutputPath(output: string | undefined, cwd: string = process.cwd()): string {
    return output ? path.resolve(cwd, output) : path.join(cwd, DEFAULT_YOUTUBE_OUTPUT);
}

export function issuesOutputPath(repository: RepositoryRef, labels: readonly string[], dir: string = process.cwd()): string {
    // Labels may contain spaces, colons or slashes
    const labelsPart = labels.length > 0 ? labels.join('_').replace(/[^\w.-]+/g, '-') : 'all';
    return path.join(dir, `issues_${repository.owner}_${repository.name}_${labelsPart}_output.json`);
}

export function discussionsOutputPath(repository: RepositoryRef, dir: string = process.cwd()): string {
    return path.join(dir, `discussions_${repository.owner}_${repository.name}_output.json`);
}

/**
 * Serialize `data` to `filePath`, creating parent directories
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
}
