/**
 * Output path and JSON writer tests
 */
import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
    discussionsOutputPath,
    issuesOutputPath,
    writeJson,
    youtubeOutputPath,
} from '../../src/output/json-writer.js';

const repository = { owner: 'acme', name: 'widgets' };

describe('output paths', () => {
    it('defaults the YouTube output to comments.json in cwd', () => {
        expect(youtubeOutputPath(undefined, '/work')).toBe(path.join('/work', 'comments.json'));
    });

    it('resolves a relative YouTube output against cwd', () => {
        expect(youtubeOutputPath('out/videos.json', '/work')).toBe(path.resolve('/work', 'out/videos.json'));
        expect(youtubeOutputPath('/tmp/abs.json', '/work')).toBe(path.resolve('/tmp/abs.json'));
    });

    it('names issue files after repository and labels', () => {
        expect(issuesOutputPath(repository, ['bug', 'help wanted'], '/out')).toBe(
            path.join('/out', 'issues_acme_widgets_bug_help-wanted_output.json')
        );
        expect(issuesOutputPath(repository, [], '/out')).toBe(path.join('/out', 'issues_acme_widgets_all_output.json'));
    });

    it('names discussion files after the repository', () => {
        expect(discussionsOutputPath(repository, '/out')).toBe(path.join('/out', 'discussions_acme_widgets_output.json'));
    });
});

describe('writeJson', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await rm(dir, { recursive: true, force: true });
        dir = undefined;
    });

    it('creates missing directories and writes indented JSON', async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'harvest-'));
        const target = path.join(dir, 'nested', 'comments.json');

        await writeJson(target, [{ id: 'A', comments: [] }]);

        expect(await readFile(target, 'utf8')).toBe('[\n  {\n    "id": "A",\n    "comments": []\n  }\n]\n');
    });
});
