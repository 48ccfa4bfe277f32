import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createWorkspace, removeWorkspace, runCli, writeRegistry, type TestWorkspace } from '../../helpers.js';
import { logger } from '../../../src/utils/logger.js';

describe('source-list', () => {
    let workspace: TestWorkspace;

    beforeEach(async () => {
        workspace = await createWorkspace();
    });

    afterEach(async () => {
        logger.setLevel('info');
        await removeWorkspace(workspace);
    });

    it('prints the local source on a fresh install', async () => {
        const output = await runCli(workspace, ['source-list']);

        expect(output).toEqual({ stdout: ['local = LOCAL'], stderr: [] });
    });

    it('prints every source in file order', async () => {
        await writeRegistry(workspace, 'local=LOCAL\ngitlab=https://gitlab.com\ngithub=https://github.com\n');

        const output = await runCli(workspace, ['source-list']);

        expect(output.stdout).toEqual([
            'local = LOCAL',
            'gitlab = https://gitlab.com',
            'github = https://github.com'
        ]);
    });

    it('traces the registry location with --verbose', async () => {
        const output = await runCli(workspace, ['--verbose', 'source-list']);

        expect(output.stderr[0]).toBe(`[DEBUG] Sources file: ${workspace.paths.file}`);
        expect(output.stdout).toEqual(['local = LOCAL']);
    });
});
