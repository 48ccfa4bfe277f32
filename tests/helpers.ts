import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { vi } from 'vitest';
import { createProgram } from '../src/cli.js';
import { resolveSourcePaths, type SourcePaths } from '../src/config.js';
import type { Confirm } from '../src/utils/prompt.js';

export interface TestWorkspace {
    root: string;
    paths: SourcePaths;
}

export async function createWorkspace(): Promise<TestWorkspace> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'srcgen-cli-'));
    return { root, paths: resolveSourcePaths(path.join(root, 'config')) };
}

export async function removeWorkspace(workspace: TestWorkspace): Promise<void> {
    await fs.rm(workspace.root, { recursive: true, force: true });
}

export async function writeRegistry(workspace: TestWorkspace, content: string): Promise<void> {
    await fs.mkdir(workspace.paths.dir, { recursive: true });
    await fs.writeFile(workspace.paths.file, content);
}

export async function readRegistry(workspace: TestWorkspace): Promise<string> {
    return fs.readFile(workspace.paths.file, 'utf8');
}

export async function exists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch {
        return false;
    }
}

/**
 * Runs one CLI invocation and captures what it printed.
 */
export async function runCli(
    workspace: TestWorkspace,
    args: string[],
    confirm: Confirm = async () => false
): Promise<{ stdout: string[]; stderr: string[] }> {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const log = vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
        stdout.push(parts.map(String).join(' '));
    });
    const error = vi.spyOn(console, 'error').mockImplementation((...parts: unknown[]) => {
        stderr.push(parts.map(String).join(' '));
    });

    try {
        const program = createProgram({ paths: workspace.paths, confirm });
        await program.parseAsync(['node', 'srcgen', ...args]);
    } finally {
        log.mockRestore();
        error.mockRestore();
    }

    return { stdout, stderr };
}
