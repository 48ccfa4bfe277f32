import chalk from 'chalk';
import fs from 'fs-extra';
import { getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CommandContext } from './context.js';

async function isDirectory(target: string): Promise<boolean> {
    if (!await fs.pathExists(target)) return false;
    const stat = await fs.stat(target);
    return stat.isDirectory();
}

export async function resetCommand(options: { force?: boolean }, context: CommandContext) {
    if (!options.force) {
        const confirmed = await context.confirm('Perform a reset operation?');
        if (!confirmed) {
            logger.debug('Reset declined');
            return;
        }
    }

    // Each directory is wiped on its own; one failure does not stop the rest
    const directories = [context.paths.dir];
    for (const directory of directories) {
        if (!await isDirectory(directory)) {
            console.log(chalk.yellow(`Skipped: "${directory}" (already wiped)`));
            continue;
        }

        try {
            await fs.remove(directory);
            console.log(chalk.green(`Wiped: "${directory}"`));
        } catch (error) {
            console.error(chalk.red(`Wipe failed: "${directory}" (${getErrorMessage(error)})`));
        }
    }
}
