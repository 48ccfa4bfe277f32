import chalk from 'chalk';
import { loadOrCreateSources } from '../sources.js';
import { getErrorMessage } from '../utils/errors.js';
import type { CommandContext } from './context.js';

export async function sourceListCommand(context: CommandContext) {
    const { file } = context.paths;
    try {
        const sources = await loadOrCreateSources(file);
        for (const [name, url] of Object.entries(sources)) {
            console.log(`${chalk.bold(name)} = ${url}`);
        }
    } catch (error) {
        console.error(chalk.red(`Failed to read sources: "${file}" (${getErrorMessage(error)})`));
    }
}
