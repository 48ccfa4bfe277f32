import chalk from 'chalk';
import { loadOrCreateSources, removeSource, writeSources, type SourceRegistry } from '../sources.js';
import { getErrorMessage, isSourceError } from '../utils/errors.js';
import type { CommandContext } from './context.js';

export async function sourceRemoveCommand(source: string, context: CommandContext) {
    const { file } = context.paths;
    let sources: SourceRegistry;
    try {
        sources = removeSource(await loadOrCreateSources(file), source);
    } catch (error) {
        if (isSourceError(error, 'SOURCE_NOT_FOUND') || isSourceError(error, 'SOURCE_RESERVED')) {
            console.error(chalk.red(`Failed to remove source: "${source}" (${error.message})`));
        } else {
            console.error(chalk.red(`Failed to read sources: "${file}" (${getErrorMessage(error)})`));
        }
        return;
    }

    try {
        await writeSources(file, sources);
    } catch (error) {
        console.error(chalk.red(`An error occurred while trying to remove a source (${getErrorMessage(error)})`));
        return;
    }

    console.log(chalk.green(`Removed source: "${source}"`));
}
