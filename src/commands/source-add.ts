import chalk from 'chalk';
import { addSource, isValidSourceName, isValidUrl, loadOrCreateSources, writeSources, type SourceRegistry } from '../sources.js';
import { getErrorMessage, isSourceError } from '../utils/errors.js';
import type { CommandContext } from './context.js';

export async function sourceAddCommand(source: string, url: string, context: CommandContext) {
    if (!isValidUrl(url)) {
        console.error(chalk.red(`Failed to add new source: "${source}" (URL malformed or invalid)`));
        return;
    }
    if (!isValidSourceName(source)) {
        console.error(chalk.red(`Failed to add new source: "${source}" (Name empty or invalid)`));
        return;
    }

    const { file } = context.paths;
    let sources: SourceRegistry;
    try {
        sources = addSource(await loadOrCreateSources(file), source, url);
    } catch (error) {
        if (isSourceError(error, 'SOURCE_EXISTS') || isSourceError(error, 'SOURCE_NAME_INVALID')) {
            console.error(chalk.red(`Failed to add new source: "${source}" (${error.message})`));
        } else {
            console.error(chalk.red(`Failed to read sources: "${file}" (${getErrorMessage(error)})`));
        }
        return;
    }

    try {
        await writeSources(file, sources);
    } catch (error) {
        console.error(chalk.red(`An error occurred while trying to add a source (${getErrorMessage(error)})`));
        return;
    }

    console.log(chalk.green(`Added new source: "${source}" = "${url}"`));
}
