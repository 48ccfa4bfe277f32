import chalk from 'chalk';
import { isValidUrl, loadOrCreateSources, setSource, writeSources, type SourceRegistry } from '../sources.js';
import { getErrorMessage, isSourceError } from '../utils/errors.js';
import type { CommandContext } from './context.js';

export async function sourceEditCommand(source: string, newUrl: string, context: CommandContext) {
    if (!isValidUrl(newUrl)) {
        console.error(chalk.red(`Failed to edit existing source: "${source}" (New URL malformed or invalid)`));
        return;
    }

    const { file } = context.paths;
    let sources: SourceRegistry;
    try {
        sources = setSource(await loadOrCreateSources(file), source, newUrl);
    } catch (error) {
        if (isSourceError(error, 'SOURCE_NOT_FOUND')) {
            console.error(chalk.red(`Failed to edit existing source: "${source}" (${error.message})`));
        } else {
            console.error(chalk.red(`Failed to read sources: "${file}" (${getErrorMessage(error)})`));
        }
        return;
    }

    try {
        await writeSources(file, sources);
    } catch (error) {
        console.error(chalk.red(`An error occurred while trying to edit a source (${getErrorMessage(error)})`));
        return;
    }

    console.log(chalk.green(`Changed existing source: "${source}" = "${newUrl}"`));
}
