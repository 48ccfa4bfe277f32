import { Command } from 'commander';
import type { SourcePaths } from './config.js';
import { resetCommand } from './commands/reset.js';
import { sourceAddCommand } from './commands/source-add.js';
import { sourceEditCommand } from './commands/source-edit.js';
import { sourceListCommand } from './commands/source-list.js';
import { sourceRemoveCommand } from './commands/source-remove.js';
import { unsupportedCommand } from './commands/unsupported.js';
import type { CommandContext } from './commands/context.js';
import { logger } from './utils/logger.js';
import { confirmPrompt, type Confirm } from './utils/prompt.js';

export const VERSION = '0.1.0';

export interface ProgramOptions {
    paths: SourcePaths;
    confirm?: Confirm;
}

export function createProgram(options: ProgramOptions): Command {
    const context: CommandContext = {
        paths: options.paths,
        confirm: options.confirm ?? confirmPrompt
    };

    const program = new Command();

    program
        .name('srcgen')
        .description('Simplified source code generator')
        .version(VERSION)
        .option('-v, --verbose', 'Toggle verbose information')
        .hook('preAction', (thisCommand) => {
            if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
                logger.setLevel('debug');
            }
            logger.debug(`Sources file: ${context.paths.file}`);
        });

    program
        .command('generate')
        .description('Generate source code using a template')
        .argument('<template>', 'Template to use for generating source code')
        .option('-o, --output <dir>', 'Specify output directory')
        .action(unsupportedCommand('generate'));

    program
        .command('sync')
        .description('Sync other sources to latest changes')
        .action(unsupportedCommand('sync'));

    program
        .command('list')
        .description('List all templates from sources')
        .option('-l, --local', 'Only include templates from local source')
        .action(unsupportedCommand('list'));

    program
        .command('import')
        .description('Import local template from file')
        .argument('<file>', 'The file to be imported as a template')
        .action(unsupportedCommand('import'));

    program
        .command('export')
        .description('Export template from local source to file')
        .argument('<template>', 'The name of the selected template to be exported')
        .argument('<output>', 'The output directory where the template will be exported')
        .action(unsupportedCommand('export'));

    program
        .command('remove')
        .description('Remove existing template from local source')
        .argument('<template>', 'The name of the selected template to be removed')
        .action(unsupportedCommand('remove'));

    program
        .command('source-add')
        .description('Add a new source')
        .argument('<source>', 'The name of the new source')
        .argument('<url>', 'The URL of the new source')
        .action((source: string, url: string) => sourceAddCommand(source, url, context));

    program
        .command('source-edit')
        .description('Edit an existing source')
        .argument('<source>', 'The name of the existing source to be edited')
        .argument('<new_url>', 'The new URL of the existing source')
        .action((source: string, newUrl: string) => sourceEditCommand(source, newUrl, context));

    program
        .command('source-remove')
        .description('Remove an existing source')
        .argument('<source>', 'The name of the existing source to be removed')
        .action((source: string) => sourceRemoveCommand(source, context));

    program
        .command('source-list')
        .description('List all sources')
        .action(() => sourceListCommand(context));

    program
        .command('reset')
        .description('Remove all sources & delete everything')
        .option('-f, --force', 'Forcefully perform operation')
        .action((opts: { force?: boolean }) => resetCommand(opts, context));

    return program;
}
