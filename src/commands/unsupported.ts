import chalk from 'chalk';

/**
 * Handler for commands that are declared but have no behavior yet.
 */
export function unsupportedCommand(name: string) {
    return () => {
        console.error(chalk.red(`"${name}" is not yet supported`));
    };
}
