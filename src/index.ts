#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './cli.js';
import { resolveSourcePaths } from './config.js';
import { getErrorMessage } from './utils/errors.js';

try {
    const program = createProgram({ paths: resolveSourcePaths() });
    await program.parseAsync();
} catch (error) {
    console.error(chalk.red('Unexpected error:'), getErrorMessage(error));
    process.exit(1);
}
