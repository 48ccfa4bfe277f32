import chalk from 'chalk';

export type LogLevel = 'debug' | 'info';

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
};

/**
 * Leveled diagnostics. Command results are printed by the commands
 * themselves; this is for tracing what they do (`--verbose`).
 */
class Logger {
    private level: LogLevel = 'info';

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
    }

    debug(message: string): void {
        if (!this.shouldLog('debug')) return;
        console.error(chalk.gray(`[DEBUG] ${message}`));
    }
}

export const logger = new Logger();

export { Logger };
