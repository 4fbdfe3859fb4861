/**
 * Unified logging system for TableTalk.
 * Provides colored, prefixed output with support for silent mode
 * and configurable log levels.
 */

import chalk from 'chalk';
import { config } from '../config/index.js';

/** Available log severity levels, lowest first. */
export type LogLevel = typeof config.logging.level;

const SEVERITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

function enabled(level: LogLevel): boolean {
    if (config.logging.silent) return false;
    return SEVERITY[level] >= SEVERITY[config.logging.level];
}

/**
 * Unified Logger for TableTalk.
 * Ensures consistent colors, prefixes, and respects the silence flag.
 */
export const logger = {
    info: (message: string, prefix: string = 'TableTalk') => {
        if (!enabled('info')) return;
        console.log(`  ${chalk.yellow('i')} ${chalk.dim(`[${prefix}]`)} ${message}`);
    },

    success: (message: string, prefix: string = 'TableTalk') => {
        if (!enabled('info')) return;
        console.log(`  ${chalk.green('+')} ${chalk.green(`[${prefix}]`)} ${chalk.bold(message)}`);
    },

    warn: (message: string, prefix: string = 'TableTalk') => {
        if (!enabled('warn')) return;
        console.warn(`  ${chalk.yellow('!')} ${chalk.yellow(`[${prefix}]`)} ${chalk.yellow(message)}`);
    },

    error: (message: string, prefix: string = 'TableTalk', error?: unknown) => {
        console.error(`  ${chalk.red('x')} ${chalk.red(`[${prefix}]`)} ${chalk.red.bold(message)}`);
        if (error) {
            const detail = error instanceof Error ? (error.stack || error.message) : String(error);
            console.error(chalk.red(detail));
        }
    },

    debug: (message: string, prefix: string = 'Debug') => {
        if (!enabled('debug')) return;
        console.log(`  ${chalk.magenta('.')} ${chalk.magenta(`[${prefix}]`)} ${chalk.gray(message)}`);
    },

    important: (message: string, prefix: string = 'System') => {
        if (config.logging.silent) return;
        console.log(`  ${chalk.bold.cyan('*')} ${chalk.bold.cyan(`[${prefix}]`)} ${chalk.bold(message)}`);
    }
};
