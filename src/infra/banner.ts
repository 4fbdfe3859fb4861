/**
 * Console chrome for the interactive CLI: a box sized to its content
 * naming the tool and the loaded dataset, and one-line status marks.
 */

import chalk from 'chalk';
import { config } from '../config/index.js';

/**
 * Lines of a box around `rows`, first row bold, the rest dim. The box
 * grows with the longest row so long file names are never cut.
 */
export function renderBanner(rows: readonly string[]): string[] {
    const width = Math.max(0, ...rows.map(row => row.length)) + 4;
    const bar = '─'.repeat(width);
    return [
        chalk.cyan(`  ╭${bar}╮`),
        ...rows.map((row, i) => {
            const text = row.padEnd(width - 4);
            return chalk.cyan('  │') + '  ' + (i === 0 ? chalk.bold(text) : chalk.dim(text)) + '  ' + chalk.cyan('│');
        }),
        chalk.cyan(`  ╰${bar}╯`),
    ];
}

/** Print the startup box: tool and version, then what was loaded. */
export function printBanner(dataset: string): void {
    console.log('');
    for (const line of renderBanner([`TableTalk v${config.version}`, dataset])) console.log(line);
    console.log('');
}

/** A `✓` line when `ok`, otherwise a hollow `○` for something unavailable. */
export function printStatus(label: string, detail: string, ok = true): void {
    const mark = ok ? chalk.green('✓') : chalk.yellow('○');
    console.log(`  ${mark} ${chalk.bold(label.padEnd(14))}${chalk.dim(detail)}`);
}

export function printHint(text: string): void {
    console.log(chalk.dim(`  ${text}`));
}
