/**
 * Terminal rendering for analyst replies and sandbox results, plus the
 * `--out` writer that saves chart specs as JSON files.
 */

import chalk from 'chalk';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { inspect } from 'node:util';
import type { Figure } from '../charts/figure.js';
import type { Table } from '../data/table.js';
import type { AssistantMessage } from '../runtime/analyst.js';
import type { ExecutionResult } from '../sandbox/types.js';

export interface RenderOptions {
    /** Print the generated code above the results. */
    showCode?: boolean;
    /** Rows shown per table before the middle is elided. */
    maxRows?: number;
}

interface Parts {
    analysis?: string;
    code?: string;
    stdout?: string;
    tables?: readonly Table[];
    charts?: readonly Figure[];
    error?: string | null;
    suggestions?: string;
}

function indent(text: string): string {
    return text.split('\n').map(line => (line ? `    ${line}` : line)).join('\n');
}

function section(title: string, body: string): string {
    return `  ${title}\n${indent(body)}`;
}

/** One line per chart: what it draws and how many traces it has. */
export function describeCharts(charts: readonly Figure[]): string {
    return charts
        .map((figure, i) => {
            const traces = figure.data.length;
            return `${i + 1}. ${inspect(figure)} · ${traces} trace${traces === 1 ? '' : 's'}`;
        })
        .join('\n');
}

function renderParts(parts: Parts, options: RenderOptions): string {
    const sections: string[] = [];
    if (parts.analysis) sections.push(section(chalk.bold.cyan('Analysis'), parts.analysis));
    if (options.showCode && parts.code) sections.push(section(chalk.bold('Code'), chalk.dim(parts.code)));
    if (parts.stdout) sections.push(section(chalk.bold('Output'), parts.stdout));
    (parts.tables ?? []).forEach((table, i) => {
        const heading = `${chalk.bold(`Table ${i + 1}`)} ${chalk.dim(`(${table.rowCount} rows x ${table.columnCount} columns)`)}`;
        sections.push(section(heading, table.toString(options.maxRows)));
    });
    if (parts.charts && parts.charts.length > 0) sections.push(section(chalk.bold('Charts'), describeCharts(parts.charts)));
    if (parts.error) sections.push(section(chalk.bold.red('Error'), chalk.red(parts.error)));
    if (parts.suggestions) sections.push(section(chalk.bold('Suggestions'), chalk.dim(parts.suggestions)));

    if (sections.length === 0) return `  ${chalk.dim('(no output)')}`;
    return sections.join('\n\n');
}

export function renderMessage(message: AssistantMessage, options: RenderOptions = {}): string {
    return renderParts(message, options);
}

export function renderResult(result: ExecutionResult, options: RenderOptions = {}): string {
    return renderParts(result, options);
}

/**
 * Write each chart as `<prefix>-<n>.json` under `dir`, creating it if needed.
 * @returns the written paths, in chart order
 */
export async function saveCharts(charts: readonly Figure[], dir: string, prefix = 'chart'): Promise<string[]> {
    if (charts.length === 0) return [];
    await mkdir(dir, { recursive: true });
    const written: string[] = [];
    for (const [i, figure] of charts.entries()) {
        const file = path.join(dir, `${prefix}-${i + 1}.json`);
        await writeFile(file, JSON.stringify(figure, null, 2) + '\n', 'utf-8');
        written.push(file);
    }
    return written;
}
