/**
 * The only names analysis code can reach. Everything else on the context's
 * global object is deleted before user code runs.
 */

import * as figures from '../charts/figure.js';
import * as stats from '../data/stats.js';
import { GroupedTable, Table, concat, merge } from '../data/table.js';

/** Language intrinsics left in place on the fresh context. */
export const SAFE_INTRINSICS = Object.freeze([
    'Array',
    'Boolean',
    'Date',
    'Error',
    'Infinity',
    'JSON',
    'Map',
    'Math',
    'NaN',
    'Number',
    'Object',
    'RangeError',
    'ReferenceError',
    'Set',
    'String',
    'SyntaxError',
    'TypeError',
    'isFinite',
    'isNaN',
    'parseFloat',
    'parseInt',
    'undefined',
] as const);

/** Bound per run by the executor. */
export const INJECTED_NAMES = Object.freeze(['print', 'tables', 'stats', 'charts', 'df'] as const);

export type InjectedName = typeof INJECTED_NAMES[number];

export const ALLOWED_NAMES: ReadonlySet<string> = new Set<string>([...SAFE_INTRINSICS, ...INJECTED_NAMES]);

/** Names the model sometimes tries to import even though they are already bound. */
export const PRELOADED_NAMES: ReadonlySet<string> = new Set<string>(['tables', 'stats', 'charts']);

// Shared by every run.
for (const shared of [Table, Table.prototype, GroupedTable, GroupedTable.prototype, figures.Figure, figures.Figure.prototype]) {
    Object.freeze(shared);
}

const tablesNamespace = Object.freeze({
    Table,
    fromRecords: (records: readonly Record<string, unknown>[], columns?: readonly string[]) => Table.fromRecords(records, columns),
    fromColumns: (columns: Record<string, readonly unknown[]>) => Table.fromColumns(columns),
    concat,
    merge,
});

const statsNamespace = Object.freeze({
    numeric: stats.numeric,
    count: stats.count,
    sum: stats.sum,
    mean: stats.mean,
    median: stats.median,
    quantile: stats.quantile,
    std: stats.std,
    min: stats.min,
    max: stats.max,
    round: stats.round,
});

const chartsNamespace = Object.freeze({
    bar: figures.bar,
    line: figures.line,
    scatter: figures.scatter,
    histogram: figures.histogram,
    pie: figures.pie,
    box: figures.box,
    figure: figures.figure,
});

export type Capabilities = Record<InjectedName, unknown>;

export function buildCapabilities(dataset: Table, print: (...values: unknown[]) => void): Capabilities {
    return {
        print,
        tables: tablesNamespace,
        stats: statsNamespace,
        charts: chartsNamespace,
        df: dataset,
    };
}
