/**
 * Dataset summary: a structured profile of every column plus the compact
 * text form that is sent to the model as dataset context.
 */

import * as stats from './stats.js';
import { isMissing, type CellValue, type Row, type Table } from './table.js';
import type { CsvEncoding } from './csv.js';

export type ColumnType = 'number' | 'boolean' | 'string' | 'empty';

export interface ColumnSummary {
    name: string;
    dtype: ColumnType;
    missingCount: number;
    missingPct: number;
    statistics?: { mean: string; median: string; std: string; min: string; max: string };
    uniqueCount?: number;
    allUniqueValues?: string[];
    topValues?: Array<{ value: string; count: number }>;
}

export interface SummaryDetails {
    shape: { rows: number; columns: number };
    missingValues: { totalMissing: number; missingPct: number };
    columns: ColumnSummary[];
    previewRows: Row[];
}

export interface DatasetSummary {
    table: Table;
    text: string;
    details: SummaryDetails;
    encoding: CsvEncoding;
}

export interface SummaryOptions {
    maxTopValues?: number;
    encoding?: CsvEncoding;
}

/** Columns with fewer distinct values than this list them all. */
const ALL_VALUES_LIMIT = 50;

function formatStat(value: number): string {
    return Number.isFinite(value) ? value.toFixed(2) : 'NA';
}

function percent(part: number, total: number): number {
    return total > 0 ? stats.round((part / total) * 100, 2) : 0;
}

function columnType(values: readonly CellValue[]): ColumnType {
    const present = values.filter(value => !isMissing(value));
    if (present.length === 0) return 'empty';
    if (present.every(value => typeof value === 'number')) return 'number';
    if (present.every(value => typeof value === 'boolean')) return 'boolean';
    return 'string';
}

function summarizeColumn(name: string, values: readonly CellValue[], maxTopValues: number): ColumnSummary {
    const dtype = columnType(values);
    const missingCount = values.filter(isMissing).length;
    const summary: ColumnSummary = {
        name,
        dtype,
        missingCount,
        missingPct: percent(missingCount, values.length),
    };

    if (dtype === 'number') {
        summary.statistics = {
            mean: formatStat(stats.mean(values)),
            median: formatStat(stats.median(values)),
            std: formatStat(stats.std(values)),
            min: formatStat(stats.min(values)),
            max: formatStat(stats.max(values)),
        };
        return summary;
    }

    const counts = new Map<string, number>();
    for (const value of values) {
        if (isMissing(value)) continue;
        const key = String(value);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    summary.uniqueCount = counts.size;
    if (counts.size < ALL_VALUES_LIMIT) {
        summary.allUniqueValues = [...counts.keys()].sort();
    } else {
        summary.topValues = [...counts.entries()]
            .sort((a, b) => b[1] - a[1])
            .slice(0, maxTopValues)
            .map(([value, count]) => ({ value, count }));
    }
    return summary;
}

function columnLine(column: ColumnSummary): string {
    const parts = [
        `${column.name} (${column.dtype})`,
        `missing=${column.missingCount}`,
        `${column.missingPct}% missing`,
    ];
    if (column.statistics) {
        const statParts = Object.entries(column.statistics).map(([key, value]) => `${key}=${value}`);
        parts.push(`stats[${statParts.join(', ')}]`);
    }
    if (column.uniqueCount !== undefined) parts.push(`unique_count=${column.uniqueCount}`);
    if (column.allUniqueValues) {
        parts.push(`all_values[${column.allUniqueValues.join(', ')}]`);
    } else if (column.topValues && column.topValues.length > 0) {
        parts.push(`top_values[${column.topValues.map(item => `${item.value} (${item.count})`).join(', ')}]`);
    }
    return ` - ${parts.join('; ')}`;
}

function buildText(details: SummaryDetails): string {
    return [
        `Dataset with ${details.shape.rows} rows and ${details.shape.columns} columns.`,
        `Total missing cells: ${details.missingValues.totalMissing} (${details.missingValues.missingPct}%).`,
        ...details.columns.map(columnLine),
    ].join('\n');
}

export function summarizeDataset(table: Table, options: SummaryOptions = {}): DatasetSummary {
    const maxTopValues = options.maxTopValues ?? 3;
    const columns = table.columns.map(name => summarizeColumn(name, table.column(name), maxTopValues));
    const totalMissing = columns.reduce((acc, column) => acc + column.missingCount, 0);

    const details: SummaryDetails = {
        shape: { rows: table.rowCount, columns: table.columnCount },
        missingValues: {
            totalMissing,
            missingPct: percent(totalMissing, table.rowCount * table.columnCount),
        },
        columns,
        previewRows: table.head(5).toRecords(),
    };

    return { table, text: buildText(details), details, encoding: options.encoding ?? 'utf-8' };
}
