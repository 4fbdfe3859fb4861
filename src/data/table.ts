/**
 * Table -- the in-memory dataset handed to analysis code as `df`, and the
 * type every derived table artifact has. Row-major: an ordered list of
 * column names plus rows keyed by those names.
 */

import { inspect, types } from 'node:util';
import * as stats from './stats.js';

export type CellValue = string | number | boolean | null;
export type Row = Record<string, CellValue>;

export type AggregateOp = 'count' | 'sum' | 'mean' | 'median' | 'std' | 'min' | 'max';

const AGGREGATES: Record<AggregateOp, (values: readonly unknown[]) => number> = {
    count: stats.count,
    sum: stats.sum,
    mean: stats.mean,
    median: stats.median,
    std: stats.std,
    min: stats.min,
    max: stats.max,
};

const DESCRIBE_STATS: Array<[string, (values: readonly unknown[]) => number]> = [
    ['count', stats.count],
    ['mean', stats.mean],
    ['std', stats.std],
    ['min', stats.min],
    ['25%', values => stats.quantile(values, 0.25)],
    ['50%', stats.median],
    ['75%', values => stats.quantile(values, 0.75)],
    ['max', stats.max],
];

/** Own value of `name`, so a column called `__proto__` never reads the prototype. */
function field(row: Record<string, unknown>, name: string): unknown {
    return Object.hasOwn(row, name) ? row[name] : undefined;
}

/** Null and NaN count as missing. */
export function isMissing(value: unknown): boolean {
    return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/** Coerce an arbitrary value into something a cell can hold. */
export function toCell(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (typeof value === 'bigint') return Number(value);
    if (types.isDate(value)) return Number.isNaN(value.getTime()) ? null : value.toISOString();
    return String(value);
}

function formatCell(value: CellValue): string {
    if (value === null) return 'null';
    if (typeof value === 'number') {
        if (Number.isInteger(value) || !Number.isFinite(value)) return String(value);
        return String(stats.round(value, 4));
    }
    return String(value);
}

function compareCells(a: CellValue, b: CellValue): number {
    const aMissing = isMissing(a);
    const bMissing = isMissing(b);
    if (aMissing || bMissing) return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    const left = String(a);
    const right = String(b);
    return left < right ? -1 : left > right ? 1 : 0;
}

export class Table {
    private readonly columnNames: string[];
    private readonly data: Row[];

    constructor(columns: readonly string[], rows: readonly Record<string, unknown>[] = []) {
        const seen = new Set<string>();
        for (const name of columns) {
            if (seen.has(name)) throw new Error(`Duplicate column: ${name}`);
            seen.add(name);
        }
        this.columnNames = [...columns];
        this.data = rows.map(row => Object.fromEntries(this.columnNames.map(name => [name, toCell(field(row, name))])));
    }

    /** Build a table from row objects; columns are the union of keys in first-seen order. */
    static fromRecords(records: readonly Record<string, unknown>[], columns?: readonly string[]): Table {
        if (columns) return new Table(columns, records);
        const names: string[] = [];
        const seen = new Set<string>();
        for (const record of records) {
            for (const key of Object.keys(record)) {
                if (!seen.has(key)) {
                    seen.add(key);
                    names.push(key);
                }
            }
        }
        return new Table(names, records);
    }

    /** Build a table from equal-length column arrays. */
    static fromColumns(columns: Record<string, readonly unknown[]>): Table {
        const names = Object.keys(columns);
        const lengths = new Set(names.map(name => columns[name].length));
        if (lengths.size > 1) {
            throw new Error(`Column lengths differ: ${names.map(name => `${name}=${columns[name].length}`).join(', ')}`);
        }
        const rowCount = names.length > 0 ? columns[names[0]].length : 0;
        const rows = Array.from({ length: rowCount }, (_, i) => Object.fromEntries(names.map(name => [name, columns[name][i]])));
        return new Table(names, rows);
    }

    get columns(): string[] {
        return [...this.columnNames];
    }

    /** Live rows. Mutating them mutates this table. */
    get rows(): Row[] {
        return this.data;
    }

    get rowCount(): number {
        return this.data.length;
    }

    get columnCount(): number {
        return this.columnNames.length;
    }

    get shape(): [number, number] {
        return [this.data.length, this.columnNames.length];
    }

    hasColumn(name: string): boolean {
        return this.columnNames.includes(name);
    }

    /** Deep copy: no row object is shared with the source. */
    copy(): Table {
        return new Table(this.columnNames, this.data);
    }

    column(name: string): CellValue[] {
        this.assertColumn(name);
        return this.data.map(row => row[name]);
    }

    head(n = 5): Table {
        return new Table(this.columnNames, this.data.slice(0, Math.max(0, n)));
    }

    tail(n = 5): Table {
        return new Table(this.columnNames, n > 0 ? this.data.slice(-n) : []);
    }

    select(...names: string[]): Table {
        names.forEach(name => this.assertColumn(name));
        return new Table(names, this.data);
    }

    filter(predicate: (row: Row, index: number) => unknown): Table {
        return new Table(this.columnNames, this.data.filter((row, i) => Boolean(predicate(row, i))));
    }

    /** Stable sort; missing values go last in both directions. */
    sortBy(name: string, options: { descending?: boolean } = {}): Table {
        this.assertColumn(name);
        const direction = options.descending ? -1 : 1;
        const sorted = [...this.data].sort((a, b) => {
            const aMissing = isMissing(a[name]);
            const bMissing = isMissing(b[name]);
            if (aMissing || bMissing) return compareCells(a[name], b[name]);
            return direction * compareCells(a[name], b[name]);
        });
        return new Table(this.columnNames, sorted);
    }

    /** Add or replace a column computed per row. */
    withColumn(name: string, compute: (row: Row, index: number) => unknown): Table {
        const columns = this.hasColumn(name) ? this.columnNames : [...this.columnNames, name];
        const rows = this.data.map((row, i) => ({ ...row, [name]: toCell(compute(row, i)) }));
        return new Table(columns, rows);
    }

    rename(mapping: Record<string, string>): Table {
        Object.keys(mapping).forEach(name => this.assertColumn(name));
        const renamed = this.columnNames.map(name => (Object.hasOwn(mapping, name) ? mapping[name] : name));
        const rows = this.data.map(row => Object.fromEntries(this.columnNames.map((name, i) => [renamed[i], row[name]])));
        return new Table(renamed, rows);
    }

    /** Drop rows with a missing value in any of the given columns (all columns when none given). */
    dropMissing(...names: string[]): Table {
        names.forEach(name => this.assertColumn(name));
        const checked = names.length > 0 ? names : this.columnNames;
        return this.filter(row => checked.every(name => !isMissing(row[name])));
    }

    /** Distinct non-missing values in first-seen order. */
    unique(name: string): CellValue[] {
        const seen = new Set<CellValue>();
        for (const value of this.column(name)) {
            if (!isMissing(value)) seen.add(value);
        }
        return [...seen];
    }

    /** Occurrences per distinct value, most frequent first; ties keep first-seen order. */
    valueCounts(name: string): Table {
        const counts = new Map<CellValue, number>();
        for (const value of this.column(name)) {
            if (isMissing(value)) continue;
            counts.set(value, (counts.get(value) ?? 0) + 1);
        }
        const rows = [...counts.entries()]
            .sort((a, b) => b[1] - a[1])
            .map(([value, n]) => ({ [name]: value, count: n }));
        return new Table([name, 'count'], rows);
    }

    groupBy(...keys: string[]): GroupedTable {
        if (keys.length === 0) throw new Error('groupBy needs at least one key column');
        keys.forEach(name => this.assertColumn(name));
        return new GroupedTable(this, keys);
    }

    /** Columns holding at least one number and nothing but numbers or missing values. */
    numericColumns(): string[] {
        return this.columnNames.filter(name => {
            let sawNumber = false;
            for (const row of this.data) {
                const value = row[name];
                if (isMissing(value)) continue;
                if (typeof value !== 'number') return false;
                sawNumber = true;
            }
            return sawNumber;
        });
    }

    /** Summary statistics of the numeric columns, one row per statistic. */
    describe(): Table {
        const numericNames = this.numericColumns();
        const rows = DESCRIBE_STATS.map(([label, fn]) => Object.fromEntries([
            ['stat', label] as const,
            ...numericNames.map(name => [name, fn(this.column(name))] as const),
        ]));
        return new Table(['stat', ...numericNames], rows);
    }

    toRecords(): Row[] {
        return this.data.map(row => ({ ...row }));
    }

    toJSON(): { columns: string[]; rows: Row[] } {
        return { columns: this.columns, rows: this.toRecords() };
    }

    /** Aligned text grid; long tables show the first and last rows around an ellipsis line. */
    toString(maxRows = 20): string {
        if (this.columnNames.length === 0) return `Empty table (${this.data.length} rows)`;

        const truncated = this.data.length > maxRows;
        const headCount = truncated ? Math.ceil(maxRows / 2) : this.data.length;
        const tailCount = truncated ? Math.floor(maxRows / 2) : 0;
        const indices = [
            ...Array.from({ length: headCount }, (_, i) => i),
            ...Array.from({ length: tailCount }, (_, i) => this.data.length - tailCount + i),
        ];

        const numericNames = new Set(this.numericColumns());
        const grid: string[][] = [['', ...this.columnNames]];
        for (const i of indices) {
            grid.push([String(i), ...this.columnNames.map(name => formatCell(this.data[i][name]))]);
        }
        const widths = grid[0].map((_, c) => Math.max(...grid.map(line => line[c].length)));
        const render = (line: string[]) => line
            .map((cell, c) => (c === 0 || numericNames.has(this.columnNames[c - 1]) ? cell.padStart(widths[c]) : cell.padEnd(widths[c])))
            .join('  ')
            .trimEnd();

        const lines = grid.map(render);
        if (truncated) {
            lines.splice(headCount + 1, 0, '...');
            lines.push('', `[${this.data.length} rows x ${this.columnNames.length} columns]`);
        }
        return lines.join('\n');
    }

    [inspect.custom](): string {
        return this.toString();
    }

    private assertColumn(name: string): void {
        if (!this.columnNames.includes(name)) throw new Error(`Unknown column: ${name}`);
    }
}

/**
 * Rows of a table partitioned by key columns, in first-seen key order.
 * Rows with a missing key value are left out.
 */
export class GroupedTable {
    constructor(private readonly source: Table, private readonly keys: readonly string[]) { }

    private groups(): Array<{ key: CellValue[]; rows: Row[] }> {
        const groups = new Map<string, { key: CellValue[]; rows: Row[] }>();
        for (const row of this.source.rows) {
            const key = this.keys.map(name => row[name]);
            if (key.some(isMissing)) continue;
            const id = JSON.stringify(key);
            const group = groups.get(id);
            if (group) {
                group.rows.push(row);
            } else {
                groups.set(id, { key, rows: [row] });
            }
        }
        return [...groups.values()];
    }

    /** One output column per entry: `{ total: ['price', 'sum'] }`. */
    agg(spec: Record<string, readonly [string, AggregateOp]>): Table {
        const outputs = Object.entries(spec);
        for (const [, [column, op]] of outputs) {
            if (!this.source.hasColumn(column)) throw new Error(`Unknown column: ${column}`);
            if (!(op in AGGREGATES)) throw new Error(`Unknown aggregate: ${op}`);
        }
        const rows = this.groups().map(({ key, rows: members }) => Object.fromEntries([
            ...this.keys.map((name, i) => [name, key[i]] as const),
            ...outputs.map(([out, [column, op]]) => [out, AGGREGATES[op](members.map(member => member[column]))] as const),
        ]));
        return new Table([...this.keys, ...outputs.map(([out]) => out)], rows);
    }

    count(): Table {
        const rows = this.groups().map(({ key, rows: members }) => Object.fromEntries([
            ['count', members.length] as const,
            ...this.keys.map((name, i) => [name, key[i]] as const),
        ]));
        return new Table([...this.keys, 'count'], rows);
    }

    sum(column: string): Table {
        return this.agg({ [column]: [column, 'sum'] });
    }

    mean(column: string): Table {
        return this.agg({ [column]: [column, 'mean'] });
    }

    min(column: string): Table {
        return this.agg({ [column]: [column, 'min'] });
    }

    max(column: string): Table {
        return this.agg({ [column]: [column, 'max'] });
    }
}

/** Stack tables vertically; the result has the union of their columns. */
export function concat(...tables: Table[]): Table {
    const names: string[] = [];
    for (const table of tables) {
        for (const name of table.columns) {
            if (!names.includes(name)) names.push(name);
        }
    }
    return new Table(names, tables.flatMap(table => table.rows));
}

/**
 * Join two tables on shared key columns. Non-key columns of `right` that
 * clash with `left` get a `_right` suffix.
 */
export function merge(left: Table, right: Table, options: { on: string | string[]; how?: 'inner' | 'left' }): Table {
    const keys = Array.isArray(options.on) ? options.on : [options.on];
    for (const key of keys) {
        if (!left.hasColumn(key) || !right.hasColumn(key)) throw new Error(`Join key missing from one side: ${key}`);
    }
    const how = options.how ?? 'inner';
    const rightExtra = right.columns.filter(name => !keys.includes(name));
    const rename = (name: string) => (left.hasColumn(name) ? `${name}_right` : name);
    const columns = [...left.columns, ...rightExtra.map(rename)];

    const index = new Map<string, Row[]>();
    for (const row of right.rows) {
        const id = JSON.stringify(keys.map(key => row[key]));
        const bucket = index.get(id);
        if (bucket) bucket.push(row); else index.set(id, [row]);
    }

    const rows: Record<string, unknown>[] = [];
    for (const row of left.rows) {
        const matches = index.get(JSON.stringify(keys.map(key => row[key]))) ?? [];
        if (matches.length === 0 && how === 'left') {
            rows.push({ ...row });
            continue;
        }
        for (const match of matches) {
            rows.push(Object.fromEntries([
                ...Object.entries(row),
                ...rightExtra.map(name => [rename(name), match[name]] as const),
            ]));
        }
    }
    return new Table(columns, rows);
}
