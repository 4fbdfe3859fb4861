/**
 * Chart artifacts. A Figure holds a Plotly-compatible `{ data, layout }`
 * spec so any front end that speaks Plotly JSON can draw it; the builders
 * below are what analysis code reaches through the `charts` namespace.
 */

import { inspect } from 'node:util';
import type { CellValue, Table } from '../data/table.js';

export interface Trace {
    type: string;
    name?: string;
    mode?: string;
    x?: CellValue[];
    y?: CellValue[];
    labels?: CellValue[];
    values?: CellValue[];
    nbinsx?: number;
    [key: string]: unknown;
}

export interface Layout {
    title?: { text: string };
    xaxis?: { title: { text: string } };
    yaxis?: { title: { text: string } };
    [key: string]: unknown;
}

export interface FigureSpec {
    data: Trace[];
    layout: Layout;
}

export class Figure {
    readonly data: Trace[];
    layout: Layout;

    constructor(spec: Partial<FigureSpec> = {}) {
        this.data = [...(spec.data ?? [])];
        this.layout = { ...(spec.layout ?? {}) };
    }

    get title(): string | undefined {
        return this.layout.title?.text;
    }

    addTrace(trace: Trace): this {
        this.data.push(trace);
        return this;
    }

    updateLayout(patch: Layout): this {
        this.layout = { ...this.layout, ...patch };
        return this;
    }

    toJSON(): FigureSpec {
        return { data: this.data.map(trace => ({ ...trace })), layout: { ...this.layout } };
    }

    [inspect.custom](): string {
        const kinds = [...new Set(this.data.map(trace => trace.type))].join(', ') || 'empty';
        return this.title ? `Figure(${kinds}, "${this.title}")` : `Figure(${kinds})`;
    }
}

export interface ChartOptions {
    x?: string;
    y?: string;
    /** Split into one trace per distinct value of this column. */
    color?: string;
    title?: string;
}

export interface HistogramOptions {
    x: string;
    color?: string;
    nbins?: number;
    title?: string;
}

export interface PieOptions {
    names: string;
    values: string;
    title?: string;
}

function requireOption(value: string | undefined, option: string, chart: string): string {
    if (!value) throw new Error(`charts.${chart} needs the "${option}" option`);
    return value;
}

function baseLayout(options: { x?: string; y?: string; title?: string }): Layout {
    const layout: Layout = {};
    if (options.title) layout.title = { text: options.title };
    if (options.x) layout.xaxis = { title: { text: options.x } };
    if (options.y) layout.yaxis = { title: { text: options.y } };
    return layout;
}

/** Partition rows by the color column, or a single unnamed group. */
function splitByColor(table: Table, color: string | undefined): Array<{ name?: string; rows: Table }> {
    if (!color) return [{ rows: table }];
    return table.unique(color).map(value => ({
        name: String(value),
        rows: table.filter(row => row[color] === value),
    }));
}

function xyChart(chart: string, table: Table, options: ChartOptions, trace: { type: string; mode?: string }): Figure {
    const x = requireOption(options.x, 'x', chart);
    const y = requireOption(options.y, 'y', chart);
    const data = splitByColor(table, options.color).map(group => ({
        ...trace,
        ...(group.name !== undefined ? { name: group.name } : {}),
        x: group.rows.column(x),
        y: group.rows.column(y),
    }));
    return new Figure({ data, layout: baseLayout({ x, y, title: options.title }) });
}

export function bar(table: Table, options: ChartOptions): Figure {
    return xyChart('bar', table, options, { type: 'bar' });
}

export function line(table: Table, options: ChartOptions): Figure {
    return xyChart('line', table, options, { type: 'scatter', mode: 'lines' });
}

export function scatter(table: Table, options: ChartOptions): Figure {
    return xyChart('scatter', table, options, { type: 'scatter', mode: 'markers' });
}

export function histogram(table: Table, options: HistogramOptions): Figure {
    const x = requireOption(options.x, 'x', 'histogram');
    const data = splitByColor(table, options.color).map(group => ({
        type: 'histogram',
        ...(group.name !== undefined ? { name: group.name } : {}),
        x: group.rows.column(x),
        ...(options.nbins ? { nbinsx: options.nbins } : {}),
    }));
    return new Figure({ data, layout: baseLayout({ x, title: options.title }) });
}

export function pie(table: Table, options: PieOptions): Figure {
    const names = requireOption(options.names, 'names', 'pie');
    const values = requireOption(options.values, 'values', 'pie');
    const layout: Layout = options.title ? { title: { text: options.title } } : {};
    return new Figure({
        data: [{ type: 'pie', labels: table.column(names), values: table.column(values) }],
        layout,
    });
}

export function box(table: Table, options: ChartOptions): Figure {
    const y = requireOption(options.y, 'y', 'box');
    const data = splitByColor(table, options.color).map(group => ({
        type: 'box',
        ...(group.name !== undefined ? { name: group.name } : {}),
        ...(options.x ? { x: group.rows.column(options.x) } : {}),
        y: group.rows.column(y),
    }));
    return new Figure({ data, layout: baseLayout({ x: options.x, y, title: options.title }) });
}

/** Low-level constructor for hand-built traces. */
export function figure(spec: Partial<FigureSpec> = {}): Figure {
    return new Figure(spec);
}
