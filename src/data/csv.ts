/**
 * CSV loading. The header row names the columns; cells are typed on the way
 * in so numeric columns are numbers by the time analysis code sees them.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { DatasetLoadError, getErrorMessage } from '../infra/errors.js';
import { logger } from '../infra/logger.js';
import { Table, type CellValue } from './table.js';

export type CsvEncoding = 'utf-8' | 'utf-16le' | 'latin1';

export interface LoadedDataset {
    table: Table;
    encoding: CsvEncoding;
}

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const MISSING_MARKERS = new Set(['', 'NA', 'N/A', 'NaN', 'nan', 'null', 'NULL', '#N/A']);

/** Typed value of a raw CSV cell. */
export function castCell(raw: string): CellValue {
    const value = raw.trim();
    if (MISSING_MARKERS.has(value)) return null;
    if (NUMBER_PATTERN.test(value)) return Number(value);
    const lower = value.toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
    return raw;
}

/** Strict UTF-8, then UTF-16LE when a BOM says so, then Latin-1 (which decodes anything). */
export function decode(buffer: Buffer): { text: string; encoding: CsvEncoding } {
    try {
        return { text: new TextDecoder('utf-8', { fatal: true }).decode(buffer), encoding: 'utf-8' };
    } catch {
        logger.debug('Not valid UTF-8, trying other encodings', 'CSV');
    }
    if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
        return { text: buffer.subarray(2).toString('utf16le'), encoding: 'utf-16le' };
    }
    return { text: buffer.toString('latin1'), encoding: 'latin1' };
}

function headerNames(header: readonly string[]): string[] {
    const names: string[] = [];
    header.forEach((raw, i) => {
        const base = raw.trim() === '' ? `Unnamed: ${i}` : String(raw);
        let name = base;
        for (let n = 1; names.includes(name); n++) name = `${base}.${n}`;
        names.push(name);
    });
    return names;
}

export function parseCsv(input: Buffer | string): LoadedDataset {
    const { text, encoding } = typeof input === 'string'
        ? { text: input, encoding: 'utf-8' as const }
        : decode(input);

    let records: string[][];
    try {
        records = parse(text, {
            bom: true,
            skip_empty_lines: true,
            relax_column_count: true,
        });
    } catch (error) {
        throw new DatasetLoadError(`Could not parse CSV: ${getErrorMessage(error)}`, { cause: error });
    }

    if (records.length === 0) throw new DatasetLoadError('CSV file is empty');

    const [header, ...body] = records;
    const columns = headerNames(header);
    const rows = body.map(cells => Object.fromEntries(
        columns.map((name, i) => [name, i < cells.length ? castCell(cells[i]) : null]),
    ));
    return { table: new Table(columns, rows), encoding };
}

export async function loadCsv(path: string): Promise<LoadedDataset> {
    let buffer: Buffer;
    try {
        buffer = await readFile(path);
    } catch (error) {
        throw new DatasetLoadError(`Could not read ${path}: ${getErrorMessage(error)}`, { cause: error });
    }
    const loaded = parseCsv(buffer);
    logger.debug(`Loaded ${path} (${loaded.table.rowCount} rows, ${loaded.encoding})`, 'CSV');
    return loaded;
}
