import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { castCell, decode, loadCsv, parseCsv } from './csv.js';
import { DatasetLoadError } from '../infra/errors.js';

vi.mock('../infra/logger.js', () => ({
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe('castCell', () => {
    it('types numbers, booleans and missing markers', () => {
        expect(castCell('42')).toBe(42);
        expect(castCell('-3.5')).toBe(-3.5);
        expect(castCell('1e3')).toBe(1000);
        expect(castCell('TRUE')).toBe(true);
        expect(castCell('false')).toBe(false);
        expect(castCell('')).toBeNull();
        expect(castCell('NA')).toBeNull();
        expect(castCell('12 apples')).toBe('12 apples');
    });
});

describe('decode', () => {
    it('prefers strict UTF-8', () => {
        expect(decode(Buffer.from('naïve', 'utf-8'))).toEqual({ text: 'naïve', encoding: 'utf-8' });
    });

    it('reads UTF-16LE when it starts with a BOM', () => {
        const buffer = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('a,b', 'utf16le')]);
        expect(decode(buffer)).toEqual({ text: 'a,b', encoding: 'utf-16le' });
    });

    it('falls back to Latin-1', () => {
        const buffer = Buffer.from([0x63, 0x61, 0x66, 0xe9]);
        expect(decode(buffer)).toEqual({ text: 'café', encoding: 'latin1' });
    });
});

describe('parseCsv', () => {
    it('builds a typed table from the header and rows', () => {
        const { table, encoding } = parseCsv('city,temp,rain\nOslo,4.5,true\nRome,,false\n');
        expect(encoding).toBe('utf-8');
        expect(table.columns).toEqual(['city', 'temp', 'rain']);
        expect(table.rows).toEqual([
            { city: 'Oslo', temp: 4.5, rain: true },
            { city: 'Rome', temp: null, rain: false },
        ]);
    });

    it('pads short rows and names blank or repeated headers', () => {
        const { table } = parseCsv(',a,a\n1,2\n');
        expect(table.columns).toEqual(['Unnamed: 0', 'a', 'a.1']);
        expect(table.rows).toEqual([{ 'Unnamed: 0': 1, a: 2, 'a.1': null }]);
    });

    it('reads a __proto__ header like any other column', () => {
        const { table } = parseCsv('__proto__,b\n1,2\n');
        expect(table.columns).toEqual(['__proto__', 'b']);
        expect(table.column('__proto__')).toEqual([1]);
    });

    it('rejects empty input', () => {
        expect(() => parseCsv('')).toThrow(DatasetLoadError);
    });

    it('rejects malformed quoting', () => {
        expect(() => parseCsv('a,b\n"unterminated,1\n')).toThrow(/Could not parse CSV/);
    });
});

describe('loadCsv', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'tabletalk-csv-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('loads a file from disk', async () => {
        const path = join(dir, 'data.csv');
        writeFileSync(path, 'x,y\n1,2\n');
        const { table } = await loadCsv(path);
        expect(table.shape).toEqual([1, 2]);
    });

    it('wraps read failures', async () => {
        await expect(loadCsv(join(dir, 'missing.csv'))).rejects.toThrow(DatasetLoadError);
    });
});
