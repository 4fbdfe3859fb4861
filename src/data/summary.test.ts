import { describe, it, expect } from 'vitest';
import { Table } from './table.js';
import { summarizeDataset } from './summary.js';

const weather = Table.fromRecords([
    { city: 'Oslo', temp: 4, ok: true },
    { city: 'Rome', temp: null, ok: false },
    { city: 'Oslo', temp: 8, ok: true },
]);

describe('summarizeDataset', () => {
    it('renders the text form sent to the model', () => {
        expect(summarizeDataset(weather).text).toBe([
            'Dataset with 3 rows and 3 columns.',
            'Total missing cells: 1 (11.11%).',
            ' - city (string); missing=0; 0% missing; unique_count=2; all_values[Oslo, Rome]',
            ' - temp (number); missing=1; 33.33% missing; stats[mean=6.00, median=6.00, std=2.83, min=4.00, max=8.00]',
            ' - ok (boolean); missing=0; 0% missing; unique_count=2; all_values[false, true]',
        ].join('\n'));
    });

    it('keeps structured details and a preview', () => {
        const { details, encoding, table } = summarizeDataset(weather, { encoding: 'latin1' });
        expect(encoding).toBe('latin1');
        expect(table).toBe(weather);
        expect(details.shape).toEqual({ rows: 3, columns: 3 });
        expect(details.missingValues).toEqual({ totalMissing: 1, missingPct: 11.11 });
        expect(details.previewRows).toHaveLength(3);
        expect(details.columns[1].statistics?.std).toBe('2.83');
    });

    it('lists only the top values of high-cardinality columns', () => {
        const ids = Array.from({ length: 60 }, (_, i) => `id${i}`);
        const table = Table.fromColumns({ id: [...ids, 'id1', 'id1', 'id2'] });
        const [column] = summarizeDataset(table, { maxTopValues: 2 }).details.columns;
        expect(column.uniqueCount).toBe(60);
        expect(column.allUniqueValues).toBeUndefined();
        expect(column.topValues).toEqual([
            { value: 'id1', count: 3 },
            { value: 'id2', count: 2 },
        ]);
    });

    it('handles empty tables', () => {
        const summary = summarizeDataset(new Table([]));
        expect(summary.text).toBe('Dataset with 0 rows and 0 columns.\nTotal missing cells: 0 (0%).');
    });

    it('marks all-missing columns as empty', () => {
        const [column] = summarizeDataset(Table.fromColumns({ v: [null, NaN] })).details.columns;
        expect(column.dtype).toBe('empty');
        expect(column.missingPct).toBe(100);
    });
});
