import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Analyst, EMPTY_QUERY_MESSAGE, NO_CODE_HINT, NO_DATASET_MESSAGE, NO_VERIFICATION_OUTPUT, verificationOutput } from './analyst.js';
import type { ChatProvider } from '../agents/providers.js';
import type { ChatMessage } from '../agents/types.js';
import { Table } from '../data/table.js';
import { CredentialsError, ModelTransportError } from '../infra/errors.js';
import type { HistoryManager } from '../infra/history.js';
import { createResult } from '../sandbox/types.js';

vi.mock('../infra/logger.js', () => ({
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

function reply(fields: { analysis?: string; code: string; suggestions?: string; needs_verification?: boolean }): string {
    return JSON.stringify({ analysis: 'Analysis.', suggestions: 'Next?', ...fields });
}

function sales(): Table {
    return Table.fromRecords([
        { region: 'north', units: 10 },
        { region: 'south', units: 4 },
        { region: 'north', units: 6 },
    ]);
}

describe('Analyst', () => {
    const chat = vi.fn<(messages: readonly ChatMessage[]) => Promise<string>>();
    const provider: ChatProvider = {
        chat,
        healthCheck: vi.fn().mockResolvedValue({ ok: true, host: 'test', model: 'test' }),
    };
    let analyst: Analyst;

    beforeEach(() => {
        chat.mockReset();
        analyst = new Analyst(provider);
        analyst.useTable(sales(), { source: 'sales.csv' });
    });

    it('asks for a dataset first', async () => {
        const fresh = new Analyst(provider);
        await expect(fresh.process('anything')).resolves.toEqual({ role: 'assistant', error: NO_DATASET_MESSAGE });
        expect(chat).not.toHaveBeenCalled();
    });

    it('asks for a question when the query is blank', async () => {
        await expect(analyst.process('  \n')).resolves.toEqual({ role: 'assistant', error: EMPTY_QUERY_MESSAGE });
        expect(chat).not.toHaveBeenCalled();
    });

    it('runs the code and attaches tables, charts and output', async () => {
        chat.mockResolvedValueOnce(reply({
            code: [
                "const totals = df.groupBy('region').sum('units');",
                "const chart = charts.bar(totals, { x: 'region', y: 'units' });",
                "print('done')",
            ].join('\n'),
        }));

        const message = await analyst.process('Units per region?');

        expect(message.error).toBeUndefined();
        expect(message.analysis).toBe('Analysis.');
        expect(message.suggestions).toBe('Next?');
        expect(message.stdout).toBe('done');
        expect(message.tables?.map(table => table.toRecords())).toEqual([[
            { region: 'north', units: 16 },
            { region: 'south', units: 4 },
        ]]);
        expect(message.charts).toHaveLength(1);
    });

    it('runs the verification round-trip before answering', async () => {
        chat
            .mockResolvedValueOnce(reply({ code: "print(df.unique('region').join(','))", needs_verification: true }))
            .mockResolvedValueOnce(reply({ analysis: 'Final.', code: "print('final')" }));

        const message = await analyst.process('Which regions?');

        expect(chat).toHaveBeenCalledTimes(2);
        const followUp = chat.mock.calls[1][0];
        expect(followUp[followUp.length - 1].content).toContain('Execution results:\n```\nnorth,south\n```');
        expect(message).toMatchObject({ analysis: 'Final.', stdout: 'final' });
    });

    it('stops when the verification code fails', async () => {
        chat.mockResolvedValueOnce(reply({ code: "df.column('nope')", needs_verification: true }));
        const message = await analyst.process('q');
        expect(message.error?.startsWith('Verification failed:\n```\nError: Unknown column: nope')).toBe(true);
        expect(chat).toHaveBeenCalledTimes(1);
    });

    it('explains a reply without code', async () => {
        chat.mockResolvedValueOnce(reply({ code: '' }));
        const message = await analyst.process('q');
        expect(message.error).toBe(NO_CODE_HINT);
        expect(message.analysis).toBe('Analysis.');
    });

    it('reports execution failures with the error report', async () => {
        chat.mockResolvedValueOnce(reply({ code: "throw new RangeError('too big')" }));
        const message = await analyst.process('q');
        expect(message.error?.startsWith('Code execution failed:\n```\nRangeError: too big')).toBe(true);
        expect(message.tables).toBeUndefined();
    });

    it('turns model failures into error messages', async () => {
        chat.mockRejectedValueOnce(new CredentialsError('MISTRAL_API_KEY is not set.'));
        await expect(analyst.process('q')).resolves.toEqual({ role: 'assistant', error: 'Error: MISTRAL_API_KEY is not set.' });

        chat.mockRejectedValueOnce(new ModelTransportError('Mistral API error: 503 - busy', { status: 503 }));
        await expect(analyst.process('q')).resolves.toEqual({
            role: 'assistant',
            error: 'Failed to contact the language model: Mistral API error: 503 - busy',
        });

        chat.mockResolvedValueOnce('{"analysis": "only"}');
        await expect(analyst.process('q')).resolves.toEqual({
            role: 'assistant',
            error: 'Error: Model response missing expected keys: code, suggestions',
        });
    });

    it('writes both sides to the transcript', async () => {
        const append = vi.fn<HistoryManager['append']>().mockResolvedValue(undefined);
        const logged = new Analyst(provider, { transcript: { append } });
        logged.useTable(sales(), { source: 'sales.csv' });
        chat.mockResolvedValueOnce(reply({ analysis: 'Ten.', code: 'print(10)' }));

        await logged.process('How many?');

        expect(append.mock.calls).toEqual([
            ['user', 'How many?', 'sales.csv'],
            ['assistant', 'Ten.', 'sales.csv'],
        ]);
    });

    it('starts over when another dataset is loaded', async () => {
        chat.mockResolvedValue(reply({ code: 'print(df.rowCount)' }));
        await analyst.process('first');
        analyst.useTable(sales().head(1));
        const message = await analyst.process('second');

        const sent = chat.mock.calls[1][0];
        expect(sent).toHaveLength(3);
        expect(sent[1].content).toContain('Dataset with 1 rows and 2 columns.');
        expect(message.stdout).toBe('1');
    });
});

describe('verificationOutput', () => {
    it('prefers stdout, then the first table, then a fixed note', () => {
        const table = Table.fromRecords([{ a: 1 }]);
        expect(verificationOutput(createResult({ stdout: 'seen', tables: [table] }))).toBe('seen');
        expect(verificationOutput(createResult({ tables: [table] }))).toBe('   a\n0  1');
        expect(verificationOutput(createResult({}))).toBe(NO_VERIFICATION_OUTPUT);
    });
});
