/**
 * Analyst -- turns one user question into one assistant message:
 * ask the model, run the optional verification round-trip, execute the
 * final code in the sandbox and attach what it produced.
 */

import { basename } from 'node:path';
import { AnalystSession, type SessionOptions } from '../agents/session.js';
import type { ChatProvider } from '../agents/providers.js';
import type { AnalystResponse } from '../agents/types.js';
import type { Figure } from '../charts/figure.js';
import { loadCsv, type CsvEncoding } from '../data/csv.js';
import { summarizeDataset, type DatasetSummary } from '../data/summary.js';
import type { Table } from '../data/table.js';
import { CredentialsError, ModelResponseError, getErrorMessage } from '../infra/errors.js';
import type { HistoryManager } from '../infra/history.js';
import { logger } from '../infra/logger.js';
import { execute } from '../sandbox/executor.js';
import { isEmptyCodeError, type ExecuteOptions, type ExecutionResult } from '../sandbox/types.js';

/** What the front end renders for one assistant turn. */
export interface AssistantMessage {
    role: 'assistant';
    analysis?: string;
    suggestions?: string;
    code?: string;
    charts?: readonly Figure[];
    tables?: readonly Table[];
    stdout?: string;
    error?: string;
}

export const NO_DATASET_MESSAGE = 'Please load a CSV file first before asking questions.';
export const EMPTY_QUERY_MESSAGE = 'Please enter a question about the dataset.';
export const NO_CODE_HINT = "The model didn't generate executable code for this request. Try rephrasing your question with more specific analysis requirements (e.g., 'Show me a bar chart of sales by product line').";
export const NO_VERIFICATION_OUTPUT = 'Verification code executed successfully but produced no output.';

export interface AnalystOptions {
    transcript?: Pick<HistoryManager, 'append'>;
    sandbox?: ExecuteOptions;
    session?: SessionOptions;
}

function fenced(text: string): string {
    return `\`\`\`\n${text}\n\`\`\``;
}

/** The text sent back to the model after a verification run. */
export function verificationOutput(result: ExecutionResult): string {
    if (result.stdout) return result.stdout;
    if (result.tables.length > 0) return result.tables[0].toString();
    return NO_VERIFICATION_OUTPUT;
}

function modelErrorMessage(error: unknown): string {
    if (error instanceof ModelResponseError || error instanceof CredentialsError) {
        return `Error: ${getErrorMessage(error)}`;
    }
    return `Failed to contact the language model: ${getErrorMessage(error)}`;
}

export class Analyst {
    private dataset: DatasetSummary | null = null;
    private session: AnalystSession | null = null;
    private source = 'dataset';

    constructor(private readonly provider: ChatProvider, private readonly options: AnalystOptions = {}) { }

    get summary(): DatasetSummary | null {
        return this.dataset;
    }

    /** Load a CSV from disk and start a fresh conversation about it. */
    async load(path: string): Promise<DatasetSummary> {
        const { table, encoding } = await loadCsv(path);
        return this.useTable(table, { encoding, source: basename(path) });
    }

    useTable(table: Table, options: { encoding?: CsvEncoding; source?: string } = {}): DatasetSummary {
        const summary = summarizeDataset(table, { encoding: options.encoding });
        this.dataset = summary;
        this.source = options.source ?? 'dataset';
        if (this.session) {
            this.session.reset(summary.text);
        } else {
            this.session = AnalystSession.create(this.provider, summary.text, this.options.session);
        }
        logger.info(`Loaded ${this.source}: ${table.rowCount} rows, ${table.columnCount} columns (${summary.encoding})`, 'Analyst');
        return summary;
    }

    /** Drop the conversation but keep the dataset. */
    reset(): void {
        this.session?.reset();
    }

    async process(query: string): Promise<AssistantMessage> {
        if (!this.dataset || !this.session) return { role: 'assistant', error: NO_DATASET_MESSAGE };
        if (!query.trim()) return { role: 'assistant', error: EMPTY_QUERY_MESSAGE };

        await this.options.transcript?.append('user', query, this.source);
        const message = await this.answer(query, this.dataset.table, this.session);
        await this.options.transcript?.append('assistant', message.error ?? message.analysis ?? '', this.source);
        return message;
    }

    private async answer(query: string, table: Table, session: AnalystSession): Promise<AssistantMessage> {
        let response: AnalystResponse;
        try {
            response = await session.ask(query);
        } catch (error) {
            logger.error('Model request failed', 'Analyst', error);
            return { role: 'assistant', error: modelErrorMessage(error) };
        }

        if (response.needsVerification) {
            const verification = execute(response.code, table, this.options.sandbox);
            if (verification.error) {
                return { role: 'assistant', error: `Verification failed:\n${fenced(verification.error)}` };
            }
            logger.debug('Sending verification output back to the model', 'Analyst');
            try {
                response = await session.sendExecutionResults(verificationOutput(verification));
            } catch (error) {
                logger.error('Verification follow-up failed', 'Analyst', error);
                return { role: 'assistant', error: `Error processing verification results: ${getErrorMessage(error)}` };
            }
        }

        const result = execute(response.code, table, this.options.sandbox);
        const message: AssistantMessage = {
            role: 'assistant',
            analysis: response.analysis,
            suggestions: response.suggestions,
            code: response.code,
        };

        if (result.error) {
            message.error = isEmptyCodeError(result) ? NO_CODE_HINT : `Code execution failed:\n${fenced(result.error)}`;
            return message;
        }
        if (result.charts.length > 0) message.charts = result.charts;
        if (result.tables.length > 0) message.tables = result.tables;
        if (result.stdout) message.stdout = result.stdout;
        return message;
    }
}
