import type { Figure } from '../charts/figure.js';
import type { Table } from '../data/table.js';

/** Returned when the code is empty or whitespace only. Callers match on it. */
export const NO_CODE_ERROR = 'No code to execute.';

/** Outcome of one sandbox run. On error both artifact lists are empty. */
export interface ExecutionResult {
    readonly charts: readonly Figure[];
    readonly tables: readonly Table[];
    readonly stdout: string;
    readonly error: string | null;
}

export interface ExecuteOptions {
    /** Wall-clock limit for the whole run. */
    timeoutMs?: number;
    /** Cap on captured print output; longer output keeps its head and tail. */
    maxOutputChars?: number;
    /** Stack frames kept in an error report. */
    maxTraceFrames?: number;
    /** Nesting depth the artifact search descends to. */
    maxCollectDepth?: number;
}

export interface Artifacts {
    charts: Figure[];
    tables: Table[];
}

export function createResult(fields: Partial<ExecutionResult>): ExecutionResult {
    return Object.freeze({
        charts: Object.freeze([...(fields.charts ?? [])]),
        tables: Object.freeze([...(fields.tables ?? [])]),
        stdout: fields.stdout ?? '',
        error: fields.error ?? null,
    });
}

export function isEmptyCodeError(result: ExecutionResult): boolean {
    return result.error === NO_CODE_ERROR;
}
