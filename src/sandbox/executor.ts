/**
 * In-process sandbox for model-written analysis code.
 *
 * Each call gets a fresh `vm` context whose global object has been stripped
 * down to the capability allow-list, with string code generation and
 * WebAssembly disabled. The dataset is deep-copied in as `df`; whatever
 * charts and derived tables the code leaves in its top-level bindings are
 * returned alongside the captured print output.
 *
 * `execute` never throws. Every failure, including a timeout, comes back as
 * an error report on the result.
 */

import { Script, createContext, type Context } from 'node:vm';
import { performance } from 'node:perf_hooks';
import { inspect, types } from 'node:util';
import { config } from '../config/index.js';
import type { Table } from '../data/table.js';
import { logger } from '../infra/logger.js';
import { ALLOWED_NAMES, buildCapabilities } from './capabilities.js';
import { collectArtifacts } from './collector.js';
import { ConsoleCapture } from './console.js';
import { planExecution } from './statement.js';
import { NO_CODE_ERROR, createResult, type ExecuteOptions, type ExecutionResult } from './types.js';

/** Name user code runs under; stack frames that mention it are the ones worth reporting. */
export const SCRIPT_FILENAME = 'analysis.js';

const PRUNE_SOURCE = `(() => {
    const global = globalThis;
    const keep = new Set(${JSON.stringify([...ALLOWED_NAMES])});
    for (const name of Object.getOwnPropertyNames(global)) {
        if (!keep.has(name)) delete global[name];
    }
})();`;

const pruneScript = new Script(PRUNE_SOURCE, { filename: 'prune.js' });

/** Prints the trailing value inside a context so the timeout also bounds its formatting. */
const showScript = new Script('show(value)', { filename: 'show.js' });

export const ASYNC_CODE_ERROR = 'SyntaxError: async code is not supported in the sandbox';

/**
 * A context whose global object holds nothing but the allow-listed
 * intrinsics and the given bindings.
 */
export function createSandboxContext(bindings: Record<string, unknown>): Context {
    const context = createContext(bindings, {
        name: 'analysis',
        codeGeneration: { strings: false, wasm: false },
        microtaskMode: 'afterEvaluate',
    });
    pruneScript.runInContext(context);
    return context;
}

function safeString(read: () => unknown, fallback: string): string {
    try {
        const value = read();
        return typeof value === 'string' ? value : fallback;
    } catch {
        return fallback;
    }
}

/**
 * `Name: message` followed by up to `maxFrames` stack frames that point
 * into the analysis code. Values thrown that are not errors are inspected.
 */
export function formatErrorReport(error: unknown, maxFrames: number): string {
    if (!types.isNativeError(error)) {
        // Hooks on a thrown value would run outside the timeout.
        return `Uncaught ${safeString(() => inspect(error, { depth: 2, breakLength: Infinity, customInspect: false, getters: false }), '(unprintable value)')}`;
    }

    const name = safeString(() => error.name, 'Error');
    const message = safeString(() => error.message, '');
    const stack = safeString(() => error.stack, '');
    const lines = [message ? `${name}: ${message}` : name];

    // Compile errors carry the location as a "file:line" banner instead of a frame.
    const banner = stack.split('\n', 1)[0];
    if (name === 'SyntaxError' && banner.startsWith(`${SCRIPT_FILENAME}:`)) {
        lines.push(`    at ${banner}`);
    }

    const frames = stack
        .split('\n')
        .filter(line => line.trimStart().startsWith('at ') && line.includes(SCRIPT_FILENAME))
        .slice(0, Math.max(0, maxFrames - (lines.length - 1)));
    lines.push(...frames);
    return lines.join('\n');
}

function isTimeout(error: unknown): boolean {
    return types.isNativeError(error) && 'code' in error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

function resolveOptions(options: ExecuteOptions): Required<ExecuteOptions> {
    return {
        timeoutMs: options.timeoutMs ?? config.sandbox.timeoutMs,
        maxOutputChars: options.maxOutputChars ?? config.sandbox.maxOutputChars,
        maxTraceFrames: options.maxTraceFrames ?? config.sandbox.maxTraceFrames,
        maxCollectDepth: options.maxCollectDepth ?? config.sandbox.maxCollectDepth,
    };
}

/** Global-object bindings in insertion order, then top-level lexical ones in source order. */
function snapshotBindings(context: Context, lexicalNames: readonly string[]): unknown[] {
    const values: unknown[] = [];
    for (const descriptor of Object.values(Object.getOwnPropertyDescriptors(context))) {
        if ('value' in descriptor) values.push(descriptor.value);
    }
    if (lexicalNames.length > 0) {
        const lexical: unknown = new Script(`[${lexicalNames.join(', ')}]`).runInContext(context);
        if (Array.isArray(lexical)) values.push(...lexical);
    }
    return values;
}

export function execute(code: string, dataset: Table, options: ExecuteOptions = {}): ExecutionResult {
    if (code.trim() === '') return createResult({ error: NO_CODE_ERROR });

    const settings = resolveOptions(options);
    const capture = new ConsoleCapture(settings.maxOutputChars);
    const startedAt = performance.now();
    const remaining = () => Math.max(1, Math.ceil(settings.timeoutMs - (performance.now() - startedAt)));

    try {
        const whole = new Script(code, { filename: SCRIPT_FILENAME });
        const plan = planExecution(code);
        if (plan.asyncAt) {
            logger.debug('Run refused: async code', 'Sandbox');
            return createResult({ error: `${ASYNC_CODE_ERROR}\n    at ${SCRIPT_FILENAME}:${plan.asyncAt.line + 1}` });
        }
        const context = createSandboxContext(
            buildCapabilities(dataset.copy(), (...values: unknown[]) => capture.print(...values)),
        );

        if (plan.trailing) {
            new Script(plan.body, { filename: SCRIPT_FILENAME }).runInContext(context, { timeout: remaining() });
            const expression = new Script(plan.trailing.source, {
                filename: SCRIPT_FILENAME,
                lineOffset: plan.trailing.line,
                columnOffset: plan.trailing.column,
            });
            const value: unknown = expression.runInContext(context, { timeout: remaining() });
            if (value !== undefined) {
                const show = (shown: unknown) => capture.print(shown);
                showScript.runInContext(createContext({ show, value }), { timeout: remaining() });
            }
        } else {
            whole.runInContext(context, { timeout: remaining() });
        }

        const artifacts = collectArtifacts(snapshotBindings(context, plan.lexicalNames), dataset, {
            maxDepth: settings.maxCollectDepth,
        });
        logger.debug(
            `Run finished in ${Math.round(performance.now() - startedAt)}ms: ${artifacts.charts.length} charts, ${artifacts.tables.length} tables`,
            'Sandbox',
        );
        return createResult({ ...artifacts, stdout: capture.text().trim() });
    } catch (error) {
        const report = isTimeout(error)
            ? `Error: Script execution timed out after ${settings.timeoutMs}ms`
            : formatErrorReport(error, settings.maxTraceFrames);
        logger.debug(`Run failed: ${report.split('\n', 1)[0]}`, 'Sandbox');
        return createResult({ stdout: capture.text(), error: report });
    }
}
