/**
 * Finds charts and derived tables among the values a run left behind.
 * Values created inside the sandbox come from another realm, so arrays,
 * sets, maps and plain objects are recognised without instanceof.
 */

import { types } from 'node:util';
import { Figure } from '../charts/figure.js';
import { Table } from '../data/table.js';
import type { Artifacts } from './types.js';

export type Classified =
    | { kind: 'chart'; value: Figure }
    | { kind: 'table'; value: Table }
    | { kind: 'sequence'; items: Iterable<unknown> }
    | { kind: 'set'; items: Iterable<unknown> }
    | { kind: 'mapping'; items: Iterable<unknown> }
    | { kind: 'scalar' };

export const DEFAULT_MAX_DEPTH = 32;

function isPlainObject(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null) return true;
    if (typeof proto !== 'object') return false;
    // Object.prototype of some realm.
    return Object.getPrototypeOf(proto) === null && Object.prototype.hasOwnProperty.call(proto, 'hasOwnProperty');
}

/** Enumerable data properties only; accessors are never invoked. */
function* ownValues(value: object): Generator<unknown> {
    for (const descriptor of Object.values(Object.getOwnPropertyDescriptors(value))) {
        if (descriptor.enumerable && 'value' in descriptor) yield descriptor.value;
    }
}

export function classify(value: unknown): Classified {
    if (value instanceof Figure) return { kind: 'chart', value };
    if (value instanceof Table) return { kind: 'table', value };
    if (typeof value !== 'object' || value === null) return { kind: 'scalar' };
    if (Array.isArray(value)) return { kind: 'sequence', items: ownValues(value) };
    if (types.isSet(value)) return { kind: 'set', items: Set.prototype.values.call(value) };
    if (types.isMap(value)) return { kind: 'mapping', items: Map.prototype.values.call(value) };
    if (isPlainObject(value)) return { kind: 'mapping', items: ownValues(value) };
    return { kind: 'scalar' };
}

function sameShape(candidate: Table, original: Table): boolean {
    if (candidate.rowCount !== original.rowCount || candidate.columnCount !== original.columnCount) return false;
    const a = candidate.columns;
    const b = original.columns;
    return a.every((name, i) => name === b[i]);
}

export interface CollectOptions {
    maxDepth?: number;
}

/**
 * Charts and tables in binding order, then container iteration order.
 * A table shaped exactly like the original dataset is taken to be the
 * dataset itself and left out.
 */
export function collectArtifacts(bindings: readonly unknown[], original: Table, options: CollectOptions = {}): Artifacts {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const artifacts: Artifacts = { charts: [], tables: [] };
    const path = new Set<object>();

    const visit = (value: unknown, depth: number): void => {
        const node = classify(value);
        switch (node.kind) {
            case 'chart':
                artifacts.charts.push(node.value);
                return;
            case 'table':
                if (!sameShape(node.value, original)) artifacts.tables.push(node.value);
                return;
            case 'scalar':
                return;
            default: {
                if (depth >= maxDepth || typeof value !== 'object' || value === null || path.has(value)) return;
                path.add(value);
                for (const item of node.items) visit(item, depth + 1);
                path.delete(value);
            }
        }
    };

    for (const binding of bindings) visit(binding, 0);
    return artifacts;
}
