/**
 * Turns the model's reply into an AnalystResponse: JSON parse, shape
 * validation with zod, and cleanup of the code field so it runs as-is in
 * the sandbox.
 */

import ts from 'typescript';
import { z } from 'zod';
import { ModelResponseError } from '../infra/errors.js';
import { PRELOADED_NAMES } from '../sandbox/capabilities.js';
import { bindingNames } from '../sandbox/statement.js';
import type { AnalystResponse } from './types.js';

const REQUIRED_KEYS = ['analysis', 'code', 'suggestions'] as const;

const AnalystPayloadSchema = z.object({
    analysis: z.string(),
    code: z.string(),
    suggestions: z.union([z.string(), z.array(z.string()).transform(items => items.join('\n'))]),
    needs_verification: z
        .union([z.boolean(), z.enum(['true', 'false']).transform(value => value === 'true')])
        .nullish()
        .transform(value => value ?? false),
});

function stripFence(text: string): string {
    const trimmed = text.trim();
    if (!trimmed.startsWith('```')) return trimmed;
    const lines = trimmed.split('\n').slice(1);
    if (lines.length > 0 && lines[lines.length - 1].trim() === '```') lines.pop();
    return lines.join('\n');
}

function isRequireCall(node: ts.Expression | undefined): boolean {
    return node !== undefined
        && ts.isCallExpression(node)
        && ts.isIdentifier(node.expression)
        && node.expression.text === 'require';
}

/** Names a top-level import or require statement binds, or null for any other statement. */
function importedNames(statement: ts.Statement): string[] | null {
    if (ts.isImportDeclaration(statement)) {
        const clause = statement.importClause;
        if (!clause) return null;
        const names: string[] = clause.name ? [clause.name.text] : [];
        const bindings = clause.namedBindings;
        if (bindings && ts.isNamespaceImport(bindings)) names.push(bindings.name.text);
        if (bindings && ts.isNamedImports(bindings)) names.push(...bindings.elements.map(element => element.name.text));
        return names;
    }
    if (ts.isVariableStatement(statement)) {
        const declarations = statement.declarationList.declarations;
        if (!declarations.every(declaration => isRequireCall(declaration.initializer))) return null;
        return declarations.flatMap(declaration => bindingNames(declaration.name));
    }
    return null;
}

/**
 * Code with a surrounding markdown fence removed and with import/require
 * statements dropped when everything they bind is already provided.
 */
export function extractCode(raw: string): string {
    const code = stripFence(raw);
    const source = ts.createSourceFile('analysis.js', code, ts.ScriptTarget.ES2022, true, ts.ScriptKind.JS);

    let result = '';
    let cursor = 0;
    for (const statement of source.statements) {
        const names = importedNames(statement);
        if (!names || names.length === 0 || !names.every(name => PRELOADED_NAMES.has(name))) continue;
        result += code.slice(cursor, statement.getStart(source));
        cursor = statement.end;
        if (code[cursor] === '\n') cursor++;
    }
    return (result + code.slice(cursor)).trim();
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(stripFence(text));
    } catch (err) {
        throw new ModelResponseError('Failed to parse JSON from the model response.', { cause: err });
    }
}

export function parseAnalystResponse(text: string): AnalystResponse {
    const payload = parseJson(text);
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
        throw new ModelResponseError('Model response is not a JSON object.');
    }

    const missing = REQUIRED_KEYS.filter(key => !(key in payload));
    if (missing.length > 0) {
        throw new ModelResponseError(`Model response missing expected keys: ${missing.join(', ')}`);
    }

    const parsed = AnalystPayloadSchema.safeParse(payload);
    if (!parsed.success) {
        const fields = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
        throw new ModelResponseError(`Model response has invalid fields: ${fields.join(', ')}`);
    }

    return {
        analysis: parsed.data.analysis.trim(),
        code: extractCode(parsed.data.code),
        suggestions: parsed.data.suggestions.trim(),
        needsVerification: parsed.data.needs_verification,
    };
}
