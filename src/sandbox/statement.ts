/**
 * Splits analysis code into the part that runs as-is and an optional
 * trailing expression whose value gets printed, using a real parse of the
 * source rather than guessing from the last line.
 */

import ts from 'typescript';

export interface TrailingExpression {
    source: string;
    /** Zero-based position of the expression in the original code. */
    line: number;
    column: number;
}

export interface SourcePosition {
    /** Zero-based. */
    line: number;
    column: number;
}

export interface ExecutionPlan {
    body: string;
    trailing: TrailingExpression | null;
    /** Top-level let/const/class bindings in source order. */
    lexicalNames: string[];
    /** First `async`, `await` or `for await`; such code cannot run synchronously. */
    asyncAt: SourcePosition | null;
}

function positionOf(source: ts.SourceFile, offset: number): SourcePosition {
    const { line, character } = source.getLineAndCharacterOfPosition(offset);
    return { line, column: character };
}

function isAssignment(expression: ts.Expression): boolean {
    let inner = expression;
    while (ts.isParenthesizedExpression(inner)) inner = inner.expression;
    if (!ts.isBinaryExpression(inner)) return false;
    const kind = inner.operatorToken.kind;
    return kind >= ts.SyntaxKind.FirstAssignment && kind <= ts.SyntaxKind.LastAssignment;
}

/** Identifiers a declaration binds, destructuring patterns included. */
export function bindingNames(name: ts.BindingName, out: string[] = []): string[] {
    if (ts.isIdentifier(name)) {
        out.push(name.text);
        return out;
    }
    for (const element of name.elements) {
        if (ts.isBindingElement(element)) bindingNames(element.name, out);
    }
    return out;
}

function collectLexicalNames(statements: readonly ts.Statement[]): string[] {
    const names: string[] = [];
    for (const statement of statements) {
        if (ts.isVariableStatement(statement)) {
            if ((statement.declarationList.flags & ts.NodeFlags.BlockScoped) === 0) continue;
            for (const declaration of statement.declarationList.declarations) bindingNames(declaration.name, names);
        } else if (ts.isClassDeclaration(statement) && statement.name) {
            names.push(statement.name.text);
        }
    }
    return names;
}

function findAsync(node: ts.Node): ts.Node | undefined {
    if (node.kind === ts.SyntaxKind.AsyncKeyword || ts.isAwaitExpression(node)) return node;
    if (ts.isForOfStatement(node) && node.awaitModifier) return node.awaitModifier;
    return ts.forEachChild(node, findAsync);
}

export function planExecution(code: string): ExecutionPlan {
    const source = ts.createSourceFile('analysis.js', code, ts.ScriptTarget.ES2022, true, ts.ScriptKind.JS);
    const statements = source.statements;
    const lexicalNames = collectLexicalNames(statements);
    const asyncNode = findAsync(source);
    const asyncAt = asyncNode ? positionOf(source, asyncNode.getStart(source)) : null;
    const last = statements.length > 0 ? statements[statements.length - 1] : undefined;

    const multiline = code.trim().includes('\n');
    if (!multiline || !last || !ts.isExpressionStatement(last) || isAssignment(last.expression)) {
        return { body: code, trailing: null, lexicalNames, asyncAt };
    }

    const start = last.getStart(source);
    return {
        body: code.slice(0, start),
        trailing: { source: code.slice(start, last.end), ...positionOf(source, start) },
        lexicalNames,
        asyncAt,
    };
}
