// ─────────────────────────────────────────────────────────────
// zscribe  ·  Error Taxonomy and Formatter
// ─────────────────────────────────────────────────────────────

import type { Token } from '../parser/tokens';

export class ZscribeError extends Error {
    constructor(
        message: string,
        readonly line: number,
        readonly column: number,
    ) {
        super(message);
        this.name = 'ZscribeError';
    }
}

/** A character the tokenizer cannot scan. */
export class LexError extends ZscribeError {
    constructor(message: string, line: number, column: number, readonly character: string) {
        super(message, line, column);
        this.name = 'LexError';
    }
}

/** A grammar violation; `token` is where the parser stopped. */
export class ParserError extends ZscribeError {
    constructor(message: string, readonly token: Token) {
        super(message, token.line, token.column);
        this.name = 'ParserError';
    }
}

/** Internal invariant violation in the generator. Never a user error. */
export class GenerationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GenerationError';
    }
}

/** Default branch of every exhaustive switch over a tagged union. */
export function assertNever(value: never, what: string): never {
    throw new GenerationError(`Unhandled ${what}: ${JSON.stringify(value)}`);
}

// ── Formatting ──────────────────────────────────────────────

const HINTS: readonly (readonly [RegExp, string])[] = [
    [/expected 'end'/i, 'Did you forget \'end\' before starting a new block?'],
    [/expected closing '==='/i, 'Section markers must match: === Title ==='],
    [/expected closing '\*\*'/i, 'Solution markers must match: ** Solution N **'],
    [/unexpected token after expression/i, 'Check for missing operators or extra characters'],
    [/unexpected character/i, 'This character is not part of the notation'],
    [/expected 'where' or 'end'/i, 'Schema and axdef blocks need \'where\' for predicates or \'end\' to close'],
    [/unclosed/i, 'Make sure all brackets, braces and parentheses are balanced'],
    [/expected identifier/i, 'A variable or type name is required here'],
    [/expected ':'/i, 'Declarations need a colon between name and type'],
];

export function hintFor(message: string): string | null {
    for (const [pattern, hint] of HINTS) {
        if (pattern.test(message)) return hint;
    }
    return null;
}

/**
 * Render an error against its source, compiler style:
 *
 *     Error: Expected ':' after binder names
 *
 *     2 | forall x N | x > 0
 *       |          ^
 */
export function formatError(error: ZscribeError, source: string, contextLines: number = 1): string {
    const lines = source.replace(/\r\n?/g, '\n').split('\n');
    const errorIdx = error.line - 1;
    const start = Math.max(0, errorIdx - contextLines);
    const end = Math.min(lines.length, errorIdx + contextLines + 1);
    const width = String(end).length;

    const parts: string[] = [`Error: ${error.message}`, ''];
    for (let idx = start; idx < end; idx++) {
        parts.push(`${String(idx + 1).padStart(width)} | ${lines[idx]}`);
        if (idx === errorIdx) {
            parts.push(`${' '.repeat(width)} | ${' '.repeat(Math.max(0, error.column - 1))}^`);
        }
    }

    const hint = hintFor(error.message);
    if (hint) parts.push('', `Hint: ${hint}`);
    return parts.join('\n');
}
