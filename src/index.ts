// ─────────────────────────────────────────────────────────────
// zscribe  ·  Public API
// ─────────────────────────────────────────────────────────────

import { ZscribeError, formatError } from './core/errors';
import { DEFAULT_OPTIONS, generate, type GenerateOptions, type Warning } from './emitters/latex';
import { parse } from './parser/document';

export { tokenize } from './parser/lexer';
export { parse, DocumentParser } from './parser/document';
export { parseExpressionText } from './parser/expressions';
export { generate, scanOverflow, DEFAULT_OPTIONS } from './emitters/latex';
export type { GenerateOptions, GenerateResult, Warning } from './emitters/latex';
export { generateHtml } from './emitters/html';
export { renderSmartText, smartSegments, PASSES } from './emitters/smart-text';
export { ZscribeError, LexError, ParserError, GenerationError, formatError } from './core/errors';
export type { NotationMode } from './core/symbols';
export type * from './parser/ast';
export type { Token, TokenType } from './parser/tokens';

export type ConvertResult =
    | { readonly ok: true; readonly output: string; readonly warnings: readonly Warning[] }
    | { readonly ok: false; readonly error: ZscribeError; readonly message: string };

/**
 * Source text to LaTeX in one call. Lexer and parser failures come back as
 * a formatted message; a GenerationError still throws.
 */
export function convert(source: string, options: Partial<GenerateOptions> = {}): ConvertResult {
    const opts: GenerateOptions = { ...DEFAULT_OPTIONS, ...options };
    try {
        const { output, warnings } = generate(parse(source), opts.mode, opts.overflowThreshold);
        return { ok: true, output, warnings };
    } catch (err) {
        if (err instanceof ZscribeError) return { ok: false, error: err, message: formatError(err, source) };
        throw err;
    }
}
