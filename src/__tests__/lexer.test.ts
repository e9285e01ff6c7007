// ─────────────────────────────────────────────────────────────
// zscribe  ·  Tokenizer Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { LexError } from '../core/errors';
import { tokenize } from '../parser/lexer';
import { directiveKey, directivePayload } from '../parser/tokens';

function types(source: string): string[] {
    return tokenize(source).map((t) => t.type);
}

describe('tokenize', () => {
    describe('basics', () => {
        it('scans identifiers, operators and numbers with positions', () => {
            const toks = tokenize('x + 1');
            expect(toks.map((t) => t.type)).toEqual(['IDENTIFIER', 'PLUS', 'NUMBER', 'EOF']);
            expect(toks.map((t) => t.value)).toEqual(['x', '+', '1', '']);
            expect(toks.map((t) => t.column)).toEqual([1, 3, 5, 6]);
            expect(toks[1].spaceBefore).toBe(true);
        });

        it('prefers the longest symbol', () => {
            expect(types('f +-> g')).toEqual(['IDENTIFIER', 'PFUN', 'IDENTIFIER', 'EOF']);
            expect(types('S -|> T')).toEqual(['IDENTIFIER', 'PINJ', 'IDENTIFIER', 'EOF']);
            expect(types('p <=> q')).toEqual(['IDENTIFIER', 'IFF', 'IDENTIFIER', 'EOF']);
        });

        it('maps word operators to keywords', () => {
            expect(types('p and not q')).toEqual(['IDENTIFIER', 'AND', 'NOT', 'IDENTIFIER', 'EOF']);
            expect(types('a elem S')).toEqual(['IDENTIFIER', 'IN', 'IDENTIFIER', 'EOF']);
        });

        it('treats F as the finite-set operator and T as a name', () => {
            expect(types('F X')).toEqual(['FINSET', 'IDENTIFIER', 'EOF']);
            expect(types('T')).toEqual(['IDENTIFIER', 'EOF']);
        });

        it('accepts Unicode spellings and counts columns in code points', () => {
            const toks = tokenize('∀ x : ℕ • x ≥ 0');
            expect(toks.map((t) => t.type)).toEqual([
                'FORALL', 'IDENTIFIER', 'COLON', 'IDENTIFIER', 'BULLET', 'IDENTIFIER', 'GREATER_EQUAL', 'NUMBER', 'EOF',
            ]);
            expect(toks[1].column).toBe(3);
        });

        it('keeps Z decorations on identifiers', () => {
            expect(tokenize('x? y!').map((t) => t.value)).toEqual(['x?', 'y!', '']);
        });

        it('lexes ranges between numbers', () => {
            expect(types('1..5')).toEqual(['NUMBER', 'RANGE', 'NUMBER', 'EOF']);
        });

        it('keeps line breaks and drops comments', () => {
            expect(types('x %% a note\ny')).toEqual(['IDENTIFIER', 'NEWLINE', 'IDENTIFIER', 'EOF']);
        });
    });

    describe('angle brackets', () => {
        it('opens a sequence at the start of an expression', () => {
            expect(types('<1, 2, 3>')).toEqual(['LANGLE', 'NUMBER', 'COMMA', 'NUMBER', 'COMMA', 'NUMBER', 'RANGLE', 'EOF']);
        });

        it('reads the empty sequence', () => {
            expect(types('<>')).toEqual(['LANGLE', 'RANGLE', 'EOF']);
        });

        it('reads spaced comparisons after an operand', () => {
            expect(types('x < 1, 2 > 3')).toEqual([
                'IDENTIFIER', 'LESS_THAN', 'NUMBER', 'COMMA', 'NUMBER', 'GREATER_THAN', 'NUMBER', 'EOF',
            ]);
        });

        it('opens a sequence after an operator', () => {
            expect(types('s = <a>')).toEqual(['IDENTIFIER', 'EQUALS', 'LANGLE', 'IDENTIFIER', 'RANGLE', 'EOF']);
        });
    });

    describe('carets and closures', () => {
        it('reads a spaced caret as concatenation', () => {
            expect(types('<a> ^ <b>')).toEqual(['LANGLE', 'IDENTIFIER', 'RANGLE', 'CAT', 'LANGLE', 'IDENTIFIER', 'RANGLE', 'EOF']);
        });

        it('reads an attached caret as a superscript', () => {
            expect(types('x^2')).toEqual(['IDENTIFIER', 'CARET', 'NUMBER', 'EOF']);
        });

        it('rejects an unspaced caret between sequences', () => {
            expect(() => tokenize('<a>^<b>')).toThrow(LexError);
        });

        it('reads attached + and * as closures', () => {
            expect(types('R+')).toEqual(['IDENTIFIER', 'TCLOSURE', 'EOF']);
            expect(types('R*')).toEqual(['IDENTIFIER', 'RTCLOSURE', 'EOF']);
        });

        it('reads + between operands as addition', () => {
            expect(types('a+b')).toEqual(['IDENTIFIER', 'PLUS', 'IDENTIFIER', 'EOF']);
            expect(types('a + b')).toEqual(['IDENTIFIER', 'PLUS', 'IDENTIFIER', 'EOF']);
        });

        it('reads an attached + or * before a spaced operand as arithmetic', () => {
            expect(types('n+ 1')).toEqual(['IDENTIFIER', 'PLUS', 'NUMBER', 'EOF']);
            expect(types('x* 2')).toEqual(['IDENTIFIER', 'STAR', 'NUMBER', 'EOF']);
            expect(types('R+ = S')).toEqual(['IDENTIFIER', 'TCLOSURE', 'EQUALS', 'IDENTIFIER', 'EOF']);
        });
    });

    describe('brackets', () => {
        it('closes a bag with ]]', () => {
            expect(types('[[a]]')).toEqual(['LBAG', 'IDENTIFIER', 'RBAG', 'EOF']);
        });

        it('splits ]] outside a bag', () => {
            expect(types('s[t[1]]')).toEqual([
                'IDENTIFIER', 'LBRACKET', 'IDENTIFIER', 'LBRACKET', 'NUMBER', 'RBRACKET', 'RBRACKET', 'EOF',
            ]);
        });

        it('scans relational image brackets', () => {
            expect(types('R(| S |)')).toEqual(['IDENTIFIER', 'LIMG', 'IDENTIFIER', 'RIMG', 'EOF']);
        });
    });

    describe('directives', () => {
        it('takes a section line whole', () => {
            const [tok] = tokenize('=== Intro ===');
            expect(tok.type).toBe('SECTION');
            expect(tok.value).toBe('=== Intro ===');
        });

        it('rejects a section without its closing marker', () => {
            expect(() => tokenize('=== Intro')).toThrow('Expected closing \'===\' after section title');
        });

        it('carries text payloads on the token', () => {
            const [tok] = tokenize('TEXT: hello there');
            expect(tok.type).toBe('TEXT');
            expect(directivePayload(tok)).toBe('hello there');
        });

        it('reads metadata keys', () => {
            const [tok] = tokenize('AUTHOR: A. Student');
            expect(tok.type).toBe('METADATA');
            expect(directiveKey(tok)).toBe('AUTHOR');
            expect(directivePayload(tok)).toBe('A. Student');
        });

        it('reads part labels followed by content', () => {
            expect(tokenize('(a) x').map((t) => [t.type, t.value])).toEqual([
                ['PART_LABEL', '(a)'], ['IDENTIFIER', 'x'], ['EOF', ''],
            ]);
        });

        it('lexes the rest of a block directive line', () => {
            expect(types('PROOF:\nx')).toEqual(['PROOF', 'NEWLINE', 'IDENTIFIER', 'EOF']);
        });

        it('takes a trailing bracket in a proof as raw justification text', () => {
            const tokens = tokenize('PROOF:\np [by \'lemma\']');
            expect(tokens.map((t) => t.type)).toEqual(['PROOF', 'NEWLINE', 'IDENTIFIER', 'JUSTIFICATION', 'EOF']);
            expect(tokens[3].value).toBe('[by \'lemma\']');
        });

        it('leaves brackets alone once a paragraph ends the proof', () => {
            expect(types('PROOF:\np [r]\ngendef [X]')).toEqual([
                'PROOF', 'NEWLINE', 'IDENTIFIER', 'JUSTIFICATION', 'NEWLINE', 'GENDEF', 'LBRACKET', 'IDENTIFIER', 'RBRACKET', 'EOF',
            ]);
        });

        it('reads a dashed line in an inference rule', () => {
            const tokens = tokenize('INFRULE:\nA\n---\nB');
            expect(tokens.map((t) => t.type)).toEqual(['INFRULE', 'NEWLINE', 'IDENTIFIER', 'NEWLINE', 'RULE_LINE', 'NEWLINE', 'IDENTIFIER', 'EOF']);
            expect(tokens[4].value).toBe('---');
        });
    });

    describe('line continuation', () => {
        it('joins the next line after a trailing backslash', () => {
            const tokens = tokenize('p and \\\nq');
            expect(tokens.map((t) => t.type)).toEqual(['IDENTIFIER', 'AND', 'CONTINUATION', 'IDENTIFIER', 'EOF']);
            expect(tokens[3]).toMatchObject({ value: 'q', line: 2, column: 1 });
        });

        it('allows a comment after the backslash', () => {
            expect(types('p and \\ %% note\nq')).toEqual(['IDENTIFIER', 'AND', 'CONTINUATION', 'IDENTIFIER', 'EOF']);
        });

        it('still reads a backslash between operands as set difference', () => {
            expect(types('A \\ B')).toEqual(['IDENTIFIER', 'SETMINUS', 'IDENTIFIER', 'EOF']);
        });
    });

    describe('errors', () => {
        it('reports the position of an unknown character', () => {
            try {
                tokenize('x $');
                expect.unreachable();
            } catch (err) {
                expect(err).toBeInstanceOf(LexError);
                if (err instanceof LexError) {
                    expect(err.message).toBe('Unexpected character \'$\'');
                    expect(err.line).toBe(1);
                    expect(err.column).toBe(3);
                    expect(err.character).toBe('$');
                }
            }
        });
    });

    it('reproduces token kinds from its own lexemes', () => {
        const source = 'forall x : N | x >= 0 and <1> ^ s = t';
        const first = tokenize(source);
        const rebuilt = first.filter((t) => t.type !== 'EOF').map((t) => (t.spaceBefore ? ' ' : '') + t.value).join('');
        expect(types(rebuilt)).toEqual(first.map((t) => t.type));
    });
});
