// ─────────────────────────────────────────────────────────────
// zscribe  ·  Expression Parser and Emitter Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { ParserError } from '../core/errors';
import { BINARY_OPERATORS } from '../core/precedence';
import { BINARY_SYMBOLS, DIALECT_SYMBOLS, NOTATION_MODES, symbol, type DialectSymbol } from '../core/symbols';
import { emitExpr } from '../emitters/latex-expr';
import type { BinaryOperator } from '../parser/ast';
import { parseExpressionText } from '../parser/expressions';

function fuzz(text: string): string {
    return emitExpr(parseExpressionText(text), { mode: 'fuzz' });
}

function standard(text: string): string {
    return emitExpr(parseExpressionText(text), { mode: 'standard' });
}

/** One input spelling per precedence tier, loosest first. */
const TIERS: readonly (readonly [BinaryOperator, string])[] = [
    ['iff', '<=>'], ['implies', '=>'], ['or', 'or'], ['and', 'and'], ['eq', '='], ['rel', '<->'],
    ['cross', 'cross'], ['maplet', '|->'], ['plus', '+'], ['times', '*'], ['override', '++'], ['dres', '<|'],
];

const tierPairs = TIERS.slice(1).map(([tight, t], idx) => {
    const [loose, l] = TIERS[idx];
    return { tight, loose, t, l };
});

/** The tree without source positions. */
function shape(text: string): unknown {
    return JSON.parse(JSON.stringify(parseExpressionText(text), (key, value: unknown) =>
        (key === 'line' || key === 'column' ? undefined : value)));
}

describe('parseExpressionText', () => {
    describe('logical structure', () => {
        it('binds and tighter than implication', () => {
            const e = parseExpressionText('p and q => r');
            expect(e.tag).toBe('BinaryOp');
            if (e.tag === 'BinaryOp') {
                expect(e.op).toBe('implies');
                expect(e.left.tag).toBe('BinaryOp');
                if (e.left.tag === 'BinaryOp') expect(e.left.op).toBe('and');
            }
            expect(standard('p and q => r')).toBe('p \\land q \\Rightarrow r');
        });

        it('keeps explicit grouping that differs from the default', () => {
            expect(fuzz('p and (q => r)')).toBe('p \\land (q \\Rightarrow r)');
        });

        it('nests implication to the right', () => {
            const e = parseExpressionText('p => q => r');
            if (e.tag !== 'BinaryOp') throw new Error('expected a binary operator');
            expect(e.left.tag).toBe('Identifier');
            expect(e.right.tag).toBe('BinaryOp');
        });

        it('wraps a conjunction under negation', () => {
            expect(fuzz('not (p and q)')).toBe('\\lnot (p \\land q)');
        });

        it('continues an expression after a trailing or leading operator', () => {
            expect(fuzz('p and\nq')).toBe('p \\land q');
            expect(fuzz('p\nand q')).toBe('p \\land q');
        });

        it('keeps a line break written with a trailing backslash', () => {
            expect(parseExpressionText('p and \\\nq')).toMatchObject({ tag: 'BinaryOp', op: 'and', lineBreak: true });
            expect(fuzz('p and \\\nq')).toBe('p \\land \\\\\n\\quad q');
            expect(fuzz('x > 0 and \\\n  x < 9 and y')).toBe('x > 0 \\land \\\\\n\\quad x < 9 \\land y');
        });

        it('ignores a backslash break inside brackets', () => {
            expect(fuzz('{a, \\\n b}')).toBe('\\{a, b\\}');
        });
    });

    describe('quantifiers', () => {
        it('reads `| P` as the body of a quantifier', () => {
            const e = parseExpressionText('forall x : N | x >= 0');
            expect(e.tag).toBe('Quantifier');
            if (e.tag === 'Quantifier') {
                expect(e.quantifier).toBe('forall');
                expect(e.binders).toHaveLength(1);
                expect(e.binders[0].names).toEqual(['x']);
                expect(e.binders[0].domain).toMatchObject({ tag: 'Identifier', name: 'N' });
                expect(e.constraint).toBeNull();
                expect(e.predicate).toMatchObject({ tag: 'BinaryOp', op: 'ge' });
            }
        });

        it('renders a constrained quantifier in both dialects', () => {
            expect(fuzz('forall x : N | x > 0 . x >= 1')).toBe('\\forall x : \\nat | x > 0 @ x \\geq 1');
            expect(standard('forall x : N | x > 0 . x >= 1')).toBe('\\forall x \\colon \\mathbb{N} \\mid x > 0 \\spot x \\geq 1');
        });

        it('renders the unconstrained form with a spot', () => {
            expect(fuzz('forall x : N | x >= 0')).toBe('\\forall x : \\nat @ x \\geq 0');
        });

        it('parses several binder groups', () => {
            const e = parseExpressionText('exists x, y : N; s : seq N . x = y');
            if (e.tag !== 'Quantifier') throw new Error('expected a quantifier');
            expect(e.binders.map((b) => b.names)).toEqual([['x', 'y'], ['s']]);
        });

        it('wraps a definite description in parentheses', () => {
            expect(fuzz('mu x : N | x > 0')).toBe('(\\mu x : \\nat | x > 0)');
        });

        it('renders lambda abstractions and conditionals', () => {
            expect(fuzz('lambda x : N . x + 1')).toBe('\\lambda x : \\nat @ x + 1');
            expect(fuzz('if x > 0 then x else -x')).toBe('\\IF x > 0 \\THEN x \\ELSE -x');
        });
    });

    describe('collections', () => {
        it('parses a sequence literal', () => {
            const e = parseExpressionText('<1, 2, 3>');
            expect(e.tag).toBe('SequenceLiteral');
            if (e.tag === 'SequenceLiteral') expect(e.elements).toHaveLength(3);
            expect(fuzz('<1, 2, 3>')).toBe('\\langle 1, 2, 3 \\rangle');
        });

        it('parses a comparison that looks like a sequence', () => {
            const e = parseExpressionText('x < 1');
            expect(e).toMatchObject({ tag: 'BinaryOp', op: 'lt' });
        });

        it('renders sets and comprehensions', () => {
            expect(fuzz('{1, 2}')).toBe('\\{1, 2\\}');
            expect(fuzz('{x : N | x > 0}')).toBe('\\{ x : \\nat | x > 0 \\}');
            expect(standard('{x : N | x > 0}')).toBe('\\{ x \\colon \\mathbb{N} \\mid x > 0 \\}');
            expect(fuzz('{x : N | x > 0 . x * x}')).toBe('\\{ x : \\nat | x > 0 @ x * x \\}');
        });

        it('renders the empty sequence, bags and tuples', () => {
            expect(fuzz('<>')).toBe('\\langle \\rangle');
            expect(fuzz('[[a, b]]')).toBe('\\lbag a, b \\rbag');
            expect(fuzz('(a, b).1')).toBe('(a, b).1');
        });

        it('reads a bag comprehension', () => {
            expect(parseExpressionText('[[x : N | x > 0]]')).toMatchObject({ tag: 'Comprehension', collection: 'bag' });
            expect(fuzz('[[x : N | x > 0]]')).toBe('\\lbag x : \\nat | x > 0 \\rbag');
        });

        it('continues a sequence literal across lines', () => {
            expect(fuzz('s = <a,\n b>')).toBe('s = \\langle a, b \\rangle');
        });

        it('renders ranges and maplets', () => {
            expect(fuzz('1..n')).toBe('1 \\upto n');
            expect(fuzz('a |-> b')).toBe('a \\mapsto b');
        });
    });

    describe('application', () => {
        it('applies by juxtaposition, left to right', () => {
            const e = parseExpressionText('f x y');
            if (e.tag !== 'FunctionApp') throw new Error('expected an application');
            expect(e.style).toBe('juxtaposed');
            expect(e.func).toMatchObject({ tag: 'FunctionApp', style: 'juxtaposed' });
            expect(fuzz('f x y')).toBe('f~x~y');
        });

        it('groups a juxtaposed argument', () => {
            expect(fuzz('f (g x)')).toBe('f~(g~x)');
        });

        it('keeps call syntax', () => {
            expect(fuzz('f(x, y)')).toBe('f(x, y)');
        });

        it('groups a juxtaposed application before a call', () => {
            expect(fuzz('(f x)(y)')).toBe('(f~x)(y)');
        });

        it('spaces prefix generics', () => {
            expect(fuzz('seq N')).toBe('\\seq \\nat');
        });
    });

    describe('operators', () => {
        it('follows the arithmetic ladder', () => {
            expect(fuzz('a + b * c')).toBe('a + b * c');
            expect(fuzz('(a + b) * c')).toBe('(a + b) * c');
            expect(fuzz('(a - b) - c')).toBe('a - b - c');
            expect(fuzz('a - (b - c)')).toBe('a - (b - c)');
        });

        it('parses parenthesised tighter operators to the same shape', () => {
            expect(shape('(a * b) + c')).toEqual(shape('a * b + c'));
            expect(shape('(p and q) => r')).toEqual(shape('p and q => r'));
        });

        it('covers every tier of the ladder in order', () => {
            const tiers = [...new Set(Object.values(BINARY_OPERATORS).map((info) => info.precedence))].sort((a, b) => a - b);
            expect(TIERS.map(([op]) => BINARY_OPERATORS[op].precedence)).toEqual(tiers);
        });

        it.each(tierPairs)('$tight binds tighter than $loose', ({ tight, loose, t, l }) => {
            expect(shape(`(a ${t} b) ${l} c`)).toEqual(shape(`a ${t} b ${l} c`));
            expect(shape(`a ${l} (b ${t} c)`)).toEqual(shape(`a ${l} b ${t} c`));
            expect(fuzz(`(a ${l} b) ${t} c`)).toBe(`(a ${BINARY_SYMBOLS[loose]} b) ${BINARY_SYMBOLS[tight]} c`);
            expect(fuzz(`a ${t} (b ${l} c)`)).toBe(`a ${BINARY_SYMBOLS[tight]} (b ${BINARY_SYMBOLS[loose]} c)`);
        });

        it('associates function arrows to the right', () => {
            expect(fuzz('A -> B -> C')).toBe('A \\fun B \\fun C');
            expect(fuzz('(A -> B) -> C')).toBe('(A \\fun B) \\fun C');
        });

        it('separates nested negations', () => {
            expect(fuzz('- - x')).toBe('-(-x)');
            expect(fuzz('-x')).toBe('-x');
        });

        it('renders prefix operators', () => {
            expect(fuzz('#S + 1')).toBe('\\# S + 1');
            expect(fuzz('dom R')).toBe('\\dom R');
            expect(fuzz('P X')).toBe('\\power X');
            expect(standard('P X')).toBe('\\mathbb{P} X');
        });

        it('renders postfix operators per dialect', () => {
            expect(fuzz('R~')).toBe('R \\inv');
            expect(standard('R~')).toBe('R^{-1}');
            expect(fuzz('R+')).toBe('R \\plus');
            expect(standard('R*')).toBe('R^{*}');
        });

        it('renders images, superscripts and subscripted names', () => {
            expect(fuzz('R(| S |)')).toBe('R \\limg S \\rimg');
            expect(fuzz('x^2')).toBe('x \\bsup 2 \\esup');
            expect(standard('x^2')).toBe('x^{2}');
            expect(fuzz('x_i')).toBe('x_{i}');
        });
    });

    describe('errors', () => {
        it('reports a missing operand', () => {
            expect(() => parseExpressionText('x +')).toThrow('Expected an expression, found end of input');
        });

        it('refuses chained comparisons', () => {
            expect(() => parseExpressionText('a = b = c')).toThrow('Comparison operators do not chain; add parentheses before \'=\'');
        });

        it('refuses chained ranges', () => {
            expect(() => parseExpressionText('1..2..3')).toThrow('Ranges do not chain; add parentheses');
        });

        it('reports trailing tokens with their position', () => {
            try {
                parseExpressionText('x y)');
                expect.unreachable();
            } catch (err) {
                expect(err).toBeInstanceOf(ParserError);
                if (err instanceof ParserError) {
                    expect(err.message).toBe('Unexpected token after expression: \')\'');
                    expect(err.column).toBe(4);
                }
            }
        });
    });
});

describe('dialect symbols', () => {
    const keys = Object.keys(DIALECT_SYMBOLS).filter((key): key is DialectSymbol => key in DIALECT_SYMBOLS);

    it.each(keys)('%s has distinct non-empty spellings', (key) => {
        const [a, b] = NOTATION_MODES.map((mode) => symbol(key, mode));
        expect(a.length).toBeGreaterThan(0);
        expect(b.length).toBeGreaterThan(0);
        expect(a).not.toBe(b);
    });
});
