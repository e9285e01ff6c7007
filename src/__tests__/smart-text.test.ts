// ─────────────────────────────────────────────────────────────
// zscribe  ·  Smart Text Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import type { EmitContext } from '../emitters/latex-expr';
import {
    citations, formula, functionApplications, joinSegments, logicalKeywords, manualMarkup,
    parenthesizedGroups, quantifiers, renderSmartText, scripts, setExpressions, simpleRelations,
    smartSegments, typeDeclarations, type Pass,
} from '../emitters/smart-text';

const FUZZ: EmitContext = { mode: 'fuzz' };
const STANDARD: EmitContext = { mode: 'standard' };

function only(pass: Pass, text: string, ctx: EmitContext = FUZZ): string {
    return joinSegments(smartSegments(text, ctx, [pass]));
}

describe('formula', () => {
    it('renders text that parses and gives up on text that does not', () => {
        expect(formula('x + 1', FUZZ)).toBe('x + 1');
        expect(formula('x +', FUZZ)).toBeNull();
    });
});

describe('passes', () => {
    it('manualMarkup renders backquoted formulas and keeps $ math', () => {
        expect(smartSegments('see `x + 1` and $y$', FUZZ, [manualMarkup])).toEqual([
            { kind: 'prose', text: 'see ' },
            { kind: 'math', text: 'x + 1' },
            { kind: 'prose', text: ' and ' },
            { kind: 'math', text: 'y' },
        ]);
    });

    it('citations turns markers into natbib citations', () => {
        expect(only(citations, 'as shown [cite spivey92 p. 4].')).toBe('as shown \\citep[p. 4]{spivey92}.');
        expect(only(citations, '[cite spivey92]')).toBe('\\citep{spivey92}');
    });

    it('logicalKeywords takes connectives only between formula words', () => {
        expect(only(logicalKeywords, 'if p and q then r')).toBe('if $p \\land q$ then r');
        expect(only(logicalKeywords, 'bread and butter')).toBe('bread and butter');
    });

    it('parenthesizedGroups keeps a touching function name', () => {
        expect(only(parenthesizedGroups, 'so g(x + 1) is even')).toBe('so $g(x + 1)$ is even');
    });

    it('scripts renders superscripts per dialect', () => {
        expect(only(scripts, 'so x^2 grows')).toBe('so $x \\bsup 2 \\esup$ grows');
        expect(only(scripts, 'so x^2 grows', STANDARD)).toBe('so $x^{2}$ grows');
    });

    it('setExpressions renders a comprehension', () => {
        expect(only(setExpressions, 'the set {x : N | x > 0} is infinite'))
            .toBe('the set $\\{ x : \\nat | x > 0 \\}$ is infinite');
    });

    it('quantifiers stops before prose words', () => {
        expect(only(quantifiers, 'so forall x : N | x >= 0 is true')).toBe('so $\\forall x : \\nat @ x \\geq 0$ is true');
    });

    it('typeDeclarations renders the declared names and type', () => {
        expect(only(typeDeclarations, 'let n : N be given')).toBe('let $n : \\nat$ be given');
    });

    it('functionApplications renders calls', () => {
        expect(only(functionApplications, 'then f(x) holds')).toBe('then $f(x)$ holds');
    });

    it('simpleRelations renders relations between formula words', () => {
        expect(only(simpleRelations, 'we know x = y here')).toBe('we know $x = y$ here');
    });
});

describe('renderSmartText', () => {
    it('renders a set expression and leaves the trailing prose alone', () => {
        expect(renderSmartText('The set { x : N | x > 0 } is infinite.', FUZZ))
            .toBe('The set $\\{ x : \\nat | x > 0 \\}$ is infinite.');
    });

    it('does not re-enter spans rendered by an earlier pass', () => {
        expect(renderSmartText('we know `x = y` here', FUZZ)).toBe('we know $x = y$ here');
    });

    it('uses the dialect of the document', () => {
        expect(renderSmartText('let n : N be given', STANDARD)).toBe('let $n \\colon \\mathbb{N}$ be given');
    });

    it('escapes the prose around formulas', () => {
        expect(renderSmartText('50% of cases', FUZZ)).toBe('50\\% of cases');
    });
});
