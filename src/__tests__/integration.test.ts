// ─────────────────────────────────────────────────────────────
// zscribe  ·  End-to-End Conversion Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { LexError, ParserError, convert } from '../index';

const HOMEWORK = [
    'TITLE: Sets and Proofs',
    'AUTHOR: A. Student',
    '',
    '=== Types ===',
    'given Person',
    'Status ::= open | shut',
    '',
    'axdef',
    '  capacity : N',
    'where',
    '  capacity > 0',
    'end',
    '',
    '=== Proofs ===',
    '** Solution 1 **',
    '(a) TEXT: We show that p => p or q holds.',
    'PROOF:',
    '  [1] p [assumption]',
    '    p or q [or intro from 1]',
].join('\n');

describe('convert', () => {
    it('converts a whole homework sheet', () => {
        const result = convert(HOMEWORK);
        if (!result.ok) throw new Error(result.message);
        const lines = result.output.split('\n');
        expect(lines).toContain('\\title{Sets and Proofs}');
        expect(lines).toContain('\\section*{Types}');
        expect(lines).toContain('\\begin{zed}');
        expect(lines).toContain('[\\mathit{Person}]');
        expect(lines).toContain('\\mathit{capacity} : \\nat');
        expect(lines).toContain('\\bigskip\\noindent\\textbf{Solution 1}');
        expect(lines).toContain('$\\infer{[p]^{1}}{\\infer[\\lor \\mbox{intro from 1}]{p \\lor q}{}}$');
        expect(result.warnings).toEqual([]);
    });

    it('switches dialect on request', () => {
        const result = convert('x = 1', { mode: 'standard' });
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.output).toContain('\\usepackage{zed-cm}');
        }
    });

    it('passes the overflow threshold through', () => {
        const result = convert('x = 1', { overflowThreshold: 20 });
        if (!result.ok) throw new Error(result.message);
        expect(result.warnings).toEqual([{ tag: 'Overflow', line: 1, length: 23, threshold: 20 }]);
    });

    it('reports proof label problems', () => {
        const result = convert('PROOF:\n[1] p [assumption]\n  p or q [or intro from 2]');
        if (!result.ok) throw new Error(result.message);
        expect(result.warnings).toEqual([{ tag: 'Discharge', line: 3, label: 2, reason: 'undefined' }]);
    });

    it('returns lexer errors with a formatted message', () => {
        const result = convert('x = 1\ny $ 2');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(LexError);
            expect(result.message.split('\n').slice(0, 5)).toEqual([
                'Error: Unexpected character \'$\'',
                '',
                '1 | x = 1',
                '2 | y $ 2',
                '  |   ^',
            ]);
        }
    });

    it('returns parser errors', () => {
        const result = convert('axdef\n  x : N\n');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(ParserError);
            expect(result.message.startsWith('Error: Expected \'end\' to close axdef')).toBe(true);
        }
    });
});
