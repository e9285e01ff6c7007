// ─────────────────────────────────────────────────────────────
// zscribe  ·  Proof Tree Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import type { ProofNode, ProofTree } from '../parser/ast';
import { parse } from '../parser/document';
import { citedLabels } from '../parser/proof';

function proof(source: string): ProofTree {
    const doc = parse(source);
    const item = doc.items[0];
    if (item.tag !== 'ProofTree') throw new Error(`expected a proof, got ${item.tag}`);
    return item;
}

function stepAt(node: ProofNode, idx: number): ProofNode {
    const child = node.children[idx];
    if (child.tag !== 'ProofNode') throw new Error('expected a proof step');
    return child;
}

describe('citedLabels', () => {
    it('finds labels after "from"', () => {
        expect(citedLabels('=> intro from 1')).toEqual([1]);
        expect(citedLabels('from 1, 2')).toEqual([1, 2]);
        expect(citedLabels('or elim from 1 and 3')).toEqual([1, 3]);
    });

    it('finds nothing in plain rule names', () => {
        expect(citedLabels('assumption')).toEqual([]);
        expect(citedLabels(null)).toEqual([]);
    });
});

describe('proof trees', () => {
    it('discharges an assumption cited by a descendant', () => {
        const tree = proof('PROOF:\n[1] p [assumption]\n  p or q [or intro from 1]');
        expect(tree.issues).toEqual([]);
        expect(tree.labels.get(1)).toBe(0);
        expect(tree.root.assumption).toBe(true);
        expect(tree.root.label).toBe(1);

        const child = stepAt(tree.root, 0);
        expect(child.id).toBe(1);
        expect(child.justification).toBe('or intro from 1');
        expect(child.assumption).toBe(false);
    });

    it('keeps justification text as written', () => {
        const tree = proof('PROOF:\np [by \'lemma\' (2)]');
        expect(tree.root.justification).toBe('by \'lemma\' (2)');
    });

    it('flags a citation of a label that does not exist', () => {
        const tree = proof('PROOF:\n[1] p [assumption]\n  p or q [or intro from 2]');
        expect(tree.issues).toEqual([{ label: 2, reason: 'undefined', nodeId: 1, line: 3, column: 3 }]);
    });

    it('flags a citation of a label on a sibling branch', () => {
        const tree = proof('PROOF:\nr [and intro]\n  [1] p [assumption]\n  q [from 1]');
        expect(tree.issues).toEqual([{ label: 1, reason: 'out-of-scope', nodeId: 2, line: 4, column: 3 }]);
    });

    it('flags a label introduced twice', () => {
        const tree = proof('PROOF:\n[1] p [assumption]\n  [1] q [assumption]');
        expect(tree.issues).toEqual([{ label: 1, reason: 'duplicate', nodeId: 1, line: 3, column: 3 }]);
    });

    it('nests steps by indentation', () => {
        const tree = proof('PROOF:\np and q [and intro]\n  p\n  q');
        expect(tree.root.children).toHaveLength(2);
        expect(stepAt(tree.root, 0).expression).toMatchObject({ tag: 'Identifier', name: 'p' });
        expect(stepAt(tree.root, 1).expression).toMatchObject({ tag: 'Identifier', name: 'q' });
    });

    it('keeps ::-marked premises under their conclusion', () => {
        const tree = proof('PROOF:\np and q [and intro]\n  :: p\n  :: q');
        expect(tree.root.children).toHaveLength(2);
        expect(stepAt(tree.root, 0).sibling).toBe(true);
        expect(stepAt(tree.root, 1).sibling).toBe(true);
    });

    it('moves ::-marked premises written first under the conclusion that follows', () => {
        const tree = proof('PROOF:\n    :: p\n    :: q\n  p and q [and intro]');
        expect(tree.root.expression).toMatchObject({ tag: 'BinaryOp', op: 'and' });
        expect(tree.root.children.map((c) => (c.tag === 'ProofNode' ? c.id : -1))).toEqual([1, 2]);
    });

    it('rejects ::-marked premises without a conclusion', () => {
        expect(() => parse('PROOF:\n:: p')).toThrow('Premises marked with \'::\' need a conclusion one level shallower');
    });

    it('groups case branches under their step', () => {
        const tree = proof('PROOF:\nr [or elim]\n  p or q\n  case p:\n    r\n  case q:\n    r');
        expect(tree.root.children).toHaveLength(2);
        const cases = tree.root.children[1];
        expect(cases.tag).toBe('CaseAnalysis');
        if (cases.tag === 'CaseAnalysis') {
            expect(cases.branches.map((b) => b.caseExpr)).toMatchObject([
                { tag: 'Identifier', name: 'p' },
                { tag: 'Identifier', name: 'q' },
            ]);
            expect(cases.branches.map((b) => b.steps.map((s) => s.id))).toEqual([[2], [3]]);
        }
    });

    it('synthesizes a conclusion for cases written at the root', () => {
        const tree = proof('PROOF:\ncase p:\n  q\ncase r:\n  q');
        expect(tree.root.synthetic).toBe(true);
        expect(tree.root.expression).toMatchObject({ tag: 'Identifier', name: 'q' });
        const cases = tree.root.children[0];
        if (cases.tag !== 'CaseAnalysis') throw new Error('expected a case analysis');
        expect(cases.branches).toHaveLength(2);
    });

    it('rejects a second conclusion', () => {
        expect(() => parse('PROOF:\np\nq')).toThrow('A proof has exactly one conclusion; indent premises beneath it');
    });

    it('rejects uneven indentation', () => {
        expect(() => parse('PROOF:\na\n  b\n     c')).toThrow('Inconsistent indentation: expected 2 more columns than the enclosing step');
    });

    it('ends at a blank line', () => {
        const doc = parse('PROOF:\np\n  q\n\nr = s');
        expect(doc.items.map((item) => item.tag)).toEqual(['ProofTree', 'ExpressionItem']);
    });
});
