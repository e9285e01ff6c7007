// ─────────────────────────────────────────────────────────────
// zscribe  ·  Proof Tree Builder
// Indentation → tree, using an explicit stack of open scopes
// ─────────────────────────────────────────────────────────────

import { ParserError } from '../core/errors';
import type { Token } from './tokens';
import type {
    CaseAnalysis, CaseBranch, Expr, LabelIssue, ProofChild, ProofNode, ProofTree,
} from './ast';

// ── Input lines ─────────────────────────────────────────────

export interface ProofStepLine {
    readonly kind: 'step';
    readonly token: Token;
    readonly sibling: boolean;
    readonly label: number | null;
    readonly expression: Expr;
    readonly justification: string | null;
}

export interface ProofCaseLine {
    readonly kind: 'case';
    readonly token: Token;
    readonly caseExpr: Expr;
}

export type ProofLine = ProofStepLine | ProofCaseLine;

/** Labels a justification discharges: `=> intro from 1`, `from 1, 2`. */
export function citedLabels(justification: string | null): number[] {
    if (justification === null) return [];
    const labels: number[] = [];
    for (const match of justification.matchAll(/\bfrom\s+(\d+(?:\s*(?:,|and)\s*\d+)*)/gi)) {
        for (const num of match[1].split(/\s*(?:,|and)\s*/)) labels.push(Number(num));
    }
    return labels;
}

// ── Builders (mutable while lines are consumed) ─────────────

interface StepBuilder {
    readonly kind: 'step';
    readonly column: number;
    /** Null for the conclusion synthesized over a root case analysis. */
    readonly line: ProofStepLine | null;
    readonly token: Token;
    readonly children: ChildBuilder[];
}

interface CaseGroupBuilder {
    readonly kind: 'cases';
    readonly column: number;
    readonly token: Token;
    readonly branches: BranchBuilder[];
}

interface BranchBuilder {
    readonly line: ProofCaseLine;
    readonly column: number;
    readonly steps: StepBuilder[];
}

type ChildBuilder = StepBuilder | CaseGroupBuilder;

type Scope =
    | { readonly kind: 'step'; readonly column: number; readonly owner: StepBuilder }
    | { readonly kind: 'branch'; readonly column: number; readonly owner: BranchBuilder };

/** A run of `::` lines waiting for the conclusion they support. */
interface SiblingRun {
    readonly column: number;
    readonly parent: Scope | null;
    readonly nodes: StepBuilder[];
}

// ── Tree construction ───────────────────────────────────────

export function buildProofTree(lines: readonly ProofLine[], at: Token): ProofTree {
    if (lines.length === 0) throw new ParserError('Expected at least one proof step after PROOF:', at);

    const scopes: Scope[] = [];
    const runs: SiblingRun[] = [];
    let root: StepBuilder | null = null;

    for (const line of lines) {
        const column = line.token.column;
        while (scopes.length > 0 && scopes[scopes.length - 1].column >= column) scopes.pop();
        const adopted = settleRuns(runs, line, column);
        const top: Scope | undefined = scopes[scopes.length - 1];

        if (line.kind === 'case') {
            let parent: Scope;
            if (top === undefined) {
                if (root !== null) throw new ParserError('A proof has exactly one conclusion; indent case branches beneath it', line.token);
                root = { kind: 'step', column: column - 1, line: null, token: line.token, children: [] };
                parent = { kind: 'step', column: root.column, owner: root };
                scopes.push(parent);
            } else {
                parent = top;
            }
            if (parent.kind === 'branch') {
                throw new ParserError('A case analysis must be placed under a proof step, not directly under another case', line.token);
            }
            const branch: BranchBuilder = { line, column, steps: [] };
            const last = parent.owner.children[parent.owner.children.length - 1];
            if (last !== undefined && last.kind === 'cases' && last.column === column) {
                last.branches.push(branch);
            } else {
                parent.owner.children.push({ kind: 'cases', column, token: line.token, branches: [branch] });
            }
            scopes.push({ kind: 'branch', column, owner: branch });
            continue;
        }

        const node: StepBuilder = { kind: 'step', column, line, token: line.token, children: [...adopted] };

        if (top !== undefined) {
            attach(top, node);
        } else if (root === null && !line.sibling) {
            root = node;
        } else if (root !== null) {
            throw new ParserError('A proof has exactly one conclusion; indent premises beneath it', line.token);
        }

        if (line.sibling) {
            const current = runs[runs.length - 1];
            if (current !== undefined && current.column === column && current.parent === (top ?? null)) {
                current.nodes.push(node);
            } else {
                runs.push({ column, parent: top ?? null, nodes: [node] });
            }
        }
        scopes.push({ kind: 'step', column, owner: node });
    }

    settleRuns(runs, null, -Infinity);
    if (root === null) throw new ParserError('Expected a conclusion for the proof', at);
    return freeze(root);
}

/**
 * Close the sibling runs that `line` ends. The innermost run lying strictly
 * deeper than `line` but below its parent scope moves under `line`;
 * the others stay with their indentation parent.
 */
function settleRuns(runs: SiblingRun[], line: ProofLine | null, column: number): StepBuilder[] {
    let adopted: StepBuilder[] = [];
    while (runs.length > 0) {
        const run = runs[runs.length - 1];
        const continuing = line !== null && line.kind === 'step' && line.sibling && column === run.column;
        if (continuing || column > run.column) break;
        runs.pop();

        const parentColumn = run.parent ? run.parent.column : -Infinity;
        const adopts = line !== null && line.kind === 'step' && adopted.length === 0 &&
            column < run.column && column > parentColumn;
        if (adopts) {
            if (run.parent) detach(run.parent, run.nodes);
            adopted = run.nodes;
        } else if (run.parent === null) {
            throw new ParserError('Premises marked with \'::\' need a conclusion one level shallower', run.nodes[0].token);
        }
    }
    return adopted;
}

function attach(scope: Scope, node: StepBuilder): void {
    if (scope.kind === 'step') scope.owner.children.push(node);
    else scope.owner.steps.push(node);
}

function detach(scope: Scope, nodes: readonly StepBuilder[]): void {
    const list: ChildBuilder[] = scope.kind === 'step' ? scope.owner.children : scope.owner.steps;
    for (const node of nodes) {
        const idx = list.indexOf(node);
        if (idx >= 0) list.splice(idx, 1);
    }
}

// ── Freezing, ids and label scoping ─────────────────────────

function freeze(root: StepBuilder): ProofTree {
    let nextId = 0;
    let unit: number | null = null;

    const checkIndent = (parentColumn: number, child: { column: number; token: Token }): void => {
        const step = child.column - parentColumn;
        if (unit === null) unit = step;
        if (step !== unit) {
            throw new ParserError(`Inconsistent indentation: expected ${unit} more columns than the enclosing step`, child.token);
        }
    };

    const freezeStep = (b: StepBuilder): ProofNode => {
        const id = nextId++;
        const synthetic = b.line === null;
        const children: ProofChild[] = [];
        for (const child of b.children) {
            if (!synthetic) checkIndent(b.column, child);
            children.push(child.kind === 'step' ? freezeStep(child) : freezeCases(child));
        }

        if (b.line === null) {
            return {
                tag: 'ProofNode', id, expression: syntheticConclusion(b), justification: null, label: null,
                assumption: false, sibling: false, synthetic: true, children,
                line: b.token.line, column: b.token.column,
            };
        }
        const { line } = b;
        return {
            tag: 'ProofNode', id, expression: line.expression, justification: line.justification, label: line.label,
            assumption: line.label !== null || (line.justification ?? '').trim().toLowerCase() === 'assumption',
            sibling: line.sibling, synthetic: false, children,
            line: line.token.line, column: line.token.column,
        };
    };

    const freezeCases = (group: CaseGroupBuilder): CaseAnalysis => {
        const branches: CaseBranch[] = group.branches.map((branch) => {
            if (branch.steps.length === 0) {
                throw new ParserError('Expected at least one step under this case', branch.line.token);
            }
            const steps = branch.steps.map((step) => {
                checkIndent(branch.column, step);
                return freezeStep(step);
            });
            return { caseExpr: branch.line.caseExpr, steps, line: branch.line.token.line, column: branch.line.token.column };
        });
        return { tag: 'CaseAnalysis', branches, line: group.token.line, column: group.token.column };
    };

    const rootNode = freezeStep(root);
    const { labels, issues } = scopeLabels(rootNode);
    return { tag: 'ProofTree', root: rootNode, labels, issues, line: rootNode.line, column: rootNode.column };
}

function syntheticConclusion(b: StepBuilder): Expr {
    for (const child of b.children) {
        if (child.kind === 'cases') {
            const first = child.branches[0].steps[0];
            if (first !== undefined && first.line !== null) return first.line.expression;
        }
    }
    throw new ParserError('Expected at least one step under this case', b.token);
}

/** Register labels, then check each citation against the labels on its ancestor chain. */
function scopeLabels(root: ProofNode): { labels: ReadonlyMap<number, number>; issues: readonly LabelIssue[] } {
    const labels = new Map<number, number>();
    const issues: LabelIssue[] = [];

    const register = (node: ProofNode): void => {
        if (node.label !== null) {
            if (labels.has(node.label)) {
                issues.push({ label: node.label, reason: 'duplicate', nodeId: node.id, line: node.line, column: node.column });
            } else {
                labels.set(node.label, node.id);
            }
        }
        forEachStep(node, register);
    };
    register(root);

    const validate = (node: ProofNode, enclosing: readonly number[]): void => {
        for (const label of citedLabels(node.justification)) {
            if (enclosing.includes(label)) continue;
            const reason = labels.has(label) ? 'out-of-scope' : 'undefined';
            issues.push({ label, reason, nodeId: node.id, line: node.line, column: node.column });
        }
        const inner = node.label !== null ? [...enclosing, node.label] : enclosing;
        forEachStep(node, (child) => validate(child, inner));
    };
    validate(root, []);

    return { labels, issues };
}

function forEachStep(node: ProofNode, visit: (child: ProofNode) => void): void {
    for (const child of node.children) {
        if (child.tag === 'ProofNode') {
            visit(child);
        } else {
            for (const branch of child.branches) branch.steps.forEach(visit);
        }
    }
}
