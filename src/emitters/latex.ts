// ─────────────────────────────────────────────────────────────
// zscribe  ·  LaTeX Generator
// Document → complete LaTeX source in the fuzz or zed-cm dialect,
// plus advisory warnings
// ─────────────────────────────────────────────────────────────

import { assertNever } from '../core/errors';
import { formatIdentifier, type NotationMode } from '../core/symbols';
import type {
    CaseAnalysis, Declaration, Document, DocumentItem, EquivChain, Expr, InfruleBlock,
    PredicateGroups, ProofChild, ProofNode, ProofTree, RuleLine, TextBlock, TitleMetadata, TruthTable,
} from '../parser/ast';
import { escapeLatex } from './escape';
import {
    emitDeclaration, emitExpr, emitJustification, emitParams, emitZedEntry, type EmitContext,
} from './latex-expr';
import { renderSmartText } from './smart-text';

// ── Options and results ─────────────────────────────────────

export interface GenerateOptions {
    mode: NotationMode;
    /** Output lines longer than this many characters produce an Overflow warning. */
    overflowThreshold: number;
}

export const DEFAULT_OPTIONS: GenerateOptions = {
    mode: 'fuzz',
    overflowThreshold: 100,
};

export type Warning =
    | { readonly tag: 'Overflow'; readonly line: number; readonly length: number; readonly threshold: number }
    | { readonly tag: 'Discharge'; readonly line: number; readonly label: number; readonly reason: 'undefined' | 'out-of-scope' | 'duplicate' };

export interface GenerateResult {
    readonly output: string;
    readonly warnings: readonly Warning[];
}

/** Render a document. Identical inputs always produce identical output. */
export function generate(
    doc: Document,
    mode: NotationMode = DEFAULT_OPTIONS.mode,
    overflowThreshold: number = DEFAULT_OPTIONS.overflowThreshold,
): GenerateResult {
    const generator = new LatexGenerator({ mode });
    const output = generator.document(doc);
    const warnings = [...generator.warnings, ...scanOverflow(output, overflowThreshold)];
    return { output, warnings };
}

/** One warning per physical line longer than `threshold` code points. */
export function scanOverflow(output: string, threshold: number): Warning[] {
    const warnings: Warning[] = [];
    output.split('\n').forEach((text, idx) => {
        const length = Array.from(text).length;
        if (length > threshold) warnings.push({ tag: 'Overflow', line: idx + 1, length, threshold });
    });
    return warnings;
}

// ── Generator ───────────────────────────────────────────────

class LatexGenerator {
    readonly warnings: Warning[] = [];
    private readonly lines: string[] = [];
    private listed = false;

    constructor(private readonly ctx: EmitContext) {}

    document(doc: Document): string {
        this.listed = doc.items.some(function hasContents(item: DocumentItem): boolean {
            return item.tag === 'Contents' ||
                ((item.tag === 'Section' || item.tag === 'Solution' || item.tag === 'Part') && item.items.some(hasContents));
        });

        this.preamble(doc.metadata);
        this.lines.push('\\begin{document}');
        if (doc.metadata !== null) this.lines.push('\\maketitle');
        this.lines.push('');
        for (const item of doc.items) this.item(item);
        this.lines.push('\\end{document}');
        return this.lines.join('\n') + '\n';
    }

    private preamble(meta: TitleMetadata | null): void {
        this.lines.push('\\documentclass{article}');
        this.lines.push('\\usepackage{amsmath}');
        if (this.ctx.mode === 'fuzz') {
            this.lines.push('\\usepackage{fuzz}');
        } else {
            this.lines.push('\\usepackage{amssymb}');
            this.lines.push('\\usepackage{zed-cm}');
            this.lines.push('\\usepackage{zed-maths}');
        }
        this.lines.push('\\usepackage{proof}');
        this.lines.push('\\usepackage{natbib}');

        if (meta !== null) {
            let title = escapeLatex(meta.title ?? '');
            if (meta.subtitle !== null) title += `\\\\\\large ${escapeLatex(meta.subtitle)}`;
            this.lines.push(`\\title{${title}}`);

            let author = escapeLatex(meta.author ?? '');
            if (meta.institution !== null) author += `\\\\${escapeLatex(meta.institution)}`;
            this.lines.push(`\\author{${author}}`);
            this.lines.push(`\\date{${meta.date !== null ? escapeLatex(meta.date) : ''}}`);
        }
        this.lines.push('');
    }

    private math(expr: Expr): string {
        return emitExpr(expr, this.ctx);
    }

    /** Math for `$...$`, where a written line break needs an array to stand in. */
    private inline(expr: Expr): string {
        const text = this.math(expr);
        return text.includes('\\\\\n') ? `\\begin{array}{l}${text}\\end{array}` : text;
    }

    // ── Structure ───────────────────────────────────────────

    private item(item: DocumentItem): void {
        switch (item.tag) {
            case 'Section': {
                const title = escapeLatex(item.title);
                this.lines.push(`\\section*{${title}}`);
                if (this.listed) this.lines.push(`\\addcontentsline{toc}{section}{${title}}`);
                this.lines.push('');
                item.items.forEach((child) => this.item(child));
                break;
            }
            case 'Solution':
                this.lines.push(`\\bigskip\\noindent\\textbf{${escapeLatex(item.label)}}`, '');
                item.items.forEach((child) => this.item(child));
                break;
            case 'Part':
                this.lines.push(`\\noindent\\textbf{(${item.label})}\\quad`);
                item.items.forEach((child) => this.item(child));
                break;
            case 'TextBlock':
                this.lines.push(this.text(item), '');
                break;
            case 'PageBreak':
                this.lines.push('\\newpage', '');
                break;
            case 'Contents':
                this.lines.push('\\tableofcontents', '');
                break;
            case 'ExpressionItem':
                this.lines.push('\\begin{center}', `$${this.inline(item.expression)}$`, '\\end{center}', '');
                break;
            case 'GivenType':
            case 'FreeType':
            case 'Abbreviation':
                this.lines.push('\\begin{zed}', emitZedEntry(item, this.ctx), '\\end{zed}', '');
                break;
            case 'ZedBlock':
                this.lines.push('\\begin{zed}', item.entries.map((entry) => emitZedEntry(entry, this.ctx)).join(' \\\\\n'), '\\end{zed}', '');
                break;
            case 'AxDef':
                this.box('\\begin{axdef}', 'axdef', item.declarations, item.predicates);
                break;
            case 'Schema':
                // Unnamed schemas are drawn as axdef boxes
                if (item.name === null) {
                    this.box('\\begin{axdef}', 'axdef', item.declarations, item.predicates);
                } else {
                    this.box(`\\begin{schema}{${formatIdentifier(item.name, this.ctx.mode)}}${emitParams(item.params, this.ctx)}`, 'schema', item.declarations, item.predicates);
                }
                break;
            case 'GenDef':
                this.box(`\\begin{gendef}${emitParams(item.params, this.ctx)}`, 'gendef', item.declarations, item.predicates);
                break;
            case 'TruthTable':
                this.truthTable(item);
                break;
            case 'EquivChain':
                this.equivChain(item);
                break;
            case 'InfruleBlock':
                this.infrule(item);
                break;
            case 'ProofTree':
                this.proof(item);
                break;
            default:
                assertNever(item, 'document item');
        }
    }

    private text(block: TextBlock): string {
        switch (block.mode) {
            case 'escaped': return escapeLatex(block.text);
            case 'raw': return block.text;
            case 'smart': return renderSmartText(block.text, this.ctx);
        }
    }

    // ── Z paragraphs ────────────────────────────────────────

    /** Blank-line groups of predicates are set apart with `\also`. */
    private box(open: string, env: string, declarations: readonly Declaration[], predicates: PredicateGroups): void {
        this.lines.push(open);
        this.lines.push(declarations.map((d) => emitDeclaration(d, this.ctx)).join(' \\\\\n'));
        if (predicates.length > 0) {
            this.lines.push('\\where');
            this.lines.push(predicates.map((group) => group.map((p) => this.math(p)).join(' \\\\\n')).join('\n\\also\n'));
        }
        this.lines.push(`\\end{${env}}`, '');
    }

    // ── Tables and chains ───────────────────────────────────

    private truthTable(table: TruthTable): void {
        this.lines.push('\\begin{center}');
        this.lines.push(`\\begin{tabular}{${table.headers.map(() => 'c').join('|')}}`);
        this.lines.push(`${table.headers.map((h) => `$${this.inline(h)}$`).join(' & ')} \\\\`);
        this.lines.push('\\hline');
        for (const row of table.rows) this.lines.push(`${row.join(' & ')} \\\\`);
        this.lines.push('\\end{tabular}', '\\end{center}', '');
    }

    private equivChain(chain: EquivChain): void {
        this.lines.push('\\begin{argue}');
        const rows = chain.steps.map((step) => {
            let row = this.math(step.expression);
            if (step.relation !== null) row = `${step.relation === 'iff' ? '\\Leftrightarrow' : '\\Rightarrow'} ${row}`;
            if (step.justification !== null) row += ` & [${emitJustification(step.justification)}]`;
            return row;
        });
        this.lines.push(rows.join(' \\\\\n'));
        this.lines.push('\\end{argue}', '');
    }

    private infrule(rule: InfruleBlock): void {
        const row = (line: RuleLine): string => line.label === null
            ? this.math(line.expression)
            : `${this.math(line.expression)} & [${emitJustification(line.label)}]`;
        this.lines.push('\\begin{infrule}');
        if (rule.premises.length > 0) this.lines.push(rule.premises.map(row).join(' \\\\\n'));
        this.lines.push('\\derive', row(rule.conclusion), '\\end{infrule}', '');
    }

    // ── Proofs ──────────────────────────────────────────────

    private proof(tree: ProofTree): void {
        for (const issue of tree.issues) {
            this.warnings.push({ tag: 'Discharge', line: issue.line, label: issue.label, reason: issue.reason });
        }
        this.lines.push('\\begin{center}', `$${this.proofNode(tree.root)}$`, '\\end{center}', '');
    }

    /** Premises sit above the line: `\infer[rule]{conclusion}{p1 & p2}`. */
    private proofNode(node: ProofNode): string {
        let conclusion = this.inline(node.expression);
        if (node.assumption) conclusion = node.label !== null ? `[${conclusion}]^{${node.label}}` : `[${conclusion}]`;

        const rule = node.justification !== null && node.justification.toLowerCase() !== 'assumption'
            ? node.justification
            : null;
        if (node.children.length === 0 && rule === null) return conclusion;

        const premises = node.children.map((child) => this.proofChild(child)).join(' & ');
        const label = rule !== null ? `[${emitJustification(rule)}]` : '';
        return `\\infer${label}{${conclusion}}{${premises}}`;
    }

    private proofChild(child: ProofChild): string {
        switch (child.tag) {
            case 'ProofNode': return this.proofNode(child);
            case 'CaseAnalysis': return this.caseAnalysis(child);
            default: return assertNever(child, 'proof child');
        }
    }

    /** Each branch stacks its derivation under its case assumption. */
    private caseAnalysis(cases: CaseAnalysis): string {
        return cases.branches.map((branch) => {
            const steps = branch.steps.map((step) => this.proofNode(step)).join(' \\quad ');
            return `\\deduce{${steps}}{[${this.inline(branch.caseExpr)}]}`;
        }).join(' & ');
    }
}
