// ─────────────────────────────────────────────────────────────
// zscribe  ·  HTML Preview
// Document → standalone HTML page; formulas typeset by KaTeX
// ─────────────────────────────────────────────────────────────

import katex from 'katex';
import macroTable from './katex-macros.json';
import { assertNever } from '../core/errors';
import { formatIdentifier } from '../core/symbols';
import type {
    CaseAnalysis, Declaration, Document, DocumentItem, EquivChain, Expr, InfruleBlock,
    PredicateGroups, ProofChild, ProofNode, RuleLine, Section, TextBlock, TitleMetadata, TruthTable,
} from '../parser/ast';
import { escapeHtml } from './escape';
import {
    emitDeclaration, emitExpr, emitJustification, emitParams, emitZedEntry, type EmitContext,
} from './latex-expr';
import { smartSegments, type Segment } from './smart-text';

// KaTeX knows the blackboard-bold sets of the standard dialect, not the fuzz commands
const CTX: EmitContext = { mode: 'standard' };

const STYLE = `
body { max-width: 50rem; margin: 2rem auto; font-family: Georgia, serif; line-height: 1.5; }
.z-box { border-left: 2px solid #333; border-bottom: 2px solid #333; padding: 0.25rem 1rem; margin: 1rem 0; }
.z-box-title { font-weight: bold; border-top: 2px solid #333; margin: 0 -1rem 0.25rem; padding: 0.25rem 1rem; }
.z-where { border: 0; border-top: 1px solid #333; margin: 0.25rem -1rem; }
.z-also { height: 0.5rem; }
.zed { margin: 1rem 0; }
table.truth-table, table.argue { margin: 1rem auto; border-collapse: collapse; }
table.truth-table th { border-bottom: 1px solid #333; }
table.truth-table td, table.truth-table th { padding: 0.2rem 0.8rem; text-align: center; }
.infrule { display: table; margin: 1rem auto; text-align: center; }
.infrule-line { border: 0; border-top: 1px solid #333; margin: 0.25rem 0; }
.infrule-premises .premise + .premise { margin-left: 2rem; }
ul.proof { list-style: none; padding-left: 1.5rem; border-left: 1px dotted #999; }
.rule { color: #555; margin-left: 1rem; }
pre.latex { background: #f6f6f6; padding: 0.5rem; }
hr.page-break { border: 0; border-top: 1px dashed #999; margin: 2rem 0; }
`;

/** Typeset TeX; KaTeX errors render in place instead of throwing. */
export function typeset(tex: string, displayMode: boolean = false): string {
    return katex.renderToString(tex, {
        // KaTeX writes \gdef definitions back into the table, so each call gets a copy
        macros: { ...macroTable },
        throwOnError: false,
        displayMode,
    });
}

export function generateHtml(doc: Document): string {
    return new HtmlGenerator().document(doc);
}

// ── Generator ───────────────────────────────────────────────

function sectionsOf(items: readonly DocumentItem[]): Section[] {
    return items.flatMap((item) => {
        switch (item.tag) {
            case 'Section': return [item, ...sectionsOf(item.items)];
            case 'Solution':
            case 'Part': return sectionsOf(item.items);
            default: return [];
        }
    });
}

class HtmlGenerator {
    private readonly parts: string[] = [];
    private sections: Section[] = [];

    document(doc: Document): string {
        this.sections = sectionsOf(doc.items);
        const title = doc.metadata?.title ?? 'zscribe document';

        this.parts.push('<!DOCTYPE html>');
        this.parts.push('<html lang="en">');
        this.parts.push('<head>');
        this.parts.push('<meta charset="utf-8">');
        this.parts.push(`<title>${escapeHtml(title)}</title>`);
        this.parts.push(`<link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/katex@${katex.version}/dist/katex.min.css">`);
        this.parts.push(`<style>${STYLE}</style>`);
        this.parts.push('</head>');
        this.parts.push('<body>');
        if (doc.metadata !== null) this.header(doc.metadata);
        for (const item of doc.items) this.item(item);
        this.parts.push('</body>');
        this.parts.push('</html>');
        return this.parts.join('\n') + '\n';
    }

    private header(meta: TitleMetadata): void {
        this.parts.push('<header>');
        if (meta.title !== null) this.parts.push(`<h1>${escapeHtml(meta.title)}</h1>`);
        if (meta.subtitle !== null) this.parts.push(`<p class="subtitle">${escapeHtml(meta.subtitle)}</p>`);
        const byline = [meta.author, meta.institution, meta.date].filter((part): part is string => part !== null);
        if (byline.length > 0) this.parts.push(`<p class="byline">${byline.map(escapeHtml).join(' · ')}</p>`);
        this.parts.push('</header>');
    }

    private math(expr: Expr, display: boolean = false): string {
        return typeset(emitExpr(expr, CTX), display);
    }

    private sectionId(section: Section): string {
        return `section-${this.sections.indexOf(section) + 1}`;
    }

    // ── Structure ───────────────────────────────────────────

    private item(item: DocumentItem): void {
        switch (item.tag) {
            case 'Section':
                this.parts.push(`<section id="${this.sectionId(item)}">`);
                this.parts.push(`<h2>${escapeHtml(item.title)}</h2>`);
                item.items.forEach((child) => this.item(child));
                this.parts.push('</section>');
                break;
            case 'Solution':
                this.parts.push('<div class="solution">', `<h3>${escapeHtml(item.label)}</h3>`);
                item.items.forEach((child) => this.item(child));
                this.parts.push('</div>');
                break;
            case 'Part':
                this.parts.push('<div class="part">', `<strong>(${escapeHtml(item.label)})</strong>`);
                item.items.forEach((child) => this.item(child));
                this.parts.push('</div>');
                break;
            case 'TextBlock':
                this.parts.push(this.text(item));
                break;
            case 'PageBreak':
                this.parts.push('<hr class="page-break">');
                break;
            case 'Contents':
                this.contents();
                break;
            case 'ExpressionItem':
                this.parts.push(`<div class="formula">${this.math(item.expression, true)}</div>`);
                break;
            case 'GivenType':
            case 'FreeType':
            case 'Abbreviation':
                this.parts.push(`<div class="zed">${typeset(emitZedEntry(item, CTX), true)}</div>`);
                break;
            case 'ZedBlock':
                this.parts.push('<div class="zed">');
                for (const entry of item.entries) this.parts.push(typeset(emitZedEntry(entry, CTX), true));
                this.parts.push('</div>');
                break;
            case 'AxDef':
                this.box(null, item.declarations, item.predicates);
                break;
            case 'Schema':
                this.box(
                    item.name === null ? null : `${formatIdentifier(item.name, CTX.mode)}${emitParams(item.params, CTX)}`,
                    item.declarations,
                    item.predicates,
                );
                break;
            case 'GenDef':
                this.box(item.params.length > 0 ? emitParams(item.params, CTX) : null, item.declarations, item.predicates);
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
                this.parts.push('<ul class="proof">', this.proofNode(item.root), '</ul>');
                break;
            default:
                assertNever(item, 'document item');
        }
    }

    private contents(): void {
        this.parts.push('<nav class="toc">', '<ul>');
        for (const section of this.sections) {
            this.parts.push(`<li><a href="#${this.sectionId(section)}">${escapeHtml(section.title)}</a></li>`);
        }
        this.parts.push('</ul>', '</nav>');
    }

    private text(block: TextBlock): string {
        switch (block.mode) {
            case 'escaped': return `<p>${escapeHtml(block.text)}</p>`;
            case 'raw': return `<pre class="latex">${escapeHtml(block.text)}</pre>`;
            case 'smart': return `<p>${smartSegments(block.text, CTX).map(segmentHtml).join('')}</p>`;
        }
    }

    // ── Z paragraphs ────────────────────────────────────────

    private box(title: string | null, declarations: readonly Declaration[], predicates: PredicateGroups): void {
        this.parts.push('<div class="z-box">');
        if (title !== null) this.parts.push(`<div class="z-box-title">${typeset(title)}</div>`);
        for (const decl of declarations) this.parts.push(`<div class="z-decl">${typeset(emitDeclaration(decl, CTX))}</div>`);
        if (predicates.length > 0) {
            this.parts.push('<hr class="z-where">');
            predicates.forEach((group, idx) => {
                if (idx > 0) this.parts.push('<div class="z-also"></div>');
                for (const pred of group) this.parts.push(`<div class="z-pred">${this.math(pred)}</div>`);
            });
        }
        this.parts.push('</div>');
    }

    // ── Tables and chains ───────────────────────────────────

    private truthTable(table: TruthTable): void {
        this.parts.push('<table class="truth-table">');
        this.parts.push(`<thead><tr>${table.headers.map((h) => `<th>${this.math(h)}</th>`).join('')}</tr></thead>`);
        this.parts.push('<tbody>');
        for (const row of table.rows) this.parts.push(`<tr>${row.map((v) => `<td>${v}</td>`).join('')}</tr>`);
        this.parts.push('</tbody>', '</table>');
    }

    private equivChain(chain: EquivChain): void {
        this.parts.push('<table class="argue">');
        for (const step of chain.steps) {
            const relation = step.relation === null ? '' : typeset(step.relation === 'iff' ? '\\Leftrightarrow' : '\\Rightarrow');
            const why = step.justification === null ? '' : typeset(`[${emitJustification(step.justification)}]`);
            this.parts.push(`<tr><td>${relation}</td><td>${this.math(step.expression)}</td><td>${why}</td></tr>`);
        }
        this.parts.push('</table>');
    }

    private infrule(rule: InfruleBlock): void {
        const line = (row: RuleLine): string => {
            const why = row.label === null ? '' : ` ${typeset(`[${emitJustification(row.label)}]`)}`;
            return `${this.math(row.expression)}${why}`;
        };
        this.parts.push('<div class="infrule">');
        this.parts.push(`<div class="infrule-premises">${rule.premises.map((p) => `<span class="premise">${line(p)}</span>`).join('')}</div>`);
        this.parts.push('<hr class="infrule-line">');
        this.parts.push(`<div class="infrule-conclusion">${line(rule.conclusion)}</div>`);
        this.parts.push('</div>');
    }

    // ── Proofs ──────────────────────────────────────────────

    /** Conclusion first, premises nested beneath it. */
    private proofNode(node: ProofNode): string {
        let tex = emitExpr(node.expression, CTX);
        if (node.assumption) tex = node.label !== null ? `[${tex}]^{${node.label}}` : `[${tex}]`;

        let html = `<li><span class="conclusion">${typeset(tex)}</span>`;
        if (node.justification !== null) {
            html += `<span class="rule">${typeset(`[${emitJustification(node.justification)}]`)}</span>`;
        }
        if (node.children.length > 0) {
            html += `<ul class="proof">${node.children.map((child) => this.proofChild(child)).join('')}</ul>`;
        }
        return html + '</li>';
    }

    private proofChild(child: ProofChild): string {
        switch (child.tag) {
            case 'ProofNode': return this.proofNode(child);
            case 'CaseAnalysis': return this.caseAnalysis(child);
            default: return assertNever(child, 'proof child');
        }
    }

    private caseAnalysis(cases: CaseAnalysis): string {
        return cases.branches.map((branch) => {
            const steps = branch.steps.map((step) => this.proofNode(step)).join('');
            return `<li class="case"><em>case</em> ${this.math(branch.caseExpr)}<ul class="proof">${steps}</ul></li>`;
        }).join('');
    }
}

// ── Smart text ──────────────────────────────────────────────

const CITATION = /^\\citep(?:\[([^\]]*)\])?\{([^}]*)\}$/;

function segmentHtml(segment: Segment): string {
    switch (segment.kind) {
        case 'prose':
            return escapeHtml(segment.text);
        case 'math':
            return typeset(segment.text);
        case 'latex': {
            const cite = CITATION.exec(segment.text);
            if (cite === null) return `<code class="latex">${escapeHtml(segment.text)}</code>`;
            const locator = cite[1] !== undefined ? `, ${escapeHtml(cite[1])}` : '';
            return `<cite>(${escapeHtml(cite[2])}${locator})</cite>`;
        }
    }
}
