// ─────────────────────────────────────────────────────────────
// zscribe  ·  Document Parser
// Sections, Z paragraphs, prose, tables, chains and proofs
// ─────────────────────────────────────────────────────────────

import { ParserError } from '../core/errors';
import { positionOf } from './ast';
import type {
    Abbreviation, Declaration, Document, DocumentItem, EquivChain, EquivStep, Expr,
    FreeBranch, FreeType, GivenType, InfruleBlock, ProofTree, RuleLine, TextBlock, TextMode,
    TruthTable, TruthValue, ZedBlock, ZedEntry,
} from './ast';
import { ExpressionParser, describeToken } from './expressions';
import { tokenize } from './lexer';
import { buildProofTree, type ProofLine } from './proof';
import { directiveKey, directivePayload, justificationText, type Token, type TokenType } from './tokens';

/** Parse a whole document. Throws `LexError` or `ParserError` on the first problem. */
export function parse(source: string): Document {
    return new DocumentParser(tokenize(source)).parseDocument();
}

const TEXT_MODES: ReadonlyMap<TokenType, TextMode> = new Map<TokenType, TextMode>([
    ['TEXT', 'smart'], ['PURETEXT', 'escaped'], ['LATEX', 'raw'],
]);

/** Tokens that start a new item and therefore end a proof. */
const DIRECTIVES: ReadonlySet<TokenType> = new Set<TokenType>([
    'SECTION', 'SOLUTION', 'PART_LABEL', 'TEXT', 'PURETEXT', 'LATEX', 'METADATA',
    'PAGEBREAK', 'CONTENTS', 'PROOF', 'EQUIV', 'TRUTH_TABLE', 'INFRULE',
]);

type BoxKind = 'axdef' | 'schema' | 'gendef';

interface OpenContainer {
    readonly token: Token;
    readonly label: string;
    readonly items: DocumentItem[];
}

interface MutableMetadata {
    title: string | null;
    subtitle: string | null;
    author: string | null;
    date: string | null;
    institution: string | null;
}

export class DocumentParser extends ExpressionParser {
    private readonly items: DocumentItem[] = [];
    private section: OpenContainer | null = null;
    private solution: OpenContainer | null = null;
    private part: OpenContainer | null = null;
    private metadata: MutableMetadata | null = null;

    parseDocument(): Document {
        for (;;) {
            this.skipNewlines();
            const tok = this.peek();
            if (tok.type === 'EOF') break;

            switch (tok.type) {
                case 'SECTION':
                    this.advance();
                    this.closeSection();
                    this.section = { token: tok, label: tok.value.replace(/^===\s*|\s*===\s*$/g, ''), items: [] };
                    break;
                case 'SOLUTION':
                    this.advance();
                    this.closeSolution();
                    this.solution = { token: tok, label: tok.value.replace(/^\*\*\s*|\s*\*\*\s*$/g, ''), items: [] };
                    break;
                case 'PART_LABEL':
                    // The rest of the line is an ordinary item
                    this.advance();
                    this.closePart();
                    this.part = { token: tok, label: tok.value.slice(1, -1), items: [] };
                    break;
                case 'METADATA':
                    this.advance();
                    this.recordMetadata(tok);
                    break;
                default:
                    this.sink().push(this.parseItem());
            }
        }

        this.closeSection();
        return { metadata: this.metadata, items: this.items };
    }

    // ── Containers ──────────────────────────────────────────

    private sink(): DocumentItem[] {
        return this.part?.items ?? this.solution?.items ?? this.section?.items ?? this.items;
    }

    private closePart(): void {
        const part = this.part;
        if (part === null) return;
        this.part = null;
        this.sink().push({ tag: 'Part', label: part.label, items: part.items, ...positionOf(part.token) });
    }

    private closeSolution(): void {
        this.closePart();
        const solution = this.solution;
        if (solution === null) return;
        this.solution = null;
        this.sink().push({ tag: 'Solution', label: solution.label, items: solution.items, ...positionOf(solution.token) });
    }

    private closeSection(): void {
        this.closeSolution();
        const section = this.section;
        if (section === null) return;
        this.section = null;
        this.items.push({ tag: 'Section', title: section.label, items: section.items, ...positionOf(section.token) });
    }

    private recordMetadata(tok: Token): void {
        const meta: MutableMetadata = this.metadata ?? { title: null, subtitle: null, author: null, date: null, institution: null };
        const value = directivePayload(tok);
        switch (directiveKey(tok)) {
            case 'TITLE': meta.title = value; break;
            case 'SUBTITLE': meta.subtitle = value; break;
            case 'AUTHOR': meta.author = value; break;
            case 'DATE': meta.date = value; break;
            case 'INSTITUTION': meta.institution = value; break;
            default: throw new ParserError(`Unknown metadata directive ${describeToken(tok)}`, tok);
        }
        this.metadata = meta;
        this.expectLineEnd();
    }

    // ── Items ───────────────────────────────────────────────

    private parseItem(): DocumentItem {
        const tok = this.peek();
        const at = positionOf(tok);

        const textMode = TEXT_MODES.get(tok.type);
        if (textMode !== undefined) {
            this.advance();
            const block: TextBlock = { tag: 'TextBlock', mode: textMode, text: directivePayload(tok), ...at };
            this.expectLineEnd();
            return block;
        }

        switch (tok.type) {
            case 'PAGEBREAK':
                this.advance();
                this.expectLineEnd();
                return { tag: 'PageBreak', ...at };
            case 'CONTENTS':
                this.advance();
                this.expectLineEnd();
                return { tag: 'Contents', ...at };
            case 'PROOF':
                return this.parseProof();
            case 'EQUIV':
                return this.parseEquiv();
            case 'TRUTH_TABLE':
                return this.parseTruthTable();
            case 'INFRULE':
                return this.parseInfrule();
            case 'AXDEF':
                return this.parseBox('axdef');
            case 'SCHEMA':
                return this.parseBox('schema');
            case 'GENDEF':
                return this.parseBox('gendef');
            case 'ZED':
                return this.parseZed();
            default:
                return this.parseEntry();
        }
    }

    /** One line that may also appear inside a `zed` block. */
    private parseEntry(): ZedEntry {
        const tok = this.peek();
        const at = positionOf(tok);

        if (tok.type === 'GIVEN') {
            this.advance();
            const names = this.parseNames('given type name');
            this.expectLineEnd();
            return { tag: 'GivenType', names, ...at };
        }

        if (tok.type === 'LBRACKET') {
            // `[A, B]` declares given types; `[X] Name == e` is a generic abbreviation
            const params = this.parseParams();
            if (!this.check('IDENTIFIER')) {
                this.expectLineEnd();
                return { tag: 'GivenType', names: params, ...at } satisfies GivenType;
            }
            const name = this.advance();
            this.expect('ABBREV', '\'==\' after the abbreviation name');
            return this.finishAbbreviation(name, params);
        }

        const definition = this.definitionAhead();
        if (definition !== null) {
            const name = this.advance();
            const params = this.check('LBRACKET') ? this.parseParams() : [];
            this.advance();
            return definition === 'FREE_TYPE' ? this.finishFreeType(name, params) : this.finishAbbreviation(name, params);
        }

        const expression = this.parseIff();
        this.expectLineEnd();
        return { tag: 'ExpressionItem', expression, ...at };
    }

    /** `Name ::=`, `Name ==`, or either with touching generic parameters. */
    private definitionAhead(): 'FREE_TYPE' | 'ABBREV' | null {
        if (!this.check('IDENTIFIER')) return null;
        let offset = 1;
        const next = this.peekAt(1);
        if (next.type === 'LBRACKET' && !next.spaceBefore) {
            offset = 2;
            for (;;) {
                const tok = this.peekAt(offset++);
                if (tok.type === 'RBRACKET') break;
                if (tok.type === 'NEWLINE' || tok.type === 'EOF') return null;
            }
        }
        const type = this.peekAt(offset).type;
        return type === 'FREE_TYPE' || type === 'ABBREV' ? type : null;
    }

    private finishAbbreviation(name: Token, params: readonly string[]): Abbreviation {
        const expression = this.parseIff();
        this.expectLineEnd();
        return { tag: 'Abbreviation', name: name.value, params, expression, ...positionOf(name) };
    }

    private finishFreeType(name: Token, params: readonly string[]): FreeType {
        const branches: FreeBranch[] = [];
        this.continueOnPipe();
        this.match('PIPE');
        do {
            branches.push(this.parseBranch());
            this.continueOnPipe();
        } while (this.match('PIPE'));
        this.expectLineEnd();
        return { tag: 'FreeType', name: name.value, params, branches, ...positionOf(name) };
    }

    /** Branches may continue on following lines that start with `|`. */
    private continueOnPipe(): void {
        const next = this.tokens[this.pos + 1];
        if (this.tokens[this.pos].type === 'NEWLINE' && next !== undefined && next.type === 'PIPE') this.pos++;
    }

    private parseBranch(): FreeBranch {
        const name = this.expect('IDENTIFIER', 'constructor name');
        const open = this.peek();
        if (open.type !== 'LANGLE' && open.type !== 'LESS_THAN') {
            return { name: name.value, payload: [], ...positionOf(name) };
        }
        this.advance();
        const payload = this.nested(() => {
            const components = [this.parseExpression()];
            while (this.match('COMMA')) components.push(this.parseExpression());
            return components;
        });
        const close = this.peek();
        if (close.type !== 'RANGLE' && close.type !== 'GREATER_THAN') {
            throw new ParserError(`Expected '>' to close the constructor payload, found ${describeToken(close)}`, close);
        }
        this.advance();
        return { name: name.value, payload, ...positionOf(name) };
    }

    // ── Boxes ───────────────────────────────────────────────

    private parseBox(kind: BoxKind): DocumentItem {
        const tok = this.advance();
        const at = positionOf(tok);
        let name: string | null = null;
        let params: string[] = [];

        if (kind === 'schema' && this.check('IDENTIFIER')) {
            name = this.advance().value;
            if (this.check('LBRACKET')) params = this.parseParams();
        } else if (kind === 'gendef') {
            params = this.parseParams();
        }
        this.expectLineEnd();

        const declarations: Declaration[] = [];
        const predicates: Expr[][] = [];
        for (;;) {
            this.skipNewlines();
            const next = this.peek();
            if (next.type === 'IDENTIFIER') {
                declarations.push(...this.parseDeclarationLine());
                continue;
            }
            if (next.type === 'WHERE' || next.type === 'END') break;
            if (next.type === 'EOF') throw new ParserError(`Expected 'end' to close ${kind}`, next);
            throw new ParserError(`Expected 'where' or 'end' after declarations, found ${describeToken(next)}`, next);
        }

        if (this.match('WHERE')) {
            this.expectLineEnd();
            let group: Expr[] = [];
            for (;;) {
                const blank = this.check('NEWLINE');
                this.skipNewlines();
                const next = this.peek();
                if (next.type === 'END') break;
                if (next.type === 'EOF') throw new ParserError(`Expected 'end' to close ${kind}`, next);
                if (blank && group.length > 0) {
                    predicates.push(group);
                    group = [];
                }
                group.push(this.parseIff());
                this.expectLineEnd();
            }
            if (group.length > 0) predicates.push(group);
        }
        this.expect('END', `'end' to close ${kind}`);
        this.expectLineEnd();

        switch (kind) {
            case 'axdef': return { tag: 'AxDef', declarations, predicates, ...at };
            case 'schema': return { tag: 'Schema', name, params, declarations, predicates, ...at };
            case 'gendef': return { tag: 'GenDef', params, declarations, predicates, ...at };
        }
    }

    /** `x, y : T; z : U` */
    private parseDeclarationLine(): Declaration[] {
        const declarations: Declaration[] = [];
        do {
            const first = this.peek();
            const names = this.parseNames('declared name');
            this.expect('COLON', '\':\' between declared names and their type');
            declarations.push({ names, type: this.parseExpression(), ...positionOf(first) });
        } while (this.match('SEMICOLON'));
        this.expectLineEnd();
        return declarations;
    }

    private parseZed(): ZedBlock {
        const tok = this.advance();
        this.expectLineEnd();
        const entries: ZedEntry[] = [];
        for (;;) {
            this.skipNewlines();
            const next = this.peek();
            if (next.type === 'END') break;
            if (next.type === 'EOF') throw new ParserError('Expected \'end\' to close zed', next);
            entries.push(this.parseEntry());
        }
        this.advance();
        this.expectLineEnd();
        return { tag: 'ZedBlock', entries, ...positionOf(tok) };
    }

    // ── Truth tables ────────────────────────────────────────

    private parseTruthTable(): TruthTable {
        const tok = this.advance();
        this.expectLineEnd();
        this.skipNewlines();

        const headers = this.inLineMode(() => {
            const cells = [this.parseIff()];
            while (this.match('PIPE')) cells.push(this.parseIff());
            return cells;
        });
        this.expectLineEnd();

        const rows: TruthValue[][] = [];
        while (this.truthCellAhead()) {
            const rowStart = this.peek();
            const row = [this.parseTruthCell()];
            while (this.match('PIPE')) row.push(this.parseTruthCell());
            if (row.length !== headers.length) {
                throw new ParserError(`Expected ${headers.length} cells in truth table row, found ${row.length}`, rowStart);
            }
            rows.push(row);
            this.expectLineEnd();
        }
        if (rows.length === 0) throw new ParserError('Expected at least one row of T/F values', this.peek());
        return { tag: 'TruthTable', headers, rows, ...positionOf(tok) };
    }

    private truthCellAhead(): boolean {
        const tok = this.peek();
        if (tok.value !== 'T' && tok.value !== 'F') return false;
        const next = this.peekAt(1).type;
        return next === 'PIPE' || next === 'NEWLINE' || next === 'EOF';
    }

    /** `F` lexes as the finite-set keyword, so cells are matched by spelling. */
    private parseTruthCell(): TruthValue {
        const tok = this.peek();
        if (tok.value === 'T' || tok.value === 'F') {
            this.advance();
            return tok.value;
        }
        throw new ParserError(`Expected 'T' or 'F' in truth table row, found ${describeToken(tok)}`, tok);
    }

    // ── Equivalence chains ──────────────────────────────────

    private parseEquiv(): EquivChain {
        const tok = this.advance();
        this.expectLineEnd();
        this.skipNewlines();

        const steps: EquivStep[] = [];
        const first = this.peek();
        const expression = this.inLineMode(() => this.parseIff());
        steps.push({ relation: null, expression, justification: this.parseJustification(), ...positionOf(first) });
        this.expectLineEnd();

        for (;;) {
            const next = this.peek();
            if (next.type !== 'IFF' && next.type !== 'IMPLIES') break;
            this.advance();
            const stepExpr = this.inLineMode(() => this.parseIff());
            steps.push({
                relation: next.type === 'IFF' ? 'iff' : 'implies',
                expression: stepExpr,
                justification: this.parseJustification(),
                ...positionOf(next),
            });
            this.expectLineEnd();
        }

        if (steps.length < 2) {
            throw new ParserError('Expected at least one step starting with \'<=>\' or \'=>\' after the first expression', this.peek());
        }
        return { tag: 'EquivChain', steps, ...positionOf(tok) };
    }

    // ── Inference rules ─────────────────────────────────────

    private parseInfrule(): InfruleBlock {
        const tok = this.advance();
        this.expectLineEnd();
        this.skipNewlines();

        const premises: RuleLine[] = [];
        while (!this.check('RULE_LINE')) {
            const next = this.peek();
            if (next.type === 'EOF' || next.type === 'NEWLINE' || DIRECTIVES.has(next.type)) {
                throw new ParserError(`Expected '---' above the conclusion, found ${describeToken(next)}`, next);
            }
            premises.push(this.parseRuleLine());
        }
        this.advance();
        this.expectLineEnd();
        return { tag: 'InfruleBlock', premises, conclusion: this.parseRuleLine(), ...positionOf(tok) };
    }

    private parseRuleLine(): RuleLine {
        const first = this.peek();
        const expression = this.inLineMode(() => this.parseIff());
        const line: RuleLine = { expression, label: this.parseJustification(), ...positionOf(first) };
        this.expectLineEnd();
        return line;
    }

    // ── Proofs ──────────────────────────────────────────────

    private parseProof(): ProofTree {
        const tok = this.advance();
        this.expectLineEnd();
        this.skipNewlines();

        const lines: ProofLine[] = [];
        for (;;) {
            const start = this.peek();
            if (start.type === 'EOF' || start.type === 'NEWLINE' || DIRECTIVES.has(start.type)) break;
            lines.push(this.inLineMode(() => this.parseProofLine()));
            this.expectLineEnd();
        }
        return buildProofTree(lines, tok);
    }

    private parseProofLine(): ProofLine {
        const first = this.peek();

        if (first.type === 'IDENTIFIER' && first.value === 'case') {
            const next = this.peekAt(1);
            if (next.spaceBefore && next.type !== 'NEWLINE' && next.type !== 'EOF') {
                this.advance();
                const caseExpr = this.parseIff();
                this.expect('COLON', '\':\' after the case expression');
                return { kind: 'case', token: first, caseExpr };
            }
        }

        const sibling = this.match('DOUBLE_COLON');
        let label: number | null = null;
        if (this.check('LBRACKET') && this.peekAt(1).type === 'NUMBER' && this.peekAt(2).type === 'RBRACKET') {
            this.advance();
            label = Number(this.advance().value);
            this.advance();
        }
        const expression = this.parseIff();
        return { kind: 'step', token: first, sibling, label, expression, justification: this.parseJustification() };
    }

    // ── Shared pieces ───────────────────────────────────────

    /** Trailing `[rule name]`, kept as written. */
    private parseJustification(): string | null {
        const tok = this.peek();
        if (tok.type !== 'JUSTIFICATION') return null;
        this.advance();
        return justificationText(tok);
    }

    /** `[X, Y]` */
    private parseParams(): string[] {
        this.expect('LBRACKET', '\'[\' before generic parameters');
        const names = this.nested(() => this.parseNames('generic parameter'));
        this.expect('RBRACKET', '\']\' after generic parameters');
        return names;
    }

    private parseNames(what: string): string[] {
        const names = [this.expect('IDENTIFIER', `identifier for ${what}`).value];
        while (this.match('COMMA')) names.push(this.expect('IDENTIFIER', `identifier for ${what}`).value);
        return names;
    }

    private expectLineEnd(): void {
        const tok = this.peek();
        if (tok.type === 'NEWLINE') {
            this.advance();
            return;
        }
        if (tok.type !== 'EOF') {
            throw new ParserError(`Unexpected token after expression: ${describeToken(tok)}`, tok);
        }
    }

    private inLineMode<T>(body: () => T): T {
        const saved = this.lineMode;
        this.lineMode = true;
        try {
            return body();
        } finally {
            this.lineMode = saved;
        }
    }
}
