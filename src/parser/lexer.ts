// ─────────────────────────────────────────────────────────────
// zscribe  ·  Tokenizer
// Maximal-munch scanner with whitespace-sensitive disambiguation
// of angle brackets, carets and postfix closures
// ─────────────────────────────────────────────────────────────

import { LexError } from '../core/errors';
import {
    BLOCK_DIRECTIVES, GLYPHS, GLYPH_STARTS, JUSTIFIED_BLOCKS, KEYWORDS, LINE_DIRECTIVES, OPERAND_END,
    SYMBOLS, type Token, type TokenType,
} from './tokens';

/** Scan a whole document. Columns count code points, starting at 1. */
export function tokenize(source: string): Token[] {
    return new Lexer(source).run();
}

const LESS_COMPOUNDS: readonly (readonly [string, TokenType])[] = [
    ['<=>', 'IFF'], ['<->', 'RELATION'], ['<<|', 'NDRES'], ['<=', 'LESS_EQUAL'], ['<|', 'DRES'],
];

/** Paragraph keywords that end a justified block when they open a line. */
const PARAGRAPH_KEYWORDS: ReadonlySet<TokenType> = new Set<TokenType>(['AXDEF', 'SCHEMA', 'GENDEF', 'ZED', 'GIVEN']);

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '9';
const isSpace = (ch: string | undefined): boolean => ch === ' ' || ch === '\t' || ch === '\n';
const isLetter = (ch: string | undefined): boolean => ch !== undefined && /\p{L}/u.test(ch);
const isIdentPart = (ch: string | undefined): boolean =>
    ch !== undefined && /[\p{L}\p{N}_']/u.test(ch) && !GLYPH_STARTS.has(ch);

class Lexer {
    private readonly chars: string[];
    private readonly tokens: Token[] = [];
    private pos = 0;
    private line = 1;
    private column = 1;
    /** True until the first token of the current line. */
    private lineStart = true;
    /** Whitespace (or a line start) separates the next token from the previous one. */
    private sawSpace = true;
    private seqDepth = 0;
    private bagDepth = 0;
    private imageDepth = 0;
    /** Inside a PROOF, EQUIV or INFRULE block, where a line may end in `[justification]`. */
    private justified = false;
    /** The justified block has had a line of content, so a blank line ends it. */
    private blockStarted = false;

    constructor(source: string) {
        this.chars = Array.from(source.replace(/\r\n?/g, '\n'));
    }

    run(): Token[] {
        while (this.pos < this.chars.length) {
            const ch = this.chars[this.pos];

            if (ch === '\n') {
                const prev = this.tokens[this.tokens.length - 1];
                if (prev !== undefined && prev.type === 'NEWLINE' && this.blockStarted) this.justified = false;
                this.push('NEWLINE', '\n');
                this.pos++;
                this.line++;
                this.column = 1;
                this.lineStart = true;
                this.sawSpace = true;
                continue;
            }

            if (ch === ' ' || ch === '\t') {
                this.advance(1);
                this.sawSpace = true;
                continue;
            }

            if (ch === '%' && this.chars[this.pos + 1] === '%') {
                while (this.pos < this.chars.length && this.chars[this.pos] !== '\n') this.advance(1);
                continue;
            }

            if (this.lineStart && this.scanDirective()) continue;
            this.scanToken();
        }

        this.push('EOF', '');
        return this.tokens;
    }

    // ── Directives ──────────────────────────────────────────

    private scanDirective(): boolean {
        const rest = this.restOfLine();

        if (/^-{3,}[ \t]*$/.test(rest)) {
            this.emitWhole('RULE_LINE', rest.trimEnd());
            return true;
        }

        if (rest.startsWith('===')) {
            if (!/^===.*===\s*$/.test(rest) || rest.trim().length < 6) {
                throw new LexError('Expected closing \'===\' after section title', this.line, this.column, '=');
            }
            this.emitWhole('SECTION', rest);
            this.justified = false;
            return true;
        }

        if (rest.startsWith('**')) {
            if (!/^\*\*.*\*\*\s*$/.test(rest) || rest.trim().length < 4) {
                throw new LexError('Expected closing \'**\' after solution label', this.line, this.column, '*');
            }
            this.emitWhole('SOLUTION', rest);
            this.justified = false;
            return true;
        }

        const part = /^\(([a-j])\)(?=\s|$)/.exec(rest);
        if (part) {
            this.push('PART_LABEL', part[0]);
            this.advance(3);
            this.lineStart = true;
            this.justified = false;
            return true;
        }

        const directive = /^(TRUTH TABLE|[A-Z]+):/.exec(rest);
        if (!directive) return false;

        const lineType = LINE_DIRECTIVES.get(directive[1]);
        if (lineType) {
            this.emitWhole(lineType, rest);
            this.justified = false;
            return true;
        }
        const blockType = BLOCK_DIRECTIVES.get(directive[1]);
        if (blockType) {
            this.push(blockType, directive[0]);
            this.advance(Array.from(directive[0]).length);
            this.justified = JUSTIFIED_BLOCKS.has(blockType);
            this.blockStarted = false;
            return true;
        }
        return false;
    }

    private emitWhole(type: TokenType, text: string): void {
        this.push(type, text);
        this.advance(Array.from(text).length);
    }

    // ── Tokens ──────────────────────────────────────────────

    private scanToken(): void {
        const ch = this.chars[this.pos];

        if (isDigit(ch)) {
            if (this.startsWith('77->')) {
                this.emit('FINFUN', '77->');
            } else {
                this.scanNumber();
            }
            return;
        }

        if (ch === '<') return this.scanLess();

        if (ch === '>' && this.seqDepth > 0 && !this.sawSpace) {
            this.seqDepth--;
            this.emit('RANGLE', '>');
            return;
        }

        if (ch === '^') return this.scanCaret();

        if (ch === '[' && this.justified && this.sawSpace && !this.lineStart && !this.startsWith('[[')) {
            const end = this.trailingBracketEnd();
            if (end !== null) return this.emit('JUSTIFICATION', this.chars.slice(this.pos, end + 1).join(''));
        }

        if (ch === '\\' && /^\\[ \t]*(%%.*)?$/.test(this.restOfLine())) return this.scanContinuation();

        if ((ch === '+' || ch === '*') && !this.startsWith('+->') && !this.startsWith('++') && this.closureAhead()) {
            this.emit(ch === '+' ? 'TCLOSURE' : 'RTCLOSURE', ch);
            return;
        }

        if (this.startsWith(']]') && this.bagDepth === 0) {
            this.emit('RBRACKET', ']');
            return;
        }

        if (this.startsWith('|)') && this.imageDepth === 0) {
            this.emit('PIPE', '|');
            return;
        }

        for (const [spelling, type] of GLYPHS) {
            if (this.startsWith(spelling)) return this.emit(type, spelling);
        }
        for (const [spelling, type] of SYMBOLS) {
            if (this.startsWith(spelling)) return this.emit(type, spelling);
        }

        if (isLetter(ch)) return this.scanIdentifier();

        throw new LexError(`Unexpected character '${ch}'`, this.line, this.column, ch);
    }

    private scanNumber(): void {
        let end = this.pos;
        while (isDigit(this.chars[end])) end++;

        const next = this.chars[end];
        const continues = isLetter(next) ||
            (next === '_' && (isLetter(this.chars[end + 1]) || isDigit(this.chars[end + 1])));
        if (!continues) {
            this.emit('NUMBER', this.chars.slice(this.pos, end).join(''));
            return;
        }

        while (isIdentPart(this.chars[end])) end++;
        this.emit('IDENTIFIER', this.chars.slice(this.pos, end).join(''));
    }

    private scanIdentifier(): void {
        let end = this.pos + 1;
        while (isIdentPart(this.chars[end])) end++;
        // Z decorations: input `x?`, output `y!`
        if (this.chars[end] === '?' || (this.chars[end] === '!' && this.chars[end + 1] !== '=')) end++;

        const word = this.chars.slice(this.pos, end).join('');
        const type = KEYWORDS.get(word) ?? 'IDENTIFIER';
        if (this.lineStart && PARAGRAPH_KEYWORDS.has(type)) this.justified = false;
        this.emit(type, word);
    }

    /**
     * `<` is a sequence opener or a comparison. Decision table:
     *
     *   previous token     space before  after `<`             result
     *   any                any           `>`                   empty sequence
     *   not operand-end    any           non-space             LANGLE
     *   not operand-end    any           space                 LESS_THAN
     *   operand-end        no            any                   LESS_THAN
     *   operand-end        yes           space                 LESS_THAN
     *   operand-end        yes           non-space             LANGLE iff an attached `>` follows on the line
     */
    private scanLess(): void {
        for (const [spelling, type] of LESS_COMPOUNDS) {
            if (this.startsWith(spelling)) return this.emit(type, spelling);
        }

        const next = this.chars[this.pos + 1];
        if (next === '>') {
            this.emit('LANGLE', '<');
            this.emit('RANGLE', '>');
            return;
        }

        const prev = this.tokens[this.tokens.length - 1];
        const operandEnd = prev !== undefined && OPERAND_END.has(prev.type);
        const spaceAfter = next === undefined || isSpace(next);

        let opens: boolean;
        if (!operandEnd) opens = !spaceAfter;
        else if (!this.sawSpace || spaceAfter) opens = false;
        else opens = this.attachedCloseAhead();

        if (opens) {
            this.seqDepth++;
            this.emit('LANGLE', '<');
        } else {
            this.emit('LESS_THAN', '<');
        }
    }

    private attachedCloseAhead(): boolean {
        for (let j = this.pos + 1; j < this.chars.length && this.chars[j] !== '\n'; j++) {
            if (this.chars[j] !== '>') continue;
            const before = this.chars[j - 1];
            const after = this.chars[j + 1];
            if (isSpace(before) || '-=|>+'.includes(before)) continue;
            if (after === '=' || after === '>') continue;
            return true;
        }
        return false;
    }

    private scanCaret(): void {
        if (this.sawSpace) {
            this.emit('CAT', '^');
            return;
        }
        const prev = this.tokens[this.tokens.length - 1];
        if (prev !== undefined && prev.type === 'RANGLE' && this.chars[this.pos + 1] === '<') {
            throw new LexError(
                'Missing spaces around \'^\' in \'>^<\': write \'> ^ <\' for sequence concatenation',
                this.line, this.column, '^',
            );
        }
        this.emit('CARET', '^');
    }

    /** Index of the `]` matching the `[` at the cursor, when nothing but a comment follows it on the line. */
    private trailingBracketEnd(): number | null {
        let depth = 0;
        for (let j = this.pos; j < this.chars.length && this.chars[j] !== '\n'; j++) {
            if (this.chars[j] === '[') depth++;
            if (this.chars[j] !== ']' || --depth > 0) continue;
            let k = j + 1;
            while (this.chars[k] === ' ' || this.chars[k] === '\t') k++;
            const after = this.chars[k];
            return after === undefined || after === '\n' || (after === '%' && this.chars[k + 1] === '%') ? j : null;
        }
        return null;
    }

    /** A `\` ending the line joins the next line to this one. */
    private scanContinuation(): void {
        this.emit('CONTINUATION', '\\');
        while (this.pos < this.chars.length && this.chars[this.pos] !== '\n') this.advance(1);
        if (this.pos < this.chars.length) {
            this.pos++;
            this.line++;
            this.column = 1;
        }
        this.sawSpace = true;
    }

    /** `R+` and `R*` touch their operand and are not followed by another operand. */
    private closureAhead(): boolean {
        if (this.sawSpace) return false;
        const prev = this.tokens[this.tokens.length - 1];
        if (prev === undefined || !OPERAND_END.has(prev.type)) return false;
        let at = this.pos + 1;
        while (this.chars[at] === ' ' || this.chars[at] === '\t') at++;
        const next = this.chars[at];
        if (next === undefined) return true;
        if (next === '(') return this.chars[at + 1] === '|';
        return !/[\p{L}\p{N}{⟨<[#]/u.test(next);
    }

    // ── Helpers ─────────────────────────────────────────────

    private emit(type: TokenType, spelling: string): void {
        switch (type) {
            case 'LBAG': this.bagDepth++; break;
            case 'RBAG': this.bagDepth = Math.max(0, this.bagDepth - 1); break;
            case 'LIMG': this.imageDepth++; break;
            case 'RIMG': this.imageDepth = Math.max(0, this.imageDepth - 1); break;
            default: break;
        }
        this.push(type, spelling);
        this.advance(Array.from(spelling).length);
    }

    private push(type: TokenType, value: string): void {
        this.tokens.push({ type, value, line: this.line, column: this.column, spaceBefore: this.sawSpace });
        if (type !== 'NEWLINE') this.blockStarted = true;
        this.sawSpace = false;
        this.lineStart = false;
    }

    private advance(count: number): void {
        this.pos += count;
        this.column += count;
    }

    private startsWith(spelling: string): boolean {
        const parts = Array.from(spelling);
        for (let k = 0; k < parts.length; k++) {
            if (this.chars[this.pos + k] !== parts[k]) return false;
        }
        return true;
    }

    private restOfLine(): string {
        let end = this.pos;
        while (end < this.chars.length && this.chars[end] !== '\n') end++;
        return this.chars.slice(this.pos, end).join('');
    }
}
