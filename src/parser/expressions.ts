// ─────────────────────────────────────────────────────────────
// zscribe  ·  Expression Parser
// Recursive descent over the precedence ladder in core/precedence
// ─────────────────────────────────────────────────────────────

import { ParserError } from '../core/errors';
import { BINARY_OPERATORS, PREC } from '../core/precedence';
import { mk, positionOf } from './ast';
import type {
    BinaryOperator, BinderGroup, Comprehension, Expr, Position, QuantifierKind, UnaryOperator,
} from './ast';
import { tokenize } from './lexer';
import type { Token, TokenType } from './tokens';

const INFIX: ReadonlyMap<TokenType, BinaryOperator> = new Map<TokenType, BinaryOperator>([
    ['IFF', 'iff'], ['IMPLIES', 'implies'], ['OR', 'or'], ['AND', 'and'],
    ['EQUALS', 'eq'], ['NOT_EQUAL', 'neq'], ['LESS_THAN', 'lt'], ['LESS_EQUAL', 'le'],
    ['GREATER_THAN', 'gt'], ['GREATER_EQUAL', 'ge'],
    ['IN', 'in'], ['NOTIN', 'notin'], ['SUBSETEQ', 'subseteq'], ['SUBSET', 'subset'],
    ['RELATION', 'rel'], ['TFUN', 'tfun'], ['PFUN', 'pfun'], ['TINJ', 'tinj'], ['PINJ', 'pinj'],
    ['TSURJ', 'tsurj'], ['PSURJ', 'psurj'], ['BIJECTION', 'bij'], ['FINFUN', 'ffun'],
    ['CROSS', 'cross'], ['MAPLET', 'maplet'],
    ['PLUS', 'plus'], ['MINUS', 'minus'], ['UNION', 'union'], ['SETMINUS', 'setminus'],
    ['CAT', 'cat'], ['BAG_UNION', 'bagUnion'],
    ['STAR', 'times'], ['DIV', 'div'], ['MOD', 'mod'], ['INTERSECT', 'intersect'],
    ['FILTER', 'filter'], ['SEMI_COMP', 'semi'], ['CIRC', 'circ'],
    ['OVERRIDE', 'override'],
    ['DRES', 'dres'], ['RRES', 'rres'], ['NDRES', 'ndres'], ['NRRES', 'nrres'],
]);

const PREFIX: ReadonlyMap<TokenType, UnaryOperator> = new Map<TokenType, UnaryOperator>([
    ['MINUS', 'neg'], ['HASH', 'card'], ['DOM', 'dom'], ['RAN', 'ran'], ['INV', 'inv'], ['ID', 'id'],
    ['POWER', 'power'], ['POWER1', 'power1'], ['FINSET', 'finset'], ['FINSET1', 'finset1'],
    ['BIGCUP', 'bigcup'], ['BIGCAP', 'bigcap'],
]);

const QUANTIFIERS: ReadonlyMap<TokenType, QuantifierKind> = new Map<TokenType, QuantifierKind>([
    ['FORALL', 'forall'], ['EXISTS', 'exists'], ['EXISTS1', 'exists1'],
]);

/** Tokens that may begin an argument of space-juxtaposed application. */
const ARGUMENT_START: ReadonlySet<TokenType> = new Set<TokenType>([
    'IDENTIFIER', 'NUMBER', 'LPAREN', 'LBRACE', 'LANGLE', 'LBAG',
]);

const PREDICATE_OPS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>([
    'eq', 'neq', 'lt', 'le', 'gt', 'ge', 'in', 'notin', 'subseteq', 'subset',
]);

/** An infix operator as taken from the input. */
interface Infix {
    readonly op: BinaryOperator;
    /** Written with a trailing `\` after the operator. */
    readonly lineBreak: boolean;
}

export function describeToken(tok: Token): string {
    switch (tok.type) {
        case 'EOF': return 'end of input';
        case 'NEWLINE': return 'end of line';
        case 'CONTINUATION': return 'line continuation \'\\\'';
        default: return `'${tok.value}'`;
    }
}

/** Parse a single standalone expression, e.g. a formula found in prose. */
export function parseExpressionText(text: string): Expr {
    const parser = new ExpressionParser(tokenize(text));
    return parser.parseStandalone();
}

// ── Parser ──────────────────────────────────────────────────

export class ExpressionParser {
    protected readonly tokens: Token[];
    protected pos = 0;
    /** Open brackets; inside them line breaks are insignificant. */
    protected depth = 0;
    /** When set, a line break always ends the expression (proofs, chains, tables). */
    protected lineMode = false;

    constructor(tokens: Token[]) {
        this.tokens = tokens;
    }

    parseStandalone(): Expr {
        this.skipNewlines();
        const expr = this.parseIff();
        this.skipNewlines();
        const tok = this.peek();
        if (tok.type !== 'EOF') {
            throw new ParserError(`Unexpected token after expression: ${describeToken(tok)}`, tok);
        }
        return expr;
    }

    // ── Cursor ──────────────────────────────────────────────

    protected peek(): Token {
        if (this.depth > 0) this.skipLayout();
        return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
    }

    /** Token `offset` places ahead, skipping line breaks inside brackets. */
    protected peekAt(offset: number): Token {
        let idx = this.pos;
        let seen = 0;
        while (idx < this.tokens.length - 1) {
            if (this.depth > 0 && (this.tokens[idx].type === 'NEWLINE' || this.tokens[idx].type === 'CONTINUATION')) {
                idx++;
                continue;
            }
            if (seen === offset) break;
            seen++;
            idx++;
        }
        return this.tokens[Math.min(idx, this.tokens.length - 1)];
    }

    protected advance(): Token {
        const tok = this.peek();
        if (tok.type !== 'EOF') this.pos++;
        return tok;
    }

    protected check(type: TokenType): boolean {
        return this.peek().type === type;
    }

    protected match(type: TokenType): boolean {
        if (!this.check(type)) return false;
        this.advance();
        return true;
    }

    protected expect(type: TokenType, what: string): Token {
        const tok = this.peek();
        if (tok.type !== type) {
            throw new ParserError(`Expected ${what}, found ${describeToken(tok)}`, tok);
        }
        return this.advance();
    }

    protected skipNewlines(): void {
        while (this.pos < this.tokens.length && this.tokens[this.pos].type === 'NEWLINE') this.pos++;
    }

    /** Line breaks and continuations, which carry no meaning inside brackets. */
    private skipLayout(): void {
        for (;;) {
            const type = this.tokens[this.pos]?.type;
            if (type !== 'NEWLINE' && type !== 'CONTINUATION') return;
            this.pos++;
        }
    }

    /** Run `body` with line breaks ignored, as inside a bracket pair. */
    protected nested<T>(body: () => T): T {
        this.depth++;
        try {
            return body();
        } finally {
            this.depth--;
        }
    }

    // ── Infix operators and line continuation ───────────────

    /** The infix operator at the cursor, or on the next line when it continues this one. */
    protected peekInfix(): Token | null {
        const tok = this.peek();
        if (tok.type === 'NEWLINE' && this.depth === 0 && !this.lineMode) {
            const next = this.tokens[this.pos + 1];
            return next !== undefined && INFIX.has(next.type) ? next : null;
        }
        return INFIX.has(tok.type) ? tok : null;
    }

    protected takeInfix(): Infix {
        if (this.tokens[this.pos].type === 'NEWLINE') this.pos++;
        const tok = this.advance();
        const op = INFIX.get(tok.type);
        if (op === undefined) throw new ParserError(`Expected an operator, found ${describeToken(tok)}`, tok);
        if (this.tokens[this.pos].type === 'CONTINUATION') {
            this.pos++;
            return { op, lineBreak: true };
        }
        // A trailing operator carries the expression onto the next line
        if (this.depth === 0 && this.tokens[this.pos].type === 'NEWLINE') {
            const next = this.tokens[this.pos + 1];
            if (next !== undefined && next.type !== 'NEWLINE' && next.type !== 'EOF') this.pos++;
        }
        return { op, lineBreak: false };
    }

    private combine(infix: Infix, left: Expr, right: Expr): Expr {
        const node = mk.binary(infix.op, left, right, positionOf(left));
        return infix.lineBreak ? { ...node, lineBreak: true } : node;
    }

    private peekOperator(...ops: BinaryOperator[]): boolean {
        const tok = this.peekInfix();
        if (tok === null) return false;
        const op = INFIX.get(tok.type);
        return op !== undefined && ops.includes(op);
    }

    // ── Logical levels ──────────────────────────────────────

    parseIff(): Expr {
        let left = this.parseImplies();
        while (this.peekOperator('iff')) {
            left = this.combine(this.takeInfix(), left, this.parseImplies());
        }
        return left;
    }

    private parseImplies(): Expr {
        const left = this.parseOr();
        if (!this.peekOperator('implies')) return left;
        return this.combine(this.takeInfix(), left, this.parseImplies());
    }

    private parseOr(): Expr {
        let left = this.parseAnd();
        while (this.peekOperator('or')) {
            left = this.combine(this.takeInfix(), left, this.parseAnd());
        }
        return left;
    }

    private parseAnd(): Expr {
        let left = this.parseNot();
        while (this.peekOperator('and')) {
            left = this.combine(this.takeInfix(), left, this.parseNot());
        }
        return left;
    }

    private parseNot(): Expr {
        const tok = this.peek();
        if (tok.type === 'NOT') {
            this.advance();
            return mk.unary('not', this.parseNot(), positionOf(tok));
        }
        return this.parsePredicate();
    }

    /** Comparisons and membership: one non-associative tier. */
    private parsePredicate(): Expr {
        const left = this.parseExpression();
        const tok = this.peekInfix();
        const op = tok ? INFIX.get(tok.type) : undefined;
        if (op === undefined || !PREDICATE_OPS.has(op)) return left;

        const result = this.combine(this.takeInfix(), left, this.parseExpression());

        const again = this.peekInfix();
        const next = again ? INFIX.get(again.type) : undefined;
        if (again && next !== undefined && PREDICATE_OPS.has(next)) {
            throw new ParserError(`Comparison operators do not chain; add parentheses before ${describeToken(again)}`, again);
        }
        return result;
    }

    // ── Expression levels (precedence climbing) ─────────────

    /** Term-level operators from function arrows up to restriction. */
    parseExpression(minPrec: number = PREC.arrow): Expr {
        let left = this.parsePrefix();

        for (;;) {
            const tok = this.peek();
            if (tok.type === 'RANGE') {
                if (PREC.range < minPrec) break;
                this.advance();
                const end = this.parseExpression(PREC.range + 1);
                left = { tag: 'Range', start: left, end, line: left.line, column: left.column };
                if (this.check('RANGE')) throw new ParserError('Ranges do not chain; add parentheses', this.peek());
                continue;
            }

            const infix = this.peekInfix();
            if (infix === null) break;
            const op = INFIX.get(infix.type);
            if (op === undefined) break;
            const info = BINARY_OPERATORS[op];
            if (info.precedence <= PREC.predicate || info.precedence < minPrec) break;

            const taken = this.takeInfix();
            const right = this.parseExpression(info.assoc === 'right' ? info.precedence : info.precedence + 1);
            left = this.combine(taken, left, right);
        }
        return left;
    }

    private parsePrefix(): Expr {
        const tok = this.peek();
        const op = PREFIX.get(tok.type);
        if (op !== undefined) {
            this.advance();
            return mk.unary(op, this.parsePrefix(), positionOf(tok));
        }
        return this.parsePostfix(this.parsePrimary(), true);
    }

    // ── Postfix: application, instantiation, image, closures ─

    private parsePostfix(base: Expr, juxtapose: boolean): Expr {
        let expr = base;

        for (;;) {
            const tok = this.peek();
            const at = positionOf(expr);

            if (tok.type === 'LPAREN' && !tok.spaceBefore) {
                this.advance();
                const args = this.nested(() => this.parseList('RPAREN'));
                this.expect('RPAREN', '\')\' to close the argument list');
                expr = mk.app(expr, args, 'call', at);
                continue;
            }

            if (tok.type === 'LBRACKET' && !tok.spaceBefore) {
                this.advance();
                const params = this.nested(() => this.parseList('RBRACKET'));
                this.expect('RBRACKET', '\']\' to close the generic parameters');
                expr = { tag: 'GenericInstantiation', base: expr, params, ...at };
                continue;
            }

            if (tok.type === 'LIMG') {
                this.advance();
                const set = this.nested(() => this.parseIff());
                this.expect('RIMG', '\'|)\' to close the relational image');
                expr = { tag: 'RelationalImage', relation: expr, set, ...at };
                continue;
            }

            if (tok.type === 'TILDE' || tok.type === 'TCLOSURE' || tok.type === 'RTCLOSURE') {
                this.advance();
                const op = tok.type === 'TILDE' ? 'inverse' : tok.type === 'TCLOSURE' ? 'tclosure' : 'rtclosure';
                expr = mk.postfix(op, expr, at);
                continue;
            }

            if (tok.type === 'CARET') {
                this.advance();
                expr = { tag: 'Superscript', base: expr, exponent: this.parsePrimary(), ...at };
                continue;
            }

            if (tok.type === 'UNDERSCORE') {
                this.advance();
                expr = { tag: 'Subscript', base: expr, index: this.parsePrimary(), ...at };
                continue;
            }

            if (tok.type === 'PERIOD' && !tok.spaceBefore) {
                const field = this.peekAt(1);
                if ((field.type === 'NUMBER' || field.type === 'IDENTIFIER') && !field.spaceBefore) {
                    this.advance();
                    this.advance();
                    expr = { tag: 'TupleProjection', base: expr, field: field.value, ...at };
                    continue;
                }
            }

            if (juxtapose && tok.spaceBefore && ARGUMENT_START.has(tok.type) && expr.tag !== 'Numeral') {
                const arg = this.parsePostfix(this.parsePrimary(), false);
                expr = mk.app(expr, [arg], 'juxtaposed', at);
                continue;
            }

            return expr;
        }
    }

    // ── Atoms ───────────────────────────────────────────────

    private parsePrimary(): Expr {
        const tok = this.peek();
        const at = positionOf(tok);

        switch (tok.type) {
            case 'IDENTIFIER':
                this.advance();
                return mk.ident(tok.value, at);

            case 'NUMBER':
                this.advance();
                return mk.num(tok.value, at);

            case 'LPAREN': {
                this.advance();
                const items = this.nested(() => this.parseList('RPAREN'));
                this.expect('RPAREN', '\')\' to close the parenthesis');
                if (items.length === 0) throw new ParserError('Empty parentheses', tok);
                return items.length === 1 ? items[0] : { tag: 'Tuple', elements: items, ...at };
            }

            case 'LBRACE':
                this.advance();
                return this.nested(() => this.parseBraced(at));

            case 'LANGLE':
                this.advance();
                return this.nested(() => this.parseSequence(at));

            case 'LBAG':
                this.advance();
                return this.nested(() => this.parseBag(at));

            case 'FORALL':
            case 'EXISTS':
            case 'EXISTS1':
                return this.parseQuantifier();

            case 'MU':
                return this.parseMu();

            case 'LAMBDA':
                return this.parseLambda();

            case 'IF':
                return this.parseConditional();

            case 'NOT':
                // `not` in operand position, e.g. `p and (not q)` written without parens
                this.advance();
                return mk.unary('not', this.parsePrefix(), at);

            default:
                throw new ParserError(`Expected an expression, found ${describeToken(tok)}`, tok);
        }
    }

    /** Comma-separated expressions up to (not including) `close`. */
    private parseList(close: TokenType): Expr[] {
        const items: Expr[] = [];
        if (this.check(close)) return items;
        items.push(this.parseIff());
        while (this.match('COMMA')) items.push(this.parseIff());
        return items;
    }

    private parseBraced(at: Position): Expr {
        if (this.looksLikeBinders()) {
            const comp = this.parseComprehensionBody('set', at);
            this.expect('RBRACE', '\'}\' to close the set comprehension');
            return comp;
        }
        const elements = this.parseList('RBRACE');
        this.expect('RBRACE', '\'}\' to close the set');
        return { tag: 'SetLiteral', elements, ...at };
    }

    private parseSequence(at: Position): Expr {
        if (this.looksLikeBinders()) {
            const comp = this.parseComprehensionBody('sequence', at);
            this.expect('RANGLE', '\'>\' to close the sequence comprehension');
            return comp;
        }
        const elements = this.parseList('RANGLE');
        this.expect('RANGLE', '\'>\' to close the sequence');
        return { tag: 'SequenceLiteral', elements, ...at };
    }

    private parseBag(at: Position): Expr {
        if (this.looksLikeBinders()) {
            const comp = this.parseComprehensionBody('bag', at);
            this.expect('RBAG', '\']]\' to close the bag comprehension');
            return comp;
        }
        const elements = this.parseList('RBAG');
        this.expect('RBAG', '\']]\' to close the bag');
        return { tag: 'BagLiteral', elements, ...at };
    }

    /** `x : T` or `x, y : T` ahead of the cursor. */
    private looksLikeBinders(): boolean {
        let k = 0;
        for (;;) {
            if (this.peekAt(k).type !== 'IDENTIFIER') return false;
            const sep = this.peekAt(k + 1).type;
            if (sep === 'COLON') return true;
            if (sep !== 'COMMA') return false;
            k += 2;
        }
    }

    private parseComprehensionBody(collection: Comprehension['collection'], at: Position): Expr {
        const binders = this.parseBinders();
        const predicate = this.match('PIPE') ? this.parseIff() : null;
        const yieldExpr = this.matchSeparator() ? this.parseIff() : null;
        return { tag: 'Comprehension', collection, binders, predicate, yield: yieldExpr, ...at };
    }

    // ── Binders ─────────────────────────────────────────────

    protected parseBinders(): BinderGroup[] {
        const groups: BinderGroup[] = [];
        do {
            const first = this.expect('IDENTIFIER', 'identifier in binder list');
            const names = [first.value];
            while (this.match('COMMA')) names.push(this.expect('IDENTIFIER', 'identifier after \',\'').value);
            const domain = this.match('COLON') ? this.parseExpression() : null;
            groups.push(mk.binder(names, domain, positionOf(first)));
        } while (this.match('SEMICOLON'));
        return groups;
    }

    /** `.`, `@` or `•` between a binder's predicate and its body. */
    private matchSeparator(): boolean {
        const tok = this.peek();
        if (tok.type === 'BULLET' || tok.type === 'PERIOD') {
            this.advance();
            return true;
        }
        return false;
    }

    private parseQuantifier(): Expr {
        const tok = this.advance();
        const quantifier = QUANTIFIERS.get(tok.type);
        if (quantifier === undefined) throw new ParserError(`Expected a quantifier, found ${describeToken(tok)}`, tok);
        const binders = this.parseBinders();

        let constraint: Expr | null = null;
        let predicate: Expr;
        if (this.match('PIPE')) {
            predicate = this.parseIff();
            if (this.matchSeparator()) {
                constraint = predicate;
                predicate = this.parseIff();
            }
        } else if (this.matchSeparator()) {
            predicate = this.parseIff();
        } else {
            throw new ParserError(`Expected '|' or '.' after quantifier binders, found ${describeToken(this.peek())}`, this.peek());
        }
        return { tag: 'Quantifier', quantifier, binders, constraint, predicate, ...positionOf(tok) };
    }

    private parseMu(): Expr {
        const tok = this.advance();
        const binders = this.parseBinders();
        const predicate = this.match('PIPE') ? this.parseIff() : null;
        const yieldExpr = this.matchSeparator() ? this.parseIff() : null;
        return { tag: 'Mu', binders, predicate, yield: yieldExpr, ...positionOf(tok) };
    }

    private parseLambda(): Expr {
        const tok = this.advance();
        const binders = this.parseBinders();
        if (!this.matchSeparator()) {
            throw new ParserError(`Expected '.' before the lambda body, found ${describeToken(this.peek())}`, this.peek());
        }
        return { tag: 'Lambda', binders, body: this.parseIff(), ...positionOf(tok) };
    }

    private parseConditional(): Expr {
        const tok = this.advance();
        const condition = this.parseIff();
        this.skipNewlines();
        this.expect('THEN', '\'then\'');
        const thenBranch = this.parseIff();
        this.skipNewlines();
        this.expect('ELSE', '\'else\'');
        const elseBranch = this.parseIff();
        return { tag: 'Conditional', condition, thenBranch, elseBranch, ...positionOf(tok) };
    }
}
