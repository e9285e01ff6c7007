// ─────────────────────────────────────────────────────────────
// zscribe  ·  Expression Emitter
// Exhaustive dispatch over Expr; grouping follows the precedence ladder
// ─────────────────────────────────────────────────────────────

import { assertNever } from '../core/errors';
import { BINARY_OPERATORS, PREC, needsParens, precedenceOf } from '../core/precedence';
import {
    BINARY_SYMBOLS, PREFIX_GENERICS, QUANTIFIER_SYMBOLS, formatIdentifier, iterate, symbol, unarySymbol,
    type NotationMode,
} from '../core/symbols';
import type {
    BinderGroup, Declaration, Expr, FreeType, FunctionApp, PostfixOperator, ZedEntry,
} from '../parser/ast';
import { escapeLatex } from './escape';

/** Read-only per-run state threaded through every emission call. */
export interface EmitContext {
    readonly mode: NotationMode;
}

const paren = (text: string): string => `(${text})`;

/** Wrap `child` when it binds looser than `minPrec`. */
function operand(child: Expr, minPrec: number, ctx: EmitContext): string {
    const text = emitExpr(child, ctx);
    return precedenceOf(child) < minPrec ? paren(text) : text;
}

function postfixSymbol(op: PostfixOperator, ctx: EmitContext): string {
    switch (op) {
        case 'inverse': return symbol('inverse', ctx.mode);
        case 'tclosure': return symbol('tclosure', ctx.mode);
        case 'rtclosure': return symbol('rtclosure', ctx.mode);
    }
}

export function emitBinders(groups: readonly BinderGroup[], ctx: EmitContext): string {
    const colon = symbol('binderColon', ctx.mode);
    return groups.map((group) => {
        const names = group.names.map((name) => formatIdentifier(name, ctx.mode)).join(', ');
        return group.domain === null ? names : `${names} ${colon} ${emitExpr(group.domain, ctx)}`;
    }).join('; ');
}

/** `binders | predicate @ body`, with the pieces that are present. */
function emitBinding(binders: readonly BinderGroup[], predicate: Expr | null, body: Expr | null, ctx: EmitContext): string {
    let text = emitBinders(binders, ctx);
    if (predicate !== null) text += ` ${symbol('mid', ctx.mode)} ${emitExpr(predicate, ctx)}`;
    if (body !== null) text += ` ${symbol('spot', ctx.mode)} ${emitExpr(body, ctx)}`;
    return text;
}

function emitApplication(expr: FunctionApp, ctx: EmitContext): string {
    const func = operand(expr.func, PREC.postfix, ctx);
    if (expr.style === 'call') {
        // `(f x)(y)`: without the group the call would take `x` as its function
        const juxtaposed = expr.func.tag === 'FunctionApp' && expr.func.style === 'juxtaposed';
        return `${juxtaposed ? paren(func) : func}(${expr.args.map((arg) => emitExpr(arg, ctx)).join(', ')})`;
    }

    // Application is left-associative, so a juxtaposed argument that is itself an application needs grouping
    const args = expr.args.map((arg) => {
        const text = emitExpr(arg, ctx);
        const group = precedenceOf(arg) < PREC.postfix || (arg.tag === 'FunctionApp' && arg.style === 'juxtaposed');
        return group ? paren(text) : text;
    });
    const generic = expr.func.tag === 'Identifier' && PREFIX_GENERICS.has(expr.func.name);
    return [func, ...args].join(generic ? ' ' : '~');
}

export function emitExpr(expr: Expr, ctx: EmitContext): string {
    switch (expr.tag) {
        case 'Identifier':
            return formatIdentifier(expr.name, ctx.mode);

        case 'Numeral':
            return expr.value;

        case 'BinaryOp': {
            const info = BINARY_OPERATORS[expr.op];
            const left = emitExpr(expr.left, ctx);
            const right = emitExpr(expr.right, ctx);
            return [
                needsParens(expr.left, info.precedence, info.assoc, 'left') ? paren(left) : left,
                expr.lineBreak === true ? `${BINARY_SYMBOLS[expr.op]} \\\\\n\\quad` : BINARY_SYMBOLS[expr.op],
                needsParens(expr.right, info.precedence, info.assoc, 'right') ? paren(right) : right,
            ].join(' ');
        }

        case 'UnaryOp':
            switch (expr.op) {
                case 'not':
                    return `${unarySymbol('not', ctx.mode)} ${operand(expr.operand, PREC.not, ctx)}`;
                case 'neg': {
                    // `--x` would read as a decrement
                    const nested = expr.operand.tag === 'UnaryOp' && expr.operand.op === 'neg';
                    const text = operand(expr.operand, PREC.prefix, ctx);
                    return `-${nested ? paren(text) : text}`;
                }
                case 'inv':
                    return `${operand(expr.operand, PREC.postfix, ctx)}${symbol('inverse', ctx.mode)}`;
                default:
                    return `${unarySymbol(expr.op, ctx.mode)} ${operand(expr.operand, PREC.prefix, ctx)}`;
            }

        case 'PostfixOp':
            return `${operand(expr.operand, PREC.postfix, ctx)}${postfixSymbol(expr.op, ctx)}`;

        case 'Quantifier': {
            const head = QUANTIFIER_SYMBOLS[expr.quantifier];
            return `${head} ${emitBinding(expr.binders, expr.constraint, expr.predicate, ctx)}`;
        }

        case 'Mu':
            return paren(`\\mu ${emitBinding(expr.binders, expr.predicate, expr.yield, ctx)}`);

        case 'Lambda':
            return `\\lambda ${emitBinding(expr.binders, null, expr.body, ctx)}`;

        case 'Conditional':
            return `\\IF ${emitExpr(expr.condition, ctx)} \\THEN ${emitExpr(expr.thenBranch, ctx)} \\ELSE ${emitExpr(expr.elseBranch, ctx)}`;

        case 'SetLiteral':
            return `\\{${expr.elements.map((e) => emitExpr(e, ctx)).join(', ')}\\}`;

        case 'SequenceLiteral':
            return expr.elements.length === 0
                ? '\\langle \\rangle'
                : `\\langle ${expr.elements.map((e) => emitExpr(e, ctx)).join(', ')} \\rangle`;

        case 'BagLiteral':
            return `\\lbag ${expr.elements.map((e) => emitExpr(e, ctx)).join(', ')} \\rbag`;

        case 'Comprehension': {
            const body = emitBinding(expr.binders, expr.predicate, expr.yield, ctx);
            switch (expr.collection) {
                case 'set': return `\\{ ${body} \\}`;
                case 'sequence': return `\\langle ${body} \\rangle`;
                case 'bag': return `\\lbag ${body} \\rbag`;
                default: return assertNever(expr.collection, 'collection');
            }
        }

        case 'Tuple':
            return paren(expr.elements.map((e) => emitExpr(e, ctx)).join(', '));

        case 'TupleProjection':
            return `${operand(expr.base, PREC.postfix, ctx)}.${/^\d+$/.test(expr.field) ? expr.field : formatIdentifier(expr.field, ctx.mode)}`;

        case 'FunctionApp':
            return emitApplication(expr, ctx);

        case 'GenericInstantiation': {
            const base = operand(expr.base, PREC.postfix, ctx);
            if (expr.base.tag === 'Identifier' && PREFIX_GENERICS.has(expr.base.name) && expr.params.length === 1) {
                return `${base} ${operand(expr.params[0], PREC.postfix, ctx)}`;
            }
            return `${base}[${expr.params.map((p) => emitExpr(p, ctx)).join(', ')}]`;
        }

        case 'RelationalImage':
            return `${operand(expr.relation, PREC.postfix, ctx)} \\limg ${emitExpr(expr.set, ctx)} \\rimg`;

        case 'Range':
            return `${operand(expr.start, PREC.range + 1, ctx)} \\upto ${operand(expr.end, PREC.range + 1, ctx)}`;

        case 'Subscript':
            return `${operand(expr.base, PREC.postfix, ctx)}_{${emitExpr(expr.index, ctx)}}`;

        case 'Superscript':
            return iterate(operand(expr.base, PREC.postfix, ctx), emitExpr(expr.exponent, ctx), ctx.mode);

        default:
            return assertNever(expr, 'expression');
    }
}

// ── Paragraph pieces ────────────────────────────────────────

/** `[X, Y]`, or nothing without parameters. */
export function emitParams(params: readonly string[], ctx: EmitContext): string {
    return params.length === 0 ? '' : `[${params.map((p) => formatIdentifier(p, ctx.mode)).join(', ')}]`;
}

export function emitDeclaration(decl: Declaration, ctx: EmitContext): string {
    const names = decl.names.map((name) => formatIdentifier(name, ctx.mode)).join(', ');
    return `${names} : ${emitExpr(decl.type, ctx)}`;
}

export function emitFreeType(type: FreeType, ctx: EmitContext): string {
    const branches = type.branches.map((branch) => {
        const name = formatIdentifier(branch.name, ctx.mode);
        if (branch.payload.length === 0) return name;
        return `${name} \\ldata ${branch.payload.map((p) => operand(p, PREC.cross + 1, ctx)).join(' \\cross ')} \\rdata`;
    });
    return `${formatIdentifier(type.name, ctx.mode)}${emitParams(type.params, ctx)} ::= ${branches.join(' | ')}`;
}

/** One line of a `zed` paragraph. */
export function emitZedEntry(entry: ZedEntry, ctx: EmitContext): string {
    switch (entry.tag) {
        case 'GivenType':
            return emitParams(entry.names, ctx);
        case 'FreeType':
            return emitFreeType(entry, ctx);
        case 'Abbreviation':
            return `${formatIdentifier(entry.name, ctx.mode)}${emitParams(entry.params, ctx)} == ${emitExpr(entry.expression, ctx)}`;
        case 'ExpressionItem':
            return emitExpr(entry.expression, ctx);
        default:
            return assertNever(entry, 'zed entry');
    }
}

// ── Justifications ──────────────────────────────────────────

const RULE_SYMBOLS: ReadonlyMap<string, string> = new Map([
    ['=>', '\\Rightarrow'], ['⇒', '\\Rightarrow'], ['implies', '\\Rightarrow'],
    ['<=>', '\\Leftrightarrow'], ['⇔', '\\Leftrightarrow'], ['iff', '\\Leftrightarrow'],
    ['and', '\\land'], ['land', '\\land'], ['∧', '\\land'],
    ['or', '\\lor'], ['lor', '\\lor'], ['∨', '\\lor'],
    ['not', '\\lnot'], ['lnot', '\\lnot'], ['¬', '\\lnot'],
    ['forall', '\\forall'], ['∀', '\\forall'],
    ['exists', '\\exists'], ['∃', '\\exists'],
    ['=', '='],
]);

/**
 * Rule names in math mode: connectives become symbols and runs of words
 * share one `\mbox`. Label citations after `from` stay words.
 */
export function emitJustification(text: string): string {
    const parts: string[] = [];
    let words: string[] = [];
    let citing = false;

    const flush = (): void => {
        if (words.length > 0) parts.push(`\\mbox{${escapeLatex(words.join(' '))}}`);
        words = [];
    };

    for (const word of text.trim().split(/\s+/)) {
        if (word.toLowerCase() === 'from') citing = true;
        const sym = citing ? undefined : RULE_SYMBOLS.get(word.toLowerCase());
        if (sym === undefined) {
            words.push(word);
        } else {
            flush();
            parts.push(sym);
        }
    }
    flush();
    return parts.join(' ');
}
