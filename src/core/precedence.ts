// ─────────────────────────────────────────────────────────────
// zscribe  ·  Precedence Ladder
// Shared by the parser (binding) and the generator (grouping)
// ─────────────────────────────────────────────────────────────

import type { BinaryOperator, Expr } from '../parser/ast';

export type Associativity = 'left' | 'right' | 'none';

export interface OperatorInfo {
    readonly precedence: number;
    readonly assoc: Associativity;
}

/** Lowest binding first. */
export const PREC = {
    iff: 1,
    implies: 2,
    or: 3,
    and: 4,
    not: 5,
    predicate: 6,
    arrow: 7,
    cross: 8,
    maplet: 9,
    range: 10,
    additive: 11,
    multiplicative: 12,
    override: 13,
    restriction: 14,
    prefix: 15,
    postfix: 16,
    atom: 17,
} as const;

export const BINARY_OPERATORS: Readonly<Record<BinaryOperator, OperatorInfo>> = {
    iff: { precedence: PREC.iff, assoc: 'left' },
    implies: { precedence: PREC.implies, assoc: 'right' },
    or: { precedence: PREC.or, assoc: 'left' },
    and: { precedence: PREC.and, assoc: 'left' },

    eq: { precedence: PREC.predicate, assoc: 'none' },
    neq: { precedence: PREC.predicate, assoc: 'none' },
    lt: { precedence: PREC.predicate, assoc: 'none' },
    le: { precedence: PREC.predicate, assoc: 'none' },
    gt: { precedence: PREC.predicate, assoc: 'none' },
    ge: { precedence: PREC.predicate, assoc: 'none' },
    in: { precedence: PREC.predicate, assoc: 'none' },
    notin: { precedence: PREC.predicate, assoc: 'none' },
    subseteq: { precedence: PREC.predicate, assoc: 'none' },
    subset: { precedence: PREC.predicate, assoc: 'none' },

    rel: { precedence: PREC.arrow, assoc: 'right' },
    tfun: { precedence: PREC.arrow, assoc: 'right' },
    pfun: { precedence: PREC.arrow, assoc: 'right' },
    tinj: { precedence: PREC.arrow, assoc: 'right' },
    pinj: { precedence: PREC.arrow, assoc: 'right' },
    tsurj: { precedence: PREC.arrow, assoc: 'right' },
    psurj: { precedence: PREC.arrow, assoc: 'right' },
    bij: { precedence: PREC.arrow, assoc: 'right' },
    ffun: { precedence: PREC.arrow, assoc: 'right' },

    cross: { precedence: PREC.cross, assoc: 'left' },
    maplet: { precedence: PREC.maplet, assoc: 'left' },

    plus: { precedence: PREC.additive, assoc: 'left' },
    minus: { precedence: PREC.additive, assoc: 'left' },
    union: { precedence: PREC.additive, assoc: 'left' },
    setminus: { precedence: PREC.additive, assoc: 'left' },
    cat: { precedence: PREC.additive, assoc: 'left' },
    bagUnion: { precedence: PREC.additive, assoc: 'left' },

    times: { precedence: PREC.multiplicative, assoc: 'left' },
    div: { precedence: PREC.multiplicative, assoc: 'left' },
    mod: { precedence: PREC.multiplicative, assoc: 'left' },
    intersect: { precedence: PREC.multiplicative, assoc: 'left' },
    filter: { precedence: PREC.multiplicative, assoc: 'left' },
    semi: { precedence: PREC.multiplicative, assoc: 'left' },
    circ: { precedence: PREC.multiplicative, assoc: 'left' },

    override: { precedence: PREC.override, assoc: 'left' },

    dres: { precedence: PREC.restriction, assoc: 'left' },
    rres: { precedence: PREC.restriction, assoc: 'left' },
    ndres: { precedence: PREC.restriction, assoc: 'left' },
    nrres: { precedence: PREC.restriction, assoc: 'left' },
};

/** Binding strength of an expression as it stands. */
export function precedenceOf(expr: Expr): number {
    switch (expr.tag) {
        case 'BinaryOp': return BINARY_OPERATORS[expr.op].precedence;
        case 'UnaryOp': return expr.op === 'not' ? PREC.not : PREC.prefix;
        case 'Range': return PREC.range;
        case 'PostfixOp':
        case 'FunctionApp':
        case 'GenericInstantiation':
        case 'RelationalImage':
        case 'TupleProjection':
        case 'Subscript':
        case 'Superscript':
            return PREC.postfix;
        // Binders and conditionals extend as far right as possible
        case 'Quantifier':
        case 'Lambda':
        case 'Conditional':
            return 0;
        case 'Mu':
        case 'Identifier':
        case 'Numeral':
        case 'SetLiteral':
        case 'SequenceLiteral':
        case 'BagLiteral':
        case 'Comprehension':
        case 'Tuple':
            return PREC.atom;
    }
}

/**
 * Whether `child` needs grouping as the `side` operand of an operator at
 * `parentPrec`. Strictly weaker children are wrapped; at equal strength the
 * operand on the non-associative side is wrapped.
 */
export function needsParens(child: Expr, parentPrec: number, parentAssoc: Associativity, side: 'left' | 'right'): boolean {
    const prec = precedenceOf(child);
    if (prec < parentPrec) return true;
    if (prec > parentPrec) return false;
    if (parentAssoc === 'none') return true;
    return parentAssoc !== side;
}
