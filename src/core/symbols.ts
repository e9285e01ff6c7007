// ─────────────────────────────────────────────────────────────
// zscribe  ·  Symbol Tables
// Operator spellings in the two output dialects
// ─────────────────────────────────────────────────────────────

import type { BinaryOperator, QuantifierKind, UnaryOperator } from '../parser/ast';

/**
 * `fuzz` targets the fuzz package; `standard` targets zed-cm with
 * zed-maths and blackboard-bold number sets from amssymb.
 */
export type NotationMode = 'fuzz' | 'standard';

export const NOTATION_MODES: readonly NotationMode[] = ['fuzz', 'standard'];

export interface DialectPair {
    readonly fuzz: string;
    readonly standard: string;
}

// ── Dialect-dependent symbols ───────────────────────────────

export const DIALECT_SYMBOLS = {
    nat: { fuzz: '\\nat', standard: '\\mathbb{N}' },
    nat1: { fuzz: '\\nat_1', standard: '\\mathbb{N}_1' },
    num: { fuzz: '\\num', standard: '\\mathbb{Z}' },
    power: { fuzz: '\\power', standard: '\\mathbb{P}' },
    power1: { fuzz: '\\power_1', standard: '\\mathbb{P}_1' },
    finset: { fuzz: '\\finset', standard: '\\mathbb{F}' },
    finset1: { fuzz: '\\finset_1', standard: '\\mathbb{F}_1' },
    inverse: { fuzz: ' \\inv', standard: '^{-1}' },
    tclosure: { fuzz: ' \\plus', standard: '^{+}' },
    rtclosure: { fuzz: ' \\star', standard: '^{*}' },
    binderColon: { fuzz: ':', standard: '\\colon' },
    mid: { fuzz: '|', standard: '\\mid' },
    spot: { fuzz: '@', standard: '\\spot' },
} satisfies Record<string, DialectPair>;

export type DialectSymbol = keyof typeof DIALECT_SYMBOLS;

export function symbol(key: DialectSymbol, mode: NotationMode): string {
    return DIALECT_SYMBOLS[key][mode];
}

/** `R^n` as relational iteration or power. */
export function iterate(base: string, exponent: string, mode: NotationMode): string {
    return mode === 'fuzz' ? `${base} \\bsup ${exponent} \\esup` : `${base}^{${exponent}}`;
}

// ── Shared symbols ──────────────────────────────────────────

export const BINARY_SYMBOLS: Readonly<Record<BinaryOperator, string>> = {
    iff: '\\Leftrightarrow',
    implies: '\\Rightarrow',
    or: '\\lor',
    and: '\\land',
    eq: '=',
    neq: '\\neq',
    lt: '<',
    le: '\\leq',
    gt: '>',
    ge: '\\geq',
    in: '\\in',
    notin: '\\notin',
    subseteq: '\\subseteq',
    subset: '\\subset',
    rel: '\\rel',
    tfun: '\\fun',
    pfun: '\\pfun',
    tinj: '\\inj',
    pinj: '\\pinj',
    tsurj: '\\surj',
    psurj: '\\psurj',
    bij: '\\bij',
    ffun: '\\ffun',
    cross: '\\cross',
    maplet: '\\mapsto',
    plus: '+',
    minus: '-',
    union: '\\cup',
    setminus: '\\setminus',
    cat: '\\cat',
    bagUnion: '\\uplus',
    times: '*',
    div: '\\div',
    mod: '\\mod',
    intersect: '\\cap',
    filter: '\\filter',
    semi: '\\comp',
    circ: '\\circ',
    override: '\\oplus',
    dres: '\\dres',
    rres: '\\rres',
    ndres: '\\ndres',
    nrres: '\\nrres',
};

/** Prefix operators; `inv` is rendered as a postfix inverse instead. */
export function unarySymbol(op: Exclude<UnaryOperator, 'inv'>, mode: NotationMode): string {
    switch (op) {
        case 'not': return '\\lnot';
        case 'neg': return '-';
        case 'card': return '\\#';
        case 'dom': return '\\dom';
        case 'ran': return '\\ran';
        case 'id': return '\\id';
        case 'bigcup': return '\\bigcup';
        case 'bigcap': return '\\bigcap';
        case 'power': return symbol('power', mode);
        case 'power1': return symbol('power1', mode);
        case 'finset': return symbol('finset', mode);
        case 'finset1': return symbol('finset1', mode);
    }
}

export const QUANTIFIER_SYMBOLS: Readonly<Record<QuantifierKind, string>> = {
    forall: '\\forall',
    exists: '\\exists',
    exists1: '\\exists_1',
};

// ── Named constants ─────────────────────────────────────────

const NAMED_DIALECT: ReadonlyMap<string, DialectSymbol> = new Map<string, DialectSymbol>([
    ['N', 'nat'], ['ℕ', 'nat'], ['N1', 'nat1'], ['ℕ₁', 'nat1'], ['Z', 'num'], ['ℤ', 'num'],
]);

const NAMED_SHARED: ReadonlyMap<string, string> = new Map([
    ['emptyset', '\\emptyset'], ['∅', '\\emptyset'],
    ['seq', '\\seq'], ['seq1', '\\seq_1'], ['iseq', '\\iseq'], ['bag', '\\bag'],
    ['head', '\\head'], ['tail', '\\tail'], ['last', '\\last'], ['front', '\\front'], ['rev', '\\rev'],
]);

/** Identifiers with a dedicated command, or null for ordinary names. */
export function namedSymbol(name: string, mode: NotationMode): string | null {
    const dialect = NAMED_DIALECT.get(name);
    if (dialect) return symbol(dialect, mode);
    return NAMED_SHARED.get(name) ?? null;
}

/** Prefix generics whose argument follows after a hard space. */
export const PREFIX_GENERICS: ReadonlySet<string> = new Set(['seq', 'seq1', 'iseq', 'bag']);

const GREEK = new Set([
    'alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta', 'eta', 'theta', 'iota', 'kappa',
    'nu', 'xi', 'pi', 'rho', 'sigma', 'tau', 'upsilon', 'phi', 'chi', 'psi', 'omega',
    'Gamma', 'Delta', 'Theta', 'Xi', 'Pi', 'Sigma', 'Phi', 'Psi', 'Omega',
]);

/**
 * Typeset an identifier: single characters as they are, `x_i` and `a_12`
 * as subscripts, Greek letter names as commands, decorations kept, and any
 * other multi-letter name in `\mathit`.
 */
export function formatIdentifier(name: string, mode: NotationMode): string {
    const named = namedSymbol(name, mode);
    if (named) return named;
    if (GREEK.has(name)) return `\\${name}`;

    const decoration = /^(.*?)('+|\?|!)?$/.exec(name);
    const stem = decoration ? decoration[1] : name;
    const suffix = decoration && decoration[2] ? decoration[2] : '';

    if (Array.from(stem).length === 1) return stem + suffix;

    const sub = /^([A-Za-z])_([A-Za-z0-9]{1,3})$/.exec(stem);
    if (sub) return `${sub[1]}_{${sub[2]}}${suffix}`;

    return `\\mathit{${stem.replace(/_/g, '\\_')}}${suffix}`;
}
