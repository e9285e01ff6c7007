// ─────────────────────────────────────────────────────────────
// zscribe  ·  Smart Text
// Finds formulas inside prose and renders them in math mode.
// Ordered passes over a segment list; each pass rewrites only
// the prose segments left by the passes before it.
// ─────────────────────────────────────────────────────────────

import proseWordList from '../core/prose-words.json';
import { LexError, ParserError } from '../core/errors';
import { formatIdentifier, symbol } from '../core/symbols';
import { parseExpressionText } from '../parser/expressions';
import { escapeLatex } from './escape';
import { emitExpr, type EmitContext } from './latex-expr';

export type SegmentKind = 'prose' | 'math' | 'latex';

export interface Segment {
    readonly kind: SegmentKind;
    /** Prose as written, math without `$` delimiters, or raw LaTeX. */
    readonly text: string;
}

export type Pass = (segments: readonly Segment[], ctx: EmitContext) => Segment[];

const PROSE_WORDS: ReadonlySet<string> = new Set(proseWordList);

/** Render a formula, or null when the text does not parse. */
export function formula(text: string, ctx: EmitContext): string | null {
    try {
        return emitExpr(parseExpressionText(text), ctx);
    } catch (err) {
        if (err instanceof LexError || err instanceof ParserError) return null;
        throw err;
    }
}

function isProseWord(word: string): boolean {
    // Single letters count as words only in lower case (`a`), so `A` stays a name
    return PROSE_WORDS.has(word) || (word.length > 1 && PROSE_WORDS.has(word.toLowerCase()));
}

// ── Segment plumbing ────────────────────────────────────────

interface Replacement {
    readonly start: number;
    readonly end: number;
    readonly segment: Segment;
}

const prose = (text: string): Segment => ({ kind: 'prose', text });
const math = (text: string): Segment => ({ kind: 'math', text });

/** Cut `text` at non-overlapping replacements, given in order. */
function splice(text: string, replacements: readonly Replacement[]): Segment[] {
    const out: Segment[] = [];
    let cursor = 0;
    for (const { start, end, segment } of replacements) {
        if (start > cursor) out.push(prose(text.slice(cursor, start)));
        out.push(segment);
        cursor = end;
    }
    if (cursor < text.length) out.push(prose(text.slice(cursor)));
    return out;
}

function rewriteProse(segments: readonly Segment[], find: (text: string) => Replacement[]): Segment[] {
    return segments.flatMap((segment) => (segment.kind === 'prose' ? splice(segment.text, find(segment.text)) : [segment]));
}

/** Replacements for every regex match whose formula renders. */
function matchFormulas(text: string, pattern: RegExp, render: (match: RegExpMatchArray) => string | null): Replacement[] {
    const found: Replacement[] = [];
    for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        const rendered = render(match);
        if (rendered !== null) found.push({ start, end: start + match[0].length, segment: math(rendered) });
    }
    return found;
}

/** Index of the bracket closing the one at `open`, or -1. */
function closingBracket(text: string, open: number, left: string, right: string): number {
    let depth = 0;
    for (let k = open; k < text.length; k++) {
        if (text[k] === left) depth++;
        else if (text[k] === right && --depth === 0) return k;
    }
    return -1;
}

// ── Words and runs ──────────────────────────────────────────

interface Word {
    readonly text: string;
    readonly start: number;
    readonly end: number;
    /** Punctuation stripped from the end of the word. */
    readonly trail: string;
    /** Sentence punctuation followed the word; a formula cannot continue past it. */
    readonly stop: boolean;
}

function splitWords(text: string): Word[] {
    const words: Word[] = [];
    for (const match of text.matchAll(/\S+/g)) {
        const start = match.index ?? 0;
        const raw = match[0];
        // A lone `:` or `.` is notation, not punctuation
        const core = /^[.,;:!?]+$/.test(raw) ? raw : raw.replace(/[.,;:!?]+$/, '');
        const trail = raw.slice(core.length);
        words.push({ text: core, start, end: start + core.length, trail, stop: trail.length > 0 });
    }
    return words;
}

const ATOM = /^(?:[A-Za-z](?:\d+|'+|_[A-Za-z0-9]+)?|\d+|[A-Z][A-Z0-9_]+)$/;
const SYMBOLIC = /^[^\p{L}\p{N}\s]+$/u;
const MIXED_SYMBOL = /[#()[\]{}<>=!+\-*|~^∈∉⊆⊂∪∩×≤≥≠↦→⇸↔∧∨¬⇒⇔]/u;

const OPERATOR_WORDS: ReadonlySet<string> = new Set([
    'land', 'lor', 'lnot', 'implies', 'iff', 'elem', 'notin', 'subset', 'subseteq', 'psubset',
    'union', 'intersect', 'cross', 'dom', 'ran', 'mod', 'div', 'o9', 'comp', 'filter',
    'P', 'P1', 'F', 'F1', 'N', 'N1', 'Z', 'seq', 'seq1', 'iseq', 'bag',
]);

const STRONG_LOGICAL: ReadonlySet<string> = new Set([
    '=>', '<=>', '⇒', '⇔', '∧', '∨', '¬', 'land', 'lor', 'lnot', 'implies', 'iff',
]);

/** English connectives that read as logic only between formula words. */
const WEAK_LOGICAL: ReadonlySet<string> = new Set(['and', 'or', 'not']);

const RELATIONS: ReadonlySet<string> = new Set([
    '=', '!=', '/=', '<', '>', '<=', '>=', '≠', '≤', '≥',
    'elem', '∈', 'notin', '∉', 'subseteq', '⊆', 'subset', '⊂', 'psubset',
    '|->', '↦', '<->', '↔', '->', '→', '+->', '⇸', '-|>', '>->', '>+>', '-->>', '+->>', '>->>',
    '<|', '|>', '<<|', '|>>', '++',
]);

function isMathWord(word: string): boolean {
    if (word === '' || isProseWord(word)) return false;
    if (ATOM.test(word) || OPERATOR_WORDS.has(word) || SYMBOLIC.test(word)) return true;
    return /^[\p{L}\p{N}_'#()[\]{}<>=!+\-*|~^∈∉⊆⊂∪∩×≤≥≠↦→⇸↔∧∨¬⇒⇔]+$/u.test(word) && MIXED_SYMBOL.test(word);
}

/**
 * Maximal runs of formula words that contain an operator accepted by
 * `isOperator`. A run ends at sentence punctuation and never starts or
 * ends on a binary operator.
 */
function formulaRuns(text: string, isOperator: (word: string) => boolean): Replacement[] {
    const words = splitWords(text);
    const member = (k: number): boolean => {
        const word = words[k].text;
        if (!WEAK_LOGICAL.has(word)) return isMathWord(word);
        const next = k + 1 < words.length && isMathWord(words[k + 1].text);
        if (word === 'not') return next;
        return next && k > 0 && !words[k - 1].stop && isMathWord(words[k - 1].text);
    };
    const binary = (word: string): boolean => word !== '¬' && word !== 'lnot' && word !== 'not' &&
        (SYMBOLIC.test(word) || WEAK_LOGICAL.has(word) || STRONG_LOGICAL.has(word) || RELATIONS.has(word));

    const found: Replacement[] = [];
    let k = 0;
    while (k < words.length) {
        if (!member(k)) {
            k++;
            continue;
        }
        let last = k;
        while (!words[last].stop && last + 1 < words.length && member(last + 1)) last++;

        let first = k;
        let end = last;
        while (first <= end && binary(words[first].text)) first++;
        while (end >= first && (binary(words[end].text) || words[end].text === 'not' || words[end].text === 'lnot')) end--;

        if (first <= end && words.slice(first, end + 1).some((w) => isOperator(w.text))) {
            found.push({ start: words[first].start, end: words[end].end, segment: prose(text.slice(words[first].start, words[end].end)) });
        }
        k = last + 1;
    }
    return found;
}

function renderRuns(segments: readonly Segment[], ctx: EmitContext, isOperator: (word: string) => boolean): Segment[] {
    return rewriteProse(segments, (text) => formulaRuns(text, isOperator).flatMap((run) => {
        const rendered = formula(run.segment.text, ctx);
        return rendered === null ? [] : [{ start: run.start, end: run.end, segment: math(rendered) }];
    }));
}

// ── Passes ──────────────────────────────────────────────────

/** `` `expr` `` is always a formula; `$…$` written by the user is kept as math. */
export const manualMarkup: Pass = (segments, ctx) => rewriteProse(segments, (text) => {
    const found: Replacement[] = [];
    for (const match of text.matchAll(/`([^`]+)`|\$([^$]+)\$/g)) {
        const start = match.index ?? 0;
        const end = start + match[0].length;
        if (match[2] !== undefined) {
            found.push({ start, end, segment: math(match[2]) });
            continue;
        }
        const rendered = formula(match[1], ctx);
        found.push({ start, end, segment: rendered === null ? prose(match[1]) : math(rendered) });
    }
    return found;
});

/** `[cite key]` and `[cite key locator]`. */
export const citations: Pass = (segments) => rewriteProse(segments, (text) => {
    const found: Replacement[] = [];
    for (const match of text.matchAll(/\[cite\s+([^\s\]]+)(?:\s+([^\]]+))?\]/g)) {
        const start = match.index ?? 0;
        const locator = match[2] !== undefined ? `[${escapeLatex(match[2].trim())}]` : '';
        found.push({ start, end: start + match[0].length, segment: { kind: 'latex', text: `\\citep${locator}{${match[1]}}` } });
    }
    return found;
});

/** Runs joined by connectives: `p and q => r`, `p ⇔ x > 1`. */
export const logicalKeywords: Pass = (segments, ctx) =>
    renderRuns(segments, ctx, (word) => STRONG_LOGICAL.has(word) || WEAK_LOGICAL.has(word));

const OPERATOR_HINT = /=>|<=>|\|->|<->|->|[=<>∧∨¬⇒⇔∈∉⊆∪∩×↦→+*#]|\b(?:land|lor|lnot|elem|notin|union|intersect|dom|ran)\b/;

/** `(x + 1)`, `f(x = y)`: parenthesized text holding an operator, with a touching function name. */
export const parenthesizedGroups: Pass = (segments, ctx) => rewriteProse(segments, (text) => {
    const found: Replacement[] = [];
    let k = 0;
    while (k < text.length) {
        const open = text.indexOf('(', k);
        if (open < 0) break;
        const close = closingBracket(text, open, '(', ')');
        if (close < 0) break;

        let start = open;
        const name = /[A-Za-z][A-Za-z0-9_]*$/.exec(text.slice(0, open));
        if (name !== null && !isProseWord(name[0])) start = open - name[0].length;

        const inner = text.slice(open + 1, close);
        const rendered = OPERATOR_HINT.test(inner) ? formula(text.slice(start, close + 1), ctx) : null;
        if (rendered !== null) {
            found.push({ start, end: close + 1, segment: math(rendered) });
            k = close + 1;
        } else {
            k = open + 1;
        }
    }
    return found;
});

/** `x^2`, `R^n`, `x_i`, `a_12`. */
export const scripts: Pass = (segments, ctx) => rewriteProse(segments, (text) =>
    matchFormulas(
        text,
        /(?<![\w\\])(?:[A-Za-z][A-Za-z0-9]*\^[A-Za-z0-9]+|[A-Za-z]_[A-Za-z0-9]{1,3})(?![\w^])/g,
        (match) => formula(match[0], ctx),
    ));

/** `{ x : N | x > 0 }`, `{1, 2}`: braces holding a separator and no prose words. */
export const setExpressions: Pass = (segments, ctx) => rewriteProse(segments, (text) => {
    const found: Replacement[] = [];
    let k = 0;
    while (k < text.length) {
        const open = text.indexOf('{', k);
        if (open < 0) break;
        const close = closingBracket(text, open, '{', '}');
        if (close < 0) break;

        const candidate = text.slice(open, close + 1);
        const inner = candidate.slice(1, -1);
        const plausible = /[|,:]/.test(inner) && !splitWords(inner).some((w) => isProseWord(w.text));
        const rendered = plausible ? formula(candidate, ctx) : null;
        if (rendered !== null) {
            found.push({ start: open, end: close + 1, segment: math(rendered) });
            k = close + 1;
        } else {
            k = open + 1;
        }
    }
    return found;
});

/** The longest prefix after a quantifier keyword that parses and holds no prose words. */
export const quantifiers: Pass = (segments, ctx) => rewriteProse(segments, (text) => {
    const found: Replacement[] = [];
    let from = 0;
    for (const match of text.matchAll(/(?<![\w\\])(?:forall|exists1|exists|mu)\b|[∀∃μ]/g)) {
        const start = match.index ?? 0;
        if (start < from) continue;

        const words = splitWords(text.slice(start)).map((w) => ({ ...w, start: w.start + start, end: w.end + start }));
        for (let last = words.length - 1; last >= 1; last--) {
            const span = words.slice(0, last + 1);
            if (span.slice(0, -1).some((w) => /[.;!?]/.test(w.trail)) || span.some((w) => isProseWord(w.text))) continue;
            const rendered = formula(text.slice(start, words[last].end), ctx);
            if (rendered !== null) {
                found.push({ start, end: words[last].end, segment: math(rendered) });
                from = words[last].end;
                break;
            }
        }
    }
    return found;
});

const TYPE_ATOM = String.raw`(?:(?:P|F|seq|iseq|bag)\s+)*[A-Z][A-Za-z0-9_]*`;
const TYPE_OP = String.raw`(?:-->>|>->>|\+->>|<->|\+->|>->|->|→|↔|⇸|×|\bcross\b)`;
const DECLARATION = new RegExp(
    String.raw`(?<![\w\\])([a-z][A-Za-z0-9_']*(?:\s*,\s*[a-z][A-Za-z0-9_']*)*)\s*:\s*(${TYPE_ATOM}(?:\s*${TYPE_OP}\s*${TYPE_ATOM})*)`,
    'g',
);

/** `x : N`, `f : A -> B`; names are rendered one by one since a declaration is not an expression. */
export const typeDeclarations: Pass = (segments, ctx) => rewriteProse(segments, (text) =>
    matchFormulas(text, DECLARATION, (match) => {
        const names = match[1].split(/\s*,\s*/);
        if (names.some(isProseWord)) return null;
        const type = formula(match[2], ctx);
        if (type === null) return null;
        const declared = names.map((name) => formatIdentifier(name, ctx.mode)).join(', ');
        return `${declared} ${symbol('binderColon', ctx.mode)} ${type}`;
    }));

/** `f(x)`, `max(a, b)`. */
export const functionApplications: Pass = (segments, ctx) => rewriteProse(segments, (text) =>
    matchFormulas(text, /(?<![\w\\])([A-Za-z][A-Za-z0-9_]*)\(([^()]+)\)/g, (match) =>
        isProseWord(match[1]) ? null : formula(match[0], ctx)));

/** `x = y`, `a elem S`, `n >= 0`, `f +-> g`. */
export const simpleRelations: Pass = (segments, ctx) => renderRuns(segments, ctx, (word) => RELATIONS.has(word));

export const PASSES: readonly Pass[] = [
    manualMarkup,
    citations,
    logicalKeywords,
    parenthesizedGroups,
    scripts,
    setExpressions,
    quantifiers,
    typeDeclarations,
    functionApplications,
    simpleRelations,
];

// ── Entry points ────────────────────────────────────────────

export function smartSegments(text: string, ctx: EmitContext, passes: readonly Pass[] = PASSES): Segment[] {
    const initial: Segment[] = text.length > 0 ? [prose(text)] : [];
    return passes.reduce<Segment[]>((segments, pass) => pass(segments, ctx), initial);
}

export function joinSegments(segments: readonly Segment[]): string {
    return segments.map((segment) => {
        switch (segment.kind) {
            case 'prose': return escapeLatex(segment.text);
            case 'math': return `$${segment.text}$`;
            case 'latex': return segment.text;
        }
    }).join('');
}

export function renderSmartText(text: string, ctx: EmitContext): string {
    return joinSegments(smartSegments(text, ctx));
}
