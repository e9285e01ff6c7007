// ─────────────────────────────────────────────────────────────
// zscribe  ·  Token Vocabulary
// Closed set of token types and the spellings that produce them
// ─────────────────────────────────────────────────────────────

export type TokenType =
    // Line directives
    | 'SECTION' | 'SOLUTION' | 'PART_LABEL'
    | 'TEXT' | 'PURETEXT' | 'LATEX' | 'METADATA'
    | 'PAGEBREAK' | 'CONTENTS' | 'PROOF' | 'EQUIV' | 'TRUTH_TABLE' | 'INFRULE' | 'RULE_LINE'
    // Literals
    | 'IDENTIFIER' | 'NUMBER'
    // Paragraph keywords
    | 'GIVEN' | 'AXDEF' | 'SCHEMA' | 'GENDEF' | 'ZED' | 'WHERE' | 'END'
    | 'IF' | 'THEN' | 'ELSE'
    // Binders
    | 'FORALL' | 'EXISTS' | 'EXISTS1' | 'MU' | 'LAMBDA'
    // Propositional
    | 'AND' | 'OR' | 'NOT' | 'IMPLIES' | 'IFF'
    // Comparison and membership
    | 'EQUALS' | 'NOT_EQUAL' | 'LESS_THAN' | 'GREATER_THAN' | 'LESS_EQUAL' | 'GREATER_EQUAL'
    | 'IN' | 'NOTIN' | 'SUBSETEQ' | 'SUBSET'
    // Sets
    | 'UNION' | 'INTERSECT' | 'SETMINUS' | 'CROSS'
    | 'POWER' | 'POWER1' | 'FINSET' | 'FINSET1' | 'BIGCUP' | 'BIGCAP' | 'HASH'
    // Relations
    | 'RELATION' | 'MAPLET' | 'DRES' | 'RRES' | 'NDRES' | 'NRRES'
    | 'SEMI_COMP' | 'CIRC' | 'OVERRIDE' | 'DOM' | 'RAN' | 'INV' | 'ID'
    | 'TILDE' | 'TCLOSURE' | 'RTCLOSURE'
    // Functions
    | 'TFUN' | 'PFUN' | 'TINJ' | 'PINJ' | 'TSURJ' | 'PSURJ' | 'BIJECTION' | 'FINFUN'
    // Sequences and bags
    | 'LANGLE' | 'RANGLE' | 'CAT' | 'FILTER' | 'CARET'
    | 'LBAG' | 'RBAG' | 'BAG_UNION'
    | 'LIMG' | 'RIMG'
    // Arithmetic
    | 'PLUS' | 'MINUS' | 'STAR' | 'DIV' | 'MOD' | 'RANGE'
    // Punctuation
    | 'LPAREN' | 'RPAREN' | 'LBRACKET' | 'RBRACKET' | 'LBRACE' | 'RBRACE'
    | 'COMMA' | 'COLON' | 'SEMICOLON' | 'PIPE' | 'PERIOD' | 'BULLET'
    | 'UNDERSCORE' | 'DOUBLE_COLON' | 'FREE_TYPE' | 'ABBREV'
    // Layout
    | 'JUSTIFICATION' | 'CONTINUATION'
    | 'NEWLINE' | 'EOF';

export interface Token {
    readonly type: TokenType;
    /** Raw lexeme exactly as written. */
    readonly value: string;
    readonly line: number;
    readonly column: number;
    readonly spaceBefore: boolean;
}

// ── Word spellings ──────────────────────────────────────────

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ['and', 'AND'], ['land', 'AND'],
    ['or', 'OR'], ['lor', 'OR'],
    ['not', 'NOT'], ['lnot', 'NOT'],
    ['implies', 'IMPLIES'], ['iff', 'IFF'],
    ['elem', 'IN'], ['in', 'IN'], ['notin', 'NOTIN'],
    ['subset', 'SUBSETEQ'], ['subseteq', 'SUBSETEQ'], ['psubset', 'SUBSET'],
    ['union', 'UNION'], ['intersect', 'INTERSECT'], ['cross', 'CROSS'],
    ['P', 'POWER'], ['P1', 'POWER1'], ['F', 'FINSET'], ['F1', 'FINSET1'],
    ['bigcup', 'BIGCUP'], ['bigcap', 'BIGCAP'],
    ['dom', 'DOM'], ['ran', 'RAN'], ['inv', 'INV'], ['id', 'ID'],
    ['o9', 'SEMI_COMP'], ['comp', 'CIRC'], ['filter', 'FILTER'],
    ['div', 'DIV'], ['mod', 'MOD'],
    ['forall', 'FORALL'], ['exists', 'EXISTS'], ['exists1', 'EXISTS1'],
    ['mu', 'MU'], ['lambda', 'LAMBDA'],
    ['if', 'IF'], ['then', 'THEN'], ['else', 'ELSE'],
    ['given', 'GIVEN'], ['axdef', 'AXDEF'], ['schema', 'SCHEMA'], ['gendef', 'GENDEF'],
    ['zed', 'ZED'], ['where', 'WHERE'], ['end', 'END'],
]);

// ── Symbol spellings ────────────────────────────────────────
// Longest spelling first; the lexer takes the first entry that matches.

export const SYMBOLS: readonly (readonly [string, TokenType])[] = [
    ['-->>', 'TSURJ'], ['+->>', 'PSURJ'], ['>->>', 'BIJECTION'], ['77->', 'FINFUN'],
    ['<=>', 'IFF'], ['<->', 'RELATION'], ['|->', 'MAPLET'], ['<<|', 'NDRES'], ['|>>', 'NRRES'],
    ['+->', 'PFUN'], ['>->', 'TINJ'], ['>+>', 'PINJ'], ['-|>', 'PINJ'], ['::=', 'FREE_TYPE'], ['(+)', 'BAG_UNION'],
    ['=>', 'IMPLIES'], ['<=', 'LESS_EQUAL'], ['>=', 'GREATER_EQUAL'],
    ['!=', 'NOT_EQUAL'], ['/=', 'NOT_EQUAL'],
    ['<|', 'DRES'], ['|>', 'RRES'], ['->', 'TFUN'], ['++', 'OVERRIDE'], ['..', 'RANGE'],
    ['::', 'DOUBLE_COLON'], ['==', 'ABBREV'], ['[[', 'LBAG'], [']]', 'RBAG'],
    ['(|', 'LIMG'], ['|)', 'RIMG'],
    ['<', 'LESS_THAN'], ['>', 'GREATER_THAN'], ['=', 'EQUALS'],
    ['+', 'PLUS'], ['-', 'MINUS'], ['*', 'STAR'], ['#', 'HASH'], ['\\', 'SETMINUS'],
    ['~', 'TILDE'], ['(', 'LPAREN'], [')', 'RPAREN'], ['[', 'LBRACKET'], [']', 'RBRACKET'],
    ['{', 'LBRACE'], ['}', 'RBRACE'], [',', 'COMMA'], [':', 'COLON'], [';', 'SEMICOLON'],
    ['|', 'PIPE'], ['.', 'PERIOD'], ['@', 'BULLET'], ['_', 'UNDERSCORE'],
];

/** Unicode spellings; each maps to the same type as its ASCII counterpart. */
export const GLYPHS: readonly (readonly [string, TokenType])[] = [
    ['∃₁', 'EXISTS1'], ['ℙ₁', 'POWER1'], ['𝔽₁', 'FINSET1'],
    ['∧', 'AND'], ['∨', 'OR'], ['¬', 'NOT'], ['⇒', 'IMPLIES'], ['⇔', 'IFF'],
    ['∀', 'FORALL'], ['∃', 'EXISTS'], ['μ', 'MU'], ['λ', 'LAMBDA'],
    ['≠', 'NOT_EQUAL'], ['≤', 'LESS_EQUAL'], ['≥', 'GREATER_EQUAL'],
    ['∈', 'IN'], ['∉', 'NOTIN'], ['⊆', 'SUBSETEQ'], ['⊂', 'SUBSET'],
    ['∪', 'UNION'], ['∩', 'INTERSECT'], ['∖', 'SETMINUS'], ['×', 'CROSS'],
    ['ℙ', 'POWER'], ['𝔽', 'FINSET'], ['⋃', 'BIGCUP'], ['⋂', 'BIGCAP'],
    ['↔', 'RELATION'], ['↦', 'MAPLET'], ['◁', 'DRES'], ['▷', 'RRES'], ['⩤', 'NDRES'], ['⩥', 'NRRES'],
    ['⨾', 'SEMI_COMP'], ['∘', 'CIRC'], ['⊕', 'OVERRIDE'], ['∼', 'TILDE'],
    ['⁺', 'TCLOSURE'], ['⋆', 'RTCLOSURE'],
    ['→', 'TFUN'], ['⇸', 'PFUN'], ['↣', 'TINJ'], ['⤔', 'PINJ'], ['↠', 'TSURJ'], ['⤀', 'PSURJ'],
    ['⤖', 'BIJECTION'], ['⇻', 'FINFUN'],
    ['⟨', 'LANGLE'], ['⟩', 'RANGLE'], ['⁀', 'CAT'], ['↾', 'FILTER'],
    ['⟦', 'LBAG'], ['⟧', 'RBAG'], ['⊎', 'BAG_UNION'], ['⦇', 'LIMG'], ['⦈', 'RIMG'],
    ['−', 'MINUS'], ['∗', 'STAR'], ['÷', 'DIV'], ['‥', 'RANGE'],
    ['•', 'BULLET'], ['∷', 'DOUBLE_COLON'], ['⩴', 'FREE_TYPE'], ['≙', 'ABBREV'],
];

/** Characters that start a glyph and therefore end an identifier. */
export const GLYPH_STARTS: ReadonlySet<string> = new Set(GLYPHS.map(([spelling]) => Array.from(spelling)[0]));

// ── Directives ──────────────────────────────────────────────

/** Directives whose payload is the rest of the line. */
export const LINE_DIRECTIVES: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ['TEXT', 'TEXT'], ['PURETEXT', 'PURETEXT'], ['LATEX', 'LATEX'],
    ['TITLE', 'METADATA'], ['SUBTITLE', 'METADATA'], ['AUTHOR', 'METADATA'],
    ['DATE', 'METADATA'], ['INSTITUTION', 'METADATA'],
]);

/** Directives that stand alone; any text after them is lexed normally. */
export const BLOCK_DIRECTIVES: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ['PAGEBREAK', 'PAGEBREAK'], ['CONTENTS', 'CONTENTS'], ['PROOF', 'PROOF'],
    ['EQUIV', 'EQUIV'], ['ARGUE', 'EQUIV'], ['TRUTH TABLE', 'TRUTH_TABLE'], ['INFRULE', 'INFRULE'],
]);

/** Blocks whose lines may end in a bracketed justification. */
export const JUSTIFIED_BLOCKS: ReadonlySet<TokenType> = new Set<TokenType>(['PROOF', 'EQUIV', 'INFRULE']);

// ── Token classes ───────────────────────────────────────────

/** Tokens after which a `<` reads as a comparison rather than a sequence opener. */
export const OPERAND_END: ReadonlySet<TokenType> = new Set<TokenType>([
    'IDENTIFIER', 'NUMBER', 'RPAREN', 'RBRACKET', 'RBRACE', 'RANGLE', 'RBAG', 'RIMG',
    'TILDE', 'TCLOSURE', 'RTCLOSURE',
]);

/** Payload of a directive token: the text after its `KEYWORD:` prefix. */
export function directivePayload(token: Token): string {
    const colon = token.value.indexOf(':');
    return colon < 0 ? '' : token.value.slice(colon + 1).trim();
}

/** Text of a `[...]` justification, as written apart from surrounding spaces. */
export function justificationText(token: Token): string {
    return token.value.slice(1, -1).trim();
}

/** Key of a metadata directive, e.g. `TITLE`. */
export function directiveKey(token: Token): string {
    const colon = token.value.indexOf(':');
    return colon < 0 ? token.value.trim() : token.value.slice(0, colon).trim();
}
