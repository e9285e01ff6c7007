// ─────────────────────────────────────────────────────────────
// zscribe  ·  Document AST
// Closed, immutable tree; every node carries its source position
// ─────────────────────────────────────────────────────────────

export interface Position {
    readonly line: number;
    readonly column: number;
}

export const NO_POSITION: Position = { line: 0, column: 0 };

// ── Expressions ─────────────────────────────────────────────

export type Expr =
    | Identifier
    | Numeral
    | UnaryOp
    | PostfixOp
    | BinaryOp
    | Quantifier
    | Mu
    | Lambda
    | Conditional
    | SetLiteral
    | SequenceLiteral
    | BagLiteral
    | Comprehension
    | Tuple
    | TupleProjection
    | FunctionApp
    | GenericInstantiation
    | RelationalImage
    | Range
    | Subscript
    | Superscript;

export type UnaryOperator =
    | 'not' | 'neg' | 'card' | 'dom' | 'ran' | 'inv' | 'id'
    | 'power' | 'power1' | 'finset' | 'finset1' | 'bigcup' | 'bigcap';

export type PostfixOperator = 'inverse' | 'tclosure' | 'rtclosure';

export type BinaryOperator =
    // propositional
    | 'iff' | 'implies' | 'or' | 'and'
    // predicates
    | 'eq' | 'neq' | 'lt' | 'le' | 'gt' | 'ge' | 'in' | 'notin' | 'subseteq' | 'subset'
    // relation and function types
    | 'rel' | 'tfun' | 'pfun' | 'tinj' | 'pinj' | 'tsurj' | 'psurj' | 'bij' | 'ffun'
    // expressions
    | 'cross' | 'maplet'
    | 'plus' | 'minus' | 'union' | 'setminus' | 'cat' | 'bagUnion'
    | 'times' | 'div' | 'mod' | 'intersect' | 'filter' | 'semi' | 'circ'
    | 'override'
    | 'dres' | 'rres' | 'ndres' | 'nrres';

export type QuantifierKind = 'forall' | 'exists' | 'exists1';

export interface Identifier extends Position {
    readonly tag: 'Identifier';
    readonly name: string;
}

export interface Numeral extends Position {
    readonly tag: 'Numeral';
    readonly value: string;
}

export interface UnaryOp extends Position {
    readonly tag: 'UnaryOp';
    readonly op: UnaryOperator;
    readonly operand: Expr;
}

export interface PostfixOp extends Position {
    readonly tag: 'PostfixOp';
    readonly op: PostfixOperator;
    readonly operand: Expr;
}

export interface BinaryOp extends Position {
    readonly tag: 'BinaryOp';
    readonly op: BinaryOperator;
    readonly left: Expr;
    readonly right: Expr;
    /** The source broke the line after the operator with a trailing `\`. */
    readonly lineBreak?: boolean;
}

/** `x, y : T` inside a binder list; groups are separated by `;`. */
export interface BinderGroup extends Position {
    readonly names: readonly string[];
    readonly domain: Expr | null;
}

/** `forall x : T | C . P`; the constraint is present only when both separators are. */
export interface Quantifier extends Position {
    readonly tag: 'Quantifier';
    readonly quantifier: QuantifierKind;
    readonly binders: readonly BinderGroup[];
    readonly constraint: Expr | null;
    readonly predicate: Expr;
}

/** Definite description; a missing yield means the bound variable itself. */
export interface Mu extends Position {
    readonly tag: 'Mu';
    readonly binders: readonly BinderGroup[];
    readonly predicate: Expr | null;
    readonly yield: Expr | null;
}

export interface Lambda extends Position {
    readonly tag: 'Lambda';
    readonly binders: readonly BinderGroup[];
    readonly body: Expr;
}

export interface Conditional extends Position {
    readonly tag: 'Conditional';
    readonly condition: Expr;
    readonly thenBranch: Expr;
    readonly elseBranch: Expr;
}

export interface SetLiteral extends Position {
    readonly tag: 'SetLiteral';
    readonly elements: readonly Expr[];
}

export interface SequenceLiteral extends Position {
    readonly tag: 'SequenceLiteral';
    readonly elements: readonly Expr[];
}

export interface BagLiteral extends Position {
    readonly tag: 'BagLiteral';
    readonly elements: readonly Expr[];
}

export interface Comprehension extends Position {
    readonly tag: 'Comprehension';
    readonly collection: 'set' | 'sequence' | 'bag';
    readonly binders: readonly BinderGroup[];
    readonly predicate: Expr | null;
    readonly yield: Expr | null;
}

export interface Tuple extends Position {
    readonly tag: 'Tuple';
    readonly elements: readonly Expr[];
}

/** `e.1` or `e.name` */
export interface TupleProjection extends Position {
    readonly tag: 'TupleProjection';
    readonly base: Expr;
    readonly field: string;
}

export interface FunctionApp extends Position {
    readonly tag: 'FunctionApp';
    readonly func: Expr;
    readonly args: readonly Expr[];
    /** `f(x, y)` is a call; `f x` is juxtaposition with exactly one argument. */
    readonly style: 'call' | 'juxtaposed';
}

export interface GenericInstantiation extends Position {
    readonly tag: 'GenericInstantiation';
    readonly base: Expr;
    readonly params: readonly Expr[];
}

export interface RelationalImage extends Position {
    readonly tag: 'RelationalImage';
    readonly relation: Expr;
    readonly set: Expr;
}

export interface Range extends Position {
    readonly tag: 'Range';
    readonly start: Expr;
    readonly end: Expr;
}

export interface Subscript extends Position {
    readonly tag: 'Subscript';
    readonly base: Expr;
    readonly index: Expr;
}

/** `R^n`: relational iteration or power. */
export interface Superscript extends Position {
    readonly tag: 'Superscript';
    readonly base: Expr;
    readonly exponent: Expr;
}

// ── Z paragraphs ────────────────────────────────────────────

export interface Declaration extends Position {
    readonly names: readonly string[];
    readonly type: Expr;
}

export interface GivenType extends Position {
    readonly tag: 'GivenType';
    readonly names: readonly string[];
}

export interface FreeBranch extends Position {
    readonly name: string;
    /** Components of the constructor's argument; empty for a constant. */
    readonly payload: readonly Expr[];
}

export interface FreeType extends Position {
    readonly tag: 'FreeType';
    readonly name: string;
    readonly params: readonly string[];
    readonly branches: readonly FreeBranch[];
}

export interface Abbreviation extends Position {
    readonly tag: 'Abbreviation';
    readonly name: string;
    readonly params: readonly string[];
    readonly expression: Expr;
}

/** Predicates of a box, grouped where the source leaves a blank line. */
export type PredicateGroups = readonly (readonly Expr[])[];

export interface AxDef extends Position {
    readonly tag: 'AxDef';
    readonly declarations: readonly Declaration[];
    readonly predicates: PredicateGroups;
}

export interface Schema extends Position {
    readonly tag: 'Schema';
    /** Null for an anonymous schema. */
    readonly name: string | null;
    readonly params: readonly string[];
    readonly declarations: readonly Declaration[];
    readonly predicates: PredicateGroups;
}

export interface GenDef extends Position {
    readonly tag: 'GenDef';
    readonly params: readonly string[];
    readonly declarations: readonly Declaration[];
    readonly predicates: PredicateGroups;
}

export interface ExpressionItem extends Position {
    readonly tag: 'ExpressionItem';
    readonly expression: Expr;
}

export type ZedEntry = ExpressionItem | GivenType | FreeType | Abbreviation;

export interface ZedBlock extends Position {
    readonly tag: 'ZedBlock';
    readonly entries: readonly ZedEntry[];
}

// ── Prose and tables ────────────────────────────────────────

/** `PURETEXT:` escapes, `LATEX:` passes through, `TEXT:` detects formulas. */
export type TextMode = 'escaped' | 'raw' | 'smart';

export interface TextBlock extends Position {
    readonly tag: 'TextBlock';
    readonly mode: TextMode;
    readonly text: string;
}

export type TruthValue = 'T' | 'F';

export interface TruthTable extends Position {
    readonly tag: 'TruthTable';
    readonly headers: readonly Expr[];
    readonly rows: readonly (readonly TruthValue[])[];
}

export interface EquivStep extends Position {
    /** Null on the first step. */
    readonly relation: 'iff' | 'implies' | null;
    readonly expression: Expr;
    readonly justification: string | null;
}

export interface EquivChain extends Position {
    readonly tag: 'EquivChain';
    readonly steps: readonly EquivStep[];
}

export interface RuleLine extends Position {
    readonly expression: Expr;
    readonly label: string | null;
}

/** Premises above a rule line, one conclusion below it. */
export interface InfruleBlock extends Position {
    readonly tag: 'InfruleBlock';
    readonly premises: readonly RuleLine[];
    readonly conclusion: RuleLine;
}

// ── Proofs ──────────────────────────────────────────────────

export interface ProofNode extends Position {
    readonly tag: 'ProofNode';
    /** Preorder index within the tree. */
    readonly id: number;
    readonly expression: Expr;
    readonly justification: string | null;
    readonly label: number | null;
    readonly assumption: boolean;
    /** Written with the `::` marker. */
    readonly sibling: boolean;
    /** Conclusion created for a case analysis written at the root. */
    readonly synthetic: boolean;
    readonly children: readonly ProofChild[];
}

export interface CaseBranch extends Position {
    readonly caseExpr: Expr;
    readonly steps: readonly ProofNode[];
}

export interface CaseAnalysis extends Position {
    readonly tag: 'CaseAnalysis';
    readonly branches: readonly CaseBranch[];
}

export type ProofChild = ProofNode | CaseAnalysis;

export type LabelIssueReason = 'undefined' | 'out-of-scope' | 'duplicate';

export interface LabelIssue extends Position {
    readonly label: number;
    readonly reason: LabelIssueReason;
    readonly nodeId: number;
}

export interface ProofTree extends Position {
    readonly tag: 'ProofTree';
    readonly root: ProofNode;
    /** Label → id of the node that introduced it. */
    readonly labels: ReadonlyMap<number, number>;
    readonly issues: readonly LabelIssue[];
}

// ── Document structure ──────────────────────────────────────

export interface Section extends Position {
    readonly tag: 'Section';
    readonly title: string;
    readonly items: readonly DocumentItem[];
}

export interface Solution extends Position {
    readonly tag: 'Solution';
    readonly label: string;
    readonly items: readonly DocumentItem[];
}

export interface Part extends Position {
    readonly tag: 'Part';
    readonly label: string;
    readonly items: readonly DocumentItem[];
}

export interface PageBreak extends Position {
    readonly tag: 'PageBreak';
}

export interface Contents extends Position {
    readonly tag: 'Contents';
}

export type DocumentItem =
    | Section
    | Solution
    | Part
    | GivenType
    | FreeType
    | Abbreviation
    | AxDef
    | Schema
    | GenDef
    | ZedBlock
    | TextBlock
    | TruthTable
    | EquivChain
    | InfruleBlock
    | ProofTree
    | PageBreak
    | Contents
    | ExpressionItem;

export interface TitleMetadata {
    readonly title: string | null;
    readonly subtitle: string | null;
    readonly author: string | null;
    readonly date: string | null;
    readonly institution: string | null;
}

export interface Document {
    readonly metadata: TitleMetadata | null;
    readonly items: readonly DocumentItem[];
}

// ── Builders ────────────────────────────────────────────────

export const mk = {
    ident: (name: string, at: Position = NO_POSITION): Identifier =>
        ({ tag: 'Identifier', name, line: at.line, column: at.column }),
    num: (value: string | number, at: Position = NO_POSITION): Numeral =>
        ({ tag: 'Numeral', value: String(value), line: at.line, column: at.column }),
    unary: (op: UnaryOperator, operand: Expr, at: Position = NO_POSITION): UnaryOp =>
        ({ tag: 'UnaryOp', op, operand, line: at.line, column: at.column }),
    postfix: (op: PostfixOperator, operand: Expr, at: Position = NO_POSITION): PostfixOp =>
        ({ tag: 'PostfixOp', op, operand, line: at.line, column: at.column }),
    binary: (op: BinaryOperator, left: Expr, right: Expr, at: Position = NO_POSITION): BinaryOp =>
        ({ tag: 'BinaryOp', op, left, right, line: at.line, column: at.column }),
    binder: (names: readonly string[], domain: Expr | null, at: Position = NO_POSITION): BinderGroup =>
        ({ names, domain, line: at.line, column: at.column }),
    app: (func: Expr, args: readonly Expr[], style: FunctionApp['style'], at: Position = NO_POSITION): FunctionApp =>
        ({ tag: 'FunctionApp', func, args, style, line: at.line, column: at.column }),
};

/** Position of a token or node, detached from the rest of its fields. */
export function positionOf(at: Position): Position {
    return { line: at.line, column: at.column };
}
