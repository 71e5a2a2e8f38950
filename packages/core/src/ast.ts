/**
 * Manifest syntax tree node definitions.
 *
 * The tree is lossless: every token keeps the trivia (whitespace, newlines,
 * comments) around it, so printing an untouched tree reproduces the source
 * byte for byte. Nodes are immutable; edits build new nodes and share the
 * untouched subtrees.
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

export type TokenType =
  | "Ident"
  | "Let"
  | "Var"
  | "Import"
  | "True"
  | "False"
  | "Nil"
  | "StringLit"
  | "NumberLit"
  | "LParen"
  | "RParen"
  | "LBracket"
  | "RBracket"
  | "Comma"
  | "Colon"
  | "Semicolon"
  | "Dot"
  | "Question"
  | "Equals"
  | "Operator"
  | "EndOfFile";

export interface Token {
  readonly kind: "Token";
  readonly type: TokenType;
  readonly text: string;
  /** Trivia before the token, starting after the previous token's trailing trivia. */
  readonly leadingTrivia: string;
  /** Trivia after the token up to, not including, the next newline. */
  readonly trailingTrivia: string;
  /** Present on parsed tokens only. */
  readonly span?: Span;
}

// --- Expressions ---

export interface Identifier {
  readonly kind: "Identifier";
  readonly name: Token;
}

/** `.name` (implicit member) or `base.name`. */
export interface MemberReference {
  readonly kind: "MemberReference";
  readonly base?: Expr;
  readonly dot: Token;
  readonly name: Token;
}

export interface StringLiteral {
  readonly kind: "StringLiteral";
  readonly token: Token;
}

export interface NumberLiteral {
  readonly kind: "NumberLiteral";
  readonly token: Token;
}

export interface BooleanLiteral {
  readonly kind: "BooleanLiteral";
  readonly token: Token;
}

export interface NilLiteral {
  readonly kind: "NilLiteral";
  readonly token: Token;
}

export interface ArrayElement {
  readonly kind: "ArrayElement";
  readonly value: Expr;
  readonly trailingComma?: Token;
}

export interface ArrayLiteral {
  readonly kind: "ArrayLiteral";
  readonly leftSquare: Token;
  readonly elements: readonly ArrayElement[];
  readonly rightSquare: Token;
}

export interface Argument {
  readonly kind: "Argument";
  readonly label?: Token;
  readonly colon?: Token;
  readonly value: Expr;
  readonly trailingComma?: Token;
}

export interface ArgumentList {
  readonly kind: "ArgumentList";
  readonly arguments: readonly Argument[];
}

export interface CallExpression {
  readonly kind: "CallExpression";
  readonly callee: Expr;
  readonly leftParen: Token;
  readonly argumentList: ArgumentList;
  readonly rightParen: Token;
}

/** A single infix operator application, e.g. `"1.0.0"..<"2.0.0"`. */
export interface BinaryExpression {
  readonly kind: "BinaryExpression";
  readonly left: Expr;
  readonly operator: Token;
  readonly right: Expr;
}

/**
 * A chain of two or more infix operators, kept flat and unfolded,
 * e.g. `common + platformTargets + [ ... ]`.
 */
export interface SequenceExpression {
  readonly kind: "SequenceExpression";
  readonly operands: readonly Expr[];
  readonly operators: readonly Token[];
}

export interface ParenExpression {
  readonly kind: "ParenExpression";
  readonly leftParen: Token;
  readonly expression: Expr;
  readonly rightParen: Token;
}

export type Expr =
  | Identifier
  | MemberReference
  | StringLiteral
  | NumberLiteral
  | BooleanLiteral
  | NilLiteral
  | ArrayLiteral
  | CallExpression
  | BinaryExpression
  | SequenceExpression
  | ParenExpression;

// --- Statements ---

export interface TypeAnnotation {
  readonly kind: "TypeAnnotation";
  readonly colon: Token;
  /** The type is not interpreted, only preserved. */
  readonly tokens: readonly Token[];
}

export interface ImportDecl {
  readonly kind: "ImportDecl";
  readonly importKeyword: Token;
  readonly path: readonly Token[];
  readonly semicolon?: Token;
}

export interface VariableDecl {
  readonly kind: "VariableDecl";
  readonly keyword: Token;
  readonly name: Token;
  readonly typeAnnotation?: TypeAnnotation;
  readonly equals: Token;
  readonly value: Expr;
  readonly semicolon?: Token;
}

export interface ExpressionStmt {
  readonly kind: "ExpressionStmt";
  readonly expression: Expr;
  readonly semicolon?: Token;
}

export type Stmt = ImportDecl | VariableDecl | ExpressionStmt;

export interface SourceFile {
  readonly kind: "SourceFile";
  readonly statements: readonly Stmt[];
  /** Empty token whose leading trivia is everything after the last statement. */
  readonly endOfFile: Token;
}

export type SyntaxNode =
  | SourceFile
  | Stmt
  | TypeAnnotation
  | Expr
  | ArgumentList
  | Argument
  | ArrayElement;

const EXPR_KINDS: ReadonlySet<string> = new Set([
  "Identifier",
  "MemberReference",
  "StringLiteral",
  "NumberLiteral",
  "BooleanLiteral",
  "NilLiteral",
  "ArrayLiteral",
  "CallExpression",
  "BinaryExpression",
  "SequenceExpression",
  "ParenExpression",
]);

export function isExpr(node: SyntaxNode): node is Expr {
  return EXPR_KINDS.has(node.kind);
}

export function isStmt(node: SyntaxNode): node is Stmt {
  return node.kind === "ImportDecl" || node.kind === "VariableDecl" || node.kind === "ExpressionStmt";
}

/** A token built by an edit rather than read from source. */
export function makeToken(type: TokenType, text: string, leadingTrivia = "", trailingTrivia = ""): Token {
  return { kind: "Token", type, text, leadingTrivia, trailingTrivia };
}
