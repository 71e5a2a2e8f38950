/**
 * Formatting observations used to make inserted nodes look like their
 * siblings: indentation, line breaks and separator spacing.
 */
import type * as AST from "./ast.js";
import { firstToken, tokensOf } from "./printer.js";

export const DEFAULT_INDENT_UNIT = "    ";

/** Indentation after the last line break in `trivia`, or undefined when it has none. */
export function lineIndent(trivia: string): string | undefined {
  const i = trivia.lastIndexOf("\n");
  if (i < 0) return undefined;
  const m = /^[ \t]*/.exec(trivia.slice(i + 1));
  return m ? m[0] : "";
}

/** Leading trivia that starts a fresh line at `indent`, or nothing for inline layouts. */
export function newlineTrivia(indent: string | undefined, lineBreak = "\n"): string {
  return indent === undefined ? "" : `${lineBreak}${indent}`;
}

/** The file's line break: `\r\n` when its first line break is one, else `\n`. */
export function detectLineBreak(node: AST.SyntaxNode): string {
  for (const token of tokensOf(node)) {
    for (const trivia of [token.leadingTrivia, token.trailingTrivia]) {
      const i = trivia.indexOf("\n");
      if (i >= 0) return i > 0 && trivia[i - 1] === "\r" ? "\r\n" : "\n";
    }
  }
  return "\n";
}

/** Indentation of the line a node starts on, if the node starts a line. */
export function nodeIndent(node: AST.SyntaxNode): string | undefined {
  const t = firstToken(node);
  return t ? lineIndent(t.leadingTrivia) : undefined;
}

/**
 * Indentation step of the file, read from the root call's first argument
 * that sits on its own line.
 */
export function detectIndentUnit(rootCall: AST.CallExpression): string {
  for (const arg of rootCall.argumentList.arguments) {
    const indent = nodeIndent(arg);
    if (indent) return indent;
  }
  return DEFAULT_INDENT_UNIT;
}

function withoutTrailing(token: AST.Token): AST.Token {
  return { ...token, trailingTrivia: "" };
}

function withLeading(token: AST.Token, trivia: string): AST.Token {
  return { ...token, leadingTrivia: trivia };
}

/** Copy of `expr` whose first token has `trivia` as its leading trivia. */
export function setLeadingTrivia(expr: AST.Expr, trivia: string): AST.Expr {
  switch (expr.kind) {
    case "Identifier":
      return { ...expr, name: withLeading(expr.name, trivia) };
    case "MemberReference":
      return expr.base
        ? { ...expr, base: setLeadingTrivia(expr.base, trivia) }
        : { ...expr, dot: withLeading(expr.dot, trivia) };
    case "StringLiteral":
    case "NumberLiteral":
    case "BooleanLiteral":
    case "NilLiteral":
      return { ...expr, token: withLeading(expr.token, trivia) };
    case "ArrayLiteral":
      return { ...expr, leftSquare: withLeading(expr.leftSquare, trivia) };
    case "CallExpression":
      return { ...expr, callee: setLeadingTrivia(expr.callee, trivia) };
    case "ParenExpression":
      return { ...expr, leftParen: withLeading(expr.leftParen, trivia) };
    case "BinaryExpression":
      return { ...expr, left: setLeadingTrivia(expr.left, trivia) };
    case "SequenceExpression": {
      const [first, ...rest] = expr.operands;
      return first ? { ...expr, operands: [setLeadingTrivia(first, trivia), ...rest] } : expr;
    }
  }
}

export function isBlank(trivia: string): boolean {
  return /^\s*$/.test(trivia);
}

/**
 * Splits off the trailing trivia of an expression's last token, so a
 * separator can be placed before a same-line comment instead of after it.
 */
export function detachTrailingTrivia(expr: AST.Expr): { expr: AST.Expr; trivia: string } {
  switch (expr.kind) {
    case "Identifier":
      return { expr: { ...expr, name: withoutTrailing(expr.name) }, trivia: expr.name.trailingTrivia };
    case "MemberReference":
      return { expr: { ...expr, name: withoutTrailing(expr.name) }, trivia: expr.name.trailingTrivia };
    case "StringLiteral":
    case "NumberLiteral":
    case "BooleanLiteral":
    case "NilLiteral":
      return { expr: { ...expr, token: withoutTrailing(expr.token) }, trivia: expr.token.trailingTrivia };
    case "ArrayLiteral":
      return {
        expr: { ...expr, rightSquare: withoutTrailing(expr.rightSquare) },
        trivia: expr.rightSquare.trailingTrivia,
      };
    case "CallExpression":
    case "ParenExpression":
      return {
        expr: { ...expr, rightParen: withoutTrailing(expr.rightParen) },
        trivia: expr.rightParen.trailingTrivia,
      };
    case "BinaryExpression": {
      const right = detachTrailingTrivia(expr.right);
      return { expr: { ...expr, right: right.expr }, trivia: right.trivia };
    }
    case "SequenceExpression": {
      const operands = expr.operands.slice();
      const last = operands.pop();
      if (!last) return { expr, trivia: "" };
      const detached = detachTrailingTrivia(last);
      return { expr: { ...expr, operands: [...operands, detached.expr] }, trivia: detached.trivia };
    }
  }
}

/** How a call entry lays out its arguments. */
export interface CallLayout {
  /** Indentation of each argument on its own line; undefined keeps them inline. */
  argumentIndent?: string;
  /** Indentation of a closing parenthesis on its own line; undefined attaches it. */
  closingIndent?: string;
  /** Line break written before indented arguments; `\n` when unset. */
  lineBreak?: string;
}

/** How a new entry sits inside an array literal. */
export interface EntryLayout {
  /** Indentation of the entry on its own line; undefined keeps it inline. */
  elementIndent?: string;
  /** Indentation of the closing bracket once an empty array gets its first entry. */
  closingIndent?: string;
  /** Line break written before indented entries; `\n` when unset. */
  lineBreak?: string;
  call: CallLayout;
}

/** Layout of the array's last element, the sibling a new entry should match. */
export function observeEntryLayout(array: AST.ArrayLiteral, lineBreak = "\n"): EntryLayout | undefined {
  const last = array.elements[array.elements.length - 1];
  if (!last) return undefined;
  const elementIndent = nodeIndent(last);
  const call: CallLayout = { lineBreak };
  if (last.value.kind === "CallExpression") {
    const firstArg = last.value.argumentList.arguments[0];
    if (firstArg) call.argumentIndent = nodeIndent(firstArg);
    call.closingIndent = lineIndent(last.value.rightParen.leadingTrivia);
  }
  return { elementIndent, closingIndent: lineIndent(array.rightSquare.leadingTrivia), lineBreak, call };
}

/**
 * Layout for the first call entry of an empty array: one entry per line,
 * indented one step deeper than the line holding the array.
 */
export function defaultEntryLayout(
  baseIndent: string,
  unit: string,
  multilineCall: boolean,
  lineBreak = "\n"
): EntryLayout {
  const elementIndent = baseIndent + unit;
  return {
    elementIndent,
    closingIndent: baseIndent,
    lineBreak,
    call: multilineCall ? { argumentIndent: elementIndent + unit, lineBreak } : { lineBreak },
  };
}
