/**
 * String literal helpers.
 */
import type * as AST from "./ast.js";

const ESCAPES: Record<string, string> = {
  "0": "\0",
  "\\": "\\",
  t: "\t",
  n: "\n",
  r: "\r",
  '"': '"',
  "'": "'",
};

/** True when the literal contains an interpolation such as `\(version)`. */
export function isInterpolated(literal: AST.StringLiteral): boolean {
  return /(^|[^\\])(\\\\)*\\\(/.test(literal.token.text);
}

/**
 * Value of a single-segment string literal. Interpolated literals have no
 * static value and yield undefined.
 */
export function stringValue(expr: AST.Expr): string | undefined {
  if (expr.kind !== "StringLiteral" || isInterpolated(expr)) return undefined;
  const body = expr.token.text.slice(1, -1);
  return body.replace(/\\(u\{([0-9a-fA-F]{1,8})\}|.)/g, (whole: string, esc: string, hex: string | undefined) => {
    if (hex !== undefined) return String.fromCodePoint(parseInt(hex, 16));
    return ESCAPES[esc] ?? whole;
  });
}

/** Source text of a string literal holding `value`. */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
  return `"${escaped}"`;
}
