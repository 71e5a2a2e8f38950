/**
 * Static evaluation of manifest expressions: literals, `let` bindings,
 * concatenation with `+`, ranges, and calls kept as data.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { tokenSpan } from "./diagnostics.js";
import { firstToken } from "./printer.js";
import { stringValue } from "./strings.js";

// --- Value types ---
export type ManifestValue =
  | { kind: "string"; value: string; span?: Span }
  | { kind: "interpolated"; text: string; span?: Span }
  | { kind: "number"; value: number; span?: Span }
  | { kind: "bool"; value: boolean; span?: Span }
  | { kind: "nil"; span?: Span }
  | { kind: "array"; items: ManifestValue[]; span?: Span }
  | { kind: "call"; name: string; args: CallArgument[]; span?: Span }
  | { kind: "member"; name: string; span?: Span }
  | { kind: "range"; lower: ManifestValue; upper: ManifestValue; closed: boolean; span?: Span }
  | { kind: "opaque"; text: string; span?: Span };

export type CallValue = Extract<ManifestValue, { kind: "call" }>;

export interface CallArgument {
  label?: string;
  value: ManifestValue;
}

// --- Load error ---
export class ManifestLoadError extends Error {
  code: string;
  span?: Span;

  constructor(code: string, message: string, span?: Span) {
    super(message);
    this.name = "ManifestLoadError";
    this.code = code;
    this.span = span;
  }
}

// --- Environment ---
export class Env {
  private bindings = new Map<string, ManifestValue>();

  set(name: string, value: ManifestValue): void {
    this.bindings.set(name, value);
  }

  get(name: string): ManifestValue | undefined {
    return this.bindings.get(name);
  }
}

function spanOf(expr: AST.SyntaxNode): Span | undefined {
  return tokenSpan(firstToken(expr));
}

/** Source-like rendering of an expression, for opaque values and messages. */
export function describeExpr(expr: AST.Expr): string {
  switch (expr.kind) {
    case "Identifier":
      return expr.name.text;
    case "MemberReference":
      return `${expr.base ? describeExpr(expr.base) : ""}.${expr.name.text}`;
    case "StringLiteral":
    case "NumberLiteral":
    case "BooleanLiteral":
    case "NilLiteral":
      return expr.token.text;
    case "ArrayLiteral":
      return "[...]";
    case "CallExpression":
      return `${describeExpr(expr.callee)}(...)`;
    case "BinaryExpression":
      return `${describeExpr(expr.left)} ${expr.operator.text} ${describeExpr(expr.right)}`;
    case "SequenceExpression":
      return expr.operands.map(describeExpr).join(" ... ");
    case "ParenExpression":
      return `(${describeExpr(expr.expression)})`;
  }
}

function concat(left: ManifestValue, right: ManifestValue, span?: Span): ManifestValue {
  if (left.kind === "array" && right.kind === "array") {
    return { kind: "array", items: [...left.items, ...right.items], span };
  }
  if (left.kind === "string" && right.kind === "string") {
    return { kind: "string", value: left.value + right.value, span };
  }
  return { kind: "opaque", text: "<concatenation>", span };
}

function applyOperator(op: string, left: ManifestValue, right: ManifestValue, span?: Span): ManifestValue {
  switch (op) {
    case "+":
      return concat(left, right, span);
    case "..<":
      return { kind: "range", lower: left, upper: right, closed: false, span };
    case "...":
      return { kind: "range", lower: left, upper: right, closed: true, span };
    default:
      return { kind: "opaque", text: `<${op}>`, span };
  }
}

/** Name a call is known by: `Package`, `target` for `.target(...)`, `package` for `Package.Dependency.package(...)`. */
function calleeName(callee: AST.Expr): string {
  switch (callee.kind) {
    case "Identifier":
      return callee.name.text;
    case "MemberReference":
      return callee.name.text;
    default:
      return describeExpr(callee);
  }
}

export function evalExpr(expr: AST.Expr, env: Env): ManifestValue {
  const span = spanOf(expr);
  switch (expr.kind) {
    case "StringLiteral": {
      const value = stringValue(expr);
      if (value === undefined) {
        return { kind: "interpolated", text: expr.token.text, span };
      }
      return { kind: "string", value, span };
    }
    case "NumberLiteral":
      return { kind: "number", value: Number(expr.token.text.replace(/_/g, "")), span };
    case "BooleanLiteral":
      return { kind: "bool", value: expr.token.text === "true", span };
    case "NilLiteral":
      return { kind: "nil", span };
    case "Identifier":
      return env.get(expr.name.text) ?? { kind: "opaque", text: expr.name.text, span };
    case "MemberReference":
      return expr.base
        ? { kind: "opaque", text: describeExpr(expr), span }
        : { kind: "member", name: expr.name.text, span };
    case "ArrayLiteral":
      return { kind: "array", items: expr.elements.map((e) => evalExpr(e.value, env)), span };
    case "CallExpression":
      return {
        kind: "call",
        name: calleeName(expr.callee),
        args: expr.argumentList.arguments.map((a) => ({
          ...(a.label ? { label: a.label.text } : {}),
          value: evalExpr(a.value, env),
        })),
        span,
      };
    case "BinaryExpression":
      return applyOperator(expr.operator.text, evalExpr(expr.left, env), evalExpr(expr.right, env), span);
    case "SequenceExpression": {
      // Only left-associative chains of one operator fold; mixed chains stay opaque.
      const ops = new Set(expr.operators.map((o) => o.text));
      const [first, ...rest] = expr.operands.map((o) => evalExpr(o, env));
      if (!first || ops.size !== 1 || !ops.has("+")) {
        return { kind: "opaque", text: describeExpr(expr), span };
      }
      return rest.reduce((acc, v) => concat(acc, v, span), first);
    }
    case "ParenExpression":
      return evalExpr(expr.expression, env);
  }
}

/**
 * Binds each top-level `let`/`var` in order, so later declarations see
 * earlier ones.
 */
export function bindDeclarations(tree: AST.SourceFile, env: Env = new Env()): Env {
  for (const stmt of tree.statements) {
    if (stmt.kind === "VariableDecl") {
      env.set(stmt.name.text, evalExpr(stmt.value, env));
    }
  }
  return env;
}

// --- Accessors ---

export function argument(call: { args: CallArgument[] }, label: string): ManifestValue | undefined {
  return call.args.find((a) => a.label === label)?.value;
}

export function positional(call: { args: CallArgument[] }): ManifestValue[] {
  return call.args.filter((a) => a.label === undefined).map((a) => a.value);
}

export function expectString(value: ManifestValue, what: string): string {
  if (value.kind === "string") return value.value;
  if (value.kind === "interpolated") {
    throw new ManifestLoadError(
      "E_MANIFEST_INTERPOLATION",
      `${what} uses string interpolation, which cannot be evaluated statically`,
      value.span
    );
  }
  throw new ManifestLoadError("E_MANIFEST_TYPE", `${what} must be a string literal`, value.span);
}

export function expectArray(value: ManifestValue, what: string): ManifestValue[] {
  if (value.kind === "array") return value.items;
  throw new ManifestLoadError("E_MANIFEST_TYPE", `${what} must be an array`, value.span);
}

export function expectCall(value: ManifestValue, what: string): CallValue {
  if (value.kind === "call") return value;
  throw new ManifestLoadError("E_MANIFEST_TYPE", `${what} must be a call such as '.name(...)'`, value.span);
}
