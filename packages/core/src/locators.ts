/**
 * Locators: single-pass searches for the parts of a manifest an edit
 * needs. Each reports one of a closed set of outcomes; ambiguous input is
 * reported, never resolved by picking one of the candidates.
 */
import type * as AST from "./ast.js";
import { firstToken } from "./printer.js";
import { stringValue } from "./strings.js";
import { childRef, rootRef, search, type NodeRef } from "./traverse.js";

export const ROOT_CALL_NAME = "Package";

export type RootCallResult =
  | { kind: "found"; ref: NodeRef<AST.CallExpression> }
  | { kind: "missing" }
  | { kind: "foundMultiple"; refs: NodeRef<AST.CallExpression>[] };

export type ArrayArgumentResult =
  | { kind: "found"; ref: NodeRef<AST.ArrayLiteral> }
  | { kind: "missing" }
  | { kind: "incompatible"; reason: string; argument: AST.Argument };

function isRootCall(expr: AST.Expr, name: string): expr is AST.CallExpression {
  return expr.kind === "CallExpression" && firstToken(expr.callee)?.text === name;
}

/**
 * Finds the `let package = Package(...)` initializer. A declaration is
 * classified on sight and never searched further.
 */
export function findRootCall(tree: AST.SourceFile, name: string = ROOT_CALL_NAME): RootCallResult {
  const decls = search(rootRef(tree), {
    match: (node): node is AST.VariableDecl => node.kind === "VariableDecl" && isRootCall(node.value, name),
    descend: (node) => node.kind !== "VariableDecl",
  });

  const refs: NodeRef<AST.CallExpression>[] = [];
  for (const decl of decls) {
    const value = decl.node.value;
    if (isRootCall(value, name)) refs.push(childRef(decl, value));
  }

  if (refs.length === 0) return { kind: "missing" };
  if (refs.length > 1) return { kind: "foundMultiple", refs };
  return { kind: "found", ref: refs[0] };
}

function describeKind(kind: AST.Expr["kind"]): string {
  const words = kind.replace(/([a-z])([A-Z])/g, "$1 $2").toLowerCase();
  return /^[aeiou]/.test(words) ? `an ${words}` : `a ${words}`;
}

/**
 * Finds the array literal passed as `label:`. A concatenation such as
 * `common + [ ... ]` qualifies when exactly one of its operands is an
 * array literal; that operand is the one reported.
 */
export function findArrayArgument(list: NodeRef<AST.ArgumentList>, label: string): ArrayArgumentResult {
  const matches = list.node.arguments.filter((a) => a.label?.text === label);
  const argument = matches[0];
  if (!argument) return { kind: "missing" };
  if (matches.length > 1) {
    return { kind: "incompatible", reason: `'${label}' is passed more than once`, argument };
  }

  const argRef = childRef(list, argument);
  const value = argument.value;
  if (value.kind === "ArrayLiteral") {
    return { kind: "found", ref: childRef(argRef, value) };
  }

  if (value.kind === "BinaryExpression" || value.kind === "SequenceExpression") {
    const valueRef = childRef(argRef, value);
    const operands = value.kind === "BinaryExpression" ? [value.left, value.right] : value.operands;
    const arrays = operands.filter((o): o is AST.ArrayLiteral => o.kind === "ArrayLiteral");
    if (arrays.length === 1) {
      return { kind: "found", ref: childRef(valueRef, arrays[0]) };
    }
    return {
      kind: "incompatible",
      reason: arrays.length === 0
        ? `'${label}' is a concatenation without an array literal`
        : `'${label}' concatenates more than one array literal`,
      argument,
    };
  }

  return { kind: "incompatible", reason: `'${label}' is ${describeKind(value.kind)}`, argument };
}

/**
 * Argument list of the first call entry whose `name:` is a plain string
 * equal to `name`. Interpolated names never match.
 */
export function findNamedEntity(array: NodeRef<AST.ArrayLiteral>, name: string): NodeRef<AST.ArgumentList> | undefined {
  for (const element of array.node.elements) {
    const call = element.value;
    if (call.kind !== "CallExpression") continue;
    const named = call.argumentList.arguments.some(
      (a) => a.label?.text === "name" && stringValue(a.value) === name
    );
    if (named) {
      const callRef = childRef(childRef(array, element), call);
      return childRef(callRef, call.argumentList);
    }
  }
  return undefined;
}
