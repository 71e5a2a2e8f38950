/**
 * Generic tree traversal and path-copying replacement.
 *
 * A `NodeRef` is a node plus the slots leading to it from the root of the
 * tree it was found in. Replacing the node rebuilds only the parents along
 * that path; every other subtree is shared with the original tree.
 */
import type * as AST from "./ast.js";
import { isExpr } from "./ast.js";
import { InvariantViolationError } from "./errors.js";

export interface ChildSlot {
  readonly node: AST.SyntaxNode;
  /** Returns a copy of the slot's parent with `child` in place of `node`. */
  replace(child: AST.SyntaxNode): AST.SyntaxNode;
}

export interface NodeRef<T extends AST.SyntaxNode = AST.SyntaxNode> {
  readonly node: T;
  readonly path: readonly ChildSlot[];
}

export type VisitAction = "continue" | "skip";

function expectExpr(node: AST.SyntaxNode): AST.Expr {
  if (!isExpr(node)) throw new InvariantViolationError(`Expected an expression, got ${node.kind}`);
  return node;
}

function expectStmt(node: AST.SyntaxNode): AST.Stmt {
  if (node.kind === "ImportDecl" || node.kind === "VariableDecl" || node.kind === "ExpressionStmt") return node;
  throw new InvariantViolationError(`Expected a statement, got ${node.kind}`);
}

function expectArgument(node: AST.SyntaxNode): AST.Argument {
  if (node.kind !== "Argument") throw new InvariantViolationError(`Expected Argument, got ${node.kind}`);
  return node;
}

function expectArgumentList(node: AST.SyntaxNode): AST.ArgumentList {
  if (node.kind !== "ArgumentList") throw new InvariantViolationError(`Expected ArgumentList, got ${node.kind}`);
  return node;
}

function expectArrayElement(node: AST.SyntaxNode): AST.ArrayElement {
  if (node.kind !== "ArrayElement") throw new InvariantViolationError(`Expected ArrayElement, got ${node.kind}`);
  return node;
}

function replaceAt<T>(items: readonly T[], index: number, item: T): T[] {
  const copy = items.slice();
  copy[index] = item;
  return copy;
}

export function childSlots(node: AST.SyntaxNode): ChildSlot[] {
  switch (node.kind) {
    case "SourceFile": {
      const n = node;
      return n.statements.map((s, i): ChildSlot => ({
        node: s,
        replace: (c) => ({ ...n, statements: replaceAt(n.statements, i, expectStmt(c)) }),
      }));
    }
    case "VariableDecl": {
      const n = node;
      return [{ node: n.value, replace: (c) => ({ ...n, value: expectExpr(c) }) }];
    }
    case "ExpressionStmt": {
      const n = node;
      return [{ node: n.expression, replace: (c) => ({ ...n, expression: expectExpr(c) }) }];
    }
    case "MemberReference": {
      const n = node;
      return n.base ? [{ node: n.base, replace: (c) => ({ ...n, base: expectExpr(c) }) }] : [];
    }
    case "ArrayLiteral": {
      const n = node;
      return n.elements.map((e, i): ChildSlot => ({
        node: e,
        replace: (c) => ({
          ...n,
          elements: replaceAt(n.elements, i, expectArrayElement(c)),
        }),
      }));
    }
    case "ArrayElement": {
      const n = node;
      return [{ node: n.value, replace: (c) => ({ ...n, value: expectExpr(c) }) }];
    }
    case "CallExpression": {
      const n = node;
      return [
        { node: n.callee, replace: (c) => ({ ...n, callee: expectExpr(c) }) },
        {
          node: n.argumentList,
          replace: (c) => ({ ...n, argumentList: expectArgumentList(c) }),
        },
      ];
    }
    case "ArgumentList": {
      const n = node;
      return n.arguments.map((a, i): ChildSlot => ({
        node: a,
        replace: (c) => ({
          ...n,
          arguments: replaceAt(n.arguments, i, expectArgument(c)),
        }),
      }));
    }
    case "Argument": {
      const n = node;
      return [{ node: n.value, replace: (c) => ({ ...n, value: expectExpr(c) }) }];
    }
    case "BinaryExpression": {
      const n = node;
      return [
        { node: n.left, replace: (c) => ({ ...n, left: expectExpr(c) }) },
        { node: n.right, replace: (c) => ({ ...n, right: expectExpr(c) }) },
      ];
    }
    case "SequenceExpression": {
      const n = node;
      return n.operands.map((o, i): ChildSlot => ({
        node: o,
        replace: (c) => ({ ...n, operands: replaceAt(n.operands, i, expectExpr(c)) }),
      }));
    }
    case "ParenExpression": {
      const n = node;
      return [{ node: n.expression, replace: (c) => ({ ...n, expression: expectExpr(c) }) }];
    }
    case "ImportDecl":
    case "TypeAnnotation":
    case "Identifier":
    case "StringLiteral":
    case "NumberLiteral":
    case "BooleanLiteral":
    case "NilLiteral":
      return [];
  }
}

export function rootRef<T extends AST.SyntaxNode>(node: T): NodeRef<T> {
  return { node, path: [] };
}

/** Ref to a direct child of `parent`, found by identity. */
export function childRef<T extends AST.SyntaxNode>(parent: NodeRef, child: T): NodeRef<T> {
  const slot = childSlots(parent.node).find((s) => s.node === child);
  if (!slot) {
    throw new InvariantViolationError(`${child.kind} is not a direct child of ${parent.node.kind}`);
  }
  return { node: child, path: [...parent.path, slot] };
}

/**
 * Depth-first, top-down walk. Returning "skip" from `visit` stops the walk
 * from descending into that node's children.
 */
export function walk(start: NodeRef, visit: (ref: NodeRef) => VisitAction): void {
  if (visit(start) === "skip") return;
  for (const slot of childSlots(start.node)) {
    walk({ node: slot.node, path: [...start.path, slot] }, visit);
  }
}

export interface SearchOptions<T extends AST.SyntaxNode> {
  match: (node: AST.SyntaxNode) => node is T;
  /** Whether to look inside a node that did not match. Defaults to true. */
  descend?: (node: AST.SyntaxNode) => boolean;
}

/** All matches below `start`; the walk never looks inside a match. */
export function search<T extends AST.SyntaxNode>(start: NodeRef, options: SearchOptions<T>): NodeRef<T>[] {
  const found: NodeRef<T>[] = [];
  walk(start, (ref) => {
    const node = ref.node;
    if (options.match(node)) {
      found.push({ node, path: ref.path });
      return "skip";
    }
    return options.descend && !options.descend(node) ? "skip" : "continue";
  });
  return found;
}

/**
 * Replace the referenced node and rebuild its ancestors.
 * Returns the new root, which must still be a source file.
 */
export function replaceNode(ref: NodeRef, replacement: AST.SyntaxNode): AST.SourceFile {
  let current = replacement;
  for (let i = ref.path.length - 1; i >= 0; i--) {
    current = ref.path[i].replace(current);
  }
  if (current.kind !== "SourceFile") {
    throw new InvariantViolationError(`Replacement produced a ${current.kind} root instead of a source file`);
  }
  return current;
}
