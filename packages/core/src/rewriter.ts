/**
 * Array and argument-list insertions. Each function returns a new node;
 * callers splice it into the tree with `replaceNode`.
 */
import * as AST from "./ast.js";
import { InvariantViolationError } from "./errors.js";
import {
  detachTrailingTrivia,
  isBlank,
  newlineTrivia,
  nodeIndent,
  setLeadingTrivia,
  type EntryLayout,
} from "./layout.js";
import { findArrayArgument } from "./locators.js";
import { emptyArray } from "./synthesizers.js";
import { rootRef } from "./traverse.js";

/** Whether a newly appended element gets a trailing comma. */
export type SeparatorPolicy = "present" | "absent" | "matchSiblings";

function comma(trailingTrivia = ""): AST.Token {
  return AST.makeToken("Comma", ",", "", trailingTrivia);
}

/**
 * Gives an expression a trailing comma. A comment that followed the
 * expression on the same line moves behind the comma.
 */
function withSeparator<T extends { value: AST.Expr; trailingComma?: AST.Token }>(item: T): T {
  if (item.trailingComma) return item;
  const detached = detachTrailingTrivia(item.value);
  return { ...item, value: detached.expr, trailingComma: comma(detached.trivia) };
}

function hasLineComment(trivia: string): boolean {
  return trivia.includes("//");
}

/**
 * Appends `value` to `array`. With an element indent in `layout` the new
 * element starts its own line; otherwise it follows its predecessor on the
 * same line.
 */
export function appendArrayElement(
  array: AST.ArrayLiteral,
  value: AST.Expr,
  policy: SeparatorPolicy,
  layout?: EntryLayout
): AST.ArrayLiteral {
  const elements = array.elements.slice();
  const previous = elements.pop();
  const elementIndent = layout?.elementIndent;
  const lineBreak = layout?.lineBreak;

  let leading: string;
  if (elementIndent !== undefined) {
    leading = newlineTrivia(elementIndent, lineBreak);
  } else if (!previous) {
    leading = "";
  } else {
    const tail = previous.trailingComma?.trailingTrivia ?? detachTrailingTrivia(previous.value).trivia;
    leading = hasLineComment(tail) ? newlineTrivia(nodeIndent(previous) ?? "", lineBreak) : " ";
  }

  const separated = policy === "matchSiblings"
    ? previous ? previous.trailingComma !== undefined : elementIndent !== undefined
    : policy === "present";

  const element: AST.ArrayElement = {
    kind: "ArrayElement",
    value: setLeadingTrivia(value, leading),
    ...(separated ? { trailingComma: comma() } : {}),
  };

  if (previous) {
    return { ...array, elements: [...elements, withSeparator(previous), element] };
  }

  let { leftSquare, rightSquare } = array;
  if (isBlank(leftSquare.trailingTrivia)) leftSquare = { ...leftSquare, trailingTrivia: "" };
  if (elementIndent !== undefined) {
    if (isBlank(rightSquare.leadingTrivia)) {
      rightSquare = { ...rightSquare, leadingTrivia: newlineTrivia(layout?.closingIndent ?? "", lineBreak) };
    }
  } else if (isBlank(rightSquare.leadingTrivia)) {
    rightSquare = { ...rightSquare, leadingTrivia: "" };
  }
  return { ...array, leftSquare, elements: [element], rightSquare };
}

/** Leading trivia for an argument appended after `last`. */
function appendedArgumentLeading(last: AST.Argument | undefined, lineBreak: string): string {
  if (!last) return "";
  const indent = nodeIndent(last);
  if (indent !== undefined) return newlineTrivia(indent, lineBreak);
  const tail = last.trailingComma?.trailingTrivia ?? detachTrailingTrivia(last.value).trivia;
  return hasLineComment(tail) ? newlineTrivia("", lineBreak) : " ";
}

function labeledEmptyArray(label: string, leading: string, separator?: AST.Token): AST.Argument {
  return {
    kind: "Argument",
    label: AST.makeToken("Ident", label, leading),
    colon: AST.makeToken("Colon", ":", "", " "),
    value: emptyArray(),
    ...(separator ? { trailingComma: separator } : {}),
  };
}

/**
 * Inserts `label: []` into `list`, before the first argument whose label is
 * in `following`, or at the end when there is none.
 */
export function insertEmptyArrayArgument(
  list: AST.ArgumentList,
  label: string,
  following: readonly string[],
  lineBreak = "\n"
): AST.ArgumentList {
  const args = list.arguments;
  const index = args.findIndex((a) => a.label !== undefined && following.includes(a.label.text));

  let result: AST.Argument[];
  if (index < 0) {
    const last = args[args.length - 1];
    const leading = appendedArgumentLeading(last, lineBreak);
    if (!last) {
      result = [labeledEmptyArray(label, leading)];
    } else {
      const inserted = labeledEmptyArray(label, leading, last.trailingComma ? comma() : undefined);
      result = [...args.slice(0, -1), withSeparator(last), inserted];
    }
  } else {
    // The new argument takes the line position of the one it displaces.
    const indent = nodeIndent(args[index]);
    const inserted = indent === undefined
      ? labeledEmptyArray(label, "", comma(" "))
      : labeledEmptyArray(label, newlineTrivia(indent, lineBreak), comma());
    result = [...args.slice(0, index), inserted, ...args.slice(index)];
  }

  const updated: AST.ArgumentList = { ...list, arguments: result };
  if (findArrayArgument(rootRef(updated), label).kind !== "found") {
    throw new InvariantViolationError(`Inserted '${label}' argument cannot be located again`);
  }
  return updated;
}
