/**
 * Manifest edit operations. Each takes a tree and returns a new tree that
 * shares every untouched subtree with the input; none of them reads or
 * writes files. Failures are thrown as ManifestEditError.
 */
import type * as AST from "./ast.js";
import { makeDiag, tokenSpan, type Diagnostic } from "./diagnostics.js";
import { ManifestEditError, type EditFailureKind } from "./errors.js";
import {
  defaultEntryLayout,
  detectIndentUnit,
  detectLineBreak,
  nodeIndent,
  observeEntryLayout,
  type EntryLayout,
} from "./layout.js";
import { findArrayArgument, findNamedEntity, findRootCall } from "./locators.js";
import type { NewPackageDependency, NewProduct, NewTarget, NewTargetDependency } from "./model.js";
import { firstToken } from "./printer.js";
import { appendArrayElement, insertEmptyArrayArgument } from "./rewriter.js";
import {
  packageDependencyEntry,
  productDependencyEntry,
  productEntry,
  stringLiteral,
  targetEntry,
} from "./synthesizers.js";
import { childRef, replaceNode, type NodeRef } from "./traverse.js";

export interface OperationOptions {
  /** Indentation step for new multi-line entries; detected from the file when unset. */
  indentUnit?: string;
}

const LANGUAGE_SETTINGS = ["swiftLanguageVersions", "cLanguageStandard", "cxxLanguageStandard"];

/** Root arguments a new `label: []` must be inserted before. */
export const INSERT_BEFORE: Readonly<Record<"dependencies" | "targets" | "products", readonly string[]>> = {
  dependencies: ["targets", ...LANGUAGE_SETTINGS],
  targets: [...LANGUAGE_SETTINGS],
  products: ["dependencies", "targets", ...LANGUAGE_SETTINGS],
};

type RootArrayLabel = keyof typeof INSERT_BEFORE;

function fail(kind: EditFailureKind, diag: Diagnostic): never {
  throw new ManifestEditError(kind, diag);
}

function rootCall(tree: AST.SourceFile): NodeRef<AST.CallExpression> {
  const result = findRootCall(tree);
  switch (result.kind) {
    case "found":
      return result.ref;
    case "missing":
      return fail("structural-not-found", makeDiag("E_NO_PACKAGE_INIT", "couldn't find Package initializer"));
    case "foundMultiple":
      return fail(
        "structural-ambiguous",
        makeDiag(
          "E_MULTIPLE_PACKAGE_INIT",
          "found multiple Package initializers",
          tokenSpan(firstToken(result.refs[1].node))
        )
      );
  }
}

function argumentsOf(call: NodeRef<AST.CallExpression>): NodeRef<AST.ArgumentList> {
  return childRef(call, call.node.argumentList);
}

/**
 * The array passed as `label:` below `list`. `parent` names the owner in
 * diagnostics; undefined means the Package initializer.
 */
function requireArray(list: NodeRef<AST.ArgumentList>, label: string, parent?: string): NodeRef<AST.ArrayLiteral> {
  const result = findArrayArgument(list, label);
  switch (result.kind) {
    case "found":
      return result.ref;
    case "missing":
      return fail(
        "structural-not-found",
        makeDiag(
          "E_MISSING_ARGUMENT",
          parent === undefined
            ? `couldn't find '${label}' argument in Package initializer`
            : `couldn't find '${label}' argument of ${parent}`
        )
      );
    case "incompatible":
      return fail(
        "structural-ambiguous",
        makeDiag(
          "E_INCOMPATIBLE_ARGUMENT",
          `'${label}' argument is not an array literal or concatenation of array literals`,
          tokenSpan(result.argument.label),
          result.reason
        )
      );
  }
}

interface RootArray {
  tree: AST.SourceFile;
  array: NodeRef<AST.ArrayLiteral>;
  call: AST.CallExpression;
}

/** The root call's `label:` array, inserting an empty one when the argument is absent. */
function findOrCreateRootArray(tree: AST.SourceFile, label: RootArrayLabel): RootArray {
  const call = rootCall(tree);
  const list = argumentsOf(call);
  if (findArrayArgument(list, label).kind !== "missing") {
    return { tree, array: requireArray(list, label), call: call.node };
  }

  const inserted = insertEmptyArrayArgument(list.node, label, INSERT_BEFORE[label], detectLineBreak(tree));
  const nextTree = replaceNode(list, inserted);
  const nextCall = rootCall(nextTree);
  return { tree: nextTree, array: requireArray(argumentsOf(nextCall), label), call: nextCall.node };
}

/** Layout for a new entry: the last sibling's, or a fresh one-entry-per-line layout. */
function entryLayout(root: RootArray, multilineCall: boolean, options: OperationOptions): EntryLayout {
  const lineBreak = detectLineBreak(root.tree);
  const observed = observeEntryLayout(root.array.node, lineBreak);
  if (observed) return observed;
  const unit = options.indentUnit ?? detectIndentUnit(root.call);
  const holder = root.array.path.find((slot) => slot.node.kind === "Argument");
  const baseIndent = holder ? nodeIndent(holder.node) ?? "" : "";
  return defaultEntryLayout(baseIndent, unit, multilineCall, lineBreak);
}

export function addPackageDependency(
  tree: AST.SourceFile,
  dependency: NewPackageDependency,
  options: OperationOptions = {}
): AST.SourceFile {
  const root = findOrCreateRootArray(tree, "dependencies");
  const layout = entryLayout(root, false, options);
  const entry = packageDependencyEntry(dependency, layout.call);
  return replaceNode(root.array, appendArrayElement(root.array.node, entry, "matchSiblings", layout));
}

export function addTarget(tree: AST.SourceFile, target: NewTarget, options: OperationOptions = {}): AST.SourceFile {
  const root = findOrCreateRootArray(tree, "targets");
  const layout = entryLayout(root, true, options);
  const entry = targetEntry(target, layout.call);
  return replaceNode(root.array, appendArrayElement(root.array.node, entry, "matchSiblings", layout));
}

export function addBinaryTarget(
  tree: AST.SourceFile,
  name: string,
  urlOrPath: string,
  checksum?: string,
  options: OperationOptions = {}
): AST.SourceFile {
  const target: NewTarget = checksum === undefined
    ? { kind: "binary", name, urlOrPath }
    : { kind: "binary", name, urlOrPath, checksum };
  return addTarget(tree, target, options);
}

export function addProduct(
  tree: AST.SourceFile,
  product: Pick<NewProduct, "name" | "type">,
  options: OperationOptions = {}
): AST.SourceFile {
  const root = findOrCreateRootArray(tree, "products");
  const layout = entryLayout(root, true, options);
  const entry = productEntry(product, layout.call);
  return replaceNode(root.array, appendArrayElement(root.array.node, entry, "matchSiblings", layout));
}

/** Appends `value` to a nested array, mirroring its entries or inline when empty. */
function appendNested(tree: AST.SourceFile, array: NodeRef<AST.ArrayLiteral>, value: AST.Expr): AST.SourceFile {
  const layout = observeEntryLayout(array.node, detectLineBreak(tree));
  return replaceNode(array, appendArrayElement(array.node, value, "matchSiblings", layout));
}

function targetDependencies(tree: AST.SourceFile, target: string): NodeRef<AST.ArrayLiteral> {
  const targets = requireArray(argumentsOf(rootCall(tree)), "targets");
  const entity = findNamedEntity(targets, target);
  if (!entity) {
    return fail("entity-not-found", makeDiag("E_MISSING_TARGET", `couldn't find target '${target}'`));
  }
  return requireArray(entity, "dependencies", `target '${target}'`);
}

export function addTargetDependency(
  tree: AST.SourceFile,
  target: string,
  dependency: NewTargetDependency
): AST.SourceFile {
  const array = targetDependencies(tree, target);
  const value = dependency.kind === "product"
    ? productDependencyEntry(dependency.name, dependency.package)
    : stringLiteral(dependency.name);
  return appendNested(tree, array, value);
}

/** Adds `.product(name:package:)` to a target's dependencies. */
export function addProductTargetDependency(
  tree: AST.SourceFile,
  target: string,
  product: string,
  packageName: string
): AST.SourceFile {
  return addTargetDependency(tree, target, { kind: "product", name: product, package: packageName });
}

export function addProductTarget(tree: AST.SourceFile, product: string, target: string): AST.SourceFile {
  const products = requireArray(argumentsOf(rootCall(tree)), "products");
  const entity = findNamedEntity(products, product);
  if (!entity) {
    return fail("entity-not-found", makeDiag("E_MISSING_PRODUCT", `couldn't find product '${product}'`));
  }
  const targets = requireArray(entity, "targets", `product '${product}'`);
  return appendNested(tree, targets, stringLiteral(target));
}
