/**
 * Semantic manifest loader: turns a parsed tree into a typed package
 * description and reports what a package build would reject.
 */
import type * as AST from "./ast.js";
import { makeDiag, tokenSpan, type Diagnostic } from "./diagnostics.js";
import {
  argument,
  bindDeclarations,
  evalExpr,
  expectArray,
  expectCall,
  expectString,
  ManifestLoadError,
  positional,
  type CallValue,
  type ManifestValue,
} from "./evaluate.js";
import { findRootCall } from "./locators.js";
import {
  packageIdentity,
  urlScheme,
  type DependencyRequirement,
  type ProductType,
} from "./model.js";
import { parseManifest } from "./parser.js";
import { firstToken } from "./printer.js";

// --- Tools version ---

export interface ToolsVersion {
  major: number;
  minor: number;
  patch: number;
}

/** Assumed when the manifest has no `swift-tools-version` comment. */
export const DEFAULT_TOOLS_VERSION: ToolsVersion = { major: 3, minor: 1, patch: 0 };

/** Oldest tools version whose manifests can be edited. */
export const MINIMUM_EDITABLE_TOOLS_VERSION: ToolsVersion = { major: 5, minor: 2, patch: 0 };

const TOOLS_VERSION_PATTERN = /^\/\/\s*swift-tools-version\s*:\s*(\d+)(?:\.(\d+))?(?:\.(\d+))?/i;

export function readToolsVersion(source: string): ToolsVersion {
  const firstLine = source.split(/\r?\n/, 1)[0] ?? "";
  const m = TOOLS_VERSION_PATTERN.exec(firstLine.replace(/^\uFEFF/, ""));
  if (!m) return DEFAULT_TOOLS_VERSION;
  return {
    major: Number(m[1]),
    minor: m[2] === undefined ? 0 : Number(m[2]),
    patch: m[3] === undefined ? 0 : Number(m[3]),
  };
}

export function compareToolsVersions(a: ToolsVersion, b: ToolsVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function formatToolsVersion(v: ToolsVersion): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

// --- Manifest model ---

export interface PackageDependency {
  identity: string;
  name?: string;
  location: string;
  requirement: DependencyRequirement;
}

export type TargetType = "regular" | "executable" | "test" | "binary" | "system" | "plugin";

export type TargetDependency =
  | { kind: "byName"; name: string }
  | { kind: "target"; name: string }
  | { kind: "product"; name: string; package?: string };

export interface TargetDescription {
  name: string;
  type: TargetType;
  dependencies: TargetDependency[];
  path?: string;
  url?: string;
  checksum?: string;
}

export interface ProductDescription {
  name: string;
  type: ProductType | { kind: "plugin" };
  targets: string[];
}

export interface Manifest {
  name: string;
  toolsVersion: ToolsVersion;
  dependencies: PackageDependency[];
  targets: TargetDescription[];
  products: ProductDescription[];
}

export interface LoadResult {
  manifest?: Manifest;
  diagnostics: Diagnostic[];
}

const TARGET_FACTORIES = new Map<string, TargetType>([
  ["target", "regular"],
  ["executableTarget", "executable"],
  ["testTarget", "test"],
  ["binaryTarget", "binary"],
  ["systemLibrary", "system"],
  ["plugin", "plugin"],
]);

// --- Extraction ---

function optionalString(call: CallValue, label: string, what: string): string | undefined {
  const value = argument(call, label);
  if (value === undefined || value.kind === "nil") return undefined;
  return expectString(value, what);
}

function requiredString(call: CallValue, label: string, what: string): string {
  const value = argument(call, label);
  if (value === undefined) {
    throw new ManifestLoadError("E_MANIFEST_MISSING_ARGUMENT", `${what} is missing '${label}:'`, call.span);
  }
  return expectString(value, `${what} '${label}:'`);
}

function rangeRequirement(value: Extract<ManifestValue, { kind: "range" }>, what: string): DependencyRequirement {
  const lower = expectString(value.lower, `${what} lower bound`);
  const upper = expectString(value.upper, `${what} upper bound`);
  return value.closed ? { kind: "closedRange", lower, upper } : { kind: "range", lower, upper };
}

/** `.exact("v")`, `.upToNextMinor(from: "v")` and the other requirement factories. */
function requirementCall(call: CallValue, what: string): DependencyRequirement {
  const [first] = positional(call);
  switch (call.name) {
    case "exact":
    case "revision":
    case "branch": {
      if (!first) throw new ManifestLoadError("E_MANIFEST_REQUIREMENT", `${what} '.${call.name}' needs a value`, call.span);
      const v = expectString(first, `${what} requirement`);
      if (call.name === "exact") return { kind: "exact", version: v };
      if (call.name === "revision") return { kind: "revision", revision: v };
      return { kind: "branch", branch: v };
    }
    case "upToNextMajor":
      return { kind: "upToNextMajor", version: requiredString(call, "from", what) };
    case "upToNextMinor":
      return { kind: "upToNextMinor", version: requiredString(call, "from", what) };
    default:
      throw new ManifestLoadError("E_MANIFEST_REQUIREMENT", `${what} has an unknown requirement '.${call.name}'`, call.span);
  }
}

function dependencyRequirement(call: CallValue, what: string): DependencyRequirement {
  const from = optionalString(call, "from", `${what} 'from:'`);
  if (from !== undefined) return { kind: "upToNextMajor", version: from };
  const exact = optionalString(call, "exact", `${what} 'exact:'`);
  if (exact !== undefined) return { kind: "exact", version: exact };
  const branch = optionalString(call, "branch", `${what} 'branch:'`);
  if (branch !== undefined) return { kind: "branch", branch };
  const revision = optionalString(call, "revision", `${what} 'revision:'`);
  if (revision !== undefined) return { kind: "revision", revision };

  const [first] = positional(call);
  if (first?.kind === "range") return rangeRequirement(first, what);
  if (first?.kind === "call") return requirementCall(first, what);
  throw new ManifestLoadError("E_MANIFEST_REQUIREMENT", `${what} has no version requirement`, call.span);
}

function loadDependency(value: ManifestValue): PackageDependency {
  const call = expectCall(value, "package dependency");
  if (call.name !== "package") {
    throw new ManifestLoadError("E_MANIFEST_TYPE", `unexpected dependency '.${call.name}'`, call.span);
  }
  const name = optionalString(call, "name", "package dependency 'name:'");
  const path = optionalString(call, "path", "package dependency 'path:'");
  const base = name === undefined ? {} : { name };
  if (path !== undefined) {
    return { ...base, identity: packageIdentity(path), location: path, requirement: { kind: "localPackage" } };
  }
  const url = requiredString(call, "url", "package dependency");
  const requirement = dependencyRequirement(call, `dependency '${url}'`);
  return { ...base, identity: packageIdentity(url), location: url, requirement };
}

function loadTargetDependency(value: ManifestValue, target: string): TargetDependency {
  if (value.kind === "string" || value.kind === "interpolated") {
    return { kind: "byName", name: expectString(value, `dependency of target '${target}'`) };
  }
  const call = expectCall(value, `dependency of target '${target}'`);
  const what = `'.${call.name}' dependency of target '${target}'`;
  switch (call.name) {
    case "byName":
      return { kind: "byName", name: requiredString(call, "name", what) };
    case "target":
      return { kind: "target", name: requiredString(call, "name", what) };
    case "product": {
      const pkg = optionalString(call, "package", `${what} 'package:'`);
      const name = requiredString(call, "name", what);
      return pkg === undefined ? { kind: "product", name } : { kind: "product", name, package: pkg };
    }
    default:
      throw new ManifestLoadError("E_MANIFEST_TYPE", `unknown target dependency '.${call.name}'`, call.span);
  }
}

function loadTarget(value: ManifestValue): TargetDescription {
  const call = expectCall(value, "target");
  const type = TARGET_FACTORIES.get(call.name);
  if (type === undefined) {
    throw new ManifestLoadError("E_MANIFEST_TYPE", `unknown target factory '.${call.name}'`, call.span);
  }
  const name = requiredString(call, "name", "target");
  const deps = argument(call, "dependencies");
  const target: TargetDescription = {
    name,
    type,
    dependencies: deps === undefined
      ? []
      : expectArray(deps, `dependencies of target '${name}'`).map((d) => loadTargetDependency(d, name)),
  };

  const path = optionalString(call, "path", `target '${name}' 'path:'`);
  if (path !== undefined) target.path = path;

  if (type === "binary") {
    const url = optionalString(call, "url", `target '${name}' 'url:'`);
    const checksum = optionalString(call, "checksum", `target '${name}' 'checksum:'`);
    if (url !== undefined) target.url = url;
    if (checksum !== undefined) target.checksum = checksum;
    const remote = url !== undefined && checksum !== undefined && urlScheme(url) !== undefined;
    if (path === undefined && !remote) {
      throw new ManifestLoadError(
        "E_MANIFEST_BINARY_TARGET",
        `binary target '${name}' needs either 'path:' or a remote 'url:' with 'checksum:'`,
        call.span
      );
    }
  }
  return target;
}

function loadProductType(call: CallValue, name: string): ProductDescription["type"] {
  switch (call.name) {
    case "executable":
      return { kind: "executable" };
    case "plugin":
      return { kind: "plugin" };
    case "library": {
      const type = argument(call, "type");
      if (type === undefined || type.kind === "nil") return { kind: "library", linkage: "automatic" };
      if (type.kind === "member" && (type.name === "static" || type.name === "dynamic")) {
        return { kind: "library", linkage: type.name };
      }
      throw new ManifestLoadError("E_MANIFEST_TYPE", `product '${name}' has an unknown library type`, type.span);
    }
    default:
      throw new ManifestLoadError("E_MANIFEST_TYPE", `unknown product factory '.${call.name}'`, call.span);
  }
}

function loadProduct(value: ManifestValue): ProductDescription {
  const call = expectCall(value, "product");
  const name = requiredString(call, "name", "product");
  const targets = argument(call, "targets");
  return {
    name,
    type: loadProductType(call, name),
    targets: targets === undefined
      ? []
      : expectArray(targets, `targets of product '${name}'`).map((t) => expectString(t, `target of product '${name}'`)),
  };
}

function listArgument<T>(
  call: CallValue,
  label: string,
  load: (value: ManifestValue) => T,
  diagnostics: Diagnostic[]
): T[] {
  const value = argument(call, label);
  if (value === undefined) return [];
  let items: ManifestValue[];
  try {
    items = expectArray(value, `'${label}'`);
  } catch (e) {
    diagnostics.push(toDiagnostic(e));
    return [];
  }
  const loaded: T[] = [];
  for (const item of items) {
    try {
      loaded.push(load(item));
    } catch (e) {
      diagnostics.push(toDiagnostic(e));
    }
  }
  return loaded;
}

function toDiagnostic(e: unknown): Diagnostic {
  if (e instanceof ManifestLoadError) return makeDiag(e.code, e.message, e.span);
  throw e;
}

// --- Checks ---

function duplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const dups = new Set<string>();
  for (const n of names) {
    if (seen.has(n)) dups.add(n);
    seen.add(n);
  }
  return [...dups];
}

function checkManifest(manifest: Manifest): Diagnostic[] {
  const diags: Diagnostic[] = [];
  for (const name of duplicates(manifest.targets.map((t) => t.name))) {
    diags.push(makeDiag("E_MANIFEST_DUPLICATE_TARGET", `duplicate target named '${name}'`));
  }
  for (const name of duplicates(manifest.products.map((p) => p.name))) {
    diags.push(makeDiag("E_MANIFEST_DUPLICATE_PRODUCT", `duplicate product named '${name}'`));
  }
  for (const identity of duplicates(manifest.dependencies.map((d) => d.identity))) {
    diags.push(makeDiag("E_MANIFEST_DUPLICATE_DEPENDENCY", `duplicate dependency identity '${identity}'`));
  }
  const targetNames = new Set(manifest.targets.map((t) => t.name));
  for (const product of manifest.products) {
    for (const target of product.targets) {
      if (!targetNames.has(target)) {
        diags.push(
          makeDiag("E_MANIFEST_UNKNOWN_TARGET", `product '${product.name}' references unknown target '${target}'`)
        );
      }
    }
  }
  return diags;
}

// --- Entry points ---

/** Loads a parsed manifest. `source` supplies the tools-version comment. */
export function loadManifest(tree: AST.SourceFile, source: string): LoadResult {
  const root = findRootCall(tree);
  if (root.kind === "missing") {
    return { diagnostics: [makeDiag("E_MANIFEST_NO_PACKAGE", "manifest has no 'let package = Package(...)' declaration")] };
  }
  if (root.kind === "foundMultiple") {
    return {
      diagnostics: [
        makeDiag("E_MANIFEST_MULTIPLE_PACKAGES", "manifest declares more than one Package", tokenSpan(firstToken(root.refs[1].node))),
      ],
    };
  }

  const env = bindDeclarations(tree);
  const value = evalExpr(root.ref.node, env);
  const call = expectCall(value, "Package");
  const diagnostics: Diagnostic[] = [];

  let name = "";
  try {
    name = requiredString(call, "name", "Package");
  } catch (e) {
    diagnostics.push(toDiagnostic(e));
  }

  const manifest: Manifest = {
    name,
    toolsVersion: readToolsVersion(source),
    dependencies: listArgument(call, "dependencies", loadDependency, diagnostics),
    targets: listArgument(call, "targets", loadTarget, diagnostics),
    products: listArgument(call, "products", loadProduct, diagnostics),
  };
  diagnostics.push(...checkManifest(manifest));

  return diagnostics.length > 0 ? { diagnostics } : { manifest, diagnostics };
}

/** Parses and loads manifest text. */
export function loadManifestSource(source: string, file = "Package.swift"): LoadResult {
  const parsed = parseManifest(source, file);
  if (!parsed.tree) return { diagnostics: parsed.diagnostics };
  return loadManifest(parsed.tree, source);
}
