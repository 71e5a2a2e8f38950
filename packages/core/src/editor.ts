/**
 * Package editor: the file-level edit operations. Each call loads the
 * manifest, checks preconditions, applies tree operations in one edit
 * session and writes the manifest once, after the edit verified.
 */
import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULT_CONFIG, type EditorConfig } from "./config.js";
import { makeDiag } from "./diagnostics.js";
import { ManifestEditError, type EditFailure, type EditFailureKind } from "./errors.js";
import {
  compareToolsVersions,
  formatToolsVersion,
  loadManifestSource,
  MINIMUM_EDITABLE_TOOLS_VERSION,
  type Manifest,
} from "./manifest.js";
import {
  describeRequirement,
  packageIdentity,
  urlScheme,
  type DependencyRequirement,
  type NewTarget,
  type NewTargetDependency,
  type ProductType,
} from "./model.js";
import * as ops from "./operations.js";
import { GitVersionResolver, pickDefaultRequirement, type VersionResolver } from "./resolver.js";
import { EditSession, type TreeOperation } from "./session.js";
import { makeTracer, type Tracer, type TraceSink } from "./trace.js";

export interface PackageEditorOptions {
  /** Path of Package.swift. */
  manifestPath: string;
  resolver?: VersionResolver;
  config?: EditorConfig;
  trace?: TraceSink;
  sessionId?: string;
}

export type EditResult =
  | { ok: true; manifest: Manifest; writtenFiles: string[] }
  | { ok: false; failure: EditFailure };

interface PlannedEdit {
  name: string;
  operation: TreeOperation;
}

function precondition(code: string, message: string, hint?: string): never {
  throw new ManifestEditError("precondition-failed", makeDiag(code, message, undefined, hint));
}

function failure(kind: EditFailureKind, code: string, message: string): EditResult {
  return { ok: false, failure: { kind, diagnostics: [makeDiag(code, message)] } };
}

const TEST_TEMPLATE = (name: string, module: string | undefined): string =>
  [
    "import XCTest",
    ...(module ? [`@testable import ${module}`] : []),
    "",
    `final class ${name}: XCTestCase {`,
    "    func testExample() {",
    "",
    "    }",
    "}",
    "",
  ].join("\n");

export class PackageEditor {
  readonly manifestPath: string;
  private resolver: VersionResolver;
  private config: EditorConfig;
  private trace?: TraceSink;
  private sessionId?: string;

  constructor(options: PackageEditorOptions) {
    this.manifestPath = path.resolve(options.manifestPath);
    this.resolver = options.resolver ?? new GitVersionResolver();
    this.config = options.config ?? DEFAULT_CONFIG;
    this.trace = options.trace;
    this.sessionId = options.sessionId;
  }

  private get packageDir(): string {
    return path.dirname(this.manifestPath);
  }

  private get operationOptions(): ops.OperationOptions {
    return this.config.indent === undefined ? {} : { indentUnit: this.config.indent };
  }

  /**
   * Loads the manifest, runs `plan` against it, applies the planned edits
   * in one session and writes the result. `plan` throws ManifestEditError
   * for unmet preconditions.
   */
  private edit(plan: (manifest: Manifest, emit: Tracer) => PlannedEdit[], after?: () => string[]): EditResult {
    const sessionId = this.sessionId ?? randomUUID();
    const emit = makeTracer(sessionId, this.trace);
    const source = fs.readFileSync(this.manifestPath, "utf-8");
    const opened = EditSession.open(source, {
      file: this.manifestPath,
      sessionId,
      ...(this.trace ? { trace: this.trace } : {}),
    });
    const session = opened.session;
    if (!session) {
      return { ok: false, failure: { kind: "manifest-invalid", diagnostics: opened.diagnostics } };
    }

    const manifest = session.manifest;
    let edits: PlannedEdit[];
    try {
      if (compareToolsVersions(manifest.toolsVersion, MINIMUM_EDITABLE_TOOLS_VERSION) < 0) {
        precondition(
          "E_TOOLS_VERSION",
          "mechanical manifest editing operations are only supported for packages with swift-tools-version 5.2 and later",
          `the manifest declares swift-tools-version ${formatToolsVersion(manifest.toolsVersion)}`
        );
      }
      edits = plan(manifest, emit);
    } catch (e) {
      if (e instanceof ManifestEditError) return { ok: false, failure: e.toFailure() };
      throw e;
    }

    for (const edit of edits) {
      const result = session.apply(edit.name, edit.operation);
      if (!result.ok) return result;
    }

    fs.writeFileSync(this.manifestPath, session.source);
    emit("write", { path: this.manifestPath, bytes: session.source.length });
    const written = [this.manifestPath, ...(after ? after() : [])];
    return { ok: true, manifest: session.manifest, writtenFiles: written };
  }

  addPackageDependency(url: string, requirement?: DependencyRequirement, name?: string): EditResult {
    const isLocal = urlScheme(url) === undefined;
    if (isLocal && requirement !== undefined && requirement.kind !== "localPackage") {
      return failure(
        "precondition-failed",
        "E_LOCAL_REQUIREMENT",
        `'${url}' is a local path, but a non-local requirement was specified`
      );
    }

    return this.edit((manifest, emit) => {
      const identity = packageIdentity(url);
      if (manifest.dependencies.some((d) => d.identity === identity)) {
        precondition("E_DUPLICATE_DEPENDENCY", `'${url}' is already a package dependency`);
      }

      let resolved: DependencyRequirement;
      let dependencyName = name;
      if (isLocal) {
        resolved = { kind: "localPackage" };
        dependencyName ??= this.localPackageName(url);
      } else if (requirement) {
        resolved = requirement;
      } else {
        resolved = pickDefaultRequirement(this.resolver.listRefs(url), this.config.defaultBranch);
        emit("resolve", { url, requirement: describeRequirement(resolved) });
      }

      const dependency = dependencyName === undefined
        ? { location: url, requirement: resolved }
        : { name: dependencyName, location: url, requirement: resolved };
      return [
        {
          name: "add-package-dependency",
          operation: (tree) => ops.addPackageDependency(tree, dependency, this.operationOptions),
        },
      ];
    });
  }

  /** Name declared by the local package at `location`, relative to this package. */
  private localPackageName(location: string): string {
    const manifestPath = path.resolve(this.packageDir, location, "Package.swift");
    if (!fs.existsSync(manifestPath)) {
      precondition("E_LOCAL_PACKAGE", `'${location}' does not contain a Package.swift`);
    }
    const loaded = loadManifestSource(fs.readFileSync(manifestPath, "utf-8"), manifestPath);
    if (!loaded.manifest) {
      throw new ManifestEditError("precondition-failed", [
        makeDiag("E_LOCAL_PACKAGE", `could not load the package at '${location}'`),
        ...loaded.diagnostics,
      ]);
    }
    return loaded.manifest.name;
  }

  addTarget(newTarget: NewTarget): EditResult {
    const testTarget: NewTarget | undefined = newTarget.kind === "library" && newTarget.includeTestTarget
      ? { kind: "test", name: `${newTarget.name}Tests`, dependencyNames: [newTarget.name] }
      : undefined;
    const added = testTarget ? [newTarget, testTarget] : [newTarget];

    return this.edit(
      (manifest) => {
        for (const target of added) {
          if (manifest.targets.some((t) => t.name === target.name)) {
            precondition("E_DUPLICATE_TARGET", `a target named '${target.name}' already exists`);
          }
        }
        return added.flatMap((target) => this.targetEdits(target));
      },
      () => (this.config.writeTemplates === false ? [] : added.flatMap((t) => this.writeTemplateFiles(t)))
    );
  }

  private targetEdits(target: NewTarget): PlannedEdit[] {
    const edits: PlannedEdit[] = [
      { name: "add-target", operation: (tree) => ops.addTarget(tree, target, this.operationOptions) },
    ];
    if (target.kind !== "binary") {
      for (const dependency of target.dependencyNames) {
        edits.push({
          name: "add-target-dependency",
          operation: (tree) => ops.addTargetDependency(tree, target.name, { kind: "byName", name: dependency }),
        });
      }
    }
    return edits;
  }

  /** Creates the source directory of a new target when it does not exist yet. */
  private writeTemplateFiles(target: NewTarget): string[] {
    const template = this.templateFor(target);
    if (!template || fs.existsSync(template.dir)) return [];
    fs.mkdirSync(template.dir, { recursive: true });
    const filePath = path.join(template.dir, template.file);
    fs.writeFileSync(filePath, template.contents);
    return [filePath];
  }

  private templateFor(target: NewTarget): { dir: string; file: string; contents: string } | undefined {
    switch (target.kind) {
      case "library":
        return { dir: path.join(this.packageDir, "Sources", target.name), file: `${target.name}.swift`, contents: "" };
      case "executable":
        return { dir: path.join(this.packageDir, "Sources", target.name), file: "main.swift", contents: "" };
      case "test":
        return {
          dir: path.join(this.packageDir, "Tests", target.name),
          file: `${target.name}.swift`,
          contents: TEST_TEMPLATE(target.name, target.dependencyNames[0]),
        };
      case "binary":
        return undefined;
    }
  }

  addBinaryTarget(name: string, urlOrPath: string, checksum?: string): EditResult {
    const target: NewTarget = checksum === undefined
      ? { kind: "binary", name, urlOrPath }
      : { kind: "binary", name, urlOrPath, checksum };
    return this.addTarget(target);
  }

  addTargetDependency(target: string, dependency: NewTargetDependency): EditResult {
    return this.edit((manifest) => {
      const existing = manifest.targets.find((t) => t.name === target);
      if (existing?.dependencies.some((d) => d.name === dependency.name)) {
        precondition("E_DUPLICATE_TARGET_DEPENDENCY", `'${dependency.name}' is already a dependency of target '${target}'`);
      }
      return [
        {
          name: "add-target-dependency",
          operation: (tree) => ops.addTargetDependency(tree, target, dependency),
        },
      ];
    });
  }

  addProduct(name: string, type: ProductType, targets: string[]): EditResult {
    return this.edit((manifest) => {
      if (manifest.products.some((p) => p.name === name)) {
        precondition("E_DUPLICATE_PRODUCT", `a product named '${name}' already exists`);
      }
      this.requireTargets(manifest, targets);
      return [
        { name: "add-product", operation: (tree) => ops.addProduct(tree, { name, type }, this.operationOptions) },
        ...targets.map((target): PlannedEdit => ({
          name: "add-product-target",
          operation: (tree) => ops.addProductTarget(tree, name, target),
        })),
      ];
    });
  }

  addProductTarget(product: string, target: string): EditResult {
    return this.edit((manifest) => {
      const existing = manifest.products.find((p) => p.name === product);
      if (!existing) {
        throw new ManifestEditError("entity-not-found", makeDiag("E_MISSING_PRODUCT", `couldn't find product '${product}'`));
      }
      this.requireTargets(manifest, [target]);
      if (existing.targets.includes(target)) {
        precondition("E_DUPLICATE_PRODUCT_TARGET", `'${target}' is already a target of product '${product}'`);
      }
      return [{ name: "add-product-target", operation: (tree) => ops.addProductTarget(tree, product, target) }];
    });
  }

  private requireTargets(manifest: Manifest, targets: string[]): void {
    for (const target of targets) {
      if (!manifest.targets.some((t) => t.name === target)) {
        throw new ManifestEditError("entity-not-found", makeDiag("E_MISSING_TARGET", `couldn't find target '${target}'`));
      }
    }
  }
}
