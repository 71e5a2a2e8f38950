/**
 * Value types for requested edits: dependency requirements and
 * descriptors of new targets and products. None of them refer to tree nodes.
 */

export type DependencyRequirement =
  | { kind: "exact"; version: string }
  | { kind: "revision"; revision: string }
  | { kind: "branch"; branch: string }
  | { kind: "upToNextMajor"; version: string }
  | { kind: "upToNextMinor"; version: string }
  | { kind: "range"; lower: string; upper: string }
  | { kind: "closedRange"; lower: string; upper: string }
  | { kind: "localPackage" };

export interface NewPackageDependency {
  /** Written as `name:` when given. */
  name?: string;
  /** A remote url, or a path for `localPackage`. */
  location: string;
  requirement: DependencyRequirement;
}

export type NewTarget =
  | { kind: "library"; name: string; includeTestTarget: boolean; dependencyNames: string[] }
  | { kind: "executable"; name: string; dependencyNames: string[] }
  | { kind: "test"; name: string; dependencyNames: string[] }
  | { kind: "binary"; name: string; urlOrPath: string; checksum?: string };

export type LibraryLinkage = "automatic" | "static" | "dynamic";

export type ProductType =
  | { kind: "library"; linkage: LibraryLinkage }
  | { kind: "executable" };

export interface NewProduct {
  name: string;
  type: ProductType;
  targets: string[];
}

/** Target dependency entry: a plain name, or a product of a package. */
export type NewTargetDependency =
  | { kind: "byName"; name: string }
  | { kind: "product"; name: string; package: string };

export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}

/** Factory method that declares a target of this kind in a manifest. */
export function targetFactoryName(target: NewTarget): string {
  switch (target.kind) {
    case "library":
    case "executable":
      return "target";
    case "test":
      return "testTarget";
    case "binary":
      return "binaryTarget";
    default:
      return assertNever(target, "target kind");
  }
}

export function describeRequirement(requirement: DependencyRequirement): string {
  switch (requirement.kind) {
    case "exact":
      return `exact ${requirement.version}`;
    case "revision":
      return `revision ${requirement.revision}`;
    case "branch":
      return `branch ${requirement.branch}`;
    case "upToNextMajor":
      return `from ${requirement.version} (next major)`;
    case "upToNextMinor":
      return `from ${requirement.version} (next minor)`;
    case "range":
      return `${requirement.lower}..<${requirement.upper}`;
    case "closedRange":
      return `${requirement.lower}...${requirement.upper}`;
    case "localPackage":
      return "local package";
    default:
      return assertNever(requirement, "requirement");
  }
}

/** The scheme of a remote reference (`https`, `ssh`, `file`, ...), if it has one. */
export function urlScheme(location: string): string | undefined {
  const m = /^([A-Za-z][A-Za-z0-9+.-]*):\/\//.exec(location);
  return m ? m[1].toLowerCase() : undefined;
}

/**
 * Identity of a package: the last path component of its location,
 * lowercased and without a `.git` suffix.
 */
export function packageIdentity(location: string): string {
  const trimmed = location.replace(/[/\\]+$/, "");
  const last = trimmed.split(/[/\\:]/).pop() ?? trimmed;
  return last.replace(/\.git$/i, "").toLowerCase();
}
