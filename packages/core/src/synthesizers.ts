/**
 * Builds the expressions an edit inserts: package dependency, target,
 * product and target-dependency entries.
 */
import * as AST from "./ast.js";
import { makeDiag } from "./diagnostics.js";
import { ManifestEditError } from "./errors.js";
import { newlineTrivia, setLeadingTrivia, type CallLayout } from "./layout.js";
import {
  assertNever,
  targetFactoryName,
  urlScheme,
  type DependencyRequirement,
  type NewPackageDependency,
  type NewProduct,
  type NewTarget,
} from "./model.js";
import { quote } from "./strings.js";

interface ArgumentSpec {
  label?: string;
  value: AST.Expr;
}

export function stringLiteral(value: string): AST.StringLiteral {
  return { kind: "StringLiteral", token: AST.makeToken("StringLit", quote(value)) };
}

export function implicitMember(name: string): AST.MemberReference {
  return {
    kind: "MemberReference",
    dot: AST.makeToken("Dot", "."),
    name: AST.makeToken("Ident", name),
  };
}

export function emptyArray(): AST.ArrayLiteral {
  return {
    kind: "ArrayLiteral",
    leftSquare: AST.makeToken("LBracket", "["),
    elements: [],
    rightSquare: AST.makeToken("RBracket", "]"),
  };
}

/** `callee(args...)`, one argument per line when the layout indents arguments. */
export function callExpression(callee: AST.Expr, specs: ArgumentSpec[], layout: CallLayout = {}): AST.CallExpression {
  const args = specs.map((spec, i): AST.Argument => {
    const leading = layout.argumentIndent !== undefined
      ? newlineTrivia(layout.argumentIndent, layout.lineBreak)
      : i === 0 ? "" : " ";
    const isLast = i === specs.length - 1;
    const separator = isLast ? {} : { trailingComma: AST.makeToken("Comma", ",") };
    if (spec.label === undefined) {
      return { kind: "Argument", value: setLeadingTrivia(spec.value, leading), ...separator };
    }
    return {
      kind: "Argument",
      label: AST.makeToken("Ident", spec.label, leading),
      colon: AST.makeToken("Colon", ":", "", " "),
      value: spec.value,
      ...separator,
    };
  });

  const closing = layout.argumentIndent !== undefined && layout.closingIndent !== undefined
    ? newlineTrivia(layout.closingIndent, layout.lineBreak)
    : "";
  return {
    kind: "CallExpression",
    callee,
    leftParen: AST.makeToken("LParen", "("),
    argumentList: { kind: "ArgumentList", arguments: args },
    rightParen: AST.makeToken("RParen", ")", closing),
  };
}

function requirementArgument(requirement: DependencyRequirement): ArgumentSpec | undefined {
  switch (requirement.kind) {
    case "exact":
      return { value: callExpression(implicitMember("exact"), [{ value: stringLiteral(requirement.version) }]) };
    case "revision":
      return { value: callExpression(implicitMember("revision"), [{ value: stringLiteral(requirement.revision) }]) };
    case "branch":
      return { value: callExpression(implicitMember("branch"), [{ value: stringLiteral(requirement.branch) }]) };
    case "upToNextMajor":
      return { label: "from", value: stringLiteral(requirement.version) };
    case "upToNextMinor":
      return {
        value: callExpression(implicitMember("upToNextMinor"), [
          { label: "from", value: stringLiteral(requirement.version) },
        ]),
      };
    case "range":
    case "closedRange":
      return {
        value: {
          kind: "BinaryExpression",
          left: stringLiteral(requirement.lower),
          operator: AST.makeToken("Operator", requirement.kind === "range" ? "..<" : "..."),
          right: stringLiteral(requirement.upper),
        },
      };
    case "localPackage":
      return undefined;
    default:
      return assertNever(requirement, "requirement");
  }
}

/** `.package(name:?, url: ..., <requirement>)` or `.package(name:?, path: ...)`. */
export function packageDependencyEntry(dependency: NewPackageDependency, layout: CallLayout = {}): AST.CallExpression {
  const specs: ArgumentSpec[] = [];
  if (dependency.name !== undefined) specs.push({ label: "name", value: stringLiteral(dependency.name) });
  const requirement = requirementArgument(dependency.requirement);
  specs.push({ label: requirement ? "url" : "path", value: stringLiteral(dependency.location) });
  if (requirement) specs.push(requirement);
  return callExpression(implicitMember("package"), specs, layout);
}

/**
 * Checks the location/checksum pairing of a binary target: a remote url
 * needs a checksum and a local path must not have one. An empty checksum
 * counts as none.
 */
export function checkBinaryLocation(urlOrPath: string, checksum: string | undefined): void {
  const remote = urlScheme(urlOrPath) !== undefined;
  if (remote && !checksum) {
    throw new ManifestEditError(
      "precondition-failed",
      makeDiag("E_MISSING_CHECKSUM", `'${urlOrPath}' is a remote URL, but no checksum was specified for the binary target`, undefined, "pass the archive checksum")
    );
  }
  if (!remote && checksum) {
    throw new ManifestEditError(
      "precondition-failed",
      makeDiag("E_UNEXPECTED_CHECKSUM", `'${urlOrPath}' is a local path, but a checksum was specified for the binary target`)
    );
  }
}

/** `.target|.testTarget(name:, dependencies: [])` or `.binaryTarget(...)`. */
export function targetEntry(target: NewTarget, layout: CallLayout = {}): AST.CallExpression {
  const callee = implicitMember(targetFactoryName(target));
  const name = { label: "name", value: stringLiteral(target.name) };
  switch (target.kind) {
    case "library":
    case "executable":
    case "test":
      return callExpression(callee, [name, { label: "dependencies", value: emptyArray() }], layout);
    case "binary": {
      checkBinaryLocation(target.urlOrPath, target.checksum);
      const specs: ArgumentSpec[] = [name];
      if (target.checksum) {
        specs.push({ label: "url", value: stringLiteral(target.urlOrPath) });
        specs.push({ label: "checksum", value: stringLiteral(target.checksum) });
      } else {
        specs.push({ label: "path", value: stringLiteral(target.urlOrPath) });
      }
      return callExpression(callee, specs, layout);
    }
    default:
      return assertNever(target, "target kind");
  }
}

/** `.library|.executable(name:, type:?, targets: [])`. */
export function productEntry(product: Pick<NewProduct, "name" | "type">, layout: CallLayout = {}): AST.CallExpression {
  const specs: ArgumentSpec[] = [{ label: "name", value: stringLiteral(product.name) }];
  const type = product.type;
  switch (type.kind) {
    case "executable":
      break;
    case "library":
      if (type.linkage !== "automatic") specs.push({ label: "type", value: implicitMember(type.linkage) });
      break;
    default:
      return assertNever(type, "product type");
  }
  specs.push({ label: "targets", value: emptyArray() });
  return callExpression(implicitMember(type.kind), specs, layout);
}

/** `.product(name: "N", package: "P")` target dependency entry. */
export function productDependencyEntry(name: string, packageName: string): AST.CallExpression {
  return callExpression(implicitMember("product"), [
    { label: "name", value: stringLiteral(name) },
    { label: "package", value: stringLiteral(packageName) },
  ]);
}
