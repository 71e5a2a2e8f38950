import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { ManifestEditError } from "./errors.js";
import type { DependencyRequirement } from "./model.js";
import { printTree } from "./printer.js";
import {
  checkBinaryLocation,
  packageDependencyEntry,
  productDependencyEntry,
  productEntry,
  targetEntry,
} from "./synthesizers.js";

const URL = "https://example.com/org/alpha.git";

function dependency(requirement: DependencyRequirement, name?: string): string {
  const location = requirement.kind === "localPackage" ? "../Local" : URL;
  return printTree(packageDependencyEntry(name === undefined ? { location, requirement } : { name, location, requirement }));
}

function failureCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof ManifestEditError) return e.diagnostics[0]?.code;
    throw e;
  }
  return undefined;
}

describe("packageDependencyEntry", () => {
  it("writes each requirement form", () => {
    assert.equal(dependency({ kind: "upToNextMajor", version: "1.2.0" }), `.package(url: "${URL}", from: "1.2.0")`);
    assert.equal(dependency({ kind: "upToNextMinor", version: "1.2.0" }), `.package(url: "${URL}", .upToNextMinor(from: "1.2.0"))`);
    assert.equal(dependency({ kind: "exact", version: "1.0.0" }), `.package(url: "${URL}", .exact("1.0.0"))`);
    assert.equal(dependency({ kind: "branch", branch: "main" }), `.package(url: "${URL}", .branch("main"))`);
    assert.equal(dependency({ kind: "revision", revision: "abc123" }), `.package(url: "${URL}", .revision("abc123"))`);
    assert.equal(dependency({ kind: "range", lower: "1.0.0", upper: "2.0.0" }), `.package(url: "${URL}", "1.0.0"..<"2.0.0")`);
    assert.equal(dependency({ kind: "closedRange", lower: "1.0.0", upper: "1.9.0" }), `.package(url: "${URL}", "1.0.0"..."1.9.0")`);
  });

  it("writes a local package as a path", () => {
    assert.equal(dependency({ kind: "localPackage" }), '.package(path: "../Local")');
  });

  it("writes the name first when given", () => {
    assert.equal(dependency({ kind: "exact", version: "1.0.0" }, "Alpha"), `.package(name: "Alpha", url: "${URL}", .exact("1.0.0"))`);
  });

  it("puts each argument on its own line with a multi-line layout", () => {
    const entry = packageDependencyEntry(
      { location: URL, requirement: { kind: "upToNextMajor", version: "1.0.0" } },
      { argumentIndent: "    ", closingIndent: "" }
    );
    assert.equal(printTree(entry), `.package(\n    url: "${URL}",\n    from: "1.0.0"\n)`);
  });
});

describe("targetEntry", () => {
  it("writes regular, executable and test targets", () => {
    assert.equal(
      printTree(targetEntry({ kind: "library", name: "Foo", includeTestTarget: false, dependencyNames: [] })),
      '.target(name: "Foo", dependencies: [])'
    );
    assert.equal(
      printTree(targetEntry({ kind: "executable", name: "Tool", dependencyNames: [] })),
      '.target(name: "Tool", dependencies: [])'
    );
    assert.equal(
      printTree(targetEntry({ kind: "test", name: "FooTests", dependencyNames: [] })),
      '.testTarget(name: "FooTests", dependencies: [])'
    );
  });

  it("writes remote and local binary targets", () => {
    assert.equal(
      printTree(targetEntry({ kind: "binary", name: "Bin", urlOrPath: "https://example.com/Bin.zip", checksum: "abc123" })),
      '.binaryTarget(name: "Bin", url: "https://example.com/Bin.zip", checksum: "abc123")'
    );
    assert.equal(
      printTree(targetEntry({ kind: "binary", name: "Bin", urlOrPath: "Frameworks/Bin.xcframework" })),
      '.binaryTarget(name: "Bin", path: "Frameworks/Bin.xcframework")'
    );
  });

  it("attaches the closing parenthesis when the layout has no closing indent", () => {
    const entry = targetEntry(
      { kind: "test", name: "FooTests", dependencyNames: [] },
      { argumentIndent: "            " }
    );
    assert.equal(printTree(entry), '.testTarget(\n            name: "FooTests",\n            dependencies: [])');
  });
});

describe("checkBinaryLocation", () => {
  it("requires a checksum for a remote url", () => {
    assert.equal(failureCode(() => checkBinaryLocation("https://example.com/Bin.zip", undefined)), "E_MISSING_CHECKSUM");
  });

  it("rejects a checksum for a local path", () => {
    assert.equal(failureCode(() => checkBinaryLocation("Bin.xcframework", "abc123")), "E_UNEXPECTED_CHECKSUM");
  });

  it("accepts matching pairs", () => {
    assert.equal(failureCode(() => checkBinaryLocation("https://example.com/Bin.zip", "abc123")), undefined);
    assert.equal(failureCode(() => checkBinaryLocation("Bin.xcframework", undefined)), undefined);
    assert.equal(failureCode(() => checkBinaryLocation("Bin.xcframework", "")), undefined);
  });

  it("treats an empty checksum as missing", () => {
    assert.equal(failureCode(() => checkBinaryLocation("https://example.com/Bin.zip", "")), "E_MISSING_CHECKSUM");
    assert.equal(
      printTree(targetEntry({ kind: "binary", name: "Bin", urlOrPath: "Bin.xcframework", checksum: "" })),
      '.binaryTarget(name: "Bin", path: "Bin.xcframework")'
    );
  });
});

describe("productEntry", () => {
  it("writes the library type only when it is not automatic", () => {
    assert.equal(
      printTree(productEntry({ name: "Lib", type: { kind: "library", linkage: "automatic" } })),
      '.library(name: "Lib", targets: [])'
    );
    assert.equal(
      printTree(productEntry({ name: "Lib", type: { kind: "library", linkage: "static" } })),
      '.library(name: "Lib", type: .static, targets: [])'
    );
  });

  it("writes executables", () => {
    assert.equal(printTree(productEntry({ name: "tool", type: { kind: "executable" } })), '.executable(name: "tool", targets: [])');
  });
});

describe("productDependencyEntry", () => {
  it("writes a product of a package", () => {
    assert.equal(printTree(productDependencyEntry("Parser", "alpha")), '.product(name: "Parser", package: "alpha")');
  });
});
