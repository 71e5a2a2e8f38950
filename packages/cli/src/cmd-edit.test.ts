/**
 * Tests for the manifest editing commands.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { VersionLookupError } from "@spm-edit/core";
import type { RemoteRefs, VersionResolver } from "@spm-edit/core";
import { runAddDependency, runAddTargetDependency } from "./cmd-dependency.js";
import { exitCodeFor } from "./cmd-edit.js";
import { runAddProduct, runAddProductTarget } from "./cmd-product.js";
import { runAddBinaryTarget, runAddTarget } from "./cmd-target.js";

const HEADER = "// swift-tools-version:5.5\nimport PackageDescription\n\n";

const MANIFEST = `${HEADER}let package = Package(
    name: "Demo",
    targets: [
        .target(
            name: "Demo",
            dependencies: []),
    ]
)
`;

class FakeResolver implements VersionResolver {
  constructor(private readonly refs: RemoteRefs) {}

  listRefs(): RemoteRefs {
    return this.refs;
  }
}

class OfflineResolver implements VersionResolver {
  listRefs(url: string): RemoteRefs {
    throw new VersionLookupError(`could not list versions of '${url}': offline`);
  }
}

async function capture(run: () => Promise<number>): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await run();
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("spm-edit edit commands", () => {
  let tmpDir: string;
  let packageDir: string;
  let homeDir: string;
  let manifestPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "spm-edit-cli-test-"));
    packageDir = path.join(tmpDir, "Demo");
    homeDir = path.join(tmpDir, "home");
    fs.mkdirSync(packageDir);
    fs.mkdirSync(homeDir);
    manifestPath = path.join(packageDir, "Package.swift");
    fs.writeFileSync(manifestPath, MANIFEST, "utf-8");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function base(extra: { pretty?: boolean; trace?: string; resolver?: VersionResolver } = {}) {
    return { manifest: manifestPath, homeDir, resolver: new FakeResolver({ tags: ["1.2.0"], branches: ["main"] }), ...extra };
  }

  function manifestText(): string {
    return fs.readFileSync(manifestPath, "utf-8");
  }

  describe("add-dependency", () => {
    it("adds a dependency and prints a JSON summary", async () => {
      const result = await capture(() => runAddDependency("https://example.com/org/alpha.git", { ...base(), exact: "2.0.0" }));
      assert.equal(result.code, 0);
      assert.equal(result.stdout, JSON.stringify({ ok: true, package: "Demo", written: [manifestPath] }));
      assert.equal(result.stderr, "");
      assert.ok(manifestText().includes('        .package(url: "https://example.com/org/alpha.git", .exact("2.0.0")),\n'));
    });

    it("resolves the requirement when none is given", async () => {
      const result = await capture(() => runAddDependency("https://example.com/org/alpha.git", base()));
      assert.equal(result.code, 0);
      assert.ok(manifestText().includes('        .package(url: "https://example.com/org/alpha.git", from: "1.2.0"),\n'));
    });

    it("writes version ranges", async () => {
      const result = await capture(() =>
        runAddDependency("https://example.com/org/alpha.git", { ...base(), from: "1.0.0", to: "1.5.0" })
      );
      assert.equal(result.code, 0);
      assert.ok(manifestText().includes('.package(url: "https://example.com/org/alpha.git", "1.0.0"..<"1.5.0"),'));
    });

    it("rejects conflicting requirement options with exit code 1", async () => {
      const result = await capture(() =>
        runAddDependency("https://example.com/org/alpha.git", { ...base(), exact: "1.0.0", branch: "main" })
      );
      assert.equal(result.code, 1);
      assert.equal(JSON.parse(result.stderr).code, "E_USAGE");
      assert.equal(manifestText(), MANIFEST);
    });

    it("fails with exit code 3 on a duplicate identity", async () => {
      assert.equal((await capture(() => runAddDependency("https://example.com/org/alpha.git", { ...base(), branch: "main" }))).code, 0);
      const written = manifestText();
      const result = await capture(() => runAddDependency("https://example.com/org/alpha.git", { ...base(), branch: "main" }));
      assert.equal(result.code, 3);
      assert.equal(
        result.stderr,
        JSON.stringify([{ code: "E_DUPLICATE_DEPENDENCY", message: "'https://example.com/org/alpha.git' is already a package dependency" }])
      );
      assert.equal(manifestText(), written);
    });

    it("fails with exit code 4 when versions cannot be listed", async () => {
      const result = await capture(() =>
        runAddDependency("https://example.com/org/alpha.git", base({ resolver: new OfflineResolver() }))
      );
      assert.equal(result.code, 4);
      assert.deepEqual(JSON.parse(result.stderr), {
        code: "E_RESOLVE",
        message: "could not list versions of 'https://example.com/org/alpha.git': offline",
      });
      assert.equal(manifestText(), MANIFEST);
    });
  });

  describe("add-target", () => {
    it("lists written files with --pretty", async () => {
      const result = await capture(() => runAddTarget("Tool", { ...base({ pretty: true }), type: "executable" }));
      assert.equal(result.code, 0);
      assert.equal(
        result.stdout,
        [`Updated ${manifestPath}`, `Updated ${path.join(packageDir, "Sources", "Tool", "main.swift")}`].join("\n")
      );
    });

    it("adds a test target for libraries unless disabled", async () => {
      assert.equal((await capture(() => runAddTarget("Foo", base()))).code, 0);
      assert.ok(manifestText().includes('name: "FooTests"'));
      assert.equal((await capture(() => runAddTarget("Bar", { ...base(), testTarget: false, dependencies: ["Foo"] }))).code, 0);
      assert.equal(manifestText().includes('name: "BarTests"'), false);
      assert.ok(manifestText().includes('        .target(\n            name: "Bar",\n            dependencies: ["Foo"]),\n'));
    });

    it("rejects an unknown type", async () => {
      const result = await capture(() => runAddTarget("Foo", { ...base(), type: "plugin" }));
      assert.equal(result.code, 1);
      assert.deepEqual(JSON.parse(result.stderr), {
        code: "E_USAGE",
        message: "unknown target type 'plugin', expected one of: library, executable, test",
      });
    });

    it("reports a duplicate target in pretty form", async () => {
      const result = await capture(() => runAddTarget("Demo", { ...base({ pretty: true }), testTarget: false }));
      assert.equal(result.code, 3);
      assert.equal(result.stderr, "error[E_DUPLICATE_TARGET]: a target named 'Demo' already exists\n  --> <unknown>");
    });
  });

  describe("add-binary-target", () => {
    it("requires a checksum for remote archives", async () => {
      const result = await capture(() => runAddBinaryTarget("Bin", "https://example.com/Bin.zip", base()));
      assert.equal(result.code, 3);
      assert.equal(JSON.parse(result.stderr)[0].code, "E_MISSING_CHECKSUM");
      assert.equal(manifestText(), MANIFEST);
    });

    it("adds a remote binary target with a checksum", async () => {
      const result = await capture(() => runAddBinaryTarget("Bin", "https://example.com/Bin.zip", { ...base(), checksum: "abc123" }));
      assert.equal(result.code, 0);
      assert.ok(manifestText().includes('            checksum: "abc123"),\n'));
    });
  });

  describe("add-target-dependency", () => {
    it("writes a JSONL trace", async () => {
      const tracePath = path.join(tmpDir, "trace.jsonl");
      const result = await capture(() => runAddTargetDependency("Demo", "Parser", { ...base({ trace: tracePath }), package: "alpha" }));
      assert.equal(result.code, 0);
      assert.ok(manifestText().includes('.product(name: "Parser", package: "alpha")'));
      const events = fs
        .readFileSync(tracePath, "utf-8")
        .trim()
        .split("\n")
        .map((line) => JSON.parse(line).event);
      assert.deepEqual(events, ["edit_start", "verify_start", "verify_end", "edit_end", "write"]);
    });

    it("fails with exit code 3 for an unknown target", async () => {
      const result = await capture(() => runAddTargetDependency("Nope", "Demo", base()));
      assert.equal(result.code, 3);
      assert.equal(JSON.parse(result.stderr)[0].code, "E_MISSING_TARGET");
    });

    it("fails with exit code 4 when the trace file cannot be opened", async () => {
      const result = await capture(() =>
        runAddTargetDependency("Demo", "Other", base({ trace: path.join(tmpDir, "missing", "trace.jsonl") }))
      );
      assert.equal(result.code, 4);
      const diag = JSON.parse(result.stderr);
      assert.equal(diag.code, "E_IO");
      assert.ok(diag.message.startsWith("Error opening trace file: "));
      assert.equal(manifestText(), MANIFEST);
    });
  });

  describe("add-product and add-product-target", () => {
    it("adds a product and then a target to it", async () => {
      assert.equal((await capture(() => runAddProduct("DemoKit", { ...base(), type: "dynamic-library" }))).code, 0);
      assert.ok(manifestText().includes('        .library(\n            name: "DemoKit",\n            type: .dynamic,\n            targets: []),\n'));
      assert.equal((await capture(() => runAddProductTarget("DemoKit", "Demo", base()))).code, 0);
      assert.ok(manifestText().includes('targets: ["Demo"]),\n'));
    });

    it("rejects an unknown product type", async () => {
      const result = await capture(() => runAddProduct("DemoKit", { ...base(), type: "plugin" }));
      assert.equal(result.code, 1);
      assert.equal(JSON.parse(result.stderr).code, "E_USAGE");
    });

    it("fails with exit code 3 for an unknown product", async () => {
      const result = await capture(() => runAddProductTarget("Nope", "Demo", base()));
      assert.equal(result.code, 3);
      assert.deepEqual(JSON.parse(result.stderr), [{ code: "E_MISSING_PRODUCT", message: "couldn't find product 'Nope'" }]);
    });
  });

  describe("manifest and config problems", () => {
    it("fails with exit code 2 for a manifest that does not load", async () => {
      fs.writeFileSync(manifestPath, `${HEADER}let package = Package(targets: [])\n`);
      const result = await capture(() => runAddTargetDependency("Demo", "Other", base()));
      assert.equal(result.code, 2);
      assert.equal(JSON.parse(result.stderr)[0].code, "E_MANIFEST_MISSING_ARGUMENT");
    });

    it("fails with exit code 4 for a missing manifest", async () => {
      fs.rmSync(manifestPath);
      const result = await capture(() => runAddTargetDependency("Demo", "Other", base()));
      assert.equal(result.code, 4);
      assert.equal(JSON.parse(result.stderr).code, "E_IO");
    });

    it("fails with exit code 4 for an invalid config file", async () => {
      fs.writeFileSync(path.join(packageDir, ".spm-edit.json"), "{ nope");
      const result = await capture(() => runAddTargetDependency("Demo", "Other", base()));
      assert.equal(result.code, 4);
      assert.equal(JSON.parse(result.stderr).code, "E_CONFIG");
      assert.equal(manifestText(), MANIFEST);
    });

    it("applies the project config", async () => {
      fs.writeFileSync(path.join(packageDir, ".spm-edit.json"), JSON.stringify({ version: 1, writeTemplates: false }));
      const result = await capture(() => runAddTarget("Foo", { ...base(), testTarget: false }));
      assert.equal(result.code, 0);
      assert.equal(fs.existsSync(path.join(packageDir, "Sources", "Foo")), false);
    });
  });

  it("maps failure kinds to exit codes", () => {
    assert.equal(exitCodeFor("manifest-invalid"), 2);
    assert.equal(exitCodeFor("structural-ambiguous"), 3);
    assert.equal(exitCodeFor("verification-failed"), 3);
  });
});
