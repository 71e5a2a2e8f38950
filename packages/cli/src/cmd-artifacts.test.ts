/**
 * Tests for spm-edit artifacts command behavior.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runArtifacts } from "./cmd-artifacts.js";

const ARTIFACTS = [
  {
    packageRef: { identity: "alpha", name: "Alpha", location: "https://example.com/org/alpha.git" },
    targetName: "AlphaBinary",
    source: { type: "remote", url: "https://example.com/AlphaBinary.zip", checksum: "abc123" },
    path: ".build/artifacts/alpha/AlphaBinary.xcframework",
  },
  {
    packageRef: { identity: "beta", name: "Beta", location: "../Beta" },
    targetName: "BetaBinary",
    source: { type: "local" },
    path: "../Beta/BetaBinary.xcframework",
  },
];

async function captureArtifacts(
  file: string,
  opts: { json?: boolean; package?: string }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runArtifacts(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("spm-edit artifacts", () => {
  let tmpDir: string;
  let file: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "spm-edit-cli-artifacts-test-"));
    file = path.join(tmpDir, "artifacts.json");
    fs.writeFileSync(file, JSON.stringify(ARTIFACTS), "utf-8");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("lists artifacts one per line", async () => {
    const result = await captureArtifacts(file, {});
    assert.equal(result.code, 0);
    assert.equal(
      result.stdout,
      [
        "Alpha.AlphaBinary remote(url: https://example.com/AlphaBinary.zip, checksum: abc123) .build/artifacts/alpha/AlphaBinary.xcframework",
        "Beta.BetaBinary local ../Beta/BetaBinary.xcframework",
      ].join("\n")
    );
  });

  it("filters by package name as JSON", async () => {
    const result = await captureArtifacts(file, { json: true, package: "Beta" });
    assert.equal(result.code, 0);
    assert.deepEqual(JSON.parse(result.stdout), [ARTIFACTS[1]]);
  });

  it("says so when nothing matches", async () => {
    const result = await captureArtifacts(file, { package: "Gamma" });
    assert.equal(result.stdout, "No managed artifacts.");
  });

  it("returns exit 2 for a malformed file", async () => {
    fs.writeFileSync(file, JSON.stringify([{ targetName: "AlphaBinary" }]), "utf-8");
    const result = await captureArtifacts(file, { json: true });
    assert.equal(result.code, 2);
    assert.equal((JSON.parse(result.stderr) as { code: string }).code, "E_ARTIFACTS");
  });

  it("returns exit 4 when the file cannot be read", async () => {
    const result = await captureArtifacts(path.join(tmpDir, "missing.json"), { json: true });
    assert.equal(result.code, 4);
    assert.equal((JSON.parse(result.stderr) as { code: string }).code, "E_IO");
  });
});
