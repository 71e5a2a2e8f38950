import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigError, DEFAULT_CONFIG, resolveEditorConfig } from "./config.js";

describe("resolveEditorConfig", () => {
  let tmpDir: string;
  let projectDir: string;
  let homeDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "spm-edit-config-"));
    projectDir = path.join(tmpDir, "project");
    homeDir = path.join(tmpDir, "home");
    fs.mkdirSync(projectDir);
    fs.mkdirSync(path.join(homeDir, ".spm-edit"), { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("uses defaults without config files", () => {
    assert.deepEqual(resolveEditorConfig(projectDir, homeDir), { config: DEFAULT_CONFIG, source: "default", path: null });
  });

  it("reads the user config", () => {
    const userPath = path.join(homeDir, ".spm-edit", "config.json");
    fs.writeFileSync(userPath, JSON.stringify({ version: 1, indent: "  " }));
    assert.deepEqual(resolveEditorConfig(projectDir, homeDir), {
      config: { version: 1, writeTemplates: true, indent: "  " },
      source: "user",
      path: userPath,
    });
  });

  it("prefers the project config", () => {
    fs.writeFileSync(path.join(homeDir, ".spm-edit", "config.json"), JSON.stringify({ version: 1, indent: "  " }));
    const projectPath = path.join(projectDir, ".spm-edit.json");
    fs.writeFileSync(projectPath, JSON.stringify({ version: 1, writeTemplates: false, defaultBranch: "develop" }));
    const resolved = resolveEditorConfig(projectDir, homeDir);
    assert.equal(resolved.source, "project");
    assert.deepEqual(resolved.config, { version: 1, writeTemplates: false, defaultBranch: "develop" });
  });

  it("rejects malformed JSON", () => {
    fs.writeFileSync(path.join(projectDir, ".spm-edit.json"), "{ nope");
    assert.throws(() => resolveEditorConfig(projectDir, homeDir), ConfigError);
  });

  it("rejects an invalid shape", () => {
    fs.writeFileSync(path.join(projectDir, ".spm-edit.json"), JSON.stringify({ indent: "xx" }));
    assert.throws(
      () => resolveEditorConfig(projectDir, homeDir),
      (e: unknown) =>
        e instanceof ConfigError &&
        e.code === "E_CONFIG" &&
        e.message.includes("version: config requires a 'version' number") &&
        e.message.includes("indent: indent must be made of spaces or tabs")
    );
  });
});
