import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { compareVersions, formatVersion, parseLsRemote, parseVersion, pickDefaultRequirement } from "./resolver.js";

function version(text: string) {
  const v = parseVersion(text);
  assert.ok(v, `invalid version ${text}`);
  return v;
}

describe("parseVersion", () => {
  it("parses release, prerelease and build versions", () => {
    assert.deepEqual(parseVersion("1.2.3"), { major: 1, minor: 2, patch: 3, prerelease: [], build: [] });
    assert.deepEqual(parseVersion("v2.0.0-beta.1+exp"), { major: 2, minor: 0, patch: 0, prerelease: ["beta", "1"], build: ["exp"] });
  });

  it("rejects other tags", () => {
    assert.equal(parseVersion("release-1"), undefined);
    assert.equal(parseVersion("1.2"), undefined);
  });

  it("formats versions", () => {
    assert.equal(formatVersion(version("v1.2.3-rc.1")), "1.2.3-rc.1");
  });
});

describe("compareVersions", () => {
  it("orders by precedence", () => {
    const ordered = ["1.0.0-alpha", "1.0.0-alpha.1", "1.0.0-beta", "1.0.0-beta.2", "1.0.0-beta.11", "1.0.0", "1.0.1", "1.10.0", "2.0.0"];
    for (let i = 1; i < ordered.length; i++) {
      assert.ok(compareVersions(version(ordered[i - 1]), version(ordered[i])) < 0, `${ordered[i - 1]} < ${ordered[i]}`);
    }
  });

  it("ignores build metadata", () => {
    assert.equal(compareVersions(version("1.0.0+a"), version("1.0.0+b")), 0);
  });
});

describe("parseLsRemote", () => {
  it("splits tags and branches", () => {
    const output = [
      "aaa\trefs/heads/main",
      "bbb\trefs/heads/feature/x",
      "ccc\trefs/tags/1.0.0",
      "ddd\trefs/tags/1.0.0^{}",
      "eee\trefs/tags/2.0.0-beta",
      "",
    ].join("\n");
    assert.deepEqual(parseLsRemote(output), { tags: ["1.0.0", "2.0.0-beta"], branches: ["main", "feature/x"] });
  });
});

describe("pickDefaultRequirement", () => {
  it("picks the highest release", () => {
    const refs = { tags: ["1.0.0", "v1.4.2", "1.10.0", "2.0.0-beta", "nightly"], branches: ["main"] };
    assert.deepEqual(pickDefaultRequirement(refs), { kind: "upToNextMajor", version: "1.10.0" });
  });

  it("falls back to the highest prerelease", () => {
    const refs = { tags: ["0.1.0-alpha", "0.1.0-beta"], branches: ["main"] };
    assert.deepEqual(pickDefaultRequirement(refs), { kind: "upToNextMajor", version: "0.1.0-beta" });
  });

  it("falls back to a branch without version tags", () => {
    assert.deepEqual(pickDefaultRequirement({ tags: [], branches: ["develop", "main"] }), { kind: "branch", branch: "main" });
    assert.deepEqual(pickDefaultRequirement({ tags: ["nightly"], branches: ["develop"] }), { kind: "branch", branch: "master" });
  });

  it("prefers a configured branch that exists", () => {
    const refs = { tags: [], branches: ["develop", "main"] };
    assert.deepEqual(pickDefaultRequirement(refs, "develop"), { kind: "branch", branch: "develop" });
    assert.deepEqual(pickDefaultRequirement(refs, "trunk"), { kind: "branch", branch: "main" });
  });
});
