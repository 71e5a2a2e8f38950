import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { ZodError } from "zod";
import { describeArtifact, ManagedArtifacts, type ManagedArtifact } from "./artifacts.js";

function artifact(location: string, targetName: string, name = "alpha"): ManagedArtifact {
  return {
    packageRef: { identity: name.toLowerCase(), name, location },
    targetName,
    source: { type: "remote", url: `https://example.com/${targetName}.zip`, checksum: "abc123" },
    path: `.build/artifacts/${name}/${targetName}.xcframework`,
  };
}

describe("ManagedArtifacts", () => {
  it("looks artifacts up by package location and by package name", () => {
    const a = artifact("https://example.com/alpha.git", "Bin");
    const artifacts = new ManagedArtifacts([a]);
    assert.equal(artifacts.byPackageLocation("https://example.com/alpha.git", "Bin"), a);
    assert.equal(artifacts.byPackageName("alpha", "Bin"), a);
    assert.equal(artifacts.byPackageName("alpha", "Other"), undefined);
  });

  it("replaces an artifact with the same location and target", () => {
    const artifacts = new ManagedArtifacts([artifact("loc", "Bin")]);
    const replacement = { ...artifact("loc", "Bin"), path: "other/Bin.xcframework" };
    artifacts.add(replacement);
    assert.equal(artifacts.size, 1);
    assert.equal(artifacts.byPackageLocation("loc", "Bin"), replacement);
  });

  it("removes artifacts", () => {
    const artifacts = new ManagedArtifacts([artifact("loc", "A"), artifact("loc", "B")]);
    assert.equal(artifacts.remove("loc", "A"), true);
    assert.equal(artifacts.remove("loc", "A"), false);
    assert.equal(artifacts.remove("elsewhere", "B"), false);
    assert.deepEqual([...artifacts].map((a) => a.targetName), ["B"]);
  });

  it("round-trips through JSON", () => {
    const artifacts = new ManagedArtifacts([artifact("loc-a", "A"), artifact("loc-b", "B", "beta")]);
    const restored = ManagedArtifacts.fromJSON(JSON.parse(JSON.stringify(artifacts)));
    assert.deepEqual(restored.toJSON(), artifacts.toJSON());
  });

  it("rejects malformed JSON data", () => {
    assert.throws(() => ManagedArtifacts.fromJSON([{ targetName: "A" }]), ZodError);
    assert.throws(() => ManagedArtifacts.fromJSON([{ ...artifact("loc", "A"), source: { type: "remote", url: "u" } }]), ZodError);
  });

  it("describes artifacts", () => {
    assert.equal(
      describeArtifact(artifact("loc", "Bin")),
      "alpha.Bin remote(url: https://example.com/Bin.zip, checksum: abc123) .build/artifacts/alpha/Bin.xcframework"
    );
    assert.equal(
      describeArtifact({ ...artifact("loc", "Bin"), source: { type: "local" } }),
      "alpha.Bin local .build/artifacts/alpha/Bin.xcframework"
    );
  });
});
