/**
 * Tests for edit sessions and verification.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as ops from "./operations.js";
import { EditSession } from "./session.js";
import { makeDiag } from "./diagnostics.js";
import { ManifestEditError } from "./errors.js";
import type { EditTraceEvent } from "./trace.js";
import { verifyManifestSource } from "./verifier.js";

const MANIFEST = `// swift-tools-version:5.5
import PackageDescription

let package = Package(
    name: "Demo",
    targets: [
        .target(name: "Demo", dependencies: []),
    ]
)
`;

function open(source = MANIFEST, trace?: (e: EditTraceEvent) => void): EditSession {
  const opened = EditSession.open(source, trace ? { trace, sessionId: "test-session" } : {});
  assert.ok(opened.session, JSON.stringify(opened.diagnostics));
  return opened.session;
}

describe("verifyManifestSource", () => {
  it("accepts a loadable manifest", () => {
    const result = verifyManifestSource(MANIFEST);
    assert.equal(result.ok, true);
    if (result.ok) assert.equal(result.manifest.name, "Demo");
  });

  it("wraps load errors in a verification failure", () => {
    const result = verifyManifestSource(MANIFEST.replace('name: "Demo",', "name: 42,"));
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.failure.kind, "verification-failed");
    const [d] = result.failure.diagnostics;
    assert.equal(d.code, "E_VERIFY");
    assert.equal(d.message, "failed to verify edited manifest: Package 'name:' must be a string literal");
    assert.deepEqual(d.notes?.map((n) => n.code), ["E_MANIFEST_TYPE"]);
  });

  it("wraps parse errors in a verification failure", () => {
    const result = verifyManifestSource("let package = Package(");
    assert.equal(result.ok, false);
    if (!result.ok) assert.deepEqual(result.failure.diagnostics[0].notes?.map((n) => n.code), ["E_PARSE"]);
  });
});

describe("EditSession", () => {
  it("refuses to open a manifest that does not load", () => {
    const opened = EditSession.open('let package = Package(name: "Demo", targets: [.target(name: "A"), .target(name: "A")])');
    assert.equal(opened.session, undefined);
    assert.deepEqual(opened.diagnostics.map((d) => d.code), ["E_MANIFEST_DUPLICATE_TARGET"]);
  });

  it("commits a verified edit", () => {
    const session = open();
    const result = session.apply("add-target", (t) =>
      ops.addTarget(t, { kind: "test", name: "DemoTests", dependencyNames: [] })
    );
    assert.equal(result.ok, true);
    assert.equal(
      session.source,
      MANIFEST.replace("[]),\n", '[]),\n        .testTarget(name: "DemoTests", dependencies: []),\n')
    );
    assert.deepEqual(session.manifest.targets.map((t) => t.name), ["Demo", "DemoTests"]);
  });

  it("keeps the committed state when an operation fails", () => {
    const session = open();
    const result = session.apply("add-target-dependency", (t) =>
      ops.addTargetDependency(t, "Missing", { kind: "byName", name: "Demo" })
    );
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.failure.kind, "entity-not-found");
    assert.equal(session.source, MANIFEST);
  });

  it("rejects an edit whose result does not load", () => {
    const session = open();
    const result = session.apply("add-target", (t) =>
      ops.addTarget(t, { kind: "library", name: "Demo", includeTestTarget: false, dependencyNames: [] })
    );
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.failure.kind, "verification-failed");
      assert.deepEqual(result.failure.diagnostics[0].notes?.map((n) => n.code), ["E_MANIFEST_DUPLICATE_TARGET"]);
    }
    assert.equal(session.source, MANIFEST);
    assert.deepEqual(session.manifest.targets.map((t) => t.name), ["Demo"]);
  });

  it("converts thrown edit errors into failures", () => {
    const session = open();
    const result = session.apply("fails", () => {
      throw new ManifestEditError("precondition-failed", makeDiag("E_TEST", "nope"));
    });
    assert.deepEqual(result, {
      ok: false,
      failure: { kind: "precondition-failed", diagnostics: [{ code: "E_TEST", message: "nope" }] },
    });
  });

  it("lets other errors propagate", () => {
    const session = open();
    assert.throws(() =>
      session.apply("crashes", () => {
        throw new TypeError("boom");
      }),
      TypeError
    );
  });

  it("applies a sequence of edits on the committed tree", () => {
    const session = open();
    const first = session.apply("add-target", (t) =>
      ops.addTarget(t, { kind: "library", name: "Core", includeTestTarget: false, dependencyNames: [] })
    );
    const second = session.apply("add-target-dependency", (t) =>
      ops.addTargetDependency(t, "Demo", { kind: "byName", name: "Core" })
    );
    assert.equal(first.ok && second.ok, true);
    assert.deepEqual(session.manifest.targets[0].dependencies, [{ kind: "byName", name: "Core" }]);
  });

  it("emits trace events in order", () => {
    const events: EditTraceEvent[] = [];
    const session = open(MANIFEST, (e) => events.push(e));
    session.apply("add-target-dependency", (t) => ops.addTargetDependency(t, "Demo", { kind: "byName", name: "Other" }));
    assert.deepEqual(events.map((e) => e.event), ["edit_start", "verify_start", "verify_end", "edit_end"]);
    assert.ok(events.every((e) => e.sessionId === "test-session"));
    assert.deepEqual(events[3].data, { operation: "add-target-dependency", ok: true, bytes: session.source.length });
  });
});
