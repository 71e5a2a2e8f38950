import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as AST from "./ast.js";
import { isInterpolated, quote, stringValue } from "./strings.js";

function literal(text: string): AST.StringLiteral {
  return { kind: "StringLiteral", token: AST.makeToken("StringLit", text) };
}

describe("String literals", () => {
  it("reads plain values", () => {
    assert.equal(stringValue(literal('"Demo"')), "Demo");
    assert.equal(stringValue(literal('""')), "");
  });

  it("unescapes escape sequences", () => {
    assert.equal(stringValue(literal('"a\\"b\\\\c\\n"')), 'a"b\\c\n');
    assert.equal(stringValue(literal('"\\u{1F600}"')), "\u{1F600}");
  });

  it("treats interpolations as having no value", () => {
    const interpolated = literal('"v\\(major)"');
    assert.ok(isInterpolated(interpolated));
    assert.equal(stringValue(interpolated), undefined);
  });

  it("does not mistake an escaped backslash for an interpolation", () => {
    const escaped = literal('"a\\\\(b)"');
    assert.equal(isInterpolated(escaped), false);
    assert.equal(stringValue(escaped), "a\\(b)");
  });

  it("returns undefined for other expressions", () => {
    assert.equal(stringValue({ kind: "NilLiteral", token: AST.makeToken("Nil", "nil") }), undefined);
  });

  it("quotes values so they read back unchanged", () => {
    assert.equal(quote('say "hi"\\'), '"say \\"hi\\"\\\\"');
    assert.equal(stringValue(literal(quote("tab\there"))), "tab\there");
  });
});
