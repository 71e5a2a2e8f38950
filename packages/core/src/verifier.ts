/**
 * Verification of edited manifest text: a fresh parse followed by a full
 * semantic load. Nothing is written.
 */
import type * as AST from "./ast.js";
import { makeDiag, withNotes } from "./diagnostics.js";
import type { EditFailure } from "./errors.js";
import { loadManifest, type Manifest } from "./manifest.js";
import { parseManifest } from "./parser.js";

export type VerifyResult =
  | { ok: true; tree: AST.SourceFile; manifest: Manifest }
  | { ok: false; failure: EditFailure };

export function verifyManifestSource(source: string, file = "Package.swift"): VerifyResult {
  const parsed = parseManifest(source, file);
  const loaded = parsed.tree ? loadManifest(parsed.tree, source) : undefined;
  if (parsed.tree && loaded?.manifest) {
    return { ok: true, tree: parsed.tree, manifest: loaded.manifest };
  }
  const underlying = loaded ? loaded.diagnostics : parsed.diagnostics;
  return {
    ok: false,
    failure: {
      kind: "verification-failed",
      diagnostics: [
        withNotes(
          makeDiag("E_VERIFY", `failed to verify edited manifest: ${underlying.map((d) => d.message).join("; ")}`),
          underlying
        ),
      ],
    },
  };
}
