/**
 * Edit failure classification.
 */
import type { Diagnostic } from "./diagnostics.js";

export type EditFailureKind =
  | "manifest-invalid"
  | "structural-not-found"
  | "structural-ambiguous"
  | "entity-not-found"
  | "precondition-failed"
  | "verification-failed";

export interface EditFailure {
  kind: EditFailureKind;
  diagnostics: Diagnostic[];
}

/**
 * Raised by tree operations for conditions the caller can act on.
 * Sessions and the package editor turn it into an `EditFailure` value.
 */
export class ManifestEditError extends Error {
  kind: EditFailureKind;
  diagnostics: Diagnostic[];

  constructor(kind: EditFailureKind, diagnostic: Diagnostic | Diagnostic[]) {
    const diagnostics = Array.isArray(diagnostic) ? diagnostic : [diagnostic];
    super(diagnostics.map((d) => d.message).join("; "));
    this.name = "ManifestEditError";
    this.kind = kind;
    this.diagnostics = diagnostics;
  }

  toFailure(): EditFailure {
    return { kind: this.kind, diagnostics: this.diagnostics };
  }
}

/**
 * The engine broke one of its own guarantees, e.g. it cannot find an
 * argument it inserted a moment ago. Never converted into a diagnostic.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}
