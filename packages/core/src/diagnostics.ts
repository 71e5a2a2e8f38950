/**
 * Diagnostics for parse, load and edit errors.
 */
import type { Span, Token } from "./ast.js";

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
  /** Underlying diagnostics, e.g. the load errors behind a rejected edit. */
  notes?: Diagnostic[];
}

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  const d: Diagnostic = { code, message };
  if (span) d.span = span;
  if (hint) d.hint = hint;
  return d;
}

export function withNotes(d: Diagnostic, notes: Diagnostic[]): Diagnostic {
  return notes.length > 0 ? { ...d, notes } : d;
}

/** Span of a parsed token; synthesized tokens have none. */
export function tokenSpan(token: Token | undefined): Span | undefined {
  return token?.span;
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
    : "<unknown>";
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  for (const note of d.notes ?? []) {
    const noteLoc = note.span ? ` (${note.span.startLine}:${note.span.startCol})` : "";
    out += `\n  note[${note.code}]: ${note.message}${noteLoc}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
