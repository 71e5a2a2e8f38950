/**
 * Edit session: owns the committed tree of one manifest and accepts an
 * edit only after the edited text reparses and loads.
 */
import { randomUUID } from "node:crypto";
import type * as AST from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { ManifestEditError, type EditFailure } from "./errors.js";
import { loadManifest, type Manifest } from "./manifest.js";
import { parseManifest } from "./parser.js";
import { printTree } from "./printer.js";
import { makeTracer, type Tracer, type TraceSink } from "./trace.js";
import { verifyManifestSource } from "./verifier.js";

export type TreeOperation = (tree: AST.SourceFile) => AST.SourceFile;

export type ApplyResult =
  | { ok: true; source: string; manifest: Manifest }
  | { ok: false; failure: EditFailure };

export interface SessionOptions {
  file?: string;
  trace?: TraceSink;
  sessionId?: string;
}

export interface OpenResult {
  session?: EditSession;
  diagnostics: Diagnostic[];
}

export class EditSession {
  readonly file: string;
  private committedTree: AST.SourceFile;
  private committedSource: string;
  private committedManifest: Manifest;
  private emit: Tracer;

  private constructor(file: string, tree: AST.SourceFile, source: string, manifest: Manifest, options: SessionOptions) {
    this.file = file;
    this.committedTree = tree;
    this.committedSource = source;
    this.committedManifest = manifest;
    this.emit = makeTracer(options.sessionId ?? randomUUID(), options.trace);
  }

  /** Parses and loads `source`; a session only ever holds a loadable manifest. */
  static open(source: string, options: SessionOptions = {}): OpenResult {
    const file = options.file ?? "Package.swift";
    const parsed = parseManifest(source, file);
    if (!parsed.tree) return { diagnostics: parsed.diagnostics };
    const loaded = loadManifest(parsed.tree, source);
    if (!loaded.manifest) return { diagnostics: loaded.diagnostics };
    return { session: new EditSession(file, parsed.tree, source, loaded.manifest, options), diagnostics: [] };
  }

  get tree(): AST.SourceFile {
    return this.committedTree;
  }

  get source(): string {
    return this.committedSource;
  }

  get manifest(): Manifest {
    return this.committedManifest;
  }

  /**
   * Runs `operation` on the committed tree and commits the result once it
   * verifies. On failure the committed state is unchanged.
   */
  apply(name: string, operation: TreeOperation): ApplyResult {
    this.emit("edit_start", { operation: name });

    let candidate: AST.SourceFile;
    try {
      candidate = operation(this.committedTree);
    } catch (e) {
      if (!(e instanceof ManifestEditError)) throw e;
      this.emit("edit_end", { operation: name, ok: false, kind: e.kind });
      return { ok: false, failure: e.toFailure() };
    }

    const text = printTree(candidate);
    this.emit("verify_start", { operation: name });
    const verified = verifyManifestSource(text, this.file);
    this.emit("verify_end", { operation: name, ok: verified.ok });
    if (!verified.ok) {
      this.emit("edit_end", { operation: name, ok: false, kind: verified.failure.kind });
      return verified;
    }

    this.committedTree = verified.tree;
    this.committedSource = text;
    this.committedManifest = verified.manifest;
    this.emit("edit_end", { operation: name, ok: true, bytes: text.length });
    return { ok: true, source: text, manifest: verified.manifest };
  }
}
