/**
 * Shared driver for the manifest editing commands: resolves the config,
 * opens the trace file, runs one PackageEditor call and maps its result to
 * an exit code.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import {
  ConfigError,
  formatDiagnostic,
  formatDiagnostics,
  PackageEditor,
  resolveEditorConfig,
  VersionLookupError,
} from "@spm-edit/core";
import type { EditFailureKind, EditResult, EditTraceEvent, VersionResolver } from "@spm-edit/core";

export interface EditCommandOptions {
  manifest?: string;
  pretty?: boolean;
  trace?: string;
  /** Directory searched for `.spm-edit.json`; defaults to the manifest's directory. */
  cwd?: string;
  homeDir?: string;
  resolver?: VersionResolver;
}

export class UsageError extends Error {
  code = "E_USAGE";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export function exitCodeFor(kind: EditFailureKind): number {
  switch (kind) {
    case "manifest-invalid":
      return 2;
    case "structural-not-found":
    case "structural-ambiguous":
    case "entity-not-found":
    case "precondition-failed":
    case "verification-failed":
      return 3;
  }
}

export function emitCliError(code: string, message: string, pretty: boolean): void {
  console.error(formatDiagnostic({ code, message }, pretty));
}

function printSuccess(result: Extract<EditResult, { ok: true }>, pretty: boolean): void {
  if (pretty) {
    for (const file of result.writtenFiles) {
      console.log(`Updated ${file}`);
    }
    return;
  }
  console.log(JSON.stringify({ ok: true, package: result.manifest.name, written: result.writtenFiles }));
}

export async function runEdit(
  opts: EditCommandOptions,
  action: (editor: PackageEditor) => EditResult
): Promise<number> {
  const pretty = !!opts.pretty;
  const manifestPath = path.resolve(opts.manifest ?? "Package.swift");

  let editor: PackageEditor;
  let traceFd: number | null = null;
  try {
    const resolved = resolveEditorConfig(opts.cwd ?? path.dirname(manifestPath), opts.homeDir);
    if (opts.trace) {
      traceFd = fs.openSync(opts.trace, "w");
    }
    const fd = traceFd;
    editor = new PackageEditor({
      manifestPath,
      config: resolved.config,
      ...(opts.resolver ? { resolver: opts.resolver } : {}),
      ...(fd !== null
        ? {
            trace: (event: EditTraceEvent) => {
              try {
                fs.writeSync(fd, JSON.stringify(event) + "\n");
              } catch (e) {
                const msg = e instanceof Error ? e.message : String(e);
                throw new CliIoError(`Error writing trace file: ${msg}`);
              }
            },
          }
        : {}),
    });
  } catch (e) {
    if (e instanceof ConfigError) {
      emitCliError(e.code, e.message, pretty);
      return 4;
    }
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error opening trace file: ${msg}`, pretty);
    return 4;
  }

  try {
    const result = action(editor);
    if (!result.ok) {
      console.error(formatDiagnostics(result.failure.diagnostics, pretty));
      return exitCodeFor(result.failure.kind);
    }
    printSuccess(result, pretty);
    return 0;
  } catch (e) {
    if (e instanceof VersionLookupError) {
      emitCliError(e.code, e.message, pretty);
      return 4;
    }
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message, pretty);
      return 4;
    }
    const err = e instanceof Error ? e : new Error(String(e));
    if ("code" in err && typeof err.code === "string" && err.code.startsWith("E") && "path" in err) {
      emitCliError("E_IO", err.message, pretty);
      return 4;
    }
    emitCliError("E_INTERNAL", err.message, pretty);
    return 4;
  } finally {
    if (traceFd !== null) {
      try {
        fs.closeSync(traceFd);
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        emitCliError("E_IO", `Error closing trace file: ${msg}`, pretty);
      }
    }
  }
}
