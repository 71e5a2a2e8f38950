/**
 * spm-edit add-target / add-binary-target
 */
import type { NewTarget } from "@spm-edit/core";
import { emitCliError, runEdit, type EditCommandOptions } from "./cmd-edit.js";

export const TARGET_TYPES = ["library", "executable", "test"] as const;

export type TargetTypeOption = (typeof TARGET_TYPES)[number];

function isTargetType(value: string): value is TargetTypeOption {
  return TARGET_TYPES.some((t) => t === value);
}

export async function runAddTarget(
  name: string,
  opts: EditCommandOptions & { type?: string; dependencies?: string[]; testTarget?: boolean }
): Promise<number> {
  const type = opts.type ?? "library";
  if (!isTargetType(type)) {
    emitCliError("E_USAGE", `unknown target type '${type}', expected one of: ${TARGET_TYPES.join(", ")}`, !!opts.pretty);
    return 1;
  }

  const dependencyNames = opts.dependencies ?? [];
  let target: NewTarget;
  switch (type) {
    case "library":
      target = { kind: "library", name, includeTestTarget: opts.testTarget !== false, dependencyNames };
      break;
    case "executable":
      target = { kind: "executable", name, dependencyNames };
      break;
    case "test":
      target = { kind: "test", name, dependencyNames };
      break;
  }
  return runEdit(opts, (editor) => editor.addTarget(target));
}

export async function runAddBinaryTarget(
  name: string,
  urlOrPath: string,
  opts: EditCommandOptions & { checksum?: string }
): Promise<number> {
  return runEdit(opts, (editor) => editor.addBinaryTarget(name, urlOrPath, opts.checksum));
}
