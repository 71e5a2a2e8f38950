/**
 * spm-edit add-dependency / add-target-dependency
 */
import { parseVersion } from "@spm-edit/core";
import type { DependencyRequirement, NewTargetDependency } from "@spm-edit/core";
import { emitCliError, runEdit, UsageError, type EditCommandOptions } from "./cmd-edit.js";

export interface RequirementOptions {
  exact?: string;
  revision?: string;
  branch?: string;
  from?: string;
  upToNextMinorFrom?: string;
  to?: string;
}

function checkVersion(option: string, value: string): string {
  if (!parseVersion(value)) {
    throw new UsageError(`--${option}: '${value}' is not a semantic version`);
  }
  return value;
}

/**
 * Builds the requirement selected by the command line options, or
 * undefined when none is given and the version should be resolved.
 */
export function requirementFromOptions(opts: RequirementOptions): DependencyRequirement | undefined {
  const given = [opts.exact, opts.revision, opts.branch, opts.from, opts.upToNextMinorFrom].filter(
    (v) => v !== undefined
  );
  if (given.length > 1) {
    throw new UsageError("only one of --exact, --revision, --branch, --from and --up-to-next-minor-from may be given");
  }

  if (opts.to !== undefined) {
    const lower = opts.from ?? opts.upToNextMinorFrom;
    if (lower === undefined) {
      throw new UsageError("--to requires --from or --up-to-next-minor-from");
    }
    return {
      kind: "range",
      lower: checkVersion(opts.from !== undefined ? "from" : "up-to-next-minor-from", lower),
      upper: checkVersion("to", opts.to),
    };
  }

  if (opts.exact !== undefined) return { kind: "exact", version: checkVersion("exact", opts.exact) };
  if (opts.revision !== undefined) return { kind: "revision", revision: opts.revision };
  if (opts.branch !== undefined) return { kind: "branch", branch: opts.branch };
  if (opts.from !== undefined) return { kind: "upToNextMajor", version: checkVersion("from", opts.from) };
  if (opts.upToNextMinorFrom !== undefined) {
    return { kind: "upToNextMinor", version: checkVersion("up-to-next-minor-from", opts.upToNextMinorFrom) };
  }
  return undefined;
}

export async function runAddDependency(
  url: string,
  opts: EditCommandOptions & RequirementOptions & { name?: string }
): Promise<number> {
  let requirement: DependencyRequirement | undefined;
  try {
    requirement = requirementFromOptions(opts);
  } catch (e) {
    if (e instanceof UsageError) {
      emitCliError(e.code, e.message, !!opts.pretty);
      return 1;
    }
    throw e;
  }
  return runEdit(opts, (editor) => editor.addPackageDependency(url, requirement, opts.name));
}

export async function runAddTargetDependency(
  target: string,
  dependency: string,
  opts: EditCommandOptions & { package?: string }
): Promise<number> {
  const dep: NewTargetDependency = opts.package === undefined
    ? { kind: "byName", name: dependency }
    : { kind: "product", name: dependency, package: opts.package };
  return runEdit(opts, (editor) => editor.addTargetDependency(target, dep));
}
