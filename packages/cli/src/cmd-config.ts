/**
 * spm-edit config - effective editor configuration and its source
 */
import { ConfigError, formatDiagnostic, resolveEditorConfig } from "@spm-edit/core";
import type { ResolvedConfig } from "@spm-edit/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  let resolved: ResolvedConfig;
  try {
    resolved = resolveEditorConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic({ code: e.code, message: e.message }, !opts.json));
      return 4;
    }
    throw e;
  }
  const { config } = resolved;

  if (opts.json) {
    console.log(JSON.stringify({ source: resolved.source, path: resolved.path, config }, null, 2));
    return 0;
  }

  console.log("Effective spm-edit config");
  console.log(`  Source:          ${resolved.source}`);
  console.log(`  Path:            ${resolved.path ?? "(none)"}`);
  console.log(`  Indent:          ${config.indent === undefined ? "(detected)" : JSON.stringify(config.indent)}`);
  console.log(`  Write templates: ${config.writeTemplates === false ? "no" : "yes"}`);
  console.log(`  Default branch:  ${config.defaultBranch ?? "(main, then master)"}`);
  return 0;
}
