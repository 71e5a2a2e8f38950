/**
 * spm-edit check - parse and load a manifest without editing it
 */
import * as fs from "node:fs";
import { formatDiagnostic, formatDiagnostics, formatToolsVersion, loadManifestSource } from "@spm-edit/core";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; stableJson?: boolean }
): Promise<number> {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, !!opts.pretty));
    return 4;
  }

  const loaded = loadManifestSource(source, file);
  if (!loaded.manifest) {
    console.error(formatDiagnostics(loaded.diagnostics, !!opts.pretty));
    return 2;
  }

  const m = loaded.manifest;
  if (opts.pretty) {
    console.log(
      `${m.name} (swift-tools-version ${formatToolsVersion(m.toolsVersion)}): ` +
        `${m.dependencies.length} dependencies, ${m.targets.length} targets, ${m.products.length} products`
    );
  } else if (opts.stableJson) {
    console.log("{\"ok\":true,\"errors\":[]}");
  } else {
    console.log("[]");
  }
  return 0;
}
