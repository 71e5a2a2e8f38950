/**
 * spm-edit artifacts - list a managed artifacts file
 */
import * as fs from "node:fs";
import { ZodError } from "zod";
import { describeArtifact, formatDiagnostic, ManagedArtifacts } from "@spm-edit/core";

export async function runArtifacts(
  file: string,
  opts: { json?: boolean; package?: string }
): Promise<number> {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading artifacts file: ${msg}` }, !opts.json));
    return 4;
  }

  let artifacts: ManagedArtifacts;
  try {
    artifacts = ManagedArtifacts.fromJSON(data);
  } catch (e) {
    if (e instanceof ZodError) {
      const msg = e.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
      console.error(formatDiagnostic({ code: "E_ARTIFACTS", message: `Invalid artifacts file: ${msg}` }, !opts.json));
      return 2;
    }
    throw e;
  }

  const listed = [...artifacts].filter((a) => opts.package === undefined || a.packageRef.name === opts.package);
  if (opts.json) {
    console.log(JSON.stringify(listed, null, 2));
    return 0;
  }
  if (listed.length === 0) {
    console.log("No managed artifacts.");
    return 0;
  }
  for (const a of listed) {
    console.log(describeArtifact(a));
  }
  return 0;
}
