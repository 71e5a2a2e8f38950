/**
 * Editor configuration.
 * Precedence: ./.spm-edit.json > ~/.spm-edit/config.json > defaults
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";

export const editorConfigSchema = z.object({
  version: z.number({ required_error: "config requires a 'version' number" }).int().positive(),
  indent: z
    .string()
    .regex(/^[ \t]+$/, "indent must be made of spaces or tabs")
    .optional(),
  writeTemplates: z.boolean().optional(),
  defaultBranch: z.string().min(1).optional(),
});

export type EditorConfig = z.infer<typeof editorConfigSchema>;

export interface ResolvedConfig {
  config: EditorConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const DEFAULT_CONFIG: EditorConfig = {
  version: 1,
  writeTemplates: true,
};

export class ConfigError extends Error {
  code = "E_CONFIG";
  file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = "ConfigError";
    this.file = file;
  }
}

function loadConfigFile(filePath: string): EditorConfig | null {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConfigError(filePath, e instanceof Error ? e.message : String(e));
  }
  const parsed = editorConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(filePath, parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; "));
  }
  return { ...DEFAULT_CONFIG, ...parsed.data };
}

export function resolveEditorConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), ".spm-edit.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".spm-edit", "config.json");

  const project = loadConfigFile(projectPath);
  if (project) return { config: project, source: "project", path: projectPath };

  const user = loadConfigFile(userPath);
  if (user) return { config: user, source: "user", path: userPath };

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}
