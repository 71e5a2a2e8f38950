/**
 * spm-edit - structural editor for Swift package manifests
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runArtifacts } from "./cmd-artifacts.js";
import { runCheck } from "./cmd-check.js";
import { runConfig } from "./cmd-config.js";
import { runAddDependency, runAddTargetDependency } from "./cmd-dependency.js";
import type { RequirementOptions } from "./cmd-dependency.js";
import type { EditCommandOptions } from "./cmd-edit.js";
import { runAddProduct, runAddProductTarget } from "./cmd-product.js";
import { runAddBinaryTarget, runAddTarget, TARGET_TYPES } from "./cmd-target.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const program = new Command();

program
  .name("spm-edit")
  .description("Surgical edits to Package.swift manifests")
  .version(pkg.version);

/** Options shared by every command that edits the manifest. */
function editCommand(name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .option("--manifest <path>", "Path of Package.swift", "Package.swift")
    .option("--pretty", "Human-readable output", false)
    .option("--trace <path>", "Write JSONL trace to file");
}

editCommand("add-dependency", "Add a package dependency")
  .argument("<url>", "Package url, or a path for a local package")
  .option("--exact <version>", "Exact version")
  .option("--revision <revision>", "Specific revision")
  .option("--branch <branch>", "Branch")
  .option("--from <version>", "Up to next major version")
  .option("--up-to-next-minor-from <version>", "Up to next minor version")
  .option("--to <version>", "Upper bound of a version range (with --from or --up-to-next-minor-from)")
  .option("--name <name>", "Package name written as 'name:'")
  .action(async (url: string, opts: EditCommandOptions & RequirementOptions & { name?: string }) => {
    const code = await runAddDependency(url, opts);
    process.exit(code);
  });

editCommand("add-target", "Add a target")
  .argument("<name>", "Target name")
  .option("--type <type>", `Target type: ${TARGET_TYPES.join(", ")}`, "library")
  .option("--dependencies <names...>", "Names of the target's dependencies")
  .option("--no-test-target", "Do not add a test target for a library")
  .action(async (name: string, opts: EditCommandOptions & { type?: string; dependencies?: string[]; testTarget?: boolean }) => {
    const code = await runAddTarget(name, opts);
    process.exit(code);
  });

editCommand("add-binary-target", "Add a binary target")
  .argument("<name>", "Target name")
  .argument("<url-or-path>", "Remote archive url or local path")
  .option("--checksum <checksum>", "Checksum of a remote archive")
  .action(async (name: string, urlOrPath: string, opts: EditCommandOptions & { checksum?: string }) => {
    const code = await runAddBinaryTarget(name, urlOrPath, opts);
    process.exit(code);
  });

editCommand("add-target-dependency", "Add a dependency to a target")
  .argument("<target>", "Target to modify")
  .argument("<dependency>", "Target or product name")
  .option("--package <package>", "Package providing the product")
  .action(async (target: string, dependency: string, opts: EditCommandOptions & { package?: string }) => {
    const code = await runAddTargetDependency(target, dependency, opts);
    process.exit(code);
  });

editCommand("add-product", "Add a product")
  .argument("<name>", "Product name")
  .option("--type <type>", "Product type: library, static-library, dynamic-library, executable", "library")
  .option("--targets <names...>", "Targets of the product")
  .action(async (name: string, opts: EditCommandOptions & { type?: string; targets?: string[] }) => {
    const code = await runAddProduct(name, opts);
    process.exit(code);
  });

editCommand("add-product-target", "Add a target to a product")
  .argument("<product>", "Product to modify")
  .argument("<target>", "Target name")
  .action(async (product: string, target: string, opts: EditCommandOptions) => {
    const code = await runAddProductTarget(product, target, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Parse and load a manifest without editing it")
  .argument("[file]", "Manifest to check", "Package.swift")
  .option("--pretty", "Human-readable output", false)
  .option("--stable-json", "Stable machine-readable success output", false)
  .action(async (file: string, opts: { pretty?: boolean; stableJson?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display the effective editor configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

program
  .command("artifacts")
  .description("List a managed artifacts file")
  .argument("<file>", "Managed artifacts JSON file")
  .option("--package <name>", "Only artifacts of this package")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean; package?: string }) => {
    const code = await runArtifacts(file, opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(program.commands.map((c) => c.name()));
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(4);
});
