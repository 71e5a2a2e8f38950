/**
 * @spm-edit/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runConfig } from "./cmd-config.js";
export { runArtifacts } from "./cmd-artifacts.js";
export { runAddDependency, runAddTargetDependency, requirementFromOptions } from "./cmd-dependency.js";
export { runAddTarget, runAddBinaryTarget } from "./cmd-target.js";
export { runAddProduct, runAddProductTarget } from "./cmd-product.js";
export { runEdit, exitCodeFor, UsageError } from "./cmd-edit.js";
export type { EditCommandOptions } from "./cmd-edit.js";
