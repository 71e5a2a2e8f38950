/**
 * @spm-edit/core - structural editing of Swift package manifests
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { ManifestEditError, InvariantViolationError } from "./errors.js";
export type { EditFailure, EditFailureKind } from "./errors.js";
export { parseManifest } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { printTree, tokensOf, firstToken } from "./printer.js";
export { walk, search, replaceNode, rootRef, childRef, childSlots } from "./traverse.js";
export type { NodeRef, ChildSlot, VisitAction, SearchOptions } from "./traverse.js";
export { findRootCall, findArrayArgument, findNamedEntity, ROOT_CALL_NAME } from "./locators.js";
export type { RootCallResult, ArrayArgumentResult } from "./locators.js";
export { appendArrayElement, insertEmptyArrayArgument } from "./rewriter.js";
export type { SeparatorPolicy } from "./rewriter.js";
export {
  packageDependencyEntry,
  targetEntry,
  productEntry,
  productDependencyEntry,
  stringLiteral,
  checkBinaryLocation,
} from "./synthesizers.js";
export {
  addPackageDependency,
  addTarget,
  addBinaryTarget,
  addTargetDependency,
  addProductTargetDependency,
  addProduct,
  addProductTarget,
  INSERT_BEFORE,
} from "./operations.js";
export type { OperationOptions } from "./operations.js";
export * from "./model.js";
export {
  loadManifest,
  loadManifestSource,
  readToolsVersion,
  compareToolsVersions,
  formatToolsVersion,
  DEFAULT_TOOLS_VERSION,
  MINIMUM_EDITABLE_TOOLS_VERSION,
} from "./manifest.js";
export type {
  Manifest,
  ToolsVersion,
  PackageDependency,
  TargetDescription,
  TargetDependency,
  TargetType,
  ProductDescription,
  LoadResult,
} from "./manifest.js";
export { verifyManifestSource } from "./verifier.js";
export type { VerifyResult } from "./verifier.js";
export { EditSession } from "./session.js";
export type { ApplyResult, OpenResult, SessionOptions, TreeOperation } from "./session.js";
export type { EditTraceEvent, EditTraceEventType, TraceSink } from "./trace.js";
export { PackageEditor } from "./editor.js";
export type { PackageEditorOptions, EditResult } from "./editor.js";
export {
  GitVersionResolver,
  VersionLookupError,
  pickDefaultRequirement,
  parseLsRemote,
  parseVersion,
  compareVersions,
  formatVersion,
} from "./resolver.js";
export type { VersionResolver, RemoteRefs, SemanticVersion } from "./resolver.js";
export { ManagedArtifacts, describeArtifact, managedArtifactsSchema } from "./artifacts.js";
export type { ManagedArtifact, ArtifactSource, PackageRef } from "./artifacts.js";
export { resolveEditorConfig, ConfigError, DEFAULT_CONFIG, editorConfigSchema } from "./config.js";
export type { EditorConfig, ResolvedConfig } from "./config.js";
