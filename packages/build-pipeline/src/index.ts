/**
 * Library exports for @avbuild/build-pipeline
 *
 * The stages can be used on their own; `runBuild` runs them in order.
 */

// Pipeline
export { runBuild, fetchVendorOnly, type PipelineDeps, type BuildOutcome } from "./pipeline.js";

// Configuration
export {
  createConfig,
  validateConfig,
  resolvePaths,
  loadRecipe,
  parseRecipe,
  configFromEnv,
  parseFetcherKind,
  defaultConfig,
  PLATFORM_PLACEHOLDER,
  type AvBuildConfig,
  type ResolvedPaths,
} from "./config.js";

// Errors
export {
  StageError,
  ConfigError,
  VerificationError,
  CommandError,
  exitCodeFor,
  describeError,
  EXIT_CODES,
  STAGES,
  type StageName,
} from "./errors.js";

// Stages
export { checkBuildState, type BuildState, type BuildStateOptions } from "./state.js";
export {
  resetWorkspace,
  cleanupWorkspace,
  listSharedObjects,
  isSharedObject,
  directoryExists,
  SHARED_OBJECT_PATTERN,
} from "./workspace.js";
export { acquireSource, simpleGitClient, type GitClient, type AcquireSourceOptions } from "./source.js";
export {
  writeVendorDescriptor,
  readVendorDescriptor,
  createVendorFetcher,
  assertVendorLayout,
  downloadArchive,
  sha256File,
  ScriptVendorFetcher,
  ArchiveVendorFetcher,
  FETCH_SCRIPT,
  type VendorFetcher,
  type VendorFetchRequest,
} from "./vendor.js";
export { detectPlatform, currentHost, resolveVendorUrl, type HostInfo } from "./platform.js";
export { stageSharedLibraries, rewriteLinkTarget } from "./staging.js";
export { patchPkgConfigFiles, patchPrefixLine } from "./pkgconfig.js";
export {
  createBuildEnvironment,
  toProcessEnv,
  withLibraryPath,
  type BuildEnvironment,
  type BuildEnvironmentOptions,
} from "./environment.js";

// Toolchain
export { PythonToolchain, type ModuleProbe, type ModuleDetails, type UninstallResult } from "./python.js";
export { spawnRunner, runOrThrow, type CommandRunner, type RunOptions, type RunResult } from "./process.js";

// Manifest and report
export { readManifest, writeManifest, isBuildManifest, describeManifest } from "./manifest.js";
export { inspectInstallation, type InspectOptions } from "./inspect.js";
