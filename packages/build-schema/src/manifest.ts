/**
 * Manifest Schema
 *
 * The build manifest is written after a fully successful build. It records
 * what was built, from which source revision, and against which vendor
 * archive, so a skipped rebuild can be traced back to a concrete build.
 */

import type { VendorFetcherKind } from "./recipe.js";

/**
 * The root manifest for a completed build.
 */
export interface BuildManifest {
  /** Manifest format version */
  manifestVersion: "1.0";

  /** Recipe identifier */
  recipe: string;

  /** ISO timestamp of build completion */
  builtAt: string;

  /** Source checkout used for the build */
  source: SourceInfo;

  /** Vendor archive used for the build */
  vendor: VendorInfo;

  /** Installed module */
  module: ModuleInfo;

  /** Runtime library directory, as configured (usually relative) */
  runtimeLibDir: string;

  /** Entries copied into the runtime library directory */
  stagedLibraries: StagedLibrary[];

  /** Runtime search paths passed to the linker */
  rpaths: string[];
}

/**
 * Source repository information.
 */
export interface SourceInfo {
  /** Clone URL */
  repoUrl: string;

  /** Branch or tag, when one was requested */
  ref?: string;

  /** Git commit SHA of the checkout */
  sha: string;
}

/**
 * Vendor archive information.
 */
export interface VendorInfo {
  /** URL template from the recipe */
  urlTemplate: string;

  /** Host platform tag the template resolves against */
  platform: string;

  /** Fetcher that populated the vendor directory */
  fetcher: VendorFetcherKind;
}

/**
 * Installed module information.
 */
export interface ModuleInfo {
  name: string;
  version: string;
}

/**
 * A shared object copied into the runtime library directory.
 */
export interface StagedLibrary {
  /** File name within the runtime library directory */
  name: string;

  kind: "file" | "symlink";

  /** Link target, for symlinks */
  target?: string;
}
