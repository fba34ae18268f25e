/**
 * Idempotency gate: decides whether a previous build can be reused.
 */

import type { BuildManifest } from "@avbuild/build-schema";

import { readManifest } from "./manifest.js";
import type { PythonToolchain } from "./python.js";
import { listSharedObjects } from "./workspace.js";

export interface BuildState {
  alreadyBuilt: boolean;
  /** Why the build is (or is not) reused */
  reason: string;
  moduleVersion?: string;
  /** Shared objects currently in the runtime library directory */
  libraries: string[];
  /** Manifest of the previous build, for the log only */
  manifest: BuildManifest | null;
}

export interface BuildStateOptions {
  moduleName: string;
  runtimeLibDir: string;
  manifestFile: string;
  python: PythonToolchain;
}

/**
 * A build is reused only when the runtime library directory holds at least
 * one shared object AND the module imports with that directory on the
 * loader search path. The manifest alone never skips a build.
 */
export async function checkBuildState(options: BuildStateOptions): Promise<BuildState> {
  const { moduleName, runtimeLibDir, manifestFile, python } = options;
  const manifest = await readManifest(manifestFile);
  const libraries = await listSharedObjects(runtimeLibDir);

  if (libraries.length === 0) {
    return {
      alreadyBuilt: false,
      reason: `No shared objects in ${runtimeLibDir}`,
      libraries,
      manifest,
    };
  }

  const probe = await python.probeModule(moduleName, [runtimeLibDir]);
  if (!probe.ok) {
    return {
      alreadyBuilt: false,
      reason: `${moduleName} does not import: ${probe.error}`,
      libraries,
      manifest,
    };
  }

  return {
    alreadyBuilt: true,
    reason: `${moduleName} ${probe.version} imports and ${libraries.length} shared objects are staged`,
    moduleVersion: probe.version,
    libraries,
    manifest,
  };
}
