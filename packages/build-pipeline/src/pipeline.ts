/**
 * Build Pipeline
 *
 * Runs the recipe stage by stage:
 * 1. Skip when a working build is already installed
 * 2. Reset the working and runtime library directories
 * 3. Shallow-clone the binding source
 * 4. Write the vendor descriptor
 * 5. Install the build front-end helpers
 * 6. Fetch the vendor archive
 * 7. Stage the shared objects
 * 8. Patch pkg-config metadata and derive the compiler environment
 * 9. Compile and install the binding
 * 10. Remove the working directory and verify the import
 *
 * Each stage is awaited before the next starts; the first failure aborts
 * the run.
 */

import type { BuildManifest, VendorDescriptor } from "@avbuild/build-schema";

import { resolvePaths, validateConfig, type AvBuildConfig, type ResolvedPaths } from "./config.js";
import { createBuildEnvironment, toProcessEnv } from "./environment.js";
import { StageError, VerificationError, type StageName } from "./errors.js";
import { describeManifest, writeManifest } from "./manifest.js";
import { patchPkgConfigFiles } from "./pkgconfig.js";
import { detectPlatform, type HostInfo } from "./platform.js";
import { spawnRunner, type CommandRunner } from "./process.js";
import { PythonToolchain } from "./python.js";
import { acquireSource, simpleGitClient, type GitClient } from "./source.js";
import { stageSharedLibraries } from "./staging.js";
import { checkBuildState, type BuildState } from "./state.js";
import { assertVendorLayout, createVendorFetcher, writeVendorDescriptor, type VendorFetcher } from "./vendor.js";
import { cleanupWorkspace, resetWorkspace } from "./workspace.js";

/**
 * External collaborators. Each defaults to the real implementation.
 */
export interface PipelineDeps {
  git?: GitClient;
  runner?: CommandRunner;
  /** Overrides the fetcher selected by `config.fetcher` */
  fetcher?: VendorFetcher;
  host?: HostInfo;
  /** Clock for the manifest timestamp */
  now?: () => Date;
}

export type BuildOutcome =
  | { status: "skipped"; state: BuildState }
  | { status: "built"; manifest: BuildManifest };

/**
 * Run one stage, wrapping any failure in a `StageError` for that stage.
 */
async function runStage<T>(stage: StageName, label: string, action: () => Promise<T>): Promise<T> {
  console.log(label);
  try {
    return await action();
  } catch (error) {
    if (error instanceof StageError || error instanceof VerificationError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new StageError(stage, message, { cause: error });
  }
}

function vendorDescriptorFor(config: AvBuildConfig): VendorDescriptor {
  const descriptor: VendorDescriptor = { url: config.vendorUrlTemplate };
  if (config.vendorSha256) {
    descriptor.sha256 = config.vendorSha256;
  }
  return descriptor;
}

/**
 * Platform tag recorded in the manifest. The script fetcher resolves the
 * platform itself, so an unrecognised host is not an error here.
 */
function platformTag(host?: HostInfo): string {
  try {
    return detectPlatform(host);
  } catch {
    return "unknown";
  }
}

interface Toolchain {
  git: GitClient;
  python: PythonToolchain;
  fetcher: VendorFetcher;
}

function createToolchain(config: AvBuildConfig, deps: PipelineDeps): Toolchain {
  const runner = deps.runner ?? spawnRunner;
  return {
    git: deps.git ?? simpleGitClient,
    python: new PythonToolchain(runner, config.python),
    fetcher:
      deps.fetcher ??
      createVendorFetcher(config.fetcher, { runner, python: config.python, host: deps.host }),
  };
}

function writeDescriptorStage(config: AvBuildConfig, paths: ResolvedPaths): Promise<void> {
  return runStage("vendor-config", "📝 Writing vendor descriptor...", () =>
    writeVendorDescriptor(paths.descriptorFile, vendorDescriptorFor(config)),
  );
}

function fetchVendorStage(paths: ResolvedPaths, fetcher: VendorFetcher): Promise<void> {
  return runStage("vendor", `📥 Fetching vendor archive (${fetcher.kind} fetcher)...`, async () => {
    await fetcher.fetch({
      workDir: paths.workDir,
      descriptorFile: paths.descriptorFile,
      vendorDir: paths.vendorDir,
    });
    await assertVendorLayout(paths.vendorDir);
  });
}

/**
 * Fetch the vendor archive into an existing checkout without building.
 */
export async function fetchVendorOnly(config: AvBuildConfig, deps: PipelineDeps = {}): Promise<string> {
  validateConfig(config);
  const paths = resolvePaths(config);
  const { fetcher } = createToolchain(config, deps);

  await writeDescriptorStage(config, paths);
  await fetchVendorStage(paths, fetcher);
  return paths.vendorDir;
}

/**
 * Run the full build.
 */
export async function runBuild(config: AvBuildConfig, deps: PipelineDeps = {}): Promise<BuildOutcome> {
  validateConfig(config);
  const paths = resolvePaths(config);
  const { git, python, fetcher } = createToolchain(config, deps);
  const now = deps.now ?? (() => new Date());

  if (config.force) {
    console.log("⚠️  --force given, rebuilding unconditionally");
  } else {
    const state = await runStage("gate", "🔎 Checking for an existing build...", () =>
      checkBuildState({
        moduleName: config.moduleName,
        runtimeLibDir: paths.runtimeLibDir,
        manifestFile: paths.manifestFile,
        python,
      }),
    );

    if (state.alreadyBuilt) {
      console.log(`✅ ${state.reason}. Skipping build.`);
      if (state.manifest) {
        console.log(`   Last build: ${describeManifest(state.manifest)}`);
      }
      return { status: "skipped", state };
    }
    console.log(`   ${state.reason}, building`);
  }

  await runStage("reset", "🧹 Cleaning up previous build artifacts...", () =>
    resetWorkspace(paths.workDir, paths.runtimeLibDir),
  );

  const sha = await runStage("source", `⬇️  Cloning ${config.repoUrl}...`, () =>
    acquireSource(git, { repoUrl: config.repoUrl, ref: config.ref, targetDir: paths.workDir }),
  );
  console.log(`   Checked out ${sha.slice(0, 7)}`);

  await writeDescriptorStage(config, paths);

  await runStage("tools", "📦 Installing build dependencies...", () =>
    python.installTools(config.buildTools),
  );

  await fetchVendorStage(paths, fetcher);

  const staged = await runStage(
    "stage",
    `🚚 Moving shared libraries to ${config.runtimeLibDir}...`,
    () =>
      stageSharedLibraries(paths.vendorLibDir, paths.runtimeLibDir, {
        transientRoot: paths.workDir,
      }),
  );
  console.log(`   Staged ${staged.length} entries`);

  const buildEnv = await runStage("configure", "🔧 Patching pkg-config files...", async () => {
    const patched = await patchPkgConfigFiles(paths.pkgConfigDir, paths.vendorDir);
    console.log(`   Patched ${patched.length} files`);
    return createBuildEnvironment({
      vendorDir: paths.vendorDir,
      rpaths: config.rpaths,
      inheritedPkgConfigPath: process.env.PKG_CONFIG_PATH,
    });
  });

  await runStage("compile", `🛠️  Building ${config.distribution} from source...`, async () => {
    const previous = await python.uninstall(config.distribution);
    console.log(
      previous === "removed"
        ? `   Removed previously installed ${config.distribution}`
        : `   No previous ${config.distribution} installed`,
    );
    await python.installFromSource(paths.workDir, config.distribution, toProcessEnv(buildEnv));
  });

  if (config.keepWorkDir) {
    console.log(`   Keeping build directory ${paths.workDir}`);
  } else {
    await runStage("cleanup", "🧹 Removing build directory...", () => cleanupWorkspace(paths.workDir));
  }

  const version = await runStage("verify", `🔍 Importing ${config.moduleName}...`, async () => {
    const probe = await python.probeModule(config.moduleName, [paths.runtimeLibDir]);
    if (!probe.ok) {
      throw new VerificationError(`${config.moduleName} does not import after the build: ${probe.error}`);
    }
    if (!probe.version) {
      throw new VerificationError(`${config.moduleName} imported but reports no version`);
    }
    return probe.version;
  });

  const manifest: BuildManifest = {
    manifestVersion: "1.0",
    recipe: config.name,
    builtAt: now().toISOString(),
    source: config.ref
      ? { repoUrl: config.repoUrl, ref: config.ref, sha }
      : { repoUrl: config.repoUrl, sha },
    vendor: {
      urlTemplate: config.vendorUrlTemplate,
      platform: platformTag(deps.host),
      fetcher: fetcher.kind,
    },
    module: { name: config.moduleName, version },
    runtimeLibDir: config.runtimeLibDir,
    stagedLibraries: staged,
    rpaths: buildEnv.rpaths,
  };

  await runStage("manifest", "🗒️  Writing build manifest...", () =>
    writeManifest(paths.manifestFile, manifest),
  );

  console.log(`✅ Success! ${config.moduleName} ${version} installed with custom libraries.`);
  return { status: "built", manifest };
}
