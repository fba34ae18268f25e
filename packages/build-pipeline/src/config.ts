/**
 * Build Configuration
 *
 * A recipe file (configs/*.json) is merged with local layout defaults and
 * command-line overrides into one `AvBuildConfig`.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { BuildRecipe, VendorFetcherKind } from "@avbuild/build-schema";

import { ConfigError } from "./errors.js";

/** Placeholder the fetch tool substitutes with the host platform tag */
export const PLATFORM_PLACEHOLDER = "{platform}";

export const FETCHER_KINDS: readonly VendorFetcherKind[] = ["script", "archive"];

/**
 * Complete configuration for one build run.
 */
export interface AvBuildConfig extends BuildRecipe {
  /** Invocation directory; relative paths below resolve against it */
  cwd: string;

  /** Clone target, removed after a successful build */
  workDir: string;

  /** Directory the shared objects are staged into; the only surviving artifact */
  runtimeLibDir: string;

  /** Vendor descriptor path, relative to the working directory */
  descriptorPath: string;

  /** Vendor directory, relative to the working directory */
  vendorDir: string;

  /** Python interpreter used for pip and the import probe */
  python: string;

  fetcher: VendorFetcherKind;

  /** Build manifest path, relative to `cwd` */
  manifestPath: string;

  /** Rebuild even when the module already imports */
  force: boolean;

  /** Leave the working directory in place after the build */
  keepWorkDir: boolean;
}

/**
 * Absolute locations derived from a config.
 */
export interface ResolvedPaths {
  workDir: string;
  runtimeLibDir: string;
  descriptorFile: string;
  vendorDir: string;
  vendorLibDir: string;
  vendorIncludeDir: string;
  pkgConfigDir: string;
  manifestFile: string;
}

/**
 * Default configuration values.
 */
export const defaultConfig: Omit<
  AvBuildConfig,
  "name" | "repoUrl" | "vendorUrlTemplate" | "cwd"
> = {
  workDir: "PyAV-Custom",
  runtimeLibDir: "lib_native",
  descriptorPath: "scripts/ffmpeg-custom.json",
  vendorDir: "vendor",
  moduleName: "av",
  distribution: "av",
  buildTools: ["pip", "setuptools", "cython", "pkgconfig"],
  rpaths: ["/var/task/lib_native"],
  python: "python",
  fetcher: "script",
  manifestPath: ".avbuild-manifest.json",
  force: false,
  keepWorkDir: false,
};

/**
 * Create a complete configuration with defaults.
 */
export function createConfig(
  partial: Partial<AvBuildConfig> & Pick<AvBuildConfig, "name" | "repoUrl" | "vendorUrlTemplate">,
): AvBuildConfig {
  return {
    ...defaultConfig,
    cwd: process.cwd(),
    ...partial,
  };
}

/**
 * Resolve every configured location to an absolute path.
 */
export function resolvePaths(config: AvBuildConfig): ResolvedPaths {
  const workDir = path.resolve(config.cwd, config.workDir);
  const vendorDir = path.resolve(workDir, config.vendorDir);
  const vendorLibDir = path.join(vendorDir, "lib");

  return {
    workDir,
    runtimeLibDir: path.resolve(config.cwd, config.runtimeLibDir),
    descriptorFile: path.resolve(workDir, config.descriptorPath),
    vendorDir,
    vendorLibDir,
    vendorIncludeDir: path.join(vendorDir, "include"),
    pkgConfigDir: path.join(vendorLibDir, "pkgconfig"),
    manifestFile: path.resolve(config.cwd, config.manifestPath),
  };
}

/**
 * True when `candidate` is `base` itself or one of its ancestors.
 */
function coversDirectory(candidate: string, base: string): boolean {
  const relative = path.relative(candidate, base);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Validate configuration.
 */
export function validateConfig(config: AvBuildConfig): void {
  if (!config.name) {
    throw new ConfigError("name is required");
  }
  if (!config.repoUrl) {
    throw new ConfigError("repoUrl is required");
  }
  if (!config.vendorUrlTemplate.includes(PLATFORM_PLACEHOLDER)) {
    throw new ConfigError(
      `vendorUrlTemplate must contain ${PLATFORM_PLACEHOLDER}: ${config.vendorUrlTemplate}`,
    );
  }
  if (config.vendorSha256 !== undefined && !/^[0-9a-f]{64}$/i.test(config.vendorSha256)) {
    throw new ConfigError("vendorSha256 must be a 64-character hex digest");
  }
  if (!config.moduleName) {
    throw new ConfigError("moduleName is required");
  }
  if (!config.distribution) {
    throw new ConfigError("distribution is required");
  }
  if (!config.python) {
    throw new ConfigError("python is required");
  }
  if (!FETCHER_KINDS.includes(config.fetcher)) {
    throw new ConfigError(
      `fetcher must be one of ${FETCHER_KINDS.join(", ")}, got "${config.fetcher}"`,
    );
  }
  for (const rpath of config.rpaths) {
    if (!path.isAbsolute(rpath) && !rpath.startsWith("$ORIGIN")) {
      throw new ConfigError(`rpath must be absolute or start with $ORIGIN: ${rpath}`);
    }
  }

  // Both directories are deleted on every build
  const cwd = path.resolve(config.cwd);
  const paths = resolvePaths(config);
  for (const [key, dir] of [
    ["workDir", paths.workDir],
    ["runtimeLibDir", paths.runtimeLibDir],
  ] as const) {
    if (coversDirectory(dir, cwd)) {
      throw new ConfigError(`${key} must be a subdirectory of ${cwd}, got ${dir}`);
    }
  }
  if (coversDirectory(paths.workDir, paths.runtimeLibDir)) {
    throw new ConfigError("runtimeLibDir must not be inside workDir");
  }
  if (coversDirectory(paths.runtimeLibDir, paths.workDir)) {
    throw new ConfigError("workDir must not be inside runtimeLibDir");
  }
}

function readString(fields: Record<string, unknown>, key: string, required: true): string;
function readString(fields: Record<string, unknown>, key: string, required: false): string | undefined;
function readString(
  fields: Record<string, unknown>,
  key: string,
  required: boolean,
): string | undefined {
  const value = fields[key];
  if (value === undefined && !required) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`recipe field "${key}" must be a string`);
  }
  return value;
}

function readStringArray(fields: Record<string, unknown>, key: string): string[] | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    throw new ConfigError(`recipe field "${key}" must be an array of strings`);
  }
  return value.map(String);
}

/** Optional recipe fields holding a plain string */
const OPTIONAL_STRING_FIELDS = [
  "ref",
  "vendorSha256",
  "moduleName",
  "distribution",
  "workDir",
  "runtimeLibDir",
  "descriptorPath",
  "vendorDir",
  "python",
  "manifestPath",
] as const satisfies ReadonlyArray<keyof BuildRecipe>;

/**
 * Parse a recipe from its JSON representation.
 */
export function parseRecipe(value: unknown): Partial<BuildRecipe> &
  Pick<BuildRecipe, "name" | "repoUrl" | "vendorUrlTemplate"> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigError("recipe must be a JSON object");
  }
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(value));

  const recipe: Partial<BuildRecipe> & Pick<BuildRecipe, "name" | "repoUrl" | "vendorUrlTemplate"> = {
    name: readString(fields, "name", true),
    repoUrl: readString(fields, "repoUrl", true),
    vendorUrlTemplate: readString(fields, "vendorUrlTemplate", true),
  };

  for (const key of OPTIONAL_STRING_FIELDS) {
    const value = readString(fields, key, false);
    if (value !== undefined) recipe[key] = value;
  }
  const fetcher = readString(fields, "fetcher", false);
  if (fetcher !== undefined) recipe.fetcher = parseFetcherKind(fetcher);
  const buildTools = readStringArray(fields, "buildTools");
  if (buildTools !== undefined) recipe.buildTools = buildTools;
  const rpaths = readStringArray(fields, "rpaths");
  if (rpaths !== undefined) recipe.rpaths = rpaths;

  return recipe;
}

/**
 * Load a recipe file.
 */
export async function loadRecipe(
  filePath: string,
): Promise<ReturnType<typeof parseRecipe>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read recipe ${filePath}: ${message}`);
  }

  try {
    return parseRecipe(JSON.parse(content));
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(`${filePath}: ${error.message}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${filePath} is not valid JSON: ${message}`);
  }
}

/**
 * Read overrides from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<AvBuildConfig> {
  const overrides: Partial<AvBuildConfig> = {};

  if (env.AVBUILD_PYTHON) {
    overrides.python = env.AVBUILD_PYTHON;
  }
  if (env.AVBUILD_FETCHER) {
    overrides.fetcher = parseFetcherKind(env.AVBUILD_FETCHER);
  }

  return overrides;
}

/**
 * Narrow a user-supplied fetcher name.
 */
export function parseFetcherKind(value: string): VendorFetcherKind {
  const kind = FETCHER_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new ConfigError(`fetcher must be one of ${FETCHER_KINDS.join(", ")}, got "${value}"`);
  }
  return kind;
}
