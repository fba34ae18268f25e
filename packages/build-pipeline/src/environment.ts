/**
 * Compiler and linker environment for the binding build.
 *
 * Kept as an explicit record and only turned into environment variables
 * for the compile command itself; `process.env` is never modified.
 */

import path from "node:path";

export interface BuildEnvironment {
  /** `PKG_CONFIG_PATH` entries, highest priority first */
  pkgConfigPath: string[];
  cflags: string[];
  ldflags: string[];
  /** Runtime search paths, already included in `ldflags` */
  rpaths: string[];
}

export interface BuildEnvironmentOptions {
  vendorDir: string;
  rpaths: string[];
  /** Existing `PKG_CONFIG_PATH`, appended after the vendor entry */
  inheritedPkgConfigPath?: string;
}

export function createBuildEnvironment(options: BuildEnvironmentOptions): BuildEnvironment {
  const { vendorDir, rpaths } = options;
  const inherited = (options.inheritedPkgConfigPath ?? "")
    .split(path.delimiter)
    .filter((entry) => entry.length > 0);

  return {
    pkgConfigPath: [path.join(vendorDir, "lib", "pkgconfig"), ...inherited],
    cflags: [`-I${path.join(vendorDir, "include")}`, "-Wno-deprecated-declarations"],
    ldflags: [`-L${path.join(vendorDir, "lib")}`, ...rpaths.map((rpath) => `-Wl,-rpath,${rpath}`)],
    rpaths: [...rpaths],
  };
}

/**
 * Layer the build environment over a base process environment.
 */
export function toProcessEnv(
  env: BuildEnvironment,
  base: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  return {
    ...base,
    PKG_CONFIG_PATH: env.pkgConfigPath.join(path.delimiter),
    CFLAGS: env.cflags.join(" "),
    LDFLAGS: env.ldflags.join(" "),
  };
}

/**
 * Prepend directories to the dynamic loader search path of `base`.
 */
export function withLibraryPath(
  dirs: string[],
  base: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  const existing = (base.LD_LIBRARY_PATH ?? "").split(path.delimiter).filter(Boolean);
  return {
    ...base,
    LD_LIBRARY_PATH: [...dirs, ...existing].join(path.delimiter),
  };
}
