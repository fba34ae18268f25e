/**
 * Python toolchain: the import probe and the pip invocations.
 */

import type { ModuleInfo } from "@avbuild/build-schema";

import { CommandError } from "./errors.js";
import { runOrThrow, type CommandRunner, type RunResult } from "./process.js";
import { withLibraryPath } from "./environment.js";

/**
 * Imports the module named in argv[1] and prints its version and location,
 * plus the linked FFmpeg versions when the module exposes them.
 */
const PROBE_SCRIPT = [
  "import importlib, json, sys",
  "m = importlib.import_module(sys.argv[1])",
  "def attr(*names):",
  "    value = m",
  "    for name in names:",
  "        value = getattr(value, name, None)",
  "        if value is None:",
  "            return None",
  "    return value",
  "def pair(sub, lib):",
  '    major = attr(sub, lib + "_version_major")',
  '    minor = attr(sub, lib + "_version_minor")',
  '    return None if major is None or minor is None else "%s.%s" % (major, minor)',
  'ffmpeg_dir = attr("ffmpeg_dir")',
  "print(json.dumps({",
  '    "version": str(getattr(m, "__version__", "") or ""),',
  '    "file": str(getattr(m, "__file__", "") or ""),',
  '    "ffmpegDir": None if ffmpeg_dir is None else str(ffmpeg_dir),',
  '    "formatVersion": pair("format", "libavformat"),',
  '    "codecVersion": pair("codec", "libavcodec"),',
  "}))",
].join("\n");

/** Linked-library details reported by the probe, when available */
export type ModuleDetails = Pick<ModuleInfo, "ffmpegDir" | "formatVersion" | "codecVersion">;

export type ModuleProbe =
  | ({ ok: true; version: string; file: string } & ModuleDetails)
  | { ok: false; reason: "import-failed" | "unavailable"; error: string };

export type UninstallResult = "removed" | "absent";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** pip's notice for a distribution that is not installed */
function notInstalledPattern(distribution: string): RegExp {
  return new RegExp(`^WARNING: Skipping ${escapeRegExp(distribution)} as it is not installed`, "im");
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? "";
}

function readModuleDetails(value: object): ModuleDetails {
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const details: ModuleDetails = {};
  if (typeof fields.ffmpegDir === "string") details.ffmpegDir = fields.ffmpegDir;
  if (typeof fields.formatVersion === "string") details.formatVersion = fields.formatVersion;
  if (typeof fields.codecVersion === "string") details.codecVersion = fields.codecVersion;
  return details;
}

export class PythonToolchain {
  constructor(
    private readonly runner: CommandRunner,
    readonly python: string,
  ) {}

  /**
   * Try to import `moduleName` with `libraryPaths` on the loader search path.
   */
  async probeModule(moduleName: string, libraryPaths: string[] = []): Promise<ModuleProbe> {
    let result: RunResult;
    try {
      result = await this.runner.run(this.python, ["-c", PROBE_SCRIPT, moduleName], {
        capture: true,
        env: withLibraryPath(libraryPaths),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, reason: "unavailable", error: message };
    }

    if (result.exitCode !== 0) {
      return {
        ok: false,
        reason: "import-failed",
        error: lastLine(result.stderr) || `exit code ${result.exitCode}`,
      };
    }

    try {
      const parsed: unknown = JSON.parse(lastLine(result.stdout));
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "version" in parsed &&
        "file" in parsed &&
        typeof parsed.version === "string" &&
        typeof parsed.file === "string"
      ) {
        return {
          ok: true,
          version: parsed.version,
          file: parsed.file,
          ...readModuleDetails(parsed),
        };
      }
    } catch {
      // Fall through to the error below
    }
    return {
      ok: false,
      reason: "unavailable",
      error: `Unexpected probe output: ${result.stdout.trim().slice(0, 200)}`,
    };
  }

  /**
   * Install or upgrade the build front-end helpers.
   */
  async installTools(packages: string[]): Promise<void> {
    if (packages.length === 0) return;
    await runOrThrow(this.runner, this.python, ["-m", "pip", "install", "--upgrade", ...packages]);
  }

  /**
   * Uninstall a previously installed distribution.
   * An absent distribution is not an error; any other failure is.
   */
  async uninstall(distribution: string): Promise<UninstallResult> {
    const args = ["-m", "pip", "uninstall", "-y", distribution];
    const result = await this.runner.run(this.python, args, { capture: true });
    const output = `${result.stdout}\n${result.stderr}`;

    if (notInstalledPattern(distribution).test(output)) {
      return "absent";
    }
    if (result.exitCode !== 0) {
      throw new CommandError(this.python, args, result.exitCode, result.stderr);
    }
    return "removed";
  }

  /**
   * Compile and install the package in `sourceDir` from source, without
   * resolving its dependencies.
   */
  async installFromSource(
    sourceDir: string,
    distribution: string,
    env: NodeJS.ProcessEnv,
  ): Promise<void> {
    await runOrThrow(
      this.runner,
      this.python,
      [
        "-m",
        "pip",
        "install",
        ".",
        "-v",
        "--no-build-isolation",
        "--no-deps",
        "--no-binary",
        distribution,
      ],
      { cwd: sourceDir, env },
    );
  }
}
