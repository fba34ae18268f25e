/**
 * Installation report for a deployed runtime: is the runtime library
 * directory where it should be, and does the module import from it.
 */

import fs from "node:fs/promises";
import type { InstallationReport } from "@avbuild/build-schema";

import type { PythonToolchain } from "./python.js";
import { directoryExists } from "./workspace.js";

/** Entries listed from the runtime library directory */
const LISTED_FILES = 5;

export interface InspectOptions {
  runtimeLibDir: string;
  moduleName: string;
  python: PythonToolchain;
  /** Listed when the runtime library directory is missing */
  cwd?: string;
}

export async function inspectInstallation(options: InspectOptions): Promise<InstallationReport> {
  const { runtimeLibDir, moduleName, python } = options;
  const cwd = options.cwd ?? process.cwd();

  const report: InstallationReport = {
    status: "error",
    debugInfo: { libDirExists: false },
    moduleInfo: {},
    error: null,
  };

  // 1. Filesystem
  try {
    if (await directoryExists(runtimeLibDir)) {
      const files = (await fs.readdir(runtimeLibDir)).sort();
      report.debugInfo = {
        libDirExists: true,
        filesFound: files.slice(0, LISTED_FILES),
        totalFiles: files.length,
      };
    } else {
      report.debugInfo = {
        libDirExists: false,
        cwd,
        cwdListing: (await fs.readdir(cwd)).sort(),
      };
    }
  } catch (error) {
    report.debugInfo.fsError = error instanceof Error ? error.message : String(error);
  }

  // 2. Import
  const probe = await python.probeModule(moduleName, [runtimeLibDir]);
  if (probe.ok) {
    report.status = "success";
    const { ok: _ok, ...moduleInfo } = probe;
    report.moduleInfo = moduleInfo;
  } else {
    report.status = probe.reason === "import-failed" ? "failed" : "error";
    report.error = probe.error;
  }

  return report;
}
