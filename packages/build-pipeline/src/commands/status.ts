#!/usr/bin/env tsx
/**
 * Status - prints the installation report as JSON.
 *
 * Usage:
 *   npm run avbuild:status
 *   npm run avbuild:status -- --lib-dir /var/task/lib_native
 *
 * Exits 0 when the module imports, 3 otherwise.
 */

import path from "node:path";
import { program } from "commander";

import { resolvePaths } from "../config.js";
import { EXIT_CODES } from "../errors.js";
import { inspectInstallation } from "../inspect.js";
import { spawnRunner } from "../process.js";
import { PythonToolchain } from "../python.js";
import { addCommonOptions, exitWithError, resolveCliConfig, type CommonOptions } from "./options.js";

interface StatusOptions extends CommonOptions {
  libDir?: string;
}

async function main() {
  addCommonOptions(
    program.name("avbuild-status").description("Report whether the built module loads"),
  )
    .option("--lib-dir <dir>", "Runtime library directory to inspect")
    .parse();

  const opts = program.opts<StatusOptions>();
  const config = await resolveCliConfig(opts);
  const runtimeLibDir = opts.libDir ? path.resolve(opts.libDir) : resolvePaths(config).runtimeLibDir;

  const report = await inspectInstallation({
    runtimeLibDir,
    moduleName: config.moduleName,
    python: new PythonToolchain(spawnRunner, config.python),
    cwd: config.cwd,
  });

  console.log(JSON.stringify(report, null, 2));
  process.exitCode =
    report.status === "success" ? EXIT_CODES.success : EXIT_CODES.verificationFailed;
}

main().catch((error) => {
  exitWithError("Status check failed", error);
});
