#!/usr/bin/env tsx
/**
 * Build - clones the binding, links it against the custom native library
 * and stages the shared objects for deployment.
 *
 * Usage:
 *   npm run avbuild
 *   npm run avbuild -- --force
 *   npm run avbuild -- --fetcher archive --python python3.12
 *
 * Exit codes: 0 built or already installed, 1 stage failure,
 * 2 invalid configuration, 3 the built module does not import.
 */

import { program } from "commander";

import { runBuild } from "../pipeline.js";
import { addCommonOptions, exitWithError, resolveCliConfig, type CommonOptions } from "./options.js";

interface BuildOptions extends CommonOptions {
  force: boolean;
  keepWorkdir: boolean;
}

async function main() {
  addCommonOptions(
    program
      .name("avbuild")
      .description("Build the Python binding against the custom prebuilt native library"),
  )
    .option("--force", "Rebuild even if a working build is installed", false)
    .option("--keep-workdir", "Keep the cloned source tree after the build", false)
    .parse();

  const opts = program.opts<BuildOptions>();
  const config = await resolveCliConfig(opts, {
    force: opts.force,
    keepWorkDir: opts.keepWorkdir,
  });

  const outcome = await runBuild(config);
  if (outcome.status === "built") {
    console.log(`\n📁 Runtime libraries: ${config.runtimeLibDir}`);
    console.log(`   Source: ${outcome.manifest.source.sha}`);
    console.log(`   Module: ${outcome.manifest.module.name} ${outcome.manifest.module.version}`);
  }
}

main().catch((error) => {
  exitWithError("Build failed", error);
});
