#!/usr/bin/env tsx
/**
 * Fetch Vendor - writes the vendor descriptor and fetches the native
 * library archive into an existing checkout, without building.
 *
 * Usage:
 *   npm run avbuild:fetch-vendor -- --fetcher archive
 */

import { program } from "commander";

import { fetchVendorOnly } from "../pipeline.js";
import { addCommonOptions, exitWithError, resolveCliConfig, type CommonOptions } from "./options.js";

async function main() {
  addCommonOptions(
    program
      .name("avbuild-fetch-vendor")
      .description("Fetch the vendor archive into an existing checkout"),
  ).parse();

  const config = await resolveCliConfig(program.opts<CommonOptions>());
  const vendorDir = await fetchVendorOnly(config);

  console.log(`\n📁 Vendor libraries available at: ${vendorDir}`);
}

main().catch((error) => {
  exitWithError("Fetch failed", error);
});
