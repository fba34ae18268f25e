/**
 * Shared command-line handling for the avbuild commands.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Command } from "commander";

import {
  configFromEnv,
  createConfig,
  loadRecipe,
  parseFetcherKind,
  type AvBuildConfig,
} from "../config.js";
import { describeError, exitCodeFor } from "../errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Recipe used when `--config` is not given */
export const DEFAULT_RECIPE = path.resolve(__dirname, "../../../../configs/pyav-custom-ffmpeg.json");

export interface CommonOptions {
  config?: string;
  cwd?: string;
  python?: string;
  fetcher?: string;
}

/**
 * Register the options every command accepts.
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "Recipe file", DEFAULT_RECIPE)
    .option("--cwd <dir>", "Directory the build runs in (defaults to the current directory)")
    .option("--python <bin>", "Python interpreter (env: AVBUILD_PYTHON)")
    .option("--fetcher <kind>", "Vendor fetcher: script or archive (env: AVBUILD_FETCHER)");
}

/**
 * Build the run configuration: recipe, then environment, then flags.
 */
export async function resolveCliConfig(
  options: CommonOptions,
  extra: Partial<AvBuildConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<AvBuildConfig> {
  const recipe = await loadRecipe(path.resolve(options.config ?? DEFAULT_RECIPE));
  const overrides: Partial<AvBuildConfig> = { ...configFromEnv(env), ...extra };

  if (options.cwd) {
    overrides.cwd = path.resolve(options.cwd);
  }
  if (options.python) {
    overrides.python = options.python;
  }
  if (options.fetcher) {
    overrides.fetcher = parseFetcherKind(options.fetcher);
  }

  return createConfig({ ...recipe, ...overrides });
}

/**
 * Report a fatal error and exit with the code for its category.
 */
export function exitWithError(prefix: string, error: unknown): never {
  console.error(`❌ ${prefix}: ${describeError(error)}`);
  process.exit(exitCodeFor(error));
}
