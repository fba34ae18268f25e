/**
 * pkg-config metadata patching.
 *
 * The archive was built elsewhere, so each `.pc` file carries a `prefix=`
 * that does not exist locally. Everything else in the file derives from
 * `${prefix}`, so only that one line is rewritten.
 */

import fs from "node:fs/promises";
import { glob } from "tinyglobby";

/** Whole `prefix=` line, excluding any line terminator */
const PREFIX_LINE = /^prefix=[^\r\n]*/gm;

/**
 * Replace every `prefix=` line in `content`.
 */
export function patchPrefixLine(content: string, prefix: string): string {
  return content.replace(PREFIX_LINE, () => `prefix=${prefix}`);
}

/**
 * Point every `.pc` file in `pkgConfigDir` at `prefix`.
 *
 * @returns Absolute paths of the patched files
 * @throws Error when the directory holds no `.pc` files
 */
export async function patchPkgConfigFiles(pkgConfigDir: string, prefix: string): Promise<string[]> {
  const files = (await glob(["*.pc"], { cwd: pkgConfigDir, absolute: true })).sort();
  if (files.length === 0) {
    throw new Error(`No pkg-config files found in ${pkgConfigDir}`);
  }

  for (const file of files) {
    const content = await fs.readFile(file, "utf-8");
    await fs.writeFile(file, patchPrefixLine(content, prefix));
  }

  return files;
}
