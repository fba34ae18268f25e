/**
 * Build manifest persistence.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { BuildManifest } from "@avbuild/build-schema";

/**
 * Shape check for a parsed manifest. Only the fields the pipeline reads
 * back are checked.
 */
export function isBuildManifest(value: unknown): value is BuildManifest {
  if (typeof value !== "object" || value === null) return false;
  if (!("manifestVersion" in value) || value.manifestVersion !== "1.0") return false;
  if (!("recipe" in value) || typeof value.recipe !== "string") return false;
  if (!("builtAt" in value) || typeof value.builtAt !== "string") return false;
  if (!("source" in value) || typeof value.source !== "object" || value.source === null) {
    return false;
  }
  if (!("sha" in value.source) || typeof value.source.sha !== "string") return false;
  if (!("module" in value) || typeof value.module !== "object" || value.module === null) {
    return false;
  }
  if (!("version" in value.module) || typeof value.module.version !== "string") return false;
  return "stagedLibraries" in value && Array.isArray(value.stagedLibraries);
}

export async function writeManifest(filePath: string, manifest: BuildManifest): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(manifest, null, 2) + "\n");
}

/**
 * Read the manifest from a previous build.
 *
 * @returns The manifest, or null when it is missing or unreadable
 */
export async function readManifest(filePath: string): Promise<BuildManifest | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (isBuildManifest(parsed)) {
      return parsed;
    }
    console.warn(`   ⚠️  Ignoring malformed build manifest: ${filePath}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`   ⚠️  Ignoring unreadable build manifest ${filePath}: ${message}`);
  }
  return null;
}

/**
 * One-line summary for logs.
 */
export function describeManifest(manifest: BuildManifest): string {
  return (
    `${manifest.module.name} ${manifest.module.version} from ${manifest.source.sha.slice(0, 7)}, ` +
    `${manifest.stagedLibraries.length} libraries, built ${manifest.builtAt}`
  );
}
