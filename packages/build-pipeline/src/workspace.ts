/**
 * Workspace directory handling: reset before a build, cleanup after it,
 * and shared-object detection in the runtime library directory.
 */

import fs from "node:fs/promises";

/** `libfoo.so`, `libfoo.so.61`, `libfoo.so.61.3.100` */
export const SHARED_OBJECT_PATTERN = /\.so(\.\d+)*$/;

export function isSharedObject(fileName: string): boolean {
  return SHARED_OBJECT_PATTERN.test(fileName);
}

/**
 * Remove the working directory and the runtime library directory, then
 * recreate the runtime library directory empty. Missing paths are fine.
 */
export async function resetWorkspace(workDir: string, runtimeLibDir: string): Promise<void> {
  await fs.rm(workDir, { recursive: true, force: true });
  await fs.rm(runtimeLibDir, { recursive: true, force: true });
  await fs.mkdir(runtimeLibDir, { recursive: true });
}

/**
 * Remove the working directory once the compiled module is installed.
 */
export async function cleanupWorkspace(workDir: string): Promise<void> {
  await fs.rm(workDir, { recursive: true, force: true });
}

/**
 * Check if a directory exists.
 */
export async function directoryExists(dir: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dir);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * List shared-object entries (files and symlinks) in a directory.
 * Returns an empty list when the directory does not exist.
 */
export async function listSharedObjects(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && isSharedObject(entry.name))
      .map((entry) => entry.name)
      .sort();
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}
