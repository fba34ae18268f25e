/**
 * Copies the vendor shared objects into the runtime library directory.
 *
 * Versioned libraries usually arrive as a chain:
 *   libavcodec.so -> libavcodec.so.61 -> libavcodec.so.61.3.100
 * The chain is recreated link by link; copying through the links would
 * leave the loader with three unrelated files, or with links pointing back
 * into the vendor tree that is deleted after the build.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { StagedLibrary } from "@avbuild/build-schema";

import { listSharedObjects } from "./workspace.js";

export interface StageOptions {
  /**
   * Tree removed once the build finishes. Links resolving into it are
   * copied through as files. Defaults to `sourceDir`.
   */
  transientRoot?: string;
}

function isInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Rewrite a link target so it stays valid once copied out of `sourceDir`.
 * Targets resolving to an entry of `sourceDir` become sibling names; any
 * other target becomes absolute.
 */
export function rewriteLinkTarget(target: string, sourceDir: string): string {
  const base = path.resolve(sourceDir);
  const resolved = path.resolve(base, target);
  return path.dirname(resolved) === base ? path.basename(resolved) : resolved;
}

async function copyFileWithMode(source: string, destination: string): Promise<void> {
  const stat = await fs.stat(source);
  await fs.copyFile(source, destination);
  await fs.chmod(destination, stat.mode & 0o7777);
}

/**
 * Stage every shared object from `sourceDir` into `targetDir`.
 *
 * @throws Error when nothing was staged, a staged link dangles, or a staged
 *   link still points into the transient tree
 */
export async function stageSharedLibraries(
  sourceDir: string,
  targetDir: string,
  options: StageOptions = {},
): Promise<StagedLibrary[]> {
  const names = await listSharedObjects(sourceDir);
  if (names.length === 0) {
    throw new Error(`No shared objects found in ${sourceDir}`);
  }

  const transientRoot = path.resolve(options.transientRoot ?? sourceDir);
  const stagedNames = new Set(names);
  await fs.mkdir(targetDir, { recursive: true });
  const staged: StagedLibrary[] = [];
  const dangling: string[] = [];

  for (const name of names) {
    const source = path.join(sourceDir, name);
    const destination = path.join(targetDir, name);
    const stat = await fs.lstat(source);

    await fs.rm(destination, { force: true });

    if (!stat.isSymbolicLink()) {
      await copyFileWithMode(source, destination);
      staged.push({ name, kind: "file" });
      continue;
    }

    const target = rewriteLinkTarget(await fs.readlink(source), sourceDir);
    if (!path.isAbsolute(target) && stagedNames.has(target)) {
      await fs.symlink(target, destination);
      staged.push({ name, kind: "symlink", target });
    } else if (isInside(path.resolve(sourceDir, target), transientRoot)) {
      try {
        await copyFileWithMode(await fs.realpath(source), destination);
        staged.push({ name, kind: "file" });
      } catch {
        dangling.push(`${name} -> ${target}`);
      }
    } else {
      await fs.symlink(target, destination);
      staged.push({ name, kind: "symlink", target });
    }
  }

  const realRoot = await fs.realpath(transientRoot);
  const escaping: string[] = [];
  for (const entry of staged) {
    if (entry.kind !== "symlink") continue;
    const link = `${entry.name} -> ${entry.target ?? "?"}`;
    try {
      const resolved = await fs.realpath(path.join(targetDir, entry.name));
      if (isInside(resolved, realRoot)) {
        escaping.push(link);
      }
    } catch {
      dangling.push(link);
    }
  }
  if (dangling.length > 0) {
    throw new Error(`Staged links do not resolve in ${targetDir}: ${dangling.join(", ")}`);
  }
  if (escaping.length > 0) {
    throw new Error(`Staged links point into ${transientRoot}: ${escaping.join(", ")}`);
  }

  return staged;
}
