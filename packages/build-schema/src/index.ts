/**
 * @avbuild/build-schema
 *
 * Shared data structures for the avbuild pipeline: the build recipe,
 * the vendor descriptor handed to the fetch tool, the manifest recorded
 * after a successful build, and the installation report.
 */

export * from "./recipe.js";
export * from "./manifest.js";
export * from "./report.js";
export type { ModuleInfo } from "./report.js";
