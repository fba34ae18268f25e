/**
 * Vendor Archive Utilities
 *
 * Writes the vendor descriptor into the cloned tree and populates the vendor
 * directory with the prebuilt native library (headers, shared libraries and
 * pkg-config metadata).
 */

import crypto from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fileURLToPath } from "node:url";
import * as tar from "tar";
import type { VendorDescriptor, VendorFetcherKind } from "@avbuild/build-schema";

import { PLATFORM_PLACEHOLDER } from "./config.js";
import { detectPlatform, resolveVendorUrl, type HostInfo } from "./platform.js";
import { runOrThrow, type CommandRunner } from "./process.js";
import { directoryExists } from "./workspace.js";

/** Fetch script shipped in the binding project's source tree */
export const FETCH_SCRIPT = "scripts/fetch-vendor.py";

/**
 * Write the vendor descriptor consumed by the fetch tool.
 */
export async function writeVendorDescriptor(
  descriptorFile: string,
  descriptor: VendorDescriptor,
): Promise<void> {
  if (!descriptor.url.includes(PLATFORM_PLACEHOLDER)) {
    throw new Error(`Vendor URL template has no ${PLATFORM_PLACEHOLDER} placeholder: ${descriptor.url}`);
  }
  await fs.mkdir(path.dirname(descriptorFile), { recursive: true });
  await fs.writeFile(descriptorFile, JSON.stringify(descriptor) + "\n");
}

/**
 * Read a vendor descriptor back from disk.
 */
export async function readVendorDescriptor(descriptorFile: string): Promise<VendorDescriptor> {
  const content = await fs.readFile(descriptorFile, "utf-8");
  const parsed: unknown = JSON.parse(content);

  if (typeof parsed !== "object" || parsed === null || !("url" in parsed)) {
    throw new Error(`Vendor descriptor ${descriptorFile} has no "url"`);
  }
  const { url } = parsed;
  if (typeof url !== "string") {
    throw new Error(`Vendor descriptor ${descriptorFile}: "url" must be a string`);
  }

  const descriptor: VendorDescriptor = { url };
  if ("sha256" in parsed && typeof parsed.sha256 === "string") {
    descriptor.sha256 = parsed.sha256;
  }
  return descriptor;
}

export interface VendorFetchRequest {
  /** Working directory (the cloned source tree) */
  workDir: string;
  descriptorFile: string;
  vendorDir: string;
}

export interface VendorFetcher {
  readonly kind: VendorFetcherKind;
  fetch(request: VendorFetchRequest): Promise<void>;
}

/**
 * Delegates to the fetch script in the cloned source tree.
 */
export class ScriptVendorFetcher implements VendorFetcher {
  readonly kind = "script" as const;

  constructor(
    private readonly runner: CommandRunner,
    private readonly python: string,
  ) {}

  async fetch(request: VendorFetchRequest): Promise<void> {
    const { workDir, descriptorFile, vendorDir } = request;
    await runOrThrow(
      this.runner,
      this.python,
      [
        FETCH_SCRIPT,
        "--config-file",
        path.relative(workDir, descriptorFile),
        path.relative(workDir, vendorDir),
      ],
      { cwd: workDir },
    );
  }
}

/**
 * Resolves the platform, downloads and unpacks the archive in-process.
 */
export class ArchiveVendorFetcher implements VendorFetcher {
  readonly kind = "archive" as const;

  constructor(private readonly host?: HostInfo) {}

  async fetch(request: VendorFetchRequest): Promise<void> {
    const { workDir, descriptorFile, vendorDir } = request;
    const descriptor = await readVendorDescriptor(descriptorFile);
    const url = resolveVendorUrl(descriptor.url, detectPlatform(this.host));

    const archivePath = path.join(workDir, "vendor-archive.tar.gz");
    console.log(`   📡 Downloading: ${url}`);
    await downloadArchive(url, archivePath);

    if (descriptor.sha256) {
      const actual = await sha256File(archivePath);
      if (actual.toLowerCase() !== descriptor.sha256.toLowerCase()) {
        throw new Error(
          `Checksum mismatch for ${url}: expected ${descriptor.sha256}, got ${actual}`,
        );
      }
    }

    console.log(`   📦 Extracting to: ${vendorDir}`);
    await fs.mkdir(vendorDir, { recursive: true });
    await tar.extract({ file: archivePath, cwd: vendorDir });

    await fs.unlink(archivePath);
  }
}

/**
 * Download `url` to `destination`. `file://` URLs are copied.
 */
export async function downloadArchive(url: string, destination: string): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });

  if (url.startsWith("file://")) {
    await fs.copyFile(fileURLToPath(url), destination);
    return;
  }

  const response = await fetch(url, { redirect: "follow" });
  if (!response.ok) {
    throw new Error(`Failed to fetch vendor archive: ${response.status} ${response.statusText}`);
  }

  const body = response.body;
  if (!body) {
    throw new Error("No response body");
  }

  await pipeline(
    Readable.fromWeb(body as Parameters<typeof Readable.fromWeb>[0]),
    createWriteStream(destination),
  );
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  await pipeline(createReadStream(filePath), hash);
  return hash.digest("hex");
}

/**
 * Create the fetcher for a configured kind.
 */
export function createVendorFetcher(
  kind: VendorFetcherKind,
  options: { runner: CommandRunner; python: string; host?: HostInfo },
): VendorFetcher {
  switch (kind) {
    case "script":
      return new ScriptVendorFetcher(options.runner, options.python);
    case "archive":
      return new ArchiveVendorFetcher(options.host);
  }
}

/** Subtrees every vendor archive must provide */
export const VENDOR_SUBTREES = ["include", "lib", path.join("lib", "pkgconfig")] as const;

/**
 * Check the vendor directory has the expected layout.
 */
export async function assertVendorLayout(vendorDir: string): Promise<void> {
  const missing: string[] = [];
  for (const subtree of VENDOR_SUBTREES) {
    if (!(await directoryExists(path.join(vendorDir, subtree)))) {
      missing.push(subtree);
    }
  }
  if (missing.length > 0) {
    throw new Error(`Vendor directory ${vendorDir} is missing: ${missing.join(", ")}`);
  }
}
