/**
 * Host platform detection for vendor archive URLs.
 *
 * Tags follow the names the prebuilt archives are published under:
 * `manylinux_x86_64`, `musllinux_aarch64`, `macosx_arm64`, `win_amd64`.
 */

import fs from "node:fs";

import { PLATFORM_PLACEHOLDER } from "./config.js";

export interface HostInfo {
  platform: NodeJS.Platform;
  /** `process.arch` value */
  arch: string;
  libc: "glibc" | "musl";
}

/**
 * musl systems ship their dynamic loader as /lib/ld-musl-<arch>.so.1.
 */
function detectLibc(): "glibc" | "musl" {
  try {
    return fs.readdirSync("/lib").some((name) => name.startsWith("ld-musl-")) ? "musl" : "glibc";
  } catch {
    return "glibc";
  }
}

export function currentHost(): HostInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    libc: process.platform === "linux" ? detectLibc() : "glibc",
  };
}

const LINUX_MACHINES: Record<string, string> = {
  x64: "x86_64",
  arm64: "aarch64",
  ia32: "i686",
  ppc64: "ppc64le",
  s390x: "s390x",
};

/**
 * Resolve the platform tag for a host.
 *
 * @throws Error when no archive is published for the host
 */
export function detectPlatform(host: HostInfo = currentHost()): string {
  const isArm64 = host.arch === "arm64";

  switch (host.platform) {
    case "linux": {
      const machine = LINUX_MACHINES[host.arch];
      if (!machine) break;
      return host.libc === "musl" ? `musllinux_${machine}` : `manylinux_${machine}`;
    }
    case "darwin":
      if (isArm64 || host.arch === "x64") {
        return isArm64 ? "macosx_arm64" : "macosx_x86_64";
      }
      break;
    case "win32":
      if (isArm64 || host.arch === "x64") {
        return isArm64 ? "win_arm64" : "win_amd64";
      }
      break;
    default:
      break;
  }

  throw new Error(`Unsupported platform: ${host.platform}/${host.arch}`);
}

/**
 * Substitute the platform tag into a URL template.
 */
export function resolveVendorUrl(template: string, platform: string): string {
  return template.replaceAll(PLATFORM_PLACEHOLDER, platform);
}
