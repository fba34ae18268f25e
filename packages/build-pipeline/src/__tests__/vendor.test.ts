/**
 * Tests for vendor descriptor handling and the fetchers
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { pathToFileURL } from "node:url";
import * as tar from "tar";

import { CommandError } from "../errors.js";
import type { HostInfo } from "../platform.js";
import {
  ArchiveVendorFetcher,
  ScriptVendorFetcher,
  assertVendorLayout,
  createVendorFetcher,
  readVendorDescriptor,
  sha256File,
  writeVendorDescriptor,
} from "../vendor.js";
import { FakeRunner, fail, populateVendor } from "./fakes.js";

const HOST: HostInfo = { platform: "linux", arch: "x64", libc: "glibc" };

describe("vendor descriptor", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "avbuild-descriptor-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("writes a one-key descriptor, creating the directory", async () => {
    const file = path.join(tempDir, "scripts", "ffmpeg-custom.json");

    await writeVendorDescriptor(file, { url: "https://example.invalid/ffmpeg-{platform}.tar.gz" });

    expect(await fs.readFile(file, "utf-8")).toBe(
      '{"url":"https://example.invalid/ffmpeg-{platform}.tar.gz"}\n',
    );
  });

  it("rejects a template without the platform placeholder", async () => {
    await expect(
      writeVendorDescriptor(path.join(tempDir, "d.json"), { url: "https://example.invalid/ffmpeg.tar.gz" }),
    ).rejects.toThrow("no {platform} placeholder");
  });

  it("reads back the url and checksum", async () => {
    const file = path.join(tempDir, "d.json");
    await writeVendorDescriptor(file, {
      url: "https://example.invalid/ffmpeg-{platform}.tar.gz",
      sha256: "b".repeat(64),
    });

    expect(await readVendorDescriptor(file)).toEqual({
      url: "https://example.invalid/ffmpeg-{platform}.tar.gz",
      sha256: "b".repeat(64),
    });
  });

  it("rejects a descriptor without a url", async () => {
    const file = path.join(tempDir, "d.json");
    await fs.writeFile(file, '{"href": "x"}');

    await expect(readVendorDescriptor(file)).rejects.toThrow('has no "url"');
  });
});

describe("ScriptVendorFetcher", () => {
  it("runs the fetch script relative to the checkout", async () => {
    const runner = new FakeRunner();
    const fetcher = new ScriptVendorFetcher(runner, "python-test");

    await fetcher.fetch({
      workDir: "/work/PyAV-Custom",
      descriptorFile: "/work/PyAV-Custom/scripts/ffmpeg-custom.json",
      vendorDir: "/work/PyAV-Custom/vendor",
    });

    expect(runner.calls).toEqual([
      {
        command: "python-test",
        args: ["scripts/fetch-vendor.py", "--config-file", "scripts/ffmpeg-custom.json", "vendor"],
        options: { cwd: "/work/PyAV-Custom" },
      },
    ]);
  });

  it("fails when the script fails", async () => {
    const runner = new FakeRunner(() => fail(2, "unsupported platform\n"));
    const fetcher = new ScriptVendorFetcher(runner, "python-test");

    const error = await fetcher
      .fetch({ workDir: "/w", descriptorFile: "/w/d.json", vendorDir: "/w/vendor" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ exitCode: 2, stderr: "unsupported platform\n" });
  });
});

describe("ArchiveVendorFetcher", () => {
  let tempDir: string;
  let workDir: string;
  let descriptorFile: string;
  let vendorDir: string;
  let archiveFile: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "avbuild-archive-test-"));
    workDir = path.join(tempDir, "work");
    descriptorFile = path.join(workDir, "scripts", "ffmpeg-custom.json");
    vendorDir = path.join(workDir, "vendor");
    archiveFile = path.join(tempDir, "ffmpeg-manylinux_x86_64.tar.gz");

    // Build the archive from a vendor layout
    const archiveSource = path.join(tempDir, "archive-source");
    await populateVendor(archiveSource);
    await tar.create({ gzip: true, file: archiveFile, cwd: archiveSource }, ["include", "lib"]);

    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const template = () => `${pathToFileURL(tempDir).href}/ffmpeg-{platform}.tar.gz`;

  it("resolves the platform and unpacks the archive", async () => {
    await writeVendorDescriptor(descriptorFile, { url: template() });

    await new ArchiveVendorFetcher(HOST).fetch({ workDir, descriptorFile, vendorDir });

    await assertVendorLayout(vendorDir);
    expect(await fs.readFile(path.join(vendorDir, "lib", "libavcodec.so.61.3.100"), "utf-8")).toBe(
      "ELF-avcodec",
    );
    expect(await fs.readlink(path.join(vendorDir, "lib", "libavcodec.so"))).toBe("libavcodec.so.61");
    await expect(fs.access(path.join(workDir, "vendor-archive.tar.gz"))).rejects.toThrow();
  });

  it("accepts a matching checksum", async () => {
    const sha256 = await sha256File(archiveFile);
    await writeVendorDescriptor(descriptorFile, { url: template(), sha256 });

    await new ArchiveVendorFetcher(HOST).fetch({ workDir, descriptorFile, vendorDir });

    await assertVendorLayout(vendorDir);
  });

  it("rejects a checksum mismatch", async () => {
    await writeVendorDescriptor(descriptorFile, { url: template(), sha256: "0".repeat(64) });

    await expect(
      new ArchiveVendorFetcher(HOST).fetch({ workDir, descriptorFile, vendorDir }),
    ).rejects.toThrow("Checksum mismatch");
    await expect(fs.access(vendorDir)).rejects.toThrow();
  });

  it("fails when no archive exists for the platform", async () => {
    await writeVendorDescriptor(descriptorFile, { url: template() });
    const host: HostInfo = { platform: "darwin", arch: "arm64", libc: "glibc" };

    await expect(
      new ArchiveVendorFetcher(host).fetch({ workDir, descriptorFile, vendorDir }),
    ).rejects.toThrow("ENOENT");
  });
});

describe("assertVendorLayout", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "avbuild-layout-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("names the missing subtrees", async () => {
    await fs.mkdir(path.join(tempDir, "lib"), { recursive: true });

    await expect(assertVendorLayout(tempDir)).rejects.toThrow(
      `Vendor directory ${tempDir} is missing: include, lib/pkgconfig`,
    );
  });
});

describe("createVendorFetcher", () => {
  it("creates the configured kind", () => {
    const runner = new FakeRunner();

    expect(createVendorFetcher("script", { runner, python: "python3" })).toBeInstanceOf(
      ScriptVendorFetcher,
    );
    expect(createVendorFetcher("archive", { runner, python: "python3" })).toBeInstanceOf(
      ArchiveVendorFetcher,
    );
  });
});
