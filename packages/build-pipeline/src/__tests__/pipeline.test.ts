/**
 * Tests for the build pipeline
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import { readFileSync } from "node:fs";
import path from "node:path";
import os from "node:os";

import { createConfig, type AvBuildConfig } from "../config.js";
import { ConfigError, StageError, VerificationError, exitCodeFor } from "../errors.js";
import { runBuild, fetchVendorOnly } from "../pipeline.js";
import type { HostInfo } from "../platform.js";
import {
  FakeFetcher,
  FakeGit,
  FakeRunner,
  TEST_SHA,
  fail,
  isProbe,
  ok,
  pipVerb,
  probeOutput,
  type RecordedCall,
} from "./fakes.js";

const HOST: HostInfo = { platform: "linux", arch: "x64", libc: "glibc" };
const BUILT_AT = new Date("2026-01-02T03:04:05.000Z");
const NOT_FOUND = "ModuleNotFoundError: No module named 'av'";

/**
 * Runner that behaves like a Python environment where `pip install .`
 * makes the module importable.
 */
function pythonEnvironment(options: { installed?: boolean; installWorks?: boolean } = {}) {
  const state = { installed: options.installed ?? false, pcAtInstall: "" };
  const runner = new FakeRunner((call: RecordedCall) => {
    if (isProbe(call)) {
      return state.installed ? probeOutput("14.0.1") : fail(1, `Traceback\n${NOT_FOUND}\n`);
    }
    const verb = pipVerb(call);
    if (verb === "uninstall") {
      return ok("", "WARNING: Skipping av as it is not installed.\n");
    }
    if (verb === "install" && call.args[3] === ".") {
      const pcFile = path.join(call.options.cwd ?? "", "vendor", "lib", "pkgconfig", "libavcodec.pc");
      state.pcAtInstall = readFileSync(pcFile, "utf-8");
      state.installed = options.installWorks ?? true;
      return ok();
    }
    return ok();
  });
  return { runner, state };
}

describe("runBuild", () => {
  let tempDir: string;
  let config: AvBuildConfig;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "avbuild-pipeline-test-"));
    config = createConfig({
      name: "test-recipe",
      repoUrl: "https://example.invalid/binding.git",
      vendorUrlTemplate: "https://example.invalid/ffmpeg-{platform}.tar.gz",
      cwd: tempDir,
      python: "python-test",
    });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const workDir = () => path.join(tempDir, "PyAV-Custom");
  const libDir = () => path.join(tempDir, "lib_native");
  const manifestFile = () => path.join(tempDir, ".avbuild-manifest.json");

  async function populateRuntimeLibDir(): Promise<void> {
    await fs.mkdir(libDir(), { recursive: true });
    await fs.writeFile(path.join(libDir(), "libavcodec.so.61"), "ELF");
  }

  it("builds from a clean state", async () => {
    const { runner, state } = pythonEnvironment();
    const git = new FakeGit();
    const fetcher = new FakeFetcher();

    const outcome = await runBuild(config, { git, runner, fetcher, host: HOST, now: () => BUILT_AT });

    expect(outcome.status).toBe("built");
    if (outcome.status !== "built") return;

    expect(outcome.manifest).toEqual({
      manifestVersion: "1.0",
      recipe: "test-recipe",
      builtAt: "2026-01-02T03:04:05.000Z",
      source: { repoUrl: "https://example.invalid/binding.git", sha: TEST_SHA },
      vendor: {
        urlTemplate: "https://example.invalid/ffmpeg-{platform}.tar.gz",
        platform: "manylinux_x86_64",
        fetcher: "script",
      },
      module: { name: "av", version: "14.0.1" },
      runtimeLibDir: "lib_native",
      stagedLibraries: [
        { name: "libavcodec.so", kind: "symlink", target: "libavcodec.so.61" },
        { name: "libavcodec.so.61", kind: "symlink", target: "libavcodec.so.61.3.100" },
        { name: "libavcodec.so.61.3.100", kind: "file" },
      ],
      rpaths: ["/var/task/lib_native"],
    });

    // Clone
    expect(git.clones).toEqual([
      {
        repoUrl: "https://example.invalid/binding.git",
        targetDir: workDir(),
        options: ["--depth", "1"],
      },
    ]);

    // Working directory removed, runtime libraries kept and linked
    await expect(fs.access(workDir())).rejects.toThrow();
    expect((await fs.readdir(libDir())).sort()).toEqual([
      "libavcodec.so",
      "libavcodec.so.61",
      "libavcodec.so.61.3.100",
    ]);
    expect(await fs.readFile(path.join(libDir(), "libavcodec.so"), "utf-8")).toBe("ELF-avcodec");

    // pkg-config prefix pointed at the vendor directory before compiling
    expect(state.pcAtInstall.split("\n")[0]).toBe(`prefix=${path.join(workDir(), "vendor")}`);

    // Manifest persisted
    const written = JSON.parse(await fs.readFile(manifestFile(), "utf-8"));
    expect(written).toEqual(outcome.manifest);
  });

  it("runs the external tools in order with the build environment", async () => {
    const { runner } = pythonEnvironment();

    await runBuild(config, { git: new FakeGit(), runner, fetcher: new FakeFetcher(), host: HOST });

    const summary = runner.calls.map((call) => (isProbe(call) ? "probe" : pipVerb(call)));
    expect(summary).toEqual(["install", "uninstall", "install", "probe"]);

    expect(runner.calls[0].args).toEqual([
      "-m",
      "pip",
      "install",
      "--upgrade",
      "pip",
      "setuptools",
      "cython",
      "pkgconfig",
    ]);

    const compile = runner.calls[2];
    const vendorDir = path.join(workDir(), "vendor");
    expect(compile.command).toBe("python-test");
    expect(compile.args).toEqual([
      "-m",
      "pip",
      "install",
      ".",
      "-v",
      "--no-build-isolation",
      "--no-deps",
      "--no-binary",
      "av",
    ]);
    expect(compile.options.cwd).toBe(workDir());
    expect(compile.options.env?.CFLAGS).toBe(
      `-I${path.join(vendorDir, "include")} -Wno-deprecated-declarations`,
    );
    expect(compile.options.env?.LDFLAGS).toBe(
      `-L${path.join(vendorDir, "lib")} -Wl,-rpath,/var/task/lib_native`,
    );
    expect(compile.options.env?.PKG_CONFIG_PATH?.split(path.delimiter)[0]).toBe(
      path.join(vendorDir, "lib", "pkgconfig"),
    );
  });

  it("hands the descriptor and vendor paths to the fetcher", async () => {
    const { runner } = pythonEnvironment();
    const fetcher = new FakeFetcher();

    await runBuild(config, { git: new FakeGit(), runner, fetcher, host: HOST, now: () => BUILT_AT });

    expect(fetcher.requests).toEqual([
      {
        workDir: workDir(),
        descriptorFile: path.join(workDir(), "scripts", "ffmpeg-custom.json"),
        vendorDir: path.join(workDir(), "vendor"),
      },
    ]);
  });

  it("skips the build when the module imports and libraries are staged", async () => {
    await populateRuntimeLibDir();
    const { runner } = pythonEnvironment({ installed: true });
    const git = new FakeGit();
    const fetcher = new FakeFetcher();

    const outcome = await runBuild(config, { git, runner, fetcher, host: HOST });

    expect(outcome.status).toBe("skipped");
    expect(git.clones).toHaveLength(0);
    expect(fetcher.requests).toHaveLength(0);
    expect(runner.calls).toHaveLength(1);
    expect(isProbe(runner.calls[0])).toBe(true);
    expect(runner.calls[0].options.env?.LD_LIBRARY_PATH?.split(path.delimiter)[0]).toBe(libDir());
    expect(await fs.readdir(libDir())).toEqual(["libavcodec.so.61"]);
  });

  it("rebuilds when the library directory is staged but the module does not import", async () => {
    await populateRuntimeLibDir();
    const { runner } = pythonEnvironment();
    const git = new FakeGit();

    const outcome = await runBuild(config, { git, runner, fetcher: new FakeFetcher(), host: HOST });

    expect(outcome.status).toBe("built");
    expect(git.clones).toHaveLength(1);
    expect(isProbe(runner.calls[0])).toBe(true);
  });

  it("rebuilds without probing when the library directory is empty", async () => {
    await fs.mkdir(libDir());
    const { runner } = pythonEnvironment({ installed: true });
    const git = new FakeGit();

    const outcome = await runBuild(config, { git, runner, fetcher: new FakeFetcher(), host: HOST });

    expect(outcome.status).toBe("built");
    expect(git.clones).toHaveLength(1);
    expect(pipVerb(runner.calls[0])).toBe("install");
  });

  it("rebuilds unconditionally with force", async () => {
    await populateRuntimeLibDir();
    const { runner } = pythonEnvironment({ installed: true });
    const git = new FakeGit();

    const outcome = await runBuild(
      { ...config, force: true },
      { git, runner, fetcher: new FakeFetcher(), host: HOST },
    );

    expect(outcome.status).toBe("built");
    expect(git.clones).toHaveLength(1);
    // The stale file was replaced by the staged link
    expect(await fs.readFile(path.join(libDir(), "libavcodec.so.61"), "utf-8")).toBe("ELF-avcodec");
  });

  it("stops at the clone when the host is unreachable", async () => {
    const { runner } = pythonEnvironment();
    const git = new FakeGit(new Error("Could not resolve host: example.invalid"));
    const fetcher = new FakeFetcher();

    const error = await runBuild(config, { git, runner, fetcher, host: HOST }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({ stage: "source" });
    expect(exitCodeFor(error)).toBe(1);
    expect(runner.calls).toHaveLength(0);
    expect(fetcher.requests).toHaveLength(0);
    await expect(fs.access(manifestFile())).rejects.toThrow();
  });

  it("fails verification with its own exit code when the module does not import", async () => {
    const { runner } = pythonEnvironment({ installWorks: false });

    const error = await runBuild(config, {
      git: new FakeGit(),
      runner,
      fetcher: new FakeFetcher(),
      host: HOST,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VerificationError);
    expect(exitCodeFor(error)).toBe(3);
    await expect(fs.access(manifestFile())).rejects.toThrow();
  });

  it("fails the compile stage when uninstall fails for another reason", async () => {
    const runner = new FakeRunner((call) =>
      pipVerb(call) === "uninstall" ? fail(1, "ERROR: Permission denied\n") : ok(),
    );

    const error = await runBuild(config, {
      git: new FakeGit(),
      runner,
      fetcher: new FakeFetcher(),
      host: HOST,
    }).catch((e: unknown) => e);

    expect(error).toMatchObject({ stage: "compile" });
    expect(runner.calls.some((call) => call.args[3] === ".")).toBe(false);
  });

  it("fails the vendor stage when the archive has no pkg-config directory", async () => {
    const { runner } = pythonEnvironment();

    const error = await runBuild(config, {
      git: new FakeGit(),
      runner,
      fetcher: new FakeFetcher({ withPkgConfig: false }),
      host: HOST,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({ stage: "vendor" });
    expect(await fs.readdir(libDir())).toEqual([]);
  });

  it("keeps the working directory when asked to", async () => {
    const { runner } = pythonEnvironment();

    await runBuild(
      { ...config, keepWorkDir: true },
      { git: new FakeGit(), runner, fetcher: new FakeFetcher(), host: HOST },
    );

    await expect(fs.access(path.join(workDir(), "setup.py"))).resolves.toBeUndefined();
  });

  it("rejects an invalid recipe before touching the filesystem", async () => {
    const git = new FakeGit();

    await expect(
      runBuild({ ...config, vendorUrlTemplate: "https://example.invalid/ffmpeg.tar.gz" }, { git }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(git.clones).toHaveLength(0);
    await expect(fs.access(libDir())).rejects.toThrow();
  });
});

describe("fetchVendorOnly", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "avbuild-fetch-only-test-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("writes the descriptor and populates the vendor directory", async () => {
    const config = createConfig({
      name: "test-recipe",
      repoUrl: "https://example.invalid/binding.git",
      vendorUrlTemplate: "https://example.invalid/ffmpeg-{platform}.tar.gz",
      vendorSha256: "a".repeat(64),
      cwd: tempDir,
    });

    const vendorDir = await fetchVendorOnly(config, { fetcher: new FakeFetcher() });

    expect(vendorDir).toBe(path.join(tempDir, "PyAV-Custom", "vendor"));
    const descriptor = await fs.readFile(
      path.join(tempDir, "PyAV-Custom", "scripts", "ffmpeg-custom.json"),
      "utf-8",
    );
    expect(JSON.parse(descriptor)).toEqual({
      url: "https://example.invalid/ffmpeg-{platform}.tar.gz",
      sha256: "a".repeat(64),
    });
    await expect(fs.access(path.join(vendorDir, "lib", "pkgconfig"))).resolves.toBeUndefined();
  });
});
