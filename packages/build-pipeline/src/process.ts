/**
 * Child process execution.
 *
 * Every external tool (pip, python, the vendor fetch script) is started
 * through a `CommandRunner`, so tests can substitute an in-process fake.
 */

import { spawn } from "node:child_process";

import { CommandError } from "./errors.js";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /**
   * Capture stdout/stderr instead of streaming them to the terminal.
   * Long-running build steps stream so the operator sees the tool output.
   */
  capture?: boolean;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /**
   * Run a command to completion. Resolves with the exit code, whatever it is;
   * rejects with `CommandError` only when the process cannot be started.
   */
  run(command: string, args: string[], options?: RunOptions): Promise<RunResult>;
}

/** Bytes of stderr kept on a captured failure */
const STDERR_TAIL = 4000;

/**
 * Runner backed by `child_process.spawn`.
 */
export const spawnRunner: CommandRunner = {
  run(command, args, options = {}) {
    return new Promise<RunResult>((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: options.capture ? ["ignore", "pipe", "pipe"] : "inherit",
      });

      let stdout = "";
      let stderr = "";
      proc.stdout?.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      proc.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      proc.on("error", (error) => {
        reject(new CommandError(command, args, null, "", { cause: error }));
      });
      proc.on("close", (code, signal) => {
        // A signal-terminated process has no exit code; report it as a failure
        const exitCode = code ?? (signal ? 128 : 1);
        resolve({ exitCode, stdout, stderr });
      });
    });
  },
};

/**
 * Run a command and throw `CommandError` on a non-zero exit.
 */
export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions,
): Promise<RunResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandError(command, args, result.exitCode, result.stderr.slice(-STDERR_TAIL));
  }
  return result;
}
