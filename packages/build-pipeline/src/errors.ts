/**
 * Error types raised by the build pipeline and the exit codes they map to.
 */

/**
 * Pipeline stages, in execution order.
 */
export const STAGES = [
  "gate",
  "reset",
  "source",
  "vendor-config",
  "tools",
  "vendor",
  "stage",
  "configure",
  "compile",
  "cleanup",
  "verify",
  "manifest",
] as const;

export type StageName = (typeof STAGES)[number];

/** Process exit codes used by the CLI commands */
export const EXIT_CODES = {
  success: 0,
  stageFailed: 1,
  invalidConfig: 2,
  verificationFailed: 3,
} as const;

/**
 * A child process exited non-zero, or could not be started at all.
 */
export class CommandError extends Error {
  readonly command: string;
  readonly args: string[];
  /** `null` when the process never started */
  readonly exitCode: number | null;
  /** Tail of captured stderr, when output was captured */
  readonly stderr: string;

  constructor(
    command: string,
    args: string[],
    exitCode: number | null,
    stderr = "",
    options?: { cause?: unknown },
  ) {
    const rendered = [command, ...args].join(" ");
    const reason = exitCode === null ? "could not be started" : `exited with code ${exitCode}`;
    super(`Command \`${rendered}\` ${reason}`, options);
    this.name = "CommandError";
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * A pipeline stage failed. Wraps the underlying error as `cause`.
 */
export class StageError extends Error {
  readonly stage: StageName;

  constructor(stage: StageName, message: string, options?: { cause?: unknown }) {
    super(`[${stage}] ${message}`, options);
    this.name = "StageError";
    this.stage = stage;
  }
}

/**
 * The recipe or the command-line overrides are invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The build finished but the installed module does not import.
 */
export class VerificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VerificationError";
  }
}

/**
 * Map an error to the process exit code the CLI reports.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof VerificationError) return EXIT_CODES.verificationFailed;
  if (error instanceof ConfigError) return EXIT_CODES.invalidConfig;
  return EXIT_CODES.stageFailed;
}

/**
 * Render an error and its cause chain for the operator.
 */
export function describeError(error: unknown): string {
  const lines: string[] = [];
  let current: unknown = error;
  let depth = 0;

  while (current !== undefined && depth < 5) {
    if (current instanceof Error) {
      lines.push(depth === 0 ? current.message : `caused by: ${current.message}`);
      if (current instanceof CommandError && current.stderr) {
        lines.push(current.stderr.trimEnd());
      }
      current = current.cause;
    } else {
      lines.push(depth === 0 ? String(current) : `caused by: ${String(current)}`);
      current = undefined;
    }
    depth++;
  }

  return lines.join("\n");
}
