/**
 * Installation report returned by `avbuild status` and the status server.
 */

export type InstallationStatus = "success" | "failed" | "error";

export interface InstallationReport {
  /**
   * - `success`: the module imported
   * - `failed`: the import raised
   * - `error`: the probe itself could not run
   */
  status: InstallationStatus;

  debugInfo: InstallationDebugInfo;

  moduleInfo: ModuleInfo;

  error: string | null;
}

export interface ModuleInfo {
  version?: string;
  file?: string;

  /** FFmpeg directory the binding was built against, when it reports one */
  ffmpegDir?: string;

  /** libavformat `major.minor` the binding links */
  formatVersion?: string;

  /** libavcodec `major.minor` the binding links */
  codecVersion?: string;
}

export interface InstallationDebugInfo {
  libDirExists: boolean;

  /** First few entries of the runtime library directory */
  filesFound?: string[];

  totalFiles?: number;

  /** Only filled when the runtime library directory is missing */
  cwd?: string;
  cwdListing?: string[];

  fsError?: string;
}
