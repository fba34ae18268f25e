/**
 * Source repository cloning utilities
 */

import { simpleGit } from "simple-git";

/**
 * The subset of git the pipeline needs.
 */
export interface GitClient {
  clone(repoUrl: string, targetDir: string, options: string[]): Promise<void>;
  /** Commit SHA checked out in `repoDir` */
  headSha(repoDir: string): Promise<string>;
}

/**
 * `GitClient` backed by simple-git.
 */
export const simpleGitClient: GitClient = {
  async clone(repoUrl, targetDir, options) {
    await simpleGit().clone(repoUrl, targetDir, options);
  },
  async headSha(repoDir) {
    const sha = await simpleGit(repoDir).revparse(["HEAD"]);
    return sha.trim();
  },
};

export interface AcquireSourceOptions {
  repoUrl: string;
  /** Branch or tag; the remote HEAD when omitted */
  ref?: string;
  targetDir: string;
}

/**
 * Shallow-clone the upstream repository.
 *
 * @returns The commit SHA of the checkout
 */
export async function acquireSource(git: GitClient, options: AcquireSourceOptions): Promise<string> {
  const cloneOptions = ["--depth", "1"];
  if (options.ref) {
    cloneOptions.push("--branch", options.ref);
  }

  await git.clone(options.repoUrl, options.targetDir, cloneOptions);
  return git.headSha(options.targetDir);
}
