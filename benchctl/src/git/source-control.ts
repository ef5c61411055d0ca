import { simpleGit, GitError } from "simple-git";
import { ExternalCommandFailedError } from "../core/errors.js";

/**
 * Source-control collaborator used by the pinning resolver. Implementations
 * are bound to one repository directory; nothing depends on process.cwd().
 */
export interface SourceControl {
  /** Most recent commit touching `pathScope` at or before `date`, or null. */
  logBefore(date: Date, pathScope: string): Promise<string | null>;
  /** Check out `pathScope` as of `commit` into the working tree. */
  checkout(commit: string, pathScope: string): Promise<void>;
  /** Discard working-tree changes made by `checkout`. */
  resetHard(): Promise<void>;
}

/** The slice of simple-git this wrapper uses. */
export type GitRunner = {
  raw(args: string[]): Promise<string>;
};

/**
 * simple-git backed implementation. The repository root is passed
 * explicitly and used as the working directory for every call.
 */
export class GitSourceControl implements SourceControl {
  private git: GitRunner;

  constructor(
    readonly repoPath: string,
    git?: GitRunner,
  ) {
    this.git = git ?? simpleGit(repoPath);
  }

  async logBefore(date: Date, pathScope: string): Promise<string | null> {
    const out = await this.raw(["log", `--before=${date.toISOString()}`, "-n1", "--format=%H", "--", pathScope]);
    const sha = out.trim();
    return sha.length > 0 ? sha : null;
  }

  async checkout(commit: string, pathScope: string): Promise<void> {
    await this.raw(["checkout", commit, "--", pathScope]);
  }

  async resetHard(): Promise<void> {
    await this.raw(["reset", "--hard"]);
  }

  private async raw(args: string[]): Promise<string> {
    try {
      return await this.git.raw(args);
    } catch (e: unknown) {
      if (e instanceof GitError) {
        throw new ExternalCommandFailedError(["git", ...args], e.message);
      }
      throw e;
    }
  }
}
