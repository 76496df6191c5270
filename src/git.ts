import type { DebugLogger } from "./debug.js";
import { GitError } from "./errors.js";
import type { ProcessRunner, RunResult } from "./process.js";

export const DEFAULT_COMMIT_MESSAGE = "Automated backup commit";

export interface PushResult {
  commitHash: string | null;
  filesStaged: string[];
}

export function githubRemoteUrl(repo: string): string {
  return `https://github.com/${repo}.git`;
}

export class GitShell {
  constructor(
    private runner: ProcessRunner,
    private logger?: DebugLogger,
  ) {}

  private exec(repoDir: string, args: string[]): RunResult {
    this.logger?.debug(`git ${args.join(" ")} (in ${repoDir})`);
    return this.runner.run("git", args, { cwd: repoDir });
  }

  run(repoDir: string, args: string[]): string {
    const result = this.exec(repoDir, args);
    if (result.exitCode !== 0) {
      throw new GitError(args, result.exitCode, result.stderr || result.stdout);
    }
    return result.stdout;
  }

  init(repoDir: string, branch: string): void {
    this.run(repoDir, ["init", "--initial-branch", branch]);
  }

  /** Adds `origin` unless the repository already has one. Returns true when added. */
  ensureRemote(repoDir: string, url: string): boolean {
    const remotes = this.run(repoDir, ["remote"]).split("\n").map((r) => r.trim());
    if (remotes.includes("origin")) return false;
    this.run(repoDir, ["remote", "add", "origin", url]);
    return true;
  }

  push(repoDir: string, branch: string, message?: string): PushResult {
    this.run(repoDir, ["add", "."]);

    const staged = this.run(repoDir, ["diff", "--cached", "--name-only"])
      .trim()
      .split("\n")
      .filter(Boolean);
    if (staged.length === 0) {
      return { commitHash: null, filesStaged: [] };
    }

    this.run(repoDir, ["commit", "-m", message ?? DEFAULT_COMMIT_MESSAGE]);
    const commitHash = this.run(repoDir, ["rev-parse", "--short", "HEAD"]).trim();
    this.run(repoDir, ["push", "origin", branch]);

    return { commitHash, filesStaged: staged };
  }

  /**
   * With a commit: fetch the branch and check the commit out (detached HEAD;
   * `checkout(repoDir, branch)` returns to the branch). Without: move the
   * local branch onto `origin/<branch>`, discarding local changes.
   */
  fetch(repoDir: string, branch: string, commit?: string): void {
    this.run(repoDir, ["fetch", "origin", branch]);
    if (commit) {
      this.checkout(repoDir, commit);
      return;
    }
    this.checkout(repoDir, branch);
    this.run(repoDir, ["reset", "--hard", `origin/${branch}`]);
  }

  checkout(repoDir: string, ref: string): void {
    this.run(repoDir, ["checkout", ref]);
  }

  pull(repoDir: string, branch: string): void {
    this.run(repoDir, ["pull", "origin", branch]);
  }

  /** False for a repository whose HEAD has no commit yet. */
  hasCommits(repoDir: string): boolean {
    const args = ["rev-parse", "-q", "--verify", "HEAD"];
    const result = this.exec(repoDir, args);
    if (result.exitCode === 0) return true;
    // --verify -q exits 1 for an unborn HEAD; 128 means git itself failed.
    if (result.exitCode === 1) return false;
    throw new GitError(args, result.exitCode, result.stderr || result.stdout);
  }

  /** `git log --oneline` lines, newest first. */
  log(repoDir: string): string[] {
    if (!this.hasCommits(repoDir)) return [];
    return this.run(repoDir, ["log", "--oneline"])
      .split("\n")
      .map((l) => l.trim())
      .filter(Boolean);
  }

  /**
   * Full hash of the newest commit whose hash starts with `id` or whose
   * subject mentions it. The repository must have at least one commit.
   */
  findCommit(repoDir: string, id: string): string | undefined {
    const lines = this.run(repoDir, ["log", "--format=%H %s"]).split("\n");
    for (const line of lines) {
      const space = line.indexOf(" ");
      const hash = space === -1 ? line.trim() : line.slice(0, space);
      const subject = space === -1 ? "" : line.slice(space + 1);
      if (hash && (hash.startsWith(id) || subject.includes(id))) {
        return hash;
      }
    }
    return undefined;
  }
}
