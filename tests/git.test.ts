import { describe, test, expect } from "vitest";
import { GitError } from "../src/errors.js";
import { GitShell, githubRemoteUrl } from "../src/git.js";
import { FakeRunner } from "./fixtures.js";

const REPO = "/srv/backups";
const FULL_HASH = "abc1234def5678abc1234def5678abc1234def56";
const OTHER_HASH = "def5678abc1234def5678abc1234def5678abc12";

function shell(): { git: GitShell; runner: FakeRunner } {
  const runner = new FakeRunner();
  return { git: new GitShell(runner), runner };
}

describe("GitShell.run", () => {
  test("returns stdout and runs in the repository", () => {
    const { git, runner } = shell();
    runner.on("git status --porcelain", { stdout: " M work/hosts\n" });
    expect(git.run(REPO, ["status", "--porcelain"])).toBe(" M work/hosts\n");
    expect(runner.calls[0]).toEqual({ command: "git", args: ["status", "--porcelain"], cwd: REPO, interactive: undefined });
  });

  test("non-zero exit raises GitError with stderr", () => {
    const { git, runner } = shell();
    runner.on("git push origin main", { exitCode: 128, stderr: "fatal: no upstream\n" });
    let caught: unknown;
    try {
      git.run(REPO, ["push", "origin", "main"]);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(GitError);
    const err = caught instanceof GitError ? caught : undefined;
    expect(err?.message).toBe("git push origin main failed with exit code 128: fatal: no upstream");
    expect(err?.stderr).toBe("fatal: no upstream\n");
    expect(err?.gitExitCode).toBe(128);
  });
});

describe("GitShell.push", () => {
  test("nothing staged skips commit and push", () => {
    const { git, runner } = shell();
    expect(git.push(REPO, "main")).toEqual({ commitHash: null, filesStaged: [] });
    expect(runner.commandLines()).toEqual(["git add .", "git diff --cached --name-only"]);
  });

  test("commits and pushes staged changes", () => {
    const { git, runner } = shell();
    runner
      .on("git diff --cached --name-only", { stdout: "work/hosts\nwork/nvim/init.lua\n" })
      .on("git rev-parse --short HEAD", { stdout: "abc1234\n" });

    expect(git.push(REPO, "main", "Backup backup_20260102_030405")).toEqual({
      commitHash: "abc1234",
      filesStaged: ["work/hosts", "work/nvim/init.lua"],
    });
    expect(runner.commandLines()).toEqual([
      "git add .",
      "git diff --cached --name-only",
      "git commit -m Backup backup_20260102_030405",
      "git rev-parse --short HEAD",
      "git push origin main",
    ]);
  });

  test("uses the default commit message", () => {
    const { git, runner } = shell();
    runner.on("git diff --cached --name-only", { stdout: "work/hosts\n" });
    git.push(REPO, "main");
    expect(runner.calls[2].args).toEqual(["commit", "-m", "Automated backup commit"]);
  });
});

describe("GitShell.fetch and pull", () => {
  test("a commit is checked out after fetching its branch", () => {
    const { git, runner } = shell();
    git.fetch(REPO, "main", FULL_HASH);
    expect(runner.commandLines()).toEqual(["git fetch origin main", `git checkout ${FULL_HASH}`]);
  });

  test("without a commit the branch is reset to origin", () => {
    const { git, runner } = shell();
    git.fetch(REPO, "main");
    expect(runner.commandLines()).toEqual([
      "git fetch origin main",
      "git checkout main",
      "git reset --hard origin/main",
    ]);
  });

  test("pull", () => {
    const { git, runner } = shell();
    git.pull(REPO, "trunk");
    expect(runner.commandLines()).toEqual(["git pull origin trunk"]);
  });
});

describe("GitShell.hasCommits and log", () => {
  test("an unborn HEAD has no commits and an empty log", () => {
    const { git, runner } = shell();
    runner.on("git rev-parse -q --verify HEAD", { exitCode: 1 });
    expect(git.hasCommits(REPO)).toBe(false);
    expect(git.log(REPO)).toEqual([]);
    expect(runner.commandLines()).toEqual(["git rev-parse -q --verify HEAD", "git rev-parse -q --verify HEAD"]);
  });

  test("does not depend on the wording of git's messages", () => {
    const { git, runner } = shell();
    runner.on("git rev-parse -q --verify HEAD", { exitCode: 1, stderr: "fatal: Ihr aktueller Branch 'main' hat noch keine Commits\n" });
    expect(git.log(REPO)).toEqual([]);
  });

  test("outside a repository the failure propagates", () => {
    const { git, runner } = shell();
    runner.on("git rev-parse -q --verify HEAD", { exitCode: 128, stderr: "fatal: not a git repository\n" });
    expect(() => git.hasCommits(REPO)).toThrow(GitError);
    expect(() => git.log(REPO)).toThrow("git rev-parse -q --verify HEAD failed with exit code 128: fatal: not a git repository");
  });

  test("log lines come from --oneline", () => {
    const { git, runner } = shell();
    runner.on("git log --oneline", { stdout: "abc1234 Backup backup_20260102_030405\ndef5678 Save configuration\n" });
    expect(git.log(REPO)).toEqual(["abc1234 Backup backup_20260102_030405", "def5678 Save configuration"]);
  });

  test("other log failures propagate", () => {
    const { git, runner } = shell();
    runner.on("git log --oneline", { exitCode: 128, stderr: "fatal: bad object HEAD\n" });
    expect(() => git.log(REPO)).toThrow(GitError);
  });
});

describe("GitShell.findCommit", () => {
  function withHistory(): { git: GitShell; runner: FakeRunner } {
    const s = shell();
    s.runner.on("git log --format=%H %s", {
      stdout: `${FULL_HASH} Backup backup_20260102_030405\n${OTHER_HASH} Save configuration\n`,
    });
    return s;
  }

  test("resolves a hash prefix to the full hash", () => {
    const { git } = withHistory();
    expect(git.findCommit(REPO, "def5678")).toBe(OTHER_HASH);
    expect(git.findCommit(REPO, FULL_HASH)).toBe(FULL_HASH);
  });

  test("resolves a backup id through the commit subject", () => {
    const { git } = withHistory();
    expect(git.findCommit(REPO, "backup_20260102_030405")).toBe(FULL_HASH);
  });

  test("unknown ids resolve to nothing", () => {
    const { git } = withHistory();
    expect(git.findCommit(REPO, "backup_19990101_000000")).toBeUndefined();
  });
});

describe("GitShell.init and ensureRemote", () => {
  test("init uses the configured branch", () => {
    const { git, runner } = shell();
    git.init(REPO, "main");
    expect(runner.commandLines()).toEqual(["git init --initial-branch main"]);
  });

  test("adds origin when missing", () => {
    const { git, runner } = shell();
    expect(git.ensureRemote(REPO, githubRemoteUrl("alice/dotfiles"))).toBe(true);
    expect(runner.commandLines()).toEqual([
      "git remote",
      "git remote add origin https://github.com/alice/dotfiles.git",
    ]);
  });

  test("keeps an existing origin", () => {
    const { git, runner } = shell();
    runner.on("git remote", { stdout: "origin\n" });
    expect(git.ensureRemote(REPO, githubRemoteUrl("alice/dotfiles"))).toBe(false);
    expect(runner.commandLines()).toEqual(["git remote"]);
  });
});
