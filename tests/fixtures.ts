import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { vi } from "vitest";
import type { Config } from "../src/config.js";
import { createContext, type Context } from "../src/context.js";
import type { ProcessRunner, RunOptions, RunResult } from "../src/process.js";

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "fuxi-test-"));
}

export interface RecordedCall {
  command: string;
  args: string[];
  cwd?: string;
  interactive?: boolean;
}

/** Records every invocation; answers from canned results keyed by the full command line. */
export class FakeRunner implements ProcessRunner {
  calls: RecordedCall[] = [];
  private responses = new Map<string, Partial<RunResult>>();

  on(commandLine: string, result: Partial<RunResult>): this {
    this.responses.set(commandLine, result);
    return this;
  }

  run(command: string, args: string[], opts: RunOptions = {}): RunResult {
    this.calls.push({ command, args, cwd: opts.cwd, interactive: opts.interactive });
    const canned = this.responses.get([command, ...args].join(" ")) ?? {};
    return { stdout: "", stderr: "", exitCode: 0, ...canned };
  }

  commandLines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(" "));
  }
}

/** A confirm capability that always gives `answer` and remembers what it was asked. */
export function scriptedConfirm(answer: boolean): { confirm: (message: string) => Promise<boolean>; prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    confirm: async (message: string) => {
      prompts.push(message);
      return answer;
    },
  };
}

const ANSI_RE = /\x1b\[[0-9;]*m/g;

/** Captures console.log output as trimmed lines without colors. */
export function captureOutput(): () => string[] {
  const lines: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    const text = args.map(String).join(" ").replace(ANSI_RE, "");
    for (const line of text.split("\n")) lines.push(line.trim());
  });
  return () => lines;
}

export function testContext(
  tmpDir: string,
  overrides: Partial<Context> = {},
): Context & { runner: FakeRunner } {
  const runner = overrides.runner instanceof FakeRunner ? overrides.runner : new FakeRunner();
  return {
    ...createContext({
      configPath: path.join(tmpDir, "config", "fuxi", "config.toml"),
      confirm: async () => true,
      platform: "linux",
      now: () => new Date(Date.UTC(2026, 0, 2, 3, 4, 5)),
      ...overrides,
    }),
    runner,
  };
}

export function sampleConfig(): Config {
  return {
    platform: "linux",
    selected_profile: "work",
    profiles: {
      work: ["/etc/hosts", "~/.ssh/config"],
      home: ["/home/user/.bashrc"],
    },
    last_backup_id: "backup_20260101_120000",
    backup_repo_path: "/srv/backups",
    github_repo: "alice/dotfiles",
    git_branch: "main",
  };
}

export function createLiveTree(tmpDir: string): string {
  const live = path.join(tmpDir, "live");
  fs.mkdirSync(live);

  fs.writeFileSync(path.join(live, "hosts"), "127.0.0.1 localhost\n");

  const nvim = path.join(live, "nvim");
  fs.mkdirSync(path.join(nvim, "lua", "plugins"), { recursive: true });
  fs.writeFileSync(path.join(nvim, "init.lua"), "require('plugins')\n");
  fs.writeFileSync(path.join(nvim, "lua", "plugins", "init.lua"), "return {}\n");
  fs.writeFileSync(path.join(nvim, "spell.bin"), Buffer.from([0, 1, 2, 255, 254]));

  return live;
}
