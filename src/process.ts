import { spawnSync } from "child_process";

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd?: string;
  /** Attach the child to this terminal, e.g. so `sudo` can ask for a password. */
  interactive?: boolean;
}

export interface ProcessRunner {
  run(command: string, args: string[], opts?: RunOptions): RunResult;
}

export class LocalProcessRunner implements ProcessRunner {
  run(command: string, args: string[], opts: RunOptions = {}): RunResult {
    const result = spawnSync(command, args, {
      cwd: opts.cwd,
      env: process.env,
      encoding: "utf-8",
      stdio: opts.interactive ? "inherit" : "pipe",
    });
    if (result.error) {
      return { stdout: "", stderr: result.error.message, exitCode: 127 };
    }
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode: result.status ?? 1,
    };
  }
}
