export class FuxiError extends Error {
  code: string;
  exitCode: number;

  constructor(message: string, code = "ERR_FUXI", exitCode = 1, options?: ErrorOptions) {
    super(message, options);
    this.name = "FuxiError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends FuxiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ERR_CONFIG", 1, options);
    this.name = "ConfigError";
  }
}

export class UserInputError extends FuxiError {
  constructor(message: string) {
    super(message, "ERR_INPUT", 1);
    this.name = "UserInputError";
  }
}

export class GitError extends FuxiError {
  args: string[];
  gitExitCode: number;
  stderr: string;

  constructor(args: string[], gitExitCode: number, stderr: string) {
    const detail = stderr.trim() || "(no output)";
    super(`git ${args.join(" ")} failed with exit code ${gitExitCode}: ${detail}`, "ERR_GIT", 1);
    this.name = "GitError";
    this.args = args;
    this.gitExitCode = gitExitCode;
    this.stderr = stderr;
  }
}

export class CopyError extends FuxiError {
  source: string;
  destination: string;

  constructor(message: string, source: string, destination: string, options?: ErrorOptions) {
    super(message, "ERR_COPY", 1, options);
    this.name = "CopyError";
    this.source = source;
    this.destination = destination;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
