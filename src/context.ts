import { resolveConfigPath } from "./config.js";
import { DebugLogger } from "./debug.js";
import { GitShell } from "./git.js";
import { LocalProcessRunner, type ProcessRunner } from "./process.js";
import { terminalConfirm, type Confirm } from "./prompt.js";
import type { SyncOptions } from "./sync.js";

/** Everything a command needs from the outside world. Tests swap in fakes. */
export interface Context {
  configPath: string;
  runner: ProcessRunner;
  confirm: Confirm;
  platform: string;
  logger: DebugLogger;
  now: () => Date;
}

export function createContext(overrides: Partial<Context> = {}): Context {
  return {
    configPath: overrides.configPath ?? resolveConfigPath(),
    runner: overrides.runner ?? new LocalProcessRunner(),
    confirm: overrides.confirm ?? terminalConfirm,
    platform: overrides.platform ?? process.platform,
    logger: overrides.logger ?? new DebugLogger(),
    now: overrides.now ?? (() => new Date()),
  };
}

export function gitShell(ctx: Context): GitShell {
  return new GitShell(ctx.runner, ctx.logger);
}

export function syncOptions(ctx: Context): SyncOptions {
  return { confirm: ctx.confirm, runner: ctx.runner, platform: ctx.platform, logger: ctx.logger };
}
