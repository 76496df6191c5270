import { Command } from "commander";
import { loadConfig } from "../config.js";
import { gitShell, type Context } from "../context.js";
import { info } from "../ui.js";
import { requireRepoPath } from "./shared.js";

export function listCommand(ctx: Context): Command {
  return new Command("list")
    .description("List all backups")
    .action(() => {
      const repoPath = requireRepoPath(loadConfig(ctx.configPath));
      const log = gitShell(ctx).log(repoPath);
      if (log.length === 0) {
        info("No backups found.");
        return;
      }
      info("Backups:");
      for (const line of log) {
        info(`  ${line}`);
      }
    });
}
