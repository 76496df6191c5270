import { Command } from "commander";
import { loadConfig } from "../config.js";
import type { Context } from "../context.js";
import { info, heading, blank, unset as unsetLabel } from "../ui.js";

export function configCommand(ctx: Context): Command {
  return new Command("config")
    .description("Show the configuration file and current settings")
    .option("-r, --raw", "Output just the configuration file path")
    .action((opts: { raw?: boolean }) => {
      if (opts.raw) {
        console.log(ctx.configPath);
        return;
      }

      const config = loadConfig(ctx.configPath);
      const unset = unsetLabel();

      blank();
      heading("Configuration");
      info(`File: ${ctx.configPath}`);
      info(`Selected profile: ${config.selected_profile ?? unset}`);
      info(`Backup repository: ${config.backup_repo_path ?? unset}`);
      info(`GitHub repository: ${config.github_repo ?? unset}`);
      info(`Branch: ${config.git_branch}`);
      info(`Last backup: ${config.last_backup_id ?? unset}`);
      blank();
    });
}
