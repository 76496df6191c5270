import { Command } from "commander";
import { loadConfig } from "../config.js";
import { gitShell, type Context } from "../context.js";
import { info, success } from "../ui.js";
import { reportPush, requireRepoPath } from "./shared.js";

export function saveCommand(ctx: Context): Command {
  return new Command("save")
    .description("Commit the backup repository and push it to GitHub")
    .option("-m, --message <message>", "Commit message")
    .option("--force", "Force save without confirmation")
    .action(async (opts: { message?: string; force?: boolean }) => {
      const config = loadConfig(ctx.configPath);
      const repoPath = requireRepoPath(config);

      if (!opts.force) {
        const confirmed = await ctx.confirm(
          "Are you sure you want to save the current configuration state?",
        );
        if (!confirmed) {
          info("Save cancelled.");
          return;
        }
      }

      const result = gitShell(ctx).push(repoPath, config.git_branch, opts.message ?? "Save configuration");
      reportPush(result);
      if (result.commitHash !== null) {
        success("Configuration saved successfully!");
      }
    });
}
