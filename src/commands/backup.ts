import { Command } from "commander";
import * as fs from "fs";
import { backupId } from "../backup-id.js";
import { loadConfig, saveConfig, selectedProfilePaths } from "../config.js";
import { gitShell, syncOptions, type Context } from "../context.js";
import { GitError, UserInputError } from "../errors.js";
import { requireSelectedProfile } from "../profiles.js";
import { mirrorLocation, syncPath } from "../sync.js";
import { info, warn, error, success, heading, blank, cmd, sanitizeUrls } from "../ui.js";
import { reportPush, requireRepoPath } from "./shared.js";

export function backupCommand(ctx: Context): Command {
  return new Command("backup")
    .description("Copy the selected profile's paths into the backup repository")
    .option("-m, --message <message>", "Backup commit message (with --push)")
    .option("--push", "Push to GitHub after backup")
    .action(async (opts: { message?: string; push?: boolean }) => {
      const config = loadConfig(ctx.configPath);
      const repoPath = requireRepoPath(config);
      if (!config.github_repo) {
        throw new UserInputError("GitHub repository is not set. Please run 'fuxi init' first.");
      }
      const profile = requireSelectedProfile(config, "backing up");
      const paths = selectedProfilePaths(config);
      if (paths.length === 0) {
        throw new UserInputError("No paths configured for the selected profile.");
      }

      // Resolve every destination before touching the disk.
      const plan = paths.map((source) => ({
        source,
        destination: mirrorLocation(repoPath, profile, source, ctx.platform),
      }));
      const id = backupId(ctx.now());

      blank();
      heading(`Backing up ${profile}...`);

      for (const { source, destination } of plan) {
        if (!fs.existsSync(source)) {
          warn(`Warning: Source path does not exist: ${source}`);
          continue;
        }
        await syncPath(source, destination, false, syncOptions(ctx));
        info(`Backed up ${source} to ${destination}`);
      }

      config.last_backup_id = id;
      saveConfig(config, ctx.configPath);
      success(`Backup '${id}' created successfully!`);

      if (!opts.push) {
        info(`Save the backup using the ${cmd("fuxi save")} command.`);
        blank();
        return;
      }

      try {
        reportPush(gitShell(ctx).push(repoPath, config.git_branch, opts.message ?? `Backup ${id}`));
        success("Backup pushed to GitHub successfully!");
      } catch (e) {
        if (!(e instanceof GitError)) throw e;
        error(`Error during push: ${sanitizeUrls(e.message)}`);
      }
      blank();
    });
}
