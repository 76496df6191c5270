import { Command } from "commander";
import * as fs from "fs";
import { loadConfig, saveConfig, selectedProfilePaths } from "../config.js";
import { gitShell, syncOptions, type Context } from "../context.js";
import { GitError, UserInputError } from "../errors.js";
import { requireSelectedProfile } from "../profiles.js";
import { mirrorLocation, previewSync, syncPath } from "../sync.js";
import { info, warn, success, heading, blank, sanitizeUrls } from "../ui.js";
import { requireRepoPath } from "./shared.js";

const MIN_ID_LENGTH = 7;

export function applyCommand(ctx: Context): Command {
  return new Command("apply")
    .description("Restore the selected profile's paths from a backup")
    .argument("<id>", "Backup ID, commit hash, or 'latest'")
    .option("-d, --dryrun", "Show what would be done without making changes")
    .action(async (id: string, opts: { dryrun?: boolean }) => {
      const config = loadConfig(ctx.configPath);

      if (id === "latest") {
        if (!config.last_backup_id) {
          throw new UserInputError("No last backup ID found.");
        }
        info(`Using last backup ID: ${config.last_backup_id}`);
      } else if (id.length < MIN_ID_LENGTH) {
        throw new UserInputError("Please provide a valid backup ID or commit hash.");
      }

      const repoPath = requireRepoPath(config);
      const profile = requireSelectedProfile(config, "applying a backup");
      const paths = selectedProfilePaths(config);
      if (paths.length === 0) {
        throw new UserInputError("No paths configured for the selected profile.");
      }
      const plan = paths.map((destination) => ({
        source: mirrorLocation(repoPath, profile, destination, ctx.platform),
        destination,
      }));

      const git = gitShell(ctx);
      const branch = config.git_branch;

      if (!git.hasCommits(repoPath)) {
        throw new UserInputError("No backups found in the repository.");
      }

      let detached = false;
      if (id === "latest") {
        git.fetch(repoPath, branch);
        success("Fetched the latest backup from git repository.");
        try {
          git.pull(repoPath, branch);
        } catch (e) {
          if (!(e instanceof GitError)) throw e;
          warn(`Error during pull: ${sanitizeUrls(e.message)}`);
        }
      } else {
        const commit = git.findCommit(repoPath, id);
        if (!commit) {
          throw new UserInputError(`Backup ID or commit hash '${id}' not found.`);
        }
        git.fetch(repoPath, branch, commit);
        detached = true;
        success(`Fetched backup ${id} (${commit.slice(0, 7)}) from git repository.`);
      }

      blank();
      heading(opts.dryrun ? `Previewing ${profile}...` : `Applying ${profile}...`);

      try {
        await restorePaths(ctx, plan, opts.dryrun === true);
      } finally {
        // Leave HEAD on the branch that `push` sends.
        if (detached) git.checkout(repoPath, branch);
      }

      if (opts.dryrun) {
        info("(dry-run) Nothing was changed.");
        blank();
        return;
      }

      if (id !== "latest") {
        config.last_backup_id = id;
        saveConfig(config, ctx.configPath);
      }
      success(`Backup '${id}' applied successfully!`);
      blank();
    });
}

async function restorePaths(
  ctx: Context,
  plan: { source: string; destination: string }[],
  dryrun: boolean,
): Promise<void> {
  for (const { source, destination } of plan) {
    if (!fs.existsSync(source)) {
      warn(`Warning: Backup path does not exist in repository: ${source}`);
      continue;
    }

    if (dryrun) {
      info(`[Dry Run] Would apply ${source} to ${destination}`);
      const changes = previewSync(source, destination);
      if (changes.length === 0) {
        info("  Already up to date.");
      }
      for (const c of changes) {
        console.log(c);
      }
      continue;
    }

    await syncPath(source, destination, true, syncOptions(ctx));
    info(`Applied ${source} to ${destination}`);
  }
}
