import { Command } from "commander";
import * as fs from "fs";
import * as path from "path";
import { loadConfig, saveConfig } from "../config.js";
import { gitShell, type Context } from "../context.js";
import { UserInputError } from "../errors.js";
import { githubRemoteUrl } from "../git.js";
import { info, success, blank, cmd } from "../ui.js";

const GITHUB_REPO_RE = /^[^/\s]+\/[^/\s]+$/;

export function initCommand(ctx: Context): Command {
  return new Command("init")
    .description("Initialize the git backup repository")
    .argument("<repo>", "GitHub repository (username/repo-name)")
    .argument("<path>", "Local backup repository path")
    .action(async (repo: string, repoPath: string) => {
      if (!repoPath.trim()) {
        throw new UserInputError("Please provide a valid path for the backup repository.");
      }
      if (!GITHUB_REPO_RE.test(repo)) {
        throw new UserInputError(
          "Please provide a valid GitHub repository in the format username/repo-name.",
        );
      }

      const config = loadConfig(ctx.configPath);

      const confirmed = await ctx.confirm(
        "This will initialize a new Git repository at the specified path. Continue?",
      );
      if (!confirmed) {
        info("Initialization cancelled.");
        return;
      }

      const target = path.resolve(repoPath);
      const git = gitShell(ctx);

      fs.mkdirSync(target, { recursive: true });
      if (!fs.existsSync(path.join(target, ".git"))) {
        git.init(target, config.git_branch);
        info(`Initialized git repository in ${target}`);
      }
      const remote = githubRemoteUrl(repo);
      if (git.ensureRemote(target, remote)) {
        info(`Added remote origin: ${remote}`);
      }

      config.backup_repo_path = target;
      config.github_repo = repo;
      saveConfig(config, ctx.configPath);

      success(`Backups will use the ${repo} repository at ${target}`);
      blank();
      info(`Next: ${cmd("fuxi profile create <name>")} and ${cmd("fuxi path add <paths...>")}`);
    });
}
