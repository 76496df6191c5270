import type { Config } from "../config.js";
import { UserInputError } from "../errors.js";
import type { PushResult } from "../git.js";
import { info, repoFile } from "../ui.js";

export function requireRepoPath(config: Config): string {
  if (!config.backup_repo_path) {
    throw new UserInputError("Backup repository path is not set. Please run 'fuxi init' first.");
  }
  return config.backup_repo_path;
}

export function reportPush(result: PushResult): void {
  if (result.commitHash === null) {
    info("No changes to commit.");
    return;
  }
  for (const f of result.filesStaged) {
    info(`Staged: ${repoFile(f)}`);
  }
  info(`Pushed commit ${result.commitHash} to origin.`);
}
