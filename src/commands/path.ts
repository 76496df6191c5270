import { Command } from "commander";
import { loadConfig, saveConfig, selectedProfilePaths } from "../config.js";
import type { Context } from "../context.js";
import { addPaths, changed, removePaths, type PathOutcome } from "../profiles.js";
import { info, success, warn } from "../ui.js";

const OUTCOME_LABELS: Record<PathOutcome["status"], string> = {
  added: "Added",
  exists: "Path already exists",
  removed: "Removed",
  missing: "Path not found",
};

function report(outcomes: PathOutcome[]): void {
  for (const o of outcomes) {
    const line = `${OUTCOME_LABELS[o.status]}: ${o.path}`;
    if (o.status === "added" || o.status === "removed") success(line);
    else warn(line);
  }
}

export function pathCommand(ctx: Context): Command {
  const paths = new Command("path").description("Manage the selected profile's paths");

  paths.addCommand(
    new Command("list").description("List all paths").action(() => {
      const list = selectedProfilePaths(loadConfig(ctx.configPath));
      if (list.length === 0) {
        info("No paths configured.");
        return;
      }
      info("Configured paths:");
      list.forEach((p, i) => info(`  ${i + 1}: ${p}`));
    }),
  );

  paths.addCommand(
    new Command("add")
      .description("Add path(s)")
      .argument("<paths...>", "Paths to add")
      .action((toAdd: string[]) => {
        const config = loadConfig(ctx.configPath);
        const outcomes = addPaths(config, toAdd);
        report(outcomes);
        if (changed(outcomes)) {
          saveConfig(config, ctx.configPath);
          info("Configuration updated successfully!");
        }
      }),
  );

  paths.addCommand(
    new Command("remove")
      .description("Remove path(s)")
      .argument("<paths...>", "Paths to remove")
      .action((toRemove: string[]) => {
        const config = loadConfig(ctx.configPath);
        const outcomes = removePaths(config, toRemove);
        report(outcomes);
        if (changed(outcomes)) {
          saveConfig(config, ctx.configPath);
          info("Configuration updated successfully!");
        }
      }),
  );

  return paths;
}
