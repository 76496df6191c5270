import { Command } from "commander";
import { loadConfig, saveConfig } from "../config.js";
import type { Context } from "../context.js";
import { createProfile, deleteProfile, listProfiles, switchProfile } from "../profiles.js";
import { info, success, warn, heading, blank, strong, selectedMark } from "../ui.js";

export function profileCommand(ctx: Context): Command {
  const profile = new Command("profile").description("Manage profiles");

  profile.addCommand(
    new Command("list").description("List all profiles").action(() => {
      const profiles = listProfiles(loadConfig(ctx.configPath));
      if (profiles.length === 0) {
        warn("No profiles found.");
        return;
      }

      blank();
      heading("Profiles");
      for (const p of profiles) {
        info(`Profile: ${strong(p.name)}${p.selected ? selectedMark() : ""}`);
        for (const path of p.paths) {
          info(`  - ${path}`);
        }
      }
      blank();
    }),
  );

  profile.addCommand(
    new Command("create")
      .description("Create a new profile")
      .argument("<name>", "Profile name")
      .action((name: string) => {
        const config = loadConfig(ctx.configPath);
        const result = createProfile(config, name);
        if (!result.created) {
          info(`Profile '${name}' already exists.`);
          return;
        }
        saveConfig(config, ctx.configPath);
        success(`Profile '${name}' created.`);
        if (result.selected) {
          info(`Profile '${name}' is now the selected profile.`);
        }
      }),
  );

  profile.addCommand(
    new Command("switch")
      .alias("select")
      .description("Switch to a profile")
      .argument("<name>", "Profile name")
      .action((name: string) => {
        const config = loadConfig(ctx.configPath);
        switchProfile(config, name);
        saveConfig(config, ctx.configPath);
        success(`Switched to profile '${name}'.`);
      }),
  );

  profile.addCommand(
    new Command("delete")
      .description("Delete a profile")
      .argument("<name>", "Profile name")
      .action((name: string) => {
        const config = loadConfig(ctx.configPath);
        const wasSelected = deleteProfile(config, name);
        saveConfig(config, ctx.configPath);
        success(`Profile '${name}' deleted.`);
        if (wasSelected) {
          warn("No profile is selected now.");
        }
      }),
  );

  return profile;
}
