import { Command } from "commander";
import type { Context } from "./context.js";
import { applyCommand } from "./commands/apply.js";
import { backupCommand } from "./commands/backup.js";
import { configCommand } from "./commands/config.js";
import { initCommand } from "./commands/init.js";
import { listCommand } from "./commands/list.js";
import { pathCommand } from "./commands/path.js";
import { profileCommand } from "./commands/profile.js";
import { saveCommand } from "./commands/save.js";
import { VERSION, versionCommand } from "./commands/version.js";

export function createProgram(ctx: Context): Command {
  const program = new Command();
  program
    .name("fuxi")
    .description("Back up profile paths into a git repository and restore them")
    .version(VERSION, "-V, --version", "Output the version number")
    .option("-v, --verbose", "Verbose output")
    .hook("preAction", () => {
      ctx.logger.enabled = program.opts<{ verbose?: boolean }>().verbose === true;
    });

  program.addCommand(versionCommand());
  program.addCommand(configCommand(ctx));
  program.addCommand(initCommand(ctx));
  program.addCommand(profileCommand(ctx));
  program.addCommand(pathCommand(ctx));
  program.addCommand(backupCommand(ctx));
  program.addCommand(applyCommand(ctx));
  program.addCommand(saveCommand(ctx));
  program.addCommand(listCommand(ctx));

  return program;
}
