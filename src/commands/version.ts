import { Command } from "commander";

export const VERSION = "0.1.0";

export function versionCommand(): Command {
  return new Command("version")
    .description("Show version information")
    .action(() => {
      console.log(`fuxi version ${VERSION}`);
    });
}
