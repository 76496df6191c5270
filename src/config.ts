import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { parse as parseToml, stringify as stringifyToml } from "smol-toml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { warn } from "./ui.js";

export const APP_NAME = "fuxi";
export const CONFIG_FILE_NAME = "config.toml";
export const DEFAULT_BRANCH = "main";

export interface Config {
  platform: string;
  selected_profile?: string;
  profiles: Record<string, string[]>;
  last_backup_id?: string;
  backup_repo_path?: string;
  github_repo?: string;
  git_branch: string;
}

const configSchema = z.object({
  platform: z.string().optional(),
  selected_profile: z.string().optional(),
  profiles: z.record(z.array(z.string())).optional(),
  last_backup_id: z.string().optional(),
  backup_repo_path: z.string().optional(),
  github_repo: z.string().optional(),
  git_branch: z.string().min(1).default(DEFAULT_BRANCH),
});

export function defaultConfig(platform: string = process.platform): Config {
  return { platform, profiles: {}, git_branch: DEFAULT_BRANCH };
}

/**
 * Per-user config directory the way most desktop tools pick it:
 * `$XDG_CONFIG_HOME` or `~/.config` on Linux, `~/Library/Application Support`
 * on macOS, `%APPDATA%` on Windows. `FUXI_CONFIG` points at a file directly.
 */
export function resolveConfigPath(
  env: Record<string, string | undefined> = process.env,
  platform: string = process.platform,
  homeDir: string = os.homedir(),
): string {
  const override = env.FUXI_CONFIG;
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }

  if (platform === "win32" && env.APPDATA) {
    return path.join(env.APPDATA, APP_NAME, CONFIG_FILE_NAME);
  }

  if (!homeDir) {
    throw new ConfigError("Could not determine config directory");
  }

  if (platform === "win32") {
    return path.join(homeDir, "AppData", "Roaming", APP_NAME, CONFIG_FILE_NAME);
  }
  if (platform === "darwin") {
    return path.join(homeDir, "Library", "Application Support", APP_NAME, CONFIG_FILE_NAME);
  }

  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg && path.isAbsolute(xdg) ? xdg : path.join(homeDir, ".config");
  return path.join(base, APP_NAME, CONFIG_FILE_NAME);
}

export function loadConfig(configPath: string): Config {
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = parseToml(fs.readFileSync(configPath, "utf-8"));
  } catch (e) {
    warn(`Ignoring unreadable config ${configPath}: ${errorMessage(e)}`);
    return defaultConfig();
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    warn(`Ignoring invalid config ${configPath}: ${message}`);
    return defaultConfig();
  }

  const data = parsed.data;
  return {
    platform: data.platform ?? process.platform,
    profiles: data.profiles ?? {},
    git_branch: data.git_branch,
    ...(data.selected_profile !== undefined ? { selected_profile: data.selected_profile } : {}),
    ...(data.last_backup_id !== undefined ? { last_backup_id: data.last_backup_id } : {}),
    ...(data.backup_repo_path !== undefined ? { backup_repo_path: data.backup_repo_path } : {}),
    ...(data.github_repo !== undefined ? { github_repo: data.github_repo } : {}),
  };
}

export function saveConfig(config: Config, configPath: string): void {
  // Scalars first: TOML puts every key after a table header into that table.
  const data: Record<string, unknown> = { platform: config.platform };
  if (config.selected_profile !== undefined) data.selected_profile = config.selected_profile;
  if (config.last_backup_id !== undefined) data.last_backup_id = config.last_backup_id;
  if (config.backup_repo_path !== undefined) data.backup_repo_path = config.backup_repo_path;
  if (config.github_repo !== undefined) data.github_repo = config.github_repo;
  data.git_branch = config.git_branch;
  data.profiles = config.profiles;

  const tmp = `${configPath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(tmp, stringifyToml(data) + "\n");
    fs.renameSync(tmp, configPath);
  } catch (e) {
    if (fs.existsSync(tmp)) fs.rmSync(tmp);
    throw new ConfigError(`Failed to write config ${configPath}: ${errorMessage(e)}`, { cause: e });
  }
}

/** Paths of the selected profile. A selection naming a missing profile reads as empty. */
export function selectedProfilePaths(config: Config): string[] {
  if (config.selected_profile === undefined) return [];
  return [...(config.profiles[config.selected_profile] ?? [])];
}
