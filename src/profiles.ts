import type { Config } from "./config.js";
import { UserInputError } from "./errors.js";

export type PathOutcome = { path: string; status: "added" | "exists" | "removed" | "missing" };

export function listProfiles(config: Config): Array<{ name: string; paths: string[]; selected: boolean }> {
  return Object.entries(config.profiles).map(([name, paths]) => ({
    name,
    paths: [...paths],
    selected: config.selected_profile === name,
  }));
}

/**
 * Returns false when the profile already exists. The first profile ever
 * created becomes the selected one.
 */
export function createProfile(config: Config, name: string): { created: boolean; selected: boolean } {
  if (!name.trim()) throw new UserInputError("Please provide a profile name.");
  if (Object.hasOwn(config.profiles, name)) {
    return { created: false, selected: false };
  }
  config.profiles[name] = [];
  if (Object.keys(config.profiles).length === 1) {
    config.selected_profile = name;
    return { created: true, selected: true };
  }
  return { created: true, selected: false };
}

export function switchProfile(config: Config, name: string): void {
  if (!Object.hasOwn(config.profiles, name)) {
    throw new UserInputError(`Profile '${name}' does not exist.`);
  }
  config.selected_profile = name;
}

/** Returns true when the deleted profile was the selected one. */
export function deleteProfile(config: Config, name: string): boolean {
  if (!Object.hasOwn(config.profiles, name)) {
    throw new UserInputError(`Profile '${name}' does not exist.`);
  }
  delete config.profiles[name];
  if (config.selected_profile === name) {
    delete config.selected_profile;
    return true;
  }
  return false;
}

export function requireSelectedProfile(config: Config, action: string): string {
  const selected = config.selected_profile;
  if (selected === undefined || selected === "") {
    throw new UserInputError(`No profile selected. Please select a profile before ${action}.`);
  }
  return selected;
}

export function addPaths(config: Config, paths: string[]): PathOutcome[] {
  const selected = requireSelectedProfile(config, "adding paths");
  const existing = config.profiles[selected] ?? [];
  config.profiles[selected] = existing;

  return paths.map((p) => {
    if (existing.includes(p)) return { path: p, status: "exists" };
    existing.push(p);
    return { path: p, status: "added" };
  });
}

export function removePaths(config: Config, paths: string[]): PathOutcome[] {
  const selected = requireSelectedProfile(config, "removing paths");
  const existing = config.profiles[selected] ?? [];

  return paths.map((p) => {
    const idx = existing.indexOf(p);
    if (idx === -1) return { path: p, status: "missing" };
    existing.splice(idx, 1);
    return { path: p, status: "removed" };
  });
}

export function changed(outcomes: PathOutcome[]): boolean {
  return outcomes.some((o) => o.status === "added" || o.status === "removed");
}
