import * as fs from "fs";
import * as path from "path";
import { createHash } from "crypto";
import { createTwoFilesPatch } from "diff";
import type { DebugLogger } from "./debug.js";
import { CopyError, UserInputError, errorMessage } from "./errors.js";
import type { ProcessRunner } from "./process.js";
import type { Confirm } from "./prompt.js";

export const ELEVATE_COMMAND = "sudo";

export interface SyncOptions {
  confirm: Confirm;
  runner: ProcessRunner;
  platform?: string;
  logger?: DebugLogger;
}

/**
 * The last normal component of a path: trailing separators, `.` and `..`
 * segments, and root or drive prefixes are skipped. `""` when none is left.
 */
export function lastComponent(p: string, platform: string = process.platform): string {
  const parts = platform === "win32" ? p.split(/[\\/]+/) : p.split("/");
  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i];
    if (part === "" || part === "." || part === "..") continue;
    if (platform === "win32" && i === 0 && /^[a-zA-Z]:$/.test(part)) continue;
    return part;
  }
  return "";
}

/** Where `source` lives inside the backup repository: `<repo>/<profile>/<last component>`. */
export function mirrorLocation(
  repoPath: string,
  profile: string,
  source: string,
  platform: string = process.platform,
): string {
  const name = lastComponent(source, platform);
  if (!name) {
    throw new UserInputError(`Cannot back up '${source}': the path has no file or directory name.`);
  }
  return path.join(repoPath, profile, name);
}

/**
 * Copies `source` to `destination`. A directory is recreated at `destination`
 * unless `flattenIntoExistingDir` is set, in which case its children are
 * merged into `destination`. Failed directory creation or copies may be
 * retried once with elevated privileges after confirmation.
 */
export async function syncPath(
  source: string,
  destination: string,
  flattenIntoExistingDir: boolean,
  opts: SyncOptions,
): Promise<void> {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(source);
  } catch (e) {
    throw new CopyError(`Cannot read ${source}: ${errorMessage(e)}`, source, destination, { cause: e });
  }

  if (!stat.isDirectory()) {
    await ensureDir(path.dirname(destination), source, opts);
    await copyEntry(source, destination, false, opts);
    return;
  }

  if (!flattenIntoExistingDir) {
    await copyEntry(source, destination, true, opts);
    return;
  }

  await ensureDir(destination, source, opts);

  let entries: string[];
  try {
    entries = fs.readdirSync(source).sort();
  } catch (e) {
    throw new CopyError(`Cannot list ${source}: ${errorMessage(e)}`, source, destination, { cause: e });
  }

  for (const entry of entries) {
    const srcEntry = path.join(source, entry);
    const dstEntry = path.join(destination, entry);
    const entryStat = statFollowingLinks(srcEntry);
    if (!entryStat) {
      opts.logger?.debug(`skipping broken link ${srcEntry}`);
      continue;
    }
    await copyEntry(srcEntry, dstEntry, entryStat.isDirectory(), opts);
  }
}

async function ensureDir(dir: string, source: string, opts: SyncOptions): Promise<void> {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (e) {
    await retryElevated(
      e,
      `Failed to create directory ${dir}: ${errorMessage(e)}`,
      `Retry creating it with ${ELEVATE_COMMAND}?`,
      [["mkdir", "-p", dir]],
      source,
      dir,
      opts,
    );
  }
}

async function copyEntry(src: string, dst: string, isDir: boolean, opts: SyncOptions): Promise<void> {
  opts.logger?.debug(`copy ${src} -> ${dst}`);
  try {
    if (isDir) {
      copyDirRecursive(src, dst);
    } else {
      fs.copyFileSync(src, dst);
    }
  } catch (e) {
    // `src/.` merges into an existing `dst` instead of nesting a new level.
    await retryElevated(
      e,
      `Failed to copy ${isDir ? "directory" : "file"} ${src} -> ${dst}: ${errorMessage(e)}`,
      `Retry with ${ELEVATE_COMMAND}?`,
      [
        ["mkdir", "-p", path.dirname(dst)],
        ["cp", "-a", isDir ? `${src}/.` : src, dst],
      ],
      src,
      dst,
      opts,
    );
  }
}

async function retryElevated(
  cause: unknown,
  failure: string,
  question: string,
  commands: string[][],
  source: string,
  destination: string,
  opts: SyncOptions,
): Promise<void> {
  const platform = opts.platform ?? process.platform;
  if (platform === "win32" || !(await opts.confirm(`${failure}. ${question}`))) {
    throw new CopyError(failure, source, destination, { cause });
  }

  for (const args of commands) {
    opts.logger?.debug(`${ELEVATE_COMMAND} ${args.join(" ")}`);
    const result = opts.runner.run(ELEVATE_COMMAND, args, { interactive: true });
    if (result.exitCode !== 0) {
      throw new CopyError(
        `${ELEVATE_COMMAND} ${args.join(" ")} failed with exit code ${result.exitCode}`,
        source,
        destination,
        { cause },
      );
    }
  }
}

function statFollowingLinks(p: string): fs.Stats | undefined {
  try {
    return fs.statSync(p);
  } catch {
    // Broken symlink
    return undefined;
  }
}

function copyDirRecursive(src: string, dst: string): void {
  fs.mkdirSync(dst, { recursive: true });

  for (const entry of fs.readdirSync(src)) {
    const srcPath = path.join(src, entry);
    const dstPath = path.join(dst, entry);
    const stat = statFollowingLinks(srcPath);
    if (!stat) continue;

    if (stat.isDirectory()) {
      copyDirRecursive(srcPath, dstPath);
    } else if (stat.isFile()) {
      fs.copyFileSync(srcPath, dstPath);
    }
  }
}

/**
 * What applying `source` onto `destination` would change: files that would be
 * created and unified diffs for files whose content differs. Files present
 * only at `destination` are left alone by a sync and are not listed.
 */
export function previewSync(source: string, destination: string): string[] {
  if (fs.statSync(source).isDirectory()) {
    const current = isDirectory(destination) ? collectFiles(destination) : {};
    return diffTrees(collectFiles(source), current);
  }

  const name = path.basename(destination);
  const current: Record<string, string> = isFile(destination) ? { [name]: readContent(destination) } : {};
  return diffTrees({ [name]: readContent(source) }, current);
}

function collectFiles(baseDir: string): Record<string, string> {
  const files: Record<string, string> = {};
  collectDir(baseDir, baseDir, files);
  return files;
}

function collectDir(dir: string, baseDir: string, files: Record<string, string>): void {
  for (const entry of fs.readdirSync(dir).sort()) {
    const full = path.join(dir, entry);
    const stat = statFollowingLinks(full);
    if (!stat) continue;
    if (stat.isFile()) {
      files[path.relative(baseDir, full)] = readContent(full);
    } else if (stat.isDirectory()) {
      collectDir(full, baseDir, files);
    }
  }
}

function readContent(file: string): string {
  const buf = fs.readFileSync(file);
  if (buf.includes(0)) {
    return `<binary ${createHash("sha1").update(buf).digest("hex").slice(0, 12)}>`;
  }
  return buf.toString("utf-8");
}

function isDirectory(p: string): boolean {
  return statFollowingLinks(p)?.isDirectory() ?? false;
}

function isFile(p: string): boolean {
  return statFollowingLinks(p)?.isFile() ?? false;
}

export function diffTrees(
  incomingFiles: Record<string, string>,
  currentFiles: Record<string, string>,
): string[] {
  const diffs: string[] = [];

  for (const p of Object.keys(incomingFiles).sort()) {
    const incoming = incomingFiles[p];

    if (!(p in currentFiles)) {
      diffs.push(`  + ${p} (new)`);
      continue;
    }

    const current = currentFiles[p];
    if (incoming === current) continue;

    diffs.push(createTwoFilesPatch(`live/${p}`, `backup/${p}`, current, incoming));
  }

  return diffs;
}
