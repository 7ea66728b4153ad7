// ---------------------------------------------------------------------------
// Launcher resolver – builds LauncherInfo from a .desktop file
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DESKTOP_ENTRY_GROUP, getDesktopEntryValue, parseDesktopEntry } from "./desktop-entry.js";
import { DockIOError, describeError } from "./errors.js";
import {
  DESKTOP_EXT,
  DESKTOP_HASH_PREFIX,
  WINDOW_HASH_PREFIX,
  type DockLog,
  type LauncherInfo,
  type LauncherResolver,
} from "./types.js";

function md5(value: string): string {
  return createHash("md5").update(value).digest("hex");
}

export function genDesktopInnerId(exec: string): string {
  return DESKTOP_HASH_PREFIX + md5(exec);
}

export function genWindowInnerId(parts: {
  wmClass: string | null;
  wmInstance?: string | null;
  exe?: string | null;
}): string {
  const key = [parts.wmClass ?? "", parts.wmInstance ?? "", parts.exe ?? ""].join("\0");
  return WINDOW_HASH_PREFIX + md5(key);
}

/** True when `filePath` lies anywhere below one of the application directories. */
export function isInstalledPath(filePath: string, applicationDirs: readonly string[]): boolean {
  const resolved = path.resolve(filePath);
  return applicationDirs.some((dir) => {
    const rel = path.relative(path.resolve(dir), resolved);
    return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
  });
}

export async function loadLauncherInfo(
  filePath: string,
  opts: { applicationDirs: readonly string[] },
): Promise<LauncherInfo> {
  const resolved = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.readFile(resolved, "utf-8");
  } catch (err) {
    throw new DockIOError(`cannot read launcher ${resolved}: ${describeError(err)}`, resolved, {
      cause: err,
    });
  }

  const groups = parseDesktopEntry(content);
  if (!groups.has(DESKTOP_ENTRY_GROUP)) {
    throw new DockIOError(`launcher ${resolved} has no [${DESKTOP_ENTRY_GROUP}] group`, resolved);
  }

  const exec = getDesktopEntryValue(groups, "Exec") ?? "";
  return {
    filePath: resolved,
    isInstalled: isInstalledPath(resolved, opts.applicationDirs),
    // Exec-less launchers fall back to their path so they stay distinct
    innerId: genDesktopInnerId(exec || resolved),
    name: getDesktopEntryValue(groups, "Name") ?? path.basename(resolved, DESKTOP_EXT),
    icon: getDesktopEntryValue(groups, "Icon") ?? "",
    exec,
  };
}

export function createLauncherResolver(opts: {
  applicationDirs: readonly string[];
  log: DockLog;
}): LauncherResolver {
  return async (filePath) => {
    try {
      return await loadLauncherInfo(filePath, opts);
    } catch (err) {
      opts.log.warn(`launcher not usable: ${describeError(err)}`);
      return null;
    }
  };
}
