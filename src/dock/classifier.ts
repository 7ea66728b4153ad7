// ---------------------------------------------------------------------------
// Launcher provenance – decides when an entry needs a scratch launcher
// ---------------------------------------------------------------------------

import * as path from "node:path";
import type { LauncherInfo } from "./types.js";

export type LauncherProvenance = "missing" | "installed" | "scratch" | "untrusted";

/** True only when `dir` is the file's immediate parent (no subdirectories). */
export function isFileInDir(file: string, dir: string): boolean {
  return path.dirname(path.resolve(file)) === path.resolve(dir);
}

export function classifyLauncher(info: LauncherInfo | null, scratchDir: string): LauncherProvenance {
  if (!info) {
    return "missing";
  }
  if (info.isInstalled) {
    return "installed";
  }
  if (isFileInDir(info.filePath, scratchDir)) {
    return "scratch";
  }
  return "untrusted";
}

/**
 * Only installed launchers and ones already synthesized into the scratch
 * directory are used as they are.
 */
export function needsScratch(info: LauncherInfo | null, scratchDir: string): boolean {
  const provenance = classifyLauncher(info, scratchDir);
  return provenance === "missing" || provenance === "untrusted";
}
