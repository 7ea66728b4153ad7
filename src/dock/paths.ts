// ---------------------------------------------------------------------------
// Dock path resolution (scratch dir, docked store, application dirs)
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { resolveConfigHome, type DockSessionConfig } from "../config/config.js";

export type DockPaths = {
  scratchDir: string;
  storePath: string;
  userApplicationsDir: string;
  applicationDirs: string[];
};

const DEFAULT_DATA_DIRS = ["/usr/local/share", "/usr/share"];

function resolveDataHome(): string {
  const xdg = process.env.XDG_DATA_HOME;
  if (xdg && path.isAbsolute(xdg)) {
    return xdg;
  }
  const home = process.env.HOME ?? process.env.USERPROFILE ?? ".";
  return path.join(home, ".local", "share");
}

function resolveDataDirs(): string[] {
  const dirs = (process.env.XDG_DATA_DIRS ?? "")
    .split(":")
    .filter((dir) => dir && path.isAbsolute(dir));
  return dirs.length > 0 ? dirs : DEFAULT_DATA_DIRS;
}

export function resolveDockPaths(cfg: DockSessionConfig = {}): DockPaths {
  const base = path.join(resolveConfigHome(), "dock-session");
  const userApplicationsDir = path.join(resolveDataHome(), "applications");

  const applicationDirs = cfg.dock?.applicationDirs?.map((dir) => path.resolve(dir)) ?? [
    userApplicationsDir,
    ...resolveDataDirs().map((dir) => path.join(dir, "applications")),
  ];

  return {
    scratchDir: path.resolve(cfg.dock?.scratchDir ?? path.join(base, "scratch")),
    storePath: path.resolve(cfg.dock?.store ?? path.join(base, "docked.json")),
    userApplicationsDir,
    applicationDirs: [...new Set(applicationDirs)],
  };
}
