// ---------------------------------------------------------------------------
// Desktop entry files – scratch template and a group/key/value parser
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { DESKTOP_EXT, SCRATCH_EXTENSIONS } from "./types.js";

export const DESKTOP_ENTRY_GROUP = "Desktop Entry";

export type ScratchDescriptor = {
  name: string;
  exec: string;
  icon: string;
};

export function formatScratchDesktopEntry(item: ScratchDescriptor): string {
  return [
    `[${DESKTOP_ENTRY_GROUP}]`,
    `Name=${item.name}`,
    `Exec=${item.exec}`,
    `Icon=${item.icon}`,
    "Type=Application",
    "Terminal=false",
    "StartupNotify=false",
    "",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export type DesktopEntryGroups = Map<string, Map<string, string>>;

/**
 * Parse the group/key/value structure of a desktop entry file. Comments and
 * blank lines are skipped; keys before the first group header are dropped;
 * the first occurrence of a key in a group wins.
 */
export function parseDesktopEntry(content: string): DesktopEntryGroups {
  const groups: DesktopEntryGroups = new Map();
  let current: Map<string, string> | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    if (line.startsWith("[") && line.endsWith("]")) {
      const name = line.slice(1, -1);
      current = groups.get(name) ?? new Map<string, string>();
      groups.set(name, current);
      continue;
    }
    const eq = line.indexOf("=");
    if (eq <= 0 || !current) {
      continue;
    }
    const key = line.slice(0, eq).trim();
    if (!current.has(key)) {
      current.set(key, line.slice(eq + 1).trim());
    }
  }

  return groups;
}

export function getDesktopEntryValue(groups: DesktopEntryGroups, key: string): string | undefined {
  return groups.get(DESKTOP_ENTRY_GROUP)?.get(key);
}

// ---------------------------------------------------------------------------
// File name helpers
// ---------------------------------------------------------------------------

export function addDesktopExt(id: string): string {
  return id.endsWith(DESKTOP_EXT) ? id : id + DESKTOP_EXT;
}

/** Strip a scratch asset extension (.desktop, .sh, .png) if present. */
export function trimScratchExt(file: string): string {
  const ext = path.extname(file);
  return SCRATCH_EXTENSIONS.some((known) => known === ext) ? file.slice(0, -ext.length) : file;
}
