// ---------------------------------------------------------------------------
// Docked Store – file-based persistence of the docked launcher list
// ---------------------------------------------------------------------------
// Storage layout:
//   ~/.config/dock-session/
//     docked.json – { version: 1, dockedApps: string[] }  (encoded paths)
// The list is rebuilt from the tracked entries and replaced wholesale.
// ---------------------------------------------------------------------------

import { existsSync, mkdirSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { AppEntry } from "./entry.js";
import type { DesktopPathCodec } from "./path-codec.js";
import type { DockedSetStore, DockedStoreFile } from "./types.js";

const DockedStoreFileSchema = Type.Object({
  version: Type.Literal(1),
  dockedApps: Type.Array(Type.String()),
});

// ---------------------------------------------------------------------------
// Read / write store file (atomic)
// ---------------------------------------------------------------------------

function emptyStore(): DockedStoreFile {
  return { version: 1, dockedApps: [] };
}

export async function readDockedStore(storePath: string): Promise<DockedStoreFile> {
  try {
    const raw = await fs.readFile(storePath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (!Value.Check(DockedStoreFileSchema, parsed)) {
      return emptyStore();
    }
    return parsed;
  } catch {
    return emptyStore();
  }
}

export async function writeDockedStore(storePath: string, store: DockedStoreFile): Promise<void> {
  const dir = path.dirname(storePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tmpPath = storePath + ".tmp";
  const content = JSON.stringify(store, null, 2);
  await fs.writeFile(tmpPath, content, "utf-8");
  await fs.rename(tmpPath, storePath);
}

// ---------------------------------------------------------------------------
// Serialised writes per store path
// ---------------------------------------------------------------------------

const storeLocks = new Map<string, Promise<unknown>>();

function resolveChain(p: Promise<unknown>): Promise<void> {
  return p.then(
    () => {},
    () => {},
  );
}

async function lockedStore<T>(storePath: string, fn: () => Promise<T>): Promise<T> {
  const storeOp = storeLocks.get(storePath) ?? Promise.resolve();
  const next = resolveChain(storeOp).then(fn);
  storeLocks.set(storePath, resolveChain(next));
  return next;
}

export function createFileDockedSetStore(storePath: string): DockedSetStore {
  return {
    load: async () => (await readDockedStore(storePath)).dockedApps,
    save: (dockedApps) =>
      lockedStore(storePath, () =>
        writeDockedStore(storePath, { version: 1, dockedApps: [...dockedApps] }),
      ),
  };
}

// ---------------------------------------------------------------------------
// Rebuild from entries
// ---------------------------------------------------------------------------

export function rebuildDockedList(entries: readonly AppEntry[], codec: DesktopPathCodec): string[] {
  const list: string[] = [];
  for (const entry of entries) {
    if (entry.isDocked && entry.launcherInfo) {
      list.push(codec.zip(entry.launcherInfo.filePath));
    }
  }
  return list;
}
