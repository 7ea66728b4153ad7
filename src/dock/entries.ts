// ---------------------------------------------------------------------------
// AppEntries – ordered collection of tracked entries
// ---------------------------------------------------------------------------

import * as path from "node:path";
import type { AppEntry } from "./entry.js";

export class AppEntries {
  private items: AppEntry[] = [];

  get length(): number {
    return this.items.length;
  }

  /** Point-in-time copy; later inserts/removals do not affect it. */
  snapshot(): AppEntry[] {
    return [...this.items];
  }

  filterDocked(): AppEntry[] {
    return this.items.filter((entry) => entry.isDocked);
  }

  indexOf(entry: AppEntry): number {
    return this.items.indexOf(entry);
  }

  getById(id: string): AppEntry | undefined {
    return this.items.find((entry) => entry.id === id);
  }

  getByInnerId(innerId: string): AppEntry | undefined {
    return this.items.find((entry) => entry.innerId === innerId);
  }

  getByWindowId(windowId: number): AppEntry | undefined {
    return this.items.find((entry) => entry.hasWindowId(windowId));
  }

  getByDesktopFilePath(filePath: string, opts: { dockedOnly?: boolean } = {}): AppEntry | undefined {
    const wanted = path.resolve(filePath);
    const pool = opts.dockedOnly ? this.filterDocked() : this.items;
    return pool.find((entry) => entry.launcherInfo?.filePath === wanted);
  }

  /** Inserts at `index`; a negative or out-of-range index appends. */
  insert(entry: AppEntry, index = -1): number {
    if (index < 0 || index >= this.items.length) {
      this.items.push(entry);
      return this.items.length - 1;
    }
    this.items.splice(index, 0, entry);
    return index;
  }

  remove(entry: AppEntry): boolean {
    const idx = this.items.indexOf(entry);
    if (idx === -1) {
      return false;
    }
    this.items.splice(idx, 1);
    return true;
  }

  move(fromIndex: number, toIndex: number): boolean {
    const len = this.items.length;
    if (fromIndex < 0 || fromIndex >= len || toIndex < 0 || toIndex >= len) {
      return false;
    }
    if (fromIndex === toIndex) {
      return true;
    }
    const [moved] = this.items.splice(fromIndex, 1);
    if (!moved) {
      return false;
    }
    this.items.splice(toIndex, 0, moved);
    return true;
  }
}
