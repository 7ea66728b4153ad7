// ---------------------------------------------------------------------------
// DockService – dock/undock state machine over the tracked entries
// ---------------------------------------------------------------------------
// Dependency-injected and event-driven like the other services. Each entry
// carries its own reader/writer lock; there is no lock across entries.
//
//   dock:   write lock for the whole transition; nothing is committed
//           until scratch synthesis has succeeded.
//   undock: read lock to inspect and delete scratch files, then a write
//           lock for the final field commit, which re-checks the entry.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { classifyLauncher } from "./classifier.js";
import { rebuildDockedList } from "./docked-store.js";
import { AppEntries } from "./entries.js";
import { AppEntry } from "./entry.js";
import { DockIOError, DockStateError, describeError } from "./errors.js";
import type { DesktopPathCodec } from "./path-codec.js";
import { ScratchLauncherStore, type CleanupReport } from "./scratch.js";
import {
  WINDOW_HASH_PREFIX,
  type DockLog,
  type DockOutcome,
  type DockWindow,
  type DockedSetStore,
  type LauncherInfo,
  type LauncherResolver,
  type UndockOutcome,
  type WindowIdentifier,
  type WindowIdentity,
} from "./types.js";

// ---------------------------------------------------------------------------
// Dependencies (injected at construction)
// ---------------------------------------------------------------------------

export type DockServiceDeps = {
  scratchDir: string;
  dockedStore: DockedSetStore;
  pathCodec: DesktopPathCodec;
  resolveLauncher: LauncherResolver;
  identifyWindow: WindowIdentifier;
  log: DockLog;
  broadcast: (event: string, payload: unknown) => void;
};

type UndockInspection =
  | { proceed: false; outcome: UndockOutcome }
  | { proceed: true; desktopFile: string; inScratch: boolean };

type UndockCommit = "stale" | "remove" | "undocked";

// ---------------------------------------------------------------------------
// DockService
// ---------------------------------------------------------------------------

export class DockService {
  readonly entries = new AppEntries();
  readonly scratch: ScratchLauncherStore;
  private readonly deps: DockServiceDeps;
  private entrySeq = 0;

  constructor(deps: DockServiceDeps) {
    this.deps = deps;
    this.scratch = new ScratchLauncherStore({ scratchDir: deps.scratchDir, log: deps.log });
  }

  private emit(event: string, payload: unknown): void {
    this.deps.broadcast(event, payload);
  }

  private createEntry(
    innerId: string,
    launcherInfo: LauncherInfo | null,
    window?: DockWindow,
  ): AppEntry {
    this.entrySeq++;
    const entry = new AppEntry({ id: `e${this.entrySeq}`, innerId, launcherInfo });
    if (window) {
      entry.attachWindow(window);
    }
    entry.updateName();
    entry.updateIcon();
    entry.updateMenu();
    return entry;
  }

  private addEntry(entry: AppEntry, index = -1): void {
    this.entries.insert(entry, index);
    this.emit("dock.entry.added", entry.snapshot());
  }

  removeAppEntry(entry: AppEntry): boolean {
    if (!this.entries.remove(entry)) {
      return false;
    }
    this.deps.log.debug(`entry removed: ${entry.id} (${entry.innerId})`);
    this.emit("dock.entry.removed", { id: entry.id });
    return true;
  }

  // -------------------------------------------------------------------------
  // dockEntry
  // -------------------------------------------------------------------------

  async dockEntry(entry: AppEntry): Promise<DockOutcome> {
    const { log } = this.deps;
    const outcome = await entry.lock.write(async (): Promise<DockOutcome> => {
      if (entry.isDocked) {
        log.warn(`dockEntry skipped: entry ${entry.id} is already docked`);
        return "already-docked";
      }

      const provenance = classifyLauncher(entry.launcherInfo, this.scratch.dir);
      log.debug(`dockEntry ${entry.id}: launcher provenance ${provenance}`);
      if (provenance === "missing" || provenance === "untrusted") {
        const file = await this.scratch.createScratchSetForEntry(entry);
        const info = await this.deps.resolveLauncher(file);
        if (!info) {
          this.logCleanup(await this.scratch.removeScratchSet(file));
          throw new DockIOError(`scratch launcher is not usable: ${file}`, file);
        }
        log.debug(`dockEntry ${entry.id}: scratch launcher ${file}`);
        entry.setLauncherInfo(info);
        entry.updateIcon();
        entry.innerId = info.innerId;
      }

      entry.isDocked = true;
      entry.updateMenu();
      return "docked";
    });

    if (outcome === "docked") {
      log.info(`entry docked: ${entry.id} (${entry.name})`);
      this.emit("dock.entry.changed", entry.snapshot());
    }
    return outcome;
  }

  // -------------------------------------------------------------------------
  // undockEntry
  // -------------------------------------------------------------------------

  async undockEntry(entry: AppEntry): Promise<UndockOutcome> {
    const { log } = this.deps;

    const inspection = await entry.lock.read(async (): Promise<UndockInspection> => {
      if (!entry.isDocked) {
        log.warn(`undockEntry skipped: entry ${entry.id} is not docked`);
        return { proceed: false, outcome: "not-docked" };
      }
      if (!entry.launcherInfo) {
        log.warn(`undockEntry skipped: entry ${entry.id} has no launcher`);
        return { proceed: false, outcome: "no-launcher" };
      }

      const desktopFile = entry.launcherInfo.filePath;
      const inScratch = this.scratch.contains(desktopFile);
      if (inScratch) {
        this.logCleanup(await this.scratch.removeScratchSet(desktopFile));
      }
      return { proceed: true, desktopFile, inScratch };
    });

    if (!inspection.proceed) {
      return inspection.outcome;
    }

    // Other transitions may have run between the two locks: re-check before committing.
    const commit = await entry.lock.write(async (): Promise<UndockCommit> => {
      if (!entry.isDocked || entry.launcherInfo?.filePath !== inspection.desktopFile) {
        return "stale";
      }

      const current = entry.current;
      if (inspection.inScratch) {
        if (!current) {
          entry.setLauncherInfo(null);
        } else if (path.basename(inspection.desktopFile).startsWith(WINDOW_HASH_PREFIX)) {
          // synthesized from this window: the window identity is still valid
          entry.innerId = current.innerId;
          entry.setLauncherInfo(null);
        } else {
          // copy of a descriptor: the window may now match a different launcher
          log.debug(`re-identify window ${current.id} of entry ${entry.id}`);
          const identity = await this.reidentify(current);
          entry.innerId = identity.innerId;
          entry.setLauncherInfo(identity.launcherInfo);
        }
      }
      entry.isDocked = false;
      if (!current) {
        this.removeAppEntry(entry);
        return "remove";
      }
      entry.updateIcon();
      entry.updateName();
      entry.updateMenu();
      return "undocked";
    });

    if (commit === "stale") {
      log.warn(`undockEntry skipped: entry ${entry.id} changed while undocking`);
      return "not-docked";
    }
    if (commit === "remove") {
      log.info(`entry undocked and removed: ${entry.id}`);
      return "removed";
    }

    log.info(`entry undocked: ${entry.id} (${entry.name})`);
    this.emit("dock.entry.changed", entry.snapshot());
    return "undocked";
  }

  private async reidentify(window: DockWindow): Promise<WindowIdentity> {
    try {
      return await this.deps.identifyWindow(window);
    } catch (err) {
      this.deps.log.error(`re-identify window ${window.id} failed: ${describeError(err)}`);
      return { innerId: window.innerId, launcherInfo: null };
    }
  }

  private logCleanup(report: CleanupReport): void {
    if (report.failed.length > 0) {
      this.deps.log.warn(
        `scratch cleanup for ${report.base}: ${report.failed.length} file(s) left behind`,
      );
    } else {
      this.deps.log.debug(`scratch cleanup for ${report.base}: ${report.removed.length} removed`);
    }
  }

  // -------------------------------------------------------------------------
  // persistence
  // -------------------------------------------------------------------------

  async saveDockedApps(): Promise<string[]> {
    const dockedApps = rebuildDockedList(this.entries.snapshot(), this.deps.pathCodec);
    await this.deps.dockedStore.save(dockedApps);
    this.emit("dock.docked-apps.changed", { dockedApps });
    return dockedApps;
  }

  async loadDockedApps(): Promise<number> {
    const { log } = this.deps;
    const stored = await this.deps.dockedStore.load();
    let restored = 0;

    for (const encoded of stored) {
      const file = this.deps.pathCodec.unzip(encoded);
      const info = await this.deps.resolveLauncher(file);
      if (!info) {
        log.warn(`docked app not restored: ${file}`);
        continue;
      }
      const existing = this.entries.getByInnerId(info.innerId);
      if (existing) {
        if (await this.restoreExisting(existing, info)) {
          restored++;
        }
        continue;
      }
      const entry = this.createEntry(info.innerId, info);
      entry.isDocked = true;
      entry.updateMenu();
      this.addEntry(entry);
      restored++;
    }

    log.info(`restored ${restored} docked app(s)`);
    return restored;
  }

  private async restoreExisting(entry: AppEntry, info: LauncherInfo): Promise<boolean> {
    const { log } = this.deps;
    if (entry.isDocked) {
      log.debug(`docked app already tracked: ${info.filePath}`);
      return false;
    }
    await entry.lock.write(() => {
      if (!entry.isDocked && !entry.launcherInfo) {
        entry.setLauncherInfo(info);
      }
    });
    try {
      return (await this.dockEntry(entry)) === "docked";
    } catch (err) {
      log.warn(`docked app not restored: ${info.filePath}: ${describeError(err)}`);
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // dock / undock by entry id
  // -------------------------------------------------------------------------

  async dock(entryId: string): Promise<DockOutcome | null> {
    const entry = this.entries.getById(entryId);
    if (!entry) {
      return null;
    }
    const outcome = await this.dockEntry(entry);
    if (outcome === "docked") {
      await this.saveDockedApps();
    }
    return outcome;
  }

  async undock(entryId: string): Promise<UndockOutcome | null> {
    const entry = this.entries.getById(entryId);
    if (!entry) {
      return null;
    }
    const outcome = await this.undockEntry(entry);
    if (outcome === "undocked" || outcome === "removed") {
      await this.saveDockedApps();
    }
    return outcome;
  }

  // -------------------------------------------------------------------------
  // requestDock / requestUndock by launcher file
  // -------------------------------------------------------------------------

  async requestDock(desktopFile: string, index = -1): Promise<boolean> {
    const info = await this.deps.resolveLauncher(desktopFile);
    if (!info) {
      throw new DockStateError(`invalid desktop file: ${desktopFile}`);
    }

    let entry = this.entries.getByInnerId(info.innerId);
    const isNew = !entry;
    if (!entry) {
      entry = this.createEntry(info.innerId, info);
      // tracked before docking so a concurrent request finds it
      this.addEntry(entry, index);
    }

    let outcome: DockOutcome;
    try {
      outcome = await this.dockEntry(entry);
    } catch (err) {
      if (isNew) {
        this.removeAppEntry(entry);
      }
      throw err;
    }

    if (outcome === "docked") {
      await this.saveDockedApps();
    }
    return outcome === "docked";
  }

  async requestUndock(desktopFile: string): Promise<boolean> {
    const entry = this.entries.getByDesktopFilePath(desktopFile, { dockedOnly: true });
    if (!entry) {
      return false;
    }
    const outcome = await this.undockEntry(entry);
    if (outcome !== "undocked" && outcome !== "removed") {
      return false;
    }
    await this.saveDockedApps();
    return true;
  }

  isDocked(desktopFile: string): boolean {
    return this.entries.getByDesktopFilePath(desktopFile, { dockedOnly: true }) !== undefined;
  }

  getDockedAppsDesktopFiles(): string[] {
    return this.entries
      .filterDocked()
      .flatMap((entry) => (entry.launcherInfo ? [entry.launcherInfo.filePath] : []));
  }

  async moveEntry(fromIndex: number, toIndex: number): Promise<boolean> {
    if (!this.entries.move(fromIndex, toIndex)) {
      return false;
    }
    this.emit("dock.entry.moved", { fromIndex, toIndex });
    if (this.entries.filterDocked().length > 0) {
      await this.saveDockedApps();
    }
    return true;
  }

  // -------------------------------------------------------------------------
  // window lifecycle
  // -------------------------------------------------------------------------

  async attachWindow(window: DockWindow): Promise<AppEntry> {
    const known = this.entries.getByWindowId(window.id);
    if (known) {
      await known.lock.write(() => {
        known.attachWindow(window);
        known.updateName();
        known.updateIcon();
      });
      this.emit("dock.entry.changed", known.snapshot());
      return known;
    }

    const identity = await this.deps.identifyWindow(window);
    const existing = this.entries.getByInnerId(identity.innerId);
    if (!existing) {
      const entry = this.createEntry(identity.innerId, identity.launcherInfo, window);
      this.addEntry(entry);
      return entry;
    }

    await existing.lock.write(() => {
      existing.attachWindow(window);
      if (!existing.launcherInfo && identity.launcherInfo) {
        existing.setLauncherInfo(identity.launcherInfo);
      }
      existing.updateName();
      existing.updateIcon();
      existing.updateMenu();
    });
    this.emit("dock.entry.changed", existing.snapshot());
    return existing;
  }

  async detachWindow(windowId: number): Promise<boolean> {
    const entry = this.entries.getByWindowId(windowId);
    if (!entry) {
      return false;
    }

    const destroy = await entry.lock.write(() => {
      entry.detachWindow(windowId);
      if (!entry.hasWindow() && !entry.isDocked) {
        return true;
      }
      entry.updateName();
      entry.updateIcon();
      entry.updateMenu();
      return false;
    });

    if (destroy) {
      this.removeAppEntry(entry);
    } else {
      this.emit("dock.entry.changed", entry.snapshot());
    }
    return true;
  }
}
