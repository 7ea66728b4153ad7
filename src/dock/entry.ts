// ---------------------------------------------------------------------------
// AppEntry – one tracked application (window-backed and/or launcher-backed)
// ---------------------------------------------------------------------------
// Mutable fields are guarded by `lock`; DockService takes it around every
// transition. The refresh helpers below assume the caller holds it.
// ---------------------------------------------------------------------------

import { AsyncRwLock } from "./rw-lock.js";
import {
  DEFAULT_ICON,
  type DockEntrySnapshot,
  type DockMenuItem,
  type DockWindow,
  type LauncherInfo,
} from "./types.js";

/** What the scratch store needs to synthesize a launcher for an entry. */
export type ScratchSource = {
  readonly launcherInfo: LauncherInfo | null;
  readonly current: DockWindow | null;
  getExec: () => string;
};

export type AppEntryInit = {
  id: string;
  innerId: string;
  launcherInfo?: LauncherInfo | null;
};

export class AppEntry implements ScratchSource {
  readonly id: string;
  readonly lock = new AsyncRwLock();

  innerId: string;
  isDocked = false;
  launcherInfo: LauncherInfo | null;
  current: DockWindow | null = null;

  name = "";
  icon = DEFAULT_ICON;
  menu: DockMenuItem[] = [];

  private readonly windows = new Map<number, DockWindow>();

  constructor(init: AppEntryInit) {
    this.id = init.id;
    this.innerId = init.innerId;
    this.launcherInfo = init.launcherInfo ?? null;
  }

  setLauncherInfo(info: LauncherInfo | null): void {
    this.launcherInfo = info;
  }

  // -------------------------------------------------------------------------
  // windows
  // -------------------------------------------------------------------------

  hasWindow(): boolean {
    return this.windows.size > 0;
  }

  hasWindowId(windowId: number): boolean {
    return this.windows.has(windowId);
  }

  get windowIds(): number[] {
    return [...this.windows.keys()];
  }

  /** Returns false when the window was already attached. */
  attachWindow(window: DockWindow): boolean {
    const isNew = !this.windows.has(window.id);
    this.windows.set(window.id, window);
    if (!this.current || this.current.id === window.id) {
      this.current = window;
    }
    return isNew;
  }

  detachWindow(windowId: number): boolean {
    if (!this.windows.delete(windowId)) {
      return false;
    }
    if (this.current?.id === windowId) {
      const [next] = this.windows.values();
      this.current = next ?? null;
    }
    return true;
  }

  // -------------------------------------------------------------------------
  // derived display state
  // -------------------------------------------------------------------------

  /** Launch command: the current window's process first, then the launcher. */
  getExec(): string {
    if (this.current) {
      return this.current.exec;
    }
    return this.launcherInfo?.exec ?? "";
  }

  updateName(): void {
    this.name = this.launcherInfo?.name || this.current?.title || "Unknown";
  }

  updateIcon(): void {
    this.icon = this.launcherInfo?.icon || this.current?.icon || DEFAULT_ICON;
  }

  updateMenu(): void {
    const menu: DockMenuItem[] = [];
    if (this.launcherInfo || this.current) {
      menu.push({ action: "launch", label: "Open" });
    }
    if (this.hasWindow()) {
      menu.push({ action: "close-all", label: "Close All" });
    }
    menu.push(
      this.isDocked ? { action: "undock", label: "Undock" } : { action: "dock", label: "Dock" },
    );
    this.menu = menu;
  }

  snapshot(): DockEntrySnapshot {
    return {
      id: this.id,
      innerId: this.innerId,
      name: this.name,
      icon: this.icon,
      isDocked: this.isDocked,
      desktopFile: this.launcherInfo?.filePath ?? null,
      windowIds: this.windowIds,
      currentWindowId: this.current?.id ?? null,
      menu: this.menu.map((item) => ({ ...item })),
    };
  }
}
