import { describe, expect, it } from "vitest";
import { AppEntry } from "./entry.js";
import type { DockWindow, LauncherInfo } from "./types.js";

function makeWindow(id: number, overrides?: Partial<DockWindow>): DockWindow {
  return {
    id,
    innerId: "w:term",
    title: `Terminal ${id}`,
    icon: "utilities-terminal",
    exec: "term --login",
    wmClass: "Term",
    ...overrides,
  };
}

const LAUNCHER: LauncherInfo = {
  filePath: "/usr/share/applications/term.desktop",
  isInstalled: true,
  innerId: "d:term",
  name: "Terminal",
  icon: "term-icon",
  exec: "term",
};

describe("AppEntry windows", () => {
  it("makes the first attached window current", () => {
    const entry = new AppEntry({ id: "e1", innerId: "w:term" });
    expect(entry.attachWindow(makeWindow(1))).toBe(true);
    expect(entry.attachWindow(makeWindow(2))).toBe(true);
    expect(entry.current?.id).toBe(1);
    expect(entry.windowIds).toEqual([1, 2]);
  });

  it("reports re-attaching a known window", () => {
    const entry = new AppEntry({ id: "e1", innerId: "w:term" });
    entry.attachWindow(makeWindow(1));
    expect(entry.attachWindow(makeWindow(1, { title: "Renamed" }))).toBe(false);
    expect(entry.current?.title).toBe("Renamed");
  });

  it("moves current to a remaining window on detach", () => {
    const entry = new AppEntry({ id: "e1", innerId: "w:term" });
    entry.attachWindow(makeWindow(1));
    entry.attachWindow(makeWindow(2));

    expect(entry.detachWindow(1)).toBe(true);
    expect(entry.current?.id).toBe(2);
    expect(entry.detachWindow(2)).toBe(true);
    expect(entry.current).toBeNull();
    expect(entry.hasWindow()).toBe(false);
    expect(entry.detachWindow(2)).toBe(false);
  });
});

describe("AppEntry display state", () => {
  it("prefers launcher name and icon over the window's", () => {
    const entry = new AppEntry({ id: "e1", innerId: "d:term", launcherInfo: LAUNCHER });
    entry.attachWindow(makeWindow(1));
    entry.updateName();
    entry.updateIcon();
    expect(entry.name).toBe("Terminal");
    expect(entry.icon).toBe("term-icon");
  });

  it("falls back to the window, then to defaults", () => {
    const entry = new AppEntry({ id: "e1", innerId: "w:term" });
    entry.attachWindow(makeWindow(7, { icon: "" }));
    entry.updateName();
    entry.updateIcon();
    expect(entry.name).toBe("Terminal 7");
    expect(entry.icon).toBe("application-default-icon");

    entry.detachWindow(7);
    entry.updateName();
    expect(entry.name).toBe("Unknown");
  });

  it("takes the launch command from the current window first", () => {
    const entry = new AppEntry({ id: "e1", innerId: "d:term", launcherInfo: LAUNCHER });
    expect(entry.getExec()).toBe("term");
    entry.attachWindow(makeWindow(1));
    expect(entry.getExec()).toBe("term --login");
  });

  it("builds the menu from dock and window state", () => {
    const entry = new AppEntry({ id: "e1", innerId: "d:term", launcherInfo: LAUNCHER });
    entry.updateMenu();
    expect(entry.menu.map((item) => item.action)).toEqual(["launch", "dock"]);

    entry.attachWindow(makeWindow(1));
    entry.isDocked = true;
    entry.updateMenu();
    expect(entry.menu).toEqual([
      { action: "launch", label: "Open" },
      { action: "close-all", label: "Close All" },
      { action: "undock", label: "Undock" },
    ]);
  });

  it("snapshots the observable fields", () => {
    const entry = new AppEntry({ id: "e1", innerId: "d:term", launcherInfo: LAUNCHER });
    entry.attachWindow(makeWindow(3));
    entry.updateName();
    entry.updateIcon();
    entry.updateMenu();

    expect(entry.snapshot()).toEqual({
      id: "e1",
      innerId: "d:term",
      name: "Terminal",
      icon: "term-icon",
      isDocked: false,
      desktopFile: "/usr/share/applications/term.desktop",
      windowIds: [3],
      currentWindowId: 3,
      menu: [
        { action: "launch", label: "Open" },
        { action: "close-all", label: "Close All" },
        { action: "dock", label: "Dock" },
      ],
    });
  });
});
