import { describe, expect, it } from "vitest";
import { AppEntries } from "./entries.js";
import { AppEntry } from "./entry.js";

function entry(id: string, filePath?: string): AppEntry {
  return new AppEntry({
    id,
    innerId: `d:${id}`,
    launcherInfo: filePath
      ? { filePath, isInstalled: true, innerId: `d:${id}`, name: id, icon: "", exec: id }
      : null,
  });
}

function ids(entries: AppEntries): string[] {
  return entries.snapshot().map((e) => e.id);
}

describe("AppEntries", () => {
  it("inserts at an index, appending when out of range", () => {
    const entries = new AppEntries();
    entries.insert(entry("a"));
    entries.insert(entry("b"));
    expect(entries.insert(entry("c"), 1)).toBe(1);
    expect(entries.insert(entry("d"), 99)).toBe(3);
    expect(entries.insert(entry("e"), -1)).toBe(4);
    expect(ids(entries)).toEqual(["a", "c", "b", "d", "e"]);
  });

  it("looks entries up by id, identity, window and launcher path", () => {
    const entries = new AppEntries();
    const a = entry("a", "/usr/share/applications/a.desktop");
    a.attachWindow({ id: 42, innerId: "w:a", title: "A", icon: "", exec: "a", wmClass: null });
    entries.insert(a);

    expect(entries.getById("a")).toBe(a);
    expect(entries.getByInnerId("d:a")).toBe(a);
    expect(entries.getByWindowId(42)).toBe(a);
    expect(entries.getByDesktopFilePath("/usr/share/applications/a.desktop")).toBe(a);
    expect(
      entries.getByDesktopFilePath("/usr/share/applications/a.desktop", { dockedOnly: true }),
    ).toBeUndefined();
    expect(entries.getById("missing")).toBeUndefined();
  });

  it("filters docked entries in order", () => {
    const entries = new AppEntries();
    const a = entry("a");
    const b = entry("b");
    const c = entry("c");
    a.isDocked = true;
    c.isDocked = true;
    [a, b, c].forEach((e) => entries.insert(e));
    expect(entries.filterDocked()).toEqual([a, c]);
  });

  it("removes and moves entries", () => {
    const entries = new AppEntries();
    const a = entry("a");
    ["a", "b", "c"].forEach((id) => entries.insert(id === "a" ? a : entry(id)));

    expect(entries.move(0, 2)).toBe(true);
    expect(ids(entries)).toEqual(["b", "c", "a"]);
    expect(entries.move(0, 5)).toBe(false);
    expect(entries.remove(a)).toBe(true);
    expect(entries.remove(a)).toBe(false);
    expect(ids(entries)).toEqual(["b", "c"]);
  });

  it("returns an independent snapshot", () => {
    const entries = new AppEntries();
    entries.insert(entry("a"));
    const snap = entries.snapshot();
    entries.insert(entry("b"));
    expect(snap).toHaveLength(1);
    expect(entries.length).toBe(2);
  });
});
