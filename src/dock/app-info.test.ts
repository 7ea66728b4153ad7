import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createLauncherResolver,
  genDesktopInnerId,
  genWindowInnerId,
  isInstalledPath,
  loadLauncherInfo,
} from "./app-info.js";
import { DockIOError } from "./errors.js";

let tmpDir: string;
let appsDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "dock-app-info-"));
  appsDir = path.join(tmpDir, "applications");
  await fs.mkdir(path.join(appsDir, "vendor"), { recursive: true });
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("identity helpers", () => {
  it("derives launcher identity from the command line", () => {
    const expected = "d:" + createHash("md5").update("editor %F").digest("hex");
    expect(genDesktopInnerId("editor %F")).toBe(expected);
  });

  it("derives window identity with the w: prefix", () => {
    const a = genWindowInnerId({ wmClass: "Editor", exe: "/usr/bin/editor" });
    const b = genWindowInnerId({ wmClass: "Editor", exe: "/usr/bin/other" });
    expect(a.startsWith("w:")).toBe(true);
    expect(a).not.toBe(b);
  });
});

describe("isInstalledPath", () => {
  it("accepts files anywhere below an application dir", () => {
    expect(isInstalledPath("/usr/share/applications/kde/x.desktop", ["/usr/share/applications"])).toBe(
      true,
    );
  });

  it("rejects files outside the application dirs", () => {
    expect(isInstalledPath("/opt/x/x.desktop", ["/usr/share/applications"])).toBe(false);
    expect(isInstalledPath("/usr/share/applications2/x.desktop", ["/usr/share/applications"])).toBe(
      false,
    );
  });
});

describe("loadLauncherInfo", () => {
  it("parses an installed launcher", async () => {
    const file = path.join(appsDir, "vendor", "editor.desktop");
    await fs.writeFile(
      file,
      "[Desktop Entry]\nName=Editor\nExec=editor %F\nIcon=accessories-text-editor\nType=Application\n",
    );

    const info = await loadLauncherInfo(file, { applicationDirs: [appsDir] });
    expect(info).toEqual({
      filePath: file,
      isInstalled: true,
      innerId: genDesktopInnerId("editor %F"),
      name: "Editor",
      icon: "accessories-text-editor",
      exec: "editor %F",
    });
  });

  it("marks launchers outside the application dirs as not installed", async () => {
    const file = path.join(tmpDir, "loose.desktop");
    await fs.writeFile(file, "[Desktop Entry]\nExec=loose\n");

    const info = await loadLauncherInfo(file, { applicationDirs: [appsDir] });
    expect(info.isInstalled).toBe(false);
    expect(info.name).toBe("loose");
    expect(info.icon).toBe("");
  });

  it("throws DockIOError for a missing file", async () => {
    await expect(
      loadLauncherInfo(path.join(tmpDir, "nope.desktop"), { applicationDirs: [] }),
    ).rejects.toBeInstanceOf(DockIOError);
  });

  it("throws DockIOError when the Desktop Entry group is missing", async () => {
    const file = path.join(tmpDir, "bad.desktop");
    await fs.writeFile(file, "Name=Bad\n");
    await expect(loadLauncherInfo(file, { applicationDirs: [] })).rejects.toThrow(
      /no \[Desktop Entry\] group/,
    );
  });
});

describe("createLauncherResolver", () => {
  it("returns null and logs a warning for unusable files", async () => {
    const warnings: string[] = [];
    const resolve = createLauncherResolver({
      applicationDirs: [appsDir],
      log: {
        debug: () => {},
        info: () => {},
        warn: (msg) => warnings.push(msg),
        error: () => {},
      },
    });

    await expect(resolve(path.join(tmpDir, "missing.desktop"))).resolves.toBeNull();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^launcher not usable: cannot read launcher /);
  });
});
