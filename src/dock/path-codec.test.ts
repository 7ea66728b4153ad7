import { describe, expect, it } from "vitest";
import { createDesktopPathCodec } from "./path-codec.js";

const codec = createDesktopPathCodec({
  scratchDir: "/home/test/.config/dock-session/scratch",
  userApplicationsDir: "/home/test/.local/share/applications",
});

describe("createDesktopPathCodec", () => {
  it("encodes known launcher directories", () => {
    expect(codec.zip("/usr/share/applications/editor.desktop")).toBe("/S@editor.desktop");
    expect(codec.zip("/usr/local/share/applications/tool.desktop")).toBe("/L@tool.desktop");
    expect(codec.zip("/home/test/.local/share/applications/mine.desktop")).toBe("/H@mine.desktop");
    expect(codec.zip("/home/test/.config/dock-session/scratch/w:abc.desktop")).toBe(
      "/D@w:abc.desktop",
    );
  });

  it("leaves unknown paths untouched", () => {
    expect(codec.zip("/opt/app/app.desktop")).toBe("/opt/app/app.desktop");
    expect(codec.unzip("/opt/app/app.desktop")).toBe("/opt/app/app.desktop");
  });

  it("decodes to the current directories", () => {
    const other = createDesktopPathCodec({
      scratchDir: "/home/other/scratch/",
      userApplicationsDir: "/home/other/apps",
    });
    expect(other.unzip("/D@w:abc.desktop")).toBe("/home/other/scratch/w:abc.desktop");
    expect(other.unzip("/H@mine.desktop")).toBe("/home/other/apps/mine.desktop");
    expect(other.unzip("/S@editor.desktop")).toBe("/usr/share/applications/editor.desktop");
  });

  it("prefers the most specific directory", () => {
    const nested = createDesktopPathCodec({
      scratchDir: "/usr/share/applications/scratch",
      userApplicationsDir: "/home/test/apps",
    });
    expect(nested.zip("/usr/share/applications/scratch/x.desktop")).toBe("/D@x.desktop");
    expect(nested.zip("/usr/share/applications/y.desktop")).toBe("/S@y.desktop");
  });
});
