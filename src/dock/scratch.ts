// ---------------------------------------------------------------------------
// ScratchLauncherStore – synthesized launchers and their sibling assets
// ---------------------------------------------------------------------------
// Layout inside the scratch directory, one set per synthesized launcher:
//   <id>.desktop – descriptor (fixed template)
//   <id>.sh      – launch script, referenced as `Exec=<script> %U`
//   <id>.png     – icon decoded from a window's inline image, if any
// The id is either the window identity (w:…) or the identity of the
// descriptor that was copied in (d:…).
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isFileInDir } from "./classifier.js";
import { addDesktopExt, formatScratchDesktopEntry, trimScratchExt } from "./desktop-entry.js";
import type { ScratchSource } from "./entry.js";
import { DockIOError, DockStateError, describeError } from "./errors.js";
import {
  DEFAULT_ICON,
  ICON_EXT,
  SCRATCH_EXTENSIONS,
  SCRIPT_EXT,
  type DockLog,
} from "./types.js";

const DIR_MODE = 0o755;
const DESKTOP_MODE = 0o644;
const SCRIPT_MODE = 0o744;

export type CleanupReport = {
  base: string;
  removed: string[];
  failed: Array<{ file: string; error: string }>;
};

export type ScratchLauncherStoreDeps = {
  scratchDir: string;
  log: DockLog;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

const DATA_URI_RE = /^data:image\/[\w.+-]+;base64,(.+)$/s;

/** Decode a base64 `data:image/...` URI into `file`. */
export async function writeDataUriImage(uri: string, file: string): Promise<string> {
  const match = DATA_URI_RE.exec(uri);
  if (!match?.[1]) {
    throw new Error("unsupported image data URI");
  }
  const bytes = Buffer.from(match[1], "base64");
  if (bytes.length === 0) {
    throw new Error("empty image data URI");
  }
  await fs.writeFile(file, bytes, { mode: DESKTOP_MODE });
  return file;
}

export class ScratchLauncherStore {
  readonly dir: string;
  private readonly log: DockLog;

  constructor(deps: ScratchLauncherStoreDeps) {
    this.dir = path.resolve(deps.scratchDir);
    this.log = deps.log;
  }

  contains(file: string): boolean {
    return isFileInDir(file, this.dir);
  }

  async ensureDir(): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true, mode: DIR_MODE });
    } catch (err) {
      throw new DockIOError(`cannot create scratch dir: ${describeError(err)}`, this.dir, {
        cause: err,
      });
    }
  }

  // -------------------------------------------------------------------------
  // createLauncher – write one descriptor from the fixed template
  // -------------------------------------------------------------------------

  async createLauncher(id: string, title: string, icon: string, exec: string): Promise<string> {
    const filename = path.join(this.dir, addDesktopExt(id));
    this.log.debug(`create scratch launcher for ${id}: ${filename}`);
    const content = formatScratchDesktopEntry({ name: title, exec, icon });
    try {
      await fs.writeFile(filename, content, { mode: DESKTOP_MODE });
    } catch (err) {
      throw new DockIOError(`cannot write scratch launcher: ${describeError(err)}`, filename, {
        cause: err,
      });
    }
    return filename;
  }

  // -------------------------------------------------------------------------
  // createScratchSetForEntry
  // -------------------------------------------------------------------------

  async createScratchSetForEntry(entry: ScratchSource): Promise<string> {
    await this.ensureDir();

    if (entry.launcherInfo) {
      const source = entry.launcherInfo.filePath;
      const target = path.join(this.dir, addDesktopExt(entry.launcherInfo.innerId));
      try {
        await fs.copyFile(source, target);
      } catch (err) {
        throw new DockIOError(`cannot copy ${source} to scratch: ${describeError(err)}`, target, {
          cause: err,
        });
      }
      this.log.debug(`copied launcher ${source} -> ${target}`);
      return target;
    }

    const current = entry.current;
    if (!current) {
      throw new DockStateError("entry has neither a launcher nor a window");
    }
    const appId = current.innerId;

    let icon = current.icon;
    if (icon.startsWith("data:image")) {
      try {
        icon = await writeDataUriImage(icon, path.join(this.dir, appId + ICON_EXT));
      } catch (err) {
        this.log.warn(`cannot materialize icon for ${appId}: ${describeError(err)}`);
        icon = "";
      }
    }
    if (!icon) {
      icon = DEFAULT_ICON;
    }

    const scriptFile = path.join(this.dir, appId + SCRIPT_EXT);
    try {
      await fs.writeFile(scriptFile, entry.getExec(), { mode: SCRIPT_MODE });
      // mode only applies on create; an overwritten script keeps its old bits
      await fs.chmod(scriptFile, SCRIPT_MODE);
    } catch (err) {
      throw new DockIOError(`cannot write launch script: ${describeError(err)}`, scriptFile, {
        cause: err,
      });
    }

    return this.createLauncher(appId, current.title, icon, `${scriptFile} %U`);
  }

  // -------------------------------------------------------------------------
  // removeScratchSet – best effort, failures are reported, never thrown
  // -------------------------------------------------------------------------

  async removeScratchSet(file: string): Promise<CleanupReport> {
    const base = trimScratchExt(path.resolve(file));
    const report: CleanupReport = { base, removed: [], failed: [] };
    this.log.debug(`remove scratch files for ${base}`);

    for (const ext of SCRATCH_EXTENSIONS) {
      const target = base + ext;
      try {
        await fs.unlink(target);
        report.removed.push(target);
      } catch (err) {
        if (isMissingFile(err)) {
          continue;
        }
        const error = describeError(err);
        this.log.warn(`failed to remove scratch file ${target}: ${error}`);
        report.failed.push({ file: target, error });
      }
    }

    return report;
  }
}
