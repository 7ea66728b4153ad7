// ---------------------------------------------------------------------------
// Default window identifier – matches a window to an installed launcher
// ---------------------------------------------------------------------------
// Order: a scratch launcher synthesized from this very window
// (<scratchDir>/<window innerId>.desktop), then <appDir>/<wm class,
// lower-cased>.desktop in each application directory. A window without a
// match keeps its own identity.
// ---------------------------------------------------------------------------

import { existsSync } from "node:fs";
import * as path from "node:path";
import { addDesktopExt } from "./desktop-entry.js";
import type { LauncherResolver, WindowIdentifier } from "./types.js";

export function createDefaultWindowIdentifier(opts: {
  scratchDir: string;
  applicationDirs: readonly string[];
  resolveLauncher: LauncherResolver;
}): WindowIdentifier {
  return async (window) => {
    const scratchFile = path.join(opts.scratchDir, addDesktopExt(window.innerId));
    if (existsSync(scratchFile)) {
      const info = await opts.resolveLauncher(scratchFile);
      if (info) {
        return { innerId: info.innerId, launcherInfo: info };
      }
    }

    const wmClass = window.wmClass?.trim();
    if (wmClass) {
      const candidate = addDesktopExt(wmClass.toLowerCase());
      for (const dir of opts.applicationDirs) {
        const file = path.join(dir, candidate);
        if (!existsSync(file)) {
          continue;
        }
        const info = await opts.resolveLauncher(file);
        if (info) {
          return { innerId: info.innerId, launcherInfo: info };
        }
      }
    }
    return { innerId: window.innerId, launcherInfo: null };
  };
}
