// ---------------------------------------------------------------------------
// Gateway Dock Service Builder – wires config, loggers and collaborators
// ---------------------------------------------------------------------------

import type { DockSessionConfig } from "../config/config.js";
import { createLauncherResolver } from "../dock/app-info.js";
import { createFileDockedSetStore } from "../dock/docked-store.js";
import { createDefaultWindowIdentifier } from "../dock/identify.js";
import { createDesktopPathCodec } from "../dock/path-codec.js";
import { resolveDockPaths, type DockPaths } from "../dock/paths.js";
import { DockService } from "../dock/service.js";
import type { WindowIdentifier } from "../dock/types.js";
import { configureLogging, getChildLogger } from "../logging.js";

export type GatewayDockState = {
  dockService: DockService;
  paths: DockPaths;
};

export function buildGatewayDockService(params: {
  cfg: DockSessionConfig;
  broadcast: (event: string, payload: unknown) => void;
  /** Replaces the wm-class based identifier, e.g. with one backed by the window manager. */
  identifyWindow?: WindowIdentifier;
}): GatewayDockState {
  configureLogging({ level: params.cfg.logging?.level });
  const dockLogger = getChildLogger({ module: "dock" });
  const paths = resolveDockPaths(params.cfg);

  const resolveLauncher = createLauncherResolver({
    applicationDirs: paths.applicationDirs,
    log: dockLogger,
  });

  const dockService = new DockService({
    scratchDir: paths.scratchDir,
    dockedStore: createFileDockedSetStore(paths.storePath),
    pathCodec: createDesktopPathCodec({
      scratchDir: paths.scratchDir,
      userApplicationsDir: paths.userApplicationsDir,
    }),
    resolveLauncher,
    identifyWindow:
      params.identifyWindow ??
      createDefaultWindowIdentifier({
        scratchDir: paths.scratchDir,
        applicationDirs: paths.applicationDirs,
        resolveLauncher,
      }),
    log: dockLogger,
    broadcast: params.broadcast,
  });

  return { dockService, paths };
}
