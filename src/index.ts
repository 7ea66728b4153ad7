export { ConfigError, loadConfig, resolveConfigPath, type DockSessionConfig } from "./config/config.js";
export {
  createLauncherResolver,
  genDesktopInnerId,
  genWindowInnerId,
  loadLauncherInfo,
} from "./dock/app-info.js";
export { classifyLauncher, isFileInDir, needsScratch, type LauncherProvenance } from "./dock/classifier.js";
export { formatScratchDesktopEntry, parseDesktopEntry } from "./dock/desktop-entry.js";
export {
  createFileDockedSetStore,
  readDockedStore,
  rebuildDockedList,
  writeDockedStore,
} from "./dock/docked-store.js";
export { AppEntries } from "./dock/entries.js";
export { AppEntry } from "./dock/entry.js";
export { DockIOError, DockStateError } from "./dock/errors.js";
export { createDefaultWindowIdentifier } from "./dock/identify.js";
export { createDesktopPathCodec, type DesktopPathCodec } from "./dock/path-codec.js";
export { resolveDockPaths, type DockPaths } from "./dock/paths.js";
export { AsyncRwLock } from "./dock/rw-lock.js";
export { ScratchLauncherStore, type CleanupReport } from "./dock/scratch.js";
export { DockService, type DockServiceDeps } from "./dock/service.js";
export type * from "./dock/types.js";
export {
  DEFAULT_ICON,
  DESKTOP_HASH_PREFIX,
  WINDOW_HASH_PREFIX,
} from "./dock/types.js";
export { buildGatewayDockService } from "./gateway/server-dock.js";
export { configureLogging, getChildLogger, type LogLevel } from "./logging.js";
