// ---------------------------------------------------------------------------
// Dock – Core Types
// ---------------------------------------------------------------------------

/** Prefix of identities derived from a window (class, instance, process). */
export const WINDOW_HASH_PREFIX = "w:";
/** Prefix of identities derived from a launcher file's command line. */
export const DESKTOP_HASH_PREFIX = "d:";

export const DESKTOP_EXT = ".desktop";
export const SCRIPT_EXT = ".sh";
export const ICON_EXT = ".png";
export const SCRATCH_EXTENSIONS = [DESKTOP_EXT, SCRIPT_EXT, ICON_EXT] as const;

export const DEFAULT_ICON = "application-default-icon";

// ---------------------------------------------------------------------------
// LauncherInfo – resolved launcher (.desktop) metadata
// ---------------------------------------------------------------------------

export type LauncherInfo = {
  filePath: string;
  isInstalled: boolean;
  innerId: string;
  name: string;
  icon: string;
  exec: string;
};

// ---------------------------------------------------------------------------
// DockWindow – what the window tracker reports about a window
// ---------------------------------------------------------------------------

export type DockWindow = {
  id: number;
  innerId: string;
  title: string;
  /** Theme icon name, absolute path, or a `data:image/...;base64,` URI. */
  icon: string;
  /** Resolved launch command of the window's process. */
  exec: string;
  wmClass: string | null;
};

// ---------------------------------------------------------------------------
// Menu + snapshot
// ---------------------------------------------------------------------------

export type DockMenuAction = "launch" | "dock" | "undock" | "close-all";

export type DockMenuItem = {
  action: DockMenuAction;
  label: string;
};

export type DockEntrySnapshot = {
  id: string;
  innerId: string;
  name: string;
  icon: string;
  isDocked: boolean;
  desktopFile: string | null;
  windowIds: number[];
  currentWindowId: number | null;
  menu: DockMenuItem[];
};

// ---------------------------------------------------------------------------
// Transition outcomes
// ---------------------------------------------------------------------------

export type DockOutcome = "docked" | "already-docked";
export type UndockOutcome = "undocked" | "removed" | "not-docked" | "no-launcher";

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

/** Parses a launcher file; `null` when it cannot be used. */
export type LauncherResolver = (filePath: string) => Promise<LauncherInfo | null>;

export type WindowIdentity = {
  innerId: string;
  launcherInfo: LauncherInfo | null;
};

export type WindowIdentifier = (window: DockWindow) => Promise<WindowIdentity>;

export type DockedSetStore = {
  load: () => Promise<string[]>;
  save: (dockedApps: string[]) => Promise<void>;
};

export type DockLog = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

// ---------------------------------------------------------------------------
// Store file shape (persisted to disk)
// ---------------------------------------------------------------------------

export type DockedStoreFile = {
  version: 1;
  dockedApps: string[];
};
