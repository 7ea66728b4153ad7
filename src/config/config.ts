// ---------------------------------------------------------------------------
// Config – YAML config file, validated with TypeBox
// ---------------------------------------------------------------------------
// Location:
//   $DOCK_SESSION_CONFIG, or <XDG_CONFIG_HOME>/dock-session/config.yaml
// A missing file is an empty config; a malformed one is a ConfigError.
// ---------------------------------------------------------------------------

import { existsSync, readFileSync } from "node:fs";
import * as path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const LogLevelSchema = Type.Union([
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
]);

export const DockSessionConfigSchema = Type.Object({
  dock: Type.Optional(
    Type.Object({
      scratchDir: Type.Optional(Type.String({ minLength: 1 })),
      store: Type.Optional(Type.String({ minLength: 1 })),
      applicationDirs: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    }),
  ),
  logging: Type.Optional(
    Type.Object({
      level: Type.Optional(LogLevelSchema),
    }),
  ),
});

export type DockSessionConfig = Static<typeof DockSessionConfigSchema>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string, options?: { cause?: unknown }) {
    super(`${configPath}: ${message}`, options);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

export function resolveConfigHome(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  if (xdg && path.isAbsolute(xdg)) {
    return xdg;
  }
  const home = process.env.HOME ?? process.env.USERPROFILE ?? ".";
  return path.join(home, ".config");
}

export function resolveConfigPath(customPath?: string): string {
  const explicit = customPath ?? process.env.DOCK_SESSION_CONFIG;
  if (explicit) {
    return path.resolve(explicit);
  }
  return path.join(resolveConfigHome(), "dock-session", "config.yaml");
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function parseConfig(raw: string, configPath: string): DockSessionConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(configPath, "invalid YAML", { cause: err });
  }

  // An empty document parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!Value.Check(DockSessionConfigSchema, parsed)) {
    const first = Value.Errors(DockSessionConfigSchema, parsed).First();
    const where = first?.path || "/";
    throw new ConfigError(configPath, `invalid config at ${where}: ${first?.message ?? "unknown"}`);
  }
  return parsed;
}

export function loadConfig(customPath?: string): DockSessionConfig {
  const configPath = resolveConfigPath(customPath);
  if (!existsSync(configPath)) {
    return {};
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(configPath, "unreadable config file", { cause: err });
  }
  return parseConfig(raw, configPath);
}
