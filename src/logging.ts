// ---------------------------------------------------------------------------
// Logging – tslog root logger plus per-subsystem child loggers
// ---------------------------------------------------------------------------
// Sub-loggers copy the root settings when created, so configureLogging()
// must run before the composition root builds its services.
// ---------------------------------------------------------------------------

import { Logger, type ILogObj } from "tslog";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

// tslog numeric levels: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
const TSLOG_LEVELS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

export type SubsystemLogger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

const rootLogger = new Logger<ILogObj>({
  name: "dock-session",
  type: process.env.NODE_ENV === "production" ? "json" : "pretty",
  minLevel: TSLOG_LEVELS[parseLogLevel(process.env.DOCK_LOG_LEVEL) ?? "info"],
});

export function configureLogging(opts: { level?: LogLevel }): void {
  if (opts.level) {
    rootLogger.settings.minLevel = TSLOG_LEVELS[opts.level];
  }
}

function wrap(logger: Logger<ILogObj>): SubsystemLogger {
  return {
    debug: (msg) => {
      logger.debug(msg);
    },
    info: (msg) => {
      logger.info(msg);
    },
    warn: (msg) => {
      logger.warn(msg);
    },
    error: (msg) => {
      logger.error(msg);
    },
  };
}

export function getChildLogger(bindings: { module: string }): SubsystemLogger {
  return wrap(rootLogger.getSubLogger({ name: bindings.module }));
}
