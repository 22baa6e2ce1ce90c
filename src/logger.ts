/**
 * Namespaced stderr logger.
 *
 * ```ts
 * const log = createLogger("rtl");
 * log.info("published", { artifacts: 4 });
 * // → [sram:rtl] published { artifacts: 4 }
 * ```
 *
 * The threshold comes from SRAM_LOG_LEVEL (debug, info, warn, error or
 * silent) and defaults to info.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function minLevel(): LogLevel | "silent" {
  const raw = (process.env.SRAM_LOG_LEVEL ?? "").trim().toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error" || raw === "silent") return raw;
  return "info";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel()];
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(namespace: string): Logger {
  const prefix = `[sram:${namespace}]`;

  // Everything goes to stderr so stdout stays free for piped JSON.
  return {
    debug: (...args) => {
      if (shouldLog("debug")) console.error(prefix, ...args);
    },
    info: (...args) => {
      if (shouldLog("info")) console.error(prefix, ...args);
    },
    warn: (...args) => {
      if (shouldLog("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (shouldLog("error")) console.error(prefix, ...args);
    },
  };
}
