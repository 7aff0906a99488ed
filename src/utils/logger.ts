import { mkdirSync, appendFileSync, existsSync, statSync, renameSync } from "fs";
import { join } from "path";
import { LOG_DIR } from "../config/paths.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, error?: unknown): void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_FILE = join(LOG_DIR, "kostore.log");
const LOG_BACKUP = join(LOG_DIR, "kostore.log.1");
const MAX_LOG_SIZE = 1024 * 1024; // 1 MB

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// State (singleton)
// ---------------------------------------------------------------------------

let initialized = false;
let minLevel: LogLevel = "info";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function parseLogLevel(value: string | undefined): LogLevel {
  const lower = value?.toLowerCase();
  if (lower === "debug" || lower === "info" || lower === "warn" || lower === "error") {
    return lower;
  }
  return "info";
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function writeLine(line: string): void {
  try {
    appendFileSync(LOG_FILE, line + "\n", "utf-8");
  } catch {
    // The logger must never throw; a read-only config dir just loses the line.
  }
}

function rotateIfNeeded(): void {
  try {
    if (existsSync(LOG_FILE) && statSync(LOG_FILE).size > MAX_LOG_SIZE) {
      // single backup, overwritten on each rotation
      renameSync(LOG_FILE, LOG_BACKUP);
    }
  } catch {
    // rotation is best-effort
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Creates the log directory, reads `KOSTORE_LOG_LEVEL` and rotates the log
 * file when it has grown past 1 MB. Later calls are no-ops.
 */
export function initLogger(): void {
  if (initialized) return;
  initialized = true;
  minLevel = parseLogLevel(process.env.KOSTORE_LOG_LEVEL);
  try {
    mkdirSync(LOG_DIR, { recursive: true });
    rotateIfNeeded();
  } catch {
    // writes will fail individually and be dropped
  }
}

/**
 * Returns a logger whose lines carry `[category]`, e.g.
 * `[2025-01-01T00:00:00.000Z] [WARN] [installer] release asset unavailable`.
 */
export function getLogger(category?: string): Logger {
  if (!initialized) initLogger();

  const prefix = category ? ` [${category}]` : "";

  function log(level: LogLevel, msg: string, extra: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const tail = extra.length > 0 ? " " + extra.map(formatValue).join(" ") : "";
    writeLine(`[${new Date().toISOString()}] [${level.toUpperCase()}]${prefix} ${msg}${tail}`);
  }

  return {
    debug: (msg, ...args) => log("debug", msg, args),
    info: (msg, ...args) => log("info", msg, args),
    warn: (msg, ...args) => log("warn", msg, args),
    error(msg: string, error?: unknown): void {
      log("error", msg, []);
      if (error !== undefined && LEVEL_ORDER.error >= LEVEL_ORDER[minLevel]) {
        writeLine("  " + formatValue(error));
      }
    },
  };
}
