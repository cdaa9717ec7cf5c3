/**
 * logger.ts — Structured logging for the data core
 *
 * Built on pino.
 *
 * Configuration:
 *   TALLYBOOK_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   TALLYBOOK_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   TALLYBOOK_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.sync.debug({ pending: 3 }, "drain:start");
 *   log.retry.warn({ attempt: 1, delayMs: 1000 }, "retry:scheduled");
 *
 * Subsystem loggers:
 *   log.cache, log.flight, log.retry, log.auth, log.sync, log.store
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Configuration ──────────────────────────────────────────────

const IS_TEST = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const IS_DEV = process.env.NODE_ENV !== "production" && !IS_TEST;

/** Resolve log level from environment */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.TALLYBOOK_LOG_LEVEL) {
    return env.TALLYBOOK_LOG_LEVEL;
  }
  const debugEnv = (env.TALLYBOOK_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  // Silent in tests, debug in dev, info in prod
  if (IS_TEST) return "silent";
  if (IS_DEV) return "debug";
  return "info";
}

/** Whether pretty output is wanted. Never under test. */
export function resolveLogPretty(env: NodeJS.ProcessEnv = process.env): boolean {
  if (IS_TEST) return false;
  return (
    env.TALLYBOOK_LOG_PRETTY === "true" ||
    (env.TALLYBOOK_LOG_PRETTY !== "false" && IS_DEV)
  );
}

function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (!resolveLogPretty()) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const level = resolveLogLevel();
const transport = resolveTransport();

/** pino numeric levels → Cloud Logging severity strings. */
const PINO_TO_SEVERITY: Record<number, string> = {
  10: "DEBUG",    // trace
  20: "DEBUG",    // debug
  30: "INFO",     // info
  40: "WARNING",  // warn
  50: "ERROR",    // error
  60: "CRITICAL", // fatal
};

/** JSON output with severity labels whenever pino-pretty is off. */
const SEVERITY_FORMAT = !IS_TEST && !transport;

export const rootLogger: Logger = pino({
  level,
  ...(transport ? { transport } : {}),
  ...(SEVERITY_FORMAT ? { messageKey: "message" } : {}),
  base: { service: "tallybook" },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    ...(SEVERITY_FORMAT
      ? {
          level(label: string, number: number) {
            return { severity: PINO_TO_SEVERITY[number] || label.toUpperCase(), level: number };
          },
        }
      : {}),
  },
  // Redact credential fields from all log output.
  redact: {
    paths: [
      "token", "*.token", "**.token",
      "password", "*.password", "**.password",
      "secret", "*.secret", "**.secret",
      "authorization", "*.authorization", "**.authorization",
    ],
    censor: "[REDACTED]",
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

/**
 * Subsystem loggers — each adds a `subsystem` field to every log line.
 *
 * Usage: log.cache.debug({ key }, "cache:evict")
 *   → { level: 20, subsystem: "cache", msg: "cache:evict", key: "...", ... }
 */
export const log = {
  /** TTL/LRU cache and epochs */
  cache: rootLogger.child({ subsystem: "cache" }),
  /** Single-flight coordinator */
  flight: rootLogger.child({ subsystem: "flight" }),
  /** Retry/backoff executor */
  retry: rootLogger.child({ subsystem: "retry" }),
  /** Auth generation fence and identity changes */
  auth: rootLogger.child({ subsystem: "auth" }),
  /** Sync dispatcher, pending queue, circuit breaker */
  sync: rootLogger.child({ subsystem: "sync" }),
  /** Local and remote store backends */
  store: rootLogger.child({ subsystem: "store" }),
  /** Root logger (for one-off use) */
  root: rootLogger,
};

export type { Logger };
