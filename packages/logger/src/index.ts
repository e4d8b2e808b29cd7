/**
 * @linkstub/logger - Structured Logging Package
 *
 * Consistent structured logging across linkstub workspaces,
 * built on pino JSON output.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@linkstub/logger";
 *
 * logger.info({ shortCode: "abc123" }, "Short URL created");
 *
 * const storeLogger = createLogger("store");
 * storeLogger.error({ err }, "Lookup failed");
 * ```
 */

import pino, { type Logger } from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "linkstub";

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger instance for a specific component
 */
export function createLogger(name: string): Logger {
  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  });
}

// ============================================================================
// Default Logger Instance
// ============================================================================

export const logger = createLogger("main");

// ============================================================================
// Log Level Helpers
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/**
 * Normalise a level string, falling back when it is not a pino level
 */
export function parseLogLevel(level: string, fallback: LogLevel = "info"): LogLevel {
  const normalized = level.toLowerCase();
  switch (normalized) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
    case "silent":
      return normalized;
    default:
      return fallback;
  }
}

export type { Logger } from "pino";
