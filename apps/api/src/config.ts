/**
 * Configuration Module
 *
 * Loads configuration from environment variables with typed parsing
 * helpers and defaults. Fails fast on startup when a required variable
 * is missing or a value cannot work.
 *
 * The resulting object is handed to constructors explicitly; nothing
 * below the entry point reads the environment.
 */

import * as dotenv from "dotenv";
import { createLogger, parseLogLevel, type Logger } from "@linkstub/logger";
import { SHORTCODE_CONFIG, STORE_CONFIG, URL_CONFIG } from "@linkstub/shared";
import type { Config, StoreDriver } from "./types.js";

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

/**
 * Get required environment variable or throw.
 */
function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse integer with default.
 */
function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse comma-separated list with default. Blank entries are dropped.
 */
function optionalList(env: Env, name: string, defaultValue: readonly string[]): string[] {
  const value = env[name];
  if (value === undefined) return [...defaultValue];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseStoreDriver(value: string): StoreDriver {
  const normalized = value.toLowerCase();
  if (normalized === "pocketbase" || normalized === "memory") {
    return normalized;
  }
  throw new Error(`Invalid STORE_DRIVER: ${value} (expected "pocketbase" or "memory")`);
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Merge a dotenv file into process.env. Variables already set win.
 * A missing file is not an error.
 *
 * @returns whether a file was read
 */
export function loadEnvFile(path = ".env", log: Logger = createLogger("config")): boolean {
  const result = dotenv.config({ path });
  if (result.error) {
    log.debug({ path, err: result.error }, "No env file loaded");
    return false;
  }

  log.debug({ path, keys: Object.keys(result.parsed ?? {}) }, "Loaded env file");
  return true;
}

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing
 */
export function loadConfig(env: Env = process.env): Config {
  const storeDriver = parseStoreDriver(optional(env, "STORE_DRIVER", "pocketbase"));

  return {
    // Server
    port: optionalInt(env, "PORT", 8080),
    host: optional(env, "HOST", "0.0.0.0"),
    nodeEnv: optional(env, "NODE_ENV", "development"),
    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),

    // Store
    storeDriver,
    pocketbaseUrl:
      storeDriver === "pocketbase"
        ? required(env, "POCKETBASE_URL")
        : optional(env, "POCKETBASE_URL", ""),
    pocketbaseCollection: optional(env, "POCKETBASE_COLLECTION", STORE_CONFIG.COLLECTION),
    requestTimeoutMs: optionalInt(env, "REQUEST_TIMEOUT_MS", STORE_CONFIG.REQUEST_TIMEOUT_MS),

    // Short codes
    shortCodeLength: optionalInt(env, "SHORT_CODE_LENGTH", SHORTCODE_CONFIG.DEFAULT_LENGTH),
    maxRetries: optionalInt(env, "MAX_RETRIES", SHORTCODE_CONFIG.MAX_RETRIES),

    // URL validation
    maxUrlLength: optionalInt(env, "MAX_URL_LENGTH", URL_CONFIG.MAX_LENGTH),
    blockedDomains: optionalList(env, "BLOCKED_DOMAINS", URL_CONFIG.BLOCKED_DOMAINS),

    // HTTP
    corsAllowedOrigins: optionalList(env, "CORS_ALLOWED_ORIGINS", ["*"]),
    rateLimitMax: optionalInt(env, "RATE_LIMIT_MAX", 100),
    rateLimitWindow: optional(env, "RATE_LIMIT_WINDOW", "1 minute"),
  };
}

/**
 * Validate configuration at runtime.
 * Throws on values the service cannot run with, logs warnings for
 * suboptimal ones and returns them.
 */
export function validateConfig(config: Config, log: Logger = createLogger("config")): string[] {
  if (config.maxRetries < 1) {
    throw new Error(`MAX_RETRIES must be at least 1, got ${config.maxRetries}`);
  }
  if (config.shortCodeLength < 1) {
    throw new Error(`SHORT_CODE_LENGTH must be at least 1, got ${config.shortCodeLength}`);
  }
  if (config.requestTimeoutMs < 1) {
    throw new Error(`REQUEST_TIMEOUT_MS must be at least 1, got ${config.requestTimeoutMs}`);
  }
  if (config.maxUrlLength < 1) {
    throw new Error(`MAX_URL_LENGTH must be at least 1, got ${config.maxUrlLength}`);
  }

  const warnings: string[] = [];

  // 62^4 is under 15M codes; collisions get frequent quickly
  if (config.shortCodeLength < 5) {
    warnings.push(
      `SHORT_CODE_LENGTH=${config.shortCodeLength} is short. Collisions will exhaust retries as the store grows.`
    );
  }

  if (config.requestTimeoutMs > 60_000) {
    warnings.push(
      `REQUEST_TIMEOUT_MS=${config.requestTimeoutMs}ms is high. A hung store will hold requests that long.`
    );
  }

  if (config.corsAllowedOrigins.includes("*") && config.nodeEnv === "production") {
    warnings.push("CORS_ALLOWED_ORIGINS allows any origin in production.");
  }

  for (const warning of warnings) {
    log.warn(`[config] ${warning}`);
  }
  return warnings;
}
