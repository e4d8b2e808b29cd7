/**
 * API Service Type Definitions
 */

import type { LogLevel } from "@linkstub/logger";

/**
 * Backing store selection
 *
 * pocketbase: PocketBase REST collection
 * memory: process-local map, lost on restart
 */
export type StoreDriver = "pocketbase" | "memory";

/**
 * Service configuration, loaded once at startup
 */
export interface Config {
  // Server
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: LogLevel;

  // Store
  storeDriver: StoreDriver;
  /** Required when storeDriver is "pocketbase" */
  pocketbaseUrl: string;
  pocketbaseCollection: string;
  /** Upper bound for every store call */
  requestTimeoutMs: number;

  // Short codes
  shortCodeLength: number;
  maxRetries: number;

  // URL validation
  maxUrlLength: number;
  blockedDomains: string[];

  // HTTP
  /** ["*"] allows any origin */
  corsAllowedOrigins: string[];
  rateLimitMax: number;
  rateLimitWindow: string;
}
