/**
 * Shared Type Definitions
 */

import type { Result } from "../errors/index.js";

// =============================================================================
// Short URL Types
// =============================================================================

/**
 * Short URL record as held by the store
 */
export interface ShortUrl {
  /** Store-assigned identifier */
  id: string;

  /** Original destination URL */
  url: string;

  /** Short code (Base62 or custom), unique across records */
  shortCode: string;

  /** Number of resolutions through the read path */
  accessCount: number;

  /** Creation timestamp */
  createdAt: Date;

  /** Last update timestamp */
  updatedAt: Date;
}

/**
 * Record handed to the store on create; id and timestamps come back from it
 */
export interface NewShortUrl {
  url: string;
  shortCode: string;
  accessCount: number;
}

/**
 * Short URL creation input
 */
export interface CreateShortUrlInput {
  /** URL to shorten */
  url: string;

  /** Optional caller-chosen short code */
  customCode?: string;
}

// =============================================================================
// Persistence
// =============================================================================

/**
 * Per-call options. The signal ends in-flight work when the
 * originating request goes away.
 */
export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Minimal lookup used by the code resolver
 */
export interface CodeLookup {
  existsByCode(code: string, options?: CallOptions): Promise<Result<boolean>>;
}

/**
 * Persistence boundary for short URLs.
 *
 * `create` must report a unique-key conflict as a DUPLICATE error;
 * this is what closes the race between two concurrent creates that
 * picked the same code.
 */
export interface UrlRepository extends CodeLookup {
  create(record: NewShortUrl, options?: CallOptions): Promise<Result<ShortUrl>>;
  getByCode(code: string, options?: CallOptions): Promise<Result<ShortUrl>>;
  update(code: string, url: string, options?: CallOptions): Promise<Result<ShortUrl>>;
  delete(code: string, options?: CallOptions): Promise<Result<void>>;
  incrementAccessCount(code: string, options?: CallOptions): Promise<Result<void>>;
  /** Reachability probe for readiness checks */
  ping(options?: CallOptions): Promise<boolean>;
}

// =============================================================================
// API Response Types
// =============================================================================

/**
 * Standard API success response
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

/**
 * Standard API error response
 */
export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Short URL as serialised by the API
 */
export interface ShortUrlView {
  id: string;
  url: string;
  shortCode: string;
  accessCount?: number;
  createdAt: string;
  updatedAt: string;
}

// =============================================================================
// Service Health Types
// =============================================================================

/**
 * Readiness check response
 */
export interface HealthCheckResponse {
  status: "ok" | "degraded";
  timestamp: string;
  checks: {
    store: "ok" | "error";
  };
}
