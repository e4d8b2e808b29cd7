/**
 * Short Code Configuration Constants
 *
 * Defaults for generation and validation. Runtime values come from the
 * API configuration and are passed into constructors; these are only
 * the fallbacks.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Default length for auto-generated short codes.
   * 6 chars = 62^6 = ~5.6 × 10^10 combinations.
   */
  DEFAULT_LENGTH: 6,

  /**
   * Base62 alphabet: 0-9a-zA-Z
   * URL-safe, case-sensitive, 62 characters total.
   */
  ALPHABET: "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ",

  /** Maximum generate-and-check cycles before giving up */
  MAX_RETRIES: 5,

  /** Caller-supplied short codes */
  CUSTOM_CODE: {
    MIN_LENGTH: 4,
    MAX_LENGTH: 20,
  },
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length to store */
  MAX_LENGTH: 2048,

  /** Allowed protocols, as reported by the WHATWG parser */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,

  /** Hosts refused outright (exact, case-insensitive match) */
  BLOCKED_DOMAINS: ["malware.com", "phishing.com"] as const,
} as const;

/**
 * Persistence Constants
 */
export const STORE_CONFIG = {
  /** PocketBase collection holding short URLs */
  COLLECTION: "short_urls",

  /** Upper bound for a single store call */
  REQUEST_TIMEOUT_MS: 30_000,
} as const;
