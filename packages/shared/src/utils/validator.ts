/**
 * Input Validation
 *
 * Gatekeeps every externally supplied URL and custom short code before it
 * reaches generation or the store. Pure: depends only on the static
 * configuration given at construction, never on stored state.
 */

import { SHORTCODE_CONFIG, URL_CONFIG } from "../constants/index.js";
import { validationError, type ServiceError } from "../errors/index.js";
import { isBase62 } from "./shortcode.js";

// =============================================================================
// TYPES
// =============================================================================

export type ValidationFailureReason =
  | "URL_TOO_LONG"
  | "INVALID_URL_FORMAT"
  | "UNSUPPORTED_SCHEME"
  | "DOMAIN_BLOCKED"
  | "CODE_LENGTH_OUT_OF_RANGE"
  | "CODE_NOT_ALPHANUMERIC";

export type ValidationOutcome =
  | { valid: true }
  | { valid: false; reason: ValidationFailureReason; error: ServiceError };

export interface UrlValidatorConfig {
  maxUrlLength: number;
  /** Hosts to refuse; compared lower-cased and by exact equality */
  blockedDomains: readonly string[];
}

export const DEFAULT_VALIDATOR_CONFIG: UrlValidatorConfig = {
  maxUrlLength: URL_CONFIG.MAX_LENGTH,
  blockedDomains: URL_CONFIG.BLOCKED_DOMAINS,
};

const VALID: ValidationOutcome = { valid: true };

const ALLOWED_PROTOCOLS: readonly string[] = URL_CONFIG.ALLOWED_PROTOCOLS;

const utf8 = new TextEncoder();

// =============================================================================
// VALIDATOR
// =============================================================================

export class UrlValidator {
  private readonly maxUrlLength: number;
  private readonly blockedDomains: ReadonlySet<string>;

  constructor(config: UrlValidatorConfig = DEFAULT_VALIDATOR_CONFIG) {
    this.maxUrlLength = config.maxUrlLength;
    this.blockedDomains = new Set(config.blockedDomains.map((domain) => domain.toLowerCase()));
  }

  /**
   * Validate a destination URL.
   *
   * Checks, in order: byte length, parseability, http/https scheme, blocked host.
   * The host check is an exact match, so `sub.malware.com` passes even when
   * `malware.com` is blocked.
   *
   * @example
   * ```ts
   * validator.validateURL("https://example.com/path"); // { valid: true }
   * validator.validateURL("ftp://example.com");        // { valid: false, reason: "UNSUPPORTED_SCHEME", ... }
   * ```
   */
  validateURL(raw: string): ValidationOutcome {
    const op = "validator.validateURL";

    // Limit is in UTF-8 bytes
    if (utf8.encode(raw).length > this.maxUrlLength) {
      return invalid("URL_TOO_LONG", validationError(op, "URL too long"));
    }

    let parsed: URL;
    try {
      parsed = new URL(raw);
    } catch (err) {
      return invalid("INVALID_URL_FORMAT", validationError(op, "invalid URL format", err));
    }

    if (!ALLOWED_PROTOCOLS.includes(parsed.protocol)) {
      return invalid(
        "UNSUPPORTED_SCHEME",
        validationError(op, "only HTTP and HTTPS URLs are allowed")
      );
    }

    if (this.isDomainBlocked(parsed.host)) {
      return invalid("DOMAIN_BLOCKED", validationError(op, "domain is blocked"));
    }

    return VALID;
  }

  /**
   * Validate the shape of a caller-supplied short code.
   * Uniqueness is checked by the resolver, not here.
   */
  validateShortCode(code: string): ValidationOutcome {
    const op = "validator.validateShortCode";
    const { MIN_LENGTH, MAX_LENGTH } = SHORTCODE_CONFIG.CUSTOM_CODE;

    if (code.length < MIN_LENGTH || code.length > MAX_LENGTH) {
      return invalid(
        "CODE_LENGTH_OUT_OF_RANGE",
        validationError(op, `short code must be between ${MIN_LENGTH} and ${MAX_LENGTH} characters`)
      );
    }

    if (!isBase62(code)) {
      return invalid(
        "CODE_NOT_ALPHANUMERIC",
        validationError(op, "short code can only contain alphanumeric characters")
      );
    }

    return VALID;
  }

  private isDomainBlocked(host: string): boolean {
    return this.blockedDomains.has(host.toLowerCase());
  }
}

function invalid(reason: ValidationFailureReason, error: ServiceError): ValidationOutcome {
  return { valid: false, reason, error };
}
