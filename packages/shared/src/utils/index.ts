/**
 * Shared Utility Functions
 */

// Generation
export {
  generateRandomCode,
  isBase62,
  secureRandomSource,
  RandomSourceError,
} from "./shortcode.js";
export type { RandomSource } from "./shortcode.js";

// Validation
export { UrlValidator, DEFAULT_VALIDATOR_CONFIG } from "./validator.js";
export type {
  UrlValidatorConfig,
  ValidationOutcome,
  ValidationFailureReason,
} from "./validator.js";

// Uniqueness resolution
export { CodeResolver, DEFAULT_RESOLVER_OPTIONS } from "./resolver.js";
export type { CodeResolverOptions } from "./resolver.js";
