/**
 * @linkstub/shared - Shared Package Exports
 *
 * Central export point for the short-code core: generation, validation,
 * uniqueness resolution, error/result types and constants.
 *
 * Import from the package root only:
 * ```ts
 * import { CodeResolver, UrlValidator } from "@linkstub/shared";
 * ```
 */

// Types (ShortUrl, UrlRepository, ApiResponse, etc.)
export * from "./types/index.js";

// Errors and results (Result, ServiceError, ok, fail, ...)
export * from "./errors/index.js";

// Utilities (code generation, validation, resolution)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, URL_CONFIG, STORE_CONFIG)
export * from "./constants/index.js";
