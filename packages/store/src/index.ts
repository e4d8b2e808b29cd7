/**
 * @linkstub/store - Short URL Persistence
 *
 * `UrlRepository` implementations:
 * - PocketBaseUrlRepository: PocketBase REST collection (production)
 * - MemoryUrlRepository: process-local map (tests, local development)
 */

export { PocketBaseUrlRepository, parsePocketBaseTime, escapeFilterValue } from "./pocketbase.js";
export type { PocketBaseRepositoryOptions } from "./pocketbase.js";

export { MemoryUrlRepository } from "./memory.js";
export type { MemoryUrlRepositoryOptions } from "./memory.js";

export { withDeadline, abortError } from "./deadline.js";
