/**
 * Short URL Services
 *
 * Business logic layer: validation, code resolution and persistence
 * sequenced per operation. Every operation returns a `Result` and stops at
 * the first failure.
 */

import { createLogger, type Logger } from "@linkstub/logger";
import {
  CodeResolver,
  UrlValidator,
  describeError,
  fail,
  internalError,
  ok,
  type CallOptions,
  type CreateShortUrlInput,
  type Result,
  type ServiceError,
  type ShortUrl,
  type UrlRepository,
} from "@linkstub/shared";
import type { Config } from "../types.js";

// ============================================================================
// Types
// ============================================================================

export interface UrlServiceDeps {
  repository: UrlRepository;
  validator: UrlValidator;
  resolver: CodeResolver;
  logger?: Logger;
}

// ============================================================================
// Url Service
// ============================================================================

export class UrlService {
  private readonly repository: UrlRepository;
  private readonly validator: UrlValidator;
  private readonly resolver: CodeResolver;
  private readonly logger: Logger;

  constructor(deps: UrlServiceDeps) {
    this.repository = deps.repository;
    this.validator = deps.validator;
    this.resolver = deps.resolver;
    this.logger = deps.logger ?? createLogger("service");
  }

  /**
   * Create a new short URL.
   *
   * Nothing is written when the URL or code is rejected. A concurrent
   * create that wins the same code surfaces here as DUPLICATE.
   */
  async createShortUrl(
    input: CreateShortUrlInput,
    options: CallOptions = {}
  ): Promise<Result<ShortUrl>> {
    const { url, customCode } = input;

    const check = this.validator.validateURL(url);
    if (!check.valid) {
      this.logger.debug({ url, reason: check.reason }, "Rejected URL");
      return fail(check.error);
    }

    const code = await this.resolver.resolveCode(customCode, options);
    if (!code.success) {
      this.logFailure(code.error, { customCode }, "Failed to resolve short code");
      return code;
    }

    const created = await this.repository.create(
      { url, shortCode: code.data, accessCount: 0 },
      options
    );
    if (!created.success) {
      this.logFailure(created.error, { shortCode: code.data }, "Failed to create short URL");
      return created;
    }

    this.logger.info(
      { shortCode: created.data.shortCode, isCustom: customCode !== undefined },
      "Short URL created successfully"
    );
    return created;
  }

  /**
   * Resolve a code for redirection and count the access.
   *
   * The returned record's `accessCount` includes this access.
   */
  async getOriginalUrl(code: string, options: CallOptions = {}): Promise<Result<ShortUrl>> {
    const op = "service.getOriginalUrl";

    const found = await this.repository.getByCode(code, options);
    if (!found.success) {
      this.logFailure(found.error, { shortCode: code }, "Failed to get short URL");
      return found;
    }

    const counted = await this.repository.incrementAccessCount(code, options);
    if (!counted.success) {
      if (counted.error.kind === "CANCELLED") {
        return counted;
      }
      const error = internalError(op, "failed to increment access count", counted.error);
      this.logger.error({ shortCode: code, cause: describeError(error) }, "Failed to increment access count");
      return fail(error);
    }

    return ok({ ...found.data, accessCount: found.data.accessCount + 1 });
  }

  /**
   * Point an existing code at a new URL.
   */
  async updateShortUrl(
    code: string,
    url: string,
    options: CallOptions = {}
  ): Promise<Result<ShortUrl>> {
    const check = this.validator.validateURL(url);
    if (!check.valid) {
      return fail(check.error);
    }

    const updated = await this.repository.update(code, url, options);
    if (!updated.success) {
      this.logFailure(updated.error, { shortCode: code }, "Failed to update short URL");
      return updated;
    }

    this.logger.info({ shortCode: code }, "Short URL updated successfully");
    return updated;
  }

  async deleteShortUrl(code: string, options: CallOptions = {}): Promise<Result<void>> {
    const deleted = await this.repository.delete(code, options);
    if (!deleted.success) {
      this.logFailure(deleted.error, { shortCode: code }, "Failed to delete short URL");
      return deleted;
    }

    this.logger.info({ shortCode: code }, "Short URL deleted successfully");
    return deleted;
  }

  /**
   * Read a record, access count included, without counting the read.
   */
  async getStatistics(code: string, options: CallOptions = {}): Promise<Result<ShortUrl>> {
    const found = await this.repository.getByCode(code, options);
    if (!found.success) {
      this.logFailure(found.error, { shortCode: code }, "Failed to get statistics");
    }
    return found;
  }

  /**
   * Store and resolver failures are expected outcomes except INTERNAL,
   * which is logged with its full cause chain.
   */
  private logFailure(
    error: ServiceError,
    context: Record<string, unknown>,
    message: string
  ): void {
    if (error.kind === "INTERNAL") {
      this.logger.error({ ...context, cause: describeError(error) }, message);
    } else {
      this.logger.debug({ ...context, kind: error.kind, op: error.op }, message);
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Wire a UrlService from configuration.
 */
export function createUrlService(
  config: Config,
  repository: UrlRepository,
  logger?: Logger
): UrlService {
  const validator = new UrlValidator({
    maxUrlLength: config.maxUrlLength,
    blockedDomains: config.blockedDomains,
  });
  const resolver = new CodeResolver(repository, validator, {
    codeLength: config.shortCodeLength,
    maxRetries: config.maxRetries,
  });
  return new UrlService({ repository, validator, resolver, logger });
}
