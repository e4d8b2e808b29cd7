/**
 * Short Code Resolution
 *
 * Produces a short code that no stored record uses yet, or honours a
 * caller-supplied one after checking its shape and availability.
 *
 * Collision handling flow (auto codes):
 * 1. Generate random code
 * 2. Check store existence → if taken, retry
 * 3. Return code (the store's unique constraint is the final safety net)
 *
 * This is a best-effort pre-check. Two concurrent creates can still pick
 * the same code; the second insert is rejected by the store as DUPLICATE.
 */

import { SHORTCODE_CONFIG } from "../constants/index.js";
import {
  cancelledError,
  fail,
  internalError,
  duplicateError,
  ok,
  type Result,
} from "../errors/index.js";
import type { CallOptions, CodeLookup } from "../types/index.js";
import { generateRandomCode, secureRandomSource, type RandomSource } from "./shortcode.js";
import type { UrlValidator } from "./validator.js";

export interface CodeResolverOptions {
  /** Length of auto-generated codes */
  codeLength: number;
  /** Generate-and-check cycles before giving up */
  maxRetries: number;
  random?: RandomSource;
}

export const DEFAULT_RESOLVER_OPTIONS: CodeResolverOptions = {
  codeLength: SHORTCODE_CONFIG.DEFAULT_LENGTH,
  maxRetries: SHORTCODE_CONFIG.MAX_RETRIES,
};

export class CodeResolver {
  private readonly codeLength: number;
  private readonly maxRetries: number;
  private readonly random: RandomSource;

  constructor(
    private readonly lookup: CodeLookup,
    private readonly validator: UrlValidator,
    options: CodeResolverOptions = DEFAULT_RESOLVER_OPTIONS
  ) {
    this.codeLength = options.codeLength;
    this.maxRetries = options.maxRetries;
    this.random = options.random ?? secureRandomSource;
  }

  /**
   * Resolve the short code for a new record.
   *
   * With a custom code: shape check, then exactly one existence check.
   * Without: up to `maxRetries` generate-and-check cycles.
   */
  async resolveCode(customCode?: string, options: CallOptions = {}): Promise<Result<string>> {
    if (customCode !== undefined) {
      return this.claimCustomCode(customCode, options);
    }
    return this.generateUniqueCode(options);
  }

  private async claimCustomCode(code: string, options: CallOptions): Promise<Result<string>> {
    const op = "resolver.claimCustomCode";

    const shape = this.validator.validateShortCode(code);
    if (!shape.valid) {
      return fail(shape.error);
    }

    const exists = await this.lookup.existsByCode(code, options);
    if (!exists.success) {
      if (exists.error.kind === "CANCELLED") {
        return exists;
      }
      return fail(internalError(op, "failed to check code existence", exists.error));
    }

    if (exists.data) {
      return fail(duplicateError(op, "short code already exists"));
    }

    return ok(code);
  }

  private async generateUniqueCode(options: CallOptions): Promise<Result<string>> {
    const op = "resolver.generateUniqueCode";

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      if (options.signal?.aborted) {
        return fail(cancelledError(op, "request cancelled", options.signal.reason));
      }

      let code: string;
      try {
        code = generateRandomCode(this.codeLength, this.random);
      } catch (err) {
        return fail(internalError(op, "failed to generate short code", err));
      }

      const exists = await this.lookup.existsByCode(code, options);
      if (!exists.success) {
        if (exists.error.kind === "CANCELLED") {
          return exists;
        }
        return fail(internalError(op, "failed to check code existence", exists.error));
      }

      if (!exists.data) {
        return ok(code);
      }
    }

    return fail(
      internalError(op, `failed to generate unique code after ${this.maxRetries} attempts`)
    );
  }
}
