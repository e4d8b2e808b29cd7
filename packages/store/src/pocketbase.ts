/**
 * PocketBase Short URL Store
 *
 * `UrlRepository` backed by a PocketBase collection over its REST API.
 *
 * Collection layout (create through the PocketBase admin UI):
 *   short_urls
 *     url           text, required
 *     short_code    text, required, unique
 *     access_count  number, default 0
 *
 * Each HTTP call runs under the caller's signal plus the request timeout.
 * The unique index on `short_code` is what rejects the losing side of two
 * concurrent creates; that rejection comes back as DUPLICATE.
 */

import { z } from "zod";
import { createLogger, type Logger } from "@linkstub/logger";
import {
  duplicateError,
  fail,
  internalError,
  notFoundError,
  ok,
  STORE_CONFIG,
  type CallOptions,
  type NewShortUrl,
  type Result,
  type ShortUrl,
  type UrlRepository,
} from "@linkstub/shared";
import { abortError, withDeadline } from "./deadline.js";

// =============================================================================
// Wire Schemas
// =============================================================================

const recordSchema = z.object({
  id: z.string(),
  created: z.string().default(""),
  updated: z.string().default(""),
  url: z.string(),
  short_code: z.string(),
  access_count: z.number().int().nonnegative().default(0),
});

const listSchema = z.object({
  items: z.array(recordSchema),
});

const errorSchema = z.object({
  data: z.record(z.string(), z.object({ code: z.string() })),
});

type PocketBaseRecord = z.infer<typeof recordSchema>;

/** A response together with the deadline it is read under */
interface Exchange {
  response: Response;
  signal: AbortSignal;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse PocketBase's "YYYY-MM-DD HH:MM:SS.sssZ" timestamps.
 * Unparseable values become the epoch.
 */
export function parsePocketBaseTime(value: string, logger?: Logger): Date {
  if (value === "") {
    return new Date(0);
  }

  const parsed = new Date(value.replace(" ", "T"));
  if (Number.isNaN(parsed.getTime())) {
    logger?.warn({ time: value }, "Failed to parse PocketBase timestamp");
    return new Date(0);
  }
  return parsed;
}

/**
 * Quote a value for a PocketBase filter string literal.
 */
export function escapeFilterValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function toShortUrl(record: PocketBaseRecord, logger: Logger): ShortUrl {
  return {
    id: record.id,
    url: record.url,
    shortCode: record.short_code,
    accessCount: record.access_count,
    createdAt: parsePocketBaseTime(record.created, logger),
    updatedAt: parsePocketBaseTime(record.updated, logger),
  };
}

// =============================================================================
// Repository
// =============================================================================

export interface PocketBaseRepositoryOptions {
  /** PocketBase server, e.g. http://localhost:8090 */
  baseUrl: string;
  collection?: string;
  requestTimeoutMs?: number;
  /** HTTP client (default: global fetch) */
  fetch?: typeof fetch;
  logger?: Logger;
}

export class PocketBaseUrlRepository implements UrlRepository {
  private readonly baseUrl: string;
  private readonly collection: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: PocketBaseRepositoryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.collection = options.collection ?? STORE_CONFIG.COLLECTION;
    this.requestTimeoutMs = options.requestTimeoutMs ?? STORE_CONFIG.REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger("store");
  }

  async create(record: NewShortUrl, options: CallOptions = {}): Promise<Result<ShortUrl>> {
    const op = "repository.create";
    this.logger.debug({ shortCode: record.shortCode, url: record.url }, "Creating new short URL");

    const sent = await this.send(op, "failed to create record", this.recordsPath(), options, {
      method: "POST",
      body: JSON.stringify({
        url: record.url,
        short_code: record.shortCode,
        access_count: record.accessCount,
      }),
    });
    if (!sent.success) {
      return sent;
    }

    const { response } = sent.data;
    if (response.status !== 200 && response.status !== 201) {
      this.logger.error({ status: response.status }, "PocketBase returned error status");
      const duplicate = response.status === 409 || (await this.isUniqueViolation(response));
      await this.release(response);
      if (duplicate) {
        return fail(duplicateError(op, "short code already exists"));
      }
      return fail(statusError(op, response.status));
    }

    const decoded = await this.decode(op, sent.data, recordSchema);
    if (!decoded.success) {
      return decoded;
    }

    const created = toShortUrl(decoded.data, this.logger);
    this.logger.info(
      { shortCode: created.shortCode, id: created.id },
      "Short URL record created successfully"
    );
    return ok(created);
  }

  async getByCode(code: string, options: CallOptions = {}): Promise<Result<ShortUrl>> {
    const op = "repository.getByCode";
    this.logger.debug({ shortCode: code }, "Looking up short URL by code");

    const query = new URLSearchParams({
      filter: `(short_code="${escapeFilterValue(code)}")`,
      perPage: "1",
    });
    const sent = await this.send(
      op,
      "failed to lookup record",
      `${this.recordsPath()}?${query.toString()}`,
      options,
      { method: "GET" }
    );
    if (!sent.success) {
      return sent;
    }

    const { response } = sent.data;
    if (response.status !== 200) {
      await this.release(response);
      if (response.status === 404) {
        return fail(notFoundError(op, "short URL not found"));
      }
      this.logger.error({ status: response.status, shortCode: code }, "PocketBase returned error status");
      return fail(statusError(op, response.status));
    }

    const decoded = await this.decode(op, sent.data, listSchema);
    if (!decoded.success) {
      return decoded;
    }

    const [record] = decoded.data.items;
    if (!record) {
      this.logger.debug({ shortCode: code }, "Short URL not found");
      return fail(notFoundError(op, "short URL not found"));
    }

    return ok(toShortUrl(record, this.logger));
  }

  async existsByCode(code: string, options: CallOptions = {}): Promise<Result<boolean>> {
    const found = await this.getByCode(code, options);
    if (found.success) {
      return ok(true);
    }
    return found.error.kind === "NOT_FOUND" ? ok(false) : found;
  }

  async update(code: string, url: string, options: CallOptions = {}): Promise<Result<ShortUrl>> {
    const op = "repository.update";
    this.logger.debug({ shortCode: code, newUrl: url }, "Updating short URL");

    const existing = await this.getByCode(code, options);
    if (!existing.success) {
      return existing;
    }

    const sent = await this.send(
      op,
      "failed to update record",
      this.recordsPath(existing.data.id),
      options,
      { method: "PATCH", body: JSON.stringify({ url }) }
    );
    if (!sent.success) {
      return sent;
    }

    const { response } = sent.data;
    if (response.status !== 200) {
      await this.release(response);
      return fail(
        response.status === 404
          ? notFoundError(op, "record not found")
          : statusError(op, response.status)
      );
    }

    const decoded = await this.decode(op, sent.data, recordSchema);
    if (!decoded.success) {
      return decoded;
    }

    this.logger.info({ shortCode: code, newUrl: url }, "Short URL updated successfully");
    return ok(toShortUrl(decoded.data, this.logger));
  }

  async delete(code: string, options: CallOptions = {}): Promise<Result<void>> {
    const op = "repository.delete";
    this.logger.debug({ shortCode: code }, "Deleting short URL");

    const existing = await this.getByCode(code, options);
    if (!existing.success) {
      return existing;
    }

    const sent = await this.send(
      op,
      "failed to delete record",
      this.recordsPath(existing.data.id),
      options,
      { method: "DELETE" }
    );
    if (!sent.success) {
      return sent;
    }

    const { response } = sent.data;
    await this.release(response);
    if (response.status === 404) {
      return fail(notFoundError(op, "record not found"));
    }
    if (response.status !== 200 && response.status !== 204) {
      return fail(statusError(op, response.status));
    }

    this.logger.info({ shortCode: code }, "Short URL deleted successfully");
    return ok(undefined);
  }

  /**
   * Uses PocketBase's `field+` modifier so concurrent reads never
   * overwrite each other's increments.
   */
  async incrementAccessCount(code: string, options: CallOptions = {}): Promise<Result<void>> {
    const op = "repository.incrementAccessCount";
    this.logger.debug({ shortCode: code }, "Incrementing access count");

    const existing = await this.getByCode(code, options);
    if (!existing.success) {
      return existing;
    }

    const sent = await this.send(
      op,
      "failed to update record",
      this.recordsPath(existing.data.id),
      options,
      { method: "PATCH", body: JSON.stringify({ "access_count+": 1 }) }
    );
    if (!sent.success) {
      return sent;
    }

    const { response } = sent.data;
    await this.release(response);
    if (response.status === 404) {
      return fail(notFoundError(op, "record not found"));
    }
    if (response.status !== 200) {
      return fail(statusError(op, response.status));
    }

    this.logger.info({ shortCode: code }, "Access count incremented");
    return ok(undefined);
  }

  async ping(options: CallOptions = {}): Promise<boolean> {
    const sent = await this.send("repository.ping", "health check failed", "/api/health", options, {
      method: "GET",
    });
    if (!sent.success) {
      return false;
    }

    await this.release(sent.data.response);
    return sent.data.response.ok;
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  private recordsPath(id?: string): string {
    const base = `/api/collections/${encodeURIComponent(this.collection)}/records`;
    return id === undefined ? base : `${base}/${encodeURIComponent(id)}`;
  }

  private async send(
    op: string,
    failureMessage: string,
    path: string,
    options: CallOptions,
    init: RequestInit
  ): Promise<Result<Exchange>> {
    const signal = withDeadline(options.signal, this.requestTimeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        headers: init.body === undefined ? undefined : { "Content-Type": "application/json" },
        signal,
      });
      return ok({ response, signal });
    } catch (err) {
      if (signal.aborted) {
        this.logger.warn({ op, err }, "PocketBase request aborted");
        return fail(abortError(op, signal));
      }
      this.logger.error({ op, err }, "PocketBase request failed");
      return fail(internalError(op, failureMessage, err));
    }
  }

  /**
   * Read and validate a JSON body. The body is read under the same
   * deadline as the request.
   */
  private async decode<T>(
    op: string,
    { response, signal }: Exchange,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Result<T>> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (signal.aborted) {
        this.logger.warn({ op, err }, "PocketBase response aborted");
        return fail(abortError(op, signal));
      }
      this.logger.error({ op, err }, "Failed to decode response");
      return fail(internalError(op, "failed to decode response", err));
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.error({ op, issues: parsed.error.issues }, "Unexpected PocketBase response shape");
      return fail(internalError(op, "failed to decode response", parsed.error));
    }
    return ok(parsed.data);
  }

  /**
   * Drop a body that will not be read so the connection goes back to
   * the pool.
   */
  private async release(response: Response): Promise<void> {
    if (response.bodyUsed || response.body === null) {
      return;
    }
    try {
      await response.body.cancel();
    } catch (err) {
      this.logger.debug({ err }, "Failed to release response body");
    }
  }

  /**
   * PocketBase reports a unique index hit as a 400 whose field error
   * code is `validation_not_unique`.
   */
  private async isUniqueViolation(response: Response): Promise<boolean> {
    if (response.status !== 400) {
      return false;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      this.logger.debug({ err }, "Unreadable PocketBase error body");
      return false;
    }

    const parsed = errorSchema.safeParse(body);
    return parsed.success && parsed.data.data.short_code?.code === "validation_not_unique";
  }
}

function statusError(op: string, status: number) {
  return internalError(op, "PocketBase error", new Error(`status ${status}`));
}
