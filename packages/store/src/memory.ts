/**
 * In-Memory Short URL Store
 *
 * Process-local `UrlRepository` keyed by short code. Enforces the same
 * unique-code constraint as the remote store, which makes it a faithful
 * stand-in for tests and for `STORE_DRIVER=memory` development runs.
 * Contents are lost on restart.
 */

import { randomUUID } from "node:crypto";
import {
  duplicateError,
  fail,
  notFoundError,
  ok,
  type CallOptions,
  type NewShortUrl,
  type Result,
  type ShortUrl,
  type UrlRepository,
} from "@linkstub/shared";
import { abortError } from "./deadline.js";

export interface MemoryUrlRepositoryOptions {
  /** Clock for created/updated timestamps */
  now?: () => Date;
  /** Id generator for new records */
  generateId?: () => string;
}

export class MemoryUrlRepository implements UrlRepository {
  private readonly records = new Map<string, ShortUrl>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryUrlRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async create(record: NewShortUrl, options: CallOptions = {}): Promise<Result<ShortUrl>> {
    const op = "repository.create";
    if (options.signal?.aborted) {
      return fail(abortError(op, options.signal));
    }

    if (this.records.has(record.shortCode)) {
      return fail(duplicateError(op, "short code already exists"));
    }

    const timestamp = this.now();
    const stored: ShortUrl = {
      id: this.generateId(),
      url: record.url,
      shortCode: record.shortCode,
      accessCount: record.accessCount,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.records.set(stored.shortCode, stored);

    return ok({ ...stored });
  }

  async getByCode(code: string, options: CallOptions = {}): Promise<Result<ShortUrl>> {
    const op = "repository.getByCode";
    if (options.signal?.aborted) {
      return fail(abortError(op, options.signal));
    }

    const record = this.records.get(code);
    if (!record) {
      return fail(notFoundError(op, "short URL not found"));
    }
    return ok({ ...record });
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
    if (options.signal?.aborted) {
      return fail(abortError(op, options.signal));
    }

    const record = this.records.get(code);
    if (!record) {
      return fail(notFoundError(op, "record not found"));
    }

    const updated: ShortUrl = { ...record, url, updatedAt: this.now() };
    this.records.set(code, updated);
    return ok({ ...updated });
  }

  async delete(code: string, options: CallOptions = {}): Promise<Result<void>> {
    const op = "repository.delete";
    if (options.signal?.aborted) {
      return fail(abortError(op, options.signal));
    }

    if (!this.records.delete(code)) {
      return fail(notFoundError(op, "record not found"));
    }
    return ok(undefined);
  }

  async incrementAccessCount(code: string, options: CallOptions = {}): Promise<Result<void>> {
    const op = "repository.incrementAccessCount";
    if (options.signal?.aborted) {
      return fail(abortError(op, options.signal));
    }

    const record = this.records.get(code);
    if (!record) {
      return fail(notFoundError(op, "record not found"));
    }

    // updatedAt tracks URL edits only
    this.records.set(code, { ...record, accessCount: record.accessCount + 1 });
    return ok(undefined);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Number of stored records */
  get size(): number {
    return this.records.size;
  }
}
