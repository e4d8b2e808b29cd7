/**
 * In-Memory Store Tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { MemoryUrlRepository } from "../src/index.js";

const CREATED = new Date("2024-03-01T10:00:00.000Z");
const EDITED = new Date("2024-03-02T12:30:00.000Z");

describe("MemoryUrlRepository", () => {
  let clock: Date;
  let ids: number;
  let repo: MemoryUrlRepository;

  beforeEach(() => {
    clock = CREATED;
    ids = 0;
    repo = new MemoryUrlRepository({
      now: () => clock,
      generateId: () => `rec${++ids}`,
    });
  });

  describe("create", () => {
    it("should store the record with id and timestamps", async () => {
      const result = await repo.create({ url: "https://example.com", shortCode: "abc123", accessCount: 0 });

      expect(result).toEqual({
        success: true,
        data: {
          id: "rec1",
          url: "https://example.com",
          shortCode: "abc123",
          accessCount: 0,
          createdAt: CREATED,
          updatedAt: CREATED,
        },
      });
      expect(repo.size).toBe(1);
    });

    it("should reject a second record with the same code as DUPLICATE", async () => {
      await repo.create({ url: "https://example.com", shortCode: "abc123", accessCount: 0 });

      const result = await repo.create({ url: "https://other.example", shortCode: "abc123", accessCount: 0 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("DUPLICATE");
        expect(result.error.op).toBe("repository.create");
      }
      expect(repo.size).toBe(1);
    });

    it("should fail with CANCELLED when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await repo.create(
        { url: "https://example.com", shortCode: "abc123", accessCount: 0 },
        { signal: controller.signal }
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("CANCELLED");
        expect(result.error.message).toBe("request cancelled");
      }
      expect(repo.size).toBe(0);
    });
  });

  describe("getByCode / existsByCode", () => {
    it("should return NOT_FOUND for an unknown code", async () => {
      const result = await repo.getByCode("nothere");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("NOT_FOUND");
      }
    });

    it("should report existence as a boolean", async () => {
      await repo.create({ url: "https://example.com", shortCode: "abc123", accessCount: 0 });

      expect(await repo.existsByCode("abc123")).toEqual({ success: true, data: true });
      expect(await repo.existsByCode("zzz999")).toEqual({ success: true, data: false });
    });

    it("should hand out copies that cannot change stored state", async () => {
      await repo.create({ url: "https://example.com", shortCode: "abc123", accessCount: 0 });

      const first = await repo.getByCode("abc123");
      if (first.success) {
        first.data.url = "https://tampered.example";
      }

      const second = await repo.getByCode("abc123");
      expect(second.success && second.data.url).toBe("https://example.com");
    });
  });

  describe("update", () => {
    it("should replace the url and bump updatedAt only", async () => {
      await repo.create({ url: "https://example.com", shortCode: "abc123", accessCount: 0 });
      clock = EDITED;

      const result = await repo.update("abc123", "https://example.org/new");

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.url).toBe("https://example.org/new");
        expect(result.data.createdAt).toEqual(CREATED);
        expect(result.data.updatedAt).toEqual(EDITED);
        expect(result.data.shortCode).toBe("abc123");
      }
    });

    it("should return NOT_FOUND for an unknown code", async () => {
      const result = await repo.update("nothere", "https://example.org");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("NOT_FOUND");
      }
    });
  });

  describe("delete", () => {
    it("should remove the record", async () => {
      await repo.create({ url: "https://example.com", shortCode: "abc123", accessCount: 0 });

      expect(await repo.delete("abc123")).toEqual({ success: true, data: undefined });
      expect(await repo.existsByCode("abc123")).toEqual({ success: true, data: false });
    });

    it("should return NOT_FOUND when nothing matches", async () => {
      const result = await repo.delete("abc123");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("NOT_FOUND");
      }
    });
  });

  describe("incrementAccessCount", () => {
    it("should add one per call without touching updatedAt", async () => {
      await repo.create({ url: "https://example.com", shortCode: "abc123", accessCount: 0 });
      clock = EDITED;

      await repo.incrementAccessCount("abc123");
      await repo.incrementAccessCount("abc123");

      const result = await repo.getByCode("abc123");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.accessCount).toBe(2);
        expect(result.data.updatedAt).toEqual(CREATED);
      }
    });

    it("should count every one of many concurrent increments", async () => {
      await repo.create({ url: "https://example.com", shortCode: "abc123", accessCount: 0 });

      await Promise.all(Array.from({ length: 50 }, () => repo.incrementAccessCount("abc123")));

      const result = await repo.getByCode("abc123");
      expect(result.success && result.data.accessCount).toBe(50);
    });

    it("should return NOT_FOUND for an unknown code", async () => {
      const result = await repo.incrementAccessCount("nothere");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe("NOT_FOUND");
      }
    });
  });

  it("should always answer ping", async () => {
    expect(await repo.ping()).toBe(true);
  });
});
