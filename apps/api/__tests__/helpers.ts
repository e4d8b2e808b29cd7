/**
 * API Test Helpers
 *
 * Config and repositories for driving the app in process.
 */

import type { FastifyInstance } from "fastify";
import {
  cancelledError,
  fail,
  internalError,
  type CallOptions,
  type Result,
  type ShortUrl,
} from "@linkstub/shared";
import { MemoryUrlRepository } from "@linkstub/store";
import { buildApp } from "../src/app.js";
import type { Config } from "../src/types.js";

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    port: 8080,
    host: "127.0.0.1",
    nodeEnv: "test",
    logLevel: "silent",
    storeDriver: "memory",
    pocketbaseUrl: "",
    pocketbaseCollection: "short_urls",
    requestTimeoutMs: 1_000,
    shortCodeLength: 6,
    maxRetries: 5,
    maxUrlLength: 2048,
    blockedDomains: ["malware.com", "phishing.com"],
    corsAllowedOrigins: ["*"],
    rateLimitMax: 1_000,
    rateLimitWindow: "1 minute",
    ...overrides,
  };
}

/**
 * Memory store whose reads fail as if the backend were down
 */
export class UnreachableRepository extends MemoryUrlRepository {
  override async getByCode(_code: string, _options?: CallOptions): Promise<Result<ShortUrl>> {
    return fail(
      internalError(
        "repository.getByCode",
        "failed to lookup record",
        new Error("connect ECONNREFUSED 127.0.0.1:8090")
      )
    );
  }

  override async ping(): Promise<boolean> {
    return false;
  }
}

/**
 * Memory store whose reads run past their deadline
 */
export class SlowRepository extends MemoryUrlRepository {
  override async getByCode(_code: string, _options?: CallOptions): Promise<Result<ShortUrl>> {
    return fail(cancelledError("repository.getByCode", "request timed out"));
  }
}

export async function createTestApp(
  repository = new MemoryUrlRepository(),
  overrides: Partial<Config> = {}
): Promise<FastifyInstance> {
  const app = await buildApp({ config: testConfig(overrides), repository });
  await app.ready();
  return app;
}
