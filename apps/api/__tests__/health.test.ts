/**
 * Health Routes Tests
 */

import { describe, it, expect } from "@jest/globals";
import type { HealthCheckResponse } from "@linkstub/shared";
import { createTestApp, UnreachableRepository } from "./helpers.js";

describe("Health routes", () => {
  it("GET /health should report liveness", async () => {
    const app = await createTestApp();

    const res = await app.inject({ method: "GET", url: "/health" });
    await app.close();

    expect(res.statusCode).toBe(200);
    expect(res.json<{ status: string }>().status).toBe("ok");
  });

  it("GET /health/ready should be 200 when the store answers", async () => {
    const app = await createTestApp();

    const res = await app.inject({ method: "GET", url: "/health/ready" });
    await app.close();

    expect(res.statusCode).toBe(200);
    const body = res.json<HealthCheckResponse>();
    expect(body.status).toBe("ok");
    expect(body.checks).toEqual({ store: "ok" });
  });

  it("GET /health/ready should be 503 when the store is unreachable", async () => {
    const app = await createTestApp(new UnreachableRepository());

    const res = await app.inject({ method: "GET", url: "/health/ready" });
    await app.close();

    expect(res.statusCode).toBe(503);
    const body = res.json<HealthCheckResponse>();
    expect(body.status).toBe("degraded");
    expect(body.checks).toEqual({ store: "error" });
  });
});
