/**
 * Health Check Routes
 *
 * Liveness and readiness probes for orchestrators and load balancers.
 */

import type { FastifyInstance } from "fastify";
import type { HealthCheckResponse, UrlRepository } from "@linkstub/shared";

export interface HealthRoutesOptions {
  repository: UrlRepository;
  /** Upper bound for the store probe */
  timeoutMs?: number;
}

const DEFAULT_PROBE_TIMEOUT_MS = 2_000;

export async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;

  // Liveness probe - process is serving
  fastify.get("/health", { schema: { tags: ["health"] } }, async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Readiness probe - store reachable
  fastify.get("/health/ready", { schema: { tags: ["health"] } }, async (request, reply) => {
    let store: HealthCheckResponse["checks"]["store"] = "error";

    try {
      const reachable = await opts.repository.ping({ signal: AbortSignal.timeout(timeoutMs) });
      store = reachable ? "ok" : "error";
    } catch (err) {
      request.log.warn({ err }, "Store readiness probe failed");
    }

    const healthy = store === "ok";
    const body: HealthCheckResponse = {
      status: healthy ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      checks: { store },
    };

    return reply.status(healthy ? 200 : 503).send(body);
  });
}
