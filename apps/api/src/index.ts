/**
 * linkstub API Service
 *
 * Entry point: loads configuration (.env, then the environment), picks the store, starts the HTTP
 * server and handles graceful shutdown.
 *
 * Endpoints:
 *   POST   /api/v1/shorten                  - Create short URL
 *   GET    /api/v1/shorten/:shortCode       - Resolve short URL
 *   PUT    /api/v1/shorten/:shortCode       - Update short URL
 *   DELETE /api/v1/shorten/:shortCode       - Delete short URL
 *   GET    /api/v1/shorten/:shortCode/stats - Access statistics
 *   GET    /health, /health/ready           - Probes
 *   GET    /docs                            - Swagger UI
 */

import type { FastifyInstance } from "fastify";
import { logger } from "@linkstub/logger";
import type { UrlRepository } from "@linkstub/shared";
import { MemoryUrlRepository, PocketBaseUrlRepository } from "@linkstub/store";

import { loadConfig, loadEnvFile, validateConfig } from "./config.js";
import { buildApp } from "./app.js";
import type { Config } from "./types.js";

// ============================================================================
// Store Selection
// ============================================================================

function createRepository(config: Config): UrlRepository {
  if (config.storeDriver === "memory") {
    logger.warn("Using in-memory store; data is lost on restart");
    return new MemoryUrlRepository();
  }

  return new PocketBaseUrlRepository({
    baseUrl: config.pocketbaseUrl,
    collection: config.pocketbaseCollection,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}

// ============================================================================
// Graceful Shutdown
// ============================================================================

function registerShutdown(fastify: FastifyInstance): void {
  async function gracefulShutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Received shutdown signal");

    try {
      await fastify.close();
      logger.info("Fastify server closed");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
}

// ============================================================================
// Server Start
// ============================================================================

async function start(): Promise<void> {
  try {
    loadEnvFile();
    const config = loadConfig();
    validateConfig(config);

    const repository = createRepository(config);

    // Non-fatal; /health/ready reports store state
    const reachable = await repository.ping();
    if (reachable) {
      logger.info({ driver: config.storeDriver }, "Store connection verified");
    } else {
      logger.warn({ driver: config.storeDriver }, "Store not reachable at startup");
    }

    const fastify = await buildApp({ config, repository });
    registerShutdown(fastify);

    await fastify.listen({ port: config.port, host: config.host });

    logger.info(`linkstub API running on http://${config.host}:${config.port}`);
    logger.info(`Swagger docs: http://${config.host}:${config.port}/docs`);
  } catch (err) {
    logger.error({ err }, "Failed to start server");
    process.exit(1);
  }
}

void start();
