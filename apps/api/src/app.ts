/**
 * Application Factory
 *
 * Builds the Fastify instance with plugins, hooks, error handling and
 * routes. Kept apart from the entry point so tests can drive it through
 * `inject` without binding a port.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { UrlRepository } from "@linkstub/shared";

import type { Config } from "./types.js";
import { createUrlService, type UrlService } from "./services/index.js";
import { errorBody, INTERNAL_ERROR_MESSAGE } from "./http/errors.js";
import { urlsRoutes } from "./routes/urls/index.js";
import { healthRoutes } from "./routes/health.js";

export interface BuildAppOptions {
  config: Config;
  repository: UrlRepository;
  /** Defaults to a service wired from config over the repository */
  service?: UrlService;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, repository } = options;
  const service = options.service ?? createUrlService(config, repository);

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === "development"
          ? {
              target: "pino-pretty",
              options: { colorize: true },
            }
          : undefined,
    },
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  // ==========================================================================
  // Plugins
  // ==========================================================================

  await fastify.register(helmet, {
    contentSecurityPolicy: config.nodeEnv === "production",
  });

  await fastify.register(cors, {
    origin: config.corsAllowedOrigins.includes("*") ? true : config.corsAllowedOrigins,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
  });

  // In-memory store; limits are per instance
  await fastify.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
    keyGenerator: (request) => request.ip || "unknown",
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: "linkstub API",
        description: "URL shortening service API",
        version: "1.0.0",
      },
      servers: [
        {
          url: `http://localhost:${config.port}`,
          description: "Development server",
        },
      ],
      tags: [
        { name: "urls", description: "Short URL management" },
        { name: "health", description: "Health check endpoints" },
      ],
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      deepLinking: true,
    },
  });

  // ==========================================================================
  // Lifecycle Hooks
  // ==========================================================================

  fastify.addHook("onRequest", async (request) => {
    request.log.debug({ url: request.url, method: request.method }, "Incoming request");
  });

  fastify.addHook("onResponse", async (request, reply) => {
    request.log.info(
      {
        url: request.url,
        method: request.method,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      "Request completed"
    );
  });

  // ==========================================================================
  // Error Handling
  // ==========================================================================

  fastify.setErrorHandler((error, request, reply) => {
    if (error.statusCode === 429) {
      return reply
        .status(429)
        .send(errorBody("RATE_LIMITED", "Too many requests. Please try again later."));
    }

    if (error.validation) {
      return reply
        .status(400)
        .send(errorBody("BAD_REQUEST", error.message, { validation: error.validation }));
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request error");
      return reply.status(500).send(errorBody("INTERNAL", INTERNAL_ERROR_MESSAGE));
    }

    request.log.warn({ err: error }, "Request rejected");
    return reply.status(statusCode).send(errorBody("BAD_REQUEST", error.message));
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(errorBody("NOT_FOUND", `Route ${request.method} ${request.url} not found`));
  });

  // ==========================================================================
  // Routes
  // ==========================================================================

  await fastify.register(healthRoutes, { repository, timeoutMs: config.requestTimeoutMs });
  await fastify.register(urlsRoutes, { prefix: "/api/v1", service });

  return fastify;
}
