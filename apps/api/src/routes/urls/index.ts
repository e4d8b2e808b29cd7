/**
 * Short URL Routes
 *
 * Endpoints (mounted under /api/v1):
 *   POST   /shorten                    - Create a new short URL
 *   GET    /shorten/:shortCode         - Resolve a short URL (counts the access)
 *   PUT    /shorten/:shortCode         - Change the destination URL
 *   DELETE /shorten/:shortCode         - Delete a short URL
 *   GET    /shorten/:shortCode/stats   - Read access statistics
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { ApiResponse, CreateShortUrlInput, ShortUrl, ShortUrlView } from "@linkstub/shared";
import type { UrlService } from "../../services/index.js";
import { sendBadRequest, sendServiceError } from "../../http/errors.js";
import { requestSignal } from "../../http/signal.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const createShortUrlSchema = z.object({
  url: z.string({ required_error: "url is required" }),
  // null reads as absent
  customCode: z.string().nullish(),
});

const updateShortUrlSchema = z.object({
  url: z.string({ required_error: "url is required" }),
});

interface ShortCodeParams {
  shortCode: string;
}

type ShortCodeRequest = FastifyRequest<{ Params: ShortCodeParams }>;

export interface UrlsRoutesOptions {
  service: UrlService;
}

// ============================================================================
// Serialisation
// ============================================================================

/**
 * API view of a record. The access count is only shown on reads.
 */
export function toView(record: ShortUrl, includeAccessCount: boolean): ShortUrlView {
  const view: ShortUrlView = {
    id: record.id,
    url: record.url,
    shortCode: record.shortCode,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
  if (includeAccessCount) {
    view.accessCount = record.accessCount;
  }
  return view;
}

function envelope<T>(data: T): ApiResponse<T> {
  return { success: true, data };
}

// ============================================================================
// OpenAPI Fragments
// ============================================================================

const shortUrlViewSchema = {
  type: "object",
  properties: {
    id: { type: "string" },
    url: { type: "string" },
    shortCode: { type: "string" },
    accessCount: { type: "integer" },
    createdAt: { type: "string" },
    updatedAt: { type: "string" },
  },
} as const;

const shortUrlResponseSchema = {
  type: "object",
  properties: {
    success: { type: "boolean" },
    data: shortUrlViewSchema,
  },
} as const;

const shortCodeParamsSchema = {
  type: "object",
  required: ["shortCode"],
  properties: {
    shortCode: { type: "string", description: "Short code" },
  },
} as const;

// ============================================================================
// Route Handlers
// ============================================================================

function buildHandlers(service: UrlService) {
  /**
   * POST /shorten - Create a new short URL
   */
  async function create(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    const parsed = createShortUrlSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendBadRequest(reply, parsed.error);
    }

    const { url, customCode } = parsed.data;
    const input: CreateShortUrlInput = customCode == null ? { url } : { url, customCode };

    const result = await service.createShortUrl(input, { signal: requestSignal(reply) });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return reply.status(201).send(envelope(toView(result.data, false)));
  }

  /**
   * GET /shorten/:shortCode - Resolve and count
   */
  async function resolve(request: ShortCodeRequest, reply: FastifyReply): Promise<FastifyReply> {
    const result = await service.getOriginalUrl(request.params.shortCode, {
      signal: requestSignal(reply),
    });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return reply.status(200).send(envelope(toView(result.data, true)));
  }

  /**
   * PUT /shorten/:shortCode - Replace destination URL
   */
  async function update(request: ShortCodeRequest, reply: FastifyReply): Promise<FastifyReply> {
    const parsed = updateShortUrlSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendBadRequest(reply, parsed.error);
    }

    const result = await service.updateShortUrl(request.params.shortCode, parsed.data.url, {
      signal: requestSignal(reply),
    });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return reply.status(200).send(envelope(toView(result.data, false)));
  }

  /**
   * DELETE /shorten/:shortCode
   */
  async function remove(request: ShortCodeRequest, reply: FastifyReply): Promise<FastifyReply> {
    const result = await service.deleteShortUrl(request.params.shortCode, {
      signal: requestSignal(reply),
    });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return reply
      .status(200)
      .send(envelope({ message: "Short URL deleted successfully" }));
  }

  /**
   * GET /shorten/:shortCode/stats - Read without counting
   */
  async function stats(request: ShortCodeRequest, reply: FastifyReply): Promise<FastifyReply> {
    const result = await service.getStatistics(request.params.shortCode, {
      signal: requestSignal(reply),
    });
    if (!result.success) {
      return sendServiceError(reply, result.error);
    }

    return reply.status(200).send(envelope(toView(result.data, true)));
  }

  return { create, resolve, update, remove, stats };
}

// ============================================================================
// Route Registration
// ============================================================================

export async function urlsRoutes(fastify: FastifyInstance, opts: UrlsRoutesOptions): Promise<void> {
  const handlers = buildHandlers(opts.service);

  fastify.post("/shorten", {
    schema: {
      description: "Create a new short URL",
      tags: ["urls"],
      body: {
        type: "object",
        required: ["url"],
        properties: {
          url: { type: "string", description: "URL to shorten (http or https)" },
          customCode: {
            type: ["string", "null"],
            description: "Optional 4-20 character alphanumeric code",
          },
        },
      },
      response: { 201: shortUrlResponseSchema },
    },
    handler: handlers.create,
  });

  fastify.get<{ Params: ShortCodeParams }>("/shorten/:shortCode", {
    schema: {
      description: "Resolve a short code to its URL and count the access",
      tags: ["urls"],
      params: shortCodeParamsSchema,
      response: { 200: shortUrlResponseSchema },
    },
    handler: handlers.resolve,
  });

  fastify.put<{ Params: ShortCodeParams }>("/shorten/:shortCode", {
    schema: {
      description: "Change the URL a short code points at",
      tags: ["urls"],
      params: shortCodeParamsSchema,
      body: {
        type: "object",
        required: ["url"],
        properties: {
          url: { type: "string", description: "New destination URL" },
        },
      },
      response: { 200: shortUrlResponseSchema },
    },
    handler: handlers.update,
  });

  fastify.delete<{ Params: ShortCodeParams }>("/shorten/:shortCode", {
    schema: {
      description: "Delete a short URL",
      tags: ["urls"],
      params: shortCodeParamsSchema,
      response: {
        200: {
          type: "object",
          properties: {
            success: { type: "boolean" },
            data: {
              type: "object",
              properties: { message: { type: "string" } },
            },
          },
        },
      },
    },
    handler: handlers.remove,
  });

  fastify.get<{ Params: ShortCodeParams }>("/shorten/:shortCode/stats", {
    schema: {
      description: "Read access statistics for a short code",
      tags: ["urls"],
      params: shortCodeParamsSchema,
      response: { 200: shortUrlResponseSchema },
    },
    handler: handlers.stats,
  });

  fastify.log.debug("Short URL routes registered");
}
