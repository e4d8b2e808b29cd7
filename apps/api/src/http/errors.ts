/**
 * Error Responses
 *
 * Maps service failures onto HTTP statuses and the standard error
 * envelope. INTERNAL causes are logged, never sent to the client.
 */

import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";
import { describeError, type ApiError, type ErrorKind, type ServiceError } from "@linkstub/shared";

export const STATUS_BY_KIND: Readonly<Record<ErrorKind, number>> = {
  VALIDATION: 400,
  DUPLICATE: 409,
  NOT_FOUND: 404,
  CANCELLED: 504,
  INTERNAL: 500,
};

export const INTERNAL_ERROR_MESSAGE = "Internal server error";

export function errorBody(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiError {
  return details === undefined
    ? { success: false, error: { code, message } }
    : { success: false, error: { code, message, details } };
}

/**
 * Send a service failure with its mapped status
 */
export function sendServiceError(reply: FastifyReply, error: ServiceError): FastifyReply {
  const status = STATUS_BY_KIND[error.kind];

  if (error.kind === "INTERNAL") {
    reply.log.error({ cause: describeError(error) }, "Internal error");
    return reply.status(status).send(errorBody(error.kind, INTERNAL_ERROR_MESSAGE));
  }

  return reply.status(status).send(errorBody(error.kind, error.message));
}

/**
 * Send a 400 for a payload that failed its shape check
 */
export function sendBadRequest(reply: FastifyReply, error: ZodError): FastifyReply {
  return reply
    .status(400)
    .send(errorBody("BAD_REQUEST", "Invalid request body", error.flatten().fieldErrors));
}
