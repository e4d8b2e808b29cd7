/**
 * Request Cancellation
 */

import type { FastifyReply } from "fastify";

/**
 * Signal that aborts when the client goes away before the response
 * has been written.
 */
export function requestSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();

  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error("client closed connection"));
    }
  });

  return controller.signal;
}
