/**
 * Request Deadlines
 *
 * Every store call runs under the caller's abort signal combined with a
 * fixed timeout, so a hung backend cannot hold a request forever.
 */

import { cancelledError, type ServiceError } from "@linkstub/shared";

/**
 * Combine an optional caller signal with a timeout.
 */
export function withDeadline(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Describe why a signal fired: the deadline, or the caller going away.
 */
export function abortError(op: string, signal: AbortSignal): ServiceError {
  const reason: unknown = signal.reason;
  if (typeof reason === "object" && reason !== null && "name" in reason && reason.name === "TimeoutError") {
    return cancelledError(op, "request timed out", reason);
  }
  return cancelledError(op, "request cancelled", reason);
}
