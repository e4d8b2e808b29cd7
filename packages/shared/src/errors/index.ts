/**
 * Service Errors and Results
 *
 * Every fallible operation in linkstub returns a `Result<T>` instead of
 * throwing. Failures carry a `ServiceError` whose `kind` callers branch on:
 *
 * | kind         | meaning                                         |
 * |--------------|-------------------------------------------------|
 * | VALIDATION   | caller input broke a rule; fix and resend       |
 * | DUPLICATE    | short code already taken                        |
 * | NOT_FOUND    | no record for the short code                    |
 * | INTERNAL     | store, decode, or generator failure (has cause) |
 * | CANCELLED    | caller aborted or the request deadline passed   |
 */

// =============================================================================
// TYPES
// =============================================================================

export type ErrorKind = "VALIDATION" | "DUPLICATE" | "NOT_FOUND" | "INTERNAL" | "CANCELLED";

export interface ServiceError {
  kind: ErrorKind;
  /** Operation that produced the error, e.g. "repository.create" */
  op: string;
  message: string;
  /** Underlying failure, kept for diagnostics only */
  cause?: unknown;
}

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: ServiceError;
}

export type Result<T> = Success<T> | Failure;

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function ok<T>(data: T): Success<T> {
  return { success: true, data };
}

export function fail(error: ServiceError): Failure {
  return { success: false, error };
}

export function validationError(op: string, message: string, cause?: unknown): ServiceError {
  return withCause({ kind: "VALIDATION", op, message }, cause);
}

export function duplicateError(op: string, message: string): ServiceError {
  return { kind: "DUPLICATE", op, message };
}

export function notFoundError(op: string, message: string): ServiceError {
  return { kind: "NOT_FOUND", op, message };
}

export function internalError(op: string, message: string, cause?: unknown): ServiceError {
  return withCause({ kind: "INTERNAL", op, message }, cause);
}

export function cancelledError(op: string, message: string, cause?: unknown): ServiceError {
  return withCause({ kind: "CANCELLED", op, message }, cause);
}

function withCause(error: ServiceError, cause: unknown): ServiceError {
  return cause === undefined ? error : { ...error, cause };
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Type guard for values shaped like a ServiceError
 */
export function isServiceError(value: unknown): value is ServiceError {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return "kind" in value && "op" in value && "message" in value;
}

/**
 * Render an error chain for logs: "op: message: cause".
 *
 * @example
 * ```ts
 * describeError(
 *   internalError("service.createShortUrl", "failed to check code existence",
 *     internalError("repository.getByCode", "failed to lookup record", new Error("ECONNREFUSED")))
 * );
 * // "service.createShortUrl: failed to check code existence: repository.getByCode: failed to lookup record: ECONNREFUSED"
 * ```
 */
export function describeError(error: ServiceError): string {
  const head = `${error.op}: ${error.message}`;
  if (error.cause === undefined) {
    return head;
  }
  return `${head}: ${describeCause(error.cause)}`;
}

function describeCause(cause: unknown): string {
  if (isServiceError(cause)) {
    return describeError(cause);
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
