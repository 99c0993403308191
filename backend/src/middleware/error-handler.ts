/**
 * Error Handling Middleware
 *
 * Hono error handler that maps domain exceptions to HTTP status codes
 * with JSON error bodies of the form { error: { code, message } }.
 */

import type { Context, ErrorHandler } from "hono";
import { ErrorCodeSchema, type ErrorCode } from "@deckwise/shared";
import { AppError } from "../errors";
import { createLogger } from "../logger";
import { type ErrorStatus, jsonError } from "./session-context";

const log = createLogger("ErrorHandler");

/**
 * Maps error codes to HTTP status codes.
 *
 * - VALIDATION_ERROR, INVALID_DECK: 400 Bad Request
 * - DECK_NOT_FOUND: 404 Not Found
 * - NO_ACTIVE_SESSION, NO_ACTIVE_CARD, ANSWER_NOT_SHOWN: 409 Conflict
 * - SAVE_FAILED, INTERNAL_ERROR: 500 Internal Server Error
 */
export function mapErrorCodeToStatus(code: ErrorCode): ErrorStatus {
  switch (code) {
    case "VALIDATION_ERROR":
    case "INVALID_DECK":
      return 400;
    case "DECK_NOT_FOUND":
      return 404;
    case "NO_ACTIVE_SESSION":
    case "NO_ACTIVE_CARD":
    case "ANSWER_NOT_SHOWN":
      return 409;
    case "SAVE_FAILED":
    case "INTERNAL_ERROR":
      return 500;
  }
}

/**
 * Determines if an error carries a known error code.
 *
 * Checks for a `code` property with a valid ErrorCode value as a fallback,
 * since instanceof checks can fail across module boundaries.
 */
function isAppError(error: unknown): error is Error & { code: ErrorCode } {
  if (error instanceof AppError) {
    return true;
  }
  return (
    error instanceof Error &&
    "code" in error &&
    ErrorCodeSchema.safeParse(error.code).success
  );
}

/**
 * Logs error details server-side with context.
 * Stack traces are logged but never exposed in responses.
 */
function logError(c: Context, error: unknown): void {
  const method = c.req.method;
  const path = c.req.path;

  if (isAppError(error)) {
    // Known domain errors: log at warn level
    log.warn(`${method} ${path} - ${error.code}: ${error.message}`);
  } else if (error instanceof Error) {
    log.error(`${method} ${path} - Unexpected error: ${error.message}`, {
      stack: error.stack,
    });
  } else {
    log.error(`${method} ${path} - Unknown error type`, { error });
  }
}

/**
 * Hono error handler for REST API routes.
 *
 * Usage:
 * ```typescript
 * app.onError(restErrorHandler);
 * ```
 */
export const restErrorHandler: ErrorHandler = (err, c) => {
  logError(c, err);

  if (isAppError(err)) {
    return jsonError(c, mapErrorCodeToStatus(err.code), err.code, err.message);
  }

  // Return safe error message (no internal details or stack traces)
  return jsonError(
    c,
    500,
    "INTERNAL_ERROR",
    "An unexpected error occurred. Please try again later."
  );
};
