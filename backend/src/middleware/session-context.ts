/**
 * Session Context Middleware
 *
 * Makes the review session available to route handlers via c.get("session"),
 * and holds the JSON error helper shared by every route.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ErrorCode, ErrorResponse } from "@deckwise/shared";
import type { ReviewSession } from "../review-session";

/**
 * Hono environment for routes that need the review session.
 */
export interface AppEnv {
  Variables: {
    session: ReviewSession;
  };
}

/** HTTP statuses used for error responses */
export type ErrorStatus = 400 | 404 | 409 | 500;

/**
 * Creates a JSON error response with the proper format.
 *
 * @param c - Hono context
 * @param status - HTTP status code
 * @param code - Error code from ErrorCode enum
 * @param message - Human-readable error message
 */
export function jsonError(c: Context, status: ErrorStatus, code: ErrorCode, message: string) {
  const body: ErrorResponse = {
    error: {
      code,
      message,
    },
  };
  return c.json(body, status);
}

/**
 * Middleware that sets the review session in context.
 */
export function sessionContext(session: ReviewSession): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("session", session);
    await next();
  };
}
