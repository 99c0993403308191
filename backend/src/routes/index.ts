/**
 * Route Index
 *
 * Registers all REST routes under `/api/*` with the session middleware.
 */

import { Hono } from "hono";
import type { ReviewSession } from "../review-session";
import { type AppEnv, sessionContext } from "../middleware/session-context";
import { deckRoutes } from "./decks";
import { sessionRoutes } from "./session";
import { statsRoutes } from "./stats";

/**
 * Hono router for the review API.
 *
 * Usage in server.ts:
 * ```typescript
 * app.route("/api", createApiRoutes(session));
 * ```
 */
export function createApiRoutes(session: ReviewSession): Hono<AppEnv> {
  const api = new Hono<AppEnv>();

  api.use("/*", sessionContext(session));

  api.route("/decks", deckRoutes);
  api.route("/session", sessionRoutes);
  api.route("/stats", statsRoutes);

  return api;
}
