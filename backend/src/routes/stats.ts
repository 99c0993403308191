/**
 * Statistics Routes
 *
 * - GET /stats?days=N - Statistics over the loaded cards
 */

import { Hono } from "hono";
import { StatsQuerySchema, formatValidationError } from "@deckwise/shared";
import { type AppEnv, jsonError } from "../middleware/session-context";

const statsRoutes = new Hono<AppEnv>();

/**
 * GET /stats
 *
 * `days` sets the forecast horizon; the configured horizon applies when omitted.
 */
statsRoutes.get("/", (c) => {
  const parsed = StatsQuerySchema.safeParse(c.req.query());
  if (!parsed.success) {
    return jsonError(c, 400, "VALIDATION_ERROR", formatValidationError(parsed.error));
  }

  return c.json(c.get("session").statistics(parsed.data.days));
});

export { statsRoutes };
