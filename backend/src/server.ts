/**
 * Deckwise Server
 *
 * Hono application serving the review API.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { restErrorHandler } from "./middleware/error-handler";
import type { ReviewSession } from "./review-session";
import { createApiRoutes } from "./routes";

export interface AppOptions {
  session: ReviewSession;
}

/**
 * Create and configure the Hono application
 */
export const createApp = ({ session }: AppOptions) => {
  const app = new Hono();

  // CORS middleware for development
  app.use(
    "/api/*",
    cors({
      origin: ["http://localhost:5173", "http://localhost:3000"],
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    })
  );

  // Health check endpoint
  app.get("/api/health", (c) => {
    return c.text("Deckwise Backend");
  });

  app.route("/api", createApiRoutes(session));

  app.onError(restErrorHandler);

  return app;
};
