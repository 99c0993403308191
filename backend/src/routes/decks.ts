/**
 * Deck Routes
 *
 * - GET /decks - Deck files available in the decks directory
 */

import { Hono } from "hono";
import type { AppEnv } from "../middleware/session-context";

const deckRoutes = new Hono<AppEnv>();

/**
 * GET /decks
 *
 * Lists deck files and the decks loaded into the current session.
 * Creates the decks directory with an example deck when it doesn't exist.
 */
deckRoutes.get("/", async (c) => {
  const session = c.get("session");
  const decks = await session.listDecks();
  return c.json({ decks, loaded: [...session.decks] });
});

export { deckRoutes };
