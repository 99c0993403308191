/**
 * Review Session Routes
 *
 * REST endpoints for driving a review session:
 * - POST /session - Load decks and start a session
 * - GET /session/current - Current card (front only)
 * - POST /session/reveal - Reveal the answer of the current card
 * - POST /session/rate - Rate the current card
 * - POST /session/cards - Add a card to a loaded deck
 * - POST /session/save - Persist changed cards
 * - DELETE /session - Save pending changes and close the session
 */

import { Hono, type Context } from "hono";
import type { z } from "zod";
import {
  AddCardRequestSchema,
  RateCardRequestSchema,
  StartSessionRequestSchema,
  formatValidationError,
  type CardDetail,
  type CardPreview,
  type CurrentCardResponse,
  type ReviewOutcome,
} from "@deckwise/shared";
import { createLogger } from "../logger";
import { type AppEnv, jsonError } from "../middleware/session-context";
import type { DeckCard } from "../spaced-repetition/card-schema";

const log = createLogger("SessionRoutes");

// =============================================================================
// Views
// =============================================================================

/**
 * Card as shown before the answer is revealed.
 */
export function toCardPreview(card: DeckCard): CardPreview {
  return { id: card.id, deck: card.deck, front: card.front };
}

/**
 * Card with answer and scheduling state.
 */
export function toCardDetail(card: DeckCard): CardDetail {
  return {
    ...toCardPreview(card),
    back: card.back,
    interval_days: card.interval_days,
    ease_factor: card.ease_factor,
    next_review_date: card.next_review_date,
    reviews: card.reviews,
    lapses: card.lapses,
  };
}

// =============================================================================
// Body Parsing
// =============================================================================

type BodyResult<T> = { success: true; data: T } | { success: false; response: Response };

/**
 * Parse and validate a JSON body, producing a 400 response on failure.
 */
async function parseBody<S extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S
): Promise<BodyResult<z.infer<S>>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return {
      success: false,
      response: jsonError(c, 400, "VALIDATION_ERROR", "Invalid JSON in request body"),
    };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      response: jsonError(c, 400, "VALIDATION_ERROR", formatValidationError(parsed.error)),
    };
  }
  return { success: true, data: parsed.data };
}

// =============================================================================
// Routes
// =============================================================================

const sessionRoutes = new Hono<AppEnv>();

/**
 * POST /session
 *
 * Loads the given decks and builds a shuffled queue of due cards.
 */
sessionRoutes.post("/", async (c) => {
  const body = await parseBody(c, StartSessionRequestSchema);
  if (!body.success) return body.response;

  log.info(`Starting session with decks: ${body.data.decks.join(", ")}`);
  const summary = await c.get("session").load(body.data.decks);
  return c.json(summary);
});

/**
 * GET /session/current
 *
 * Returns the card under review without its answer.
 */
sessionRoutes.get("/current", (c) => {
  const session = c.get("session");
  const card = session.current();
  const response: CurrentCardResponse = {
    card: card ? toCardPreview(card) : null,
    remaining: session.remaining,
  };
  return c.json(response);
});

/**
 * POST /session/reveal
 *
 * Reveals the answer of the current card. Required before rating.
 */
sessionRoutes.post("/reveal", (c) => {
  const card = c.get("session").revealAnswer();
  return c.json(toCardDetail(card));
});

/**
 * POST /session/rate
 *
 * Rates the current card: 1 Again, 2 Hard, 3 Good, 4 Easy.
 */
sessionRoutes.post("/rate", async (c) => {
  const body = await parseBody(c, RateCardRequestSchema);
  if (!body.success) return body.response;

  const result = c.get("session").rate(body.data.quality);
  log.info(
    `Card ${result.card.id} rated ${body.data.quality}: next_review=${result.card.next_review_date}, interval=${result.card.interval_days}`
  );

  const response: ReviewOutcome = {
    card: toCardDetail(result.card),
    changed: result.changed,
    requeued: result.requeued,
    remaining: result.remaining,
  };
  return c.json(response);
});

/**
 * POST /session/cards
 *
 * Adds a new card to a loaded deck (first loaded deck by default).
 */
sessionRoutes.post("/cards", async (c) => {
  const body = await parseBody(c, AddCardRequestSchema);
  if (!body.success) return body.response;

  const card = await c.get("session").addCard(body.data.front, body.data.back, body.data.deck);
  return c.json(toCardDetail(card), 201);
});

/**
 * POST /session/save
 *
 * Writes every deck with changed cards.
 */
sessionRoutes.post("/save", async (c) => {
  const summary = await c.get("session").save();
  return c.json(summary, summary.failed.length > 0 ? 500 : 200);
});

/**
 * DELETE /session
 *
 * Saves pending changes and unloads every deck.
 */
sessionRoutes.delete("/", async (c) => {
  await c.get("session").reset();
  return c.body(null, 204);
});

export { sessionRoutes };
