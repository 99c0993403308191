/**
 * Deckwise Shared Types
 *
 * Core type definitions shared by the REST server and any client
 * that drives a review session.
 */

/**
 * Recall quality reported by the reviewer for a single card.
 */
export const Quality = {
  Again: 1,
  Hard: 2,
  Good: 3,
  Easy: 4,
} as const;

export type ReviewQuality = (typeof Quality)[keyof typeof Quality];

/**
 * Error codes returned by the REST API.
 */
export type ErrorCode =
  | "VALIDATION_ERROR"
  | "DECK_NOT_FOUND"
  | "INVALID_DECK"
  | "NO_ACTIVE_SESSION"
  | "NO_ACTIVE_CARD"
  | "ANSWER_NOT_SHOWN"
  | "SAVE_FAILED"
  | "INTERNAL_ERROR";

/**
 * Summary returned when a session loads one or more decks.
 */
export interface SessionSummary {
  decks: string[];
  totalCards: number;
  dueCards: number;
  warnings: string[];
}

/**
 * Per-deck outcome of persisting dirty cards.
 */
export interface SaveSummary {
  saved: string[];
  failed: { deck: string; message: string }[];
}
