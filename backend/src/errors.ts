/**
 * Error Classes
 *
 * Domain errors carrying an ErrorCode so the REST layer can map them
 * to HTTP status codes without inspecting messages.
 */

import type { ErrorCode } from "@deckwise/shared";

/**
 * Base error for deck and session operations.
 */
export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = "AppError";
    this.code = code;
  }
}

/**
 * Error thrown when a deck file is missing or unreadable as a deck.
 */
export class DeckError extends AppError {
  constructor(message: string, code: "DECK_NOT_FOUND" | "INVALID_DECK") {
    super(message, code);
    this.name = "DeckError";
  }
}

/**
 * Error thrown when a session operation is not valid in the current state.
 */
export class SessionError extends AppError {
  constructor(
    message: string,
    code: "NO_ACTIVE_SESSION" | "NO_ACTIVE_CARD" | "ANSWER_NOT_SHOWN" | "VALIDATION_ERROR"
  ) {
    super(message, code);
    this.name = "SessionError";
  }
}

/**
 * Error thrown when the decks directory cannot be listed or created.
 */
export class DecksDirError extends AppError {
  constructor(message: string) {
    super(message, "INTERNAL_ERROR");
    this.name = "DecksDirError";
  }
}
