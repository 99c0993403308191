/**
 * Deckwise REST Protocol
 *
 * Zod schemas for validating request bodies and describing response
 * payloads exchanged between a review client and the server.
 */

import { z } from "zod";

// =============================================================================
// Error Code Schema
// =============================================================================

/**
 * Schema for ErrorCode enum values
 */
export const ErrorCodeSchema = z.enum([
  "VALIDATION_ERROR",
  "DECK_NOT_FOUND",
  "INVALID_DECK",
  "NO_ACTIVE_SESSION",
  "NO_ACTIVE_CARD",
  "ANSWER_NOT_SHOWN",
  "SAVE_FAILED",
  "INTERNAL_ERROR",
]);

/**
 * Error body used by every failing endpoint.
 */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string().min(1, "Error message is required"),
  }),
});

// =============================================================================
// Shared Field Schemas
// =============================================================================

/**
 * Quality rating: 1 Again, 2 Hard, 3 Good, 4 Easy.
 */
export const ReviewQualitySchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

/**
 * Calendar date (YYYY-MM-DD)
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD format");

/**
 * Deck file name as listed by GET /api/decks
 */
export const DeckNameSchema = z
  .string()
  .min(1, "Deck name is required")
  .refine((name) => !name.includes("/") && !name.includes("\\") && !name.includes(".."), {
    message: "Deck name must not contain path separators",
  });

// =============================================================================
// Request Schemas
// =============================================================================

/**
 * POST /api/session
 */
export const StartSessionRequestSchema = z.object({
  decks: z.array(DeckNameSchema).min(1, "At least one deck is required"),
});

/**
 * POST /api/session/rate
 */
export const RateCardRequestSchema = z.object({
  quality: ReviewQualitySchema,
});

/**
 * POST /api/session/cards
 */
export const AddCardRequestSchema = z.object({
  front: z.string().trim().min(1, "Front is required"),
  back: z.string().trim().min(1, "Back is required"),
  deck: DeckNameSchema.optional(),
});

/**
 * GET /api/stats query string
 */
export const StatsQuerySchema = z.object({
  days: z.coerce.number().int().min(0).max(3650).optional(),
});

// =============================================================================
// Response Schemas
// =============================================================================

/**
 * Card as shown before the answer is revealed.
 */
export const CardPreviewSchema = z.object({
  id: z.string().min(1),
  deck: z.string().min(1),
  front: z.string(),
});

/**
 * Card with answer and scheduling state.
 */
export const CardDetailSchema = CardPreviewSchema.extend({
  back: z.string(),
  interval_days: z.number().min(0),
  ease_factor: z.number(),
  next_review_date: CalendarDateSchema.nullable(),
  reviews: z.number().int().min(0),
  lapses: z.number().int().min(0),
});

/**
 * GET /api/session/current
 */
export const CurrentCardResponseSchema = z.object({
  card: CardPreviewSchema.nullable(),
  remaining: z.number().int().min(0),
});

/**
 * POST /api/session/rate
 */
export const ReviewOutcomeSchema = z.object({
  card: CardDetailSchema,
  changed: z.boolean(),
  requeued: z.boolean(),
  remaining: z.number().int().min(0),
});

// =============================================================================
// Inferred Types
// =============================================================================

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
export type StartSessionRequest = z.infer<typeof StartSessionRequestSchema>;
export type RateCardRequest = z.infer<typeof RateCardRequestSchema>;
export type AddCardRequest = z.infer<typeof AddCardRequestSchema>;
export type StatsQuery = z.infer<typeof StatsQuerySchema>;
export type CardPreview = z.infer<typeof CardPreviewSchema>;
export type CardDetail = z.infer<typeof CardDetailSchema>;
export type CurrentCardResponse = z.infer<typeof CurrentCardResponseSchema>;
export type ReviewOutcome = z.infer<typeof ReviewOutcomeSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Format a Zod validation error into a single-line message.
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
