/**
 * Deckwise Shared Types and Protocol
 *
 * This package contains:
 * - Zod schemas for REST request validation
 * - TypeScript types for review sessions and cards on the wire
 */

export const VERSION = "0.1.0";

// Core types
export { Quality } from "./types";
export type { ReviewQuality, ErrorCode, SessionSummary, SaveSummary } from "./types";

// Protocol schemas
export {
  ErrorCodeSchema,
  ErrorResponseSchema,
  ReviewQualitySchema,
  CalendarDateSchema,
  DeckNameSchema,
  StartSessionRequestSchema,
  RateCardRequestSchema,
  AddCardRequestSchema,
  StatsQuerySchema,
  CardPreviewSchema,
  CardDetailSchema,
  CurrentCardResponseSchema,
  ReviewOutcomeSchema,
  formatValidationError,
} from "./protocol";

export type {
  ErrorResponse,
  StartSessionRequest,
  RateCardRequest,
  AddCardRequest,
  StatsQuery,
  CardPreview,
  CardDetail,
  CurrentCardResponse,
  ReviewOutcome,
} from "./protocol";
