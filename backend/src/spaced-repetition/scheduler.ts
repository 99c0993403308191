/**
 * SM-2 Scheduler
 *
 * Pure function converting a quality rating into the next interval,
 * ease factor, review/lapse counts and due date of a card. The four
 * qualities are the simplified SM-2 responses: Again, Hard, Good, Easy.
 *
 * Cards in the learning phase (interval below the minimum, or at most one
 * completed review) get fixed intervals. Graduated cards grow
 * multiplicatively with their ease factor.
 *
 * The interval always counts from the review date, not from the card's
 * previous due date.
 */

import { Quality, type ReviewQuality } from "@deckwise/shared";
import { createLogger } from "../logger";
import {
  type CalendarDate,
  type CardRecord,
  type ScheduleFields,
  MAX_INTERVAL_DAYS,
  SCHEDULE_FIELDS,
  addDays,
  pickSchedule,
  roundTo,
} from "./card-schema";
import { DEFAULT_POLICY, type SchedulerPolicy } from "./scheduler-policy";

const log = createLogger("scheduler");

// =============================================================================
// Constants
// =============================================================================

/** Decimal places kept for interval_days */
export const INTERVAL_PRECISION = 2;

/** Decimal places kept for ease_factor */
export const EASE_PRECISION = 3;

// =============================================================================
// Types
// =============================================================================

/** Why a call left the card as it was */
export type UnchangedReason = "invalid_quality" | "no_change";

/**
 * Result of advancing a card.
 * "changed" carries a new record; the input card is never mutated.
 */
export type AdvanceResult<T extends CardRecord = CardRecord> =
  | { status: "changed"; card: T; quality: ReviewQuality; days: number }
  | { status: "unchanged"; reason: UnchangedReason };

// =============================================================================
// Input Validation
// =============================================================================

/**
 * Check if a value is one of the four quality ratings.
 */
export function isReviewQuality(value: unknown): value is ReviewQuality {
  return (
    value === Quality.Again ||
    value === Quality.Hard ||
    value === Quality.Good ||
    value === Quality.Easy
  );
}

/**
 * Clamp out-of-invariant persisted state to the nearest valid value.
 * Scheduling self-heals bad input instead of rejecting it.
 */
export function normalizeSchedule(
  card: ScheduleFields,
  today: CalendarDate,
  policy: SchedulerPolicy = DEFAULT_POLICY
): ScheduleFields {
  const interval = Number.isFinite(card.interval_days)
    ? Math.min(MAX_INTERVAL_DAYS, Math.max(0, card.interval_days))
    : 0;
  const ease = Number.isFinite(card.ease_factor) ? card.ease_factor : policy.defaultEase;

  return {
    interval_days: interval,
    ease_factor: Math.max(policy.minEase, ease),
    next_review_date: card.next_review_date ?? today,
    reviews: toCount(card.reviews),
    lapses: toCount(card.lapses),
  };
}

function toCount(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

// =============================================================================
// Core Algorithm
// =============================================================================

/**
 * Compute the next schedule for a card.
 *
 * @param card - Card to review; not mutated
 * @param quality - 1 Again, 2 Hard, 3 Good, 4 Easy. Any other value is a no-op.
 * @param today - Review date in YYYY-MM-DD format
 * @param policy - Scheduling constants
 */
export function advance<T extends CardRecord>(
  card: T,
  quality: number,
  today: CalendarDate,
  policy: SchedulerPolicy = DEFAULT_POLICY
): AdvanceResult<T> {
  if (!isReviewQuality(quality)) {
    log.warn(`Ignoring invalid quality rating: ${String(quality)}`);
    return { status: "unchanged", reason: "invalid_quality" };
  }

  const state = normalizeSchedule(card, today, policy);
  const oldInterval = state.interval_days;
  const currentEase = state.ease_factor;

  let lapses = state.lapses;
  let ease = currentEase;
  let days: number;

  if (quality === Quality.Again) {
    lapses += 1;
    ease = Math.max(policy.minEase, currentEase + policy.easeAgain);
    days =
      policy.lapseIntervalFactor > 0
        ? Math.ceil(oldInterval * policy.lapseIntervalFactor)
        : policy.lapseNewIntervalDays;
    days = Math.max(1, days);
  } else {
    const isLearning = oldInterval < policy.minIntervalDays || state.reviews <= 1;
    days = isLearning
      ? learningInterval(quality, policy)
      : graduatedInterval(quality, oldInterval, currentEase, policy);

    if (quality === Quality.Hard) {
      ease = Math.max(policy.minEase, currentEase + policy.easeHard);
    } else if (quality === Quality.Easy) {
      ease = currentEase + policy.easeEasy;
    }

    days = Math.max(policy.minIntervalDays, days);
  }

  days = Math.min(MAX_INTERVAL_DAYS, days);

  const next: ScheduleFields = {
    interval_days: roundTo(days, INTERVAL_PRECISION),
    ease_factor: roundTo(ease, EASE_PRECISION),
    next_review_date: addDays(today, Math.round(days)),
    reviews: state.reviews + 1,
    lapses,
  };

  if (!scheduleDiffers(pickSchedule(card), next)) {
    return { status: "unchanged", reason: "no_change" };
  }

  return { status: "changed", card: { ...card, ...next }, quality, days };
}

/**
 * Fixed intervals for cards still in the learning phase.
 */
function learningInterval(quality: ReviewQuality, policy: SchedulerPolicy): number {
  switch (quality) {
    case Quality.Hard:
      return 1;
    case Quality.Easy:
      return policy.easyGraduationDays;
    default:
      return policy.initialIntervalDays;
  }
}

/**
 * Multiplicative growth for graduated cards.
 * Hard uses its own smaller multiplier and may stay below old + 1.
 */
function graduatedInterval(
  quality: ReviewQuality,
  oldInterval: number,
  ease: number,
  policy: SchedulerPolicy
): number {
  if (quality === Quality.Hard) {
    return Math.ceil(oldInterval * policy.hardIntervalModifier);
  }

  let days = Math.ceil(oldInterval * ease);
  if (quality === Quality.Easy) {
    days = Math.ceil(days * policy.easyBonusModifier);
  }

  return Math.max(days, oldInterval + 1);
}

/**
 * Compare the scheduling fields of two states.
 */
function scheduleDiffers(before: ScheduleFields, after: ScheduleFields): boolean {
  return SCHEDULE_FIELDS.some((field) => before[field] !== after[field]);
}

// =============================================================================
// Applying Results
// =============================================================================

/**
 * Write a changed result back onto the owned card instance.
 * Keeps the card's identity so queues and collections holding it see the update.
 *
 * @returns true if the card was updated
 */
export function applyAdvance<T extends CardRecord>(card: T, result: AdvanceResult<T>): boolean {
  if (result.status !== "changed") {
    return false;
  }

  card.interval_days = result.card.interval_days;
  card.ease_factor = result.card.ease_factor;
  card.next_review_date = result.card.next_review_date;
  card.reviews = result.card.reviews;
  card.lapses = result.card.lapses;
  return true;
}
