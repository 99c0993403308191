/**
 * Card Schema
 *
 * Types for schedulable cards and the calendar-date helpers shared by
 * the scheduler, the due-set selector and the statistics aggregator.
 *
 * Cards are stored as rows of CSV deck files. The core fields are typed;
 * any other column is kept verbatim in `extras` so it survives a save.
 */

import { DEFAULT_POLICY, type SchedulerPolicy } from "./scheduler-policy";

// =============================================================================
// Date Pattern
// =============================================================================

/**
 * ISO 8601 date pattern (YYYY-MM-DD).
 * Used for all date fields in card records.
 */
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// =============================================================================
// Types
// =============================================================================

/** Calendar date in YYYY-MM-DD format */
export type CalendarDate = string;

/** Longest interval a card can hold (100 years) */
export const MAX_INTERVAL_DAYS = 36500;

/**
 * The schedulable unit.
 *
 * SM-2 fields:
 * - interval_days: days until next exposure once graduated (0 for new cards)
 * - ease_factor: multiplier applied to the interval on graduated reviews
 * - next_review_date: due date, null means due now
 * - reviews: completed rating events
 * - lapses: ratings of "Again"
 */
export interface CardRecord {
  front: string;
  back: string;
  interval_days: number;
  ease_factor: number;
  next_review_date: CalendarDate | null;
  reviews: number;
  lapses: number;
  /** Passthrough columns in header order, never interpreted */
  extras: Map<string, string>;
}

/**
 * A card loaded from a deck file.
 * The id is assigned at load time and is not persisted.
 */
export interface DeckCard extends CardRecord {
  id: string;
  deck: string;
}

/** Scheduling fields written by the scheduler */
export type ScheduleFields = Pick<
  CardRecord,
  "interval_days" | "ease_factor" | "next_review_date" | "reviews" | "lapses"
>;

export const SCHEDULE_FIELDS = [
  "interval_days",
  "ease_factor",
  "next_review_date",
  "reviews",
  "lapses",
] as const satisfies readonly (keyof ScheduleFields)[];

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a new, never-reviewed card due today.
 */
export function createNewCard(
  front: string,
  back: string,
  today: CalendarDate,
  policy: SchedulerPolicy = DEFAULT_POLICY
): CardRecord {
  return {
    front,
    back,
    interval_days: 0,
    ease_factor: policy.defaultEase,
    next_review_date: today,
    reviews: 0,
    lapses: 0,
    extras: new Map(),
  };
}

/**
 * Copy the scheduling fields of a card.
 */
export function pickSchedule(card: ScheduleFields): ScheduleFields {
  return {
    interval_days: card.interval_days,
    ease_factor: card.ease_factor,
    next_review_date: card.next_review_date,
    reviews: card.reviews,
    lapses: card.lapses,
  };
}

// =============================================================================
// Numeric Utilities
// =============================================================================

/**
 * Round to a fixed number of decimal places.
 */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

// =============================================================================
// Date Utilities
// =============================================================================

/**
 * Format a Date object to YYYY-MM-DD string.
 */
export function formatDate(date: Date): CalendarDate {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parse a YYYY-MM-DD string to a Date object.
 * Returns null if the string is invalid.
 */
export function parseDate(dateStr: string): Date | null {
  if (!DATE_PATTERN.test(dateStr)) {
    return null;
  }

  const [year, month, day] = dateStr.split("-").map(Number);
  const date = new Date(year, month - 1, day);

  // Validate the date is real (e.g., not Feb 30)
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Get today's date in YYYY-MM-DD format.
 */
export function getToday(): CalendarDate {
  return formatDate(new Date());
}

/**
 * Add days to a date string and return the result in YYYY-MM-DD format.
 */
export function addDays(dateStr: CalendarDate, days: number): CalendarDate {
  const date = parseDate(dateStr);
  if (!date) {
    throw new Error(`Invalid date: ${dateStr}`);
  }

  date.setDate(date.getDate() + days);
  return formatDate(date);
}
