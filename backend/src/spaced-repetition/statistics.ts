/**
 * Statistics Aggregator
 *
 * Read-only snapshot of collection health: maturity buckets, interval and
 * ease histograms, a dense due-date forecast and aggregate counters.
 * Pure function of the collection, the reference date and the horizon.
 */

import { addDays, roundTo, type CalendarDate, type CardRecord } from "./card-schema";

// =============================================================================
// Constants
// =============================================================================

/** Default forecast horizon in days */
export const DEFAULT_FORECAST_DAYS = 30;

/** Cards below this interval are still learning */
export const LEARNING_INTERVAL_THRESHOLD = 21;

/** Cards at or above this interval are mature */
export const MATURE_INTERVAL_THRESHOLD = 90;

/**
 * Interval bins. "0d" holds exactly zero; every other bin covers
 * (previous upper bound, upper bound]; ">1y" is open-ended.
 */
const INTERVAL_BINS = [
  { label: "0d", upTo: 0 },
  { label: "<=1d", upTo: 1 },
  { label: "2-3d", upTo: 3 },
  { label: "4-7d", upTo: 7 },
  { label: "8-14d", upTo: 14 },
  { label: "15-30d", upTo: 30 },
  { label: "1-2m", upTo: 60 },
  { label: "2-3m", upTo: 90 },
  { label: "3-6m", upTo: 180 },
  { label: "6-12m", upTo: 365 },
  { label: ">1y", upTo: Infinity },
] as const;

/**
 * Ease bins, each covering [from, next from); ">3.0" starts at 3.0.
 */
const EASE_BINS = [
  { label: "<1.3", from: -Infinity },
  { label: "1.3-1.5", from: 1.3 },
  { label: "1.5-1.8", from: 1.5 },
  { label: "1.8-2.0", from: 1.8 },
  { label: "2.0-2.2", from: 2.0 },
  { label: "2.2-2.4", from: 2.2 },
  { label: "2.4-2.6", from: 2.4 },
  { label: "2.6-2.8", from: 2.6 },
  { label: "2.8-3.0", from: 2.8 },
  { label: ">3.0", from: 3.0 },
] as const;

export const INTERVAL_LABELS = INTERVAL_BINS.map((bin) => bin.label);
export const EASE_LABELS = EASE_BINS.map((bin) => bin.label);

// =============================================================================
// Types
// =============================================================================

export type Maturity = "new" | "learning" | "young" | "mature";
export type IntervalLabel = (typeof INTERVAL_BINS)[number]["label"];
export type EaseLabel = (typeof EASE_BINS)[number]["label"];

export interface HistogramBin<L extends string> {
  label: L;
  count: number;
}

export interface ForecastDay {
  date: CalendarDate;
  count: number;
}

export interface StatisticsSnapshot {
  today: CalendarDate;
  forecastDays: number;
  totalCards: number;
  maturity: Record<Maturity, number>;
  dueToday: number;
  dueTomorrow: number;
  dueNext7Days: number;
  forecast: ForecastDay[];
  averageIntervalAll: number;
  averageIntervalMature: number;
  longestInterval: number;
  intervalHistogram: HistogramBin<IntervalLabel>[];
  averageEase: number;
  easeHistogram: HistogramBin<EaseLabel>[];
  totalReviews: number;
  totalLapses: number;
  averageReviewsPerCard: number;
  averageLapsesPerCard: number;
  lapsedCardCount: number;
}

type StatsCard = Pick<
  CardRecord,
  "interval_days" | "ease_factor" | "next_review_date" | "reviews" | "lapses"
>;

// =============================================================================
// Classification
// =============================================================================

/**
 * Maturity bucket of a single card.
 */
export function classifyMaturity(card: Pick<CardRecord, "interval_days" | "reviews">): Maturity {
  if (card.reviews === 0) return "new";
  if (card.interval_days < LEARNING_INTERVAL_THRESHOLD) return "learning";
  if (card.interval_days < MATURE_INTERVAL_THRESHOLD) return "young";
  return "mature";
}

/**
 * Interval histogram label for a number of days.
 */
export function intervalBin(interval: number): IntervalLabel {
  const days = Math.max(0, interval);
  const bin = INTERVAL_BINS.find((candidate) => days <= candidate.upTo);
  return bin?.label ?? ">1y";
}

/**
 * Ease histogram label for an ease factor.
 */
export function easeBin(ease: number): EaseLabel {
  for (let i = EASE_BINS.length - 1; i >= 0; i--) {
    if (ease >= EASE_BINS[i].from) {
      return EASE_BINS[i].label;
    }
  }
  return "<1.3";
}

// =============================================================================
// Aggregation
// =============================================================================

/**
 * Compute a statistics snapshot.
 *
 * @param collection - Cards to aggregate; not modified
 * @param today - Reference date in YYYY-MM-DD format
 * @param forecastDays - Horizon; the forecast has forecastDays + 1 entries
 */
export function computeStatistics(
  collection: readonly StatsCard[],
  today: CalendarDate,
  forecastDays: number = DEFAULT_FORECAST_DAYS
): StatisticsSnapshot {
  const horizon = Number.isFinite(forecastDays) ? Math.max(0, Math.floor(forecastDays)) : 0;
  const tomorrow = addDays(today, 1);
  const weekEnd = addDays(today, 7);

  const forecast: ForecastDay[] = [];
  const forecastIndex = new Map<CalendarDate, ForecastDay>();
  for (let offset = 0; offset <= horizon; offset++) {
    const day: ForecastDay = { date: addDays(today, offset), count: 0 };
    forecast.push(day);
    forecastIndex.set(day.date, day);
  }

  const maturity: Record<Maturity, number> = { new: 0, learning: 0, young: 0, mature: 0 };
  const intervalCounts = new Map<IntervalLabel, number>();
  const easeCounts = new Map<EaseLabel, number>();

  let dueToday = 0;
  let dueTomorrow = 0;
  let dueNext7Days = 0;
  let totalReviews = 0;
  let totalLapses = 0;
  let lapsedCardCount = 0;
  let reviewedCount = 0;
  let intervalSum = 0;
  let matureCount = 0;
  let matureIntervalSum = 0;
  let longestInterval = 0;
  let easeSum = 0;

  for (const card of collection) {
    const bucket = classifyMaturity(card);
    maturity[bucket]++;

    totalReviews += card.reviews;
    totalLapses += card.lapses;
    if (card.lapses > 0) lapsedCardCount++;

    if (bucket !== "new") {
      reviewedCount++;
      intervalSum += card.interval_days;
      easeSum += card.ease_factor;
      longestInterval = Math.max(longestInterval, card.interval_days);

      const easeLabel = easeBin(card.ease_factor);
      easeCounts.set(easeLabel, (easeCounts.get(easeLabel) ?? 0) + 1);
    }

    if (bucket === "mature") {
      matureCount++;
      matureIntervalSum += card.interval_days;
    }

    const intervalLabel = intervalBin(card.interval_days);
    intervalCounts.set(intervalLabel, (intervalCounts.get(intervalLabel) ?? 0) + 1);

    const due = card.next_review_date ?? today;
    const forecastDay = forecastIndex.get(due);
    if (forecastDay) forecastDay.count++;

    if (due <= today) dueToday++;
    if (due === tomorrow) dueTomorrow++;
    if (due >= tomorrow && due <= weekEnd) dueNext7Days++;
  }

  const totalCards = collection.length;

  return {
    today,
    forecastDays: horizon,
    totalCards,
    maturity,
    dueToday,
    dueTomorrow,
    dueNext7Days,
    forecast,
    averageIntervalAll: average(intervalSum, reviewedCount, 1),
    averageIntervalMature: average(matureIntervalSum, matureCount, 1),
    longestInterval,
    intervalHistogram: INTERVAL_LABELS.map((label) => ({
      label,
      count: intervalCounts.get(label) ?? 0,
    })),
    averageEase: average(easeSum, reviewedCount, 2),
    easeHistogram: EASE_LABELS.map((label) => ({
      label,
      count: easeCounts.get(label) ?? 0,
    })),
    totalReviews,
    totalLapses,
    averageReviewsPerCard: average(totalReviews, totalCards, 1),
    averageLapsesPerCard: average(totalLapses, totalCards, 1),
    lapsedCardCount,
  };
}

function average(sum: number, count: number, places: number): number {
  return count > 0 ? roundTo(sum / count, places) : 0;
}
