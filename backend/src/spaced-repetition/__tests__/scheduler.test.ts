/**
 * Scheduler Tests
 */

import { describe, expect, test } from "vitest";
import { Quality } from "@deckwise/shared";
import { type CardRecord, MAX_INTERVAL_DAYS, addDays, createNewCard } from "../card-schema";
import { createSeededRandom } from "../due-set";
import { advance, applyAdvance, isReviewQuality, normalizeSchedule } from "../scheduler";
import { DEFAULT_POLICY, resolvePolicy } from "../scheduler-policy";

const TODAY = "2026-03-10";

function makeCard(overrides: Partial<CardRecord> = {}): CardRecord {
  return {
    front: "What is the capital of France?",
    back: "Paris",
    interval_days: 0,
    ease_factor: 2.5,
    next_review_date: TODAY,
    reviews: 0,
    lapses: 0,
    extras: new Map(),
    ...overrides,
  };
}

/** Advance and return the new card, failing the test if nothing changed */
function review(card: CardRecord, quality: number, today = TODAY): CardRecord {
  const result = advance(card, quality, today);
  if (result.status !== "changed") {
    throw new Error(`Expected a change, got ${result.reason}`);
  }
  return result.card;
}

describe("isReviewQuality", () => {
  test("accepts the four ratings", () => {
    expect([1, 2, 3, 4].every(isReviewQuality)).toBe(true);
  });

  test("rejects everything else", () => {
    expect(isReviewQuality(0)).toBe(false);
    expect(isReviewQuality(5)).toBe(false);
    expect(isReviewQuality(2.5)).toBe(false);
    expect(isReviewQuality("3")).toBe(false);
  });
});

describe("advance", () => {
  describe("learning phase", () => {
    test("Good on a new card graduates to one day", () => {
      const next = review(makeCard(), Quality.Good);

      expect(next.interval_days).toBe(1);
      expect(next.ease_factor).toBe(2.5);
      expect(next.reviews).toBe(1);
      expect(next.lapses).toBe(0);
      expect(next.next_review_date).toBe("2026-03-11");
    });

    test("Good three days in a row gives 1, 1, then 3 days", () => {
      const first = review(makeCard(), Quality.Good, "2026-03-10");
      const second = review(first, Quality.Good, "2026-03-11");
      const third = review(second, Quality.Good, "2026-03-12");

      expect(first.interval_days).toBe(1);
      expect(second.interval_days).toBe(1);
      expect(second.reviews).toBe(2);
      expect(third.interval_days).toBe(3);
      expect(third.next_review_date).toBe("2026-03-15");
    });

    test("Easy on a new card jumps to the graduation interval", () => {
      const next = review(makeCard(), Quality.Easy);

      expect(next.interval_days).toBe(4);
      expect(next.ease_factor).toBe(2.65);
      expect(next.next_review_date).toBe("2026-03-14");
    });

    test("Hard on a new card gives one day and lowers ease", () => {
      const next = review(makeCard(), Quality.Hard);

      expect(next.interval_days).toBe(1);
      expect(next.ease_factor).toBe(2.35);
    });

    test("a card with one review is still learning", () => {
      const next = review(makeCard({ interval_days: 10, reviews: 1 }), Quality.Good);
      expect(next.interval_days).toBe(1);
    });
  });

  describe("graduated cards", () => {
    test("Hard multiplies by the hard modifier and lowers ease", () => {
      const next = review(makeCard({ interval_days: 100, ease_factor: 2.0, reviews: 6 }), Quality.Hard);

      expect(next.interval_days).toBe(120);
      expect(next.ease_factor).toBe(1.85);
      expect(next.next_review_date).toBe("2026-07-08");
    });

    test("Hard may stay below old interval plus one", () => {
      const next = review(makeCard({ interval_days: 1.5, reviews: 3 }), Quality.Hard);
      expect(next.interval_days).toBe(2);
    });

    test("Good multiplies by ease and rounds up", () => {
      const next = review(makeCard({ interval_days: 2.5, reviews: 3 }), Quality.Good);
      expect(next.interval_days).toBe(7);
      expect(next.ease_factor).toBe(2.5);
    });

    test("Good always exceeds the old interval", () => {
      const next = review(makeCard({ interval_days: 5, ease_factor: 1.3, reviews: 4 }), Quality.Good);
      // ceil(5 * 1.3) = 7
      expect(next.interval_days).toBe(7);

      const slow = review(makeCard({ interval_days: 1, ease_factor: 1.3, reviews: 4 }), Quality.Good);
      // ceil(1.3) = 2 = old + 1
      expect(slow.interval_days).toBe(2);
    });

    test("Easy applies the easy bonus on top of ease", () => {
      const next = review(makeCard({ interval_days: 10, reviews: 3 }), Quality.Easy);

      // ceil(10 * 2.5) = 25, ceil(25 * 1.3) = 33
      expect(next.interval_days).toBe(33);
      expect(next.ease_factor).toBe(2.65);
    });
  });

  describe("lapses", () => {
    test("Again resets to one day and counts a lapse", () => {
      const card = makeCard({ interval_days: 10, ease_factor: 2.5, reviews: 4 });
      const next = review(card, Quality.Again);

      expect(next.interval_days).toBe(1);
      expect(next.ease_factor).toBe(2.3);
      expect(next.lapses).toBe(1);
      expect(next.reviews).toBe(5);
      expect(next.next_review_date).toBe("2026-03-11");
    });

    test("ease never drops below the minimum", () => {
      const next = review(makeCard({ interval_days: 10, ease_factor: 1.3, reviews: 4 }), Quality.Again);
      expect(next.ease_factor).toBe(1.3);

      const hard = review(makeCard({ interval_days: 10, ease_factor: 1.35, reviews: 4 }), Quality.Hard);
      expect(hard.ease_factor).toBe(1.3);
    });

    test("a lapse interval factor keeps part of the old interval", () => {
      const policy = resolvePolicy({ lapseIntervalFactor: 0.5 });
      const result = advance(makeCard({ interval_days: 9, reviews: 4 }), Quality.Again, TODAY, policy);

      expect(result.status).toBe("changed");
      if (result.status === "changed") {
        // ceil(9 * 0.5) = 5
        expect(result.card.interval_days).toBe(5);
        expect(result.days).toBe(5);
      }
    });
  });

  describe("input handling", () => {
    test("invalid quality leaves the card unchanged", () => {
      const card = makeCard({ interval_days: 10, reviews: 3 });
      const result = advance(card, 7, TODAY);

      expect(result).toEqual({ status: "unchanged", reason: "invalid_quality" });
      expect(card.interval_days).toBe(10);
      expect(card.reviews).toBe(3);
    });

    test("does not mutate the input card", () => {
      const card = makeCard();
      const next = review(card, Quality.Good);

      expect(card.reviews).toBe(0);
      expect(card.interval_days).toBe(0);
      expect(next).not.toBe(card);
    });

    test("keeps front, back and extras", () => {
      const card = makeCard({ extras: new Map([["tags", "geo"]]) });
      const next = review(card, Quality.Good);

      expect(next.front).toBe(card.front);
      expect(next.back).toBe("Paris");
      expect(next.extras.get("tags")).toBe("geo");
    });

    test("a missing due date counts as due today", () => {
      const next = review(makeCard({ next_review_date: null }), Quality.Good);
      expect(next.next_review_date).toBe("2026-03-11");
    });

    test("negative interval and low ease are healed before scheduling", () => {
      const next = review(makeCard({ interval_days: -4, ease_factor: 0.5 }), Quality.Good);

      expect(next.interval_days).toBe(1);
      expect(next.ease_factor).toBe(1.3);
    });

    test("due dates roll over month ends", () => {
      const next = review(makeCard(), Quality.Good, "2026-01-31");
      expect(next.next_review_date).toBe("2026-02-01");
    });

    test("intervals are capped", () => {
      const next = review(makeCard({ interval_days: 1e9, reviews: 5 }), Quality.Good);

      expect(next.interval_days).toBe(MAX_INTERVAL_DAYS);
      expect(next.next_review_date).toBe(addDays(TODAY, MAX_INTERVAL_DAYS));
    });

    test("is deterministic", () => {
      const card = makeCard({ interval_days: 7.25, ease_factor: 2.123, reviews: 5 });
      expect(advance(card, Quality.Easy, TODAY)).toEqual(advance(card, Quality.Easy, TODAY));
    });
  });
});

describe("rating sequences", () => {
  test.each(["first-sequence", "second-sequence", "third-sequence"])(
    "keep every invariant after each rating (%s)",
    (seed) => {
      const random = createSeededRandom(seed);
      let card = makeCard();

      for (let step = 0; step < 200; step++) {
        const quality = 1 + Math.floor(random() * 4);
        const next = review(card, quality);

        expect(next.ease_factor).toBeGreaterThanOrEqual(DEFAULT_POLICY.minEase);
        expect(next.reviews).toBe(card.reviews + 1);
        expect(next.lapses).toBe(card.lapses + (quality === Quality.Again ? 1 : 0));
        expect(next.interval_days).toBeGreaterThanOrEqual(DEFAULT_POLICY.minIntervalDays);
        expect(next.interval_days).toBeLessThanOrEqual(MAX_INTERVAL_DAYS);
        expect(next.next_review_date !== null && next.next_review_date > TODAY).toBe(true);

        card = next;
      }
    }
  );
});

describe("applyAdvance", () => {
  test("writes a changed result onto the same instance", () => {
    const card = makeCard();
    const result = advance(card, Quality.Good, TODAY);

    expect(applyAdvance(card, result)).toBe(true);
    expect(card.interval_days).toBe(1);
    expect(card.reviews).toBe(1);
    expect(card.next_review_date).toBe("2026-03-11");
  });

  test("ignores unchanged results", () => {
    const card = makeCard();
    expect(applyAdvance(card, { status: "unchanged", reason: "invalid_quality" })).toBe(false);
    expect(card.reviews).toBe(0);
  });
});

describe("normalizeSchedule", () => {
  test("clamps out-of-range values", () => {
    const healed = normalizeSchedule(
      { interval_days: Number.NaN, ease_factor: 1.0, next_review_date: null, reviews: -2, lapses: 1.7 },
      TODAY
    );

    expect(healed).toEqual({
      interval_days: 0,
      ease_factor: DEFAULT_POLICY.minEase,
      next_review_date: TODAY,
      reviews: 0,
      lapses: 1,
    });
  });
});

describe("createNewCard", () => {
  test("is new and due today", () => {
    const card = createNewCard("Q", "A", TODAY);

    expect(card.interval_days).toBe(0);
    expect(card.ease_factor).toBe(2.5);
    expect(card.reviews).toBe(0);
    expect(card.next_review_date).toBe(TODAY);
  });
});
