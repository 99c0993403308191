/**
 * Card Schema Tests
 *
 * Tests for card factories and date helpers.
 */

import { describe, expect, test } from "vitest";
import {
  addDays,
  createNewCard,
  formatDate,
  getToday,
  parseDate,
  pickSchedule,
  roundTo,
} from "../card-schema";
import { resolvePolicy } from "../scheduler-policy";

describe("card-schema", () => {
  describe("createNewCard", () => {
    test("uses the policy's default ease", () => {
      const card = createNewCard("Q", "A", "2026-03-10", resolvePolicy({ defaultEase: 2.0 }));

      expect(card.ease_factor).toBe(2.0);
      expect(card.extras.size).toBe(0);
    });
  });

  describe("pickSchedule", () => {
    test("copies only the scheduling fields", () => {
      const card = createNewCard("Q", "A", "2026-03-10");
      expect(pickSchedule(card)).toEqual({
        interval_days: 0,
        ease_factor: 2.5,
        next_review_date: "2026-03-10",
        reviews: 0,
        lapses: 0,
      });
    });
  });

  describe("roundTo", () => {
    test("rounds to the given places", () => {
      expect(roundTo(2.34567, 3)).toBe(2.346);
      expect(roundTo(7.125, 2)).toBe(7.13);
      expect(roundTo(3, 2)).toBe(3);
    });
  });

  describe("formatDate", () => {
    test("pads month and day", () => {
      expect(formatDate(new Date(2026, 0, 5))).toBe("2026-01-05");
    });
  });

  describe("parseDate", () => {
    test("parses valid dates", () => {
      const date = parseDate("2026-03-10");
      expect(date?.getFullYear()).toBe(2026);
      expect(date?.getMonth()).toBe(2);
      expect(date?.getDate()).toBe(10);
    });

    test("rejects malformed and impossible dates", () => {
      expect(parseDate("2026-3-10")).toBeNull();
      expect(parseDate("10/03/2026")).toBeNull();
      expect(parseDate("2026-02-30")).toBeNull();
      expect(parseDate("")).toBeNull();
    });
  });

  describe("leap days", () => {
    test("are valid only in leap years", () => {
      expect(parseDate("2028-02-29")).not.toBeNull();
      expect(parseDate("2026-02-29")).toBeNull();
    });
  });

  describe("getToday", () => {
    test("returns a calendar date", () => {
      expect(parseDate(getToday())).not.toBeNull();
    });
  });

  describe("addDays", () => {
    test("crosses month and year ends", () => {
      expect(addDays("2026-03-10", 1)).toBe("2026-03-11");
      expect(addDays("2026-02-28", 1)).toBe("2026-03-01");
      expect(addDays("2026-12-31", 1)).toBe("2027-01-01");
      expect(addDays("2026-03-10", 0)).toBe("2026-03-10");
    });

    test("throws on invalid input", () => {
      expect(() => addDays("not-a-date", 1)).toThrow("Invalid date: not-a-date");
    });
  });
});
