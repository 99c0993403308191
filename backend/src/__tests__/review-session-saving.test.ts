/**
 * Review Session Saving Tests
 *
 * Ratings that land while a deck write is in flight. The rename that
 * completes the write is intercepted so a card can be rated between the
 * snapshot of the deck and the end of the write.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { mkdtemp, readFile, rename, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Quality } from "@deckwise/shared";
import { ReviewSession } from "../review-session";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

const TODAY = "2026-03-10";

const HEADER = "front,back,next_review_date,interval_days,ease_factor,lapses,reviews";

const GEO_DECK = [
  HEADER,
  "Capital of France?,Paris,2026-03-10,3,2.5,0,3",
  "Capital of Spain?,Madrid,2026-03-20,10,2.5,0,4",
  "Capital of Italy?,Rome,,,,,",
].join("\n") + "\n";

describe("ReviewSession saving", () => {
  let testDir: string;
  let session: ReviewSession;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "review-session-saving-test-"));
    await writeFile(join(testDir, "geo.csv"), GEO_DECK);
    session = new ReviewSession({ decksDir: testDir, clock: () => TODAY, random: () => 0 });
    await session.load(["geo.csv"]);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  test("a card rated during a write stays pending", async () => {
    const actual = await vi.importActual<typeof import("node:fs/promises")>("node:fs/promises");

    // Queue is Italy then France
    session.revealAnswer();
    session.rate(Quality.Good);

    vi.mocked(rename).mockImplementationOnce(async (from, to) => {
      session.revealAnswer();
      session.rate(Quality.Good);
      await actual.rename(from, to);
    });

    expect(await session.save()).toEqual({ saved: ["geo.csv"], failed: [] });
    expect(await readFile(join(testDir, "geo.csv"), "utf-8")).toBe(
      [
        HEADER,
        "Capital of France?,Paris,2026-03-10,3,2.5,0,3",
        "Capital of Spain?,Madrid,2026-03-20,10,2.5,0,4",
        "Capital of Italy?,Rome,2026-03-11,1,2.5,0,1",
      ].join("\n") + "\n"
    );
    expect(session.pendingChanges).toBe(1);

    expect(await session.save()).toEqual({ saved: ["geo.csv"], failed: [] });
    // ceil(3 * 2.5) = 8
    expect(await readFile(join(testDir, "geo.csv"), "utf-8")).toBe(
      [
        HEADER,
        "Capital of France?,Paris,2026-03-18,8,2.5,0,4",
        "Capital of Spain?,Madrid,2026-03-20,10,2.5,0,4",
        "Capital of Italy?,Rome,2026-03-11,1,2.5,0,1",
      ].join("\n") + "\n"
    );
    expect(session.pendingChanges).toBe(0);
  });
});
