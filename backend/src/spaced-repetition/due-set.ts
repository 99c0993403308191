/**
 * Due-Set Selector
 *
 * Derives the review queue from a card collection and keeps it in order
 * across a session. The selector only reorders references; card state is
 * written by the scheduler alone.
 */

import { Quality } from "@deckwise/shared";
import type { CalendarDate, CardRecord } from "./card-schema";

// =============================================================================
// Types
// =============================================================================

/** Source of uniform numbers in [0, 1) */
export type RandomSource = () => number;

export interface ReviewQueueOptions {
  /** Shuffle once at construction (default true) */
  shuffle?: boolean;
  /** Random source for the shuffle (default Math.random) */
  random?: RandomSource;
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Check if a card is due on or before today. A missing date means due now.
 */
export function isDue(card: Pick<CardRecord, "next_review_date">, today: CalendarDate): boolean {
  return card.next_review_date === null || card.next_review_date <= today;
}

/**
 * Filter a collection to the cards due today, in collection order.
 * Returns the same card references.
 */
export function selectDue<T extends CardRecord>(collection: readonly T[], today: CalendarDate): T[] {
  return collection.filter((card) => isDue(card, today));
}

// =============================================================================
// Shuffling
// =============================================================================

/**
 * Hash a string to a 32-bit integer using djb2 variant.
 */
function hashString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash;
  }
  return hash;
}

/**
 * Reproducible random source (mulberry32) for pinning session order in tests.
 *
 * @param seed - Number or string seed
 */
export function createSeededRandom(seed: number | string): RandomSource {
  let state = (typeof seed === "string" ? hashString(seed) : seed) >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffleCards<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

// =============================================================================
// Review Queue
// =============================================================================

/**
 * Ordered queue of due cards for one session.
 *
 * A card rated "Again" moves to the end of the remaining queue, so it is
 * seen again only after every other card still waiting.
 */
export class ReviewQueue<T> {
  private readonly cards: T[];
  private index = 0;

  constructor(cards: readonly T[], options: ReviewQueueOptions = {}) {
    const { shuffle = true, random = Math.random } = options;
    this.cards = shuffle ? shuffleCards(cards, random) : [...cards];
  }

  /** Card under review, or undefined once the queue is exhausted */
  current(): T | undefined {
    return this.cards[this.index];
  }

  /** Cards left including the current one */
  get remaining(): number {
    return Math.max(0, this.cards.length - this.index);
  }

  get isExhausted(): boolean {
    return this.index >= this.cards.length;
  }

  /** Move past the current card */
  next(): T | undefined {
    if (!this.isExhausted) {
      this.index++;
    }
    return this.current();
  }

  /** Remove the current card and append it to the end */
  requeueCurrent(): T | undefined {
    if (this.isExhausted) {
      return undefined;
    }
    const [card] = this.cards.splice(this.index, 1);
    this.cards.push(card);
    return this.current();
  }

  /**
   * Update the queue after a rating.
   * @returns true if the card was requeued
   */
  record(quality: number): boolean {
    if (quality === Quality.Again) {
      this.requeueCurrent();
      return true;
    }
    this.next();
    return false;
  }
}
