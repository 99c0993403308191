/**
 * Review Session
 *
 * Drives one review session over the loaded decks: builds the shuffled
 * due queue, shows and rates one card at a time, adds cards and persists
 * every dirty card grouped by deck file.
 *
 * Single reviewer, single active card. A failed save leaves the cards
 * dirty and never rolls back a rating already applied in memory.
 */

import { randomUUID } from "node:crypto";
import type { SaveSummary, SessionSummary } from "@deckwise/shared";
import { AppError, DeckError, SessionError } from "./errors";
import { sessionLog as log } from "./logger";
import { CardCollection } from "./spaced-repetition/card-collection";
import {
  type CalendarDate,
  type DeckCard,
  createNewCard,
  getToday,
} from "./spaced-repetition/card-schema";
import { getDeckPath, discoverDecks, loadDeck, saveDeck } from "./spaced-repetition/deck-storage";
import { type RandomSource, ReviewQueue, selectDue } from "./spaced-repetition/due-set";
import { type UnchangedReason, advance, applyAdvance } from "./spaced-repetition/scheduler";
import { DEFAULT_POLICY, type SchedulerPolicy } from "./spaced-repetition/scheduler-policy";
import {
  DEFAULT_FORECAST_DAYS,
  type StatisticsSnapshot,
  computeStatistics,
} from "./spaced-repetition/statistics";

// =============================================================================
// Types
// =============================================================================

export interface ReviewSessionOptions {
  /** Absolute path to the directory holding deck files */
  decksDir: string;
  policy?: SchedulerPolicy;
  /** Default statistics horizon */
  forecastDays?: number;
  /** Random source for the queue shuffle */
  random?: RandomSource;
  /** Source of today's date (YYYY-MM-DD) */
  clock?: () => CalendarDate;
}

export interface RateResult {
  card: DeckCard;
  changed: boolean;
  reason?: UnchangedReason;
  requeued: boolean;
  remaining: number;
}

// =============================================================================
// Review Session
// =============================================================================

export class ReviewSession {
  readonly decksDir: string;
  readonly policy: SchedulerPolicy;
  readonly forecastDays: number;
  private readonly random: RandomSource;
  private readonly clock: () => CalendarDate;

  private collection = new CardCollection();
  private queue: ReviewQueue<DeckCard> | null = null;
  private loadedDecks: string[] = [];
  private answerShown = false;

  constructor(options: ReviewSessionOptions) {
    this.decksDir = options.decksDir;
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.forecastDays = options.forecastDays ?? DEFAULT_FORECAST_DAYS;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? getToday;
  }

  /** Deck file names available in the decks directory */
  listDecks(): Promise<string[]> {
    return discoverDecks(this.decksDir);
  }

  /** Decks loaded into the current session */
  get decks(): readonly string[] {
    return this.loadedDecks;
  }

  get isActive(): boolean {
    return this.loadedDecks.length > 0;
  }

  /** All loaded cards */
  get cards(): readonly DeckCard[] {
    return this.collection.cards;
  }

  /** Cards left in the queue including the current one */
  get remaining(): number {
    return this.queue?.remaining ?? 0;
  }

  /** Cards changed since they were last saved */
  get pendingChanges(): number {
    return this.collection.dirtyCount;
  }

  /**
   * Load decks and start a new session.
   * Pending changes of the previous session are saved first.
   *
   * @throws DeckError if a deck is missing or invalid
   * @throws AppError with SAVE_FAILED if pending changes couldn't be written
   */
  async load(deckNames: readonly string[]): Promise<SessionSummary> {
    await this.flushBeforeSwitch();

    const today = this.clock();
    const names = [...new Set(deckNames)];
    const warnings: string[] = [];
    const cards: DeckCard[] = [];

    for (const name of names) {
      const deck = await loadDeck(getDeckPath(this.decksDir, name), name, today, this.policy);
      cards.push(...deck.cards);
      warnings.push(...deck.warnings);
    }

    this.collection = new CardCollection(cards);
    this.loadedDecks = names;
    this.queue = new ReviewQueue(selectDue(this.collection.cards, today), {
      random: this.random,
    });
    this.answerShown = false;

    log.info(
      `Loaded ${cards.length} card(s) from ${names.length} deck(s), ${this.queue.remaining} due`
    );

    return {
      decks: names,
      totalCards: cards.length,
      dueCards: this.queue.remaining,
      warnings,
    };
  }

  /** Card under review, or null when the queue is empty */
  current(): DeckCard | null {
    return this.queue?.current() ?? null;
  }

  /**
   * Reveal the answer of the current card. Rating is allowed afterwards.
   * @throws SessionError if there is no card under review
   */
  revealAnswer(): DeckCard {
    const card = this.requireCurrent();
    this.answerShown = true;
    return card;
  }

  /**
   * Rate the current card and move the queue on.
   *
   * "Again" sends the card to the end of the queue. An invalid quality
   * leaves both the card and the queue untouched.
   *
   * @throws SessionError if there is no card or its answer isn't shown
   */
  rate(quality: number): RateResult {
    const card = this.requireCurrent();
    if (!this.answerShown) {
      throw new SessionError("Reveal the answer before rating the card", "ANSWER_NOT_SHOWN");
    }

    const result = advance(card, quality, this.clock(), this.policy);
    if (result.status === "unchanged" && result.reason === "invalid_quality") {
      return { card, changed: false, reason: result.reason, requeued: false, remaining: this.remaining };
    }

    const changed = applyAdvance(card, result);
    if (changed) {
      this.collection.markDirty(card);
    }

    const requeued = this.requireQueue().record(quality);
    this.answerShown = false;

    if (requeued) {
      log.info(`Card ${card.id} marked 'Again'. Will see again soon.`);
    }

    return {
      card,
      changed,
      reason: result.status === "unchanged" ? result.reason : undefined,
      requeued,
      remaining: this.remaining,
    };
  }

  /**
   * Add a new card to a loaded deck and save it immediately.
   * Defaults to the first loaded deck. The card joins the queue on the next load.
   * If the write fails the card stays in memory, pending the next save.
   *
   * @throws SessionError if no session is active or a field is empty
   * @throws DeckError if the deck isn't loaded
   * @throws AppError with SAVE_FAILED if the deck couldn't be written
   */
  async addCard(front: string, back: string, deck?: string): Promise<DeckCard> {
    if (!this.isActive) {
      throw new SessionError("Load at least one deck before adding a card", "NO_ACTIVE_SESSION");
    }

    const trimmedFront = front.trim();
    const trimmedBack = back.trim();
    if (!trimmedFront || !trimmedBack) {
      throw new SessionError("Both front and back are required", "VALIDATION_ERROR");
    }

    const target = deck ?? this.loadedDecks[0];
    if (!this.loadedDecks.includes(target)) {
      throw new DeckError(`Deck is not loaded: ${target}`, "DECK_NOT_FOUND");
    }

    const card: DeckCard = {
      ...createNewCard(trimmedFront, trimmedBack, this.clock(), this.policy),
      id: randomUUID(),
      deck: target,
    };
    this.collection.add(card);
    log.info(`Added new card to '${target}'`);

    const summary = await this.save();
    const failure = summary.failed.find((entry) => entry.deck === target);
    if (failure) {
      throw new AppError(`Card added but not saved to ${target}: ${failure.message}`, "SAVE_FAILED");
    }
    return card;
  }

  /**
   * Write every deck that holds a dirty card.
   * Failures are logged and reported; their cards stay dirty.
   * Cards changed while their deck is being written stay dirty too.
   */
  async save(): Promise<SaveSummary> {
    const summary: SaveSummary = { saved: [], failed: [] };

    for (const deck of this.collection.dirtyDecks()) {
      const cards = this.collection.cardsInDeck(deck);
      const pending = this.collection.snapshotPending(deck);
      try {
        await saveDeck(getDeckPath(this.decksDir, deck), cards);
        this.collection.markSaved(pending);
        summary.saved.push(deck);
        log.info(`Saved ${cards.length} card(s) to ${deck}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error(`Failed to save ${deck}: ${message}`);
        summary.failed.push({ deck, message });
      }
    }

    return summary;
  }

  /** Number of loaded cards due today or earlier */
  dueCount(): number {
    return selectDue(this.collection.cards, this.clock()).length;
  }

  /** Statistics over every loaded card */
  statistics(forecastDays: number = this.forecastDays): StatisticsSnapshot {
    return computeStatistics(this.collection.cards, this.clock(), forecastDays);
  }

  /**
   * Save pending changes and close the session.
   * @throws AppError with SAVE_FAILED if pending changes couldn't be written
   */
  async reset(): Promise<void> {
    await this.flushBeforeSwitch();
    this.collection = new CardCollection();
    this.queue = null;
    this.loadedDecks = [];
    this.answerShown = false;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async flushBeforeSwitch(): Promise<void> {
    const summary = await this.save();
    if (summary.failed.length > 0) {
      const decks = summary.failed.map((failure) => failure.deck).join(", ");
      throw new AppError(`Could not save pending changes to: ${decks}`, "SAVE_FAILED");
    }
  }

  private requireQueue(): ReviewQueue<DeckCard> {
    if (!this.queue) {
      throw new SessionError("No decks loaded", "NO_ACTIVE_SESSION");
    }
    return this.queue;
  }

  private requireCurrent(): DeckCard {
    const card = this.requireQueue().current();
    if (!card) {
      throw new SessionError("No card is under review", "NO_ACTIVE_CARD");
    }
    return card;
  }
}
