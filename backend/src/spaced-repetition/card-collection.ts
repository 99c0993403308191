/**
 * Card Collection
 *
 * In-memory set of loaded cards across one or more decks, plus a change
 * revision for every card modified since it was last persisted.
 *
 * A save takes a snapshot of the revisions before writing and clears only
 * the cards whose revision hasn't moved since, so a change made while the
 * write is in flight stays pending.
 */

import type { DeckCard } from "./card-schema";

/** Card id to change revision, taken before a deck is written */
export type PendingSnapshot = ReadonlyMap<string, number>;

export class CardCollection {
  private readonly items: DeckCard[] = [];
  private readonly dirty = new Map<string, number>();

  constructor(cards: readonly DeckCard[] = []) {
    for (const card of cards) {
      this.add(card, false);
    }
  }

  /** All cards in load order */
  get cards(): readonly DeckCard[] {
    return this.items;
  }

  /** Cards with changes not yet persisted */
  get dirtyCount(): number {
    return this.dirty.size;
  }

  /**
   * Append a card. New cards default to dirty so they get written.
   */
  add(card: DeckCard, dirty = true): void {
    this.items.push(card);
    if (dirty) {
      this.markDirty(card);
    }
  }

  markDirty(card: DeckCard): void {
    this.dirty.set(card.id, (this.dirty.get(card.id) ?? 0) + 1);
  }

  /** Cards of one deck in load order */
  cardsInDeck(deck: string): DeckCard[] {
    return this.items.filter((card) => card.deck === deck);
  }

  /** Decks holding at least one dirty card, in load order */
  dirtyDecks(): string[] {
    const decks = new Set<string>();
    for (const card of this.items) {
      if (this.dirty.has(card.id)) {
        decks.add(card.deck);
      }
    }
    return [...decks];
  }

  /**
   * Revisions of the dirty cards of one deck, taken before writing it.
   */
  snapshotPending(deck: string): PendingSnapshot {
    const snapshot = new Map<string, number>();
    for (const card of this.items) {
      const revision = this.dirty.get(card.id);
      if (card.deck === deck && revision !== undefined) {
        snapshot.set(card.id, revision);
      }
    }
    return snapshot;
  }

  /**
   * Forget changes covered by a completed write.
   * Cards changed again after the snapshot stay dirty.
   */
  markSaved(snapshot: PendingSnapshot): void {
    for (const [id, revision] of snapshot) {
      if (this.dirty.get(id) === revision) {
        this.dirty.delete(id);
      }
    }
  }
}
