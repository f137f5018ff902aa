/**
 * Board locations for nine-column patience.
 *
 * Every location answers the same five questions (can it take this
 * card, take it, can it give its card, give it, which card is
 * exposed). There are exactly three kinds, each tagged with `kind` so
 * that `BoardLocation` can be narrowed exhaustively:
 *
 * - Foundation: builds up by suit from Ace to King; never gives.
 * - Column: builds down in alternating colors; any card on empty.
 * - SpotInHand: holds one card; gives it away, never accepts one.
 */

import type { Card, Rank, Suit } from '../../src/card-system/Card';
import {
  cardColor,
  createCard,
  nextRank,
  previousRank,
} from '../../src/card-system/Card';
import { Pile } from '../../src/card-system/Pile';

/**
 * Shared contract of every board location.
 *
 * `canGiveCard()` gates removal: callers check it before `giveCard()`.
 * `receive()` does not re-check `canReceive()`, so the deal can place
 * cards freely.
 */
export interface Location {
  canReceive(card: Card): boolean;
  receive(card: Card): void;
  canGiveCard(): boolean;
  /** @throws If the location holds no card. */
  giveCard(): Card;
  /** The card currently exposed for comparison or removal. */
  activeCard(): Card | undefined;
}

// ── Foundation ──────────────────────────────────────────────

export class Foundation implements Location {
  readonly kind = 'foundation';

  private top: Rank | undefined;

  constructor(readonly suit: Suit) {
    this.top = undefined;
  }

  /** Rank of the top card, or undefined while empty. */
  topRank(): Rank | undefined {
    return this.top;
  }

  /** Rank the next accepted card must have; undefined once the King is on. */
  nextRank(): Rank | undefined {
    return this.top === undefined ? 1 : nextRank(this.top);
  }

  canReceive(card: Card): boolean {
    return card.suit === this.suit && card.rank === this.nextRank();
  }

  receive(card: Card): void {
    this.top = card.rank;
  }

  canGiveCard(): boolean {
    return false;
  }

  /**
   * Take the top card back off the foundation.
   *
   * Not reachable through the board, since canGiveCard() is always
   * false; available to code holding the foundation directly.
   */
  giveCard(): Card {
    if (this.top === undefined) {
      throw new Error(`Cannot give a card from an empty ${this.suit} foundation`);
    }
    const card = createCard(this.top, this.suit);
    this.top = previousRank(this.top);
    return card;
  }

  activeCard(): Card | undefined {
    return this.top === undefined ? undefined : createCard(this.top, this.suit);
  }
}

// ── Column ──────────────────────────────────────────────────

export class Column implements Location {
  readonly kind = 'column';

  private readonly pile: Pile;

  constructor(cards: readonly Card[] = []) {
    this.pile = new Pile(cards);
  }

  canReceive(card: Card): boolean {
    const active = this.pile.peek();
    if (!active) return true; // Any card on an empty column
    return (
      cardColor(active) !== cardColor(card) && card.rank === active.rank - 1
    );
  }

  receive(card: Card): void {
    this.pile.push(card);
  }

  canGiveCard(): boolean {
    return !this.pile.isEmpty();
  }

  giveCard(): Card {
    if (this.pile.isEmpty()) {
      throw new Error('Cannot give a card from an empty column');
    }
    return this.pile.popOrThrow();
  }

  activeCard(): Card | undefined {
    return this.pile.peek();
  }

  /** The card at `row` (0 = bottom), or undefined past the top. */
  cardAt(row: number): Card | undefined {
    return this.pile.at(row);
  }

  size(): number {
    return this.pile.size();
  }

  /** All cards, bottom to top. */
  cards(): Card[] {
    return this.pile.toArray();
  }
}

// ── Hand cell ───────────────────────────────────────────────

export class SpotInHand implements Location {
  readonly kind = 'hand';

  private card: Card | undefined;

  constructor(card?: Card) {
    this.card = card;
  }

  canReceive(_card: Card): boolean {
    return false;
  }

  /** Store a card, replacing any held card. */
  receive(card: Card): void {
    this.card = card;
  }

  canGiveCard(): boolean {
    return this.card !== undefined;
  }

  giveCard(): Card {
    const card = this.card;
    if (card === undefined) {
      throw new Error('Cannot give a card from an empty hand cell');
    }
    this.card = undefined;
    return card;
  }

  activeCard(): Card | undefined {
    return this.card;
  }
}

/** Any of the three location kinds. */
export type BoardLocation = Foundation | Column | SpotInHand;
