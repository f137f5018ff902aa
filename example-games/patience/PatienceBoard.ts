/**
 * The nine-column patience board.
 *
 * Owns one Foundation per suit, nine Columns and seven hand cells, and
 * addresses them by label (see PatienceRules). All mutation goes
 * through execute(); permits() and permittedMoves() never change the
 * board.
 */

import type { Card } from '../../src/card-system/Card';
import { MAX_RANK } from '../../src/card-system/Card';
import type { BoardLocation } from './Locations';
import { Column, Foundation, SpotInHand } from './Locations';
import type { Label, Movement, VictoryState } from './PatienceState';
import { FOUNDATION_SUITS } from './PatienceState';
import {
  DESTINATION_LABELS,
  ORIGIN_LABELS,
  layoutDeal,
  resolveLabel,
} from './PatienceRules';

export class Board {
  private readonly foundations: readonly Foundation[];
  private readonly columns: readonly Column[];
  private readonly hand: readonly SpotInHand[];

  /**
   * Deal a shuffled deck onto a fresh board, reading cards by
   * position: columns 1..9 take 1..9 cards, then one card per hand
   * cell. The deck itself is not modified.
   *
   * @throws If the deck holds fewer than 52 cards.
   */
  constructor(deck: readonly Card[]) {
    const layout = layoutDeal(deck);

    this.foundations = FOUNDATION_SUITS.map((suit) => new Foundation(suit));
    this.columns = layout.columns.map((cards) => new Column(cards));
    this.hand = layout.hand.map((card) => new SpotInHand(card));
  }

  // ── Addressing ────────────────────────────────────────────

  /**
   * The location a label points to.
   *
   * @throws If the label is outside `a`-`t`.
   */
  locationAt(label: Label): BoardLocation {
    const { kind, index } = resolveLabel(label);
    switch (kind) {
      case 'foundation':
        return this.foundations[index];
      case 'column':
        return this.columns[index];
      case 'hand':
        return this.hand[index];
    }
  }

  /** Foundation `index` (0-3, spades, hearts, diamonds, clubs). */
  foundation(index: number): Foundation {
    return this.pick(this.foundations, index, 'foundation');
  }

  /** Column `index` (0-8, labels e-m). */
  column(index: number): Column {
    return this.pick(this.columns, index, 'column');
  }

  /** Hand cell `index` (0-6, labels n-t). */
  handCell(index: number): SpotInHand {
    return this.pick(this.hand, index, 'hand cell');
  }

  foundationCount(): number {
    return this.foundations.length;
  }

  columnCount(): number {
    return this.columns.length;
  }

  handSize(): number {
    return this.hand.length;
  }

  private pick<T>(group: readonly T[], index: number, name: string): T {
    if (!Number.isInteger(index) || index < 0 || index >= group.length) {
      throw new Error(`No ${name} at index ${index}`);
    }
    return group[index];
  }

  // ── Moves ─────────────────────────────────────────────────

  /**
   * Whether the origin's active card may move to the destination:
   * the origin holds a card, is allowed to give it, and the
   * destination accepts it.
   */
  permits(movement: Movement): boolean {
    const origin = this.locationAt(movement.origin);
    const card = origin.activeCard();
    if (!card) return false;
    return (
      origin.canGiveCard() &&
      this.locationAt(movement.destination).canReceive(card)
    );
  }

  /**
   * Move the origin's active card onto the destination.
   *
   * Legality is checked first; an illegal movement throws and leaves
   * the board untouched.
   *
   * @throws If permits(movement) is false.
   * @returns The card that was moved.
   */
  execute(movement: Movement): Card {
    if (!this.permits(movement)) {
      const card = this.locationAt(movement.origin).activeCard();
      throw new Error(
        `Illegal move: ${movement.origin} -> ${movement.destination} ` +
          `(${card ? `${card.rank} of ${card.suit}` : 'empty'})`,
      );
    }

    const card = this.locationAt(movement.origin).giveCard();
    this.locationAt(movement.destination).receive(card);
    return card;
  }

  /**
   * Every permitted movement, origin-major in label order.
   *
   * Origins are columns and hand cells, destinations foundations and
   * columns: 16 x 13 candidate pairs.
   */
  permittedMoves(): Movement[] {
    const moves: Movement[] = [];

    for (const origin of ORIGIN_LABELS) {
      for (const destination of DESTINATION_LABELS) {
        const movement: Movement = { origin, destination };
        if (this.permits(movement)) {
          moves.push(movement);
        }
      }
    }

    return moves;
  }

  // ── Win detection ─────────────────────────────────────────

  /** Won once every foundation has reached the King. */
  victoryState(): VictoryState {
    return this.foundations.every((f) => f.topRank() === MAX_RANK)
      ? 'won'
      : 'ongoing';
  }
}
