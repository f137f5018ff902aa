/**
 * Nine-column patience rules: label addressing and the deal.
 *
 * Labels partition into three ranges:
 * - `a`-`d` foundations (spades, hearts, diamonds, clubs)
 * - `e`-`m` columns 1..9
 * - `n`-`t` hand cells 1..7
 *
 * Moves only ever leave a column or a hand cell and only ever land on
 * a foundation or a column, so origins are `e`-`t` and destinations
 * `a`-`m`.
 */

import type { Card } from '../../src/card-system/Card';
import { cardKey } from '../../src/card-system/Card';
import {
  DECK_SIZE,
  createSeededRng,
  createShuffledDeck,
} from '../../src/card-system/Deck';
import type { Label, LocationAddress, LocationKind } from './PatienceState';
import {
  LABELS,
  FOUNDATION_COUNT,
  COLUMN_COUNT,
  HAND_SIZE,
} from './PatienceState';

// ── Label ranges ────────────────────────────────────────────

const CHAR_CODE_A = 'a'.charCodeAt(0);

/** Offset of each group's first label within LABELS. */
const GROUP_OFFSET: Record<LocationKind, number> = {
  foundation: 0,
  column: FOUNDATION_COUNT,
  hand: FOUNDATION_COUNT + COLUMN_COUNT,
};

/** Labels a move may start from: every column and hand cell. */
export const ORIGIN_LABELS: readonly Label[] = LABELS.slice(
  GROUP_OFFSET.column,
);

/** Labels a move may end on: every foundation and column. */
export const DESTINATION_LABELS: readonly Label[] = LABELS.slice(
  0,
  GROUP_OFFSET.hand,
);

/**
 * Whether `value` is one of the 20 board labels.
 */
export function isLabel(value: string): value is Label {
  return value.length === 1 && value >= 'a' && value <= 't';
}

/** Whether `value` is a label a move may start from (`e`-`t`). */
export function isOriginLabel(value: string): value is Label {
  return isLabel(value) && value >= 'e';
}

/** Whether `value` is a label a move may end on (`a`-`m`). */
export function isDestinationLabel(value: string): value is Label {
  return isLabel(value) && value <= 'm';
}

/**
 * Map a label to its location group and index.
 *
 * @throws If `label` is not one of `a`-`t`. Raw input must be checked
 *         with isLabel() first.
 */
export function resolveLabel(label: string): LocationAddress {
  if (!isLabel(label)) {
    throw new Error(`Label outside range: ${JSON.stringify(label)}`);
  }
  const position = label.charCodeAt(0) - CHAR_CODE_A;
  if (position < GROUP_OFFSET.column) {
    return { kind: 'foundation', index: position };
  }
  if (position < GROUP_OFFSET.hand) {
    return { kind: 'column', index: position - GROUP_OFFSET.column };
  }
  return { kind: 'hand', index: position - GROUP_OFFSET.hand };
}

// ── Deal ────────────────────────────────────────────────────

/**
 * A dealt layout: card positions for each column and hand cell.
 */
export interface DealLayout {
  /** Cards for columns 1..9, bottom to top. */
  readonly columns: readonly (readonly Card[])[];
  /** One card per hand cell. */
  readonly hand: readonly Card[];
}

/**
 * Split a deck into the triangular deal, reading cards by position.
 *
 * Column i (1-based) takes the next i cards, consuming 45 cards in
 * total; the following 7 cards go to the hand cells, one each.
 *
 * @throws If the deck holds fewer than 52 cards, or the same card twice.
 */
export function layoutDeal(deck: readonly Card[]): DealLayout {
  if (deck.length < DECK_SIZE) {
    throw new Error(
      `A deal needs ${DECK_SIZE} cards, got ${deck.length}`,
    );
  }

  const seen = new Set<string>();
  for (const card of deck.slice(0, DECK_SIZE)) {
    const key = cardKey(card);
    if (seen.has(key)) {
      throw new Error(`Duplicate card in deal: ${key}`);
    }
    seen.add(key);
  }

  let cardIndex = 0;
  const columns: Card[][] = [];
  for (let col = 1; col <= COLUMN_COUNT; col++) {
    columns.push(deck.slice(cardIndex, cardIndex + col));
    cardIndex += col;
  }

  const hand = deck.slice(cardIndex, cardIndex + HAND_SIZE);

  return { columns, hand };
}

/**
 * Shuffle a standard deck for a new game. With a seed the shuffle is
 * reproducible.
 */
export function dealDeck(seed?: number): Card[] {
  return seed === undefined
    ? createShuffledDeck()
    : createShuffledDeck(createSeededRng(seed));
}
