/**
 * Nine-column patience state types.
 *
 * Board geometry, label space, the Movement command and the victory
 * state. Rules live in PatienceRules / Locations, the board aggregate
 * in PatienceBoard.
 */

import type { Suit } from '../../src/card-system/Card';

// ── Constants ───────────────────────────────────────────────

/** Number of foundation piles (one per suit). */
export const FOUNDATION_COUNT = 4;

/** Number of tableau columns. */
export const COLUMN_COUNT = 9;

/** Number of single-card hand cells. */
export const HAND_SIZE = 7;

/** Cards consumed by the triangular column deal (1 + 2 + ... + 9). */
export const COLUMN_DEAL_SIZE = (COLUMN_COUNT * (COLUMN_COUNT + 1)) / 2;

/** Foundation suit order, matching labels a, b, c, d. */
export const FOUNDATION_SUITS: readonly Suit[] = [
  'spades',
  'hearts',
  'diamonds',
  'clubs',
] as const;

// ── Labels ──────────────────────────────────────────────────

/** All location labels, in board order. */
export const LABELS = [
  'a', 'b', 'c', 'd',
  'e', 'f', 'g', 'h', 'i', 'j', 'k', 'l', 'm',
  'n', 'o', 'p', 'q', 'r', 's', 't',
] as const;

/** One of the 20 single-character location labels. */
export type Label = (typeof LABELS)[number];

/** The three location groups of the board. */
export type LocationKind = 'foundation' | 'column' | 'hand';

/**
 * Where a label points: a group and an index within it
 * (0-3 for foundations, 0-8 for columns, 0-6 for hand cells).
 */
export interface LocationAddress {
  readonly kind: LocationKind;
  readonly index: number;
}

// ── Move types ──────────────────────────────────────────────

/**
 * A proposed transfer of the origin's active card to the destination.
 * The card itself is read from the origin when the move is checked or
 * executed.
 */
export interface Movement {
  readonly origin: Label;
  readonly destination: Label;
}

// ── Game state ──────────────────────────────────────────────

export type VictoryState = 'ongoing' | 'won';
