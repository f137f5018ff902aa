/**
 * Card types and helpers for the patience engine.
 *
 * Defines Rank, Suit, Color and Card as the data model consumed by
 * the board, the locations and the renderer.
 */

/** Card ranks, Ace low (1) through King (13). */
export type Rank = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13;

/** All ranks in order (Ace low). */
export const RANKS: readonly Rank[] = [
  1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13,
] as const;

/** Highest rank a foundation can reach. */
export const MAX_RANK: Rank = 13;

/** Standard playing card suits. */
export type Suit = 'spades' | 'hearts' | 'diamonds' | 'clubs';

/** All suits, in foundation order. */
export const SUITS: readonly Suit[] = [
  'spades',
  'hearts',
  'diamonds',
  'clubs',
] as const;

export type Color = 'black' | 'red';

/**
 * A playing card. Immutable: two cards with the same suit and rank
 * are interchangeable.
 */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export function createCard(rank: Rank, suit: Suit): Card {
  return { rank, suit };
}

/** Spades and clubs are black; hearts and diamonds are red. */
export function suitColor(suit: Suit): Color {
  switch (suit) {
    case 'spades':
    case 'clubs':
      return 'black';
    case 'hearts':
    case 'diamonds':
      return 'red';
  }
}

export function cardColor(card: Card): Color {
  return suitColor(card.suit);
}

/**
 * The rank one above `rank`, or undefined for a King.
 */
export function nextRank(rank: Rank): Rank | undefined {
  return rank < MAX_RANK ? RANKS[rank] : undefined;
}

/**
 * The rank one below `rank`, or undefined for an Ace.
 */
export function previousRank(rank: Rank): Rank | undefined {
  return rank > 1 ? RANKS[rank - 2] : undefined;
}

// ── Text form ───────────────────────────────────────────────

const SUIT_SYMBOLS: Record<Suit, string> = {
  spades: '♠',
  hearts: '♡',
  diamonds: '♢',
  clubs: '♣',
};

const FACE_LABELS: Partial<Record<Rank, string>> = {
  1: 'A',
  11: 'J',
  12: 'Q',
  13: 'K',
};

export function suitSymbol(suit: Suit): string {
  return SUIT_SYMBOLS[suit];
}

/** Short rank label: A, 2..10, J, Q, K. */
export function rankLabel(rank: Rank): string {
  return FACE_LABELS[rank] ?? String(rank);
}

/**
 * Three-character cell for a card, e.g. " A♠", "10♢", " K♣".
 */
export function formatCard(card: Card): string {
  return rankLabel(card.rank).padStart(2, ' ') + suitSymbol(card.suit);
}

/** Value key of a card, e.g. "12-hearts"; the deal uses it to reject duplicates. */
export function cardKey(card: Card): string {
  return `${card.rank}-${card.suit}`;
}
