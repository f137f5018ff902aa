/**
 * Card System Module
 *
 * Cards, suits and colors, the standard deck with its shuffle, and
 * the Pile stack used by tableau columns.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and helpers
export type { Card } from './Card';
export type { Rank, Suit, Color } from './Card';
export {
  RANKS,
  SUITS,
  MAX_RANK,
  createCard,
  suitColor,
  cardColor,
  nextRank,
  previousRank,
  suitSymbol,
  rankLabel,
  formatCard,
  cardKey,
} from './Card';

// Deck factory and operations
export {
  DECK_SIZE,
  createStandardDeck,
  shuffle,
  createSeededRng,
  createShuffledDeck,
} from './Deck';

// Pile abstraction
export { Pile } from './Pile';
