/**
 * Deck operations for the patience engine.
 *
 * A Deck is represented as a plain Card array. This module provides
 * the standard 52-card factory and a shuffle that works on Card
 * arrays, keeping the data model simple and composable.
 */

import type { Card } from './Card';
import { RANKS, SUITS, createCard } from './Card';

/** Number of cards in a standard deck. */
export const DECK_SIZE = 52;

/**
 * Create a standard 52-card deck (no jokers).
 *
 * Cards are ordered by suit (foundation order) then rank (A through K).
 */
export function createStandardDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Shuffle a deck in place using the Fisher-Yates algorithm.
 *
 * An optional random number generator can be supplied for
 * deterministic testing. The generator must return a value
 * in [0, 1) (same contract as Math.random).
 *
 * @returns The same array reference (mutated).
 */
export function shuffle(
  deck: Card[],
  rng: () => number = Math.random,
): Card[] {
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }
  return deck;
}

/**
 * Create a deterministic RNG from a numeric seed.
 * Uses a simple linear congruential generator (LCG) compatible
 * with the shuffle() function's () => number contract. The seed is
 * reduced to an unsigned 32-bit state, so negative seeds stay in [0, 1).
 */
export function createSeededRng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

/**
 * Convenience: a freshly shuffled standard deck.
 */
export function createShuffledDeck(rng: () => number = Math.random): Card[] {
  return shuffle(createStandardDeck(), rng);
}
