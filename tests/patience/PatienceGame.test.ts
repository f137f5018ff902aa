import { describe, it, expect, vi } from 'vitest';
import { PatienceGame } from '../../example-games/patience/PatienceGame';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { RANKS, cardKey, createCard } from '../../src/card-system/Card';
import {
  createSeededRng,
  createShuffledDeck,
  createStandardDeck,
} from '../../src/card-system/Deck';

/** A game on the unshuffled deal with three foundations complete and clubs at the queen. */
function nearlyWonGame(): PatienceGame {
  const game = new PatienceGame({ deck: createStandardDeck() });
  for (let fi = 0; fi < 4; fi++) {
    const foundation = game.board.foundation(fi);
    for (const rank of RANKS) {
      if (fi < 3 || rank < 13) {
        foundation.receive(createCard(rank, foundation.suit));
      }
    }
  }
  return game;
}

describe('PatienceGame setup', () => {
  it('should deal the given deck by position', () => {
    const deck = createStandardDeck();
    const game = new PatienceGame({ deck });
    expect(game.board.column(0).cards()).toEqual([deck[0]]);
    expect(game.moveCount).toBe(0);
  });

  it('should shuffle reproducibly from a seed', () => {
    const a = new PatienceGame({ seed: 42 });
    const b = new PatienceGame({ seed: 42 });
    const deck = createShuffledDeck(createSeededRng(42));
    expect(a.board.column(8).cards().map(cardKey)).toEqual(
      b.board.column(8).cards().map(cardKey),
    );
    expect(a.board.handCell(6).activeCard()).toEqual(deck[51]);
  });

  it('should deal all 52 distinct cards from a negative seed', () => {
    const game = new PatienceGame({ seed: -1000 });
    const keys: string[] = [];
    for (let col = 0; col < game.board.columnCount(); col++) {
      keys.push(...game.board.column(col).cards().map(cardKey));
    }
    for (let cell = 0; cell < game.board.handSize(); cell++) {
      const card = game.board.handCell(cell).activeCard();
      if (card) keys.push(cardKey(card));
    }
    expect(keys).toHaveLength(52);
    expect(new Set(keys).size).toBe(52);
  });

  it('should publish to a supplied emitter', () => {
    const events = new GameEventEmitter();
    const game = new PatienceGame({ deck: createStandardDeck(), events });
    expect(game.events).toBe(events);
  });
});

describe('tryMove', () => {
  it('should apply a permitted move and emit card-moved', () => {
    const game = new PatienceGame({ deck: createStandardDeck() });
    const listener = vi.fn();
    game.events.on('card-moved', listener);

    const outcome = game.tryMove({ origin: 'e', destination: 'a' });

    expect(outcome).toEqual({
      kind: 'applied',
      card: createCard(1, 'spades'),
      victory: 'ongoing',
    });
    expect(game.moveCount).toBe(1);
    expect(listener).toHaveBeenCalledOnce();
    expect(listener).toHaveBeenCalledWith({
      origin: 'e',
      destination: 'a',
      card: createCard(1, 'spades'),
      moveCount: 1,
    });
  });

  it('should reject a move the board does not permit', () => {
    const game = new PatienceGame({ deck: createStandardDeck() });
    const moved = vi.fn();
    const rejected = vi.fn();
    game.events.on('card-moved', moved);
    game.events.on('move-rejected', rejected);

    const outcome = game.tryMove({ origin: 'f', destination: 'a' });

    expect(outcome).toEqual({ kind: 'rejected' });
    expect(game.moveCount).toBe(0);
    expect(moved).not.toHaveBeenCalled();
    expect(rejected).toHaveBeenCalledWith({ origin: 'f', destination: 'a' });
    expect(game.board.column(1).size()).toBe(2);
  });

  it('should emit game-won on the winning move', () => {
    const game = nearlyWonGame();
    const won = vi.fn();
    game.events.on('game-won', won);

    const outcome = game.tryMove({ origin: 't', destination: 'd' });

    expect(outcome).toEqual({
      kind: 'applied',
      card: createCard(13, 'clubs'),
      victory: 'won',
    });
    expect(won).toHaveBeenCalledWith({ moveCount: 1 });
  });

  it('should emit card-moved before game-won', () => {
    const game = nearlyWonGame();
    const order: string[] = [];
    game.events.on('card-moved', () => order.push('card-moved'));
    game.events.on('game-won', () => order.push('game-won'));

    game.tryMove({ origin: 't', destination: 'd' });

    expect(order).toEqual(['card-moved', 'game-won']);
  });
});

describe('hint', () => {
  it('should suggest the first permitted move', () => {
    const game = new PatienceGame({ deck: createStandardDeck() });
    expect(game.hint()).toEqual({ origin: 'e', destination: 'a' });
  });

  it('should follow the board after a move', () => {
    const game = new PatienceGame({ deck: createStandardDeck() });
    game.tryMove({ origin: 'e', destination: 'a' });
    // e is empty now, so f's 3♠ is the first card that fits
    expect(game.hint()).toEqual({ origin: 'f', destination: 'e' });
  });
});

describe('isStuck', () => {
  it('should be false while moves remain', () => {
    expect(new PatienceGame({ deck: createStandardDeck() }).isStuck()).toBe(false);
  });

  it('should be true once no card can move on an unfinished board', () => {
    const game = new PatienceGame({ deck: createStandardDeck() });
    for (let col = 0; col < game.board.columnCount(); col++) {
      const column = game.board.column(col);
      while (column.canGiveCard()) column.giveCard();
    }
    for (let cell = 0; cell < game.board.handSize(); cell++) {
      game.board.handCell(cell).giveCard();
    }

    expect(game.hint()).toBeUndefined();
    expect(game.isStuck()).toBe(true);
  });

  it('should be false on a won board', () => {
    const game = nearlyWonGame();
    game.tryMove({ origin: 't', destination: 'd' });
    for (let col = 0; col < game.board.columnCount(); col++) {
      const column = game.board.column(col);
      while (column.canGiveCard()) column.giveCard();
    }
    for (let cell = 0; cell < game.board.handSize(); cell++) {
      const spot = game.board.handCell(cell);
      if (spot.canGiveCard()) spot.giveCard();
    }
    expect(game.isStuck()).toBe(false);
  });
});
