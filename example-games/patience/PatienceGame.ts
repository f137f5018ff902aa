/**
 * Patience game orchestration: ties the board, the move counter and
 * the event emitter into a playable session.
 *
 * Provides:
 *   - Game setup (shuffle + deal, optionally seeded)
 *   - Check-then-execute moves with event publication
 *   - Hints and stuck detection over permittedMoves()
 */

import type { Card } from '../../src/card-system/Card';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { Board } from './PatienceBoard';
import type { Movement, VictoryState } from './PatienceState';
import { dealDeck } from './PatienceRules';

// ── Move results ────────────────────────────────────────────

export interface MoveApplied {
  readonly kind: 'applied';
  readonly card: Card;
  readonly victory: VictoryState;
}

export interface MoveRejected {
  readonly kind: 'rejected';
}

export type MoveOutcome = MoveApplied | MoveRejected;

// ── Setup ───────────────────────────────────────────────────

export interface PatienceSetupOptions {
  /** Seed for a reproducible shuffle (default: Math.random). */
  seed?: number;
  /** A pre-arranged deck, dealt by position. Takes precedence over `seed`. */
  deck?: readonly Card[];
  /** Emitter to publish to (default: a new one). */
  events?: GameEventEmitter;
}

// ── Session ─────────────────────────────────────────────────

export class PatienceGame {
  readonly board: Board;
  readonly events: GameEventEmitter;

  private moves = 0;

  constructor(options: PatienceSetupOptions = {}) {
    const { seed, deck = dealDeck(seed), events = new GameEventEmitter() } =
      options;
    this.board = new Board(deck);
    this.events = events;
  }

  /** Number of moves applied so far. */
  get moveCount(): number {
    return this.moves;
  }

  /**
   * Apply a movement if the board permits it.
   *
   * Emits `card-moved` (and `game-won` on the winning move) for an
   * applied move, `move-rejected` otherwise.
   */
  tryMove(movement: Movement): MoveOutcome {
    const { origin, destination } = movement;
    if (!this.board.permits(movement)) {
      this.events.emit('move-rejected', { origin, destination });
      return { kind: 'rejected' };
    }

    const card = this.board.execute(movement);
    this.moves++;
    this.events.emit('card-moved', {
      origin,
      destination,
      card,
      moveCount: this.moves,
    });

    const victory = this.board.victoryState();
    if (victory === 'won') {
      this.events.emit('game-won', { moveCount: this.moves });
    }
    return { kind: 'applied', card, victory };
  }

  /** The first permitted movement in label order, if any. */
  hint(): Movement | undefined {
    return this.board.permittedMoves()[0];
  }

  /** Whether no permitted movement remains on an unfinished board. */
  isStuck(): boolean {
    return (
      this.board.victoryState() === 'ongoing' &&
      this.board.permittedMoves().length === 0
    );
  }
}
