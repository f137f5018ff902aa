/**
 * Typed Event Emitter for the patience engine.
 *
 * Provides a type-safe, zero-dependency event emitter for move
 * lifecycle events. Works headless in Node.js; the terminal driver
 * and the tests subscribe to it to observe a game without reaching
 * into the board.
 */

import type { Card } from '../card-system/Card';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted after a card has been transferred between two locations.
 */
export interface CardMovedPayload {
  /** Label of the location the card left. */
  readonly origin: string;
  /** Label of the location the card joined. */
  readonly destination: string;
  /** The card that moved. */
  readonly card: Card;
  /** Moves applied so far, including this one. */
  readonly moveCount: number;
}

/**
 * Emitted when a proposed move is not permitted. The board is
 * unchanged.
 */
export interface MoveRejectedPayload {
  readonly origin: string;
  readonly destination: string;
}

/**
 * Emitted once, when the last foundation is completed.
 */
export interface GameWonPayload {
  /** Total moves applied to reach the win. */
  readonly moveCount: number;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'card-moved': CardMovedPayload;
  'move-rejected': MoveRejectedPayload;
  'game-won': GameWonPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

type ListenerTable = {
  [K in GameEventName]: Array<GameEventListener<K>>;
};

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('card-moved', (payload) => {
 *   console.log(`${payload.origin} -> ${payload.destination}`);
 * });
 * ```
 */
export class GameEventEmitter {
  private listeners: ListenerTable = GameEventEmitter.emptyTable();

  private static emptyTable(): ListenerTable {
    return { 'card-moved': [], 'move-rejected': [], 'game-won': [] };
  }

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    if (list.length === 0) return;

    // Copy the array so listeners can safely unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: GameEventName): void {
    if (event) {
      this.listeners[event].length = 0;
    } else {
      this.listeners = GameEventEmitter.emptyTable();
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: GameEventName): number {
    return this.listeners[event].length;
  }
}
