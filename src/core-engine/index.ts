/**
 * Core Engine Module
 *
 * Framework pieces shared by games: currently the typed game event
 * emitter.
 */
export const ENGINE_VERSION = '0.1.0';

// Game event system
export type {
  CardMovedPayload,
  MoveRejectedPayload,
  GameWonPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';
