/**
 * Core Engine Module
 *
 * Game-agnostic plumbing: the typed event emitter and the screen
 * flow phase machine.
 */
export const ENGINE_VERSION = '0.1.0';

// Screen flow
export type { ScreenPhase, ScreenFlow } from './ScreenFlow';
export {
  createScreenFlow,
  canTransition,
  transitionTo,
  isPlaying,
  isFinished,
} from './ScreenFlow';

// Game event system
export type { EventMap, GameEventListener } from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';
