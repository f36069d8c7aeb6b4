/**
 * Events emitted by a {@link KlondikeSession}.
 *
 * Front ends subscribe to refresh the board or show status; tests use
 * them to observe the turn loop.
 */

import type { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { ScreenPhase } from '../../src/core-engine/ScreenFlow';
import type { GameMode, MoveError, TurnOutcome } from './KlondikeState';
import type { Selection } from './Selection';

/** A new deal (fresh shuffle or restart) is on the table. */
export interface GameStartedPayload {
  readonly mode: GameMode;
  /** Whether this deal repeats the previous deck ordering. */
  readonly restarted: boolean;
}

/** Cards moved from the stock to the waste. */
export interface CardsDrawnPayload {
  readonly count: number;
  /** True when the pipeline drew because the waste ran out. */
  readonly automatic: boolean;
}

/** The waste was turned over to become the stock. */
export interface DeckRecycledPayload {
  readonly count: number;
}

export interface MoveAppliedPayload {
  readonly from: Selection;
  readonly to: Selection;
  readonly cardCount: number;
  /** True for the debug move that bypasses validation. */
  readonly forced: boolean;
}

export interface MoveRejectedPayload {
  readonly from: Selection;
  readonly to: Selection;
  readonly error: MoveError;
  readonly reason: string;
}

export interface SelectionPickedPayload {
  readonly selection: Selection;
}

export interface SelectionClearedPayload {
  readonly selection: Selection;
}

export interface TurnCompletedPayload {
  /** Monotonically increasing turn counter (starts at 1 after the deal). */
  readonly turnNumber: number;
  readonly outcome: TurnOutcome;
}

export interface PhaseChangedPayload {
  readonly from: ScreenPhase;
  readonly to: ScreenPhase;
}

export interface GameWonPayload {
  readonly turnNumber: number;
}

export interface KlondikeEventMap {
  'game-started': GameStartedPayload;
  'cards-drawn': CardsDrawnPayload;
  'deck-recycled': DeckRecycledPayload;
  'move-applied': MoveAppliedPayload;
  'move-rejected': MoveRejectedPayload;
  'selection-picked': SelectionPickedPayload;
  'selection-cleared': SelectionClearedPayload;
  'turn-completed': TurnCompletedPayload;
  'phase-changed': PhaseChangedPayload;
  'game-won': GameWonPayload;
}

export type KlondikeEventName = keyof KlondikeEventMap;

export type KlondikeEvents = GameEventEmitter<KlondikeEventMap>;
