/**
 * Klondike state types.
 *
 * Defines the game-specific state for Klondike solitaire, kept apart
 * from the rules (KlondikeRules) and from the Phaser UI.
 */

import type { Card, Suit } from '../../src/card-system/Card';
import { SUITS } from '../../src/card-system/Card';
import type { Pile } from '../../src/card-system/Pile';
import type { FoundationPile } from '../../src/card-system/FoundationPile';
import type { TableauColumn } from '../../src/card-system/TableauColumn';

// ── Constants ───────────────────────────────────────────────

/** Number of tableau columns. */
export const TABLEAU_COUNT = 7;

/** Number of foundation piles (one per suit). */
export const FOUNDATION_COUNT = 4;

/** Foundation suit order: foundation `i` is built in `FOUNDATION_SUITS[i]`. */
export const FOUNDATION_SUITS: readonly Suit[] = SUITS;

// ── Game mode ───────────────────────────────────────────────

/**
 * How many cards one draw moves from the stock to the waste, and how
 * many waste cards are shown at once.
 */
export type GameMode = 'draw-one' | 'draw-three';

export const GAME_MODES: readonly GameMode[] = ['draw-one', 'draw-three'] as const;

/** Cards moved per draw in the given mode. */
export function drawCount(mode: GameMode): number {
  return mode === 'draw-three' ? 3 : 1;
}

/** Waste cards shown face-up in the given mode. Only the top one is playable. */
export function visibleWasteCount(mode: GameMode): number {
  return mode === 'draw-three' ? 3 : 1;
}

// ── Game state ──────────────────────────────────────────────

/**
 * Complete Klondike game state. Every one of the 52 cards lives in
 * exactly one of the stock, the waste, a column or a foundation.
 */
export interface KlondikeState {
  /** Face-down draw source. Top of pile = next card drawn. */
  readonly stock: Pile;

  /** Face-up pile fed by draws. Only its top card is playable. */
  readonly waste: Pile;

  /** Seven tableau columns, left to right. */
  readonly tableau: readonly TableauColumn[];

  /** Four foundations, suits in `FOUNDATION_SUITS` order. */
  readonly foundations: readonly FoundationPile[];

  readonly mode: GameMode;

  /**
   * The deck ordering this game was dealt from. Restarting redeals
   * from it for an exact replay.
   */
  readonly initialDeck: readonly Card[];
}

// ── Results ─────────────────────────────────────────────────

/**
 * Why a move did not happen.
 *
 * - `invalid-move`               -- the rules reject this source/destination pair.
 * - `collection-transfer-failed` -- the source lacks the cards or the
 *                                   destination cannot receive that many.
 */
export type MoveError = 'invalid-move' | 'collection-transfer-failed';

export type MoveResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: MoveError; readonly reason: string };

/**
 * Result of a draw action.
 *
 * - `drew`     -- `count` cards moved from the stock to the waste.
 * - `recycled` -- the stock was empty; `count` waste cards became the stock.
 * - `empty`    -- stock and waste are both empty; nothing happened.
 */
export type DrawOutcome =
  | { readonly kind: 'drew'; readonly count: number }
  | { readonly kind: 'recycled'; readonly count: number }
  | { readonly kind: 'empty' };

/** Result of the per-turn pipeline. */
export type TurnOutcome = 'continue' | 'victory';
