/**
 * Automatic play for Klondike.
 *
 * Provides:
 *   - AutoPlayStrategy interface: chooseStep(state)
 *   - GreedyStrategy: foundation moves first, then moves that turn over
 *     a face-down card, then waste-to-column, then draw
 *   - playGame: runs a strategy until victory, a stall or a step limit
 *
 * Used by the autoplay script to estimate how often a deal is won.
 */

import { STANDARD_DECK_SIZE } from '../../src/card-system/Deck';
import type { KlondikeState } from './KlondikeState';
import type { KlondikeMove } from './KlondikeRules';
import { attemptMove, drawFromDeck, findLegalMoves, isVictory } from './KlondikeRules';
import { runTurnPipeline } from './TurnPipeline';

// ── Steps ───────────────────────────────────────────────────

export type AutoPlayStep =
  | { readonly kind: 'move'; readonly move: KlondikeMove }
  | { readonly kind: 'draw' }
  | { readonly kind: 'stuck' };

// ── Strategy interface ──────────────────────────────────────

export interface AutoPlayStrategy {
  /** Human-readable strategy name. */
  readonly name: string;

  /** Choose the next step for the current board. Must not mutate it. */
  chooseStep(state: KlondikeState): AutoPlayStep;
}

// ── GreedyStrategy ──────────────────────────────────────────

/** Whether a column move takes its whole face-up run off a face-down card. */
function revealsCard(move: KlondikeMove, state: KlondikeState): boolean {
  const { from } = move;
  if (from.kind !== 'column') return false;
  const column = state.tableau[from.index];
  return from.cardCount === column.faceUpCount() && column.size() > from.cardCount;
}

/**
 * Takes the first legal move in priority order:
 *   1. waste or column card to a foundation
 *   2. column run onto another column, uncovering a face-down card
 *   3. waste card to a column
 *   4. draw, while the stock or waste holds cards
 *
 * Column-to-column moves that uncover nothing are never made, so the
 * strategy cannot shuffle a run back and forth.
 */
export const GreedyStrategy: AutoPlayStrategy = {
  name: 'greedy',

  chooseStep(state: KlondikeState): AutoPlayStep {
    const moves = findLegalMoves(state);

    const toFoundation = moves.find(
      (m) => m.to.kind === 'pile' && m.from.kind !== 'pile',
    );
    if (toFoundation) return { kind: 'move', move: toFoundation };

    const uncovering = moves.find(
      (m) => m.to.kind === 'column' && revealsCard(m, state),
    );
    if (uncovering) return { kind: 'move', move: uncovering };

    const fromWaste = moves.find(
      (m) => m.from.kind === 'deck' && m.to.kind === 'column',
    );
    if (fromWaste) return { kind: 'move', move: fromWaste };

    if (!state.stock.isEmpty() || !state.waste.isEmpty()) {
      return { kind: 'draw' };
    }
    return { kind: 'stuck' };
  },
};

// ── Play loop ───────────────────────────────────────────────

export interface PlayOptions {
  /** Give up after this many steps. Default: 1000. */
  maxSteps?: number;
  /**
   * Consecutive draws without a move after which the game counts as
   * stalled. Default: 52, more than one pass through any stock.
   */
  idleDrawLimit?: number;
}

export interface PlayResult {
  readonly won: boolean;
  /** Moves plus draws taken. */
  readonly steps: number;
  readonly moves: number;
  readonly draws: number;
  readonly endReason: 'victory' | 'stuck' | 'stalled' | 'step-limit';
}

/**
 * Play `state` to the end with `strategy`, mutating it. The turn
 * pipeline (without auto-draw) runs before the first step and after
 * every step.
 *
 * @throws If the strategy proposes a move the rules reject.
 */
export function playGame(
  state: KlondikeState,
  strategy: AutoPlayStrategy = GreedyStrategy,
  options: PlayOptions = {},
): PlayResult {
  const { maxSteps = 1000, idleDrawLimit = STANDARD_DECK_SIZE } = options;
  const pipeline = { autoDraw: false };

  let moves = 0;
  let draws = 0;
  let idleDraws = 0;

  const result = (endReason: PlayResult['endReason']): PlayResult => ({
    won: endReason === 'victory',
    steps: moves + draws,
    moves,
    draws,
    endReason,
  });

  runTurnPipeline(state, pipeline);
  while (moves + draws < maxSteps) {
    if (isVictory(state)) return result('victory');

    const step = strategy.chooseStep(state);
    switch (step.kind) {
      case 'stuck':
        return result('stuck');

      case 'draw':
        if (idleDraws >= idleDrawLimit) return result('stalled');
        drawFromDeck(state);
        draws++;
        idleDraws++;
        break;

      case 'move': {
        const outcome = attemptMove(step.move.from, step.move.to, state);
        if (!outcome.ok) {
          throw new Error(`${strategy.name} strategy chose an illegal move: ${outcome.reason}`);
        }
        moves++;
        idleDraws = 0;
        break;
      }
    }
    runTurnPipeline(state, pipeline);
  }
  return result(isVictory(state) ? 'victory' : 'step-limit');
}
