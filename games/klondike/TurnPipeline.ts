/**
 * The per-turn pipeline: restores board invariants after every action.
 *
 * Steps, always in this order:
 *   1. Turn the top card of every non-empty column face-up.
 *   2. Auto-draw one batch when the waste is empty and the stock is not
 *      (can be switched off). An empty stock is only recycled by an
 *      explicit draw.
 *   3. Clamp the cursor and the picked-up selection to the board.
 *   4. Derive the context help line from the cursor.
 *   5. Check for victory.
 *
 * Every step is total; the pipeline cannot fail.
 */

import type { KlondikeState, TurnOutcome } from './KlondikeState';
import { drawFromDeck, isVictory } from './KlondikeRules';
import type { Selection, SelectionState } from './Selection';
import { applyColumnSelectionRules } from './Selection';

export interface TurnPipelineOptions {
  /** Draw automatically when the waste runs out. Default: true. */
  autoDraw?: boolean;
  /** Allow selecting face-down column cards. Default: false. */
  debugMode?: boolean;
}

export interface TurnReport {
  readonly outcome: TurnOutcome;
  /** Help line for the cursor's current location. */
  readonly helpText: string;
  /** Indices of columns whose top card was turned face-up this turn. */
  readonly exposed: readonly number[];
  /** Cards auto-drawn to the waste this turn. */
  readonly autoDrawn: number;
}

/**
 * Turn every column's top card face-up.
 *
 * @returns Indices of the columns that changed.
 */
export function exposeColumnTops(state: KlondikeState): number[] {
  const exposed: number[] = [];
  state.tableau.forEach((column, index) => {
    if (column.exposeTop()) exposed.push(index);
  });
  return exposed;
}

/**
 * Draw one batch if the stock has cards and the waste has none.
 *
 * @returns Number of cards drawn.
 */
export function autoDraw(state: KlondikeState): number {
  if (state.stock.isEmpty() || !state.waste.isEmpty()) return 0;
  const outcome = drawFromDeck(state);
  return outcome.kind === 'drew' ? outcome.count : 0;
}

/** Context help for whatever the cursor points at. */
export function contextHelp(cursor: Selection): string {
  switch (cursor.kind) {
    case 'deck':
      return 'Enter: Hit';
    case 'column':
      return 'Enter: Try to Move to Stack';
    case 'pile':
      return '';
  }
}

/**
 * Re-apply the column selection rules to the cursor and the picked-up
 * selection, in place.
 */
export function clampSelections(
  selection: SelectionState,
  state: KlondikeState,
  debugMode: boolean,
): void {
  selection.cursor = applyColumnSelectionRules(selection.cursor, state, debugMode);
  if (selection.picked) {
    selection.picked = applyColumnSelectionRules(selection.picked, state, debugMode);
  }
}

/**
 * Run the pipeline once. When `selection` is given its cursor and
 * picked-up selection are clamped in place.
 */
export function runTurnPipeline(
  state: KlondikeState,
  options: TurnPipelineOptions = {},
  selection?: SelectionState,
): TurnReport {
  const { autoDraw: autoDrawEnabled = true, debugMode = false } = options;

  const exposed = exposeColumnTops(state);
  const autoDrawn = autoDrawEnabled ? autoDraw(state) : 0;

  if (selection) {
    clampSelections(selection, state, debugMode);
  }
  const helpText = selection ? contextHelp(selection.cursor) : '';

  const outcome: TurnOutcome = isVictory(state) ? 'victory' : 'continue';
  return { outcome, helpText, exposed, autoDrawn };
}
