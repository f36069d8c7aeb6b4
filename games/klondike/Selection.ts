/**
 * Klondike cursor and selection.
 *
 * A Selection names a location on the board: the deck (the waste's top
 * card), a tableau column with the length of the run selected from its
 * top, or a foundation pile. The UI keeps two of them: the cursor and
 * the optional picked-up selection.
 *
 * Selections are immutable values; every operation here returns a new one.
 */

import type { CardCollection } from '../../src/card-system/CardCollection';
import type { KlondikeState } from './KlondikeState';
import { FOUNDATION_COUNT, TABLEAU_COUNT } from './KlondikeState';

// ── Types ───────────────────────────────────────────────────

export interface DeckSelection {
  readonly kind: 'deck';
}

export interface ColumnSelection {
  readonly kind: 'column';
  /** Column index (0-6). */
  readonly index: number;
  /** Number of cards selected, counted from the top of the column. */
  readonly cardCount: number;
}

export interface PileSelection {
  readonly kind: 'pile';
  /** Foundation index (0-3). */
  readonly index: number;
}

export type Selection = DeckSelection | ColumnSelection | PileSelection;

/** The cursor and what was picked up by a previous select action. */
export interface SelectionState {
  cursor: Selection;
  picked: Selection | null;
}

/** Navigation and extension actions the cursor responds to. */
export type CursorAction =
  | 'move-left'
  | 'move-right'
  | 'extend-up'
  | 'extend-down'
  | 'jump-to-deck'
  | 'jump-to-last-pile';

export const CURSOR_ACTIONS: readonly CursorAction[] = [
  'move-left',
  'move-right',
  'extend-up',
  'extend-down',
  'jump-to-deck',
  'jump-to-last-pile',
] as const;

// ── Constructors ────────────────────────────────────────────

export const DECK: DeckSelection = { kind: 'deck' };

export function columnSelection(index: number, cardCount: number): ColumnSelection {
  return { kind: 'column', index, cardCount };
}

export function pileSelection(index: number): PileSelection {
  return { kind: 'pile', index };
}

/**
 * Select column `index`, with one card selected unless it is empty.
 */
function enterColumn(index: number, state: KlondikeState): ColumnSelection {
  return columnSelection(index, state.tableau[index].isEmpty() ? 0 : 1);
}

// ── Queries ─────────────────────────────────────────────────

/**
 * Whether two selections point into the same deck, column or pile
 * (same kind and index; the selected card count is ignored).
 */
export function sameCollection(a: Selection, b: Selection): boolean {
  switch (a.kind) {
    case 'deck':
      return b.kind === 'deck';
    case 'column':
      return b.kind === 'column' && a.index === b.index;
    case 'pile':
      return b.kind === 'pile' && a.index === b.index;
  }
}

/** Number of cards a selection covers. The deck and piles always offer one. */
export function selectedCardCount(selection: Selection): number {
  return selection.kind === 'column' ? selection.cardCount : 1;
}

/**
 * The collection a selection points into.
 *
 * @throws If the selection's index is out of range.
 */
export function collectionFor(
  selection: Selection,
  state: KlondikeState,
): CardCollection {
  switch (selection.kind) {
    case 'deck':
      return state.waste;
    case 'column': {
      const column = state.tableau[selection.index];
      if (!column) {
        throw new Error(`Column index ${selection.index} is out of range`);
      }
      return column;
    }
    case 'pile': {
      const pile = state.foundations[selection.index];
      if (!pile) {
        throw new Error(`Pile index ${selection.index} is out of range`);
      }
      return pile;
    }
  }
}

/** Short description such as `deck`, `column 3 (2 cards)` or `pile 0`. */
export function describeSelection(selection: Selection): string {
  switch (selection.kind) {
    case 'deck':
      return 'deck';
    case 'column':
      return `column ${selection.index} (${selection.cardCount} ${selection.cardCount === 1 ? 'card' : 'cards'})`;
    case 'pile':
      return `pile ${selection.index}`;
  }
}

// ── Navigation ──────────────────────────────────────────────

/**
 * Move one slot left: piles -> column 6 -> ... -> column 0 -> deck.
 * The deck stays put.
 */
export function moveLeft(selection: Selection, state: KlondikeState): Selection {
  switch (selection.kind) {
    case 'deck':
      return selection;
    case 'column':
      return selection.index > 0 ? enterColumn(selection.index - 1, state) : DECK;
    case 'pile':
      return enterColumn(TABLEAU_COUNT - 1, state);
  }
}

/**
 * Move one slot right: deck -> column 0 -> ... -> column 6 -> pile 0.
 * A pile selection stays put.
 */
export function moveRight(selection: Selection, state: KlondikeState): Selection {
  switch (selection.kind) {
    case 'deck':
      return enterColumn(0, state);
    case 'column':
      return selection.index < TABLEAU_COUNT - 1
        ? enterColumn(selection.index + 1, state)
        : pileSelection(0);
    case 'pile':
      return selection;
  }
}

/**
 * Extend a column selection by one card, or move up one pile.
 * Column counts above the selectable run are clamped later by
 * {@link applyColumnSelectionRules}.
 */
export function selectUp(selection: Selection): Selection {
  switch (selection.kind) {
    case 'deck':
      return selection;
    case 'column':
      return columnSelection(selection.index, selection.cardCount + 1);
    case 'pile':
      return selection.index > 0 ? pileSelection(selection.index - 1) : selection;
  }
}

/**
 * Shrink a column selection by one card (not below zero), or move down
 * one pile.
 */
export function selectDown(selection: Selection): Selection {
  switch (selection.kind) {
    case 'deck':
      return selection;
    case 'column':
      return selection.cardCount > 0
        ? columnSelection(selection.index, selection.cardCount - 1)
        : selection;
    case 'pile':
      return selection.index < FOUNDATION_COUNT - 1
        ? pileSelection(selection.index + 1)
        : selection;
  }
}

export function jumpToDeck(): Selection {
  return DECK;
}

/** Jump to the foundation area, the right-most slot. */
export function jumpToLastPile(): Selection {
  return pileSelection(0);
}

// ── Selection rules ─────────────────────────────────────────

/**
 * Number of cards that may be selected in a column: the face-up run,
 * or the whole column in debug mode (to inspect face-down cards).
 */
export function selectableCount(
  state: KlondikeState,
  columnIndex: number,
  debugMode: boolean,
): number {
  const column = state.tableau[columnIndex];
  return debugMode ? column.size() : column.faceUpCount();
}

/**
 * Clamp a column selection to the selectable cards of its column, and
 * select at least one card of a non-empty column. Other selections are
 * returned unchanged. Applying the rules twice equals applying them once.
 */
export function applyColumnSelectionRules(
  selection: Selection,
  state: KlondikeState,
  debugMode: boolean = false,
): Selection {
  if (selection.kind !== 'column') return selection;

  const column = state.tableau[selection.index];
  const floor = column.isEmpty() ? 0 : 1;
  const max = selectableCount(state, selection.index, debugMode);
  const cardCount = Math.max(floor, Math.min(selection.cardCount, max));

  return cardCount === selection.cardCount
    ? selection
    : columnSelection(selection.index, cardCount);
}

function stepCursor(
  action: CursorAction,
  selection: Selection,
  state: KlondikeState,
): Selection {
  switch (action) {
    case 'move-left':
      return moveLeft(selection, state);
    case 'move-right':
      return moveRight(selection, state);
    case 'extend-up':
      return selectUp(selection);
    case 'extend-down':
      return selectDown(selection);
    case 'jump-to-deck':
      return jumpToDeck();
    case 'jump-to-last-pile':
      return jumpToLastPile();
  }
}

/**
 * Apply one cursor action and then the selection rules.
 */
export function applyCursorAction(
  action: CursorAction,
  selection: Selection,
  state: KlondikeState,
  debugMode: boolean = false,
): Selection {
  return applyColumnSelectionRules(
    stepCursor(action, selection, state),
    state,
    debugMode,
  );
}
