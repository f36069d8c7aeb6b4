/**
 * Board geometry for the Klondike scene.
 *
 * Nine slots run left to right in cursor order: the deck (stock above
 * the waste), the seven columns, and the foundations stacked top to
 * bottom. All positions are card centres in scene pixels.
 */

import { CARD_H, CARD_W } from '../../src/ui/constants';
import type { KlondikeState } from './KlondikeState';
import { TABLEAU_COUNT } from './KlondikeState';
import { visibleWaste } from './KlondikeRules';
import type { Selection } from './Selection';

// ── Constants ───────────────────────────────────────────────

export const MARGIN_X = 80;
export const SLOT_SPACING = 130;
/** Centre line of the top row of cards. */
export const TOP_Y = 110;
/** Vertical overlap between cascaded cards in a column. */
export const CASCADE_OFFSET_Y = 26;
/** Vertical gap between fanned waste cards. */
export const WASTE_OFFSET_Y = 22;
export const PILE_GAP_Y = 16;

/** Slot index of the foundations. */
export const PILE_SLOT = TABLEAU_COUNT + 1;

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned rectangle given by its centre and size. */
export interface Bounds extends Point {
  readonly width: number;
  readonly height: number;
}

// ── Positions ───────────────────────────────────────────────

export function slotX(slot: number): number {
  return MARGIN_X + CARD_W / 2 + slot * SLOT_SPACING;
}

export function stockPosition(): Point {
  return { x: slotX(0), y: TOP_Y };
}

/** Position of the `i`-th visible waste card (0 = bottom of the fan). */
export function wastePosition(i: number): Point {
  return { x: slotX(0), y: TOP_Y + CARD_H + 20 + i * WASTE_OFFSET_Y };
}

export function columnCardPosition(column: number, row: number): Point {
  return { x: slotX(column + 1), y: TOP_Y + row * CASCADE_OFFSET_Y };
}

export function pilePosition(index: number): Point {
  return { x: slotX(PILE_SLOT), y: TOP_Y + index * (CARD_H + PILE_GAP_Y) };
}

// ── Selection outline ───────────────────────────────────────

function cardBounds(p: Point): Bounds {
  return { x: p.x, y: p.y, width: CARD_W, height: CARD_H };
}

/**
 * Rectangle covering the cards a selection refers to: the playable
 * waste card, the selected run of a column (or its empty slot), or a
 * foundation.
 */
export function selectionBounds(selection: Selection, state: KlondikeState): Bounds {
  switch (selection.kind) {
    case 'deck': {
      const shown = visibleWaste(state).length;
      return cardBounds(wastePosition(Math.max(0, shown - 1)));
    }
    case 'column': {
      const size = state.tableau[selection.index].size();
      const count = Math.max(1, Math.min(selection.cardCount, size));
      const firstRow = Math.max(0, size - count);
      const lastRow = Math.max(0, size - 1);
      const top = columnCardPosition(selection.index, firstRow);
      const bottom = columnCardPosition(selection.index, lastRow);
      return {
        x: top.x,
        y: (top.y + bottom.y) / 2,
        width: CARD_W,
        height: CARD_H + (bottom.y - top.y),
      };
    }
    case 'pile':
      return cardBounds(pilePosition(selection.index));
  }
}
