/**
 * Card face helpers
 *
 * Cards are drawn as rounded rectangles with a text label rather than
 * sprites. These map a card to its label and text colour.
 */

import type { Card, Suit } from '../card-system/Card';
import { SUIT_SYMBOL, cardLabel, isRed } from '../card-system/Card';

/** Text shown on a face-down card. */
export const CARD_BACK_LABEL = '##';

export const RED_TEXT = '#cc2222';
export const BLACK_TEXT = '#111111';

/**
 * Label for a card: `A♠`, `10♦`, or {@link CARD_BACK_LABEL} when it
 * is face-down.
 */
export function cardFaceLabel(card: Card, faceUp: boolean = true): string {
  return faceUp ? cardLabel(card) : CARD_BACK_LABEL;
}

/** Text colour for a face-up card. */
export function cardFaceColor(card: Card): string {
  return isRed(card.suit) ? RED_TEXT : BLACK_TEXT;
}

/** Label for an empty foundation: its suit symbol. */
export function emptyPileLabel(suit: Suit): string {
  return SUIT_SYMBOL[suit];
}
