/**
 * Shared builders for Klondike tests.
 */

import { createCard } from '../../src/card-system/Card';
import type { Card, Rank, Suit } from '../../src/card-system/Card';
import { STANDARD_DECK_SIZE, createStandardDeck } from '../../src/card-system/Deck';
import type { Rng } from '../../src/card-system/Deck';
import { Pile } from '../../src/card-system/Pile';
import { FoundationPile } from '../../src/card-system/FoundationPile';
import { TableauColumn } from '../../src/card-system/TableauColumn';
import type { ColumnEntry } from '../../src/card-system/TableauColumn';
import type { GameMode, KlondikeState } from '../../games/klondike/KlondikeState';
import { FOUNDATION_SUITS, TABLEAU_COUNT } from '../../games/klondike/KlondikeState';

export function card(rank: Rank, suit: Suit): Card {
  return createCard(rank, suit);
}

export interface ColumnSpec {
  /** Face-down cards, bottom first. */
  down?: Card[];
  /** Face-up cards on top of them, bottom first. */
  up?: Card[];
}

export interface BoardSpec {
  /** Bottom first; the last card is drawn next. */
  stock?: Card[];
  /** Bottom first; the last card is playable. */
  waste?: Card[];
  /** Up to seven columns; missing ones are empty. */
  columns?: ColumnSpec[];
  /** Up to four foundations in FOUNDATION_SUITS order. */
  foundations?: Card[][];
  mode?: GameMode;
}

/**
 * A hand-built board. Card counts are not checked, so partial boards
 * are fine for rules tests.
 */
export function buildState(board: BoardSpec = {}): KlondikeState {
  const tableau = Array.from({ length: TABLEAU_COUNT }, (_, i) => {
    const col = board.columns?.[i] ?? {};
    const entries: ColumnEntry[] = [
      ...(col.down ?? []).map((c): ColumnEntry => ({ card: c, state: 'face-down' })),
      ...(col.up ?? []).map((c): ColumnEntry => ({ card: c, state: 'face-up' })),
    ];
    return new TableauColumn(entries);
  });

  const foundations = FOUNDATION_SUITS.map(
    (suit, i) => new FoundationPile(suit, board.foundations?.[i] ?? []),
  );

  return {
    stock: new Pile(board.stock ?? []),
    waste: new Pile(board.waste ?? []),
    tableau,
    foundations,
    mode: board.mode ?? 'draw-one',
    initialDeck: [],
  };
}

/**
 * The ordered deck with A♥ swapped into the slot that becomes the top
 * of the stock after a deal, so the first draw turns it over.
 */
export function deckWithAceOfHeartsOnStock(): Card[] {
  const deck = createStandardDeck();
  // The deal takes 28 cards from the end; deck[23] is left on top.
  [deck[0], deck[23]] = [deck[23], deck[0]];
  return deck;
}

/**
 * An rng for one `shuffle()` of a 52-card deck that keeps the ordered
 * deck except for the given swaps: at step `i` (51 down to 1) card `i`
 * swaps with card `swaps[i]`.
 */
export function riggedRng(swaps: Readonly<Record<number, number>> = {}): Rng {
  let i = STANDARD_DECK_SIZE;
  return () => {
    i--;
    const j = swaps[i];
    return j === undefined ? 0.999 : (j + 0.5) / (i + 1);
  };
}
