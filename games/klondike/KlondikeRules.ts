/**
 * Klondike game rules.
 *
 * All functions are pure, or mutate only the state passed in. No Phaser
 * dependency.
 *
 * Classic Klondike rules:
 * - 52-card deck, no jokers.
 * - 28 cards are dealt face-down into 7 columns of 1..7 cards; the top
 *   card of each column is turned face-up.
 * - The remaining 24 cards form the stock. Drawing moves one card (or
 *   three, in draw-three mode) to the waste; an exhausted stock is
 *   refilled from the waste.
 * - Foundations build up by suit from Ace to King.
 * - Tableau columns build down in alternating colours; a run of face-up
 *   cards moves as a unit. Only a King may fill an empty column.
 * - Win: every foundation topped by its King.
 */

import type { Card } from '../../src/card-system/Card';
import { cardLabel, cardsEqual } from '../../src/card-system/Card';
import {
  STANDARD_DECK_SIZE,
  createShuffledDeck,
  createStandardDeck,
  drawOrThrow,
} from '../../src/card-system/Deck';
import type { Rng } from '../../src/card-system/Deck';
import { Pile } from '../../src/card-system/Pile';
import { FoundationPile } from '../../src/card-system/FoundationPile';
import { TableauColumn } from '../../src/card-system/TableauColumn';
import type {
  DrawOutcome,
  GameMode,
  KlondikeState,
  MoveError,
  MoveResult,
} from './KlondikeState';
import {
  FOUNDATION_COUNT,
  FOUNDATION_SUITS,
  TABLEAU_COUNT,
  drawCount,
  visibleWasteCount,
} from './KlondikeState';
import type { Selection } from './Selection';
import {
  DECK,
  collectionFor,
  columnSelection,
  describeSelection,
  pileSelection,
  sameCollection,
  selectedCardCount,
} from './Selection';

// ── Deal ────────────────────────────────────────────────────

/**
 * @throws If `deck` is not 52 distinct cards.
 */
function assertStandardDeck(deck: readonly Card[]): void {
  if (deck.length !== STANDARD_DECK_SIZE) {
    throw new Error(
      `Expected a ${STANDARD_DECK_SIZE}-card deck, got ${deck.length} cards`,
    );
  }
  const seen = new Set<string>();
  for (const card of deck) {
    const key = `${card.rank}-${card.suit}`;
    if (seen.has(key)) {
      throw new Error(`Duplicate card in deck: ${cardLabel(card)}`);
    }
    seen.add(key);
  }
}

function emptyFoundations(): FoundationPile[] {
  return FOUNDATION_SUITS.map((suit) => new FoundationPile(suit));
}

/**
 * Deal a Klondike game from a deck ordering (last element = top).
 *
 * Column `i` receives `i + 1` cards taken from the top of the deck, all
 * face-down; the turn pipeline turns each column's top card over. The
 * remaining 24 cards become the stock.
 *
 * @throws If `deck` is not a complete 52-card deck.
 */
export function deal(deck: readonly Card[], mode: GameMode): KlondikeState {
  assertStandardDeck(deck);

  const remaining = [...deck];
  const tableau: TableauColumn[] = [];
  for (let col = 0; col < TABLEAU_COUNT; col++) {
    const cards: Card[] = [];
    for (let n = 0; n <= col; n++) {
      cards.push(drawOrThrow(remaining));
    }
    tableau.push(TableauColumn.faceDown(cards));
  }

  return {
    stock: new Pile(remaining),
    waste: new Pile(),
    tableau,
    foundations: emptyFoundations(),
    mode,
    initialDeck: [...deck],
  };
}

/**
 * Deal a new game from a freshly shuffled deck.
 */
export function newGame(mode: GameMode, rng: Rng = Math.random): KlondikeState {
  return deal(createShuffledDeck(rng), mode);
}

/**
 * Deal again from a previously captured deck ordering (usually
 * `state.initialDeck`), reproducing the original deal exactly.
 */
export function restartGame(seedDeck: readonly Card[], mode: GameMode): KlondikeState {
  return deal(seedDeck, mode);
}

/**
 * A finished board: every foundation holds its whole suit.
 */
export function createVictoryState(mode: GameMode = 'draw-one'): KlondikeState {
  const ordered = createStandardDeck();
  const foundations = FOUNDATION_SUITS.map(
    (suit) => new FoundationPile(suit, ordered.filter((c) => c.suit === suit)),
  );
  return {
    stock: new Pile(),
    waste: new Pile(),
    tableau: Array.from({ length: TABLEAU_COUNT }, () => new TableauColumn()),
    foundations,
    mode,
    initialDeck: ordered,
  };
}

/**
 * A finished board with the King of the first foundation moved back
 * onto the first column.
 */
export function createAlmostVictoryState(mode: GameMode = 'draw-one'): KlondikeState {
  const state = createVictoryState(mode);
  const king = state.foundations[0].popOrThrow();
  state.tableau[0].receive([king]);
  return state;
}

// ── Inspection ──────────────────────────────────────────────

/** Every card on the board, from stock, waste, columns and foundations. */
export function allCards(state: KlondikeState): Card[] {
  return [
    ...state.stock.toArray(),
    ...state.waste.toArray(),
    ...state.tableau.flatMap((col) => col.toArray()),
    ...state.foundations.flatMap((pile) => pile.toArray()),
  ];
}

/** Total number of cards on the board. Always 52 for a dealt game. */
export function countCards(state: KlondikeState): number {
  return allCards(state).length;
}

/**
 * The waste cards shown face-up, bottom-first: the top one in draw-one
 * mode, up to the top three in draw-three mode. Only the last is playable.
 */
export function visibleWaste(state: KlondikeState): Card[] {
  const cards = state.waste.toArray();
  return cards.slice(Math.max(0, cards.length - visibleWasteCount(state.mode)));
}

// ── Placement helpers ───────────────────────────────────────

/** Whether `card` can go onto the given foundation next. */
export function canPlaceOnFoundation(card: Card, foundation: FoundationPile): boolean {
  return foundation.accepts(card);
}

/**
 * Whether `card` can land on a column: a King on an empty column, or
 * opposite colour and one rank below the top card.
 */
export function canPlaceOnColumn(card: Card, column: TableauColumn): boolean {
  return column.accepts(card);
}

// ── Move validation ─────────────────────────────────────────

const OK: MoveResult = { ok: true };

function reject(reason: string, error: MoveError = 'invalid-move'): MoveResult {
  return { ok: false, error, reason };
}

function placeOn(card: Card, to: Selection, state: KlondikeState): MoveResult {
  switch (to.kind) {
    case 'deck':
      return reject('cannot move cards onto the deck');
    case 'column':
      return canPlaceOnColumn(card, state.tableau[to.index])
        ? OK
        : reject(`${cardLabel(card)} does not fit on column ${to.index}`);
    case 'pile':
      return canPlaceOnFoundation(card, state.foundations[to.index])
        ? OK
        : reject(`${cardLabel(card)} does not fit on pile ${to.index}`);
  }
}

/**
 * Decide whether moving the cards selected by `from` onto `to` is legal.
 * Never mutates the state.
 *
 * - Nothing may move within one collection, or onto the deck.
 * - The waste's top card may go to a foundation or a column.
 * - A foundation's top card may go back to a column, not to another pile.
 * - A column may send exactly one card to a foundation, or its selected
 *   run to another column, judged by the run's bottom card.
 * - An empty source is never a legal move.
 */
export function validMove(
  from: Selection,
  to: Selection,
  state: KlondikeState,
): MoveResult {
  if (sameCollection(from, to)) return reject('source and destination are the same');
  if (to.kind === 'deck') return reject('cannot move cards onto the deck');

  switch (from.kind) {
    case 'deck': {
      const card = state.waste.peek();
      if (!card) return reject('the waste is empty');
      return placeOn(card, to, state);
    }
    case 'pile': {
      if (to.kind === 'pile') return reject('cannot move between foundations');
      const card = state.foundations[from.index].peek();
      if (!card) return reject(`pile ${from.index} is empty`);
      return placeOn(card, to, state);
    }
    case 'column': {
      const run = state.tableau[from.index].peekN(from.cardCount);
      if (!run) return reject(`column ${from.index} has no such run`);
      if (to.kind === 'pile' && run.length !== 1) {
        return reject('only one card at a time may go to a foundation');
      }
      return placeOn(run[0], to, state);
    }
  }
}

// ── Move application ────────────────────────────────────────

/**
 * Transfer the selected cards without consulting the rules. Both sides
 * are checked before either is touched, so a failure leaves the state
 * unchanged.
 */
export function moveCards(
  from: Selection,
  to: Selection,
  state: KlondikeState,
): MoveResult {
  if (sameCollection(from, to)) return reject('source and destination are the same');

  const count = selectedCardCount(from);
  const source = collectionFor(from, state);
  const destination = collectionFor(to, state);

  if (!source.peekN(count) || !destination.canReceive(count)) {
    return reject(
      `cannot transfer ${count} from ${describeSelection(from)} to ${describeSelection(to)}`,
      'collection-transfer-failed',
    );
  }

  const cards = source.take(count);
  if (!cards || !destination.receive(cards)) {
    throw new Error(
      `Transfer from ${describeSelection(from)} to ${describeSelection(to)} failed after passing its checks`,
    );
  }
  return OK;
}

/**
 * Validate and apply a move. A rejected move leaves the state untouched.
 */
export function attemptMove(
  from: Selection,
  to: Selection,
  state: KlondikeState,
): MoveResult {
  const verdict = validMove(from, to, state);
  if (!verdict.ok) return verdict;
  return moveCards(from, to, state);
}

/**
 * Draw from the stock.
 *
 * With cards in the stock, move up to `drawCount(mode)` of them to the
 * waste one at a time. With an empty stock, turn the waste over to
 * become the new stock (its first-drawn card on top) and draw nothing.
 */
export function drawFromDeck(state: KlondikeState): DrawOutcome {
  if (state.stock.isEmpty()) {
    if (state.waste.isEmpty()) return { kind: 'empty' };
    const recycled = state.waste.toArray().reverse();
    state.waste.clear();
    state.stock.push(...recycled);
    return { kind: 'recycled', count: recycled.length };
  }

  const count = Math.min(drawCount(state.mode), state.stock.size());
  for (let i = 0; i < count; i++) {
    state.waste.push(state.stock.popOrThrow());
  }
  return { kind: 'drew', count };
}

function autoPlace(from: Selection, state: KlondikeState): MoveResult {
  for (let fi = 0; fi < FOUNDATION_COUNT; fi++) {
    const result = attemptMove(from, pileSelection(fi), state);
    if (result.ok) return result;
  }
  return reject(`no foundation accepts the card from ${describeSelection(from)}`);
}

/**
 * Move the top card of a column to the first foundation that accepts it.
 */
export function autoPlaceToFoundation(
  columnIndex: number,
  state: KlondikeState,
): MoveResult {
  return autoPlace(columnSelection(columnIndex, 1), state);
}

/**
 * Move the waste's top card to the first foundation that accepts it.
 */
export function autoPlaceWasteToFoundation(state: KlondikeState): MoveResult {
  return autoPlace(DECK, state);
}

// ── Win detection ───────────────────────────────────────────

/**
 * The game is won when every foundation is topped by a King.
 */
export function isVictory(state: KlondikeState): boolean {
  return state.foundations.every((pile) => pile.isComplete());
}

// ── Move enumeration ────────────────────────────────────────

/** A source/destination pair. */
export interface KlondikeMove {
  readonly from: Selection;
  readonly to: Selection;
}

function moveSources(state: KlondikeState): Selection[] {
  const sources: Selection[] = [DECK];
  for (let col = 0; col < TABLEAU_COUNT; col++) {
    const run = state.tableau[col].faceUpCount();
    for (let n = 1; n <= run; n++) {
      sources.push(columnSelection(col, n));
    }
  }
  for (let fi = 0; fi < FOUNDATION_COUNT; fi++) {
    sources.push(pileSelection(fi));
  }
  return sources;
}

function moveDestinations(state: KlondikeState): Selection[] {
  const destinations: Selection[] = [];
  for (let col = 0; col < TABLEAU_COUNT; col++) {
    destinations.push(columnSelection(col, state.tableau[col].isEmpty() ? 0 : 1));
  }
  for (let fi = 0; fi < FOUNDATION_COUNT; fi++) {
    destinations.push(pileSelection(fi));
  }
  return destinations;
}

/**
 * Every legal card move on the board, not counting draws. Column
 * sources include each suffix of the face-up run.
 */
export function findLegalMoves(state: KlondikeState): KlondikeMove[] {
  const moves: KlondikeMove[] = [];
  const destinations = moveDestinations(state);
  for (const from of moveSources(state)) {
    for (const to of destinations) {
      if (validMove(from, to, state).ok) {
        moves.push({ from, to });
      }
    }
  }
  return moves;
}

/**
 * Where a card lies: `'stock'`, or a selection covering it. For a
 * column that is the run from the card up to the column's top.
 */
export function locateCard(card: Card, state: KlondikeState): Selection | 'stock' | undefined {
  if (state.stock.toArray().some((c) => cardsEqual(c, card))) return 'stock';
  if (state.waste.toArray().some((c) => cardsEqual(c, card))) return DECK;
  for (let col = 0; col < TABLEAU_COUNT; col++) {
    const cards = state.tableau[col].toArray();
    const pos = cards.findIndex((c) => cardsEqual(c, card));
    if (pos !== -1) return columnSelection(col, cards.length - pos);
  }
  for (let fi = 0; fi < FOUNDATION_COUNT; fi++) {
    if (state.foundations[fi].toArray().some((c) => cardsEqual(c, card))) {
      return pileSelection(fi);
    }
  }
  return undefined;
}
