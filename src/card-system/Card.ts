/**
 * Card types and factory functions for the Klondike engine.
 *
 * Cards are immutable rank/suit values. Whether a card is shown face-up
 * is a property of the collection holding it, not of the card.
 */

/** Standard playing card ranks. */
export type Rank =
  | 'A'
  | '2'
  | '3'
  | '4'
  | '5'
  | '6'
  | '7'
  | '8'
  | '9'
  | '10'
  | 'J'
  | 'Q'
  | 'K';

/** All ranks in order (Ace low). */
export const RANKS: readonly Rank[] = [
  'A',
  '2',
  '3',
  '4',
  '5',
  '6',
  '7',
  '8',
  '9',
  '10',
  'J',
  'Q',
  'K',
] as const;

/** Standard playing card suits. */
export type Suit = 'hearts' | 'spades' | 'diamonds' | 'clubs';

/**
 * All suits in deck order. Foundation `i` is built in `SUITS[i]`.
 */
export const SUITS: readonly Suit[] = [
  'hearts',
  'spades',
  'diamonds',
  'clubs',
] as const;

/** Display symbol per suit. */
export const SUIT_SYMBOL: Record<Suit, string> = {
  hearts: '\u2665', // ♥
  spades: '\u2660', // ♠
  diamonds: '\u2666', // ♦
  clubs: '\u2663', // ♣
};

/**
 * A playing card. There is no identity beyond (rank, suit).
 */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

/**
 * Create a single card.
 */
export function createCard(rank: Rank, suit: Suit): Card {
  return { rank, suit };
}

const RANK_VALUE: Record<Rank, number> = {
  A: 1,
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
  '10': 10,
  J: 11,
  Q: 12,
  K: 13,
};

/**
 * Numeric value of a rank (A=1, K=13).
 */
export function rankValue(rank: Rank): number {
  return RANK_VALUE[rank];
}

/** Hearts and diamonds are red; spades and clubs are black. */
export function isRed(suit: Suit): boolean {
  return suit === 'hearts' || suit === 'diamonds';
}

/** Whether two cards differ in colour. */
export function isOppositeColor(a: Card, b: Card): boolean {
  return isRed(a.suit) !== isRed(b.suit);
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/**
 * Short label such as `A♥` or `10♣`.
 */
export function cardLabel(card: Card): string {
  return `${card.rank}${SUIT_SYMBOL[card.suit]}`;
}
