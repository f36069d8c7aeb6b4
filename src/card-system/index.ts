/**
 * Card System Module
 *
 * Card values, deck construction and shuffling, and the pile types
 * (plain piles, tableau columns, foundations) that cards move between.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and helpers
export type { Card, Rank, Suit } from './Card';
export {
  RANKS,
  SUITS,
  SUIT_SYMBOL,
  createCard,
  rankValue,
  isRed,
  isOppositeColor,
  cardsEqual,
  cardLabel,
} from './Card';

// Deck factory and operations
export type { Rng } from './Deck';
export {
  STANDARD_DECK_SIZE,
  createStandardDeck,
  createDeckFrom,
  shuffle,
  createShuffledDeck,
  createSeededRng,
  drawOrThrow,
} from './Deck';

// Collections
export type { CardCollection } from './CardCollection';
export { Pile } from './Pile';
export { FoundationPile } from './FoundationPile';
export type { CardState, ColumnEntry } from './TableauColumn';
export { TableauColumn } from './TableauColumn';
