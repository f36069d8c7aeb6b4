/**
 * Deck operations for the Klondike engine.
 *
 * A deck is a plain Card array whose last element is the top. This module
 * provides factory functions, shuffling and seeded randomness.
 */

import type { Card, Rank, Suit } from './Card';
import { RANKS, SUITS, createCard } from './Card';

/** A random number generator returning values in [0, 1), like Math.random. */
export type Rng = () => number;

/** Number of cards in a standard deck. */
export const STANDARD_DECK_SIZE = 52;

/**
 * Create a standard 52-card deck (no jokers).
 *
 * Cards are ordered by suit (in `SUITS` order) then rank (A through K).
 */
export function createStandardDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Create a deck from a specific list of rank/suit pairs.
 */
export function createDeckFrom(
  cards: ReadonlyArray<{ rank: Rank; suit: Suit }>,
): Card[] {
  return cards.map((c) => createCard(c.rank, c.suit));
}

/**
 * Shuffle a deck in place using the Fisher-Yates algorithm.
 *
 * @returns The same array reference (mutated).
 */
export function shuffle(deck: Card[], rng: Rng = Math.random): Card[] {
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }
  return deck;
}

/**
 * Create a freshly shuffled standard deck.
 */
export function createShuffledDeck(rng: Rng = Math.random): Card[] {
  return shuffle(createStandardDeck(), rng);
}

/**
 * Create a deterministic RNG from a numeric seed.
 * Uses a linear congruential generator compatible with the
 * `shuffle()` contract.
 */
export function createSeededRng(seed: number): Rng {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

/**
 * Draw the top card from a deck, throwing if the deck is empty.
 *
 * Use this when an empty deck indicates a logic error (e.g.
 * dealing should never exhaust the deck).
 */
export function drawOrThrow(deck: Card[]): Card {
  const card = deck.pop();
  if (card === undefined) {
    throw new Error('Cannot draw from an empty deck');
  }
  return card;
}
