/**
 * The capability shared by every pile a card can be moved out of or into.
 *
 * Failure is reported as a value (`undefined` from `take`, `false` from
 * `receive`) because rejected transfers are routine during play. A failed
 * call never mutates the collection.
 */

import type { Card } from './Card';

export interface CardCollection {
  /**
   * Remove the top `count` cards, returned bottom-first.
   * @returns `undefined` if the cards are not available or the collection
   *          does not allow removing that many at once.
   */
  take(count: number): Card[] | undefined;

  /**
   * Append cards to the top, in array order.
   * @returns `false` if the collection cannot accept these cards in one call.
   */
  receive(cards: readonly Card[]): boolean;

  /** Whether a `receive` of `count` cards would be accepted. */
  canReceive(count: number): boolean;

  /** The top card, or `undefined` if empty. */
  peek(): Card | undefined;

  /**
   * The top `count` cards, bottom-first, without removing them.
   * @returns `undefined` if fewer than `count` cards are present.
   */
  peekN(count: number): Card[] | undefined;

  size(): number;
  isEmpty(): boolean;

  /** A copy of all cards, bottom to top. */
  toArray(): Card[];
}
