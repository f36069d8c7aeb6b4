/**
 * Pile abstraction for the Klondike engine.
 *
 * A Pile is a stack of cards (LIFO). Besides the raw push/pop operations
 * used while dealing and drawing, it implements {@link CardCollection}:
 * any number of cards may be taken from the top, but only one card is
 * received per call.
 *
 * The stock and the waste are plain piles; {@link FoundationPile} narrows
 * the rules further.
 */

import type { Card } from './Card';
import type { CardCollection } from './CardCollection';

export class Pile implements CardCollection {
  protected readonly cards: Card[];

  /**
   * Create a Pile, optionally pre-populated with cards.
   * The last element of the array is treated as the top of the pile.
   */
  constructor(cards: readonly Card[] = []) {
    this.cards = [...cards];
  }

  /** Push one or more cards onto the top of the pile. */
  push(...newCards: Card[]): void {
    this.cards.push(...newCards);
  }

  /**
   * Remove and return the top card.
   * @returns The top card, or `undefined` if the pile is empty.
   */
  pop(): Card | undefined {
    return this.cards.pop();
  }

  /**
   * Remove and return the top card, throwing if the pile is empty.
   */
  popOrThrow(): Card {
    const card = this.cards.pop();
    if (card === undefined) {
      throw new Error('Cannot pop from an empty pile');
    }
    return card;
  }

  take(count: number): Card[] | undefined {
    if (!this.canTake(count)) return undefined;
    return this.cards.splice(this.cards.length - count, count);
  }

  receive(cards: readonly Card[]): boolean {
    if (!this.canReceive(cards.length)) return false;
    this.cards.push(...cards);
    return true;
  }

  canReceive(count: number): boolean {
    return count === 1;
  }

  /**
   * Look at the top card without removing it.
   * @returns The top card, or `undefined` if the pile is empty.
   */
  peek(): Card | undefined {
    return this.cards.length > 0
      ? this.cards[this.cards.length - 1]
      : undefined;
  }

  peekN(count: number): Card[] | undefined {
    if (count < 1 || count > this.cards.length) return undefined;
    return this.cards.slice(this.cards.length - count);
  }

  /** Whether the pile contains no cards. */
  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  /** The number of cards in the pile. */
  size(): number {
    return this.cards.length;
  }

  /**
   * Return a shallow copy of all cards in the pile (bottom to top).
   */
  toArray(): Card[] {
    return [...this.cards];
  }

  /** Clear all cards from the pile. */
  clear(): void {
    this.cards.length = 0;
  }

  /** Whether `take(count)` would succeed. */
  protected canTake(count: number): boolean {
    return Number.isInteger(count) && count >= 1 && count <= this.cards.length;
  }
}
