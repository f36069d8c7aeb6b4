/**
 * A foundation: one suit, built up from Ace to King one card at a time.
 */

import type { Card, Suit } from './Card';
import { rankValue } from './Card';
import { Pile } from './Pile';

export class FoundationPile extends Pile {
  constructor(
    readonly suit: Suit,
    cards: readonly Card[] = [],
  ) {
    super(cards);
  }

  /**
   * Whether `card` may be placed next: it must match the suit and be the
   * Ace on an empty pile, or exactly one rank above the current top.
   */
  accepts(card: Card): boolean {
    if (card.suit !== this.suit) return false;
    const top = this.peek();
    if (!top) return card.rank === 'A';
    return rankValue(card.rank) === rankValue(top.rank) + 1;
  }

  /** A foundation holds its full suit once a King is on top. */
  isComplete(): boolean {
    return this.peek()?.rank === 'K';
  }

  protected override canTake(count: number): boolean {
    return count === 1 && super.canTake(count);
  }
}
