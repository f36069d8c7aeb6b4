/**
 * A tableau column: cards stacked bottom-to-top, each face-up or face-down.
 *
 * Face state belongs to the column. Cards leave a column as bare
 * {@link Card} values and every card a column receives lies face-up.
 * Normally the column holds some face-down cards under a contiguous
 * face-up run.
 */

import type { Card } from './Card';
import { isOppositeColor, rankValue } from './Card';
import type { CardCollection } from './CardCollection';

export type CardState = 'face-up' | 'face-down';

/** A card together with its face state inside a column. */
export interface ColumnEntry {
  readonly card: Card;
  readonly state: CardState;
}

export class TableauColumn implements CardCollection {
  private readonly entries: ColumnEntry[];

  constructor(entries: readonly ColumnEntry[] = []) {
    this.entries = [...entries];
  }

  /** Build a column of face-down cards (as dealt). */
  static faceDown(cards: readonly Card[]): TableauColumn {
    return new TableauColumn(cards.map((card) => ({ card, state: 'face-down' })));
  }

  take(count: number): Card[] | undefined {
    if (!Number.isInteger(count) || count < 1 || count > this.entries.length) {
      return undefined;
    }
    return this.entries
      .splice(this.entries.length - count, count)
      .map((e) => e.card);
  }

  receive(cards: readonly Card[]): boolean {
    if (!this.canReceive(cards.length)) return false;
    for (const card of cards) {
      this.entries.push({ card, state: 'face-up' });
    }
    return true;
  }

  canReceive(count: number): boolean {
    return count >= 1;
  }

  peek(): Card | undefined {
    return this.entries.length > 0
      ? this.entries[this.entries.length - 1].card
      : undefined;
  }

  peekN(count: number): Card[] | undefined {
    if (count < 1 || count > this.entries.length) return undefined;
    return this.entries.slice(this.entries.length - count).map((e) => e.card);
  }

  size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  toArray(): Card[] {
    return this.entries.map((e) => e.card);
  }

  /** A copy of the entries (bottom to top) with their face states. */
  toEntries(): ColumnEntry[] {
    return [...this.entries];
  }

  /** Length of the contiguous face-up run at the top of the column. */
  faceUpCount(): number {
    let count = 0;
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].state !== 'face-up') break;
      count++;
    }
    return count;
  }

  /**
   * Turn the top card face-up.
   * @returns `true` if a face-down card was turned over.
   */
  exposeTop(): boolean {
    const last = this.entries.length - 1;
    if (last < 0 || this.entries[last].state === 'face-up') return false;
    this.entries[last] = { card: this.entries[last].card, state: 'face-up' };
    return true;
  }

  /**
   * Whether `card` may be placed on this column: a King on an empty
   * column, otherwise a card of the opposite colour one rank below the top.
   */
  accepts(card: Card): boolean {
    const top = this.peek();
    if (!top) return card.rank === 'K';
    return (
      isOppositeColor(top, card) &&
      rankValue(top.rank) === rankValue(card.rank) + 1
    );
  }
}
