import type { Decimal } from 'decimal.js';
import type { PriceLevel } from '../types/stream.types';

export type LadderSide = 'bids' | 'asks';

/**
 * One side of an order book, kept sorted best price first:
 * bids descending, asks ascending. Prices are unique and every stored size is positive.
 */
export class Ladder {
  private levels: PriceLevel[] = [];

  constructor(readonly side: LadderSide) {}

  get depth(): number {
    return this.levels.length;
  }

  best(): PriceLevel | undefined {
    return this.levels[0];
  }

  get(price: Decimal): Decimal | undefined {
    const { index, found } = this.locate(price);
    return found ? this.levels[index].size : undefined;
  }

  /**
   * Insert or replace a level. A zero size removes the price instead.
   */
  set(price: Decimal, size: Decimal): void {
    if (size.isZero()) {
      this.remove(price);
      return;
    }

    const { index, found } = this.locate(price);
    const level = { price, size };
    if (found) {
      this.levels[index] = level;
    } else {
      this.levels.splice(index, 0, level);
    }
  }

  remove(price: Decimal): boolean {
    const { index, found } = this.locate(price);
    if (!found) {
      return false;
    }
    this.levels.splice(index, 1);
    return true;
  }

  /**
   * Replace the whole side. Callers validate uniqueness and sign beforehand.
   */
  replace(levels: readonly PriceLevel[]): void {
    this.levels = levels
      .filter((level) => !level.size.isZero())
      .map((level) => ({ price: level.price, size: level.size }))
      .sort((a, b) => this.compare(a.price, b.price));
  }

  clear(): void {
    this.levels = [];
  }

  top(limit: number = this.levels.length): PriceLevel[] {
    return this.levels.slice(0, Math.max(0, limit));
  }

  [Symbol.iterator](): Iterator<PriceLevel> {
    return this.levels[Symbol.iterator]();
  }

  // Negative when `a` ranks ahead of `b` on this side
  private compare(a: Decimal, b: Decimal): number {
    return this.side === 'asks' ? a.comparedTo(b) : b.comparedTo(a);
  }

  private locate(price: Decimal): { index: number; found: boolean } {
    let low = 0;
    let high = this.levels.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      const order = this.compare(this.levels[mid].price, price);
      if (order === 0) {
        return { index: mid, found: true };
      }
      if (order < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return { index: low, found: false };
  }
}
