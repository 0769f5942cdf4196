import { Decimal } from 'decimal.js';
import type { Side } from '../schemas/ftx.schema';
import type { PriceLevel } from '../types/stream.types';
import { CHECKSUM_DEPTH, computeChecksum } from './checksum';
import { Ladder, type LadderSide } from './ladder';
import { MalformedMessageError, OutOfSequenceError } from './order-book.errors';

export type BookState = 'not-ready' | 'ready';

/**
 * Local replica of one market's order book.
 *
 * Starts not-ready, becomes ready on the first snapshot and stays ready while
 * diffs are applied. `invalidate()` drops the contents and goes back to
 * not-ready; diffs are refused until the next snapshot.
 *
 * Every method runs synchronously, so a query never sees a half-applied frame.
 */
export class OrderBook {
  private readonly bids = new Ladder('bids');
  private readonly asks = new Ladder('asks');
  private currentState: BookState = 'not-ready';
  private appliedCount = 0;
  private lastTime: Date | undefined;

  constructor(
    readonly market: string,
    private readonly checksumDepth: number = CHECKSUM_DEPTH,
  ) {}

  get state(): BookState {
    return this.currentState;
  }

  get isReady(): boolean {
    return this.currentState === 'ready';
  }

  // Number of snapshots and diffs applied since creation
  get sequence(): number {
    return this.appliedCount;
  }

  get lastUpdateTime(): Date | undefined {
    return this.lastTime;
  }

  applySnapshot(
    bids: readonly PriceLevel[],
    asks: readonly PriceLevel[],
    time?: Date,
  ): void {
    this.assertSnapshotSide('bids', bids);
    this.assertSnapshotSide('asks', asks);

    this.bids.replace(bids);
    this.asks.replace(asks);
    this.currentState = 'ready';
    this.markApplied(time);
  }

  applyUpdate(
    bids: readonly PriceLevel[],
    asks: readonly PriceLevel[],
    time?: Date,
  ): void {
    if (!this.isReady) {
      throw new OutOfSequenceError(this.market);
    }

    // Validate everything first so a rejected diff leaves the book untouched
    this.assertNonNegative('bids', bids);
    this.assertNonNegative('asks', asks);

    for (const level of bids) {
      this.bids.set(level.price, level.size);
    }
    for (const level of asks) {
      this.asks.set(level.price, level.size);
    }
    this.markApplied(time);
  }

  invalidate(): void {
    this.bids.clear();
    this.asks.clear();
    this.currentState = 'not-ready';
  }

  checksum(): number {
    return computeChecksum(
      this.bids.top(this.checksumDepth),
      this.asks.top(this.checksumDepth),
      this.checksumDepth,
    );
  }

  verifyChecksum(expected: number): boolean {
    return this.checksum() === expected;
  }

  bestBid(): PriceLevel | undefined {
    return this.bids.best();
  }

  bestAsk(): PriceLevel | undefined {
    return this.asks.best();
  }

  bestBidAndAsk(): [PriceLevel, PriceLevel] | undefined {
    const bid = this.bestBid();
    const ask = this.bestAsk();
    return bid && ask ? [bid, ask] : undefined;
  }

  bidPrice(): Decimal | undefined {
    return this.bestBid()?.price;
  }

  askPrice(): Decimal | undefined {
    return this.bestAsk()?.price;
  }

  // Not rounded to the market's price increment
  midPrice(): Decimal | undefined {
    const bid = this.bidPrice();
    const ask = this.askPrice();
    if (!bid || !ask) {
      return undefined;
    }
    return bid.plus(ask).dividedBy(2);
  }

  /**
   * Expected average execution price of a market order of `size`:
   * buys walk the asks, sells walk the bids, best price first.
   * Undefined when the side does not hold enough size.
   */
  quote(side: Side, size: Decimal.Value): Decimal | undefined {
    const wanted = new Decimal(size);
    if (wanted.lessThanOrEqualTo(0)) {
      return undefined;
    }

    const ladder = side === 'buy' ? this.asks : this.bids;
    let remaining = wanted;
    let notional = new Decimal(0);

    for (const level of ladder) {
      const filled = Decimal.min(level.size, remaining);
      notional = notional.plus(level.price.times(filled));
      remaining = remaining.minus(filled);
      if (remaining.isZero()) {
        return notional.dividedBy(wanted);
      }
    }

    return undefined;
  }

  levels(side: LadderSide, limit?: number): PriceLevel[] {
    return (side === 'bids' ? this.bids : this.asks).top(limit);
  }

  sizeAt(side: LadderSide, price: Decimal.Value): Decimal | undefined {
    return (side === 'bids' ? this.bids : this.asks).get(new Decimal(price));
  }

  depth(side: LadderSide): number {
    return (side === 'bids' ? this.bids : this.asks).depth;
  }

  private markApplied(time?: Date): void {
    this.appliedCount++;
    if (time) {
      this.lastTime = time;
    }
  }

  private assertNonNegative(
    side: LadderSide,
    levels: readonly PriceLevel[],
  ): void {
    for (const level of levels) {
      if (level.size.isNegative()) {
        throw new MalformedMessageError(
          `Negative size ${level.size.toString()} at ${level.price.toString()} in ${this.market} ${side}`,
        );
      }
    }
  }

  private assertSnapshotSide(
    side: LadderSide,
    levels: readonly PriceLevel[],
  ): void {
    this.assertNonNegative(side, levels);

    const seen = new Set<string>();
    for (const level of levels) {
      // Decimal#toString is canonical, so 100 and 100.0 collide as they should
      const key = level.price.toString();
      if (seen.has(key)) {
        throw new MalformedMessageError(
          `Duplicate price ${key} in ${this.market} ${side} snapshot`,
        );
      }
      seen.add(key);
    }
  }
}
