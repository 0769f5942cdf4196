import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter } from 'events';
import { STREAM_CONFIG, type StreamConfig } from '../config/stream.config';
import { OrderBook } from '../orderbook/order-book';
import {
  MalformedMessageError,
  OutOfSequenceError,
} from '../orderbook/order-book.errors';
import type { BookEvent } from '../types/stream.types';
import { BookMetricsService } from './metrics.service';

export type ApplyOutcome =
  | 'applied'
  | 'checksum-mismatch'
  | 'out-of-sequence'
  | 'malformed'
  | 'untracked';

// Owns one OrderBook per tracked market and applies decoded book events to it.
// Checksum mismatches are reported, not repaired: resync policy belongs to the stream service.
@Injectable()
export class OrderBookService extends EventEmitter {
  private readonly logger = new Logger(OrderBookService.name);
  private readonly books = new Map<string, OrderBook>();

  constructor(
    @Inject(STREAM_CONFIG) private readonly config: StreamConfig,
    private readonly metricsService: BookMetricsService,
  ) {
    super();
  }

  /**
   * Start tracking a market with an empty, not-ready book
   */
  track(market: string): OrderBook {
    let book = this.books.get(market);
    if (!book) {
      book = new OrderBook(market, this.config.checksumDepth);
      this.books.set(market, book);
      this.logger.log(`Tracking order book for ${market}`);
    }
    return book;
  }

  untrack(market: string): void {
    if (this.books.delete(market)) {
      this.metricsService.removeMarket(market);
      this.logger.log(`Stopped tracking order book for ${market}`);
    }
  }

  getBook(market: string): OrderBook | undefined {
    return this.books.get(market);
  }

  getMarkets(): string[] {
    return [...this.books.keys()].sort();
  }

  invalidate(market: string): void {
    this.books.get(market)?.invalidate();
  }

  // Connection lost: nothing in any book can be trusted until a new snapshot
  invalidateAll(): void {
    for (const book of this.books.values()) {
      book.invalidate();
    }
  }

  apply(event: BookEvent): ApplyOutcome {
    const book = this.books.get(event.market);
    if (!book) {
      this.logger.debug(
        `Ignoring ${event.kind} for untracked market ${event.market}`,
      );
      return 'untracked';
    }

    try {
      if (event.kind === 'snapshot') {
        book.applySnapshot(event.bids, event.asks, event.time);
      } else {
        book.applyUpdate(event.bids, event.asks, event.time);
      }
    } catch (error) {
      if (error instanceof OutOfSequenceError) {
        this.logger.debug(error.message);
        return 'out-of-sequence';
      }
      if (error instanceof MalformedMessageError) {
        this.logger.warn(
          `Dropped malformed ${event.kind} for ${event.market}: ${error.message}`,
        );
        this.metricsService.recordMalformedFrame();
        return 'malformed';
      }
      throw error;
    }

    this.metricsService.recordUpdate(event.market);

    if (!book.verifyChecksum(event.checksum)) {
      this.metricsService.recordChecksumMismatch(event.market);
      this.logger.warn(
        `Checksum mismatch for ${event.market} after ${event.kind}: ` +
          `expected ${event.checksum}, got ${book.checksum()}. ` +
          `Book has ${book.depth('bids')} bids, ${book.depth('asks')} asks.`,
      );
      return 'checksum-mismatch';
    }

    this.emit('bookUpdate', event.market);
    return 'applied';
  }
}
