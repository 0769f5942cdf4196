import { describe, it, expect, beforeEach } from 'vitest';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import { AppController } from '../app.controller';
import { MarketStreamService } from '../services/market-stream.service';
import { BookMetricsService } from '../services/metrics.service';
import { OrderBookService } from '../services/order-book.service';
import { PrivateStreamRouter } from '../services/private-stream.router';
import { SubscriptionRegistry } from '../services/subscription-registry.service';
import { FakeSocket, testConfig } from './stream-fixtures';

describe('AppController', () => {
  let books: OrderBookService;
  let controller: AppController;

  beforeEach(() => {
    const config = testConfig();
    const metrics = new BookMetricsService();
    books = new OrderBookService(config, metrics);
    const stream = new MarketStreamService(
      config,
      (url) => new FakeSocket(url),
      new SubscriptionRegistry(),
      books,
      new PrivateStreamRouter(),
      metrics,
    );
    controller = new AppController(stream, books, metrics);

    books
      .track('BTC-PERP')
      .applySnapshot(
        [
          { price: new Decimal(100), size: new Decimal(2) },
          { price: new Decimal(99), size: new Decimal(3) },
        ],
        [{ price: new Decimal(101), size: new Decimal('0.5') }],
        new Date('2024-01-01T00:00:00.000Z'),
      );
    books.track('ETH-PERP');
  });

  it('reports every tracked book in the status', () => {
    const status = controller.getStatus();

    expect(status.connected).toBe(false);
    expect(status.malformedFrames).toBe(0);
    expect(status.books).toEqual([
      {
        market: 'BTC-PERP',
        state: 'ready',
        sequence: 1,
        bidLevels: 2,
        askLevels: 1,
        updatesPerMinute: 0,
        checksumMismatches: 0,
        resyncs: 0,
      },
      {
        market: 'ETH-PERP',
        state: 'not-ready',
        sequence: 0,
        bidLevels: 0,
        askLevels: 0,
        updatesPerMinute: 0,
        checksumMismatches: 0,
        resyncs: 0,
      },
    ]);
  });

  it('renders a book down to the requested depth', () => {
    expect(controller.getBook('BTC-PERP', { depth: '1' })).toEqual({
      market: 'BTC-PERP',
      state: 'ready',
      sequence: 1,
      lastUpdateTime: '2024-01-01T00:00:00.000Z',
      checksum: 1509689881,
      bestBid: { price: '100', size: '2' },
      bestAsk: { price: '101', size: '0.5' },
      midPrice: '100.5',
      bids: [{ price: '100', size: '2' }],
      asks: [{ price: '101', size: '0.5' }],
    });
  });

  it('returns 404 for markets it does not track', () => {
    expect(() => controller.getBook('SOL-PERP', {})).toThrow(NotFoundException);
  });

  it('rejects a bad depth', () => {
    expect(() => controller.getBook('BTC-PERP', { depth: '-3' })).toThrow(
      BadRequestException,
    );
  });

  it('quotes a market order', () => {
    expect(
      controller.getQuote('BTC-PERP', { side: 'sell', size: '4' }),
    ).toEqual({ market: 'BTC-PERP', side: 'sell', size: '4', price: '99.5' });
    expect(
      controller.getQuote('BTC-PERP', { side: 'buy', size: '10' }).price,
    ).toBeNull();
  });

  it('rejects a malformed quote request', () => {
    expect(() =>
      controller.getQuote('BTC-PERP', { side: 'hold', size: '1' }),
    ).toThrow(BadRequestException);
    expect(() =>
      controller.getQuote('BTC-PERP', { side: 'buy', size: '0' }),
    ).toThrow(BadRequestException);
  });
});
