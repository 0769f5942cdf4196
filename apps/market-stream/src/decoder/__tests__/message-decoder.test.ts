import { describe, it, expect } from 'vitest';
import { decodeFrame } from '../message-decoder';

const frame = (value: object) => JSON.stringify(value);

function expectKind<K extends string>(
  event: { kind: string },
  kind: K,
): asserts event is { kind: K } {
  expect(event.kind).toBe(kind);
}

const bookFrame = (type: string, data: object, market = 'BTC-PERP') =>
  frame({ channel: 'orderbook', market, type, data });

describe('decodeFrame', () => {
  describe('control frames', () => {
    it('decodes pong as a heartbeat', () => {
      expect(decodeFrame(frame({ type: 'pong' }))).toEqual({
        kind: 'heartbeat',
      });
    });

    it('decodes subscription confirmations', () => {
      expect(
        decodeFrame(
          frame({ type: 'subscribed', channel: 'orderbook', market: 'BTC-PERP' }),
        ),
      ).toEqual({ kind: 'subscribed', channel: 'orderbook', market: 'BTC-PERP' });
      expect(
        decodeFrame(
          frame({ type: 'unsubscribed', channel: 'trades', market: 'ETH-PERP' }),
        ),
      ).toEqual({ kind: 'unsubscribed', channel: 'trades', market: 'ETH-PERP' });
    });

    it('drops the market from private channel confirmations', () => {
      const event = decodeFrame(
        frame({ type: 'subscribed', channel: 'fills', market: 'BTC-PERP' }),
      );
      expectKind(event, 'subscribed');
      expect(event).toEqual({
        kind: 'subscribed',
        channel: 'fills',
        market: undefined,
      });
    });

    it('treats confirmations for unknown channels as unknown', () => {
      const raw = frame({ type: 'subscribed', channel: 'markets' });
      expect(decodeFrame(raw)).toEqual({
        kind: 'unknown',
        type: 'subscribed',
        channel: 'markets',
        raw,
      });
    });

    it('decodes info and error frames', () => {
      expect(
        decodeFrame(
          frame({ type: 'info', code: 20001, msg: 'Server restarting' }),
        ),
      ).toEqual({ kind: 'info', code: 20001, message: 'Server restarting' });
      expect(
        decodeFrame(frame({ type: 'error', code: 400, msg: 'Invalid market' })),
      ).toEqual({ kind: 'error', code: 400, message: 'Invalid market' });
    });

    it('accepts Buffers', () => {
      expect(decodeFrame(Buffer.from('{"type":"pong"}'))).toEqual({
        kind: 'heartbeat',
      });
    });
  });

  describe('orderbook frames', () => {
    it('decodes a partial as a snapshot', () => {
      const event = decodeFrame(
        bookFrame('partial', {
          action: 'partial',
          bids: [[100.5, 2]],
          asks: [[101, 0.25]],
          checksum: 1234,
          time: 1621740952.5,
        }),
      );

      if (event.kind !== 'snapshot') {
        throw new Error(`Expected snapshot, got ${event.kind}`);
      }
      expect(event.market).toBe('BTC-PERP');
      expect(event.checksum).toBe(1234);
      expect(event.time.getTime()).toBe(1621740952500);
      expect(
        event.bids.map((l) => [l.price.toString(), l.size.toString()]),
      ).toEqual([['100.5', '2']]);
      expect(
        event.asks.map((l) => [l.price.toString(), l.size.toString()]),
      ).toEqual([['101', '0.25']]);
    });

    it('decodes an update', () => {
      const event = decodeFrame(
        bookFrame('update', {
          action: 'update',
          bids: [],
          asks: [[101, 0]],
          checksum: 99,
          time: 1621740953,
        }),
      );

      expectKind(event, 'update');
    });

    it('keeps long numerals exact', () => {
      const event = decodeFrame(
        '{"channel":"orderbook","market":"BTC-PERP","type":"partial","data":' +
          '{"action":"partial","bids":[[35000.123456789012345678,1]],"asks":[],' +
          '"checksum":1,"time":1621740952.5079553}}',
      );

      if (event.kind !== 'snapshot') {
        throw new Error(`Expected snapshot, got ${event.kind}`);
      }
      expect(event.bids[0].price.toString()).toBe('35000.123456789012345678');
    });

    it('rejects an action that contradicts the frame type', () => {
      const event = decodeFrame(
        bookFrame('partial', {
          action: 'update',
          bids: [],
          asks: [],
          checksum: 0,
          time: 1621740953,
        }),
      );

      expect(event).toMatchObject({
        kind: 'malformed',
        reason: 'Orderbook action update does not match frame type partial',
      });
    });

    it('rejects a frame without a market', () => {
      const event = decodeFrame(
        frame({
          channel: 'orderbook',
          type: 'update',
          data: { action: 'update', bids: [], asks: [], checksum: 0, time: 1 },
        }),
      );

      expect(event).toMatchObject({
        kind: 'malformed',
        reason: 'Orderbook frame without market',
      });
    });

    it('rejects levels that are not numbers', () => {
      const event = decodeFrame(
        bookFrame('update', {
          action: 'update',
          bids: [['abc', 1]],
          asks: [],
          checksum: 0,
          time: 1621740953,
        }),
      );

      expect(event).toMatchObject({
        kind: 'malformed',
        reason: 'bids.0.0: Invalid decimal number: abc',
      });
    });
  });

  describe('market data frames', () => {
    it('decodes trades', () => {
      const event = decodeFrame(
        frame({
          channel: 'trades',
          market: 'BTC-PERP',
          type: 'update',
          data: [
            {
              id: 123,
              price: 35000.5,
              size: 0.01,
              side: 'buy',
              liquidation: false,
              time: '2021-05-23T03:35:52.507+00:00',
            },
          ],
        }),
      );

      if (event.kind !== 'trades') {
        throw new Error(`Expected trades, got ${event.kind}`);
      }
      expect(event.market).toBe('BTC-PERP');
      expect(event.trades).toHaveLength(1);
      expect(event.trades[0].id).toBe('123');
      expect(event.trades[0].price.toString()).toBe('35000.5');
      expect(event.trades[0].time.toISOString()).toBe(
        '2021-05-23T03:35:52.507Z',
      );
    });

    it('decodes a ticker with missing values', () => {
      const event = decodeFrame(
        frame({
          channel: 'ticker',
          market: 'ETH-PERP',
          type: 'update',
          data: {
            bid: 2500,
            ask: 2500.5,
            bidSize: 1,
            askSize: 2,
            last: null,
            time: 1621740952.5,
          },
        }),
      );

      if (event.kind !== 'ticker') {
        throw new Error(`Expected ticker, got ${event.kind}`);
      }
      expect(event.ticker.ask?.toString()).toBe('2500.5');
      expect(event.ticker.last).toBeNull();
    });
  });

  describe('private frames', () => {
    it('decodes a fill and keeps 64-bit ids exact', () => {
      const event = decodeFrame(
        '{"channel":"fills","type":"update","data":{' +
          '"id":12345678901234567890,"market":"BTC-PERP","future":"BTC-PERP",' +
          '"baseCurrency":null,"quoteCurrency":null,"type":"order","side":"sell",' +
          '"price":35000,"size":0.5,"orderId":42,"tradeId":7,' +
          '"time":"2021-05-23T03:35:52.507+00:00","fee":0.35,"feeRate":0.0007,' +
          '"feeCurrency":"USD","liquidity":"taker"}}',
      );

      if (event.kind !== 'fill') {
        throw new Error(`Expected fill, got ${event.kind}`);
      }
      expect(event.fill.id).toBe('12345678901234567890');
      expect(event.fill.orderId).toBe('42');
      expect(event.fill.side).toBe('sell');
      expect(event.fill.fee.toString()).toBe('0.35');
    });

    it('decodes an order update and normalises the order type', () => {
      const event = decodeFrame(
        frame({
          channel: 'orders',
          type: 'update',
          data: {
            id: 9,
            clientId: null,
            market: 'ETH-PERP',
            type: 'take_profit',
            side: 'buy',
            price: null,
            size: 3,
            status: 'new',
            filledSize: 0,
            remainingSize: 3,
            avgFillPrice: null,
            reduceOnly: false,
            ioc: false,
            postOnly: false,
            createdAt: '2021-05-23T03:35:52+00:00',
          },
        }),
      );

      if (event.kind !== 'order') {
        throw new Error(`Expected order, got ${event.kind}`);
      }
      expect(event.order.id).toBe('9');
      expect(event.order.type).toBe('takeProfit');
      expect(event.order.price).toBeNull();
      expect(event.order.status).toBe('new');
    });
  });

  describe('anything else', () => {
    it('reports invalid JSON as malformed', () => {
      const event = decodeFrame('{not json');

      if (event.kind !== 'malformed') {
        throw new Error(`Expected malformed, got ${event.kind}`);
      }
      expect(event.reason).toMatch(/^Invalid JSON: /);
      expect(event.raw).toBe('{not json');
    });

    it('reports a frame without a type as malformed', () => {
      expect(decodeFrame(frame({ channel: 'orderbook' }))).toMatchObject({
        kind: 'malformed',
        reason: 'type: Required',
      });
    });

    it('reports unknown types and channels as unknown', () => {
      const weird = frame({ type: 'weird' });
      expect(decodeFrame(weird)).toEqual({
        kind: 'unknown',
        type: 'weird',
        channel: undefined,
        raw: weird,
      });

      const markets = frame({ channel: 'markets', type: 'partial', data: {} });
      expect(decodeFrame(markets)).toMatchObject({
        kind: 'unknown',
        type: 'partial',
        channel: 'markets',
      });
    });
  });
});
