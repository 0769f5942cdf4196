import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import { Ladder } from '../ladder';

const d = (value: Decimal.Value) => new Decimal(value);
const prices = (ladder: Ladder) =>
  ladder.top().map((level) => level.price.toString());

describe('Ladder', () => {
  it('keeps bids in descending price order', () => {
    const bids = new Ladder('bids');
    bids.set(d(99), d(1));
    bids.set(d(101), d(1));
    bids.set(d(100), d(1));

    expect(prices(bids)).toEqual(['101', '100', '99']);
    expect(bids.best()?.price.toString()).toBe('101');
  });

  it('keeps asks in ascending price order', () => {
    const asks = new Ladder('asks');
    asks.set(d(102), d(1));
    asks.set(d(100.5), d(1));
    asks.set(d(101), d(1));

    expect(prices(asks)).toEqual(['100.5', '101', '102']);
    expect(asks.best()?.price.toString()).toBe('100.5');
  });

  it('treats numerically equal prices as the same level', () => {
    const bids = new Ladder('bids');
    bids.set(d('100'), d(1));
    bids.set(d('100.0'), d(2));
    bids.set(d('1e2'), d(3));

    expect(bids.depth).toBe(1);
    expect(bids.get(d(100))?.toString()).toBe('3');
  });

  it('removes a level when its size is set to zero', () => {
    const asks = new Ladder('asks');
    asks.set(d(101), d(1));
    asks.set(d(102), d(1));

    asks.set(d(101), d(0));

    expect(prices(asks)).toEqual(['102']);
    expect(asks.get(d(101))).toBeUndefined();
  });

  it('ignores a zero size for a price it does not hold', () => {
    const asks = new Ladder('asks');
    asks.set(d(101), d(1));

    asks.set(d(105), d(0));

    expect(prices(asks)).toEqual(['101']);
  });

  it('reports whether remove found the price', () => {
    const bids = new Ladder('bids');
    bids.set(d(100), d(1));

    expect(bids.remove(d(100))).toBe(true);
    expect(bids.remove(d(100))).toBe(false);
    expect(bids.depth).toBe(0);
  });

  it('replaces the whole side, skipping zero sizes', () => {
    const bids = new Ladder('bids');
    bids.set(d(50), d(1));

    bids.replace([
      { price: d(99), size: d(3) },
      { price: d(100), size: d(2) },
      { price: d(98), size: d(0) },
    ]);

    expect(prices(bids)).toEqual(['100', '99']);
  });

  it('limits top() and returns a copy', () => {
    const asks = new Ladder('asks');
    asks.set(d(101), d(1));
    asks.set(d(102), d(1));
    asks.set(d(103), d(1));

    expect(asks.top(2).map((level) => level.price.toString())).toEqual([
      '101',
      '102',
    ]);
    expect(asks.top(0)).toEqual([]);

    const copy = asks.top();
    copy.pop();
    expect(asks.depth).toBe(3);
  });

  it('clears every level', () => {
    const bids = new Ladder('bids');
    bids.set(d(100), d(1));
    bids.clear();

    expect(bids.depth).toBe(0);
    expect(bids.best()).toBeUndefined();
  });
});
