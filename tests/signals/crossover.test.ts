import { describe, it, expect } from 'vitest';

import { MovingAverageTracker, classify } from '../../src/signals/crossover.js';
import { PriceWindow } from '../../src/signals/window.js';

const periods = { shortPeriod: 5, longPeriod: 15 };

describe('classify', () => {
  it('compares averages exactly', () => {
    expect(classify(13, 8)).toBe('BUY');
    expect(classify(8, 13)).toBe('SELL');
    expect(classify(10, 10)).toBe('HOLD');
    expect(classify(10.000001, 10)).toBe('BUY');
  });
});

describe('MovingAverageTracker', () => {
  it('is pending until the window holds longPeriod prices', () => {
    const tracker = new MovingAverageTracker(periods);
    const window = new PriceWindow(tracker.capacity);
    for (let price = 1; price <= 14; price += 1) {
      const reading = tracker.observe(window, price);
      expect(reading).toEqual({
        status: 'pending',
        signal: 'HOLD',
        shortAvg: 0,
        longAvg: 0,
        length: price,
        required: 15,
      });
    }
  });

  it('reports BUY on ascending prices once full', () => {
    const tracker = new MovingAverageTracker(periods);
    const window = new PriceWindow(tracker.capacity);
    for (let price = 1; price <= 14; price += 1) tracker.observe(window, price);
    expect(tracker.observe(window, 15)).toEqual({
      status: 'ready',
      signal: 'BUY',
      shortAvg: 13,
      longAvg: 8,
    });
  });

  it('reports SELL on descending prices', () => {
    const tracker = new MovingAverageTracker(periods);
    const window = new PriceWindow(tracker.capacity);
    let reading = tracker.evaluate(window);
    for (let price = 15; price >= 1; price -= 1) reading = tracker.observe(window, price);
    expect(reading).toEqual({ status: 'ready', signal: 'SELL', shortAvg: 3, longAvg: 8 });
  });

  it('reports HOLD on a flat window', () => {
    const tracker = new MovingAverageTracker(periods);
    const window = new PriceWindow(tracker.capacity);
    window.fill(100);
    expect(tracker.evaluate(window)).toEqual({
      status: 'ready',
      signal: 'HOLD',
      shortAvg: 100,
      longAvg: 100,
    });
  });

  it('uses only the most recent shortPeriod prices for the short average', () => {
    const tracker = new MovingAverageTracker({ shortPeriod: 2, longPeriod: 4 });
    const window = new PriceWindow(tracker.capacity);
    [10, 10, 2, 4, 6].forEach((p) => tracker.observe(window, p));
    // window = [10, 2, 4, 6]
    expect(tracker.evaluate(window)).toEqual({
      status: 'ready',
      signal: 'SELL',
      shortAvg: 5,
      longAvg: 5.5,
    });
  });

  it('rejects a short period longer than the long period', () => {
    expect(() => new MovingAverageTracker({ shortPeriod: 6, longPeriod: 5 })).toThrow(RangeError);
  });
});
