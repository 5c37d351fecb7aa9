import { SMA } from 'technicalindicators';

import type { CrossoverReading, Signal, StrategyPeriods } from './types.js';
import type { PriceWindow } from './window.js';

function average(values: number[], period: number): number {
  const series = SMA.calculate({ period, values: values.slice(values.length - period) });
  return series[series.length - 1] ?? 0;
}

export function classify(shortAvg: number, longAvg: number): Signal {
  if (shortAvg > longAvg) return 'BUY';
  if (shortAvg < longAvg) return 'SELL';
  return 'HOLD';
}

/**
 * Crossover reading from the window as it stands. Until the window holds
 * `longPeriod` prices the reading is pending: HOLD with zero averages.
 */
export function evaluate(window: PriceWindow, periods: StrategyPeriods): CrossoverReading {
  const values = window.values();
  if (values.length < periods.longPeriod) {
    return {
      status: 'pending',
      signal: 'HOLD',
      shortAvg: 0,
      longAvg: 0,
      length: values.length,
      required: periods.longPeriod,
    };
  }
  const shortAvg = average(values, periods.shortPeriod);
  const longAvg = average(values, periods.longPeriod);
  return { status: 'ready', signal: classify(shortAvg, longAvg), shortAvg, longAvg };
}

export class MovingAverageTracker {
  constructor(readonly periods: StrategyPeriods) {
    if (periods.shortPeriod < 1 || periods.shortPeriod > periods.longPeriod) {
      throw new RangeError(
        `shortPeriod (${periods.shortPeriod}) must be between 1 and longPeriod (${periods.longPeriod})`
      );
    }
  }

  get capacity(): number {
    return this.periods.longPeriod;
  }

  observe(window: PriceWindow, price: number): CrossoverReading {
    window.push(price);
    return evaluate(window, this.periods);
  }

  evaluate(window: PriceWindow): CrossoverReading {
    return evaluate(window, this.periods);
  }
}
