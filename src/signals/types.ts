import type { Instrument } from '../quotes/types.js';

export type Signal = 'BUY' | 'SELL' | 'HOLD';

export type StrategyPeriods = {
  shortPeriod: number;
  longPeriod: number;
};

export type CrossoverReading =
  | { status: 'ready'; signal: Signal; shortAvg: number; longAvg: number }
  | {
      status: 'pending';
      signal: 'HOLD';
      shortAvg: 0;
      longAvg: 0;
      /** prices currently held */
      length: number;
      /** prices needed before the reading is real */
      required: number;
    };

export interface SignalRecord {
  timestamp: Date;
  instrument: Instrument;
  price: number;
  shortAvg: number;
  longAvg: number;
  signal: Signal;
}
