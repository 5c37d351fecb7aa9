/**
 * crosswatch - session-aware moving-average crossover monitor.
 *
 * Main entry point for the library.
 */

export const VERSION = '0.1.0';

export { SystemClock, formatTimestamp, secondsOfDay, wallClock, type Clock, type WallClock } from './core/clock.js';
export {
  ConfigError,
  RESOLUTIONS,
  loadConfig,
  parseConfig,
  type CrosswatchConfig,
  type Resolution,
} from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { fetchWithRetry, type FetchOutcome, type RetryOptions } from './quotes/fetcher.js';
export { TradingViewQuoteSource, createQuoteSource } from './quotes/tradingview.js';
export {
  instrumentKey,
  parseInstrument,
  resolveInstruments,
  type Instrument,
  type QuoteFailureKind,
  type QuoteResult,
  type QuoteSource,
} from './quotes/types.js';
export {
  SignalPoller,
  formatSignalLine,
  type InstrumentOutcome,
  type InstrumentSnapshot,
  type PollerState,
  type RunSummary,
  type TickReport,
} from './schedule/poller.js';
export { preloadWindows, type PreloadResult, type PreloadTarget } from './schedule/preload.js';
export { SessionPolicy, type NextTick, type SessionPhase, type SessionSettings } from './schedule/session.js';
export { MovingAverageTracker, classify, evaluate } from './signals/crossover.js';
export { CsvSignalLog, SIGNAL_LOG_HEADER, type SignalLog } from './signals/log.js';
export type { CrossoverReading, Signal, SignalRecord, StrategyPeriods } from './signals/types.js';
export { PriceWindow } from './signals/window.js';
