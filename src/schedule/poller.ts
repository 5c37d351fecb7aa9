import { SystemClock, formatTimestamp, type Clock } from '../core/clock.js';
import type { CrosswatchConfig, Resolution } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { fetchWithRetry } from '../quotes/fetcher.js';
import { resolveInstruments, type Instrument, type QuoteFailureKind, type QuoteSource } from '../quotes/types.js';
import { MovingAverageTracker } from '../signals/crossover.js';
import type { SignalLog } from '../signals/log.js';
import type { Signal, SignalRecord } from '../signals/types.js';
import { PriceWindow } from '../signals/window.js';
import { preloadWindows, type PreloadResult, type PreloadTarget } from './preload.js';
import { SessionPolicy, type SessionPhase } from './session.js';

export type PollerState =
  | 'idle'
  | 'bootstrapping'
  | 'waiting'
  | 'polling_high'
  | 'polling_low'
  | 'stopped';

type WindowKey = 'high' | 'low';

type InstrumentState = {
  instrument: Instrument;
  windows: Record<WindowKey, PriceWindow>;
  lastSignal: Signal | null;
  lastPrice: number | null;
};

export type InstrumentOutcome =
  | { symbol: string; status: 'skipped'; kind: QuoteFailureKind; attempts: number }
  | { symbol: string; status: 'pending'; price: number; length: number; required: number }
  | { symbol: string; status: 'unchanged'; price: number; signal: Signal }
  | { symbol: string; status: 'changed'; record: SignalRecord }
  | { symbol: string; status: 'log_failed'; price: number; signal: Signal }
  | { symbol: string; status: 'aborted' };

export type TickReport = {
  phase: SessionPhase;
  resolution: Resolution;
  startedAt: Date;
  outcomes: InstrumentOutcome[];
};

export type RunSummary = {
  ticks: number;
  recordsWritten: number;
  endedBy: 'closed' | 'aborted';
};

export type InstrumentSnapshot = {
  symbol: string;
  exchange: string;
  highWindow: number;
  lowWindow: number;
  lastSignal: Signal | null;
  lastPrice: number | null;
};

export function formatSignalLine(record: SignalRecord, timeZone: string): string {
  return [
    formatTimestamp(record.timestamp, timeZone),
    record.instrument.symbol,
    record.price.toFixed(2),
    `Short MA: ${record.shortAvg.toFixed(2)}`,
    `Long MA: ${record.longAvg.toFixed(2)}`,
    record.signal,
  ].join(' | ');
}

const seconds = (value: number) => Math.round(value * 1000);

/**
 * Session-driven polling loop. Owns every instrument's windows and last emitted
 * signal; a record is appended only when a ready reading differs from the last
 * one emitted for that instrument.
 */
export class SignalPoller {
  private state: PollerState = 'idle';
  private table = new Map<string, InstrumentState>();
  private tracker: MovingAverageTracker;
  private policy: SessionPolicy;
  private clock: Clock;
  private logger: Logger;
  private controller: AbortController | null = null;

  constructor(
    private params: {
      config: CrosswatchConfig;
      source: QuoteSource;
      signalLog: SignalLog;
      clock?: Clock;
      logger?: Logger;
      policy?: SessionPolicy;
    }
  ) {
    const { config } = params;
    this.clock = params.clock ?? new SystemClock();
    this.logger = params.logger ?? new Logger(config.logging.level);
    this.policy = params.policy ?? SessionPolicy.fromConfig(config);
    this.tracker = new MovingAverageTracker(config.strategy);

    for (const instrument of resolveInstruments(config.tickers, config.defaultExchange)) {
      this.table.set(instrument.symbol, {
        instrument,
        windows: {
          high: new PriceWindow(this.tracker.capacity),
          low: new PriceWindow(this.tracker.capacity),
        },
        lastSignal: null,
        lastPrice: null,
      });
    }
  }

  getState(): PollerState {
    return this.state;
  }

  getPolicy(): SessionPolicy {
    return this.policy;
  }

  instruments(): Instrument[] {
    return Array.from(this.table.values(), (entry) => entry.instrument);
  }

  snapshot(): InstrumentSnapshot[] {
    return Array.from(this.table.values(), (entry) => ({
      symbol: entry.instrument.symbol,
      exchange: entry.instrument.exchange,
      highWindow: entry.windows.high.length,
      lowWindow: entry.windows.low.length,
      lastSignal: entry.lastSignal,
      lastPrice: entry.lastPrice,
    }));
  }

  /** Window for tests and diagnostics. */
  windowFor(symbol: string, key: WindowKey): PriceWindow | undefined {
    return this.table.get(symbol.toUpperCase())?.windows[key];
  }

  async preload(signal?: AbortSignal): Promise<PreloadResult[]> {
    const settings = this.policy.settings;
    const targets: PreloadTarget[] = [];
    for (const entry of this.table.values()) {
      targets.push({
        instrument: entry.instrument,
        resolution: settings.highFrequencyResolution,
        window: entry.windows.high,
      });
      targets.push({
        instrument: entry.instrument,
        resolution: settings.lowFrequencyResolution,
        window: entry.windows.low,
      });
    }
    return preloadWindows(targets, {
      source: this.params.source,
      clock: this.clock,
      delayMs: seconds(this.params.config.preload.delaySeconds),
      logger: this.logger,
      signal,
    });
  }

  /** One pass over every instrument at the phase's resolution. */
  async tick(phase: SessionPhase, signal?: AbortSignal): Promise<TickReport> {
    const resolution = this.policy.resolutionFor(phase);
    if (!resolution) {
      throw new Error(`Cannot poll during ${phase}`);
    }
    const key: WindowKey = phase === 'high_frequency' ? 'high' : 'low';
    this.state = key === 'high' ? 'polling_high' : 'polling_low';

    const startedAt = this.clock.now();
    const outcomes: InstrumentOutcome[] = [];
    const delayMs = seconds(this.params.config.polling.instrumentDelaySeconds);

    for (const entry of this.table.values()) {
      if (signal?.aborted) {
        outcomes.push({ symbol: entry.instrument.symbol, status: 'aborted' });
        continue;
      }
      outcomes.push(await this.pollInstrument(entry, resolution, key, signal));
      await this.clock.sleep(delayMs, signal);
    }

    return { phase, resolution, startedAt, outcomes };
  }

  private async pollInstrument(
    entry: InstrumentState,
    resolution: Resolution,
    key: WindowKey,
    signal?: AbortSignal
  ): Promise<InstrumentOutcome> {
    const { instrument } = entry;
    const symbol = instrument.symbol;
    const quotes = this.params.config.quotes;

    const fetched = await fetchWithRetry(this.params.source, instrument, resolution, {
      retries: quotes.retries,
      retryDelayMs: seconds(quotes.retryDelaySeconds),
      clock: this.clock,
      logger: this.logger,
      signal,
    });
    if (!fetched.ok) {
      return { symbol, status: 'skipped', kind: fetched.kind, attempts: fetched.attempts };
    }

    const price = fetched.price;
    entry.lastPrice = price;
    const reading = this.tracker.observe(entry.windows[key], price);

    if (reading.status === 'pending') {
      this.logger.debug(`${symbol}: collecting ${resolution} prices (${reading.length}/${reading.required})`);
      return { symbol, status: 'pending', price, length: reading.length, required: reading.required };
    }

    if (reading.signal === entry.lastSignal) {
      return { symbol, status: 'unchanged', price, signal: reading.signal };
    }

    const record: SignalRecord = {
      timestamp: this.clock.now(),
      instrument,
      price,
      shortAvg: reading.shortAvg,
      longAvg: reading.longAvg,
      signal: reading.signal,
    };
    try {
      await this.params.signalLog.append(record);
    } catch (error) {
      this.logger.error(`${symbol}: failed to write signal record`, error);
      return { symbol, status: 'log_failed', price, signal: reading.signal };
    }
    this.logger.info(formatSignalLine(record, this.policy.settings.timeZone));
    entry.lastSignal = reading.signal;
    return { symbol, status: 'changed', record };
  }

  /**
   * Preloads, then polls until the session closes or the loop is aborted via
   * `signal` or `stop()`.
   */
  async run(signal?: AbortSignal): Promise<RunSummary> {
    if (this.controller) {
      throw new Error('Poller already running');
    }
    const controller = new AbortController();
    this.controller = controller;
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const abort = controller.signal;

    let ticks = 0;
    let recordsWritten = 0;
    let endedBy: RunSummary['endedBy'] = 'aborted';

    try {
      this.state = 'bootstrapping';
      if (this.params.config.preload.enabled) {
        await this.preload(abort);
      }

      const { session } = this.params.config;
      this.logger.info(
        `Monitoring ${this.table.size} ticker(s) from ${session.open} to ${session.close} ${session.timeZone}...`
      );

      while (!abort.aborted) {
        const now = this.clock.now();
        const phase = this.policy.phase(now);

        if (phase === 'closed') {
          this.logger.info('Market closed. Monitoring ended.');
          endedBy = 'closed';
          break;
        }

        if (phase === 'before_open') {
          this.state = 'waiting';
          const next = this.policy.nextTick(now, phase);
          const delayMs = next?.delayMs ?? 0;
          this.logger.info(`Waiting for market open (${Math.round(delayMs / 1000)} seconds)...`);
          await this.clock.sleep(delayMs, abort);
          continue;
        }

        const report = await this.tick(phase, abort);
        ticks += 1;
        recordsWritten += report.outcomes.filter((o) => o.status === 'changed').length;

        const next = this.policy.nextTick(this.clock.now(), phase, report.startedAt);
        if (next) {
          this.logger.debug(`Next ${phase} tick at ${formatTimestamp(next.wakeAt, session.timeZone)}`);
          await this.clock.sleep(next.delayMs, abort);
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller = null;
      this.state = 'stopped';
    }

    return { ticks, recordsWritten, endedBy };
  }

  stop(): void {
    this.controller?.abort();
  }
}
