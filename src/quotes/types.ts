import { ConfigError, type Resolution } from '../core/config.js';

export type { Resolution };

export interface Instrument {
  symbol: string;
  exchange: string;
}

export type QuoteFailureKind = 'rate_limited' | 'unavailable';

export type QuoteResult =
  | { ok: true; price: number }
  | { ok: false; kind: QuoteFailureKind; message: string };

export interface QuoteSource {
  readonly name: string;
  /** Last traded price at the given bar resolution. Upstream failures resolve, never reject. */
  fetchLastPrice(
    instrument: Instrument,
    resolution: Resolution,
    signal?: AbortSignal
  ): Promise<QuoteResult>;
}

export function instrumentKey(instrument: Instrument): string {
  return `${instrument.exchange}:${instrument.symbol}`;
}

/**
 * Accepts `TSLA` or `NYSE:IBM`; symbols and exchanges are upper-cased.
 */
export function parseInstrument(entry: string, defaultExchange: string): Instrument {
  const trimmed = entry.trim();
  const idx = trimmed.indexOf(':');
  if (idx === -1) {
    return { symbol: trimmed.toUpperCase(), exchange: defaultExchange.trim().toUpperCase() };
  }
  return {
    exchange: trimmed.slice(0, idx).trim().toUpperCase(),
    symbol: trimmed.slice(idx + 1).trim().toUpperCase(),
  };
}

export function resolveInstruments(tickers: string[], defaultExchange: string): Instrument[] {
  const seen = new Set<string>();
  const out: Instrument[] = [];
  for (const entry of tickers) {
    const instrument = parseInstrument(entry, defaultExchange);
    if (!instrument.symbol || !instrument.exchange) {
      throw new ConfigError(`Invalid ticker entry: "${entry}"`);
    }
    if (seen.has(instrument.symbol)) {
      throw new ConfigError(`Duplicate ticker: ${instrument.symbol}`);
    }
    seen.add(instrument.symbol);
    out.push(instrument);
  }
  return out;
}
