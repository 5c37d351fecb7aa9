import fetch from 'node-fetch';
import { z } from 'zod';

import type { CrosswatchConfig } from '../core/config.js';
import { instrumentKey, type Instrument, type QuoteResult, type QuoteSource, type Resolution } from './types.js';

const COLUMN_SUFFIX: Record<Resolution, string> = {
  '1m': '|1',
  '5m': '|5',
  '15m': '|15',
  '30m': '|30',
  '1h': '|60',
  '4h': '|240',
  '1d': '',
};

const ScanResponseSchema = z.object({
  totalCount: z.number().optional(),
  data: z
    .array(
      z.object({
        s: z.string(),
        d: z.array(z.union([z.number(), z.string(), z.null()])),
      })
    )
    .nullable()
    .default([]),
});

export function closeColumn(resolution: Resolution): string {
  return `close${COLUMN_SUFFIX[resolution]}`;
}

/**
 * Scanner-endpoint quote source. One POST per fetch; HTTP 429 maps to
 * `rate_limited`, every other failure to `unavailable`.
 */
export class TradingViewQuoteSource implements QuoteSource {
  readonly name = 'tradingview';
  private baseUrl: string;
  private screener: string;
  private timeoutMs: number;

  constructor(config: CrosswatchConfig) {
    this.baseUrl = config.quotes.baseUrl.replace(/\/$/, '');
    this.screener = config.quotes.screener;
    this.timeoutMs = config.quotes.timeoutMs;
  }

  async fetchLastPrice(
    instrument: Instrument,
    resolution: Resolution,
    signal?: AbortSignal
  ): Promise<QuoteResult> {
    const ticker = instrumentKey(instrument);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/${this.screener}/scan`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          symbols: { tickers: [ticker], query: { types: [] } },
          columns: [closeColumn(resolution)],
        }),
        signal: controller.signal,
      });

      if (response.status === 429) {
        return { ok: false, kind: 'rate_limited', message: `${ticker}: HTTP 429 Too Many Requests` };
      }
      if (!response.ok) {
        return { ok: false, kind: 'unavailable', message: `${ticker}: HTTP ${response.status}` };
      }

      const parsed = ScanResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { ok: false, kind: 'unavailable', message: `${ticker}: unexpected scanner payload` };
      }
      const row = (parsed.data.data ?? []).find((item) => item.s === ticker);
      const price = row?.d[0];
      if (typeof price !== 'number' || !Number.isFinite(price) || price <= 0) {
        return { ok: false, kind: 'unavailable', message: `${ticker}: no price in scanner response` };
      }
      return { ok: true, price };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, kind: 'unavailable', message: `${ticker}: ${message}` };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

export function createQuoteSource(config: CrosswatchConfig): QuoteSource {
  switch (config.quotes.provider) {
    case 'tradingview':
      return new TradingViewQuoteSource(config);
  }
}
