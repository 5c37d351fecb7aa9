import { describe, it, expect, vi } from 'vitest';

import { Logger } from '../../src/core/logger.js';
import { fetchWithRetry } from '../../src/quotes/fetcher.js';
import type { QuoteResult, QuoteSource } from '../../src/quotes/types.js';
import { ManualClock } from '../helpers/manual_clock.js';

const instrument = { symbol: 'TSLA', exchange: 'NASDAQ' };
const rateLimited: QuoteResult = { ok: false, kind: 'rate_limited', message: 'HTTP 429' };

function sourceFrom(...results: QuoteResult[]) {
  const fetchLastPrice = vi.fn(async () => results.shift() ?? rateLimited);
  const source: QuoteSource = { name: 'stub', fetchLastPrice };
  return { source, fetchLastPrice };
}

function setup() {
  const clock = new ManualClock('2026-10-19T14:00:00Z');
  const lines: string[] = [];
  const logger = new Logger('debug', (line) => lines.push(line));
  return { clock, logger, lines };
}

describe('fetchWithRetry', () => {
  it('returns the price from the first successful attempt', async () => {
    const { clock, logger } = setup();
    const { source, fetchLastPrice } = sourceFrom({ ok: true, price: 251.3 });
    const result = await fetchWithRetry(source, instrument, '1m', {
      retries: 3,
      retryDelayMs: 5000,
      clock,
      logger,
    });
    expect(result).toEqual({ ok: true, price: 251.3, attempts: 1 });
    expect(fetchLastPrice).toHaveBeenCalledWith(instrument, '1m', undefined);
    expect(clock.sleeps).toEqual([]);
  });

  it('calls an always rate-limited source exactly `retries` times', async () => {
    const { clock, logger, lines } = setup();
    const { source, fetchLastPrice } = sourceFrom();
    const result = await fetchWithRetry(source, instrument, '15m', {
      retries: 3,
      retryDelayMs: 5000,
      clock,
      logger,
    });
    expect(fetchLastPrice).toHaveBeenCalledTimes(3);
    expect(result).toEqual({ ok: false, kind: 'rate_limited', message: 'HTTP 429', attempts: 3 });
    expect(clock.sleeps).toEqual([5000, 5000]);
    expect(lines.at(-1)).toContain('TSLA: failed after 3 attempt(s) due to rate limits.');
  });

  it('recovers when a retry succeeds', async () => {
    const { clock, logger } = setup();
    const { source } = sourceFrom(rateLimited, { ok: true, price: 10 });
    const result = await fetchWithRetry(source, instrument, '1m', {
      retries: 3,
      retryDelayMs: 5000,
      clock,
      logger,
    });
    expect(result).toEqual({ ok: true, price: 10, attempts: 2 });
    expect(clock.sleeps).toEqual([5000]);
  });

  it('does not retry other failures', async () => {
    const { clock, logger } = setup();
    const { source, fetchLastPrice } = sourceFrom({ ok: false, kind: 'unavailable', message: 'HTTP 500' });
    const result = await fetchWithRetry(source, instrument, '1m', {
      retries: 3,
      retryDelayMs: 5000,
      clock,
      logger,
    });
    expect(fetchLastPrice).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ ok: false, kind: 'unavailable', message: 'HTTP 500', attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it('treats a thrown error as unavailable', async () => {
    const { clock, logger } = setup();
    const source: QuoteSource = {
      name: 'throws',
      fetchLastPrice: vi.fn(async () => {
        throw new Error('socket hang up');
      }),
    };
    const result = await fetchWithRetry(source, instrument, '1m', {
      retries: 3,
      retryDelayMs: 5000,
      clock,
      logger,
    });
    expect(result).toEqual({ ok: false, kind: 'unavailable', message: 'socket hang up', attempts: 1 });
  });

  it('stops retrying once aborted', async () => {
    const { clock, logger } = setup();
    const controller = new AbortController();
    const fetchLastPrice = vi.fn(async (): Promise<QuoteResult> => {
      controller.abort();
      return rateLimited;
    });
    const result = await fetchWithRetry({ name: 'stub', fetchLastPrice }, instrument, '1m', {
      retries: 3,
      retryDelayMs: 5000,
      clock,
      logger,
      signal: controller.signal,
    });
    expect(fetchLastPrice).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(1);
  });
});
