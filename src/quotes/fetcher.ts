import type { Clock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import type { Instrument, QuoteResult, QuoteSource, Resolution } from './types.js';

export type RetryOptions = {
  retries: number;
  retryDelayMs: number;
  clock: Clock;
  logger?: Logger;
  signal?: AbortSignal;
};

export type FetchOutcome = QuoteResult & { attempts: number };

async function attempt(
  source: QuoteSource,
  instrument: Instrument,
  resolution: Resolution,
  signal?: AbortSignal
): Promise<QuoteResult> {
  try {
    return await source.fetchLastPrice(instrument, resolution, signal);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, kind: 'unavailable', message };
  }
}

/**
 * Rate-limited attempts are retried up to `retries` total calls with a fixed
 * delay; any other failure returns after the first call.
 */
export async function fetchWithRetry(
  source: QuoteSource,
  instrument: Instrument,
  resolution: Resolution,
  options: RetryOptions
): Promise<FetchOutcome> {
  const { retries, retryDelayMs, clock, logger, signal } = options;
  const symbol = instrument.symbol;
  const maxAttempts = Math.max(1, retries);
  let last: QuoteResult = { ok: false, kind: 'unavailable', message: 'not attempted' };
  let attempts = 0;

  while (attempts < maxAttempts) {
    if (signal?.aborted) break;
    attempts += 1;
    last = await attempt(source, instrument, resolution, signal);
    if (last.ok) {
      return { ...last, attempts };
    }
    if (last.kind !== 'rate_limited') {
      logger?.warn(`${symbol}: error fetching price (${last.message})`);
      return { ...last, attempts };
    }
    if (attempts < maxAttempts) {
      logger?.warn(
        `${symbol}: rate limit hit. Retrying in ${retryDelayMs / 1000}s... (${attempts}/${maxAttempts})`
      );
      await clock.sleep(retryDelayMs, signal);
    }
  }

  if (!last.ok && last.kind === 'rate_limited') {
    logger?.warn(`${symbol}: failed after ${attempts} attempt(s) due to rate limits.`);
  }
  return { ...last, attempts };
}
