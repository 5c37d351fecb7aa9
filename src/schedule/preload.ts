import type { Clock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import type { Instrument, QuoteResult, QuoteSource, Resolution } from '../quotes/types.js';
import type { PriceWindow } from '../signals/window.js';

export type PreloadTarget = {
  instrument: Instrument;
  resolution: Resolution;
  window: PriceWindow;
};

export type PreloadResult = {
  instrument: Instrument;
  resolution: Resolution;
  status: 'filled' | 'rate_limited' | 'unavailable' | 'aborted';
  price?: number;
};

/**
 * One attempt per target, no retries. A filled window holds `capacity` copies of
 * the fetched price so averages are available on the first live tick.
 */
export async function preloadWindows(
  targets: PreloadTarget[],
  params: {
    source: QuoteSource;
    clock: Clock;
    delayMs: number;
    logger: Logger;
    signal?: AbortSignal;
  }
): Promise<PreloadResult[]> {
  const { source, clock, delayMs, logger, signal } = params;
  const results: PreloadResult[] = [];

  for (const target of targets) {
    const { instrument, resolution, window } = target;
    if (signal?.aborted) {
      results.push({ instrument, resolution, status: 'aborted' });
      continue;
    }

    let outcome: QuoteResult;
    try {
      outcome = await source.fetchLastPrice(instrument, resolution, signal);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      outcome = { ok: false, kind: 'unavailable', message };
    }

    if (outcome.ok) {
      window.fill(outcome.price);
      logger.info(`${instrument.symbol}: preloaded ${resolution} MA history with ${outcome.price}`);
      results.push({ instrument, resolution, status: 'filled', price: outcome.price });
    } else if (outcome.kind === 'rate_limited') {
      logger.warn(
        `${instrument.symbol}: skipped ${resolution} preload due to rate limit. MA will build over time.`
      );
      results.push({ instrument, resolution, status: 'rate_limited' });
    } else {
      logger.error(`${instrument.symbol}: error preloading ${resolution} history`, outcome.message);
      results.push({ instrument, resolution, status: 'unavailable' });
    }

    await clock.sleep(delayMs, signal);
  }

  return results;
}
