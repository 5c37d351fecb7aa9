import { mkdtempSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';

import { ConfigError, loadConfig, parseConfig } from '../../src/core/config.js';
import { resolveInstruments } from '../../src/quotes/types.js';

function writeConfig(body: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'crosswatch-config-'));
  const path = join(dir, 'config.yaml');
  writeFileSync(path, body);
  return path;
}

describe('parseConfig', () => {
  it('fills every default', () => {
    const cfg = parseConfig({});
    expect(cfg.tickers).toEqual(['TSLA', 'MSFT', 'NVDA', 'PLTR']);
    expect(cfg.strategy).toEqual({ shortPeriod: 5, longPeriod: 15 });
    expect(cfg.session).toEqual({
      timeZone: 'America/New_York',
      open: '09:30',
      close: '16:00',
      tradingDays: [1, 2, 3, 4, 5],
      waitFloorSeconds: 30,
    });
    expect(cfg.polling.highFrequency).toEqual({ intervalSeconds: 60, durationMinutes: 30, resolution: '1m' });
    expect(cfg.polling.lowFrequency).toEqual({ gridMinutes: 10, minSleepSeconds: 5, resolution: '15m' });
    expect(cfg.quotes.retries).toBe(3);
    expect(cfg.quotes.retryDelaySeconds).toBe(5);
    expect(cfg.preload).toEqual({ enabled: true, delaySeconds: 1.5 });
    expect(cfg.signalLog.path).toBe('tradingview_signals.csv');
  });

  it('rejects a short period longer than the long period', () => {
    expect(() => parseConfig({ strategy: { shortPeriod: 20, longPeriod: 15 } })).toThrow(
      'strategy.shortPeriod: shortPeriod must not exceed longPeriod'
    );
  });

  it('rejects a close before the open', () => {
    expect(() => parseConfig({ session: { open: '16:00', close: '09:30' } })).toThrow(ConfigError);
  });

  it('rejects malformed times and unknown zones', () => {
    try {
      parseConfig({ session: { open: '9h30', timeZone: 'Mars/Olympus' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = (error as ConfigError).issues;
      expect(issues).toContain('session.open: expected HH:MM');
      expect(issues).toContain('session.timeZone: unknown time zone');
    }
  });
});

describe('loadConfig', () => {
  it('reads YAML and applies environment overrides', () => {
    const path = writeConfig(
      ['tickers: [AAPL, "NYSE:IBM"]', 'strategy:', '  shortPeriod: 3', '  longPeriod: 9'].join('\n')
    );
    const cfg = loadConfig(path, {
      CROSSWATCH_LOG_LEVEL: 'DEBUG',
      CROSSWATCH_SIGNAL_LOG: '~/signals/out.csv',
    });
    expect(cfg.tickers).toEqual(['AAPL', 'NYSE:IBM']);
    expect(cfg.strategy).toEqual({ shortPeriod: 3, longPeriod: 9 });
    expect(cfg.logging.level).toBe('debug');
    expect(cfg.signalLog.path).toBe(join(homedir(), 'signals', 'out.csv'));
  });

  it('treats an empty file as all defaults', () => {
    const cfg = loadConfig(writeConfig(''), {});
    expect(cfg.defaultExchange).toBe('NASDAQ');
  });

  it('fails when an explicit path is missing', () => {
    expect(() => loadConfig(join(tmpdir(), 'crosswatch-missing', 'nope.yaml'), {})).toThrow(ConfigError);
  });
});

describe('resolveInstruments', () => {
  it('applies the default exchange and keeps order', () => {
    expect(resolveInstruments(['tsla', 'NYSE:ibm'], 'NASDAQ')).toEqual([
      { symbol: 'TSLA', exchange: 'NASDAQ' },
      { symbol: 'IBM', exchange: 'NYSE' },
    ]);
  });

  it('rejects duplicates and empty symbols', () => {
    expect(() => resolveInstruments(['TSLA', 'tsla'], 'NASDAQ')).toThrow('Duplicate ticker: TSLA');
    expect(() => resolveInstruments(['NYSE:'], 'NASDAQ')).toThrow(ConfigError);
  });
});
