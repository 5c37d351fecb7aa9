#!/usr/bin/env node
import 'dotenv/config';
/**
 * crosswatch CLI
 *
 * Runs the session-aware moving-average crossover monitor.
 */

import { Command, Option } from 'commander';
import yaml from 'yaml';

import { VERSION } from '../index.js';
import { SystemClock, formatTimestamp } from '../core/clock.js';
import { ConfigError, RESOLUTIONS, loadConfig, type CrosswatchConfig, type Resolution } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { fetchWithRetry } from '../quotes/fetcher.js';
import { createQuoteSource } from '../quotes/tradingview.js';
import { parseInstrument } from '../quotes/types.js';
import { SignalPoller } from '../schedule/poller.js';
import { SessionPolicy } from '../schedule/session.js';
import { CsvSignalLog } from '../signals/log.js';

type GlobalOptions = { config?: string };

function readConfig(program: Command): CrosswatchConfig {
  const opts = program.opts<GlobalOptions>();
  return loadConfig(opts.config);
}

function parseTickers(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const program = new Command();

program
  .name('crosswatch')
  .description('Session-aware moving-average crossover monitor')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config.yaml');

program
  .command('run')
  .description('Preload history and poll until the market closes')
  .option('--tickers <list>', 'Comma-separated tickers (overrides config)', parseTickers)
  .option('--log-file <path>', 'Signal CSV path (overrides config)')
  .option('--no-preload', 'Skip warming the moving-average windows')
  .action(async (options: { tickers?: string[]; logFile?: string; preload: boolean }) => {
    const config = readConfig(program);
    if (options.tickers && options.tickers.length > 0) {
      config.tickers = options.tickers;
    }
    if (options.logFile) {
      config.signalLog.path = options.logFile;
    }
    if (!options.preload) {
      config.preload.enabled = false;
    }

    const logger = new Logger(config.logging.level);
    const signalLog = new CsvSignalLog(config.signalLog.path, config.session.timeZone);
    signalLog.ensureHeader();

    const poller = new SignalPoller({
      config,
      source: createQuoteSource(config),
      signalLog,
      clock: new SystemClock(),
      logger,
    });

    const shutdown = () => {
      logger.info('Shutdown requested; stopping after the current step.');
      poller.stop();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    const summary = await poller.run();
    logger.info(
      `Stopped (${summary.endedBy}) after ${summary.ticks} tick(s); ${summary.recordsWritten} signal change(s) written to ${config.signalLog.path}`
    );
  });

program
  .command('phase')
  .description('Show the session phase and next wake time')
  .option('--at <iso>', 'Evaluate at this instant instead of now')
  .action((options: { at?: string }) => {
    const config = readConfig(program);
    const policy = SessionPolicy.fromConfig(config);
    const now = options.at ? new Date(options.at) : new Date();
    if (Number.isNaN(now.getTime())) {
      throw new ConfigError(`Invalid --at value: ${options.at}`);
    }
    const tz = config.session.timeZone;
    const phase = policy.phase(now);
    const next = policy.nextTick(now, phase);
    console.log(`Time:       ${formatTimestamp(now, tz)} (${tz})`);
    console.log(`Phase:      ${phase}`);
    console.log(`Resolution: ${policy.resolutionFor(phase) ?? '-'}`);
    console.log(
      `Next wake:  ${next ? `${formatTimestamp(next.wakeAt, tz)} (in ${Math.round(next.delayMs / 1000)}s)` : '-'}`
    );
  });

program
  .command('quote <ticker>')
  .description('Fetch the last price once, with rate-limit retries')
  .addOption(
    new Option('-r, --resolution <resolution>', 'Bar resolution').choices([...RESOLUTIONS]).default('1m')
  )
  .action(async (ticker: string, options: { resolution: Resolution }) => {
    const config = readConfig(program);
    const logger = new Logger(config.logging.level);
    const instrument = parseInstrument(ticker, config.defaultExchange);
    const result = await fetchWithRetry(createQuoteSource(config), instrument, options.resolution, {
      retries: config.quotes.retries,
      retryDelayMs: config.quotes.retryDelaySeconds * 1000,
      clock: new SystemClock(),
      logger,
    });
    if (result.ok) {
      console.log(`${instrument.exchange}:${instrument.symbol} ${options.resolution} ${result.price.toFixed(2)}`);
    } else {
      console.log(`${instrument.exchange}:${instrument.symbol}: ${result.kind} (${result.message})`);
      process.exitCode = 1;
    }
  });

program
  .command('config')
  .description('Print the resolved configuration')
  .action(() => {
    const config = readConfig(program);
    console.log(yaml.stringify(config).trimEnd());
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error(error instanceof Error ? error.stack ?? error.message : String(error));
  }
  process.exitCode = 1;
});
