import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { isValidTimeZone, parseTimeOfDay } from './clock.js';
import { isLogLevel } from './logger.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const RESOLUTIONS = ['1m', '5m', '15m', '30m', '1h', '4h', '1d'] as const;

const ResolutionSchema = z.enum(RESOLUTIONS);

const TimeOfDaySchema = z
  .string()
  .refine((value) => parseTimeOfDay(value) !== null, { message: 'expected HH:MM' });

const ConfigSchema = z
  .object({
    tickers: z.array(z.string().min(1)).min(1).default(['TSLA', 'MSFT', 'NVDA', 'PLTR']),
    defaultExchange: z.string().min(1).default('NASDAQ'),
    strategy: z
      .object({
        shortPeriod: z.number().int().positive().default(5),
        longPeriod: z.number().int().positive().default(15),
      })
      .default({}),
    session: z
      .object({
        timeZone: z
          .string()
          .default('America/New_York')
          .refine(isValidTimeZone, { message: 'unknown time zone' }),
        open: TimeOfDaySchema.default('09:30'),
        close: TimeOfDaySchema.default('16:00'),
        tradingDays: z.array(z.number().int().min(0).max(6)).default([1, 2, 3, 4, 5]),
        waitFloorSeconds: z.number().nonnegative().default(30),
      })
      .default({}),
    polling: z
      .object({
        highFrequency: z
          .object({
            intervalSeconds: z.number().positive().default(60),
            durationMinutes: z.number().nonnegative().default(30),
            resolution: ResolutionSchema.default('1m'),
          })
          .default({}),
        lowFrequency: z
          .object({
            gridMinutes: z.number().int().positive().max(1440).default(10),
            minSleepSeconds: z.number().nonnegative().default(5),
            resolution: ResolutionSchema.default('15m'),
          })
          .default({}),
        instrumentDelaySeconds: z.number().nonnegative().default(1),
      })
      .default({}),
    preload: z
      .object({
        enabled: z.boolean().default(true),
        delaySeconds: z.number().nonnegative().default(1.5),
      })
      .default({}),
    quotes: z
      .object({
        provider: z.enum(['tradingview']).default('tradingview'),
        baseUrl: z.string().url().default('https://scanner.tradingview.com'),
        screener: z.string().min(1).default('america'),
        timeoutMs: z.number().positive().default(10_000),
        retries: z.number().int().positive().default(3),
        retryDelaySeconds: z.number().nonnegative().default(5),
      })
      .default({}),
    signalLog: z
      .object({
        path: z.string().min(1).default('tradingview_signals.csv'),
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      })
      .default({}),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.strategy.shortPeriod > cfg.strategy.longPeriod) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['strategy', 'shortPeriod'],
        message: 'shortPeriod must not exceed longPeriod',
      });
    }
    const open = parseTimeOfDay(cfg.session.open);
    const close = parseTimeOfDay(cfg.session.close);
    if (open !== null && close !== null && open >= close) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['session', 'close'],
        message: 'close must be after open',
      });
    }
  });

export type CrosswatchConfig = z.infer<typeof ConfigSchema>;
export type Resolution = z.infer<typeof ResolutionSchema>;

export function defaultConfigPath(): string {
  return join(homedir(), '.crosswatch', 'config.yaml');
}

export function parseConfig(input: unknown): CrosswatchConfig {
  const result = ConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  return result.data;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): CrosswatchConfig {
  const explicit = configPath ?? env.CROSSWATCH_CONFIG_PATH;
  const path = expandHome(explicit ?? defaultConfigPath());

  let parsed: unknown = {};
  if (explicit || existsSync(path)) {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read config ${path}: ${reason}`);
    }
    parsed = yaml.parse(raw) ?? {};
  }

  const cfg = parseConfig(parsed);

  const envLevel = env.CROSSWATCH_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    cfg.logging.level = envLevel;
  }
  if (env.CROSSWATCH_SIGNAL_LOG) {
    cfg.signalLog.path = env.CROSSWATCH_SIGNAL_LOG;
  }
  cfg.signalLog.path = expandHome(cfg.signalLog.path);

  return cfg;
}
