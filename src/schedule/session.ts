import { parseTimeOfDay, secondsOfDay, wallClock } from '../core/clock.js';
import type { CrosswatchConfig, Resolution } from '../core/config.js';

export type SessionPhase = 'before_open' | 'high_frequency' | 'low_frequency' | 'closed';

export type NextTick = {
  delayMs: number;
  wakeAt: Date;
};

export type SessionSettings = {
  timeZone: string;
  /** seconds since local midnight */
  openSeconds: number;
  closeSeconds: number;
  tradingDays: number[];
  waitFloorSeconds: number;
  highFrequencyIntervalSeconds: number;
  highFrequencyDurationSeconds: number;
  highFrequencyResolution: Resolution;
  gridMinutes: number;
  minSleepSeconds: number;
  lowFrequencyResolution: Resolution;
};

export function sessionSettingsFromConfig(config: CrosswatchConfig): SessionSettings {
  const open = parseTimeOfDay(config.session.open);
  const close = parseTimeOfDay(config.session.close);
  if (open === null || close === null) {
    throw new RangeError(`Invalid session hours ${config.session.open}-${config.session.close}`);
  }
  const hf = config.polling.highFrequency;
  const lf = config.polling.lowFrequency;
  return {
    timeZone: config.session.timeZone,
    openSeconds: open,
    closeSeconds: close,
    tradingDays: config.session.tradingDays,
    waitFloorSeconds: config.session.waitFloorSeconds,
    highFrequencyIntervalSeconds: hf.intervalSeconds,
    highFrequencyDurationSeconds: hf.durationMinutes * 60,
    highFrequencyResolution: hf.resolution,
    gridMinutes: lf.gridMinutes,
    minSleepSeconds: lf.minSleepSeconds,
    lowFrequencyResolution: lf.resolution,
  };
}

function after(now: Date, seconds: number): NextTick {
  const delayMs = Math.round(seconds * 1000);
  return { delayMs, wakeAt: new Date(now.getTime() + delayMs) };
}

/**
 * Maps wall-clock time in the market's zone to a polling phase and cadence.
 * Stateless; every call re-derives from `now`.
 */
export class SessionPolicy {
  constructor(readonly settings: SessionSettings) {}

  static fromConfig(config: CrosswatchConfig): SessionPolicy {
    return new SessionPolicy(sessionSettingsFromConfig(config));
  }

  phase(now: Date): SessionPhase {
    const s = this.settings;
    if (!s.tradingDays.includes(wallClock(now, s.timeZone).weekday)) {
      return 'closed';
    }
    const t = secondsOfDay(now, s.timeZone);
    if (t < s.openSeconds) return 'before_open';
    if (t < s.openSeconds + s.highFrequencyDurationSeconds && t <= s.closeSeconds) {
      return 'high_frequency';
    }
    if (t <= s.closeSeconds) return 'low_frequency';
    return 'closed';
  }

  resolutionFor(phase: SessionPhase): Resolution | null {
    if (phase === 'high_frequency') return this.settings.highFrequencyResolution;
    if (phase === 'low_frequency') return this.settings.lowFrequencyResolution;
    return null;
  }

  /**
   * First multiple of the grid strictly after `now`: 14:07 → 14:10, 14:10 → 14:20.
   */
  nextGridBoundary(now: Date): Date {
    const gridSeconds = this.settings.gridMinutes * 60;
    const t = secondsOfDay(now, this.settings.timeZone);
    let boundary = (Math.floor(t / gridSeconds) + 1) * gridSeconds;
    if (boundary <= t) {
      boundary += gridSeconds;
    }
    return new Date(now.getTime() + Math.round((boundary - t) * 1000));
  }

  secondsUntilOpen(now: Date): number {
    return this.settings.openSeconds - secondsOfDay(now, this.settings.timeZone);
  }

  /**
   * How long to sleep before the next iteration. For low-frequency polling the
   * grid boundary is taken from `tickStartedAt` and the delay measured from `now`,
   * so time spent fetching is deducted.
   */
  nextTick(now: Date, phase: SessionPhase, tickStartedAt: Date = now): NextTick | null {
    const s = this.settings;
    switch (phase) {
      case 'before_open':
        return after(now, Math.max(s.waitFloorSeconds, this.secondsUntilOpen(now)));
      case 'high_frequency':
        return after(now, s.highFrequencyIntervalSeconds);
      case 'low_frequency': {
        const boundary = this.nextGridBoundary(tickStartedAt);
        const untilBoundary = (boundary.getTime() - now.getTime()) / 1000;
        return after(now, Math.max(s.minSleepSeconds, untilBoundary));
      }
      case 'closed':
        return null;
    }
  }
}
