import { appendFileSync, existsSync, mkdirSync, statSync } from 'node:fs';
import { dirname } from 'node:path';

import { formatTimestamp } from '../core/clock.js';
import type { SignalRecord } from './types.js';

export interface SignalLog {
  append(record: SignalRecord): Promise<void>;
}

export const SIGNAL_LOG_HEADER = ['Timestamp', 'Ticker', 'Price', 'Short_MA', 'Long_MA', 'Signal'];

function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvRow(fields: string[]): string {
  return `${fields.map(csvField).join(',')}\r\n`;
}

export function formatSignalRow(record: SignalRecord, timeZone: string): string[] {
  return [
    formatTimestamp(record.timestamp, timeZone),
    record.instrument.symbol,
    record.price.toFixed(2),
    record.shortAvg.toFixed(2),
    record.longAvg.toFixed(2),
    record.signal,
  ];
}

/**
 * Append-only CSV file. The header is written when the file is missing or empty.
 */
export class CsvSignalLog implements SignalLog {
  constructor(
    readonly path: string,
    private timeZone: string
  ) {}

  ensureHeader(): void {
    if (existsSync(this.path) && statSync(this.path).size > 0) return;
    mkdirSync(dirname(this.path), { recursive: true });
    appendFileSync(this.path, toCsvRow(SIGNAL_LOG_HEADER), 'utf-8');
  }

  async append(record: SignalRecord): Promise<void> {
    this.ensureHeader();
    appendFileSync(this.path, toCsvRow(formatSignalRow(record, this.timeZone)), 'utf-8');
  }
}
