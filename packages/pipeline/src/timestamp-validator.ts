import { InvalidTimestampError, TimestampOutOfWindowError } from '@history-injector/core';

const DAY_MS = 86_400_000;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

// Outside ±8.64e15 ms a Date is invalid and every comparison against it is false.
function checkedDate(ms: number, raw: string | number): Date {
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) throw new InvalidTimestampError(raw);
  return date;
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone === 'Z' || zone === 'z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) return Number.NaN;
  return sign * (hours * 60 + minutes);
}

/**
 * Parses an ISO 8601 date or date-time into a UTC instant. Values without a
 * zone are UTC; a bare date is midnight UTC. Numbers are epoch seconds.
 */
export function parseTimestamp(raw: string | number): Date {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) throw new InvalidTimestampError(raw);
    return checkedDate(Math.round(raw * 1000), raw);
  }

  const match = ISO_PATTERN.exec(raw.trim());
  if (!match) throw new InvalidTimestampError(raw);

  const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '', zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(fraction.padEnd(3, '0').slice(0, 3));

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    throw new InvalidTimestampError(raw);
  }

  const local = checkedDate(Date.UTC(year, month - 1, day, hour, minute, second, millis), raw);
  // Date.UTC rolls Feb 30 over into March; reject instead.
  if (local.getUTCFullYear() !== year || local.getUTCMonth() !== month - 1 || local.getUTCDate() !== day) {
    throw new InvalidTimestampError(raw);
  }

  const offset = offsetMinutes(zone);
  if (Number.isNaN(offset)) throw new InvalidTimestampError(raw);
  return checkedDate(local.getTime() - offset * 60_000, raw);
}

export interface TimestampWindowOptions {
  maxTimestampOffsetDays: number;
  clockSkewToleranceMs?: number;
  now?: () => Date;
}

export interface TimestampWindow {
  start: Date;
  end: Date;
}

export class TimestampValidator {
  private readonly now: () => Date;

  constructor(private readonly options: TimestampWindowOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /** `[now - max offset, now + skew tolerance]`, inclusive at both ends. */
  window(): TimestampWindow {
    const now = this.now().getTime();
    return {
      start: new Date(now - this.options.maxTimestampOffsetDays * DAY_MS),
      end: new Date(now + (this.options.clockSkewToleranceMs ?? 0)),
    };
  }

  validate(raw: string | number): Date {
    const timestamp = parseTimestamp(raw);
    const { start, end } = this.window();
    if (timestamp.getTime() < start.getTime() || timestamp.getTime() > end.getTime()) {
      throw new TimestampOutOfWindowError(timestamp, start, end);
    }
    return timestamp;
  }
}
