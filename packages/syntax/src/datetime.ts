import { ok } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure } from './errors';
import type { FormatError } from './errors';

/** An RFC 3339 timestamp with an explicit offset. */
export interface Datetime {
  /** Canonical form: uppercase `T` and `Z`, the input's digits otherwise. */
  readonly datetime: string;
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  /** Fractional-second digits as written, without the dot. */
  readonly fraction?: string;
  /** `Z` or `+hh:mm` / `-hh:mm`. */
  readonly offset: string;
  /** Milliseconds since the Unix epoch, fraction truncated. */
  readonly epochMillis: number;
}

const PATTERN = /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})?$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse an RFC 3339 datetime. The offset is mandatory and `-00:00`
 * (unknown local offset) is rejected.
 *
 * @example
 * ```typescript
 * parseDatetime('1985-04-12t23:20:50.52z'); // datetime: '1985-04-12T23:20:50.52Z'
 * parseDatetime('1985-04-12T23:20:50');     // rule: 'MissingTimezone'
 * ```
 */
export function parseDatetime(raw: string): Result<Datetime, FormatError> {
  if (raw.length === 0) {
    return formatFailure('datetime', 'Empty', 'datetime must not be empty');
  }
  const match = PATTERN.exec(raw);
  if (!match) {
    return formatFailure('datetime', 'BadSyntax', `"${raw}" is not an RFC 3339 datetime`);
  }
  const [, y, mo, d, h, mi, s, fraction, rawOffset] = match;
  if (rawOffset === undefined) {
    return formatFailure('datetime', 'MissingTimezone', 'datetime needs a "Z" or numeric offset');
  }
  if (rawOffset === '-00:00') {
    return formatFailure('datetime', 'UnknownLocalOffset', '"-00:00" means an unknown offset and is not accepted');
  }

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (month < 1 || month > 12) {
    return formatFailure('datetime', 'FieldOutOfRange', `month ${mo} is out of range`);
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return formatFailure('datetime', 'FieldOutOfRange', `day ${d} is out of range for ${y}-${mo}`);
  }
  if (hour > 23 || minute > 59 || second > 60) {
    return formatFailure('datetime', 'FieldOutOfRange', `time ${h}:${mi}:${s} is out of range`);
  }

  const offset = rawOffset.toUpperCase();
  let offsetMinutes = 0;
  if (offset !== 'Z') {
    const offsetHours = Number(offset.slice(1, 3));
    const offsetMins = Number(offset.slice(4, 6));
    if (offsetHours > 23 || offsetMins > 59) {
      return formatFailure('datetime', 'FieldOutOfRange', `offset ${offset} is out of range`);
    }
    offsetMinutes = (offset.startsWith('-') ? -1 : 1) * (offsetHours * 60 + offsetMins);
  }

  const millis = fraction === undefined ? 0 : Number(fraction.slice(0, 3).padEnd(3, '0'));
  // Date.UTC maps years 0-99 onto 1900-1999, so set the year separately.
  const utc = new Date(Date.UTC(2000, month - 1, day, hour, minute, Math.min(second, 59), millis));
  utc.setUTCFullYear(year, month - 1, day);
  const epochMillis = utc.getTime() - offsetMinutes * 60_000;

  const datetime = `${y}-${mo}-${d}T${h}:${mi}:${s}${fraction === undefined ? '' : `.${fraction}`}${offset}`;
  return ok({ datetime, year, month, day, hour, minute, second, fraction, offset, epochMillis });
}

/** Validate a datetime and return its canonical form. */
export function validateDatetime(raw: string): Result<string, FormatError> {
  const parsed = parseDatetime(raw);
  return parsed.ok ? ok(parsed.value.datetime) : parsed;
}

/** Whether `raw` is a valid datetime. */
export function isValidDatetime(raw: string): boolean {
  return parseDatetime(raw).ok;
}
