import { ok, QuireError, QuireErrorCode, debug } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure } from './errors';
import type { FormatError } from './errors';
import { decodeSortable, encodeSortableU64, sortableDigit, SORTABLE_U64_LENGTH } from './encoding';

/** Length of every TID string. */
export const TID_LENGTH = SORTABLE_U64_LENGTH;

/** Largest clock identifier (10 bits). */
export const MAX_CLOCK_ID = 1023;

/** Largest timestamp in microseconds (53 bits). */
export const MAX_TID_TIMESTAMP = Number.MAX_SAFE_INTEGER;

/**
 * A timestamp identifier: 53 bits of microseconds since the Unix epoch and a
 * 10-bit clock identifier, packed into a 64-bit integer whose top bit is 0
 * and written as 13 base32-sortable characters.
 */
export interface Tid {
  readonly tid: string;
  /** The packed 64-bit value. */
  readonly value: bigint;
  /** Microseconds since the Unix epoch. */
  readonly timestamp: number;
  readonly clockId: number;
}

/**
 * Parse a TID string.
 *
 * @example
 * ```typescript
 * const result = parseTid('3kkqvzbva22jz');
 * // result.value.timestamp === 1707228000000000, result.value.clockId === 511
 * ```
 */
export function parseTid(raw: string): Result<Tid, FormatError> {
  if (raw.length === 0) {
    return formatFailure('tid', 'Empty', 'TID must not be empty');
  }
  if (raw.length !== TID_LENGTH) {
    return formatFailure('tid', 'BadLength', `TID must be exactly ${TID_LENGTH} characters, got ${raw.length}`);
  }
  const value = decodeSortable(raw);
  if (value === undefined) {
    return formatFailure('tid', 'InvalidCharacter', 'TID may only contain 234567abcdefghijklmnopqrstuvwxyz');
  }
  // The first character carries the 65th bit; 'j' (digit 15) is the largest allowed.
  if (sortableDigit(raw[0]) > 15) {
    return formatFailure('tid', 'HighBitSet', 'TID does not fit in 64 bits');
  }
  return ok({
    tid: raw,
    value,
    timestamp: Number(value >> 10n),
    clockId: Number(value & 1023n),
  });
}

/** Validate a TID, returning it unchanged on success. */
export function validateTid(raw: string): Result<string, FormatError> {
  const parsed = parseTid(raw);
  return parsed.ok ? ok(parsed.value.tid) : parsed;
}

/** Whether `raw` is a valid TID. */
export function isValidTid(raw: string): boolean {
  return parseTid(raw).ok;
}

/**
 * Encode a timestamp (microseconds) and clock identifier as a TID.
 *
 * @throws {QuireError} CODEC_INVALID_INPUT when either part is out of range.
 */
export function encodeTid(timestamp: number, clockId: number): string {
  if (!Number.isInteger(timestamp) || timestamp < 0 || timestamp > MAX_TID_TIMESTAMP) {
    throw new QuireError(
      QuireErrorCode.CODEC_INVALID_INPUT,
      `TID timestamp must be a non-negative safe integer, at most ${MAX_TID_TIMESTAMP}, got ${timestamp}`,
      { hint: 'Pass microseconds since the Unix epoch, e.g. Date.now() * 1000.' },
    );
  }
  if (!Number.isInteger(clockId) || clockId < 0 || clockId > MAX_CLOCK_ID) {
    throw new QuireError(
      QuireErrorCode.CODEC_INVALID_INPUT,
      `TID clock id must be an integer in 0..${MAX_CLOCK_ID}, got ${clockId}`,
    );
  }
  return encodeSortableU64((BigInt(timestamp) << 10n) | BigInt(clockId));
}

/** Options for {@link TidGenerator}. */
export interface TidGeneratorOptions {
  /** Clock identifier stamped into every TID. Defaults to 0. */
  clockId?: number;
  /** Current time in microseconds. Defaults to `Date.now() * 1000`. */
  now?: () => number;
}

/**
 * Produces strictly increasing TIDs for one clock.
 *
 * When the clock stands still or runs backwards the generator steps one
 * microsecond past the last TID it issued.
 *
 * @example
 * ```typescript
 * const tids = new TidGenerator({ clockId: 7 });
 * const a = tids.next();
 * const b = tids.next(); // b > a
 * ```
 */
export class TidGenerator {
  private readonly clockId: number;
  private readonly now: () => number;
  private last = -1;

  constructor(options?: TidGeneratorOptions) {
    this.clockId = options?.clockId ?? 0;
    this.now = options?.now ?? ((): number => Date.now() * 1000);
    if (!Number.isInteger(this.clockId) || this.clockId < 0 || this.clockId > MAX_CLOCK_ID) {
      throw new QuireError(
        QuireErrorCode.CODEC_INVALID_INPUT,
        `TID clock id must be an integer in 0..${MAX_CLOCK_ID}, got ${this.clockId}`,
      );
    }
  }

  next(): string {
    let timestamp = this.now();
    if (timestamp <= this.last) {
      if (timestamp < this.last) {
        debug.syntax.warn(`clock moved backwards by ${this.last - timestamp}us; continuing from last TID`);
      }
      timestamp = this.last + 1;
    }
    this.last = timestamp;
    return encodeTid(timestamp, this.clockId);
  }
}
