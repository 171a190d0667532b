import { ok } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure } from './errors';
import type { FormatError } from './errors';
import { parseTid } from './tid';
import type { Tid } from './tid';

/** Maximum record key length in UTF-8 bytes. */
export const MAX_RECORD_KEY_LENGTH = 512;

const encoder = new TextEncoder();

/**
 * A record key, classified by shape: the literal `self`, a key that parses
 * as a TID, or anything else.
 */
export type RecordKey =
  | { readonly kind: 'self'; readonly key: 'self' }
  | { readonly kind: 'tid'; readonly key: string; readonly tid: Tid }
  | { readonly kind: 'custom'; readonly key: string };

/**
 * Parse a record key. Any string of 1-512 bytes without `/` is a key,
 * except `.` and `..`.
 */
export function parseRecordKey(raw: string): Result<RecordKey, FormatError> {
  if (raw.length === 0) {
    return formatFailure('record-key', 'Empty', 'record key must not be empty');
  }
  const bytes = encoder.encode(raw).length;
  if (bytes > MAX_RECORD_KEY_LENGTH) {
    return formatFailure('record-key', 'TooLong', `record key is ${bytes} bytes, more than ${MAX_RECORD_KEY_LENGTH}`);
  }
  if (raw.includes('/')) {
    return formatFailure('record-key', 'InvalidCharacter', 'record key must not contain "/"');
  }
  if (raw === '.' || raw === '..') {
    return formatFailure('record-key', 'ReservedName', `"${raw}" is not a usable record key`);
  }

  const tid = parseTid(raw);
  const key: RecordKey =
    raw === 'self'
      ? { kind: 'self', key: 'self' }
      : tid.ok
        ? { kind: 'tid', key: raw, tid: tid.value }
        : { kind: 'custom', key: raw };
  return ok(key);
}

/** Validate a record key, returning it unchanged on success. */
export function validateRecordKey(raw: string): Result<string, FormatError> {
  const parsed = parseRecordKey(raw);
  return parsed.ok ? ok(parsed.value.key) : parsed;
}

/** Whether `raw` is a valid record key. */
export function isValidRecordKey(raw: string): boolean {
  return parseRecordKey(raw).ok;
}
