import { ok } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure } from './errors';
import type { FormatError } from './errors';
import { checkLabel, MAX_HANDLE_LENGTH } from './handle';

/** Longest NSID: a full domain authority, a dot, and a 63-character name. */
export const MAX_NSID_LENGTH = 317;

const MAX_NAME_LENGTH = 63;

/**
 * A parsed namespaced identifier such as `com.example.feed.post`.
 *
 * The authority is the reversed domain (`com.example.feed`), normalized to
 * lowercase; the name (`post`) keeps its case.
 */
export interface Nsid {
  readonly authority: string;
  readonly name: string;
  /** Canonical `${authority}.${name}` form. */
  readonly nsid: string;
}

/**
 * Parse an NSID.
 *
 * @example
 * ```typescript
 * const result = parseNsid('COM.Example.fooBar');
 * // result.value.nsid === 'com.example.fooBar'
 * ```
 */
export function parseNsid(raw: string): Result<Nsid, FormatError> {
  if (raw.length === 0) {
    return formatFailure('nsid', 'Empty', 'NSID must not be empty');
  }
  if (raw.length > MAX_NSID_LENGTH) {
    return formatFailure('nsid', 'TooLong', `NSID is longer than ${MAX_NSID_LENGTH} characters`);
  }

  const segments = raw.split('.');
  if (segments.length < 3) {
    return formatFailure('nsid', 'TooFewSegments', 'NSID needs at least three dot-separated segments');
  }

  const name = segments[segments.length - 1];
  const authoritySegments = segments.slice(0, -1);

  for (const segment of authoritySegments) {
    const checked = checkLabel(segment, 'nsid');
    if (!checked.ok) {
      return checked;
    }
  }
  const authority = authoritySegments.join('.');
  if (authority.length > MAX_HANDLE_LENGTH) {
    return formatFailure('nsid', 'TooLong', `NSID authority is longer than ${MAX_HANDLE_LENGTH} characters`);
  }
  if (/^[0-9]/.test(authoritySegments[0])) {
    return formatFailure('nsid', 'TldStartsWithDigit', `first segment "${authoritySegments[0]}" starts with a digit`);
  }

  if (name.length === 0) {
    return formatFailure('nsid', 'EmptyLabel', 'NSID name must not be empty');
  }
  if (name.length > MAX_NAME_LENGTH || !/^[a-zA-Z][a-zA-Z0-9]*$/.test(name)) {
    return formatFailure('nsid', 'BadName', `NSID name "${name}" must be a letter followed by letters or digits`);
  }

  const lowered = authority.toLowerCase();
  return ok({ authority: lowered, name, nsid: `${lowered}.${name}` });
}

/** Validate an NSID and return its canonical form. */
export function validateNsid(raw: string): Result<string, FormatError> {
  const parsed = parseNsid(raw);
  return parsed.ok ? ok(parsed.value.nsid) : parsed;
}

/** Whether `raw` is a valid NSID. */
export function isValidNsid(raw: string): boolean {
  return parseNsid(raw).ok;
}
