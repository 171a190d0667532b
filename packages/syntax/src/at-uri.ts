import { ok, err } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure, withFormat } from './errors';
import type { FormatError } from './errors';
import { validateDid } from './did';
import { validateHandle } from './handle';
import { validateNsid } from './nsid';
import { validateRecordKey } from './record-key';

/** Maximum length of an at-uri or generic uri value. */
export const MAX_AT_URI_LENGTH = 8192;

// ─── at-identifier ──────────────────────────────────────────────────────────────

/**
 * Validate an account identifier: a DID or a handle. Returns the DID
 * unchanged or the handle lowercased.
 */
export function validateAtIdentifier(raw: string): Result<string, FormatError> {
  const result = raw.startsWith('did:') ? validateDid(raw) : validateHandle(raw);
  return result.ok ? result : err(withFormat(result.error, 'at-identifier'));
}

/** Whether `raw` is a valid DID or handle. */
export function isValidAtIdentifier(raw: string): boolean {
  return validateAtIdentifier(raw).ok;
}

// ─── at-uri ─────────────────────────────────────────────────────────────────────

/** A parsed `at://` URI naming an account, a collection, or one record. */
export interface AtUri {
  /** Canonical form. */
  readonly uri: string;
  /** DID, or lowercased handle. */
  readonly authority: string;
  readonly collection?: string;
  readonly rkey?: string;
}

/**
 * Parse an `at://authority[/collection[/rkey]]` URI. Query strings,
 * fragments and userinfo are rejected; a single trailing slash is allowed
 * and dropped from the canonical form.
 *
 * @example
 * ```typescript
 * parseAtUri('at://Alice.Example.com/com.example.post/3kkqvzbva22jz');
 * // uri: 'at://alice.example.com/com.example.post/3kkqvzbva22jz'
 * ```
 */
export function parseAtUri(raw: string): Result<AtUri, FormatError> {
  if (raw.length === 0) {
    return formatFailure('at-uri', 'Empty', 'at-uri must not be empty');
  }
  if (raw.length > MAX_AT_URI_LENGTH) {
    return formatFailure('at-uri', 'TooLong', `at-uri is longer than ${MAX_AT_URI_LENGTH} characters`);
  }
  if (!raw.startsWith('at://')) {
    return formatFailure('at-uri', 'BadScheme', 'at-uri must start with "at://"');
  }

  let rest = raw.slice('at://'.length);
  if (rest.includes('?')) {
    return formatFailure('at-uri', 'UnexpectedQuery', 'at-uri must not carry a query string');
  }
  if (rest.includes('#')) {
    return formatFailure('at-uri', 'UnexpectedFragment', 'at-uri must not carry a fragment');
  }
  if (rest.includes('@')) {
    return formatFailure('at-uri', 'UnexpectedCredentials', 'at-uri must not carry credentials');
  }
  if (rest.endsWith('/')) {
    rest = rest.slice(0, -1);
  }

  const segments = rest.split('/');
  if (segments.length > 3 || segments.some((segment) => segment.length === 0)) {
    return formatFailure('at-uri', 'BadPath', 'expected at://authority[/collection[/rkey]]');
  }
  const [rawAuthority, rawCollection, rawRkey] = segments;

  const authority = rawAuthority.startsWith('did:') ? validateDid(rawAuthority) : validateHandle(rawAuthority);
  if (!authority.ok) {
    return err(withFormat(authority.error, 'at-uri', 'authority'));
  }

  let collection: string | undefined;
  if (segments.length > 1) {
    const checked = validateNsid(rawCollection);
    if (!checked.ok) {
      return err(withFormat(checked.error, 'at-uri', 'collection'));
    }
    collection = checked.value;
  }

  let rkey: string | undefined;
  if (segments.length > 2) {
    const checked = validateRecordKey(rawRkey);
    if (!checked.ok) {
      return err(withFormat(checked.error, 'at-uri', 'record key'));
    }
    rkey = checked.value;
  }

  const uri = ['at:/', authority.value, collection, rkey].filter((part) => part !== undefined).join('/');
  return ok({ uri, authority: authority.value, collection, rkey });
}

/** Validate an at-uri and return its canonical form. */
export function validateAtUri(raw: string): Result<string, FormatError> {
  const parsed = parseAtUri(raw);
  return parsed.ok ? ok(parsed.value.uri) : parsed;
}

/** Whether `raw` is a valid at-uri. */
export function isValidAtUri(raw: string): boolean {
  return parseAtUri(raw).ok;
}

// ─── uri ────────────────────────────────────────────────────────────────────────

/**
 * Validate a generic URI: a scheme, a colon, and at least one
 * non-whitespace character.
 */
export function validateUri(raw: string): Result<string, FormatError> {
  if (raw.length === 0) {
    return formatFailure('uri', 'Empty', 'uri must not be empty');
  }
  if (raw.length > MAX_AT_URI_LENGTH) {
    return formatFailure('uri', 'TooLong', `uri is longer than ${MAX_AT_URI_LENGTH} characters`);
  }
  if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\S+$/.test(raw)) {
    return formatFailure('uri', 'BadSyntax', `"${raw}" is not a URI`);
  }
  return ok(raw);
}

/** Whether `raw` is a valid URI. */
export function isValidUri(raw: string): boolean {
  return validateUri(raw).ok;
}
