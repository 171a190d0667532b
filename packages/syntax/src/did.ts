import { ok } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure } from './errors';
import type { FormatError } from './errors';
import { decodeBase32 } from './encoding';
import { validateHandle } from './handle';

/** Maximum DID length in characters. */
export const MAX_DID_LENGTH = 2048;

/** A parsed decentralized identifier. */
export interface Did {
  /** The full DID, unchanged (DIDs are case-sensitive). */
  readonly did: string;
  /** Method name, e.g. `plc` or `web`. */
  readonly method: string;
  /** Everything after `did:<method>:`. */
  readonly identifier: string;
}

/**
 * Parse a DID.
 *
 * The generic grammar applies to every method. `did:plc` identifiers must
 * also be 24 base32 characters, and `did:web` identifiers must decode to a
 * valid hostname with an optional percent-encoded port.
 *
 * @example
 * ```typescript
 * parseDid('did:plc:ewvi7nxzyoun6zhxrhs64oiz');
 * parseDid('did:web:example.com%3A3000');
 * ```
 */
export function parseDid(raw: string): Result<Did, FormatError> {
  if (raw.length === 0) {
    return formatFailure('did', 'Empty', 'DID must not be empty');
  }
  if (raw.length > MAX_DID_LENGTH) {
    return formatFailure('did', 'TooLong', `DID is longer than ${MAX_DID_LENGTH} characters`);
  }
  if (!raw.startsWith('did:')) {
    return formatFailure('did', 'MissingPrefix', 'DID must start with "did:"');
  }

  const rest = raw.slice(4);
  const colon = rest.indexOf(':');
  const method = colon < 0 ? rest : rest.slice(0, colon);
  if (!/^[a-z0-9]+$/.test(method)) {
    return formatFailure('did', 'BadMethod', 'DID method must be lowercase letters and digits');
  }

  const identifier = colon < 0 ? '' : rest.slice(colon + 1);
  if (identifier.length === 0) {
    return formatFailure('did', 'EmptyIdentifier', 'DID has no method-specific identifier');
  }
  if (!/^[A-Za-z0-9._:%-]+$/.test(identifier)) {
    return formatFailure('did', 'InvalidCharacter', 'DID identifier contains a character outside [A-Za-z0-9._:%-]');
  }
  if (/%(?![0-9A-Fa-f]{2})/.test(identifier)) {
    return formatFailure('did', 'BadPercentEncoding', 'every "%" must be followed by two hex digits');
  }
  if (identifier.endsWith(':')) {
    return formatFailure('did', 'TrailingColon', 'DID must not end with ":"');
  }

  if (method === 'plc') {
    if (!/^[a-z2-7]{24}$/.test(identifier) || decodeBase32(identifier) === undefined) {
      return formatFailure('did', 'BadPlcIdentifier', 'did:plc identifier must be 24 lowercase base32 characters');
    }
  } else if (method === 'web') {
    const host = checkWebHost(identifier);
    if (!host.ok) {
      return host;
    }
  }

  return ok({ did: raw, method, identifier });
}

function checkWebHost(identifier: string): Result<string, FormatError> {
  if (identifier.includes(':')) {
    return formatFailure('did', 'BadWebHost', 'did:web paths are not supported');
  }
  let decoded: string;
  try {
    decoded = decodeURIComponent(identifier);
  } catch {
    return formatFailure('did', 'BadPercentEncoding', 'did:web identifier does not decode to UTF-8');
  }

  const match = /^([^:]*)(?::(\d{1,5}))?$/.exec(decoded);
  if (!match) {
    return formatFailure('did', 'BadWebHost', `"${decoded}" is not a host with an optional port`);
  }
  const [, host, port] = match;
  if (port !== undefined && Number(port) > 65535) {
    return formatFailure('did', 'BadWebHost', `port ${port} is out of range`);
  }
  const handle = validateHandle(host);
  if (!handle.ok) {
    return formatFailure('did', 'BadWebHost', `did:web host is invalid: ${handle.error.message}`);
  }
  return ok(decoded);
}

/** Validate a DID, returning it unchanged on success. */
export function validateDid(raw: string): Result<string, FormatError> {
  const parsed = parseDid(raw);
  return parsed.ok ? ok(parsed.value.did) : parsed;
}

/** Whether `raw` is a valid DID. */
export function isValidDid(raw: string): boolean {
  return parseDid(raw).ok;
}
