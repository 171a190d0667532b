import { sha256 } from '@noble/hashes/sha256';
import { ok, QuireError, QuireErrorCode } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure } from './errors';
import type { FormatError } from './errors';
import {
  bytesEqual,
  concatBytes,
  decodeBase32,
  decodeBase58btc,
  decodeVarint,
  encodeBase32,
  encodeBase58btc,
  encodeVarint,
  fromHex,
} from './encoding';

// ─── Multicodec table ───────────────────────────────────────────────────────────

/** Content codecs a CID commonly names. */
export const CODEC_RAW = 0x55;
export const CODEC_DAG_PB = 0x70;
export const CODEC_DAG_CBOR = 0x71;
export const CODEC_DAG_JSON = 0x0129;

/** Hash algorithms accepted in a CID's multihash, with their digest sizes. */
export const HASH_ALGORITHMS: Readonly<Record<number, { name: string; digestLength: number | undefined }>> = {
  0x00: { name: 'identity', digestLength: undefined },
  0x12: { name: 'sha2-256', digestLength: 32 },
  0x13: { name: 'sha2-512', digestLength: 64 },
  0xb220: { name: 'blake2b-256', digestLength: 32 },
};

const SHA2_256 = 0x12;

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A self-describing content hash. */
export interface Multihash {
  /** Hash function code, e.g. 0x12 for sha2-256. */
  readonly code: number;
  readonly digest: Uint8Array;
}

/** A decoded content identifier. */
export interface Cid {
  readonly version: 0 | 1;
  /** Content codec, e.g. 0x71 for dag-cbor. */
  readonly codec: number;
  readonly multihash: Multihash;
  /** Binary form: the bare multihash for v0, version+codec+multihash for v1. */
  readonly bytes: Uint8Array;
}

// ─── Parsing ────────────────────────────────────────────────────────────────────

function parseMultihash(bytes: Uint8Array, offset: number): Result<Multihash, FormatError> {
  const code = decodeVarint(bytes, offset);
  if (!code) {
    return formatFailure('cid', 'Truncated', 'multihash code is truncated');
  }
  const length = decodeVarint(bytes, offset + code.length);
  if (!length) {
    return formatFailure('cid', 'Truncated', 'multihash length is truncated');
  }
  const digest = bytes.slice(offset + code.length + length.length);
  if (digest.length !== length.value) {
    return formatFailure(
      'cid',
      digest.length < length.value ? 'Truncated' : 'DigestLengthMismatch',
      `multihash declares ${length.value} digest bytes but carries ${digest.length}`,
    );
  }
  const algorithm = HASH_ALGORITHMS[code.value];
  if (!algorithm) {
    return formatFailure('cid', 'UnsupportedHashAlgorithm', `hash function 0x${code.value.toString(16)} is not supported`);
  }
  if (algorithm.digestLength !== undefined && digest.length !== algorithm.digestLength) {
    return formatFailure(
      'cid',
      'DigestLengthMismatch',
      `${algorithm.name} digests are ${algorithm.digestLength} bytes, got ${digest.length}`,
    );
  }
  return ok({ code: code.value, digest });
}

/**
 * Decode a CID from its binary form. A leading `0x12 0x20` marks a v0
 * (bare sha2-256 multihash); anything else must be a v1.
 */
export function decodeCid(bytes: Uint8Array): Result<Cid, FormatError> {
  if (bytes.length === 0) {
    return formatFailure('cid', 'Empty', 'CID must not be empty');
  }
  if (bytes[0] === SHA2_256 && bytes[1] === 32) {
    const multihash = parseMultihash(bytes, 0);
    if (!multihash.ok) {
      return multihash;
    }
    const cid: Cid = { version: 0, codec: CODEC_DAG_PB, multihash: multihash.value, bytes };
    return ok(cid);
  }

  const version = decodeVarint(bytes, 0);
  if (!version) {
    return formatFailure('cid', 'Truncated', 'CID version is truncated');
  }
  if (version.value !== 1) {
    return formatFailure('cid', 'UnsupportedVersion', `CID version ${version.value} is not supported`);
  }
  const codec = decodeVarint(bytes, version.length);
  if (!codec) {
    return formatFailure('cid', 'Truncated', 'CID codec is truncated');
  }
  const multihash = parseMultihash(bytes, version.length + codec.length);
  if (!multihash.ok) {
    return multihash;
  }
  const cid: Cid = { version: 1, codec: codec.value, multihash: multihash.value, bytes };
  return ok(cid);
}

function decodeMultibase(raw: string): Result<Uint8Array, FormatError> {
  const prefix = raw[0];
  const body = raw.slice(1);
  let decoded: Uint8Array | undefined;
  switch (prefix) {
    case 'b':
      decoded = decodeBase32(body);
      break;
    case 'B':
      decoded = body === body.toUpperCase() ? decodeBase32(body.toLowerCase()) : undefined;
      break;
    case 'z':
      decoded = decodeBase58btc(body);
      break;
    case 'f':
      decoded = body === body.toLowerCase() ? fromHex(body) : undefined;
      break;
    case 'F':
      decoded = body === body.toUpperCase() ? fromHex(body) : undefined;
      break;
    default:
      return formatFailure('cid', 'BadMultibasePrefix', `multibase prefix "${prefix}" is not supported`);
  }
  if (decoded === undefined || decoded.length === 0) {
    return formatFailure('cid', 'BadEncoding', `CID body is not valid for multibase "${prefix}"`);
  }
  return ok(decoded);
}

/**
 * Parse a CID string: a bare base58btc v0 (`Qm...`) or a v1 behind one of
 * the multibase prefixes `b`, `B`, `z`, `f` or `F`.
 *
 * @example
 * ```typescript
 * const result = parseCid('bafkreibm6jg3ux5qumhcn2b3flc3tyu6dmlb4xa7u5bf44yegnrjhc4yeq');
 * // result.value.codec === CODEC_RAW
 * ```
 */
export function parseCid(raw: string): Result<Cid, FormatError> {
  if (raw.length === 0) {
    return formatFailure('cid', 'Empty', 'CID must not be empty');
  }

  if (raw.length === 46 && raw.startsWith('Qm')) {
    const bytes = decodeBase58btc(raw);
    if (bytes === undefined) {
      return formatFailure('cid', 'BadEncoding', 'CIDv0 is not valid base58btc');
    }
    const cid = decodeCid(bytes);
    if (cid.ok && cid.value.version !== 0) {
      return formatFailure('cid', 'BadEncoding', 'a "Qm" string must decode to a CIDv0');
    }
    return cid;
  }

  const bytes = decodeMultibase(raw);
  if (!bytes.ok) {
    return bytes;
  }
  const cid = decodeCid(bytes.value);
  if (cid.ok && cid.value.version === 0) {
    return formatFailure('cid', 'UnsupportedVersion', 'CIDv0 must be written as bare base58btc');
  }
  return cid;
}

/**
 * Canonical text form: base32 with a `b` prefix for v1, bare base58btc
 * for v0.
 */
export function formatCid(cid: Cid): string {
  return cid.version === 0 ? encodeBase58btc(cid.bytes) : `b${encodeBase32(cid.bytes)}`;
}

/** Validate a CID string and return its canonical form. */
export function validateCid(raw: string): Result<string, FormatError> {
  const parsed = parseCid(raw);
  return parsed.ok ? ok(formatCid(parsed.value)) : parsed;
}

/** Whether `raw` is a valid CID. */
export function isValidCid(raw: string): boolean {
  return parseCid(raw).ok;
}

/**
 * Compare two CIDs by their binary form, so different text encodings of
 * one CID are equal. Strings that do not parse are never equal.
 */
export function cidEquals(a: Cid | string, b: Cid | string): boolean {
  const left = typeof a === 'string' ? parseCid(a) : ok(a);
  const right = typeof b === 'string' ? parseCid(b) : ok(b);
  return left.ok && right.ok && bytesEqual(left.value.bytes, right.value.bytes);
}

/**
 * Create a CIDv1 for `data` with a sha2-256 multihash.
 *
 * @param codec - Content codec of `data`; defaults to raw.
 * @throws {QuireError} CODEC_INVALID_INPUT for a codec that is not a
 *   non-negative safe integer.
 *
 * @example
 * ```typescript
 * formatCid(createCid(new TextEncoder().encode('hello')));
 * // 'bafkreibm6jg3ux5qumhcn2b3flc3tyu6dmlb4xa7u5bf44yegnrjhc4yeq'
 * ```
 */
export function createCid(data: Uint8Array, codec: number = CODEC_RAW): Cid {
  if (!Number.isSafeInteger(codec) || codec < 0) {
    throw new QuireError(QuireErrorCode.CODEC_INVALID_INPUT, `Codec must be a non-negative integer, got ${codec}`);
  }
  const digest = sha256(data);
  const bytes = concatBytes(
    encodeVarint(1),
    encodeVarint(codec),
    encodeVarint(SHA2_256),
    encodeVarint(digest.length),
    digest,
  );
  return { version: 1, codec, multihash: { code: SHA2_256, digest }, bytes };
}
