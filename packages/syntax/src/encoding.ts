/**
 * Byte codecs used by the identifier formats: the multibase alphabets a
 * CID may be written in, the sortable base32 of TIDs, plain base64 for
 * `$bytes` payloads, and unsigned varints.
 *
 * Decoders return `undefined` on malformed input rather than throwing;
 * callers turn that into a rule-specific error.
 */

const BASE32_ALPHABET = 'abcdefghijklmnopqrstuvwxyz234567';
const BASE32_SORTABLE_ALPHABET = '234567abcdefghijklmnopqrstuvwxyz';
const BASE58_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

// ─── base32 (RFC 4648, no padding) ──────────────────────────────────────────────

/**
 * Encode bytes as lowercase, unpadded RFC 4648 base32.
 *
 * @example
 * ```typescript
 * encodeBase32(new Uint8Array(15)); // 'aaaaaaaaaaaaaaaaaaaaaaaa'
 * ```
 */
export function encodeBase32(data: Uint8Array): string {
  let value = 0;
  let bits = 0;
  let out = '';
  for (const byte of data) {
    value = (value << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      out += BASE32_ALPHABET[(value >>> (bits - 5)) & 31];
      bits -= 5;
    }
    value &= (1 << bits) - 1;
  }
  if (bits > 0) {
    out += BASE32_ALPHABET[(value << (5 - bits)) & 31];
  }
  return out;
}

/**
 * Decode lowercase, unpadded base32. Lengths that leave five or more
 * dangling bits, and non-zero padding bits, are rejected.
 */
export function decodeBase32(text: string): Uint8Array | undefined {
  const out: number[] = [];
  let value = 0;
  let bits = 0;
  for (const char of text) {
    const digit = BASE32_ALPHABET.indexOf(char);
    if (digit < 0) {
      return undefined;
    }
    value = (value << 5) | digit;
    bits += 5;
    if (bits >= 8) {
      out.push((value >>> (bits - 8)) & 0xff);
      bits -= 8;
    }
    value &= (1 << bits) - 1;
  }
  if (bits >= 5 || value !== 0) {
    return undefined;
  }
  return Uint8Array.from(out);
}

// ─── base32-sortable (TIDs) ─────────────────────────────────────────────────────

/** Number of base32-sortable characters needed for a 64-bit value. */
export const SORTABLE_U64_LENGTH = 13;

/**
 * Encode a 64-bit unsigned value as 13 base32-sortable characters. The
 * encoding preserves numeric order under plain string comparison.
 */
export function encodeSortableU64(value: bigint): string {
  let remaining = value;
  let out = '';
  for (let i = 0; i < SORTABLE_U64_LENGTH; i++) {
    out = BASE32_SORTABLE_ALPHABET[Number(remaining & 31n)] + out;
    remaining >>= 5n;
  }
  return out;
}

/** Decode base32-sortable characters to an unsigned value. */
export function decodeSortable(text: string): bigint | undefined {
  let value = 0n;
  for (const char of text) {
    const digit = BASE32_SORTABLE_ALPHABET.indexOf(char);
    if (digit < 0) {
      return undefined;
    }
    value = (value << 5n) | BigInt(digit);
  }
  return value;
}

/** Index of `char` in the sortable alphabet, or -1. */
export function sortableDigit(char: string): number {
  return BASE32_SORTABLE_ALPHABET.indexOf(char);
}

// ─── base58btc ──────────────────────────────────────────────────────────────────

/** Encode bytes as base58btc (Bitcoin alphabet). */
export function encodeBase58btc(data: Uint8Array): string {
  const digits: number[] = [];
  for (const byte of data) {
    let carry = byte;
    for (let j = 0; j < digits.length; j++) {
      carry += digits[j] << 8;
      digits[j] = carry % 58;
      carry = Math.floor(carry / 58);
    }
    while (carry > 0) {
      digits.push(carry % 58);
      carry = Math.floor(carry / 58);
    }
  }
  let out = '';
  for (let i = 0; i < data.length && data[i] === 0; i++) {
    out += '1';
  }
  for (let i = digits.length - 1; i >= 0; i--) {
    out += BASE58_ALPHABET[digits[i]];
  }
  return out;
}

/** Decode base58btc text. */
export function decodeBase58btc(text: string): Uint8Array | undefined {
  const bytes: number[] = [];
  for (const char of text) {
    const digit = BASE58_ALPHABET.indexOf(char);
    if (digit < 0) {
      return undefined;
    }
    let carry = digit;
    for (let j = 0; j < bytes.length; j++) {
      carry += bytes[j] * 58;
      bytes[j] = carry & 0xff;
      carry >>= 8;
    }
    while (carry > 0) {
      bytes.push(carry & 0xff);
      carry >>= 8;
    }
  }
  for (let i = 0; i < text.length && text[i] === '1'; i++) {
    bytes.push(0);
  }
  return Uint8Array.from(bytes.reverse());
}

// ─── base16 ─────────────────────────────────────────────────────────────────────

/**
 * Encode a byte array to a lowercase hex string.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([255, 0])); // 'ff00'
 * ```
 */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < data.length; i++) {
    hex += data[i].toString(16).padStart(2, '0');
  }
  return hex;
}

/** Decode an even-length hex string in a single letter case. */
export function fromHex(hex: string): Uint8Array | undefined {
  if (hex.length % 2 !== 0 || !/^([0-9a-f]*|[0-9A-F]*)$/.test(hex)) {
    return undefined;
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

// ─── base64 ─────────────────────────────────────────────────────────────────────

/** Encode bytes as standard base64 without padding. */
export function encodeBase64(data: Uint8Array): string {
  let binary = '';
  for (let i = 0; i < data.length; i++) {
    binary += String.fromCharCode(data[i]);
  }
  return btoa(binary).replace(/=+$/, '');
}

/**
 * Decode standard base64, padded or not. URL-safe characters are not
 * accepted.
 */
export function decodeBase64(text: string): Uint8Array | undefined {
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(text)) {
    return undefined;
  }
  const unpadded = text.replace(/=+$/, '');
  if (unpadded.length % 4 === 1) {
    return undefined;
  }
  const padded = unpadded + '='.repeat((4 - (unpadded.length % 4)) % 4);
  if (text.length !== unpadded.length && text !== padded) {
    return undefined;
  }
  let binary: string;
  try {
    binary = atob(padded);
  } catch {
    return undefined;
  }
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

// ─── Unsigned varint ────────────────────────────────────────────────────────────

/** Seven 7-bit groups keep every decoded value a safe integer. */
const MAX_VARINT_BYTES = 7;

/** Encode a non-negative safe integer as an unsigned LEB128 varint. */
export function encodeVarint(value: number): Uint8Array {
  const out: number[] = [];
  let remaining = value;
  while (remaining >= 0x80) {
    out.push((remaining % 0x80) | 0x80);
    remaining = Math.floor(remaining / 0x80);
  }
  out.push(remaining);
  return Uint8Array.from(out);
}

/**
 * Read an unsigned varint starting at `offset`. Returns the value and the
 * number of bytes consumed, or `undefined` when the input ends mid-varint
 * or the encoding is not minimal.
 */
export function decodeVarint(data: Uint8Array, offset = 0): { value: number; length: number } | undefined {
  let value = 0;
  let scale = 1;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const index = offset + i;
    if (index >= data.length) {
      return undefined;
    }
    const byte = data[index];
    value += (byte & 0x7f) * scale;
    if ((byte & 0x80) === 0) {
      if (byte === 0 && i > 0) {
        return undefined;
      }
      return { value, length: i + 1 };
    }
    scale *= 0x80;
  }
  return undefined;
}

/** Concatenate byte arrays. */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/** Byte-wise equality. */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}
