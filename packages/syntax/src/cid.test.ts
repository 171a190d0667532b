import { describe, it, expect } from 'vitest';
import {
  parseCid,
  validateCid,
  formatCid,
  cidEquals,
  createCid,
  CODEC_RAW,
  CODEC_DAG_CBOR,
  CODEC_DAG_PB,
} from './cid';
import { toHex } from './encoding';

const HELLO_DIGEST = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const HELLO_RAW = 'bafkreibm6jg3ux5qumhcn2b3flc3tyu6dmlb4xa7u5bf44yegnrjhc4yeq';
const HELLO_CBOR = 'bafyreibm6jg3ux5qumhcn2b3flc3tyu6dmlb4xa7u5bf44yegnrjhc4yeq';
const HELLO_V0 = 'QmRN6wdp1S2A5EtjW9A3M1vKSBuQQGcgvuhoMUoEz4iiT5';

const hello = new TextEncoder().encode('hello');

function ruleOf(raw: string): string {
  const result = parseCid(raw);
  return result.ok ? 'ok' : result.error.rule;
}

describe('parseCid', () => {
  it('decodes a base32 CIDv1', () => {
    const result = parseCid(HELLO_RAW);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.version).toBe(1);
      expect(result.value.codec).toBe(CODEC_RAW);
      expect(result.value.multihash.code).toBe(0x12);
      expect(toHex(result.value.multihash.digest)).toBe(HELLO_DIGEST);
    }
  });

  it('decodes a bare base58 CIDv0', () => {
    const result = parseCid(HELLO_V0);
    expect(result.ok && result.value.version).toBe(0);
    expect(result.ok && result.value.codec).toBe(CODEC_DAG_PB);
    expect(validateCid(HELLO_V0)).toEqual({ ok: true, value: HELLO_V0 });
  });

  it('canonicalizes other multibase encodings to base32', () => {
    const hex = `01551220${HELLO_DIGEST}`;
    expect(validateCid(`f${hex}`)).toEqual({ ok: true, value: HELLO_RAW });
    expect(validateCid(`F${hex.toUpperCase()}`)).toEqual({ ok: true, value: HELLO_RAW });
    expect(validateCid(`B${HELLO_RAW.slice(1).toUpperCase()}`)).toEqual({ ok: true, value: HELLO_RAW });
    expect(validateCid('zb2rhZfjRh2FHHB2RkHVEvL2vJnCTcu7kwRqgVsf9gpkLgteo')).toEqual({ ok: true, value: HELLO_RAW });
  });

  it.each([
    ['', 'Empty'],
    ['xabc', 'BadMultibasePrefix'],
    ['b!!!', 'BadEncoding'],
    ['b', 'BadEncoding'],
    [`f01551220${HELLO_DIGEST.slice(2)}`, 'Truncated'],
    ['f015512202cf2', 'Truncated'],
    [`f01551220${HELLO_DIGEST}00`, 'DigestLengthMismatch'],
    [`f01551210${HELLO_DIGEST.slice(0, 32)}`, 'DigestLengthMismatch'],
    [`f01551420${HELLO_DIGEST}`, 'UnsupportedHashAlgorithm'],
    [`f02551220${HELLO_DIGEST}`, 'UnsupportedVersion'],
    [`f1220${HELLO_DIGEST}`, 'UnsupportedVersion'],
  ])('rejects %j with %s', (cid, rule) => {
    expect(ruleOf(cid)).toBe(rule);
  });

  it('accepts identity multihashes of any length', () => {
    expect(ruleOf('f01550003616263')).toBe('ok');
  });
});

describe('createCid', () => {
  it('hashes with sha2-256 under the raw codec by default', () => {
    expect(formatCid(createCid(hello))).toBe(HELLO_RAW);
  });

  it('takes a content codec', () => {
    expect(formatCid(createCid(hello, CODEC_DAG_CBOR))).toBe(HELLO_CBOR);
  });

  it('rejects a negative codec', () => {
    expect(() => createCid(hello, -1)).toThrow('Codec must be a non-negative integer, got -1');
  });
});

describe('cidEquals', () => {
  it('compares decoded bytes across encodings', () => {
    expect(cidEquals('zb2rhZfjRh2FHHB2RkHVEvL2vJnCTcu7kwRqgVsf9gpkLgteo', HELLO_RAW)).toBe(true);
    expect(cidEquals(createCid(hello), HELLO_RAW)).toBe(true);
  });

  it('distinguishes codecs and versions', () => {
    expect(cidEquals(HELLO_RAW, HELLO_CBOR)).toBe(false);
    expect(cidEquals(HELLO_V0, HELLO_RAW)).toBe(false);
  });

  it('treats unparseable strings as unequal', () => {
    expect(cidEquals('garbage', 'garbage')).toBe(false);
  });
});

describe('canonical form', () => {
  it.each([
    HELLO_RAW,
    HELLO_CBOR,
    HELLO_V0,
    `B${HELLO_RAW.slice(1).toUpperCase()}`,
    'zb2rhZfjRh2FHHB2RkHVEvL2vJnCTcu7kwRqgVsf9gpkLgteo',
  ])('validates its own output unchanged: %s', (raw) => {
    const first = validateCid(raw);
    expect(first.ok).toBe(true);
    expect(first.ok && validateCid(first.value)).toEqual(first);
  });
});
