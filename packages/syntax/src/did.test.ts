import { describe, it, expect } from 'vitest';
import { parseDid, validateDid, isValidDid, MAX_DID_LENGTH } from './did';

function ruleOf(raw: string): string {
  const result = parseDid(raw);
  return result.ok ? 'ok' : result.error.rule;
}

describe('parseDid', () => {
  it('splits method and identifier', () => {
    expect(parseDid('did:plc:ewvi7nxzyoun6zhxrhs64oiz')).toEqual({
      ok: true,
      value: { did: 'did:plc:ewvi7nxzyoun6zhxrhs64oiz', method: 'plc', identifier: 'ewvi7nxzyoun6zhxrhs64oiz' },
    });
  });

  it.each([
    'did:web:example.com',
    'did:web:example.com%3A3000',
    'did:method:val%BB',
    'did:example:a:b:c',
    'did:key:zQ3shokFTS3brHcDQrn82RUDfCZESWL1ZdCEJwekUDPQiYBme',
  ])('accepts %s', (did) => {
    expect(isValidDid(did)).toBe(true);
  });

  it('keeps the identifier case', () => {
    expect(validateDid('did:example:ABC')).toEqual({ ok: true, value: 'did:example:ABC' });
  });

  it.each([
    ['', 'Empty'],
    ['DID:plc:abc', 'MissingPrefix'],
    ['did:PLC:abc', 'BadMethod'],
    ['did::abc', 'BadMethod'],
    ['did:plc', 'EmptyIdentifier'],
    ['did:plc:', 'EmptyIdentifier'],
    ['did:example:a b', 'InvalidCharacter'],
    ['did:example:ab%2', 'BadPercentEncoding'],
    ['did:example:abc:', 'TrailingColon'],
    ['did:plc:ewvi7nxzyoun6zhxrhs64oi', 'BadPlcIdentifier'],
    ['did:plc:EWVI7NXZYOUN6ZHXRHS64OIZ', 'BadPlcIdentifier'],
    ['did:plc:ewvi7nxzyoun6zhxrhs64oi1', 'BadPlcIdentifier'],
    ['did:web:localhost', 'BadWebHost'],
    ['did:web:example.com:user', 'BadWebHost'],
    ['did:web:example.com%3A99999', 'BadWebHost'],
  ])('rejects %j with %s', (did, rule) => {
    expect(ruleOf(did)).toBe(rule);
  });

  it('caps the length', () => {
    expect(ruleOf(`did:example:${'a'.repeat(MAX_DID_LENGTH)}`)).toBe('TooLong');
  });
});

describe('canonical form', () => {
  it.each([
    'did:example:ABC',
    'did:plc:ewvi7nxzyoun6zhxrhs64oiz',
    'did:web:example.com%3A3000',
  ])('validates its own output unchanged: %s', (raw) => {
    const first = validateDid(raw);
    expect(first.ok).toBe(true);
    expect(first.ok && validateDid(first.value)).toEqual(first);
  });
});
