import { describe, it, expect } from 'vitest';
import { QuireErrorCode, isPlainObject, isQuireError } from '@quire/types';

import { compileGraph } from './builder';
import type { InstancePath, ValidationOutcome, ViolationKind } from './types';
import {
  acceptsMimeType,
  describeType,
  graphemeLength,
  utf8Length,
  validateDefinition,
  validateValue,
} from './validate';
import type { ValidateOptions } from './validate';

const CID = 'bafkreibm6jg3ux5qumhcn2b3flc3tyu6dmlb4xa7u5bf44yegnrjhc4yeq';

function lexicon(id: string, defs: Record<string, unknown>): Record<string, unknown> {
  return { lexicon: 1, id, defs };
}

function object(properties: Record<string, unknown>, extra?: Record<string, unknown>): Record<string, unknown> {
  return { type: 'object', properties, ...extra };
}

/** Validate `value` against `main` of a throwaway document. */
function check(
  main: Record<string, unknown>,
  value: unknown,
  options?: ValidateOptions,
  defs?: Record<string, unknown>,
): ValidationOutcome {
  const graph = compileGraph([lexicon('com.example.t', { main, ...defs })]);
  return validateDefinition(graph, 'com.example.t', value, options);
}

function problems(outcome: ValidationOutcome): { path: InstancePath; kind: ViolationKind }[] {
  return outcome.valid ? [] : outcome.violations.map(({ path, kind }) => ({ path, kind }));
}

function codes(outcome: ValidationOutcome): string[] {
  return problems(outcome).map((p) => p.kind.code);
}

describe('length helpers', () => {
  it('counts UTF-8 bytes', () => {
    expect(utf8Length('abc')).toBe(3);
    expect(utf8Length('é')).toBe(2);
    expect(utf8Length('👍🏽')).toBe(8);
  });

  it('counts grapheme clusters', () => {
    expect(graphemeLength('abc')).toBe(3);
    expect(graphemeLength('e\u0301')).toBe(1);
    expect(graphemeLength('👍🏽👍🏽')).toBe(2);
  });
});

describe('describeType', () => {
  it.each([
    [null, 'null'],
    [[1], 'array'],
    [new Uint8Array(1), 'bytes'],
    [3, 'integer'],
    [1.5, 'number'],
    ['x', 'string'],
    [{}, 'object'],
    [undefined, 'undefined'],
  ])('names %j as %s', (value, name) => {
    expect(describeType(value)).toBe(name);
  });
});

describe('string', () => {
  it('passes a conforming value through', () => {
    expect(check({ type: 'string', maxLength: 5 }, 'hello')).toEqual({ valid: true, value: 'hello' });
  });

  it('bounds byte length', () => {
    expect(problems(check({ type: 'string', maxLength: 5 }, 'héllo!'))).toEqual([
      { path: [], kind: { code: 'StringTooLong', maxBytes: 5, actualBytes: 7 } },
    ]);
    expect(problems(check({ type: 'string', minLength: 3 }, 'ab'))).toEqual([
      { path: [], kind: { code: 'StringTooShort', minBytes: 3, actualBytes: 2 } },
    ]);
  });

  it('bounds grapheme count separately from bytes', () => {
    expect(check({ type: 'string', maxGraphemes: 3 }, '👍🏽👍🏽👍🏽').valid).toBe(true);
    expect(problems(check({ type: 'string', minGraphemes: 2 }, 'e\u0301'))).toEqual([
      { path: [], kind: { code: 'StringTooFewGraphemes', minGraphemes: 2, actualGraphemes: 1 } },
    ]);
  });

  it('applies both units when both are set', () => {
    const text = 'é'.repeat(150);
    expect(check({ type: 'string', maxLength: 3000, maxGraphemes: 300 }, text).valid).toBe(true);
    expect(problems(check({ type: 'string', maxLength: 3000, maxGraphemes: 100 }, text))).toEqual([
      { path: [], kind: { code: 'StringTooManyGraphemes', maxGraphemes: 100, actualGraphemes: 150 } },
    ]);
    expect(codes(check({ type: 'string', maxLength: 200, maxGraphemes: 100 }, text))).toEqual([
      'StringTooLong',
      'StringTooManyGraphemes',
    ]);
  });

  it('returns the canonical form of formatted strings', () => {
    expect(check({ type: 'string', format: 'handle' }, 'Alice.Example.com')).toEqual({
      valid: true,
      value: 'alice.example.com',
    });
  });

  it('reports the format rule that failed', () => {
    const [problem] = problems(check({ type: 'string', format: 'handle' }, 'not a handle'));
    expect(problem.kind).toMatchObject({ code: 'FormatMismatch', format: 'handle', rule: 'MissingDot' });
  });

  it('checks enum and const', () => {
    expect(problems(check({ type: 'string', enum: ['red', 'green'] }, 'blue'))).toEqual([
      { path: [], kind: { code: 'EnumMismatch', allowed: ['red', 'green'] } },
    ]);
    expect(problems(check({ type: 'string', const: 'fixed' }, 'loose'))).toEqual([
      { path: [], kind: { code: 'ConstMismatch', expected: 'fixed' } },
    ]);
  });

  it('never enforces knownValues', () => {
    expect(check({ type: 'string', knownValues: ['a', 'b'] }, 'z').valid).toBe(true);
  });

  it('does not coerce other types', () => {
    expect(problems(check({ type: 'string' }, 5))).toEqual([
      { path: [], kind: { code: 'UnexpectedType', expected: 'string', actual: 'integer' } },
    ]);
  });
});

describe('integer', () => {
  const range = { type: 'integer', minimum: 1, maximum: 5 };

  it('accepts whole numbers in range', () => {
    expect(check(range, 3)).toEqual({ valid: true, value: 3 });
    expect(check(range, 5)).toEqual({ valid: true, value: 5 });
  });

  it('reports values out of range', () => {
    expect(problems(check(range, 9))).toEqual([
      { path: [], kind: { code: 'OutOfRange', minimum: 1, maximum: 5, actual: 9 } },
    ]);
  });

  it.each([
    [1.5, 'number'],
    ['5', 'string'],
    [true, 'boolean'],
  ])('rejects %j', (value, actual) => {
    expect(problems(check(range, value))).toEqual([
      { path: [], kind: { code: 'UnexpectedType', expected: 'integer', actual } },
    ]);
  });

  it('checks enum and const', () => {
    expect(codes(check({ type: 'integer', enum: [1, 2, 4] }, 3))).toEqual(['EnumMismatch']);
    expect(codes(check({ type: 'integer', const: 7 }, 8))).toEqual(['ConstMismatch']);
  });
});

describe('boolean', () => {
  it('accepts only true and false', () => {
    expect(check({ type: 'boolean' }, false)).toEqual({ valid: true, value: false });
    expect(codes(check({ type: 'boolean' }, 'true'))).toEqual(['UnexpectedType']);
    expect(codes(check({ type: 'boolean', const: true }, false))).toEqual(['ConstMismatch']);
  });
});

describe('bytes', () => {
  const bytes = { type: 'bytes', maxLength: 4 };

  it('accepts Uint8Array and the $bytes JSON form', () => {
    const data = new Uint8Array([1, 2, 3]);
    expect(check(bytes, data)).toEqual({ valid: true, value: data });
    expect(check(bytes, { $bytes: 'AQID' })).toEqual({ valid: true, value: { $bytes: 'AQID' } });
  });

  it('bounds the decoded length', () => {
    expect(problems(check(bytes, { $bytes: 'AQIDBAU' }))).toEqual([
      { path: [], kind: { code: 'ByteLengthOutOfBounds', maxLength: 4, actual: 5 } },
    ]);
  });

  it.each([[{ $bytes: '!!' }, 'object'], ['AQID', 'string'], [[1, 2], 'array']])('rejects %j', (value, actual) => {
    expect(problems(check(bytes, value))).toEqual([
      { path: [], kind: { code: 'UnexpectedType', expected: 'bytes', actual } },
    ]);
  });
});

describe('blob', () => {
  const image = { type: 'blob', accept: ['image/*'], maxSize: 1000 };
  const blob = (overrides: Record<string, unknown>): Record<string, unknown> => ({
    $type: 'blob',
    ref: { $link: CID },
    mimeType: 'image/png',
    size: 500,
    ...overrides,
  });

  it('accepts a matching blob', () => {
    expect(check(image, blob({}))).toEqual({ valid: true, value: blob({}) });
  });

  it('canonicalizes the CID', () => {
    const upper = `B${CID.slice(1).toUpperCase()}`;
    expect(check(image, blob({ ref: { $link: upper } }))).toEqual({ valid: true, value: blob({}) });
  });

  it('checks MIME type, size and link', () => {
    expect(problems(check(image, blob({ mimeType: 'video/mp4', size: 2000 })))).toEqual([
      { path: ['mimeType'], kind: { code: 'MimeTypeNotAccepted', mimeType: 'video/mp4', accept: ['image/*'] } },
      { path: ['size'], kind: { code: 'BlobTooLarge', maxSize: 1000, actual: 2000 } },
    ]);
    const [bad] = problems(check(image, blob({ ref: { $link: 'nope' } })));
    expect(bad.path).toEqual(['ref', '$link']);
    expect(bad.kind).toMatchObject({ code: 'FormatMismatch', format: 'cid' });
  });

  it('rejects values without the blob shape', () => {
    expect(problems(check(image, blob({ $type: undefined })))).toEqual([
      { path: [], kind: { code: 'UnexpectedType', expected: 'blob', actual: 'object' } },
    ]);
    expect(codes(check(image, blob({ size: -1 })))).toEqual(['UnexpectedType']);
  });
});

describe('acceptsMimeType', () => {
  it.each([
    [['image/*'], 'image/png', true],
    [['image/*'], 'video/mp4', false],
    [['*/*'], 'application/octet-stream', true],
    [['text/plain'], 'TEXT/Plain', true],
    [['text/plain'], 'text/html', false],
  ])('%j accepts %s: %s', (accept, mimeType, expected) => {
    expect(acceptsMimeType(accept, mimeType)).toBe(expected);
  });
});

describe('cid-link', () => {
  it('accepts a link and canonicalizes it', () => {
    expect(check({ type: 'cid-link' }, { $link: CID })).toEqual({ valid: true, value: { $link: CID } });
  });

  it('rejects bad CIDs and extra keys', () => {
    const [bad] = problems(check({ type: 'cid-link' }, { $link: 'zzz' }));
    expect(bad.path).toEqual(['$link']);
    expect(bad.kind.code).toBe('FormatMismatch');
    expect(codes(check({ type: 'cid-link' }, { $link: CID, extra: 1 }))).toEqual(['UnexpectedType']);
  });
});

describe('null and unknown', () => {
  it('accepts only null for null', () => {
    expect(check({ type: 'null' }, null)).toEqual({ valid: true, value: null });
    expect(problems(check({ type: 'null' }, 0))).toEqual([
      { path: [], kind: { code: 'UnexpectedType', expected: 'null', actual: 'integer' } },
    ]);
  });

  it('accepts any JSON-like value for unknown', () => {
    const value = { a: [1, 'x', null, { b: true }] };
    expect(check({ type: 'unknown' }, value)).toEqual({ valid: true, value });
  });

  it.each([
    [Number.NaN, 'number'],
    [{ f: (): number => 1 }, 'object'],
    [undefined, 'undefined'],
  ])('rejects %s for unknown', (value, actual) => {
    expect(problems(check({ type: 'unknown' }, value))).toEqual([
      { path: [], kind: { code: 'UnexpectedType', expected: 'JSON value', actual } },
    ]);
  });
});

describe('token', () => {
  const main = object({ mood: { type: 'ref', ref: '#happy' } });
  const defs = { happy: { type: 'token' } };

  it('matches the fully qualified token name', () => {
    expect(check(main, { mood: 'com.example.t#happy' }, undefined, defs).valid).toBe(true);
    expect(problems(check(main, { mood: 'happy' }, undefined, defs))).toEqual([
      { path: ['mood'], kind: { code: 'ConstMismatch', expected: 'com.example.t#happy' } },
    ]);
  });
});

describe('object', () => {
  const profile = object(
    {
      name: { type: 'string' },
      bio: { type: 'string' },
      avatar: { type: 'string' },
      level: { type: 'string', default: 'info' },
      age: { type: 'integer' },
    },
    { required: ['name', 'avatar'], nullable: ['avatar'] },
  );

  it('reports a missing required property at its path', () => {
    expect(problems(check(profile, { avatar: null }))).toEqual([
      { path: ['name'], kind: { code: 'MissingRequiredField', field: 'name' } },
    ]);
  });

  it('treats null as missing unless the property is nullable', () => {
    expect(problems(check(profile, { name: null, avatar: null, bio: null }))).toEqual([
      { path: ['name'], kind: { code: 'MissingRequiredField', field: 'name' } },
      { path: ['bio'], kind: { code: 'UnexpectedType', expected: 'string', actual: 'null' } },
    ]);
  });

  it('collects every sibling violation in declaration order', () => {
    expect(codes(check(profile, { age: 'old', bio: 4 }))).toEqual([
      'MissingRequiredField',
      'UnexpectedType',
      'MissingRequiredField',
      'UnexpectedType',
    ]);
  });

  it('applies defaults unless asked not to', () => {
    expect(check(profile, { name: 'a', avatar: null })).toEqual({
      valid: true,
      value: { name: 'a', avatar: null, level: 'info' },
    });
    expect(check(profile, { name: 'a', avatar: null }, { applyDefaults: false })).toEqual({
      valid: true,
      value: { name: 'a', avatar: null },
    });
  });

  it('builds a new value, $type first and unknown keys last', () => {
    const input = { extra: 1, avatar: 'x', name: 'a', $type: 'com.example.t' };
    const outcome = check(profile, input);
    if (!outcome.valid || !isPlainObject(outcome.value)) {
      throw new Error('expected a valid object');
    }
    expect(Object.keys(outcome.value)).toEqual(['$type', 'name', 'avatar', 'level', 'extra']);
    expect(input).toEqual({ extra: 1, avatar: 'x', name: 'a', $type: 'com.example.t' });
  });

  it('never adds violations when a failing property is removed', () => {
    const shape = object({ a: { type: 'integer' }, b: { type: 'string', maxLength: 2 }, c: { type: 'boolean' } });
    const all = problems(check(shape, { a: 'x', b: 'long', c: 1 }));
    expect(all.map((p) => p.path)).toEqual([['a'], ['b'], ['c']]);
    for (const key of ['a', 'b', 'c']) {
      const rest: Record<string, unknown> = { a: 'x', b: 'long', c: 1 };
      delete rest[key];
      expect(problems(check(shape, rest))).toEqual(all.filter((p) => p.path[0] !== key));
    }
  });

  it('rejects undeclared keys on closed objects', () => {
    const closed = object({ a: { type: 'integer' } }, { closed: true });
    expect(check(closed, { a: 1, $type: 'com.example.t' }).valid).toBe(true);
    expect(problems(check(closed, { a: 1, b: 2 }))).toEqual([
      { path: ['b'], kind: { code: 'UnexpectedProperty', property: 'b' } },
    ]);
  });

  it('never copies a __proto__ key', () => {
    const input: unknown = JSON.parse('{"__proto__": {"polluted": true}}');
    expect(codes(check(object({}), input))).toEqual(['UnexpectedProperty']);
  });

  it('rejects non-objects', () => {
    expect(problems(check(profile, []))).toEqual([
      { path: [], kind: { code: 'UnexpectedType', expected: 'object', actual: 'array' } },
    ]);
  });
});

describe('array', () => {
  const tags = { type: 'array', items: { type: 'string' }, maxLength: 2 };

  it('validates every item at its index', () => {
    expect(check(tags, ['a', 'b'])).toEqual({ valid: true, value: ['a', 'b'] });
    expect(problems(check(tags, ['a', 1]))).toEqual([
      { path: [1], kind: { code: 'UnexpectedType', expected: 'string', actual: 'integer' } },
    ]);
  });

  it('reports the item count and still checks the items', () => {
    expect(problems(check(tags, ['a', 1, 'c']))).toEqual([
      { path: [], kind: { code: 'ArrayLengthOutOfBounds', maxLength: 2, actual: 3 } },
      { path: [1], kind: { code: 'UnexpectedType', expected: 'string', actual: 'integer' } },
    ]);
  });

  it('reports a minimum item count', () => {
    expect(problems(check({ type: 'array', items: { type: 'string' }, minLength: 1 }, []))).toEqual([
      { path: [], kind: { code: 'ArrayLengthOutOfBounds', minLength: 1, actual: 0 } },
    ]);
  });
});

describe('union', () => {
  const union = { type: 'union', refs: ['#image', '#video'] };
  const defs = {
    image: object({ alt: { type: 'string' } }, { required: ['alt'] }),
    video: object({ url: { type: 'string', format: 'uri' } }),
  };

  it('selects the member named by $type', () => {
    const value = { $type: 'com.example.t#image', alt: 'a cat' };
    expect(check(union, value, undefined, defs)).toEqual({ valid: true, value });
    expect(problems(check(union, { $type: 'com.example.t#image' }, undefined, defs))).toEqual([
      { path: ['alt'], kind: { code: 'MissingRequiredField', field: 'alt' } },
    ]);
  });

  it('requires a string $type', () => {
    expect(problems(check(union, { alt: 'x' }, undefined, defs))).toEqual([
      { path: ['$type'], kind: { code: 'MissingRequiredField', field: '$type' } },
    ]);
    expect(problems(check(union, { $type: 5 }, undefined, defs))).toEqual([
      { path: ['$type'], kind: { code: 'UnexpectedType', expected: 'string', actual: 'integer' } },
    ]);
    expect(codes(check(union, 'x', undefined, defs))).toEqual(['UnexpectedType']);
  });

  it('passes unknown tags through an open union', () => {
    const value = { $type: 'com.other.thing', anything: true };
    expect(check(union, value, undefined, defs)).toEqual({ valid: true, value });
  });

  it('rejects unknown tags in a closed union', () => {
    expect(problems(check({ ...union, closed: true }, { $type: 'com.other.thing' }, undefined, defs))).toEqual([
      {
        path: ['$type'],
        kind: {
          code: 'UnknownUnionTag',
          tag: 'com.other.thing',
          allowed: ['com.example.t#image', 'com.example.t#video'],
        },
      },
    ]);
  });

  it('reads nsid#main as nsid', () => {
    const graph = compileGraph([
      lexicon('com.example.t', { main: { type: 'union', refs: ['com.example.link'], closed: true } }),
      lexicon('com.example.link', { main: object({ uri: { type: 'string' } }, { required: ['uri'] }) }),
    ]);
    const outcome = validateDefinition(graph, 'com.example.t', { $type: 'com.example.link#main', uri: 'x' });
    expect(outcome.valid).toBe(true);
  });
});

describe('validateValue', () => {
  const graph = compileGraph([
    lexicon('com.example.t', { main: object({ count: { type: 'integer' } }) }),
    lexicon('com.example.list', { main: { type: 'query' } }),
  ]);

  it('prefixes violation paths', () => {
    const handle = graph.lookup('com.example.t');
    expect(handle).toBe(1);
    const outcome = validateValue(graph, 1, { count: 'x' }, undefined, ['body']);
    expect(problems(outcome)).toEqual([
      { path: ['body', 'count'], kind: { code: 'UnexpectedType', expected: 'integer', actual: 'string' } },
    ]);
  });

  it('refuses to validate a value against a query', () => {
    let thrown: unknown;
    try {
      validateDefinition(graph, 'com.example.list', {});
    } catch (e) {
      thrown = e;
    }
    expect(isQuireError(thrown, QuireErrorCode.DEFINITION_KIND_MISMATCH)).toBe(true);
  });

  it('throws DEFINITION_NOT_FOUND for unknown refs', () => {
    expect(() => validateDefinition(graph, 'com.example.t#nope', {})).toThrow('No definition com.example.t#nope in this graph');
  });
});
